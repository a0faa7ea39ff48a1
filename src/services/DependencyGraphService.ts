// src/services/DependencyGraphService.ts
import { logger } from '../utils/logger.js';
import { type TaskDefinition } from '../types/index.js';
import {
  EdgeKindEnum,
  type DanglingReference,
  type EdgeKind,
  type TaskEdge,
  type TaskRelation,
} from './MiseTaskServiceTypes.js';

const WILDCARD = '*';

/** The task part of a reference; mise allows arguments after the name. */
export function referenceTarget(reference: string): string {
  return reference.trim().split(/\s+/)[0] ?? '';
}

/**
 * Strongly connected components over `nodes`, found with an iterative Tarjan walk.
 * Components and their members come back in `nodes` order.
 */
export function stronglyConnectedComponents(nodes: string[], successors: Map<string, string[]>): string[][] {
  const position = new Map(nodes.map((node, index) => [node, index]));
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  for (const start of nodes) {
    if (index.has(start)) {
      continue;
    }
    const work: { node: string; next: number }[] = [{ node: start, next: 0 }];
    index.set(start, counter);
    lowLink.set(start, counter);
    counter++;
    stack.push(start);
    onStack.add(start);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      if (frame === undefined) {
        break;
      }
      const neighbours = successors.get(frame.node) ?? [];
      if (frame.next < neighbours.length) {
        const neighbour = neighbours[frame.next] ?? '';
        frame.next++;
        if (!index.has(neighbour)) {
          index.set(neighbour, counter);
          lowLink.set(neighbour, counter);
          counter++;
          stack.push(neighbour);
          onStack.add(neighbour);
          work.push({ node: neighbour, next: 0 });
        } else if (onStack.has(neighbour)) {
          lowLink.set(frame.node, Math.min(lowLink.get(frame.node) ?? 0, index.get(neighbour) ?? 0));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent !== undefined) {
        lowLink.set(parent.node, Math.min(lowLink.get(parent.node) ?? 0, lowLink.get(frame.node) ?? 0));
      }
      if (lowLink.get(frame.node) === index.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member !== undefined) {
            onStack.delete(member);
            component.push(member);
          }
        } while (member !== undefined && member !== frame.node);
        components.push(component);
      }
    }
  }

  const byPosition = (a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  return components
    .map((component) => component.sort(byPosition))
    .sort((a, b) => byPosition(a[0] ?? '', b[0] ?? ''));
}

function sameMembers(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((member) => b.includes(member));
}

/**
 * Directed graph over full task names. Edges point in execution order:
 * `depends` D→T, `depends_post` T→P, `wait_for` W→T.
 */
export class TaskGraph {
  public readonly tasks: TaskDefinition[];
  public readonly edges: TaskEdge[];
  public readonly dangling: DanglingReference[];
  /** Cycles among hard edges only. */
  public readonly hardCycles: string[][];
  /** Cycles that need a soft edge to close. Legal in mise, but a smell. */
  public readonly softCycles: string[][];

  private readonly byName: Map<string, TaskDefinition>;
  private readonly declarationIndex: Map<string, number>;
  private readonly hardDependencies: Map<string, string[]>;
  private readonly hardDependents: Map<string, string[]>;

  constructor(tasks: TaskDefinition[], edges: TaskEdge[], dangling: DanglingReference[]) {
    this.tasks = tasks;
    this.edges = edges;
    this.dangling = dangling;
    this.byName = new Map(tasks.map((task) => [task.full_name, task]));
    this.declarationIndex = new Map(tasks.map((task, index) => [task.full_name, index]));
    this.hardDependencies = new Map(tasks.map((task) => [task.full_name, []]));
    this.hardDependents = new Map(tasks.map((task) => [task.full_name, []]));

    const hardSuccessors = new Map<string, string[]>(tasks.map((task) => [task.full_name, []]));
    const allSuccessors = new Map<string, string[]>(tasks.map((task) => [task.full_name, []]));
    for (const edge of edges) {
      allSuccessors.get(edge.from)?.push(edge.to);
      if (edge.kind === 'depends') {
        hardSuccessors.get(edge.from)?.push(edge.to);
        this.hardDependencies.get(edge.to)?.push(edge.from);
        this.hardDependents.get(edge.from)?.push(edge.to);
      }
    }

    const names = this.names();
    const isCycle = (component: string[], successors: Map<string, string[]>): boolean => {
      const only = component[0] ?? '';
      return component.length > 1 || (successors.get(only) ?? []).includes(only);
    };
    this.hardCycles = stronglyConnectedComponents(names, hardSuccessors).filter((c) => isCycle(c, hardSuccessors));
    this.softCycles = stronglyConnectedComponents(names, allSuccessors).filter(
      (c) => isCycle(c, allSuccessors) && !this.hardCycles.some((hard) => sameMembers(hard, c))
    );
  }

  /** Full names in declaration order. */
  public names(): string[] {
    return this.tasks.map((task) => task.full_name);
  }

  public has(fullName: string): boolean {
    return this.byName.has(fullName);
  }

  public get(fullName: string): TaskDefinition | undefined {
    return this.byName.get(fullName);
  }

  public declarationOrder(fullName: string): number {
    return this.declarationIndex.get(fullName) ?? Number.MAX_SAFE_INTEGER;
  }

  public compareByDeclaration = (a: string, b: string): number =>
    this.declarationOrder(a) - this.declarationOrder(b);

  /** Direct hard dependencies, deduplicated, in declaration order. */
  public dependenciesOf(fullName: string): string[] {
    return [...new Set(this.hardDependencies.get(fullName) ?? [])].sort(this.compareByDeclaration);
  }

  /** Direct hard dependents, deduplicated, in declaration order. */
  public dependentsOf(fullName: string): string[] {
    return [...new Set(this.hardDependents.get(fullName) ?? [])].sort(this.compareByDeclaration);
  }

  /** Tasks resolved from the given task's own field of this kind. */
  public relationsDeclaredBy(fullName: string, kind: EdgeKind): string[] {
    const targets = this.edges
      .filter((edge) => edge.declared_by === fullName && edge.kind === kind)
      .map((edge) => (edge.from === fullName ? edge.to : edge.from));
    return [...new Set(targets)].sort(this.compareByDeclaration);
  }

  /** Other tasks whose own fields reference this task, with the field that does. */
  public referrersOf(fullName: string): TaskRelation[] {
    const relations: TaskRelation[] = [];
    for (const edge of this.edges) {
      const referenced = edge.declared_by === edge.from ? edge.to : edge.from;
      if (referenced !== fullName || edge.declared_by === fullName) {
        continue;
      }
      if (!relations.some((r) => r.task === edge.declared_by && r.relation === edge.kind)) {
        relations.push({ task: edge.declared_by, relation: edge.kind });
      }
    }
    return relations.sort(
      (a, b) =>
        this.compareByDeclaration(a.task, b.task) ||
        EdgeKindEnum.options.indexOf(a.relation) - EdgeKindEnum.options.indexOf(b.relation)
    );
  }

  /** True when the task has no edges of any kind except to itself. */
  public isIsolated(fullName: string): boolean {
    return this.edges.every((edge) => (edge.from !== fullName && edge.to !== fullName) || edge.from === edge.to);
  }
}

/**
 * Resolves a dependency reference by full name, then declared name, then alias.
 * A trailing `*` matches every task whose name starts with the prefix.
 */
export class TaskReferenceResolver {
  private readonly tasks: TaskDefinition[];
  private readonly byFullName = new Map<string, TaskDefinition>();
  private readonly byDeclaredName = new Map<string, TaskDefinition>();
  private readonly byAlias = new Map<string, TaskDefinition>();

  constructor(tasks: TaskDefinition[]) {
    this.tasks = tasks;
    for (const task of tasks) {
      this.byFullName.set(task.full_name, task);
      if (!this.byDeclaredName.has(task.name)) this.byDeclaredName.set(task.name, task);
      if (task.alias && !this.byAlias.has(task.alias)) this.byAlias.set(task.alias, task);
    }
  }

  /** Full names the reference stands for; empty when it is dangling. */
  public resolve(reference: string, declaringTask?: string): string[] {
    const target = referenceTarget(reference);
    if (target.length === 0) {
      return [];
    }
    if (target.endsWith(WILDCARD)) {
      const prefix = target.slice(0, -WILDCARD.length);
      return this.tasks
        .filter((task) => task.full_name !== declaringTask)
        .filter((task) => task.full_name.startsWith(prefix) || task.name.startsWith(prefix))
        .map((task) => task.full_name);
    }
    const found = this.byFullName.get(target) ?? this.byDeclaredName.get(target) ?? this.byAlias.get(target);
    return found ? [found.full_name] : [];
  }
}

/**
 * Builds the TaskGraph for an extracted task set.
 */
export class DependencyGraphService {
  public build(tasks: TaskDefinition[]): TaskGraph {
    const resolver = new TaskReferenceResolver(tasks);
    const edges: TaskEdge[] = [];
    const dangling: DanglingReference[] = [];
    for (const task of tasks) {
      const fields: Record<EdgeKind, string[]> = {
        depends: task.depends,
        depends_post: task.depends_post,
        wait_for: task.wait_for,
      };
      for (const kind of EdgeKindEnum.options) {
        for (const reference of fields[kind]) {
          const targets = resolver.resolve(reference, task.full_name);
          if (targets.length === 0) {
            dangling.push({ task: task.full_name, kind, reference });
            continue;
          }
          for (const target of targets) {
            const [from, to] = kind === 'depends_post' ? [task.full_name, target] : [target, task.full_name];
            edges.push({ from, to, kind, declared_by: task.full_name, reference });
          }
        }
      }
    }

    const graph = new TaskGraph(tasks, edges, dangling);
    logger.debug(
      `[DependencyGraphService] ${tasks.length} task(s), ${edges.length} edge(s), ${dangling.length} dangling, ${graph.hardCycles.length} hard cycle(s)`
    );
    return graph;
  }
}
