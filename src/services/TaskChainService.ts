// src/services/TaskChainService.ts
import { logger } from '../utils/logger.js';
import { CycleDetectedError, TaskNotFoundError } from '../utils/errors.js';
import { type TaskDefinition } from '../types/index.js';
import { type TaskGraph } from './DependencyGraphService.js';
import { type TaskChain, type TaskChainDetail } from './MiseTaskServiceTypes.js';

/** Min-heap of task names keyed by declaration order. */
class DeclarationHeap {
  private readonly items: string[] = [];
  private readonly key: (name: string) => number;

  constructor(key: (name: string) => number) {
    this.key = key;
  }

  public get size(): number {
    return this.items.length;
  }

  public push(name: string): void {
    this.items.push(name);
    let child = this.items.length - 1;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.at(parent) <= this.at(child)) break;
      this.swap(parent, child);
      child = parent;
    }
  }

  public pop(): string | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      let parent = 0;
      for (;;) {
        const left = parent * 2 + 1;
        const right = left + 1;
        let smallest = parent;
        if (left < this.items.length && this.at(left) < this.at(smallest)) smallest = left;
        if (right < this.items.length && this.at(right) < this.at(smallest)) smallest = right;
        if (smallest === parent) break;
        this.swap(parent, smallest);
        parent = smallest;
      }
    }
    return top;
  }

  private at(position: number): number {
    return this.key(this.items[position] ?? '');
  }

  private swap(a: number, b: number): void {
    const held = this.items[a] ?? '';
    this.items[a] = this.items[b] ?? '';
    this.items[b] = held;
  }
}

function detail(task: TaskDefinition, graph: TaskGraph): TaskChainDetail {
  return {
    full_name: task.full_name,
    description: task.description,
    domain: task.domain,
    complexity: task.complexity,
    depends: graph.dependenciesOf(task.full_name),
    file_path: task.file_path,
  };
}

/**
 * Execution order and parallel layering for a task and its hard-dependency closure.
 */
export class TaskChainService {
  /** Every hard-dependency ancestor of the root, excluding the root itself. */
  public static ancestors(graph: TaskGraph, root: string): string[] {
    return TaskChainService.reach(root, (name) => graph.dependenciesOf(name)).sort(graph.compareByDeclaration);
  }

  /** Every task that transitively depends on the root, excluding the root itself. */
  public static descendants(graph: TaskGraph, root: string): string[] {
    return TaskChainService.reach(root, (name) => graph.dependentsOf(name)).sort(graph.compareByDeclaration);
  }

  /**
   * Partitions `members` into maximal layers: layer i holds every unplaced member whose
   * hard dependencies inside `members` all sit in layers before i. Throws on a cycle.
   */
  public static layers(graph: TaskGraph, members: string[]): string[][] {
    const memberSet = new Set(members);
    const pending = new Map<string, number>();
    for (const name of members) {
      pending.set(name, graph.dependenciesOf(name).filter((dep) => memberSet.has(dep)).length);
    }

    const result: string[][] = [];
    let current = members.filter((name) => pending.get(name) === 0).sort(graph.compareByDeclaration);
    let placed = 0;
    while (current.length > 0) {
      result.push(current);
      placed += current.length;
      const next: string[] = [];
      for (const name of current) {
        for (const dependent of graph.dependentsOf(name)) {
          const remaining = pending.get(dependent);
          if (remaining === undefined) continue;
          pending.set(dependent, remaining - 1);
          if (remaining - 1 === 0) next.push(dependent);
        }
      }
      current = next.sort(graph.compareByDeclaration);
    }

    if (placed < members.length) {
      throw new CycleDetectedError(TaskChainService.cycleMembers(graph, members));
    }
    return result;
  }

  /** Kahn's algorithm; among ready tasks the earliest declared goes first. */
  public static executionOrder(graph: TaskGraph, members: string[]): string[] {
    const memberSet = new Set(members);
    const pending = new Map<string, number>();
    const ready = new DeclarationHeap((name) => graph.declarationOrder(name));
    for (const name of members) {
      const count = graph.dependenciesOf(name).filter((dep) => memberSet.has(dep)).length;
      pending.set(name, count);
      if (count === 0) ready.push(name);
    }

    const order: string[] = [];
    while (ready.size > 0) {
      const name = ready.pop();
      if (name === undefined) break;
      order.push(name);
      for (const dependent of graph.dependentsOf(name)) {
        const remaining = pending.get(dependent);
        if (remaining === undefined) continue;
        pending.set(dependent, remaining - 1);
        if (remaining - 1 === 0) ready.push(dependent);
      }
    }

    if (order.length < members.length) {
      throw new CycleDetectedError(TaskChainService.cycleMembers(graph, members));
    }
    return order;
  }

  public trace(graph: TaskGraph, taskName: string): TaskChain {
    const root = this.resolveRoot(graph, taskName);
    logger.debug(`[TaskChainService] Tracing ${root}`);

    const ancestors = TaskChainService.ancestors(graph, root);
    const closure = [...ancestors, root].sort(graph.compareByDeclaration);
    const cycle = TaskChainService.cycleMembers(graph, closure);
    if (cycle.length > 0) {
      throw new CycleDetectedError(cycle);
    }

    const executionOrder = TaskChainService.executionOrder(graph, closure);
    const closureSet = new Set(closure);
    const taskDetails: Record<string, TaskChainDetail> = {};
    for (const name of executionOrder) {
      const task = graph.get(name);
      if (task) taskDetails[name] = detail(task, graph);
    }

    return {
      task_name: root,
      dependencies: executionOrder.filter((name) => name !== root),
      dependents: TaskChainService.descendants(graph, root),
      execution_order: executionOrder,
      parallel_groups: TaskChainService.layers(graph, closure),
      post_tasks: graph.relationsDeclaredBy(root, 'depends_post'),
      wait_for: graph.relationsDeclaredBy(root, 'wait_for'),
      dangling: graph.dangling.filter((ref) => ref.kind === 'depends' && closureSet.has(ref.task)),
      task_details: taskDetails,
    };
  }

  /** Accepts a full name, a declared name or an alias. */
  private resolveRoot(graph: TaskGraph, taskName: string): string {
    const wanted = taskName.trim();
    if (graph.has(wanted)) {
      return wanted;
    }
    const match =
      graph.tasks.find((task) => task.name === wanted) ?? graph.tasks.find((task) => task.alias === wanted);
    if (!match) {
      throw new TaskNotFoundError(taskName, graph.names());
    }
    return match.full_name;
  }

  /** Union of the hard cycles that touch any of `members`, in declaration order. */
  private static cycleMembers(graph: TaskGraph, members: string[]): string[] {
    const memberSet = new Set(members);
    const implicated = new Set<string>();
    for (const cycle of graph.hardCycles) {
      if (cycle.some((name) => memberSet.has(name))) {
        cycle.forEach((name) => implicated.add(name));
      }
    }
    return [...implicated].sort(graph.compareByDeclaration);
  }

  private static reach(root: string, next: (name: string) => string[]): string[] {
    const seen = new Set<string>([root]);
    const queue = [root];
    const found: string[] = [];
    for (let head = 0; head < queue.length; head++) {
      const name = queue[head] ?? '';
      for (const neighbour of next(name)) {
        if (!seen.has(neighbour)) {
          seen.add(neighbour);
          found.push(neighbour);
          queue.push(neighbour);
        }
      }
    }
    return found;
  }
}
