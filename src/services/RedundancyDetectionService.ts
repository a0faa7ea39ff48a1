// src/services/RedundancyDetectionService.ts
import { DEFAULT_SETTINGS } from '../config/ConfigurationManager.js';
import { logger } from '../utils/logger.js';
import { type TaskDefinition } from '../types/index.js';
import { type TaskGraph } from './DependencyGraphService.js';
import { TaskUtilsService } from './TaskUtilsService.js';
import { type PruneCandidate } from './MiseTaskServiceTypes.js';

export interface RedundancyContext {
  graph: TaskGraph;
  /** Leaf names that mark a task as run by people rather than by other tasks. */
  entryPointLeaves: readonly string[];
}

/**
 * One pruning heuristic. Policies are advisory: a task invoked by something outside
 * the project (CI config, another repository) can still look unused here.
 */
export interface RedundancyPolicy {
  readonly name: string;
  evaluate(context: RedundancyContext): PruneCandidate[];
}

const NO_OP_COMMANDS = [/^true$/, /^:$/, /^exit\s+0$/, /^echo(\s.*)?$/];
const DELEGATION_PATTERN = /^mise\s+(?:run|r)\s+([^\s]+)\s*$/;

function normalizeCommand(task: TaskDefinition): string {
  return TaskUtilsService.commandLines(task.run)
    .map((line) => line.replace(/\s+/g, ' '))
    .join('\n');
}

function isNoOp(task: TaskDefinition): boolean {
  const commands = TaskUtilsService.commandLines(task.run);
  return commands.every((command) => NO_OP_COMMANDS.some((pattern) => pattern.test(command)));
}

function candidate(task: TaskDefinition, policy: string, reason: string): PruneCandidate {
  return { task: task.full_name, domain: task.domain, reason, policy };
}

/** Tasks with no relations in either direction and nothing tracked, other than entry points. */
export class IsolatedTaskPolicy implements RedundancyPolicy {
  public readonly name = 'isolated';

  public evaluate({ graph, entryPointLeaves }: RedundancyContext): PruneCandidate[] {
    return graph.tasks
      .filter(
        (task) =>
          task.depends.length === 0 &&
          task.depends_post.length === 0 &&
          task.wait_for.length === 0 &&
          task.sources.length === 0 &&
          task.outputs.length === 0 &&
          graph.isIsolated(task.full_name) &&
          !TaskUtilsService.isEntryPoint(task, entryPointLeaves)
      )
      .map((task) => {
        const reason = 'No dependencies or dependents, and no sources or outputs tracked';
        return candidate(task, this.name, isNoOp(task) ? `${reason}; its command does nothing` : reason);
      });
  }
}

/** Later tasks of a domain that repeat an earlier task's command in the same directory. */
export class DuplicateCommandPolicy implements RedundancyPolicy {
  public readonly name = 'duplicate_command';

  public evaluate({ graph }: RedundancyContext): PruneCandidate[] {
    const firstSeen = new Map<string, TaskDefinition>();
    const found: PruneCandidate[] = [];
    for (const task of graph.tasks) {
      const command = normalizeCommand(task);
      if (command.length === 0) {
        continue;
      }
      const key = `${task.domain}\u0000${task.dir ?? ''}\u0000${command}`;
      const original = firstSeen.get(key);
      if (original) {
        found.push(candidate(task, this.name, `Runs the same command as ${original.full_name}`));
      } else {
        firstSeen.set(key, task);
      }
    }
    return found;
  }
}

/**
 * Tasks whose effective command, after following `mise run <task>` delegation,
 * matches a later-declared task in another domain, or that merely delegate to it.
 */
export class SupersededTaskPolicy implements RedundancyPolicy {
  public readonly name = 'superseded';

  public evaluate({ graph }: RedundancyContext): PruneCandidate[] {
    const groups = new Map<string, TaskDefinition[]>();
    for (const task of graph.tasks) {
      const command = this.effectiveCommand(graph, task);
      if (command.length === 0) {
        continue;
      }
      const key = `${task.dir ?? ''}\u0000${command}`;
      groups.set(key, [...(groups.get(key) ?? []), task]);
    }

    const found: PruneCandidate[] = [];
    for (const members of groups.values()) {
      const direct = members.filter((task) => this.delegateOf(graph, task) === null);
      const canonical = direct[direct.length - 1];
      if (members.length < 2 || !canonical) {
        continue;
      }
      for (const task of members) {
        if (task === canonical) continue;
        const delegate = this.delegateOf(graph, task);
        if (delegate !== null) {
          found.push(candidate(task, this.name, `Only delegates to ${delegate.full_name}`));
        } else if (task.domain !== canonical.domain) {
          found.push(candidate(task, this.name, `Superseded by ${canonical.full_name}, which runs the same command`));
        }
      }
    }
    return found;
  }

  private delegateOf(graph: TaskGraph, task: TaskDefinition): TaskDefinition | null {
    const commands = TaskUtilsService.commandLines(task.run);
    const match = commands.length === 1 ? DELEGATION_PATTERN.exec(commands[0] ?? '') : null;
    const target = match?.[1];
    if (!target) {
      return null;
    }
    const resolved =
      graph.get(target) ?? graph.tasks.find((t) => t.name === target) ?? graph.tasks.find((t) => t.alias === target);
    return resolved && resolved.full_name !== task.full_name ? resolved : null;
  }

  private effectiveCommand(graph: TaskGraph, task: TaskDefinition): string {
    const visited = new Set<string>([task.full_name]);
    let current = task;
    for (;;) {
      const next = this.delegateOf(graph, current);
      if (!next || visited.has(next.full_name)) {
        return normalizeCommand(current);
      }
      visited.add(next.full_name);
      current = next;
    }
  }
}

export const DEFAULT_REDUNDANCY_POLICIES: readonly RedundancyPolicy[] = [
  new IsolatedTaskPolicy(),
  new DuplicateCommandPolicy(),
  new SupersededTaskPolicy(),
];

/**
 * Runs the configured policies and reports one candidate per task (first policy wins).
 * Never deletes anything.
 */
export class RedundancyDetectionService {
  private readonly policies: readonly RedundancyPolicy[];
  private readonly entryPointLeaves: readonly string[];

  constructor(
    policies: readonly RedundancyPolicy[] = DEFAULT_REDUNDANCY_POLICIES,
    entryPointLeaves: readonly string[] = DEFAULT_SETTINGS.entryPointLeaves
  ) {
    this.policies = policies;
    this.entryPointLeaves = entryPointLeaves;
  }

  public detect(graph: TaskGraph): PruneCandidate[] {
    const byTask = new Map<string, PruneCandidate>();
    for (const policy of this.policies) {
      for (const found of policy.evaluate({ graph, entryPointLeaves: this.entryPointLeaves })) {
        if (!byTask.has(found.task)) {
          byTask.set(found.task, found);
        }
      }
    }
    const candidates = [...byTask.values()].sort((a, b) => graph.compareByDeclaration(a.task, b.task));
    logger.debug(`[RedundancyDetectionService] ${candidates.length} prune candidate(s)`);
    return candidates;
  }
}
