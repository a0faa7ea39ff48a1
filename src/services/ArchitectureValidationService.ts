// src/services/ArchitectureValidationService.ts
import { type TaskGraphSettings } from '../config/ConfigurationManager.js';
import { logger } from '../utils/logger.js';
import { TASK_DOMAINS, isTaskDomain, type TaskDomain } from '../types/index.js';
import { type TaskGraph } from './DependencyGraphService.js';
import { TaskChainService } from './TaskChainService.js';
import { TaskUtilsService } from './TaskUtilsService.js';
import {
  IssueCategoryEnum,
  type ArchitectureIssue,
  type ArchitectureReport,
  type SkippedTask,
} from './MiseTaskServiceTypes.js';

const SEGMENT_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;
const MAX_CHAIN_DEPTH = 5;

/**
 * Read-only battery of checks over an extracted task set and its graph.
 * Output is a pure function of its input, so repeated runs agree.
 */
export class ArchitectureValidationService {
  private readonly settings: TaskGraphSettings;

  constructor(settings: TaskGraphSettings) {
    this.settings = settings;
  }

  public validate(graph: TaskGraph, skipped: SkippedTask[] = []): ArchitectureReport {
    const issues: ArchitectureIssue[] = [
      ...this.checkCycles(graph),
      ...this.checkDangling(graph),
      ...this.checkDomainPrefixes(graph),
      ...this.checkOrphans(graph),
      ...this.checkNaming(graph),
      ...skipped.map(
        (entry): ArchitectureIssue => ({
          category: 'malformed_task',
          severity: 'warning',
          task: entry.name,
          message: `Skipped ${entry.location}: ${entry.reason}`,
        })
      ),
    ];
    issues.sort(
      (a, b) =>
        IssueCategoryEnum.options.indexOf(a.category) - IssueCategoryEnum.options.indexOf(b.category) ||
        graph.compareByDeclaration(a.task, b.task)
    );

    const domainsUsed = TASK_DOMAINS.filter((domain) => graph.tasks.some((task) => task.domain === domain));
    const report: ArchitectureReport = {
      total_tasks: graph.tasks.length,
      inline_tasks: graph.tasks.filter((task) => task.origin === 'inline').length,
      file_tasks: graph.tasks.filter((task) => task.origin === 'file').length,
      domains_used: domainsUsed,
      issues,
      suggestions: this.suggestions(graph, domainsUsed),
      skipped,
    };
    logger.debug(
      `[ArchitectureValidationService] ${report.total_tasks} task(s), ${issues.length} issue(s), ${report.suggestions.length} suggestion(s)`
    );
    return report;
  }

  /** Entry-point shaped tasks are never orphans. */
  public isEntryPoint(graph: TaskGraph, fullName: string): boolean {
    const task = graph.get(fullName);
    return task !== undefined && TaskUtilsService.isEntryPoint(task, this.settings.entryPointLeaves);
  }

  private checkCycles(graph: TaskGraph): ArchitectureIssue[] {
    const hard = graph.hardCycles.map(
      (members): ArchitectureIssue => ({
        category: 'circular_dependency',
        severity: 'error',
        task: members[0] ?? '',
        message: `Circular dependency detected among: ${members.join(', ')}`,
        related_tasks: members,
      })
    );
    const soft = graph.softCycles.map(
      (members): ArchitectureIssue => ({
        category: 'soft_cycle',
        severity: 'warning',
        task: members[0] ?? '',
        message: `Cycle through wait_for/depends_post relations among: ${members.join(', ')}; ordering between them is ambiguous`,
        related_tasks: members,
      })
    );
    return [...hard, ...soft];
  }

  private checkDangling(graph: TaskGraph): ArchitectureIssue[] {
    return graph.dangling.map((ref): ArchitectureIssue => ({
      category: 'dangling_dependency',
      severity: ref.kind === 'depends' ? 'error' : 'warning',
      task: ref.task,
      message: `${ref.kind} references '${ref.reference}', which is not a known task`,
    }));
  }

  private checkDomainPrefixes(graph: TaskGraph): ArchitectureIssue[] {
    const issues: ArchitectureIssue[] = [];
    for (const task of graph.tasks) {
      const prefix = task.full_name.split(':')[0] ?? '';
      if (!isTaskDomain(prefix)) {
        issues.push({
          category: 'domain_prefix',
          severity: 'warning',
          task: task.full_name,
          message: `Prefix '${prefix}' is not a recognized domain (${TASK_DOMAINS.join(', ')}); treated as '${task.domain}'`,
        });
      }
    }
    return issues;
  }

  private checkOrphans(graph: TaskGraph): ArchitectureIssue[] {
    return graph.tasks
      .filter((task) => task.depends.length === 0 && task.depends_post.length === 0 && task.wait_for.length === 0)
      .filter((task) => graph.isIsolated(task.full_name) && !this.isEntryPoint(graph, task.full_name))
      .map((task): ArchitectureIssue => ({
        category: 'orphan',
        severity: 'info',
        task: task.full_name,
        message: 'Task has no dependencies and nothing depends on it',
      }));
  }

  private checkNaming(graph: TaskGraph): ArchitectureIssue[] {
    const issues: ArchitectureIssue[] = [];
    for (const task of graph.tasks) {
      const invalid = task.full_name.split(':').filter((segment) => !SEGMENT_PATTERN.test(segment));
      if (invalid.length > 0) {
        issues.push({
          category: 'naming',
          severity: 'warning',
          task: task.full_name,
          message: `Name segment(s) ${invalid.map((s) => `'${s}'`).join(', ')} should use lowercase letters, digits, '-', '_' or '.'`,
        });
      }
    }
    for (const task of graph.tasks) {
      if (task.description_generated) {
        issues.push({
          category: 'missing_description',
          severity: 'info',
          task: task.full_name,
          message: 'Task has no description',
        });
      }
    }
    return issues;
  }

  private suggestions(graph: TaskGraph, domainsUsed: TaskDomain[]): string[] {
    const suggestions: string[] = [];
    const inDomain = (domain: TaskDomain): string[] =>
      graph.tasks.filter((task) => task.domain === domain).map((task) => task.full_name);

    if (graph.tasks.length > 0 && !domainsUsed.includes('test')) {
      suggestions.push('Add test tasks so changes can be verified before build and deploy');
    }

    for (const name of inDomain('deploy')) {
      const upstream = TaskChainService.ancestors(graph, name);
      if (!upstream.some((dep) => dep.startsWith('build:') || dep.startsWith('test:'))) {
        suggestions.push(`Make ${name} depend on a build or test task so broken code is never deployed`);
      }
    }

    const untracked = graph.tasks.filter((task) => task.domain === 'build' && task.sources.length === 0);
    if (untracked.length > 0) {
      suggestions.push(
        `Declare sources for ${untracked.map((task) => task.full_name).join(', ')} so mise can skip them when nothing changed`
      );
    }

    if (graph.hardCycles.length === 0) {
      const depth = TaskChainService.layers(graph, graph.names()).length;
      if (depth > MAX_CHAIN_DEPTH) {
        suggestions.push(
          `The longest dependency chain is ${depth} tasks deep; consider flattening it so more tasks can run in parallel`
        );
      }
    }

    const complexInline = graph.tasks.filter((task) => task.complexity === 'complex' && task.file_path === null);
    if (complexInline.length > 0) {
      suggestions.push(
        `Move ${complexInline.map((task) => task.full_name).join(', ')} into script files under ${this.settings.taskDirectories[0] ?? '.mise/tasks'}`
      );
    }
    return suggestions;
  }
}
