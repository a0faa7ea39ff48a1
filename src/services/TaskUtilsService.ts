// src/services/TaskUtilsService.ts
import { type ComplexityThresholds } from '../config/ConfigurationManager.js';
import {
  TASK_DOMAINS,
  isTaskDomain,
  toFullName,
  type TaskComplexity,
  type TaskDefinition,
  type TaskDomain,
} from '../types/index.js';
import domainKeywords from '../data/domain-keywords.json';

const DOMAIN_KEYWORDS: Record<TaskDomain, string[]> = domainKeywords;

const SUMMARY_MAX_LENGTH = 80;

/**
 * Pure classification helpers shared by extraction and placement.
 * Static only: no instance state.
 */
export class TaskUtilsService {
  /** Splits a run value into its command lines, skipping blanks and comments. */
  public static commandLines(run: string | string[]): string[] {
    const items = Array.isArray(run) ? run : [run];
    return items.flatMap((item) =>
      item
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'))
    );
  }

  /** Command lines of a script body: no shebang, comments, blank lines or shell option lines. */
  public static scriptCommandLines(content: string): string[] {
    return TaskUtilsService.commandLines(content).filter((line) => !/^set\s+[-+]/.test(line));
  }

  public static classifyComplexity(
    commands: string[],
    thresholds: ComplexityThresholds,
    fileBacked = false
  ): TaskComplexity {
    const count = commands.length;
    const longest = commands.reduce((max, command) => Math.max(max, command.length), 0);

    if (count <= thresholds.simpleMaxCommands && longest <= thresholds.simpleMaxCommandLength) {
      return fileBacked ? 'moderate' : 'simple';
    }
    if (count <= thresholds.moderateMaxCommands) {
      return 'moderate';
    }
    return 'complex';
  }

  /**
   * Domain of a declared name: the leading colon segment, or the whole name when it has none,
   * if that is a recognized domain; otherwise the default.
   */
  public static domainFromName(name: string, defaultDomain: TaskDomain): TaskDomain {
    const prefix = name.split(':')[0] ?? '';
    return isTaskDomain(prefix) ? prefix : defaultDomain;
  }

  /**
   * Entry points are run by people, not by other tasks: `domain:domain`,
   * a configured entry leaf such as `default` or `dev`, or a task with an alias.
   */
  public static isEntryPoint(task: TaskDefinition, entryPointLeaves: readonly string[]): boolean {
    const segments = task.full_name.split(':');
    const leaf = segments[segments.length - 1] ?? '';
    return (
      (segments.length === 2 && segments[0] === segments[1]) || entryPointLeaves.includes(leaf) || task.alias !== null
    );
  }

  public static fullNameFor(name: string, defaultDomain: TaskDomain): string {
    return toFullName(name, TaskUtilsService.domainFromName(name, defaultDomain));
  }

  public static tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .split(/[^a-z0-9-]+/)
      .filter((token) => token.length > 0);
  }

  /** Counts keyword hits per domain in a free-text description. */
  public static scoreDomains(description: string): Record<TaskDomain, number> {
    const tokens = TaskUtilsService.tokenize(description);
    const hits = (domain: TaskDomain): number => tokens.filter((token) => DOMAIN_KEYWORDS[domain].includes(token)).length;
    return {
      build: hits('build'),
      test: hits('test'),
      lint: hits('lint'),
      dev: hits('dev'),
      deploy: hits('deploy'),
      db: hits('db'),
      ci: hits('ci'),
      docs: hits('docs'),
      clean: hits('clean'),
      setup: hits('setup'),
    };
  }

  /** Highest-scoring domain; ties go to the earlier domain of the enumeration. Null when nothing matched. */
  public static bestDomain(description: string): TaskDomain | null {
    const scores = TaskUtilsService.scoreDomains(description);
    let best: TaskDomain | null = null;
    for (const domain of TASK_DOMAINS) {
      if (scores[domain] > 0 && (best === null || scores[domain] > scores[best])) {
        best = domain;
      }
    }
    return best;
  }

  public static domainKeywords(domain: TaskDomain): string[] {
    return [...DOMAIN_KEYWORDS[domain]];
  }

  /** One-line description generated for tasks that declare none. */
  public static summarizeRun(run: string | string[]): string {
    const commands = TaskUtilsService.commandLines(run);
    if (commands.length === 0) {
      return 'Task with no commands';
    }
    let first = commands[0] ?? '';
    if (first.length > SUMMARY_MAX_LENGTH) {
      first = `${first.slice(0, SUMMARY_MAX_LENGTH - 3)}...`;
    }
    return commands.length === 1 ? `Run: ${first}` : `Run: ${first} (+${commands.length - 1} more)`;
  }

  /** Lowercase, hyphen-joined slug of up to `maxWords` words. */
  public static slugify(words: string[], maxWords = 2): string {
    return words
      .map((word) => word.toLowerCase().replace(/[^a-z0-9]+/g, ''))
      .filter((word) => word.length > 0)
      .slice(0, maxWords)
      .join('-');
  }
}
