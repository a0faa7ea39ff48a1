// src/services/TaskPlacementService.ts
import { stringify } from '@iarna/toml';
import { type TaskGraphSettings } from '../config/ConfigurationManager.js';
import { logger } from '../utils/logger.js';
import {
  DanglingDependencyError,
  InvalidComplexityError,
  InvalidDomainError,
  NameCollisionError,
} from '../utils/errors.js';
import {
  TASK_COMPLEXITIES,
  TASK_DOMAINS,
  isTaskComplexity,
  isTaskDomain,
  type ProjectStructure,
  type TaskComplexity,
  type TaskDefinition,
  type TaskDomain,
  type TaskStorage,
} from '../types/index.js';
import { TaskReferenceResolver, type TaskGraph } from './DependencyGraphService.js';
import { TaskUtilsService } from './TaskUtilsService.js';
import { type PlacementPlan, type PlacementRequest } from './MiseTaskServiceTypes.js';
import defaultCommands from '../data/default-commands.json';
import shellCommands from '../data/shell-commands.json';

const DEFAULT_COMMANDS: Record<string, Partial<Record<TaskDomain, string>>> = defaultCommands;
const SHELL_EXECUTABLES = new Set<string>(shellCommands);
const SHELL_OPERATORS = ['|', '>', '$(', ' --'];
const STEP_SEPARATOR = /&&|;|\n|\bthen\b/i;
const STOPWORDS = new Set(['a', 'an', 'the', 'to', 'for', 'of', 'and', 'or', 'in', 'on', 'with', 'into', 'from', 'all', 'my', 'our', 'it']);

export const SCRIPT_PREAMBLE = ['#!/usr/bin/env bash', 'set -euo pipefail'] as const;

export interface PlacementContext {
  graph: TaskGraph;
  /** Task directories in effect; new scripts go to the first. */
  taskDirs: string[];
  structure: ProjectStructure | null;
}

/** Splits a description into its command-like steps. */
export function descriptionSteps(description: string): string[] {
  return description
    .split(STEP_SEPARATOR)
    .map((step) => step.trim())
    .filter((step) => step.length > 0);
}

/** True when a step reads as a shell command rather than prose. */
export function looksLikeShell(step: string): boolean {
  const first = step.split(/\s+/)[0] ?? '';
  return SHELL_EXECUTABLES.has(first) || first.startsWith('./') || SHELL_OPERATORS.some((op) => step.includes(op));
}

/** Body of a file-backed task: shebang, `#MISE` metadata, strict mode, commands. */
export function renderScript(task: Pick<TaskDefinition, 'description' | 'depends'>, commands: string[]): string {
  const header = [`#MISE description=${stringify.value(task.description)}`];
  if (task.depends.length > 0) {
    header.push(`#MISE depends=${stringify.value(task.depends)}`);
  }
  return [SCRIPT_PREAMBLE[0], ...header, SCRIPT_PREAMBLE[1], '', ...commands, ''].join('\n');
}

/**
 * Decides domain, complexity, name and storage form for a new task.
 * Reads nothing from disk; the caller supplies the current graph.
 */
export class TaskPlacementService {
  private readonly settings: TaskGraphSettings;

  constructor(settings: TaskGraphSettings) {
    this.settings = settings;
  }

  public plan(request: PlacementRequest, context: PlacementContext): PlacementPlan {
    const warnings: string[] = [];
    const description = request.description.trim();
    const domain = this.chooseDomain(request, description, warnings);
    const commands = this.chooseCommands(request, description, domain, context.structure, warnings);
    const complexity = this.chooseComplexity(request, commands, warnings);
    const fullName = this.chooseName(request, description, domain, context.graph, warnings);
    const depends = this.resolveDepends(request.depends ?? [], fullName, context.graph);

    const run: string | string[] = commands.length === 1 ? (commands[0] ?? '') : commands;
    const isScript = complexity === 'complex';
    const taskDir = context.taskDirs[0] ?? this.settings.taskDirectories[0] ?? '.mise/tasks';
    const filePath = isScript ? `${taskDir}/${fullName.split(':').join('/')}` : null;

    const task: TaskDefinition = {
      name: fullName,
      full_name: fullName,
      domain,
      description,
      description_generated: false,
      run,
      depends,
      depends_post: [],
      wait_for: [],
      sources: [],
      outputs: [],
      env: {},
      dir: null,
      alias: null,
      hide: false,
      confirm: null,
      complexity,
      file_path: filePath,
      origin: isScript ? 'file' : 'inline',
    };
    const storage: TaskStorage =
      filePath !== null
        ? { kind: 'file', file_path: filePath, script: renderScript(task, commands) }
        : { kind: 'inline', key: fullName, run };

    logger.info(`[TaskPlacementService] Planned ${fullName} (${domain}, ${complexity}, ${storage.kind})`);
    return { full_name: fullName, domain, complexity, storage, task, warnings };
  }

  private chooseDomain(request: PlacementRequest, description: string, warnings: string[]): TaskDomain {
    if (request.domain_hint !== undefined) {
      const hint = request.domain_hint.trim().toLowerCase();
      if (!isTaskDomain(hint)) {
        throw new InvalidDomainError(request.domain_hint, TASK_DOMAINS);
      }
      return hint;
    }
    const prefix = request.suggested_name?.includes(':') ? request.suggested_name.split(':')[0] ?? '' : '';
    if (isTaskDomain(prefix)) {
      return prefix;
    }
    const scored = TaskUtilsService.bestDomain(description);
    if (scored !== null) {
      return scored;
    }
    warnings.push(`No domain keywords found in the description; using '${this.settings.defaultDomain}'`);
    return this.settings.defaultDomain;
  }

  /**
   * Classifies the commands the task will actually run, so extraction reads the same class back.
   * A forced class only decides storage; when the stored form reads back differently that is reported.
   */
  private chooseComplexity(request: PlacementRequest, commands: string[], warnings: string[]): TaskComplexity {
    if (request.force_complexity === undefined) {
      return TaskUtilsService.classifyComplexity(commands, this.settings.complexity);
    }
    const forced = request.force_complexity.trim().toLowerCase();
    if (!isTaskComplexity(forced)) {
      throw new InvalidComplexityError(request.force_complexity, TASK_COMPLEXITIES);
    }
    const stored = TaskUtilsService.classifyComplexity(commands, this.settings.complexity, forced === 'complex');
    if (stored !== forced) {
      warnings.push(`Forced complexity '${forced}' only decides storage; the task reads back as '${stored}'`);
    }
    return forced;
  }

  private chooseCommands(
    request: PlacementRequest,
    description: string,
    domain: TaskDomain,
    structure: ProjectStructure | null,
    warnings: string[]
  ): string[] {
    if (request.run !== undefined) {
      const explicit = TaskUtilsService.commandLines(request.run);
      if (explicit.length > 0) {
        return explicit;
      }
    }
    const steps = descriptionSteps(description);
    if (steps.length > 0 && steps.every(looksLikeShell)) {
      return steps;
    }
    for (const manager of structure?.package_managers ?? []) {
      const command = DEFAULT_COMMANDS[manager]?.[domain];
      if (command !== undefined) {
        return [command];
      }
    }
    warnings.push('Could not derive a command from the description; the task runs a placeholder echo');
    return [`echo ${JSON.stringify(description)}`];
  }

  private chooseName(
    request: PlacementRequest,
    description: string,
    domain: TaskDomain,
    graph: TaskGraph,
    warnings: string[]
  ): string {
    const suggested = request.suggested_name?.trim();
    if (suggested) {
      const segments = suggested.split(':');
      const prefix = segments[0] ?? '';
      const leaf = segments.length > 1 && isTaskDomain(prefix) ? segments.slice(1).join(':') : suggested;
      if (segments.length > 1 && isTaskDomain(prefix) && prefix !== domain) {
        warnings.push(`Suggested name '${suggested}' moved to the '${domain}' domain`);
      }
      const fullName = `${domain}:${leaf}`;
      if (graph.has(fullName)) {
        throw new NameCollisionError(fullName);
      }
      return fullName;
    }

    const base = `${domain}:${this.deriveLeaf(description, domain)}`;
    let fullName = base;
    for (let suffix = 2; graph.has(fullName); suffix++) {
      fullName = `${base}-${suffix}`;
    }
    if (fullName !== base) {
      warnings.push(`'${base}' already exists; the new task is named '${fullName}'`);
    }
    return fullName;
  }

  private deriveLeaf(description: string, domain: TaskDomain): string {
    const domainWords = new Set(TaskUtilsService.domainKeywords(domain));
    const words = TaskUtilsService.tokenize(description).filter((word) => !STOPWORDS.has(word) && !domainWords.has(word));
    const slug = TaskUtilsService.slugify(words);
    return slug.length > 0 ? slug : domain;
  }

  private resolveDepends(references: string[], fullName: string, graph: TaskGraph): string[] {
    const resolver = new TaskReferenceResolver(graph.tasks);
    const resolved: string[] = [];
    const missing: string[] = [];
    for (const reference of references) {
      const targets = resolver.resolve(reference, fullName);
      if (targets.length === 0) {
        missing.push(reference);
      } else if (reference.trim().endsWith('*')) {
        resolved.push(reference.trim());
      } else {
        resolved.push(...targets);
      }
    }
    if (missing.length > 0) {
      throw new DanglingDependencyError(fullName, missing);
    }
    return [...new Set(resolved)];
  }
}
