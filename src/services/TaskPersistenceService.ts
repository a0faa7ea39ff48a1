// src/services/TaskPersistenceService.ts
import { type TaskGraphSettings } from '../config/ConfigurationManager.js';
import { MiseConfigRepository, TaskFileRepository, type LoadedMiseConfig } from '../repositories/index.js';
import { logger } from '../utils/logger.js';
import { NameCollisionError } from '../utils/errors.js';
import { type TaskDefinition, type TomlTable } from '../types/index.js';
import { type TaskGraph } from './DependencyGraphService.js';
import { type AffectedDependent, type PlacementPlan, type RemovalResult } from './MiseTaskServiceTypes.js';

/** The inline table entry for a task, without fields left at their defaults. */
export function toInlineEntry(task: TaskDefinition): TomlTable {
  const entry: TomlTable = {};
  if (!task.description_generated && task.description.length > 0) entry.description = task.description;
  entry.run = task.run;
  if (task.depends.length > 0) entry.depends = task.depends;
  if (task.depends_post.length > 0) entry.depends_post = task.depends_post;
  if (task.wait_for.length > 0) entry.wait_for = task.wait_for;
  if (task.sources.length > 0) entry.sources = task.sources;
  if (task.outputs.length > 0) entry.outputs = task.outputs;
  if (Object.keys(task.env).length > 0) entry.env = { ...task.env };
  if (task.dir !== null) entry.dir = task.dir;
  if (task.alias !== null) entry.alias = task.alias;
  if (task.hide) entry.hide = true;
  if (task.confirm !== null) entry.confirm = task.confirm;
  return entry;
}

/**
 * Writes task mutations back: one full rewrite of the config document,
 * or one script file. Dependents of removed tasks are reported, never edited.
 */
export class TaskPersistenceService {
  private readonly settings: TaskGraphSettings;

  constructor(settings: TaskGraphSettings) {
    this.settings = settings;
  }

  /** Persists a placement plan; returns non-fatal warnings. */
  public async saveTask(projectRoot: string, plan: PlacementPlan, loaded?: LoadedMiseConfig): Promise<string[]> {
    const warnings: string[] = [];
    const { storage } = plan;

    if (storage.kind === 'file') {
      const files = new TaskFileRepository(projectRoot);
      if (await files.exists(storage.file_path)) {
        throw new NameCollisionError(plan.full_name);
      }
      await files.writeScript(storage.file_path, storage.script);
      return warnings;
    }

    const document = loaded ?? (await this.repository(projectRoot).load());
    if (storage.key in document.config.tasks) {
      throw new NameCollisionError(plan.full_name);
    }
    document.config.tasks[storage.key] = toInlineEntry(plan.task);
    warnings.push(...this.unrecognizedWarning(document));
    await this.repository(projectRoot).save(document);
    logger.info(`[TaskPersistenceService] Added ${storage.key} to ${document.path}`);
    return warnings;
  }

  /**
   * Removes the given tasks in one pass: inline entries in a single rewrite,
   * script files one by one. Affected dependents come from the graph before removal.
   */
  public async removeTasks(
    projectRoot: string,
    graph: TaskGraph,
    tasks: TaskDefinition[],
    loaded?: LoadedMiseConfig
  ): Promise<RemovalResult> {
    const result: RemovalResult = { removed: [], deleted_files: [], affected_dependents: [], warnings: [] };
    const removing = new Set(tasks.map((task) => task.full_name));

    const document = loaded ?? (await this.repository(projectRoot).load());
    let documentChanged = false;
    const files = new TaskFileRepository(projectRoot);

    for (const task of tasks) {
      if (task.origin === 'inline') {
        const key = Object.keys(document.config.tasks).find(
          (candidate) => candidate === task.name || candidate === task.full_name
        );
        if (key !== undefined) {
          delete document.config.tasks[key];
          documentChanged = true;
        }
      } else if (task.file_path !== null) {
        if (await files.deleteScript(task.file_path)) {
          result.deleted_files.push(task.file_path);
        } else {
          result.warnings.push(`Script ${task.file_path} was already gone`);
        }
      }
      result.removed.push(task.full_name);

      for (const relation of graph.referrersOf(task.full_name)) {
        if (removing.has(relation.task)) continue;
        const affected: AffectedDependent = { ...relation, removed_task: task.full_name };
        result.affected_dependents.push(affected);
        result.warnings.push(
          `${relation.task} still lists ${task.full_name} in ${relation.relation}; update it by hand`
        );
      }
    }

    if (documentChanged) {
      result.warnings.push(...this.unrecognizedWarning(document));
      await this.repository(projectRoot).save(document);
    }
    logger.info(
      `[TaskPersistenceService] Removed ${result.removed.length} task(s); ${result.affected_dependents.length} dependent relation(s) left dangling`
    );
    return result;
  }

  private repository(projectRoot: string): MiseConfigRepository {
    return new MiseConfigRepository(projectRoot, this.settings.configFileNames);
  }

  private unrecognizedWarning(document: LoadedMiseConfig): string[] {
    if (document.unrecognized_sections.length === 0) {
      return [];
    }
    return [
      `Rewriting ${document.path} drops unrecognized section(s): ${document.unrecognized_sections.join(', ')}`,
    ];
  }
}
