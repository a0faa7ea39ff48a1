// src/services/TaskExtractionService.ts
import path from 'node:path';
import { parse } from '@iarna/toml';
import { z } from 'zod';
import { type TaskGraphSettings } from '../config/ConfigurationManager.js';
import {
  MiseConfigRepository,
  TaskFileRepository,
  toTomlValue,
  type LoadedMiseConfig,
  type TaskScriptData,
} from '../repositories/index.js';
import { logger } from '../utils/logger.js';
import { MalformedTaskError } from '../utils/errors.js';
import { toFullName, type MiseConfig, type TaskDefinition, type TomlTable, type TomlValue } from '../types/index.js';
import { TaskUtilsService } from './TaskUtilsService.js';
import { type ExtractionResult, type SkippedTask } from './MiseTaskServiceTypes.js';

const StringList = z.union([z.string(), z.array(z.string())]).transform((value) => (Array.isArray(value) ? value : [value]));

/** Fields of an inline task table or of a script's `#MISE` header. Unknown keys pass through. */
const TaskFieldsSchema = z
  .object({
    run: z.union([z.string(), z.array(z.string())]).optional(),
    file: z.string().min(1).optional(),
    description: z.string().optional(),
    depends: StringList.optional(),
    depends_post: StringList.optional(),
    wait_for: StringList.optional(),
    sources: StringList.optional(),
    // mise also accepts `outputs = { auto = true }`, which tracks nothing we can compare.
    outputs: z.union([StringList, z.record(z.unknown()).transform((): string[] => [])]).optional(),
    env: z.record(z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value))).optional(),
    dir: z.string().optional(),
    alias: StringList.optional(),
    hide: z.boolean().optional(),
    confirm: z.string().optional(),
  })
  .passthrough();

type TaskFields = z.infer<typeof TaskFieldsSchema>;

const HEADER_PATTERN = /^#\s*mise\s+([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+)$/i;
const NON_TASK_EXTENSIONS = new Set(['.md', '.txt', '.json', '.toml', '.yml', '.yaml', '.lock']);
const DEFAULT_LEAF = '_default';

function isCommandList(value: TomlValue): value is string | string[] {
  if (typeof value === 'string') {
    return true;
  }
  if (!Array.isArray(value)) {
    return false;
  }
  const items: unknown[] = value;
  return items.every((item) => typeof item === 'string');
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`).join('; ');
}

/** Derives a task name from a script path below a task directory, or null when the file is not a task. */
export function scriptTaskName(relativePath: string): string | null {
  const segments = relativePath.split('/').filter((segment) => segment.length > 0);
  const leaf = segments.pop();
  if (!leaf || leaf.startsWith('.')) {
    return null;
  }
  const extension = path.extname(leaf);
  if (NON_TASK_EXTENSIONS.has(extension.toLowerCase())) {
    return null;
  }
  const baseName = extension.length > 0 && extension.length < leaf.length ? leaf.slice(0, -extension.length) : leaf;
  if (baseName !== DEFAULT_LEAF) {
    segments.push(baseName);
  }
  return segments.length > 0 ? segments.join(':') : null;
}

/** Parses the `#MISE key=value` header lines of a script; values are TOML values. */
export function parseScriptHeader(content: string): { fields: TomlTable; errors: string[] } {
  const fields: TomlTable = {};
  const errors: string[] = [];
  for (const line of content.split('\n')) {
    const match = HEADER_PATTERN.exec(line.trim());
    if (!match) {
      continue;
    }
    const key = match[1] ?? '';
    const rawValue = match[2] ?? '';
    try {
      const value = toTomlValue(parse(`${key} = ${rawValue}`)[key]);
      if (value !== undefined) {
        fields[key] = value;
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message.split('\n')[0] : String(error);
      errors.push(`header '${key}' is not a valid TOML value (${message})`);
    }
  }
  return { fields, errors };
}

/**
 * Produces TaskDefinitions from the document's task table and the task script tree.
 * Malformed entries are skipped and reported; only an entirely malformed set fails.
 */
export class TaskExtractionService {
  private readonly settings: TaskGraphSettings;

  constructor(settings: TaskGraphSettings) {
    this.settings = settings;
  }

  /** Task directories: the document's `task_config.includes` when declared, otherwise the configured defaults. */
  public taskDirectories(config: MiseConfig): string[] {
    const includes: TomlValue | undefined = config.task_config.includes;
    if (Array.isArray(includes)) {
      const entries: unknown[] = includes;
      const dirs = entries.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
      if (dirs.length > 0) {
        return dirs;
      }
    }
    return [...this.settings.taskDirectories];
  }

  public async extract(projectRoot: string, loaded?: LoadedMiseConfig): Promise<ExtractionResult> {
    const document = loaded ?? (await new MiseConfigRepository(projectRoot, this.settings.configFileNames).load());
    const fileRepository = new TaskFileRepository(projectRoot);
    const taskDirs = this.taskDirectories(document.config);
    const scripts = await fileRepository.listScripts(taskDirs);

    // Inline entries may point at a script with `file`; read those up front.
    const referencedScripts = new Map<string, string>();
    for (const value of Object.values(document.config.tasks)) {
      const parsed = TaskFieldsSchema.safeParse(value);
      const file = parsed.success ? parsed.data.file : undefined;
      if (file && !referencedScripts.has(file) && (await fileRepository.exists(file))) {
        referencedScripts.set(file, await fileRepository.readScript(file));
      }
    }

    const result = this.buildTasks(document.config, scripts, referencedScripts);
    result.config_path = document.exists ? document.path : null;
    result.task_dirs = taskDirs;

    logger.info(
      `[TaskExtractionService] Extracted ${result.tasks.length} task(s) from ${projectRoot}; skipped ${result.skipped.length}`
    );
    if (result.tasks.length === 0 && result.skipped.length > 0) {
      throw new MalformedTaskError(undefined, { skipped: result.skipped });
    }
    return result;
  }

  /** Pure part of extraction: builds definitions from an already loaded snapshot. */
  public buildTasks(
    config: MiseConfig,
    scripts: TaskScriptData[],
    referencedScripts: Map<string, string> = new Map()
  ): ExtractionResult {
    const tasks: TaskDefinition[] = [];
    const skipped: SkippedTask[] = [];
    const seen = new Map<string, string>();

    const accept = (task: TaskDefinition, location: string): void => {
      const earlier = seen.get(task.full_name);
      if (earlier !== undefined) {
        skipped.push({
          name: task.name,
          origin: task.origin,
          location,
          reason: `duplicate of '${task.full_name}' already declared at ${earlier}`,
        });
        return;
      }
      seen.set(task.full_name, location);
      tasks.push(task);
    };

    for (const [key, value] of Object.entries(config.tasks)) {
      const location = `[tasks."${key}"]`;
      const outcome = this.fromInlineEntry(key, value, referencedScripts);
      if (typeof outcome === 'string') {
        logger.warn(`[TaskExtractionService] Skipping malformed task ${key}: ${outcome}`);
        skipped.push({ name: key, origin: 'inline', location, reason: outcome });
      } else {
        accept(outcome, location);
      }
    }

    for (const script of scripts) {
      const name = scriptTaskName(script.relative_path);
      if (name === null) {
        continue;
      }
      const outcome = this.fromScript(name, script);
      if (typeof outcome === 'string') {
        logger.warn(`[TaskExtractionService] Skipping malformed task script ${script.file_path}: ${outcome}`);
        skipped.push({ name, origin: 'file', location: script.file_path, reason: outcome });
      } else {
        accept(outcome, script.file_path);
      }
    }

    return { config_path: null, task_dirs: [], tasks, skipped };
  }

  /** Returns the definition, or the reason the entry was skipped. */
  private fromInlineEntry(key: string, value: TomlValue, referencedScripts: Map<string, string>): TaskDefinition | string {
    if (isCommandList(value)) {
      return this.makeTask(key, { run: value }, null, 'inline');
    }
    if (typeof value !== 'object' || Array.isArray(value) || value instanceof Date) {
      return 'task entry must be a command string, a list of commands or a table';
    }
    const parsed = TaskFieldsSchema.safeParse(value);
    if (!parsed.success) {
      return describeIssues(parsed.error);
    }
    const fields = parsed.data;
    if (fields.run !== undefined) {
      return this.makeTask(key, { ...fields, run: fields.run }, null, 'inline');
    }
    if (fields.file !== undefined) {
      const script = referencedScripts.get(fields.file);
      if (script === undefined) {
        return `referenced script '${fields.file}' does not exist`;
      }
      return this.makeTask(key, { ...fields, run: script }, fields.file, 'inline');
    }
    return "missing 'run'";
  }

  private fromScript(name: string, script: TaskScriptData): TaskDefinition | string {
    const header = parseScriptHeader(script.content);
    if (header.errors.length > 0) {
      return header.errors.join('; ');
    }
    const parsed = TaskFieldsSchema.safeParse(header.fields);
    if (!parsed.success) {
      return describeIssues(parsed.error);
    }
    return this.makeTask(name, { ...parsed.data, run: script.content }, script.file_path, 'file');
  }

  private makeTask(
    name: string,
    fields: TaskFields & { run: string | string[] },
    filePath: string | null,
    origin: TaskDefinition['origin']
  ): TaskDefinition {
    const domain = TaskUtilsService.domainFromName(name, this.settings.defaultDomain);
    const commands =
      filePath !== null && typeof fields.run === 'string'
        ? TaskUtilsService.scriptCommandLines(fields.run)
        : TaskUtilsService.commandLines(fields.run);
    const description = fields.description?.trim() ?? '';

    return {
      name,
      full_name: toFullName(name, domain),
      domain,
      description: description.length > 0 ? description : TaskUtilsService.summarizeRun(commands),
      description_generated: description.length === 0,
      run: fields.run,
      depends: fields.depends ?? [],
      depends_post: fields.depends_post ?? [],
      wait_for: fields.wait_for ?? [],
      sources: fields.sources ?? [],
      outputs: fields.outputs ?? [],
      env: fields.env ?? {},
      dir: fields.dir ?? null,
      alias: fields.alias?.[0] ?? null,
      hide: fields.hide ?? false,
      confirm: fields.confirm ?? null,
      complexity: TaskUtilsService.classifyComplexity(commands, this.settings.complexity, filePath !== null),
      file_path: filePath,
      origin,
    };
  }
}
