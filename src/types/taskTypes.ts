import { z } from 'zod';

/**
 * Functional categories a task belongs to.
 * String literal unions backed by zod enums, no TS enums.
 */
export const TaskDomainEnum = z.enum(['build', 'test', 'lint', 'dev', 'deploy', 'db', 'ci', 'docs', 'clean', 'setup']);
export type TaskDomain = z.infer<typeof TaskDomainEnum>;
export const TASK_DOMAINS: readonly TaskDomain[] = TaskDomainEnum.options;

/**
 * How much logic a task carries, which decides where it is stored:
 * simple and moderate tasks live inline in the config document, complex ones in a script file.
 */
export const TaskComplexityEnum = z.enum(['simple', 'moderate', 'complex']);
export type TaskComplexity = z.infer<typeof TaskComplexityEnum>;
export const TASK_COMPLEXITIES: readonly TaskComplexity[] = TaskComplexityEnum.options;

export function isTaskDomain(value: string): value is TaskDomain {
  return TaskDomainEnum.safeParse(value).success;
}

export function isTaskComplexity(value: string): value is TaskComplexity {
  return TaskComplexityEnum.safeParse(value).success;
}

/**
 * A task as extracted from the project, inline or file-backed.
 * Field names follow the keys of the mise task table.
 */
export interface TaskDefinition {
  /** Name as declared: the table key, or the path-derived name of a script. */
  name: string;
  /** Domain-prefixed, colon-separated identifier, unique within the project. */
  full_name: string;
  domain: TaskDomain;
  description: string;
  /** True when the description was generated because the task declares none. */
  description_generated: boolean;
  run: string | string[];
  depends: string[];
  depends_post: string[];
  wait_for: string[];
  sources: string[];
  outputs: string[];
  env: Record<string, string>;
  dir: string | null;
  alias: string | null;
  hide: boolean;
  confirm: string | null;
  complexity: TaskComplexity;
  /** Project-relative script path; set only for file-backed tasks. */
  file_path: string | null;
  /** Declared in the document's task table, or discovered as a script under a task directory. */
  origin: TaskOrigin;
}

export type TaskOrigin = 'inline' | 'file';

/** Where a task's command body lives. */
export type TaskStorage =
  | { kind: 'inline'; key: string; run: string | string[] }
  | { kind: 'file'; file_path: string; script: string };

/** TOML arrays hold one kind of value; arrays of arrays may differ per inner array. */
export type TomlArray = string[] | number[] | boolean[] | Date[] | TomlTable[];
export type TomlValue = string | number | boolean | Date | TomlTable | TomlArray | TomlArray[];
export interface TomlTable {
  [key: string]: TomlValue;
}

/** The mise configuration document, split into the top-level sections it recognizes. */
export interface MiseConfig {
  tools: TomlTable;
  env: TomlTable;
  tasks: TomlTable;
  vars: TomlTable;
  task_config: TomlTable;
  settings: TomlTable;
}

export const MISE_CONFIG_SECTIONS = ['tools', 'env', 'tasks', 'vars', 'task_config', 'settings'] as const;
export type MiseConfigSection = (typeof MISE_CONFIG_SECTIONS)[number];

export interface ProjectStructure {
  root_path: string;
  package_managers: string[];
  languages: string[];
  frameworks: string[];
  has_tests: boolean;
  has_docs: boolean;
  has_ci: boolean;
  has_database: boolean;
  build_artifacts: string[];
  source_dirs: string[];
}

export type EffortEstimate = 'low' | 'medium' | 'high';

export interface TaskRecommendation {
  task: TaskDefinition;
  reasoning: string;
  /** 1-10, higher is more important. */
  priority: number;
  estimated_effort: EffortEstimate;
  dependencies_needed: string[];
}

export function toFullName(name: string, domain: TaskDomain): string {
  return name.includes(':') ? name : `${domain}:${name}`;
}
