// src/services/MiseTaskServiceTypes.ts
import { z } from 'zod';
import {
  type ProjectStructure,
  type TaskComplexity,
  type TaskDefinition,
  type TaskDomain,
  type TaskOrigin,
  type TaskRecommendation,
  type TaskStorage,
} from '../types/index.js';

export interface SkippedTask {
  name: string;
  origin: TaskOrigin;
  /** Table key (`[tasks."name"]`) or project-relative script path. */
  location: string;
  reason: string;
}

export interface ExtractionResult {
  /** Absolute path of the config document, null when the project has none. */
  config_path: string | null;
  task_dirs: string[];
  tasks: TaskDefinition[];
  skipped: SkippedTask[];
}

export const EdgeKindEnum = z.enum(['depends', 'depends_post', 'wait_for']);
export type EdgeKind = z.infer<typeof EdgeKindEnum>;

/**
 * A directed precedence edge: `from` runs before `to`.
 * `declared_by` is the task whose field holds the reference.
 */
export interface TaskEdge {
  from: string;
  to: string;
  kind: EdgeKind;
  declared_by: string;
  reference: string;
}

export interface DanglingReference {
  task: string;
  kind: EdgeKind;
  reference: string;
}

export interface TaskRelation {
  task: string;
  relation: EdgeKind;
}

export interface TaskChainDetail {
  full_name: string;
  description: string;
  domain: TaskDomain;
  complexity: TaskComplexity;
  depends: string[];
  file_path: string | null;
}

export interface TaskChain {
  task_name: string;
  /** Transitive hard dependencies of the root, in execution order. */
  dependencies: string[];
  /** Tasks that transitively depend on the root, in declaration order. */
  dependents: string[];
  /** Ancestors plus the root, topologically sorted with declaration-order ties. */
  execution_order: string[];
  /** Maximal layers of the same set; every task's dependencies lie in earlier layers. */
  parallel_groups: string[][];
  post_tasks: string[];
  wait_for: string[];
  dangling: DanglingReference[];
  task_details: Record<string, TaskChainDetail>;
}

export const IssueCategoryEnum = z.enum([
  'circular_dependency',
  'dangling_dependency',
  'domain_prefix',
  'soft_cycle',
  'orphan',
  'naming',
  'missing_description',
  'malformed_task',
]);
export type IssueCategory = z.infer<typeof IssueCategoryEnum>;

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ArchitectureIssue {
  category: IssueCategory;
  severity: IssueSeverity;
  task: string;
  message: string;
  related_tasks?: string[];
}

export interface ArchitectureReport {
  total_tasks: number;
  inline_tasks: number;
  file_tasks: number;
  domains_used: TaskDomain[];
  issues: ArchitectureIssue[];
  suggestions: string[];
  skipped: SkippedTask[];
}

export type ValidationOutcome = 'no_tasks' | 'success' | 'issues_found';

export interface ValidationResult extends ArchitectureReport {
  project_path: string;
  validation_result: ValidationOutcome;
  error_count: number;
  warning_count: number;
}

export interface PruneCandidate {
  task: string;
  domain: TaskDomain;
  reason: string;
  /** Name of the policy that flagged the task. */
  policy: string;
}

export interface PlacementRequest {
  description: string;
  suggested_name?: string;
  force_complexity?: string;
  domain_hint?: string;
  /** Explicit commands; otherwise they are derived from the description or the project. */
  run?: string | string[];
  depends?: string[];
}

export interface PlacementPlan {
  full_name: string;
  domain: TaskDomain;
  complexity: TaskComplexity;
  storage: TaskStorage;
  task: TaskDefinition;
  warnings: string[];
}

export interface AffectedDependent {
  task: string;
  relation: EdgeKind;
  removed_task: string;
}

export interface RemovalResult {
  removed: string[];
  deleted_files: string[];
  affected_dependents: AffectedDependent[];
  warnings: string[];
}

export interface CreateTaskResult {
  success: true;
  dry_run: boolean;
  task_name: string;
  domain: TaskDomain;
  complexity: TaskComplexity;
  storage: TaskStorage['kind'];
  file_path: string | null;
  task: TaskDefinition;
  warnings: string[];
}

export interface RemoveTaskResult extends RemovalResult {
  success: true;
  task_name: string;
}

export interface PruneResult {
  project_path: string;
  dry_run: boolean;
  candidates: PruneCandidate[];
  removed: string[];
  deleted_files: string[];
  affected_dependents: AffectedDependent[];
  warnings: string[];
}

export interface ProjectAnalysis {
  project_path: string;
  structure: ProjectStructure;
  config_path: string | null;
  existing_tasks: TaskDefinition[];
  skipped: SkippedTask[];
  recommendations: TaskRecommendation[];
  total_recommendations: number;
}

export interface RedundancyResult {
  project_path: string;
  candidates: PruneCandidate[];
  total_tasks: number;
}
