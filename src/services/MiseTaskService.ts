// src/services/MiseTaskService.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationManager, type TaskGraphSettings } from '../config/ConfigurationManager.js';
import { MiseConfigRepository, isMissingFileError, type LoadedMiseConfig } from '../repositories/index.js';
import { logger } from '../utils/logger.js';
import { AccessDeniedError, MalformedTaskError, PathNotFoundError, TaskNotFoundError } from '../utils/errors.js';
import { type ProjectStructure } from '../types/index.js';
import { ProjectStructureService } from './ProjectStructureService.js';
import { TaskExtractionService } from './TaskExtractionService.js';
import { DependencyGraphService, type TaskGraph } from './DependencyGraphService.js';
import { TaskChainService } from './TaskChainService.js';
import { ArchitectureValidationService } from './ArchitectureValidationService.js';
import { RedundancyDetectionService, type RedundancyPolicy } from './RedundancyDetectionService.js';
import { TaskPlacementService } from './TaskPlacementService.js';
import { TaskPersistenceService } from './TaskPersistenceService.js';
import { TaskRecommendationService } from './TaskRecommendationService.js';
import {
  type CreateTaskResult,
  type ExtractionResult,
  type PlacementPlan,
  type PlacementRequest,
  type ProjectAnalysis,
  type PruneResult,
  type RedundancyResult,
  type RemoveTaskResult,
  type TaskChain,
  type ValidationResult,
} from './MiseTaskServiceTypes.js';

interface ProjectSnapshot {
  root: string;
  document: LoadedMiseConfig;
  extraction: ExtractionResult;
  graph: TaskGraph;
}

export interface CreateTaskInput extends PlacementRequest {
  project_path: string;
  dry_run?: boolean;
}

/**
 * Entry point for every task graph operation. Each call reads a fresh snapshot
 * of the project; nothing is cached between calls.
 */
export class MiseTaskService {
  private readonly settings: TaskGraphSettings;

  private structureService: ProjectStructureService;
  private extractionService: TaskExtractionService;
  private graphService: DependencyGraphService;
  private chainService: TaskChainService;
  private validationService: ArchitectureValidationService;
  private redundancyService: RedundancyDetectionService;
  private placementService: TaskPlacementService;
  private persistenceService: TaskPersistenceService;
  private recommendationService: TaskRecommendationService;

  constructor(
    settings: TaskGraphSettings = ConfigurationManager.getInstance().getSettings(),
    policies?: readonly RedundancyPolicy[]
  ) {
    this.settings = settings;
    this.structureService = new ProjectStructureService();
    this.extractionService = new TaskExtractionService(settings);
    this.graphService = new DependencyGraphService();
    this.chainService = new TaskChainService();
    this.validationService = new ArchitectureValidationService(settings);
    this.redundancyService = new RedundancyDetectionService(policies, settings.entryPointLeaves);
    this.placementService = new TaskPlacementService(settings);
    this.persistenceService = new TaskPersistenceService(settings);
    this.recommendationService = new TaskRecommendationService(settings);
  }

  public async analyzeProjectStructure(projectPath: string): Promise<ProjectStructure> {
    const root = await this.resolveProject(projectPath);
    return this.structureService.analyze(root);
  }

  public async analyzeProject(projectPath: string): Promise<ProjectAnalysis> {
    const snapshot = await this.loadSnapshot(projectPath);
    const structure = await this.structureService.analyze(snapshot.root);
    const recommendations = this.recommendationService.recommend(structure, snapshot.extraction.tasks);
    return {
      project_path: snapshot.root,
      structure,
      config_path: snapshot.extraction.config_path,
      existing_tasks: snapshot.extraction.tasks,
      skipped: snapshot.extraction.skipped,
      recommendations,
      total_recommendations: recommendations.length,
    };
  }

  public async extractTasks(projectPath: string): Promise<ExtractionResult> {
    return (await this.loadSnapshot(projectPath)).extraction;
  }

  /** The dependency graph of the project's current task set. */
  public async buildDependencyGraph(projectPath: string): Promise<TaskGraph> {
    return (await this.loadSnapshot(projectPath)).graph;
  }

  public async traceTaskChain(projectPath: string, taskName: string): Promise<TaskChain> {
    const { graph } = await this.loadSnapshot(projectPath);
    return this.chainService.trace(graph, taskName);
  }

  public async validateArchitecture(projectPath: string): Promise<ValidationResult> {
    const { root, graph, extraction } = await this.loadSnapshot(projectPath);
    const report = this.validationService.validate(graph, extraction.skipped);
    const errorCount = report.issues.filter((issue) => issue.severity === 'error').length;
    const warningCount = report.issues.filter((issue) => issue.severity === 'warning').length;
    return {
      project_path: root,
      validation_result:
        report.total_tasks === 0 ? 'no_tasks' : errorCount + warningCount === 0 ? 'success' : 'issues_found',
      error_count: errorCount,
      warning_count: warningCount,
      ...report,
    };
  }

  public async findRedundantTasks(projectPath: string): Promise<RedundancyResult> {
    const { root, graph } = await this.loadSnapshot(projectPath);
    return { project_path: root, candidates: this.redundancyService.detect(graph), total_tasks: graph.tasks.length };
  }

  public async pruneTasks(projectPath: string, dryRun: boolean): Promise<PruneResult> {
    const snapshot = await this.loadSnapshot(projectPath);
    const candidates = this.redundancyService.detect(snapshot.graph);
    const result: PruneResult = {
      project_path: snapshot.root,
      dry_run: dryRun,
      candidates,
      removed: [],
      deleted_files: [],
      affected_dependents: [],
      warnings: [],
    };
    if (dryRun || candidates.length === 0) {
      return result;
    }

    const tasks = candidates.flatMap((candidate) => snapshot.graph.get(candidate.task) ?? []);
    const removal = await this.persistenceService.removeTasks(snapshot.root, snapshot.graph, tasks, snapshot.document);
    logger.info(`[MiseTaskService] Pruned ${removal.removed.length} task(s) from ${snapshot.root}`);
    return { ...result, ...removal };
  }

  /** Decides where a new task would go without writing anything. */
  public async planTask(projectPath: string, request: PlacementRequest): Promise<PlacementPlan> {
    const snapshot = await this.loadSnapshot(projectPath, { allowMalformed: true });
    return this.planInSnapshot(snapshot, request);
  }

  public async createTask(input: CreateTaskInput): Promise<CreateTaskResult> {
    const snapshot = await this.loadSnapshot(input.project_path, { allowMalformed: true });
    const plan = await this.planInSnapshot(snapshot, input);

    const warnings = [...plan.warnings];
    const dryRun = input.dry_run ?? false;
    if (!dryRun) {
      warnings.push(...(await this.persistenceService.saveTask(snapshot.root, plan, snapshot.document)));
    }
    return {
      success: true,
      dry_run: dryRun,
      task_name: plan.full_name,
      domain: plan.domain,
      complexity: plan.complexity,
      storage: plan.storage.kind,
      file_path: plan.storage.kind === 'file' ? plan.storage.file_path : null,
      task: plan.task,
      warnings,
    };
  }

  public async removeTask(projectPath: string, taskName: string): Promise<RemoveTaskResult> {
    const snapshot = await this.loadSnapshot(projectPath);
    const { graph } = snapshot;
    const task =
      graph.get(taskName) ??
      graph.tasks.find((candidate) => candidate.name === taskName) ??
      graph.tasks.find((candidate) => candidate.alias === taskName);
    if (!task) {
      throw new TaskNotFoundError(taskName, graph.names());
    }
    const removal = await this.persistenceService.removeTasks(snapshot.root, graph, [task], snapshot.document);
    return { success: true, task_name: task.full_name, ...removal };
  }

  private async planInSnapshot(snapshot: ProjectSnapshot, request: PlacementRequest): Promise<PlacementPlan> {
    const structure = await this.structureService.analyze(snapshot.root);
    return this.placementService.plan(request, {
      graph: snapshot.graph,
      taskDirs: snapshot.extraction.task_dirs,
      structure,
    });
  }

  /** Refuses system directories and anything that is not an existing directory. */
  private async resolveProject(projectPath: string): Promise<string> {
    const root = path.resolve(projectPath);
    const blocked = this.settings.blockedPathPrefixes.some(
      (prefix) => root === prefix || root.startsWith(`${prefix}${path.sep}`)
    );
    if (blocked) {
      throw new AccessDeniedError(root);
    }
    try {
      const stats = await fs.stat(root);
      if (!stats.isDirectory()) {
        throw new PathNotFoundError(root);
      }
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        throw new PathNotFoundError(root);
      }
      throw error;
    }
    return root;
  }

  private async loadSnapshot(projectPath: string, options: { allowMalformed?: boolean } = {}): Promise<ProjectSnapshot> {
    const root = await this.resolveProject(projectPath);
    const document = await new MiseConfigRepository(root, this.settings.configFileNames).load();
    const extraction = options.allowMalformed
      ? await this.extractLeniently(root, document)
      : await this.extractionService.extract(root, document);
    const graph = this.graphService.build(extraction.tasks);
    return { root, document, extraction, graph };
  }

  // Creating a task into a project whose existing entries are all malformed is still allowed.
  private async extractLeniently(root: string, document: LoadedMiseConfig): Promise<ExtractionResult> {
    try {
      return await this.extractionService.extract(root, document);
    } catch (error: unknown) {
      if (error instanceof MalformedTaskError) {
        logger.warn(`[MiseTaskService] ${error.message}; continuing with an empty task set`);
        return {
          config_path: document.exists ? document.path : null,
          task_dirs: this.extractionService.taskDirectories(document.config),
          tasks: [],
          skipped: [],
        };
      }
      throw error;
    }
  }
}
