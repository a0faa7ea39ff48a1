// src/services/TaskRecommendationService.ts
import { type TaskGraphSettings } from '../config/ConfigurationManager.js';
import { logger } from '../utils/logger.js';
import {
  TASK_DOMAINS,
  toFullName,
  type EffortEstimate,
  type ProjectStructure,
  type TaskDefinition,
  type TaskDomain,
  type TaskRecommendation,
} from '../types/index.js';
import { TaskUtilsService } from './TaskUtilsService.js';
import defaultCommands from '../data/default-commands.json';

const DEFAULT_COMMANDS: Record<string, Partial<Record<TaskDomain, string>>> = defaultCommands;

/** Domains a task of the key domain conventionally waits on. */
export const CONVENTIONAL_UPSTREAM: Partial<Record<TaskDomain, TaskDomain[]>> = {
  deploy: ['build'],
  ci: ['lint', 'test'],
};

interface Opportunity {
  domain: TaskDomain;
  description: string;
  reasoning: string;
  command?: string;
}

/**
 * Suggests tasks for domains the project's structure calls for but its task set lacks.
 */
export class TaskRecommendationService {
  private readonly settings: TaskGraphSettings;

  constructor(settings: TaskGraphSettings) {
    this.settings = settings;
  }

  public recommend(structure: ProjectStructure, existing: TaskDefinition[]): TaskRecommendation[] {
    const covered = new Set(existing.map((task) => task.domain));
    const opportunities = this.opportunities(structure).filter((o) => !covered.has(o.domain));
    const recommended = new Set(opportunities.map((o) => o.domain));

    const recommendations = opportunities.map((opportunity): TaskRecommendation => {
      const upstream = CONVENTIONAL_UPSTREAM[opportunity.domain] ?? [];
      const depends: string[] = [];
      const needed: string[] = [];
      for (const domain of upstream) {
        const present = existing.find((task) => task.domain === domain);
        if (present) {
          depends.push(present.full_name);
        } else {
          const name = toFullName(domain, domain);
          needed.push(name);
          if (recommended.has(domain)) depends.push(name);
        }
      }
      const command = opportunity.command ?? this.defaultCommand(structure, opportunity.domain);
      const run = command ?? `echo ${JSON.stringify(opportunity.description)}`;
      return {
        task: this.draftTask(opportunity, run, depends),
        reasoning: opportunity.reasoning,
        priority: this.settings.domainPriorities[opportunity.domain],
        estimated_effort: this.effort(command, depends),
        dependencies_needed: needed,
      };
    });

    recommendations.sort(
      (a, b) => b.priority - a.priority || TASK_DOMAINS.indexOf(a.task.domain) - TASK_DOMAINS.indexOf(b.task.domain)
    );
    logger.debug(`[TaskRecommendationService] ${recommendations.length} recommendation(s) for ${structure.root_path}`);
    return recommendations;
  }

  private opportunities(structure: ProjectStructure): Opportunity[] {
    const found: Opportunity[] = [];
    const managers = structure.package_managers.join(', ');
    if (structure.package_managers.length > 0) {
      found.push(
        {
          domain: 'build',
          description: 'Build the project',
          reasoning: `Detected ${managers}; a build task gives other tasks something to depend on`,
        },
        {
          domain: 'lint',
          description: 'Check code style and common mistakes',
          reasoning: `Detected ${managers}; linting catches problems before tests run`,
        },
        {
          domain: 'dev',
          description: 'Start the development workflow',
          reasoning: `Detected ${managers}; a dev task documents how to run the project locally`,
        },
        {
          domain: 'setup',
          description: 'Install project dependencies',
          reasoning: `Detected ${managers}; a setup task makes onboarding one command`,
        }
      );
    }
    if (structure.has_tests) {
      found.push({
        domain: 'test',
        description: 'Run the test suite',
        reasoning: 'Test directories exist but no test task runs them',
      });
    }
    if (structure.has_docs) {
      found.push({
        domain: 'docs',
        description: 'Build the documentation',
        reasoning: 'Documentation directories exist but no docs task builds them',
      });
    }
    if (structure.has_database) {
      found.push({
        domain: 'db',
        description: 'Apply database migrations',
        reasoning: 'Database artifacts exist but no db task manages them',
      });
    }
    if (structure.has_ci) {
      found.push({
        domain: 'ci',
        description: 'Run the checks CI runs',
        reasoning: 'CI configuration exists; a ci task lets the same checks run locally',
      });
    }
    if (structure.build_artifacts.length > 0) {
      found.push({
        domain: 'clean',
        description: 'Remove build artifacts',
        reasoning: `Build output (${structure.build_artifacts.join(', ')}) exists but no clean task removes it`,
        command: `rm -rf ${structure.build_artifacts.join(' ')}`,
      });
    }
    return found;
  }

  private defaultCommand(structure: ProjectStructure, domain: TaskDomain): string | undefined {
    for (const manager of structure.package_managers) {
      const command = DEFAULT_COMMANDS[manager]?.[domain];
      if (command !== undefined) return command;
    }
    return undefined;
  }

  private effort(command: string | undefined, depends: string[]): EffortEstimate {
    if (command === undefined) {
      return depends.length > 0 ? 'high' : 'medium';
    }
    return 'low';
  }

  private draftTask(opportunity: Opportunity, run: string, depends: string[]): TaskDefinition {
    const { domain } = opportunity;
    return {
      name: domain,
      full_name: toFullName(domain, domain),
      domain,
      description: opportunity.description,
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
      complexity: TaskUtilsService.classifyComplexity([run], this.settings.complexity),
      file_path: null,
      origin: 'inline',
    };
  }
}
