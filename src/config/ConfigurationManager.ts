import fs from 'node:fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { TaskDomainEnum, type TaskDomain } from '../types/index.js';

export interface ComplexityThresholds {
  /** Commands at or below this count are simple. */
  simpleMaxCommands: number;
  /** Commands at or below this count (and above simple) are moderate; beyond it, complex. */
  moderateMaxCommands: number;
  /** A single command longer than this is never simple. */
  simpleMaxCommandLength: number;
}

export interface TaskGraphSettings {
  configFileNames: string[];
  taskDirectories: string[];
  defaultDomain: TaskDomain;
  complexity: ComplexityThresholds;
  domainPriorities: Record<TaskDomain, number>;
  entryPointLeaves: string[];
  blockedPathPrefixes: string[];
}

export const DEFAULT_SETTINGS: TaskGraphSettings = {
  configFileNames: ['mise.toml', '.mise.toml', 'mise/config.toml', '.config/mise.toml'],
  taskDirectories: ['.mise/tasks', 'mise-tasks', '.mise-tasks', 'mise/tasks', '.config/mise/tasks'],
  defaultDomain: 'build',
  complexity: {
    simpleMaxCommands: 1,
    moderateMaxCommands: 5,
    simpleMaxCommandLength: 120,
  },
  domainPriorities: {
    build: 9,
    test: 8,
    lint: 7,
    ci: 8,
    deploy: 6,
    dev: 5,
    db: 7,
    docs: 4,
    clean: 3,
    setup: 8,
  },
  entryPointLeaves: ['default', 'all', 'install', 'start', 'serve', 'watch', 'dev'],
  blockedPathPrefixes: ['/etc', '/proc', '/sys', '/dev', '/bin', '/sbin', '/usr/bin', '/usr/sbin'],
};

const PositiveInt = z.number().int().positive();

// Shape of the optional JSON settings file; every key may be omitted.
const SettingsFileSchema = z
  .object({
    configFileNames: z.array(z.string().min(1)).min(1),
    taskDirectories: z.array(z.string().min(1)).min(1),
    defaultDomain: TaskDomainEnum,
    complexity: z
      .object({
        simpleMaxCommands: PositiveInt,
        moderateMaxCommands: PositiveInt,
        simpleMaxCommandLength: PositiveInt,
      })
      .partial(),
    domainPriorities: z.record(TaskDomainEnum, z.number().int().min(1).max(10)),
    entryPointLeaves: z.array(z.string().min(1)),
    blockedPathPrefixes: z.array(z.string().min(1)),
  })
  .partial();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

function cloneSettings(settings: TaskGraphSettings): TaskGraphSettings {
  return {
    ...settings,
    configFileNames: [...settings.configFileNames],
    taskDirectories: [...settings.taskDirectories],
    complexity: { ...settings.complexity },
    domainPriorities: { ...settings.domainPriorities },
    entryPointLeaves: [...settings.entryPointLeaves],
    blockedPathPrefixes: [...settings.blockedPathPrefixes],
  };
}

/** Applies a parsed settings file over a base, merging the nested tables key by key. */
export function mergeSettings(base: TaskGraphSettings, override: SettingsFile): TaskGraphSettings {
  const merged = cloneSettings(base);
  if (override.configFileNames) merged.configFileNames = [...override.configFileNames];
  if (override.taskDirectories) merged.taskDirectories = [...override.taskDirectories];
  if (override.defaultDomain) merged.defaultDomain = override.defaultDomain;
  if (override.complexity) merged.complexity = { ...merged.complexity, ...override.complexity };
  if (override.domainPriorities) merged.domainPriorities = { ...merged.domainPriorities, ...override.domainPriorities };
  if (override.entryPointLeaves) merged.entryPointLeaves = [...override.entryPointLeaves];
  if (override.blockedPathPrefixes) merged.blockedPathPrefixes = [...override.blockedPathPrefixes];

  if (merged.complexity.moderateMaxCommands < merged.complexity.simpleMaxCommands) {
    logger.warn(
      `moderateMaxCommands (${merged.complexity.moderateMaxCommands}) is below simpleMaxCommands (${merged.complexity.simpleMaxCommands}); raising it to match.`
    );
    merged.complexity.moderateMaxCommands = merged.complexity.simpleMaxCommands;
  }
  return merged;
}

function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Centralized configuration for the task graph services.
 * Singleton: defaults, then the JSON file named by MISE_TASK_GRAPH_CONFIG, then environment overrides.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | null = null;

  private settings: TaskGraphSettings;

  private constructor(env: NodeJS.ProcessEnv) {
    this.settings = cloneSettings(DEFAULT_SETTINGS);
    this.loadSettingsFile(env);
    this.loadEnvironmentOverrides(env);
  }

  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(process.env);
    }
    return ConfigurationManager.instance;
  }

  /** Builds an unshared instance from an explicit environment. */
  public static fromEnvironment(env: NodeJS.ProcessEnv): ConfigurationManager {
    return new ConfigurationManager(env);
  }

  public getSettings(): TaskGraphSettings {
    return cloneSettings(this.settings);
  }

  public getComplexityThresholds(): ComplexityThresholds {
    return { ...this.settings.complexity };
  }

  public getDefaultDomain(): TaskDomain {
    return this.settings.defaultDomain;
  }

  private loadSettingsFile(env: NodeJS.ProcessEnv): void {
    const settingsPath = env.MISE_TASK_GRAPH_CONFIG;
    if (!settingsPath) {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(settingsPath, 'utf8'));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to load settings from ${settingsPath}: ${message}. Using defaults.`);
      return;
    }
    const parsed = SettingsFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        { issues: parsed.error.issues },
        `Settings file ${settingsPath} does not match the expected shape. Using defaults.`
      );
      return;
    }
    this.settings = mergeSettings(this.settings, parsed.data);
    logger.info(`Loaded settings overrides from ${settingsPath}`);
  }

  private loadEnvironmentOverrides(env: NodeJS.ProcessEnv): void {
    logger.debug('Loading environment variable overrides for configuration...');

    const simpleMax = this.readPositiveInt(env, 'MISE_TASK_GRAPH_SIMPLE_MAX_COMMANDS');
    const moderateMax = this.readPositiveInt(env, 'MISE_TASK_GRAPH_MODERATE_MAX_COMMANDS');
    if (simpleMax !== undefined || moderateMax !== undefined) {
      this.settings = mergeSettings(this.settings, {
        complexity: {
          ...(simpleMax !== undefined ? { simpleMaxCommands: simpleMax } : {}),
          ...(moderateMax !== undefined ? { moderateMaxCommands: moderateMax } : {}),
        },
      });
    }

    const defaultDomain = env.MISE_TASK_GRAPH_DEFAULT_DOMAIN;
    if (defaultDomain) {
      const parsed = TaskDomainEnum.safeParse(defaultDomain.toLowerCase());
      if (parsed.success) {
        this.settings.defaultDomain = parsed.data;
        logger.info(`Overriding defaultDomain from env: ${parsed.data}`);
      } else {
        logger.warn(
          `Invalid MISE_TASK_GRAPH_DEFAULT_DOMAIN: ${defaultDomain}. Using default ${this.settings.defaultDomain}.`
        );
      }
    }

    if (env.MISE_TASK_GRAPH_TASK_DIRS) {
      const dirs = parseList(env.MISE_TASK_GRAPH_TASK_DIRS);
      if (dirs.length > 0) {
        this.settings.taskDirectories = dirs;
        logger.info(`Overriding taskDirectories from env: ${dirs.join(', ')}`);
      }
    }

    if (env.MISE_TASK_GRAPH_CONFIG_FILES) {
      const files = parseList(env.MISE_TASK_GRAPH_CONFIG_FILES);
      if (files.length > 0) {
        this.settings.configFileNames = files;
        logger.info(`Overriding configFileNames from env: ${files.join(', ')}`);
      }
    }
  }

  private readPositiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (!raw) {
      return undefined;
    }
    const value = parseInt(raw, 10);
    if (isNaN(value) || value < 1) {
      logger.warn(`Invalid ${key} environment variable: ${raw}. Keeping the current value.`);
      return undefined;
    }
    logger.info(`Overriding ${key} from env: ${value}`);
    return value;
  }
}
