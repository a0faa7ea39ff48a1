// src/repositories/MiseConfigRepository.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { parse, stringify } from '@iarna/toml';
import writeFileAtomic from 'write-file-atomic';
import { logger } from '../utils/logger.js';
import {
  MISE_CONFIG_SECTIONS,
  type MiseConfig,
  type MiseConfigSection,
  type TomlArray,
  type TomlTable,
  type TomlValue,
} from '../types/index.js';

export interface LoadedMiseConfig {
  /** Absolute path of the document; the write target when it does not exist yet. */
  path: string;
  exists: boolean;
  config: MiseConfig;
  /** Top-level sections present on disk that a rewrite will not carry over. */
  unrecognized_sections: string[];
}

export function emptyMiseConfig(): MiseConfig {
  return { tools: {}, env: {}, tasks: {}, vars: {}, task_config: {}, settings: {} };
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isMiseConfigSection(key: string): key is MiseConfigSection {
  return MISE_CONFIG_SECTIONS.some((section) => section === key);
}

function isDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function homogeneous<T>(items: unknown[], guard: (item: unknown) => item is T): T[] | undefined {
  return items.every(guard) ? items.filter(guard) : undefined;
}

function toTomlArray(items: unknown[]): TomlArray | undefined {
  return (
    homogeneous(items, (item): item is string => typeof item === 'string') ??
    homogeneous(items, (item): item is number => typeof item === 'number') ??
    homogeneous(items, (item): item is boolean => typeof item === 'boolean') ??
    homogeneous(items, isDate) ??
    homogeneous(items, isPlainObject)?.map((item) => toTomlTable(item))
  );
}

/**
 * Narrows a decoded TOML value into the typed form the repository writes back.
 * Dates keep the parser's instances so local dates and times serialize as they were read.
 * Arrays mixing kinds cannot come out of the parser and are dropped.
 */
export function toTomlValue(value: unknown): TomlValue | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || isDate(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (items.length > 0 && items.every((item) => Array.isArray(item))) {
      const nested: TomlArray[] = [];
      for (const item of items) {
        const inner: unknown[] = Array.isArray(item) ? item : [];
        const converted = toTomlArray(inner);
        if (converted === undefined) {
          return undefined;
        }
        nested.push(converted);
      }
      return nested;
    }
    return toTomlArray(items);
  }
  if (isPlainObject(value)) {
    return toTomlTable(value);
  }
  return undefined;
}

export function toTomlTable(value: unknown): TomlTable {
  const table: TomlTable = {};
  if (!isPlainObject(value)) {
    return table;
  }
  for (const [key, raw] of Object.entries(value)) {
    const converted = toTomlValue(raw);
    if (converted !== undefined) {
      table[key] = converted;
    }
  }
  return table;
}

/**
 * Loads and saves the project's mise configuration document.
 * Nothing is cached: every load reads the file again.
 */
export class MiseConfigRepository {
  private readonly projectRoot: string;
  private readonly configFileNames: string[];

  constructor(projectRoot: string, configFileNames: string[]) {
    this.projectRoot = projectRoot;
    this.configFileNames = configFileNames;
  }

  /** Finds the first configured document that exists, falling back to the first candidate. */
  public async locate(): Promise<{ path: string; exists: boolean }> {
    for (const fileName of this.configFileNames) {
      const candidate = path.join(this.projectRoot, fileName);
      try {
        const stats = await fs.stat(candidate);
        if (stats.isFile()) {
          return { path: candidate, exists: true };
        }
      } catch (error: unknown) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    }
    return { path: path.join(this.projectRoot, this.configFileNames[0] ?? 'mise.toml'), exists: false };
  }

  public async load(): Promise<LoadedMiseConfig> {
    const located = await this.locate();
    const config = emptyMiseConfig();
    if (!located.exists) {
      logger.debug(`[MiseConfigRepository] No config document under ${this.projectRoot}`);
      return { ...located, config, unrecognized_sections: [] };
    }

    const text = await fs.readFile(located.path, 'utf8');
    const data = parse(text);
    const unrecognized: string[] = [];
    for (const [key, value] of Object.entries(data)) {
      if (isMiseConfigSection(key)) {
        config[key] = toTomlTable(value);
      } else {
        unrecognized.push(key);
      }
    }
    logger.debug(
      `[MiseConfigRepository] Loaded ${located.path} (${Object.keys(config.tasks).length} inline task entries)`
    );
    return { ...located, config, unrecognized_sections: unrecognized };
  }

  /** Serializes the recognized sections and replaces the document in one atomic write. */
  public async save(loaded: LoadedMiseConfig): Promise<void> {
    const document: TomlTable = {};
    for (const section of MISE_CONFIG_SECTIONS) {
      const table = loaded.config[section];
      if (Object.keys(table).length > 0) {
        document[section] = table;
      }
    }
    const text = stringify(document);
    await fs.mkdir(path.dirname(loaded.path), { recursive: true });
    await writeFileAtomic(loaded.path, text, { encoding: 'utf8' });
    logger.info(`[MiseConfigRepository] Wrote ${loaded.path}`);
  }
}

export function isMissingFileError(error: unknown): boolean {
  // fs errors can come from another realm, where instanceof Error is false.
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
