// src/repositories/TaskFileRepository.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import writeFileAtomic from 'write-file-atomic';
import { logger } from '../utils/logger.js';
import { isMissingFileError } from './MiseConfigRepository.js';

export interface TaskScriptData {
  /** Task directory the script was found under, project-relative. */
  task_dir: string;
  /** Path below the task directory, '/'-separated. */
  relative_path: string;
  /** Project-relative path, '/'-separated. */
  file_path: string;
  content: string;
}

const SCRIPT_MODE = 0o755;

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Reads and writes file-backed task scripts under the project's task directories.
 */
export class TaskFileRepository {
  private readonly projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  /** Lists every regular, non-hidden file below the given task directories, in path order. */
  public async listScripts(taskDirs: string[]): Promise<TaskScriptData[]> {
    const scripts: TaskScriptData[] = [];
    const seen = new Set<string>();

    for (const taskDir of taskDirs) {
      const absoluteDir = path.resolve(this.projectRoot, taskDir);
      if (!(await this.isDirectory(absoluteDir))) {
        continue;
      }
      const entries = await fg('**/*', {
        cwd: absoluteDir,
        onlyFiles: true,
        dot: false,
        followSymbolicLinks: false,
      });
      entries.sort();

      for (const entry of entries) {
        const filePath = toPosix(path.relative(this.projectRoot, path.join(absoluteDir, entry)));
        if (seen.has(filePath)) {
          continue;
        }
        seen.add(filePath);
        const content = await fs.readFile(path.join(absoluteDir, entry), 'utf8');
        scripts.push({ task_dir: toPosix(taskDir), relative_path: entry, file_path: filePath, content });
      }
    }
    logger.debug(`[TaskFileRepository] Found ${scripts.length} task script(s) under ${this.projectRoot}`);
    return scripts;
  }

  public async exists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(path.resolve(this.projectRoot, filePath));
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  public async readScript(filePath: string): Promise<string> {
    return fs.readFile(path.resolve(this.projectRoot, filePath), 'utf8');
  }

  /** Writes an executable script atomically, creating its directories. */
  public async writeScript(filePath: string, content: string): Promise<void> {
    const absolute = path.resolve(this.projectRoot, filePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await writeFileAtomic(absolute, content, { encoding: 'utf8', mode: SCRIPT_MODE });
    logger.info(`[TaskFileRepository] Wrote task script ${filePath}`);
  }

  /** Deletes a script; returns false when it was already gone. */
  public async deleteScript(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(path.resolve(this.projectRoot, filePath));
      logger.info(`[TaskFileRepository] Deleted task script ${filePath}`);
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        logger.warn(`[TaskFileRepository] Task script ${filePath} was already removed`);
        return false;
      }
      throw error;
    }
  }

  private async isDirectory(absolutePath: string): Promise<boolean> {
    try {
      return (await fs.stat(absolutePath)).isDirectory();
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }
}
