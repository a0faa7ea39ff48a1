// src/services/ProjectStructureService.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { logger } from '../utils/logger.js';
import { isMissingFileError } from '../repositories/index.js';
import { type ProjectStructure } from '../types/index.js';

interface ManifestMarker {
  files: string[];
  packageManager: string;
  language: string;
}

const MANIFEST_MARKERS: ManifestMarker[] = [
  { files: ['package.json'], packageManager: 'npm', language: 'javascript' },
  { files: ['Cargo.toml'], packageManager: 'cargo', language: 'rust' },
  { files: ['pyproject.toml', 'setup.py', 'requirements.txt'], packageManager: 'pip', language: 'python' },
  { files: ['go.mod'], packageManager: 'go', language: 'go' },
];

const FRAMEWORK_MARKERS: Record<string, string[]> = {
  next: ['next.config.*'],
  nuxt: ['nuxt.config.*'],
  vite: ['vite.config.*'],
  svelte: ['svelte.config.*'],
  astro: ['astro.config.*'],
  angular: ['angular.json'],
  django: ['manage.py'],
  tauri: ['src-tauri'],
};

const SOURCE_DIRS = ['src', 'lib', 'app'];
const TEST_DIRS = ['tests', 'test', '__tests__', 'spec'];
const DOC_DIRS = ['docs', 'doc', 'documentation'];
const CI_MARKERS = ['.github/workflows', '.gitlab-ci.yml', 'Jenkinsfile', '.circleci'];
const DATABASE_MARKERS = ['migrations', 'schema.sql', 'models', 'alembic', 'prisma'];
const BUILD_ARTIFACTS = ['dist', 'build', 'target', 'out'];

/**
 * Detects package managers, languages, frameworks and conventional directories
 * by checking which marker files exist. Reads no file contents.
 */
export class ProjectStructureService {
  public async analyze(rootPath: string): Promise<ProjectStructure> {
    const structure: ProjectStructure = {
      root_path: rootPath,
      package_managers: [],
      languages: [],
      frameworks: [],
      has_tests: false,
      has_docs: false,
      has_ci: false,
      has_database: false,
      build_artifacts: [],
      source_dirs: [],
    };

    for (const marker of MANIFEST_MARKERS) {
      if (await this.anyExists(rootPath, marker.files)) {
        structure.package_managers.push(marker.packageManager);
        structure.languages.push(marker.language);
      }
    }
    if (await this.exists(rootPath, 'tsconfig.json')) {
      structure.languages.push('typescript');
    }

    for (const [framework, patterns] of Object.entries(FRAMEWORK_MARKERS)) {
      const matches = await fg(patterns, { cwd: rootPath, deep: 1, onlyFiles: false, dot: true });
      if (matches.length > 0) {
        structure.frameworks.push(framework);
      }
    }

    structure.source_dirs = await this.filterExisting(rootPath, SOURCE_DIRS);
    structure.has_tests = await this.anyExists(rootPath, TEST_DIRS);
    structure.has_docs = await this.anyExists(rootPath, DOC_DIRS);
    structure.has_ci = await this.anyExists(rootPath, CI_MARKERS);
    structure.has_database = await this.anyExists(rootPath, DATABASE_MARKERS);
    structure.build_artifacts = await this.filterExisting(rootPath, BUILD_ARTIFACTS);

    logger.debug(
      `[ProjectStructureService] ${rootPath}: managers=[${structure.package_managers.join(', ')}] frameworks=[${structure.frameworks.join(', ')}]`
    );
    return structure;
  }

  private async filterExisting(rootPath: string, candidates: string[]): Promise<string[]> {
    const found: string[] = [];
    for (const candidate of candidates) {
      if (await this.exists(rootPath, candidate)) {
        found.push(candidate);
      }
    }
    return found;
  }

  private async anyExists(rootPath: string, candidates: string[]): Promise<boolean> {
    return (await this.filterExisting(rootPath, candidates)).length > 0;
  }

  private async exists(rootPath: string, relativePath: string): Promise<boolean> {
    try {
      await fs.stat(path.join(rootPath, relativePath));
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }
}
