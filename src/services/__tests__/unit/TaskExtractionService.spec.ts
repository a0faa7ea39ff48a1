// src/services/__tests__/unit/TaskExtractionService.spec.ts
import { TaskExtractionService, parseScriptHeader, scriptTaskName } from '../../TaskExtractionService.js';
import { emptyMiseConfig, type TaskScriptData } from '../../../repositories/index.js';
import { MalformedTaskError } from '../../../utils/errors.js';
import { createProject, removeProject, testSettings } from '../taskFixtures.js';

const STAGING_SCRIPT = [
  '#!/usr/bin/env bash',
  '#MISE description="Ship to staging"',
  '#MISE depends=["build"]',
  'set -e',
  './deploy.sh staging',
  '',
].join('\n');

function script(taskDir: string, relativePath: string, content: string): TaskScriptData {
  return { task_dir: taskDir, relative_path: relativePath, file_path: `${taskDir}/${relativePath}`, content };
}

describe('TaskExtractionService Unit Tests', () => {
  const service = new TaskExtractionService(testSettings());

  describe('scriptTaskName', () => {
    it('should join path segments with colons and drop the extension', () => {
      expect(scriptTaskName('deploy/staging.sh')).toBe('deploy:staging');
    });

    it('should name a _default leaf after its directory', () => {
      expect(scriptTaskName('test/_default')).toBe('test');
    });

    it('should ignore dot-files and documentation', () => {
      expect(scriptTaskName('deploy/.env')).toBeNull();
      expect(scriptTaskName('README.md')).toBeNull();
    });
  });

  describe('parseScriptHeader', () => {
    it('should decode header values as TOML values', () => {
      const header = parseScriptHeader(STAGING_SCRIPT);
      expect(header.errors).toEqual([]);
      expect(header.fields).toEqual({ description: 'Ship to staging', depends: ['build'] });
    });

    it('should accept the lowercase spaced form', () => {
      expect(parseScriptHeader('# mise hide=true\n').fields).toEqual({ hide: true });
    });

    it('should report a header that is not a TOML value', () => {
      const header = parseScriptHeader('#MISE description=Ship it\n');
      expect(header.errors).toHaveLength(1);
      expect(header.errors[0]).toMatch(/^header 'description' is not a valid TOML value/);
    });
  });

  describe('buildTasks', () => {
    it('should extract inline shorthand and table entries', () => {
      const config = emptyMiseConfig();
      config.tasks = {
        build: 'npm run build',
        'test:unit': { run: ['npm ci', 'npm test'], depends: 'build', description: 'Unit tests' },
      };

      const result = service.buildTasks(config, []);

      expect(result.skipped).toEqual([]);
      expect(result.tasks.map((task) => task.full_name)).toEqual(['build:build', 'test:unit']);
      const [build, unit] = result.tasks;
      expect(build).toMatchObject({
        name: 'build',
        domain: 'build',
        run: 'npm run build',
        description: 'Run: npm run build',
        description_generated: true,
        complexity: 'simple',
        origin: 'inline',
        file_path: null,
      });
      expect(unit).toMatchObject({
        domain: 'test',
        description: 'Unit tests',
        depends: ['build'],
        complexity: 'moderate',
      });
    });

    it('should skip malformed entries with a reason and keep the rest', () => {
      const config = emptyMiseConfig();
      config.tasks = {
        lint: 'eslint .',
        broken: { description: 'nothing to run' },
        numeric: 42,
      };

      const result = service.buildTasks(config, []);

      expect(result.tasks.map((task) => task.full_name)).toEqual(['lint:lint']);
      expect(result.skipped).toEqual([
        { name: 'broken', origin: 'inline', location: '[tasks."broken"]', reason: "missing 'run'" },
        {
          name: 'numeric',
          origin: 'inline',
          location: '[tasks."numeric"]',
          reason: 'task entry must be a command string, a list of commands or a table',
        },
      ]);
    });

    it('should extract file-backed tasks that are never simple', () => {
      const result = service.buildTasks(emptyMiseConfig(), [script('.mise/tasks', 'deploy/staging.sh', STAGING_SCRIPT)]);

      expect(result.tasks).toHaveLength(1);
      expect(result.tasks[0]).toMatchObject({
        name: 'deploy:staging',
        full_name: 'deploy:staging',
        domain: 'deploy',
        description: 'Ship to staging',
        depends: ['build'],
        complexity: 'moderate',
        file_path: '.mise/tasks/deploy/staging.sh',
        origin: 'file',
      });
    });

    it('should keep the inline declaration when a script has the same full name', () => {
      const config = emptyMiseConfig();
      config.tasks = { 'deploy:staging': './deploy.sh staging' };

      const result = service.buildTasks(config, [script('.mise/tasks', 'deploy/staging.sh', STAGING_SCRIPT)]);

      expect(result.tasks.map((task) => task.origin)).toEqual(['inline']);
      expect(result.skipped).toEqual([
        {
          name: 'deploy:staging',
          origin: 'file',
          location: '.mise/tasks/deploy/staging.sh',
          reason: `duplicate of 'deploy:staging' already declared at [tasks."deploy:staging"]`,
        },
      ]);
    });
  });

  describe('extract', () => {
    let root = '';

    afterEach(async () => {
      await removeProject(root);
    });

    it('should read the config document and the task directories', async () => {
      root = await createProject({
        'mise.toml': '[tasks.build]\nrun = "npm run build"\ndescription = "Build"\n',
        '.mise/tasks/deploy/staging.sh': STAGING_SCRIPT,
      });

      const result = await service.extract(root);

      expect(result.config_path).toBe(`${root}/mise.toml`);
      expect(result.tasks.map((task) => task.full_name)).toEqual(['build:build', 'deploy:staging']);
    });

    it('should use task_config.includes as the task directories', async () => {
      root = await createProject({
        'mise.toml': '[task_config]\nincludes = ["tasks"]\n',
        'tasks/lint.sh': '#!/usr/bin/env bash\neslint .\n',
        '.mise/tasks/ignored.sh': '#!/usr/bin/env bash\necho ignored\n',
      });

      const result = await service.extract(root);

      expect(result.task_dirs).toEqual(['tasks']);
      expect(result.tasks.map((task) => task.full_name)).toEqual(['lint:lint']);
    });

    it('should read scripts referenced by an inline file key', async () => {
      root = await createProject({
        'mise.toml': '[tasks."db:migrate"]\nfile = "scripts/migrate.sh"\n',
        'scripts/migrate.sh': '#!/usr/bin/env bash\npsql -f schema.sql\n',
      });

      const result = await service.extract(root);

      expect(result.tasks[0]).toMatchObject({
        full_name: 'db:migrate',
        file_path: 'scripts/migrate.sh',
        origin: 'inline',
        complexity: 'moderate',
      });
    });

    it('should fail with MalformedTask only when every entry is malformed', async () => {
      root = await createProject({ 'mise.toml': '[tasks.broken]\ndescription = "nothing to run"\n' });

      await expect(service.extract(root)).rejects.toBeInstanceOf(MalformedTaskError);
    });

    it('should return an empty set for a project without tasks', async () => {
      root = await createProject({ 'package.json': '{}' });

      const result = await service.extract(root);

      expect(result).toEqual({
        config_path: null,
        task_dirs: testSettings().taskDirectories,
        tasks: [],
        skipped: [],
      });
    });
  });
});
