// src/services/__tests__/taskRemoveIntegration.test.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { MiseTaskService } from '../MiseTaskService.js';
import { TaskNotFoundError } from '../../utils/errors.js';
import { createProject, removeProject, testSettings } from './taskFixtures.js';

const MISE_TOML = [
  '[tasks.build]',
  'run = "npm run build"',
  'description = "Build"',
  '',
  '[tasks."test:unit"]',
  'run = "npm test"',
  'depends = ["build"]',
  '',
  '[tasks."deploy:prod"]',
  'run = "./deploy.sh"',
  'depends = ["build"]',
  'wait_for = ["test:unit"]',
  '',
].join('\n');

describe('MiseTaskService Integration - removeTask', () => {
  let root: string;
  let service: MiseTaskService;

  beforeEach(async () => {
    root = await createProject({ 'mise.toml': MISE_TOML });
    service = new MiseTaskService(testSettings());
  });

  afterEach(async () => {
    await removeProject(root);
  });

  it('should remove the task and report its dependents without editing them', async () => {
    const result = await service.removeTask(root, 'build');

    expect(result).toEqual({
      success: true,
      task_name: 'build:build',
      removed: ['build:build'],
      deleted_files: [],
      affected_dependents: [
        { task: 'test:unit', relation: 'depends', removed_task: 'build:build' },
        { task: 'deploy:prod', relation: 'depends', removed_task: 'build:build' },
      ],
      warnings: [
        'test:unit still lists build:build in depends; update it by hand',
        'deploy:prod still lists build:build in depends; update it by hand',
      ],
    });

    const extraction = await service.extractTasks(root);
    expect(extraction.tasks.map((task) => [task.full_name, task.depends, task.wait_for])).toEqual([
      ['test:unit', ['build'], []],
      ['deploy:prod', ['build'], ['test:unit']],
    ]);
  });

  it('should report a task that does not exist', async () => {
    await expect(service.removeTask(root, 'lint:missing')).rejects.toThrow(TaskNotFoundError);
    expect(await fs.readFile(path.join(root, 'mise.toml'), 'utf8')).toBe(MISE_TOML);
  });

  it('should delete the script of a file-backed task', async () => {
    const scriptRoot = await createProject({ '.mise/tasks/lint/eslint.sh': '#!/usr/bin/env bash\neslint .\n' });
    try {
      const result = await service.removeTask(scriptRoot, 'lint:eslint');

      expect(result.removed).toEqual(['lint:eslint']);
      expect(result.deleted_files).toEqual(['.mise/tasks/lint/eslint.sh']);
      await expect(fs.stat(path.join(scriptRoot, '.mise/tasks/lint/eslint.sh'))).rejects.toThrow();
      await expect(fs.stat(path.join(scriptRoot, 'mise.toml'))).rejects.toThrow();
    } finally {
      await removeProject(scriptRoot);
    }
  });
});
