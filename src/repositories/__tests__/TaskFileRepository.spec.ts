// src/repositories/__tests__/TaskFileRepository.spec.ts
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { TaskFileRepository } from '../TaskFileRepository.js';

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(root, relativePath)), { recursive: true });
    await fs.writeFile(path.join(root, relativePath), content, 'utf8');
  }
}

describe('TaskFileRepository Unit Tests', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mise-task-graph-scripts-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should list visible scripts of every task directory in path order', async () => {
    await writeFiles(root, {
      '.mise/tasks/b.sh': 'echo b',
      '.mise/tasks/a/x.sh': 'echo x',
      '.mise/tasks/.hidden': 'echo hidden',
      'mise-tasks/c': 'echo c',
    });

    const scripts = await new TaskFileRepository(root).listScripts(['.mise/tasks', 'mise-tasks', 'absent']);

    expect(scripts).toEqual([
      { task_dir: '.mise/tasks', relative_path: 'a/x.sh', file_path: '.mise/tasks/a/x.sh', content: 'echo x' },
      { task_dir: '.mise/tasks', relative_path: 'b.sh', file_path: '.mise/tasks/b.sh', content: 'echo b' },
      { task_dir: 'mise-tasks', relative_path: 'c', file_path: 'mise-tasks/c', content: 'echo c' },
    ]);
  });

  it('should write, read and delete executable scripts', async () => {
    const repository = new TaskFileRepository(root);

    await repository.writeScript('.mise/tasks/deploy/prod', '#!/usr/bin/env bash\n./deploy.sh\n');

    expect(await repository.exists('.mise/tasks/deploy/prod')).toBe(true);
    expect(await repository.readScript('.mise/tasks/deploy/prod')).toBe('#!/usr/bin/env bash\n./deploy.sh\n');
    expect((await fs.stat(path.join(root, '.mise/tasks/deploy/prod'))).mode & 0o111).not.toBe(0);

    expect(await repository.deleteScript('.mise/tasks/deploy/prod')).toBe(true);
    expect(await repository.exists('.mise/tasks/deploy/prod')).toBe(false);
    expect(await repository.deleteScript('.mise/tasks/deploy/prod')).toBe(false);
  });
});
