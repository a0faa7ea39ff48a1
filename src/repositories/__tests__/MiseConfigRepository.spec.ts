// src/repositories/__tests__/MiseConfigRepository.spec.ts
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse } from '@iarna/toml';
import { MiseConfigRepository, emptyMiseConfig, isMissingFileError, toTomlValue } from '../MiseConfigRepository.js';

const CONFIG_FILES = ['mise.toml', '.mise.toml', 'mise/config.toml'];

describe('MiseConfigRepository Unit Tests', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mise-task-graph-repo-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should fall back to the first candidate when no document exists', async () => {
    const repository = new MiseConfigRepository(root, CONFIG_FILES);

    expect(await repository.locate()).toEqual({ path: path.join(root, 'mise.toml'), exists: false });
    const loaded = await repository.load();
    expect(loaded.config).toEqual(emptyMiseConfig());
    expect(loaded.unrecognized_sections).toEqual([]);
  });

  it('should locate documents in candidate order', async () => {
    await fs.writeFile(path.join(root, '.mise.toml'), '', 'utf8');

    expect(await new MiseConfigRepository(root, CONFIG_FILES).locate()).toEqual({
      path: path.join(root, '.mise.toml'),
      exists: true,
    });
  });

  it('should load known sections and list unrecognized ones', async () => {
    await fs.writeFile(
      path.join(root, 'mise.toml'),
      ['[tools]', 'node = "20"', '', '[tasks.build]', 'run = "npm run build"', '', '[custom]', 'flag = true', ''].join('\n'),
      'utf8'
    );

    const loaded = await new MiseConfigRepository(root, CONFIG_FILES).load();

    expect(loaded.exists).toBe(true);
    expect(loaded.config.tools).toEqual({ node: '20' });
    expect(loaded.config.tasks).toEqual({ build: { run: 'npm run build' } });
    expect(loaded.unrecognized_sections).toEqual(['custom']);
  });

  it('should write only non-empty sections and create missing directories', async () => {
    const repository = new MiseConfigRepository(root, ['mise/config.toml']);
    const loaded = await repository.load();
    loaded.config.tasks['lint:eslint'] = { run: 'eslint .', depends: ['build'] };

    await repository.save(loaded);

    const written = parse(await fs.readFile(path.join(root, 'mise/config.toml'), 'utf8'));
    expect(Object.keys(written)).toEqual(['tasks']);
    expect((await repository.load()).config.tasks).toEqual({ 'lint:eslint': { run: 'eslint .', depends: ['build'] } });
  });

  it('should carry untouched values through a rewrite unchanged', async () => {
    await fs.writeFile(
      path.join(root, 'mise.toml'),
      ['[vars]', 'matrix = [[1, 2], [3, 4]]', 'released = 2024-01-01', ''].join('\n'),
      'utf8'
    );
    const repository = new MiseConfigRepository(root, CONFIG_FILES);
    const loaded = await repository.load();
    loaded.config.tasks['test'] = { run: 'npm test' };

    await repository.save(loaded);

    const text = await fs.readFile(path.join(root, 'mise.toml'), 'utf8');
    expect(text).toMatch(/^matrix = \[ \[ 1, 2 \], \[ 3, 4 \] \]$/m);
    expect(text).toMatch(/^released = 2024-01-01$/m);
    const reloaded = await repository.load();
    expect(JSON.stringify(reloaded.config.vars.matrix)).toBe('[[1,2],[3,4]]');
    expect(reloaded.config.vars.released).toBeInstanceOf(Date);
  });

  it('should recognize missing-file errors by their code alone', async () => {
    const statError: unknown = await fs.stat(path.join(root, 'absent')).catch((error: unknown) => error);

    expect(isMissingFileError(statError)).toBe(true);
    expect(isMissingFileError({ code: 'ENOENT' })).toBe(true);
    expect(isMissingFileError({ code: 'EACCES' })).toBe(false);
    expect(isMissingFileError(null)).toBe(false);
  });

  describe('toTomlValue', () => {
    it('should keep scalars and homogeneous arrays', () => {
      expect(toTomlValue('x')).toBe('x');
      expect(toTomlValue([1, 2])).toEqual([1, 2]);
      expect(toTomlValue([true])).toEqual([true]);
    });

    it('should keep dates and nested arrays as decoded', () => {
      const released = new Date('2024-01-02T03:04:05.000Z');
      expect(toTomlValue(released)).toBe(released);
      expect(toTomlValue([[1, 2], ['a']])).toEqual([[1, 2], ['a']]);
    });

    it('should drop values TOML cannot hold', () => {
      expect(toTomlValue(null)).toBeUndefined();
      expect(toTomlValue([1, 'a'])).toBeUndefined();
      expect(toTomlValue({ keep: 1, drop: undefined })).toEqual({ keep: 1 });
    });
  });
});
