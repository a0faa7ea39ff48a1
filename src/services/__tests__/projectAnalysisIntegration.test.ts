// src/services/__tests__/projectAnalysisIntegration.test.ts
import os from 'node:os';
import path from 'node:path';
import { MiseTaskService } from '../MiseTaskService.js';
import { AccessDeniedError, MalformedTaskError, PathNotFoundError } from '../../utils/errors.js';
import { createProject, removeProject, testSettings } from './taskFixtures.js';

describe('MiseTaskService Integration - analysis', () => {
  const service = new MiseTaskService(testSettings());
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeProject(root);
      root = undefined;
    }
  });

  it('should refuse system directories', async () => {
    await expect(service.validateArchitecture('/etc')).rejects.toThrow(AccessDeniedError);
  });

  it('should refuse paths that do not exist or are not directories', async () => {
    root = await createProject({ 'notes.txt': 'hello' });

    await expect(service.extractTasks(path.join(os.tmpdir(), 'mise-task-graph-missing', 'project'))).rejects.toThrow(
      PathNotFoundError
    );
    await expect(service.extractTasks(path.join(root, 'notes.txt'))).rejects.toThrow(PathNotFoundError);
  });

  it('should report a project without tasks', async () => {
    root = await createProject();

    const result = await service.validateArchitecture(root);

    expect(result.validation_result).toBe('no_tasks');
    expect(result.total_tasks).toBe(0);
    expect(result.issues).toEqual([]);
    expect(result.suggestions).toEqual([]);
  });

  it('should fail when every task entry is malformed', async () => {
    root = await createProject({ 'mise.toml': '[tasks.broken]\ndescription = "no run"\n' });

    await expect(service.validateArchitecture(root)).rejects.toThrow(MalformedTaskError);
  });

  it('should count errors and warnings', async () => {
    root = await createProject({
      'mise.toml': ['[tasks."test:unit"]', 'run = "npm test"', 'description = "Unit tests"', 'depends = ["build:gone"]', ''].join(
        '\n'
      ),
    });

    const result = await service.validateArchitecture(root);

    expect(result.validation_result).toBe('issues_found');
    expect(result.error_count).toBe(1);
    expect(result.warning_count).toBe(0);
  });

  it('should recommend tasks for uncovered domains', async () => {
    root = await createProject({
      'package.json': '{}',
      'mise.toml': '[tasks."build:web"]\nrun = "npm run build"\n',
    });

    const analysis = await service.analyzeProject(root);

    expect(analysis.config_path).toBe(path.join(root, 'mise.toml'));
    expect(analysis.existing_tasks.map((task) => task.full_name)).toEqual(['build:web']);
    expect(analysis.recommendations.map((r) => r.task.full_name)).toEqual(['setup:setup', 'lint:lint', 'dev:dev']);
    expect(analysis.total_recommendations).toBe(3);
  });

  it('should analyze the structure of a project', async () => {
    root = await createProject({ 'Cargo.toml': '[package]', 'tests/smoke.rs': '' });

    const structure = await service.analyzeProjectStructure(root);

    expect(structure.package_managers).toEqual(['cargo']);
    expect(structure.has_tests).toBe(true);
  });

  it('should build the dependency graph of a project', async () => {
    root = await createProject({
      'mise.toml': ['[tasks.build]', 'run = "cargo build"', '', '[tasks.test]', 'run = "cargo test"', 'depends = ["build"]', ''].join(
        '\n'
      ),
    });

    const graph = await service.buildDependencyGraph(root);

    expect(graph.names()).toEqual(['build:build', 'test:test']);
    expect(graph.edges).toEqual([
      { from: 'build:build', to: 'test:test', kind: 'depends', declared_by: 'test:test', reference: 'build' },
    ]);
    expect(graph.dangling).toEqual([]);
  });
});
