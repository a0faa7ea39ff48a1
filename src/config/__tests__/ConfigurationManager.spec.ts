// src/config/__tests__/ConfigurationManager.spec.ts
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationManager, DEFAULT_SETTINGS, mergeSettings } from '../ConfigurationManager.js';

describe('ConfigurationManager Unit Tests', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mise-task-graph-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should use the defaults when nothing is configured', () => {
    expect(ConfigurationManager.fromEnvironment({}).getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('should apply environment overrides', () => {
    const manager = ConfigurationManager.fromEnvironment({
      MISE_TASK_GRAPH_SIMPLE_MAX_COMMANDS: '2',
      MISE_TASK_GRAPH_MODERATE_MAX_COMMANDS: '8',
      MISE_TASK_GRAPH_DEFAULT_DOMAIN: 'Test',
      MISE_TASK_GRAPH_TASK_DIRS: 'tasks, scripts/tasks',
      MISE_TASK_GRAPH_CONFIG_FILES: 'mise.toml',
    });

    const settings = manager.getSettings();
    expect(settings.complexity).toEqual({ simpleMaxCommands: 2, moderateMaxCommands: 8, simpleMaxCommandLength: 120 });
    expect(manager.getDefaultDomain()).toBe('test');
    expect(settings.taskDirectories).toEqual(['tasks', 'scripts/tasks']);
    expect(settings.configFileNames).toEqual(['mise.toml']);
  });

  it('should ignore invalid environment values', () => {
    const manager = ConfigurationManager.fromEnvironment({
      MISE_TASK_GRAPH_SIMPLE_MAX_COMMANDS: 'abc',
      MISE_TASK_GRAPH_MODERATE_MAX_COMMANDS: '0',
      MISE_TASK_GRAPH_DEFAULT_DOMAIN: 'release',
    });

    expect(manager.getComplexityThresholds()).toEqual(DEFAULT_SETTINGS.complexity);
    expect(manager.getDefaultDomain()).toBe('build');
  });

  it('should merge a settings file over the defaults', async () => {
    const settingsPath = path.join(tempDir, 'settings.json');
    await fs.writeFile(
      settingsPath,
      JSON.stringify({ defaultDomain: 'lint', complexity: { moderateMaxCommands: 3 }, domainPriorities: { docs: 10 } }),
      'utf8'
    );

    const settings = ConfigurationManager.fromEnvironment({ MISE_TASK_GRAPH_CONFIG: settingsPath }).getSettings();

    expect(settings.defaultDomain).toBe('lint');
    expect(settings.complexity).toEqual({ simpleMaxCommands: 1, moderateMaxCommands: 3, simpleMaxCommandLength: 120 });
    expect(settings.domainPriorities.docs).toBe(10);
    expect(settings.domainPriorities.build).toBe(9);
  });

  it('should fall back to the defaults for a settings file of the wrong shape', async () => {
    const settingsPath = path.join(tempDir, 'settings.json');
    await fs.writeFile(settingsPath, JSON.stringify({ complexity: { simpleMaxCommands: -1 } }), 'utf8');

    const settings = ConfigurationManager.fromEnvironment({ MISE_TASK_GRAPH_CONFIG: settingsPath }).getSettings();

    expect(settings).toEqual(DEFAULT_SETTINGS);
  });

  it('should fall back to the defaults when the settings file is missing', () => {
    const settings = ConfigurationManager.fromEnvironment({
      MISE_TASK_GRAPH_CONFIG: path.join(tempDir, 'absent.json'),
    }).getSettings();

    expect(settings).toEqual(DEFAULT_SETTINGS);
  });

  it('should raise moderateMaxCommands to at least simpleMaxCommands', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, { complexity: { simpleMaxCommands: 4, moderateMaxCommands: 2 } });

    expect(merged.complexity.moderateMaxCommands).toBe(4);
    expect(DEFAULT_SETTINGS.complexity.simpleMaxCommands).toBe(1);
  });

  it('should hand out copies of its settings', () => {
    const manager = ConfigurationManager.fromEnvironment({});

    manager.getSettings().taskDirectories.push('elsewhere');

    expect(manager.getSettings().taskDirectories).toEqual(DEFAULT_SETTINGS.taskDirectories);
  });
});
