// src/services/__tests__/unit/RedundancyDetectionService.spec.ts
import {
  RedundancyDetectionService,
  type RedundancyContext,
  type RedundancyPolicy,
} from '../../RedundancyDetectionService.js';
import { type PruneCandidate } from '../../MiseTaskServiceTypes.js';
import { buildGraph, makeTask } from '../taskFixtures.js';

describe('RedundancyDetectionService Unit Tests', () => {
  const service = new RedundancyDetectionService();

  it('should flag an isolated no-op task for lacking dependencies', () => {
    const graph = buildGraph([
      makeTask('build:web'),
      makeTask('test:unit', { depends: ['build:web'] }),
      makeTask('build:noop', { run: 'true' }),
    ]);

    expect(service.detect(graph)).toEqual([
      {
        task: 'build:noop',
        domain: 'build',
        reason: 'No dependencies or dependents, and no sources or outputs tracked; its command does nothing',
        policy: 'isolated',
      },
    ]);
  });

  it('should not flag isolated entry points', () => {
    const graph = buildGraph([
      makeTask('test', { run: 'npm test' }),
      makeTask('dev:start', { run: 'npm run dev' }),
      makeTask('deploy:ship', { alias: 'ship' }),
      makeTask('build:noop', { run: 'true' }),
    ]);

    expect(service.detect(graph).map((found) => found.task)).toEqual(['build:noop']);
  });

  it('should take entry leaves from the configured list', () => {
    const graph = buildGraph([makeTask('dev:start', { run: 'true' })]);

    expect(new RedundancyDetectionService(undefined, []).detect(graph).map((found) => found.task)).toEqual(['dev:start']);
  });

  it('should not flag isolated tasks that track sources', () => {
    const graph = buildGraph([makeTask('build:web', { sources: ['src/**'] })]);

    expect(service.detect(graph)).toEqual([]);
  });

  it('should flag the later of two tasks repeating a command in one domain', () => {
    const graph = buildGraph([
      makeTask('lint:a', { run: 'eslint .', sources: ['src/**'] }),
      makeTask('lint:b', { run: 'eslint  .', sources: ['src/**'] }),
    ]);

    expect(service.detect(graph)).toEqual([
      { task: 'lint:b', domain: 'lint', reason: 'Runs the same command as lint:a', policy: 'duplicate_command' },
    ]);
  });

  it('should flag tasks superseded by a newer task with the same effective command', () => {
    const graph = buildGraph([
      makeTask('build:old', { run: 'npm run build', sources: ['src/**'] }),
      makeTask('dev:b', { run: 'mise run build:old', sources: ['src/**'] }),
      makeTask('ci:build', { run: 'npm run build', sources: ['src/**'] }),
    ]);

    expect(service.detect(graph)).toEqual([
      {
        task: 'build:old',
        domain: 'build',
        reason: 'Superseded by ci:build, which runs the same command',
        policy: 'superseded',
      },
      { task: 'dev:b', domain: 'dev', reason: 'Only delegates to build:old', policy: 'superseded' },
    ]);
  });

  it('should run injected policies and keep the first candidate per task', () => {
    const everything: RedundancyPolicy = {
      name: 'everything',
      evaluate: ({ graph }: RedundancyContext): PruneCandidate[] =>
        graph.tasks.map((task) => ({ task: task.full_name, domain: task.domain, reason: 'all', policy: 'everything' })),
    };
    const graph = buildGraph([makeTask('build:noop', { run: ':' }), makeTask('test:unit', { sources: ['t/**'] })]);

    const candidates = new RedundancyDetectionService([everything]).detect(graph);

    expect(candidates.map((c) => [c.task, c.policy])).toEqual([
      ['build:noop', 'everything'],
      ['test:unit', 'everything'],
    ]);
  });
});
