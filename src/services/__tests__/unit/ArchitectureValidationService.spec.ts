// src/services/__tests__/unit/ArchitectureValidationService.spec.ts
import { ArchitectureValidationService } from '../../ArchitectureValidationService.js';
import { buildGraph, makeTask, testSettings } from '../taskFixtures.js';

describe('ArchitectureValidationService Unit Tests', () => {
  const service = new ArchitectureValidationService(testSettings());

  const tasks = [
    makeTask('build:web', { sources: ['src/**'] }),
    makeTask('test:unit', { depends: ['build:web'] }),
    makeTask('release:cut'),
    makeTask('lint:Check_All'),
    makeTask('dev:dev'),
    makeTask('deploy:prod', {
      depends: ['setup:missing'],
      description: 'Run: ./deploy.sh',
      description_generated: true,
    }),
  ];

  it('should count tasks and list the domains in use', () => {
    const report = service.validate(buildGraph(tasks));

    expect(report.total_tasks).toBe(6);
    expect(report.inline_tasks).toBe(6);
    expect(report.file_tasks).toBe(0);
    expect(report.domains_used).toEqual(['build', 'test', 'lint', 'dev', 'deploy']);
  });

  it('should report issues grouped by category in declaration order', () => {
    const report = service.validate(buildGraph(tasks));

    expect(report.issues.map((issue) => [issue.category, issue.severity, issue.task])).toEqual([
      ['dangling_dependency', 'error', 'deploy:prod'],
      ['domain_prefix', 'warning', 'release:cut'],
      ['orphan', 'info', 'release:cut'],
      ['orphan', 'info', 'lint:Check_All'],
      ['naming', 'warning', 'lint:Check_All'],
      ['missing_description', 'info', 'deploy:prod'],
    ]);
    expect(report.issues[0]?.message).toBe("depends references 'setup:missing', which is not a known task");
    expect(report.issues[4]?.message).toBe(
      "Name segment(s) 'Check_All' should use lowercase letters, digits, '-', '_' or '.'"
    );
  });

  it('should suggest deterministic improvements', () => {
    const report = service.validate(buildGraph(tasks));

    expect(report.suggestions).toEqual([
      'Make deploy:prod depend on a build or test task so broken code is never deployed',
      'Declare sources for release:cut so mise can skip them when nothing changed',
    ]);
  });

  it('should yield identical results when run twice on the same project', () => {
    const first = service.validate(buildGraph(tasks));
    const second = service.validate(buildGraph(tasks));

    expect(second).toEqual(first);
  });

  it('should report hard and soft cycles', () => {
    const report = service.validate(
      buildGraph([
        makeTask('build:a', { depends: ['build:b'] }),
        makeTask('build:b', { depends: ['build:a'] }),
        makeTask('test:x', { wait_for: ['test:y'] }),
        makeTask('test:y', { depends: ['test:x'] }),
      ])
    );

    const cycles = report.issues.filter((issue) => issue.category !== 'orphan');
    expect(cycles).toEqual([
      {
        category: 'circular_dependency',
        severity: 'error',
        task: 'build:a',
        message: 'Circular dependency detected among: build:a, build:b',
        related_tasks: ['build:a', 'build:b'],
      },
      {
        category: 'soft_cycle',
        severity: 'warning',
        task: 'test:x',
        message:
          'Cycle through wait_for/depends_post relations among: test:x, test:y; ordering between them is ambiguous',
        related_tasks: ['test:x', 'test:y'],
      },
    ]);
  });

  it('should report skipped malformed entries', () => {
    const report = service.validate(buildGraph([makeTask('test:unit')]), [
      { name: 'broken', origin: 'inline', location: '[tasks."broken"]', reason: "missing 'run'" },
    ]);

    expect(report.issues).toContainEqual({
      category: 'malformed_task',
      severity: 'warning',
      task: 'broken',
      message: `Skipped [tasks."broken"]: missing 'run'`,
    });
  });

  it('should suggest test tasks and flatter chains', () => {
    const chain = ['build:s1', 'build:s2', 'build:s3', 'build:s4', 'build:s5', 'build:s6'].map((name, index, all) =>
      makeTask(name, { sources: ['src/**'], depends: index > 0 ? [all[index - 1] ?? ''] : [] })
    );

    const report = service.validate(buildGraph(chain));

    expect(report.suggestions).toEqual([
      'Add test tasks so changes can be verified before build and deploy',
      'The longest dependency chain is 6 tasks deep; consider flattening it so more tasks can run in parallel',
    ]);
  });

  it('should not treat entry-point shaped tasks as orphans', () => {
    const report = service.validate(
      buildGraph([makeTask('dev:dev'), makeTask('build:all'), makeTask('test:quick', { alias: 'q' })])
    );

    expect(report.issues.filter((issue) => issue.category === 'orphan')).toEqual([]);
  });
});
