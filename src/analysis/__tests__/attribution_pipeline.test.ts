import { describe, it, expect } from 'vitest';
import { attributeIssues } from '../attribution_pipeline.js';
import { IssueResolver } from '../issue_resolver.js';
import { StatsAggregator } from '../stats_aggregator.js';
import { BlameService } from '../../ingest/blame_service.js';
import { Semaphore } from '../../utils/semaphore.js';
import { FakeGitRunner, porcelain } from '../../__tests__/helpers/index.js';
import type { Issue, IssueFilter } from '../../types.js';

function setup(runner: FakeGitRunner, options: { capacity?: number; filter?: IssueFilter } = {}) {
  const aggregator = new StatsAggregator({ filter: options.filter });
  const gate = new Semaphore(options.capacity ?? 4);
  const blame = new BlameService({ runner, gate, warnings: aggregator });
  const resolver = new IssueResolver(blame);
  return { aggregator, blame, gate, resolver };
}

const A_JS = porcelain([
  { line: 1, name: 'Alice', email: 'alice@x', content: "console.log('hi');" },
  { line: 3, name: 'Bob', email: 'bob@x', content: 'let y = 2;' },
]);

function eslintIssue(filePath: string, line: number, ruleId: string, severity: number): Issue {
  return { filePath, line, ruleId, severity, message: `${ruleId} violation`, source: 'eslint' };
}

describe('attributeIssues', () => {
  it('should attribute the Alice and Bob scenario end to end', async () => {
    const runner = new FakeGitRunner().onBlame('a.js', { stdout: A_JS });
    const { aggregator, resolver, gate } = setup(runner);

    const summary = await attributeIssues([
      eslintIssue('a.js', 1, 'no-console', 2),
      eslintIssue('a.js', 3, 'prefer-const', 1),
    ], { resolver, aggregator, concurrency: gate.capacity });
    const snapshot = await aggregator.snapshot();

    expect(summary).toEqual({ total: 2, recorded: 2, excluded: 0, unattributed: 0, failed: 0 });
    expect(snapshot.authors.get('alice@x')).toMatchObject({ name: 'Alice', count: 1, errors: 1, warnings: 0 });
    expect(snapshot.authors.get('bob@x')).toMatchObject({ name: 'Bob', count: 1, errors: 0, warnings: 1 });
    expect(snapshot.rules.get('no-console')?.count).toBe(1);
    expect(snapshot.files.get('a.js')?.count).toBe(2);
    expect(runner.callsFor('blame')).toHaveLength(1);
  });

  it('should drop issues in files that fail attribution and warn once', async () => {
    const runner = new FakeGitRunner()
      .onBlame('a.js', { stdout: A_JS })
      .onBlame('gone.js', { exitCode: 128, stderr: "fatal: no such path 'gone.js' in HEAD" });
    const { aggregator, resolver } = setup(runner, { capacity: 1 });

    const summary = await attributeIssues([
      eslintIssue('gone.js', 1, 'no-console', 2),
      eslintIssue('gone.js', 2, 'no-console', 2),
      eslintIssue('a.js', 1, 'no-console', 2),
    ], { resolver, aggregator, concurrency: 1 });
    const snapshot = await aggregator.snapshot();

    expect(summary).toEqual({ total: 3, recorded: 1, excluded: 0, unattributed: 0, failed: 2 });
    expect(snapshot.files.has('gone.js')).toBe(false);
    expect(snapshot.rules.get('no-console')?.count).toBe(1);
    expect(snapshot.warnings).toEqual([
      "Blame failed for gone.js: git blame --line-porcelain -- gone.js exited with code 128: fatal: no such path 'gone.js' in HEAD",
    ]);
    expect(runner.calls.filter((call) => call.args[3] === 'gone.js')).toHaveLength(1);
  });

  it('should not spawn git for ignored files or rules', async () => {
    const runner = new FakeGitRunner().onBlame('a.js', { stdout: A_JS });
    const filter: IssueFilter = {
      shouldIgnoreFile: (path) => path === 'vendor/x.js',
      shouldIgnoreRule: (rule) => rule === 'max-len',
      shouldIgnoreAuthor: () => false,
    };
    const { aggregator, resolver } = setup(runner, { filter });

    const summary = await attributeIssues([
      eslintIssue('vendor/x.js', 1, 'no-console', 2),
      eslintIssue('b.js', 1, 'max-len', 1),
    ], { resolver, aggregator, filter, concurrency: 2 });

    expect(summary).toEqual({ total: 2, recorded: 0, excluded: 2, unattributed: 0, failed: 0 });
    expect(runner.calls).toHaveLength(0);
  });

  it('should count author exclusions as excluded', async () => {
    const runner = new FakeGitRunner().onBlame('a.js', { stdout: A_JS });
    const filter: IssueFilter = {
      shouldIgnoreFile: () => false,
      shouldIgnoreRule: () => false,
      shouldIgnoreAuthor: (email) => email === 'bob@x',
    };
    const { aggregator, resolver } = setup(runner, { filter });

    const summary = await attributeIssues([
      eslintIssue('a.js', 1, 'no-console', 2),
      eslintIssue('a.js', 3, 'prefer-const', 1),
    ], { resolver, aggregator, filter, concurrency: 2 });

    expect(summary).toMatchObject({ recorded: 1, excluded: 1 });
  });

  it('should report unattributed issues for files blame has nothing for', async () => {
    const runner = new FakeGitRunner().onBlame('empty.js', { stdout: '' });
    const { aggregator, resolver } = setup(runner);

    const summary = await attributeIssues([eslintIssue('empty.js', 1, 'eol-last', 1)], {
      resolver,
      aggregator,
      concurrency: 4,
    });

    expect(summary.unattributed).toBe(1);
  });

  it('should keep blame concurrency within the gate while running many workers', async () => {
    let running = 0;
    let peak = 0;
    const runner = new FakeGitRunner().on('blame', async (args) => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise<void>((resolve) => setImmediate(resolve));
      running -= 1;
      return {
        stdout: porcelain([{ line: 1, name: 'Alice', email: 'alice@x' }]).replace('filename a.js', `filename ${args[3] ?? ''}`),
      };
    });
    const { aggregator, resolver, gate } = setup(runner, { capacity: 2 });
    const issues = Array.from({ length: 12 }, (_, i) => eslintIssue(`f${i % 6}.js`, 1, 'no-console', 2));

    const summary = await attributeIssues(issues, { resolver, aggregator, concurrency: gate.capacity });

    expect(summary.recorded).toBe(12);
    expect(peak).toBeLessThanOrEqual(2);
    expect(runner.callsFor('blame')).toHaveLength(6);
    expect((await aggregator.snapshot()).authors.get('alice@x')?.count).toBe(12);
  });

  it('should report progress for every issue', async () => {
    const runner = new FakeGitRunner().onBlame('a.js', { stdout: A_JS });
    const { aggregator, resolver } = setup(runner);
    const progress: Array<[number, number]> = [];

    await attributeIssues([
      eslintIssue('a.js', 1, 'no-console', 2),
      eslintIssue('a.js', 3, 'prefer-const', 1),
    ], { resolver, aggregator, concurrency: 1, onProgress: (done, total) => progress.push([done, total]) });

    expect(progress).toEqual([[1, 2], [2, 2]]);
  });

  it('should stop dispatching once the signal aborts', async () => {
    const runner = new FakeGitRunner().onBlame('a.js', { stdout: A_JS });
    const { aggregator, resolver } = setup(runner);
    const controller = new AbortController();
    controller.abort(new Error('user cancelled'));

    await expect(attributeIssues([eslintIssue('a.js', 1, 'no-console', 2)], {
      resolver,
      aggregator,
      concurrency: 1,
      signal: controller.signal,
    })).rejects.toThrow('user cancelled');
    expect(runner.calls).toHaveLength(0);
  });

  it('should abort the run on errors that are not attribution failures', async () => {
    const runner = new FakeGitRunner();
    const aggregator = new StatsAggregator();
    const resolver = new IssueResolver({
      async attribute() {
        throw new TypeError('broken attributor');
      },
    });

    await expect(attributeIssues([eslintIssue('a.js', 1, 'no-console', 2)], {
      resolver,
      aggregator,
      concurrency: 2,
    })).rejects.toThrow('broken attributor');
    expect(runner.calls).toHaveLength(0);
  });
});
