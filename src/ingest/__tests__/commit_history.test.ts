import { describe, it, expect } from 'vitest';
import { isBugFixMessage, parseGitLog, readCommitLog, type CommitRecord } from '../commit_indexer.js';
import { analyzeBugDensity, computeBugDensity } from '../bug_density_indexer.js';
import { analyzeChurn, computeChurn, parseNumstatLine } from '../churn_indexer.js';
import {
  analyzeCommitCounts,
  analyzeRecentContributors,
  countCommitsByAuthor,
  sinceDate,
} from '../contributor_indexer.js';
import { FakeGitRunner } from '../../__tests__/helpers/index.js';

const RS = '\u001e';
const US = '\u001f';

function header(hash: string, author: string, email: string, date: string, subject: string): string {
  return `${RS}${hash}${US}${author}${US}${email}${US}${date}${US}${subject}`;
}

function commit(subject: string, files: string[], overrides: Partial<CommitRecord> = {}): CommitRecord {
  return {
    hash: 'abc123',
    author: 'Alice',
    email: 'alice@x',
    timestamp: '2026-01-01T00:00:00+00:00',
    subject,
    files,
    ...overrides,
  };
}

describe('commit log', () => {
  it('should parse each header with the files that follow it', () => {
    const output = [
      header('h1', 'Alice', 'alice@x', '2026-03-02T10:00:00+00:00', 'fix crash on save'),
      'src/a.js',
      'src\\b.js',
      '',
      header('h2', 'Bob', 'bob@x', '2026-03-01T09:00:00+00:00', 'add feature'),
      'src/c.js',
      '',
    ].join('\n');

    expect(parseGitLog(output)).toEqual([
      {
        hash: 'h1',
        author: 'Alice',
        email: 'alice@x',
        timestamp: '2026-03-02T10:00:00+00:00',
        subject: 'fix crash on save',
        files: ['src/a.js', 'src/b.js'],
      },
      {
        hash: 'h2',
        author: 'Bob',
        email: 'bob@x',
        timestamp: '2026-03-01T09:00:00+00:00',
        subject: 'add feature',
        files: ['src/c.js'],
      },
    ]);
  });

  it('should keep commits that touched no files', () => {
    const output = header('h1', 'Alice', 'alice@x', '2026-03-02T10:00:00+00:00', 'empty') + '\n';

    expect(parseGitLog(output)[0]?.files).toEqual([]);
  });

  it('should skip records without a header', () => {
    expect(parseGitLog(`${RS}just a path\nsrc/a.js\n`)).toEqual([]);
  });

  it('should build the log command from options', async () => {
    const runner = new FakeGitRunner().on('log', { stdout: '' });

    await readCommitLog(runner, { withFiles: true, allRefs: true, noMerges: true, since: '2026-01-01' });

    expect(runner.calls[0]?.args).toEqual([
      'log',
      '--pretty=format:%x1e%H%x1f%an%x1f%ae%x1f%aI%x1f%s',
      '--name-only',
      '--all',
      '--no-merges',
      '--since=2026-01-01',
    ]);
  });

  it('should classify bug fix subjects case-insensitively', () => {
    expect(isBugFixMessage('Fix login redirect')).toBe(true);
    expect(isBugFixMessage('handle ERROR from api')).toBe(true);
    expect(isBugFixMessage('Repair broken build')).toBe(true);
    expect(isBugFixMessage('add dark mode')).toBe(false);
  });
});

describe('bug density', () => {
  const tracked = new Set(['a.js', 'b.js']);

  it('should report 2 fixes in 6 commits as 33.33% and drop a file with 4 commits', () => {
    const commits = [
      commit('fix null check', ['a.js', 'b.js']),
      commit('add parser', ['a.js', 'b.js']),
      commit('bug in parser', ['a.js', 'b.js']),
      commit('refactor', ['a.js', 'b.js']),
      commit('docs', ['a.js']),
      commit('tidy imports', ['a.js']),
    ];

    const entries = computeBugDensity(commits, tracked);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ path: 'a.js', totalCommits: 6, bugFixes: 2 });
    expect(entries[0]?.ratio).toBeCloseTo(33.333, 3);
  });

  it('should include a file at exactly the minimum', () => {
    const commits = Array.from({ length: 5 }, () => commit('chore', ['b.js']));

    expect(computeBugDensity(commits, tracked)).toEqual([
      { path: 'b.js', totalCommits: 5, bugFixes: 0, ratio: 0 },
    ]);
  });

  it('should ignore untracked files and honour a custom floor', () => {
    const commits = [commit('fix', ['a.js', 'gone.js']), commit('feat', ['a.js'])];

    expect(computeBugDensity(commits, tracked, 2)).toEqual([
      { path: 'a.js', totalCommits: 2, bugFixes: 1, ratio: 50 },
    ]);
  });

  it('should never credit a file to the neighbouring commit', async () => {
    const output = [
      header('h1', 'Alice', 'alice@x', '2026-03-02T10:00:00+00:00', 'fix crash'),
      'a.js',
      '',
      header('h2', 'Bob', 'bob@x', '2026-03-01T09:00:00+00:00', 'add feature'),
      'b.js',
      '',
    ].join('\n');
    const runner = new FakeGitRunner().on('log', { stdout: output });

    const entries = await analyzeBugDensity(runner, tracked, 1);

    expect(entries).toEqual([
      { path: 'a.js', totalCommits: 1, bugFixes: 1, ratio: 100 },
      { path: 'b.js', totalCommits: 1, bugFixes: 0, ratio: 0 },
    ]);
  });
});

describe('churn', () => {
  it('should parse numstat rows, read binary rows as zero lines and skip renames', () => {
    expect(parseNumstatLine('12\t3\tsrc/a.js')).toEqual({ added: 12, deleted: 3, path: 'src/a.js' });
    expect(parseNumstatLine('-\t-\tlogo.png')).toEqual({ added: 0, deleted: 0, path: 'logo.png' });
    expect(parseNumstatLine('-\t4\tlogo.png')).toBeNull();
    expect(parseNumstatLine('1\t1\tsrc/{old => new}.js')).toBeNull();
    expect(parseNumstatLine('')).toBeNull();
  });

  it('should accumulate per tracked file and sort by changes', () => {
    const numstat = [
      '10\t2\ta.js',
      '3\t0\tb.js',
      '',
      '0\t5\ta.js',
      '7\t7\tuntracked.js',
      '',
      '1\t1\ta.js',
    ].join('\n');

    expect(computeChurn(numstat, new Set(['a.js', 'b.js']))).toEqual([
      { path: 'a.js', changes: 3, added: 11, deleted: 8, net: 3 },
      { path: 'b.js', changes: 1, added: 3, deleted: 0, net: 3 },
    ]);
  });

  it('should count changes to binary files', () => {
    expect(computeChurn('-\t-\tlogo.png\n-\t-\tlogo.png\n', new Set(['logo.png']))).toEqual([
      { path: 'logo.png', changes: 2, added: 0, deleted: 0, net: 0 },
    ]);
  });

  it('should read numstat from git log', async () => {
    const runner = new FakeGitRunner().on('log --numstat', { stdout: '4\t1\ta.js\n' });

    await expect(analyzeChurn(runner, new Set(['a.js']))).resolves.toEqual([
      { path: 'a.js', changes: 1, added: 4, deleted: 1, net: 3 },
    ]);
    expect(runner.calls[0]?.args).toEqual(['log', '--numstat', '--pretty=format:']);
  });
});

describe('contributors', () => {
  it('should count commits per email with first and last dates and the latest name', () => {
    const entries = countCommitsByAuthor([
      commit('c3', [], { author: 'Alice L.', timestamp: '2026-03-03T00:00:00Z' }),
      commit('c2', [], { email: 'bob@x', author: 'Bob', timestamp: '2026-03-02T00:00:00Z' }),
      commit('c1', [], { author: 'Alice', timestamp: '2026-01-01T00:00:00Z' }),
    ]);

    expect(entries).toEqual([
      {
        email: 'alice@x',
        name: 'Alice L.',
        commits: 2,
        firstCommit: '2026-01-01T00:00:00Z',
        lastCommit: '2026-03-03T00:00:00Z',
      },
      {
        email: 'bob@x',
        name: 'Bob',
        commits: 1,
        firstCommit: '2026-03-02T00:00:00Z',
        lastCommit: '2026-03-02T00:00:00Z',
      },
    ]);
  });

  it('should query every ref without merges for commit counts', async () => {
    const runner = new FakeGitRunner().on('log', { stdout: '' });

    await analyzeCommitCounts(runner);

    expect(runner.calls[0]?.args).toContain('--all');
    expect(runner.calls[0]?.args).toContain('--no-merges');
  });

  it('should limit recent contributors to the window', async () => {
    const runner = new FakeGitRunner().on('log', {
      stdout: header('h1', 'Carol', 'carol@x', '2026-10-18T12:00:00+00:00', 'recent work') + '\n',
    });

    const entries = await analyzeRecentContributors(runner, 30, new Date('2026-10-19T00:00:00Z'));

    expect(runner.calls[0]?.args).toContain('--since=2026-09-19');
    expect(entries).toEqual([
      { email: 'carol@x', name: 'Carol', commits: 1, lastCommit: '2026-10-18T12:00:00+00:00' },
    ]);
  });

  it('should format the since date as a calendar day', () => {
    expect(sinceDate(7, new Date('2026-03-10T15:30:00Z'))).toBe('2026-03-03');
  });
});
