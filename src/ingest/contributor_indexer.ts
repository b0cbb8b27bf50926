/**
 * @fileoverview Commit counts and recent contributors, keyed by author email.
 */

import type { CommitCountEntry, RecentContributorEntry } from '../types.js';
import type { GitRunner } from '../utils/git.js';
import { readCommitLog, type CommitRecord } from './commit_indexer.js';

export const DEFAULT_RECENT_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

function byCommitsThenEmail(a: { commits: number; email: string }, b: { commits: number; email: string }): number {
  return b.commits - a.commits || a.email.localeCompare(b.email);
}

/** The display name comes from each author's most recent commit. */
export function countCommitsByAuthor(commits: readonly CommitRecord[]): CommitCountEntry[] {
  const authors = new Map<string, CommitCountEntry & { firstMs: number; lastMs: number }>();
  for (const commit of commits) {
    if (!commit.email) continue;
    const time = Date.parse(commit.timestamp);
    if (Number.isNaN(time)) continue;

    const entry = authors.get(commit.email);
    if (!entry) {
      authors.set(commit.email, {
        email: commit.email,
        name: commit.author,
        commits: 1,
        firstCommit: commit.timestamp,
        lastCommit: commit.timestamp,
        firstMs: time,
        lastMs: time,
      });
      continue;
    }
    entry.commits += 1;
    if (time < entry.firstMs) {
      entry.firstMs = time;
      entry.firstCommit = commit.timestamp;
    }
    if (time > entry.lastMs) {
      entry.lastMs = time;
      entry.lastCommit = commit.timestamp;
      entry.name = commit.author;
    }
  }
  return [...authors.values()]
    .map(({ email, name, commits: count, firstCommit, lastCommit }) => ({
      email,
      name,
      commits: count,
      firstCommit,
      lastCommit,
    }))
    .sort(byCommitsThenEmail);
}

export function summarizeRecentContributors(commits: readonly CommitRecord[]): RecentContributorEntry[] {
  return countCommitsByAuthor(commits).map(({ email, name, commits: count, lastCommit }) => ({
    email,
    name,
    commits: count,
    lastCommit,
  }));
}

export async function analyzeCommitCounts(runner: GitRunner): Promise<CommitCountEntry[]> {
  const commits = await readCommitLog(runner, { allRefs: true, noMerges: true });
  return countCommitsByAuthor(commits);
}

export function sinceDate(days: number, now: Date = new Date()): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
}

export async function analyzeRecentContributors(
  runner: GitRunner,
  days = DEFAULT_RECENT_DAYS,
  now: Date = new Date()
): Promise<RecentContributorEntry[]> {
  const commits = await readCommitLog(runner, { since: sinceDate(days, now) });
  return summarizeRecentContributors(commits);
}
