import type { BugDensityEntry } from '../types.js';
import type { GitRunner } from '../utils/git.js';
import { isBugFixMessage, readCommitLog, type CommitRecord } from './commit_indexer.js';

export const DEFAULT_BUG_DENSITY_MIN_COMMITS = 5;

/**
 * Share of each tracked file's commits whose subject looks like a bug fix.
 * Files touched by fewer than `minCommits` commits are left out. Sorted by
 * ratio, then commit count, then path.
 */
export function computeBugDensity(
  commits: readonly CommitRecord[],
  trackedFiles: ReadonlySet<string>,
  minCommits = DEFAULT_BUG_DENSITY_MIN_COMMITS
): BugDensityEntry[] {
  const totals = new Map<string, { totalCommits: number; bugFixes: number }>();
  for (const commit of commits) {
    const isFix = isBugFixMessage(commit.subject);
    for (const file of commit.files) {
      if (!trackedFiles.has(file)) continue;
      const entry = totals.get(file) ?? { totalCommits: 0, bugFixes: 0 };
      entry.totalCommits += 1;
      if (isFix) entry.bugFixes += 1;
      totals.set(file, entry);
    }
  }

  const entries: BugDensityEntry[] = [];
  for (const [path, { totalCommits, bugFixes }] of totals) {
    if (totalCommits < minCommits) continue;
    entries.push({ path, totalCommits, bugFixes, ratio: (bugFixes / totalCommits) * 100 });
  }
  return entries.sort((a, b) =>
    b.ratio - a.ratio || b.totalCommits - a.totalCommits || a.path.localeCompare(b.path)
  );
}

export async function analyzeBugDensity(
  runner: GitRunner,
  trackedFiles: ReadonlySet<string>,
  minCommits = DEFAULT_BUG_DENSITY_MIN_COMMITS
): Promise<BugDensityEntry[]> {
  const commits = await readCommitLog(runner, { withFiles: true });
  return computeBugDensity(commits, trackedFiles, minCommits);
}
