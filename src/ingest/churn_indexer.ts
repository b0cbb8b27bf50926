/**
 * @fileoverview Code churn from `git log --numstat`.
 *
 * Every numstat row is one commit touching one file. Binary rows (`-\t-`)
 * count as a change of zero lines; rename rows (`old => new`) are skipped.
 */

import type { ChurnEntry } from '../types.js';
import { normalizePath, type GitRunner } from '../utils/git.js';

export interface NumstatRow {
  added: number;
  deleted: number;
  path: string;
}

export function parseNumstatLine(line: string): NumstatRow | null {
  const parts = line.split('\t');
  if (parts.length !== 3) return null;
  const [addedRaw = '', deletedRaw = '', pathRaw = ''] = parts;
  const binary = addedRaw === '-' && deletedRaw === '-';
  if (!binary && (!/^\d+$/.test(addedRaw) || !/^\d+$/.test(deletedRaw))) return null;
  if (pathRaw.includes(' => ')) return null;
  const path = normalizePath(pathRaw);
  if (!path) return null;
  if (binary) return { added: 0, deleted: 0, path };
  return { added: parseInt(addedRaw, 10), deleted: parseInt(deletedRaw, 10), path };
}

/**
 * Accumulate churn for tracked files only. Sorted by change count, then path.
 */
export function computeChurn(numstat: string, trackedFiles: ReadonlySet<string>): ChurnEntry[] {
  const churn = new Map<string, ChurnEntry>();
  for (const line of numstat.split(/\r?\n/)) {
    const row = parseNumstatLine(line.trim());
    if (!row || !trackedFiles.has(row.path)) continue;

    let entry = churn.get(row.path);
    if (!entry) {
      entry = { path: row.path, changes: 0, added: 0, deleted: 0, net: 0 };
      churn.set(row.path, entry);
    }
    entry.changes += 1;
    entry.added += row.added;
    entry.deleted += row.deleted;
    entry.net += row.added - row.deleted;
  }
  return [...churn.values()].sort((a, b) => b.changes - a.changes || a.path.localeCompare(b.path));
}

export async function analyzeChurn(runner: GitRunner, trackedFiles: ReadonlySet<string>): Promise<ChurnEntry[]> {
  const output = await runner.run(['log', '--numstat', '--pretty=format:']);
  return computeChurn(output, trackedFiles);
}
