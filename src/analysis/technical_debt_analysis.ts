/**
 * @fileoverview Technical debt markers in tracked files.
 *
 * Counts TODO, FIXME and HACK markers that follow a `//`, `#` or `/*`
 * comment leader. Each category counts at most once per line.
 */

import { isNonSourceFile, readTrackedFile } from '../ingest/file_filters.js';
import type { TechnicalDebtEntry } from '../types.js';
import { FILE_SCAN_CONCURRENCY, mapWithConcurrency } from '../utils/async.js';

// ============================================================================
// MARKERS
// ============================================================================

export const DEBT_MARKERS = {
  todo: /(?:\/\/|#|\/\*)\s*todo/i,
  fixme: /(?:\/\/|#|\/\*)\s*fixme/i,
  hack: /(?:\/\/|#|\/\*)\s*hack/i,
} as const;

export type DebtCounts = Pick<TechnicalDebtEntry, 'todo' | 'fixme' | 'hack' | 'total'>;

// ============================================================================
// SCANNING
// ============================================================================

export function countDebtMarkers(content: string): DebtCounts {
  const counts: DebtCounts = { todo: 0, fixme: 0, hack: 0, total: 0 };
  for (const line of content.split('\n')) {
    if (DEBT_MARKERS.todo.test(line)) counts.todo += 1;
    if (DEBT_MARKERS.fixme.test(line)) counts.fixme += 1;
    if (DEBT_MARKERS.hack.test(line)) counts.hack += 1;
  }
  counts.total = counts.todo + counts.fixme + counts.hack;
  return counts;
}

/**
 * Scan every tracked file under `root`. Files with no markers are omitted;
 * the rest are sorted by total, then path.
 */
export async function analyzeTechnicalDebt(
  root: string,
  trackedFiles: Iterable<string>
): Promise<TechnicalDebtEntry[]> {
  const candidates = [...trackedFiles].filter((file) => !isNonSourceFile(file));
  const scanned = await mapWithConcurrency(candidates, FILE_SCAN_CONCURRENCY, async (file) => {
    const content = await readTrackedFile(root, file);
    if (!content) return null;
    return { path: file, ...countDebtMarkers(content.toString('utf8')) };
  });

  return scanned
    .filter((entry): entry is TechnicalDebtEntry => entry !== null && entry.total > 0)
    .sort((a, b) => b.total - a.total || a.path.localeCompare(b.path));
}
