import type { LinesOfCodeEntry } from '../types.js';
import { FILE_SCAN_CONCURRENCY, mapWithConcurrency } from '../utils/async.js';
import { isNonSourceFile, readTrackedFile } from './file_filters.js';

/** Newline count, as `wc -l` reports it. */
export function countLines(content: Buffer): number {
  let lines = 0;
  for (let offset = content.indexOf(0x0a); offset !== -1; offset = content.indexOf(0x0a, offset + 1)) {
    lines += 1;
  }
  return lines;
}

/** Line counts and sizes for tracked source files, largest first. */
export async function analyzeLinesOfCode(root: string, trackedFiles: Iterable<string>): Promise<LinesOfCodeEntry[]> {
  const candidates = [...trackedFiles].filter((file) => !isNonSourceFile(file));
  const measured = await mapWithConcurrency(candidates, FILE_SCAN_CONCURRENCY, async (file) => {
    const content = await readTrackedFile(root, file);
    return content ? { path: file, lines: countLines(content), bytes: content.length } : null;
  });
  return measured
    .filter((entry): entry is LinesOfCodeEntry => entry !== null)
    .sort((a, b) => b.lines - a.lines || a.path.localeCompare(b.path));
}
