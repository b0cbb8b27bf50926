/**
 * @fileoverview Maps a lint issue onto the contributor of its line.
 *
 * Linters sometimes report a line that blame does not attribute (end-of-file
 * rules, trailing blank lines). The resolver picks the first attributed line
 * at or after the reported one, falling back to the last attributed line.
 */

import type { BlameInfo, BlameIndex, Issue } from '../types.js';
import type { AttributeOptions } from '../ingest/blame_service.js';

export type Resolution =
  | { found: true; line: number; blame: BlameInfo }
  | { found: false };

export interface LineAttributor {
  attribute(filePath: string, options?: AttributeOptions): Promise<BlameIndex>;
}

/**
 * Smallest entry of `lines` that is `>= target`, else the largest entry.
 * `lines` must be sorted ascending. Returns undefined for an empty list.
 */
export function nearestAttributedLine(lines: readonly number[], target: number): number | undefined {
  let low = 0;
  let high = lines.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const value = lines[mid];
    if (value !== undefined && value < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return lines[low] ?? lines[lines.length - 1];
}

export class IssueResolver {
  private readonly sortedLines = new WeakMap<BlameIndex, number[]>();

  constructor(private readonly attributor: LineAttributor) {}

  /**
   * Attribution errors propagate unchanged; an index with nothing usable
   * resolves to `{ found: false }`.
   */
  async resolve(issue: Issue, options?: AttributeOptions): Promise<Resolution> {
    const index = await this.attributor.attribute(issue.filePath, options);
    if (index.size === 0) {
      return { found: false };
    }

    const line = nearestAttributedLine(this.linesOf(index), issue.line);
    const blame = line === undefined ? undefined : index.get(line);
    if (line === undefined || !blame) {
      return { found: false };
    }
    return { found: true, line, blame };
  }

  private linesOf(index: BlameIndex): number[] {
    let lines = this.sortedLines.get(index);
    if (!lines) {
      lines = [...index.keys()].sort((a, b) => a - b);
      this.sortedLines.set(index, lines);
    }
    return lines;
  }
}
