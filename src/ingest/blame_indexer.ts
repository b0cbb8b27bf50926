/**
 * @fileoverview Parser for `git blame --line-porcelain` output.
 *
 * Every record in line-porcelain mode repeats the full commit header, so each
 * source line can be attributed on its own:
 *
 * ```
 * <40- or 64-hex> <orig-line> <final-line> [<group-size>]
 * author <name>
 * author-mail <<email>>
 * ...
 * \t<line content>
 * ```
 *
 * Records missing an email or line number are skipped; a malformed record
 * never stops the rest of the output from being read.
 */

import type { BlameIndex, BlameInfo } from '../types.js';

export interface BlameLineHeader {
  commitHash: string;
  originalLine: number;
  finalLine: number;
  groupLines?: number;
}

/**
 * Parse a record header line. Returns null for anything that is not one.
 */
export function parseBlameLineHeader(line: string): BlameLineHeader | null {
  const match = line.match(/^([0-9a-f]{40}|[0-9a-f]{64})\s+(\d+)\s+(\d+)(?:\s+(\d+))?$/);
  if (!match) return null;
  const [, commitHash = '', originalLine = '0', finalLine = '0', groupLines] = match;
  return {
    commitHash,
    originalLine: parseInt(originalLine, 10),
    finalLine: parseInt(finalLine, 10),
    groupLines: groupLines ? parseInt(groupLines, 10) : undefined,
  };
}

function stripMailDelimiters(value: string): string {
  return value.trim().replace(/^</, '').replace(/>$/, '').trim();
}

export function parseBlameOutput(output: string): BlameIndex {
  const index = new Map<number, BlameInfo>();
  let currentLine = 0;
  let name = '';
  let email = '';

  for (const raw of output.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;

    if (line.startsWith('\t')) {
      if (email && currentLine > 0) {
        index.set(currentLine, { name, email });
      }
      currentLine = 0;
      name = '';
      email = '';
      continue;
    }

    const header = parseBlameLineHeader(line);
    if (header) {
      currentLine = header.finalLine;
      continue;
    }

    if (line.startsWith('author-mail ')) {
      email = stripMailDelimiters(line.slice('author-mail '.length));
    } else if (line.startsWith('author ')) {
      name = line.slice('author '.length).trim();
    }
  }

  return index;
}
