import type { GitRunner } from '../utils/git.js';
import { normalizePath } from '../utils/git.js';

export interface CommitRecord {
  hash: string;
  author: string;
  email: string;
  /** Strict ISO-8601 author date. */
  timestamp: string;
  subject: string;
  /** Paths from `--name-only`; empty unless requested. */
  files: string[];
}

export interface CommitLogOptions {
  /** Include the files each commit touched. */
  withFiles?: boolean;
  allRefs?: boolean;
  noMerges?: boolean;
  /** Passed to `--since`, e.g. `2026-09-19`. */
  since?: string;
  signal?: AbortSignal;
}

const RECORD_SEPARATOR = '\u001e';
const FIELD_SEPARATOR = '\u001f';
const LOG_FORMAT = '--pretty=format:%x1e%H%x1f%an%x1f%ae%x1f%aI%x1f%s';

/**
 * Split `git log` output produced with {@link LOG_FORMAT} into commits. Each
 * record is a header line followed by the commit's file list, parsed as one
 * unit so a file can never be credited to a neighbouring commit.
 */
export function parseGitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = [];
  const records = output.split(RECORD_SEPARATOR).map((chunk) => chunk.trim()).filter(Boolean);
  for (const record of records) {
    const lines = record.split(/\r?\n/).filter((line) => line.trim().length > 0);

    // The header is always the first line; subjects may not be trusted to
    // lack a unit separator, so it is never searched for.
    const header = lines[0];
    if (!header || !header.includes(FIELD_SEPARATOR)) continue;

    const [hash, author = '', email = '', timestamp = '', ...subjectParts] = header.split(FIELD_SEPARATOR);
    if (!hash || !timestamp) continue;

    commits.push({
      hash,
      author: author.trim(),
      email: email.trim(),
      timestamp: timestamp.trim(),
      subject: subjectParts.join(FIELD_SEPARATOR),
      files: Array.from(new Set(lines.slice(1).map(normalizePath))),
    });
  }
  return commits;
}

export async function readCommitLog(runner: GitRunner, options: CommitLogOptions = {}): Promise<CommitRecord[]> {
  const args = ['log', LOG_FORMAT];
  if (options.withFiles) args.push('--name-only');
  if (options.allRefs) args.push('--all');
  if (options.noMerges) args.push('--no-merges');
  if (options.since) args.push(`--since=${options.since}`);
  const output = await runner.run(args, { signal: options.signal });
  return parseGitLog(output);
}

const BUG_FIX_PATTERN = /(fix|bug|issue|error|broken|crash|repair)/i;

export function isBugFixMessage(message: string): boolean {
  return BUG_FIX_PATTERN.test(message);
}
