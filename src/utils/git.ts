/**
 * @fileoverview Git Utilities
 * Narrow subprocess seam for every git command lintboard runs. Production code
 * uses `ExecaGitRunner`; tests substitute an in-process fake.
 */

import { execa } from 'execa';
import { GitCommandError, RepositoryError } from '../core/errors.js';

export interface GitRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface GitRunner {
  /** Repository root every command runs in. */
  readonly cwd: string;
  /** Resolves with stdout; rejects with `GitCommandError` on non-zero exit or timeout. */
  run(args: readonly string[], options?: GitRunOptions): Promise<string>;
}

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export class ExecaGitRunner implements GitRunner {
  constructor(readonly cwd: string) {}

  async run(args: readonly string[], options: GitRunOptions = {}): Promise<string> {
    const result = await execa('git', [...args], {
      cwd: this.cwd,
      reject: false,
      timeout: options.timeoutMs,
      cancelSignal: options.signal,
      maxBuffer: MAX_OUTPUT_BYTES,
      stripFinalNewline: false,
    });
    if (result.failed) {
      throw new GitCommandError(
        args,
        result.exitCode ?? null,
        String(result.stderr),
        result.timedOut,
      );
    }
    return String(result.stdout);
  }
}

export function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').trim();
}

/** Fails with `RepositoryError` when `runner.cwd` is not inside a git repository. */
export async function validateRepository(runner: GitRunner): Promise<void> {
  try {
    await runner.run(['rev-parse', '--git-dir']);
  } catch (error) {
    if (error instanceof GitCommandError) {
      const reason = error.exitCode === null
        ? 'git could not be started'
        : error.stderr.trim() || `git exited with code ${error.exitCode}`;
      throw new RepositoryError(runner.cwd, reason);
    }
    throw error;
  }
}

export async function listTrackedFiles(runner: GitRunner): Promise<string[]> {
  const output = await runner.run(['ls-files', '-z']);
  return output
    .split('\0')
    .map(normalizePath)
    .filter((file) => file.length > 0);
}
