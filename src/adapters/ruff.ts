/**
 * @fileoverview Ruff adapter for Python sources.
 */

import * as path from 'node:path';
import { z } from 'zod';
import type { Issue } from '../types.js';
import { normalizePath } from '../utils/git.js';
import { parseLinterJson, runLinterProcess, type LinterRunOptions } from './linter_process.js';
import { UNKNOWN_RULE } from './eslint.js';

/** Ruff has no severity levels; every finding counts as a warning. */
export const RUFF_SEVERITY = 1;

const RuffDiagnosticSchema = z.object({
  code: z.string().nullable().optional(),
  message: z.string().default(''),
  filename: z.string(),
  location: z.object({ row: z.number().int() }),
});

export const RuffReportSchema = z.array(RuffDiagnosticSchema);

export function parseRuffReport(output: string, root: string): Issue[] {
  return parseLinterJson('ruff', output, RuffReportSchema).map((diagnostic) => ({
    filePath: normalizePath(
      path.isAbsolute(diagnostic.filename) ? path.relative(root, diagnostic.filename) : diagnostic.filename
    ),
    line: diagnostic.location.row,
    ruleId: diagnostic.code ?? UNKNOWN_RULE,
    severity: RUFF_SEVERITY,
    message: diagnostic.message,
    source: 'ruff',
  }));
}

export interface RunRuffOptions extends Pick<LinterRunOptions, 'timeoutMs' | 'signal'> {
  /** Rule selectors passed as `--select`. */
  rules?: readonly string[];
  /** Substrings of paths to leave out. */
  ignorePaths?: readonly string[];
}

export function buildRuffArgs(files: readonly string[], options: RunRuffOptions = {}): string[] {
  const args = ['check', '--output-format=json', '--exit-zero'];
  if (options.rules && options.rules.length > 0) {
    args.push(`--select=${options.rules.join(',')}`);
  }
  args.push('--', ...files);
  return args;
}

/** Lint the tracked `.py` files. Resolves to no issues when there are none. */
export async function runRuff(
  root: string,
  trackedFiles: Iterable<string>,
  options: RunRuffOptions = {}
): Promise<Issue[]> {
  const ignorePaths = options.ignorePaths ?? [];
  const files = [...trackedFiles].filter(
    (file) => file.endsWith('.py') && !ignorePaths.some((fragment) => file.includes(fragment))
  );
  if (files.length === 0) return [];

  const output = await runLinterProcess('ruff', 'ruff', buildRuffArgs(files, options), {
    cwd: root,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });
  return parseRuffReport(output, root);
}
