/**
 * @fileoverview ESLint adapter.
 *
 * Runs `npx eslint . --format json` in the repository root and maps each
 * message onto an {@link Issue}. Results for files outside the tracked set
 * are dropped, as are messages for ignored rules.
 */

import * as path from 'node:path';
import { z } from 'zod';
import type { Issue } from '../types.js';
import { normalizePath } from '../utils/git.js';
import { parseLinterJson, runLinterProcess, type LinterRunOptions } from './linter_process.js';

/** Rule id for messages ESLint reports without one (parse errors). */
export const UNKNOWN_RULE = 'unknown';

const EslintMessageSchema = z.object({
  ruleId: z.string().nullable().optional(),
  severity: z.number().int(),
  message: z.string().default(''),
  line: z.number().int().default(1),
});

const EslintResultSchema = z.object({
  filePath: z.string(),
  messages: z.array(EslintMessageSchema),
});

export const EslintReportSchema = z.array(EslintResultSchema);

export interface EslintReportOptions {
  /** Repository root; absolute result paths are made relative to it. */
  root: string;
  trackedFiles: ReadonlySet<string>;
  ignoredRules?: ReadonlySet<string>;
}

export function parseEslintReport(output: string, options: EslintReportOptions): Issue[] {
  const results = parseLinterJson('eslint', output, EslintReportSchema);
  const issues: Issue[] = [];

  for (const result of results) {
    const relative = path.isAbsolute(result.filePath)
      ? path.relative(options.root, result.filePath)
      : result.filePath;
    const filePath = normalizePath(relative);
    if (!options.trackedFiles.has(filePath)) continue;

    for (const message of result.messages) {
      const ruleId = message.ruleId ?? UNKNOWN_RULE;
      if (options.ignoredRules?.has(ruleId)) continue;
      issues.push({
        filePath,
        line: message.line,
        ruleId,
        severity: message.severity,
        message: message.message,
        source: 'eslint',
      });
    }
  }
  return issues;
}

export type RunEslintOptions = Omit<EslintReportOptions, 'root'> & Pick<LinterRunOptions, 'timeoutMs' | 'signal'>;

export async function runEslint(root: string, options: RunEslintOptions): Promise<Issue[]> {
  const output = await runLinterProcess('eslint', 'npx', ['eslint', '.', '--format', 'json'], {
    cwd: root,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });
  return parseEslintReport(output, { ...options, root });
}
