import { execa } from 'execa';
import type { z } from 'zod';
import { LinterError, type LinterName } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export interface LinterRunOptions {
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Run a linter and return its stdout. Exit codes 0 and 1 mean "clean" and
 * "found problems" for both ESLint and Ruff; anything else is a failure.
 */
export async function runLinterProcess(
  linter: LinterName,
  command: string,
  args: readonly string[],
  options: LinterRunOptions
): Promise<string> {
  logDebug('[lintboard] running linter', { linter, command, args: args.length });
  const result = await execa(command, [...args], {
    cwd: options.cwd,
    reject: false,
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
    maxBuffer: MAX_OUTPUT_BYTES,
  });

  const exitCode = result.exitCode ?? null;
  if (result.timedOut) {
    throw new LinterError(linter, 'spawn', 'timed out');
  }
  if (exitCode === null || exitCode > 1) {
    const detail = String(result.stderr).trim().split('\n')[0] || `exit code ${exitCode ?? 'unknown'}`;
    throw new LinterError(linter, 'spawn', detail);
  }
  return String(result.stdout);
}

/** JSON-decode linter output and validate it against `schema`. */
export function parseLinterJson<S extends z.ZodTypeAny>(linter: LinterName, output: string, schema: S): z.output<S> {
  const trimmed = output.trim();
  if (trimmed.length === 0) {
    throw new LinterError(linter, 'parse', 'no output');
  }
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch (error) {
    throw new LinterError(linter, 'parse', getErrorMessage(error));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new LinterError(linter, 'parse', details.join('; '));
  }
  return parsed.data;
}
