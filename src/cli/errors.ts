/**
 * @fileoverview CLI error handling with helpful suggestions
 *
 * Every failure that reaches the top of a command is turned into an
 * `ErrorEnvelope`: a stable code, the message, a suggestion and the process
 * exit code. Human mode prints `Error [CODE]: message`; `--json` prints the
 * envelope on stderr so stdout stays parseable.
 */

import { isLintboardError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_A_REPOSITORY'
  | 'CONFIG_INVALID'
  | 'LINTER_FAILED'
  | 'GIT_COMMAND_FAILED'
  | 'COVERAGE_UNREADABLE'
  | 'INTERNAL';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `lintboard help` for usage information.',
  NOT_A_REPOSITORY: 'Run lintboard from inside a git work tree, or pass the repository directory.',
  CONFIG_INVALID: 'Fix the listed keys, or run `lintboard init --force` to start from the sample file.',
  LINTER_FAILED: 'Check that the linter is installed and runs on its own in the repository.',
  GIT_COMMAND_FAILED: 'Check that git is installed and the repository is not corrupt.',
  COVERAGE_UNREADABLE: 'Pass a readable lcov.info or coverage-final.json with --coverage-file.',
  INTERNAL: 'Re-run with --verbose and report the output if the problem persists.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INTERNAL: 1,
  INVALID_ARGUMENT: 2,
  NOT_A_REPOSITORY: 3,
  CONFIG_INVALID: 4,
  LINTER_FAILED: 5,
  GIT_COMMAND_FAILED: 6,
  COVERAGE_UNREADABLE: 7,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

// ============================================================================
// ENVELOPE
// ============================================================================

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
  details?: Record<string, unknown>;
}

function isCliErrorCode(code: string): code is CliErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODES, code);
}

/** Map any thrown value to an envelope. Unknown errors become `INTERNAL`. */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return {
      code: error.code,
      message: error.message,
      retryable: false,
      suggestion: error.suggestion,
      details: error.details,
    };
  }
  if (isLintboardError(error)) {
    const code = isCliErrorCode(error.code) ? error.code : 'INTERNAL';
    return {
      code,
      message: error.message,
      retryable: error.retryable,
      suggestion: ERROR_SUGGESTIONS[code],
      details: error.toJSON().details,
    };
  }
  return {
    code: 'INTERNAL',
    message: getErrorMessage(error),
    retryable: false,
    suggestion: ERROR_SUGGESTIONS.INTERNAL,
  };
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

export function formatError(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.suggestion) {
    lines.push('', `Suggestion: ${envelope.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
