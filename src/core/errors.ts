/**
 * @fileoverview lintboard error hierarchy
 *
 * Typed errors for the attribution pipeline and its collaborators. Only
 * `RepositoryError` is fatal to a run; attribution failures are recorded as
 * warnings and the run continues.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class LintboardError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// GIT ERRORS
// ============================================================================

export class GitCommandError extends LintboardError {
  readonly code = 'GIT_COMMAND_FAILED';
  readonly retryable = false;

  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly timedOut: boolean,
  ) {
    const reason = timedOut
      ? 'timed out'
      : exitCode === null
        ? 'could not be started'
        : `exited with code ${exitCode}`;
    const detail = stderr.trim().split('\n')[0] ?? '';
    super(`git ${args.join(' ')} ${reason}${detail ? `: ${detail}` : ''}`);
    this.name = 'GitCommandError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        args: [...this.args],
        exitCode: this.exitCode,
        timedOut: this.timedOut,
      },
    };
  }
}

export class RepositoryError extends LintboardError {
  readonly code = 'NOT_A_REPOSITORY';
  readonly retryable = false;

  constructor(
    readonly workspace: string,
    message: string,
  ) {
    super(`Cannot use ${workspace} as a git repository: ${message}`);
    this.name = 'RepositoryError';
  }
}

// ============================================================================
// ATTRIBUTION ERRORS
// ============================================================================

export type AttributionFailureReason = 'timeout' | 'command_failed' | 'previously_failed';

export class AttributionError extends LintboardError {
  readonly code = 'ATTRIBUTION_FAILED';
  // Failure causes (untracked or binary file, corrupt pack) hold for the whole run.
  readonly retryable = false;

  constructor(
    readonly filePath: string,
    readonly reason: AttributionFailureReason,
    message: string,
  ) {
    super(`Attribution failed for ${filePath} (${reason}): ${message}`);
    this.name = 'AttributionError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// CONFIG ERRORS
// ============================================================================

export class ConfigError extends LintboardError {
  readonly code = 'CONFIG_INVALID';
  readonly retryable = false;

  constructor(
    readonly source: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        issues: [...this.issues],
      },
    };
  }
}

// ============================================================================
// LINTER ERRORS
// ============================================================================

export type LinterName = 'eslint' | 'ruff';
export type LinterPhase = 'spawn' | 'parse';

export class LinterError extends LintboardError {
  readonly code = 'LINTER_FAILED';
  readonly retryable = false;

  constructor(
    readonly linter: LinterName,
    readonly phase: LinterPhase,
    message: string,
  ) {
    super(`${linter} ${phase === 'spawn' ? 'could not run' : 'output could not be parsed'}: ${message}`);
    this.name = 'LinterError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        linter: this.linter,
        phase: this.phase,
      },
    };
  }
}

// ============================================================================
// COVERAGE ERRORS
// ============================================================================

export class CoverageError extends LintboardError {
  readonly code = 'COVERAGE_UNREADABLE';
  readonly retryable = false;

  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`Cannot read coverage report ${source}: ${message}`);
    this.name = 'CoverageError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isLintboardError(error: unknown): error is LintboardError {
  return error instanceof LintboardError;
}

export function isAttributionError(error: unknown): error is AttributionError {
  return error instanceof AttributionError;
}
