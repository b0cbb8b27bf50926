/**
 * @fileoverview Message extraction for values caught from git, linters and
 * file reads, which may throw strings or plain objects as well as errors.
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return error === undefined ? 'Unknown error' : String(error);
}
