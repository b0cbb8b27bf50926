import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

const SKIP_EXTENSIONS = [
  '.png', '.jpg', '.jpeg', '.gif', '.svg', '.ico',
  '.pdf', '.zip', '.tar', '.gz', '.exe', '.bin',
  '.lock', '.log', '.tmp', '.cache',
];

const SKIP_PATH_SEGMENTS = [
  'node_modules/', '.git/', 'dist/', 'build/',
  'coverage/', '.nyc_output/', 'vendor/',
];

/** Binary, generated and vendored files that content scans leave alone. */
export function isNonSourceFile(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return SKIP_EXTENSIONS.some((ext) => lower.endsWith(ext))
    || SKIP_PATH_SEGMENTS.some((segment) => filePath.includes(segment));
}

/**
 * Read a tracked file relative to `root`. Returns null when it cannot be
 * read (deleted in the worktree, permission denied, a submodule directory).
 */
export async function readTrackedFile(root: string, filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(path.join(root, filePath));
  } catch (error) {
    logDebug('[lintboard] skipping unreadable file', { file: filePath, error: getErrorMessage(error) });
    return null;
  }
}
