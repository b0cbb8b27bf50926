/**
 * Shared Vitest setup for lintboard.
 *
 * Logs go to stderr through the telemetry logger; keep them quiet unless a
 * test run asks for them explicitly.
 */

import { afterEach, vi } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

setLogLevel(process.env.LINTBOARD_LOG_LEVEL === 'debug' ? 'debug' : 'silent');

afterEach(() => {
  vi.restoreAllMocks();
});
