#!/usr/bin/env node
/**
 * @fileoverview lintboard CLI
 *
 * Commands:
 *   lintboard [report] [DIRECTORY] --authors ...  - Build leaderboards (default)
 *   lintboard init [DIRECTORY]                    - Write a sample .lintboard.yml
 *   lintboard config [DIRECTORY]                  - Print the effective configuration
 *   lintboard help [command]                      - Show help
 *
 * @packageDocumentation
 */

import { getErrorMessage } from '../utils/errors.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  });
