/**
 * @fileoverview Config Command - print the effective configuration
 *
 * Usage: lintboard config [DIRECTORY] [--config <file>] [--json]
 */

import * as path from 'node:path';
import { loadConfig } from '../../config/index.js';

export interface ConfigCommandOptions {
  workspace: string;
  configPath?: string;
  json?: boolean;
}

export async function configCommand(options: ConfigCommandOptions, write: (text: string) => void): Promise<void> {
  const config = await loadConfig(path.resolve(options.workspace), options.configPath);
  if (options.json) {
    write(`${JSON.stringify({ source: config.source, values: config.values }, null, 2)}\n`);
    return;
  }
  write(`${config.summary().join('\n')}\n`);
}
