/**
 * @fileoverview Init Command - write a sample `.lintboard.yml`
 *
 * Usage: lintboard init [DIRECTORY] [--force]
 */

import * as path from 'node:path';
import { writeSampleConfig } from '../../config/index.js';

export interface InitCommandOptions {
  workspace: string;
  force?: boolean;
}

export async function initCommand(options: InitCommandOptions, write: (text: string) => void): Promise<void> {
  const target = await writeSampleConfig(path.resolve(options.workspace), options.force ?? false);
  write(`Wrote ${target}\n`);
}
