/**
 * @fileoverview Configuration discovery and loading.
 *
 * Lookup order in the repository root: `.lintboard.yml`, `.lintboard.yaml`,
 * `lintboard.config.yml`. An explicit path wins and must exist.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'yaml';
import { ConfigError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { ReportConfig } from './report_config.js';
import { LintboardConfigSchema } from './schema.js';

export const CONFIG_FILE_NAMES = ['.lintboard.yml', '.lintboard.yaml', 'lintboard.config.yml'] as const;

export const SAMPLE_CONFIG = `# lintboard configuration
# Every key is optional; the values below are the defaults unless noted.

# Files to leave out of every board: globs (matched against the path and the
# file name) or plain substrings. Default: none.
ignoreFiles:
  - "*.min.js"
# Substrings of paths to leave out.
ignorePaths: []
# Authors to leave out, matched case-insensitively against email and name.
ignoreAuthors: []
# Lint rule ids to leave out.
ignoreRules: []

# Files larger than this many kilobytes are skipped (0 = no limit).
maxFileSizeKb: 5000
# Concurrent git blame processes.
maxConcurrentBlame: 4
blameTimeoutMs: 30000

# Files with fewer commits are left off the bug density board.
bugDensityMinCommits: 5
# Window for the recent contributors board.
recentDays: 30

spellcheck:
  enabled: true
  extensions: [".js", ".ts", ".jsx", ".tsx", ".md", ".txt"]
  ignorePaths: ["node_modules", "dist", "build"]
  customWords: []

ruff:
  enabled: true
  rules: []
  ignorePaths: ["node_modules", "dist", "build"]
`;

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** First config file present in `root`, as an absolute path. */
export async function findConfigFile(root: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(root, name);
    if (await exists(candidate)) return candidate;
  }
  return null;
}

/** Parse and validate YAML config text. An empty document means defaults. */
export function parseConfig(content: string, source: string): ReportConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(source, [getErrorMessage(error)]);
  }

  const parsed = LintboardConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) =>
      e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
    );
    throw new ConfigError(source, issues);
  }
  return new ReportConfig(parsed.data, source);
}

/**
 * Load the configuration for `root`. `explicitPath` is resolved against the
 * current directory and must exist; otherwise the first default file name
 * found in `root` is used, and built-in defaults when there is none.
 */
export async function loadConfig(root: string, explicitPath?: string): Promise<ReportConfig> {
  const source = explicitPath ? path.resolve(explicitPath) : await findConfigFile(root);
  if (!source) {
    logDebug('[lintboard] no config file, using defaults', { root });
    return ReportConfig.defaults();
  }

  let content: string;
  try {
    content = await fs.readFile(source, 'utf8');
  } catch (error) {
    throw new ConfigError(source, [`cannot read file: ${getErrorMessage(error)}`]);
  }
  logDebug('[lintboard] loaded config', { source });
  return parseConfig(content, source);
}

/**
 * Write {@link SAMPLE_CONFIG} to `<root>/.lintboard.yml`. Refuses to replace
 * an existing file unless `force` is set.
 *
 * @returns the path written
 */
export async function writeSampleConfig(root: string, force = false): Promise<string> {
  const target = path.join(root, CONFIG_FILE_NAMES[0]);
  if (!force && await exists(target)) {
    throw new ConfigError(target, ['file already exists (use --force to overwrite)']);
  }
  await fs.writeFile(target, SAMPLE_CONFIG, 'utf8');
  return target;
}
