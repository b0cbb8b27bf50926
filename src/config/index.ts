/**
 * @fileoverview lintboard configuration
 *
 * - `schema`: zod schema and defaults for the YAML file
 * - `report_config`: effective values plus exclusion predicates
 * - `loader`: file discovery, parsing and `init`
 */

export {
  DEFAULT_SKIPPED_PATHS,
  DEFAULT_SPELLCHECK_EXTENSIONS,
  LintboardConfigSchema,
  RuffConfigSchema,
  SpellcheckConfigSchema,
  type LintboardConfig,
  type LintboardConfigInput,
} from './schema.js';

export { ReportConfig } from './report_config.js';

export {
  CONFIG_FILE_NAMES,
  SAMPLE_CONFIG,
  findConfigFile,
  loadConfig,
  parseConfig,
  writeSampleConfig,
} from './loader.js';
