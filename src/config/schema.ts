/**
 * @fileoverview Configuration file schema.
 *
 * Every key is optional in the file; the schema fills in defaults so the
 * parsed value is always complete.
 */

import { z } from 'zod';

export const DEFAULT_SPELLCHECK_EXTENSIONS = ['.js', '.ts', '.jsx', '.tsx', '.md', '.txt'] as const;
export const DEFAULT_SKIPPED_PATHS = ['node_modules', 'dist', 'build'] as const;

const stringList = z.array(z.string().min(1)).default([]);

export const SpellcheckConfigSchema = z.object({
  enabled: z.boolean().default(true),
  extensions: z.array(z.string().min(1)).default([...DEFAULT_SPELLCHECK_EXTENSIONS]),
  ignorePaths: z.array(z.string().min(1)).default([...DEFAULT_SKIPPED_PATHS]),
  customWords: stringList,
}).strict();

export const RuffConfigSchema = z.object({
  enabled: z.boolean().default(true),
  rules: stringList,
  ignorePaths: z.array(z.string().min(1)).default([...DEFAULT_SKIPPED_PATHS]),
}).strict();

export const LintboardConfigSchema = z.object({
  ignoreFiles: stringList,
  ignorePaths: stringList,
  ignoreAuthors: stringList,
  ignoreRules: stringList,
  /** Kilobytes; 0 disables the limit. */
  maxFileSizeKb: z.number().int().nonnegative().default(5000),
  maxConcurrentBlame: z.number().int().min(1).default(4),
  blameTimeoutMs: z.number().int().positive().default(30_000),
  bugDensityMinCommits: z.number().int().min(1).default(5),
  recentDays: z.number().int().positive().default(30),
  spellcheck: SpellcheckConfigSchema.default({}),
  ruff: RuffConfigSchema.default({}),
}).strict();

/** As written in a file. */
export type LintboardConfigInput = z.input<typeof LintboardConfigSchema>;
/** After defaults. */
export type LintboardConfig = z.output<typeof LintboardConfigSchema>;
