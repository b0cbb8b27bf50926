import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { IssueFilter } from '../types.js';
import { FILE_SCAN_CONCURRENCY, mapWithConcurrency } from '../utils/async.js';
import { LintboardConfigSchema, type LintboardConfig, type LintboardConfigInput } from './schema.js';

/**
 * Effective configuration for one run, plus the exclusion predicates the
 * aggregator and the file filters consult.
 */
export class ReportConfig implements IssueFilter {
  private readonly ignoredRules: ReadonlySet<string>;
  private readonly ignoredAuthors: readonly string[];

  constructor(
    readonly values: LintboardConfig,
    /** Where the values came from; `null` means built-in defaults. */
    readonly source: string | null = null
  ) {
    this.ignoredRules = new Set(values.ignoreRules);
    this.ignoredAuthors = values.ignoreAuthors.map((author) => author.toLowerCase());
  }

  static defaults(): ReportConfig {
    return new ReportConfig(LintboardConfigSchema.parse({}));
  }

  static from(input: LintboardConfigInput, source: string | null = null): ReportConfig {
    return new ReportConfig(LintboardConfigSchema.parse(input), source);
  }

  /** Copy with extra ignored rules, e.g. from `--ignore`. */
  withIgnoredRules(rules: readonly string[]): ReportConfig {
    if (rules.length === 0) return this;
    const ignoreRules = [...new Set([...this.values.ignoreRules, ...rules])];
    return new ReportConfig({ ...this.values, ignoreRules }, this.source);
  }

  /**
   * Glob (against the path, then the basename) or substring match on
   * `ignoreFiles`, substring match on `ignorePaths`. Size limits are applied
   * separately by {@link filterTrackedFiles}.
   */
  shouldIgnoreFile(filePath: string): boolean {
    const base = path.posix.basename(filePath);
    const byPattern = this.values.ignoreFiles.some((pattern) =>
      minimatch(filePath, pattern, { dot: true })
      || minimatch(base, pattern, { dot: true })
      || filePath.includes(pattern)
    );
    return byPattern || this.values.ignorePaths.some((fragment) => filePath.includes(fragment));
  }

  /** Case-insensitive exact or substring match on email or name. */
  shouldIgnoreAuthor(email: string, name: string): boolean {
    const lowerEmail = email.toLowerCase();
    const lowerName = name.toLowerCase();
    return this.ignoredAuthors.some((ignored) =>
      lowerEmail.includes(ignored) || lowerName.includes(ignored)
    );
  }

  shouldIgnoreRule(ruleId: string): boolean {
    return this.ignoredRules.has(ruleId);
  }

  get ignoredRuleSet(): ReadonlySet<string> {
    return this.ignoredRules;
  }

  concurrencyLimit(): number {
    return this.values.maxConcurrentBlame;
  }

  /**
   * Tracked files that pass {@link shouldIgnoreFile} and the size limit.
   * Files that cannot be stat'ed are kept; content scans skip them later.
   */
  async filterTrackedFiles(root: string, files: readonly string[]): Promise<string[]> {
    const limitBytes = this.values.maxFileSizeKb * 1024;
    const candidates = files.filter((file) => !this.shouldIgnoreFile(file));
    if (limitBytes === 0) return candidates;

    const sizes = await mapWithConcurrency(candidates, FILE_SCAN_CONCURRENCY, async (file) => {
      try {
        return (await fs.stat(path.join(root, file))).size;
      } catch {
        return 0;
      }
    });
    return candidates.filter((_, index) => (sizes[index] ?? 0) <= limitBytes);
  }

  /** Human-readable lines describing the effective configuration. */
  summary(): string[] {
    const list = (values: readonly string[]): string => (values.length > 0 ? values.join(', ') : '(none)');
    const v = this.values;
    return [
      `Config file: ${this.source ?? '(defaults)'}`,
      `Ignored files: ${list(v.ignoreFiles)}`,
      `Ignored paths: ${list(v.ignorePaths)}`,
      `Ignored authors: ${list(v.ignoreAuthors)}`,
      `Ignored rules: ${list(v.ignoreRules)}`,
      `Max file size: ${v.maxFileSizeKb === 0 ? 'unlimited' : `${v.maxFileSizeKb} KB`}`,
      `Max concurrent blame: ${v.maxConcurrentBlame}`,
      `Blame timeout: ${v.blameTimeoutMs} ms`,
      `Bug density minimum commits: ${v.bugDensityMinCommits}`,
      `Recent contributor window: ${v.recentDays} days`,
      `Spellcheck: ${v.spellcheck.enabled ? 'enabled' : 'disabled'} (${list(v.spellcheck.extensions)})`,
      `Spellcheck custom words: ${list(v.spellcheck.customWords)}`,
      `Ruff: ${v.ruff.enabled ? 'enabled' : 'disabled'} (rules: ${list(v.ruff.rules)})`,
    ];
  }
}
