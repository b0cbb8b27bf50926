/**
 * @fileoverview Running per-author, per-file and per-rule tallies.
 *
 * One mutex covers all three maps and the warning log, so a snapshot always
 * sees every map at the same issue count. Keys are never removed and counts
 * only grow for the lifetime of an aggregator.
 */

import {
  ERROR_SEVERITY,
  type AuthorStats,
  type BlameInfo,
  type FileStats,
  type Issue,
  type IssueFilter,
  type RuleStats,
  type StatsSnapshot,
  type WarningSink,
} from '../types.js';
import { Mutex } from '../utils/semaphore.js';

export interface StatsAggregatorOptions {
  filter?: IssueFilter;
  /** Clock for first/last-seen timestamps, in epoch milliseconds. */
  now?: () => number;
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

export class StatsAggregator implements WarningSink {
  private readonly lock = new Mutex();
  private readonly authors = new Map<string, AuthorStats>();
  private readonly files = new Map<string, FileStats>();
  private readonly rules = new Map<string, RuleStats>();
  private readonly warnings: string[] = [];
  private readonly filter?: IssueFilter;
  private readonly now: () => number;

  constructor(options: StatsAggregatorOptions = {}) {
    this.filter = options.filter;
    this.now = options.now ?? Date.now;
  }

  /**
   * Count one occurrence of `issue` against `blame`. Not idempotent.
   *
   * @returns false when the file, rule or author is excluded
   */
  record(issue: Issue, blame: BlameInfo): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (this.isExcluded(issue, blame)) {
        return false;
      }
      const seenAt = this.now();
      this.recordAuthor(issue, blame, seenAt);
      this.recordFile(issue, blame);
      this.recordRule(issue, blame);
      return true;
    });
  }

  async warn(message: string): Promise<void> {
    await this.lock.runExclusive(() => {
      this.warnings.push(message);
    });
  }

  /** Deep copy of every map and the warning log, taken under the lock. */
  snapshot(): Promise<StatsSnapshot> {
    return this.lock.runExclusive((): StatsSnapshot => {
      const authors = new Map<string, AuthorStats>();
      for (const [key, stats] of this.authors) {
        authors.set(key, { ...stats, rules: new Map(stats.rules), files: new Map(stats.files) });
      }
      const files = new Map<string, FileStats>();
      for (const [key, stats] of this.files) {
        files.set(key, { ...stats, rules: new Map(stats.rules), authors: new Map(stats.authors) });
      }
      const rules = new Map<string, RuleStats>();
      for (const [key, stats] of this.rules) {
        rules.set(key, { ...stats, authors: new Map(stats.authors), files: new Map(stats.files) });
      }
      return { authors, files, rules, warnings: [...this.warnings] };
    });
  }

  private isExcluded(issue: Issue, blame: BlameInfo): boolean {
    if (!this.filter) return false;
    return this.filter.shouldIgnoreFile(issue.filePath)
      || this.filter.shouldIgnoreRule(issue.ruleId)
      || this.filter.shouldIgnoreAuthor(blame.email, blame.name);
  }

  private recordAuthor(issue: Issue, blame: BlameInfo, seenAt: number): void {
    let author = this.authors.get(blame.email);
    if (!author) {
      author = {
        name: blame.name,
        email: blame.email,
        count: 0,
        rules: new Map(),
        files: new Map(),
        errors: 0,
        warnings: 0,
        firstSeen: seenAt,
        lastSeen: seenAt,
      };
      this.authors.set(blame.email, author);
    }
    // Keyed by email; the display name follows the most recent record.
    if (blame.name) {
      author.name = blame.name;
    }
    author.count += 1;
    increment(author.rules, issue.ruleId);
    increment(author.files, issue.filePath);
    if (issue.severity === ERROR_SEVERITY) {
      author.errors += 1;
    } else {
      author.warnings += 1;
    }
    author.lastSeen = Math.max(author.lastSeen, seenAt);
  }

  private recordFile(issue: Issue, blame: BlameInfo): void {
    let file = this.files.get(issue.filePath);
    if (!file) {
      file = { path: issue.filePath, count: 0, rules: new Map(), authors: new Map() };
      this.files.set(issue.filePath, file);
    }
    file.count += 1;
    increment(file.rules, issue.ruleId);
    increment(file.authors, blame.email);
  }

  private recordRule(issue: Issue, blame: BlameInfo): void {
    let rule = this.rules.get(issue.ruleId);
    if (!rule) {
      rule = { rule: issue.ruleId, count: 0, authors: new Map(), files: new Map() };
      this.rules.set(issue.ruleId, rule);
    }
    rule.count += 1;
    increment(rule.authors, blame.email);
    increment(rule.files, issue.filePath);
  }
}
