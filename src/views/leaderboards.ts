/**
 * @fileoverview Leaderboards over aggregated statistics.
 *
 * Pure functions: aggregates in, ranked rows out. Rank starts at 1 and every
 * ordering has a final tiebreak on name, path or rule so output is stable
 * across runs.
 */

import type { AuthorStats, FileStats, RuleStats } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export type Ranked<T> = T & { rank: number };

/** Shown as the top rule when a row has no rule counts. */
export const UNKNOWN_TOP_RULE = 'unknown';

export interface AuthorBoardRow {
  rank: number;
  name: string;
  email: string;
  count: number;
  errors: number;
  warnings: number;
  files: number;
  topRule: string;
  topRuleCount: number;
}

export interface FileBoardRow {
  rank: number;
  path: string;
  count: number;
  authors: number;
  topRule: string;
  topRuleCount: number;
}

export interface RuleBoardRow {
  rank: number;
  rule: string;
  count: number;
  authors: number;
  files: number;
}

export interface SummaryStats {
  totalIssues: number;
  errors: number;
  warnings: number;
  authors: number;
  files: number;
  rules: number;
  /** Null when there are no authors. */
  averagePerAuthor: number | null;
  /** Null when there are no files. */
  averagePerFile: number | null;
}

// ============================================================================
// HELPERS
// ============================================================================

/** Keep the first `topN` rows; a missing or non-positive `topN` keeps all. */
export function limitRows<T>(rows: readonly T[], topN?: number): T[] {
  return topN !== undefined && topN > 0 ? rows.slice(0, topN) : [...rows];
}

/**
 * Assign ranks to entries that are already in board order, then truncate.
 */
export function rankEntries<T extends object>(entries: readonly T[], topN?: number): Array<Ranked<T>> {
  return limitRows(entries, topN).map((entry, index) => ({ ...entry, rank: index + 1 }));
}

/** Most frequent rule; ties go to the alphabetically first id. */
export function topRule(rules: ReadonlyMap<string, number>): { rule: string; count: number } {
  let best = { rule: UNKNOWN_TOP_RULE, count: 0 };
  for (const [rule, count] of rules) {
    if (count > best.count || (count === best.count && count > 0 && rule < best.rule)) {
      best = { rule, count };
    }
  }
  return best;
}

// ============================================================================
// BOARDS
// ============================================================================

export function buildAuthorBoard(authors: ReadonlyMap<string, AuthorStats>, topN?: number): AuthorBoardRow[] {
  const rows = [...authors.values()]
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name) || a.email.localeCompare(b.email))
    .map((stats) => {
      const top = topRule(stats.rules);
      return {
        name: stats.name,
        email: stats.email,
        count: stats.count,
        errors: stats.errors,
        warnings: stats.warnings,
        files: stats.files.size,
        topRule: top.rule,
        topRuleCount: top.count,
      };
    });
  return rankEntries(rows, topN);
}

export function buildFileBoard(files: ReadonlyMap<string, FileStats>, topN?: number): FileBoardRow[] {
  const rows = [...files.values()]
    .sort((a, b) => b.count - a.count || a.path.localeCompare(b.path))
    .map((stats) => {
      const top = topRule(stats.rules);
      return {
        path: stats.path,
        count: stats.count,
        authors: stats.authors.size,
        topRule: top.rule,
        topRuleCount: top.count,
      };
    });
  return rankEntries(rows, topN);
}

export function buildRuleBoard(rules: ReadonlyMap<string, RuleStats>, topN?: number): RuleBoardRow[] {
  const rows = [...rules.values()]
    .sort((a, b) => b.count - a.count || a.rule.localeCompare(b.rule))
    .map((stats) => ({
      rule: stats.rule,
      count: stats.count,
      authors: stats.authors.size,
      files: stats.files.size,
    }));
  return rankEntries(rows, topN);
}

/** Totals come from the author aggregate, which sees every recorded issue. */
export function buildSummary(
  authors: ReadonlyMap<string, AuthorStats>,
  files: ReadonlyMap<string, FileStats>,
  rules: ReadonlyMap<string, RuleStats>
): SummaryStats {
  let totalIssues = 0;
  let errors = 0;
  let warnings = 0;
  for (const stats of authors.values()) {
    totalIssues += stats.count;
    errors += stats.errors;
    warnings += stats.warnings;
  }
  return {
    totalIssues,
    errors,
    warnings,
    authors: authors.size,
    files: files.size,
    rules: rules.size,
    averagePerAuthor: authors.size > 0 ? totalIssues / authors.size : null,
    averagePerFile: files.size > 0 ? totalIssues / files.size : null,
  };
}
