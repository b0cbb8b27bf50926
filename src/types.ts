/**
 * @fileoverview Shared data model for lintboard.
 *
 * Attribution types flow from the blame service through the resolver into
 * the aggregator. History, coverage and spelling entry types are produced
 * independently by the extractors under `src/ingest` and `src/analysis`.
 */

// ============================================================================
// ATTRIBUTION
// ============================================================================

/** Contributor responsible for one source line. */
export interface BlameInfo {
  readonly name: string;
  readonly email: string;
}

/** 1-based line number to contributor. Only attributable lines are present. */
export type BlameIndex = ReadonlyMap<number, BlameInfo>;

/** ESLint convention: 2 is an error, anything else a warning. */
export const ERROR_SEVERITY = 2;

export type IssueSource = 'eslint' | 'ruff' | (string & {});

export interface Issue {
  readonly filePath: string;
  readonly line: number;
  readonly ruleId: string;
  readonly severity: number;
  readonly message: string;
  readonly source: IssueSource;
}

// ============================================================================
// AGGREGATES
// ============================================================================

export interface AuthorStats {
  name: string;
  email: string;
  count: number;
  rules: Map<string, number>;
  files: Map<string, number>;
  errors: number;
  warnings: number;
  /** Epoch milliseconds. */
  firstSeen: number;
  lastSeen: number;
}

export interface FileStats {
  path: string;
  count: number;
  rules: Map<string, number>;
  authors: Map<string, number>;
}

export interface RuleStats {
  rule: string;
  count: number;
  authors: Map<string, number>;
  files: Map<string, number>;
}

export interface StatsSnapshot {
  authors: Map<string, AuthorStats>;
  files: Map<string, FileStats>;
  rules: Map<string, RuleStats>;
  warnings: string[];
}

// ============================================================================
// COLLABORATOR SEAMS
// ============================================================================

export interface IssueFilter {
  shouldIgnoreFile(filePath: string): boolean;
  shouldIgnoreRule(ruleId: string): boolean;
  shouldIgnoreAuthor(email: string, name: string): boolean;
}

/** Append-only sink for non-fatal failures. */
export interface WarningSink {
  warn(message: string): Promise<void>;
}

// ============================================================================
// HISTORY AND DERIVED METRICS
// ============================================================================

export interface ChurnEntry {
  path: string;
  changes: number;
  added: number;
  deleted: number;
  net: number;
}

export interface BugDensityEntry {
  path: string;
  totalCommits: number;
  bugFixes: number;
  /** Percentage, 0 to 100. */
  ratio: number;
}

export interface TechnicalDebtEntry {
  path: string;
  todo: number;
  fixme: number;
  hack: number;
  total: number;
}

export interface CommitCountEntry {
  email: string;
  name: string;
  commits: number;
  /** ISO-8601 strings as reported by git. */
  firstCommit: string;
  lastCommit: string;
}

export interface RecentContributorEntry {
  email: string;
  name: string;
  commits: number;
  lastCommit: string;
}

export interface LinesOfCodeEntry {
  path: string;
  lines: number;
  bytes: number;
}

export interface CoverageEntry {
  path: string;
  linesFound: number;
  linesHit: number;
  functionsFound: number;
  functionsHit: number;
  branchesFound: number;
  branchesHit: number;
  /** Line coverage percentage, 0 to 100. */
  percentage: number;
}

export interface CoverageReport {
  source: string;
  entries: CoverageEntry[];
  overall: number;
}

export interface SpellingFileEntry {
  path: string;
  totalWords: number;
  misspelled: number;
  /** Percentage of checked words that are misspelled. */
  errorRate: number;
  topMisspellings: Array<{ word: string; count: number; suggestion?: string }>;
}

export interface SpellingAuthorEntry {
  email: string;
  name: string;
  misspelled: number;
  files: number;
  /** Most frequent misspelling; ties go to the alphabetically first word. */
  topMistake: string;
  topMistakeCount: number;
}

export interface SpellingReport {
  files: SpellingFileEntry[];
  authors: SpellingAuthorEntry[];
}
