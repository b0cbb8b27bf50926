/**
 * @fileoverview lintboard - lint leaderboards attributed through git blame
 *
 * ## Quick Start
 *
 * ```typescript
 * import { buildReport, formatReport } from 'lintboard';
 *
 * const report = await buildReport({
 *   workspace: '/path/to/repo',
 *   boards: new Set(['authors', 'summary']),
 * });
 * process.stdout.write(formatReport(report));
 * ```
 *
 * The lower-level pieces (blame service, resolver, aggregator, pipeline) are
 * exported for callers that bring their own issues.
 *
 * @packageDocumentation
 */

// Types
export type * from './types.js';
export { ERROR_SEVERITY } from './types.js';

// Errors
export {
  LintboardError,
  GitCommandError,
  RepositoryError,
  AttributionError,
  ConfigError,
  LinterError,
  CoverageError,
  isLintboardError,
  isAttributionError,
  type AttributionFailureReason,
  type ErrorJSON,
  type LinterName,
  type LinterPhase,
} from './core/errors.js';
export { getErrorMessage } from './utils/errors.js';

// Concurrency
export { Semaphore, Mutex } from './utils/semaphore.js';

// Git
export {
  ExecaGitRunner,
  listTrackedFiles,
  normalizePath,
  validateRepository,
  type GitRunOptions,
  type GitRunner,
} from './utils/git.js';

// Attribution
export { parseBlameOutput } from './ingest/blame_indexer.js';
export {
  BlameService,
  DEFAULT_BLAME_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENT_BLAME,
  type AttributeOptions,
  type BlameServiceOptions,
  type BlameServiceStats,
} from './ingest/blame_service.js';
export { IssueResolver, nearestAttributedLine, type LineAttributor, type Resolution } from './analysis/issue_resolver.js';
export { StatsAggregator, type StatsAggregatorOptions } from './analysis/stats_aggregator.js';
export {
  attributeIssues,
  type AttributionPipelineOptions,
  type AttributionSummary,
} from './analysis/attribution_pipeline.js';

// History and derived metrics
export { readCommitLog, parseGitLog, isBugFixMessage, type CommitRecord } from './ingest/commit_indexer.js';
export { analyzeChurn, computeChurn } from './ingest/churn_indexer.js';
export { analyzeBugDensity, computeBugDensity, DEFAULT_BUG_DENSITY_MIN_COMMITS } from './ingest/bug_density_indexer.js';
export {
  analyzeCommitCounts,
  analyzeRecentContributors,
  countCommitsByAuthor,
  DEFAULT_RECENT_DAYS,
} from './ingest/contributor_indexer.js';
export { analyzeLinesOfCode, countLines } from './ingest/loc_indexer.js';
export { analyzeCoverage, parseCoverage, parseLcov, parseIstanbulJson } from './ingest/coverage_indexer.js';
export { analyzeTechnicalDebt, countDebtMarkers } from './analysis/technical_debt_analysis.js';
export {
  SpellChecker,
  analyzeSpelling,
  buildDictionary,
  loadBundledDictionary,
  type SpellingDictionary,
} from './analysis/spellcheck.js';

// Linters
export { parseEslintReport, runEslint } from './adapters/eslint.js';
export { parseRuffReport, runRuff } from './adapters/ruff.js';

// Configuration
export { ReportConfig, loadConfig, parseConfig, writeSampleConfig, type LintboardConfig } from './config/index.js';

// Boards and rendering
export {
  buildAuthorBoard,
  buildFileBoard,
  buildRuleBoard,
  buildSummary,
  rankEntries,
  type AuthorBoardRow,
  type FileBoardRow,
  type Ranked,
  type RuleBoardRow,
  type SummaryStats,
} from './views/leaderboards.js';
export { formatReport, formatReportJson, type ReportDocument } from './views/report_format.js';
export { buildReport, BOARD_NAMES, type BoardName, type ReportCommandOptions } from './cli/commands/report.js';

// Logging
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
