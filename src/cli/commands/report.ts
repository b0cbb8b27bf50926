/**
 * @fileoverview Report Command - build the requested leaderboards
 *
 * Run order: load config, validate the repository, list and filter tracked
 * files, collect lint issues (only for boards that need them), attribute
 * them through one shared blame service, then build each board.
 *
 * A git or coverage failure on a history board becomes a warning and the
 * board is left out. Repository, config and linter failures abort the run.
 *
 * Usage: lintboard [report] [DIRECTORY] --authors --files ... [--json]
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { runEslint as defaultRunEslint } from '../../adapters/eslint.js';
import { runRuff as defaultRunRuff } from '../../adapters/ruff.js';
import {
  attributeIssues,
  type AttributionSummary,
} from '../../analysis/attribution_pipeline.js';
import { IssueResolver } from '../../analysis/issue_resolver.js';
import { SpellChecker, analyzeSpelling, loadBundledDictionary } from '../../analysis/spellcheck.js';
import { StatsAggregator } from '../../analysis/stats_aggregator.js';
import { analyzeTechnicalDebt } from '../../analysis/technical_debt_analysis.js';
import { loadConfig, type ReportConfig } from '../../config/index.js';
import { CoverageError, GitCommandError } from '../../core/errors.js';
import { BlameService } from '../../ingest/blame_service.js';
import { analyzeBugDensity } from '../../ingest/bug_density_indexer.js';
import { analyzeChurn } from '../../ingest/churn_indexer.js';
import { analyzeCommitCounts, analyzeRecentContributors } from '../../ingest/contributor_indexer.js';
import { analyzeCoverage } from '../../ingest/coverage_indexer.js';
import { analyzeLinesOfCode } from '../../ingest/loc_indexer.js';
import { logDebug, logInfo } from '../../telemetry/logger.js';
import type { Issue } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { ExecaGitRunner, listTrackedFiles, validateRepository, type GitRunner } from '../../utils/git.js';
import { Semaphore } from '../../utils/semaphore.js';
import {
  buildAuthorBoard,
  buildFileBoard,
  buildRuleBoard,
  buildSummary,
  rankEntries,
} from '../../views/leaderboards.js';
import { formatReport, formatReportJson, type ReportDocument } from '../../views/report_format.js';
import { createError } from '../errors.js';
import { NO_PROGRESS, createProgressBar, formatDuration, type ProgressFactory } from '../progress.js';

// ============================================================================
// TYPES
// ============================================================================

export const BOARD_NAMES = [
  'authors',
  'files',
  'rules',
  'summary',
  'ruff',
  'loc',
  'commits',
  'recent',
  'coverage',
  'churn',
  'bugs',
  'debt',
  'spellcheck',
] as const;

export type BoardName = (typeof BOARD_NAMES)[number];

/** Boards fed by the ESLint attribution pipeline. */
const LINT_BOARDS: ReadonlySet<BoardName> = new Set(['authors', 'files', 'rules', 'summary']);

export interface ReportCommandOptions {
  workspace: string;
  boards: ReadonlySet<BoardName>;
  topN?: number;
  /** Extra rule ids from `--ignore`. */
  ignoreRules?: readonly string[];
  coverageFile?: string;
  configPath?: string;
  json?: boolean;
  quiet?: boolean;
  signal?: AbortSignal;
}

/** Seams for the subprocess-backed collaborators. */
export interface ReportDependencies {
  createRunner: (root: string) => GitRunner;
  runEslint: typeof defaultRunEslint;
  runRuff: typeof defaultRunRuff;
  createProgress: ProgressFactory;
  now: () => Date;
}

export const DEFAULT_REPORT_DEPENDENCIES: ReportDependencies = {
  createRunner: (root) => new ExecaGitRunner(root),
  runEslint: defaultRunEslint,
  runRuff: defaultRunRuff,
  createProgress: createProgressBar,
  now: () => new Date(),
};

// ============================================================================
// REPORT
// ============================================================================

async function resolveRepositoryRoot(workspace: string): Promise<string> {
  const root = path.resolve(workspace);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `Directory not found: ${root}`, { cause: getErrorMessage(error) });
  }
  if (!isDirectory) {
    throw createError('INVALID_ARGUMENT', `Not a directory: ${root}`);
  }
  return root;
}

function addSummaries(a: AttributionSummary, b: AttributionSummary): AttributionSummary {
  return {
    total: a.total + b.total,
    recorded: a.recorded + b.recorded,
    excluded: a.excluded + b.excluded,
    unattributed: a.unattributed + b.unattributed,
    failed: a.failed + b.failed,
  };
}

interface PipelineContext {
  resolver: IssueResolver;
  config: ReportConfig;
  deps: ReportDependencies;
  showProgress: boolean;
  signal?: AbortSignal;
}

async function runPipeline(
  issues: readonly Issue[],
  aggregator: StatsAggregator,
  task: string,
  context: PipelineContext
): Promise<AttributionSummary> {
  const progress = context.showProgress && issues.length > 0
    ? context.deps.createProgress(issues.length, task)
    : NO_PROGRESS;
  try {
    return await attributeIssues(issues, {
      resolver: context.resolver,
      aggregator,
      concurrency: context.config.concurrencyLimit(),
      filter: context.config,
      signal: context.signal,
      onProgress: (completed) => progress.update(completed),
    });
  } finally {
    progress.stop();
  }
}

/**
 * Build every requested board for the repository at `options.workspace`.
 *
 * @throws CliError for a missing directory
 * @throws RepositoryError, ConfigError or LinterError, which end the run
 */
export async function buildReport(
  options: ReportCommandOptions,
  deps: ReportDependencies = DEFAULT_REPORT_DEPENDENCIES
): Promise<ReportDocument> {
  const startedAt = Date.now();
  const { boards, topN, signal } = options;
  const wants = (board: BoardName): boolean => boards.has(board);

  const root = await resolveRepositoryRoot(options.workspace);
  const config = (await loadConfig(root, options.configPath)).withIgnoredRules(options.ignoreRules ?? []);
  const runner = deps.createRunner(root);
  await validateRepository(runner);

  const tracked = await config.filterTrackedFiles(root, await listTrackedFiles(runner));
  const trackedSet: ReadonlySet<string> = new Set(tracked);
  logDebug('[lintboard] tracked files', { root, count: tracked.length });

  // The lint aggregator doubles as the run's warning log.
  const aggregator = new StatsAggregator({ filter: config });
  const blame = new BlameService({
    runner,
    gate: new Semaphore(config.concurrencyLimit()),
    warnings: aggregator,
    timeoutMs: config.values.blameTimeoutMs,
  });
  const pipeline: PipelineContext = {
    resolver: new IssueResolver(blame),
    config,
    deps,
    showProgress: !options.quiet,
    signal,
  };

  const report: ReportDocument = {
    repository: root,
    generatedAt: deps.now().toISOString(),
    warnings: [],
  };

  const wantsLint = [...LINT_BOARDS].some(wants);
  if (wantsLint) {
    const issues = await deps.runEslint(root, {
      trackedFiles: trackedSet,
      ignoredRules: config.ignoredRuleSet,
      signal,
    });
    logInfo(`[lintboard] attributing ${issues.length} ESLint issues`);
    report.attribution = await runPipeline(issues, aggregator, 'Attributing ESLint issues', pipeline);
  }

  if (wants('ruff')) {
    if (config.values.ruff.enabled) {
      const ruffIssues = await deps.runRuff(root, tracked, {
        rules: config.values.ruff.rules,
        ignorePaths: config.values.ruff.ignorePaths,
        signal,
      });
      // Ruff issues get their own aggregate so they do not mix into the ESLint boards.
      const ruffAggregator = new StatsAggregator({ filter: config });
      const ruffSummary = await runPipeline(ruffIssues, ruffAggregator, 'Attributing ruff issues', pipeline);
      report.attribution = report.attribution ? addSummaries(report.attribution, ruffSummary) : ruffSummary;
      report.ruff = buildRuleBoard((await ruffAggregator.snapshot()).rules, topN);
    } else {
      await aggregator.warn('Ruff board skipped: ruff is disabled in the configuration');
    }
  }

  if (wantsLint) {
    const snapshot = await aggregator.snapshot();
    if (wants('authors')) report.authors = buildAuthorBoard(snapshot.authors, topN);
    if (wants('files')) report.files = buildFileBoard(snapshot.files, topN);
    if (wants('rules')) report.rules = buildRuleBoard(snapshot.rules, topN);
    if (wants('summary')) report.summary = buildSummary(snapshot.authors, snapshot.files, snapshot.rules);
  }

  /** History boards: git and coverage failures become warnings. */
  const optionalBoard = async <T>(label: string, build: () => Promise<T>): Promise<T | undefined> => {
    try {
      return await build();
    } catch (error) {
      if (error instanceof GitCommandError || error instanceof CoverageError) {
        await aggregator.warn(`${label} board skipped: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  };
  const keepAuthor = (entry: { email: string; name: string }): boolean =>
    !config.shouldIgnoreAuthor(entry.email, entry.name);

  if (wants('loc')) {
    report.linesOfCode = rankEntries(await analyzeLinesOfCode(root, tracked), topN);
  }
  if (wants('commits')) {
    const commits = await optionalBoard('Commits', () => analyzeCommitCounts(runner));
    if (commits) report.commits = rankEntries(commits.filter(keepAuthor), topN);
  }
  if (wants('recent')) {
    const recent = await optionalBoard('Recent contributors', () =>
      analyzeRecentContributors(runner, config.values.recentDays, deps.now())
    );
    if (recent) report.recentContributors = rankEntries(recent.filter(keepAuthor), topN);
  }
  if (wants('coverage')) {
    const coverage = await optionalBoard('Coverage', () => analyzeCoverage(root, trackedSet, options.coverageFile));
    if (coverage !== undefined) {
      report.coverage = coverage === null
        ? null
        : { source: coverage.source, overall: coverage.overall, entries: rankEntries(coverage.entries, topN) };
    }
  }
  if (wants('churn')) {
    const churn = await optionalBoard('Churn', () => analyzeChurn(runner, trackedSet));
    if (churn) report.churn = rankEntries(churn, topN);
  }
  if (wants('bugs')) {
    const bugs = await optionalBoard('Bug density', () =>
      analyzeBugDensity(runner, trackedSet, config.values.bugDensityMinCommits)
    );
    if (bugs) report.bugDensity = rankEntries(bugs, topN);
  }
  if (wants('debt')) {
    report.technicalDebt = rankEntries(await analyzeTechnicalDebt(root, tracked), topN);
  }
  if (wants('spellcheck')) {
    const settings = config.values.spellcheck;
    if (settings.enabled) {
      const spelling = await analyzeSpelling(root, tracked, {
        checker: new SpellChecker(await loadBundledDictionary(), settings.customWords),
        attributor: blame,
        concurrency: config.concurrencyLimit(),
        extensions: settings.extensions,
        ignorePaths: settings.ignorePaths,
        filter: config,
        signal,
      });
      report.spelling = {
        files: rankEntries(spelling.files, topN),
        authors: rankEntries(spelling.authors, topN),
      };
    } else {
      await aggregator.warn('Spelling board skipped: spellcheck is disabled in the configuration');
    }
  }

  report.warnings = (await aggregator.snapshot()).warnings;
  const stats = blame.stats();
  logInfo(`[lintboard] report built in ${formatDuration(Date.now() - startedAt)}`, {
    blamed: stats.invocations,
    blameFailures: stats.failed,
  });
  return report;
}

/** Render a report the way the command prints it. */
export function renderReport(report: ReportDocument, options: Pick<ReportCommandOptions, 'json' | 'quiet'>): string {
  if (options.json) {
    return formatReportJson(report);
  }
  return formatReport(options.quiet ? { ...report, warnings: [] } : report);
}

export async function reportCommand(
  options: ReportCommandOptions,
  write: (text: string) => void,
  deps: ReportDependencies = DEFAULT_REPORT_DEPENDENCIES
): Promise<void> {
  const report = await buildReport(options, deps);
  write(renderReport(report, options));
}
