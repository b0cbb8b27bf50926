/**
 * @fileoverview Text and JSON rendering of a report.
 *
 * Boards render as plain aligned tables. Colour and ASCII art are left to
 * whatever consumes the JSON form.
 */

import type { AttributionSummary } from '../analysis/attribution_pipeline.js';
import type {
  BugDensityEntry,
  ChurnEntry,
  CommitCountEntry,
  CoverageEntry,
  LinesOfCodeEntry,
  RecentContributorEntry,
  SpellingAuthorEntry,
  SpellingFileEntry,
  TechnicalDebtEntry,
} from '../types.js';
import type { AuthorBoardRow, FileBoardRow, Ranked, RuleBoardRow, SummaryStats } from './leaderboards.js';

// ============================================================================
// DOCUMENT
// ============================================================================

export interface CoverageBoard {
  source: string;
  overall: number;
  entries: Array<Ranked<CoverageEntry>>;
}

export interface SpellingBoard {
  files: Array<Ranked<SpellingFileEntry>>;
  authors: Array<Ranked<SpellingAuthorEntry>>;
}

/** Everything one `report` run produced. Boards that were not requested are absent. */
export interface ReportDocument {
  repository: string;
  generatedAt: string;
  attribution?: AttributionSummary;
  authors?: AuthorBoardRow[];
  files?: FileBoardRow[];
  rules?: RuleBoardRow[];
  ruff?: RuleBoardRow[];
  linesOfCode?: Array<Ranked<LinesOfCodeEntry>>;
  commits?: Array<Ranked<CommitCountEntry>>;
  recentContributors?: Array<Ranked<RecentContributorEntry>>;
  /** Null when no coverage report was found. */
  coverage?: CoverageBoard | null;
  churn?: Array<Ranked<ChurnEntry>>;
  bugDensity?: Array<Ranked<BugDensityEntry>>;
  technicalDebt?: Array<Ranked<TechnicalDebtEntry>>;
  spelling?: SpellingBoard;
  summary?: SummaryStats;
  warnings: string[];
}

// ============================================================================
// FORMATTING HELPERS
// ============================================================================

export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const render = (cells: readonly string[]): string =>
    widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join(' | ').trimEnd();

  return [
    render(headers),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...rows.map(render),
  ].join('\n');
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function ratio(hit: number, found: number): string {
  return found > 0 ? formatPercent((hit / found) * 100) : '-';
}

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function day(iso: string): string {
  return iso.slice(0, 10);
}

// ============================================================================
// SECTIONS
// ============================================================================

interface Column<T> {
  header: string;
  value: (row: T) => string | number;
}

interface Section<T> {
  title: string;
  empty: string;
  columns: ReadonlyArray<Column<T>>;
}

function renderSection<T>(section: Section<T>, rows: readonly T[]): string {
  const heading = `${section.title}\n${'='.repeat(section.title.length)}`;
  if (rows.length === 0) {
    return `${heading}\n${section.empty}`;
  }
  const table = formatTable(
    section.columns.map((column) => column.header),
    rows.map((row) => section.columns.map((column) => String(column.value(row))))
  );
  return `${heading}\n${table}`;
}

const rank = <T extends { rank: number }>(): Column<T> => ({ header: '#', value: (row) => row.rank });

const AUTHOR_SECTION: Section<AuthorBoardRow> = {
  title: 'Authors by lint issues',
  empty: 'No attributed issues.',
  columns: [
    rank(),
    { header: 'Author', value: (row) => row.name },
    { header: 'Email', value: (row) => row.email },
    { header: 'Issues', value: (row) => row.count },
    { header: 'Errors', value: (row) => row.errors },
    { header: 'Warnings', value: (row) => row.warnings },
    { header: 'Files', value: (row) => row.files },
    { header: 'Top rule', value: (row) => `${row.topRule} (${row.topRuleCount})` },
  ],
};

const FILE_SECTION: Section<FileBoardRow> = {
  title: 'Files by lint issues',
  empty: 'No attributed issues.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Issues', value: (row) => row.count },
    { header: 'Authors', value: (row) => row.authors },
    { header: 'Top rule', value: (row) => `${row.topRule} (${row.topRuleCount})` },
  ],
};

const ruleSection = (title: string): Section<RuleBoardRow> => ({
  title,
  empty: 'No rule violations.',
  columns: [
    rank(),
    { header: 'Rule', value: (row) => row.rule },
    { header: 'Issues', value: (row) => row.count },
    { header: 'Authors', value: (row) => row.authors },
    { header: 'Files', value: (row) => row.files },
  ],
});

const LOC_SECTION: Section<Ranked<LinesOfCodeEntry>> = {
  title: 'Lines of code',
  empty: 'No source files.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Lines', value: (row) => row.lines },
    { header: 'Size', value: (row) => formatBytes(row.bytes) },
  ],
};

const COMMITS_SECTION: Section<Ranked<CommitCountEntry>> = {
  title: 'Commits by author',
  empty: 'No commits.',
  columns: [
    rank(),
    { header: 'Author', value: (row) => row.name },
    { header: 'Email', value: (row) => row.email },
    { header: 'Commits', value: (row) => row.commits },
    { header: 'First', value: (row) => day(row.firstCommit) },
    { header: 'Last', value: (row) => day(row.lastCommit) },
  ],
};

const RECENT_SECTION: Section<Ranked<RecentContributorEntry>> = {
  title: 'Recent contributors',
  empty: 'No recent commits.',
  columns: [
    rank(),
    { header: 'Author', value: (row) => row.name },
    { header: 'Email', value: (row) => row.email },
    { header: 'Commits', value: (row) => row.commits },
    { header: 'Last', value: (row) => day(row.lastCommit) },
  ],
};

const COVERAGE_SECTION: Section<Ranked<CoverageEntry>> = {
  title: 'Least covered files',
  empty: 'No coverage data for tracked files.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Lines', value: (row) => formatPercent(row.percentage) },
    { header: 'Hit/Found', value: (row) => `${row.linesHit}/${row.linesFound}` },
    { header: 'Functions', value: (row) => ratio(row.functionsHit, row.functionsFound) },
    { header: 'Branches', value: (row) => ratio(row.branchesHit, row.branchesFound) },
  ],
};

const CHURN_SECTION: Section<Ranked<ChurnEntry>> = {
  title: 'Code churn',
  empty: 'No history for tracked files.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Changes', value: (row) => row.changes },
    { header: 'Added', value: (row) => `+${row.added}` },
    { header: 'Deleted', value: (row) => `-${row.deleted}` },
    { header: 'Net', value: (row) => signed(row.net) },
  ],
};

const BUG_SECTION: Section<Ranked<BugDensityEntry>> = {
  title: 'Bug density',
  empty: 'No files with enough commits.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Bug fixes', value: (row) => row.bugFixes },
    { header: 'Commits', value: (row) => row.totalCommits },
    { header: 'Ratio', value: (row) => formatPercent(row.ratio) },
  ],
};

const DEBT_SECTION: Section<Ranked<TechnicalDebtEntry>> = {
  title: 'Technical debt',
  empty: 'No TODO, FIXME or HACK markers.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'TODO', value: (row) => row.todo },
    { header: 'FIXME', value: (row) => row.fixme },
    { header: 'HACK', value: (row) => row.hack },
    { header: 'Total', value: (row) => row.total },
  ],
};

const SPELLING_FILE_SECTION: Section<Ranked<SpellingFileEntry>> = {
  title: 'Spelling by file',
  empty: 'No comments to check.',
  columns: [
    rank(),
    { header: 'File', value: (row) => row.path },
    { header: 'Misspelled', value: (row) => row.misspelled },
    { header: 'Words', value: (row) => row.totalWords },
    { header: 'Error rate', value: (row) => formatPercent(row.errorRate) },
    {
      header: 'Top misspellings',
      value: (row) => row.topMisspellings
        .map((m) => `${m.word} x${m.count}${m.suggestion ? ` -> ${m.suggestion}` : ''}`)
        .join(', '),
    },
  ],
};

const SPELLING_AUTHOR_SECTION: Section<Ranked<SpellingAuthorEntry>> = {
  title: 'Spelling by author',
  empty: 'No attributed misspellings.',
  columns: [
    rank(),
    { header: 'Author', value: (row) => row.name },
    { header: 'Email', value: (row) => row.email },
    { header: 'Misspelled', value: (row) => row.misspelled },
    { header: 'Files', value: (row) => row.files },
    { header: 'Top mistake', value: (row) => `${row.topMistake} (${row.topMistakeCount})` },
  ],
};

export function formatSummary(summary: SummaryStats): string {
  const average = (value: number | null): string => (value === null ? 'n/a' : value.toFixed(1));
  const items: Array<[string, string | number]> = [
    ['Total issues', summary.totalIssues],
    ['Errors', summary.errors],
    ['Warnings', summary.warnings],
    ['Authors with issues', summary.authors],
    ['Files with issues', summary.files],
    ['Distinct rules', summary.rules],
    ['Issues per author', average(summary.averagePerAuthor)],
    ['Issues per file', average(summary.averagePerFile)],
  ];
  const width = Math.max(...items.map(([key]) => key.length));
  return ['Summary', '=======', ...items.map(([key, value]) => `${key.padEnd(width)} : ${value}`)].join('\n');
}

// ============================================================================
// REPORT
// ============================================================================

/** Human-readable report. Sections appear in a fixed order. */
export function formatReport(report: ReportDocument): string {
  const sections: string[] = [`lintboard report for ${report.repository}`];

  if (report.attribution) {
    const a = report.attribution;
    sections.push(
      `Attributed ${a.recorded} of ${a.total} issues (${a.excluded} excluded, ${a.unattributed} unattributed, ${a.failed} failed)`
    );
  }
  if (report.authors) sections.push(renderSection(AUTHOR_SECTION, report.authors));
  if (report.files) sections.push(renderSection(FILE_SECTION, report.files));
  if (report.rules) sections.push(renderSection(ruleSection('Rules by violations'), report.rules));
  if (report.ruff) sections.push(renderSection(ruleSection('Ruff rules by violations'), report.ruff));
  if (report.linesOfCode) sections.push(renderSection(LOC_SECTION, report.linesOfCode));
  if (report.commits) sections.push(renderSection(COMMITS_SECTION, report.commits));
  if (report.recentContributors) sections.push(renderSection(RECENT_SECTION, report.recentContributors));
  if (report.coverage === null) {
    sections.push(`${COVERAGE_SECTION.title}\n${'='.repeat(COVERAGE_SECTION.title.length)}\nNo coverage report found.`);
  } else if (report.coverage) {
    sections.push(
      `${renderSection(COVERAGE_SECTION, report.coverage.entries)}\nOverall: ${formatPercent(report.coverage.overall)} (${report.coverage.source})`
    );
  }
  if (report.churn) sections.push(renderSection(CHURN_SECTION, report.churn));
  if (report.bugDensity) sections.push(renderSection(BUG_SECTION, report.bugDensity));
  if (report.technicalDebt) sections.push(renderSection(DEBT_SECTION, report.technicalDebt));
  if (report.spelling) {
    sections.push(renderSection(SPELLING_FILE_SECTION, report.spelling.files));
    sections.push(renderSection(SPELLING_AUTHOR_SECTION, report.spelling.authors));
  }
  if (report.summary) sections.push(formatSummary(report.summary));
  if (report.warnings.length > 0) {
    sections.push(['Warnings', '========', ...report.warnings.map((w) => `  ${w}`)].join('\n'));
  }

  return `${sections.join('\n\n')}\n`;
}

export function formatReportJson(report: ReportDocument): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
