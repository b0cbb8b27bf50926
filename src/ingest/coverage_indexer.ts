/**
 * @fileoverview Coverage report ingestion (LCOV and Istanbul JSON).
 *
 * Reports are matched against the tracked-file set by repository-relative
 * path. Entries are sorted by ascending line coverage so the least covered
 * files come first.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { CoverageError } from '../core/errors.js';
import type { CoverageEntry, CoverageReport } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizePath } from '../utils/git.js';

// ============================================================================
// TYPES
// ============================================================================

export type FileCoverage = Omit<CoverageEntry, 'path' | 'percentage'>;

/** Keyed by the path exactly as the report wrote it. */
export type CoverageData = Map<string, FileCoverage>;

export const COVERAGE_FILE_CANDIDATES = [
  'coverage/lcov.info',
  'coverage/coverage.info',
  'lcov.info',
  'coverage.info',
  'coverage/coverage-final.json',
  'coverage-final.json',
  'nyc_output/coverage-final.json',
  '.nyc_output/coverage-final.json',
] as const;

function emptyCoverage(): FileCoverage {
  return {
    linesFound: 0,
    linesHit: 0,
    functionsFound: 0,
    functionsHit: 0,
    branchesFound: 0,
    branchesHit: 0,
  };
}

// ============================================================================
// LCOV
// ============================================================================

const LCOV_COUNTERS: Record<string, keyof FileCoverage> = {
  LF: 'linesFound',
  LH: 'linesHit',
  FNF: 'functionsFound',
  FNH: 'functionsHit',
  BRF: 'branchesFound',
  BRH: 'branchesHit',
};

export function parseLcov(content: string): CoverageData {
  const files: CoverageData = new Map();
  let currentPath = '';
  let current = emptyCoverage();

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('SF:')) {
      currentPath = line.slice(3);
      current = emptyCoverage();
      continue;
    }
    if (line === 'end_of_record') {
      if (currentPath) files.set(currentPath, current);
      currentPath = '';
      continue;
    }
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const field = LCOV_COUNTERS[line.slice(0, colon)];
    const value = Number.parseInt(line.slice(colon + 1), 10);
    if (field && Number.isFinite(value)) {
      current[field] = value;
    }
  }
  return files;
}

// ============================================================================
// ISTANBUL
// ============================================================================

const PositionSchema = z.object({ line: z.number().int() });
const LocationSchema = z.object({ start: PositionSchema, end: PositionSchema });

const IstanbulFileSchema = z.object({
  path: z.string().optional(),
  statementMap: z.record(LocationSchema),
  s: z.record(z.number()),
  f: z.record(z.number()).default({}),
  b: z.record(z.array(z.number())).default({}),
});

export const IstanbulReportSchema = z.record(IstanbulFileSchema);

export function parseIstanbulJson(content: string, source = 'coverage-final.json'): CoverageData {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new CoverageError(source, `invalid JSON: ${getErrorMessage(error)}`);
  }
  const parsed = IstanbulReportSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new CoverageError(source, details.join('; '));
  }

  const files: CoverageData = new Map();
  for (const [key, file] of Object.entries(parsed.data)) {
    // A line is covered when any statement starting on it ran.
    const lineHits = new Map<number, number>();
    for (const [id, location] of Object.entries(file.statementMap)) {
      const count = file.s[id] ?? 0;
      const line = location.start.line;
      lineHits.set(line, Math.max(lineHits.get(line) ?? 0, count));
    }
    const functionCounts = Object.values(file.f);
    const branchCounts = Object.values(file.b).flat();

    files.set(file.path ?? key, {
      linesFound: lineHits.size,
      linesHit: [...lineHits.values()].filter((count) => count > 0).length,
      functionsFound: functionCounts.length,
      functionsHit: functionCounts.filter((count) => count > 0).length,
      branchesFound: branchCounts.length,
      branchesHit: branchCounts.filter((count) => count > 0).length,
    });
  }
  return files;
}

// ============================================================================
// DETECTION AND LOADING
// ============================================================================

export async function detectCoverageFile(root: string): Promise<string | null> {
  for (const candidate of COVERAGE_FILE_CANDIDATES) {
    try {
      await fs.access(path.join(root, candidate));
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

export function parseCoverage(content: string, source: string): CoverageData {
  const ext = path.extname(source).toLowerCase();
  if (ext === '.info') return parseLcov(content);
  if (ext === '.json') return parseIstanbulJson(content, source);

  const firstLine = content.trimStart().split('\n', 1)[0] ?? '';
  if (firstLine.startsWith('TN:') || firstLine.startsWith('SF:')) return parseLcov(content);
  if (firstLine.startsWith('{')) return parseIstanbulJson(content, source);
  throw new CoverageError(source, 'unrecognised format (expected LCOV or Istanbul JSON)');
}

function toRepositoryPath(root: string, reported: string): string {
  const relative = path.isAbsolute(reported) ? path.relative(root, reported) : reported;
  return normalizePath(relative).replace(/^\.\//, '');
}

/**
 * Restrict coverage to tracked files. `overall` is hit lines over found
 * lines across the kept entries, as a percentage.
 */
export function summarizeCoverage(
  data: CoverageData,
  trackedFiles: ReadonlySet<string>,
  root: string,
  source: string
): CoverageReport {
  const entries: CoverageEntry[] = [];
  for (const [reported, coverage] of data) {
    const repoPath = toRepositoryPath(root, reported);
    if (!trackedFiles.has(repoPath)) continue;
    const percentage = coverage.linesFound > 0 ? (coverage.linesHit / coverage.linesFound) * 100 : 0;
    entries.push({ path: repoPath, ...coverage, percentage });
  }
  entries.sort((a, b) => a.percentage - b.percentage || a.path.localeCompare(b.path));

  const found = entries.reduce((sum, entry) => sum + entry.linesFound, 0);
  const hit = entries.reduce((sum, entry) => sum + entry.linesHit, 0);
  return { source, entries, overall: found > 0 ? (hit / found) * 100 : 0 };
}

/**
 * Load `coverageFile` (relative to `root`), or the first report found in the
 * usual locations. Resolves null when no report exists.
 */
export async function analyzeCoverage(
  root: string,
  trackedFiles: ReadonlySet<string>,
  coverageFile?: string
): Promise<CoverageReport | null> {
  const source = coverageFile ?? await detectCoverageFile(root);
  if (!source) return null;

  let content: string;
  try {
    content = await fs.readFile(path.resolve(root, source), 'utf8');
  } catch (error) {
    throw new CoverageError(source, getErrorMessage(error));
  }
  return summarizeCoverage(parseCoverage(content, source), trackedFiles, root, source);
}
