/**
 * @fileoverview Spelling in code comments.
 *
 * Only comment text is checked: `//`, `#`, `/* ... *\/` on one line and
 * `<!-- ... -->`. Lines that are mostly symbols are skipped, as are words
 * shorter than four letters and words that look like identifiers.
 *
 * Per-author tallies come from the line-attribution service, gated by the
 * spell checker's own semaphore so a spelling pass cannot starve the lint
 * attribution pipeline of blame permits.
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { isAttributionError } from '../core/errors.js';
import { isNonSourceFile, readTrackedFile } from '../ingest/file_filters.js';
import { logDebug } from '../telemetry/logger.js';
import type {
  BlameIndex,
  IssueFilter,
  SpellingAuthorEntry,
  SpellingFileEntry,
  SpellingReport,
} from '../types.js';
import { FILE_SCAN_CONCURRENCY, mapWithConcurrency } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { Semaphore } from '../utils/semaphore.js';
import type { LineAttributor } from './issue_resolver.js';

// ============================================================================
// DICTIONARY
// ============================================================================

const DICTIONARY_URL = new URL('../../data/dictionary.json', import.meta.url);

const DictionaryFileSchema = z.object({
  words: z.array(z.string()),
  programmingTerms: z.array(z.string()),
  keywords: z.array(z.string()),
  typos: z.record(z.string()),
});

export type DictionaryFile = z.infer<typeof DictionaryFileSchema>;

export interface SpellingDictionary {
  words: ReadonlySet<string>;
  /** Known misspelling → correction. */
  typos: ReadonlyMap<string, string>;
}

export function buildDictionary(file: DictionaryFile): SpellingDictionary {
  const words = new Set<string>();
  for (const word of [...file.words, ...file.programmingTerms, ...file.keywords]) {
    words.add(word.toLowerCase());
  }
  const typos = new Map<string, string>();
  for (const [typo, correction] of Object.entries(file.typos)) {
    typos.set(typo.toLowerCase(), correction);
  }
  return { words, typos };
}

let bundled: Promise<SpellingDictionary> | undefined;

/** The dictionary shipped in `data/dictionary.json`, read once per process. */
export function loadBundledDictionary(): Promise<SpellingDictionary> {
  bundled ??= fs.readFile(DICTIONARY_URL, 'utf8').then((content) =>
    buildDictionary(DictionaryFileSchema.parse(JSON.parse(content)))
  );
  return bundled;
}

// ============================================================================
// CHECKER
// ============================================================================

const MAX_SUGGESTIONS = 3;

export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

export class SpellChecker {
  private readonly customWords: ReadonlySet<string>;

  constructor(
    private readonly dictionary: SpellingDictionary,
    customWords: Iterable<string> = []
  ) {
    this.customWords = new Set([...customWords].map((word) => word.toLowerCase()));
  }

  isCorrect(word: string): boolean {
    const lower = word.toLowerCase();
    return this.customWords.has(lower)
      || this.dictionary.words.has(lower)
      || lower.includes('http')
      || lower.includes('www');
  }

  /** Typo-table correction first, then dictionary words one edit away. */
  suggest(word: string): string[] {
    const lower = word.toLowerCase();
    const suggestions: string[] = [];
    const known = this.dictionary.typos.get(lower);
    if (known) suggestions.push(known);

    for (const candidate of this.dictionary.words) {
      if (suggestions.length >= MAX_SUGGESTIONS) break;
      if (candidate.length !== lower.length || suggestions.includes(candidate)) continue;
      if (levenshteinDistance(lower, candidate) === 1) suggestions.push(candidate);
    }
    return suggestions;
  }
}

// ============================================================================
// TEXT EXTRACTION
// ============================================================================

const COMMENT_PATTERN = /\/\/\s*(.+)|\/\*((?:[^*]|\*[^/])*)\*\/|#\s*(.+)|<!--([^>]*)-->/g;
const WORD_PATTERN = /[a-zA-Z]+/g;
const MIN_WORD_LENGTH = 4;

/** Blank lines and lines where more than half the characters are symbols. */
export function isCodeLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length === 0) return true;
  let symbols = 0;
  for (const char of trimmed) {
    if (!/\p{L}|\s/u.test(char)) symbols += 1;
  }
  return symbols / trimmed.length > 0.5;
}

/**
 * camelCase, anything with a digit, and ALL-CAPS words. A capitalised
 * sentence word ("Returns") is not code.
 */
export function isLikelyCode(word: string): boolean {
  if (/\d/.test(word)) return true;
  if (word.length > 1 && word === word.toUpperCase()) return true;
  return word.length < 20 && /[a-z]/.test(word) && /[A-Z]/.test(word.slice(1));
}

/** Comment bodies on one line, each longer than three characters. */
export function extractCommentText(line: string): string[] {
  const texts: string[] = [];
  for (const match of line.matchAll(COMMENT_PATTERN)) {
    for (const group of match.slice(1)) {
      if (group && group.trim().length > 3) texts.push(group);
    }
  }
  return texts;
}

export function extractCheckableWords(text: string): string[] {
  return (text.match(WORD_PATTERN) ?? []).filter(
    (word) => word.length >= MIN_WORD_LENGTH && !isLikelyCode(word)
  );
}

// ============================================================================
// FILE ANALYSIS
// ============================================================================

const TOP_MISSPELLINGS = 5;

export interface FileSpelling {
  entry: SpellingFileEntry;
  /** 1-based line → misspelled words on it, lower-cased. */
  misspelledLines: Map<number, string[]>;
}

export function checkFileSpelling(filePath: string, content: string, checker: SpellChecker): FileSpelling {
  let totalWords = 0;
  let misspelled = 0;
  const byWord = new Map<string, number>();
  const misspelledLines = new Map<number, string[]>();

  content.split(/\r?\n/).forEach((line, index) => {
    if (isCodeLine(line)) return;
    for (const text of extractCommentText(line)) {
      for (const word of extractCheckableWords(text)) {
        totalWords += 1;
        if (checker.isCorrect(word)) continue;
        misspelled += 1;
        const lower = word.toLowerCase();
        byWord.set(lower, (byWord.get(lower) ?? 0) + 1);
        const onLine = misspelledLines.get(index + 1);
        if (onLine) {
          onLine.push(lower);
        } else {
          misspelledLines.set(index + 1, [lower]);
        }
      }
    }
  });

  const topMisspellings = [...byWord.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, TOP_MISSPELLINGS)
    .map(([word, count]) => {
      const suggestion = checker.suggest(word)[0];
      return suggestion ? { word, count, suggestion } : { word, count };
    });

  return {
    entry: {
      path: filePath,
      totalWords,
      misspelled,
      errorRate: totalWords > 0 ? (misspelled / totalWords) * 100 : 0,
      topMisspellings,
    },
    misspelledLines,
  };
}

export interface SpellingScope {
  /** Extensions to check, with the leading dot. Compared case-insensitively. */
  extensions: readonly string[];
  /** Substrings of paths to leave out. */
  ignorePaths: readonly string[];
}

export function isSpellCheckFile(filePath: string, scope: SpellingScope): boolean {
  if (isNonSourceFile(filePath)) return false;
  if (scope.ignorePaths.some((fragment) => filePath.includes(fragment))) return false;
  const lower = filePath.toLowerCase();
  return scope.extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

export interface AnalyzeSpellingOptions extends SpellingScope {
  checker: SpellChecker;
  attributor: LineAttributor;
  /** Blame permits for this pass. Separate from the lint pipeline's gate. */
  concurrency: number;
  filter?: Pick<IssueFilter, 'shouldIgnoreAuthor'>;
  signal?: AbortSignal;
}

/**
 * Check comments in every tracked file in scope. Files without checkable
 * words are omitted; the rest are sorted by error rate. Authors are credited
 * per misspelled line; a file whose attribution fails still counts toward
 * the file board.
 */
export async function analyzeSpelling(
  root: string,
  trackedFiles: Iterable<string>,
  options: AnalyzeSpellingOptions
): Promise<SpellingReport> {
  const gate = new Semaphore(options.concurrency);
  const authors = new Map<string, AuthorMistakes>();
  const candidates = [...trackedFiles].filter((file) => isSpellCheckFile(file, options));

  const scanned = await mapWithConcurrency(candidates, FILE_SCAN_CONCURRENCY, async (file) => {
    options.signal?.throwIfAborted();
    const content = await readTrackedFile(root, file);
    if (!content) return null;
    const result = checkFileSpelling(file, content.toString('utf8'), options.checker);
    if (result.misspelledLines.size > 0) {
      await creditAuthors(file, result.misspelledLines, options, gate, authors);
    }
    return result.entry;
  });

  const files = scanned
    .filter((entry): entry is SpellingFileEntry => entry !== null && entry.totalWords > 0)
    .sort((a, b) => b.errorRate - a.errorRate || b.misspelled - a.misspelled || a.path.localeCompare(b.path));

  const authorEntries: SpellingAuthorEntry[] = [...authors.entries()]
    .map(([email, stats]) => {
      const top = mostFrequent(stats.words);
      return {
        email,
        name: stats.name,
        misspelled: stats.misspelled,
        files: stats.files.size,
        topMistake: top.word,
        topMistakeCount: top.count,
      };
    })
    .sort((a, b) => b.misspelled - a.misspelled || a.email.localeCompare(b.email));

  logDebug('[lintboard] spelling pass complete', { files: files.length, authors: authorEntries.length });
  return { files, authors: authorEntries };
}

interface AuthorMistakes {
  name: string;
  misspelled: number;
  files: Set<string>;
  words: Map<string, number>;
}

function mostFrequent(words: ReadonlyMap<string, number>): { word: string; count: number } {
  let best = { word: '', count: 0 };
  for (const [word, count] of words) {
    if (count > best.count || (count === best.count && word.localeCompare(best.word) < 0)) {
      best = { word, count };
    }
  }
  return best;
}

async function creditAuthors(
  file: string,
  misspelledLines: ReadonlyMap<number, readonly string[]>,
  options: AnalyzeSpellingOptions,
  gate: Semaphore,
  authors: Map<string, AuthorMistakes>
): Promise<void> {
  let index: BlameIndex;
  try {
    index = await options.attributor.attribute(file, { gate, signal: options.signal });
  } catch (error) {
    if (!isAttributionError(error)) throw error;
    logDebug('[lintboard] spelling without authors', { file, error: getErrorMessage(error) });
    return;
  }

  for (const [line, words] of misspelledLines) {
    const blame = index.get(line);
    if (!blame || options.filter?.shouldIgnoreAuthor(blame.email, blame.name)) continue;
    const stats = authors.get(blame.email) ?? {
      name: blame.name,
      misspelled: 0,
      files: new Set<string>(),
      words: new Map<string, number>(),
    };
    stats.name = blame.name || stats.name;
    stats.misspelled += words.length;
    stats.files.add(file);
    for (const word of words) {
      stats.words.set(word, (stats.words.get(word) ?? 0) + 1);
    }
    authors.set(blame.email, stats);
  }
}
