import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AttributionError } from '../../core/errors.js';
import type { AttributeOptions } from '../../ingest/blame_service.js';
import type { BlameIndex, BlameInfo } from '../../types.js';
import { Semaphore } from '../../utils/semaphore.js';
import type { LineAttributor } from '../issue_resolver.js';
import {
  SpellChecker,
  analyzeSpelling,
  buildDictionary,
  checkFileSpelling,
  extractCheckableWords,
  extractCommentText,
  isCodeLine,
  isLikelyCode,
  levenshteinDistance,
  loadBundledDictionary,
} from '../spellcheck.js';
import { cleanupWorkspace, createWorkspaceWithFiles } from '../../__tests__/helpers/index.js';

const dictionary = buildDictionary({
  words: ['the', 'value', 'return', 'returns', 'cache', 'handle', 'check'],
  programmingTerms: ['json'],
  keywords: ['function'],
  typos: { recieve: 'receive' },
});

const SAMPLE = [
  '// Returns the cached value',
  'const total = computeTotal(items);',
  '/* recieve the value */',
  '// recieve and chack',
  '}}}}',
].join('\n');

const alice: BlameInfo = { name: 'Alice', email: 'alice@x' };
const bob: BlameInfo = { name: 'Bob', email: 'bob@x' };

class FakeAttributor implements LineAttributor {
  readonly calls: Array<{ filePath: string; options?: AttributeOptions }> = [];

  constructor(private readonly indexes: Record<string, BlameIndex | Error>) {}

  async attribute(filePath: string, options?: AttributeOptions): Promise<BlameIndex> {
    this.calls.push({ filePath, options });
    const result = this.indexes[filePath];
    if (result instanceof Error) throw result;
    return result ?? new Map();
  }
}

describe('spellcheck', () => {
  const checker = new SpellChecker(dictionary, ['LintBoard']);

  describe('SpellChecker', () => {
    it('should accept dictionary, custom and URL-like words in any case', () => {
      expect(checker.isCorrect('Value')).toBe(true);
      expect(checker.isCorrect('lintboard')).toBe(true);
      expect(checker.isCorrect('https')).toBe(true);
      expect(checker.isCorrect('recieve')).toBe(false);
    });

    it('should suggest the typo-table correction before near dictionary words', () => {
      expect(checker.suggest('recieve')).toEqual(['receive']);
      expect(checker.suggest('chack')).toEqual(['check']);
      expect(checker.suggest('zzzzzz')).toEqual([]);
    });

    it('should compute edit distance', () => {
      expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
      expect(levenshteinDistance('', 'abc')).toBe(3);
      expect(levenshteinDistance('same', 'same')).toBe(0);
    });

    it('should load the bundled dictionary', async () => {
      const bundled = new SpellChecker(await loadBundledDictionary());

      expect(bundled.isCorrect('function')).toBe(true);
      expect(bundled.suggest('recieve')[0]).toBe('receive');
    });
  });

  describe('text extraction', () => {
    it('should treat blank and symbol-heavy lines as code', () => {
      expect(isCodeLine('   ')).toBe(true);
      expect(isCodeLine('}); // x')).toBe(true);
      expect(isCodeLine('// returns the value')).toBe(false);
    });

    it('should flag identifiers but not capitalised words', () => {
      expect(isLikelyCode('parseJson')).toBe(true);
      expect(isLikelyCode('HTTP')).toBe(true);
      expect(isLikelyCode('abc1')).toBe(true);
      expect(isLikelyCode('Returns')).toBe(false);
    });

    it('should pull comment bodies out of each comment style', () => {
      expect(extractCommentText('const x = 1; // handle the value')).toEqual(['handle the value']);
      expect(extractCommentText('/* cache check */')).toEqual([' cache check ']);
      expect(extractCommentText('<!-- recieve it -->')).toEqual([' recieve it ']);
      expect(extractCommentText('# ok')).toEqual([]);
    });

    it('should keep words of four or more letters that are not code', () => {
      expect(extractCheckableWords('Returns the parseJson value of HTTP')).toEqual(['Returns', 'value']);
    });
  });

  describe('checkFileSpelling', () => {
    it('should count checked and misspelled words per line', () => {
      const { entry, misspelledLines } = checkFileSpelling('src/a.js', SAMPLE, checker);

      expect(entry).toEqual({
        path: 'src/a.js',
        totalWords: 7,
        misspelled: 4,
        errorRate: (4 / 7) * 100,
        topMisspellings: [
          { word: 'recieve', count: 2, suggestion: 'receive' },
          { word: 'cached', count: 1 },
          { word: 'chack', count: 1, suggestion: 'check' },
        ],
      });
      expect([...misspelledLines]).toEqual([
        [1, ['cached']],
        [3, ['recieve']],
        [4, ['recieve', 'chack']],
      ]);
    });
  });

  describe('analyzeSpelling', () => {
    let workspace: string;
    const tracked = ['src/a.js', 'src/clean.ts', 'src/code.ts', 'node_modules/x/index.js', 'docs/readme.md', 'gen/out.js'];

    beforeEach(async () => {
      workspace = await createWorkspaceWithFiles({
        'src/a.js': SAMPLE,
        'src/clean.ts': '// handle the value\n',
        'src/code.ts': 'export const x = 1;\n',
        'node_modules/x/index.js': '// recieve\n',
        'docs/readme.md': '<!-- recieve -->\n',
        'gen/out.js': '// recieve\n',
      });
    });

    afterEach(async () => {
      await cleanupWorkspace(workspace);
    });

    const scope = { extensions: ['.js', '.TS'], ignorePaths: ['gen/'] };

    it('should rank files by error rate and credit authors per misspelled line', async () => {
      const attributor = new FakeAttributor({
        'src/a.js': new Map([[1, bob], [3, alice], [4, alice]]),
      });

      const report = await analyzeSpelling(workspace, tracked, { ...scope, checker, attributor, concurrency: 2 });

      expect(report.files.map((entry) => [entry.path, entry.misspelled, entry.totalWords])).toEqual([
        ['src/a.js', 4, 7],
        ['src/clean.ts', 0, 2],
      ]);
      expect(report.authors).toEqual([
        { email: 'alice@x', name: 'Alice', misspelled: 3, files: 1, topMistake: 'recieve', topMistakeCount: 2 },
        { email: 'bob@x', name: 'Bob', misspelled: 1, files: 1, topMistake: 'cached', topMistakeCount: 1 },
      ]);
      expect(attributor.calls.map((call) => call.filePath)).toEqual(['src/a.js']);
      expect(attributor.calls[0]?.options?.gate).toBeInstanceOf(Semaphore);
    });

    it('should skip ignored authors', async () => {
      const attributor = new FakeAttributor({
        'src/a.js': new Map([[1, alice], [3, bob], [4, alice]]),
      });
      const filter = { shouldIgnoreAuthor: (email: string) => email === 'bob@x' };

      const report = await analyzeSpelling(workspace, tracked, { ...scope, checker, attributor, concurrency: 1, filter });

      expect(report.authors.map((author) => author.email)).toEqual(['alice@x']);
    });

    it('should keep file results when attribution fails', async () => {
      const attributor = new FakeAttributor({
        'src/a.js': new AttributionError('src/a.js', 'command_failed', 'exit 128'),
      });

      const report = await analyzeSpelling(workspace, tracked, { ...scope, checker, attributor, concurrency: 1 });

      expect(report.files).toHaveLength(2);
      expect(report.authors).toEqual([]);
    });

    it('should propagate unexpected attribution errors', async () => {
      const attributor = new FakeAttributor({ 'src/a.js': new Error('boom') });

      await expect(
        analyzeSpelling(workspace, tracked, { ...scope, checker, attributor, concurrency: 1 })
      ).rejects.toThrow('boom');
    });
  });
});
