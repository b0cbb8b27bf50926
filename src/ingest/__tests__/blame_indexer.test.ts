/**
 * Tests for the line-porcelain parser
 */

import { describe, it, expect } from 'vitest';
import { parseBlameLineHeader, parseBlameOutput } from '../blame_indexer.js';
import { porcelain } from '../../__tests__/helpers/index.js';

describe('Blame Parser', () => {
  describe('parseBlameLineHeader', () => {
    it('should parse standard blame header', () => {
      expect(parseBlameLineHeader('abc123def456789012345678901234567890abcd 1 1')).toEqual({
        commitHash: 'abc123def456789012345678901234567890abcd',
        originalLine: 1,
        finalLine: 1,
        groupLines: undefined,
      });
    });

    it('should parse header with group lines', () => {
      expect(parseBlameLineHeader('abc123def456789012345678901234567890abcd 10 15 5')).toEqual({
        commitHash: 'abc123def456789012345678901234567890abcd',
        originalLine: 10,
        finalLine: 15,
        groupLines: 5,
      });
    });

    it('should parse a SHA-256 object name', () => {
      const hash = '0123456789abcdef'.repeat(4);

      expect(parseBlameLineHeader(`${hash} 3 4`)).toMatchObject({ commitHash: hash, finalLine: 4 });
      expect(parseBlameLineHeader(`${hash.slice(0, 50)} 3 4`)).toBeNull();
    });

    it('should return null for invalid header', () => {
      expect(parseBlameLineHeader('author John Doe')).toBeNull();
      expect(parseBlameLineHeader('')).toBeNull();
      expect(parseBlameLineHeader('abc123 1 1')).toBeNull();
    });
  });

  describe('parseBlameOutput', () => {
    it('should map final line numbers to author name and email', () => {
      const index = parseBlameOutput(porcelain([
        { line: 1, name: 'Alice', email: 'alice@x' },
        { line: 2, name: 'Bob', email: 'bob@x' },
      ]));

      expect([...index.entries()]).toEqual([
        [1, { name: 'Alice', email: 'alice@x' }],
        [2, { name: 'Bob', email: 'bob@x' }],
      ]);
    });

    it('should index output from a SHA-256 repository', () => {
      const hash = 'fedcba9876543210'.repeat(4);
      const index = parseBlameOutput(porcelain([{ line: 1, name: 'Alice', email: 'alice@x', hash }]));

      expect([...index.entries()]).toEqual([[1, { name: 'Alice', email: 'alice@x' }]]);
    });

    it('should use the final line, not the original one', () => {
      const output = [
        'abc123def456789012345678901234567890abcd 3 7 1',
        'author Alice',
        'author-mail <alice@x>',
        '\tconst x = 1;',
      ].join('\n');

      expect([...parseBlameOutput(output).keys()]).toEqual([7]);
    });

    it('should trim whitespace and angle brackets from the email', () => {
      const output = [
        'abc123def456789012345678901234567890abcd 1 1 1',
        'author   Alice Liddell  ',
        'author-mail   <alice@x>  ',
        '\tx',
      ].join('\n');

      expect(parseBlameOutput(output).get(1)).toEqual({ name: 'Alice Liddell', email: 'alice@x' });
    });

    it('should skip a record without an email and keep the rest', () => {
      const output = [
        'abc123def456789012345678901234567890abcd 1 1 1',
        'author Ghost',
        'author-mail <>',
        '\tfirst',
        'abc123def456789012345678901234567890abcd 2 2 1',
        'author Bob',
        'author-mail <bob@x>',
        '\tsecond',
      ].join('\n');

      const index = parseBlameOutput(output);
      expect(index.has(1)).toBe(false);
      expect(index.get(2)).toEqual({ name: 'Bob', email: 'bob@x' });
    });

    it('should skip a record whose header is missing', () => {
      const output = [
        'garbage header',
        'author Alice',
        'author-mail <alice@x>',
        '\torphan',
        'abc123def456789012345678901234567890abcd 4 4 1',
        'author Bob',
        'author-mail <bob@x>',
        '\tkept',
      ].join('\n');

      expect([...parseBlameOutput(output).keys()]).toEqual([4]);
    });

    it('should not carry identity from one record into the next', () => {
      const output = [
        'abc123def456789012345678901234567890abcd 1 1 1',
        'author Alice',
        'author-mail <alice@x>',
        '\tone',
        'abc123def456789012345678901234567890abcd 2 2 1',
        'author Nobody',
        '\ttwo',
      ].join('\n');

      expect([...parseBlameOutput(output).keys()]).toEqual([1]);
    });

    it('should tolerate CRLF line endings', () => {
      const output = porcelain([{ line: 1, name: 'Alice', email: 'alice@x' }]).replace(/\n/g, '\r\n');

      expect(parseBlameOutput(output).get(1)).toEqual({ name: 'Alice', email: 'alice@x' });
    });

    it('should return an empty index for empty output', () => {
      expect(parseBlameOutput('').size).toBe(0);
    });

    it('should never index an empty identity', () => {
      const index = parseBlameOutput(porcelain([
        { line: 1, name: 'Alice', email: 'alice@x' },
        { line: 2, name: 'Bob', email: '' },
        { line: 3, name: 'Carol', email: 'carol@x' },
      ]));

      expect(index.size).toBe(2);
      for (const info of index.values()) {
        expect(info.email.length).toBeGreaterThan(0);
      }
    });
  });
});
