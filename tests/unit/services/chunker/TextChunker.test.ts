/**
 * Unit tests for TextChunker
 */

import { describe, it, expect } from 'vitest';
import { TextChunker } from '../../../../src/services/chunker/TextChunker.js';
import { ValidationError } from '../../../../src/lib/errors.js';
import { SMALL_PROFILE, spacedText } from '../../../helpers/chunker-test-helper.js';

describe('TextChunker', () => {
  describe('chunk', () => {
    it('should return no chunks for blank input', () => {
      const chunker = new TextChunker();

      expect(chunker.chunk('')).toEqual([]);
      expect(chunker.chunk('   \n\t  ')).toEqual([]);
    });

    it('should return short text as a single trimmed chunk', () => {
      const chunker = new TextChunker();

      expect(chunker.chunk('  hello world  ')).toEqual([
        { index: 0, text: 'hello world', startOffset: 0, endOffset: 11, estimatedTokenCount: 2 },
      ]);
    });

    it('should cut at whitespace with overlap between consecutive chunks', () => {
      const chunker = new TextChunker(SMALL_PROFILE);
      const chunks = chunker.chunk(spacedText());

      expect(chunks.map((c) => [c.index, c.startOffset, c.endOffset, c.text.length, c.estimatedTokenCount])).toEqual([
        [0, 0, 1020, 1019, 254],
        [1, 920, 1940, 1019, 254],
        [2, 1840, 2400, 560, 140],
      ]);
      expect(chunks[2]?.text.endsWith('abcdefghij')).toBe(true);
    });

    it('should prefer a sentence end past the minimum size', () => {
      const chunker = new TextChunker({ minTokens: 5, maxTokens: 10, overlapTokens: 0, charsPerToken: 4 });
      const chunks = chunker.chunk('The first sentence is here. The second one follows right after it.');

      expect(chunks.map((c) => c.text)).toEqual([
        'The first sentence is here.',
        'The second one follows right after it.',
      ]);
      expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
        [0, 28],
        [28, 66],
      ]);
    });

    it('should cut mid-word at the maximum size when there is no whitespace', () => {
      const chunker = new TextChunker();
      const chunks = chunker.chunk('x'.repeat(100_000));

      expect(chunks).toHaveLength(27);
      chunks.forEach((chunk, k) => {
        expect(chunk.index).toBe(k);
        expect(chunk.startOffset).toBe(k * 3700);
      });
      expect(chunks[0]?.endOffset).toBe(4000);
      expect(chunks[26]?.startOffset).toBe(96200);
      expect(chunks[26]?.endOffset).toBe(100_000);
      expect(chunks[26]?.estimatedTokenCount).toBe(950);
    });

    it('should chunk megabytes of text without terminators in linear time', () => {
      const chunker = new TextChunker();
      const text = 'word '.repeat(800_000);

      const started = performance.now();
      const chunks = chunker.chunk(text);
      const elapsedMs = performance.now() - started;

      expect(chunks).toHaveLength(1081);
      expect(chunks[1]?.startOffset).toBe(3700);
      expect(chunks[1080]?.startOffset).toBe(3_996_000);
      expect(chunks[1080]?.endOffset).toBe(3_999_999);
      expect(elapsedMs).toBeLessThan(1000);
    });

    it('should produce identical chunks for identical input', () => {
      const chunker = new TextChunker(SMALL_PROFILE);

      expect(chunker.chunk(spacedText())).toEqual(chunker.chunk(spacedText()));
    });

    it('should keep every chunk within the maximum size', () => {
      const chunker = new TextChunker(SMALL_PROFILE);
      const text = 'Lorem ipsum dolor sit amet. '.repeat(200);

      for (const chunk of chunker.chunk(text)) {
        expect(chunk.endOffset - chunk.startOffset).toBeLessThanOrEqual(1024);
        expect(chunk.text).toBe(chunk.text.trim());
      }
    });
  });

  describe('estimateTokens', () => {
    it('should divide by chars per token, with a minimum of one', () => {
      const chunker = new TextChunker();

      expect(chunker.estimateTokens('')).toBe(1);
      expect(chunker.estimateTokens('abc')).toBe(1);
      expect(chunker.estimateTokens('abcdefghi')).toBe(2);
    });
  });

  describe('settings', () => {
    it('should report token and character sizes', () => {
      expect(new TextChunker().describeSettings()).toEqual({
        minTokens: 500,
        maxTokens: 1000,
        overlapTokens: 75,
        charsPerToken: 4,
        minChars: 2000,
        maxChars: 4000,
        overlapChars: 300,
      });
    });

    it('should reject a minimum above the maximum', () => {
      expect(() => new TextChunker({ minTokens: 20, maxTokens: 10 })).toThrow(ValidationError);
    });

    it('should reject an overlap as large as the maximum', () => {
      expect(() => new TextChunker({ minTokens: 5, maxTokens: 10, overlapTokens: 10 })).toThrow(
        'Chunk overlap must be non-negative and below the maximum'
      );
    });
  });
});
