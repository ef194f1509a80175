/**
 * TextChunker - splits text into overlapping, boundary-aware chunks
 *
 * Sizes are configured in estimated tokens and converted to characters with
 * a fixed chars-per-token ratio. A cut prefers, in order: the end of the last
 * sentence past the minimum size, the last whitespace past the minimum size,
 * and finally the maximum size (mid-word).
 */

import { ValidationError } from '../../lib/errors.js';
import {
  DEFAULT_CHUNKING_OPTIONS,
  type Chunk,
  type ChunkingOptions,
} from '../../models/chunk.js';

const SENTENCE_ENDERS = ['. ', '! ', '? ', '.\n', '!\n', '?\n'] as const;
const ENDER_LENGTH = 2;

const WHITESPACE = /\s/;

/**
 * Effective chunk settings, in tokens and characters
 */
export interface ChunkSettings extends ChunkingOptions {
  minChars: number;
  maxChars: number;
  overlapChars: number;
}

/**
 * TextChunker service
 */
export class TextChunker {
  private readonly settings: ChunkSettings;

  /**
   * @throws ValidationError unless 0 < min <= max, 0 <= overlap < max and charsPerToken > 0
   */
  constructor(options: Partial<ChunkingOptions> = {}) {
    const merged: ChunkingOptions = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
    validateOptions(merged);

    this.settings = {
      ...merged,
      minChars: merged.minTokens * merged.charsPerToken,
      maxChars: merged.maxTokens * merged.charsPerToken,
      overlapChars: merged.overlapTokens * merged.charsPerToken,
    };
  }

  /**
   * Split text into chunks
   *
   * Offsets refer to `text.trim()`. Blank input yields no chunks.
   */
  public chunk(text: string): Chunk[] {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return [];
    }

    const { minChars, maxChars, overlapChars } = this.settings;
    const length = trimmed.length;

    if (length <= maxChars) {
      return [this.makeChunk(0, trimmed, 0, length)];
    }

    const chunks: Chunk[] = [];
    let currentPos = 0;

    while (currentPos < length) {
      const candidateEnd = Math.min(currentPos + maxChars, length);
      const end =
        candidateEnd < length
          ? findBreak(trimmed, currentPos, candidateEnd, minChars)
          : candidateEnd;

      const slice = trimmed.slice(currentPos, end).trim();
      if (slice.length > 0) {
        chunks.push(this.makeChunk(chunks.length, slice, currentPos, end));
      }

      if (end >= length) {
        break;
      }

      const next = end - overlapChars;
      currentPos = next > currentPos ? next : end;
    }

    return chunks;
  }

  /**
   * max(1, floor(length / charsPerToken))
   */
  public estimateTokens(text: string): number {
    return Math.max(1, Math.floor(text.length / this.settings.charsPerToken));
  }

  public describeSettings(): ChunkSettings {
    return { ...this.settings };
  }

  private makeChunk(index: number, text: string, startOffset: number, endOffset: number): Chunk {
    return {
      index,
      text,
      startOffset,
      endOffset,
      estimatedTokenCount: this.estimateTokens(text),
    };
  }
}

/**
 * Choose the cut position for a chunk starting at `start` whose hard limit is `limit`
 */
function findBreak(text: string, start: number, limit: number, minChars: number): number {
  const floor = start + minChars;

  // Terminators may start anywhere in [floor, limit]
  const window = text.slice(floor, limit + ENDER_LENGTH);
  let sentenceBreak = -1;
  for (const ender of SENTENCE_ENDERS) {
    const pos = window.lastIndexOf(ender, limit - floor);
    if (pos >= 0) {
      sentenceBreak = Math.max(sentenceBreak, floor + pos + ender.length);
    }
  }
  if (sentenceBreak > 0) {
    return sentenceBreak;
  }

  for (let pos = limit; pos > floor; pos--) {
    if (WHITESPACE.test(text.charAt(pos - 1))) {
      return pos;
    }
  }

  return limit;
}

function validateOptions(options: ChunkingOptions): void {
  const { minTokens, maxTokens, overlapTokens, charsPerToken } = options;
  const integers = [minTokens, maxTokens, overlapTokens, charsPerToken];

  if (!integers.every(Number.isInteger)) {
    throw new ValidationError('Chunk settings must be integers', JSON.stringify(options));
  }
  if (minTokens <= 0 || minTokens > maxTokens) {
    throw new ValidationError('Chunk minimum must be positive and not exceed the maximum', JSON.stringify(options));
  }
  if (overlapTokens < 0 || overlapTokens >= maxTokens) {
    throw new ValidationError('Chunk overlap must be non-negative and below the maximum', JSON.stringify(options));
  }
  if (charsPerToken <= 0) {
    throw new ValidationError('charsPerToken must be positive', JSON.stringify(options));
  }
}
