/**
 * Chunk model - a contiguous, overlapping slice of an ingested text
 */

/**
 * A chunk produced by the TextChunker
 *
 * Offsets index into the trimmed source text; `endOffset` is exclusive.
 */
export interface Chunk {
  /** Position in the chunk sequence (0-based) */
  readonly index: number;

  /** Trimmed chunk text, never empty */
  readonly text: string;

  /** Start of the slice in the trimmed source */
  readonly startOffset: number;

  /** End of the slice in the trimmed source (exclusive) */
  readonly endOffset: number;

  /** max(1, floor(text.length / charsPerToken)) */
  readonly estimatedTokenCount: number;
}

/**
 * Chunk sizing, expressed in estimated tokens
 */
export interface ChunkingOptions {
  minTokens: number;
  maxTokens: number;
  overlapTokens: number;
  charsPerToken: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  minTokens: 500,
  maxTokens: 1000,
  overlapTokens: 75,
  charsPerToken: 4,
};

/**
 * A chunk together with its normalized embedding
 */
export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}
