/**
 * Ingestion Pipeline
 *
 * Chunker -> Embedding Gateway -> Normalizer. Produces one normalized vector
 * per chunk and, for standalone texts, a single combined vector.
 */

import { DimensionMismatchError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { RagResult, err, ok } from '../lib/result-types.js';
import { mapInOrder } from '../lib/task-runner.js';
import { averageVectors, normalize } from '../lib/vector-math.js';
import type { EmbeddedChunk } from '../models/chunk.js';
import type { TextChunker } from './chunker/TextChunker.js';
import type { IEmbeddingGateway } from './embedding/gateway-interface.js';

/**
 * A text embedded as a whole and per chunk
 */
export interface EmbeddedText {
  /** Normalized vector representing the whole text */
  vector: number[];
  chunks: EmbeddedChunk[];
}

export interface IngestionOptions {
  /** Parallel embed calls per text (default: 1, sequential) */
  concurrency?: number;
}

export class IngestionPipeline {
  private readonly concurrency: number;

  constructor(
    private readonly chunker: TextChunker,
    private readonly gateway: IEmbeddingGateway,
    options: IngestionOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 1;
  }

  /**
   * Chunk the text and embed every chunk, in chunk order
   *
   * The first gateway failure stops the run and is returned.
   */
  async embedChunks(text: string): Promise<RagResult<EmbeddedChunk[]>> {
    const chunks = this.chunker.chunk(text);
    if (chunks.length === 0) {
      return err(new ValidationError('Text must not be blank'));
    }

    const started = performance.now();
    const result = await mapInOrder(
      chunks,
      async (chunk) =>
        (await this.gateway.embed(chunk.text)).map((vector) => ({ chunk, vector: normalize(vector) })),
      this.concurrency
    );

    if (result.isOk()) {
      logger.info('Embedded text', {
        chunks: chunks.length,
        characters: text.length,
        concurrency: this.concurrency,
        durationMs: Math.round(performance.now() - started),
      });
    }

    return result;
  }

  /**
   * Embed a text into one vector
   *
   * A single chunk yields its own vector; several chunks yield the
   * normalized component-wise mean.
   */
  async embedText(text: string): Promise<RagResult<EmbeddedText>> {
    const embedded = await this.embedChunks(text);
    return embedded.andThen((chunks) =>
      combineVectors(chunks.map((c) => c.vector)).map((vector) => ({ vector, chunks }))
    );
  }
}

/**
 * Combine per-chunk vectors into one normalized vector
 */
export function combineVectors(vectors: readonly number[][]): RagResult<number[]> {
  const [first, ...rest] = vectors;
  if (first === undefined) {
    return err(new ValidationError('Nothing to combine'));
  }
  if (rest.length === 0) {
    return ok(first);
  }

  const mismatch = rest.find((v) => v.length !== first.length);
  if (mismatch !== undefined) {
    return err(new DimensionMismatchError(first.length, mismatch.length));
  }

  return ok(normalize(averageVectors(vectors)));
}
