/**
 * Brute-force top-K ranking by cosine similarity
 */

import { cosineSimilarity, type Vector } from '../../lib/vector-math.js';
import { logger } from '../../lib/logger.js';
import type { RetrievalResult } from '../../models/records.js';

export interface Rankable {
  id: number;
  vector: Vector;
}

export interface ScanOptions {
  /** Name used in the slow-scan log */
  operation: string;
  slowThresholdMs: number;
}

/**
 * Score every candidate against the query and keep the best `topK`
 *
 * Ordered by similarity descending, ties by ascending id.
 *
 * @throws DimensionMismatchError if a candidate's vector length differs
 */
export function rankBySimilarity<R extends Rankable>(
  query: Vector,
  candidates: readonly R[],
  topK: number,
  options: ScanOptions
): RetrievalResult<R>[] {
  if (topK <= 0) {
    return [];
  }

  const start = performance.now();

  const scored = candidates.map((record) => ({
    record,
    similarity: cosineSimilarity(query, record.vector),
  }));

  scored.sort((a, b) => b.similarity - a.similarity || a.record.id - b.record.id);

  const results = scored.slice(0, topK);
  const duration = performance.now() - start;

  if (duration > options.slowThresholdMs) {
    logger.logSlowQuery(options.operation, duration, options.slowThresholdMs, candidates.length);
  } else {
    logger.debug('Similarity scan', {
      operation: options.operation,
      scanned: candidates.length,
      returned: results.length,
      durationMs: Math.round(duration),
    });
  }

  return results;
}
