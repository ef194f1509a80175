/**
 * Unit tests for vector math
 */

import { describe, it, expect } from 'vitest';
import {
  averageVectors,
  cosineSimilarity,
  decodeEmbedding,
  encodeEmbedding,
  l2Normalize,
  normalize,
  vectorNorm,
} from '../../src/lib/vector-math.js';
import { DimensionMismatchError } from '../../src/lib/errors.js';

describe('vector math', () => {
  it('should normalize to unit length', () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
    expect(vectorNorm(normalize([1, 2, 2]))).toBeCloseTo(1, 12);
  });

  it('should leave a zero vector unchanged', () => {
    expect(normalize([0, 0, 0])).toEqual([0, 0, 0]);
  });

  it('should score identical, orthogonal and opposite directions', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('should score a zero vector as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should score two empty vectors as 0', () => {
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it('should be symmetric', () => {
    const pairs: Array<[number[], number[]]> = [
      [[0.3, -1.2, 4], [2.5, 0.1, -0.7]],
      [[1e-3, 7, 7], [-3, 0, 2]],
      [[5, 5], [-1, 9]],
    ];

    for (const [a, b] of pairs) {
      expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
    }
  });

  it('should refuse vectors of different lengths', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);
  });

  it('should average component-wise', () => {
    expect(averageVectors([[1, 0], [0, 1]])).toEqual([0.5, 0.5]);
    expect(averageVectors([])).toEqual([]);
  });

  it('should store vectors as JSON arrays', () => {
    expect(encodeEmbedding([0.25, -0.5])).toBe('[0.25,-0.5]');
    expect(decodeEmbedding('[0.25,-0.5]')).toEqual([0.25, -0.5]);
  });

  it('should reject a stored value that is not a numeric array', () => {
    expect(() => decodeEmbedding('{"a":1}')).toThrow('Invalid stored embedding');
    expect(() => decodeEmbedding('["a"]')).toThrow('Invalid stored embedding');
  });
});
