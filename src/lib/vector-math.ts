/**
 * Vector Math
 *
 * L2 normalization, cosine similarity and (de)serialization of embedding
 * vectors. Stored vectors are JSON arrays of floats.
 */

import { z } from 'zod';
import { DimensionMismatchError } from './errors.js';

/**
 * Embedding vector as handled by the pipeline
 */
export type Vector = readonly number[];

const StoredVectorSchema = z.array(z.number().finite());

/**
 * Euclidean norm of a vector
 */
export function vectorNorm(vector: Vector): number {
	let sumOfSquares = 0;
	for (const value of vector) {
		sumOfSquares += value * value;
	}
	return Math.sqrt(sumOfSquares);
}

/**
 * Normalize a vector to unit length (L2 normalization)
 *
 * A zero vector has no direction and is returned unchanged.
 *
 * @example
 * ```typescript
 * l2Normalize([3, 4]); // [0.6, 0.8]
 * ```
 */
export function l2Normalize(vector: Vector): number[] {
	const norm = vectorNorm(vector);

	if (norm === 0) {
		return [...vector];
	}

	return vector.map((v) => v / norm);
}

/**
 * L2-normalize, then clamp every component into [-1, 1]
 *
 * The clamp only matters for floating-point overshoot of a unit vector.
 */
export function normalize(vector: Vector): number[] {
	return l2Normalize(vector).map((v) => Math.min(1, Math.max(-1, v)));
}

/**
 * Compute cosine similarity between two vectors
 *
 * Range: [-1, 1], where:
 * - 1.0 = identical direction
 * - 0.0 = orthogonal
 * - -1.0 = opposite direction
 *
 * Empty vectors and zero vectors score 0.
 *
 * @throws DimensionMismatchError if vectors have different dimensions
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
	if (a.length !== b.length) {
		throw new DimensionMismatchError(a.length, b.length);
	}

	let dotProduct = 0;
	let magnitudeA = 0;
	let magnitudeB = 0;

	for (let i = 0; i < a.length; i++) {
		const aVal = a[i] ?? 0;
		const bVal = b[i] ?? 0;
		dotProduct += aVal * bVal;
		magnitudeA += aVal * aVal;
		magnitudeB += bVal * bVal;
	}

	const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

	if (magnitude === 0) {
		return 0;
	}

	return Math.min(1, Math.max(-1, dotProduct / magnitude));
}

/**
 * Component-wise arithmetic mean of equally sized vectors
 *
 * The mean of unit vectors is not unit length; callers re-normalize.
 *
 * @throws DimensionMismatchError if the vectors differ in length
 */
export function averageVectors(vectors: readonly Vector[]): number[] {
	const first = vectors[0];
	if (first === undefined) {
		return [];
	}

	const sum = new Array<number>(first.length).fill(0);

	for (const vector of vectors) {
		if (vector.length !== first.length) {
			throw new DimensionMismatchError(first.length, vector.length);
		}
		for (let i = 0; i < vector.length; i++) {
			sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
		}
	}

	return sum.map((v) => v / vectors.length);
}

/**
 * Serialize a vector for the TEXT embedding column
 */
export function encodeEmbedding(vector: Vector): string {
	return JSON.stringify(vector);
}

/**
 * Parse a stored embedding column back into a vector
 *
 * @throws Error if the column does not hold a JSON array of finite numbers
 */
export function decodeEmbedding(json: string): number[] {
	const parsed = StoredVectorSchema.safeParse(JSON.parse(json));
	if (!parsed.success) {
		throw new Error(`Invalid stored embedding: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
	}
	return parsed.data;
}
