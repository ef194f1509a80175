/**
 * Text preview helpers for API responses and answer sources
 *
 * @module preview-generator
 */

export const SOURCE_PREVIEW_CHARS = 300;
export const RECORD_PREVIEW_CHARS = 500;
export const CHUNK_PREVIEW_CHARS = 200;

/**
 * Cut text to `maxChars`, appending "..." when anything was removed
 *
 * @example
 * ```typescript
 * truncatePreview('abcdef', 3); // 'abc...'
 * truncatePreview('abc', 3);    // 'abc'
 * ```
 */
export function truncatePreview(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Similarity as a percentage with one decimal, e.g. 0.8734 -> "87.3%"
 */
export function formatSimilarityPercent(similarity: number): string {
  return `${(similarity * 100).toFixed(1)}%`;
}
