/**
 * Persisted record models
 */

/**
 * A standalone embedded text
 */
export interface StoredRecord {
  id: number;
  text: string;
  vector: number[];
  /** ISO-8601 UTC */
  createdAt: string;
}

/**
 * An uploaded document (content stays in storage)
 */
export interface DocumentRecord {
  id: number;
  fileName: string;
  /** UTF-8 byte length of the content */
  fileSize: number;
  chunkCount: number;
  createdAt: string;
}

/**
 * One embedded chunk of a document
 */
export interface DocumentChunkRecord {
  id: number;
  documentId: number;
  documentName: string;
  chunkIndex: number;
  text: string;
  vector: number[];
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  createdAt: string;
}

/**
 * A record scored against a query vector
 */
export interface RetrievalResult<R> {
  record: R;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}
