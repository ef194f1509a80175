/**
 * Retrieval-augmented answer models
 */

/**
 * Identifies where a piece of context came from
 */
export type RagSourceKey =
  | { kind: 'record'; recordId: number }
  | { kind: 'document'; documentId: number; documentName: string; chunkIndex: number };

/**
 * A retrieved passage cited by an answer
 */
export interface RagSource {
  key: RagSourceKey;
  /** Human readable origin, e.g. "Embedding #4" or "notes.md, chunk 2" */
  label: string;
  preview: string;
  similarity: number;
  /** e.g. "87.3%" */
  similarityPercent: string;
  link?: string;
  createdAt?: string;
}

export interface RagAnswer {
  question: string;
  answer: string;
  /** Context was found and passed to the generator */
  usedRetrieval: boolean;
  /** A similarity search ran, whether or not it found anything */
  retrievalAttempted: boolean;
  sources: RagSource[];
}

export interface RagOptions {
  topK: number;
  useRetrieval: boolean;
}
