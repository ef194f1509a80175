/**
 * Response shapes returned by the services, the tool server and `--json` CLI output
 */

import type { ChunkSettings } from '../services/chunker/TextChunker.js';

export interface ChunkInfo {
  index: number;
  preview: string;
  tokenCount: number;
  /** First components of the chunk vector */
  embeddingHead: number[];
}

export interface EmbedResponse {
  /** null when the embedding was not saved */
  id: number | null;
  text: string;
  embedding: number[];
  createdAt?: string;
  /** Present only when the text was split into several chunks */
  chunks?: ChunkInfo[];
}

export interface EmbedBatchResponse {
  results: EmbedResponse[];
}

export interface StoredEmbeddingView {
  id: number;
  text: string;
  embedding: number[];
  createdAt: string;
}

export interface SearchHit {
  id: number;
  text: string;
  similarity: number;
}

export interface SearchResponse {
  query: string;
  results: SearchHit[];
}

export interface DeleteResponse {
  deleted: true;
  id: number;
}

export interface StatsResponse {
  totalEmbeddings: number;
  chunkSettings: ChunkSettings;
  normalization: 'l2';
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  gateway: { id: string; available: boolean };
  database: { available: boolean; schemaVersion?: string; dbSizeBytes?: number };
}

export interface DocumentUploadResponse {
  documentId: number;
  fileName: string;
  fileSize: number;
  chunksCreated: number;
  createdAt: string;
}

export interface DocumentChunkView {
  id: number;
  documentId: number;
  documentName: string;
  chunkIndex: number;
  text: string;
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  createdAt: string;
}

export interface DocumentStatsResponse {
  totalDocuments: number;
  totalChunks: number;
}
