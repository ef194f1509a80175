/**
 * Embedding Service
 *
 * Operations over standalone embedded texts: embed (and store), search,
 * browse, delete, statistics, question answering and health.
 */

import { NotFoundError, ValidationError } from '../lib/errors.js';
import { parseId, parseTopK, requireText } from '../lib/input-validation.js';
import { logger } from '../lib/logger.js';
import {
  CHUNK_PREVIEW_CHARS,
  RECORD_PREVIEW_CHARS,
  SOURCE_PREVIEW_CHARS,
  truncatePreview,
} from '../lib/preview-generator.js';
import { RagResult, err, ok } from '../lib/result-types.js';
import type {
  DeleteResponse,
  EmbedBatchResponse,
  EmbedResponse,
  HealthResponse,
  SearchResponse,
  StatsResponse,
  StoredEmbeddingView,
} from '../models/api-types.js';
import type { RagAnswer } from '../models/rag.js';
import type { StoredRecord } from '../models/records.js';
import type { TextChunker } from './chunker/TextChunker.js';
import type { DatabaseService } from './database.js';
import type { EmbeddingRepository } from './database/EmbeddingRepository.js';
import type { IEmbeddingGateway } from './embedding/gateway-interface.js';
import type { EmbeddedText, IngestionPipeline } from './ingestion-pipeline.js';
import { RagOrchestrator, recordRetrievalSource } from './rag-orchestrator.js';

/** Vector components shown per chunk in embed responses */
const CHUNK_VECTOR_HEAD = 10;

export interface EmbeddingServiceDeps {
  database: DatabaseService;
  repository: EmbeddingRepository;
  pipeline: IngestionPipeline;
  chunker: TextChunker;
  gateway: IEmbeddingGateway;
}

function toView(record: StoredRecord): StoredEmbeddingView {
  return { id: record.id, text: record.text, embedding: record.vector, createdAt: record.createdAt };
}

export class EmbeddingService {
  private readonly orchestrator: RagOrchestrator;

  constructor(private readonly deps: EmbeddingServiceDeps) {
    this.orchestrator = new RagOrchestrator(deps.pipeline, deps.gateway);
  }

  /**
   * Embed a text and store it
   */
  async embed(text: string): Promise<RagResult<EmbedResponse>> {
    return this.embedInternal(text, true);
  }

  /**
   * Embed a text without storing it
   */
  async embedQuery(text: string): Promise<RagResult<EmbedResponse>> {
    return this.embedInternal(text, false);
  }

  /**
   * Embed and store several texts, one after another
   *
   * The first failure stops the batch; texts before it stay stored.
   */
  async embedBatch(texts: readonly string[]): Promise<RagResult<EmbedBatchResponse>> {
    if (texts.length === 0) {
      return err(new ValidationError('texts must contain at least one entry'));
    }

    const blank = texts.findIndex((t) => t.trim().length === 0);
    if (blank >= 0) {
      return err(new ValidationError(`texts[${blank}] must not be blank`));
    }

    const results: EmbedResponse[] = [];
    for (const text of texts) {
      const result = await this.embedInternal(text, true);
      if (result.isErr()) {
        return err(result.error);
      }
      results.push(result.value);
    }

    return ok({ results });
  }

  /**
   * Most similar stored texts for a query
   */
  async search(query: string, topK = 5, truncate = true): Promise<RagResult<SearchResponse>> {
    const checked = requireText(query, 'query').andThen(() => parseTopK(topK));
    if (checked.isErr()) {
      return err(checked.error);
    }

    const embedded = await this.deps.pipeline.embedText(query);
    if (embedded.isErr()) {
      return err(embedded.error);
    }

    return this.deps.repository.search(embedded.value.vector, topK).map((results) => ({
      query,
      results: results.map(({ record, similarity }) => ({
        id: record.id,
        text: truncate ? truncatePreview(record.text, SOURCE_PREVIEW_CHARS) : record.text,
        similarity,
      })),
    }));
  }

  list(): RagResult<StoredEmbeddingView[]> {
    return this.deps.repository.findAll().map((records) => records.map(toView));
  }

  get(id: unknown): RagResult<StoredEmbeddingView> {
    return parseId(id).andThen((recordId) =>
      this.deps.repository.findById(recordId).andThen((record) =>
        record === null
          ? err(new NotFoundError(`Embedding ${recordId} not found`))
          : ok(toView(record))
      )
    );
  }

  delete(id: unknown): RagResult<DeleteResponse> {
    return parseId(id).andThen((recordId) =>
      this.deps.repository.delete(recordId).andThen((deleted) =>
        deleted
          ? ok({ deleted: true as const, id: recordId })
          : err(new NotFoundError(`Embedding ${recordId} not found`))
      )
    );
  }

  stats(): RagResult<StatsResponse> {
    return this.deps.repository.count().map((totalEmbeddings) => ({
      totalEmbeddings,
      chunkSettings: this.deps.chunker.describeSettings(),
      normalization: 'l2' as const,
    }));
  }

  /**
   * Answer a question, grounded in stored texts unless `useRetrieval` is false
   */
  async answer(question: string, useRetrieval = true, topK = 3): Promise<RagResult<RagAnswer>> {
    const checked = requireText(question, 'question').andThen(() => parseTopK(topK));
    if (checked.isErr()) {
      return err(checked.error);
    }

    return this.orchestrator.answer(
      question,
      { topK, useRetrieval },
      recordRetrievalSource(this.deps.repository)
    );
  }

  /**
   * Probe the backend and the database; never fails
   */
  async health(): Promise<HealthResponse> {
    const available = await this.deps.gateway.isAvailable();
    const databaseUp = this.deps.database.ping();
    const stats = databaseUp ? this.deps.database.getStats() : undefined;

    const status = available && databaseUp ? 'healthy' : 'degraded';
    if (status === 'degraded') {
      logger.warn('Health check degraded', { gateway: available, database: databaseUp });
    }

    return {
      status,
      gateway: { id: this.deps.gateway.id, available },
      database: {
        available: databaseUp,
        schemaVersion: stats?.schemaVersion,
        dbSizeBytes: stats?.dbSizeBytes,
      },
    };
  }

  private async embedInternal(text: string, save: boolean): Promise<RagResult<EmbedResponse>> {
    const checked = requireText(text, 'text');
    if (checked.isErr()) {
      return err(checked.error);
    }

    const embedded = await this.deps.pipeline.embedText(text);
    if (embedded.isErr()) {
      return err(embedded.error);
    }

    if (!save) {
      return ok(this.toResponse(text, embedded.value, null));
    }

    return this.deps.repository
      .insert(text, embedded.value.vector)
      .map((record) => this.toResponse(text, embedded.value, record));
  }

  private toResponse(text: string, embedded: EmbeddedText, record: StoredRecord | null): EmbedResponse {
    const response: EmbedResponse = {
      id: record?.id ?? null,
      text: truncatePreview(text, RECORD_PREVIEW_CHARS),
      embedding: embedded.vector,
    };

    if (record !== null) {
      response.createdAt = record.createdAt;
    }

    if (embedded.chunks.length > 1) {
      response.chunks = embedded.chunks.map(({ chunk, vector }) => ({
        index: chunk.index,
        preview: truncatePreview(chunk.text, CHUNK_PREVIEW_CHARS),
        tokenCount: chunk.estimatedTokenCount,
        embeddingHead: vector.slice(0, CHUNK_VECTOR_HEAD),
      }));
    }

    return response;
  }
}
