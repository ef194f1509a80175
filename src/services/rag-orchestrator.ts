/**
 * RAG Orchestrator
 *
 * Embeds a question, retrieves the most similar stored passages, builds a
 * context block from them and asks the generation model for an answer with
 * source attribution.
 */

import { logger } from '../lib/logger.js';
import { formatSimilarityPercent, truncatePreview, SOURCE_PREVIEW_CHARS } from '../lib/preview-generator.js';
import { RagResult, err } from '../lib/result-types.js';
import { ValidationError } from '../lib/errors.js';
import type { RagAnswer, RagOptions, RagSource, RagSourceKey } from '../models/rag.js';
import type { DocumentRepository } from './database/DocumentRepository.js';
import type { EmbeddingRepository } from './database/EmbeddingRepository.js';
import type { IEmbeddingGateway } from './embedding/gateway-interface.js';
import type { IngestionPipeline } from './ingestion-pipeline.js';

/**
 * A stored passage scored against the question
 */
export interface RetrievedPassage {
  key: RagSourceKey;
  label: string;
  text: string;
  similarity: number;
  link?: string;
  createdAt?: string;
}

/**
 * Anything the orchestrator can search: standalone records or document chunks
 */
export interface RetrievalSource {
  search(queryVector: number[], topK: number): RagResult<RetrievedPassage[]>;
}

export function recordRetrievalSource(repository: EmbeddingRepository): RetrievalSource {
  return {
    search: (queryVector, topK) =>
      repository.search(queryVector, topK).map((results) =>
        results.map(({ record, similarity }): RetrievedPassage => ({
          key: { kind: 'record', recordId: record.id },
          label: `Embedding #${record.id}`,
          text: record.text,
          similarity,
          createdAt: record.createdAt,
        }))
      ),
  };
}

/**
 * @param baseUrl - prefix for chunk links, without trailing slash
 */
export function documentRetrievalSource(
  repository: DocumentRepository,
  baseUrl: string
): RetrievalSource {
  return {
    search: (queryVector, topK) =>
      repository.search(queryVector, topK).map((results) =>
        results.map(({ record, similarity }): RetrievedPassage => ({
          key: {
            kind: 'document',
            documentId: record.documentId,
            documentName: record.documentName,
            chunkIndex: record.chunkIndex,
          },
          label: `${record.documentName}, chunk ${record.chunkIndex + 1}`,
          text: record.text,
          similarity,
          link: `${baseUrl}/api/documents/${record.documentId}/chunks/${record.chunkIndex}`,
        }))
      ),
  };
}

/**
 * Context handed to the generator: one block per passage, blank-line separated
 */
export function buildContext(passages: readonly RetrievedPassage[]): string {
  return passages
    .map(
      (p) =>
        `Source: ${p.label}\nSimilarity: ${formatSimilarityPercent(p.similarity)}\nText: ${p.text}`
    )
    .join('\n\n');
}

export function toRagSource(passage: RetrievedPassage): RagSource {
  const source: RagSource = {
    key: passage.key,
    label: passage.label,
    preview: truncatePreview(passage.text, SOURCE_PREVIEW_CHARS),
    similarity: passage.similarity,
    similarityPercent: formatSimilarityPercent(passage.similarity),
  };
  if (passage.link !== undefined) {
    source.link = passage.link;
  }
  if (passage.createdAt !== undefined) {
    source.createdAt = passage.createdAt;
  }
  return source;
}

export class RagOrchestrator {
  constructor(
    private readonly pipeline: IngestionPipeline,
    private readonly gateway: IEmbeddingGateway
  ) {}

  async answer(
    question: string,
    options: RagOptions,
    source: RetrievalSource
  ): Promise<RagResult<RagAnswer>> {
    if (question.trim().length === 0) {
      return err(new ValidationError('Question must not be blank'));
    }

    if (!options.useRetrieval) {
      return (await this.gateway.generate(question)).map((answer) => ({
        question,
        answer,
        usedRetrieval: false,
        retrievalAttempted: false,
        sources: [],
      }));
    }

    const embedded = await this.pipeline.embedText(question);
    if (embedded.isErr()) {
      return err(embedded.error);
    }

    const retrieved = source.search(embedded.value.vector, options.topK);
    if (retrieved.isErr()) {
      return err(retrieved.error);
    }

    const passages = retrieved.value;
    if (passages.length === 0) {
      logger.info('No stored context found, answering without retrieval');
      return (await this.gateway.generate(question)).map((answer) => ({
        question,
        answer,
        usedRetrieval: false,
        retrievalAttempted: true,
        sources: [],
      }));
    }

    const generated = await this.gateway.generate(question, buildContext(passages));

    return generated.map((answer) => ({
      question,
      answer,
      usedRetrieval: true,
      retrievalAttempted: true,
      sources: passages.map(toRagSource),
    }));
  }
}
