/**
 * Document Service
 *
 * Markdown upload (chunk, embed, store atomically), browsing, deletion and
 * question answering over document chunks.
 */

import { NotFoundError, ValidationError } from '../lib/errors.js';
import { parseId, parseIndex, parseTopK, requireText } from '../lib/input-validation.js';
import { logger } from '../lib/logger.js';
import { RagResult, err, ok } from '../lib/result-types.js';
import type {
  DeleteResponse,
  DocumentChunkView,
  DocumentStatsResponse,
  DocumentUploadResponse,
} from '../models/api-types.js';
import type { RagAnswer } from '../models/rag.js';
import type { DocumentChunkRecord, DocumentRecord } from '../models/records.js';
import type { DocumentRepository } from './database/DocumentRepository.js';
import type { IEmbeddingGateway } from './embedding/gateway-interface.js';
import type { IngestionPipeline } from './ingestion-pipeline.js';
import { RagOrchestrator, documentRetrievalSource } from './rag-orchestrator.js';

const ALLOWED_EXTENSION = '.md';

export interface DocumentServiceDeps {
  repository: DocumentRepository;
  pipeline: IngestionPipeline;
  gateway: IEmbeddingGateway;
  /** Prefix for source links, e.g. http://localhost:8080 */
  sourceBaseUrl: string;
}

function toChunkView(chunk: DocumentChunkRecord): DocumentChunkView {
  return {
    id: chunk.id,
    documentId: chunk.documentId,
    documentName: chunk.documentName,
    chunkIndex: chunk.chunkIndex,
    text: chunk.text,
    startOffset: chunk.startOffset,
    endOffset: chunk.endOffset,
    tokenCount: chunk.tokenCount,
    createdAt: chunk.createdAt,
  };
}

export class DocumentService {
  private readonly orchestrator: RagOrchestrator;

  constructor(private readonly deps: DocumentServiceDeps) {
    this.orchestrator = new RagOrchestrator(deps.pipeline, deps.gateway);
  }

  /**
   * Chunk and embed a Markdown document, then store it with its chunks
   *
   * Nothing is written unless every chunk was embedded.
   */
  async upload(fileName: string, content: string): Promise<RagResult<DocumentUploadResponse>> {
    const name = fileName.trim();
    if (name.length === 0) {
      return err(new ValidationError('fileName must not be blank'));
    }
    if (!name.toLowerCase().endsWith(ALLOWED_EXTENSION)) {
      return err(new ValidationError('Only Markdown (.md) files are accepted', `got "${name}"`));
    }

    const checked = requireText(content, 'content');
    if (checked.isErr()) {
      return err(checked.error);
    }

    const embedded = await this.deps.pipeline.embedChunks(content);
    if (embedded.isErr()) {
      logger.warn('Document upload aborted', { fileName: name, code: embedded.error.code });
      return err(embedded.error);
    }

    return this.deps.repository
      .saveDocumentWithChunks(name, content, embedded.value)
      .map((document) => ({
        documentId: document.id,
        fileName: document.fileName,
        fileSize: document.fileSize,
        chunksCreated: document.chunkCount,
        createdAt: document.createdAt,
      }));
  }

  list(): RagResult<DocumentRecord[]> {
    return this.deps.repository.findAllDocuments();
  }

  get(id: unknown): RagResult<DocumentRecord> {
    return parseId(id).andThen((documentId) => this.requireDocument(documentId));
  }

  /**
   * Chunks of a document, in order
   */
  chunks(id: unknown): RagResult<DocumentChunkView[]> {
    return parseId(id)
      .andThen((documentId) => this.requireDocument(documentId))
      .andThen((document) => this.deps.repository.findChunksByDocument(document.id))
      .map((chunks) => chunks.map(toChunkView));
  }

  chunk(id: unknown, index: unknown): RagResult<DocumentChunkView> {
    return parseId(id).andThen((documentId) =>
      parseIndex(index, 'chunkIndex').andThen((chunkIndex) =>
        this.deps.repository.findChunk(documentId, chunkIndex).andThen((chunk) =>
          chunk === null
            ? err(new NotFoundError(`Chunk ${chunkIndex} of document ${documentId} not found`))
            : ok(toChunkView(chunk))
        )
      )
    );
  }

  delete(id: unknown): RagResult<DeleteResponse> {
    return parseId(id).andThen((documentId) =>
      this.deps.repository.deleteDocument(documentId).andThen((deleted) =>
        deleted
          ? ok({ deleted: true as const, id: documentId })
          : err(new NotFoundError(`Document ${documentId} not found`))
      )
    );
  }

  /**
   * Answer a question from document chunks, with links to the cited chunks
   */
  async ask(question: string, topK = 3): Promise<RagResult<RagAnswer>> {
    const checked = requireText(question, 'question').andThen(() => parseTopK(topK));
    if (checked.isErr()) {
      return err(checked.error);
    }

    return this.orchestrator.answer(
      question,
      { topK, useRetrieval: true },
      documentRetrievalSource(this.deps.repository, this.deps.sourceBaseUrl)
    );
  }

  stats(): RagResult<DocumentStatsResponse> {
    return this.deps.repository.countDocuments().andThen((totalDocuments) =>
      this.deps.repository.countChunks().map((totalChunks) => ({ totalDocuments, totalChunks }))
    );
  }

  private requireDocument(documentId: number): RagResult<DocumentRecord> {
    return this.deps.repository.findDocumentById(documentId).andThen((document) =>
      document === null
        ? err(new NotFoundError(`Document ${documentId} not found`))
        : ok(document)
    );
  }
}
