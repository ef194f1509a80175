/**
 * Wiring of the retrieval stack from a validated configuration
 */

import type { RagConfig } from '../lib/env-config.js';
import { logger } from '../lib/logger.js';
import { RagResult, err, trySync } from '../lib/result-types.js';
import { RagError, ValidationError, errorMessage } from '../lib/errors.js';
import { TextChunker } from './chunker/TextChunker.js';
import { DatabaseService } from './database.js';
import { DocumentRepository } from './database/DocumentRepository.js';
import { EmbeddingRepository } from './database/EmbeddingRepository.js';
import { DocumentService } from './document-service.js';
import type { IEmbeddingGateway } from './embedding/gateway-interface.js';
import { OllamaGateway } from './embedding/ollama-gateway.js';
import { EmbeddingService } from './embedding-service.js';
import { IngestionPipeline } from './ingestion-pipeline.js';

export interface RagContext {
  config: RagConfig;
  database: DatabaseService;
  gateway: IEmbeddingGateway;
  embeddings: EmbeddingService;
  documents: DocumentService;
  close(): void;
}

export interface RagContextOverrides {
  /** Replaces the Ollama gateway (tests, alternative backends) */
  gateway?: IEmbeddingGateway;
}

/**
 * Open the database and build every service
 */
export function createRagContext(
  config: RagConfig,
  overrides: RagContextOverrides = {}
): RagResult<RagContext> {
  logger.configure({ logDir: config.logging.dir, consoleLevel: config.logging.level });

  const chunker = trySync(
    () => new TextChunker(config.chunking),
    (error) => (error instanceof RagError ? error : new ValidationError('Invalid chunk settings', errorMessage(error)))
  );
  if (chunker.isErr()) {
    return err(chunker.error);
  }

  const database = new DatabaseService({ dbPath: config.database.path });

  return database.init().map((db) => {
    const gateway = overrides.gateway ?? new OllamaGateway(config.gateway);
    const pipeline = new IngestionPipeline(chunker.value, gateway, {
      concurrency: config.ingestion.concurrency,
    });
    const repositoryOptions = { slowSearchMs: config.retrieval.slowSearchMs };
    const embeddingRepository = new EmbeddingRepository(db, repositoryOptions);
    const documentRepository = new DocumentRepository(db, repositoryOptions);

    return {
      config,
      database,
      gateway,
      embeddings: new EmbeddingService({
        database,
        repository: embeddingRepository,
        pipeline,
        chunker: chunker.value,
        gateway,
      }),
      documents: new DocumentService({
        repository: documentRepository,
        pipeline,
        gateway,
        sourceBaseUrl: config.retrieval.sourceBaseUrl,
      }),
      close: () => database.close(),
    };
  });
}
