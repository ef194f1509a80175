/**
 * Unit tests for RagOrchestrator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import {
  RagOrchestrator,
  buildContext,
  documentRetrievalSource,
  recordRetrievalSource,
} from '../../../src/services/rag-orchestrator.js';
import { IngestionPipeline } from '../../../src/services/ingestion-pipeline.js';
import { TextChunker } from '../../../src/services/chunker/TextChunker.js';
import { EmbeddingRepository } from '../../../src/services/database/EmbeddingRepository.js';
import { DocumentRepository } from '../../../src/services/database/DocumentRepository.js';
import { UpstreamUnavailableError, ValidationError } from '../../../src/lib/errors.js';
import { createTestDatabase, fixedClock, TEST_TIMESTAMP } from '../../helpers/database-test-helper.js';
import { FakeGateway } from '../../helpers/fake-gateway.js';

const QUESTION = 'Why do cats purr?';

describe('RagOrchestrator', () => {
  let db: Database.Database;
  let records: EmbeddingRepository;
  let gateway: FakeGateway;
  let orchestrator: RagOrchestrator;

  beforeEach(() => {
    db = createTestDatabase();
    records = new EmbeddingRepository(db, { clock: fixedClock });
    gateway = new FakeGateway({ [QUESTION]: [1, 0] });
    orchestrator = new RagOrchestrator(new IngestionPipeline(new TextChunker(), gateway), gateway);
  });

  afterEach(() => {
    db.close();
  });

  it('should ask the model directly when retrieval is off', async () => {
    records.insert('Cats purr.', [1, 0]);

    const answer = (
      await orchestrator.answer(QUESTION, { topK: 3, useRetrieval: false }, recordRetrievalSource(records))
    )._unsafeUnwrap();

    expect(answer).toEqual({
      question: QUESTION,
      answer: 'test answer',
      usedRetrieval: false,
      retrievalAttempted: false,
      sources: [],
    });
    expect(gateway.embedCalls).toEqual([]);
    expect(gateway.generateCalls).toEqual([{ question: QUESTION, context: undefined }]);
  });

  it('should fall back to a plain answer when the store is empty', async () => {
    const answer = (
      await orchestrator.answer(QUESTION, { topK: 3, useRetrieval: true }, recordRetrievalSource(records))
    )._unsafeUnwrap();

    expect(answer.usedRetrieval).toBe(false);
    expect(answer.retrievalAttempted).toBe(true);
    expect(answer.sources).toEqual([]);
    expect(gateway.embedCalls).toEqual([QUESTION]);
    expect(gateway.generateCalls).toEqual([{ question: QUESTION, context: undefined }]);
  });

  it('should ground the answer in the most similar records', async () => {
    records.insert('Cats purr.', [1, 0]);
    records.insert('Dogs bark.', [0, 1]);

    const answer = (
      await orchestrator.answer(QUESTION, { topK: 2, useRetrieval: true }, recordRetrievalSource(records))
    )._unsafeUnwrap();

    expect(gateway.generateCalls).toEqual([
      {
        question: QUESTION,
        context:
          'Source: Embedding #1\nSimilarity: 100.0%\nText: Cats purr.\n\n' +
          'Source: Embedding #2\nSimilarity: 0.0%\nText: Dogs bark.',
      },
    ]);
    expect(answer.usedRetrieval).toBe(true);
    expect(answer.sources[0]).toEqual({
      key: { kind: 'record', recordId: 1 },
      label: 'Embedding #1',
      preview: 'Cats purr.',
      similarity: 1,
      similarityPercent: '100.0%',
      createdAt: TEST_TIMESTAMP,
    });
    expect(answer.sources).toHaveLength(2);
  });

  it('should shorten source previews to 300 characters', async () => {
    records.insert('a'.repeat(400), [1, 0]);

    const answer = (
      await orchestrator.answer(QUESTION, { topK: 1, useRetrieval: true }, recordRetrievalSource(records))
    )._unsafeUnwrap();

    expect(answer.sources[0]?.preview).toBe(`${'a'.repeat(300)}...`);
  });

  it('should link document chunks', async () => {
    const documents = new DocumentRepository(db, { clock: fixedClock });
    documents.saveDocumentWithChunks('guide.md', 'Cats purr when content.', [
      {
        chunk: { index: 0, text: 'Cats purr when content.', startOffset: 0, endOffset: 23, estimatedTokenCount: 5 },
        vector: [0.8, 0.6],
      },
    ]);

    const answer = (
      await orchestrator.answer(
        QUESTION,
        { topK: 3, useRetrieval: true },
        documentRetrievalSource(documents, 'http://localhost:8080')
      )
    )._unsafeUnwrap();

    expect(answer.sources).toEqual([
      {
        key: { kind: 'document', documentId: 1, documentName: 'guide.md', chunkIndex: 0 },
        label: 'guide.md, chunk 1',
        preview: 'Cats purr when content.',
        similarity: answer.sources[0]?.similarity,
        similarityPercent: '80.0%',
        link: 'http://localhost:8080/api/documents/1/chunks/0',
      },
    ]);
    expect(answer.sources[0]?.similarity).toBeCloseTo(0.8, 10);
  });

  it('should reject a blank question before calling the backend', async () => {
    const result = await orchestrator.answer('   ', { topK: 3, useRetrieval: true }, recordRetrievalSource(records));

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
    expect(gateway.embedCalls).toEqual([]);
    expect(gateway.generateCalls).toEqual([]);
  });

  it('should pass generation failures through', async () => {
    records.insert('Cats purr.', [1, 0]);
    gateway.generateFailure = new UpstreamUnavailableError('Backend unreachable at http://ollama.test');

    const result = await orchestrator.answer(QUESTION, { topK: 1, useRetrieval: true }, recordRetrievalSource(records));

    expect(result._unsafeUnwrapErr()).toBe(gateway.generateFailure);
  });
});

describe('buildContext', () => {
  it('should return an empty string for no passages', () => {
    expect(buildContext([])).toBe('');
  });
});
