/**
 * Repository for uploaded documents and their embedded chunks
 *
 * Chunks reference their document with ON DELETE CASCADE, so removing a
 * document removes every chunk in the same statement.
 */

import Database from 'better-sqlite3';
import type { DocumentChunkRow, DocumentRow } from '../../models/database-schema.js';
import type { EmbeddedChunk } from '../../models/chunk.js';
import type {
  DocumentChunkRecord,
  DocumentRecord,
  RetrievalResult,
} from '../../models/records.js';
import { RagResult, ok } from '../../lib/result-types.js';
import { logger } from '../../lib/logger.js';
import { decodeEmbedding, encodeEmbedding } from '../../lib/vector-math.js';
import type { Vector } from '../../lib/vector-math.js';
import type { RepositoryOptions } from './EmbeddingRepository.js';
import { rankBySimilarity } from './similarity-search.js';
import { storageCall } from './storage-call.js';

type DocumentListRow = Omit<DocumentRow, 'content'> & { chunk_count: number };
type ChunkWithNameRow = DocumentChunkRow & { file_name: string };

interface ChunkInsert {
  document_id: number;
  chunk_index: number;
  text: string;
  embedding: string;
  start_offset: number;
  end_offset: number;
  token_count: number;
  created_at: string;
}

const DOCUMENT_COLUMNS = `
  d.id, d.file_name, d.file_size, d.created_at,
  (SELECT COUNT(*) FROM document_chunks c WHERE c.document_id = d.id) AS chunk_count
`;

const CHUNK_COLUMNS = 'c.*, d.file_name';

function prepareStatements(db: Database.Database) {
  return {
    insertDocument: db.prepare<{ file_name: string; file_size: number; content: string; created_at: string }>(`
      INSERT INTO documents (file_name, file_size, content, created_at)
      VALUES (@file_name, @file_size, @content, @created_at)
    `),
    insertChunk: db.prepare<ChunkInsert>(`
      INSERT INTO document_chunks (
        document_id, chunk_index, text, embedding, start_offset, end_offset, token_count, created_at
      ) VALUES (
        @document_id, @chunk_index, @text, @embedding, @start_offset, @end_offset, @token_count, @created_at
      )
    `),
    findDocument: db.prepare<[number], DocumentListRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents d WHERE d.id = ?`
    ),
    findAllDocuments: db.prepare<[], DocumentListRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents d ORDER BY d.id`
    ),
    findChunksByDocument: db.prepare<[number], ChunkWithNameRow>(`
      SELECT ${CHUNK_COLUMNS}
      FROM document_chunks c JOIN documents d ON d.id = c.document_id
      WHERE c.document_id = ?
      ORDER BY c.chunk_index
    `),
    findChunk: db.prepare<[number, number], ChunkWithNameRow>(`
      SELECT ${CHUNK_COLUMNS}
      FROM document_chunks c JOIN documents d ON d.id = c.document_id
      WHERE c.document_id = ? AND c.chunk_index = ?
    `),
    findAllChunks: db.prepare<[], ChunkWithNameRow>(`
      SELECT ${CHUNK_COLUMNS}
      FROM document_chunks c JOIN documents d ON d.id = c.document_id
      ORDER BY c.id
    `),
    deleteDocument: db.prepare<[number]>('DELETE FROM documents WHERE id = ?'),
    countDocuments: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM documents'),
    countChunks: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM document_chunks'),
  };
}

function toDocument(row: DocumentListRow): DocumentRecord {
  return {
    id: row.id,
    fileName: row.file_name,
    fileSize: row.file_size,
    chunkCount: row.chunk_count,
    createdAt: row.created_at,
  };
}

function toChunk(row: ChunkWithNameRow): DocumentChunkRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    documentName: row.file_name,
    chunkIndex: row.chunk_index,
    text: row.text,
    vector: decodeEmbedding(row.embedding),
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    tokenCount: row.token_count,
    createdAt: row.created_at,
  };
}

/**
 * DocumentRepository - Data access layer for documents and document_chunks
 */
export class DocumentRepository {
  private readonly db: Database.Database;
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly slowSearchMs: number;
  private readonly clock: () => Date;

  constructor(db: Database.Database, options: RepositoryOptions = {}) {
    this.db = db;
    this.statements = prepareStatements(db);
    this.slowSearchMs = options.slowSearchMs ?? 200;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * @returns id of the new document
   */
  insertDocument(fileName: string, content: string): RagResult<number> {
    return storageCall('insert_document', 'documents', () => this.writeDocument(fileName, content));
  }

  /**
   * @returns id of the new chunk row
   */
  insertChunk(documentId: number, embedded: EmbeddedChunk): RagResult<number> {
    return storageCall('insert_chunk', 'document_chunks', () =>
      this.writeChunk(documentId, embedded, this.clock().toISOString())
    );
  }

  /**
   * Write a document and all of its chunks in one transaction
   */
  saveDocumentWithChunks(
    fileName: string,
    content: string,
    chunks: readonly EmbeddedChunk[]
  ): RagResult<DocumentRecord> {
    const save = this.db.transaction((): DocumentRecord => {
      const documentId = this.writeDocument(fileName, content);
      const createdAt = this.clock().toISOString();

      for (const embedded of chunks) {
        this.writeChunk(documentId, embedded, createdAt);
      }

      const row = this.statements.findDocument.get(documentId);
      if (row === undefined) {
        throw new Error(`Document ${documentId} vanished during save`);
      }
      return toDocument(row);
    });

    return storageCall('save_document', 'documents', () => save()).map((document) => {
      logger.info('Document stored', {
        documentId: document.id,
        fileName: document.fileName,
        chunks: document.chunkCount,
      });
      return document;
    });
  }

  findDocumentById(id: number): RagResult<DocumentRecord | null> {
    return storageCall('find_document', 'documents', () => {
      const row = this.statements.findDocument.get(id);
      return row ? toDocument(row) : null;
    });
  }

  findAllDocuments(): RagResult<DocumentRecord[]> {
    return storageCall('list_documents', 'documents', () =>
      this.statements.findAllDocuments.all().map(toDocument)
    );
  }

  /**
   * Chunks of one document, chunkIndex ascending
   */
  findChunksByDocument(documentId: number): RagResult<DocumentChunkRecord[]> {
    return storageCall('list_chunks', 'document_chunks', () =>
      this.statements.findChunksByDocument.all(documentId).map(toChunk)
    );
  }

  findChunk(documentId: number, chunkIndex: number): RagResult<DocumentChunkRecord | null> {
    return storageCall('find_chunk', 'document_chunks', () => {
      const row = this.statements.findChunk.get(documentId, chunkIndex);
      return row ? toChunk(row) : null;
    });
  }

  /**
   * Delete a document and, by cascade, its chunks
   *
   * @returns true if a document was removed
   */
  deleteDocument(id: number): RagResult<boolean> {
    return storageCall('delete_document', 'documents', () =>
      this.statements.deleteDocument.run(id).changes > 0
    );
  }

  countDocuments(): RagResult<number> {
    return storageCall('count_documents', 'documents', () =>
      this.statements.countDocuments.get()?.count ?? 0
    );
  }

  countChunks(): RagResult<number> {
    return storageCall('count_chunks', 'document_chunks', () =>
      this.statements.countChunks.get()?.count ?? 0
    );
  }

  /**
   * Linear scan over every chunk of every document, best `topK` first
   */
  search(queryVector: Vector, topK: number): RagResult<RetrievalResult<DocumentChunkRecord>[]> {
    if (topK <= 0) {
      return ok([]);
    }

    return storageCall('search_chunks', 'document_chunks', () =>
      rankBySimilarity(queryVector, this.statements.findAllChunks.all().map(toChunk), topK, {
        operation: 'search_chunks',
        slowThresholdMs: this.slowSearchMs,
      })
    );
  }

  private writeDocument(fileName: string, content: string): number {
    const info = this.statements.insertDocument.run({
      file_name: fileName,
      file_size: Buffer.byteLength(content, 'utf8'),
      content,
      created_at: this.clock().toISOString(),
    });
    return Number(info.lastInsertRowid);
  }

  private writeChunk(documentId: number, embedded: EmbeddedChunk, createdAt: string): number {
    const { chunk, vector } = embedded;
    const info = this.statements.insertChunk.run({
      document_id: documentId,
      chunk_index: chunk.index,
      text: chunk.text,
      embedding: encodeEmbedding(vector),
      start_offset: chunk.startOffset,
      end_offset: chunk.endOffset,
      token_count: chunk.estimatedTokenCount,
      created_at: createdAt,
    });
    return Number(info.lastInsertRowid);
  }
}
