/**
 * Repository for standalone embedded texts
 */

import Database from 'better-sqlite3';
import type { EmbeddingRow } from '../../models/database-schema.js';
import type { RetrievalResult, StoredRecord } from '../../models/records.js';
import { RagResult, ok } from '../../lib/result-types.js';
import { decodeEmbedding, encodeEmbedding, type Vector } from '../../lib/vector-math.js';
import { rankBySimilarity } from './similarity-search.js';
import { storageCall } from './storage-call.js';

export interface RepositoryOptions {
  /** Similarity scans slower than this are logged (default: 200) */
  slowSearchMs?: number;
  /** Timestamp source for created_at */
  clock?: () => Date;
}

function prepareStatements(db: Database.Database) {
  return {
    insert: db.prepare<{ text: string; embedding: string; created_at: string }>(`
      INSERT INTO embeddings (text, embedding, created_at)
      VALUES (@text, @embedding, @created_at)
    `),
    findById: db.prepare<[number], EmbeddingRow>('SELECT * FROM embeddings WHERE id = ?'),
    findAll: db.prepare<[], EmbeddingRow>('SELECT * FROM embeddings ORDER BY id'),
    deleteById: db.prepare<[number]>('DELETE FROM embeddings WHERE id = ?'),
    count: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM embeddings'),
  };
}

function toRecord(row: EmbeddingRow): StoredRecord {
  return {
    id: row.id,
    text: row.text,
    vector: decodeEmbedding(row.embedding),
    createdAt: row.created_at,
  };
}

/**
 * EmbeddingRepository - Data access layer for the embeddings table
 */
export class EmbeddingRepository {
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly slowSearchMs: number;
  private readonly clock: () => Date;

  constructor(db: Database.Database, options: RepositoryOptions = {}) {
    this.statements = prepareStatements(db);
    this.slowSearchMs = options.slowSearchMs ?? 200;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Persist a text with its (already normalized) vector
   */
  insert(text: string, vector: Vector): RagResult<StoredRecord> {
    return storageCall('insert_embedding', 'embeddings', () => {
      const createdAt = this.clock().toISOString();
      const info = this.statements.insert.run({
        text,
        embedding: encodeEmbedding(vector),
        created_at: createdAt,
      });
      return { id: Number(info.lastInsertRowid), text, vector: [...vector], createdAt };
    });
  }

  findById(id: number): RagResult<StoredRecord | null> {
    return storageCall('find_embedding', 'embeddings', () => {
      const row = this.statements.findById.get(id);
      return row ? toRecord(row) : null;
    });
  }

  /**
   * All records in insertion order
   */
  findAll(): RagResult<StoredRecord[]> {
    return storageCall('list_embeddings', 'embeddings', () =>
      this.statements.findAll.all().map(toRecord)
    );
  }

  /**
   * @returns true if a row was removed
   */
  delete(id: number): RagResult<boolean> {
    return storageCall('delete_embedding', 'embeddings', () =>
      this.statements.deleteById.run(id).changes > 0
    );
  }

  count(): RagResult<number> {
    return storageCall('count_embeddings', 'embeddings', () =>
      this.statements.count.get()?.count ?? 0
    );
  }

  /**
   * Linear scan of every record, best `topK` first
   */
  search(queryVector: Vector, topK: number): RagResult<RetrievalResult<StoredRecord>[]> {
    if (topK <= 0) {
      return ok([]);
    }

    return storageCall('search_embeddings', 'embeddings', () =>
      rankBySimilarity(queryVector, this.statements.findAll.all().map(toRecord), topK, {
        operation: 'search_embeddings',
        slowThresholdMs: this.slowSearchMs,
      })
    );
  }
}
