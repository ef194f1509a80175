/**
 * Migration 002: Create documents and their chunks
 *
 * Deleting a document removes its chunks through the foreign key cascade.
 */

import type { Database } from 'better-sqlite3';

export const version = '002';
export const description = 'create documents tables';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE documents (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      file_name TEXT NOT NULL,
      file_size INTEGER NOT NULL CHECK(file_size >= 0),
      content TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE document_chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      document_id INTEGER NOT NULL,
      chunk_index INTEGER NOT NULL,
      text TEXT NOT NULL,
      embedding TEXT NOT NULL, -- JSON: number[]
      start_offset INTEGER NOT NULL,
      end_offset INTEGER NOT NULL,
      token_count INTEGER NOT NULL,
      created_at TEXT NOT NULL,

      FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE,
      UNIQUE (document_id, chunk_index),
      CHECK (start_offset < end_offset),
      CHECK (token_count >= 1)
    );
  `);

  db.exec(`
    CREATE INDEX idx_documents_created ON documents(created_at);
    CREATE INDEX idx_document_chunks_document ON document_chunks(document_id, chunk_index);
  `);
}
