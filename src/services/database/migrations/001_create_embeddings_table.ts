/**
 * Migration 001: Create meta bookkeeping and the standalone embeddings table
 *
 * This migration creates:
 * - meta key/value table holding schema_version
 * - migration_history table
 * - embeddings table for free-standing text records
 */

import type { Database } from 'better-sqlite3';

export const version = '001';
export const description = 'create embeddings table';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS migration_history (
      version TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at INTEGER NOT NULL DEFAULT (unixepoch())
    );
  `);

  db.exec(`
    CREATE TABLE embeddings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT NOT NULL,
      embedding TEXT NOT NULL, -- JSON: number[]
      created_at TEXT NOT NULL
    );
  `);

  db.exec('CREATE INDEX idx_embeddings_created ON embeddings(created_at);');
}
