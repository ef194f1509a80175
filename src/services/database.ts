/**
 * Database Service
 *
 * Owns the SQLite connection lifecycle. Repositories receive the handle from
 * here; nothing holds a global connection.
 */

import Database from 'better-sqlite3';
import { closeDatabase, initializeDatabase } from '../lib/database-init.js';
import { StorageError, errorMessage } from '../lib/errors.js';
import { Result, err, ok } from '../lib/result-types.js';
import type { Migration } from '../models/database-schema.js';

export interface DatabaseServiceOptions {
  dbPath: string;
  migrations?: readonly Migration[];
}

export interface DatabaseStats {
  dbPath: string;
  dbSizeBytes: number;
  schemaVersion: string;
}

/**
 * Database service - open/migrate on init, checkpoint on close
 */
export class DatabaseService {
  private db: Database.Database | null = null;
  private schemaVersion = '0';

  constructor(private readonly options: DatabaseServiceOptions) {}

  /**
   * Open the database and apply pending migrations (idempotent)
   */
  init(): Result<Database.Database, StorageError> {
    if (this.db !== null) {
      return ok(this.db);
    }

    try {
      const result = initializeDatabase({
        dbPath: this.options.dbPath,
        migrations: this.options.migrations,
      });
      this.db = result.db;
      this.schemaVersion = result.schemaVersion;
      return ok(result.db);
    } catch (error) {
      return err(
        new StorageError(
          `Failed to open database at ${this.options.dbPath}`,
          errorMessage(error),
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  /**
   * The open connection
   *
   * @throws StorageError if init() has not succeeded
   */
  get connection(): Database.Database {
    if (this.db === null) {
      throw new StorageError('Database is not initialized', 'call init() first');
    }
    return this.db;
  }

  isOpen(): boolean {
    return this.db !== null && this.db.open;
  }

  /**
   * Liveness probe used by health checks; never throws
   */
  ping(): boolean {
    if (this.db === null) {
      return false;
    }
    try {
      return this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get()?.ok === 1;
    } catch {
      return false;
    }
  }

  getStats(): DatabaseStats {
    const db = this.connection;
    const pageCount = db.pragma('page_count', { simple: true });
    const pageSize = db.pragma('page_size', { simple: true });

    return {
      dbPath: this.options.dbPath,
      dbSizeBytes:
        typeof pageCount === 'number' && typeof pageSize === 'number' ? pageCount * pageSize : 0,
      schemaVersion: this.schemaVersion,
    };
  }

  close(): void {
    if (this.db === null) {
      return;
    }
    closeDatabase(this.db);
    this.db = null;
  }
}
