/**
 * Unit tests for MigrationRunner and DatabaseService
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { MigrationRunner } from '../../../src/services/migration-runner.js';
import { DatabaseService } from '../../../src/services/database.js';
import { MIGRATIONS } from '../../../src/services/database/migrations/index.js';
import { StorageError } from '../../../src/lib/errors.js';
import type { Migration } from '../../../src/models/database-schema.js';

const failingMigration: Migration = {
  version: '003',
  description: 'always fails',
  up: () => {
    throw new Error('boom');
  },
};

function tableNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);
}

describe('MigrationRunner', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should report version 0 on a fresh database', () => {
    expect(new MigrationRunner(db).getCurrentVersion()).toBe('0');
  });

  it('should apply every migration once', () => {
    const runner = new MigrationRunner(db);

    expect(runner.applyMigrations()).toBe(2);
    expect(runner.getCurrentVersion()).toBe('002');
    expect(runner.applyMigrations()).toBe(0);
    expect(tableNames(db)).toEqual([
      'document_chunks',
      'documents',
      'embeddings',
      'meta',
      'migration_history',
    ]);
    expect(db.prepare<[], { version: string }>('SELECT version FROM migration_history ORDER BY version').all())
      .toEqual([{ version: '001' }, { version: '002' }]);
  });

  it('should leave the schema untouched when a migration fails', () => {
    const runner = new MigrationRunner(db, [...MIGRATIONS, failingMigration]);

    expect(() => runner.applyMigrations()).toThrow('Migration 003 failed: boom');
    expect(runner.getCurrentVersion()).toBe('002');
  });

  it('should reject duplicate versions', () => {
    const runner = new MigrationRunner(db);
    const first = MIGRATIONS[0];
    if (first === undefined) {
      throw new Error('no migrations');
    }

    expect(() => runner.validateMigrations([first, first])).toThrow('Duplicate migration version: 001');
  });
});

describe('DatabaseService', () => {
  it('should refuse access before init', () => {
    const service = new DatabaseService({ dbPath: ':memory:' });

    expect(service.isOpen()).toBe(false);
    expect(service.ping()).toBe(false);
    expect(() => service.connection).toThrow(StorageError);
  });

  it('should open, migrate and close', () => {
    const service = new DatabaseService({ dbPath: ':memory:' });

    const db = service.init()._unsafeUnwrap();

    expect(service.init()._unsafeUnwrap()).toBe(db);
    expect(service.ping()).toBe(true);
    expect(service.getStats().schemaVersion).toBe('002');
    expect(service.getStats().dbSizeBytes).toBeGreaterThan(0);

    service.close();

    expect(service.isOpen()).toBe(false);
  });

  it('should return a StorageError when migrations fail', () => {
    const service = new DatabaseService({ dbPath: ':memory:', migrations: [...MIGRATIONS, failingMigration] });

    const error = service.init()._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toBe('Failed to open database at :memory:');
    expect(error.details).toBe('Migration 003 failed: boom');
  });
});
