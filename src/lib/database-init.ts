/**
 * Database Initialization Helper
 *
 * Opens the SQLite store, applies PRAGMA configuration and runs pending
 * migrations.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import {
	DEFAULT_PRAGMA_CONFIG,
	type Migration,
	type SQLitePragmaConfig,
} from '../models/database-schema.js';
import { MigrationRunner } from '../services/migration-runner.js';
import { logger } from './logger.js';

export const IN_MEMORY_DB = ':memory:';

/**
 * Database initialization options
 */
export interface DatabaseInitOptions {
	/** Path to the database file, or `:memory:` */
	dbPath: string;
	/** Migration set (defaults to the production migrations) */
	migrations?: readonly Migration[];
}

/**
 * Database initialization result
 */
export interface DatabaseInitResult {
	db: Database.Database;
	/** Whether the database file was newly created */
	isNew: boolean;
	schemaVersion: string;
	migrationsApplied: number;
	durationMs: number;
}

/**
 * Initialize the database with all required setup
 *
 * @throws Error when the file cannot be opened or a migration fails
 */
export function initializeDatabase(options: DatabaseInitOptions): DatabaseInitResult {
	const startTime = performance.now();
	const inMemory = options.dbPath === IN_MEMORY_DB;

	if (!inMemory) {
		const dbDir = path.dirname(options.dbPath);
		if (!fs.existsSync(dbDir)) {
			fs.mkdirSync(dbDir, { recursive: true });
			logger.info('Created database directory', { path: dbDir });
		}
	}

	const isNew = inMemory || !fs.existsSync(options.dbPath);
	const db = new Database(options.dbPath);

	try {
		const pragmaConfig: SQLitePragmaConfig = {
			...DEFAULT_PRAGMA_CONFIG,
			// WAL needs a file
			...(inMemory ? { journal_mode: 'MEMORY' as const } : {}),
		};
		applyPragmaConfig(db, pragmaConfig);

		const runner = new MigrationRunner(db, options.migrations);
		const migrationsApplied = runner.applyMigrations();
		const schemaVersion = runner.getCurrentVersion();

		const durationMs = performance.now() - startTime;

		logger.info('Database initialization complete', {
			dbPath: options.dbPath,
			isNew,
			schemaVersion,
			migrationsApplied,
			durationMs: Math.round(durationMs),
		});

		return { db, isNew, schemaVersion, migrationsApplied, durationMs };
	} catch (error) {
		db.close();
		logger.logDatabaseError('initialize', error, {
			additionalContext: { dbPath: options.dbPath },
		});
		throw error;
	}
}

/**
 * Apply PRAGMA configuration to database
 */
function applyPragmaConfig(db: Database.Database, config: SQLitePragmaConfig): void {
	// Set journal mode (must be first for WAL)
	db.pragma(`journal_mode = ${config.journal_mode}`);
	db.pragma(`synchronous = ${config.synchronous}`);
	db.pragma(`cache_size = ${config.cache_size}`);
	db.pragma(`temp_store = ${config.temp_store}`);
	db.pragma(`mmap_size = ${config.mmap_size}`);
	db.pragma(`wal_autocheckpoint = ${config.wal_autocheckpoint}`);
	db.pragma(`foreign_keys = ${config.foreign_keys}`);
}

/**
 * Checkpoint the WAL and close the database
 */
export function closeDatabase(db: Database.Database): void {
	if (!db.open) {
		return;
	}

	try {
		if (db.pragma('journal_mode', { simple: true }) === 'wal') {
			db.pragma('wal_checkpoint(TRUNCATE)');
			logger.debug('WAL checkpoint completed before close');
		}

		db.close();
		logger.info('Database closed');
	} catch (error) {
		logger.logDatabaseError('close', error);
		throw error;
	}
}
