/**
 * Migration Runner Service
 *
 * Executes schema migrations sequentially, tracks version history,
 * and keeps every migration atomic.
 */

import Database from 'better-sqlite3';
import type { Migration } from '../models/database-schema.js';
import { MIGRATIONS } from './database/migrations/index.js';
import { logger } from '../lib/logger.js';

/**
 * Migration Runner
 *
 * Manages database schema migrations with transaction safety
 */
export class MigrationRunner {
	private db: Database.Database;
	private migrations: readonly Migration[];

	constructor(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS) {
		this.db = db;
		this.migrations = migrations;
	}

	/**
	 * Get current schema version from meta table
	 *
	 * @returns Current schema version or '0' on a fresh database
	 */
	getCurrentVersion(): string {
		const metaExists = this.db
			.prepare("SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = 'meta'")
			.get();

		if (metaExists === undefined) {
			return '0';
		}

		const row = this.db
			.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
			.get('schema_version');

		return row ? row.value : '0';
	}

	/**
	 * Get list of pending migrations, lowest version first
	 */
	getPendingMigrations(currentVersion: string): Migration[] {
		return [...this.migrations]
			.filter((m) => m.version > currentVersion)
			.sort((a, b) => a.version.localeCompare(b.version));
	}

	/**
	 * Validate migrations before execution
	 *
	 * @throws Error on duplicate or non-numeric versions
	 */
	validateMigrations(migrations: Migration[]): void {
		const versions = new Set<string>();

		for (const migration of migrations) {
			if (!/^\d+$/.test(migration.version)) {
				throw new Error(
					`Invalid migration version format: ${migration.version} (expected numeric)`
				);
			}
			if (versions.has(migration.version)) {
				throw new Error(`Duplicate migration version: ${migration.version}`);
			}
			versions.add(migration.version);
		}
	}

	/**
	 * Apply all pending migrations sequentially
	 *
	 * Each migration runs in its own transaction. A failing migration is
	 * rolled back and halts the run.
	 *
	 * @returns Number of migrations applied
	 */
	applyMigrations(): number {
		const pending = this.getPendingMigrations(this.getCurrentVersion());

		if (pending.length === 0) {
			logger.debug('Database schema is up to date');
			return 0;
		}

		this.validateMigrations(pending);

		for (const migration of pending) {
			const apply = this.db.transaction(() => {
				migration.up(this.db);
				this.updateSchemaVersion(migration.version);
				this.recordMigration(migration);
			});

			try {
				apply();
				logger.info('Migration applied', {
					version: migration.version,
					description: migration.description,
				});
			} catch (error) {
				const errorMessage = error instanceof Error ? error.message : String(error);
				logger.logDatabaseError('migrate', error, {
					additionalContext: { version: migration.version },
				});
				throw new Error(`Migration ${migration.version} failed: ${errorMessage}`);
			}
		}

		return pending.length;
	}

	private updateSchemaVersion(version: string): void {
		this.db
			.prepare(`
				INSERT OR REPLACE INTO meta (key, value, updated_at)
				VALUES ('schema_version', ?, unixepoch())
			`)
			.run(version);
	}

	private recordMigration(migration: Migration): void {
		this.db
			.prepare('INSERT INTO migration_history (version, description) VALUES (?, ?)')
			.run(migration.version, migration.description);
	}
}
