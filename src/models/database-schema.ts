/**
 * Database Schema Type Definitions
 *
 * Row shapes for every table and the SQLite configuration types used by
 * the retrieval store.
 */

import type { Database } from 'better-sqlite3';

/**
 * SQLite PRAGMA configuration settings
 */
export interface SQLitePragmaConfig {
	/** Write-Ahead Logging mode for concurrent readers */
	journal_mode: 'WAL' | 'MEMORY';
	/** Synchronous mode - NORMAL is safe with WAL */
	synchronous: 'NORMAL' | 'FULL' | 'OFF';
	/** Page cache size in kibibytes (negative = KB, positive = pages) */
	cache_size: number;
	/** Temporary storage location */
	temp_store: 'MEMORY' | 'FILE' | 'DEFAULT';
	/** Memory-mapped I/O size in bytes (virtual addressing) */
	mmap_size: number;
	/** WAL auto-checkpoint interval in pages */
	wal_autocheckpoint: number;
	/** Enable foreign key constraint enforcement */
	foreign_keys: 'ON' | 'OFF';
}

/**
 * Default PRAGMA configuration
 */
export const DEFAULT_PRAGMA_CONFIG: SQLitePragmaConfig = {
	journal_mode: 'WAL',
	synchronous: 'NORMAL',
	cache_size: -64000, // 64MB
	temp_store: 'MEMORY',
	mmap_size: 268435456, // 256MB
	wal_autocheckpoint: 1000,
	foreign_keys: 'ON',
};

/**
 * A schema migration, applied in version order inside a transaction
 */
export interface Migration {
	version: string;
	description: string;
	up(db: Database): void;
}

// ============================================================================
// Row Interfaces
// ============================================================================

/**
 * Row of the `embeddings` table (standalone record)
 */
export interface EmbeddingRow {
	id: number;
	text: string;
	/** JSON array of floats */
	embedding: string;
	/** ISO-8601 UTC */
	created_at: string;
}

/**
 * Row of the `documents` table
 */
export interface DocumentRow {
	id: number;
	file_name: string;
	file_size: number;
	content: string;
	created_at: string;
}

/**
 * Row of the `document_chunks` table
 */
export interface DocumentChunkRow {
	id: number;
	document_id: number;
	chunk_index: number;
	text: string;
	embedding: string;
	start_offset: number;
	end_offset: number;
	token_count: number;
	created_at: string;
}
