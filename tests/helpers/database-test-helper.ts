/**
 * Database test helper
 * In-memory databases with the production migrations applied
 */

import Database from 'better-sqlite3';
import { IN_MEMORY_DB, initializeDatabase } from '../../src/lib/database-init.js';

export const TEST_TIMESTAMP = '2024-01-15T10:00:00.000Z';

/**
 * Clock returning the same instant on every call
 */
export const fixedClock = (): Date => new Date(TEST_TIMESTAMP);

/**
 * Create an in-memory test database with the production schema
 */
export function createTestDatabase(): Database.Database {
  return initializeDatabase({ dbPath: IN_MEMORY_DB }).db;
}
