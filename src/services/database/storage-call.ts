/**
 * Wraps synchronous better-sqlite3 work into a Result, logging failures
 */

import { RagError, StorageError, toStorageError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { RagResult, trySync } from '../../lib/result-types.js';

/**
 * Domain errors raised inside `fn` (e.g. a dimension mismatch) pass through
 * unlogged; only storage failures reach the database error log.
 */
export function storageCall<T>(operation: string, table: string, fn: () => T): RagResult<T> {
  return trySync(fn, toStorageError(operation)).mapErr((error: RagError) => {
    if (error instanceof StorageError) {
      logger.logDatabaseError(operation, error.cause ?? error, { table });
    }
    return error;
  });
}
