/**
 * Input checks shared by the services
 */

import { ValidationError } from './errors.js';
import { RagResult, err, ok } from './result-types.js';

/**
 * Accept a positive integer id given as a number or a decimal string
 */
export function parseId(value: unknown, field = 'id'): RagResult<number> {
  const id =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : NaN;

  if (!Number.isSafeInteger(id) || id <= 0) {
    return err(new ValidationError(`Invalid ${field}`, `expected a positive integer, got ${JSON.stringify(value)}`));
  }
  return ok(id);
}

/**
 * Accept a non-negative integer (chunk indices)
 */
export function parseIndex(value: unknown, field = 'index'): RagResult<number> {
  const index =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : NaN;

  if (!Number.isSafeInteger(index) || index < 0) {
    return err(new ValidationError(`Invalid ${field}`, `expected a non-negative integer, got ${JSON.stringify(value)}`));
  }
  return ok(index);
}

/**
 * Reject empty or whitespace-only text
 */
export function requireText(value: string, field: string): RagResult<string> {
  if (value.trim().length === 0) {
    return err(new ValidationError(`${field} must not be blank`));
  }
  return ok(value);
}

/**
 * Result limit for searches; must be a positive integer
 */
export function parseTopK(value: number): RagResult<number> {
  if (!Number.isInteger(value) || value <= 0) {
    return err(new ValidationError('Invalid topK', `expected a positive integer, got ${value}`));
  }
  return ok(value);
}
