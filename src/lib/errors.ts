/**
 * Error Hierarchy
 *
 * Typed failures for the retrieval pipeline. Every error carries a stable
 * code, whether retrying the same call can succeed, and the status code the
 * outer transport layer should answer with.
 */

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base class for all errors surfaced by text-rag
 */
export abstract class RagError extends Error {
	abstract readonly code: string;
	abstract readonly retryable: boolean;
	abstract readonly status: number;
	readonly timestamp: Date = new Date();

	constructor(
		message: string,
		public readonly details?: string,
		public override cause?: Error
	) {
		super(message);
		this.name = this.constructor.name;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

// ============================================================================
// Caller Errors
// ============================================================================

/**
 * Input rejected before any work was done (blank text, bad id, ...)
 */
export class ValidationError extends RagError {
	readonly code = 'VALIDATION_ERROR';
	readonly retryable = false;
	readonly status = 400;
}

/**
 * Referenced record, document or chunk does not exist
 */
export class NotFoundError extends RagError {
	readonly code = 'NOT_FOUND';
	readonly retryable = false;
	readonly status = 404;
}

// ============================================================================
// Upstream (Embedding / Generation Backend) Errors
// ============================================================================

/**
 * Backend unreachable or answered with a non-success status
 */
export class UpstreamUnavailableError extends RagError {
	readonly code = 'UPSTREAM_UNAVAILABLE';
	readonly retryable = true;
	readonly status = 502;

	constructor(
		message: string,
		details?: string,
		cause?: Error,
		public readonly httpStatus?: number
	) {
		super(message, details, cause);
	}
}

/**
 * Backend did not answer within the configured bound
 */
export class UpstreamTimeoutError extends RagError {
	readonly code = 'UPSTREAM_TIMEOUT';
	readonly retryable = true;
	readonly status = 504;

	constructor(
		message: string,
		public readonly timeoutMs: number,
		cause?: Error
	) {
		super(message, `Request exceeded ${timeoutMs}ms`, cause);
	}
}

/**
 * Backend answered but the payload held no vector or no answer
 */
export class EmptyResultError extends RagError {
	readonly code = 'EMPTY_RESULT';
	readonly retryable = false;
	readonly status = 502;
}

// ============================================================================
// Internal Errors
// ============================================================================

/**
 * Two vectors of different dimensionality were combined
 */
export class DimensionMismatchError extends RagError {
	readonly code = 'DIMENSION_MISMATCH';
	readonly retryable = false;
	readonly status = 500;

	constructor(
		public readonly expected: number,
		public readonly actual: number
	) {
		super(
			`Vectors must have the same dimensions (got ${expected} and ${actual})`
		);
	}
}

/**
 * SQLite operation failed
 */
export class StorageError extends RagError {
	readonly code = 'STORAGE_ERROR';
	readonly retryable = false;
	readonly status = 500;
}

/**
 * Configuration could not be loaded or is invalid
 */
export class ConfigError extends RagError {
	readonly code = 'CONFIG_ERROR';
	readonly retryable = false;
	readonly status = 500;
}

/**
 * Errors the embedding gateway may return
 */
export type GatewayError =
	| UpstreamUnavailableError
	| UpstreamTimeoutError
	| EmptyResultError;

// ============================================================================
// Boundary Helpers
// ============================================================================

/**
 * Structured error body returned to transport-level callers
 */
export interface ErrorBody {
	error: string;
	code: string;
	details?: string;
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown thrown value as a StorageError, passing RagErrors through
 */
export function toStorageError(operation: string) {
	return (error: unknown): RagError => {
		if (error instanceof RagError) {
			return error;
		}
		return new StorageError(
			`${operation} failed`,
			errorMessage(error),
			error instanceof Error ? error : undefined
		);
	};
}

/**
 * Status code for any failure; unknown failures map to 500
 */
export function statusFor(error: unknown): number {
	return error instanceof RagError ? error.status : 500;
}

/**
 * Convert any failure to the `{ error, details? }` body
 */
export function toErrorBody(error: unknown): ErrorBody {
	if (error instanceof RagError) {
		const body: ErrorBody = { error: error.message, code: error.code };
		if (error.details !== undefined) {
			body.details = error.details;
		}
		return body;
	}

	return {
		error: 'Unexpected failure',
		code: 'INTERNAL_ERROR',
		details: errorMessage(error),
	};
}
