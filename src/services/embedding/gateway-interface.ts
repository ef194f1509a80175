/**
 * Embedding Gateway Interface
 *
 * Contract for the external model backend: text in, vector out, plus
 * question answering over an optional context block.
 */

import type { GatewayError } from '../../lib/errors.js';
import type { Result } from '../../lib/result-types.js';

export const GROUNDED_SYSTEM_PROMPT =
	'You are an assistant that answers questions using the provided context. ' +
	'If the context does not contain enough information, say so honestly. ' +
	'Context:\n';

export const GENERAL_SYSTEM_PROMPT =
	'You are a helpful assistant. Answer questions using your own knowledge.';

/**
 * Chat message sent to the generation model
 */
export interface ChatMessage {
	role: 'system' | 'user' | 'assistant';
	content: string;
}

/**
 * System + user messages for a question, grounded when context is given
 */
export function buildMessages(question: string, context?: string): ChatMessage[] {
	const system = context !== undefined ? GROUNDED_SYSTEM_PROMPT + context : GENERAL_SYSTEM_PROMPT;
	return [
		{ role: 'system', content: system },
		{ role: 'user', content: question },
	];
}

/**
 * Core gateway interface
 *
 * Failures are returned, never thrown, and never replaced by placeholder
 * vectors or answers.
 */
export interface IEmbeddingGateway {
	/** Display name for health output (e.g. "ollama:nomic-embed-text") */
	readonly id: string;

	/**
	 * Embed one text; the vector is returned as produced by the model (not normalized)
	 */
	embed(text: string): Promise<Result<number[], GatewayError>>;

	/**
	 * Answer a question, grounded in `context` when given
	 */
	generate(question: string, context?: string): Promise<Result<string, GatewayError>>;

	/**
	 * Liveness probe; resolves false on any failure
	 */
	isAvailable(): Promise<boolean>;
}
