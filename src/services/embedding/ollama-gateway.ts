/**
 * Ollama Gateway
 *
 * HTTP client for an Ollama-compatible backend:
 * - POST /api/embed  { model, input }            -> { embeddings: number[][] }
 * - POST /api/chat   { model, messages, stream } -> NDJSON lines { message, done }
 * - GET  /api/tags                               -> liveness
 */

import { z } from 'zod';
import {
	EmptyResultError,
	UpstreamTimeoutError,
	UpstreamUnavailableError,
	errorMessage,
	type GatewayError,
} from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { Result, err, ok, trySync } from '../../lib/result-types.js';
import { RetryManager } from '../../lib/RetryManager.js';
import type { GatewayConfig } from '../../lib/env-config.js';
import { buildMessages, type IEmbeddingGateway } from './gateway-interface.js';

const EmbedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())).optional(),
});

const ChatLineSchema = z.object({
	message: z.object({
		role: z.string().optional(),
		content: z.string(),
	}),
	done: z.boolean().optional(),
});

/** Upper bound for error bodies copied into error details */
const MAX_ERROR_BODY = 500;

function isAbortLike(error: unknown): error is { name: string } {
	return (
		typeof error === 'object' &&
		error !== null &&
		'name' in error &&
		(error.name === 'TimeoutError' || error.name === 'AbortError')
	);
}

function parseJson(text: string): Result<unknown, Error> {
	return trySync(
		(): unknown => JSON.parse(text),
		(error) => (error instanceof Error ? error : new Error(String(error)))
	);
}

/**
 * Split an NDJSON chat body and concatenate the message fragments in order
 *
 * Malformed lines are skipped; `valid` counts the lines that parsed.
 */
export function collectChatFragments(body: string): { content: string; valid: number; skipped: number } {
	let content = '';
	let valid = 0;
	let skipped = 0;

	for (const rawLine of body.split('\n')) {
		const line = rawLine.trim();
		if (line.length === 0) {
			continue;
		}

		const parsed = parseJson(line).map((value) => ChatLineSchema.safeParse(value));
		if (parsed.isErr() || !parsed.value.success) {
			skipped++;
			logger.warn('Skipping malformed chat response line', { line: line.slice(0, 200) });
			continue;
		}

		content += parsed.value.data.message.content;
		valid++;
	}

	return { content, valid, skipped };
}

/**
 * Gateway backed by an Ollama HTTP server
 */
export class OllamaGateway implements IEmbeddingGateway {
	readonly id: string;
	private readonly retryManager: RetryManager;

	constructor(private readonly config: GatewayConfig) {
		this.id = `ollama:${config.embedModel}`;
		this.retryManager = new RetryManager({
			maxAttempts: config.retryAttempts,
			onRetry: (error, attempt, nextDelay) => {
				logger.warn('Retrying upstream call', { code: error.code, attempt, nextDelay });
			},
		});
	}

	async embed(text: string): Promise<Result<number[], GatewayError>> {
		return this.retryManager.retry((attempt) => this.embedOnce(text, attempt));
	}

	async generate(question: string, context?: string): Promise<Result<string, GatewayError>> {
		return this.retryManager.retry((attempt) => this.generateOnce(question, context, attempt));
	}

	async isAvailable(): Promise<boolean> {
		try {
			const response = await fetch(`${this.config.baseUrl}/api/tags`, {
				signal: AbortSignal.timeout(this.config.healthTimeoutMs),
			});
			return response.ok;
		} catch (error) {
			logger.debug('Backend liveness probe failed', { error: errorMessage(error) });
			return false;
		}
	}

	private async embedOnce(text: string, attempt: number): Promise<Result<number[], GatewayError>> {
		const body = await this.post(
			'embed',
			'/api/embed',
			{ model: this.config.embedModel, input: text },
			this.config.embedTimeoutMs,
			attempt
		);

		return body.andThen((raw): Result<number[], GatewayError> => {
			const parsed = parseJson(raw).map((value) => EmbedResponseSchema.safeParse(value));
			if (parsed.isErr() || !parsed.value.success) {
				return err(
					new UpstreamUnavailableError('Malformed embedding response', raw.slice(0, MAX_ERROR_BODY))
				);
			}

			const vector = parsed.value.data.embeddings?.[0];
			if (vector === undefined || vector.length === 0) {
				return err(new EmptyResultError('Embedding backend returned no vector'));
			}
			return ok(vector);
		});
	}

	private async generateOnce(
		question: string,
		context: string | undefined,
		attempt: number
	): Promise<Result<string, GatewayError>> {
		if (context !== undefined) {
			logger.debug('Generating grounded answer', { contextChars: context.length });
		}

		const body = await this.post(
			'generate',
			'/api/chat',
			{
				model: this.config.chatModel,
				messages: buildMessages(question, context),
				stream: this.config.stream,
			},
			this.config.generateTimeoutMs,
			attempt
		);

		return body.andThen((raw): Result<string, GatewayError> => {
			const { content, valid, skipped } = collectChatFragments(raw);
			if (valid === 0) {
				return err(
					new EmptyResultError('Generation backend returned no answer', `${skipped} malformed line(s)`)
				);
			}
			return ok(content);
		});
	}

	/**
	 * POST a JSON body and return the raw response text
	 */
	private async post(
		operation: string,
		path: string,
		payload: Record<string, unknown>,
		timeoutMs: number,
		attempt: number
	): Promise<Result<string, GatewayError>> {
		const url = `${this.config.baseUrl}${path}`;
		const started = performance.now();

		logger.debug('Upstream request', { operation, url, attempt });

		let failure: GatewayError;
		try {
			const response = await fetch(url, {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify(payload),
				signal: AbortSignal.timeout(timeoutMs),
			});
			const text = await response.text();

			if (response.ok) {
				return ok(text);
			}

			failure = new UpstreamUnavailableError(
				`Backend answered ${operation} with HTTP ${response.status}`,
				text.slice(0, MAX_ERROR_BODY),
				undefined,
				response.status
			);
		} catch (error) {
			const cause = error instanceof Error ? error : undefined;
			failure = isAbortLike(error)
				? new UpstreamTimeoutError(`Backend ${operation} timed out`, timeoutMs, cause)
				: new UpstreamUnavailableError(
						`Backend unreachable at ${this.config.baseUrl}`,
						errorMessage(error),
						cause
					);
		}

		logger.logUpstreamError(operation, url, failure, performance.now() - started, attempt);
		return err(failure);
	}
}
