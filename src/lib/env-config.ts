/**
 * Configuration Management
 *
 * Loads `.env`, reads the process environment and validates it into a typed
 * RagConfig. Every value has a default, so an empty environment is valid.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { Result, ok, err } from './result-types.js';
import type { ConsoleLevel } from './logger.js';
import type { ChunkingOptions } from '../models/chunk.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Ollama-compatible backend settings
 */
export interface GatewayConfig {
	baseUrl: string;
	embedModel: string;
	chatModel: string;
	embedTimeoutMs: number;
	generateTimeoutMs: number;
	/** Bound for the liveness probe */
	healthTimeoutMs: number;
	/** Ask the backend for NDJSON streamed chat output */
	stream: boolean;
	/** Attempts per call; 1 disables retry */
	retryAttempts: number;
}

export interface RagConfig {
	database: { path: string };
	logging: { dir: string; level: ConsoleLevel };
	gateway: GatewayConfig;
	chunking: ChunkingOptions;
	ingestion: { concurrency: number };
	retrieval: { sourceBaseUrl: string; slowSearchMs: number };
}

// ============================================================================
// Environment Schema
// ============================================================================

type Env = Record<string, string | undefined>;

/** Blank variables count as unset */
const blankAsUnset = (value: unknown): unknown =>
	typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
	z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
	z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().default(fallback));

const flag = (fallback: boolean) =>
	z.preprocess(
		blankAsUnset,
		z
			.enum(['true', 'false', '1', '0'])
			.default(fallback ? 'true' : 'false')
			.transform((value) => value === 'true' || value === '1')
	);

const EnvSchema = z
	.object({
		RAG_DB_PATH: text('.textrag/rag.db'),
		RAG_LOG_DIR: text('.textrag/logs'),
		RAG_LOG_LEVEL: z.preprocess(
			blankAsUnset,
			z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn')
		),
		OLLAMA_BASE_URL: z.preprocess(blankAsUnset, z.string().url().default('http://localhost:11434')),
		OLLAMA_EMBED_MODEL: text('nomic-embed-text'),
		OLLAMA_CHAT_MODEL: text('qwen2.5:1.5b'),
		OLLAMA_EMBED_TIMEOUT_MS: positiveInt(60_000),
		OLLAMA_GENERATE_TIMEOUT_MS: positiveInt(300_000),
		OLLAMA_HEALTH_TIMEOUT_MS: positiveInt(3_000),
		OLLAMA_STREAM: flag(false),
		OLLAMA_RETRY_ATTEMPTS: positiveInt(1),
		RAG_CHUNK_MIN_TOKENS: positiveInt(500),
		RAG_CHUNK_MAX_TOKENS: positiveInt(1000),
		RAG_CHUNK_OVERLAP_TOKENS: nonNegativeInt(75),
		RAG_CHARS_PER_TOKEN: positiveInt(4),
		RAG_EMBED_CONCURRENCY: positiveInt(1),
		RAG_SOURCE_BASE_URL: z.preprocess(blankAsUnset, z.string().url().default('http://localhost:8080')),
		RAG_SLOW_SEARCH_MS: positiveInt(200),
	})
	.superRefine((env, ctx) => {
		if (env.RAG_CHUNK_MIN_TOKENS > env.RAG_CHUNK_MAX_TOKENS) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['RAG_CHUNK_MIN_TOKENS'],
				message: 'must not exceed RAG_CHUNK_MAX_TOKENS',
			});
		}
		if (env.RAG_CHUNK_OVERLAP_TOKENS >= env.RAG_CHUNK_MAX_TOKENS) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['RAG_CHUNK_OVERLAP_TOKENS'],
				message: 'must be smaller than RAG_CHUNK_MAX_TOKENS',
			});
		}
	});

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Manages configuration loading from environment variables and .env files.
 */
export class ConfigurationManager {
	constructor(private envPath?: string) {}

	/**
	 * Load environment variables from .env file (a missing file is fine)
	 */
	loadEnv(): Result<void, ConfigError> {
		const result = loadEnv({ path: this.envPath });

		if (result.error && !isMissingFile(result.error)) {
			return err(new ConfigError('Failed to load .env file', result.error.message, result.error));
		}

		return ok(undefined);
	}

	/**
	 * Build a validated configuration from an environment map
	 */
	resolve(env: Env = process.env): Result<RagConfig, ConfigError> {
		const parsed = EnvSchema.safeParse(env);

		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			return err(new ConfigError('Invalid configuration', issues));
		}

		const e = parsed.data;
		return ok({
			database: { path: e.RAG_DB_PATH },
			logging: { dir: e.RAG_LOG_DIR, level: e.RAG_LOG_LEVEL },
			gateway: {
				baseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ''),
				embedModel: e.OLLAMA_EMBED_MODEL,
				chatModel: e.OLLAMA_CHAT_MODEL,
				embedTimeoutMs: e.OLLAMA_EMBED_TIMEOUT_MS,
				generateTimeoutMs: e.OLLAMA_GENERATE_TIMEOUT_MS,
				healthTimeoutMs: e.OLLAMA_HEALTH_TIMEOUT_MS,
				stream: e.OLLAMA_STREAM,
				retryAttempts: e.OLLAMA_RETRY_ATTEMPTS,
			},
			chunking: {
				minTokens: e.RAG_CHUNK_MIN_TOKENS,
				maxTokens: e.RAG_CHUNK_MAX_TOKENS,
				overlapTokens: e.RAG_CHUNK_OVERLAP_TOKENS,
				charsPerToken: e.RAG_CHARS_PER_TOKEN,
			},
			ingestion: { concurrency: e.RAG_EMBED_CONCURRENCY },
			retrieval: {
				sourceBaseUrl: e.RAG_SOURCE_BASE_URL.replace(/\/+$/, ''),
				slowSearchMs: e.RAG_SLOW_SEARCH_MS,
			},
		});
	}

	/**
	 * Load `.env` then resolve the process environment
	 */
	load(): Result<RagConfig, ConfigError> {
		return this.loadEnv().andThen(() => this.resolve());
	}
}

function isMissingFile(error: Error): boolean {
	return 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a configuration manager instance
 *
 * @param envPath - Optional path to .env file
 */
export function createConfigManager(envPath?: string): ConfigurationManager {
	return new ConfigurationManager(envPath);
}
