/**
 * Structured Logging Module
 *
 * Writes database errors, slow similarity scans, upstream failures and
 * general events as JSON Lines (.jsonl), one file per log type.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Console threshold; `silent` disables console echo entirely
 */
export type ConsoleLevel = LogLevel | 'silent';

const LEVEL_ORDER: ConsoleLevel[] = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'];

type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Database error log entry
 */
export interface DatabaseErrorLog extends BaseLogEntry {
	type: 'database_error';
	level: 'error';
	operation: string;
	table?: string;
	error_message: string;
	stack_trace?: string;
	context?: LogContext;
}

/**
 * Slow similarity scan log entry
 */
export interface SlowQueryLog extends BaseLogEntry {
	type: 'slow_query';
	level: 'warn';
	operation: string;
	duration_ms: number;
	scanned_count: number;
	threshold_ms: number;
}

/**
 * Embedding/generation backend failure
 */
export interface UpstreamErrorLog extends BaseLogEntry {
	type: 'upstream_error';
	level: 'error';
	operation: string;
	url: string;
	error_code: string;
	error_message: string;
	duration_ms: number;
	attempt?: number;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: LogContext;
}

export type LogEntry = DatabaseErrorLog | SlowQueryLog | UpstreamErrorLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files (default: .textrag/logs) */
	logDir?: string;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: ConsoleLevel;
}

/**
 * Structured JSON Lines logger
 */
export class Logger {
	private logDir: string;
	private consoleLevel: ConsoleLevel;
	private dirReady = false;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir ?? '.textrag/logs';
		this.consoleLevel = config.consoleLevel ?? 'warn';
	}

	/**
	 * Redirect file output and/or change the console threshold
	 */
	configure(config: LoggerConfig): void {
		if (config.logDir !== undefined && config.logDir !== this.logDir) {
			this.logDir = config.logDir;
			this.dirReady = false;
		}
		if (config.consoleLevel !== undefined) {
			this.consoleLevel = config.consoleLevel;
		}
	}

	getLogDir(): string {
		return this.logDir;
	}

	private ensureLogDirectory(): void {
		if (this.dirReady) {
			return;
		}
		fs.mkdirSync(this.logDir, { recursive: true });
		this.dirReady = true;
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		const logLine = JSON.stringify(entry) + '\n';

		try {
			this.ensureLogDirectory();
			fs.appendFileSync(path.join(this.logDir, `${logType}.jsonl`), logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (LEVEL_ORDER.indexOf(entry.level) < LEVEL_ORDER.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const body = entry.type === 'general' ? entry.message : JSON.stringify(entry);

		// stdout belongs to command output and the MCP transport
		console.error(prefix, body, entry.type === 'general' && entry.context ? entry.context : '');
	}

	private emit(logType: string, entry: LogEntry): void {
		this.writeLogEntry(logType, entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a database error
	 */
	logDatabaseError(
		operation: string,
		error: unknown,
		context?: { table?: string; additionalContext?: LogContext }
	): void {
		this.emit('db-errors', {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'database_error',
			operation,
			table: context?.table,
			error_message: error instanceof Error ? error.message : String(error),
			stack_trace: error instanceof Error ? error.stack : undefined,
			context: context?.additionalContext,
		});
	}

	/**
	 * Log a similarity scan that exceeded its threshold
	 */
	logSlowQuery(
		operation: string,
		durationMs: number,
		thresholdMs: number,
		scannedCount: number
	): void {
		this.emit('slow-queries', {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'slow_query',
			operation,
			duration_ms: Math.round(durationMs),
			scanned_count: scannedCount,
			threshold_ms: thresholdMs,
		});
	}

	/**
	 * Log a failed call to the embedding/generation backend
	 */
	logUpstreamError(
		operation: string,
		url: string,
		error: { code: string; message: string },
		durationMs: number,
		attempt?: number
	): void {
		this.emit('upstream', {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'upstream_error',
			operation,
			url,
			error_code: error.code,
			error_message: error.message,
			duration_ms: Math.round(durationMs),
			attempt,
		});
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: LogContext): void {
		this.emit('general', {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		});
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: LogContext): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: LogContext): void {
		this.log('fatal', message, context);
	}
}

function envConsoleLevel(): ConsoleLevel | undefined {
	const value = process.env.RAG_LOG_LEVEL;
	return LEVEL_ORDER.find((level) => level === value);
}

/**
 * Default logger instance
 */
export const logger = new Logger({
	logDir: process.env.RAG_LOG_DIR,
	consoleLevel: envConsoleLevel(),
});
