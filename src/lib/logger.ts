/**
 * Structured Logging Module
 *
 * Structured logging for the daemon, the command store and slow requests
 * using JSON Lines (.jsonl) files, one file per log type.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Command store error log entry
 */
export interface StoreErrorLog extends BaseLogEntry {
	type: 'store_error';
	level: 'error' | 'fatal';
	operation: string;
	error_code: string;
	error_message: string;
	stack_trace?: string;
	context?: Record<string, unknown>;
}

/**
 * Slow request log entry
 */
export interface SlowRequestLog extends BaseLogEntry {
	type: 'slow_request';
	level: 'warn';
	operation: string;
	duration_ms: number;
	threshold_ms: number;
	result_count?: number;
	context?: Record<string, unknown>;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

export type LogEntry = StoreErrorLog | SlowRequestLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; no files are written when omitted */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured JSONL logger
 */
export class Logger {
	private logDir: string | undefined;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		this.ensureLogDirectory();
	}

	private ensureLogDirectory(): void {
		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true, mode: 0o700 });
		}
	}

	private getLogFilePath(logDir: string, logType: string): string {
		return path.join(logDir, `${logType}.jsonl`);
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(this.getLogFilePath(this.logDir, logType), logLine, 'utf8');
		} catch (error) {
			// Fall back to stderr if the file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const summary = entry.type === 'general' ? entry.message : entry.type;
		const { timestamp, level, type: _type, ...rest } = entry;
		const details = Object.keys(rest).length > 0 ? ' ' + JSON.stringify(rest) : '';
		const prefix = `[${level.toUpperCase()}] ${timestamp}`;

		// stdout stays free for command output; everything goes to stderr
		switch (level) {
			case 'error':
			case 'fatal':
				console.error(chalk.red(prefix), summary, chalk.gray(details));
				break;
			case 'warn':
				console.error(chalk.yellow(prefix), summary, chalk.gray(details));
				break;
			default:
				console.error(chalk.gray(prefix), summary, chalk.gray(details));
		}
	}

	/**
	 * Log a command store failure
	 */
	logStoreError(
		operation: string,
		error: unknown,
		context?: Record<string, unknown>
	): void {
		const entry: StoreErrorLog = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'store_error',
			operation,
			error_code: errorCode(error),
			error_message: error instanceof Error ? error.message : String(error),
			stack_trace: error instanceof Error ? error.stack : undefined,
			context,
		};

		this.writeLogEntry('store-errors', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a request that exceeded its latency budget
	 */
	logSlowRequest(
		operation: string,
		durationMs: number,
		thresholdMs: number,
		context?: { resultCount?: number; additionalContext?: Record<string, unknown> }
	): void {
		const entry: SlowRequestLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'slow_request',
			operation,
			duration_ms: Math.round(durationMs),
			threshold_ms: thresholdMs,
			result_count: context?.resultCount,
			context: context?.additionalContext,
		};

		this.writeLogEntry('slow-requests', entry);
		this.outputToConsole(entry);
	}

	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

function errorCode(error: unknown): string {
	if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return 'UNKNOWN';
}

/**
 * Logger that writes nothing; used where a component is built without one
 */
export function createSilentLogger(): Logger {
	return new Logger({ console: false });
}
