/**
 * Single-Writer Enforcement
 *
 * SQLite supports multiple concurrent readers but only one writer at a time.
 * Writers inside this process are queued on a promise chain so that only one
 * transaction is open on the shared connection; writers in other processes
 * are handled with BEGIN IMMEDIATE and exponential backoff on SQLITE_BUSY.
 *
 * ## Retry Strategy
 *
 * When a write lock cannot be acquired (SQLITE_BUSY):
 * 1. Wait with exponential backoff: 10ms, 20ms, 40ms, 80ms, ...
 * 2. Maximum backoff: 500ms per attempt
 * 3. Total timeout: Configurable (default 5000ms)
 * 4. After timeout: Throw error
 */

import type Database from 'better-sqlite3';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import { TimedOutError } from '../lib/errors/DaemonErrors.js';

/**
 * Write lock configuration
 */
export interface WriteLockConfig {
	/** Total timeout in milliseconds (default: 5000ms) */
	timeoutMs: number;
	/** Initial backoff delay in milliseconds (default: 10ms) */
	initialBackoffMs: number;
	/** Maximum backoff delay in milliseconds (default: 500ms) */
	maxBackoffMs: number;
	/** Backoff multiplier (default: 2 for exponential) */
	backoffMultiplier: number;
}

export const DEFAULT_WRITE_LOCK_CONFIG: WriteLockConfig = {
	timeoutMs: 5000,
	initialBackoffMs: 10,
	maxBackoffMs: 500,
	backoffMultiplier: 2,
};

function isBusyError(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		(error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED')
	);
}

/**
 * Write Lock Manager
 */
export class WriteLock {
	private db: Database.Database;
	private config: WriteLockConfig;
	private logger: Logger;
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	constructor(
		db: Database.Database,
		config: Partial<WriteLockConfig> = {},
		logger: Logger = createSilentLogger()
	) {
		this.db = db;
		this.config = { ...DEFAULT_WRITE_LOCK_CONFIG, ...config };
		this.logger = logger;
	}

	/**
	 * Acquire a write lock with exponential backoff retry
	 *
	 * @returns True if lock acquired, false if timeout
	 * @throws Error if database error other than SQLITE_BUSY
	 */
	async acquireWriteLock(): Promise<boolean> {
		const startTime = Date.now();
		let backoffMs = this.config.initialBackoffMs;
		let attempt = 0;

		while (Date.now() - startTime < this.config.timeoutMs) {
			attempt++;

			try {
				this.db.prepare('BEGIN IMMEDIATE').run();
				return true;
			} catch (error) {
				if (!isBusyError(error)) {
					throw error;
				}

				this.logger.debug('Database busy, retrying', {
					attempt,
					backoffMs,
					elapsedMs: Date.now() - startTime,
				});

				await this.sleep(backoffMs);
				backoffMs = Math.min(
					backoffMs * this.config.backoffMultiplier,
					this.config.maxBackoffMs
				);
			}
		}

		this.logger.warn('Write lock acquisition timeout', {
			attempts: attempt,
			timeoutMs: this.config.timeoutMs,
		});

		return false;
	}

	/**
	 * Release the write lock by committing or rolling back the transaction
	 */
	releaseWriteLock(commit: boolean = true): void {
		if (!this.db.inTransaction) {
			return;
		}
		this.db.prepare(commit ? 'COMMIT' : 'ROLLBACK').run();
	}

	/**
	 * Execute a function inside an IMMEDIATE transaction
	 *
	 * Calls are queued so they run one at a time in arrival order.
	 * Commits on success, rolls back on error.
	 *
	 * @throws TimedOutError if the lock cannot be acquired in time
	 */
	withWriteLock<T>(fn: () => T | Promise<T>): Promise<T> {
		this.pending++;
		const run = this.tail.then(() => this.runLocked(fn));
		// The queue continues whether or not this writer failed
		this.tail = run.then(
			() => undefined,
			() => undefined
		);
		return run.finally(() => {
			this.pending--;
		});
	}

	/**
	 * Writers queued or running
	 */
	getPendingCount(): number {
		return this.pending;
	}

	/**
	 * Resolves once every writer queued so far has finished
	 */
	drain(): Promise<void> {
		return this.tail;
	}

	private async runLocked<T>(fn: () => T | Promise<T>): Promise<T> {
		const acquired = await this.acquireWriteLock();
		if (!acquired) {
			throw new TimedOutError('acquire write lock', this.config.timeoutMs);
		}

		try {
			const result = await fn();
			this.releaseWriteLock(true);
			return result;
		} catch (error) {
			this.releaseWriteLock(false);
			throw error;
		}
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}

	getConfig(): WriteLockConfig {
		return { ...this.config };
	}
}
