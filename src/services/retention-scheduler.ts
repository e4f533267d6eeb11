/**
 * Retention Scheduler
 *
 * Periodically deletes command records older than the configured retention
 * window and rebuilds the vector index when anything was removed, so
 * suggestions never surface pruned commands.
 */

import type { CommandStore } from './command-store.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import { StoreError, toError } from '../lib/errors/DaemonErrors.js';
import { Result, ok } from '../lib/result-types.js';
import { MS_PER_DAY, RETENTION_INTERVAL_MS } from '../constants/daemon-constants.js';

/**
 * Anything that can rebuild the index after a prune
 */
export interface IndexRebuilder {
	rebuildFromStore(): Promise<void>;
}

export interface RetentionSchedulerOptions {
	store: CommandStore;
	index?: IndexRebuilder;
	/** Read on every run so configuration changes apply to the next cycle */
	retentionDays: () => number;
	intervalMs?: number;
	logger?: Logger;
	now?: () => number;
}

export interface RetentionStats {
	lastRunTimestamp: number | null;
	lastRemoved: number;
	totalRemoved: number;
	runs: number;
}

export class RetentionScheduler {
	private store: CommandStore;
	private index: IndexRebuilder | null;
	private retentionDays: () => number;
	private intervalMs: number;
	private logger: Logger;
	private now: () => number;
	private intervalId: NodeJS.Timeout | null = null;
	private isRunning = false;
	private stats: RetentionStats = { lastRunTimestamp: null, lastRemoved: 0, totalRemoved: 0, runs: 0 };

	constructor(options: RetentionSchedulerOptions) {
		this.store = options.store;
		this.index = options.index ?? null;
		this.retentionDays = options.retentionDays;
		this.intervalMs = options.intervalMs ?? RETENTION_INTERVAL_MS;
		this.logger = options.logger ?? createSilentLogger();
		this.now = options.now ?? Date.now;
	}

	/**
	 * Run one pass now and then every interval
	 */
	start(): void {
		if (this.intervalId) {
			this.logger.warn('Retention scheduler is already running');
			return;
		}

		this.logger.info('Starting retention scheduler', {
			intervalHours: this.intervalMs / 3_600_000,
			retentionDays: this.retentionDays(),
		});

		this.trigger();
		this.intervalId = setInterval(() => this.trigger(), this.intervalMs);
		this.intervalId.unref();
	}

	stop(): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
			this.logger.info('Retention scheduler stopped');
		}
	}

	/**
	 * Prune once
	 *
	 * @returns Number of records removed; 0 when a pass is already running
	 */
	async runOnce(): Promise<Result<number, StoreError>> {
		if (this.isRunning) {
			this.logger.warn('Retention pass already running, skipping this cycle');
			return ok(0);
		}

		this.isRunning = true;
		try {
			const cutoff = this.now() - this.retentionDays() * MS_PER_DAY;
			const pruned = await this.store.prune(cutoff);
			if (pruned.isErr()) {
				return pruned;
			}

			const removed = pruned.value;
			this.stats.runs++;
			this.stats.lastRunTimestamp = this.now();
			this.stats.lastRemoved = removed;
			this.stats.totalRemoved += removed;
			this.logger.info('Retention pass completed', { removed, cutoff });

			if (removed > 0 && this.index) {
				await this.index.rebuildFromStore();
			}
			return ok(removed);
		} finally {
			this.isRunning = false;
		}
	}

	getStats(): RetentionStats {
		return { ...this.stats };
	}

	private trigger(): void {
		this.runOnce()
			.then((result) => {
				if (result.isErr()) {
					this.logger.error('Retention pass failed', { error: result.error.message });
				}
			})
			.catch((error: unknown) => {
				this.logger.error('Retention pass failed', { error: toError(error).message });
			});
	}
}
