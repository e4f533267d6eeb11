/**
 * Index Coordinator
 *
 * Keeps the vector index in step with the command store off the request
 * path. Successful commands are queued (distinct by text), embedded in
 * debounced batches, added to the index and followed by one build() and a
 * save() per batch.
 */

import type { CommandStore } from './command-store.js';
import type { VectorIndex, IndexItem } from './vector-index.js';
import type { Embedder } from './embedder.js';
import type { VectorMetadata } from '../models/vector-entry.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import { toError } from '../lib/errors/DaemonErrors.js';
import {
  BOOTSTRAP_COMMAND_LIMIT,
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_INDEX_BATCH_SIZE,
} from '../constants/daemon-constants.js';

export interface IndexCoordinatorOptions {
  store: CommandStore;
  index: VectorIndex;
  embedder: Embedder;
  /** Queue length that triggers an immediate flush */
  batchSize?: number;
  /** Quiet period before a partial batch is flushed */
  flushIntervalMs?: number;
  logger?: Logger;
}

export interface CoordinatorStats {
  queued: number;
  indexedCommands: number;
  batchesFlushed: number;
  embeddingFailures: number;
  lastFlushAt: number | null;
}

/**
 * Logged command as seen by the coordinator
 */
export interface IndexCandidate {
  id: number;
  command: string;
  exitCode: number;
}

export class IndexCoordinator {
  private store: CommandStore;
  private index: VectorIndex;
  private embedder: Embedder;
  private batchSize: number;
  private flushIntervalMs: number;
  private logger: Logger;

  private queue = new Map<string, VectorMetadata>();
  private indexed = new Set<string>();
  private flushTimer: NodeJS.Timeout | null = null;
  private flushing: Promise<void> | null = null;
  private stopped = false;
  private stats: Omit<CoordinatorStats, 'queued' | 'indexedCommands'> = {
    batchesFlushed: 0,
    embeddingFailures: 0,
    lastFlushAt: null,
  };

  constructor(options: IndexCoordinatorOptions) {
    this.store = options.store;
    this.index = options.index;
    this.embedder = options.embedder;
    this.batchSize = options.batchSize ?? DEFAULT_INDEX_BATCH_SIZE;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Restore the saved index, or rebuild it from the store when there is none
   * or it cannot be read
   */
  async bootstrap(): Promise<void> {
    const loaded = await this.index.load();
    if (loaded.isOk() && loaded.value) {
      for (const metadata of this.index.listMetadata()) {
        this.indexed.add(metadata.command);
      }
      this.logger.info('Vector index loaded', { vectors: this.indexed.size });
      return;
    }

    if (loaded.isErr()) {
      this.logger.warn('Saved vector index unusable; rebuilding', { error: loaded.error.message });
    }
    await this.rebuildFromStore();
  }

  /**
   * Re-embed the distinct successful commands in the store and replace the
   * index with them
   */
  async rebuildFromStore(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
    const run = this.rebuild();
    this.flushing = run;
    try {
      await run;
    } finally {
      this.flushing = null;
    }
  }

  private async rebuild(): Promise<void> {
    const commands = this.store.recentDistinctCommands(BOOTSTRAP_COMMAND_LIMIT, true);
    if (commands.isErr()) {
      this.logger.error('Cannot rebuild vector index', { error: commands.error.message });
      return;
    }

    const items: IndexItem[] = [];
    for (const entry of commands.value) {
      const vector = await this.embed(entry.command);
      if (vector) {
        items.push({ vector, metadata: { command: entry.command, record_id: entry.lastId } });
      }
    }

    const rebuilt = await this.index.rebuild(items);
    if (rebuilt.isErr()) {
      this.logger.error('Vector index rebuild failed', { error: rebuilt.error.message });
      return;
    }

    this.indexed = new Set(items.map((item) => item.metadata.command));
    // Commands logged while rebuilding stay queued unless the rebuild saw them
    for (const command of this.indexed) {
      this.queue.delete(command);
    }
    await this.persist();
  }

  /**
   * Queue a logged command; failed commands and already indexed texts are
   * ignored
   */
  enqueue(candidate: IndexCandidate): void {
    if (this.stopped || candidate.exitCode !== 0) {
      return;
    }
    if (this.indexed.has(candidate.command) || this.queue.has(candidate.command)) {
      return;
    }

    this.queue.set(candidate.command, { command: candidate.command, record_id: candidate.id });

    if (this.queue.size >= this.batchSize) {
      this.triggerFlush();
    } else {
      this.resetFlushTimer();
    }
  }

  /**
   * Embed, add and build everything queued so far
   */
  async flush(): Promise<void> {
    this.clearFlushTimer();
    // No await when idle, so the batch is claimed before the caller resumes
    while (this.flushing) {
      await this.flushing;
    }
    if (this.queue.size === 0) {
      return;
    }

    const batch = Array.from(this.queue.values());
    this.queue.clear();

    const run = this.processBatch(batch);
    this.flushing = run;
    try {
      await run;
    } finally {
      this.flushing = null;
    }
  }

  /**
   * Stop accepting work, flush the queue and save the index
   */
  async shutdown(): Promise<void> {
    await this.flush();
    this.stopped = true;
    this.clearFlushTimer();
    await this.persist();
  }

  getStats(): CoordinatorStats {
    return {
      queued: this.queue.size,
      indexedCommands: this.indexed.size,
      ...this.stats,
    };
  }

  private async processBatch(batch: VectorMetadata[]): Promise<void> {
    let added = 0;
    for (const metadata of batch) {
      const vector = await this.embed(metadata.command);
      if (!vector) continue;

      const result = this.index.add(vector, metadata);
      if (result.isErr()) {
        this.logger.warn('Vector rejected by index', { error: result.error.message });
        continue;
      }
      this.indexed.add(metadata.command);
      added++;
    }

    if (added === 0) {
      return;
    }

    const built = await this.index.build();
    if (built.isErr()) {
      this.logger.error('Vector index build failed', { error: built.error.message });
      return;
    }

    this.stats.batchesFlushed++;
    this.stats.lastFlushAt = Date.now();
    this.logger.debug('Indexed command batch', { added, generation: built.value });
    await this.persist();
  }

  private async embed(command: string): Promise<Float32Array | null> {
    try {
      return await this.embedder.encode(command);
    } catch (error) {
      this.stats.embeddingFailures++;
      this.logger.warn('Embedding failed', { error: toError(error).message });
      return null;
    }
  }

  private async persist(): Promise<void> {
    const saved = await this.index.save();
    if (saved.isErr()) {
      this.logger.error('Vector index save failed', { error: saved.error.message });
    }
  }

  private triggerFlush(): void {
    this.flush().catch((error: unknown) => {
      this.logger.error('Index flush failed', { error: toError(error).message });
    });
  }

  private resetFlushTimer(): void {
    this.clearFlushTimer();
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.triggerFlush();
    }, this.flushIntervalMs);
    this.flushTimer.unref();
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
