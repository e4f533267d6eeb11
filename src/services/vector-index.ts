/**
 * Vector Index
 *
 * Approximate nearest-neighbour search over command embeddings. Vectors are
 * accumulated with add() and become searchable after build(), which grows a
 * random projection forest off the request path and swaps the finished
 * snapshot in atomically. Queries always read the current snapshot.
 */

import { IndexError, toError } from '../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import {
  DEFAULT_EMBEDDING_DIM,
  DEFAULT_INDEX_SEED,
  DEFAULT_LEAF_SIZE,
  DEFAULT_N_TREES,
} from '../constants/suggestion-constants.js';
import {
  IndexState,
  type DistanceMetric,
  type IndexStatistics,
  type VectorMetadata,
  type VectorQueryHit,
} from '../models/vector-entry.js';
import {
  buildTree,
  collectCandidates,
  createRng,
  rankNeighbours,
  type AnnTree,
  type VectorSet,
} from './ann-forest.js';
import { IndexStoreService } from './index-store.js';

export interface VectorIndexOptions {
  dim?: number;
  nTrees?: number;
  leafSize?: number;
  metric?: DistanceMetric;
  seed?: number;
  /** Directory for save()/load(); persistence is disabled without one */
  directory?: string;
  logger?: Logger;
}

/**
 * Immutable searchable state
 */
interface Snapshot {
  generation: number;
  set: VectorSet;
  metadata: VectorMetadata[];
  trees: AnnTree[];
}

interface PendingEntry {
  vector: Float32Array;
  metadata: VectorMetadata;
}

export interface IndexItem {
  vector: Float32Array;
  metadata: VectorMetadata;
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * Vector index with a build generation counter
 */
export class VectorIndex {
  private readonly dim: number;
  private readonly nTrees: number;
  private readonly leafSize: number;
  private readonly metric: DistanceMetric;
  private readonly seed: number;
  private readonly store: IndexStoreService | null;
  private readonly logger: Logger;

  private snapshot: Snapshot | null = null;
  private pending: PendingEntry[] = [];
  private generation = 0;
  private inFlight: Promise<unknown> | null = null;

  constructor(options: VectorIndexOptions = {}) {
    this.dim = options.dim ?? DEFAULT_EMBEDDING_DIM;
    this.nTrees = options.nTrees ?? DEFAULT_N_TREES;
    this.leafSize = Math.max(1, options.leafSize ?? DEFAULT_LEAF_SIZE);
    this.metric = options.metric ?? 'angular';
    this.seed = options.seed ?? DEFAULT_INDEX_SEED;
    this.store = options.directory ? new IndexStoreService(options.directory) : null;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Queue a vector for the next build
   *
   * @returns The vector's local index once built. Indices handed out while a
   * rebuild is running are provisional.
   */
  add(vector: Float32Array, metadata: VectorMetadata): Result<number, IndexError> {
    if (vector.length !== this.dim) {
      return err(IndexError.dimensionMismatch(this.dim, vector.length));
    }
    const localIndex = (this.snapshot?.metadata.length ?? 0) + this.pending.length;
    this.pending.push({ vector: Float32Array.from(vector), metadata: { ...metadata } });
    return ok(localIndex);
  }

  /**
   * Build a new snapshot over every vector added so far
   *
   * A no-op returning the current generation when nothing was added since the
   * last build. A call made while another build is running waits for it.
   *
   * @returns The generation now being served
   */
  async build(): Promise<Result<number, IndexError>> {
    while (this.inFlight) {
      await this.inFlight;
    }

    if (this.pending.length === 0) {
      if (this.snapshot) {
        return ok(this.snapshot.generation);
      }
      return err(new IndexError('EMPTY_INDEX', 'Cannot build an index with no vectors'));
    }

    const base = this.snapshot;
    const additions = this.pending.slice();
    return this.runExclusive(async () => {
      const next = await this.createSnapshot(base, additions);
      this.pending.splice(0, additions.length);
      this.snapshot = next;
      this.logger.debug('Vector index built', {
        generation: next.generation,
        vectors: next.metadata.length,
      });
      return ok(next.generation);
    });
  }

  /**
   * Replace the whole index with `items`, discarding stale entries
   *
   * An empty item list resets the index to EMPTY.
   */
  async rebuild(items: IndexItem[]): Promise<Result<number, IndexError>> {
    for (const item of items) {
      if (item.vector.length !== this.dim) {
        return err(IndexError.dimensionMismatch(this.dim, item.vector.length));
      }
    }

    while (this.inFlight) {
      await this.inFlight;
    }

    const discarded = this.pending.length;
    return this.runExclusive(async () => {
      const fresh = items.map((item) => ({ vector: item.vector, metadata: { ...item.metadata } }));
      const next = fresh.length > 0 ? await this.createSnapshot(null, fresh) : null;
      this.pending.splice(0, discarded);
      if (next) {
        this.snapshot = next;
      } else {
        this.generation++;
        this.snapshot = null;
      }
      this.logger.info('Vector index rebuilt', { generation: this.generation, vectors: fresh.length });
      return ok(this.generation);
    });
  }

  /**
   * k nearest neighbours from the current snapshot, nearest first
   */
  query(vector: Float32Array, k: number): Result<VectorQueryHit[], IndexError> {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return err(IndexError.notBuilt());
    }
    if (vector.length !== this.dim) {
      return err(IndexError.dimensionMismatch(this.dim, vector.length));
    }
    if (k <= 0) {
      return ok([]);
    }

    const population = snapshot.set.count;
    let candidates: Iterable<number>;

    if (k >= population) {
      candidates = Array.from({ length: population }, (_, i) => i);
    } else {
      const found = collectCandidates(snapshot.trees, vector, this.nTrees * k);
      // Too few candidates from the forest; fall back to an exact scan
      candidates = found.size >= k ? found : Array.from({ length: population }, (_, i) => i);
    }

    const neighbours = rankNeighbours(snapshot.set, this.metric, vector, candidates, k);
    const hits: VectorQueryHit[] = [];
    for (const { index, distance } of neighbours) {
      const metadata = snapshot.metadata[index];
      if (metadata) {
        hits.push({ localIndex: index, distance, metadata: { ...metadata } });
      }
    }
    return ok(hits);
  }

  /**
   * Persist the current snapshot
   *
   * @returns false when there is no built snapshot to save
   */
  async save(): Promise<Result<boolean, IndexError>> {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return ok(false);
    }
    if (!this.store) {
      return err(new IndexError('PERSISTENCE', 'Vector index has no storage directory'));
    }

    try {
      await this.store.save(
        {
          dim: this.dim,
          metric: this.metric,
          leafSize: this.leafSize,
          generation: snapshot.generation,
        },
        snapshot.set.vectors,
        snapshot.metadata,
        snapshot.trees
      );
      return ok(true);
    } catch (error) {
      this.logger.error('Failed to save vector index', { error: toError(error).message });
      return err(new IndexError('PERSISTENCE', 'Failed to save vector index', toError(error)));
    }
  }

  /**
   * Restore the last saved snapshot
   *
   * Runs exclusively with builds. When a build or rebuild finished between
   * the call and the files being read, the saved snapshot is older than the
   * index and is not installed.
   *
   * @returns false, leaving the index as it is, when nothing was installed
   */
  async load(): Promise<Result<boolean, IndexError>> {
    const store = this.store;
    if (!store) {
      return ok(false);
    }

    const startGeneration = this.generation;
    while (this.inFlight) {
      await this.inFlight;
    }
    if (this.generation !== startGeneration) {
      this.logger.debug('Saved vector index skipped; index changed while waiting', {
        generation: this.generation,
      });
      return ok(false);
    }

    return this.runExclusive(() => this.restore(store));
  }

  getState(): IndexState {
    if (this.pending.length > 0) {
      return IndexState.ACCUMULATING;
    }
    return this.snapshot ? IndexState.BUILT : IndexState.EMPTY;
  }

  isBuilt(): boolean {
    return this.snapshot !== null;
  }

  getGeneration(): number {
    return this.generation;
  }

  getDimension(): number {
    return this.dim;
  }

  /**
   * Metadata of built and pending entries, in local index order
   */
  listMetadata(): VectorMetadata[] {
    const built = this.snapshot?.metadata ?? [];
    return [...built, ...this.pending.map((entry) => entry.metadata)].map((metadata) => ({ ...metadata }));
  }

  getStatistics(): IndexStatistics {
    return {
      state: this.getState(),
      generation: this.generation,
      builtVectors: this.snapshot?.set.count ?? 0,
      pendingVectors: this.pending.length,
      dimension: this.dim,
      trees: this.nTrees,
      metric: this.metric,
    };
  }

  private async restore(store: IndexStoreService): Promise<Result<boolean, IndexError>> {
    try {
      const persisted = await store.load();
      if (!persisted) {
        return ok(false);
      }

      const { meta } = persisted;
      if (meta.dim !== this.dim) {
        return err(IndexError.dimensionMismatch(this.dim, meta.dim));
      }
      if (meta.metric !== this.metric) {
        return err(new IndexError('PERSISTENCE', `Saved index uses ${meta.metric}, expected ${this.metric}`));
      }

      this.generation = Math.max(this.generation, meta.generation);
      this.snapshot = {
        generation: meta.generation,
        set: { vectors: persisted.vectors, dim: meta.dim, count: meta.numItems },
        metadata: persisted.metadata,
        trees: persisted.trees,
      };
      return ok(true);
    } catch (error) {
      this.logger.error('Failed to load vector index', { error: toError(error).message });
      return err(new IndexError('PERSISTENCE', 'Failed to load vector index', toError(error)));
    }
  }

  private async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = fn();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Assemble vectors and grow the forest, yielding between trees
   */
  private async createSnapshot(base: Snapshot | null, additions: PendingEntry[]): Promise<Snapshot> {
    const baseCount = base?.set.count ?? 0;
    const count = baseCount + additions.length;
    const vectors = new Float32Array(count * this.dim);
    if (base) {
      vectors.set(base.set.vectors.subarray(0, baseCount * this.dim));
    }
    additions.forEach((entry, i) => vectors.set(entry.vector, (baseCount + i) * this.dim));

    const metadata = [...(base?.metadata ?? []), ...additions.map((entry) => entry.metadata)];
    const set: VectorSet = { vectors, dim: this.dim, count };
    const generation = this.generation + 1;
    const rng = createRng(this.seed ^ generation);

    const trees: AnnTree[] = [];
    for (let t = 0; t < this.nTrees; t++) {
      await yieldToEventLoop();
      trees.push(buildTree(set, this.metric, this.leafSize, rng));
    }

    this.generation = generation;
    return { generation, set, metadata, trees };
  }
}
