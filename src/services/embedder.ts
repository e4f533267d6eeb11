/**
 * Command Embedders
 *
 * The daemon only needs a fixed-length vector per command string. The
 * built-in NgramHashEmbedder hashes character n-grams and whole tokens into
 * `dim` buckets (FNV-1a) and L2-normalizes the result. GuardedEmbedder wraps
 * any embedder with a bounded per-text LRU cache and an opossum circuit
 * breaker whose timeout bounds every call.
 */

import CircuitBreaker from 'opossum';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import {
  DEFAULT_EMBEDDING_DIM,
  DEFAULT_NGRAM_SIZES,
  EMBEDDER_TIMEOUT_MS,
  EMBEDDING_CACHE_SIZE,
} from '../constants/suggestion-constants.js';

/**
 * Turns command text into a vector of `dimension` floats
 */
export interface Embedder {
  readonly dimension: number;
  encode(text: string): Promise<Float32Array>;
}

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/**
 * FNV-1a, unsigned 32-bit
 */
export function fnv1aHash(str: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Scale to unit length in place; zero vectors are left as they are
 */
export function l2Normalize(vector: Float32Array): Float32Array {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm > 0) {
    for (let i = 0; i < vector.length; i++) {
      vector[i] = (vector[i] ?? 0) / norm;
    }
  }
  return vector;
}

/**
 * Hashed character n-gram embedder
 */
export class NgramHashEmbedder implements Embedder {
  readonly dimension: number;
  private ngramSizes: readonly number[];

  constructor(dimension: number = DEFAULT_EMBEDDING_DIM, ngramSizes: readonly number[] = DEFAULT_NGRAM_SIZES) {
    this.dimension = dimension;
    this.ngramSizes = ngramSizes;
  }

  encodeSync(text: string): Float32Array {
    const vector = new Float32Array(this.dimension);
    const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();
    if (normalized.length === 0) {
      return vector;
    }

    const padded = ` ${normalized} `;
    for (const n of this.ngramSizes) {
      for (let i = 0; i + n <= padded.length; i++) {
        const bucket = fnv1aHash(padded.substring(i, i + n)) % this.dimension;
        vector[bucket] = (vector[bucket] ?? 0) + 1;
      }
    }

    // Whole tokens weigh more than their fragments
    for (const token of normalized.split(' ')) {
      const bucket = fnv1aHash(`#${token}`) % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + 2;
    }

    return l2Normalize(vector);
  }

  encode(text: string): Promise<Float32Array> {
    return Promise.resolve(this.encodeSync(text));
  }
}

/**
 * Map-backed LRU: get() refreshes an entry, set() evicts the oldest
 */
export class LruCache<K, V> {
  private entries = new Map<K, V>();

  constructor(private readonly capacity: number) {}

  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface GuardedEmbedderOptions {
  /** Per-call timeout (default: 25ms) */
  timeoutMs?: number;
  /** Cached texts (default: 512); 0 disables the cache */
  cacheSize?: number;
  /** Breaker stays open this long before trying again (default: 10s) */
  resetTimeoutMs?: number;
  logger?: Logger;
}

export interface GuardedEmbedderStats {
  cacheHits: number;
  cacheMisses: number;
  cacheSize: number;
  breakerState: 'closed' | 'open' | 'half-open';
}

/**
 * Embedder with caching and a circuit breaker
 */
export class GuardedEmbedder implements Embedder {
  readonly dimension: number;
  private cache: LruCache<string, Float32Array> | null;
  private breaker: CircuitBreaker<[string], Float32Array>;
  private logger: Logger;
  private cacheHits = 0;
  private cacheMisses = 0;

  constructor(private inner: Embedder, options: GuardedEmbedderOptions = {}) {
    this.dimension = inner.dimension;
    this.logger = options.logger ?? createSilentLogger();
    const cacheSize = options.cacheSize ?? EMBEDDING_CACHE_SIZE;
    this.cache = cacheSize > 0 ? new LruCache(cacheSize) : null;

    this.breaker = new CircuitBreaker((text: string) => this.inner.encode(text), {
      timeout: options.timeoutMs ?? EMBEDDER_TIMEOUT_MS,
      errorThresholdPercentage: 50,
      resetTimeout: options.resetTimeoutMs ?? 10_000,
      rollingCountTimeout: 10_000,
      rollingCountBuckets: 10,
      volumeThreshold: 5,
      name: 'command-embedder',
    });

    this.breaker.on('open', () => {
      this.logger.warn('Embedder circuit opened; semantic suggestions paused');
    });
    this.breaker.on('halfOpen', () => {
      this.logger.info('Embedder circuit half-open; probing');
    });
    this.breaker.on('close', () => {
      this.logger.info('Embedder circuit closed');
    });
  }

  /**
   * @throws when the breaker is open, the call times out or the embedder fails
   */
  async encode(text: string): Promise<Float32Array> {
    const cached = this.cache?.get(text);
    if (cached) {
      this.cacheHits++;
      return cached;
    }
    this.cacheMisses++;

    const vector = await this.breaker.fire(text);
    if (vector.length !== this.dimension) {
      throw new Error(`Embedder returned ${vector.length} dimensions, expected ${this.dimension}`);
    }
    this.cache?.set(text, vector);
    return vector;
  }

  getStats(): GuardedEmbedderStats {
    return {
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cacheSize: this.cache?.size ?? 0,
      breakerState: this.breaker.opened ? 'open' : this.breaker.halfOpen ? 'half-open' : 'closed',
    };
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
