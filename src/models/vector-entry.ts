/**
 * Metadata stored beside each vector
 */
export interface VectorMetadata {
  command: string;
  record_id: number;
}

/**
 * Internal index slot; localIndex is dense and zero-based
 */
export interface IndexEntry {
  localIndex: number;
  vector: Float32Array;
  metadata: VectorMetadata;
}

/**
 * Query hit, nearest first
 */
export interface VectorQueryHit {
  localIndex: number;
  metadata: VectorMetadata;
  distance: number;
}

export type DistanceMetric = 'angular' | 'euclidean';

/**
 * Lifecycle of a vector index
 */
export enum IndexState {
  EMPTY = 'EMPTY',
  ACCUMULATING = 'ACCUMULATING',
  BUILT = 'BUILT',
}

export interface IndexStatistics {
  state: IndexState;
  generation: number;
  builtVectors: number;
  pendingVectors: number;
  dimension: number;
  trees: number;
  metric: DistanceMetric;
}
