/**
 * Constants and default values for the suggestion cascade
 *
 * @module suggestion-constants
 */

/**
 * Default cap on returned suggestions
 */
export const DEFAULT_MAX_SUGGESTIONS = 5;

/**
 * Candidates below this confidence are dropped
 */
export const DEFAULT_MIN_CONFIDENCE = 0.3;

/**
 * Minimum token-sort ratio (0-100) kept by the fuzzy tier
 */
export const DEFAULT_FUZZY_THRESHOLD = 60;

/**
 * Number of most recent records scanned by the fuzzy tier
 */
export const DEFAULT_FUZZY_POOL_SIZE = 200;

/**
 * Nearest neighbours requested from the vector index
 */
export const DEFAULT_SEMANTIC_K = 10;

/**
 * Confidence lost per rank position in the exact tier
 */
export const DEFAULT_EXACT_RANK_DECAY = 0.05;

/**
 * Maximum prefix hits read from the store per request
 */
export const EXACT_CANDIDATE_LIMIT = 500;

/**
 * Requests slower than this are written to the slow-request log
 */
export const SLOW_REQUEST_THRESHOLD_MS = 50;

/**
 * Weight of the most recent history entry blended into the semantic query
 */
export const HISTORY_CONTEXT_WEIGHT = 0.25;

/**
 * Embedding defaults
 */
export const DEFAULT_EMBEDDING_DIM = 128;
export const DEFAULT_NGRAM_SIZES: readonly number[] = [2, 3, 4];
export const EMBEDDING_CACHE_SIZE = 512;
export const EMBEDDER_TIMEOUT_MS = 25;

/**
 * Vector index defaults
 */
export const DEFAULT_N_TREES = 10;
export const DEFAULT_LEAF_SIZE = 16;
export const DEFAULT_INDEX_SEED = 0x5eed;
