import { z } from 'zod';
import {
  DEFAULT_EXACT_RANK_DECAY,
  DEFAULT_FUZZY_POOL_SIZE,
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_MAX_SUGGESTIONS,
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_SEMANTIC_K,
  DEFAULT_EMBEDDING_DIM,
  DEFAULT_N_TREES,
} from '../constants/suggestion-constants.js';
import {
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_EXCLUDED_PATTERNS,
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_INDEX_BATCH_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_SHUTDOWN_GRACE_MS,
} from '../constants/daemon-constants.js';

export const SuggestionSettingsSchema = z.object({
  max_suggestions: z.number().int().min(1).max(50).default(DEFAULT_MAX_SUGGESTIONS),
  min_confidence: z.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
  fuzzy_threshold: z.number().min(0).max(100).default(DEFAULT_FUZZY_THRESHOLD),
  fuzzy_pool_size: z.number().int().min(1).max(10_000).default(DEFAULT_FUZZY_POOL_SIZE),
  semantic_k: z.number().int().min(1).max(200).default(DEFAULT_SEMANTIC_K),
  exact_rank_decay: z.number().min(0).max(0.5).default(DEFAULT_EXACT_RANK_DECAY),
});

export const PrivacySettingsSchema = z.object({
  excluded_paths: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_PATHS]),
  excluded_patterns: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_PATTERNS]),
  retention_days: z.number().int().min(1).default(DEFAULT_RETENTION_DAYS),
});

export const IndexSettingsSchema = z.object({
  dim: z.number().int().min(2).max(4096).default(DEFAULT_EMBEDDING_DIM),
  n_trees: z.number().int().min(1).max(100).default(DEFAULT_N_TREES),
  batch_size: z.number().int().min(1).max(10_000).default(DEFAULT_INDEX_BATCH_SIZE),
  flush_interval_ms: z.number().int().min(10).default(DEFAULT_FLUSH_INTERVAL_MS),
});

export const DaemonSettingsSchema = z.object({
  request_timeout_ms: z.number().int().min(10).default(DEFAULT_REQUEST_TIMEOUT_MS),
  idle_timeout_ms: z.number().int().min(100).default(DEFAULT_IDLE_TIMEOUT_MS),
  shutdown_grace_ms: z.number().int().min(0).default(DEFAULT_SHUTDOWN_GRACE_MS),
});

/**
 * Full daemon configuration as stored in config.json
 */
export const DaemonConfigSchema = z.object({
  suggestions: SuggestionSettingsSchema.default({}),
  privacy: PrivacySettingsSchema.default({}),
  index: IndexSettingsSchema.default({}),
  daemon: DaemonSettingsSchema.default({}),
});

export type SuggestionSettings = z.infer<typeof SuggestionSettingsSchema>;
export type PrivacySettings = z.infer<typeof PrivacySettingsSchema>;
export type IndexSettings = z.infer<typeof IndexSettingsSchema>;
export type DaemonSettings = z.infer<typeof DaemonSettingsSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

/**
 * Configuration with every default applied
 */
export function defaultDaemonConfig(): DaemonConfig {
  return DaemonConfigSchema.parse({});
}
