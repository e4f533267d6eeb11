/**
 * Suggestion Cascade
 *
 * Fuses three retrieval tiers into one ranked, deduplicated list:
 *
 * - EXACT: prefix hits from the store, grouped by command text and ranked by
 *   frequency then recency
 * - FUZZY: token-sort ratio against the distinct commands of the most recent
 *   records
 * - SEMANTIC: nearest neighbours of the embedded partial in the vector index,
 *   skipped while the index is not built
 *
 * A store failure fails the request; embedder and index failures only remove
 * the semantic tier.
 */

import { performance } from 'perf_hooks';
import type { CommandStore } from './command-store.js';
import type { VectorIndex } from './vector-index.js';
import type { Embedder } from './embedder.js';
import { l2Normalize } from './embedder.js';
import { tokenSortRatio } from '../lib/fuzzy.js';
import { RetrievalFailedError, type StoreError, toError } from '../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import type { SuggestionSettings } from '../models/daemon-config.js';
import {
  SourceTier,
  TIER_PRIORITY,
  type SuggestRequest,
  type SuggestionCandidate,
} from '../models/suggestion.js';
import {
  EXACT_CANDIDATE_LIMIT,
  HISTORY_CONTEXT_WEIGHT,
  SLOW_REQUEST_THRESHOLD_MS,
} from '../constants/suggestion-constants.js';

export interface SuggestionCascadeDependencies {
  store: CommandStore;
  index: VectorIndex;
  /** Absent embedder disables the semantic tier */
  embedder?: Embedder | null;
  /** Read on every request so configuration changes apply immediately */
  settings: () => SuggestionSettings;
  logger?: Logger;
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Confidence desc, then tier priority, then command text
 */
export function compareCandidates(a: SuggestionCandidate, b: SuggestionCandidate): number {
  return (
    b.confidence - a.confidence ||
    TIER_PRIORITY[a.source_tier] - TIER_PRIORITY[b.source_tier] ||
    compareText(a.command, b.command)
  );
}

/**
 * Union candidates by command text; the highest confidence wins and every
 * contributing tier is kept
 */
export function mergeCandidates(candidates: SuggestionCandidate[]): SuggestionCandidate[] {
  const byCommand = new Map<string, SuggestionCandidate>();

  for (const candidate of candidates) {
    const existing = byCommand.get(candidate.command);
    if (!existing) {
      byCommand.set(candidate.command, { ...candidate, tiers: [...candidate.tiers] });
      continue;
    }

    const candidateWins =
      candidate.confidence > existing.confidence ||
      (candidate.confidence === existing.confidence &&
        TIER_PRIORITY[candidate.source_tier] < TIER_PRIORITY[existing.source_tier]);
    const winner = candidateWins ? candidate : existing;
    const tiers = Array.from(new Set([...existing.tiers, ...candidate.tiers])).sort(
      (a, b) => TIER_PRIORITY[a] - TIER_PRIORITY[b]
    );

    byCommand.set(candidate.command, {
      command: candidate.command,
      confidence: winner.confidence,
      source_tier: winner.source_tier,
      tiers,
      fuzzy_score: existing.fuzzy_score ?? candidate.fuzzy_score,
      similarity_score: existing.similarity_score ?? candidate.similarity_score,
    });
  }

  return Array.from(byCommand.values()).sort(compareCandidates);
}

export class SuggestionCascade {
  private store: CommandStore;
  private index: VectorIndex;
  private embedder: Embedder | null;
  private settings: () => SuggestionSettings;
  private logger: Logger;

  constructor(deps: SuggestionCascadeDependencies) {
    this.store = deps.store;
    this.index = deps.index;
    this.embedder = deps.embedder ?? null;
    this.settings = deps.settings;
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Ranked suggestions for a partial command line
   */
  async suggest(request: SuggestRequest): Promise<Result<SuggestionCandidate[], RetrievalFailedError>> {
    if (request.partial.length === 0) {
      return ok([]);
    }

    const startTime = performance.now();
    const settings = this.settings();

    const exact = this.exactTier(request.partial, request.cwd, settings);
    if (exact.isErr()) {
      return err(this.retrievalFailed(exact.error));
    }
    const fuzzy = this.fuzzyTier(request.partial, settings);
    if (fuzzy.isErr()) {
      return err(this.retrievalFailed(fuzzy.error));
    }
    const semantic = await this.semanticTier(request.partial, request.history, settings);

    const ranked = mergeCandidates([...exact.value, ...fuzzy.value, ...semantic])
      .filter((candidate) => candidate.confidence >= settings.min_confidence)
      .slice(0, settings.max_suggestions);

    const durationMs = performance.now() - startTime;
    if (durationMs > SLOW_REQUEST_THRESHOLD_MS) {
      this.logger.logSlowRequest('suggest', durationMs, SLOW_REQUEST_THRESHOLD_MS, {
        resultCount: ranked.length,
        additionalContext: {
          partial_length: request.partial.length,
          exact: exact.value.length,
          fuzzy: fuzzy.value.length,
          semantic: semantic.length,
        },
      });
    }

    return ok(ranked);
  }

  /**
   * Prefix hits grouped by command; confidence decays with rank
   */
  exactTier(
    partial: string,
    cwd: string | undefined,
    settings: SuggestionSettings
  ): Result<SuggestionCandidate[], StoreError> {
    return this.store
      .searchPrefix(partial, cwd, EXACT_CANDIDATE_LIMIT, { successfulOnly: true })
      .map((records) => {
        const groups = new Map<string, { count: number; lastTimestamp: number; lastId: number }>();
        for (const record of records) {
          const group = groups.get(record.command);
          if (group) {
            group.count++;
          } else {
            // Records arrive newest first
            groups.set(record.command, { count: 1, lastTimestamp: record.timestamp, lastId: record.id });
          }
        }

        return Array.from(groups.entries())
          .sort(
            ([, a], [, b]) => b.count - a.count || b.lastTimestamp - a.lastTimestamp || b.lastId - a.lastId
          )
          .map(([command], rank) => ({
            command,
            confidence: clampConfidence(1 - settings.exact_rank_decay * rank),
            source_tier: SourceTier.EXACT,
            tiers: [SourceTier.EXACT],
          }));
      });
  }

  /**
   * Token-sort ratio against recent distinct commands
   */
  fuzzyTier(partial: string, settings: SuggestionSettings): Result<SuggestionCandidate[], StoreError> {
    return this.store.recent(settings.fuzzy_pool_size, undefined, { successfulOnly: true }).map((records) => {
      const seen = new Set<string>();
      const candidates: SuggestionCandidate[] = [];

      for (const record of records) {
        if (seen.has(record.command)) continue;
        seen.add(record.command);

        const score = tokenSortRatio(partial, record.command);
        if (score >= settings.fuzzy_threshold) {
          candidates.push({
            command: record.command,
            confidence: clampConfidence(score / 100),
            source_tier: SourceTier.FUZZY,
            tiers: [SourceTier.FUZZY],
            fuzzy_score: score,
          });
        }
      }

      return candidates;
    });
  }

  /**
   * Nearest neighbours of the embedded partial; empty when unavailable
   */
  async semanticTier(
    partial: string,
    history: string[] | undefined,
    settings: SuggestionSettings
  ): Promise<SuggestionCandidate[]> {
    if (!this.embedder || !this.index.isBuilt()) {
      return [];
    }

    try {
      const query = await this.queryVector(this.embedder, partial, history);
      const hits = this.index.query(query, settings.semantic_k);
      if (hits.isErr()) {
        this.logger.debug('Semantic tier skipped', { reason: hits.error.message });
        return [];
      }

      return hits.value.map((hit) => {
        const similarity = 1 / (1 + hit.distance);
        return {
          command: hit.metadata.command,
          confidence: clampConfidence(similarity),
          source_tier: SourceTier.SEMANTIC,
          tiers: [SourceTier.SEMANTIC],
          similarity_score: similarity,
        };
      });
    } catch (error) {
      this.logger.warn('Semantic tier failed', { error: toError(error).message });
      return [];
    }
  }

  /**
   * Embedding of the partial, nudged toward the most recent history entry
   */
  private async queryVector(embedder: Embedder, partial: string, history: string[] | undefined): Promise<Float32Array> {
    const base = await embedder.encode(partial);
    const previous = history?.[history.length - 1];
    if (!previous) {
      return base;
    }

    const context = await embedder.encode(previous);
    const blended = new Float32Array(base.length);
    for (let i = 0; i < base.length; i++) {
      blended[i] = (base[i] ?? 0) + HISTORY_CONTEXT_WEIGHT * (context[i] ?? 0);
    }
    return l2Normalize(blended);
  }

  private retrievalFailed(error: StoreError): RetrievalFailedError {
    this.logger.error('Suggestion retrieval failed', { code: error.code, error: error.message });
    return new RetrievalFailedError(error.message, error);
  }
}
