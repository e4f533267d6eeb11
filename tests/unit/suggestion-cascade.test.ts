/**
 * Unit tests for SuggestionCascade
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  SuggestionCascade,
  compareCandidates,
  mergeCandidates,
} from '../../src/services/suggestion-cascade.js';
import type { CommandStore } from '../../src/services/command-store.js';
import { VectorIndex } from '../../src/services/vector-index.js';
import { RetrievalFailedError } from '../../src/lib/errors/DaemonErrors.js';
import { defaultDaemonConfig, type SuggestionSettings } from '../../src/models/daemon-config.js';
import { SourceTier, type SuggestionCandidate } from '../../src/models/suggestion.js';
import {
  FailingEmbedder,
  FixedEmbedder,
  openMemoryStore,
  seedCommands,
  unwrap,
} from '../helpers/daemon-test-helper.js';

const BASE = Date.UTC(2026, 2, 1);

function settingsWith(overrides: Partial<SuggestionSettings> = {}): () => SuggestionSettings {
  return () => ({ ...defaultDaemonConfig().suggestions, ...overrides });
}

function candidate(
  command: string,
  confidence: number,
  tier: SourceTier
): SuggestionCandidate {
  return { command, confidence, source_tier: tier, tiers: [tier] };
}

async function indexOf(entries: Record<string, number[]>): Promise<VectorIndex> {
  const index = new VectorIndex({ dim: 4, nTrees: 2 });
  Object.entries(entries).forEach(([command, values], i) => {
    unwrap(index.add(Float32Array.from(values), { command, record_id: i + 1 }));
  });
  unwrap(await index.build());
  return index;
}

describe('SuggestionCascade', () => {
  let store: CommandStore;

  beforeEach(async () => {
    store = openMemoryStore();
    await seedCommands(store, [
      { command: 'git status', timestamp: BASE },
      { command: 'git status', timestamp: BASE + 1 },
      { command: 'git status', timestamp: BASE + 2 },
      { command: 'git stash', timestamp: BASE + 3 },
      { command: 'git switch main', timestamp: BASE + 4 },
    ]);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('suggest', () => {
    it('should merge exact and fuzzy hits for a partial command', async () => {
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      const suggestions = unwrap(await cascade.suggest({ partial: 'git st' }));

      expect(suggestions).toEqual([
        {
          command: 'git status',
          confidence: 1,
          source_tier: SourceTier.EXACT,
          tiers: [SourceTier.EXACT, SourceTier.FUZZY],
          fuzzy_score: 75,
          similarity_score: undefined,
        },
        {
          command: 'git stash',
          confidence: 0.95,
          source_tier: SourceTier.EXACT,
          tiers: [SourceTier.EXACT, SourceTier.FUZZY],
          fuzzy_score: 80,
          similarity_score: undefined,
        },
      ]);
    });

    it('should not suggest commands that failed', async () => {
      await seedCommands(store, [
        { command: 'git stauts', exitCode: 127, timestamp: BASE + 5 },
        { command: 'git stauts', exitCode: 127, timestamp: BASE + 6 },
      ]);
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      const suggestions = unwrap(await cascade.suggest({ partial: 'git st' }));

      expect(suggestions.map((s) => [s.command, s.confidence])).toEqual([
        ['git status', 1],
        ['git stash', 0.95],
      ]);
    });

    it('should return nothing for an empty partial', async () => {
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      expect(unwrap(await cascade.suggest({ partial: '' }))).toEqual([]);
    });

    it('should drop candidates below the minimum confidence', async () => {
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith({ min_confidence: 0.96 }),
      });

      const suggestions = unwrap(await cascade.suggest({ partial: 'git st' }));

      expect(suggestions.map((s) => s.command)).toEqual(['git status']);
    });

    it('should cap the number of suggestions', async () => {
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith({ max_suggestions: 1 }),
      });

      expect(unwrap(await cascade.suggest({ partial: 'git' }))).toHaveLength(1);
    });

    it('should read settings on every request', async () => {
      let threshold = 0.3;
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: () => ({ ...defaultDaemonConfig().suggestions, min_confidence: threshold }),
      });

      expect(unwrap(await cascade.suggest({ partial: 'git st' }))).toHaveLength(2);
      threshold = 0.99;
      expect(unwrap(await cascade.suggest({ partial: 'git st' }))).toHaveLength(1);
    });

    it('should fail when the store cannot be read', async () => {
      const closed = openMemoryStore();
      await closed.close();
      const cascade = new SuggestionCascade({
        store: closed,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      const result = await cascade.suggest({ partial: 'git' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(RetrievalFailedError);
        expect(result.error.code).toBe('RETRIEVAL_FAILED');
        expect(result.error.retryable).toBe(true);
      }
    });

    it('should add semantic neighbours from a built index', async () => {
      const index = await indexOf({ 'docker ps': [1, 0, 0, 0], 'ls -la': [0, 1, 0, 0] });
      const cascade = new SuggestionCascade({
        store,
        index,
        embedder: new FixedEmbedder({ containers: [1, 0, 0, 0] }),
        settings: settingsWith(),
      });

      const suggestions = unwrap(await cascade.suggest({ partial: 'containers' }));

      expect(suggestions.map((s) => [s.command, s.source_tier])).toEqual([
        ['docker ps', SourceTier.SEMANTIC],
        ['ls -la', SourceTier.SEMANTIC],
      ]);
      expect(suggestions[0]?.confidence).toBeCloseTo(1, 5);
      // angular distance sqrt(2) for orthogonal vectors
      expect(suggestions[1]?.confidence).toBeCloseTo(1 / (1 + Math.SQRT2), 5);
    });

    it('should embed the last history entry alongside the partial', async () => {
      const index = await indexOf({ 'docker ps': [1, 0, 0, 0] });
      const embedder = new FixedEmbedder({ containers: [1, 0, 0, 0], 'cd infra': [0, 1, 0, 0] });
      const cascade = new SuggestionCascade({ store, index, embedder, settings: settingsWith() });

      const suggestions = unwrap(
        await cascade.suggest({ partial: 'containers', history: ['make', 'cd infra'] })
      );

      expect(embedder.calls).toEqual(['containers', 'cd infra']);
      expect(suggestions[0]?.command).toBe('docker ps');
      expect(suggestions[0]?.confidence).toBeLessThan(1);
    });

    it('should skip the semantic tier while the index is not built', async () => {
      const embedder = new FixedEmbedder({ containers: [1, 0, 0, 0] });
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        embedder,
        settings: settingsWith(),
      });

      expect(unwrap(await cascade.suggest({ partial: 'containers' }))).toEqual([]);
      expect(embedder.calls).toEqual([]);
    });

    it('should keep the other tiers when the embedder fails', async () => {
      const index = await indexOf({ 'docker ps': [1, 0, 0, 0] });
      const cascade = new SuggestionCascade({
        store,
        index,
        embedder: new FailingEmbedder(),
        settings: settingsWith(),
      });

      const suggestions = unwrap(await cascade.suggest({ partial: 'git st' }));

      expect(suggestions.map((s) => s.command)).toEqual(['git status', 'git stash']);
    });
  });

  describe('exactTier', () => {
    it('should rank by frequency, then recency, with decaying confidence', async () => {
      await seedCommands(store, [
        { command: 'make build', timestamp: BASE + 10 },
        { command: 'make lint', timestamp: BASE + 11 },
        { command: 'make build', timestamp: BASE + 12 },
        { command: 'make test', timestamp: BASE + 13 },
      ]);
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      const candidates = unwrap(cascade.exactTier('make', undefined, settingsWith()()));

      expect(candidates.map((c) => c.command)).toEqual(['make build', 'make test', 'make lint']);
      expect(candidates[0]?.confidence).toBe(1);
      expect(candidates[1]?.confidence).toBeCloseTo(0.95);
      expect(candidates[2]?.confidence).toBeCloseTo(0.9);
    });
  });

  describe('fuzzyTier', () => {
    it('should keep distinct commands at or above the threshold', () => {
      const cascade = new SuggestionCascade({
        store,
        index: new VectorIndex({ dim: 4 }),
        settings: settingsWith(),
      });

      const candidates = unwrap(cascade.fuzzyTier('git st', settingsWith()()));

      // 'git switch main' scores 57
      expect(candidates.map((c) => [c.command, c.fuzzy_score])).toEqual([
        ['git stash', 80],
        ['git status', 75],
      ]);
    });
  });
});

describe('mergeCandidates', () => {
  it('should keep the best confidence and every tier', () => {
    const merged = mergeCandidates([
      candidate('kubectl get pods', 0.7, SourceTier.FUZZY),
      candidate('kubectl get pods', 0.9, SourceTier.SEMANTIC),
    ]);

    expect(merged).toEqual([
      {
        command: 'kubectl get pods',
        confidence: 0.9,
        source_tier: SourceTier.SEMANTIC,
        tiers: [SourceTier.SEMANTIC, SourceTier.FUZZY],
        fuzzy_score: undefined,
        similarity_score: undefined,
      },
    ]);
  });

  it('should credit the higher-priority tier on equal confidence', () => {
    const [merged] = mergeCandidates([
      candidate('ls', 0.8, SourceTier.FUZZY),
      candidate('ls', 0.8, SourceTier.EXACT),
    ]);

    expect(merged?.source_tier).toBe(SourceTier.EXACT);
  });

  it('should order ties by tier, then by command text', () => {
    const sorted = [
      candidate('b', 0.5, SourceTier.FUZZY),
      candidate('c', 0.5, SourceTier.EXACT),
      candidate('a', 0.5, SourceTier.FUZZY),
      candidate('d', 0.6, SourceTier.SEMANTIC),
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.command)).toEqual(['d', 'c', 'a', 'b']);
  });
});
