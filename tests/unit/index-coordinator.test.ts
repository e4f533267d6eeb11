/**
 * Unit tests for IndexCoordinator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IndexCoordinator } from '../../src/services/index-coordinator.js';
import type { CommandStore } from '../../src/services/command-store.js';
import { VectorIndex } from '../../src/services/vector-index.js';
import {
  FailingEmbedder,
  FixedEmbedder,
  createTempDir,
  openMemoryStore,
  seedCommands,
  type TempDir,
} from '../helpers/daemon-test-helper.js';

const VECTORS: Record<string, number[]> = {
  ls: [1, 0, 0, 0],
  'git status': [0, 1, 0, 0],
  'make test': [0, 0, 1, 0],
};

describe('IndexCoordinator', () => {
  let temp: TempDir;
  let store: CommandStore;
  let index: VectorIndex;
  let embedder: FixedEmbedder;

  function coordinator(batchSize: number = 10): IndexCoordinator {
    return new IndexCoordinator({ store, index, embedder, batchSize, flushIntervalMs: 60_000 });
  }

  beforeEach(() => {
    temp = createTempDir();
    store = openMemoryStore();
    index = new VectorIndex({ dim: 4, nTrees: 2, directory: temp.path });
    embedder = new FixedEmbedder(VECTORS);
  });

  afterEach(async () => {
    await store.close();
    temp.cleanup();
  });

  describe('enqueue', () => {
    it('should index queued commands on flush', async () => {
      const subject = coordinator();
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });
      subject.enqueue({ id: 2, command: 'git status', exitCode: 0 });

      expect(subject.getStats().queued).toBe(2);
      await subject.flush();

      expect(index.listMetadata()).toEqual([
        { command: 'ls', record_id: 1 },
        { command: 'git status', record_id: 2 },
      ]);
      expect(index.isBuilt()).toBe(true);
      expect(subject.getStats()).toMatchObject({ queued: 0, indexedCommands: 2, batchesFlushed: 1 });
    });

    it('should ignore failed commands', () => {
      const subject = coordinator();
      subject.enqueue({ id: 1, command: 'ls', exitCode: 127 });

      expect(subject.getStats().queued).toBe(0);
    });

    it('should queue each command text once', async () => {
      const subject = coordinator();
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });
      subject.enqueue({ id: 2, command: 'ls', exitCode: 0 });
      expect(subject.getStats().queued).toBe(1);

      await subject.flush();
      subject.enqueue({ id: 3, command: 'ls', exitCode: 0 });

      expect(subject.getStats().queued).toBe(0);
      expect(embedder.calls).toEqual(['ls']);
    });

    it('should flush as soon as a batch is full', async () => {
      const subject = coordinator(2);
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });
      subject.enqueue({ id: 2, command: 'make test', exitCode: 0 });

      expect(subject.getStats().queued).toBe(0);
      await subject.flush();

      expect(index.getStatistics().builtVectors).toBe(2);
    });

    it('should count embedding failures and skip the build', async () => {
      const subject = new IndexCoordinator({ store, index, embedder: new FailingEmbedder() });
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });

      await subject.flush();

      expect(subject.getStats()).toMatchObject({ embeddingFailures: 1, indexedCommands: 0, batchesFlushed: 0 });
      expect(index.isBuilt()).toBe(false);
    });
  });

  describe('bootstrap', () => {
    it('should rebuild from successful store commands when nothing was saved', async () => {
      const ids = await seedCommands(store, [
        { command: 'ls', timestamp: 1000 },
        { command: 'lss', exitCode: 127, timestamp: 2000 },
        { command: 'ls', timestamp: 3000 },
      ]);

      await coordinator().bootstrap();

      expect(index.listMetadata()).toEqual([{ command: 'ls', record_id: ids[2] }]);
    });

    it('should restore a saved index without embedding again', async () => {
      await seedCommands(store, [{ command: 'git status' }]);
      await coordinator().bootstrap();

      const restoredIndex = new VectorIndex({ dim: 4, nTrees: 2, directory: temp.path });
      const restoredEmbedder = new FixedEmbedder(VECTORS);
      const restored = new IndexCoordinator({ store, index: restoredIndex, embedder: restoredEmbedder });
      await restored.bootstrap();

      expect(restoredEmbedder.calls).toEqual([]);
      expect(restoredIndex.isBuilt()).toBe(true);
      expect(restored.getStats().indexedCommands).toBe(1);

      restored.enqueue({ id: 9, command: 'git status', exitCode: 0 });
      expect(restored.getStats().queued).toBe(0);
    });

    it('should rebuild when the saved index has another dimension', async () => {
      await seedCommands(store, [{ command: 'make test' }]);
      const wide = new VectorIndex({ dim: 8, directory: temp.path });
      await new IndexCoordinator({ store, index: wide, embedder: new FixedEmbedder({}, 8) }).bootstrap();

      await coordinator().bootstrap();

      expect(index.listMetadata().map((m) => m.command)).toEqual(['make test']);
    });
  });

  describe('rebuildFromStore', () => {
    it('should drop commands that are no longer stored', async () => {
      const subject = coordinator();
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });
      await subject.flush();
      await seedCommands(store, [{ command: 'git status' }]);

      await subject.rebuildFromStore();

      expect(index.listMetadata().map((m) => m.command)).toEqual(['git status']);
      expect(subject.getStats().indexedCommands).toBe(1);
    });
  });

  describe('shutdown', () => {
    it('should flush pending work, save and stop accepting commands', async () => {
      const subject = coordinator();
      subject.enqueue({ id: 1, command: 'ls', exitCode: 0 });

      await subject.shutdown();
      subject.enqueue({ id: 2, command: 'make test', exitCode: 0 });

      expect(subject.getStats().queued).toBe(0);
      const reloaded = new VectorIndex({ dim: 4, directory: temp.path });
      expect((await reloaded.load()).isOk()).toBe(true);
      expect(reloaded.listMetadata()).toEqual([{ command: 'ls', record_id: 1 }]);
    });
  });
});
