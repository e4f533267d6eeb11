/**
 * Unit tests for CommandStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { CommandStore, buildMatchExpression, escapeLike } from '../../src/services/command-store.js';
import { StoreError } from '../../src/lib/errors/DaemonErrors.js';
import { MS_PER_DAY } from '../../src/constants/daemon-constants.js';
import {
  createTempDir,
  openMemoryStore,
  seedCommands,
  unwrap,
  type TempDir,
} from '../helpers/daemon-test-helper.js';

const BASE = Date.UTC(2026, 0, 1);

describe('CommandStore', () => {
  let store: CommandStore;

  beforeEach(() => {
    store = openMemoryStore();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('log', () => {
    it('should assign strictly increasing ids', async () => {
      const ids = await seedCommands(store, [{ command: 'ls' }, { command: 'pwd' }, { command: 'ls' }]);

      expect(ids[1]).toBeGreaterThan(ids[0] ?? Infinity);
      expect(ids[2]).toBeGreaterThan(ids[1] ?? Infinity);
    });

    it('should store every field', async () => {
      const [id] = await seedCommands(store, [
        {
          command: 'make test',
          cwd: '/srv/app',
          exitCode: 2,
          durationSeconds: 1.5,
          timestamp: BASE,
          sessionId: 'session-1',
        },
      ]);

      expect(unwrap(store.recent(1))).toEqual([
        {
          id,
          command: 'make test',
          working_directory: '/srv/app',
          exit_code: 2,
          duration_seconds: 1.5,
          timestamp: BASE,
          session_id: 'session-1',
        },
      ]);
    });

    it('should default the timestamp to now', async () => {
      const before = Date.now();
      await seedCommands(store, [{ command: 'date' }]);
      const [record] = unwrap(store.recent(1));

      expect(record?.timestamp).toBeGreaterThanOrEqual(before);
    });
  });

  describe('recent', () => {
    it('should return newest first', async () => {
      await seedCommands(store, [
        { command: 'first', timestamp: BASE },
        { command: 'second', timestamp: BASE + 1000 },
        { command: 'third', timestamp: BASE + 2000 },
      ]);

      expect(unwrap(store.recent(2)).map((r) => r.command)).toEqual(['third', 'second']);
    });

    it('should break timestamp ties by id', async () => {
      await seedCommands(store, [
        { command: 'a', timestamp: BASE },
        { command: 'b', timestamp: BASE },
      ]);

      expect(unwrap(store.recent(10)).map((r) => r.command)).toEqual(['b', 'a']);
    });
  });

  describe('searchPrefix', () => {
    beforeEach(async () => {
      await seedCommands(store, [
        { command: 'git status', cwd: '/home/u/proj', timestamp: BASE },
        { command: 'git stash', cwd: '/home/u/proj/sub', timestamp: BASE + 1 },
        { command: 'git status', cwd: '/home/u/project2', timestamp: BASE + 2 },
        { command: 'grep -r todo', cwd: '/home/u/proj', timestamp: BASE + 3 },
      ]);
    });

    it('should match case-insensitively, newest first', () => {
      const records = unwrap(store.searchPrefix('GIT ST', undefined, 10));

      expect(records.map((r) => r.working_directory)).toEqual([
        '/home/u/project2',
        '/home/u/proj/sub',
        '/home/u/proj',
      ]);
    });

    it('should restrict to a directory and its descendants', () => {
      const records = unwrap(store.searchPrefix('git', '/home/u/proj', 10));

      expect(records.map((r) => r.command)).toEqual(['git stash', 'git status']);
    });

    it('should accept a trailing slash on the directory', () => {
      expect(unwrap(store.searchPrefix('git', '/home/u/proj/', 10))).toHaveLength(2);
    });

    it('should respect the limit', () => {
      expect(unwrap(store.searchPrefix('g', undefined, 2))).toHaveLength(2);
    });

    it('should skip failed commands when asked', async () => {
      await seedCommands(store, [{ command: 'git stauts', exitCode: 127, timestamp: BASE + 4 }]);

      expect(unwrap(store.searchPrefix('git st', undefined, 10))[0]?.command).toBe('git stauts');
      expect(
        unwrap(store.searchPrefix('git st', undefined, 10, { successfulOnly: true })).map((r) => r.command)
      ).toEqual(['git status', 'git stash', 'git status']);
      expect(unwrap(store.recent(10, undefined, { successfulOnly: true })).map((r) => r.command)).toEqual([
        'grep -r todo',
        'git status',
        'git stash',
        'git status',
      ]);
    });

    it('should treat LIKE wildcards literally', async () => {
      await seedCommands(store, [{ command: 'echo 100%' }, { command: 'echo 1000' }]);

      expect(unwrap(store.searchPrefix('echo 100%', undefined, 10)).map((r) => r.command)).toEqual([
        'echo 100%',
      ]);
      expect(unwrap(store.searchPrefix('_cho', undefined, 10))).toEqual([]);
    });
  });

  describe('searchText', () => {
    beforeEach(async () => {
      const now = Date.now();
      await seedCommands(store, [
        { command: 'docker compose up', timestamp: now - 3 * MS_PER_DAY },
        { command: 'docker ps', timestamp: now - 2 * MS_PER_DAY },
        { command: 'kubectl get pods', timestamp: now - MS_PER_DAY },
      ]);
    });

    it('should find commands containing any token', () => {
      const commands = unwrap(store.searchText('compose pods', 10)).map((r) => r.command);

      expect(commands.sort()).toEqual(['docker compose up', 'kubectl get pods']);
    });

    it('should respect the limit', () => {
      expect(unwrap(store.searchText('docker', 1))).toHaveLength(1);
    });

    it('should rank by relevance before recency', async () => {
      const ranked = unwrap(CommandStore.open({ dbPath: ':memory:', recencyWeight: 0 }));
      try {
        await seedCommands(ranked, [
          { command: 'docker compose up', timestamp: BASE },
          { command: 'ls', timestamp: BASE + 1 },
          { command: 'pwd', timestamp: BASE + 2 },
          { command: 'cd src', timestamp: BASE + 3 },
          { command: 'vim notes', timestamp: BASE + 4 },
          { command: 'htop', timestamp: BASE + 5 },
          { command: 'docker ps', timestamp: BASE + 6 },
        ]);

        expect(unwrap(ranked.searchText('docker compose', 10)).map((r) => r.command)).toEqual([
          'docker compose up',
          'docker ps',
        ]);
      } finally {
        await ranked.close();
      }
    });

    it('should put the most recent first among equally relevant matches', async () => {
      const ranked = unwrap(CommandStore.open({ dbPath: ':memory:', recencyWeight: 0 }));
      try {
        await seedCommands(ranked, [
          { command: 'make build', timestamp: BASE },
          { command: 'make build', timestamp: BASE + 20 },
          { command: 'make build', timestamp: BASE + 10 },
          { command: 'ls', timestamp: BASE + 30 },
          { command: 'pwd', timestamp: BASE + 40 },
        ]);

        expect(unwrap(ranked.searchText('build', 10)).map((r) => r.timestamp)).toEqual([
          BASE + 20,
          BASE + 10,
          BASE,
        ]);
      } finally {
        await ranked.close();
      }
    });

    it('should favour recent commands at the default weight', async () => {
      const now = Date.now();
      await seedCommands(store, [{ command: 'docker ps', timestamp: now - 30 * MS_PER_DAY }]);

      const records = unwrap(store.searchText('ps', 10));

      expect(records.map((r) => [r.command, r.timestamp])).toEqual([
        ['docker ps', now - 2 * MS_PER_DAY],
        ['docker ps', now - 30 * MS_PER_DAY],
      ]);
    });

    it('should return nothing for a query without word tokens', () => {
      expect(unwrap(store.searchText('-- !!', 10))).toEqual([]);
    });

    it('should not fail on FTS syntax characters', () => {
      expect(unwrap(store.searchText('docker" OR (', 10)).length).toBe(2);
    });
  });

  describe('recentDistinctCommands', () => {
    it('should group by text and skip failures when asked', async () => {
      const ids = await seedCommands(store, [
        { command: 'npm test', timestamp: BASE },
        { command: 'npm tset', exitCode: 127, timestamp: BASE + 1 },
        { command: 'npm test', timestamp: BASE + 2 },
      ]);

      expect(unwrap(store.recentDistinctCommands(10, true))).toEqual([
        { command: 'npm test', count: 2, lastUsed: BASE + 2, lastId: ids[2] },
      ]);
      expect(unwrap(store.recentDistinctCommands(10, false)).map((f) => f.command)).toEqual([
        'npm test',
        'npm tset',
      ]);
    });
  });

  describe('prune', () => {
    it('should delete records older than the cutoff and drop them from search', async () => {
      await seedCommands(store, [
        { command: 'old terraform plan', timestamp: BASE - 100 * MS_PER_DAY },
        { command: 'new terraform apply', timestamp: BASE },
      ]);

      const removed = unwrap(await store.prune(BASE - 50 * MS_PER_DAY));

      expect(removed).toBe(1);
      expect(unwrap(store.searchText('terraform', 10)).map((r) => r.command)).toEqual([
        'new terraform apply',
      ]);
    });
  });

  describe('getStatistics', () => {
    it('should aggregate the history', async () => {
      await seedCommands(store, [
        { command: 'ls', sessionId: 'a', timestamp: BASE },
        { command: 'ls', sessionId: 'a', timestamp: BASE + 10 },
        { command: 'false', exitCode: 1, sessionId: 'b', timestamp: BASE + 20 },
      ]);

      const stats = unwrap(store.getStatistics());

      expect(stats.totalCommands).toBe(3);
      expect(stats.uniqueCommands).toBe(2);
      expect(stats.successfulCommands).toBe(2);
      expect(stats.successRate).toBeCloseTo(2 / 3);
      expect(stats.totalSessions).toBe(2);
      expect(stats.oldestTimestamp).toBe(BASE);
      expect(stats.newestTimestamp).toBe(BASE + 20);
      expect(stats.topCommands[0]).toMatchObject({ command: 'ls', count: 2 });
    });

    it('should report an empty history', () => {
      const stats = unwrap(store.getStatistics());

      expect(stats.totalCommands).toBe(0);
      expect(stats.successRate).toBe(0);
      expect(stats.oldestTimestamp).toBeNull();
    });
  });
});

describe('CommandStore on disk', () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = createTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should keep records across reopen', async () => {
    const dbPath = join(temp.path, 'history.db');
    const first = unwrap(CommandStore.open({ dbPath }));
    await seedCommands(first, [{ command: 'cargo build' }]);
    await first.close();

    const second = unwrap(CommandStore.open({ dbPath }));
    expect(unwrap(second.recent(10)).map((r) => r.command)).toEqual(['cargo build']);
    await second.close();
  });

  it('should report a file that is not a database as corrupt', () => {
    const dbPath = join(temp.path, 'history.db');
    writeFileSync(dbPath, 'x'.repeat(4096));

    const result = CommandStore.open({ dbPath });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StoreError);
      expect(result.error.kind).toBe('CORRUPT');
      expect(result.error.code).toBe('STORE_CORRUPT');
    }
  });
});

describe('query helpers', () => {
  it('should escape LIKE wildcards', () => {
    expect(escapeLike('50%_\\')).toBe('50\\%\\_\\\\');
  });

  it('should quote every token and join with OR', () => {
    expect(buildMatchExpression('git "push" --force')).toBe('"git" OR "push" OR "force"');
  });

  it('should return null without tokens', () => {
    expect(buildMatchExpression('  -- ')).toBeNull();
  });
});
