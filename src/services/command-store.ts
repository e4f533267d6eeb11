/**
 * Command Store
 *
 * Append-only SQLite log of executed commands with prefix, full-text and
 * recency lookups. Writes go through WriteLock; reads are plain SELECTs on
 * the same WAL connection.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type {
  CommandFrequency,
  CommandRecord,
  NewCommand,
  StoreStatistics,
} from '../models/command-record.js';
import { StoreError, type StoreErrorKind, toError } from '../lib/errors/DaemonErrors.js';
import { Result, ok, err, trySync } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import { MS_PER_DAY } from '../constants/daemon-constants.js';
import { WriteLock, type WriteLockConfig } from './write-lock.js';
import { MigrationRunner, defaultMigrationsDir } from './migration-runner.js';

const RECORD_COLUMNS = 'id, command, working_directory, exit_code, duration_seconds, timestamp, session_id';
const TOP_COMMANDS_LIMIT = 10;

/**
 * Options for opening a command store
 */
export interface CommandStoreOptions {
  /** Database file, or ':memory:' */
  dbPath: string;
  logger?: Logger;
  migrationsDir?: string;
  /** SQLite busy_timeout in milliseconds (default: 1000) */
  busyTimeoutMs?: number;
  writeLock?: Partial<WriteLockConfig>;
  /** Weight of the 1 / (1 + age in days) term in full-text ranking (default: 1) */
  recencyWeight?: number;
}

export interface RecordFilterOptions {
  /** Only records that exited with status 0 */
  successfulOnly?: boolean;
}

interface RankedRow extends CommandRecord {
  rank: number;
}

interface StatisticsRow {
  total: number;
  unique_commands: number;
  successful: number | null;
  sessions: number;
  oldest: number | null;
  newest: number | null;
}

interface FrequencyRow {
  command: string;
  count: number;
  last_used: number;
  last_id: number;
}

/**
 * Escape LIKE wildcards so the input matches literally (ESCAPE '\')
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Build an FTS5 MATCH expression that ORs every word token as a quoted string
 *
 * @returns null when the query has no word tokens
 */
export function buildMatchExpression(query: string): string | null {
  const tokens = query.split(/[^\p{L}\p{N}_]+/u).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return null;
  }
  return tokens.map((token) => `"${token.replace(/"/g, '""')}"`).join(' OR ');
}

function exitClause(options: RecordFilterOptions): string {
  return options.successfulOnly ? 'AND exit_code = 0' : '';
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isCorruption(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'SQLITE_CORRUPT' || code === 'SQLITE_NOTADB';
}

/**
 * Persistent command history
 */
export class CommandStore {
  private db: Database.Database;
  private writeLock: WriteLock;
  private logger: Logger;
  private recencyWeight: number;

  private constructor(db: Database.Database, options: CommandStoreOptions, logger: Logger) {
    this.db = db;
    this.logger = logger;
    this.recencyWeight = options.recencyWeight ?? 1;
    this.writeLock = new WriteLock(db, options.writeLock, logger);
  }

  /**
   * Open (creating if needed) and migrate the database
   */
  static open(options: CommandStoreOptions): Result<CommandStore, StoreError> {
    const logger = options.logger ?? createSilentLogger();
    let db: Database.Database | undefined;

    try {
      if (options.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(options.dbPath), { recursive: true, mode: 0o700 });
      }

      db = new Database(options.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 1000}`);

      const runner = new MigrationRunner(db, options.migrationsDir ?? defaultMigrationsDir(), logger);
      runner.applyMigrations();

      const problem = runner.checkIntegrity();
      if (problem !== null) {
        db.close();
        const error = new StoreError('CORRUPT', 'open', new Error(`Integrity check failed: ${problem}`));
        logger.logStoreError('open', error, { dbPath: options.dbPath });
        return err(error);
      }

      return ok(new CommandStore(db, options, logger));
    } catch (error) {
      if (db?.open) {
        db.close();
      }
      const kind: StoreErrorKind = isCorruption(error) ? 'CORRUPT' : 'READ_FAILED';
      logger.logStoreError('open', error, { dbPath: options.dbPath });
      return err(new StoreError(kind, 'open', toError(error)));
    }
  }

  /**
   * Append a command; resolves once the row is committed
   *
   * @returns The new record id
   */
  async log(entry: NewCommand): Promise<Result<number, StoreError>> {
    const timestamp = entry.timestamp ?? Date.now();

    try {
      const id = await this.writeLock.withWriteLock(() => {
        const info = this.db
          .prepare<[string, string, number, number, number, string | null]>(
            `INSERT INTO commands (command, working_directory, exit_code, duration_seconds, timestamp, session_id)
             VALUES (?, ?, ?, ?, ?, ?)`
          )
          .run(
            entry.command,
            entry.cwd,
            entry.exitCode,
            entry.durationSeconds,
            timestamp,
            entry.sessionId ?? null
          );
        return Number(info.lastInsertRowid);
      });
      return ok(id);
    } catch (error) {
      return err(this.toStoreError('WRITE_FAILED', 'log', error, { command_length: entry.command.length }));
    }
  }

  /**
   * Records whose command starts with `partial` (case-insensitive), newest first
   *
   * @param cwdFilter - Restrict to this directory and its descendants
   */
  searchPrefix(
    partial: string,
    cwdFilter: string | undefined,
    limit: number,
    options: RecordFilterOptions = {}
  ): Result<CommandRecord[], StoreError> {
    return this.read('searchPrefix', () => {
      const params: Array<string | number> = [`${escapeLike(partial)}%`];
      const cwdClause = this.cwdClause(cwdFilter, params);
      params.push(limit);

      return this.db
        .prepare<Array<string | number>, CommandRecord>(
          `SELECT ${RECORD_COLUMNS} FROM commands
           WHERE command LIKE ? ESCAPE '\\' ${cwdClause} ${exitClause(options)}
           ORDER BY timestamp DESC, id DESC
           LIMIT ?`
        )
        .all(...params);
    });
  }

  /**
   * Token-based full-text search ranked by BM25 plus a recency bonus
   */
  searchText(query: string, limit: number): Result<CommandRecord[], StoreError> {
    const match = buildMatchExpression(query);
    if (match === null) {
      return ok([]);
    }

    return this.read('searchText', () => {
      const pool = Math.max(limit * 5, 100);
      const rows = this.db
        .prepare<[string, number], RankedRow>(
          `SELECT c.id, c.command, c.working_directory, c.exit_code, c.duration_seconds,
                  c.timestamp, c.session_id, bm25(commands_fts) AS rank
           FROM commands_fts
           JOIN commands c ON c.id = commands_fts.rowid
           WHERE commands_fts MATCH ?
           ORDER BY rank
           LIMIT ?`
        )
        .all(match, pool);

      const now = Date.now();
      return rows
        .map((row) => {
          const ageDays = Math.max(0, now - row.timestamp) / MS_PER_DAY;
          // bm25() is negative, lower is better
          const score = -row.rank + this.recencyWeight / (1 + ageDays);
          const { rank: _rank, ...record } = row;
          return { record, score };
        })
        .sort(
          (a, b) =>
            b.score - a.score ||
            b.record.timestamp - a.record.timestamp ||
            b.record.id - a.record.id
        )
        .slice(0, limit)
        .map(({ record }) => record);
    });
  }

  /**
   * Most recent records, newest first
   */
  recent(limit: number, cwdFilter?: string, options: RecordFilterOptions = {}): Result<CommandRecord[], StoreError> {
    return this.read('recent', () => {
      const params: Array<string | number> = [];
      const cwdClause = this.cwdClause(cwdFilter, params);
      params.push(limit);

      return this.db
        .prepare<Array<string | number>, CommandRecord>(
          `SELECT ${RECORD_COLUMNS} FROM commands
           WHERE 1 = 1 ${cwdClause} ${exitClause(options)}
           ORDER BY timestamp DESC, id DESC
           LIMIT ?`
        )
        .all(...params);
    });
  }

  /**
   * Distinct command texts, most recently used first
   */
  recentDistinctCommands(limit: number, successfulOnly: boolean): Result<CommandFrequency[], StoreError> {
    return this.read('recentDistinctCommands', () =>
      this.db
        .prepare<[number, number], FrequencyRow>(
          `SELECT command, COUNT(*) AS count, MAX(timestamp) AS last_used, MAX(id) AS last_id
           FROM commands
           WHERE (? = 0 OR exit_code = 0)
           GROUP BY command
           ORDER BY last_used DESC, last_id DESC
           LIMIT ?`
        )
        .all(successfulOnly ? 1 : 0, limit)
        .map(toFrequency)
    );
  }

  /**
   * Delete records older than `beforeTimestamp` (epoch ms)
   *
   * @returns Number of records removed
   */
  async prune(beforeTimestamp: number): Promise<Result<number, StoreError>> {
    try {
      const removed = await this.writeLock.withWriteLock(
        () => this.db.prepare<[number]>('DELETE FROM commands WHERE timestamp < ?').run(beforeTimestamp).changes
      );
      if (removed > 0) {
        this.logger.info('Pruned command history', { removed, before: beforeTimestamp });
      }
      return ok(removed);
    } catch (error) {
      return err(this.toStoreError('WRITE_FAILED', 'prune', error));
    }
  }

  /**
   * Aggregate statistics over the whole history
   */
  getStatistics(): Result<StoreStatistics, StoreError> {
    return this.read('getStatistics', () => {
      const row = this.db
        .prepare<[], StatisticsRow>(
          `SELECT COUNT(*) AS total,
                  COUNT(DISTINCT command) AS unique_commands,
                  SUM(CASE WHEN exit_code = 0 THEN 1 ELSE 0 END) AS successful,
                  COUNT(DISTINCT session_id) AS sessions,
                  MIN(timestamp) AS oldest,
                  MAX(timestamp) AS newest
           FROM commands`
        )
        .get();

      const topCommands = this.db
        .prepare<[number], FrequencyRow>(
          `SELECT command, COUNT(*) AS count, MAX(timestamp) AS last_used, MAX(id) AS last_id
           FROM commands
           GROUP BY command
           ORDER BY count DESC, last_used DESC
           LIMIT ?`
        )
        .all(TOP_COMMANDS_LIMIT)
        .map(toFrequency);

      const total = row?.total ?? 0;
      const successful = row?.successful ?? 0;

      return {
        totalCommands: total,
        uniqueCommands: row?.unique_commands ?? 0,
        successfulCommands: successful,
        successRate: total > 0 ? successful / total : 0,
        totalSessions: row?.sessions ?? 0,
        oldestTimestamp: row?.oldest ?? null,
        newestTimestamp: row?.newest ?? null,
        topCommands,
        databaseSizeBytes: this.databaseSize(),
      };
    });
  }

  /**
   * Wait for queued writes, then close the connection
   */
  async close(): Promise<void> {
    await this.writeLock.drain();
    if (this.db.open) {
      this.db.close();
    }
  }

  private cwdClause(cwdFilter: string | undefined, params: Array<string | number>): string {
    if (cwdFilter === undefined || cwdFilter.length === 0) {
      return '';
    }

    const directory = cwdFilter.length > 1 ? cwdFilter.replace(/\/+$/, '') : cwdFilter;
    const descendants = directory === '/' ? '/%' : `${escapeLike(directory)}/%`;
    params.push(directory, descendants);
    return `AND (working_directory = ? OR working_directory LIKE ? ESCAPE '\\')`;
  }

  private databaseSize(): number {
    const pageCount: unknown = this.db.pragma('page_count', { simple: true });
    const pageSize: unknown = this.db.pragma('page_size', { simple: true });
    return typeof pageCount === 'number' && typeof pageSize === 'number' ? pageCount * pageSize : 0;
  }

  private read<T>(operation: string, fn: () => T): Result<T, StoreError> {
    return trySync(fn, (error) => this.toStoreError('READ_FAILED', operation, error));
  }

  private toStoreError(
    kind: StoreErrorKind,
    operation: string,
    error: unknown,
    context?: Record<string, unknown>
  ): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    const resolvedKind = isCorruption(error) ? 'CORRUPT' : kind;
    this.logger.logStoreError(operation, error, context);
    return new StoreError(resolvedKind, operation, toError(error));
  }
}

function toFrequency(row: FrequencyRow): CommandFrequency {
  return {
    command: row.command,
    count: row.count,
    lastUsed: row.last_used,
    lastId: row.last_id,
  };
}
