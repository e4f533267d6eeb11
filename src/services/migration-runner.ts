/**
 * Migration Runner Service
 *
 * Executes SQL migrations from sql/migrations sequentially and tracks the
 * schema version in the meta table.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Resolves to <root>/sql/migrations from both src/services and dist/src/services
 */
export function defaultMigrationsDir(): string {
	const candidates = [
		path.join(__dirname, '../../sql/migrations'),
		path.join(__dirname, '../../../sql/migrations'),
	];
	return candidates.find((dir) => fs.existsSync(dir)) ?? candidates[0] ?? '';
}

/**
 * Migration metadata structure
 */
export interface Migration {
	version: number;
	description: string;
	sql: string;
}

/**
 * Migration Runner
 */
export class MigrationRunner {
	private db: Database.Database;
	private migrationsDir: string;
	private logger: Logger;

	constructor(db: Database.Database, migrationsDir: string, logger: Logger = createSilentLogger()) {
		this.db = db;
		this.migrationsDir = migrationsDir;
		this.logger = logger;
	}

	/**
	 * Load all migration files, sorted by version
	 *
	 * File names follow <version>_<description>.sql
	 */
	loadMigrations(): Migration[] {
		if (!fs.existsSync(this.migrationsDir)) {
			return [];
		}

		const files = fs
			.readdirSync(this.migrationsDir)
			.filter((f) => f.endsWith('.sql'))
			.sort();

		const migrations = files.map((file) => {
			const [version = '', ...descParts] = path.basename(file, '.sql').split('_');
			if (!/^\d+$/.test(version)) {
				throw new Error(`Invalid migration version format: ${file} (expected numeric prefix)`);
			}
			return {
				version: parseInt(version, 10),
				description: descParts.join(' '),
				sql: fs.readFileSync(path.join(this.migrationsDir, file), 'utf-8'),
			};
		});

		const seen = new Set<number>();
		for (const migration of migrations) {
			if (seen.has(migration.version)) {
				throw new Error(`Duplicate migration version: ${migration.version}`);
			}
			seen.add(migration.version);
		}

		return migrations.sort((a, b) => a.version - b.version);
	}

	/**
	 * Current schema version, 0 for a fresh database
	 */
	getCurrentVersion(): number {
		const metaExists = this.db
			.prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'meta'`)
			.get();
		if (!metaExists) {
			return 0;
		}

		const row = this.db
			.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
			.get('schema_version');
		return row ? parseInt(row.value, 10) : 0;
	}

	/**
	 * Apply all pending migrations, each in its own transaction
	 *
	 * @returns Number of migrations applied
	 */
	applyMigrations(): number {
		const currentVersion = this.getCurrentVersion();
		const pending = this.loadMigrations().filter((m) => m.version > currentVersion);

		if (pending.length === 0) {
			return 0;
		}

		for (const migration of pending) {
			const apply = this.db.transaction(() => {
				this.db.exec(migration.sql);
				this.db
					.prepare<[string]>(`INSERT OR REPLACE INTO meta (key, value) VALUES ('schema_version', ?)`)
					.run(String(migration.version));
			});

			try {
				apply();
			} catch (error) {
				const errorMessage = error instanceof Error ? error.message : String(error);
				this.logger.error('Migration failed', { version: migration.version, error: errorMessage });
				throw new Error(`Migration ${migration.version} failed: ${errorMessage}`);
			}

			this.logger.info('Applied migration', {
				version: migration.version,
				description: migration.description,
			});
		}

		return pending.length;
	}

	/**
	 * PRAGMA quick_check; returns the first problem or null when healthy
	 */
	checkIntegrity(): string | null {
		const rows = this.db.pragma('quick_check', { simple: false });
		if (!Array.isArray(rows) || rows.length === 0) {
			return 'quick_check returned no rows';
		}
		const first: unknown = rows[0];
		if (first && typeof first === 'object' && 'quick_check' in first && first.quick_check === 'ok') {
			return null;
		}
		return JSON.stringify(first);
	}
}
