/**
 * Environment Configuration
 *
 * Resolves the per-user data, runtime and config locations from environment
 * variables, optionally seeded from a .env file.
 */

import * as os from 'os';
import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { Result, ok, err } from './result-types.js';
import { ConfigurationError } from './errors/DaemonErrors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export const APP_NAME = 'cmdhint';

/**
 * Recognised environment variables
 */
export const ENV_VARS = {
	DATA_DIR: 'CMDHINT_DATA_DIR',
	RUNTIME_DIR: 'CMDHINT_RUNTIME_DIR',
	CONFIG_PATH: 'CMDHINT_CONFIG_PATH',
	LOG_LEVEL: 'CMDHINT_LOG_LEVEL',
} as const;

/**
 * Every filesystem location the daemon and CLI touch
 */
export interface DaemonPaths {
	dataDir: string;
	runtimeDir: string;
	dbPath: string;
	indexDir: string;
	logDir: string;
	socketPath: string;
	pidPath: string;
	configPath: string;
}

/**
 * Environment-backed configuration manager
 */
export class ConfigurationManager {
	constructor(
		private env: NodeJS.ProcessEnv = process.env,
		private envPath?: string
	) {}

	/**
	 * Load variables from a .env file into process.env; a missing file is fine
	 */
	loadEnv(): Result<void, ConfigurationError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigurationError(
					'envPath',
					this.envPath ?? '.env',
					error instanceof Error ? error.message : 'Unknown error'
				)
			);
		}
	}

	/**
	 * Resolve all daemon paths
	 *
	 * Data: $CMDHINT_DATA_DIR, $XDG_DATA_HOME/cmdhint, ~/.local/share/cmdhint.
	 * Runtime: $CMDHINT_RUNTIME_DIR, $XDG_RUNTIME_DIR/cmdhint, <data>/runtime.
	 */
	resolvePaths(): DaemonPaths {
		const dataDir = this.resolveDataDir();
		const runtimeDir = this.resolveRuntimeDir(dataDir);

		return {
			dataDir,
			runtimeDir,
			dbPath: path.join(dataDir, 'history.db'),
			indexDir: path.join(dataDir, 'index'),
			logDir: path.join(dataDir, 'logs'),
			socketPath: path.join(runtimeDir, 'daemon.sock'),
			pidPath: path.join(runtimeDir, 'daemon.pid'),
			configPath: this.resolveConfigPath(),
		};
	}

	/**
	 * Log level override for console output
	 */
	getLogLevel(): Result<LogLevel | undefined, ConfigurationError> {
		const value = this.getEnvVar(ENV_VARS.LOG_LEVEL);
		if (value === undefined) {
			return ok(undefined);
		}
		const level = value.toLowerCase();
		if (!isLogLevel(level)) {
			return err(
				new ConfigurationError(ENV_VARS.LOG_LEVEL, value, 'expected debug, info, warn, error or fatal')
			);
		}
		return ok(level);
	}

	private resolveDataDir(): string {
		const explicit = this.getEnvVar(ENV_VARS.DATA_DIR);
		if (explicit) return path.resolve(explicit);

		const xdg = this.getEnvVar('XDG_DATA_HOME');
		if (xdg) return path.join(xdg, APP_NAME);

		return path.join(this.homeDir(), '.local', 'share', APP_NAME);
	}

	private resolveRuntimeDir(dataDir: string): string {
		const explicit = this.getEnvVar(ENV_VARS.RUNTIME_DIR);
		if (explicit) return path.resolve(explicit);

		const xdg = this.getEnvVar('XDG_RUNTIME_DIR');
		if (xdg) return path.join(xdg, APP_NAME);

		return path.join(dataDir, 'runtime');
	}

	private resolveConfigPath(): string {
		const explicit = this.getEnvVar(ENV_VARS.CONFIG_PATH);
		if (explicit) return path.resolve(explicit);

		const xdg = this.getEnvVar('XDG_CONFIG_HOME');
		const base = xdg ? xdg : path.join(this.homeDir(), '.config');
		return path.join(base, APP_NAME, 'config.json');
	}

	private homeDir(): string {
		return this.getEnvVar('HOME') ?? os.homedir();
	}

	/**
	 * Get environment variable, treating empty strings as unset
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === undefined || value === '' ? undefined : value;
	}
}

/**
 * Create a configuration manager instance
 *
 * @param envPath - Optional path to .env file
 */
export function createConfigManager(envPath?: string): ConfigurationManager {
	return new ConfigurationManager(process.env, envPath);
}
