/**
 * Configuration provider for daemon tunables
 * Loads config.json, validates it, and serves dotted-key reads and writes
 *
 * @module config-provider
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { z } from 'zod';
import { DaemonConfigSchema, defaultDaemonConfig, type DaemonConfig } from '../models/daemon-config.js';
import { ConfigurationError } from '../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../lib/result-types.js';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';

export type ConfigChangeListener = (config: DaemonConfig, key: string) => void;

export interface ConfigProviderOptions {
  logger?: Logger;
  /** Values applied over the file contents (tests, CLI flags) */
  overrides?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/**
 * Configuration provider
 *
 * Features:
 * - Load configuration from a JSON file
 * - Validate with the zod schema, falling back to defaults on errors
 * - Dotted-key get/set (e.g. `suggestions.max_suggestions`)
 * - Persist on set, notify change listeners
 */
export class ConfigProvider {
  private config: DaemonConfig;
  private configPath: string | null;
  private warnings: string[] = [];
  private changeListeners: ConfigChangeListener[] = [];
  private logger: Logger;

  /**
   * @param configPath - config.json location; null keeps everything in memory
   */
  constructor(configPath: string | null, options: ConfigProviderOptions = {}) {
    this.configPath = configPath;
    this.logger = options.logger ?? createSilentLogger();
    this.config = this.loadConfig(options.overrides);
  }

  getConfig(): DaemonConfig {
    return structuredClone(this.config);
  }

  /**
   * Problems found while loading the file
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  onConfigChange(listener: ConfigChangeListener): void {
    this.changeListeners.push(listener);
  }

  /**
   * Read a section or a single value by dotted key
   */
  get(key: string): Result<unknown, ConfigurationError> {
    let current: unknown = this.config;
    for (const part of key.split('.')) {
      if (!isRecord(current) || !(part in current)) {
        return err(new ConfigurationError(key, undefined, 'unknown configuration key'));
      }
      current = current[part];
    }
    return ok(structuredClone(current));
  }

  /**
   * Set a single value, validate the result, persist and notify listeners
   */
  set(key: string, value: unknown): Result<DaemonConfig, ConfigurationError> {
    const parts = key.split('.');
    const field = parts.pop();
    const draft: Record<string, unknown> = structuredClone(this.config);

    let parent: Record<string, unknown> = draft;
    for (const part of parts) {
      const next = parent[part];
      if (!isRecord(next)) {
        return err(new ConfigurationError(key, value, 'unknown configuration key'));
      }
      parent = next;
    }
    if (field === undefined || !(field in parent) || isRecord(parent[field])) {
      return err(new ConfigurationError(key, value, 'unknown configuration key'));
    }
    parent[field] = value;

    const parsed = DaemonConfigSchema.safeParse(draft);
    if (!parsed.success) {
      return err(new ConfigurationError(key, value, describeIssues(parsed.error)));
    }

    const persisted = this.persist(parsed.data);
    if (persisted.isErr()) {
      return err(persisted.error);
    }

    this.config = parsed.data;
    this.logger.info('Configuration updated', { key });
    for (const listener of this.changeListeners) {
      listener(this.getConfig(), key);
    }
    return ok(this.getConfig());
  }

  private loadConfig(overrides: unknown): DaemonConfig {
    this.warnings = [];
    let raw: Record<string, unknown> = {};

    if (this.configPath && existsSync(this.configPath)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
        if (isRecord(parsed)) {
          raw = parsed;
        } else {
          this.warn(`Configuration in ${this.configPath} is not a JSON object`);
        }
      } catch (error) {
        this.warn(
          `Failed to load configuration from ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    if (isRecord(overrides)) {
      raw = deepMerge(raw, overrides);
    }

    const result = DaemonConfigSchema.safeParse(raw);
    if (!result.success) {
      this.warn(`Invalid configuration: ${describeIssues(result.error)}`);
      this.warn('Falling back to default configuration');
      return defaultDaemonConfig();
    }
    return result.data;
  }

  private persist(config: DaemonConfig): Result<void, ConfigurationError> {
    if (!this.configPath) {
      return ok(undefined);
    }

    try {
      mkdirSync(dirname(this.configPath), { recursive: true, mode: 0o700 });
      const tmp = `${this.configPath}.${process.pid}.tmp`;
      writeFileSync(tmp, JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
      renameSync(tmp, this.configPath);
      return ok(undefined);
    } catch (error) {
      return err(
        new ConfigurationError(
          'configPath',
          this.configPath,
          `could not be written: ${error instanceof Error ? error.message : String(error)}`
        )
      );
    }
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }
}
