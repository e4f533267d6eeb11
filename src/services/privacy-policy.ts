/**
 * Privacy Policy
 *
 * Decides whether a logged command must be discarded before it reaches the
 * store: commands run inside an excluded directory (or below it) and
 * commands whose text matches an excluded pattern.
 */

import * as os from 'os';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { Logger } from '../lib/logger.js';
import { createSilentLogger } from '../lib/logger.js';
import { MAX_PATTERN_LENGTH } from '../constants/daemon-constants.js';
import type { PrivacySettings } from '../models/daemon-config.js';

const GLOB_CHARS = /[*?[\]{}]/;

export interface PrivacyPolicyOptions {
  homeDir?: string;
  logger?: Logger;
}

export type PrivacyRules = Pick<PrivacySettings, 'excluded_paths' | 'excluded_patterns'>;

export function expandHome(entry: string, homeDir: string): string {
  if (entry === '~') return homeDir;
  if (entry.startsWith('~/')) return path.join(homeDir, entry.slice(2));
  return entry;
}

export class PrivacyPolicy {
  private directories: string[] = [];
  private globs: string[] = [];
  private patterns: RegExp[] = [];
  private homeDir: string;
  private logger: Logger;

  constructor(rules: PrivacyRules, options: PrivacyPolicyOptions = {}) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.logger = options.logger ?? createSilentLogger();
    this.update(rules);
  }

  /**
   * Replace the active rules
   */
  update(rules: PrivacyRules): void {
    this.directories = [];
    this.globs = [];
    for (const entry of rules.excluded_paths) {
      const expanded = expandHome(entry, this.homeDir);
      if (GLOB_CHARS.test(expanded)) {
        this.globs.push(expanded);
      } else {
        this.directories.push(stripTrailingSlash(path.resolve(expanded)));
      }
    }

    this.patterns = [];
    for (const source of rules.excluded_patterns) {
      if (source.length > MAX_PATTERN_LENGTH) {
        this.logger.warn('Ignoring oversized privacy pattern', { length: source.length });
        continue;
      }
      try {
        this.patterns.push(new RegExp(source, 'i'));
      } catch (error) {
        this.logger.warn('Ignoring invalid privacy pattern', {
          pattern: source,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * True when `cwd` is an excluded directory or lies below one
   */
  isExcluded(cwd: string): boolean {
    const resolved = stripTrailingSlash(path.resolve(expandHome(cwd, this.homeDir)));

    for (const directory of this.directories) {
      if (resolved === directory || resolved.startsWith(directory === '/' ? '/' : `${directory}/`)) {
        return true;
      }
    }

    return this.globs.some(
      (glob) => minimatch(resolved, glob, { dot: true }) || minimatch(resolved, `${glob}/**`, { dot: true })
    );
  }

  /**
   * True when the command text matches an excluded pattern
   */
  isCommandExcluded(command: string): boolean {
    return this.patterns.some((pattern) => pattern.test(command));
  }

  shouldFilter(command: string, cwd: string): boolean {
    return this.isExcluded(cwd) || this.isCommandExcluded(command);
  }
}

function stripTrailingSlash(value: string): string {
  return value.length > 1 ? value.replace(/\/+$/, '') : value;
}
