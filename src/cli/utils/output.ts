/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import type { CommandRecord } from '../../models/command-record.js';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→',
  bullet: '•'
};

export interface SuggestionLine {
  command: string;
  confidence: number;
  source_tier: string;
}

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: Error): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error ? { name: error.name, message: error.message } : undefined
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error && error.message !== message) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else {
      console.log(`${chalk.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Ranked suggestions, best first
   */
  suggestions(partial: string, items: SuggestionLine[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ partial, suggestions: items });
      return;
    }
    if (items.length === 0) {
      console.log(chalk.gray(`No suggestions for "${partial}"`));
      return;
    }
    items.forEach((item, i) => {
      const confidence = chalk.dim(`${Math.round(item.confidence * 100)}%`.padStart(4));
      console.log(`  ${chalk.dim(`${i + 1}.`)} ${confidence} ${chalk.cyan(item.command)} ${chalk.gray(item.source_tier)}`);
    });
  }

  /**
   * Command history, newest first
   */
  history(records: CommandRecord[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ history: records });
      return;
    }
    for (const record of records) {
      const when = new Date(record.timestamp).toISOString().replace('T', ' ').slice(0, 19);
      const marker = record.exit_code === 0 ? chalk.green(symbols.bullet) : chalk.red(symbols.bullet);
      console.log(`${marker} ${chalk.dim(when)} ${record.command} ${chalk.gray(`${symbols.arrow} ${record.working_directory}`)}`);
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, (l) => l.toUpperCase());
      const formatted = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      console.log(`  ${chalk.dim(formattedKey + ':')} ${formatted}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
