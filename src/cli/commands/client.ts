import { Command } from 'commander';
import { z } from 'zod';
import { output } from '../utils/output.js';
import { callDaemon, loadContext, reportFailure } from '../utils/daemon-context.js';
import type { CommandRecord } from '../../models/command-record.js';

const SuggestionsPayloadSchema = z.object({
  suggestions: z.array(
    z.object({
      command: z.string(),
      confidence: z.number(),
      source_tier: z.string(),
    })
  ),
});

const HistoryPayloadSchema = z.object({
  history: z.array(
    z.object({
      id: z.number(),
      command: z.string(),
      working_directory: z.string(),
      exit_code: z.number(),
      duration_seconds: z.number(),
      timestamp: z.number(),
      session_id: z.string().nullable(),
    })
  ),
});

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Not an integer: ${value}`);
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the ping command
 */
export function createPingCommand(): Command {
  return new Command('ping')
    .description('Check that the daemon answers')
    .action(async () => {
      const started = Date.now();
      const response = await callDaemon(loadContext(), { type: 'ping', data: {} });
      if (response.isErr()) {
        reportFailure('Daemon did not answer', response.error);
        return;
      }
      output.success('pong', { latency_ms: Date.now() - started });
    });
}

interface SuggestOptions {
  cwd?: string;
  history: string[];
}

/**
 * Create the suggest command
 */
export function createSuggestCommand(): Command {
  return new Command('suggest')
    .description('Suggest completions for a partial command line')
    .argument('<partial...>', 'Partial command line')
    .option('--cwd <dir>', 'Working directory to favour', process.cwd())
    .option('--history <command>', 'Previous command (repeatable, oldest first)', collect, [])
    .action(async (words: string[], options: SuggestOptions) => {
      const partial = words.join(' ');
      const response = await callDaemon(loadContext(), {
        type: 'suggest',
        data: { partial, cwd: options.cwd, history: options.history.length > 0 ? options.history : undefined },
      });
      if (response.isErr()) {
        reportFailure('Suggestion request failed', response.error);
        return;
      }

      const payload = SuggestionsPayloadSchema.safeParse(response.value);
      if (!payload.success) {
        reportFailure('Unexpected response from daemon', payload.error);
        return;
      }
      output.suggestions(partial, payload.data.suggestions);
    });
}

interface LogOptions {
  cwd: string;
  exitCode: number;
  duration: number;
  session?: string;
}

/**
 * Create the log command (used by shell hooks)
 */
export function createLogCommand(): Command {
  return new Command('log')
    .description('Record an executed command')
    .argument('<command>', 'Command line that was run')
    .option('--cwd <dir>', 'Working directory the command ran in', process.cwd())
    .option('--exit-code <code>', 'Exit status', parseInteger, 0)
    .option('--duration <seconds>', 'Run time in seconds', parseNumber, 0)
    .option('--session <id>', 'Shell session identifier')
    .action(async (commandLine: string, options: LogOptions) => {
      const response = await callDaemon(loadContext(), {
        type: 'log_command',
        data: {
          command: commandLine,
          cwd: options.cwd,
          exit_code: options.exitCode,
          duration: options.duration,
          session_id: options.session,
        },
      });
      if (response.isErr()) {
        reportFailure('Failed to log command', response.error);
        return;
      }
      if (response.value.filtered === true) {
        output.info('Command filtered by privacy rules');
      } else {
        output.success('Command logged', { id: response.value.id });
      }
    });
}

interface HistoryOptions {
  limit: number;
  search?: string;
  cwd?: string;
}

/**
 * Create the history command
 */
export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show recent commands, or search them')
    .option('-n, --limit <count>', 'Number of records', parseInteger, 20)
    .option('-s, --search <query>', 'Full-text search')
    .option('--cwd <dir>', 'Only commands run in this directory or below it')
    .action(async (options: HistoryOptions) => {
      const response = await callDaemon(loadContext(), {
        type: 'get_history',
        data: { limit: options.limit, search: options.search, cwd: options.cwd },
      });
      if (response.isErr()) {
        reportFailure('History request failed', response.error);
        return;
      }

      const payload = HistoryPayloadSchema.safeParse(response.value);
      if (!payload.success) {
        reportFailure('Unexpected response from daemon', payload.error);
        return;
      }
      const records: CommandRecord[] = payload.data.history;
      output.history(records);
    });
}
