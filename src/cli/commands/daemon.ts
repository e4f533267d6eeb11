import { Command } from 'commander';
import chalk from 'chalk';
import { Daemon } from '../../services/daemon.js';
import { PidMarker } from '../../services/pid-marker.js';
import { exitCodeFor, toError } from '../../lib/errors/DaemonErrors.js';
import { isLogLevel, type LogLevel } from '../../lib/logger.js';
import { output } from '../utils/output.js';
import { callDaemon, createDaemonLogger, loadContext, reportFailure } from '../utils/daemon-context.js';

interface StartOptions {
  logLevel?: string;
}

/**
 * Create the start command
 *
 * Runs the daemon in the foreground until SIGTERM, SIGINT or a shutdown
 * request. Exit status 3 means another daemon already owns the socket, 4 that
 * the history database could not be opened.
 */
export function createStartCommand(): Command {
  const command = new Command('start');

  command
    .description('Run the suggestion daemon in the foreground')
    .option('--log-level <level>', 'Console log level (debug, info, warn, error, fatal)')
    .action(async (options: StartOptions) => {
      const context = loadContext();
      let consoleLevel: LogLevel | undefined;
      if (options.logLevel !== undefined) {
        if (!isLogLevel(options.logLevel)) {
          output.error(`Unknown log level: ${options.logLevel}`);
          process.exitCode = 1;
          return;
        }
        consoleLevel = options.logLevel;
      }
      const logger = createDaemonLogger(context, consoleLevel);
      const daemon = new Daemon({ paths: context.paths, logger });

      try {
        await daemon.start();
      } catch (error) {
        const cause = toError(error);
        logger.fatal('Daemon failed to start', { error: cause.message });
        output.error('Daemon failed to start', cause);
        process.exitCode = exitCodeFor(error);
        return;
      }

      process.stderr.write(chalk.green('✓ cmdhint daemon running\n'));
      process.stderr.write(chalk.gray(`  Socket: ${context.paths.socketPath}\n`));
      process.stderr.write(chalk.gray(`  Data:   ${context.paths.dataDir}\n`));

      await daemon.waitForExit();
    });

  return command;
}

/**
 * Create the stop command
 */
export function createStopCommand(): Command {
  const command = new Command('stop');

  command
    .description('Stop the running daemon')
    .action(async () => {
      const context = loadContext();
      const response = await callDaemon(context, { type: 'shutdown', data: {} });
      if (response.isOk()) {
        output.success('Daemon stopping');
        return;
      }

      // Socket gone but the process may still be alive
      const pid = new PidMarker(context.paths.pidPath).readLive();
      if (pid === null) {
        output.info('Daemon is not running');
        return;
      }
      try {
        process.kill(pid, 'SIGTERM');
        output.success('Sent SIGTERM to daemon', { pid });
      } catch (error) {
        reportFailure('Failed to stop daemon', toError(error));
      }
    });

  return command;
}

/**
 * Create the status command
 */
export function createStatusCommand(): Command {
  const command = new Command('status');

  command
    .description('Show daemon status')
    .action(async () => {
      const context = loadContext();
      const response = await callDaemon(context, { type: 'status', data: {} });
      if (response.isErr()) {
        output.warning('Daemon is not running', { socket: context.paths.socketPath });
        process.exitCode = 1;
        return;
      }

      const { status: _status, ...details } = response.value;
      output.success('Daemon is running', details);
    });

  return command;
}
