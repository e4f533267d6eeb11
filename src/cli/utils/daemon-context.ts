/**
 * Shared plumbing for CLI commands: path resolution, logging and requests
 * to the running daemon
 */

import { createConfigManager, type DaemonPaths } from '../../lib/env-config.js';
import { Logger, type LogLevel } from '../../lib/logger.js';
import type { DaemonError } from '../../lib/errors/DaemonErrors.js';
import { Result, err, ok } from '../../lib/result-types.js';
import { sendRequest } from '../../services/ipc/ipc-client.js';
import type { OkResponse, OutgoingRequest } from '../../models/ipc-message.js';
import { output } from './output.js';

export interface CliContext {
  paths: DaemonPaths;
  logLevel: LogLevel | undefined;
}

/**
 * Load .env and resolve every daemon location
 */
export function loadContext(): CliContext {
  const manager = createConfigManager();
  const loaded = manager.loadEnv();
  if (loaded.isErr()) {
    output.warning(loaded.error.message);
  }

  const level = manager.getLogLevel();
  if (level.isErr()) {
    output.warning(level.error.message);
  }

  return {
    paths: manager.resolvePaths(),
    logLevel: level.isOk() ? level.value : undefined,
  };
}

export function createDaemonLogger(context: CliContext, consoleLevel?: LogLevel): Logger {
  return new Logger({
    logDir: context.paths.logDir,
    consoleLevel: consoleLevel ?? context.logLevel ?? 'info',
  });
}

/**
 * Send a request and unwrap an `ok` response; daemon-side errors are
 * returned with their message
 */
export async function callDaemon(
  context: CliContext,
  request: OutgoingRequest
): Promise<Result<OkResponse, DaemonError | Error>> {
  const response = await sendRequest(context.paths.socketPath, request);
  if (response.isErr()) {
    return err(response.error);
  }
  if (response.value.status === 'error') {
    return err(new Error(`${response.value.message} (${response.value.code})`));
  }
  return ok(response.value);
}

/**
 * Report a failed call and set a non-zero exit status
 */
export function reportFailure(message: string, error: Error): void {
  output.error(message, error);
  process.exitCode = 1;
}
