#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormat, output } from './utils/output.js';
import { toError } from '../lib/errors/DaemonErrors.js';
import { ENV_VARS } from '../lib/env-config.js';
import { createStartCommand, createStopCommand, createStatusCommand } from './commands/daemon.js';
import {
  createPingCommand,
  createSuggestCommand,
  createLogCommand,
  createHistoryCommand,
} from './commands/client.js';
import { createConfigCommand } from './commands/config.js';

const program = new Command();

program
  .name('cmdhint')
  .description('Local shell command suggestion daemon')
  .version('0.1.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean }>();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }
    if (opts.verbose) {
      process.env[ENV_VARS.LOG_LEVEL] = 'debug';
    }
  });

program.exitOverride();

// Register commands
program.addCommand(createStartCommand());
program.addCommand(createStopCommand());
program.addCommand(createStatusCommand());
program.addCommand(createPingCommand());
program.addCommand(createSuggestCommand());
program.addCommand(createLogCommand());
program.addCommand(createHistoryCommand());
program.addCommand(createConfigCommand());

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // Help, version and usage errors have already been printed
    process.exitCode = error.exitCode;
  } else {
    output.error(toError(error).message);
    process.exitCode = 1;
  }
}
