import { Command } from 'commander';
import { ConfigProvider } from '../../services/config-provider.js';
import { UnavailableError } from '../../lib/errors/DaemonErrors.js';
import { output } from '../utils/output.js';
import { callDaemon, loadContext, reportFailure, type CliContext } from '../utils/daemon-context.js';

/**
 * JSON when it parses, the raw string otherwise (`config set x true` sets a
 * boolean, `config set x ~/work` a string)
 */
export function parseConfigValue(raw: string): unknown {
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Edit config.json directly when no daemon is running
 */
function localProvider(context: CliContext): ConfigProvider {
  const provider = new ConfigProvider(context.paths.configPath);
  for (const warning of provider.getWarnings()) {
    output.warning(warning);
  }
  return provider;
}

/**
 * Configuration command implementation
 *
 * Talks to the running daemon so changes apply immediately; falls back to
 * the config file otherwise.
 */
export function createConfigCommand(): Command {
  const cmd = new Command('config');

  cmd.description('Read or change daemon settings');

  // config get [suggestions.max_suggestions]
  cmd
    .command('get')
    .description('Get a configuration value, or the whole configuration')
    .argument('[key]', 'Dotted configuration key (e.g., suggestions.max_suggestions)')
    .action(async (key: string | undefined) => {
      const context = loadContext();
      const response = await callDaemon(context, { type: 'get_config', data: key ? { key } : {} });

      if (response.isOk()) {
        const value = key ? response.value.value : response.value.config;
        output.success(key ?? 'Configuration', { value });
        return;
      }
      if (!(response.error instanceof UnavailableError)) {
        reportFailure(`Failed to get configuration: ${key ?? ''}`, response.error);
        return;
      }

      const provider = localProvider(context);
      if (!key) {
        output.success('Configuration', { value: provider.getConfig() });
        return;
      }
      const value = provider.get(key);
      if (value.isErr()) {
        reportFailure(`Failed to get configuration: ${key}`, value.error);
        return;
      }
      output.success(key, { value: value.value });
    });

  // config set suggestions.max_suggestions 8
  cmd
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Dotted configuration key')
    .argument('<value>', 'New value (parsed as JSON when possible)')
    .action(async (key: string, raw: string) => {
      const context = loadContext();
      const value = parseConfigValue(raw);
      const response = await callDaemon(context, { type: 'set_config', data: { key, value } });

      if (response.isOk()) {
        output.success(`Configuration updated: ${key} = ${describeValue(value)}`);
        return;
      }
      if (!(response.error instanceof UnavailableError)) {
        reportFailure(`Failed to update configuration: ${key}`, response.error);
        return;
      }

      const updated = localProvider(context).set(key, value);
      if (updated.isErr()) {
        reportFailure(`Failed to update configuration: ${key}`, updated.error);
        return;
      }
      output.success(`Configuration updated: ${key} = ${describeValue(value)}`, {
        note: 'daemon not running; saved to config file',
      });
    });

  return cmd;
}
