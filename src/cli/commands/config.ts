/**
 * Config command - View and edit configuration
 */

import { Command } from 'commander';
import { ConfigManager, DEFAULT_CONFIG, parseCliValue } from '../../config/config-manager.js';
import type { GlobalOptions } from '../bootstrap.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Creates the config command with subcommands
 */
export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show')
    .description('Show current configuration (file and environment merged)')
    .action(async (_options: unknown, command: Command) => {
      await showConfig(command.optsWithGlobals<GlobalOptions>());
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., agent.maxTokens 2000)')
    .action(async (key: string, value: string, _options: unknown, command: Command) => {
      await setConfig(key, value, command.optsWithGlobals<GlobalOptions>());
    });

  cmd
    .command('get <key>')
    .description('Get a specific configuration value')
    .action(async (key: string, _options: unknown, command: Command) => {
      await getConfig(key, command.optsWithGlobals<GlobalOptions>());
    });

  // Default action (show)
  cmd.action(async (_options: unknown, command: Command) => {
    await showConfig(command.optsWithGlobals<GlobalOptions>());
  });

  return cmd;
}

async function showConfig(options: GlobalOptions): Promise<void> {
  const configManager = new ConfigManager(options.config);

  const result = await configManager.load();
  const config = result.config ?? DEFAULT_CONFIG;

  console.log(`Current Configuration (${configManager.path}):\n`);
  console.log(JSON.stringify(config, null, 2));

  if (!result.success && result.errors) {
    console.log('\nWarnings:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function setConfig(key: string, value: string, options: GlobalOptions): Promise<void> {
  // Environment overrides must not leak into the saved file
  const configManager = new ConfigManager(options.config, {});
  const loaded = await configManager.load();
  if (!loaded.success) {
    console.error('Cannot update an invalid configuration file:');
    for (const error of loaded.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const parsedValue = parseCliValue(value);
  const result = configManager.set(key, parsedValue);

  if (!result.success) {
    console.error('Invalid configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  try {
    await configManager.save();
    console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  } catch (error) {
    console.error('Failed to save configuration:', errorMessage(error));
    process.exit(1);
  }
}

async function getConfig(key: string, options: GlobalOptions): Promise<void> {
  const configManager = new ConfigManager(options.config);

  await configManager.load();

  const value = configManager.get(key);

  if (value === undefined) {
    console.error(`Configuration key not found: ${key}`);
    process.exit(1);
  }

  if (typeof value === 'object') {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}
