/**
 * Command-line program definition
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { chatCommand } from './commands/chat.js';
import { messageCommand } from './commands/message.js';
import { toolsCommand } from './commands/tools.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

/**
 * Reads the version from the nearest package.json above this file.
 * Sources live at src/cli, compiled output at dist/src/cli.
 */
function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '../../package.json'), join(here, '../../../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      // Try the next location
    }
  }
  return '0.0.0';
}

/**
 * Creates and configures the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('sandbox-chat')
    .description('Chat with a hosted AI model that can read and edit files inside a sandbox directory')
    .version(readVersion(), '-v, --version', 'Display version number')
    .option('-c, --config <path>', 'Path to the JSON config file', 'config.json')
    .option('-m, --model <model>', 'Model to use (overrides agent.model)')
    .option('--debug', 'Write the conversation history to debug.historyPath after each message')
    .option('--no-debug', 'Disable the conversation history dump')
    .option('--stream', 'Stream responses as they arrive')
    .option('--no-stream', 'Wait for complete responses instead of streaming')
    .option('-s, --sandbox <dir>', 'Sandbox directory the file tools are confined to');

  program.addCommand(chatCommand(), { isDefault: true });
  program.addCommand(messageCommand());
  program.addCommand(toolsCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}
