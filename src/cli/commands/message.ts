/**
 * Message command - Send a single message and print the reply
 */

import { Command } from 'commander';
import { bootstrap, type GlobalOptions } from '../bootstrap.js';
import { formatError, printReply } from '../utils/output.js';

/**
 * Creates the message command
 */
export function messageCommand(): Command {
  const cmd = new Command('message');

  cmd
    .description('Send one message to the assistant and exit')
    .argument('<text>', 'Message text to send')
    .action(async (text: string, _options: unknown, command: Command) => {
      await runMessage(text, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

/**
 * Sends one message, prints the reply and exits 1 on failure
 */
export async function runMessage(text: string, options: GlobalOptions): Promise<void> {
  try {
    const { session, streaming, logger } = await bootstrap(options);
    try {
      await printReply(session, text, {
        write: (chunk) => process.stdout.write(chunk),
        streaming,
        color: Boolean(process.stdout.isTTY),
      });
    } catch (error) {
      await logger.error('Message failed', error, { operation: 'message' });
      throw error;
    }
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
