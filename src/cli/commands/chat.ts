/**
 * Chat command - Interactive REPL (the default command)
 */

import { Command } from 'commander';
import { bootstrap, type GlobalOptions, type Runtime } from '../bootstrap.js';
import { runRepl } from '../repl.js';
import { runMessage } from './message.js';
import { formatError, printReply } from '../utils/output.js';
import { formatToolList } from '../utils/render.js';

/**
 * Creates the chat command
 */
export function chatCommand(): Command {
  const cmd = new Command('chat');

  cmd
    .description('Start an interactive chat session, or send one message when text is given')
    .argument('[message]', 'Single message to send instead of starting the REPL')
    .allowExcessArguments(false)
    .action(async (message: string | undefined, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      if (message !== undefined) {
        await runMessage(message, options);
        return;
      }
      await runChat(options);
    });

  return cmd;
}

async function runChat(options: GlobalOptions): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = await bootstrap(options);
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }

  const { session, registry, logger, streaming, config } = runtime;
  const color = Boolean(process.stdout.isTTY);

  console.log('Sandbox Chat - Interactive Mode');
  console.log("Type 'exit', 'quit', or 'q' to exit");
  console.log("Type 'reset' to clear conversation history");
  console.log(formatToolList(registry.list()));
  console.log(`Sandbox: ${runtime.sandbox.root}`);
  console.log('-'.repeat(40));

  await logger.info('Chat session started', { operation: 'chat', model: config.agent.model, streaming });

  await runRepl(
    {
      onMessage: async (text) => {
        try {
          if (streaming) process.stdout.write('\nClaude: ');
          await printReply(session, text, {
            write: (chunk) => process.stdout.write(chunk),
            streaming,
            prefix: '\nClaude: ',
            color,
          });
        } catch (error) {
          console.error(`\n${formatError(error)}`);
          await logger.error('Message failed', error, { operation: 'chat' });
        }
      },
      onReset: () => session.reset(),
    },
    { input: process.stdin, output: process.stdout },
  );

  await logger.info('Chat session ended', { operation: 'chat' });
}
