import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export type ReplCommand =
  | { kind: 'exit' }
  | { kind: 'reset' }
  | { kind: 'skip' }
  | { kind: 'message'; text: string };

const EXIT_WORDS = new Set(['exit', 'quit', 'q']);

/**
 * Classifies one line typed at the prompt
 */
export function parseReplInput(line: string): ReplCommand {
  const text = line.trim();
  const word = text.toLowerCase();

  if (text.length === 0) return { kind: 'skip' };
  if (EXIT_WORDS.has(word)) return { kind: 'exit' };
  if (word === 'reset') return { kind: 'reset' };
  return { kind: 'message', text };
}

export interface ReplHandlers {
  onMessage(text: string): Promise<void>;
  onReset(): void;
}

export interface ReplIO {
  input: Readable;
  output: Writable;
  prompt?: string;
}

/**
 * Reads lines until exit, Ctrl-D or Ctrl-C. Each message is fully handled
 * before the next prompt.
 */
export async function runRepl(handlers: ReplHandlers, io: ReplIO): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output, terminal: false });
  const write = (text: string) => io.output.write(text);
  const prompt = io.prompt ?? '\nYou: ';

  rl.on('SIGINT', () => rl.close());

  try {
    write(prompt);
    for await (const line of rl) {
      const command = parseReplInput(line);

      if (command.kind === 'exit') {
        break;
      }
      if (command.kind === 'reset') {
        handlers.onReset();
        write('Conversation history cleared.\n');
      } else if (command.kind === 'message') {
        await handlers.onMessage(command.text);
      }

      write(prompt);
    }
  } finally {
    rl.close();
  }

  write('Goodbye!\n');
}
