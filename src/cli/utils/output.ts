import type { ChatSession } from '../../agent/chat-session.js';
import type { ChatReply } from '../../agent/chat-types.js';
import { errorMessage } from '../../utils/errors.js';
import { banner, formatToolCall, formatToolSummary } from './render.js';

export interface ReplyOutput {
  write(text: string): void;
  streaming: boolean;
  /** Printed before a blocking reply, e.g. `\nClaude: ` */
  prefix?: string;
  color?: boolean;
}

/**
 * Sends one message and prints the answer.
 *
 * Streaming prints text as it arrives, with a `[TOOL CALL]` banner for each
 * tool result and an `[ASSISTANT MESSAGE]` banner before the follow-up text.
 * Blocking mode prints the tool summary, then the whole reply.
 */
export async function printReply(session: ChatSession, text: string, out: ReplyOutput): Promise<ChatReply> {
  const color = out.color ?? false;

  if (!out.streaming) {
    const reply = await session.send(text);
    if (reply.toolCalls.length > 0) {
      out.write(`${formatToolSummary(reply.toolCalls, color)}\n`);
    }
    out.write(`${out.prefix ?? ''}${reply.text}\n`);
    return reply;
  }

  let afterTool = false;
  for await (const event of session.stream(text)) {
    switch (event.type) {
      case 'text_delta':
        if (afterTool) {
          out.write(banner('ASSISTANT MESSAGE', color));
          afterTool = false;
        }
        out.write(event.text);
        break;
      case 'tool_result':
        out.write(banner('TOOL CALL', color) + formatToolCall(event.name, event.result));
        afterTool = true;
        break;
      case 'tool_call':
        break;
      case 'done':
        out.write('\n');
        return event.reply;
    }
  }
  throw new Error('Stream ended without a reply');
}

/**
 * Line printed for a failed command or message
 */
export function formatError(error: unknown): string {
  return `Error: ${errorMessage(error)}`;
}
