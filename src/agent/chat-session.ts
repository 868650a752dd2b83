import { Logger } from '../logging/logger.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ChatClientError, errorMessage } from '../utils/errors.js';
import type { HistorySink } from '../session/history-dump.js';
import type {
  AssistantBlock,
  ChatClient,
  ChatReply,
  ChatRequest,
  ChatResponse,
  SessionEvent,
  StopReason,
  ToolCallRecord,
  ToolResultEntry,
  ToolUseBlock,
  Turn,
} from './chat-types.js';

/**
 * Chat session configuration
 */
export interface ChatSessionConfig {
  model: string;
  systemPrompt: string;
  maxTokens: number;
  /** Tool rounds allowed per user message before the loop stops */
  maxToolIterations: number;
}

export const DEFAULT_CHAT_SESSION_CONFIG: ChatSessionConfig = {
  model: 'claude-3-haiku-20240307',
  systemPrompt: 'You are a helpful AI assistant. Be concise and clear in your responses.',
  maxTokens: 1000,
  maxToolIterations: 10,
};

export interface ChatSessionOptions {
  logger?: Logger;
  /** Receives the full history after every completed message */
  historySink?: HistorySink;
}

function textOf(content: AssistantBlock[]): string {
  return content.map((block) => (block.type === 'text' ? block.text : '')).join('');
}

function toolUsesOf(content: AssistantBlock[]): ToolUseBlock[] {
  return content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

/**
 * ChatSession - Owns the conversation history and runs the tool-use loop
 *
 * Each user message is submitted with the full history. While the model
 * stops for tool use, every requested tool runs in order through the
 * registry and the results go back as a single tool turn.
 */
export class ChatSession {
  private readonly config: ChatSessionConfig;
  private readonly logger: Logger;
  private readonly historySink: HistorySink | undefined;
  private turns: Turn[] = [];

  constructor(
    private readonly client: ChatClient,
    private readonly registry: ToolRegistry,
    config: Partial<ChatSessionConfig> = {},
    options: ChatSessionOptions = {},
  ) {
    this.config = { ...DEFAULT_CHAT_SESSION_CONFIG, ...config };
    this.logger = options.logger ?? new Logger({ level: 'silent' });
    this.historySink = options.historySink;
  }

  getConfig(): ChatSessionConfig {
    return { ...this.config };
  }

  /**
   * Deep copy of the conversation so far
   */
  history(): Turn[] {
    return structuredClone(this.turns);
  }

  reset(): void {
    this.turns = [];
  }

  /**
   * Sends a message and resolves once the model has produced a final answer
   */
  async send(text: string): Promise<ChatReply> {
    for await (const event of this.converse(text, false)) {
      if (event.type === 'done') {
        return event.reply;
      }
    }
    throw new ChatClientError('Conversation ended without a reply');
  }

  /**
   * Same loop as `send`, yielding text as it arrives and each tool call
   */
  stream(text: string): AsyncGenerator<SessionEvent> {
    return this.converse(text, true);
  }

  private request(): ChatRequest {
    return {
      model: this.config.model,
      system: this.config.systemPrompt,
      maxTokens: this.config.maxTokens,
      history: structuredClone(this.turns),
      tools: this.registry.definitions(),
    };
  }

  private async *submit(streaming: boolean): AsyncGenerator<SessionEvent, ChatResponse> {
    const request = this.request();
    if (!streaming) {
      return await this.client.create(request);
    }

    for await (const event of this.client.stream(request)) {
      if (event.type === 'text_delta') {
        yield { type: 'text_delta', text: event.text };
      } else {
        return event.response;
      }
    }
    throw new ChatClientError('Stream ended without a final message');
  }

  private async *converse(text: string, streaming: boolean): AsyncGenerator<SessionEvent> {
    this.turns.push({ role: 'user', content: text });

    const texts: string[] = [];
    const toolCalls: ToolCallRecord[] = [];
    let iterations = 0;
    let toolRounds = 0;
    let stopReason: StopReason = 'end_turn';
    let truncated = false;

    for (;;) {
      iterations++;
      const response = yield* this.submit(streaming);
      stopReason = response.stopReason;

      await this.logger.debug('Model response received', {
        operation: 'chat_round',
        model: this.config.model,
        iteration: iterations,
        stopReason,
      });

      this.turns.push({ role: 'assistant', content: structuredClone(response.content) });
      const roundText = textOf(response.content);
      if (roundText.length > 0) {
        texts.push(roundText);
      }

      const toolUses = toolUsesOf(response.content);
      if (stopReason !== 'tool_use' || toolUses.length === 0) {
        break;
      }

      const results: ToolResultEntry[] = [];
      for (const toolUse of toolUses) {
        yield { type: 'tool_call', id: toolUse.id, name: toolUse.name, input: toolUse.input };

        await this.logger.info('Executing tool', { operation: 'tool_call', toolName: toolUse.name });
        const result = await this.registry.execute(toolUse.name, toolUse.input);
        const isError = result.startsWith('Error');

        results.push({ toolUseId: toolUse.id, toolName: toolUse.name, content: result, isError });
        toolCalls.push({ id: toolUse.id, name: toolUse.name, input: toolUse.input, result, isError });

        yield { type: 'tool_result', id: toolUse.id, name: toolUse.name, result, isError };
      }
      this.turns.push({ role: 'tool', results });

      toolRounds++;
      if (toolRounds >= this.config.maxToolIterations) {
        const notice = `Stopped after ${toolRounds} tool iteration(s) without a final answer.`;
        this.turns.push({ role: 'assistant', content: [{ type: 'text', text: notice }] });
        texts.push(notice);
        truncated = true;
        yield { type: 'text_delta', text: notice };
        await this.logger.warn('Tool iteration limit reached', {
          operation: 'chat_round',
          maxToolIterations: this.config.maxToolIterations,
        });
        break;
      }
    }

    const reply: ChatReply = { text: texts.join('\n'), toolCalls, stopReason, iterations, truncated };

    await this.logger.info('Message completed', {
      operation: 'chat',
      model: this.config.model,
      iterations,
      toolCalls: toolCalls.length,
      truncated,
    });
    await this.dumpHistory();

    yield { type: 'done', reply };
  }

  private async dumpHistory(): Promise<void> {
    if (!this.historySink) return;
    try {
      await this.historySink.write(this.turns);
    } catch (error) {
      await this.logger.warn('Failed to write conversation history', {
        operation: 'history_dump',
        error: errorMessage(error),
      });
    }
  }
}
