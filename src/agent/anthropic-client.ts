import Anthropic from '@anthropic-ai/sdk';
import { ChatClientError, errorMessage, isRecord } from '../utils/errors.js';
import type {
  AssistantBlock,
  ChatClient,
  ChatRequest,
  ChatResponse,
  ChatStreamEvent,
  StopReason,
  Turn,
} from './chat-types.js';

/**
 * Maps session turns onto the Messages API shape.
 * Tool turns become a user message of tool_result blocks.
 */
export function toMessageParams(history: Turn[]): Anthropic.MessageParam[] {
  return history.map((turn): Anthropic.MessageParam => {
    switch (turn.role) {
      case 'user':
        return { role: 'user', content: turn.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: turn.content
            // The API rejects empty text blocks
            .filter((block) => block.type !== 'text' || block.text.length > 0)
            .map((block): Anthropic.ContentBlockParam =>
              block.type === 'text'
                ? { type: 'text', text: block.text }
                : { type: 'tool_use', id: block.id, name: block.name, input: block.input },
            ),
        };
      case 'tool':
        return {
          role: 'user',
          content: turn.results.map(
            (result): Anthropic.ToolResultBlockParam => ({
              type: 'tool_result',
              tool_use_id: result.toolUseId,
              content: result.content,
              is_error: result.isError,
            }),
          ),
        };
    }
  });
}

function toStopReason(reason: Anthropic.Message['stop_reason']): StopReason {
  switch (reason) {
    case 'end_turn':
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return reason;
    default:
      return 'other';
  }
}

/**
 * Keeps text and tool_use blocks; other block kinds are dropped
 */
export function toChatResponse(message: Anthropic.Message): ChatResponse {
  const content: AssistantBlock[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }
  return { content, stopReason: toStopReason(message.stop_reason) };
}

function toCreateParams(request: ChatRequest): Anthropic.MessageCreateParamsNonStreaming {
  return {
    model: request.model,
    max_tokens: request.maxTokens,
    system: request.system,
    messages: toMessageParams(request.history),
    ...(request.tools.length > 0
      ? {
          tools: request.tools.map(
            (tool): Anthropic.Tool => ({
              name: tool.name,
              description: tool.description,
              input_schema: tool.input_schema,
            }),
          ),
        }
      : {}),
  };
}

function wrapError(error: unknown): ChatClientError {
  if (error instanceof Anthropic.APIError) {
    return new ChatClientError(`API request failed (${error.status ?? 'no status'}): ${error.message}`, error);
  }
  return new ChatClientError(errorMessage(error), error);
}

/**
 * AnthropicChatClient - ChatClient backed by the Anthropic Messages API
 */
export class AnthropicChatClient implements ChatClient {
  private client: Anthropic;

  constructor(options: { apiKey: string } | { client: Anthropic }) {
    this.client = 'client' in options ? options.client : new Anthropic({ apiKey: options.apiKey });
  }

  async create(request: ChatRequest): Promise<ChatResponse> {
    try {
      const message = await this.client.messages.create(toCreateParams(request));
      return toChatResponse(message);
    } catch (error) {
      throw wrapError(error);
    }
  }

  async *stream(request: ChatRequest): AsyncGenerator<ChatStreamEvent> {
    try {
      const stream = this.client.messages.stream(toCreateParams(request));
      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield { type: 'text_delta', text: event.delta.text };
        }
      }
      yield { type: 'message', response: toChatResponse(await stream.finalMessage()) };
    } catch (error) {
      throw wrapError(error);
    }
  }
}
