import type {
  AssistantBlock,
  ChatClient,
  ChatRequest,
  ChatResponse,
  ChatStreamEvent,
} from '../../src/agent/chat-types.js';

export function textResponse(text: string): ChatResponse {
  return { content: [{ type: 'text', text }], stopReason: 'end_turn' };
}

export function toolResponse(
  calls: Array<{ id: string; name: string; input?: Record<string, unknown> }>,
  text = '',
): ChatResponse {
  const content: AssistantBlock[] = text ? [{ type: 'text', text }] : [];
  for (const call of calls) {
    content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input ?? {} });
  }
  return { content, stopReason: 'tool_use' };
}

/**
 * In-process ChatClient replaying canned responses in order.
 * Streaming splits each text block into one delta per word.
 */
export class ScriptedChatClient implements ChatClient {
  readonly requests: ChatRequest[] = [];
  private queue: Array<ChatResponse | Error>;

  constructor(responses: Array<ChatResponse | Error>) {
    this.queue = [...responses];
  }

  get remaining(): number {
    return this.queue.length;
  }

  private next(request: ChatRequest): ChatResponse {
    // History is copied so later turns don't leak into recorded requests
    this.requests.push({ ...request, history: [...request.history] });
    const response = this.queue.shift();
    if (response === undefined) {
      throw new Error('No scripted response left');
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  async create(request: ChatRequest): Promise<ChatResponse> {
    return this.next(request);
  }

  async *stream(request: ChatRequest): AsyncGenerator<ChatStreamEvent> {
    const response = this.next(request);
    for (const block of response.content) {
      if (block.type !== 'text') continue;
      for (const piece of block.text.split(/(?<= )/)) {
        yield { type: 'text_delta', text: piece };
      }
    }
    yield { type: 'message', response };
  }
}
