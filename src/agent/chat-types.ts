import type { ToolDefinition } from '../tools/tool-definition.js';

/**
 * Conversation turns kept by a ChatSession
 */
export interface UserTurn {
  role: 'user';
  content: string;
}

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type AssistantBlock = TextBlock | ToolUseBlock;

export interface AssistantTurn {
  role: 'assistant';
  content: AssistantBlock[];
}

export interface ToolResultEntry {
  toolUseId: string;
  toolName: string;
  content: string;
  isError: boolean;
}

/**
 * All tool results answering one assistant turn
 */
export interface ToolResultTurn {
  role: 'tool';
  results: ToolResultEntry[];
}

export type Turn = UserTurn | AssistantTurn | ToolResultTurn;

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence' | 'other';

/**
 * One request to the remote model
 */
export interface ChatRequest {
  model: string;
  system: string;
  maxTokens: number;
  history: Turn[];
  tools: ToolDefinition[];
}

export interface ChatResponse {
  content: AssistantBlock[];
  stopReason: StopReason;
}

export interface ChatTextDeltaEvent {
  type: 'text_delta';
  text: string;
}

export interface ChatMessageEvent {
  type: 'message';
  response: ChatResponse;
}

/**
 * Streaming output: any number of text deltas, then exactly one message
 */
export type ChatStreamEvent = ChatTextDeltaEvent | ChatMessageEvent;

/**
 * Port to the hosted model
 */
export interface ChatClient {
  create(request: ChatRequest): Promise<ChatResponse>;
  stream(request: ChatRequest): AsyncIterable<ChatStreamEvent>;
}

export interface ToolCallRecord {
  id: string;
  name: string;
  input: Record<string, unknown>;
  result: string;
  isError: boolean;
}

export interface ChatReply {
  text: string;
  toolCalls: ToolCallRecord[];
  stopReason: StopReason;
  iterations: number;
  truncated: boolean;
}

/**
 * Events yielded by ChatSession.stream
 */
export type SessionEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; id: string; name: string; result: string; isError: boolean }
  | { type: 'done'; reply: ChatReply };
