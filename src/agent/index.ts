/**
 * Agent module
 * Conversation loop and the remote model client
 */

export {
  ChatSession,
  DEFAULT_CHAT_SESSION_CONFIG,
  type ChatSessionConfig,
  type ChatSessionOptions,
} from './chat-session.js';

export { AnthropicChatClient, toMessageParams, toChatResponse } from './anthropic-client.js';

export type {
  AssistantBlock,
  AssistantTurn,
  ChatClient,
  ChatMessageEvent,
  ChatReply,
  ChatRequest,
  ChatResponse,
  ChatStreamEvent,
  ChatTextDeltaEvent,
  SessionEvent,
  StopReason,
  TextBlock,
  ToolCallRecord,
  ToolResultEntry,
  ToolResultTurn,
  ToolUseBlock,
  Turn,
  UserTurn,
} from './chat-types.js';
