/**
 * sandbox-chat - Chat client with sandboxed file-system tools
 */

export {
  ConfigManager,
  SandboxChatConfigSchema,
  DEFAULT_CONFIG,
  ENV_PREFIX,
  type SandboxChatConfig,
  type PartialSandboxChatConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export {
  ToolRegistry,
  defineTool,
  formatInputError,
  createCoreTools,
  createFileTools,
  createDirectoryTools,
  createUtilityTools,
  isBuiltinToolName,
  sortData,
  formatLocalTime,
  BUILTIN_TOOL_NAMES,
  type BuiltinToolName,
  type ToolRegistryOptions,
  type ToolDefinition,
  type ToolHandler,
  type ToolInputSchema,
  type JSONSchemaProperty,
  type RegistrableTool,
  type TypedToolSpec,
  type ToolContext,
} from './tools/index.js';

export {
  ChatSession,
  AnthropicChatClient,
  DEFAULT_CHAT_SESSION_CONFIG,
  type ChatSessionConfig,
  type ChatSessionOptions,
  type ChatClient,
  type ChatRequest,
  type ChatResponse,
  type ChatReply,
  type ChatStreamEvent,
  type SessionEvent,
  type ToolCallRecord,
  type Turn,
} from './agent/index.js';

export { SandboxPolicy, type PathResolution } from './security/sandbox-policy.js';

export { HistoryDump, type HistorySink } from './session/history-dump.js';

export {
  Logger,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
  type LogEntry,
} from './logging/index.js';

export { SandboxChatError, ConfigError, ChatClientError } from './utils/errors.js';
