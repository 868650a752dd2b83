/**
 * Builds the runtime objects every chat command needs
 */

import { ConfigManager, type SandboxChatConfig } from '../config/config-manager.js';
import { Logger } from '../logging/logger.js';
import { SandboxPolicy } from '../security/sandbox-policy.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ChatSession } from '../agent/chat-session.js';
import { AnthropicChatClient } from '../agent/anthropic-client.js';
import type { ChatClient } from '../agent/chat-types.js';
import { HistoryDump } from '../session/history-dump.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  config: string;
  model?: string;
  debug?: boolean;
  stream?: boolean;
  sandbox?: string;
}

export const MISSING_API_KEY_MESSAGE =
  'ANTHROPIC_API_KEY not found in environment variables\nPlease set it in your .env file or as an environment variable';

export interface Runtime {
  config: SandboxChatConfig;
  logger: Logger;
  sandbox: SandboxPolicy;
  registry: ToolRegistry;
  session: ChatSession;
  streaming: boolean;
}

/**
 * Loads the config file and environment, throwing ConfigError on problems
 */
export async function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigManager> {
  const manager = new ConfigManager(path, env);
  const result = await manager.load();
  if (!result.success) {
    throw new ConfigError((result.errors ?? ['Invalid configuration']).join('\n'));
  }
  return manager;
}

/**
 * Applies command-line flags on top of the loaded configuration
 */
export function applyOverrides(config: SandboxChatConfig, options: GlobalOptions): SandboxChatConfig {
  return {
    ...config,
    agent: {
      ...config.agent,
      model: options.model ?? config.agent.model,
      stream: options.stream ?? config.agent.stream,
    },
    sandbox: { root: options.sandbox ?? config.sandbox.root },
    debug: { ...config.debug, enabled: options.debug ?? config.debug.enabled },
  };
}

export function requireApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const key = env.ANTHROPIC_API_KEY;
  if (!key) {
    throw new ConfigError(MISSING_API_KEY_MESSAGE);
  }
  return key;
}

export function createLogger(config: SandboxChatConfig): Logger {
  return new Logger(config.logging, { component: 'sandbox-chat' });
}

export function createRegistry(config: SandboxChatConfig, sandbox: SandboxPolicy, logger: Logger): ToolRegistry {
  return new ToolRegistry({
    autoLoad: true,
    sandbox,
    enabled: config.tools.enabled,
    logger: logger.child({ component: 'tools' }),
  });
}

/**
 * Wires config, logger, sandbox, tools and client into a session
 */
export function createRuntime(config: SandboxChatConfig, client: ChatClient): Runtime {
  const logger = createLogger(config);
  const sandbox = new SandboxPolicy(config.sandbox.root);
  const registry = createRegistry(config, sandbox, logger);

  const session = new ChatSession(
    client,
    registry,
    {
      model: config.agent.model,
      systemPrompt: config.agent.systemPrompt,
      maxTokens: config.agent.maxTokens,
      maxToolIterations: config.agent.maxToolIterations,
    },
    {
      logger: logger.child({ component: 'session' }),
      historySink: config.debug.enabled ? new HistoryDump(config.debug.historyPath) : undefined,
    },
  );

  return { config, logger, sandbox, registry, session, streaming: config.agent.stream };
}

/**
 * Full startup used by the chat and message commands
 */
export async function bootstrap(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Promise<Runtime> {
  const manager = await loadConfig(options.config, env);
  const config = applyOverrides(manager.config, options);
  const apiKey = requireApiKey(env);
  return createRuntime(config, new AnthropicChatClient({ apiKey }));
}
