import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { atomicWrite } from '../utils/atomic-write.js';
import { ConfigError, errorMessage, isErrnoException, isRecord } from '../utils/errors.js';

/**
 * Configuration schema using Zod for validation
 */
export const SandboxChatConfigSchema = z.object({
  agent: z.object({
    model: z.string().min(1).default('claude-3-haiku-20240307'),
    maxTokens: z.number().int().min(1).max(200000).default(1000),
    systemPrompt: z.string().default('You are a helpful AI assistant. Be concise and clear in your responses.'),
    maxToolIterations: z.number().int().min(1).max(100).default(10),
    stream: z.boolean().default(true),
  }).default({}),

  sandbox: z.object({
    root: z.string().min(1).default('sandbox'),
  }).default({}),

  tools: z.object({
    enabled: z.array(z.string().min(1)).optional(),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    path: z.string().min(1).default('logs/sandbox-chat.log'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),

  debug: z.object({
    enabled: z.boolean().default(false),
    historyPath: z.string().min(1).default('debug/conversation.json'),
  }).default({}),
});

/**
 * Type for the full configuration
 */
export type SandboxChatConfig = z.infer<typeof SandboxChatConfigSchema>;

/**
 * Type for partial configuration (user overrides)
 */
export type PartialSandboxChatConfig = z.input<typeof SandboxChatConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: SandboxChatConfig = SandboxChatConfigSchema.parse({});

/**
 * Environment variable prefix for configuration overrides
 */
export const ENV_PREFIX = 'SANDBOX_CHAT_';

type EnvKind = 'string' | 'integer' | 'boolean' | 'list';

/**
 * Mapping of environment variables to config paths
 */
const ENV_MAPPINGS: Record<string, { path: [string, string]; kind: EnvKind }> = {
  [`${ENV_PREFIX}AGENT_MODEL`]: { path: ['agent', 'model'], kind: 'string' },
  [`${ENV_PREFIX}AGENT_MAX_TOKENS`]: { path: ['agent', 'maxTokens'], kind: 'integer' },
  [`${ENV_PREFIX}AGENT_SYSTEM_PROMPT`]: { path: ['agent', 'systemPrompt'], kind: 'string' },
  [`${ENV_PREFIX}AGENT_MAX_TOOL_ITERATIONS`]: { path: ['agent', 'maxToolIterations'], kind: 'integer' },
  [`${ENV_PREFIX}AGENT_STREAM`]: { path: ['agent', 'stream'], kind: 'boolean' },
  [`${ENV_PREFIX}SANDBOX_ROOT`]: { path: ['sandbox', 'root'], kind: 'string' },
  [`${ENV_PREFIX}TOOLS_ENABLED`]: { path: ['tools', 'enabled'], kind: 'list' },
  [`${ENV_PREFIX}LOGGING_LEVEL`]: { path: ['logging', 'level'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_PATH`]: { path: ['logging', 'path'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: { path: ['logging', 'maxSize'], kind: 'integer' },
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: { path: ['logging', 'maxFiles'], kind: 'integer' },
  [`${ENV_PREFIX}DEBUG_ENABLED`]: { path: ['debug', 'enabled'], kind: 'boolean' },
  [`${ENV_PREFIX}DEBUG_HISTORY_PATH`]: { path: ['debug', 'historyPath'], kind: 'string' },
};

/**
 * Result of configuration validation
 */
export interface ConfigValidationResult {
  success: boolean;
  config?: SandboxChatConfig;
  errors?: string[];
}

/**
 * Parses an environment variable value to the type its key expects
 */
export function parseEnvValue(value: string, kind: EnvKind, name: string): unknown {
  switch (kind) {
    case 'integer': {
      const num = Number(value.trim());
      if (value.trim() === '' || !Number.isInteger(num)) {
        throw new ConfigError(`Invalid numeric value for ${name}: ${value}`);
      }
      return num;
    }
    case 'boolean': {
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      throw new ConfigError(`Invalid boolean value for ${name}: ${value}`);
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    case 'string':
      return value;
  }
}

/**
 * Parses a CLI-supplied value: JSON literals (numbers, booleans, arrays) are
 * decoded, anything else stays a string
 */
export function parseCliValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Deep merges two plain objects. Later values override earlier values.
 */
function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * Sets a nested value, creating intermediate objects as needed
 */
function setNestedValue(obj: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const child = obj[head];
  const next: Record<string, unknown> = isRecord(child) ? { ...child } : {};
  obj[head] = next;
  setNestedValue(next, rest, value);
}

/**
 * ConfigManager - Loads, validates and persists the client configuration
 *
 * Precedence is defaults → JSON file → `SANDBOX_CHAT_*` environment variables.
 * Saves are atomic (temp file + rename).
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: SandboxChatConfig;
  private env: NodeJS.ProcessEnv;

  /**
   * @param configPath - Path to the configuration file
   * @param env - Environment to read overrides from
   */
  constructor(configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
    this.env = env;
  }

  get config(): SandboxChatConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Loads configuration with precedence: defaults → file → environment
   */
  async load(): Promise<ConfigValidationResult> {
    let fileConfig: Record<string, unknown> = {};

    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isRecord(parsed)) {
        return { success: false, errors: [`Config file ${this.configPath} must contain a JSON object`] };
      }
      fileConfig = parsed;
    } catch (error) {
      // Missing file means defaults
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        return {
          success: false,
          errors: [`Failed to read config file: ${errorMessage(error)}`],
        };
      }
    }

    let envOverrides: Record<string, unknown>;
    try {
      envOverrides = this.getEnvironmentOverrides();
    } catch (error) {
      return { success: false, errors: [errorMessage(error)] };
    }

    return this.validate(deepMerge(fileConfig, envOverrides));
  }

  /**
   * Validates a partial configuration and, on success, makes it current
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = SandboxChatConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return {
        success: true,
        config: result.data,
      };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return {
      success: false,
      errors,
    };
  }

  /**
   * Saves the current configuration to file atomically
   */
  async save(config?: PartialSandboxChatConfig): Promise<void> {
    const configToSave = config ?? this.currentConfig;

    const validation = this.validate(configToSave);
    if (!validation.success) {
      throw new ConfigError(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    await atomicWrite(this.configPath, JSON.stringify(configToSave, null, 2) + '\n', 0o600);
  }

  /**
   * Gets a specific configuration value by dotted path
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;

    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }

    return current;
  }

  /**
   * Sets a specific configuration value by dotted path.
   * Unknown keys are rejected; the current config changes only when valid.
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const parts = path.split('.');
    if (parts.length !== 2 || (this.get(path) === undefined && !isKnownOptional(path))) {
      return { success: false, errors: [`Unknown configuration key '${path}'`] };
    }

    const draft: Record<string, unknown> = { ...this.currentConfig };
    setNestedValue(draft, parts, value);

    return this.validate(draft);
  }

  /**
   * Names of the recognized environment variables
   */
  static environmentVariables(): string[] {
    return Object.keys(ENV_MAPPINGS);
  }

  private getEnvironmentOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value !== undefined) {
        setNestedValue(overrides, mapping.path, parseEnvValue(value, mapping.kind, envVar));
      }
    }

    return overrides;
  }
}

function isKnownOptional(path: string): boolean {
  return path === 'tools.enabled';
}
