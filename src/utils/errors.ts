/**
 * Error types shared across the client
 */

export class SandboxChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SandboxChatError';
  }
}

export class ConfigError extends SandboxChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ChatClientError extends SandboxChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CHAT_CLIENT_ERROR', cause);
    this.name = 'ChatClientError';
  }
}

/**
 * Narrows an unknown thrown value to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Extracts a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Type guard for plain JSON-like objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
