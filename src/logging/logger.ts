import { appendFile, stat, rename, unlink, mkdir, access, constants } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity. `silent` sits above every real level,
 * so a logger set to it writes nothing.
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Levels an entry can actually be written at
 */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

/**
 * Context attached to log entries
 */
export interface LogContext {
  operation?: string;
  toolName?: string;
  model?: string;
  [key: string]: unknown;
}

/**
 * One JSON line in the log file
 */
export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'logs/sandbox-chat.log',
  maxSize: 10 * 1024 * 1024,
  maxFiles: 5,
};

/**
 * Logger - JSON lines logger with level filtering and size-based rotation
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: EntryLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger sharing this one's file with extra default context
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.defaultContext, ...context });
  }

  formatEntry(level: EntryLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  /**
   * Appends one entry. Never rejects: when the file cannot be written the
   * line goes to stderr instead.
   */
  async write(entry: LogEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';

    try {
      const dir = dirname(this.config.path);
      if (dir !== '.') {
        await mkdir(dir, { recursive: true });
      }

      await this.rotateIfNeeded();
      await appendFile(this.config.path, line, { encoding: 'utf-8' });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[log write failed: ${reason}] ${line}`);
    }
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.write(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.write(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.write(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error, keeping the stack when one is available
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (err) {
      entry.context = { ...entry.context, errorMessage: err.message };
    } else if (error !== undefined) {
      entry.context = { ...entry.context, errorDetails: String(error) };
    }

    await this.write(entry);
  }

  async rotateIfNeeded(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.config.path)).size;
    } catch {
      // Nothing written yet
      return;
    }

    if (size >= this.config.maxSize) {
      await this.rotate();
    }
  }

  /**
   * Shifts `log` → `log.1` → `log.2` ..., dropping anything past maxFiles
   */
  async rotate(): Promise<void> {
    const base = this.config.path;

    await unlinkIfExists(`${base}.${this.config.maxFiles}`);

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await renameIfExists(`${base}.${i}`, `${base}.${i + 1}`);
    }

    await renameIfExists(base, `${base}.1`);
  }

  /**
   * Lists the current log file followed by rotated files, newest first
   */
  async listLogFiles(): Promise<string[]> {
    const candidates = [this.config.path];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      candidates.push(`${this.config.path}.${i}`);
    }

    const files: string[] = [];
    for (const candidate of candidates) {
      if (await exists(candidate)) {
        files.push(candidate);
      }
    }
    return files;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function unlinkIfExists(path: string): Promise<void> {
  if (await exists(path)) {
    await unlink(path);
  }
}

async function renameIfExists(from: string, to: string): Promise<void> {
  if (await exists(from)) {
    await rename(from, to);
  }
}
