/**
 * Logs command - Print recent log entries
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigManager } from '../../config/config-manager.js';
import { LOG_LEVELS, type LogEntry, type LogLevel } from '../../logging/logger.js';
import { isErrnoException } from '../../utils/errors.js';
import type { GlobalOptions } from '../bootstrap.js';
import { formatError } from '../utils/output.js';
import { formatLogEntry } from '../utils/render.js';

interface LogsOptions {
  level?: string;
  lines?: number;
}

const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']),
  message: z.string(),
  context: z
    .object({
      operation: z.string().optional(),
      toolName: z.string().optional(),
      model: z.string().optional(),
    })
    .passthrough()
    .optional(),
  stack: z.string().optional(),
});

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Creates the logs command
 */
export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View recent log entries')
    .option('-l, --level <level>', 'Filter by minimum log level (debug, info, warn, error)')
    .option('-n, --lines <count>', 'Number of lines to show', (value) => parseInt(value, 10), 50)
    .action(async (_options: LogsOptions, command: Command) => {
      await runLogs(command.optsWithGlobals<GlobalOptions & LogsOptions>());
    });

  return cmd;
}

/**
 * Parses a log line into a LogEntry, or null for anything else
 */
export function parseLogLine(line: string): LogEntry | null {
  try {
    const result = LogEntrySchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * Last `lineCount` lines of the log at or above `minLevel`
 */
export async function readRecentEntries(logPath: string, lineCount: number, minLevel?: LogLevel): Promise<LogEntry[]> {
  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const entries: LogEntry[] = [];
  for (const line of content.trim().split('\n').slice(-lineCount)) {
    const entry = parseLogLine(line);
    if (entry && (!minLevel || LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel])) {
      entries.push(entry);
    }
  }
  return entries;
}

async function runLogs(options: GlobalOptions & LogsOptions): Promise<void> {
  const minLevel = options.level;
  if (minLevel !== undefined && !isLogLevel(minLevel)) {
    console.error(`Invalid log level: ${minLevel}`);
    console.error('Valid levels: debug, info, warn, error');
    process.exit(1);
  }

  const lineCount = options.lines ?? 50;
  if (!Number.isInteger(lineCount) || lineCount < 1) {
    console.error('--lines must be a positive integer');
    process.exit(1);
  }

  try {
    const configManager = new ConfigManager(options.config);
    await configManager.load();
    const logPath = configManager.config.logging.path;

    const entries = await readRecentEntries(logPath, lineCount, minLevel);
    if (entries.length === 0) {
      console.log(`No log entries found in ${logPath}.`);
      return;
    }

    const color = Boolean(process.stdout.isTTY);
    for (const entry of entries) {
      console.log(formatLogEntry(entry, color));
    }
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }
}
