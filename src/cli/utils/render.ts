/**
 * Terminal rendering helpers for chat output
 */

import type { ToolCallRecord } from '../../agent/chat-types.js';
import type { LogEntry, EntryLevel } from '../../logging/logger.js';

// ANSI escape codes for terminal formatting
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';

const RULE = '='.repeat(40);

/**
 * Wraps text in an ANSI style unless color is disabled
 */
export function paint(text: string, style: string, color: boolean): string {
  return color ? `${style}${text}${RESET}` : text;
}

/**
 * Section banner printed between streamed segments, e.g. `[TOOL CALL]`
 */
export function banner(title: string, color = false): string {
  return `\n\n${RULE}\n${paint(`[${title}]`, BOLD, color)}\n${RULE}\n\n`;
}

export function formatToolCall(name: string, result: string): string {
  return `[Tool: ${name} -> ${result}]`;
}

/**
 * One line per tool call, used after a blocking reply
 */
export function formatToolSummary(calls: ToolCallRecord[], color = false): string {
  return calls
    .map((call) => paint(formatToolCall(call.name, call.result), call.isError ? RED : YELLOW, color))
    .join('\n');
}

export function formatToolList(names: string[]): string {
  return names.length > 0 ? `Tools available: ${names.join(', ')}` : 'Tools available: (none)';
}

const LEVEL_COLORS: Record<EntryLevel, string> = {
  debug: GRAY,
  info: CYAN,
  warn: YELLOW,
  error: RED,
};

/**
 * Formats a log entry as `[HH:MM:SS] LEVEL message key=value`
 */
export function formatLogEntry(entry: LogEntry, color = false): string {
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `${paint(`[${time}] ${level}`, LEVEL_COLORS[entry.level], color)} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${paint(contextStr, GRAY, color)}`;
  }

  if (entry.stack) {
    output += `\n${paint(entry.stack, GRAY, color)}`;
  }

  return output;
}
