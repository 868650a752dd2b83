import { z } from 'zod';
import { defineTool, type RegistrableTool } from './tool-definition.js';
import type { ToolContext } from './fs-helpers.js';

const SortDataInput = z.object({
  data: z.string(),
  order: z.enum(['asc', 'desc']).default('asc'),
  numeric: z.boolean().default(false),
  case_sensitive: z.boolean().default(false),
});

type SortDataOptions = z.infer<typeof SortDataInput>;

/**
 * Splits the raw `data` argument into items.
 * JSON arrays are taken as-is; otherwise comma-separated, then newline-separated.
 */
export function parseSortItems(data: string): unknown[] | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    if (data.includes(',')) {
      return data.split(',').map((item) => item.trim());
    }
    return data
      .split('\n')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  if (!Array.isArray(parsed)) {
    return 'Error: JSON data must be a list/array';
  }
  return parsed;
}

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Numeric value of an item. Integer text becomes a bigint so values past
 * 2^53 keep every digit; anything else goes through Number.
 */
function toNumeric(item: unknown): number | bigint | null {
  if (typeof item === 'number') {
    return Number.isFinite(item) ? item : null;
  }
  if (typeof item !== 'string') {
    return null;
  }
  const text = item.trim();
  if (INTEGER_TEXT.test(text)) {
    return BigInt(text.startsWith('+') ? text.slice(1) : text);
  }
  if (text === '') {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sorts a data string and formats the result.
 * Numeric results render as `[1, 3, 5]`; text results as `a, b, c`.
 */
export function sortData({ data, order, numeric, case_sensitive }: SortDataOptions): string {
  if (data.length === 0) {
    return 'Error: No data provided to sort';
  }

  const items = parseSortItems(data);
  if (typeof items === 'string') {
    return items;
  }
  if (items.length === 0) {
    return 'Error: No data to sort';
  }

  const direction = order === 'desc' ? -1 : 1;

  if (numeric) {
    const numbers: Array<number | bigint> = [];
    for (const item of items) {
      const value = toNumeric(item);
      if (value === null) {
        return 'Error: Could not convert data to numbers for numeric sorting';
      }
      numbers.push(value);
    }
    numbers.sort((a, b) => compareNumeric(a, b) * direction);
    return `[${numbers.map(String).join(', ')}]`;
  }

  const key = case_sensitive ? (s: string) => s : (s: string) => s.toLowerCase();
  const texts = items.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
  texts.sort((a, b) => compareStrings(key(a), key(b)) * direction);
  return texts.join(', ');
}

export function createSortDataTool(): RegistrableTool {
  return defineTool({
    name: 'sort_data',
    description:
      'Sort data in ascending or descending order. Supports numbers, text, JSON arrays, and comma/newline separated values.',
    inputSchema: {
      type: 'object',
      properties: {
        data: {
          type: 'string',
          description: 'Data to sort - can be JSON array, comma-separated values, or newline-separated values',
        },
        order: {
          type: 'string',
          enum: ['asc', 'desc'],
          description: "Sort order: 'asc' for ascending, 'desc' for descending",
          default: 'asc',
        },
        numeric: {
          type: 'boolean',
          description: 'Whether to sort as numbers (true) or text (false)',
          default: false,
        },
        case_sensitive: {
          type: 'boolean',
          description: 'Whether sorting should be case-sensitive',
          default: false,
        },
      },
      required: ['data'],
    },
    input: SortDataInput,
    async run(input) {
      return sortData(input);
    },
  });
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:mm:ss <time zone>`
 */
export function formatLocalTime(date: Date, timeZone: string): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time} ${timeZone}`;
}

export function createCurrentTimeTool({ now = () => new Date() }: Partial<ToolContext> = {}): RegistrableTool {
  return defineTool({
    name: 'get_current_time',
    description: 'Get the current date and time',
    inputSchema: { type: 'object', properties: {}, required: [] },
    input: z.object({}),
    async run() {
      const timeZone = Intl.DateTimeFormat().resolvedOptions().timeZone;
      return formatLocalTime(now(), timeZone);
    },
  });
}

export function createUtilityTools(context: ToolContext): RegistrableTool[] {
  return [createSortDataTool(), createCurrentTimeTool(context)];
}
