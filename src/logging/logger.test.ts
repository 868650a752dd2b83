import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, readFile, access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, type LogEntry } from './logger.js';

async function readEntries(path: string): Promise<LogEntry[]> {
  const content = await readFile(path, 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

describe('Logger', () => {
  let testDir: string;
  let logPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'sandbox-chat-logger-'));
    logPath = join(testDir, 'chat.log');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('level filtering', () => {
    it('drops entries below the configured level', async () => {
      const logger = new Logger({ level: 'warn', path: logPath });

      await logger.debug('debug message');
      await logger.info('info message');
      await logger.warn('warn message');
      await logger.error('error message');

      const entries = await readEntries(logPath);
      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('writes every level at debug', async () => {
      const logger = new Logger({ level: 'debug', path: logPath });

      await logger.debug('d');
      await logger.info('i');
      await logger.warn('w');
      await logger.error('e');

      const entries = await readEntries(logPath);
      expect(entries).toHaveLength(4);
    });

    it('writes nothing when silent', async () => {
      const logger = new Logger({ level: 'silent', path: logPath });

      await logger.error('never written', new Error('boom'));

      await expect(access(logPath)).rejects.toThrow();
    });

    it('reports which levels pass the filter', () => {
      const logger = new Logger({ level: 'info', path: logPath });

      expect(logger.shouldLog('debug')).toBe(false);
      expect(logger.shouldLog('info')).toBe(true);
      expect(logger.shouldLog('error')).toBe(true);
    });
  });

  describe('entry format', () => {
    it('writes one JSON object per line with timestamp, level and message', async () => {
      const logger = new Logger({ level: 'info', path: logPath });
      await logger.info('remote call completed');

      const [entry] = await readEntries(logPath);
      expect(entry?.level).toBe('info');
      expect(entry?.message).toBe('remote call completed');
      expect(new Date(entry?.timestamp ?? '').toISOString()).toBe(entry?.timestamp);
      expect(entry?.context).toBeUndefined();
    });

    it('merges default context with call context', async () => {
      const logger = new Logger({ level: 'info', path: logPath }, { model: 'test-model' });
      await logger.info('tool executed', { toolName: 'read_file' });

      const [entry] = await readEntries(logPath);
      expect(entry?.context).toEqual({ model: 'test-model', toolName: 'read_file' });
    });

    it('creates the log directory on first write', async () => {
      const nestedPath = join(testDir, 'nested', 'dir', 'chat.log');
      const logger = new Logger({ level: 'info', path: nestedPath });

      await logger.info('hello');

      const entries = await readEntries(nestedPath);
      expect(entries).toHaveLength(1);
    });
  });

  describe('error entries', () => {
    it('keeps the stack and message of Error instances', async () => {
      const logger = new Logger({ level: 'error', path: logPath });

      await logger.error('Chat turn failed', new Error('connection reset'), { operation: 'send' });

      const [entry] = await readEntries(logPath);
      expect(entry?.stack).toContain('Error: connection reset');
      expect(entry?.context?.operation).toBe('send');
      expect(entry?.context?.errorMessage).toBe('connection reset');
    });

    it('stringifies non-Error values', async () => {
      const logger = new Logger({ level: 'error', path: logPath });

      await logger.error('Chat turn failed', 'plain failure');

      const [entry] = await readEntries(logPath);
      expect(entry?.context?.errorDetails).toBe('plain failure');
      expect(entry?.stack).toBeUndefined();
    });
  });

  describe('rotation', () => {
    it('rotates once the file reaches maxSize', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 100, maxFiles: 3 });

      for (let i = 0; i < 10; i++) {
        await logger.info(`Message ${i} padded with enough text to pass the limit`);
      }

      const files = await logger.listLogFiles();
      expect(files[0]).toBe(logPath);
      expect(files).toContain(`${logPath}.1`);
    });

    it('never keeps more than maxFiles rotated files', async () => {
      const logger = new Logger({ level: 'info', path: logPath, maxSize: 50, maxFiles: 2 });

      for (let i = 0; i < 20; i++) {
        await logger.info(`Message ${i} with padding`);
      }

      const files = await logger.listLogFiles();
      expect(files).toEqual([logPath, `${logPath}.1`, `${logPath}.2`]);
    });
  });

  describe('child loggers', () => {
    it('inherit the file and extend the context', async () => {
      const parent = new Logger({ level: 'info', path: logPath }, { operation: 'chat' });
      const child = parent.child({ toolName: 'sort_data' });

      await child.info('child message');

      const [entry] = await readEntries(logPath);
      expect(entry?.context).toEqual({ operation: 'chat', toolName: 'sort_data' });
    });
  });

  describe('unwritable destination', () => {
    it('falls back to stderr instead of rejecting', async () => {
      // A regular file where the log directory should be
      const blocker = join(testDir, 'blocker');
      await writeFile(blocker, 'not a directory');
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      try {
        const logger = new Logger({ level: 'info', path: join(blocker, 'chat.log') });

        await expect(logger.info('still here')).resolves.toBeUndefined();
        await expect(logger.error('and here', new Error('boom'))).resolves.toBeUndefined();

        const fallbacks = stderr.mock.calls
          .map(([chunk]) => String(chunk))
          .filter((chunk) => chunk.startsWith('[log write failed: '));
        expect(fallbacks).toHaveLength(2);
        expect(fallbacks[0]).toContain('"message":"still here"');
        expect(fallbacks[1]).toContain('"message":"and here"');
      } finally {
        stderr.mockRestore();
      }
    });
  });
});
