/**
 * Integration tests for the conversation loop driving the real tool catalog
 * against a temporary sandbox directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ChatSession } from '../../src/agent/chat-session.js';
import type { SessionEvent, Turn } from '../../src/agent/chat-types.js';
import { Logger } from '../../src/logging/logger.js';
import { SandboxPolicy } from '../../src/security/sandbox-policy.js';
import { ToolRegistry } from '../../src/tools/tool-registry.js';
import { ScriptedChatClient, textResponse, toolResponse } from '../helpers/scripted-client.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function roles(history: Turn[]): string[] {
  return history.map((turn) => turn.role);
}

describe('Tool loop integration', () => {
  let root: string;
  let registry: ToolRegistry;

  beforeEach(async () => {
    root = join(tmpdir(), `sandbox-chat-integration-${randomUUID()}`);
    await mkdir(root, { recursive: true });
    registry = new ToolRegistry({ autoLoad: true, sandbox: new SandboxPolicy(root) });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write, move and read a file across two messages', async () => {
    const client = new ScriptedChatClient([
      toolResponse(
        [{ id: 't1', name: 'write_file', input: { file_path: 'todo.txt', content: 'buy milk\n' } }],
        'Writing it now.',
      ),
      textResponse('Saved todo.txt.'),
      toolResponse([
        { id: 't2', name: 'move_file', input: { source_path: 'todo.txt', destination_dir: 'archive' } },
        { id: 't3', name: 'read_file', input: { file_path: 'archive/todo.txt' } },
      ]),
      textResponse('It says buy milk.'),
    ]);
    const session = new ChatSession(client, registry);

    const first = await session.send('Save a todo list');

    expect(first.text).toBe('Writing it now.\nSaved todo.txt.');
    expect(first.toolCalls.map((c) => c.result)).toEqual(['Success: Content written to todo.txt (9 bytes)']);
    expect(await readFile(join(root, 'todo.txt'), 'utf-8')).toBe('buy milk\n');

    const second = await session.send('Archive it and read it back');

    expect(second.text).toBe('It says buy milk.');
    expect(second.iterations).toBe(2);
    expect(second.toolCalls.map((c) => c.result)).toEqual([
      "Success: Moved file 'todo.txt' to 'archive/todo.txt'",
      'buy milk\n',
    ]);
    expect(await exists(join(root, 'todo.txt'))).toBe(false);

    const history = session.history();
    expect(roles(history)).toEqual(['user', 'assistant', 'tool', 'assistant', 'user', 'assistant', 'tool', 'assistant']);
    expect(history[6]).toEqual({
      role: 'tool',
      results: [
        {
          toolUseId: 't2',
          toolName: 'move_file',
          content: "Success: Moved file 'todo.txt' to 'archive/todo.txt'",
          isError: false,
        },
        { toolUseId: 't3', toolName: 'read_file', content: 'buy milk\n', isError: false },
      ],
    });

    // Every request carries the full history so far
    expect(client.requests.map((r) => r.history.length)).toEqual([1, 3, 5, 7]);
    expect(client.requests[0]?.tools.map((t) => t.name)).toEqual(registry.list());
  });

  it('should feed a sandbox violation back to the model as an error result', async () => {
    const client = new ScriptedChatClient([
      toolResponse([{ id: 't1', name: 'read_file', input: { file_path: '../../etc/passwd' } }]),
      textResponse('I cannot read that file.'),
    ]);
    const session = new ChatSession(client, registry);

    const reply = await session.send('Read /etc/passwd');

    expect(reply.toolCalls).toEqual([
      {
        id: 't1',
        name: 'read_file',
        input: { file_path: '../../etc/passwd' },
        result: `Error: Access denied. Can only read files within ${root}`,
        isError: true,
      },
    ]);
    expect(reply.text).toBe('I cannot read that file.');
  });

  it('should stream tool events between text deltas', async () => {
    const client = new ScriptedChatClient([
      toolResponse([{ id: 't1', name: 'sort_data', input: { data: '3,1,2', numeric: true } }]),
      textResponse('Sorted.'),
    ]);
    const session = new ChatSession(client, registry);

    const events: SessionEvent[] = [];
    for await (const event of session.stream('Sort 3,1,2')) {
      events.push(event);
    }

    expect(events.map((e) => e.type)).toEqual(['tool_call', 'tool_result', 'text_delta', 'done']);
    expect(events[1]).toEqual({ type: 'tool_result', id: 't1', name: 'sort_data', result: '[1, 2, 3]', isError: false });
  });

  it('should stop after the configured number of tool rounds', async () => {
    const listCall = (id: string) => toolResponse([{ id, name: 'list_files', input: {} }]);
    const client = new ScriptedChatClient([listCall('t1'), listCall('t2'), listCall('t3')]);
    const session = new ChatSession(client, registry, { maxToolIterations: 2 });

    const reply = await session.send('Keep listing');

    expect(reply.truncated).toBe(true);
    expect(reply.toolCalls).toHaveLength(2);
    expect(reply.text).toBe('Stopped after 2 tool iteration(s) without a final answer.');
    expect(client.remaining).toBe(1);
    expect(roles(session.history())).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'assistant']);
  });

  describe('with an unwritable log file', () => {
    let logger: Logger;

    beforeEach(async () => {
      // A regular file where the log directory should be
      const blocker = join(root, 'blocker');
      await writeFile(blocker, 'not a directory');
      logger = new Logger({ level: 'debug', path: join(blocker, 'chat.log') });
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should still return result strings from the registry', async () => {
      const logged = new ToolRegistry({ autoLoad: true, sandbox: new SandboxPolicy(root), logger });

      expect(await logged.execute('nope', {})).toBe("Error: Unknown tool 'nope'");
      expect(await logged.execute('sort_data', { data: 'b,a' })).toBe('a, b');
    });

    it('should complete a tool round and keep the history whole', async () => {
      const logged = new ToolRegistry({ autoLoad: true, sandbox: new SandboxPolicy(root), logger });
      const client = new ScriptedChatClient([
        toolResponse([{ id: 't1', name: 'sort_data', input: { data: '2,1', numeric: true } }]),
        textResponse('Done.'),
      ]);
      const session = new ChatSession(client, logged, {}, { logger });

      const reply = await session.send('Sort 2,1');

      expect(reply.text).toBe('Done.');
      expect(reply.toolCalls.map((c) => c.result)).toEqual(['[1, 2]']);
      expect(roles(session.history())).toEqual(['user', 'assistant', 'tool', 'assistant']);
    });
  });
});
