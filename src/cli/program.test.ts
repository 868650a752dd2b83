import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Command } from 'commander';
import { createProgram } from './program.js';
import { runMessage } from './commands/message.js';

vi.mock('./commands/message.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./commands/message.js')>();
  return { ...actual, runMessage: vi.fn(async () => undefined) };
});

function quietProgram(): Command {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  }
  return program;
}

describe('createProgram', () => {
  beforeEach(() => {
    vi.mocked(runMessage).mockClear();
  });

  it('should send a positional message once instead of starting the REPL', async () => {
    await quietProgram().parseAsync(['node', 'sandbox-chat', 'hello there']);

    expect(runMessage).toHaveBeenCalledTimes(1);
    expect(runMessage).toHaveBeenCalledWith('hello there', expect.objectContaining({ config: 'config.json' }));
  });

  it('should pass global options along with the positional message', async () => {
    await quietProgram().parseAsync(['node', 'sandbox-chat', '-c', 'custom.json', '-m', 'claude-test-model', 'hi']);

    expect(runMessage).toHaveBeenCalledWith(
      'hi',
      expect.objectContaining({ config: 'custom.json', model: 'claude-test-model' }),
    );
  });

  it('should reject more than one positional argument', async () => {
    await expect(quietProgram().parseAsync(['node', 'sandbox-chat', 'one', 'two'])).rejects.toMatchObject({
      code: 'commander.excessArguments',
    });
    expect(runMessage).not.toHaveBeenCalled();
  });
});
