import { describe, expect, it, vi } from 'vitest';
import { createCommandExecutor, parseCommandLine } from '../../src/console/commands.js';
import type { ConsoleOutput } from '../../src/console/types.js';

function createOutput() {
  return {
    writeLine: vi.fn(),
    clear: vi.fn(),
    clearLine: vi.fn(),
    hide: vi.fn(),
  } satisfies ConsoleOutput;
}

describe('parseCommandLine', () => {
  it('splits the name from its arguments', () => {
    expect(parseCommandLine('  spawn  guest 3 ')).toEqual({
      name: 'spawn',
      args: ['guest', '3'],
      rest: 'guest 3',
    });
  });

  it('lowercases the command name only', () => {
    expect(parseCommandLine('ECHO Hello')).toEqual({ name: 'echo', args: ['Hello'], rest: 'Hello' });
  });

  it('handles a blank line', () => {
    expect(parseCommandLine('   ')).toEqual({ name: '', args: [], rest: '' });
  });
});

describe('createCommandExecutor', () => {
  it('lists built-in commands on help', () => {
    const output = createOutput();
    createCommandExecutor().execute('help', output);

    expect(output.writeLine).toHaveBeenCalledTimes(2);
    expect(output.writeLine).toHaveBeenNthCalledWith(1, 'Built-in commands: clear, cls, echo, help, hide');
  });

  it('hides the console', () => {
    const output = createOutput();
    createCommandExecutor().execute('HIDE', output);
    expect(output.hide).toHaveBeenCalledTimes(1);
  });

  it('clears the scrollback with clear and cls', () => {
    const output = createOutput();
    const executor = createCommandExecutor();
    executor.execute('clear', output);
    executor.execute('cls', output);
    expect(output.clear).toHaveBeenCalledTimes(2);
  });

  it('echoes the rest of the line', () => {
    const output = createOutput();
    createCommandExecutor().execute('echo  hi  there', output);
    expect(output.writeLine).toHaveBeenCalledWith('hi  there');
  });

  it('reports unknown commands without a fallback', () => {
    const output = createOutput();
    createCommandExecutor().execute('spawn guest', output);
    expect(output.writeLine).toHaveBeenCalledWith('Unknown command: spawn', 'red');
  });

  it('passes other lines to the fallback untouched', () => {
    const output = createOutput();
    const fallback = { execute: vi.fn() };
    createCommandExecutor(fallback).execute('spawn guest', output);

    expect(fallback.execute).toHaveBeenCalledWith('spawn guest', output);
    expect(output.writeLine).not.toHaveBeenCalled();
  });
});
