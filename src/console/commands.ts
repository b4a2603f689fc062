import type { CommandExecutor, ConsoleOutput } from './types.js';

export const BUILTIN_COMMANDS = ['clear', 'cls', 'echo', 'help', 'hide'] as const;

export type ParsedCommandLine = {
  name: string;
  args: string[];
  /** Everything after the command name, with inner spacing kept. */
  rest: string;
};

export function parseCommandLine(raw: string): ParsedCommandLine {
  const trimmed = raw.trim();
  const match = /^(\S*)\s*([\s\S]*)$/.exec(trimmed);
  const name = (match?.[1] ?? '').toLowerCase();
  const rest = match?.[2] ?? '';
  const args = rest.split(/\s+/).filter(Boolean);
  return { name, args, rest };
}

/**
 * Executor for the console's own commands. Anything else goes to `fallback`,
 * the host's command interpreter.
 */
export function createCommandExecutor(fallback?: CommandExecutor): CommandExecutor {
  return {
    execute(line: string, output: ConsoleOutput): void {
      const parsed = parseCommandLine(line);
      if (handleBuiltin(parsed, output)) return;

      if (fallback) {
        fallback.execute(line, output);
        return;
      }
      output.writeLine(`Unknown command: ${parsed.name}`, 'red');
    },
  };
}

function handleBuiltin(command: ParsedCommandLine, output: ConsoleOutput): boolean {
  switch (command.name) {
    case 'help':
      output.writeLine(`Built-in commands: ${BUILTIN_COMMANDS.join(', ')}`);
      output.writeLine('Page Up/Page Down scroll, Up/Down recall history, Escape clears the line.');
      return true;
    case 'hide':
      output.hide();
      return true;
    case 'clear':
    case 'cls':
      output.clear();
      return true;
    case 'echo':
      output.writeLine(command.rest);
      return true;
    default:
      return false;
  }
}
