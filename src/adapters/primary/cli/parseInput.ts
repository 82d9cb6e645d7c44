export interface ParsedInput {
  command: string;
  args: string[];
}

/**
 * Splits a line of user input into a lower-cased command and its arguments
 *
 * @returns null for a blank line
 *
 * @example
 * parseInput('  ADD John 1234567890 ');
 * // { command: 'add', args: ['John', '1234567890'] }
 */
export function parseInput(line: string): ParsedInput | null {
  const [command, ...args] = line.trim().split(/\s+/);
  if (!command) {
    return null;
  }
  return { command: command.toLowerCase(), args };
}
