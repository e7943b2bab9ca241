/**
 * Switchboard CLI - Command Line Splitting
 *
 * Commands are separated by `;` and words by whitespace. A word starting
 * with `#` begins a comment that runs to the end of the line. There is no
 * quoting and no expansion.
 */

const COMMENT = /(^|\s)#.*$/;

export function splitCommands(line: string): string[][] {
  const commands: string[][] = [];
  for (const segment of line.replace(COMMENT, '').split(';')) {
    const words = segment.split(/\s+/).filter((word) => word !== '');
    if (words.length > 0) commands.push(words);
  }
  return commands;
}
