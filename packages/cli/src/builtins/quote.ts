/**
 * Switchboard CLI - Value Quoting
 *
 * Variable values printed by `set` and `declare -p` are quoted so that the
 * output can be read back as input by a shell.
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Single-quote `value` unless it is a non-empty run of safe characters. */
export function shellQuote(value: string): string {
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Double-quote `value`, escaping the characters special inside double quotes. */
export function doubleQuote(value: string): string {
  return `"${value.replace(/[\\"$`]/g, (c) => `\\${c}`)}"`;
}
