/**
 * @switchboard/cli
 *
 * Switchboard command-line interface: the interpreter session, the option
 * builtins (set, shopt, enable, declare, describe, help, exit) and the
 * Commander program behind the `switchboard` command.
 *
 * Usage:
 *   switchboard -c 'set -o'
 *   switchboard -o errexit -O extglob -c 'shopt extglob'
 *   switchboard describe noglob
 *   switchboard mirrors
 *   switchboard log [--option <name>] [--outcome <outcome>] [--json]
 *   switchboard config get|set|home
 */

export type { ExtensionCatalog, ExtensionFactory } from './session/extension-catalog.js';
export { FIRST_PARTY_EXTENSIONS } from './session/extension-catalog.js';
export type { SessionOptions, StartupOptions } from './session/session.js';
export { Session } from './session/session.js';
export { splitCommands } from './session/words.js';
export type { Builtin } from './builtins/index.js';
export { BUILTINS, CommandOutput, runCommand } from './builtins/index.js';
