/**
 * Switchboard CLI - Builtins
 *
 * Dispatch for one command: leading `NAME=value` words are assignments
 * (the first refused one ends the command), then builtins take precedence
 * over extension commands.
 */

import type { CommandResult } from '@switchboard/extension-loader';
import type { Session } from '../session/session.js';
import { declareBuiltin } from './declare.js';
import { describeBuiltin } from './describe.js';
import { enableBuiltin } from './enable.js';
import { exitBuiltin } from './exit.js';
import { createHelpBuiltin } from './help.js';
import { CommandOutput, type Builtin } from './output.js';
import { setBuiltin } from './set.js';
import { shoptBuiltin } from './shopt.js';

export type { Builtin } from './output.js';
export { CommandOutput } from './output.js';

/** Status for a command that is neither a builtin nor an extension command. */
const NOT_FOUND_STATUS = 127;

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

const builtins = new Map<string, Builtin>();
for (const builtin of [
  declareBuiltin,
  describeBuiltin,
  enableBuiltin,
  exitBuiltin,
  createHelpBuiltin(() => [...builtins.values()]),
  setBuiltin,
  shoptBuiltin,
]) {
  builtins.set(builtin.name, builtin);
}

export const BUILTINS: ReadonlyMap<string, Builtin> = builtins;

export function runCommand(words: ReadonlyArray<string>, session: Session): CommandResult {
  const out = new CommandOutput();

  let index = 0;
  for (; index < words.length; index++) {
    const match = ASSIGNMENT.exec(words[index] ?? '');
    if (match === null) break;
    const [, name = '', value = ''] = match;
    const assigned = session.variables.assign(name, value);
    if (!assigned.ok) {
      out.fail(1, `${name}: readonly variable`);
      return out.result();
    }
  }

  const [name, ...args] = words.slice(index);
  if (name === undefined) return out.result();

  const builtin = builtins.get(name);
  if (builtin !== undefined) {
    out.merge(builtin.run(args, session));
    return out.result();
  }

  const entry = session.loader.findCommand(name);
  if (entry !== undefined) {
    out.merge(entry.command.run(args, session.context()));
    return out.result();
  }

  out.merge({ status: NOT_FOUND_STATUS, stdout: [], stderr: [`${name}: command not found`] });
  return out.result();
}
