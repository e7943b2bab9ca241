/**
 * Switchboard CLI - exit
 *
 *   exit [n]
 *
 * Ends the session with status n (taken modulo 256), or with the status of
 * the last command.
 */

import { ExitStatus } from '@switchboard/kernel';
import { CommandOutput, type Builtin } from './output.js';

export const exitBuiltin: Builtin = {
  name: 'exit',
  usage: 'exit [n]',
  description: 'Exit the shell.',
  run(args, session) {
    const out = new CommandOutput();
    const word = args[0];
    if (word === undefined) {
      session.requestExit(session.lastStatus);
      return out.result();
    }
    if (!/^-?\d+$/.test(word)) {
      out.fail(ExitStatus.BadUsage, `exit: ${word}: numeric argument required`);
      session.requestExit(ExitStatus.BadUsage);
      return out.result();
    }
    session.requestExit(((Number.parseInt(word, 10) % 256) + 256) % 256);
    return out.result();
  },
};
