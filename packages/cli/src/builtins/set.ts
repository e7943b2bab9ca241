/**
 * Switchboard CLI - set
 *
 *   set                  print every variable as NAME=value
 *   set -X / set +X      turn a lettered option on / off (letters group: -eu)
 *   set -o NAME          turn a named option on (+o turns it off)
 *   set -o / set +o      list options, as a table / as re-runnable commands
 *   set -- ARG ...       set the positional parameters
 *
 * Processing stops at the first rejected option; options already applied
 * stay applied.
 */

import {
  AccessClass,
  DisplayStyle,
  ExitStatus,
  Outcome,
  describeOutcome,
  isBadOutcome,
  outcomeToExitStatus,
  toOptionValue,
} from '@switchboard/kernel';
import type { Session } from '../session/session.js';
import { CommandOutput, usageLine, type Builtin } from './output.js';
import { shellQuote } from './quote.js';

function usage(session: Session): string {
  return `set [-${session.system.letters()}] [-o option-name] [--] [arg ...]`;
}

function listVariables(session: Session, out: CommandOutput): void {
  for (const [name, view] of session.variables.list()) {
    out.print(`${name}=${shellQuote(view.value)}`);
  }
}

/** `set -` turns off tracing and verbose mode. */
function resetTracing(session: Session): void {
  for (const letter of ['x', 'v']) {
    session.system.writeByLetter(letter, AccessClass.Short, 0);
  }
}

function isOptionName(word: string): boolean {
  const first = word.charAt(0);
  return word !== '' && first !== '-' && first !== '+';
}

export const setBuiltin: Builtin = {
  name: 'set',
  usage: 'set [-abefhkmnptuvxBCEHPT] [-o option-name] [--] [arg ...]',
  description: 'Set or unset shell options and positional parameters.',
  run(args, session) {
    const out = new CommandOutput();
    const { system } = session;

    if (args.length === 0) {
      listVariables(session, out);
      return out.result();
    }

    let index = 0;
    let positional: ReadonlyArray<string> | undefined;

    while (index < args.length) {
      const word = args[index] ?? '';
      if (word === '--') {
        positional = args.slice(index + 1);
        break;
      }
      if (word === '-') {
        resetTracing(session);
        positional = args.slice(index + 1);
        break;
      }
      const sign = word.charAt(0);
      if ((sign !== '-' && sign !== '+') || word.length < 2) {
        positional = args.slice(index);
        break;
      }
      index++;

      const value = toOptionValue(sign === '-');
      for (const letter of word.slice(1)) {
        if (letter === 'o') {
          const name = args[index];
          // An option word after -o is not a name: list, then parse it as flags.
          if (name === undefined || !isOptionName(name)) {
            out.print(
              ...(sign === '-'
                ? system.list(AccessClass.SetO, DisplayStyle.OnOff)
                : system.list(AccessClass.SetO, DisplayStyle.SetO)),
            );
            continue;
          }
          index++;
          const outcome = system.writeByName(name, AccessClass.SetO, value);
          if (isBadOutcome(outcome)) {
            out.fail(outcomeToExitStatus(outcome), `set: ${name}: ${describeOutcome(outcome)}`);
            return out.result();
          }
          continue;
        }

        const outcome = system.writeByLetter(letter, AccessClass.Short, value);
        if (outcome === Outcome.NotFound) {
          out.fail(
            ExitStatus.BadUsage,
            `set: ${sign}${letter}: invalid option`,
            usageLine('set', usage(session)),
          );
          return out.result();
        }
        if (isBadOutcome(outcome)) {
          out.fail(outcomeToExitStatus(outcome), `set: ${sign}${letter}: ${describeOutcome(outcome)}`);
          return out.result();
        }
      }
    }

    if (positional !== undefined) session.positional = positional;
    return out.result();
  },
};
