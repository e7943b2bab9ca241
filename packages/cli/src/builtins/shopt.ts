/**
 * Switchboard CLI - shopt
 *
 *   shopt [-pqsu] [-o] [optname ...]
 *
 * `-s` enables and `-u` disables the named options. Without either, each
 * named option is printed and the status is 0 only when all of them are on;
 * `-q` suppresses the output. Without names the visible options are listed,
 * only enabled ones under `-s` and only disabled ones under `-u`. `-p`
 * prints re-runnable commands and `-o` switches to the `set -o` options.
 */

import {
  AccessClass,
  DisplayStyle,
  ExitStatus,
  Outcome,
  describeOutcome,
  isBadOutcome,
  outcomeToExitStatus,
  renderOption,
} from '@switchboard/kernel';
import { getopt, getoptDiagnostic } from './getopt.js';
import { CommandOutput, usageLine, type Builtin } from './output.js';

/** Status when a queried option is off. */
const OPTION_OFF = 1;

const USAGE = 'shopt [-pqsu] [-o] [optname ...]';

export const shoptBuiltin: Builtin = {
  name: 'shopt',
  usage: USAGE,
  description: 'Set and unset shell options.',
  run(args, session) {
    const out = new CommandOutput();
    const parsed = getopt(args, 'pqsuo');
    if (!parsed.ok) {
      out.fail(ExitStatus.BadUsage, getoptDiagnostic('shopt', parsed), usageLine('shopt', USAGE));
      return out.result();
    }

    const { flags, operands } = parsed;
    const enable = flags.has('s');
    const disable = flags.has('u');
    if (enable && disable) {
      out.fail(
        ExitStatus.BadUsage,
        'shopt: cannot set and unset shell options simultaneously',
        usageLine('shopt', USAGE),
      );
      return out.result();
    }

    const setO = flags.has('o');
    const access = setO ? AccessClass.SetO : AccessClass.Shopt;
    const style = flags.has('p') ? (setO ? DisplayStyle.SetO : DisplayStyle.Shopt) : DisplayStyle.OnOff;
    const quiet = flags.has('q');
    const { system } = session;

    if (operands.length === 0) {
      if (!quiet) {
        const hide = enable ? new Set([0]) : disable ? new Set([1]) : undefined;
        out.print(...system.list(access, style, hide));
      }
      return out.result();
    }

    for (const name of operands) {
      const option = system.findByName(name);

      if (enable || disable) {
        const outcome = system.write(option, access, enable ? 1 : 0);
        if (isBadOutcome(outcome)) {
          out.fail(outcomeToExitStatus(outcome), `shopt: ${name}: ${describeOutcome(outcome)}`);
        }
        continue;
      }

      if (option === undefined) {
        out.fail(
          outcomeToExitStatus(Outcome.NotFound),
          `shopt: ${name}: ${describeOutcome(Outcome.NotFound)}`,
        );
        continue;
      }
      if (!quiet) out.print(...renderOption(option, access, style));
      if (system.read(option, access) <= 0) out.fail(OPTION_OFF);
    }

    return out.result();
  },
};
