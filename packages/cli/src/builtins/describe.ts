/**
 * Switchboard CLI - describe
 *
 *   describe [-1|-2|-3] NAME ...
 *
 * Prints the help display of each option. A single character that is not
 * an option name is looked up as a letter. The digit picks the detail
 * level; the default is the full display with usage recipes.
 */

import { DisplayStyle, ExitStatus, Outcome, describeOutcome, outcomeToExitStatus } from '@switchboard/kernel';
import { getopt, getoptDiagnostic } from './getopt.js';
import { CommandOutput, usageLine, type Builtin } from './output.js';

const USAGE = 'describe [-1|-2|-3] NAME ...';

function styleFor(flags: ReadonlyMap<string, string | true>): DisplayStyle {
  if (flags.has('1')) return DisplayStyle.Help1;
  if (flags.has('2')) return DisplayStyle.Help2;
  return DisplayStyle.Help3;
}

export const describeBuiltin: Builtin = {
  name: 'describe',
  usage: USAGE,
  description: 'Describe options and how to query or change them.',
  run(args, session) {
    const out = new CommandOutput();
    const parsed = getopt(args, '123');
    if (!parsed.ok || parsed.operands.length === 0) {
      out.fail(
        ExitStatus.BadUsage,
        ...(parsed.ok ? [] : [getoptDiagnostic('describe', parsed)]),
        usageLine('describe', USAGE),
      );
      return out.result();
    }

    const style = styleFor(parsed.flags);
    for (const name of parsed.operands) {
      const option =
        session.system.findByName(name) ??
        (name.length === 1 ? session.system.findByLetter(name) : undefined);
      if (option === undefined) {
        out.fail(
          outcomeToExitStatus(Outcome.NotFound),
          `describe: ${name}: ${describeOutcome(Outcome.NotFound)}`,
        );
        continue;
      }
      out.print(...session.system.describe(option, style));
    }
    return out.result();
  },
};
