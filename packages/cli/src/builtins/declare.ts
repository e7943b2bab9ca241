/**
 * Switchboard CLI - declare
 *
 *   declare -p [name ...]
 *
 * Prints variables with their attributes: `-r` read-only, `-x` inherited
 * from the environment. Only the printing form is supported.
 */

import { ExitStatus, type VariableView } from '@switchboard/kernel';
import { getopt, getoptDiagnostic } from './getopt.js';
import { CommandOutput, usageLine, type Builtin } from './output.js';
import { doubleQuote } from './quote.js';

const USAGE = 'declare -p [name ...]';

export function declareLine(name: string, view: VariableView): string {
  const attributes = `${view.readOnly ? 'r' : ''}${view.imported ? 'x' : ''}`;
  return `declare ${attributes === '' ? '--' : `-${attributes}`} ${name}=${doubleQuote(view.value)}`;
}

export const declareBuiltin: Builtin = {
  name: 'declare',
  usage: USAGE,
  description: 'Display variables and their attributes.',
  run(args, session) {
    const out = new CommandOutput();
    const parsed = getopt(args, 'p');
    if (!parsed.ok) {
      out.fail(ExitStatus.BadUsage, getoptDiagnostic('declare', parsed), usageLine('declare', USAGE));
      return out.result();
    }
    if (!parsed.flags.has('p') && parsed.operands.length > 0) {
      out.fail(ExitStatus.BadUsage, usageLine('declare', USAGE));
      return out.result();
    }

    if (parsed.operands.length === 0) {
      for (const [name, view] of session.variables.list()) out.print(declareLine(name, view));
      return out.result();
    }
    for (const name of parsed.operands) {
      const view = session.variables.lookup(name);
      if (view === undefined) {
        out.fail(ExitStatus.BadAssign, `declare: ${name}: not found`);
      } else {
        out.print(declareLine(name, view));
      }
    }
    return out.result();
  },
};
