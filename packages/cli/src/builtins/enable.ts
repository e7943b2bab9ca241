/**
 * Switchboard CLI - enable
 *
 *   enable              list loaded extensions
 *   enable -a           list every known extension, marking unloaded ones -n
 *   enable -f NAME      load an extension from the catalog
 *   enable -d NAME      unload a loaded extension
 */

import { ExitStatus } from '@switchboard/kernel';
import { getopt, getoptDiagnostic } from './getopt.js';
import { CommandOutput, formatFailure, usageLine, type Builtin } from './output.js';

const USAGE = 'enable [-a] [-f NAME | -d NAME]';

export const enableBuiltin: Builtin = {
  name: 'enable',
  usage: USAGE,
  description: 'Load, unload and list extensions.',
  run(args, session) {
    const out = new CommandOutput();
    const parsed = getopt(args, 'af:d:');
    if (!parsed.ok) {
      out.fail(ExitStatus.BadUsage, getoptDiagnostic('enable', parsed), usageLine('enable', USAGE));
      return out.result();
    }

    const { flags, operands } = parsed;
    const load = flags.get('f');
    const unload = flags.get('d');
    if ((load !== undefined && unload !== undefined) || operands.length > 0) {
      out.fail(ExitStatus.BadUsage, usageLine('enable', USAGE));
      return out.result();
    }

    if (typeof load === 'string') {
      const result = session.loadExtension(load);
      if (!result.ok) out.fail(ExitStatus.BadAssign, `enable: ${load}: ${formatFailure(result)}`);
      return out.result();
    }
    if (typeof unload === 'string') {
      const result = session.unloadExtension(unload);
      if (!result.ok) out.fail(ExitStatus.BadAssign, `enable: ${unload}: ${formatFailure(result)}`);
      return out.result();
    }

    for (const manifest of session.loader.list()) {
      out.print(`enable ${manifest.extension_id}`);
    }
    if (flags.has('a')) {
      for (const id of [...session.extensions.keys()].sort()) {
        if (!session.loader.isLoaded(id)) out.print(`enable -n ${id}`);
      }
    }
    return out.result();
  },
};
