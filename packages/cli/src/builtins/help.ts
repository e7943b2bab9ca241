/**
 * Switchboard CLI - help
 *
 *   help [name ...]
 *
 * Lists builtins, then the commands of loaded extensions. With names,
 * prints the usage and description of each.
 */

import type { CommandResult, ExtensionCommand } from '@switchboard/extension-loader';
import type { Session } from '../session/session.js';
import { CommandOutput, type Builtin } from './output.js';

type HelpTopic = Pick<Builtin | ExtensionCommand, 'name' | 'usage' | 'description'>;

function topics(builtins: ReadonlyArray<Builtin>, session: Session): HelpTopic[] {
  const commands = session.loader.list().flatMap((manifest) => manifest.commands);
  return [...builtins, ...commands];
}

export function createHelpBuiltin(builtins: () => ReadonlyArray<Builtin>): Builtin {
  return {
    name: 'help',
    usage: 'help [name ...]',
    description: 'Display information about builtin and extension commands.',
    run(args, session): CommandResult {
      const out = new CommandOutput();
      const all = topics(builtins(), session);

      if (args.length === 0) {
        for (const topic of all) out.print(topic.usage);
        return out.result();
      }
      for (const name of args) {
        const topic = all.find((candidate) => candidate.name === name);
        if (topic === undefined) {
          out.fail(1, `help: no help topics match '${name}'`);
          continue;
        }
        out.print(`${topic.name}: ${topic.usage}`, `    ${topic.description}`);
      }
      return out.result();
    },
  };
}
