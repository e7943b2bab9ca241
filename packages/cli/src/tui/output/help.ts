import type { Session } from '../../session/session.js'
import { BUILTINS } from '../../builtins/index.js'
import { t } from '../theme.js'

/**
 * renderHelp: print the shell commands grouped by category.
 */
export function renderHelp(session: Session): void {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 34 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('builtins')
  for (const builtin of BUILTINS.values()) {
    out += cmd(builtin.usage, builtin.description)
  }

  const commands = session.loader.list().flatMap(manifest => manifest.commands)
  if (commands.length > 0) {
    out += section('extensions')
    for (const command of commands) {
      out += cmd(command.usage, command.description)
    }
  }

  out += section('navigation')
  out += cmd('/option-view  /ov', 'open full-screen option view (Ink view)')

  out += section('system')
  out += cmd('help NAME', 'show one command')
  out += cmd('exit  Ctrl+C', 'exit')

  process.stdout.write(out)
}
