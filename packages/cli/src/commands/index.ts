/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/switchboard.ts
 */

import { program } from 'commander'
import { configCommand } from './config.js'
import { describeCommand } from './describe.js'
import { logCommand } from './log.js'
import { mirrorsCommand } from './mirrors.js'
import { runRoot } from './run.js'
import { collect, type GlobalOptions } from './runtime.js'

program
  .name('switchboard')
  .description(
    'Switchboard: shell option registry.\n' +
    'Runs set, shopt and extension commands with -c, from stdin, or in an interactive shell.',
  )
  .version('0.1.0')
  .option('-o, --set-option <name>', 'Turn on a set -o option at startup (repeatable)', collect, [])
  .option('-O, --shopt-option <name>', 'Turn on a shopt option at startup (repeatable)', collect, [])
  .option('--flags <letters>', 'Turn lettered options on, or off after a leading +')
  .option('--no-import-env', 'Ignore inherited SHELLOPTS and BASHOPTS')
  .option('--home <dir>', 'Use this directory as SWITCHBOARD_HOME')
  .option('-c <commands>', 'Run the commands and exit')
  .action(async () => {
    await runRoot(program.opts<GlobalOptions>())
  })

program.addCommand(describeCommand)
program.addCommand(mirrorsCommand)
program.addCommand(logCommand)
program.addCommand(configCommand)

export { program }
