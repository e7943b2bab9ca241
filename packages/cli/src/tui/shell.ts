/**
 * shell.ts: the interactive switchboard prompt.
 *
 * Lines typed at the prompt run through Session.execute(); their output is
 * appended to stdout, diagnostics in red. Two lines are handled here rather
 * than by the session: `help` prints the coloured overview, and
 * `/option-view` (or `/ov`) hands the terminal to the Ink option view
 * until it exits.
 *
 * readline owns stdin in raw mode except while the option view is mounted.
 */

import * as readline from 'readline'
import React from 'react'
import { render } from 'ink'
import type { CommandResult } from '@switchboard/extension-loader'
import type { Session } from '../session/session.js'
import { renderHeader } from './output/header.js'
import { renderHelp } from './output/help.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'
import type { OptionViewProps } from './option-view/OptionView.js'

// OptionView is imported on first use.
type OptionViewCtor = React.ComponentType<OptionViewProps>

function printResult(result: CommandResult): void {
  for (const line of result.stdout) {
    process.stdout.write(line + '\n')
  }
  for (const line of result.stderr) {
    process.stdout.write(t.red(line) + '\n')
  }
}

function mountOptionView(rl: readline.Interface, session: Session, showPrompt: () => void): void {
  // Ink sets and clears raw mode itself; readline only has to stop reading.
  rl.pause()

  // Ink unrefs stdin on unmount. Without another handle the process could
  // exit before waitUntilExit() resolves.
  const keepAlive = setInterval(() => undefined, 60_000)

  const restore = (): void => {
    process.stdin.ref()
    clearInterval(keepAlive)
    process.stdin.setRawMode(true)
    rl.resume()
    showPrompt()
  }

  import('./option-view/OptionView.js')
    .then(mod => {
      const OptionView: OptionViewCtor = mod.OptionView

      // The view calls useApp().exit() on q or Escape.
      const { waitUntilExit } = render(React.createElement(OptionView, { session }))

      waitUntilExit().then(restore).catch(restore)
    })
    .catch(err => {
      process.stdout.write('\n  ' + t.red('option view error: ' + String(err)) + '\n')
      restore()
    })
}

/**
 * launchShell: entry point for the interactive TTY shell.
 *
 * Called from the root command when stdin and stdout are a TTY, no `-c`
 * was given and SWITCHBOARD_NO_TUI is not set. Resolves when the session
 * exits; the caller turns exitRequested into the process exit code.
 */
export function launchShell(session: Session): Promise<void> {
  // 1. Print startup header
  renderHeader(session)

  // 2. Set up readline in raw mode.
  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 50,
  })
  process.stdin.setRawMode(true)

  // The prompt carries `$-` and the last status, so it is rebuilt after
  // every command. It is written directly: rl.prompt() redraws the line and
  // loses track of the cursor after output from outside readline.
  const showPrompt = (): void => {
    const ps1 = buildPS1(session.flags(), session.lastStatus)
    rl.setPrompt(ps1)
    process.stdout.write('\n' + ps1)
  }

  showPrompt()

  return new Promise<void>(resolve => {
    rl.on('close', () => resolve())

    // 3. Command routing
    rl.on('line', (line: string) => {
      const input = line.trim()

      if (input === '/option-view' || input === '/ov') {
        // The prompt comes back when the view is dismissed.
        mountOptionView(rl, session, showPrompt)
        return
      }

      if (input === 'help') {
        renderHelp(session)
        showPrompt()
        return
      }

      for (const result of session.execute(input)) {
        printResult(result)
      }

      if (session.exitRequested !== undefined) {
        rl.close()
        return
      }
      showPrompt()
    })

    // 4. Ctrl+C ends the session with the last status
    rl.on('SIGINT', () => {
      process.stdout.write('\n')
      session.requestExit(session.lastStatus)
      rl.close()
    })
  })
}
