import { AccessClass, Mirror } from '@switchboard/kernel'
import type { Session } from '../../session/session.js'
import { t } from '../theme.js'

/**
 * One switch per lettered option, lit when the option is on. The strip is
 * the same `$-` the prompt shows, drawn as a patch bay.
 */
function switchStrip(session: Session): [string, string, string] {
  const letters = [...session.system.letters()]
  const cells = letters.map(letter => {
    const on = session.system.read(session.system.findByLetter(letter), AccessClass.Short) > 0
    return on ? t.green('●') : t.dim('○')
  })
  return [
    t.blueDim('┌' + letters.map(() => '─').join('┬') + '┐'),
    t.blueDim('│') + cells.join(t.blueDim('│')) + t.blueDim('│'),
    t.blueDim('└') + letters.map(letter => t.muted(letter)).join(t.blueDim('┴')) + t.blueDim('┘'),
  ]
}

/**
 * renderHeader: print the startup banner.
 *
 * Three parts:
 *   1. Switch strip + wordmark + tagline (brand block)
 *   2. Separator line
 *   3. Session summary: option and extension counts, `$-`, startup warnings
 */
export function renderHeader(session: Session): void {

  // ── Part 1: Brand block ──────────────────────────────────────────────────

  const [top, middle, bottom] = switchStrip(session)
  process.stdout.write('\n')
  process.stdout.write('  ' + top + '\n')
  process.stdout.write('  ' + middle + '   ' + t.blue.bold('S W I T C H B O A R D') + '\n')
  process.stdout.write('  ' + bottom + '   ' + t.muted('Shell Option Registry') + '\n')

  // ── Part 2: Separator ────────────────────────────────────────────────────

  process.stdout.write('\n')
  process.stdout.write('  ' + t.dim('─'.repeat(60)) + '\n')
  process.stdout.write('\n')

  // ── Part 3: Session summary ──────────────────────────────────────────────

  const setOpts  = (session.variables.get(Mirror.ShellOpts) ?? '').split(':').filter(s => s !== '')
  const bashOpts = (session.variables.get(Mirror.BashOpts) ?? '').split(':').filter(s => s !== '')

  const line1 = (
    '  ' +
    t.muted('options') + ' ' + t.text(String(session.system.registry.size)) +
    '  ' + t.dim('·') +
    '  ' + t.muted('extensions') + ' ' + t.text(String(session.loader.list().length)) +
    '  ' + t.dim('·') +
    '  ' + t.muted('$-') + ' ' + t.amber(session.flags())
  )
  const line2 = (
    '  ' +
    t.dim('  SHELLOPTS ') + t.green(String(setOpts.length)) +
    t.dim(' on  ·  BASHOPTS ') + t.green(String(bashOpts.length)) +
    t.dim(' on')
  )
  process.stdout.write(line1 + '\n')
  process.stdout.write(line2 + '\n')

  for (const warning of [...session.warnings, ...session.startupErrors]) {
    process.stdout.write('  ' + t.amber('! ') + t.muted(warning) + '\n')
  }

  process.stdout.write('\n')
}
