import { t } from './theme.js'

/**
 * buildPS1: the interactive prompt.
 *
 *   [switchboard:Bhimsx] ❯        after a successful command
 *   [switchboard:Bhimsx] 2 ❯      after one that failed with status 2
 *
 * The second field is `$-`, so the prompt tracks the lettered options.
 */
export function buildPS1(flags: string, lastStatus = 0): string {
  const frame  = t.blueDim
  const status = lastStatus === 0 ? '' : ' ' + t.red(String(lastStatus))

  return (
    frame('[') +
    t.blue.bold('switchboard') +
    frame(':') +
    t.amber(flags === '' ? '-' : flags) +
    frame(']') +
    status +
    frame(' ❯ ')
  )
}
