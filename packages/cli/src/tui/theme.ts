import chalk, { type ChalkInstance } from 'chalk'
import { Outcome } from '@switchboard/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _outcomeColors: Record<Outcome, ChalkInstance> = {
  [Outcome.Changed]:   t.green,
  [Outcome.Unchanged]: t.muted,
  [Outcome.Ignored]:   t.amber,
  [Outcome.NotFound]:  t.red,
  [Outcome.ReadOnly]:  t.red,
  [Outcome.Forbidden]: t.red,
  [Outcome.BadValue]:  t.red,
  [Outcome.Duplicate]: t.red,
}

const isOutcome = (value: string): value is Outcome =>
  Object.values<string>(Outcome).includes(value)

/** Colour for an outcome name as read back from the change log. */
export const outcomeColor = (outcome: string): ChalkInstance =>
  isOutcome(outcome) ? _outcomeColors[outcome] : t.muted
