/**
 * Switchboard Kernel - Single-Letter Flags
 *
 * Helpers for the `set -X` / `set +X` surface and the `$-` special
 * parameter. A flag character is `-` (on) or `+` (off), the reverse of what
 * one might expect, matching `set` usage.
 */

import { AccessClass } from '../types/access.js';
import { toOptionValue } from '../types/option.js';
import type { OptionValue } from '../types/option.js';
import { isGoodOutcome } from '../types/outcome.js';
import type { OptionSystem } from '../system.js';

export const FLAG_ON = '-';
export const FLAG_OFF = '+';
export type FlagChar = typeof FLAG_ON | typeof FLAG_OFF;

/** Returned by changeFlag() when the flag is unknown or the write was refused. */
export const FLAG_ERROR = -1;

export function isValidFlag(flag: string): flag is FlagChar {
  return flag === FLAG_ON || flag === FLAG_OFF;
}

export function boolToFlag(enabled: boolean): FlagChar {
  return enabled ? FLAG_ON : FLAG_OFF;
}

export function flagToBool(flag: FlagChar): boolean {
  return flag === FLAG_ON;
}

/**
 * Turn the option with letter `letter` on (`-`) or off (`+`).
 *
 * @returns the value before the change, or FLAG_ERROR.
 */
export function changeFlag(system: OptionSystem, letter: string, flag: FlagChar): number {
  const option = system.findByLetter(letter);
  if (option === undefined) return FLAG_ERROR;

  const previous = system.read(option, AccessClass.Short);
  const outcome = system.write(option, AccessClass.Short, toOptionValue(flagToBool(flag)));
  return isGoodOutcome(outcome) ? previous : FLAG_ERROR;
}

export interface SetFlagExtras {
  /** A command string was given with `-c`. */
  readonly pendingCommand?: boolean | undefined;
  /** Commands are read from standard input. */
  readonly readFromStdin?: boolean | undefined;
}

/** The value of `$-`: enabled letters in ascending order, then `c` and `s`. */
export function whichSetFlags(system: OptionSystem, extras: SetFlagExtras = {}): string {
  let result = '';
  for (const letter of system.letters()) {
    if (system.read(system.findByLetter(letter), AccessClass.Short) > 0) result += letter;
  }
  if (extras.pendingCommand === true) result += 'c';
  if (extras.readFromStdin === true) result += 's';
  return result;
}

/** Saved values of every lettered option, keyed by letter. */
export type FlagSnapshot = ReadonlyMap<string, OptionValue>;

/** Capture every lettered option for later restoration on scope unwind. */
export function saveFlags(system: OptionSystem): FlagSnapshot {
  const snapshot = new Map<string, OptionValue>();
  for (const letter of system.letters()) {
    snapshot.set(letter, system.read(system.findByLetter(letter), AccessClass.Unwind));
  }
  return snapshot;
}

/**
 * Restore a snapshot taken by saveFlags(). Letters deregistered since the
 * snapshot are skipped.
 */
export function restoreFlags(system: OptionSystem, snapshot: FlagSnapshot): void {
  for (const [letter, value] of snapshot) {
    const option = system.findByLetter(letter);
    if (option === undefined) continue;
    system.write(option, AccessClass.Unwind, value);
  }
}
