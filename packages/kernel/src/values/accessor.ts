/**
 * Switchboard Kernel - Value Accessor
 *
 * Reads and writes option values under an access class, enforcing the
 * restriction flags and dispatching to option hooks.
 *
 * Write order for descriptors without a write hook:
 *
 *   1. readOnly     -> ReadOnly unless the access class is privileged
 *   2. forbidChange -> Unchanged (same value), Ignored (ignoreChange) or
 *                      Forbidden, unless the access class is startup or above
 *   3. ignoreChange -> Ignored
 *   4. value check  -> BadValue for anything but a non-negative integer
 *   5. storage      -> ReadOnly when there is no cell, else Changed
 *
 * A write hook replaces all five steps. Mirrors are refreshed only when the
 * stored value actually changed (or the hook reports Changed).
 *
 * readOption() and writeOption() are plain functions so that the mirror
 * synchronizer can use them without a ValueAccessor of its own.
 */

import { isPrivilegedAccess, isStartupAccess } from '../types/access.js';
import type { AccessClass } from '../types/access.js';
import type { OptionChangeEvent } from '../types/change.js';
import type { ChangeLogger } from '../logging/change-log.js';
import { mirrorsOf } from '../types/mirror.js';
import type { MirrorRefresher } from '../types/mirror.js';
import { OPTION_INVALID_VALUE } from '../types/option.js';
import type { OptionDescriptor, OptionValue } from '../types/option.js';
import { Outcome } from '../types/outcome.js';

// ---------------------------------------------------------------------------
// Primitive operations
// ---------------------------------------------------------------------------

/**
 * Read the current value of an option.
 *
 * @returns the hook's value, else the stored value, else OPTION_INVALID_VALUE
 *   (also for a missing descriptor).
 */
export function readOption(
  option: OptionDescriptor | undefined,
  access: AccessClass,
): OptionValue {
  if (option === undefined) return OPTION_INVALID_VALUE;
  const read = option.hooks?.read;
  if (read !== undefined) return read(option, access);
  return option.storage?.value ?? OPTION_INVALID_VALUE;
}

/** True if `value` may be stored directly in an option cell. */
export function isStorableValue(value: OptionValue): boolean {
  return Number.isInteger(value) && value >= 0;
}

function refreshMirrors(option: OptionDescriptor, refresher: MirrorRefresher | undefined): void {
  if (refresher === undefined) return;
  for (const mirror of mirrorsOf(option)) {
    refresher.refresh(mirror);
  }
}

/**
 * Write an option value under an access class.
 *
 * @param refresher - Receives a refresh request for every mirror the option
 *   participates in, after an effective change.
 */
export function writeOption(
  option: OptionDescriptor | undefined,
  access: AccessClass,
  value: OptionValue,
  refresher?: MirrorRefresher,
): Outcome {
  if (option === undefined) return Outcome.NotFound;

  const write = option.hooks?.write;
  if (write !== undefined) {
    const outcome = write(option, access, value);
    if (outcome === Outcome.Changed) refreshMirrors(option, refresher);
    return outcome;
  }

  const { flags } = option;
  if (flags.readOnly && !isPrivilegedAccess(access)) {
    return Outcome.ReadOnly;
  }
  if (flags.forbidChange && !isStartupAccess(access)) {
    if (readOption(option, access) === value) return Outcome.Unchanged;
    return flags.ignoreChange ? Outcome.Ignored : Outcome.Forbidden;
  }
  if (flags.ignoreChange) {
    return Outcome.Ignored;
  }

  if (!isStorableValue(value)) return Outcome.BadValue;

  const cell = option.storage;
  if (cell === undefined) return Outcome.ReadOnly;

  const previous = cell.value;
  cell.value = value;
  if (previous !== value) refreshMirrors(option, refresher);
  return Outcome.Changed;
}

// ---------------------------------------------------------------------------
// ValueAccessor
// ---------------------------------------------------------------------------

export interface ValueAccessorOptions {
  readonly refresher?: MirrorRefresher | undefined;
  readonly logger?: ChangeLogger | undefined;
  /** Clock for event timestamps. Defaults to the wall clock. */
  readonly now?: (() => Date) | undefined;
}

export interface WriteOptions {
  /**
   * Request mirror refreshes after an effective change (default true).
   * The synchronizer turns this off while it imports a mirror.
   */
  readonly refresh?: boolean | undefined;
}

/**
 * readOption()/writeOption() bound to a mirror refresher and a change logger.
 * Every write attempt is logged, including refused ones.
 */
export class ValueAccessor {
  constructor(private readonly options: ValueAccessorOptions = {}) {}

  read(option: OptionDescriptor | undefined, access: AccessClass): OptionValue {
    return readOption(option, access);
  }

  write(
    option: OptionDescriptor | undefined,
    access: AccessClass,
    value: OptionValue,
    writeOptions: WriteOptions = {},
  ): Outcome {
    const previous = readOption(option, access);
    const refresher = (writeOptions.refresh ?? true) ? this.options.refresher : undefined;
    const outcome = writeOption(option, access, value, refresher);

    const logger = this.options.logger;
    if (logger !== undefined) {
      const event: OptionChangeEvent = {
        option: option?.name ?? null,
        letter: option?.letter ?? null,
        access,
        requested: value,
        previous,
        outcome,
        timestamp: (this.options.now?.() ?? new Date()).toISOString(),
      };
      logger.record(event);
    }
    return outcome;
  }
}
