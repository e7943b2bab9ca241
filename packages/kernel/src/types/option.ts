/**
 * Switchboard Kernel - Option Descriptor Types
 *
 * An option descriptor is the immutable record describing one toggleable
 * setting: its long name and/or single-letter alias, the cell holding its
 * value, optional read/write hooks, its default, and the flags that decide
 * which surfaces see it and how writes are restricted.
 *
 * Descriptors are compared by identity. Registering the same object twice is
 * idempotent; registering a different object under a taken key is a conflict.
 */

import type { AccessClass } from './access.js';
import type { Outcome } from './outcome.js';

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** An option value. Toggles use 0 (off) and 1 (on). */
export type OptionValue = number;

/** Returned when reading a missing descriptor or one without storage. */
export const OPTION_INVALID_VALUE: OptionValue = -1;

/** Marks a value that has not been computed yet. */
export const OPTION_VALUE_UNSET: OptionValue = -2;

/** Convert a boolean to the canonical toggle value. */
export function toOptionValue(enabled: boolean): OptionValue {
  return enabled ? 1 : 0;
}

/** A mutable integer cell owned by exactly one descriptor. */
export interface OptionCell {
  value: OptionValue;
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

/**
 * Optional capability interface for options whose value is computed or whose
 * writes have side effects. A hook that is present fully owns the operation:
 * the accessor neither checks restriction flags nor touches storage.
 */
export interface OptionHooks {
  read?(option: OptionDescriptor, access: AccessClass): OptionValue;
  /**
   * Apply a write. Return Changed only when the value actually changed; the
   * accessor refreshes the environment mirrors on Changed and nothing else.
   */
  write?(option: OptionDescriptor, access: AccessClass, value: OptionValue): Outcome;
}

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

/**
 * Participation and restriction flags. Each flag is independently checkable.
 */
export interface OptionFlags {
  /** Hidden from `set -o` / `set +o` listings. */
  readonly hideSetO: boolean;
  /** Hidden from `shopt` listings. */
  readonly hideShopt: boolean;
  /** Mirrored into SHELLOPTS. */
  readonly shellopts: boolean;
  /** Mirrored into BASHOPTS. */
  readonly bashopts: boolean;
  /** Writes fail with ReadOnly unless the access class is privileged. */
  readonly readOnly: boolean;
  /** Changes fail with Forbidden outside startup and privileged access. */
  readonly forbidChange: boolean;
  /** Writes succeed with Ignored without changing the value. */
  readonly ignoreChange: boolean;
}

export const NO_FLAGS: OptionFlags = Object.freeze({
  hideSetO: false,
  hideShopt: false,
  shellopts: false,
  bashopts: false,
  readOnly: false,
  forbidChange: false,
  ignoreChange: false,
});

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

export interface OptionDescriptor {
  readonly name?: string | undefined;
  readonly letter?: string | undefined;
  readonly storage?: OptionCell | undefined;
  /** Value restored by bulk reset; never consulted by ordinary reads. */
  readonly defaultValue?: OptionValue | undefined;
  readonly hooks?: OptionHooks | undefined;
  readonly flags: OptionFlags;
  readonly help?: string | undefined;
}

/**
 * Input accepted by defineOption(). Flags default to false; `initial`
 * creates a fresh storage cell, `storage` shares an existing one.
 */
export interface OptionInit {
  readonly name?: string | undefined;
  readonly letter?: string | undefined;
  readonly initial?: OptionValue | undefined;
  readonly storage?: OptionCell | undefined;
  readonly defaultValue?: OptionValue | undefined;
  readonly hooks?: OptionHooks | undefined;
  readonly flags?: Partial<OptionFlags> | undefined;
  readonly help?: string | undefined;
}

/**
 * Build a frozen option descriptor.
 *
 * When neither `storage` nor `initial` is given and the descriptor has no
 * hooks, a cell initialised to `defaultValue` (or 0) is created, so plain
 * toggles need only a name and/or letter.
 *
 * @example
 * const noglob = defineOption({ name: 'noglob', letter: 'f', flags: { shellopts: true } });
 */
export function defineOption(init: OptionInit): OptionDescriptor {
  const needsCell = init.hooks === undefined || init.initial !== undefined;
  const storage: OptionCell | undefined =
    init.storage ??
    (needsCell ? { value: init.initial ?? init.defaultValue ?? 0 } : undefined);

  return Object.freeze({
    name: init.name,
    letter: init.letter,
    storage,
    defaultValue: init.defaultValue ?? init.initial,
    hooks: init.hooks,
    flags: Object.freeze({ ...NO_FLAGS, ...init.flags }),
    help: init.help,
  });
}

// ---------------------------------------------------------------------------
// Key validation
// ---------------------------------------------------------------------------

/** Size of the letter-indexed table: one slot per 7-bit character code. */
export const LETTER_TABLE_SIZE = 128;

const OPTION_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** A letter is exactly one printable 7-bit character other than space, `-` and `+`. */
export function isValidLetter(letter: string): boolean {
  if (letter.length !== 1) return false;
  const code = letter.charCodeAt(0);
  return code > 0x20 && code < 0x7f && letter !== '-' && letter !== '+';
}

/** Option names start with a letter or underscore and may contain `-`. */
export function isValidOptionName(name: string): boolean {
  return OPTION_NAME_PATTERN.test(name);
}

/**
 * Label used for an option in diagnostics and logs: its name, else `-X`.
 */
export function optionLabel(option: OptionDescriptor): string {
  if (option.name !== undefined) return option.name;
  if (option.letter !== undefined) return `-${option.letter}`;
  return '(unnamed)';
}
