/**
 * Switchboard Kernel - Access Classification
 *
 * Every read or write of an option is tagged with the reason it is being
 * attempted. The tag serves two purposes:
 *
 * - a visibility filter when options are enumerated or displayed
 *   (e.g. `set -o` does not list options hidden from the long-option surface);
 * - a policy key handed to the value accessor and to option hooks
 *   (e.g. a read-only option may still be restored during scope unwinding).
 *
 * Access classes form a partial order by rank:
 *
 *   user (Short, SetO, Shopt) < startup (Argv, Environ) < privileged (Unwind, Reinit, Unload, Any)
 *
 * Classes of equal rank are not comparable for policy purposes.
 */

import type { OptionDescriptor } from './option.js';

// ---------------------------------------------------------------------------
// Access Class
// ---------------------------------------------------------------------------

/**
 * Why a read or write of an option is being attempted.
 */
export enum AccessClass {
  /** `set -X` / `set +X` (single-letter flag). */
  Short = 'short',
  /** `set -o NAME` / `set +o NAME`. */
  SetO = 'set_o',
  /** `shopt -s NAME` / `shopt -u NAME`. */
  Shopt = 'shopt',
  /** Parsed from the command line when the interpreter starts. */
  Argv = 'argv',
  /** Imported from an inherited environment mirror at startup. */
  Environ = 'environ',
  /** Restored automatically while a scope unwinds. */
  Unwind = 'unwind',
  /** Full reinitialization back to defaults. */
  Reinit = 'reinit',
  /** Extension unload. */
  Unload = 'unload',
  /** Unrestricted access; hides nothing and bypasses every restriction. */
  Any = 'any',
}

/** The three policy tiers of the access partial order. */
export enum AccessRank {
  User = 0,
  Startup = 1,
  Privileged = 2,
}

/**
 * Rank of each access class.
 * Use this map (through the helpers below) rather than comparing classes directly.
 */
export const ACCESS_RANK: Readonly<Record<AccessClass, AccessRank>> = {
  [AccessClass.Short]: AccessRank.User,
  [AccessClass.SetO]: AccessRank.User,
  [AccessClass.Shopt]: AccessRank.User,
  [AccessClass.Argv]: AccessRank.Startup,
  [AccessClass.Environ]: AccessRank.Startup,
  [AccessClass.Unwind]: AccessRank.Privileged,
  [AccessClass.Reinit]: AccessRank.Privileged,
  [AccessClass.Unload]: AccessRank.Privileged,
  [AccessClass.Any]: AccessRank.Privileged,
} as const;

/** True for unwind, reinit, unload and unrestricted access. */
export function isPrivilegedAccess(access: AccessClass): boolean {
  return ACCESS_RANK[access] === AccessRank.Privileged;
}

/**
 * True for startup-derived access (argv, environment) and for every
 * privileged class, which outranks startup.
 */
export function isStartupAccess(access: AccessClass): boolean {
  return ACCESS_RANK[access] >= AccessRank.Startup;
}

/** True if `a` strictly outranks `b`. */
export function outranks(a: AccessClass, b: AccessClass): boolean {
  return ACCESS_RANK[a] > ACCESS_RANK[b];
}

// ---------------------------------------------------------------------------
// Visibility
// ---------------------------------------------------------------------------

/**
 * A predicate that returns true when a descriptor should be skipped.
 */
export type OptionFilter = (option: OptionDescriptor) => boolean;

const hideForShort: OptionFilter = (d) => d.letter === undefined;
const hideForSetO: OptionFilter = (d) => d.flags.hideSetO;
const hideForShopt: OptionFilter = (d) => d.flags.hideShopt;

/**
 * Return the visibility filter for an access class, or undefined when the
 * class hides nothing.
 *
 * Visibility only governs enumeration and display. Lookup by name or letter
 * is never filtered.
 */
export function hiddenFilterFor(access: AccessClass): OptionFilter | undefined {
  switch (access) {
    case AccessClass.Short:
      return hideForShort;
    case AccessClass.SetO:
      return hideForSetO;
    case AccessClass.Shopt:
      return hideForShopt;
    default:
      return undefined;
  }
}

/** True if `option` is hidden from enumeration under `access`. */
export function isHiddenFrom(option: OptionDescriptor, access: AccessClass): boolean {
  return hiddenFilterFor(access)?.(option) ?? false;
}
