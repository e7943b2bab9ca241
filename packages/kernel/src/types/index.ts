/**
 * Switchboard Kernel - Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file beyond the small helpers defined next to
 * their types.
 */

export type { OptionFilter } from './access.js';
export {
  ACCESS_RANK,
  AccessClass,
  AccessRank,
  hiddenFilterFor,
  isHiddenFrom,
  isPrivilegedAccess,
  isStartupAccess,
  outranks,
} from './access.js';

export type { OptionChangeEvent } from './change.js';

export type { MirrorRefresher } from './mirror.js';
export { ALL_MIRRORS, Mirror, mirrorsOf, participatesIn } from './mirror.js';

export type {
  OptionCell,
  OptionDescriptor,
  OptionFlags,
  OptionHooks,
  OptionInit,
  OptionValue,
} from './option.js';
export {
  LETTER_TABLE_SIZE,
  NO_FLAGS,
  OPTION_INVALID_VALUE,
  OPTION_VALUE_UNSET,
  defineOption,
  isValidLetter,
  isValidOptionName,
  optionLabel,
  toOptionValue,
} from './option.js';

export {
  ExitStatus,
  Outcome,
  describeOutcome,
  isBadOutcome,
  isGoodOutcome,
  outcomeToExitStatus,
} from './outcome.js';
