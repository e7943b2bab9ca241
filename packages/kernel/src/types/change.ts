/**
 * Switchboard Kernel - Option Change Event
 *
 * Every write attempted through the ValueAccessor is recorded as one
 * OptionChangeEvent, whatever its outcome. Rejected writes are logged as
 * well: the log answers both "what changed" and "what was refused".
 */

import type { AccessClass } from './access.js';
import type { OptionValue } from './option.js';
import type { Outcome } from './outcome.js';

export interface OptionChangeEvent {
  /** Long name of the option, or null for letter-only options. */
  readonly option: string | null;
  /** Letter alias, or null. */
  readonly letter: string | null;
  readonly access: AccessClass;
  readonly requested: OptionValue;
  /** Value read (with the same access class) before the write. */
  readonly previous: OptionValue;
  readonly outcome: Outcome;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}
