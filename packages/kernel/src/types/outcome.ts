/**
 * Switchboard Kernel - Outcome Types
 *
 * Every registry mutation and every option write produces an Outcome.
 * Outcomes are values, never exceptions. A single predicate,
 * isGoodOutcome(), separates the outcomes that count as success from the
 * ones that must be reported to the user; builtins never test individual
 * outcomes to decide their exit status.
 */

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/**
 * The closed set of results of registry and value operations.
 */
export enum Outcome {
  /** The value (or the registry) was updated. */
  Changed = 'Changed',
  /** The requested value equals the current one, or the entry is already registered. */
  Unchanged = 'Unchanged',
  /** The write was silently discarded (ignore-changes option). */
  Ignored = 'Ignored',
  /** No descriptor exists for the requested name or letter. */
  NotFound = 'NotFound',
  /** The option can only be changed under a privileged access class. */
  ReadOnly = 'ReadOnly',
  /** Policy or a hook rejected a genuinely different value. */
  Forbidden = 'Forbidden',
  /** A hook (or the accessor) rejected the value as malformed. */
  BadValue = 'BadValue',
  /** Registration conflicts with an entry owned by a different descriptor. */
  Duplicate = 'Duplicate',
}

const GOOD_OUTCOMES: ReadonlySet<Outcome> = new Set([
  Outcome.Changed,
  Outcome.Unchanged,
  Outcome.Ignored,
]);

/** True for Changed, Unchanged and Ignored. */
export function isGoodOutcome(outcome: Outcome): boolean {
  return GOOD_OUTCOMES.has(outcome);
}

/** Negation of isGoodOutcome(). */
export function isBadOutcome(outcome: Outcome): boolean {
  return !GOOD_OUTCOMES.has(outcome);
}

// ---------------------------------------------------------------------------
// Exit Status
// ---------------------------------------------------------------------------

/**
 * Exit statuses produced by the option builtins.
 */
export enum ExitStatus {
  Success = 0,
  /** Read-only, forbidden or malformed assignment. */
  BadAssign = 1,
  /** Unknown option or malformed command usage. */
  BadUsage = 2,
  /** Internal error (registration conflict reaching a user command). */
  Internal = 70,
}

const OUTCOME_EXIT_STATUS: Readonly<Record<Outcome, ExitStatus>> = {
  [Outcome.Changed]: ExitStatus.Success,
  [Outcome.Unchanged]: ExitStatus.Success,
  [Outcome.Ignored]: ExitStatus.Success,
  [Outcome.NotFound]: ExitStatus.BadUsage,
  [Outcome.ReadOnly]: ExitStatus.BadAssign,
  [Outcome.Forbidden]: ExitStatus.BadAssign,
  [Outcome.BadValue]: ExitStatus.BadAssign,
  [Outcome.Duplicate]: ExitStatus.Internal,
};

/** Map an outcome to the exit status a user-facing command reports. */
export function outcomeToExitStatus(outcome: Outcome): ExitStatus {
  return OUTCOME_EXIT_STATUS[outcome];
}

/**
 * Short human-readable reason for a bad outcome, used in diagnostics of the
 * form `<command>: <option>: <reason>`.
 */
export function describeOutcome(outcome: Outcome): string {
  switch (outcome) {
    case Outcome.NotFound:
      return 'invalid option name';
    case Outcome.ReadOnly:
      return 'read-only option';
    case Outcome.Forbidden:
      return 'cannot be changed after startup';
    case Outcome.BadValue:
      return 'invalid option value';
    case Outcome.Duplicate:
      return 'conflicts with a registered option';
    case Outcome.Changed:
      return 'changed';
    case Outcome.Unchanged:
      return 'unchanged';
    case Outcome.Ignored:
      return 'ignored';
  }
}
