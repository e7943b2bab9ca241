/**
 * Switchboard Kernel - Error Classes
 *
 * Outcomes cover every expected failure. Exceptions are reserved for
 * programming errors that would otherwise leave the registry inconsistent.
 */

/**
 * Thrown when the registry detects a descriptor whose keys disagree about
 * its identity (e.g. its name maps to it but its letter does not).
 */
export class InternalConsistencyError extends Error {
  constructor(detail: string) {
    super(`Option registry consistency violation: ${detail}`);
    this.name = 'InternalConsistencyError';
  }
}
