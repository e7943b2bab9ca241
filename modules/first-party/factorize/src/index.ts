/**
 * @switchboard/module-factorize
 *
 * Switchboard first-party example extension: prime testing options, the
 * PRIME_CANDIDATE / PRIME_DIVISOR variables and the is_prime command.
 */

export { FACTORIZE_EXTENSION_ID, INITIAL_CANDIDATE, createFactorizeExtension } from './manifest.js';
export { PRIME_CANDIDATE, PRIME_DIVISOR, createIsPrimeCommand } from './command.js';
export type { FactorizeOptions } from './command.js';
export { isPrime, parseCandidate, primeFactors, smallestFactor } from './factor.js';
export type { FactorTrace, ParsedNumber } from './factor.js';
