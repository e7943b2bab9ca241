/**
 * Switchboard First-Party Factorize Module - Manifest
 *
 * An example loadable extension. It contributes three options, two
 * variables and the is_prime command, and removes all of them again when
 * it is unloaded with `enable -d factorize`. Both settable options start on.
 *
 *   auto_factorize     bare `is_prime` divides PRIME_CANDIDATE by its factor
 *   verbose_factorize  `is_prime` prints every trial division
 *   is_prime           read-only; on while $PRIME_CANDIDATE is prime
 */

import { defineOption, type OptionDescriptor, type VariableStore } from '@switchboard/kernel';
import type { ExtensionManifest } from '@switchboard/extension-loader';
import { PRIME_CANDIDATE, PRIME_DIVISOR, createIsPrimeCommand } from './command.js';
import { isPrime, parseCandidate } from './factor.js';

export const FACTORIZE_EXTENSION_ID = 'factorize';

/** Value PRIME_CANDIDATE starts with on load. */
export const INITIAL_CANDIDATE = '42';

interface BoundVariables {
  store: VariableStore | undefined;
}

function isPrimeOption(bound: BoundVariables): OptionDescriptor {
  return defineOption({
    name: 'is_prime',
    hooks: {
      read: () => {
        const raw = bound.store?.lookup(PRIME_CANDIDATE)?.value;
        if (raw === undefined) return 0;
        const candidate = parseCandidate(raw);
        return candidate.kind === 'integer' && isPrime(candidate.value) ? 1 : 0;
      },
    },
    flags: { readOnly: true, hideSetO: true, hideShopt: true },
    help: 'Set while the value of PRIME_CANDIDATE is a prime number.',
  });
}

/** Build a fresh manifest with its own option storage. */
export function createFactorizeExtension(): ExtensionManifest {
  const bound: BoundVariables = { store: undefined };

  const autoFactorize = defineOption({
    name: 'auto_factorize',
    initial: 1,
    flags: { bashopts: true, hideSetO: true },
    help: 'A bare is_prime divides PRIME_CANDIDATE by its smallest factor\nand stores the factor in PRIME_DIVISOR.',
  });
  const verboseFactorize = defineOption({
    name: 'verbose_factorize',
    initial: 1,
    flags: { bashopts: true, hideSetO: true },
    help: 'is_prime reports every trial division.',
  });

  return {
    extension_id: FACTORIZE_EXTENSION_ID,
    extension_name: 'Factorize',
    version: '0.1.0',
    description: 'Prime testing and factorization (example extension).',
    builtin: false,
    options: [autoFactorize, isPrimeOption(bound), verboseFactorize],
    variables: [
      { name: PRIME_CANDIDATE, value: INITIAL_CANDIDATE },
      { name: PRIME_DIVISOR, value: '1', readOnly: true },
    ],
    commands: [createIsPrimeCommand({ autoFactorize, verboseFactorize })],
    onLoad: (ctx) => {
      bound.store = ctx.variables;
    },
    onUnload: () => {
      bound.store = undefined;
    },
  };
}
