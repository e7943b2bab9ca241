/**
 * Switchboard First-Party Factorize Module - is_prime Command
 *
 *   is_prime [-aq] [N ...]
 *
 * Classifies each N as prime, composite or invalid. Without arguments it
 * classifies $PRIME_CANDIDATE, and with auto_factorize on it also divides
 * the smallest factor out of PRIME_CANDIDATE and stores it in
 * PRIME_DIVISOR, so repeated calls walk through the factorization.
 *
 * Exit status: 2 if any argument was invalid or non-positive, else 1 if
 * any number was composite (or 1), else 0.
 */

import { AccessClass, type OptionDescriptor } from '@switchboard/kernel';
import type { CommandResult, ExtensionCommand, ExtensionContext } from '@switchboard/extension-loader';
import { parseCandidate, primeFactors, smallestFactor } from './factor.js';

export const PRIME_CANDIDATE = 'PRIME_CANDIDATE';
export const PRIME_DIVISOR = 'PRIME_DIVISOR';

const USAGE = 'is_prime [-aq] [N ...]';

enum Status {
  Prime = 0,
  Composite = 1,
  Invalid = 2,
}

interface RunFlags {
  allFactors: boolean;
  quiet: boolean;
}

export interface FactorizeOptions {
  readonly autoFactorize: OptionDescriptor;
  readonly verboseFactorize: OptionDescriptor;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

type ParsedArgs =
  | { readonly ok: true; readonly flags: RunFlags; readonly operands: ReadonlyArray<string> }
  | { readonly ok: false; readonly option: string };

/** Option letters stop at `--`, at the first operand and at a negative number. */
function parseArgs(args: ReadonlyArray<string>): ParsedArgs {
  const flags: RunFlags = { allFactors: false, quiet: false };
  let index = 0;
  for (; index < args.length; index++) {
    const word = args[index] ?? '';
    if (word === '--') {
      index++;
      break;
    }
    if (!word.startsWith('-') || word === '-' || /^-\d/.test(word)) break;
    for (const letter of word.slice(1)) {
      if (letter === 'a') flags.allFactors = true;
      else if (letter === 'q') flags.quiet = true;
      else return { ok: false, option: letter };
    }
  }
  return { ok: true, flags, operands: args.slice(index) };
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

function classify(n: number, flags: RunFlags, out: string[], verbose: boolean): Status {
  if (n < 1) {
    out.push(`${n} is not positive`);
    return Status.Invalid;
  }
  if (n === 1) {
    out.push('1 is neither prime nor composite');
    return Status.Composite;
  }
  const f = smallestFactor(n, verbose ? (line) => out.push(line) : undefined);
  if (f === 0) {
    out.push(`${n} is prime`);
    return Status.Prime;
  }
  if (flags.allFactors) {
    out.push(`${n} = ${primeFactors(n).join(' * ')}`);
  } else {
    out.push(`${n} is divisible by ${f}, giving ${n / f}`);
  }
  return Status.Composite;
}

function result(status: number, stdout: string[], stderr: string[], quiet: boolean): CommandResult {
  return { status, stdout: quiet ? [] : stdout, stderr };
}

/**
 * Divide the smallest factor out of the candidate. Primes reduce to 1 and
 * become the divisor themselves.
 */
function advance(n: number, ctx: ExtensionContext, stderr: string[]): void {
  const f = smallestFactor(n);
  const divisor = f === 0 ? n : f;
  ctx.variables.bind(PRIME_DIVISOR, String(divisor), { force: true });
  if (!ctx.variables.bind(PRIME_CANDIDATE, String(n / divisor))) {
    stderr.push(`is_prime: ${PRIME_CANDIDATE}: readonly variable`);
  }
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export function createIsPrimeCommand(options: FactorizeOptions): ExtensionCommand {
  return {
    name: 'is_prime',
    usage: USAGE,
    description: 'Report whether each N (default $PRIME_CANDIDATE) is prime.',
    run(args, ctx) {
      const parsed = parseArgs(args);
      if (!parsed.ok) {
        return {
          status: Status.Invalid,
          stdout: [],
          stderr: [`is_prime: -${parsed.option}: invalid option`, `is_prime: usage: ${USAGE}`],
        };
      }

      const { flags, operands } = parsed;
      const verbose = ctx.system.read(options.verboseFactorize, AccessClass.Any) > 0;
      const stdout: string[] = [];
      const stderr: string[] = [];

      if (operands.length === 0) {
        const raw = ctx.variables.lookup(PRIME_CANDIDATE)?.value ?? '';
        const candidate = parseCandidate(raw);
        if (candidate.kind !== 'integer') {
          stdout.push(`${raw} is not a number`);
          return result(Status.Invalid, stdout, stderr, flags.quiet);
        }
        const status = classify(candidate.value, flags, stdout, verbose);
        const auto = ctx.system.read(options.autoFactorize, AccessClass.Any) > 0;
        if (auto && candidate.value > 1) advance(candidate.value, ctx, stderr);
        return result(status, stdout, stderr, flags.quiet);
      }

      let errors = 0;
      let composites = 0;
      for (const word of operands) {
        const candidate = parseCandidate(word);
        switch (candidate.kind) {
          case 'not_a_number':
            stdout.push(`${word} is not a number`);
            errors++;
            continue;
          case 'fraction':
            stdout.push(`${word} is not an integer`);
            continue;
          case 'out_of_range':
            stdout.push(`${word} is too ${candidate.negative ? 'small' : 'big'}`);
            continue;
          case 'integer': {
            const status = classify(candidate.value, flags, stdout, verbose);
            if (status === Status.Composite) composites++;
            else if (status === Status.Invalid) errors++;
          }
        }
      }

      const status = errors > 0 ? Status.Invalid : composites > 0 ? Status.Composite : Status.Prime;
      return result(status, stdout, stderr, flags.quiet);
    },
  };
}
