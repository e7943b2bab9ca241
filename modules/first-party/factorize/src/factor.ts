/**
 * Switchboard First-Party Factorize Module - Trial Division
 */

/** Receives one line per divisor tried when verbose output is on. */
export type FactorTrace = (line: string) => void;

const SMALL_PRIMES: ReadonlyArray<number> = [2, 3, 5, 7];

/**
 * Smallest prime divisor of `n` (n >= 2), or 0 when `n` is prime.
 */
export function smallestFactor(n: number, trace?: FactorTrace): number {
  for (const p of SMALL_PRIMES) {
    if (n === p) {
      trace?.(`${n} is prime`);
      return 0;
    }
    if (n % p === 0) {
      trace?.(`${n} is divisible by ${p}`);
      return p;
    }
  }
  for (let d = 11; d * d <= n; d += 2) {
    if (n % d === 0) {
      trace?.(`${n} is divisible by ${d}`);
      return d;
    }
    trace?.(`${n} is not divisible by ${d}`);
  }
  trace?.(`${n} is prime`);
  return 0;
}

export function isPrime(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 2 && smallestFactor(n) === 0;
}

/** Prime factors of `n` (n >= 2) in ascending order, with repetition. */
export function primeFactors(n: number): number[] {
  const factors: number[] = [];
  let rest = n;
  while (rest > 1) {
    const f = smallestFactor(rest);
    if (f === 0) {
      factors.push(rest);
      break;
    }
    factors.push(f);
    rest /= f;
  }
  return factors;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type ParsedNumber =
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'fraction' }
  | { readonly kind: 'out_of_range'; readonly negative: boolean }
  | { readonly kind: 'not_a_number' };

const INTEGER = /^-?\d+$/;
const FRACTION = /^-?\d+\.\d*$/;

/** Classify a command-line word or variable value as a candidate number. */
export function parseCandidate(word: string): ParsedNumber {
  if (FRACTION.test(word)) return { kind: 'fraction' };
  if (!INTEGER.test(word)) return { kind: 'not_a_number' };
  const value = Number(word);
  if (!Number.isSafeInteger(value)) {
    return { kind: 'out_of_range', negative: word.startsWith('-') };
  }
  return { kind: 'integer', value };
}
