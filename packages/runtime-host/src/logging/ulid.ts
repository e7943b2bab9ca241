/**
 * Switchboard Runtime Host - ULID Generator
 *
 * 26-character Crockford Base32 identifiers: a 48-bit millisecond time
 * followed by 80 random bits. Used as event_id in option-changes.jsonl so
 * that a log assembled from several copies of a home directory can be
 * deduplicated on read.
 *
 * readLog() breaks timestamp ties on event_id, so a sink takes its ids from
 * a monotonic generator: within one millisecond each id is the previous one
 * plus one.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const RANDOM_LIMIT = 1n << 80n;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(rest & 0x1fn)) + out;
    rest >>= 5n;
  }
  return out;
}

function randomComponent(source: (size: number) => Uint8Array): bigint {
  let value = 0n;
  for (const byte of source(RANDOM_BYTES)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/** A single ULID for time `now` (milliseconds since the epoch). */
export function ulid(now: number = Date.now()): string {
  return encode(BigInt(now), TIME_CHARS) + encode(randomComponent(randomBytes), RANDOM_CHARS);
}

export interface MonotonicUlidOptions {
  readonly clock?: (() => number) | undefined;
  readonly random?: ((size: number) => Uint8Array) | undefined;
}

/**
 * Returns a generator whose ids strictly increase. When the clock has not
 * advanced past the previous id's time, the previous time is kept and its
 * random part incremented.
 */
export function createMonotonicUlid(options: MonotonicUlidOptions = {}): () => string {
  const clock = options.clock ?? Date.now;
  const random = options.random ?? randomBytes;
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const now = clock();
    if (now > lastTime) {
      lastTime = now;
      lastRandom = randomComponent(random);
    } else {
      lastRandom += 1n;
      if (lastRandom >= RANDOM_LIMIT) {
        // The random part overflowed: borrow the next millisecond.
        lastTime += 1;
        lastRandom = 0n;
      }
    }
    return encode(BigInt(lastTime), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}
