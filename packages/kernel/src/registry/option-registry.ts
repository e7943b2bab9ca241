/**
 * Switchboard Kernel - Option Registry
 *
 * The OptionRegistry is the live collection of option descriptors and the
 * two indexes used to find them:
 *
 * - a name-ordered array, searched by bisection;
 * - a fixed 128-slot table indexed by letter character code.
 *
 * Registry invariants:
 * - The name array is always fully sorted (code-unit order).
 * - The letter table never maps one letter to two distinct live descriptors.
 * - A descriptor is either indexed under every key it has, or under none.
 *
 * Descriptors are compared by identity. Entries self-register when the
 * interpreter (or an extension) initialises and extensions deregister their
 * entries when they unload.
 */

import { InternalConsistencyError } from '../errors.js';
import type { OptionFilter } from '../types/access.js';
import type { OptionDescriptor } from '../types/option.js';
import {
  LETTER_TABLE_SIZE,
  isValidLetter,
  isValidOptionName,
  optionLabel,
} from '../types/option.js';
import { Outcome } from '../types/outcome.js';

interface SearchResult {
  /** Index of the match, or the insertion point if there is none. */
  readonly index: number;
  readonly match: boolean;
}

export interface OptionRegistryOptions {
  /**
   * Throw InternalConsistencyError on a consistency violation (default).
   * When false the violation is reported through onConsistencyViolation and
   * the registration is refused with Duplicate.
   */
  readonly strict?: boolean | undefined;
  /** Called after a new descriptor has been inserted into its indexes. */
  readonly onRegister?: ((option: OptionDescriptor) => void) | undefined;
  /** Called after a registered descriptor has been removed from both indexes. */
  readonly onDeregister?: ((option: OptionDescriptor) => void) | undefined;
  readonly onConsistencyViolation?: ((detail: string) => void) | undefined;
}

export class OptionRegistry {
  private readonly named: OptionDescriptor[] = [];
  private readonly byLetter: Array<OptionDescriptor | undefined> =
    new Array<OptionDescriptor | undefined>(LETTER_TABLE_SIZE).fill(undefined);
  /** Concatenated known letters; null when it must be rebuilt. */
  private letterCache: string | null = null;

  constructor(private readonly options: OptionRegistryOptions = {}) {}

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  private search(name: string): SearchResult {
    let left = 0;
    let right = this.named.length;
    while (left < right) {
      const mid = (left + right) >>> 1;
      const midName = this.named[mid]?.name ?? '';
      if (name < midName) {
        right = mid;
      } else if (name > midName) {
        left = mid + 1;
      } else {
        return { index: mid, match: true };
      }
    }
    return { index: left, match: false };
  }

  findByName(name: string): OptionDescriptor | undefined {
    const result = this.search(name);
    return result.match ? this.named[result.index] : undefined;
  }

  findByLetter(letter: string): OptionDescriptor | undefined {
    if (letter.length !== 1) return undefined;
    const code = letter.charCodeAt(0);
    return code < LETTER_TABLE_SIZE ? this.byLetter[code] : undefined;
  }

  /**
   * All registered letters in ascending character-code order.
   * Cached; rebuilt lazily after a letter is added or removed.
   */
  letters(): string {
    if (this.letterCache === null) {
      let out = '';
      for (let code = 0; code < LETTER_TABLE_SIZE; code++) {
        if (this.byLetter[code] !== undefined) out += String.fromCharCode(code);
      }
      this.letterCache = out;
    }
    return this.letterCache;
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  /**
   * Register a descriptor under its name and/or letter.
   *
   * @returns Changed when inserted, Unchanged when this exact descriptor is
   *   already registered, Duplicate when a key belongs to another descriptor,
   *   BadValue when the descriptor has no usable key.
   * @throws {InternalConsistencyError} in strict mode when the descriptor is
   *   indexed under one of its keys but not the other.
   */
  register(option: OptionDescriptor): Outcome {
    const { name, letter } = option;
    if (name === undefined && letter === undefined) return Outcome.BadValue;
    if (name !== undefined && !isValidOptionName(name)) return Outcome.BadValue;
    if (letter !== undefined && !isValidLetter(letter)) return Outcome.BadValue;

    let search: SearchResult | undefined;
    let nameOwned = false;
    if (name !== undefined) {
      search = this.search(name);
      if (search.match) {
        if (this.named[search.index] !== option) return Outcome.Duplicate;
        nameOwned = true;
      }
    }

    let code: number | undefined;
    let letterOwned = false;
    if (letter !== undefined) {
      code = letter.charCodeAt(0);
      const owner = this.byLetter[code];
      if (owner !== undefined) {
        if (owner !== option) return Outcome.Duplicate;
        letterOwned = true;
      }
    }

    const nameSettled = name === undefined || nameOwned;
    const letterSettled = letter === undefined || letterOwned;
    if (nameSettled && letterSettled) return Outcome.Unchanged;

    if (nameOwned || letterOwned) {
      const owned = nameOwned ? 'name' : 'letter';
      const missing = nameOwned ? 'letter' : 'name';
      return this.violation(
        `"${optionLabel(option)}" is registered under its ${owned} but not its ${missing}`,
      );
    }

    if (search !== undefined) {
      this.named.splice(search.index, 0, option);
    }
    if (code !== undefined) {
      this.byLetter[code] = option;
      this.letterCache = null;
    }
    this.options.onRegister?.(option);
    return Outcome.Changed;
  }

  /**
   * Remove every occurrence of a descriptor from both indexes.
   * Removing a descriptor that was never registered is a no-op.
   *
   * @returns Changed when something was removed, Unchanged otherwise.
   */
  deregister(option: OptionDescriptor): Outcome {
    let removed = false;

    for (let i = this.named.length - 1; i >= 0; i--) {
      if (this.named[i] === option) {
        this.named.splice(i, 1);
        removed = true;
      }
    }
    for (let code = 0; code < LETTER_TABLE_SIZE; code++) {
      if (this.byLetter[code] === option) {
        this.byLetter[code] = undefined;
        this.letterCache = null;
        removed = true;
      }
    }

    if (!removed) return Outcome.Unchanged;
    this.options.onDeregister?.(option);
    return Outcome.Changed;
  }

  private violation(detail: string): Outcome {
    if (this.options.strict ?? true) {
      throw new InternalConsistencyError(detail);
    }
    this.options.onConsistencyViolation?.(detail);
    return Outcome.Duplicate;
  }

  // -------------------------------------------------------------------------
  // Enumeration
  // -------------------------------------------------------------------------

  /**
   * Iterate live descriptors: named ones in name order, then letter-only
   * ones in ascending letter order. Descriptors for which `hidden` returns
   * true are skipped. The returned iterable is lazy and restartable.
   */
  enumerate(hidden?: OptionFilter): Iterable<OptionDescriptor> {
    return {
      [Symbol.iterator]: () => this.walk(hidden),
    };
  }

  private *walk(hidden: OptionFilter | undefined): Generator<OptionDescriptor> {
    for (let position = 0; position < this.named.length; position++) {
      const option = this.named[position];
      if (option === undefined) continue;
      if (hidden === undefined || !hidden(option)) yield option;
    }
    for (let code = 0; code < LETTER_TABLE_SIZE; code++) {
      const option = this.byLetter[code];
      if (option === undefined || option.name !== undefined) continue;
      if (hidden === undefined || !hidden(option)) yield option;
    }
  }

  /** Number of live descriptors not hidden by `hidden`. */
  count(hidden?: OptionFilter): number {
    let total = 0;
    for (const _ of this.enumerate(hidden)) total++;
    return total;
  }

  get size(): number {
    return this.count();
  }
}
