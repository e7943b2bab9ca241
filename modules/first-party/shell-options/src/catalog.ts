/**
 * Switchboard First-Party Shell Options - Catalog
 *
 * The plain toggles of the interpreter live in catalog.json beside this
 * package: `set` entries belong to the long-option surface and SHELLOPTS,
 * `shopt` entries to the extended-option surface and BASHOPTS. Options that
 * need hooks or session-dependent initial values are defined in code (see
 * manifest.ts).
 *
 * A malformed catalog is a packaging error and throws at load time.
 */

import { readFileSync } from 'node:fs';
import { defineOption, isValidLetter, isValidOptionName, type OptionDescriptor } from '@switchboard/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CatalogEntry {
  readonly name: string;
  readonly letter?: string | undefined;
  readonly default: number;
  readonly ignoreChange: boolean;
  readonly help: string;
}

export interface ShellOptionCatalog {
  readonly set: ReadonlyArray<CatalogEntry>;
  readonly shopt: ReadonlyArray<CatalogEntry>;
}

export const CATALOG_URL = new URL('../catalog.json', import.meta.url);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(raw: unknown, where: string): CatalogEntry {
  if (!isRecord(raw)) {
    throw new Error(`${where}: expected an object`);
  }
  const { name, letter, help, ignoreChange } = raw;
  const value = raw['default'];

  if (typeof name !== 'string' || !isValidOptionName(name)) {
    throw new Error(`${where}: invalid name ${JSON.stringify(name)}`);
  }
  if (letter !== undefined && (typeof letter !== 'string' || !isValidLetter(letter))) {
    throw new Error(`${where} (${name}): invalid letter ${JSON.stringify(letter)}`);
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`${where} (${name}): default must be an integer`);
  }
  if (ignoreChange !== undefined && typeof ignoreChange !== 'boolean') {
    throw new Error(`${where} (${name}): ignoreChange must be a boolean`);
  }
  if (typeof help !== 'string') {
    throw new Error(`${where} (${name}): help must be a string`);
  }

  return {
    name,
    letter,
    default: value,
    ignoreChange: ignoreChange ?? false,
    help,
  };
}

function parseSection(raw: Record<string, unknown>, section: 'set' | 'shopt'): CatalogEntry[] {
  const list = raw[section];
  if (!Array.isArray(list)) {
    throw new Error(`catalog.json: "${section}" must be an array`);
  }
  return list.map((entry: unknown, i) => parseEntry(entry, `catalog.json ${section}[${i}]`));
}

/**
 * Validate an untrusted JSON value as a ShellOptionCatalog.
 *
 * @throws {Error} naming the first malformed entry
 */
export function parseCatalog(raw: unknown): ShellOptionCatalog {
  if (!isRecord(raw)) {
    throw new Error('catalog.json: expected an object');
  }
  return { set: parseSection(raw, 'set'), shopt: parseSection(raw, 'shopt') };
}

export function loadCatalog(location: URL = CATALOG_URL): ShellOptionCatalog {
  const raw: unknown = JSON.parse(readFileSync(location, 'utf-8'));
  return parseCatalog(raw);
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

/**
 * Build fresh descriptors (with fresh storage cells) for every catalog
 * entry, `set` entries first.
 */
export function catalogOptions(catalog: ShellOptionCatalog): OptionDescriptor[] {
  const setOptions = catalog.set.map((entry) =>
    defineOption({
      name: entry.name,
      letter: entry.letter,
      initial: entry.default,
      help: entry.help,
      flags: { shellopts: true, hideShopt: true, ignoreChange: entry.ignoreChange },
    }),
  );
  const shoptOptions = catalog.shopt.map((entry) =>
    defineOption({
      name: entry.name,
      letter: entry.letter,
      initial: entry.default,
      help: entry.help,
      flags: { bashopts: true, hideSetO: true, ignoreChange: entry.ignoreChange },
    }),
  );
  return [...setOptions, ...shoptOptions];
}
