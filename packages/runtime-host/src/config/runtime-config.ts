/**
 * Switchboard Runtime Host - Runtime Configuration
 *
 * `<SWITCHBOARD_HOME>/config.json` holds the per-user runtime settings:
 *
 *   changeLog          append every option write to logs/option-changes.jsonl
 *   importEnvironment  import inherited SHELLOPTS/BASHOPTS at startup
 *   strictConsistency  throw on registry consistency violations
 *   autoload           extension ids loaded at startup, in order
 *
 * Missing fields take their defaults. Fields of the wrong type are
 * replaced by their defaults and reported as warnings; unknown fields are
 * reported and ignored.
 */

import type { StateIO } from '../state/state-io.js';

export const CONFIG_FILE = 'config.json';

export interface RuntimeConfig {
  readonly changeLog: boolean;
  readonly importEnvironment: boolean;
  readonly strictConsistency: boolean;
  readonly autoload: ReadonlyArray<string>;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = Object.freeze({
  changeLog: true,
  importEnvironment: true,
  strictConsistency: true,
  autoload: Object.freeze([]),
});

export type ConfigKey = keyof RuntimeConfig;

const BOOLEAN_KEYS = ['changeLog', 'importEnvironment', 'strictConsistency'] as const;
type BooleanKey = (typeof BOOLEAN_KEYS)[number];

export const CONFIG_KEYS: ReadonlyArray<ConfigKey> = [...BOOLEAN_KEYS, 'autoload'];

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key);
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

export interface ConfigLoadResult {
  readonly config: RuntimeConfig;
  readonly warnings: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate an untrusted JSON value into a RuntimeConfig.
 * `undefined` (no file) yields the defaults without warnings.
 */
export function parseRuntimeConfig(raw: unknown): ConfigLoadResult {
  if (raw === undefined) return { config: DEFAULT_RUNTIME_CONFIG, warnings: [] };
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { config: DEFAULT_RUNTIME_CONFIG, warnings: ['config.json: expected an object'] };
  }

  const warnings: string[] = [];
  const flags: Record<BooleanKey, boolean> = {
    changeLog: DEFAULT_RUNTIME_CONFIG.changeLog,
    importEnvironment: DEFAULT_RUNTIME_CONFIG.importEnvironment,
    strictConsistency: DEFAULT_RUNTIME_CONFIG.strictConsistency,
  };
  let autoload: ReadonlyArray<string> = DEFAULT_RUNTIME_CONFIG.autoload;

  for (const [key, value] of Object.entries(raw)) {
    if (isBooleanKey(key)) {
      if (typeof value === 'boolean') {
        flags[key] = value;
      } else {
        warnings.push(`config.json: ${key} must be a boolean`);
      }
    } else if (key === 'autoload') {
      if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
        autoload = value;
      } else {
        warnings.push('config.json: autoload must be an array of strings');
      }
    } else {
      warnings.push(`config.json: unknown key "${key}"`);
    }
  }

  return { config: { ...flags, autoload }, warnings };
}

export function loadRuntimeConfig(io: StateIO): ConfigLoadResult {
  return parseRuntimeConfig(io.readJson(CONFIG_FILE));
}

export function saveRuntimeConfig(io: StateIO, config: RuntimeConfig): void {
  io.writeJson(CONFIG_FILE, config);
}

// ---------------------------------------------------------------------------
// Editing
// ---------------------------------------------------------------------------

export type ConfigUpdateResult =
  | { readonly ok: true; readonly config: RuntimeConfig }
  | { readonly ok: false; readonly reason: string };

/**
 * Apply a textual `key value` update, as given on the command line.
 * Booleans accept `true`/`false`/`on`/`off`; autoload takes a
 * comma-separated list (empty for none).
 */
export function updateRuntimeConfig(
  config: RuntimeConfig,
  key: string,
  value: string,
): ConfigUpdateResult {
  if (!isConfigKey(key)) {
    return { ok: false, reason: `unknown config key "${key}" (expected one of: ${CONFIG_KEYS.join(', ')})` };
  }
  if (isBooleanKey(key)) {
    const parsed = parseBooleanText(value);
    if (parsed === undefined) {
      return { ok: false, reason: `${key} expects true or false, got "${value}"` };
    }
    const flags: Record<BooleanKey, boolean> = {
      changeLog: config.changeLog,
      importEnvironment: config.importEnvironment,
      strictConsistency: config.strictConsistency,
    };
    flags[key] = parsed;
    return { ok: true, config: { ...flags, autoload: config.autoload } };
  }
  const ids = value.split(',').map((s) => s.trim()).filter((s) => s !== '');
  return { ok: true, config: { ...config, autoload: ids } };
}

function parseBooleanText(value: string): boolean | undefined {
  switch (value.toLowerCase()) {
    case 'true':
    case 'on':
    case '1':
      return true;
    case 'false':
    case 'off':
    case '0':
      return false;
    default:
      return undefined;
  }
}
