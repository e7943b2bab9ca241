/**
 * Switchboard Runtime Host - Runtime Configuration Tests
 *
 * Defaults, validation warnings and command-line updates of config.json.
 *
 * Isolation: uses MemoryStateIO; no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RUNTIME_CONFIG,
  loadRuntimeConfig,
  parseRuntimeConfig,
  saveRuntimeConfig,
  updateRuntimeConfig,
} from '../src/config/runtime-config.js';
import { MemoryStateIO } from '../src/state/state-io.js';

describe('parseRuntimeConfig', () => {
  it('returns the defaults when there is no file', () => {
    expect(parseRuntimeConfig(undefined)).toEqual({
      config: {
        changeLog: true,
        importEnvironment: true,
        strictConsistency: true,
        autoload: [],
      },
      warnings: [],
    });
  });

  it('applies valid fields', () => {
    const { config, warnings } = parseRuntimeConfig({
      changeLog: false,
      autoload: ['factorize'],
    });

    expect(config).toEqual({
      changeLog: false,
      importEnvironment: true,
      strictConsistency: true,
      autoload: ['factorize'],
    });
    expect(warnings).toEqual([]);
  });

  it('replaces invalid fields with defaults and warns', () => {
    const { config, warnings } = parseRuntimeConfig({
      importEnvironment: 'yes',
      autoload: [1],
      colour: 'blue',
    });

    expect(config).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(warnings).toEqual([
      'config.json: importEnvironment must be a boolean',
      'config.json: autoload must be an array of strings',
      'config.json: unknown key "colour"',
    ]);
  });

  it('rejects a non-object document', () => {
    expect(parseRuntimeConfig([]).warnings).toEqual(['config.json: expected an object']);
  });
});

describe('load / save', () => {
  it('round-trips through StateIO', () => {
    const io = new MemoryStateIO();
    saveRuntimeConfig(io, { ...DEFAULT_RUNTIME_CONFIG, strictConsistency: false });

    expect(loadRuntimeConfig(io).config.strictConsistency).toBe(false);
  });
});

describe('updateRuntimeConfig', () => {
  it('parses boolean words', () => {
    const result = updateRuntimeConfig(DEFAULT_RUNTIME_CONFIG, 'changeLog', 'off');
    expect(result).toEqual({ ok: true, config: { ...DEFAULT_RUNTIME_CONFIG, changeLog: false } });
  });

  it('splits autoload on commas', () => {
    const result = updateRuntimeConfig(DEFAULT_RUNTIME_CONFIG, 'autoload', 'factorize, extra,');
    expect(result).toEqual({
      ok: true,
      config: { ...DEFAULT_RUNTIME_CONFIG, autoload: ['factorize', 'extra'] },
    });
  });

  it('rejects unknown keys and bad booleans', () => {
    expect(updateRuntimeConfig(DEFAULT_RUNTIME_CONFIG, 'colour', 'blue')).toEqual({
      ok: false,
      reason:
        'unknown config key "colour" (expected one of: changeLog, importEnvironment, strictConsistency, autoload)',
    });
    expect(updateRuntimeConfig(DEFAULT_RUNTIME_CONFIG, 'changeLog', 'maybe')).toEqual({
      ok: false,
      reason: 'changeLog expects true or false, got "maybe"',
    });
  });
});
