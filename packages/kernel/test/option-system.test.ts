/**
 * Switchboard Kernel - Option System Tests
 *
 * End-to-end behaviour of the context object: startup initialization,
 * reset to defaults, logging, and the reference scenarios for the
 * short-flag, long-option and import surfaces.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AccessClass,
  DisplayStyle,
  InternalConsistencyError,
  Mirror,
  NO_FLAGS,
  OptionSystem,
  Outcome,
  defineOption,
} from '../src/index.js';
import type { LogSink, OptionChangeEvent, OptionFlags } from '../src/index.js';
import { MemoryVariables } from './helpers/memory-variables.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function standardOptions() {
  return {
    noglob: defineOption({ name: 'noglob', letter: 'f', flags: { shellopts: true } }),
    verbose: defineOption({ name: 'verbose', letter: 'v', flags: { shellopts: true } }),
    interactive: defineOption({
      name: 'interactive',
      letter: 'i',
      initial: 0,
      flags: { readOnly: true, shellopts: true },
    }),
    extglob: defineOption({ name: 'extglob', initial: 0, flags: { bashopts: true, hideSetO: true } }),
    nullglob: defineOption({ name: 'nullglob', initial: 0, flags: { bashopts: true, hideSetO: true } }),
  };
}

function buildSystem(variables = new MemoryVariables(), sink?: LogSink) {
  const options = standardOptions();
  const system = new OptionSystem({
    variables,
    sink,
    now: () => new Date('2026-03-04T05:06:07.000Z'),
  });
  for (const option of Object.values(options)) {
    expect(system.register(option)).toBe(Outcome.Changed);
  }
  return { system, options, variables };
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe('reference scenarios', () => {
  it('noglob via -f is mirrored while on', () => {
    const { system, variables } = buildSystem();

    expect(system.writeByLetter('f', AccessClass.Short, 1)).toBe(Outcome.Changed);
    expect(variables.valueOf('SHELLOPTS')).toBe('noglob');
    expect(system.writeByLetter('f', AccessClass.Short, 0)).toBe(Outcome.Changed);
    expect(variables.valueOf('SHELLOPTS')).toBe('');
  });

  it('interactive cannot be set through set -o', () => {
    const { system, options } = buildSystem();

    expect(system.writeByName('interactive', AccessClass.SetO, 1)).toBe(Outcome.ReadOnly);
    expect(options.interactive.storage?.value).toBe(0);
  });

  it('a second descriptor claiming v is refused', () => {
    const { system, options } = buildSystem();
    const vi2 = defineOption({ name: 'vi', letter: 'v' });

    expect(system.register(vi2)).toBe(Outcome.Duplicate);
    expect(system.findByLetter('v')).toBe(options.verbose);
    expect(system.findByName('vi')).toBeUndefined();
  });

  it('unknown names are NotFound', () => {
    const { system } = buildSystem();
    expect(system.writeByName('nosuchoption', AccessClass.SetO, 1)).toBe(Outcome.NotFound);
    expect(system.writeByLetter('Q', AccessClass.Short, 1)).toBe(Outcome.NotFound);
  });
});

// ---------------------------------------------------------------------------
// initialize
// ---------------------------------------------------------------------------

describe('initialize', () => {
  it('imports inherited mirrors, then publishes both', () => {
    const variables = new MemoryVariables()
      .inherit('SHELLOPTS', 'noglob:braceexpand')
      .inherit('BASHOPTS', 'nullglob');
    const { system, options } = buildSystem(variables);

    const report = system.initialize();

    expect(report.imports).toEqual([
      { mirror: Mirror.ShellOpts, accepted: true, applied: ['noglob'], skipped: ['braceexpand'] },
      { mirror: Mirror.BashOpts, accepted: true, applied: ['nullglob'], skipped: [] },
    ]);
    expect(report.mirrors).toEqual({ SHELLOPTS: 'noglob', BASHOPTS: 'nullglob' });
    expect(options.noglob.storage?.value).toBe(1);
    expect(variables.lookup('SHELLOPTS')).toEqual({
      value: 'noglob',
      imported: false,
      readOnly: true,
    });
  });

  it('skips the import when disabled', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'noglob');
    const { system, options } = buildSystem(variables);

    const report = system.initialize({ importEnvironment: false });

    expect(report.imports).toEqual([]);
    expect(report.mirrors).toEqual({ SHELLOPTS: '', BASHOPTS: '' });
    expect(options.noglob.storage?.value).toBe(0);
  });

  it('adds an enabled option registered afterwards to its mirror', () => {
    const variables = new MemoryVariables();
    const system = new OptionSystem({ variables });
    system.register(defineOption({ name: 'alpha', initial: 1, flags: { bashopts: true } }));
    expect(system.initialize().mirrors.BASHOPTS).toBe('alpha');

    const beta = defineOption({ name: 'beta', initial: 1, flags: { bashopts: true } });
    expect(system.register(beta)).toBe(Outcome.Changed);
    expect(variables.valueOf('BASHOPTS')).toBe('alpha:beta');

    expect(system.register(defineOption({ name: 'gamma', initial: 0, flags: { bashopts: true } }))).toBe(
      Outcome.Changed,
    );
    expect(variables.valueOf('BASHOPTS')).toBe('alpha:beta');
  });

  it('never imports twice', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'noglob');
    const { system } = buildSystem(variables);
    system.initialize();
    system.writeByName('noglob', AccessClass.SetO, 0);

    expect(system.deserialize(Mirror.ShellOpts).accepted).toBe(false);
    expect(system.initialize().mirrors.SHELLOPTS).toBe('');
  });
});

// ---------------------------------------------------------------------------
// resetToDefaults
// ---------------------------------------------------------------------------

describe('resetToDefaults', () => {
  it('writes every declared default with Reinit, read-only options included', () => {
    const { system, options } = buildSystem();
    system.writeByName('extglob', AccessClass.Shopt, 1);
    system.write(options.interactive, AccessClass.Unwind, 1);
    system.writeByName('noglob', AccessClass.SetO, 1);

    const entries = system.resetToDefaults();

    expect(entries.map((e) => [e.option.name, e.outcome])).toEqual([
      ['extglob', Outcome.Changed],
      ['interactive', Outcome.Changed],
      ['nullglob', Outcome.Changed],
    ]);
    expect(options.extglob.storage?.value).toBe(0);
    expect(options.interactive.storage?.value).toBe(0);
    // noglob declares no default and keeps its value
    expect(options.noglob.storage?.value).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe('change logging', () => {
  it('forwards each write to the sink, refused ones included', () => {
    const events: OptionChangeEvent[] = [];
    const { system } = buildSystem(new MemoryVariables(), { append: (e) => void events.push(e) });

    system.writeByName('noglob', AccessClass.SetO, 1);
    system.writeByName('interactive', AccessClass.SetO, 1);

    expect(events.map((e) => [e.option, e.outcome])).toEqual([
      ['noglob', Outcome.Changed],
      ['interactive', Outcome.ReadOnly],
    ]);
    expect(system.logger.recent('noglob')[0]?.timestamp).toBe('2026-03-04T05:06:07.000Z');
  });

  it('logs imported values with Environ access', () => {
    const events: OptionChangeEvent[] = [];
    const variables = new MemoryVariables().inherit('BASHOPTS', 'extglob');
    const { system } = buildSystem(variables, { append: (e) => void events.push(e) });

    system.initialize();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      option: 'extglob',
      access: AccessClass.Environ,
      requested: 1,
      previous: 0,
      outcome: Outcome.Changed,
    });
  });
});

// ---------------------------------------------------------------------------
// Display and consistency
// ---------------------------------------------------------------------------

describe('list / describe', () => {
  it('lists set -o options in OnOff style', () => {
    const { system } = buildSystem();
    system.writeByName('verbose', AccessClass.SetO, 1);

    expect(system.list(AccessClass.SetO, DisplayStyle.OnOff)).toEqual([
      `interactive            \toff`,
      `noglob                 \toff`,
      `verbose                \ton`,
    ]);
  });

  it('describes an option in Help1 style', () => {
    const { system, options } = buildSystem();
    expect(system.describe(options.noglob, DisplayStyle.Help1)).toEqual([
      `noglob                 \toff\t+f`,
    ]);
  });
});

describe('consistency reporting', () => {
  it('routes violations to the callback when not strict', () => {
    const onConsistencyViolation = vi.fn();
    const system = new OptionSystem({
      variables: new MemoryVariables(),
      strictConsistency: false,
      onConsistencyViolation,
    });
    const d: { name: string; letter: string; flags: OptionFlags } = {
      name: 'alpha',
      letter: 'a',
      flags: NO_FLAGS,
    };
    system.register(d);
    d.letter = 'b';

    expect(system.register(d)).toBe(Outcome.Duplicate);
    expect(onConsistencyViolation).toHaveBeenCalledTimes(1);
  });

  it('throws by default', () => {
    const system = new OptionSystem({ variables: new MemoryVariables() });
    const d: { name: string; letter: string; flags: OptionFlags } = {
      name: 'alpha',
      letter: 'a',
      flags: NO_FLAGS,
    };
    system.register(d);
    d.name = 'beta';

    expect(() => system.register(d)).toThrow(InternalConsistencyError);
  });
});
