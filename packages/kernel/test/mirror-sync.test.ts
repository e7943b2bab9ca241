/**
 * Switchboard Kernel - Environment Mirror Tests
 *
 * SHELLOPTS / BASHOPTS serialization after writes, import of inherited
 * values, and mirror maintenance on deregistration.
 *
 * Variables live in an in-memory VariableStore; no process environment is
 * read or written.
 */

import { describe, it, expect } from 'vitest';
import {
  AccessClass,
  Mirror,
  MirrorSynchronizer,
  OptionRegistry,
  OptionSystem,
  Outcome,
  defineOption,
  isListShaped,
} from '../src/index.js';
import type { OptionDescriptor } from '../src/index.js';
import { MemoryVariables } from './helpers/memory-variables.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function systemWith(
  variables: MemoryVariables,
  ...options: OptionDescriptor[]
): OptionSystem {
  const system = new OptionSystem({ variables });
  for (const option of options) system.register(option);
  return system;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

describe('serialize', () => {
  it('lists a mirrored short option after it is turned on and drops it when turned off', () => {
    const variables = new MemoryVariables();
    const noglob = defineOption({ name: 'noglob', letter: 'f', flags: { shellopts: true } });
    const system = systemWith(variables, noglob);

    expect(system.writeByLetter('f', AccessClass.Short, 1)).toBe(Outcome.Changed);
    expect(variables.valueOf('SHELLOPTS')).toBe('noglob');

    expect(system.writeByLetter('f', AccessClass.Short, 0)).toBe(Outcome.Changed);
    expect(variables.valueOf('SHELLOPTS')).toBe('');
  });

  it('joins enabled participants in name order and leaves the variable read-only', () => {
    const variables = new MemoryVariables();
    const system = systemWith(
      variables,
      defineOption({ name: 'xtrace', initial: 1, flags: { shellopts: true } }),
      defineOption({ name: 'errexit', initial: 1, flags: { shellopts: true } }),
      defineOption({ name: 'noglob', initial: 0, flags: { shellopts: true } }),
      defineOption({ name: 'extglob', initial: 1, flags: { bashopts: true } }),
    );

    expect(system.serialize(Mirror.ShellOpts)).toBe('errexit:xtrace');
    expect(system.serialize(Mirror.BashOpts)).toBe('extglob');
    expect(variables.lookup('SHELLOPTS')).toEqual({
      value: 'errexit:xtrace',
      imported: false,
      readOnly: true,
    });
  });

  it('rewrites a read-only mirror variable', () => {
    const variables = new MemoryVariables();
    const system = systemWith(
      variables,
      defineOption({ name: 'errexit', initial: 1, flags: { shellopts: true } }),
    );
    variables.unbind('SHELLOPTS');
    variables.bind('SHELLOPTS', 'stale');
    variables.markReadOnly('SHELLOPTS');

    expect(system.serialize(Mirror.ShellOpts)).toBe('errexit');
    expect(variables.valueOf('SHELLOPTS')).toBe('errexit');
  });

  it('re-serializes when an enabled mirrored option is deregistered', () => {
    const variables = new MemoryVariables();
    const extglob = defineOption({ name: 'extglob', initial: 1, flags: { bashopts: true } });
    const nullglob = defineOption({ name: 'nullglob', initial: 1, flags: { bashopts: true } });
    const system = systemWith(variables, extglob, nullglob);
    system.serialize(Mirror.BashOpts);

    expect(system.deregister(extglob)).toBe(Outcome.Changed);
    expect(variables.valueOf('BASHOPTS')).toBe('nullglob');
  });

  it('publishes an enabled mirrored option as soon as it is registered', () => {
    const variables = new MemoryVariables();
    systemWith(variables, defineOption({ name: 'xtrace', initial: 1, flags: { shellopts: true } }));

    expect(variables.lookup('SHELLOPTS')).toEqual({ value: 'xtrace', imported: false, readOnly: true });
  });

  it('keeps an inherited mirror for initialize() while options are registered', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'noglob');
    const system = systemWith(
      variables,
      defineOption({ name: 'errexit', initial: 1, flags: { shellopts: true } }),
      defineOption({ name: 'noglob', flags: { shellopts: true } }),
    );
    system.writeByName('errexit', AccessClass.SetO, 1);

    expect(variables.lookup('SHELLOPTS')).toEqual({ value: 'noglob', imported: true, readOnly: false });
    expect(system.initialize().mirrors.SHELLOPTS).toBe('errexit:noglob');
  });

  it('leaves the mirror alone when a disabled option is deregistered', () => {
    const variables = new MemoryVariables();
    const extglob = defineOption({ name: 'extglob', initial: 0, flags: { bashopts: true } });
    const system = systemWith(variables, extglob);

    system.deregister(extglob);
    expect(variables.lookup('BASHOPTS')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Import
// ---------------------------------------------------------------------------

describe('deserialize', () => {
  it('enables known names and silently skips unknown ones', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'a:b:c');
    const a = defineOption({ name: 'a', flags: { shellopts: true } });
    const c = defineOption({ name: 'c', flags: { shellopts: true } });
    const system = systemWith(variables, a, c);

    expect(system.deserialize(Mirror.ShellOpts)).toEqual({
      mirror: Mirror.ShellOpts,
      accepted: true,
      applied: ['a', 'c'],
      skipped: ['b'],
    });
    expect(a.storage?.value).toBe(1);
    expect(c.storage?.value).toBe(1);
  });

  it('skips empty segments, non-participants and refused writes', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', ':noglob::extglob:interactive:');
    const noglob = defineOption({ name: 'noglob', flags: { shellopts: true } });
    const extglob = defineOption({ name: 'extglob', flags: { bashopts: true } });
    const interactive = defineOption({
      name: 'interactive',
      flags: { shellopts: true, readOnly: true },
    });
    const system = systemWith(variables, noglob, extglob, interactive);

    const report = system.deserialize(Mirror.ShellOpts);
    expect(report.applied).toEqual(['noglob']);
    expect(report.skipped).toEqual(['extglob', 'interactive']);
    expect(extglob.storage?.value).toBe(0);
    expect(interactive.storage?.value).toBe(0);
  });

  it('ignores a mirror assigned during the session', () => {
    const variables = new MemoryVariables();
    variables.bind('SHELLOPTS', 'noglob');
    const noglob = defineOption({ name: 'noglob', flags: { shellopts: true } });
    const system = systemWith(variables, noglob);

    expect(system.deserialize(Mirror.ShellOpts).accepted).toBe(false);
    expect(noglob.storage?.value).toBe(0);
  });

  it('ignores a value that is not a colon-separated name list', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'noglob;rm -rf');
    const noglob = defineOption({ name: 'noglob', flags: { shellopts: true } });
    const system = systemWith(variables, noglob);

    expect(system.deserialize(Mirror.ShellOpts)).toEqual({
      mirror: Mirror.ShellOpts,
      accepted: false,
      applied: [],
      skipped: [],
    });
    expect(noglob.storage?.value).toBe(0);
  });

  it('is a no-op when the variable is absent', () => {
    const system = systemWith(new MemoryVariables());
    expect(system.deserialize(Mirror.BashOpts).accepted).toBe(false);
  });

  it('round-trips through serialize restricted to known names', () => {
    const variables = new MemoryVariables().inherit('BASHOPTS', 'nullglob:bogus:dotglob');
    const system = systemWith(
      variables,
      defineOption({ name: 'dotglob', flags: { bashopts: true } }),
      defineOption({ name: 'nullglob', flags: { bashopts: true } }),
      defineOption({ name: 'globstar', flags: { bashopts: true } }),
    );

    system.deserialize(Mirror.BashOpts);
    const first = system.serialize(Mirror.BashOpts);
    expect(first).toBe('dotglob:nullglob');
    expect(system.serialize(Mirror.BashOpts)).toBe(first);
  });

  it('does not refresh the mirror while importing', () => {
    const variables = new MemoryVariables().inherit('SHELLOPTS', 'noglob');
    const system = systemWith(
      variables,
      defineOption({ name: 'noglob', flags: { shellopts: true } }),
    );

    system.deserialize(Mirror.ShellOpts);
    expect(variables.lookup('SHELLOPTS')).toEqual({
      value: 'noglob',
      imported: true,
      readOnly: false,
    });
  });
});

describe('MirrorSynchronizer without an OptionSystem', () => {
  it('imports with plain writes', () => {
    const registry = new OptionRegistry();
    const noglob = defineOption({ name: 'noglob', flags: { shellopts: true } });
    registry.register(noglob);
    const sync = new MirrorSynchronizer(registry, new MemoryVariables().inherit('SHELLOPTS', 'noglob'));

    expect(sync.deserialize(Mirror.ShellOpts).applied).toEqual(['noglob']);
    expect(sync.compose(Mirror.ShellOpts)).toBe('noglob');
  });
});

describe('isListShaped', () => {
  it('accepts colon-separated names, including empty ones', () => {
    expect(isListShaped('')).toBe(true);
    expect(isListShaped('a')).toBe(true);
    expect(isListShaped('a::interactive-comments:')).toBe(true);
  });

  it('rejects other characters', () => {
    expect(isListShaped('a b')).toBe(false);
    expect(isListShaped('a;b')).toBe(false);
    expect(isListShaped('$(x)')).toBe(false);
  });
});
