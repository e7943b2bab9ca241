/**
 * Switchboard Extension Loader - ExtensionLoader Tests
 *
 * Coverage:
 *   L1: load registers options, binds variables and exposes commands
 *   L2: invalid manifests are rejected before anything is registered
 *   L3: an extension_id can only be loaded once
 *   L4: a registration conflict rolls back the options already registered
 *   L5: a throwing onLoad rolls back options and variables
 *   L6: conflicting commands and read-only variables are refused up front
 *   L7: unload removes everything and refreshes the mirrors
 *   L8: builtin and unknown extensions cannot be unloaded
 *   L9: a throwing onUnload leaves the extension loaded
 *
 * Isolation: in-memory ShellVariables and a fresh OptionSystem per test.
 */

import { describe, it, expect, vi } from 'vitest';
import { AccessClass, Mirror, Outcome, defineOption } from '@switchboard/kernel';
import { ShellVariables } from '@switchboard/runtime-host';
import { ExtensionLoader } from '../src/index.js';
import { buildContext, demoManifest } from './helpers.js';

describe('ExtensionLoader.load', () => {
  it('L1: registers options, binds variables and exposes commands', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);
    const onLoad = vi.fn();
    const manifest = demoManifest({ onLoad });

    expect(loader.load(manifest)).toEqual({ ok: true, extension_id: 'demo' });

    expect(ctx.system.findByName('demo_on')).toBe(manifest.options[0]);
    expect(ctx.system.findByLetter('Q')).toBe(manifest.options[1]);
    expect(ctx.variables.lookup('DEMO_LEVEL')).toEqual({ value: '3', imported: false, readOnly: false });
    expect(onLoad).toHaveBeenCalledWith(ctx);

    const entry = loader.findCommand('demo');
    expect(entry?.extension).toBe(manifest);
    expect(entry?.command.run(['a', 'b'], ctx)).toEqual({ status: 0, stdout: ['a b'], stderr: [] });

    expect(loader.list()).toEqual([manifest]);
    expect(loader.isLoaded('demo')).toBe(true);
  });

  it('L1: marks read-only variables', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);

    loader.load(demoManifest({ variables: [{ name: 'DEMO_LEVEL', value: '3', readOnly: true }] }));

    expect(ctx.variables.lookup('DEMO_LEVEL')?.readOnly).toBe(true);
  });

  it('L2: rejects an invalid manifest without registering anything', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);

    const result = loader.load(demoManifest({ extension_id: 'Bad_Id' }));

    expect(result).toEqual({
      ok: false,
      reason: 'Manifest validation failed',
      details: 'Invalid extension_id "Bad_Id": expected lowercase letters, digits and "-", starting with a letter',
    });
    expect(ctx.system.registry.size).toBe(0);
    expect(ctx.variables.lookup('DEMO_LEVEL')).toBeUndefined();
  });

  it('L3: refuses to load the same extension twice', () => {
    const loader = new ExtensionLoader(buildContext());
    loader.load(demoManifest());

    expect(loader.load(demoManifest())).toEqual({ ok: false, reason: 'Extension already loaded: demo' });
  });

  it('L4: rolls back registered options when a later one conflicts', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);
    const existing = defineOption({ name: 'extglob', flags: { bashopts: true } });
    ctx.system.register(existing);

    const manifest = demoManifest({
      options: [defineOption({ name: 'demo_first' }), defineOption({ name: 'extglob' })],
    });
    const result = loader.load(manifest);

    expect(result).toEqual({
      ok: false,
      reason: 'Option registration failed',
      details: 'extglob: name or letter is already registered',
    });
    expect(ctx.system.findByName('demo_first')).toBeUndefined();
    expect(ctx.system.findByName('extglob')).toBe(existing);
    expect(ctx.variables.lookup('DEMO_LEVEL')).toBeUndefined();
    expect(loader.isLoaded('demo')).toBe(false);
  });

  it('L5: rolls back when onLoad throws', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);

    const result = loader.load(
      demoManifest({
        onLoad: () => {
          throw new Error('setup failed');
        },
      }),
    );

    expect(result).toEqual({ ok: false, reason: 'onLoad failed', details: 'setup failed' });
    expect(ctx.system.registry.size).toBe(0);
    expect(ctx.variables.lookup('DEMO_LEVEL')).toBeUndefined();
    expect(loader.findCommand('demo')).toBeUndefined();
  });

  it('L6: refuses a command another extension provides', () => {
    const loader = new ExtensionLoader(buildContext());
    loader.load(demoManifest());

    const second = demoManifest({
      extension_id: 'other',
      options: [],
      variables: [],
    });

    expect(loader.load(second)).toEqual({
      ok: false,
      reason: 'Command already provided by another extension',
      details: 'demo',
    });
  });

  it('L6: refuses to overwrite a read-only variable', () => {
    const variables = new ShellVariables();
    variables.bind('DEMO_LEVEL', '9');
    variables.markReadOnly('DEMO_LEVEL');
    const ctx = buildContext(variables);
    const loader = new ExtensionLoader(ctx);

    expect(loader.load(demoManifest())).toEqual({
      ok: false,
      reason: 'Variable is read-only',
      details: 'DEMO_LEVEL',
    });
    expect(ctx.system.registry.size).toBe(0);
    expect(variables.get('DEMO_LEVEL')).toBe('9');
  });
});

describe('ExtensionLoader.unload', () => {
  it('L7: removes options, variables and commands and refreshes the mirrors', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);
    const onUnload = vi.fn();
    loader.load(demoManifest({ onUnload }));
    ctx.system.initialize({ importEnvironment: false });
    expect(ctx.variables.lookup(Mirror.BashOpts)?.value).toBe('demo_on');

    expect(loader.unload('demo')).toEqual({ ok: true, extension_id: 'demo' });

    expect(onUnload).toHaveBeenCalledWith(ctx);
    expect(ctx.system.findByName('demo_on')).toBeUndefined();
    expect(ctx.system.findByLetter('Q')).toBeUndefined();
    expect(ctx.variables.lookup('DEMO_LEVEL')).toBeUndefined();
    expect(ctx.variables.lookup(Mirror.BashOpts)?.value).toBe('');
    expect(loader.findCommand('demo')).toBeUndefined();
    expect(loader.list()).toEqual([]);
  });

  it('L7: an unloaded extension can be loaded again with its last values', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);
    const manifest = demoManifest();
    loader.load(manifest);
    expect(ctx.system.writeByLetter('Q', AccessClass.Short, 1)).toBe(Outcome.Changed);
    loader.unload('demo');

    expect(loader.load(manifest)).toEqual({ ok: true, extension_id: 'demo' });
    expect(ctx.system.read(ctx.system.findByLetter('Q'), AccessClass.Short)).toBe(1);
  });

  it('L8: refuses builtin and unknown extensions', () => {
    const loader = new ExtensionLoader(buildContext());
    loader.load(demoManifest({ builtin: true }));

    expect(loader.unload('demo')).toEqual({
      ok: false,
      reason: 'Builtin extension cannot be unloaded: demo',
    });
    expect(loader.unload('missing')).toEqual({ ok: false, reason: 'Extension not loaded: missing' });
    expect(loader.isLoaded('demo')).toBe(true);
  });

  it('L9: keeps the extension when onUnload throws', () => {
    const ctx = buildContext();
    const loader = new ExtensionLoader(ctx);
    loader.load(
      demoManifest({
        onUnload: () => {
          throw new Error('busy');
        },
      }),
    );

    expect(loader.unload('demo')).toEqual({ ok: false, reason: 'onUnload failed', details: 'busy' });
    expect(ctx.system.findByName('demo_on')).toBeDefined();
    expect(loader.isLoaded('demo')).toBe(true);
  });
});
