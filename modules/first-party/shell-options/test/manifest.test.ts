/**
 * Switchboard First-Party Shell Options - Manifest Tests
 *
 * Loads the builtin extension into a fresh session and checks the
 * behaviour of the code-defined options.
 */

import { describe, it, expect } from 'vitest';
import { AccessClass, Mirror, OptionSystem, Outcome } from '@switchboard/kernel';
import { ExtensionLoader } from '@switchboard/extension-loader';
import { ShellVariables } from '@switchboard/runtime-host';
import { createShellOptionsExtension, type SessionTraits } from '../src/index.js';

function startSession(traits: SessionTraits = {}) {
  const variables = new ShellVariables();
  const system = new OptionSystem({ variables });
  const loader = new ExtensionLoader({ variables, system });
  const extension = createShellOptionsExtension(traits);
  expect(loader.load(extension.manifest)).toEqual({ ok: true, extension_id: 'shell-options' });
  system.initialize({ importEnvironment: false });
  return { variables, system, loader, extension };
}

describe('createShellOptionsExtension', () => {
  it('registers every option and publishes the default mirrors', () => {
    const { system, variables } = startSession();

    expect(system.registry.size).toBe(73);
    expect(variables.get(Mirror.ShellOpts)).toBe('braceexpand:hashall:interactive-comments');
    expect(variables.get(Mirror.BashOpts)).toBe(
      'checkwinsize:cmdhist:complete_fullquote:extquote:force_fignore:' +
        'globasciiranges:hostcomplete:progcomp:promptvars:sourcepath',
    );
  });

  it('cannot be unloaded', () => {
    const { loader } = startSession();
    expect(loader.unload('shell-options')).toEqual({
      ok: false,
      reason: 'Builtin extension cannot be unloaded: shell-options',
    });
  });

  it('keeps separate sessions independent', () => {
    const a = startSession();
    const b = startSession();

    a.system.writeByLetter('f', AccessClass.Short, 1);

    expect(a.system.read(a.system.findByName('noglob'), AccessClass.Short)).toBe(1);
    expect(b.system.read(b.system.findByName('noglob'), AccessClass.Short)).toBe(0);
  });
});

describe('line editing mode', () => {
  it('starts in emacs mode only for interactive sessions', () => {
    expect(startSession({ interactive: true }).extension.editing.mode).toBe('emacs');
    expect(startSession().extension.editing.mode).toBe('none');
  });

  it('makes emacs and vi mutually exclusive', () => {
    const { system, variables, extension } = startSession({ interactive: true });

    expect(system.writeByName('vi', AccessClass.SetO, 1)).toBe(Outcome.Changed);

    expect(extension.editing.mode).toBe('vi');
    expect(system.read(system.findByName('emacs'), AccessClass.SetO)).toBe(0);
    expect(variables.get(Mirror.ShellOpts)).toBe('braceexpand:hashall:interactive-comments:vi');
  });

  it('turns line editing off when the active mode is turned off', () => {
    const { system, extension } = startSession({ interactive: true });

    expect(system.writeByName('vi', AccessClass.SetO, 0)).toBe(Outcome.Unchanged);
    expect(system.writeByName('emacs', AccessClass.SetO, 0)).toBe(Outcome.Changed);
    expect(extension.editing.mode).toBe('none');
  });
});

describe('session options', () => {
  it('interactive is read-only', () => {
    const { system } = startSession({ interactive: true });
    const interactive = system.findByLetter('i');

    expect(system.write(interactive, AccessClass.SetO, 0)).toBe(Outcome.ReadOnly);
    expect(system.read(interactive, AccessClass.SetO)).toBe(1);
  });

  it('privileged can only change at startup', () => {
    const { system } = startSession();

    expect(system.writeByLetter('p', AccessClass.Argv, 1)).toBe(Outcome.Changed);
    expect(system.writeByLetter('p', AccessClass.Short, 1)).toBe(Outcome.Unchanged);
    expect(system.writeByLetter('p', AccessClass.Short, 0)).toBe(Outcome.Forbidden);
  });

  it('login_shell and restricted_shell report the session traits', () => {
    const { system } = startSession({ loginShell: true });

    expect(system.read(system.findByName('login_shell'), AccessClass.Shopt)).toBe(1);
    expect(system.read(system.findByName('restricted_shell'), AccessClass.Shopt)).toBe(0);
    expect(system.writeByName('login_shell', AccessClass.Shopt, 0)).toBe(Outcome.ReadOnly);
  });

  it('nolog accepts and ignores changes', () => {
    const { system } = startSession();

    expect(system.writeByName('nolog', AccessClass.SetO, 1)).toBe(Outcome.Ignored);
    expect(system.read(system.findByName('nolog'), AccessClass.SetO)).toBe(0);
  });
});
