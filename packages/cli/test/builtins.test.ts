/**
 * Switchboard CLI - Builtin Tests
 *
 * Coverage:
 *   B1: set letters, grouping and the `$-` value
 *   B2: set -o / +o by name and the two listings
 *   B3: set diagnostics and exit statuses
 *   B4: shopt enable, disable, query and listing filters
 *   B5: declare -p attributes and NAME=value assignment
 *   B6: enable loads and unloads catalog extensions
 *   B7: help, describe and exit
 *   B8: dispatch of extension commands and unknown commands
 *
 * Isolation: every test starts a fresh Session with no StateIO.
 */

import { describe, it, expect } from 'vitest';
import { Mirror } from '@switchboard/kernel';
import type { CommandResult } from '@switchboard/extension-loader';
import { Session } from '../src/session/session.js';

function run(session: Session, line: string): CommandResult {
  const results = session.execute(line);
  expect(results).toHaveLength(1);
  const [result] = results;
  if (result === undefined) throw new Error('no result');
  return result;
}

const ok = { status: 0, stdout: [], stderr: [] };

function onOff(name: string, on: boolean): string {
  return `${name.padEnd(23)}\t${on ? 'on' : 'off'}`;
}

describe('set', () => {
  it('B1: turns lettered options on and off', () => {
    const session = new Session();
    expect(session.flags()).toBe('Bh');

    expect(run(session, 'set -e')).toEqual(ok);
    expect(session.flags()).toBe('Beh');

    expect(run(session, 'set +e')).toEqual(ok);
    expect(session.flags()).toBe('Bh');
  });

  it('B1: accepts grouped letters', () => {
    const session = new Session();
    expect(run(session, 'set -eu')).toEqual(ok);
    expect(session.flags()).toBe('Behu');
  });

  it('B1: mirrors lettered changes into SHELLOPTS', () => {
    const session = new Session();
    run(session, 'set -f');
    expect(session.variables.get(Mirror.ShellOpts)).toBe(
      'braceexpand:hashall:interactive-comments:noglob',
    );
    run(session, 'set +f');
    expect(session.variables.get(Mirror.ShellOpts)).toBe('braceexpand:hashall:interactive-comments');
  });

  it('B2: turns named options on and off', () => {
    const session = new Session();
    expect(run(session, 'set -o pipefail')).toEqual(ok);
    expect(session.variables.get(Mirror.ShellOpts)).toBe(
      'braceexpand:hashall:interactive-comments:pipefail',
    );
    expect(run(session, 'set +o pipefail')).toEqual(ok);
    expect(session.variables.get(Mirror.ShellOpts)).toBe('braceexpand:hashall:interactive-comments');
  });

  it('B2: lists set -o options as a table', () => {
    const result = run(new Session(), 'set -o');

    expect(result.status).toBe(0);
    expect(result.stdout).toHaveLength(27);
    expect(result.stdout[0]).toBe(onOff('allexport', false));
    expect(result.stdout).toContain(onOff('braceexpand', true));
    expect(result.stdout).not.toContain(onOff('interactive', false));
    expect(result.stdout).not.toContain(onOff('extglob', false));
  });

  it('B2: lists set +o options as commands', () => {
    const result = run(new Session(), 'set +o');

    expect(result.stdout[0]).toBe('set +o allexport');
    expect(result.stdout).toContain('set -o braceexpand');
    expect(result.stdout).toContain('set +o noglob');
  });

  it('B2: lists, then reads a following option word as flags', () => {
    const session = new Session();
    const listed = run(session, 'set -o -e');

    expect(listed.status).toBe(0);
    expect(listed.stderr).toEqual([]);
    expect(listed.stdout).toHaveLength(27);
    expect(listed.stdout).toContain(onOff('errexit', false));
    expect(session.flags()).toBe('Beh');

    const script = run(session, 'set +o +e');
    expect(script.stdout).toContain('set -o errexit');
    expect(session.flags()).toBe('Bh');
  });

  it('B2: sets positional parameters', () => {
    const session = new Session();
    run(session, 'set -e -- a b');
    expect(session.positional).toEqual(['a', 'b']);
    expect(session.flags()).toBe('Beh');

    run(session, 'set x y');
    expect(session.positional).toEqual(['x', 'y']);
  });

  it('B2: prints variables without arguments', () => {
    const session = new Session({ env: { GREETING: 'hello world', PLAIN: 'abc' } });
    const result = run(session, 'set');

    expect(result.stdout).toContain("GREETING='hello world'");
    expect(result.stdout).toContain('PLAIN=abc');
  });

  it('B3: rejects an unknown letter with a usage error', () => {
    const session = new Session();
    expect(run(session, 'set -eZ')).toEqual({
      status: 2,
      stdout: [],
      stderr: [
        'set: -Z: invalid option',
        'set: usage: set [-BCEHPTabefhikmnptuvx] [-o option-name] [--] [arg ...]',
      ],
    });
    // letters before the bad one stay applied
    expect(session.flags()).toBe('Beh');
  });

  it('B3: rejects an unknown name', () => {
    expect(run(new Session(), 'set -o bogus')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['set: bogus: invalid option name'],
    });
  });

  it('B3: refuses read-only and change-restricted options', () => {
    const session = new Session();
    expect(run(session, 'set +i')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['set: +i: read-only option'],
    });
    expect(run(session, 'set -p')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['set: -p: cannot be changed after startup'],
    });
  });

  it('B3: reports nothing for an ignored change', () => {
    const session = new Session();
    expect(run(session, 'set -o nolog')).toEqual(ok);
    expect(session.variables.get(Mirror.ShellOpts)).toBe('braceexpand:hashall:interactive-comments');
  });
});

describe('shopt', () => {
  const enabledByDefault = [
    'checkwinsize',
    'cmdhist',
    'complete_fullquote',
    'extquote',
    'force_fignore',
    'globasciiranges',
    'hostcomplete',
    'progcomp',
    'promptvars',
    'sourcepath',
  ];

  it('B4: enables and queries an option', () => {
    const session = new Session();
    expect(run(session, 'shopt -s extglob')).toEqual(ok);
    expect(run(session, 'shopt extglob')).toEqual({ status: 0, stdout: [onOff('extglob', true)], stderr: [] });
    expect(session.variables.get(Mirror.BashOpts)).toBe(
      'checkwinsize:cmdhist:complete_fullquote:extglob:extquote:force_fignore:' +
        'globasciiranges:hostcomplete:progcomp:promptvars:sourcepath',
    );
  });

  it('B4: -q reports through the status only', () => {
    const session = new Session();
    run(session, 'shopt -s extglob');
    expect(run(session, 'shopt -q extglob')).toEqual(ok);
    expect(run(session, 'shopt -q extglob dotglob')).toEqual({ status: 1, stdout: [], stderr: [] });
  });

  it('B4: -p prints commands', () => {
    const session = new Session();
    expect(run(session, 'shopt -p cmdhist dotglob').stdout).toEqual(['shopt -s cmdhist', 'shopt -u dotglob']);
    expect(run(session, 'shopt -po noglob').stdout).toEqual(['set +o noglob']);
  });

  it('B4: -s without names lists only enabled options', () => {
    const result = run(new Session(), 'shopt -s');
    expect(result.stdout).toEqual(enabledByDefault.map((name) => onOff(name, true)));
  });

  it('B4: -u without names lists only disabled options', () => {
    const result = run(new Session(), 'shopt -u');
    expect(result.stdout).toContain(onOff('login_shell', false));
    expect(result.stdout).not.toContain(onOff('cmdhist', true));
    expect(result.stdout).not.toContain(onOff('interactive', false));
  });

  it('B4: rejects -s together with -u', () => {
    expect(run(new Session(), 'shopt -s -u extglob')).toEqual({
      status: 2,
      stdout: [],
      stderr: [
        'shopt: cannot set and unset shell options simultaneously',
        'shopt: usage: shopt [-pqsu] [-o] [optname ...]',
      ],
    });
  });

  it('B4: rejects unknown letters and names', () => {
    const session = new Session();
    expect(run(session, 'shopt -x')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['shopt: -x: invalid option', 'shopt: usage: shopt [-pqsu] [-o] [optname ...]'],
    });
    expect(run(session, 'shopt -s bogus extglob')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['shopt: bogus: invalid option name'],
    });
    // later names are still processed
    expect(run(session, 'shopt -q extglob').status).toBe(0);
  });

  it('B4: refuses read-only options', () => {
    expect(run(new Session(), 'shopt -u login_shell')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['shopt: login_shell: read-only option'],
    });
  });
});

describe('declare and assignment', () => {
  it('B5: prints attributes', () => {
    const session = new Session({ env: { HOME: '/home/test' } });

    expect(run(session, 'declare -p HOME SHELLOPTS')).toEqual({
      status: 0,
      stdout: [
        'declare -x HOME="/home/test"',
        'declare -r SHELLOPTS="braceexpand:hashall:interactive-comments"',
      ],
      stderr: [],
    });
  });

  it('B5: assigns variables and escapes their values', () => {
    const session = new Session();
    expect(run(session, 'GREETING=hello')).toEqual(ok);
    expect(run(session, 'MSG=a"b$c')).toEqual(ok);

    expect(run(session, 'declare -p GREETING MSG').stdout).toEqual([
      'declare -- GREETING="hello"',
      'declare -- MSG="a\\"b\\$c"',
    ]);
  });

  it('B5: refuses to assign a read-only variable', () => {
    const session = new Session();
    expect(run(session, 'SHELLOPTS=noglob set -e')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['SHELLOPTS: readonly variable'],
    });
    expect(session.flags()).toBe('Bh');
  });

  it('B5: reports unknown variables', () => {
    expect(run(new Session(), 'declare -p MISSING')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['declare: MISSING: not found'],
    });
  });
});

describe('enable', () => {
  it('B6: lists loaded and available extensions', () => {
    const session = new Session();
    expect(run(session, 'enable').stdout).toEqual(['enable shell-options']);
    expect(run(session, 'enable -a').stdout).toEqual(['enable shell-options', 'enable -n factorize']);
  });

  it('B6: loads and unloads an extension', () => {
    const session = new Session();

    expect(run(session, 'enable -f factorize')).toEqual(ok);
    expect(run(session, 'enable').stdout).toEqual(['enable shell-options', 'enable factorize']);
    expect(session.variables.get(Mirror.BashOpts)).toBe(
      'auto_factorize:checkwinsize:cmdhist:complete_fullquote:extquote:force_fignore:' +
        'globasciiranges:hostcomplete:progcomp:promptvars:sourcepath:verbose_factorize',
    );
    expect(run(session, 'is_prime -q 7')).toEqual(ok);

    expect(run(session, 'enable -d factorize')).toEqual(ok);
    expect(run(session, 'is_prime 7')).toEqual({
      status: 127,
      stdout: [],
      stderr: ['is_prime: command not found'],
    });
  });

  it('B6: reports load and unload failures', () => {
    const session = new Session();
    expect(run(session, 'enable -f nope')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['enable: nope: Unknown extension: nope'],
    });
    expect(run(session, 'enable -d shell-options')).toEqual({
      status: 1,
      stdout: [],
      stderr: ['enable: shell-options: Builtin extension cannot be unloaded: shell-options'],
    });
    expect(run(session, 'enable -f')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['enable: -f: option requires an argument', 'enable: usage: enable [-a] [-f NAME | -d NAME]'],
    });
  });
});

describe('help, describe and exit', () => {
  it('B7: help lists builtins then extension commands', () => {
    const session = new Session();
    run(session, 'enable -f factorize');

    expect(run(session, 'help').stdout).toEqual([
      'declare -p [name ...]',
      'describe [-1|-2|-3] NAME ...',
      'enable [-a] [-f NAME | -d NAME]',
      'exit [n]',
      'help [name ...]',
      'set [-abefhkmnptuvxBCEHPT] [-o option-name] [--] [arg ...]',
      'shopt [-pqsu] [-o] [optname ...]',
      'is_prime [-aq] [N ...]',
    ]);
    expect(run(session, 'help is_prime').stdout).toEqual([
      'is_prime: is_prime [-aq] [N ...]',
      '    Report whether each N (default $PRIME_CANDIDATE) is prime.',
    ]);
    expect(run(session, 'help nope')).toEqual({
      status: 1,
      stdout: [],
      stderr: ["help: no help topics match 'nope'"],
    });
  });

  it('B7: describe looks options up by name or letter', () => {
    const session = new Session();
    const line = `${'noglob'.padEnd(23)}\toff\t+f`;

    expect(run(session, 'describe -1 noglob').stdout).toEqual([line]);
    expect(run(session, 'describe -1 f').stdout).toEqual([line]);
    expect(run(session, 'describe nope')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['describe: nope: invalid option name'],
    });
    expect(run(session, 'describe').stderr).toEqual(['describe: usage: describe [-1|-2|-3] NAME ...']);
  });

  it('B7: exit stops the remaining commands', () => {
    const session = new Session();
    expect(session.execute('exit 3; set -e')).toEqual([ok]);
    expect(session.exitRequested).toBe(3);
    expect(session.flags()).toBe('Bh');
  });

  it('B7: exit defaults to the last status and wraps large values', () => {
    const first = new Session();
    first.execute('set -Z; exit');
    expect(first.exitRequested).toBe(2);

    const second = new Session();
    second.execute('exit 300');
    expect(second.exitRequested).toBe(44);

    const third = new Session();
    expect(run(third, 'exit abc')).toEqual({
      status: 2,
      stdout: [],
      stderr: ['exit: abc: numeric argument required'],
    });
    expect(third.exitRequested).toBe(2);
  });
});

describe('dispatch', () => {
  it('B8: reports unknown commands', () => {
    expect(run(new Session(), 'frobnicate now')).toEqual({
      status: 127,
      stdout: [],
      stderr: ['frobnicate: command not found'],
    });
  });

  it('B8: runs several commands and ignores comments', () => {
    const session = new Session();
    expect(session.execute('set -e; set -u # set -x')).toEqual([ok, ok]);
    expect(session.flags()).toBe('Behu');
    expect(session.lastStatus).toBe(0);
  });

  it('B8: runs auto_factorize through the extension command', () => {
    const session = new Session();
    run(session, 'enable -f factorize');
    run(session, 'shopt -u verbose_factorize');

    expect(run(session, 'is_prime')).toEqual({
      status: 1,
      stdout: ['42 is divisible by 2, giving 21'],
      stderr: [],
    });
    expect(session.variables.get('PRIME_CANDIDATE')).toBe('21');
    expect(session.variables.get('PRIME_DIVISOR')).toBe('2');
  });
});
