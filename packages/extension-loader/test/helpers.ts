/**
 * Shared fixtures for extension-loader tests.
 */

import { OptionSystem, defineOption } from '@switchboard/kernel';
import { ShellVariables } from '@switchboard/runtime-host';
import type { ExtensionContext, ExtensionManifest } from '../src/index.js';

export function buildContext(variables = new ShellVariables()): ExtensionContext {
  return { variables, system: new OptionSystem({ variables }) };
}

/** A fresh manifest per call, so descriptors are never shared between tests. */
export function demoManifest(overrides: Partial<ExtensionManifest> = {}): ExtensionManifest {
  return {
    extension_id: 'demo',
    extension_name: 'Demo',
    version: '1.0.0',
    description: 'Demo extension',
    builtin: false,
    options: [
      defineOption({ name: 'demo_on', initial: 1, flags: { bashopts: true, hideSetO: true } }),
      defineOption({ name: 'demo_off', letter: 'Q', flags: { shellopts: true } }),
    ],
    variables: [{ name: 'DEMO_LEVEL', value: '3' }],
    commands: [
      {
        name: 'demo',
        usage: 'demo [ARG ...]',
        description: 'Echo the arguments.',
        run: (args) => ({ status: 0, stdout: [args.join(' ')], stderr: [] }),
      },
    ],
    ...overrides,
  };
}
