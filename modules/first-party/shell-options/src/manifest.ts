/**
 * Switchboard First-Party Shell Options - Manifest
 *
 * The interpreter's own options packaged as a builtin extension. A fresh
 * manifest (fresh descriptors, fresh storage) is built per session, so two
 * sessions in one process never share option state.
 */

import { defineOption, toOptionValue, type OptionDescriptor } from '@switchboard/kernel';
import type { ExtensionManifest } from '@switchboard/extension-loader';
import { catalogOptions, loadCatalog, type ShellOptionCatalog } from './catalog.js';
import { createEditingModeOptions, type EditingModeState } from './editing-mode.js';

export const SHELL_OPTIONS_EXTENSION_ID = 'shell-options';

/** Facts about the session fixed when it starts. */
export interface SessionTraits {
  readonly interactive?: boolean | undefined;
  readonly loginShell?: boolean | undefined;
  readonly restricted?: boolean | undefined;
  readonly privileged?: boolean | undefined;
}

export interface ShellOptionsExtension {
  readonly manifest: ExtensionManifest;
  readonly editing: EditingModeState;
}

function sessionOptions(traits: SessionTraits): OptionDescriptor[] {
  return [
    defineOption({
      name: 'interactive',
      letter: 'i',
      initial: toOptionValue(traits.interactive === true),
      flags: { readOnly: true, hideSetO: true, hideShopt: true },
      help: 'The shell is reading commands from a terminal.',
    }),
    defineOption({
      name: 'privileged',
      letter: 'p',
      initial: toOptionValue(traits.privileged === true),
      flags: { forbidChange: true, shellopts: true, hideShopt: true },
      help: 'Do not read startup files from the environment.\nCan only be changed when the shell starts.',
    }),
    defineOption({
      name: 'login_shell',
      initial: toOptionValue(traits.loginShell === true),
      flags: { readOnly: true, bashopts: true, hideSetO: true },
      help: 'The shell was started as a login shell.',
    }),
    defineOption({
      name: 'restricted_shell',
      initial: toOptionValue(traits.restricted === true),
      flags: { readOnly: true, bashopts: true, hideSetO: true },
      help: 'The shell was started in restricted mode.',
    }),
  ];
}

/**
 * Build the builtin shell-options extension.
 *
 * Interactive sessions start in emacs editing mode, others with line
 * editing off.
 */
export function createShellOptionsExtension(
  traits: SessionTraits = {},
  catalog: ShellOptionCatalog = loadCatalog(),
): ShellOptionsExtension {
  const editing = createEditingModeOptions(traits.interactive === true ? 'emacs' : 'none');

  const manifest: ExtensionManifest = {
    extension_id: SHELL_OPTIONS_EXTENSION_ID,
    extension_name: 'Shell Options',
    version: '0.1.0',
    description: 'Standard set -o and shopt options.',
    builtin: true,
    options: [
      ...catalogOptions(catalog),
      editing.emacs,
      editing.vi,
      ...sessionOptions(traits),
    ],
    variables: [],
    commands: [],
  };

  return { manifest, editing: editing.state };
}
