/**
 * Switchboard First-Party Shell Options - Line Editing Mode
 *
 * `emacs` and `vi` are two views of one setting: the active line-editing
 * mode. Turning one on turns the other off; turning the active one off
 * disables line editing. Both descriptors are hook-driven and share a
 * single EditingModeState.
 */

import {
  Outcome,
  defineOption,
  type OptionDescriptor,
  type OptionHooks,
} from '@switchboard/kernel';

export type EditingMode = 'emacs' | 'vi' | 'none';

export interface EditingModeState {
  mode: EditingMode;
}

function modeHooks(state: EditingModeState, mode: Exclude<EditingMode, 'none'>): OptionHooks {
  return {
    read: () => (state.mode === mode ? 1 : 0),
    write: (_option, _access, value) => {
      if (value > 0) {
        if (state.mode === mode) return Outcome.Unchanged;
        state.mode = mode;
        return Outcome.Changed;
      }
      if (state.mode !== mode) return Outcome.Unchanged;
      state.mode = 'none';
      return Outcome.Changed;
    },
  };
}

export interface EditingModeOptions {
  readonly state: EditingModeState;
  readonly emacs: OptionDescriptor;
  readonly vi: OptionDescriptor;
}

export function createEditingModeOptions(initial: EditingMode = 'none'): EditingModeOptions {
  const state: EditingModeState = { mode: initial };
  const flags = { shellopts: true, hideShopt: true };
  return {
    state,
    emacs: defineOption({
      name: 'emacs',
      hooks: modeHooks(state, 'emacs'),
      flags,
      help: 'Use an emacs-style line editing interface.',
    }),
    vi: defineOption({
      name: 'vi',
      hooks: modeHooks(state, 'vi'),
      flags,
      help: 'Use a vi-style line editing interface.',
    }),
  };
}
