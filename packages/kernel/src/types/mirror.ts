/**
 * Switchboard Kernel - Environment Mirror Types
 *
 * A mirror is a variable holding the colon-separated list of enabled long
 * option names of one participating group. Each descriptor opts into a
 * mirror through a flag; unnamed descriptors never participate.
 */

import type { OptionDescriptor } from './option.js';

export enum Mirror {
  /** Options settable with `set -o`. */
  ShellOpts = 'SHELLOPTS',
  /** Options settable with `shopt`. */
  BashOpts = 'BASHOPTS',
}

export const ALL_MIRRORS: ReadonlyArray<Mirror> = [Mirror.ShellOpts, Mirror.BashOpts];

/** True if `option` is listed in (and imported from) `mirror`. */
export function participatesIn(option: OptionDescriptor, mirror: Mirror): boolean {
  if (option.name === undefined) return false;
  return mirror === Mirror.ShellOpts ? option.flags.shellopts : option.flags.bashopts;
}

/** The mirrors an option participates in, in fixed order. */
export function mirrorsOf(option: OptionDescriptor): ReadonlyArray<Mirror> {
  return ALL_MIRRORS.filter((m) => participatesIn(option, m));
}

/**
 * Receives notification that a mirror must be regenerated.
 * Implemented by the MirrorSynchronizer; the value accessor depends only on
 * this interface.
 */
export interface MirrorRefresher {
  refresh(mirror: Mirror): void;
}
