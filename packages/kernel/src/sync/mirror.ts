/**
 * Switchboard Kernel - Environment Mirror Synchronizer
 *
 * Keeps the SHELLOPTS and BASHOPTS variables consistent with the registry.
 *
 * - serialize(): rebuild a mirror from the live options and bind it
 *   (read-only) in the variable store.
 * - deserialize(): enable the options named in an inherited mirror. Runs
 *   only when the variable is still the imported one and is list-shaped.
 *   Nothing the import rejects is reported as a diagnostic; the
 *   ImportReport says what was applied and what was skipped.
 *
 * - refresh(): serialize() after a change, except while the mirror still
 *   holds the inherited value that deserialize() has yet to read.
 *
 * The synchronizer is the MirrorRefresher handed to the value accessor.
 */

import type { VariableStore } from '../adapters/index.js';
import type { OptionRegistry } from '../registry/option-registry.js';
import { AccessClass } from '../types/access.js';
import { participatesIn } from '../types/mirror.js';
import type { Mirror, MirrorRefresher } from '../types/mirror.js';
import type { OptionDescriptor, OptionValue } from '../types/option.js';
import { isGoodOutcome } from '../types/outcome.js';
import type { Outcome } from '../types/outcome.js';
import { readOption, writeOption } from '../values/accessor.js';

/** Colon-separated option names; empty segments are allowed. */
const LIST_SHAPE = /^[A-Za-z0-9_-]*(:[A-Za-z0-9_-]*)*$/;

export function isListShaped(value: string): boolean {
  return LIST_SHAPE.test(value);
}

/** Writes used while importing. Defaults to writeOption() without refresh. */
export type MirrorImportWriter = (
  option: OptionDescriptor,
  access: AccessClass,
  value: OptionValue,
) => Outcome;

export interface ImportReport {
  readonly mirror: Mirror;
  /** False when the variable was absent, assigned this session or malformed. */
  readonly accepted: boolean;
  /** Names written successfully, in list order. */
  readonly applied: ReadonlyArray<string>;
  /** Unknown, non-participating or refused names, in list order. */
  readonly skipped: ReadonlyArray<string>;
}

export class MirrorSynchronizer implements MirrorRefresher {
  private readonly importWrite: MirrorImportWriter;

  constructor(
    private readonly registry: OptionRegistry,
    private readonly variables: VariableStore,
    importWrite?: MirrorImportWriter,
  ) {
    this.importWrite = importWrite ?? ((option, access, value) => writeOption(option, access, value));
  }

  /**
   * The colon-joined names of the enabled participants of `mirror`,
   * in name order, without binding anything.
   */
  compose(mirror: Mirror): string {
    const names: string[] = [];
    for (const option of this.registry.enumerate()) {
      if (!participatesIn(option, mirror) || option.name === undefined) continue;
      if (readOption(option, AccessClass.Environ) > 0) names.push(option.name);
    }
    return names.join(':');
  }

  /**
   * Rebuild `mirror` and bind it, overriding and then restoring its
   * read-only attribute.
   *
   * @returns the value bound.
   */
  serialize(mirror: Mirror): string {
    const value = this.compose(mirror);
    this.variables.bind(mirror, value, { force: true });
    this.variables.markReadOnly(mirror);
    return value;
  }

  /**
   * Re-serialize after a change. A mirror that still holds its inherited
   * value is left for initialize(), which imports it first.
   */
  refresh(mirror: Mirror): void {
    if (this.variables.lookup(mirror)?.imported === true) return;
    this.serialize(mirror);
  }

  /**
   * Enable every participating option named in the inherited value of
   * `mirror`. Options not named are left alone.
   */
  deserialize(mirror: Mirror): ImportReport {
    const variable = this.variables.lookup(mirror);
    if (variable === undefined || !variable.imported || !isListShaped(variable.value)) {
      return { mirror, accepted: false, applied: [], skipped: [] };
    }

    const applied: string[] = [];
    const skipped: string[] = [];
    for (const name of variable.value.split(':')) {
      if (name === '') continue;
      const option = this.registry.findByName(name);
      if (option === undefined || !participatesIn(option, mirror)) {
        skipped.push(name);
        continue;
      }
      const outcome = this.importWrite(option, AccessClass.Environ, 1);
      if (isGoodOutcome(outcome)) {
        applied.push(name);
      } else {
        skipped.push(name);
      }
    }
    return { mirror, accepted: true, applied, skipped };
  }
}
