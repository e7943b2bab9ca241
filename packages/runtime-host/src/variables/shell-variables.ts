/**
 * Switchboard Runtime Host - Shell Variable Table
 *
 * The interpreter's variable table. Implements the kernel's VariableStore
 * adapter so the mirror synchronizer can publish SHELLOPTS and BASHOPTS.
 *
 * Attributes tracked per variable:
 *   imported  - still holds the value inherited from the parent environment
 *   readOnly  - user assignments are refused
 *
 * Variables inherited from the process environment start out imported.
 * Any assignment made during the session (user or forced) clears the flag.
 */

import type { BindOptions, VariableStore, VariableView } from '@switchboard/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface VariableEntry {
  value: string;
  imported: boolean;
  readOnly: boolean;
}

export type AssignResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: 'readonly' | 'invalid_name' };

const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Shell variable names: letters, digits and underscores, not starting with a digit. */
export function isValidVariableName(name: string): boolean {
  return VARIABLE_NAME_PATTERN.test(name);
}

// ---------------------------------------------------------------------------
// ShellVariables
// ---------------------------------------------------------------------------

export class ShellVariables implements VariableStore {
  private readonly entries = new Map<string, VariableEntry>();

  /**
   * Build a table from an environment block. Entries whose name is not a
   * valid variable name, or whose value is undefined, are skipped.
   */
  static fromEnvironment(env: Readonly<Record<string, string | undefined>>): ShellVariables {
    const table = new ShellVariables();
    for (const [name, value] of Object.entries(env)) {
      if (value === undefined || !isValidVariableName(name)) continue;
      table.entries.set(name, { value, imported: true, readOnly: false });
    }
    return table;
  }

  lookup(name: string): VariableView | undefined {
    const entry = this.entries.get(name);
    return entry === undefined ? undefined : { ...entry };
  }

  get(name: string): string | undefined {
    return this.entries.get(name)?.value;
  }

  bind(name: string, value: string, options: BindOptions = {}): boolean {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      this.entries.set(name, { value, imported: false, readOnly: false });
      return true;
    }
    if (entry.readOnly && options.force !== true) return false;
    entry.value = value;
    entry.imported = false;
    return true;
  }

  /**
   * A user assignment (`NAME=value`). Unlike bind(), the name is validated
   * and the reason for a refusal is reported.
   */
  assign(name: string, value: string): AssignResult {
    if (!isValidVariableName(name)) return { ok: false, reason: 'invalid_name' };
    if (!this.bind(name, value)) return { ok: false, reason: 'readonly' };
    return { ok: true };
  }

  markReadOnly(name: string): void {
    const entry = this.entries.get(name);
    if (entry !== undefined) entry.readOnly = true;
  }

  unbind(name: string): void {
    this.entries.delete(name);
  }

  /** All variables in name order. */
  list(): ReadonlyArray<readonly [string, VariableView]> {
    return [...this.entries]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, entry]) => [name, { ...entry }] as const);
  }

  get size(): number {
    return this.entries.size;
  }
}
