/**
 * Switchboard Kernel - Adapter Interfaces
 *
 * The kernel never owns the interpreter's variable table. The environment
 * mirrors reach it only through the VariableStore adapter below, which the
 * runtime host implements and injects when it builds an OptionSystem.
 *
 * No implementations are provided here. Adapters are injected, not constructed.
 */

// ---------------------------------------------------------------------------
// Variable Store
// ---------------------------------------------------------------------------

/** A variable as seen through the adapter. */
export interface VariableView {
  readonly value: string;
  /**
   * True while the value is the one inherited from the parent environment.
   * Any assignment made during the session clears it.
   */
  readonly imported: boolean;
  readonly readOnly: boolean;
}

export interface BindOptions {
  /** Overwrite the value even when the variable is read-only. */
  readonly force?: boolean | undefined;
}

/**
 * The subset of the interpreter's variable table used by the mirror
 * synchronizer and by extensions.
 */
export interface VariableStore {
  lookup(name: string): VariableView | undefined;
  /**
   * Create or overwrite a variable.
   *
   * @returns false when the variable is read-only and `force` is not set.
   */
  bind(name: string, value: string, options?: BindOptions): boolean;
  markReadOnly(name: string): void;
  /** Remove a variable regardless of its attributes. No-op if absent. */
  unbind(name: string): void;
}
