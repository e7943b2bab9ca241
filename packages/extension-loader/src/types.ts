/**
 * Switchboard Extension Loader - Extension Types
 *
 * An extension is a bundle of option descriptors, shell variables and
 * commands that is loaded into a running session and can later be removed
 * again. The manifest is plain data plus optional lifecycle callbacks; the
 * loader owns every registry mutation.
 */

import type { OptionDescriptor, OptionSystem, VariableStore } from '@switchboard/kernel';

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * What an extension sees of the session. Passed to lifecycle callbacks and
 * to every command invocation.
 */
export interface ExtensionContext {
  readonly variables: VariableStore;
  readonly system: OptionSystem;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/** Result of running a builtin or extension command. */
export interface CommandResult {
  readonly status: number;
  readonly stdout: ReadonlyArray<string>;
  readonly stderr: ReadonlyArray<string>;
}

export interface ExtensionCommand {
  readonly name: string;
  /** One-line synopsis shown by `help`, e.g. `is_prime [N ...]`. */
  readonly usage: string;
  readonly description: string;
  run(args: ReadonlyArray<string>, ctx: ExtensionContext): CommandResult;
}

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

/** A shell variable created on load and removed on unload. */
export interface ExtensionVariable {
  readonly name: string;
  readonly value: string;
  readonly readOnly?: boolean | undefined;
}

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

export interface ExtensionManifest {
  /** Stable id used by `enable -f` / `enable -d`, e.g. `factorize`. */
  readonly extension_id: string;
  readonly extension_name: string;
  /** Semver, e.g. `0.1.0`. */
  readonly version: string;
  readonly description: string;
  /** Builtin extensions are part of the interpreter and cannot be unloaded. */
  readonly builtin: boolean;
  /** Registered in order on load, deregistered in reverse order on unload. */
  readonly options: ReadonlyArray<OptionDescriptor>;
  readonly variables: ReadonlyArray<ExtensionVariable>;
  readonly commands: ReadonlyArray<ExtensionCommand>;
  /** Runs after options and variables are in place. Throwing aborts the load. */
  readonly onLoad?: ((ctx: ExtensionContext) => void) | undefined;
  /** Runs before anything is removed. Throwing aborts the unload. */
  readonly onUnload?: ((ctx: ExtensionContext) => void) | undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Load / Unload Results
// ---------------------------------------------------------------------------

/**
 * The result of an extension load attempt.
 * A discriminated union: either success with the loaded extension_id, or
 * failure with a structured reason.
 */
export type LoadResult =
  | { readonly ok: true; readonly extension_id: string }
  | { readonly ok: false; readonly reason: string; readonly details?: string | undefined };

export type UnloadResult =
  | { readonly ok: true; readonly extension_id: string }
  | { readonly ok: false; readonly reason: string; readonly details?: string | undefined };
