/**
 * Switchboard Extension Loader - Extension Loader
 *
 * The ExtensionLoader moves extensions in and out of a running session.
 *
 * Loading is a multi-step process:
 * 1. Validate the manifest (ExtensionValidator.validateManifest)
 * 2. Refuse an extension_id that is already loaded
 * 3. Refuse commands already provided by a loaded extension
 * 4. Refuse variables that exist and are read-only
 * 5. Register options in manifest order; the first outcome other than
 *    Changed deregisters the ones already registered and fails the load
 * 6. Bind variables
 * 7. Run onLoad; a throw undoes steps 5 and 6
 * 8. Record the extension in the ExtensionRegistry
 *
 * Unloading runs onUnload, deregisters options in reverse order under the
 * Unload access class, and unbinds variables. Builtin extensions stay.
 */

import {
  Outcome,
  optionLabel,
  type OptionDescriptor,
} from '@switchboard/kernel';
import { ExtensionRegistry, type CommandEntry } from './registry.js';
import type {
  ExtensionContext,
  ExtensionManifest,
  LoadResult,
  UnloadResult,
} from './types.js';
import { ExtensionValidator } from './validator.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function registrationFailure(outcome: Outcome): string {
  switch (outcome) {
    case Outcome.Duplicate:
      return 'name or letter is already registered';
    case Outcome.Unchanged:
      return 'descriptor is already registered';
    case Outcome.BadValue:
      return 'descriptor has no valid name or letter';
    default:
      return outcome;
  }
}

// ---------------------------------------------------------------------------
// Extension Loader
// ---------------------------------------------------------------------------

export class ExtensionLoader {
  private readonly validator = new ExtensionValidator();
  private readonly registry = new ExtensionRegistry();

  constructor(private readonly context: ExtensionContext) {}

  /**
   * Load an extension through the full validation and registration pipeline.
   *
   * @returns LoadResult: ok on success, failure with reason if rejected.
   *   Nothing the extension contributes remains registered after a failure.
   * @throws {InternalConsistencyError} propagated from the option registry
   *   in strict mode, after already-registered options are rolled back
   */
  load(manifest: ExtensionManifest): LoadResult {
    const validation = this.validator.validateManifest(manifest);
    if (!validation.ok) {
      return {
        ok: false,
        reason: 'Manifest validation failed',
        details: validation.errors.map((e) => e.message).join('; '),
      };
    }

    const id = manifest.extension_id;
    if (this.registry.has(id)) {
      return { ok: false, reason: `Extension already loaded: ${id}` };
    }

    const takenCommands = this.registry.conflictingCommands(manifest);
    if (takenCommands.length > 0) {
      return {
        ok: false,
        reason: 'Command already provided by another extension',
        details: takenCommands.join(', '),
      };
    }

    const lockedVariables = manifest.variables
      .filter((v) => this.context.variables.lookup(v.name)?.readOnly === true)
      .map((v) => v.name);
    if (lockedVariables.length > 0) {
      return {
        ok: false,
        reason: 'Variable is read-only',
        details: lockedVariables.join(', '),
      };
    }

    const registered: OptionDescriptor[] = [];
    try {
      for (const option of manifest.options) {
        const outcome = this.context.system.register(option);
        if (outcome !== Outcome.Changed) {
          this.deregisterAll(registered);
          return {
            ok: false,
            reason: 'Option registration failed',
            details: `${optionLabel(option)}: ${registrationFailure(outcome)}`,
          };
        }
        registered.push(option);
      }
    } catch (err) {
      this.deregisterAll(registered);
      throw err;
    }

    for (const variable of manifest.variables) {
      this.context.variables.bind(variable.name, variable.value);
      if (variable.readOnly === true) {
        this.context.variables.markReadOnly(variable.name);
      }
    }

    if (manifest.onLoad !== undefined) {
      try {
        manifest.onLoad(this.context);
      } catch (err) {
        this.unbindAll(manifest);
        this.deregisterAll(registered);
        return { ok: false, reason: 'onLoad failed', details: errorMessage(err) };
      }
    }

    this.registry.register(manifest);
    return { ok: true, extension_id: id };
  }

  /**
   * Remove a loaded extension from the session.
   */
  unload(extensionId: string): UnloadResult {
    const manifest = this.registry.get(extensionId);
    if (manifest === undefined) {
      return { ok: false, reason: `Extension not loaded: ${extensionId}` };
    }
    if (manifest.builtin) {
      return { ok: false, reason: `Builtin extension cannot be unloaded: ${extensionId}` };
    }

    if (manifest.onUnload !== undefined) {
      try {
        manifest.onUnload(this.context);
      } catch (err) {
        return { ok: false, reason: 'onUnload failed', details: errorMessage(err) };
      }
    }

    this.deregisterAll(manifest.options);
    this.unbindAll(manifest);
    this.registry.remove(extensionId);
    return { ok: true, extension_id: extensionId };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Loaded extensions in load order. */
  list(): ReadonlyArray<ExtensionManifest> {
    return this.registry.list();
  }

  get(extensionId: string): ExtensionManifest | undefined {
    return this.registry.get(extensionId);
  }

  isLoaded(extensionId: string): boolean {
    return this.registry.has(extensionId);
  }

  findCommand(name: string): CommandEntry | undefined {
    return this.registry.findCommand(name);
  }

  // -------------------------------------------------------------------------
  // Rollback
  // -------------------------------------------------------------------------

  private deregisterAll(options: ReadonlyArray<OptionDescriptor>): void {
    for (let i = options.length - 1; i >= 0; i--) {
      const option = options[i];
      if (option !== undefined) this.context.system.deregister(option);
    }
  }

  private unbindAll(manifest: ExtensionManifest): void {
    for (const variable of manifest.variables) {
      this.context.variables.unbind(variable.name);
    }
  }
}
