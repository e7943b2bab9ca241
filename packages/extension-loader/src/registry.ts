/**
 * Switchboard Extension Loader - Extension Registry
 *
 * The ExtensionRegistry is the authoritative record of loaded extensions,
 * in load order, and of the commands they contribute.
 *
 * Registry invariants:
 * - An extension_id appears at most once.
 * - A command name is owned by at most one loaded extension.
 *
 * The registry holds manifests only. Options and variables live in the
 * OptionSystem and the VariableStore; the loader keeps both in step.
 */

import type { ExtensionCommand, ExtensionManifest } from './types.js';

export interface CommandEntry {
  readonly extension: ExtensionManifest;
  readonly command: ExtensionCommand;
}

export class ExtensionRegistry {
  private readonly entries: Map<string, ExtensionManifest> = new Map();
  private readonly commands: Map<string, CommandEntry> = new Map();

  /**
   * Record a loaded extension.
   *
   * @throws {Error} If the extension_id is already registered or one of its
   *   commands is owned by another extension
   */
  register(manifest: ExtensionManifest): void {
    if (this.entries.has(manifest.extension_id)) {
      throw new Error(
        `Extension already registered: ${manifest.extension_id}. ` +
          `Duplicate extension_id is not permitted.`,
      );
    }
    const taken = this.conflictingCommands(manifest);
    if (taken.length > 0) {
      throw new Error(`Command already provided by another extension: ${taken.join(', ')}`);
    }
    this.entries.set(manifest.extension_id, manifest);
    for (const command of manifest.commands) {
      this.commands.set(command.name, { extension: manifest, command });
    }
  }

  /** Forget an extension and its commands. No-op when it is not registered. */
  remove(extensionId: string): void {
    const manifest = this.entries.get(extensionId);
    if (manifest === undefined) return;
    for (const command of manifest.commands) {
      this.commands.delete(command.name);
    }
    this.entries.delete(extensionId);
  }

  has(extensionId: string): boolean {
    return this.entries.has(extensionId);
  }

  get(extensionId: string): ExtensionManifest | undefined {
    return this.entries.get(extensionId);
  }

  /** Loaded extensions in load order. */
  list(): ReadonlyArray<ExtensionManifest> {
    return Array.from(this.entries.values());
  }

  findCommand(name: string): CommandEntry | undefined {
    return this.commands.get(name);
  }

  /** Names of the manifest's commands already owned by a registered extension. */
  conflictingCommands(manifest: ExtensionManifest): string[] {
    return manifest.commands
      .map((c) => c.name)
      .filter((name) => this.commands.has(name));
  }
}
