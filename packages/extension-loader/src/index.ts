/**
 * @switchboard/extension-loader
 *
 * Switchboard extension loader: manifest validation, load and unload with
 * rollback, and the registry of loaded extensions and their commands.
 */

export type {
  CommandResult,
  ExtensionCommand,
  ExtensionContext,
  ExtensionManifest,
  ExtensionVariable,
  LoadResult,
  UnloadResult,
  ValidationError,
  ValidationResult,
} from './types.js';

export { ExtensionLoader } from './loader.js';
export { ExtensionRegistry } from './registry.js';
export type { CommandEntry } from './registry.js';
export { ExtensionValidator } from './validator.js';
