/**
 * @switchboard/module-shell-options
 *
 * Switchboard first-party shell options: the option catalog and the
 * builtin extension manifest that registers it.
 */

export type { CatalogEntry, ShellOptionCatalog } from './catalog.js';
export { CATALOG_URL, catalogOptions, loadCatalog, parseCatalog } from './catalog.js';
export type { EditingMode, EditingModeOptions, EditingModeState } from './editing-mode.js';
export { createEditingModeOptions } from './editing-mode.js';
export type { SessionTraits, ShellOptionsExtension } from './manifest.js';
export { SHELL_OPTIONS_EXTENSION_ID, createShellOptionsExtension } from './manifest.js';
