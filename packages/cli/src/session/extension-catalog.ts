/**
 * Switchboard CLI - Extension Catalog
 *
 * Extensions that `enable -f` and the `autoload` setting can load, keyed by
 * extension id. Each factory builds a fresh manifest, so loading the same
 * extension into two sessions never shares option storage.
 */

import type { ExtensionManifest } from '@switchboard/extension-loader';
import { FACTORIZE_EXTENSION_ID, createFactorizeExtension } from '@switchboard/module-factorize';

export type ExtensionFactory = () => ExtensionManifest;

export type ExtensionCatalog = ReadonlyMap<string, ExtensionFactory>;

export const FIRST_PARTY_EXTENSIONS: ExtensionCatalog = new Map<string, ExtensionFactory>([
  [FACTORIZE_EXTENSION_ID, createFactorizeExtension],
]);
