/**
 * @capstack/distribution
 *
 * Manifest loading and validation, the closed provider catalog, and the
 * resolver that assembles a Stack from a manifest.
 */

export type { Manifest, ProviderBinding, ServerSettings } from './manifest-schema.js';
export { ManifestSchema, ProviderBindingSchema, ServerSettingsSchema, parseManifest } from './manifest-schema.js';
export type { LoadManifestOptions } from './manifest-loader.js';
export { expandEnv, loadManifest, parseManifestText } from './manifest-loader.js';
export { ProviderCatalog, defaultCatalog } from './catalog.js';
export type { ResolveOptions, Stack } from './resolver.js';
export { resolveManifest } from './resolver.js';
