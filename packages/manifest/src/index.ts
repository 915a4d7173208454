/**
 * @plugscan/manifest
 *
 * Manifest JSON for discovered packages: serialization, schema validation,
 * and comparison against reference manifests.
 */

export { assertManifestEquivalent, compareManifests } from "./compare.js";
export {
  formatPath,
  type ManifestPackageJSON,
  ManifestPackageSchema,
  type ManifestPluginJSON,
  ManifestPluginSchema,
  ManifestReferenceSchema,
  validateManifest,
} from "./schema.js";
export { serializeManifest, toManifestPackage, toManifestPlugin } from "./serialize.js";
export type {
  ManifestPackage,
  ManifestPlugin,
  ManifestReference,
  ManifestValue,
  NullPolicy,
  SerializeOptions,
} from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@plugscan/manifest";
