import {
  type DiscoveryPlugin,
  isResolvedReference,
  type Package,
  PLUGIN_FIELDS,
} from "@plugscan/core";
import type {
  ManifestPackage,
  ManifestPlugin,
  ManifestValue,
  NullPolicy,
  SerializeOptions,
} from "./types.js";

const DEFAULT_NULL_POLICY: NullPolicy = "emit";

/**
 * Convert one discovered plugin into its manifest entry.
 */
export function toManifestPlugin(plugin: DiscoveryPlugin, options: SerializeOptions = {}): ManifestPlugin {
  const nullPolicy = options.nullPolicy ?? DEFAULT_NULL_POLICY;
  const entry: Record<string, ManifestValue> = { name: plugin.name, plugin_kind: plugin.kind };

  for (const field of PLUGIN_FIELDS[plugin.kind]) {
    if (field.name === "name") continue;

    const value = plugin.constructorArgs.get(field.name) ?? null;
    if (value === null && nullPolicy === "omit") continue;

    entry[field.name] = isResolvedReference(value)
      ? { module: value.module, name: value.name, kind: value.objectKind }
      : value;
  }
  return entry;
}

export function toManifestPackage(pkg: Package, options: SerializeOptions = {}): ManifestPackage {
  return {
    name: pkg.packageName,
    plugins: pkg.plugins.map((plugin) => toManifestPlugin(plugin, options)),
    metadata: pkg.metadata,
  };
}

/**
 * Serialize a package to manifest JSON. Equal packages always produce
 * byte-identical output.
 */
export function serializeManifest(pkg: Package, options: SerializeOptions = {}): string {
  return JSON.stringify(toManifestPackage(pkg, options), null, options.indent);
}
