import type { PluginKind } from "./discovery-types.js";

// ---------------------------------------------------------------------------
// Descriptor constructor → plugin kind (closed mapping)
// ---------------------------------------------------------------------------

/** Every plugin kind, in manifest documentation order. */
export const PLUGIN_KINDS = ["parser", "upgrader", "exporter", "base"] as const;

/**
 * Descriptor constructor names recognised in registration files.
 * Adding a kind means extending `PluginKind`, this table, and `PLUGIN_FIELDS`.
 */
export const DESCRIPTOR_CONSTRUCTORS: Readonly<Record<string, PluginKind>> = Object.freeze({
  ParserPlugin: "parser",
  UpgraderPlugin: "upgrader",
  ExporterPlugin: "exporter",
  BasePlugin: "base",
});

/**
 * Map a descriptor constructor name to its plugin kind.
 * Returns undefined for names outside the mapping.
 */
export function pluginKindForConstructor(constructorName: string): PluginKind | undefined {
  return Object.hasOwn(DESCRIPTOR_CONSTRUCTORS, constructorName)
    ? DESCRIPTOR_CONSTRUCTORS[constructorName]
    : undefined;
}

export function isPluginKind(value: string): value is PluginKind {
  return PLUGIN_KINDS.some((kind) => kind === value);
}
