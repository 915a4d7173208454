import type { PluginKind } from "./discovery-types.js";

// ---------------------------------------------------------------------------
// Manifest field table
// ---------------------------------------------------------------------------

/** Value shape a manifest field accepts. */
export type FieldType = "string" | "boolean" | "reference" | "io_type";

export interface FieldSpec {
  /** Keyword argument name, also the manifest JSON key */
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
}

/** Allowed `io_type` values. */
export const IO_TYPES = ["stdin", "stdout", "both"] as const;
export type IoType = (typeof IO_TYPES)[number];

export function isIoType(value: string): value is IoType {
  return IO_TYPES.some((io) => io === value);
}

const COMMON_FIELDS: readonly FieldSpec[] = [
  { name: "name", type: "string", required: true },
  { name: "obj", type: "reference", required: true },
  { name: "config", type: "reference", required: false },
  { name: "call_method", type: "string", required: false },
  { name: "io_type", type: "io_type", required: false },
  { name: "requires_store", type: "boolean", required: false },
];

/**
 * Fields every kind serializes, in manifest key order (after `plugin_kind`,
 * which the serializer inserts right after `name`).
 */
export const PLUGIN_FIELDS: Readonly<Record<PluginKind, readonly FieldSpec[]>> = {
  parser: COMMON_FIELDS,
  exporter: COMMON_FIELDS,
  base: COMMON_FIELDS,
  upgrader: [
    ...COMMON_FIELDS,
    { name: "version_strategy", type: "reference", required: false },
    { name: "version_reader", type: "reference", required: false },
  ],
};

/** Fields that can never be tolerated as unsupported. */
export const REQUIRED_FIELD_NAMES: readonly string[] = COMMON_FIELDS.filter((f) => f.required).map(
  (f) => f.name,
);

export function fieldSpecFor(kind: PluginKind, name: string): FieldSpec | undefined {
  return PLUGIN_FIELDS[kind].find((f) => f.name === name);
}
