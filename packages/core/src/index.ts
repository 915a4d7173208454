// ---------------------------------------------------------------------------
// @plugscan/core - data model shared by the discovery engine and its callers
// ---------------------------------------------------------------------------

export type {
  AliasKind,
  ArgumentEntry,
  ArgumentValue,
  ConstructorArgValue,
  DiscoveryPlugin,
  ImportMap,
  ImportOrigin,
  ImportTarget,
  JsonValue,
  LiteralValue,
  ObjectKind,
  Package,
  PackageMetadata,
  PluginKind,
  RegistrationSite,
  ResolvedArgument,
  ResolvedReference,
  ResolvedValue,
} from "./discovery-types.js";
export { deepFreeze } from "./freeze.js";
export {
  type FieldSpec,
  type FieldType,
  fieldSpecFor,
  IO_TYPES,
  type IoType,
  isIoType,
  PLUGIN_FIELDS,
  REQUIRED_FIELD_NAMES,
} from "./manifest-fields.js";
export {
  DESCRIPTOR_CONSTRUCTORS,
  isPluginKind,
  PLUGIN_KINDS,
  pluginKindForConstructor,
} from "./plugin-kinds.js";
export { inferObjectKind, isResolvedReference } from "./type-guards.js";

// Package metadata
export const PACKAGE_NAME = "@plugscan/core";
