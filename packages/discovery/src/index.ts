// ---------------------------------------------------------------------------
// @plugscan/discovery - static plugin discovery from registration source
// ---------------------------------------------------------------------------

export { classifyValue, decodeEscapes, parseArguments } from "./argument-parser.js";
export {
  type DiscoveryConfig,
  type DiscoveryConfigInput,
  DiscoveryConfigSchema,
  type EnumerationCase,
  EnumerationCaseSchema,
  resolveDiscoveryConfig,
  type StructuralMatcherConfig,
  StructuralMatcherConfigSchema,
} from "./config.js";
export {
  createDiscoveryEngine,
  type DiscoverOptions,
  type DiscoveryEngine,
  type DiscoveryEngineDeps,
  type DiscoveryResult,
  readRegistrationFile,
  type SourceContext,
} from "./engine.js";
export { type BuildImportMapOptions, buildImportMap, type ImportMapResult } from "./import-map.js";
export {
  createConsoleLogger,
  DEFAULT_LOG_TAG,
  type DiscoveryLogger,
  type LogLevel,
  silentLogger,
} from "./logger.js";
export { type BuildPluginOptions, buildDiscoveryPlugin, buildPackage } from "./manifest-builder.js";
export { maskSource } from "./scanner.js";
export {
  type ExtractSitesOptions,
  extractRegistrationSites,
  findEntryPoint,
  type FunctionSpan,
} from "./site-extractor.js";
export {
  type EntryPointHint,
  type LocateOptions,
  locateRegistrationFile,
  moduleNameFor,
  type RegistrationFile,
} from "./source-locator.js";
export {
  createCommandMatcher,
  type MatchSpan,
  parseMatchOutput,
  type StructuralMatcher,
} from "./structural-matcher.js";
export { type ResolveOptions, resolveArgument } from "./symbol-resolver.js";
export { withSpan } from "./telemetry.js";

// Package metadata
export const PACKAGE_NAME = "@plugscan/discovery";
