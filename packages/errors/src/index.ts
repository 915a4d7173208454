/**
 * @plugscan/errors
 *
 * Error taxonomy for static plugin discovery.
 *
 * Every error carries a `.code` from the catalog. `DiscoveryError` subclasses
 * abort a discovery attempt and tell the caller to use the dynamic path;
 * `UnrecognizedImportSyntaxError` is only ever recorded as a warning.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isPlugscanError, PlugscanError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type ErrorSeverity,
  type FallbackCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export { hasCode, isDiscoveryError, isInternalError, shouldFallback } from "./guards.js";

// ============================================================================
// DISCOVERY ERRORS
// ============================================================================

export {
  DiscoveryError,
  RegistrationFunctionNotFoundError,
  RequiresRuntimeInspectionError,
  SourceNotFoundError,
  type SourceNotFoundReason,
  StructuralMatchToolFailureError,
  UnknownArgumentError,
  UnknownPluginKindError,
  UnresolvedSymbolError,
  UnsupportedValueError,
} from "./discovery.js";

export { UnrecognizedImportSyntaxError } from "./warnings.js";

// ============================================================================
// MANIFEST / CONFIG / INTERNAL
// ============================================================================

export { type ManifestDifference, SchemaMismatchError } from "./manifest.js";
export { DiscoveryConfigurationError } from "./config.js";
export { InternalError } from "./internal.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@plugscan/errors";
