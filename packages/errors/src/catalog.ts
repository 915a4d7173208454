/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the plugscan workspace. Each code maps to a
 * domain, a severity, and whether it hands the package over to the dynamic
 * discovery path.
 *
 * Naming convention: UPPER_SNAKE_CASE
 * Domains: discovery, manifest, config, internal
 */

export type ErrorSeverity = "error" | "warning";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    severity: "error",
    triggersFallback: true,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred inside the discovery engine",
  },

  // ============================================================================
  // DISCOVERY ERRORS - static analysis of the registration file
  // ============================================================================
  SOURCE_NOT_FOUND: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Registration file not found",
    description: "The registration file is missing or more than one candidate exists",
  },
  REGISTRATION_FUNCTION_NOT_FOUND: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Registration function not found",
    description: "The registration file does not define the entry-point function",
  },
  UNRECOGNIZED_IMPORT_SYNTAX: {
    domain: "discovery",
    severity: "warning",
    triggersFallback: false,
    isExpected: true,
    title: "Unrecognized import syntax",
    description: "An import statement could not be parsed and was skipped",
  },
  UNRESOLVED_SYMBOL: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Unresolved symbol",
    description: "A referenced identifier is not bound by any import in the file",
  },
  REQUIRES_RUNTIME_INSPECTION: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Requires runtime inspection",
    description: "The value can only be known by executing the plugin package",
  },
  UNKNOWN_PLUGIN_KIND: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Unknown plugin kind",
    description: "The descriptor constructor is not in the plugin-kind mapping",
  },
  UNSUPPORTED_VALUE: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Unsupported argument value",
    description: "A descriptor argument has a shape that static discovery cannot serialize",
  },
  UNKNOWN_ARGUMENT: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: true,
    title: "Unknown descriptor argument",
    description: "A descriptor argument is not part of the manifest schema for its kind",
  },
  STRUCTURAL_MATCH_TOOL_FAILURE: {
    domain: "discovery",
    severity: "error",
    triggersFallback: true,
    isExpected: false,
    title: "Structural match failed",
    description: "The structural-matching helper failed, timed out, or returned malformed output",
  },

  // ============================================================================
  // MANIFEST ERRORS
  // ============================================================================
  SCHEMA_MISMATCH: {
    domain: "manifest",
    severity: "error",
    triggersFallback: false,
    isExpected: false,
    title: "Manifest schema mismatch",
    description: "The produced manifest disagrees with the reference manifest",
  },

  // ============================================================================
  // CONFIGURATION ERRORS
  // ============================================================================
  DISCOVERY_CONFIGURATION_INVALID: {
    domain: "config",
    severity: "error",
    triggersFallback: false,
    isExpected: true,
    title: "Invalid discovery configuration",
    description: "The discovery configuration failed validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Codes whose errors abort a discovery attempt and send the caller to the dynamic path.
 */
export type FallbackCode = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["triggersFallback"] extends true ? K : never;
}[ErrorCode];
