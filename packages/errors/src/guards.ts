/**
 * Type guards for the error hierarchy + code-level discrimination.
 */

import type { PlugscanError } from "./base.js";
import type { ErrorCode, FallbackCode } from "./catalog.js";
import { DiscoveryError } from "./discovery.js";
import { InternalError } from "./internal.js";

/** Check if an error aborts discovery (any `DiscoveryError` subclass) */
export function isDiscoveryError(error: unknown): error is DiscoveryError {
  return error instanceof DiscoveryError;
}

/** Check if an error is an `InternalError` (bug, unexpected exception) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a PlugscanError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: PlugscanError,
  code: C,
): error is PlugscanError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error should send the caller to the dynamic discovery path.
 * Returns false for values outside the hierarchy.
 */
export function shouldFallback(
  error: unknown,
): error is PlugscanError & { readonly code: FallbackCode } {
  return (error instanceof DiscoveryError || error instanceof InternalError) && error.triggersFallback;
}
