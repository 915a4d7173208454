import { PlugscanError } from "./base.js";

/**
 * Thrown when discovery configuration fails validation.
 */
export class DiscoveryConfigurationError extends PlugscanError {
  readonly _tag = "ConfigurationError" as const;
  readonly code = "DISCOVERY_CONFIGURATION_INVALID" as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: { cause?: unknown }) {
    super(`Invalid discovery configuration: ${issues.join("; ")}`, undefined, options);
    this.issues = issues;
  }
}
