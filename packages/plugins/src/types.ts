import type { DiscoveryEngine, DiscoveryLogger, EntryPointHint } from "@plugscan/discovery";
import type { DiscoveryError, InternalError, PlugscanError } from "@plugscan/errors";
import type { PackageMetadata } from "@plugscan/core";
import type { SerializeOptions } from "@plugscan/manifest";
import type { CachedOrigin, DiscoveryCache } from "./discovery-cache.js";

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** One installed package to discover plugins for. */
export interface DiscoveryRequest {
  readonly packageName: string;
  /** Directory the package's sources live under */
  readonly packageRoot: string;
  /** site-packages directory holding the package's `.dist-info`, if known */
  readonly siteDir?: string | undefined;
  /** Skips entry-point lookup when given */
  readonly hint?: EntryPointHint | undefined;
  readonly metadata?: PackageMetadata | undefined;
}

/**
 * The runtime path: imports the package in an interpreter and returns its
 * manifest JSON. Supplied by the caller.
 */
export type DynamicDiscovery = (request: DiscoveryRequest) => Promise<string>;

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type DiscoverySource = "static" | "dynamic" | "cache";

export interface DiscoveryOutcome {
  readonly packageName: string;
  /** Manifest JSON text */
  readonly manifest: string;
  readonly source: DiscoverySource;
  /** Path that produced a cached manifest */
  readonly origin?: CachedOrigin | undefined;
  /** Why the static path was abandoned, when it was */
  readonly fallbackReason?: DiscoveryError | InternalError | undefined;
}

/** A package of a batch whose dynamic discovery failed too. */
export interface DiscoveryFailure {
  readonly packageName: string;
  readonly source: "error";
  readonly error: PlugscanError;
}

export type BatchOutcome = DiscoveryOutcome | DiscoveryFailure;

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export interface FallbackControllerConfig {
  readonly engine: DiscoveryEngine;
  readonly dynamicDiscovery: DynamicDiscovery;
  /** Defaults to the PLUGSCAN_STATIC_DISCOVERY environment flag */
  readonly enabled?: boolean | undefined;
  readonly cache?: DiscoveryCache | undefined;
  readonly logger?: DiscoveryLogger | undefined;
  readonly serializeOptions?: SerializeOptions | undefined;
  readonly entryPointGroup?: string | undefined;
  /** Called once per package that falls back to the dynamic path */
  readonly onFallback?: ((request: DiscoveryRequest, error: DiscoveryError | InternalError) => void) | undefined;
  /** Called for each package of a batch that could not be discovered at all */
  readonly onDiscoveryError?: ((request: DiscoveryRequest, error: PlugscanError) => void) | undefined;
}

export interface FallbackController {
  readonly enabled: boolean;
  discover(request: DiscoveryRequest): Promise<DiscoveryOutcome>;
  /**
   * Results are in request order. A package that fails on both paths yields
   * a `DiscoveryFailure` and leaves the others untouched.
   */
  discoverAll(requests: readonly DiscoveryRequest[]): Promise<BatchOutcome[]>;
}
