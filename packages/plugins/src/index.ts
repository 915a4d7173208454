/**
 * @plugscan/plugins - caller-side plugin management
 *
 * Opt-in static discovery with a dynamic fallback, a fingerprint-keyed
 * manifest cache and entry-point metadata lookup.
 */

export { DEFAULT_ENTRY_POINT_GROUP, FALLBACK_LOG_TAG, STATIC_DISCOVERY_ENV } from "./constants.js";
export {
  type CachedManifest,
  type CachedOrigin,
  DiscoveryCache,
  discoveryFingerprint,
} from "./discovery-cache.js";
export {
  type EntryPoint,
  normalizeDistributionName,
  parseEntryPoints,
  readEntryPointHint,
} from "./entry-points.js";
export { createFallbackController } from "./fallback-controller.js";
export { resolveStaticDiscoveryFlag } from "./flags.js";
export { getFallbackDiscoveryCounter, getStaticDiscoveryCounter } from "./metrics.js";
export { SerialQueue } from "./serial-queue.js";
export type {
  BatchOutcome,
  DiscoveryFailure,
  DiscoveryOutcome,
  DiscoveryRequest,
  DiscoverySource,
  DynamicDiscovery,
  FallbackController,
  FallbackControllerConfig,
} from "./types.js";

export const PACKAGE_NAME = "@plugscan/plugins";
