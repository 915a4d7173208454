import { type Counter, metrics } from "@opentelemetry/api";

const METER_NAME = "plugscan";

let _staticDiscoveries: Counter | undefined;
let _fallbackDiscoveries: Counter | undefined;

/** Packages served by static discovery, cache hits included. */
export function getStaticDiscoveryCounter(): Counter {
  if (!_staticDiscoveries) {
    _staticDiscoveries = metrics.getMeter(METER_NAME).createCounter("plugscan.discovery.static", {
      description: "Packages whose manifest came from static discovery",
    });
  }
  return _staticDiscoveries;
}

export function getFallbackDiscoveryCounter(): Counter {
  if (!_fallbackDiscoveries) {
    _fallbackDiscoveries = metrics.getMeter(METER_NAME).createCounter("plugscan.discovery.fallback", {
      description: "Packages that fell back to dynamic discovery",
    });
  }
  return _fallbackDiscoveries;
}
