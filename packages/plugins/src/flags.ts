import { STATIC_DISCOVERY_ENV } from "./constants.js";

const ENABLED_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Whether static discovery is switched on. An explicit setting wins over
 * the environment.
 */
export function resolveStaticDiscoveryFlag(
  env: Readonly<Record<string, string | undefined>> = process.env,
  explicit?: boolean,
): boolean {
  if (explicit !== undefined) return explicit;
  const raw = env[STATIC_DISCOVERY_ENV];
  return raw !== undefined && ENABLED_VALUES.has(raw.trim().toLowerCase());
}
