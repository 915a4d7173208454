import { createHash } from "node:crypto";
import type { JsonValue, PackageMetadata } from "@plugscan/core";

/** Path that produced a cached manifest. */
export type CachedOrigin = "static" | "dynamic";

export interface CachedManifest {
  readonly manifest: string;
  readonly origin: CachedOrigin;
}

interface CacheEntry extends CachedManifest {
  readonly fingerprint: string;
}

/**
 * Cache key of one discovery: sha256 of the registration file's text plus the
 * package metadata the manifest embeds, hex-encoded. Metadata key order does
 * not matter.
 */
export function discoveryFingerprint(source: string, metadata: PackageMetadata = {}): string {
  return createHash("sha256")
    .update(source, "utf8")
    .update("\0")
    .update(canonicalJson(metadata), "utf8")
    .digest("hex");
}

function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`).join(",")}}`;
}

/**
 * In-memory manifest cache keyed by package name. An entry is only served
 * while its fingerprint is unchanged.
 */
export class DiscoveryCache {
  private readonly entries = new Map<string, CacheEntry>();

  get(packageName: string, fingerprint: string): CachedManifest | undefined {
    const entry = this.entries.get(packageName);
    if (entry === undefined) return undefined;
    if (entry.fingerprint !== fingerprint) {
      this.entries.delete(packageName);
      return undefined;
    }
    return { manifest: entry.manifest, origin: entry.origin };
  }

  set(packageName: string, fingerprint: string, manifest: string, origin: CachedOrigin = "static"): void {
    this.entries.set(packageName, { fingerprint, manifest, origin });
  }

  /** @returns whether an entry was removed */
  invalidate(packageName: string): boolean {
    return this.entries.delete(packageName);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
