import type { ObjectKind, PackageMetadata } from "@plugscan/core";

/** A resolved reference as it appears in manifest JSON. */
export interface ManifestReference {
  readonly module: string;
  readonly name: string;
  readonly kind: ObjectKind;
}

export type ManifestValue = string | number | boolean | ManifestReference | null;

/**
 * One plugin entry. Keys are `name`, `plugin_kind`, then the kind's fields
 * in table order.
 */
export type ManifestPlugin = Readonly<Record<string, ManifestValue>>;

export interface ManifestPackage {
  readonly name: string;
  readonly plugins: readonly ManifestPlugin[];
  readonly metadata: PackageMetadata;
}

/**
 * `emit` writes unset optional fields as explicit `null`; `omit` leaves
 * them out.
 */
export type NullPolicy = "emit" | "omit";

export interface SerializeOptions {
  readonly nullPolicy?: NullPolicy | undefined;
  /** Passed to JSON.stringify */
  readonly indent?: number | undefined;
}
