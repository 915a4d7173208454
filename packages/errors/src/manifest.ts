import { PlugscanError } from "./base.js";

/** One point where a produced manifest differs from the reference one. */
export interface ManifestDifference {
  /** JSON path, e.g. `plugins[0].obj.module` */
  readonly path: string;
  readonly reason: string;
}

/**
 * Thrown by oracle comparisons when the statically produced manifest does not
 * match the manifest the dynamic path produced for the same package.
 * Validation-time only; the engine itself never raises it.
 */
export class SchemaMismatchError extends PlugscanError {
  readonly _tag = "ManifestError" as const;
  readonly code = "SCHEMA_MISMATCH" as const;
  readonly differences: readonly ManifestDifference[];

  constructor(differences: readonly ManifestDifference[]) {
    super(
      `Manifest mismatch (${differences.length} difference${differences.length === 1 ? "" : "s"}): ${differences
        .slice(0, 5)
        .map((d) => `${d.path}: ${d.reason}`)
        .join("; ")}`,
    );
    this.differences = differences;
  }
}
