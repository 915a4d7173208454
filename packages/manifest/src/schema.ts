/**
 * Zod schema for manifest JSON, used to validate both the manifests this
 * workspace produces and reference manifests from the dynamic path.
 */

import { IO_TYPES } from "@plugscan/core";
import { SchemaMismatchError } from "@plugscan/errors";
import { z } from "zod";

export const ManifestReferenceSchema = z
  .object({
    module: z.string().min(1),
    name: z.string().min(1),
    kind: z.enum(["class", "function"]),
  })
  .strict();

const optionalReference = ManifestReferenceSchema.nullable().optional();

const commonFields = {
  name: z.string().min(1),
  obj: ManifestReferenceSchema.nullable(),
  config: optionalReference,
  call_method: z.string().nullable().optional(),
  io_type: z.enum(IO_TYPES).nullable().optional(),
  requires_store: z.boolean().nullable().optional(),
};

export const ManifestPluginSchema = z.discriminatedUnion("plugin_kind", [
  z.object({ plugin_kind: z.literal("parser"), ...commonFields }).strict(),
  z.object({ plugin_kind: z.literal("exporter"), ...commonFields }).strict(),
  z.object({ plugin_kind: z.literal("base"), ...commonFields }).strict(),
  z
    .object({
      plugin_kind: z.literal("upgrader"),
      ...commonFields,
      version_strategy: optionalReference,
      version_reader: optionalReference,
    })
    .strict(),
]);

export const ManifestPackageSchema = z
  .object({
    name: z.string().min(1),
    plugins: z.array(ManifestPluginSchema),
    metadata: z.record(z.unknown()).default({}),
  })
  .strict();

export type ManifestPluginJSON = z.infer<typeof ManifestPluginSchema>;
export type ManifestPackageJSON = z.infer<typeof ManifestPackageSchema>;

/**
 * Validate manifest JSON (a string or an already-parsed value).
 *
 * @throws SchemaMismatchError with one difference per zod issue
 */
export function validateManifest(input: unknown): ManifestPackageJSON {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new SchemaMismatchError([
        { path: "", reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` },
      ]);
    }
  }

  const result = ManifestPackageSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaMismatchError(
      result.error.issues.map((issue) => ({ path: formatPath(issue.path), reason: issue.message })),
    );
  }
  return result.data;
}

/** `["plugins", 0, "obj"]` → `plugins[0].obj` */
export function formatPath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") out += `[${segment}]`;
    else out += out === "" ? segment : `.${segment}`;
  }
  return out;
}
