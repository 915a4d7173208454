import { REQUIRED_FIELD_NAMES } from "@plugscan/core";
import { DiscoveryConfigurationError } from "@plugscan/errors";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** How an enumeration member name is written into the manifest. */
export const EnumerationCaseSchema = z.enum(["lower", "upper", "preserve"]);
export type EnumerationCase = z.infer<typeof EnumerationCaseSchema>;

export const StructuralMatcherConfigSchema = z.object({
  /** Executable with ast-grep compatible `run --json` output */
  command: z.string().min(1).default("ast-grep"),
  args: z.array(z.string()).default(["run", "--lang", "python", "--json=compact"]),
  timeoutMs: z.number().int().positive().default(5_000),
});

export const DiscoveryConfigSchema = z.object({
  entryPoint: z
    .string()
    .regex(IDENTIFIER, "entryPoint must be an identifier")
    .default("register_plugin"),
  registrationFileNames: z
    .array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*\.py$/, "expected a .py file name"))
    .min(1)
    .default(["plugins.py", "plugin.py"]),
  descriptorSuffix: z.string().regex(IDENTIFIER).default("Plugin"),
  /** Enumeration class (by its original, unaliased name) → member case */
  enumerations: z
    .record(z.string().regex(IDENTIFIER), EnumerationCaseSchema)
    .default({ IOType: "lower" }),
  /** Optional fields recorded as null (with a warning) when their value is unsupported */
  tolerateUnsupported: z
    .array(z.string())
    .default([])
    .refine((fields) => fields.every((f) => !REQUIRED_FIELD_NAMES.includes(f)), {
      message: `required fields (${REQUIRED_FIELD_NAMES.join(", ")}) cannot be tolerated`,
    }),
  structuralMatcher: StructuralMatcherConfigSchema.optional(),
  logLevel: z.enum(["debug", "info", "warn", "silent"]).default("warn"),
});

/** Configuration as a caller writes it: every field optional. */
export type DiscoveryConfigInput = z.input<typeof DiscoveryConfigSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type StructuralMatcherConfig = z.infer<typeof StructuralMatcherConfigSchema>;

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Validate a partial configuration and fill in defaults.
 *
 * @throws DiscoveryConfigurationError listing every zod issue
 */
export function resolveDiscoveryConfig(input: DiscoveryConfigInput = {}): Readonly<DiscoveryConfig> {
  const result = DiscoveryConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path === "" ? issue.message : `${path}: ${issue.message}`;
    });
    throw new DiscoveryConfigurationError(issues, { cause: result.error });
  }
  return Object.freeze(result.data);
}
