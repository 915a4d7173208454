import { spawnSync } from "node:child_process";
import { StructuralMatchToolFailureError } from "@plugscan/errors";
import { z } from "zod";
import type { StructuralMatcherConfig } from "./config.js";

// ============================================================================
// TYPES
// ============================================================================

/** A matched span, offsets in UTF-16 code units into the file text. */
export interface MatchSpan {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/**
 * Out-of-process structural search over one file.
 * Implementations throw `StructuralMatchToolFailureError`; they never hang.
 */
export interface StructuralMatcher {
  readonly tool: string;
  match(pattern: string, filePath: string, source: string): readonly MatchSpan[];
}

const MatchOutputSchema = z.array(
  z.object({
    text: z.string(),
    range: z.object({
      byteOffset: z.object({
        start: z.number().int().nonnegative(),
        end: z.number().int().nonnegative(),
      }),
    }),
  }),
);

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024; // 10 MB

// ============================================================================
// COMMAND MATCHER
// ============================================================================

/**
 * Matcher that runs an ast-grep compatible command:
 * `<command> <args...> --pattern <pattern> <file>`, reading a JSON array of
 * matches with UTF-8 byte ranges from stdout.
 */
export function createCommandMatcher(config: StructuralMatcherConfig): StructuralMatcher {
  const tool = config.command;
  return {
    tool,
    match(pattern, filePath, source) {
      const result = spawnSync(tool, [...config.args, "--pattern", pattern, filePath], {
        encoding: "utf8",
        timeout: config.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
      });

      if (result.error !== undefined) {
        const timedOut = "code" in result.error && result.error.code === "ETIMEDOUT";
        throw new StructuralMatchToolFailureError(
          tool,
          timedOut ? `timed out after ${config.timeoutMs}ms` : `could not run: ${result.error.message}`,
          undefined,
          { cause: result.error },
        );
      }
      if (result.status === null) {
        throw new StructuralMatchToolFailureError(tool, `terminated by ${result.signal ?? "signal"}`);
      }
      if (result.status !== 0) {
        const stderr = result.stderr.trim();
        throw new StructuralMatchToolFailureError(
          tool,
          stderr === "" ? "non-zero exit" : stderr,
          result.status,
        );
      }

      return parseMatchOutput(tool, result.stdout, source);
    },
  };
}

/**
 * Parse the tool's JSON output and convert byte ranges to string offsets.
 */
export function parseMatchOutput(tool: string, stdout: string, source: string): MatchSpan[] {
  let json: unknown;
  try {
    json = JSON.parse(stdout === "" ? "[]" : stdout);
  } catch (error) {
    throw new StructuralMatchToolFailureError(tool, "output is not valid JSON", undefined, {
      cause: error,
    });
  }

  const parsed = MatchOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new StructuralMatchToolFailureError(tool, "output does not match the expected shape", undefined, {
      cause: parsed.error,
    });
  }

  const bytes = Buffer.from(source, "utf8");
  return parsed.data.map((entry) => {
    const { start, end } = entry.range.byteOffset;
    if (end < start || end > bytes.length) {
      throw new StructuralMatchToolFailureError(tool, `byte range ${start}..${end} is outside the file`);
    }
    return {
      start: bytes.subarray(0, start).toString("utf8").length,
      end: bytes.subarray(0, end).toString("utf8").length,
      text: entry.text,
    };
  });
}
