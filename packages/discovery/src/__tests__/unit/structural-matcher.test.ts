import { StructuralMatchToolFailureError } from "@plugscan/errors";
import { describe, expect, it } from "vitest";
import { createCommandMatcher, parseMatchOutput } from "../../structural-matcher.js";

const SOURCE = "# é\ndef register_plugin():\n    pass\n";

function output(start: number, end: number, text = ""): string {
  return JSON.stringify([{ text, range: { byteOffset: { start, end } } }]);
}

describe("structural-matcher", () => {
  // -------------------------------------------------------------------------
  // parseMatchOutput
  // -------------------------------------------------------------------------

  describe("parseMatchOutput", () => {
    it("should convert UTF-8 byte ranges to string offsets", () => {
      const text = "def register_plugin():\n    pass";

      const spans = parseMatchOutput("ast-grep", output(5, 36, text), SOURCE);

      expect(spans).toEqual([{ start: 4, end: 35, text }]);
      expect(SOURCE.slice(4, 35)).toBe(text);
    });

    it("should treat empty output as no matches", () => {
      expect(parseMatchOutput("ast-grep", "", SOURCE)).toEqual([]);
    });

    it("should reject output that is not JSON", () => {
      expect(() => parseMatchOutput("ast-grep", "not json", SOURCE)).toThrow(
        "Structural match with ast-grep failed: output is not valid JSON",
      );
    });

    it("should reject JSON of the wrong shape", () => {
      expect(() => parseMatchOutput("ast-grep", '[{"text": 1}]', SOURCE)).toThrow(
        "Structural match with ast-grep failed: output does not match the expected shape",
      );
    });

    it("should reject ranges outside the file", () => {
      expect(() => parseMatchOutput("ast-grep", output(5, 500), SOURCE)).toThrow(
        "Structural match with ast-grep failed: byte range 5..500 is outside the file",
      );
    });
  });

  // -------------------------------------------------------------------------
  // createCommandMatcher
  // -------------------------------------------------------------------------

  describe("createCommandMatcher", () => {
    it("should parse the output of a successful run", () => {
      const matcher = createCommandMatcher({
        command: process.execPath,
        args: ["-e", `process.stdout.write(${JSON.stringify(output(5, 36))})`, "--"],
        timeoutMs: 10_000,
      });

      expect(matcher.match("def register_plugin($$$PARAMS): $$$BODY", "/tmp/plugins.py", SOURCE)).toEqual([
        { start: 4, end: 35, text: "" },
      ]);
    });

    it("should fail on a non-zero exit", () => {
      const matcher = createCommandMatcher({
        command: process.execPath,
        args: ["-e", "process.stderr.write('boom'); process.exit(3)", "--"],
        timeoutMs: 10_000,
      });

      let caught: unknown;
      try {
        matcher.match("pattern", "/tmp/plugins.py", SOURCE);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StructuralMatchToolFailureError);
      expect(caught).toMatchObject({ exitCode: 3, message: `Structural match with ${process.execPath} failed: boom` });
    });

    it("should fail when the command cannot be started", () => {
      const matcher = createCommandMatcher({
        command: "plugscan-missing-matcher-tool",
        args: [],
        timeoutMs: 1_000,
      });

      expect(() => matcher.match("pattern", "/tmp/plugins.py", SOURCE)).toThrow(
        /^Structural match with plugscan-missing-matcher-tool failed: could not run: /,
      );
    });

    it("should fail when the command times out", () => {
      const matcher = createCommandMatcher({
        command: process.execPath,
        args: ["-e", "setTimeout(() => {}, 5000)", "--"],
        timeoutMs: 200,
      });

      expect(() => matcher.match("pattern", "/tmp/plugins.py", SOURCE)).toThrow(
        `Structural match with ${process.execPath} failed: timed out after 200ms`,
      );
    });
  });
});
