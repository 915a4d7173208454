import type { ArgumentEntry, ArgumentValue, RegistrationSite } from "@plugscan/core";
import { UnsupportedValueError } from "@plugscan/errors";
import { maskSource, readStringToken, splitTopLevel } from "./scanner.js";

const KEYWORD = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DOTTED = /^[A-Za-z_][A-Za-z0-9_]*(?:\s*\.\s*[A-Za-z_][A-Za-z0-9_]*)+$/;
const NUMBER = /^[+-]?\d(?:_?\d)*(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d+)?$/;
const STRING_START = /^([rRbBuUfF]{0,2})(['"])/;

/**
 * Split a descriptor call into its keyword arguments, in source order.
 *
 * Positional arguments, `*`/`**` unpacking, and repeated keywords are
 * rejected here: they can feed any field and only the interpreter knows which.
 */
export function parseArguments(site: RegistrationSite): ArgumentEntry[] {
  const text = site.text;
  const masked = maskSource(text);
  const open = masked.indexOf("(");
  const close = text.length - 1;

  const segments = splitTopLevel(masked, open + 1, close);
  const last = segments[segments.length - 1];
  if (last !== undefined && masked.slice(last.start, last.end).trim() === "") segments.pop();

  const entries: ArgumentEntry[] = [];
  const seen = new Set<string>();

  segments.forEach((segment, index) => {
    const maskedSegment = masked.slice(segment.start, segment.end);
    const trimmed = maskedSegment.trim();
    if (trimmed === "") {
      throw new UnsupportedValueError(`<argument ${index + 1}>`, "", "empty argument");
    }
    if (trimmed.startsWith("*")) {
      const marker = trimmed.startsWith("**") ? "**" : "*";
      throw new UnsupportedValueError(
        marker,
        text.slice(segment.start, segment.end).trim(),
        "argument unpacking requires runtime information",
      );
    }

    const keyword = KEYWORD.exec(maskedSegment);
    const name = keyword?.[1];
    if (keyword === null || name === undefined) {
      throw new UnsupportedValueError(
        `<positional ${index + 1}>`,
        text.slice(segment.start, segment.end).trim(),
        "positional arguments are not supported",
      );
    }

    const valueStart = segment.start + keyword[0].length;
    const maskedValue = masked.slice(valueStart, segment.end);
    const lead = maskedValue.length - maskedValue.trimStart().length;
    const trail = maskedValue.length - maskedValue.trimEnd().length;
    const raw = text.slice(valueStart + lead, segment.end - trail);

    if (seen.has(name)) {
      throw new UnsupportedValueError(name, raw, "duplicate keyword argument");
    }
    seen.add(name);
    entries.push({ name, value: classifyValue(raw), raw });
  });

  return entries;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** Classify one argument value by its syntax alone. */
export function classifyValue(raw: string): ArgumentValue {
  const stringValue = classifyString(raw);
  if (stringValue !== undefined) return stringValue;

  if (raw === "True") return { type: "boolean", value: true };
  if (raw === "False") return { type: "boolean", value: false };
  if (raw === "None") return { type: "none" };
  if (NUMBER.test(raw)) return { type: "number", value: Number(raw.replace(/_/g, "")) };
  if (IDENTIFIER.test(raw)) return { type: "identifier", symbol: raw };
  if (DOTTED.test(raw)) {
    const [base = "", ...chain] = raw.split(".").map((s) => s.trim());
    return { type: "attribute", base, chain };
  }
  return { type: "unsupported", raw, reason: describeUnsupported(raw) };
}

function classifyString(raw: string): ArgumentValue | undefined {
  const start = STRING_START.exec(raw);
  const prefixLength = start?.[1]?.length;
  if (prefixLength === undefined) return undefined;

  const token = readStringToken(raw, prefixLength);
  if (token.start !== 0) return undefined;
  if (!token.terminated) {
    return { type: "unsupported", raw, reason: "unterminated string" };
  }
  if (token.end !== raw.length) {
    const rest = raw.slice(token.end).trim();
    return {
      type: "unsupported",
      raw,
      reason: STRING_START.test(rest) ? "implicit string concatenation" : "string expression",
    };
  }
  if (token.prefix.includes("b")) return { type: "unsupported", raw, reason: "byte string" };
  if (token.prefix.includes("f")) return { type: "unsupported", raw, reason: "f-string" };

  const inner = raw.slice(token.quoteStart + token.delimiter.length, token.end - token.delimiter.length);
  if (token.prefix.includes("r")) return { type: "string", value: inner };

  const decoded = decodeEscapes(inner);
  return decoded === undefined
    ? { type: "unsupported", raw, reason: "unsupported escape sequence" }
    : { type: "string", value: decoded };
}

function describeUnsupported(raw: string): string {
  const masked = maskSource(raw);
  if (/^lambda\b/.test(masked)) return "lambda expression";
  if (/\bif\b[\s\S]*\belse\b/.test(masked)) return "conditional expression";
  if (masked.startsWith("[") || masked.startsWith("{")) return "collection literal";
  if (masked.startsWith("(")) return "parenthesized expression";
  if (/^[A-Za-z_][A-Za-z0-9_.\s]*\(/.test(masked) && masked.endsWith(")")) return "call expression";
  if (raw === "") return "missing value";
  return "unrecognized expression";
}

// ============================================================================
// ESCAPES
// ============================================================================

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\"],
  ["'", "'"],
  ['"', '"'],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["a", "\x07"],
  ["b", "\b"],
  ["f", "\f"],
  ["v", "\v"],
  ["\n", ""],
]);

const HEX_ESCAPE_WIDTH: ReadonlyMap<string, number> = new Map([
  ["x", 2],
  ["u", 4],
  ["U", 8],
]);

/**
 * Decode backslash escapes of a non-raw string literal. Returns undefined
 * for escapes whose value is not known without the interpreter (`\N{...}`)
 * or that are malformed.
 */
export function decodeEscapes(text: string): string | undefined {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch !== "\\") {
      out += ch;
      i++;
      continue;
    }

    const next = text.charAt(i + 1);
    if (next === "\r" && text.charAt(i + 2) === "\n") {
      i += 3;
      continue;
    }
    const simple = SIMPLE_ESCAPES.get(next);
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(text.slice(i + 1, i + 4));
    if (octal !== null) {
      out += String.fromCharCode(Number.parseInt(octal[0], 8));
      i += 1 + octal[0].length;
      continue;
    }

    const width = HEX_ESCAPE_WIDTH.get(next);
    if (width !== undefined) {
      const digits = text.slice(i + 2, i + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(digits)) return undefined;
      const codePoint = Number.parseInt(digits, 16);
      if (codePoint > 0x10ffff) return undefined;
      out += String.fromCodePoint(codePoint);
      i += 2 + width;
      continue;
    }

    if (next === "N") return undefined;
    // Unknown escapes keep their backslash.
    out += ch;
    i++;
  }
  return out;
}
