import {
  DESCRIPTOR_CONSTRUCTORS,
  type ImportMap,
  type PluginKind,
  pluginKindForConstructor,
  type RegistrationSite,
} from "@plugscan/core";
import {
  RegistrationFunctionNotFoundError,
  StructuralMatchToolFailureError,
} from "@plugscan/errors";
import {
  findClosing,
  isIdentifierChar,
  lineColumn,
  maskSource,
  readStringToken,
} from "./scanner.js";
import type { MatchSpan, StructuralMatcher } from "./structural-matcher.js";

export interface ExtractSitesOptions {
  readonly entryPoint: string;
  /** Naming convention for descriptor constructors outside the closed mapping */
  readonly descriptorSuffix?: string | undefined;
  /** Lets `from core import ParserPlugin as PP` make `PP(...)` a site */
  readonly importMap?: ImportMap | undefined;
  readonly filePath?: string | undefined;
  readonly matcher?: StructuralMatcher | undefined;
}

/** The entry-point function as found in the source. */
export interface FunctionSpan {
  readonly defStart: number;
  readonly bodyStart: number;
  readonly bodyEnd: number;
}

const IN_PROCESS = "in-process";
const CALL = /([A-Za-z_][A-Za-z0-9_]*(?:[ \t]*\.[ \t]*[A-Za-z_][A-Za-z0-9_]*)*)[ \t]*\(/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function definitionPattern(entryPoint: string, flags: string): RegExp {
  return new RegExp(`^([ \\t]*)(?:async[ \\t]+)?def[ \\t]+${escapeRegExp(entryPoint)}[ \\t]*\\(`, flags);
}

// ============================================================================
// ENTRY-POINT SPAN
// ============================================================================

/**
 * Find the entry-point definition and the span of its body.
 *
 * With several definitions of the same name the last module-level one wins,
 * matching what the name is bound to once the module has run.
 */
export function findEntryPoint(source: string, options: ExtractSitesOptions): FunctionSpan {
  const masked = maskSource(source);

  if (options.matcher !== undefined) {
    return findWithMatcher(source, masked, options.matcher, options);
  }

  const matches = [...masked.matchAll(definitionPattern(options.entryPoint, "gm"))];
  const chosen = matches.filter((m) => m[1] === "").pop() ?? matches[0];
  if (chosen?.index === undefined) {
    throw new RegistrationFunctionNotFoundError(options.entryPoint, options.filePath);
  }
  const indent = chosen[1]?.length ?? 0;
  const paren = chosen.index + chosen[0].length - 1;
  return spanFromParameters(source, masked, chosen.index + indent, paren, indent, IN_PROCESS);
}

function findWithMatcher(
  source: string,
  masked: string,
  matcher: StructuralMatcher,
  options: ExtractSitesOptions,
): FunctionSpan {
  if (options.filePath === undefined) {
    throw new StructuralMatchToolFailureError(matcher.tool, "no file path to match against");
  }
  const filePath = options.filePath;
  // A pattern without `-> $RET` does not match an annotated definition.
  const span = [
    `def ${options.entryPoint}($$$PARAMS): $$$BODY`,
    `def ${options.entryPoint}($$$PARAMS) -> $RET: $$$BODY`,
  ]
    .flatMap((pattern) => matcher.match(pattern, filePath, source))
    .reduce<MatchSpan | undefined>((last, s) => (last === undefined || s.start > last.start ? s : last), undefined);
  if (span === undefined) {
    throw new RegistrationFunctionNotFoundError(options.entryPoint, options.filePath);
  }

  const head = definitionPattern(options.entryPoint, "").exec(masked.slice(span.start, span.end));
  if (head === null || head[1] !== "") {
    throw new StructuralMatchToolFailureError(
      matcher.tool,
      `matched span at offset ${span.start} does not start with def ${options.entryPoint}`,
    );
  }
  const { column } = lineColumn(source, span.start);
  const paren = span.start + head[0].length - 1;
  const fn = spanFromParameters(source, masked, span.start, paren, column - 1, matcher.tool);
  return { ...fn, bodyEnd: Math.min(fn.bodyEnd, span.end) };
}

function spanFromParameters(
  source: string,
  masked: string,
  defStart: number,
  paren: number,
  indent: number,
  tool: string,
): FunctionSpan {
  const close = findClosing(masked, paren);
  if (close === -1) {
    throw new StructuralMatchToolFailureError(tool, `unbalanced parameter list at offset ${paren}`);
  }

  // Skip the return annotation up to the colon that opens the body.
  let depth = 0;
  let colon = -1;
  for (let i = close + 1; i < masked.length; i++) {
    const ch = masked.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === ":" && depth === 0) {
      colon = i;
      break;
    } else if (ch === "\n" && depth === 0 && masked.charAt(i - 1) !== "\\") break;
  }
  if (colon === -1) {
    throw new StructuralMatchToolFailureError(tool, `no body found after parameter list at offset ${close}`);
  }

  const newline = masked.indexOf("\n", colon);
  const restOfLine = masked.slice(colon + 1, newline === -1 ? masked.length : newline).trim();
  const singleLine = restOfLine !== "" && restOfLine !== "\\";
  const bodyEnd = blockEnd(source, masked, colon + 1, singleLine ? Number.POSITIVE_INFINITY : indent);
  return { defStart, bodyStart: colon + 1, bodyEnd };
}

/**
 * End of an indented block: the start of the first non-blank line, outside
 * brackets and strings, indented no deeper than the definition.
 */
function blockEnd(source: string, masked: string, from: number, defIndent: number): number {
  let depth = 0;
  let atLineStart = false;
  let i = from;
  while (i < masked.length) {
    if (atLineStart) {
      atLineStart = false;
      let j = i;
      while (masked.charAt(j) === " " || masked.charAt(j) === "\t") j++;
      const next = masked.charAt(j);
      if (j < masked.length && next !== "\n" && next !== "\r" && j - i <= defIndent) return i;
      i = j;
      continue;
    }
    const ch = masked.charAt(i);
    if (ch === '"' || ch === "'") {
      i = readStringToken(source, i).end;
      continue;
    }
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth = Math.max(0, depth - 1);
    else if (ch === "\n" && depth === 0 && masked.charAt(i - 1) !== "\\") atLineStart = true;
    i++;
  }
  return masked.length;
}

// ============================================================================
// SITES
// ============================================================================

function descriptorKind(
  name: string,
  qualified: boolean,
  options: ExtractSitesOptions,
): { constructorName: string; kind: PluginKind | undefined } | undefined {
  const direct = pluginKindForConstructor(name);
  if (direct !== undefined) return { constructorName: name, kind: direct };

  const origin = qualified ? undefined : options.importMap?.get(name);
  if (origin?.target === "symbol" && Object.hasOwn(DESCRIPTOR_CONSTRUCTORS, origin.originalName)) {
    return { constructorName: origin.originalName, kind: pluginKindForConstructor(origin.originalName) };
  }

  const suffix = options.descriptorSuffix ?? "Plugin";
  if (name.endsWith(suffix) && name.length > suffix.length) {
    return { constructorName: name, kind: undefined };
  }
  return undefined;
}

/**
 * Find every descriptor constructor call inside the entry-point body, in
 * source order. Calls nested inside another site's arguments are part of
 * that site, not sites of their own.
 */
export function extractRegistrationSites(source: string, options: ExtractSitesOptions): RegistrationSite[] {
  const fn = findEntryPoint(source, options);
  const masked = maskSource(source);
  const sites: RegistrationSite[] = [];

  const call = new RegExp(CALL.source, "g");
  call.lastIndex = fn.bodyStart;
  for (let match = call.exec(masked); match !== null; match = call.exec(masked)) {
    const start = match.index;
    if (start >= fn.bodyEnd) break;

    const before = masked.charAt(start - 1);
    if (before === "." || isIdentifierChar(before)) continue;
    if (/\b(?:def|class)[ \t]+$/.test(masked.slice(Math.max(0, start - 16), start))) continue;

    const chain = (match[1] ?? "").split(".").map((s) => s.trim());
    const name = chain[chain.length - 1] ?? "";
    const descriptor = descriptorKind(name, chain.length > 1, options);
    if (descriptor === undefined) continue;

    const paren = start + match[0].length - 1;
    const close = findClosing(masked, paren);
    if (close === -1 || close >= fn.bodyEnd) {
      throw new StructuralMatchToolFailureError(
        options.matcher?.tool ?? IN_PROCESS,
        `unbalanced call to ${name} at offset ${start}`,
      );
    }

    const { line, column } = lineColumn(source, start);
    sites.push({
      constructorName: descriptor.constructorName,
      kind: descriptor.kind,
      text: source.slice(start, close + 1),
      start,
      end: close + 1,
      line,
      column,
    });
    call.lastIndex = close + 1;
  }
  return sites;
}
