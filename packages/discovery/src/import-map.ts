import type { ImportMap, ImportOrigin } from "@plugscan/core";
import { UnrecognizedImportSyntaxError } from "@plugscan/errors";
import { type DiscoveryLogger, silentLogger } from "./logger.js";
import { logicalLines, maskSource } from "./scanner.js";

export interface BuildImportMapOptions {
  /** Dotted module path of the file, needed for relative imports */
  readonly modulePath?: string | undefined;
  /** True when the file is a package's `__init__.py` */
  readonly isPackageInit?: boolean | undefined;
  readonly logger?: DiscoveryLogger | undefined;
}

export interface ImportMapResult {
  readonly importMap: ImportMap;
  readonly warnings: readonly UnrecognizedImportSyntaxError[];
  /**
   * Module-level names whose last binding is a local `def`, `class`, or
   * assignment rather than an import.
   */
  readonly localNames: ReadonlySet<string>;
}

const IDENT = "[A-Za-z_][A-Za-z0-9_]*";
const FROM_IMPORT = /^from\s+(\S+)\s+import\s+(.*)$/;
const FROM_MODULE = new RegExp(`^(\\.*)(${IDENT}(?:\\.${IDENT})*)?$`);
const NAME_ALIAS = new RegExp(`^(${IDENT})(?:\\s+as\\s+(${IDENT}))?$`);
const MODULE_ALIAS = new RegExp(`^(${IDENT}(?:\\.${IDENT})*)(?:\\s+as\\s+(${IDENT}))?$`);
const LOCAL_DEFINITION = new RegExp(`^(?:async\\s+)?(?:def|class)\\s+(${IDENT})`);
const LOCAL_ASSIGNMENT = new RegExp(`^(${IDENT})\\s*(?::[^=]*)?=(?!=)`);

type ParsedImport =
  | { readonly ok: true; readonly bindings: ReadonlyArray<readonly [string, ImportOrigin]> }
  | { readonly ok: false; readonly detail: string };

/**
 * Build the import map of a registration file.
 *
 * Statements are applied in source order, so a later binding of the same
 * local name (import, `def`, `class`, or module-level assignment) replaces
 * an earlier one. Unparseable imports are skipped and reported as warnings.
 */
export function buildImportMap(source: string, options: BuildImportMapOptions = {}): ImportMapResult {
  const logger = options.logger ?? silentLogger;
  const map = new Map<string, ImportOrigin>();
  const localNames = new Set<string>();
  const warnings: UnrecognizedImportSyntaxError[] = [];

  for (const logical of logicalLines(maskSource(source))) {
    const statements = logical.text
      .split(";")
      .map((s) => s.trim())
      .filter((s) => s !== "");

    for (const statement of statements) {
      let parsed: ParsedImport | undefined;
      if (/^from\s/.test(statement)) {
        parsed = parseFromImport(statement, logical.line, options);
      } else if (/^import\s/.test(statement)) {
        parsed = parseImport(statement, logical.line);
      } else if (logical.indent === 0) {
        const local = LOCAL_DEFINITION.exec(statement) ?? LOCAL_ASSIGNMENT.exec(statement);
        const name = local?.[1];
        if (name !== undefined) {
          map.delete(name);
          localNames.add(name);
        }
      }
      if (parsed === undefined) continue;

      if (!parsed.ok) {
        const warning = new UnrecognizedImportSyntaxError(statement, logical.line, parsed.detail);
        warnings.push(warning);
        logger.warn(warning.message);
        continue;
      }
      for (const [local, origin] of parsed.bindings) {
        map.set(local, origin);
        localNames.delete(local);
      }
    }
  }

  return { importMap: map, warnings, localNames };
}

function parseFromImport(statement: string, line: number, options: BuildImportMapOptions): ParsedImport {
  const match = FROM_IMPORT.exec(statement);
  const moduleToken = match?.[1];
  let names = match?.[2]?.trim();
  if (moduleToken === undefined || names === undefined) {
    return { ok: false, detail: "malformed from-import" };
  }

  const resolved = resolveModule(moduleToken, options);
  if (typeof resolved !== "string") return { ok: false, detail: resolved.error };

  if (names.startsWith("(")) {
    if (!names.endsWith(")")) return { ok: false, detail: "unbalanced parentheses" };
    names = names.slice(1, -1).trim();
  }
  if (names === "*") return { ok: false, detail: "wildcard import" };

  const parts = names.split(",").map((p) => p.trim());
  if (parts.length > 1 && parts[parts.length - 1] === "") parts.pop();

  const bindings: Array<readonly [string, ImportOrigin]> = [];
  for (const part of parts) {
    const nameMatch = NAME_ALIAS.exec(part);
    const originalName = nameMatch?.[1];
    if (originalName === undefined) {
      return { ok: false, detail: `unrecognized name '${part}'` };
    }
    const alias = nameMatch?.[2];
    bindings.push([
      alias ?? originalName,
      {
        modulePath: resolved,
        originalName,
        aliasKind: alias === undefined ? "direct" : "aliased",
        target: "symbol",
        line,
      },
    ]);
  }
  return { ok: true, bindings };
}

function parseImport(statement: string, line: number): ParsedImport {
  const parts = statement
    .slice("import".length)
    .split(",")
    .map((p) => p.trim().replace(/\s*\.\s*/g, "."));

  const bindings: Array<readonly [string, ImportOrigin]> = [];
  for (const part of parts) {
    const match = MODULE_ALIAS.exec(part);
    const dotted = match?.[1];
    if (dotted === undefined) {
      return { ok: false, detail: `unrecognized module '${part}'` };
    }
    const segments = dotted.split(".");
    const alias = match?.[2];
    if (alias === undefined) {
      // `import a.b` binds `a` to the top-level package
      const top = segments[0] ?? dotted;
      bindings.push([top, { modulePath: top, originalName: top, aliasKind: "direct", target: "module", line }]);
    } else {
      bindings.push([
        alias,
        {
          modulePath: dotted,
          originalName: segments[segments.length - 1] ?? dotted,
          aliasKind: "aliased",
          target: "module",
          line,
        },
      ]);
    }
  }
  return { ok: true, bindings };
}

/**
 * Absolute module path for the module part of a from-import.
 * One leading dot is the file's own package, each further dot one level up.
 */
function resolveModule(token: string, options: BuildImportMapOptions): string | { error: string } {
  const match = FROM_MODULE.exec(token);
  const dots = match?.[1]?.length ?? 0;
  const rest = match?.[2];
  if (match === null || (dots === 0 && rest === undefined)) {
    return { error: `unrecognized module '${token}'` };
  }
  if (dots === 0 && rest !== undefined) return rest;

  if (options.modulePath === undefined) {
    return { error: "relative import without a known module path" };
  }
  const segments = options.modulePath.split(".");
  const packageSegments = options.isPackageInit === true ? segments : segments.slice(0, -1);
  const base = packageSegments.slice(0, packageSegments.length - (dots - 1));
  if (base.length === 0 || dots - 1 > packageSegments.length) {
    return { error: "relative import beyond top-level package" };
  }
  return [...base, ...(rest === undefined ? [] : rest.split("."))].join(".");
}
