import { PlugscanError } from "./base.js";

// ---------------------------------------------------------------------------
// Abstract base for everything that aborts a discovery attempt
// ---------------------------------------------------------------------------

/**
 * Abstract base class for static discovery failures.
 *
 * Enables generic catch: `if (e instanceof DiscoveryError)`.
 * Every subclass aborts the whole package; none yields a partial manifest.
 */
export abstract class DiscoveryError extends PlugscanError {
  readonly _tag = "DiscoveryError" as const;
}

// ---------------------------------------------------------------------------
// Source not found
// ---------------------------------------------------------------------------

export type SourceNotFoundReason = "missing" | "ambiguous" | "unreadable";

/**
 * Thrown when the registration file is missing, unreadable, or when more than
 * one candidate exists and nothing disambiguates them.
 */
export class SourceNotFoundError extends DiscoveryError {
  readonly code = "SOURCE_NOT_FOUND" as const;
  readonly packageRoot: string;
  readonly reason: SourceNotFoundReason;
  readonly candidates: readonly string[];

  constructor(
    packageRoot: string,
    reason: SourceNotFoundReason,
    candidates: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(describeSourceNotFound(packageRoot, reason, candidates), { packageRoot, reason }, options);
    this.packageRoot = packageRoot;
    this.reason = reason;
    this.candidates = candidates;
  }
}

function describeSourceNotFound(
  packageRoot: string,
  reason: SourceNotFoundReason,
  candidates: readonly string[],
): string {
  switch (reason) {
    case "missing":
      return `No registration file found under ${packageRoot} (looked for ${candidates.join(", ")})`;
    case "ambiguous":
      return `Ambiguous registration file under ${packageRoot}: ${candidates.join(", ")}`;
    case "unreadable":
      return `Registration file could not be read: ${candidates.join(", ")}`;
  }
}

// ---------------------------------------------------------------------------
// Registration function not found
// ---------------------------------------------------------------------------

/**
 * Thrown when the registration file has no entry-point function.
 */
export class RegistrationFunctionNotFoundError extends DiscoveryError {
  readonly code = "REGISTRATION_FUNCTION_NOT_FOUND" as const;
  readonly entryPoint: string;
  readonly filePath: string | undefined;

  constructor(entryPoint: string, filePath?: string) {
    super(
      `Function ${entryPoint}() not found${filePath === undefined ? "" : ` in ${filePath}`}`,
      filePath === undefined ? { entryPoint } : { entryPoint, filePath },
    );
    this.entryPoint = entryPoint;
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Unresolved symbol
// ---------------------------------------------------------------------------

/**
 * Thrown when an argument names an identifier that no import binds.
 */
export class UnresolvedSymbolError extends DiscoveryError {
  readonly code = "UNRESOLVED_SYMBOL" as const;
  readonly symbol: string;
  readonly argument: string;
  readonly locallyDefined: boolean;

  constructor(symbol: string, argument: string, locallyDefined: boolean) {
    super(
      locallyDefined
        ? `Symbol '${symbol}' (argument '${argument}') is defined in the registration file itself`
        : `Symbol '${symbol}' (argument '${argument}') is not imported`,
      { symbol, argument },
    );
    this.symbol = symbol;
    this.argument = argument;
    this.locallyDefined = locallyDefined;
  }
}

// ---------------------------------------------------------------------------
// Requires runtime inspection
// ---------------------------------------------------------------------------

/**
 * Thrown when a value depends on information only available by executing
 * the plugin package (class attributes, module objects).
 */
export class RequiresRuntimeInspectionError extends DiscoveryError {
  readonly code = "REQUIRES_RUNTIME_INSPECTION" as const;
  readonly expression: string;
  readonly argument: string;

  constructor(expression: string, argument: string, detail: string) {
    super(`Argument '${argument}' = ${expression} requires runtime inspection: ${detail}`, {
      expression,
      argument,
    });
    this.expression = expression;
    this.argument = argument;
  }
}

// ---------------------------------------------------------------------------
// Unknown plugin kind
// ---------------------------------------------------------------------------

/**
 * Thrown when a descriptor constructor is not in the closed kind mapping.
 */
export class UnknownPluginKindError extends DiscoveryError {
  readonly code = "UNKNOWN_PLUGIN_KIND" as const;
  readonly constructorName: string;
  readonly line: number;

  constructor(constructorName: string, line: number) {
    super(`Unknown plugin descriptor '${constructorName}' at line ${line}`, {
      constructorName,
      line: String(line),
    });
    this.constructorName = constructorName;
    this.line = line;
  }
}

// ---------------------------------------------------------------------------
// Unsupported value
// ---------------------------------------------------------------------------

/**
 * Thrown when an argument cannot be turned into a manifest value: an
 * unsupported expression on a field that does not tolerate it, a type that
 * does not fit the field, a positional argument, or a missing required one.
 */
export class UnsupportedValueError extends DiscoveryError {
  readonly code = "UNSUPPORTED_VALUE" as const;
  readonly argument: string;
  readonly raw: string;

  constructor(argument: string, raw: string, detail: string) {
    super(`Argument '${argument}' = ${raw === "" ? "<absent>" : raw}: ${detail}`, {
      argument,
      raw,
    });
    this.argument = argument;
    this.raw = raw;
  }
}

// ---------------------------------------------------------------------------
// Unknown argument
// ---------------------------------------------------------------------------

/**
 * Thrown when a descriptor receives a keyword that its kind's manifest schema
 * does not define.
 */
export class UnknownArgumentError extends DiscoveryError {
  readonly code = "UNKNOWN_ARGUMENT" as const;
  readonly argument: string;
  readonly pluginKind: string;

  constructor(argument: string, pluginKind: string) {
    super(`Argument '${argument}' is not part of the ${pluginKind} manifest schema`, {
      argument,
      pluginKind,
    });
    this.argument = argument;
    this.pluginKind = pluginKind;
  }
}

// ---------------------------------------------------------------------------
// Structural match tool failure
// ---------------------------------------------------------------------------

/**
 * Thrown when the structural-matching helper fails, times out, or returns
 * output that cannot be used.
 */
export class StructuralMatchToolFailureError extends DiscoveryError {
  readonly code = "STRUCTURAL_MATCH_TOOL_FAILURE" as const;
  readonly tool: string;
  readonly exitCode: number | undefined;

  constructor(tool: string, detail: string, exitCode?: number, options?: { cause?: unknown }) {
    super(
      `Structural match with ${tool} failed: ${detail}`,
      exitCode === undefined ? { tool } : { tool, exitCode: String(exitCode) },
      options,
    );
    this.tool = tool;
    this.exitCode = exitCode;
  }
}
