// ---------------------------------------------------------------------------
// Plugin kinds
// ---------------------------------------------------------------------------

/** Discriminator of a registered plugin, derived from its descriptor constructor. */
export type PluginKind = "parser" | "upgrader" | "exporter" | "base";

// ---------------------------------------------------------------------------
// Import map
// ---------------------------------------------------------------------------

/** Whether the local name equals the imported one (`import X`) or renames it (`import X as Y`). */
export type AliasKind = "direct" | "aliased";

/** A binding to a name inside a module, or to the module object itself. */
export type ImportTarget = "symbol" | "module";

/**
 * Where a locally bound name comes from.
 *
 * `from pkg.parser import Foo as Bar` binds `Bar` to
 * `{ modulePath: "pkg.parser", originalName: "Foo", aliasKind: "aliased", target: "symbol" }`.
 * `import pkg.parser as p` binds `p` to
 * `{ modulePath: "pkg.parser", originalName: "parser", aliasKind: "aliased", target: "module" }`.
 */
export interface ImportOrigin {
  readonly modulePath: string;
  readonly originalName: string;
  readonly aliasKind: AliasKind;
  readonly target: ImportTarget;
  /** 1-based line of the import statement */
  readonly line: number;
}

/** Local symbol → origin. Built once per file; last binding wins. */
export type ImportMap = ReadonlyMap<string, ImportOrigin>;

// ---------------------------------------------------------------------------
// Registration sites
// ---------------------------------------------------------------------------

/**
 * One descriptor constructor invocation inside the registration function.
 * `text` runs from the constructor name to its balanced closing paren.
 */
export interface RegistrationSite {
  readonly constructorName: string;
  /** undefined when the constructor is not in the closed kind mapping */
  readonly kind: PluginKind | undefined;
  readonly text: string;
  /** Offsets into the source text (UTF-16 code units, end exclusive) */
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

// ---------------------------------------------------------------------------
// Argument values (syntactic classification)
// ---------------------------------------------------------------------------

export type ArgumentValue =
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "none" }
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "identifier"; readonly symbol: string }
  | { readonly type: "attribute"; readonly base: string; readonly chain: readonly string[] }
  | { readonly type: "unsupported"; readonly raw: string; readonly reason: string };

/** One `name=value` pair of a descriptor invocation. */
export interface ArgumentEntry {
  readonly name: string;
  readonly value: ArgumentValue;
  /** Source text of the value, trimmed */
  readonly raw: string;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export type ObjectKind = "class" | "function";

/** Fully-qualified identity of an imported class or function, independent of local aliases. */
export interface ResolvedReference {
  readonly module: string;
  readonly name: string;
  readonly objectKind: ObjectKind;
}

export type LiteralValue = string | number | boolean | null;

export type ResolvedValue =
  | { readonly type: "literal"; readonly value: LiteralValue }
  | { readonly type: "reference"; readonly reference: ResolvedReference }
  | { readonly type: "unsupported"; readonly raw: string; readonly reason: string };

/** An argument after symbol resolution. */
export interface ResolvedArgument {
  readonly name: string;
  readonly value: ResolvedValue;
  readonly raw: string;
}

// ---------------------------------------------------------------------------
// Engine output
// ---------------------------------------------------------------------------

export type ConstructorArgValue = LiteralValue | ResolvedReference;

/**
 * Resolved, engine-agnostic record for one registered plugin.
 * Knows nothing about the manifest JSON shape.
 */
export interface DiscoveryPlugin {
  readonly name: string;
  readonly kind: PluginKind;
  /** Insertion order follows the source */
  readonly constructorArgs: ReadonlyMap<string, ConstructorArgValue>;
  readonly config: ResolvedReference | null;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/** Dependency and version metadata supplied by the caller. */
export type PackageMetadata = Readonly<Record<string, JsonValue>>;

/** Everything a package registers, in source order. */
export interface Package {
  readonly packageName: string;
  readonly plugins: readonly DiscoveryPlugin[];
  readonly metadata: PackageMetadata;
}
