import {
  type ArgumentEntry,
  type ImportMap,
  inferObjectKind,
  type LiteralValue,
  type ResolvedArgument,
  type ResolvedValue,
} from "@plugscan/core";
import { RequiresRuntimeInspectionError, UnresolvedSymbolError } from "@plugscan/errors";
import type { EnumerationCase } from "./config.js";

export interface ResolveOptions {
  /** Enumeration class (original name) → how member names are written */
  readonly enumerations?: Readonly<Record<string, EnumerationCase>> | undefined;
  /** Module-level names the file defines itself */
  readonly localNames?: ReadonlySet<string> | undefined;
}

const DEFAULT_ENUMERATIONS: Readonly<Record<string, EnumerationCase>> = { IOType: "lower" };

function enumerationCase(
  enumerations: Readonly<Record<string, EnumerationCase>>,
  name: string,
): EnumerationCase | undefined {
  return Object.hasOwn(enumerations, name) ? enumerations[name] : undefined;
}

function memberLiteral(member: string, mode: EnumerationCase): LiteralValue {
  switch (mode) {
    case "lower":
      return member.toLowerCase();
    case "upper":
      return member.toUpperCase();
    case "preserve":
      return member;
  }
}

/**
 * Resolve one parsed argument against the file's import map.
 *
 * Pure: the result depends only on the argument and the map, never on the
 * order the imports appeared in.
 *
 * @throws UnresolvedSymbolError when a referenced name is not imported
 * @throws RequiresRuntimeInspectionError when the value is an attribute only
 *   the interpreter can evaluate, or a module object
 */
export function resolveArgument(
  entry: ArgumentEntry,
  importMap: ImportMap,
  options: ResolveOptions = {},
): ResolvedArgument {
  return { name: entry.name, raw: entry.raw, value: resolveValue(entry, importMap, options) };
}

function resolveValue(entry: ArgumentEntry, importMap: ImportMap, options: ResolveOptions): ResolvedValue {
  const enumerations = options.enumerations ?? DEFAULT_ENUMERATIONS;
  const { value } = entry;

  switch (value.type) {
    case "string":
    case "boolean":
    case "number":
      return { type: "literal", value: value.value };
    case "none":
      return { type: "literal", value: null };
    case "unsupported":
      return { type: "unsupported", raw: value.raw, reason: value.reason };

    case "identifier": {
      const origin = importMap.get(value.symbol);
      if (origin === undefined) {
        throw new UnresolvedSymbolError(
          value.symbol,
          entry.name,
          options.localNames?.has(value.symbol) ?? false,
        );
      }
      if (origin.target === "module") {
        throw new RequiresRuntimeInspectionError(entry.raw, entry.name, "value is a module object");
      }
      return {
        type: "reference",
        reference: {
          module: origin.modulePath,
          name: origin.originalName,
          objectKind: inferObjectKind(origin.originalName),
        },
      };
    }

    case "attribute": {
      const origin = importMap.get(value.base);
      if (origin === undefined) {
        throw new UnresolvedSymbolError(value.base, entry.name, options.localNames?.has(value.base) ?? false);
      }

      if (origin.target === "symbol") {
        const mode = enumerationCase(enumerations, origin.originalName);
        const [member] = value.chain;
        if (mode !== undefined && member !== undefined && value.chain.length === 1) {
          return { type: "literal", value: memberLiteral(member, mode) };
        }
        throw new RequiresRuntimeInspectionError(
          entry.raw,
          entry.name,
          `attribute of ${origin.originalName} is only known at runtime`,
        );
      }

      // Module binding: walk sub-modules until the named object.
      let modulePath = origin.modulePath;
      for (let i = 0; i < value.chain.length; i++) {
        const segment = value.chain[i] ?? "";
        const next = value.chain[i + 1];
        if (next === undefined) {
          return {
            type: "reference",
            reference: { module: modulePath, name: segment, objectKind: inferObjectKind(segment) },
          };
        }
        const mode = enumerationCase(enumerations, segment);
        if (mode !== undefined && i + 2 === value.chain.length) {
          return { type: "literal", value: memberLiteral(next, mode) };
        }
        if (!/^[a-z_]/.test(segment)) {
          throw new RequiresRuntimeInspectionError(
            entry.raw,
            entry.name,
            `${segment}.${next} is a class attribute`,
          );
        }
        modulePath = `${modulePath}.${segment}`;
      }
      throw new RequiresRuntimeInspectionError(entry.raw, entry.name, "value is a module object");
    }
  }
}
