import type { ConstructorArgValue, ResolvedReference } from "./discovery-types.js";

/**
 * Distinguish a resolved reference from a literal constructor argument.
 */
export function isResolvedReference(value: ConstructorArgValue): value is ResolvedReference {
  return value !== null && typeof value === "object";
}

/**
 * Infer whether a referenced name is a class or a function from its spelling:
 * upper-case initial means class (PEP 8 naming), anything else a function.
 */
export function inferObjectKind(name: string): "class" | "function" {
  const first = name.charAt(0);
  return first !== "" && first === first.toUpperCase() && first !== first.toLowerCase()
    ? "class"
    : "function";
}
