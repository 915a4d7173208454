import { type ManifestDifference, SchemaMismatchError } from "@plugscan/errors";
import { formatPath } from "./schema.js";

function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function show(value: unknown): string {
  return value === undefined ? "nothing" : JSON.stringify(value);
}

/**
 * Structural comparison of two manifest JSON values.
 *
 * Objects compare as key sets (order ignored), arrays element by element
 * (order kept). A missing key and a `null` value are different.
 */
export function compareManifests(actual: unknown, expected: unknown): ManifestDifference[] {
  const differences: ManifestDifference[] = [];
  walk(actual, expected, [], differences);
  return differences;
}

function walk(
  actual: unknown,
  expected: unknown,
  path: ReadonlyArray<string | number>,
  out: ManifestDifference[],
): void {
  if (Array.isArray(actual) && Array.isArray(expected)) {
    if (actual.length !== expected.length) {
      out.push({ path: formatPath(path), reason: `expected ${expected.length} items, got ${actual.length}` });
    }
    const shared = Math.min(actual.length, expected.length);
    for (let i = 0; i < shared; i++) {
      walk(actual[i], expected[i], [...path, i], out);
    }
    return;
  }

  if (isPlainObject(actual) && isPlainObject(expected)) {
    for (const key of Object.keys(expected)) {
      if (!Object.hasOwn(actual, key)) {
        out.push({ path: formatPath([...path, key]), reason: "missing" });
      } else {
        walk(actual[key], expected[key], [...path, key], out);
      }
    }
    for (const key of Object.keys(actual)) {
      if (!Object.hasOwn(expected, key)) {
        out.push({ path: formatPath([...path, key]), reason: "unexpected key" });
      }
    }
    return;
  }

  if (!Object.is(actual, expected)) {
    out.push({ path: formatPath(path), reason: `expected ${show(expected)}, got ${show(actual)}` });
  }
}

/**
 * @throws SchemaMismatchError listing every difference
 */
export function assertManifestEquivalent(actual: unknown, expected: unknown): void {
  const differences = compareManifests(actual, expected);
  if (differences.length > 0) {
    throw new SchemaMismatchError(differences);
  }
}
