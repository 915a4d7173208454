/**
 * Deep freeze utility for making engine output immutable.
 */

/**
 * Recursively freezes an object and all nested objects/arrays.
 * Uses a WeakSet to handle circular references safely.
 * Returns the same reference (freezes in-place, no clone).
 *
 * A Map is frozen as an object (which does not stop `set`) and its values
 * are walked; consumers see it through `ReadonlyMap`.
 */
export function deepFreeze<T>(obj: T): T {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  freezeRecursive(obj, new WeakSet<object>());
  return obj;
}

function freezeRecursive(obj: object, seen: WeakSet<object>): void {
  if (seen.has(obj)) {
    return;
  }

  seen.add(obj);
  Object.freeze(obj);

  if (obj instanceof Map) {
    for (const value of obj.values()) {
      if (value !== null && typeof value === "object") {
        freezeRecursive(value, seen);
      }
    }
    return;
  }

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object") {
      freezeRecursive(value, seen);
    }
  }
}
