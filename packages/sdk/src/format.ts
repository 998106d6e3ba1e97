/**
 * Deterministic serialization utilities
 */

import { createHash } from "node:crypto";
import type { Value } from "./types.js";

/**
 * Stable, deterministic JSON stringification with alphabetical key ordering
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 0)
 * @returns JSON string without trailing newline
 */
export function stableStringify(obj: unknown, indent = 0): string {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      // Detect cycles
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        // Objects: sort keys and normalize values
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) ?? "null";
}

/**
 * Structural equality of two stored values (key order ignored, no type coercion)
 */
export function valuesEqual(a: Value | undefined, b: Value | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (typeof a !== "object" || typeof b !== "object") return false;
  return stableStringify(a) === stableStringify(b);
}

/**
 * SHA-1 hex digest of the stable serialization of a value
 */
export function fingerprint(value: unknown): string {
  return createHash("sha1").update(stableStringify(value)).digest("hex");
}
