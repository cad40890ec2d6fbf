/**
 * packages/core/src/internal/equal.ts — Structural equality and deep merge.
 *
 * Keys holding `undefined` count as absent, so `{ a: 1 }` equals
 * `{ a: 1, b: undefined }`. Functions compare by reference.
 */

import { isPlainRecord } from "../attrs.js";

function definedEntries(value: object): ReadonlyMap<string, unknown> {
  const out = new Map<string, unknown>();
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) out.set(key, entry);
  }
  return out;
}

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
  const aEntries = definedEntries(a);
  const bEntries = definedEntries(b);
  if (aEntries.size !== bEntries.size) return false;
  for (const [key, value] of aEntries) {
    if (!bEntries.has(key)) return false;
    if (!deepEqual(value, bEntries.get(key))) return false;
  }
  return true;
}

/** Own data property; a `__proto__` key stays a key instead of replacing the prototype. */
function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Merge `right` into `left`. Keys holding plain records on both sides merge
 * recursively; every other value from `right` replaces the left one.
 */
export function deepMerge(
  left: Readonly<Record<string, unknown>>,
  right: Readonly<Record<string, unknown>>,
): Readonly<Record<string, unknown>> {
  const out: Record<string, unknown> = { ...left };
  for (const [key, value] of Object.entries(right)) {
    const current = Object.hasOwn(out, key) ? out[key] : undefined;
    defineEntry(out, key, isPlainRecord(current) && isPlainRecord(value) ? deepMerge(current, value) : value);
  }
  return Object.freeze(out);
}
