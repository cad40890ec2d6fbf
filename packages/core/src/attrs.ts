/**
 * packages/core/src/attrs.ts — Attribute sources and typed readers.
 *
 * Attribute sets arrive either as plain records or as ordered `[key, value]`
 * lists. Readers never throw; an unusable value reads as `undefined`.
 */

export type AttrRecord = Readonly<Record<string, unknown>>;
export type AttrPair = readonly [string, unknown];
export type AttrList = readonly AttrPair[];
export type AttrSource = AttrRecord | AttrList;

export function isPlainRecord(value: unknown): value is AttrRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isAttrPair(value: unknown): value is AttrPair {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "string";
}

/** Entries of a record or pair list, in source order. Malformed pairs are skipped. */
export function attrEntries(source: unknown): readonly AttrPair[] {
  if (isPlainRecord(source)) return Object.entries(source);
  if (!Array.isArray(source)) return [];
  const out: AttrPair[] = [];
  for (const entry of source) {
    if (isAttrPair(entry)) out.push(entry);
  }
  return out;
}

/** First value stored under `key`. */
export function readAttr(source: unknown, key: string): unknown {
  if (isPlainRecord(source)) return source[key];
  if (!Array.isArray(source)) return undefined;
  for (const entry of source) {
    if (isAttrPair(entry) && entry[0] === key) return entry[1];
  }
  return undefined;
}

export function hasAttr(source: unknown, key: string): boolean {
  if (isPlainRecord(source)) return Object.prototype.hasOwnProperty.call(source, key);
  return attrEntries(source).some(([k]) => k === key);
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function readFinite(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

export function readOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
): T | undefined {
  if (typeof value !== "string") return undefined;
  for (const candidate of allowed) {
    if (candidate === value) return candidate;
  }
  return undefined;
}

export function readStringList(value: unknown): readonly string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item === "string") out.push(item);
  }
  return Object.freeze(out);
}

export function readFiniteList(value: unknown): readonly number[] {
  if (!Array.isArray(value)) return Object.freeze([]);
  const out: number[] = [];
  for (const item of value) {
    const n = readFinite(item);
    if (n !== undefined) out.push(n);
  }
  return Object.freeze(out);
}
