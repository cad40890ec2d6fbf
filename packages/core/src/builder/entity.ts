/**
 * packages/core/src/builder/entity.ts — Source entity shape consumed by the builder.
 *
 * Why: The authoring front end is external. Its output reaches the core as
 * plain records, which are normalized here; malformed nodes are dropped.
 */

import {
  type AttrList,
  type AttrSource,
  attrEntries,
  isAttrPair,
  isPlainRecord,
  readString,
} from "../attrs.js";

export type SourceEntity = Readonly<{
  /** Entity kind, e.g. "button", "vbox", "menuItem" (snake_case also accepted). */
  name: string;
  /** Keys are camelCased on construction, so `on_click` reads as `onClick`. */
  attrs: AttrSource;
  entities: readonly SourceEntity[];
}>;

export function sourceEntity(
  name: string,
  attrs: AttrSource = {},
  entities: readonly SourceEntity[] = [],
): SourceEntity {
  return Object.freeze({ name, attrs: normalizeAttrs(attrs), entities });
}

/** `"text_input"` and `"textInput"` name the same kind. */
export function normalizeKind(name: string): string {
  return name.replace(/_([a-z])/g, (_match, ch: string) => ch.toUpperCase());
}

/**
 * Same attributes as an ordered pair list with camelCase keys.
 * Readers take the first of two colliding keys.
 */
export function normalizeAttrs(source: unknown): AttrList {
  return Object.freeze(
    attrEntries(source).map(([key, value]): readonly [string, unknown] => [normalizeKind(key), value]),
  );
}

function parseAttrs(value: unknown): AttrSource {
  if (isPlainRecord(value)) return value;
  if (Array.isArray(value)) return value.filter(isAttrPair);
  return {};
}

function parseOne(value: unknown): SourceEntity | null {
  if (!isPlainRecord(value)) return null;
  const name = readString(value.name);
  if (name === undefined || name.length === 0) return null;
  return sourceEntity(name, parseAttrs(value.attrs), parseSourceEntities(value.entities));
}

/** Normalize untrusted input (one entity or a list) into source entities. */
export function parseSourceEntities(value: unknown): readonly SourceEntity[] {
  const raw: readonly unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  const out: SourceEntity[] = [];
  for (const item of raw) {
    const parsed = parseOne(item);
    if (parsed !== null) out.push(parsed);
  }
  return Object.freeze(out);
}
