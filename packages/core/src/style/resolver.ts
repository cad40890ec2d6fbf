/**
 * packages/core/src/style/resolver.ts — Named style registry and inheritance.
 *
 * Why: Styles may extend one parent. Resolution is a pure function of the
 * registry and the requested name; nothing is cached between calls.
 */

import { type AttrSource, isAttrPair, isPlainRecord } from "../attrs.js";
import { type Check, OK_CHECK, UiError, err } from "../errors.js";
import { STYLE_KEYS, type Style, createStyle, mergeStyles } from "./style.js";

export type NamedStyle = Readonly<{
  name: string;
  extends?: string | undefined;
  attributes: AttrSource;
}>;

export type StyleRegistry = ReadonlyMap<string, NamedStyle>;

export type StyleRefError = "style_not_found";

const EMPTY_REGISTRY: StyleRegistry = new Map();

export function createStyleRegistry(definitions: readonly NamedStyle[] = []): StyleRegistry {
  if (definitions.length === 0) return EMPTY_REGISTRY;
  const map = new Map<string, NamedStyle>();
  for (const def of definitions) map.set(def.name, def);
  return map;
}

/**
 * Resolve `name` with its ancestors, then apply `overrides`.
 * An unregistered name resolves to just the overrides.
 *
 * @throws UiError `UI_CIRCULAR_STYLE` when `name` is reachable from its own parent chain
 */
export function resolveStyle(
  registry: StyleRegistry,
  name: string,
  overrides: AttrSource = [],
): Style {
  return resolveChain(registry, name, overrides, []);
}

function resolveChain(
  registry: StyleRegistry,
  name: string,
  overrides: AttrSource,
  chain: readonly string[],
): Style {
  const def = registry.get(name);
  if (def === undefined) return createStyle(overrides);
  if (chain.includes(name)) {
    throw new UiError(
      "UI_CIRCULAR_STYLE",
      `Circular style inheritance detected: ${[...chain, name].join(" -> ")}`,
    );
  }

  const own = createStyle(def.attributes);
  const parentName = def.extends;
  if (parentName === undefined || !registry.has(parentName)) {
    return mergeStyles(own, createStyle(overrides));
  }

  const parent = resolveChain(registry, parentName, [], [...chain, name]);
  return mergeStyles(mergeStyles(parent, own), createStyle(overrides));
}

type ParsedRef =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "named"; name: string; overrides: AttrSource }>
  | Readonly<{ kind: "inline"; attrs: AttrSource }>;

function parseStyleRef(ref: unknown): ParsedRef {
  if (ref === undefined || ref === null) return { kind: "none" };
  if (typeof ref === "string") return { kind: "named", name: ref, overrides: [] };
  if (isPlainRecord(ref)) return { kind: "inline", attrs: ref };
  if (!Array.isArray(ref) || ref.length === 0) return { kind: "none" };

  const head: unknown = ref[0];
  if (typeof head === "string") {
    // ["fg", "red"] is a single inline pair, ["header", ["fg", "red"]] a named ref.
    if (STYLE_KEYS.has(head)) return { kind: "inline", attrs: isAttrPair(ref) ? [ref] : [] };
    return { kind: "named", name: head, overrides: ref.slice(1).filter(isAttrPair) };
  }
  return { kind: "inline", attrs: ref.filter(isAttrPair) };
}

/**
 * Resolve a style reference as written on an entity:
 * - a registered name,
 * - an inline attribute record or `[key, value]` list,
 * - a list headed by a name followed by override pairs.
 * Empty references resolve to `undefined`.
 */
export function resolveStyleRef(registry: StyleRegistry, ref: unknown): Style | undefined {
  const parsed = parseStyleRef(ref);
  switch (parsed.kind) {
    case "none":
      return undefined;
    case "named":
      return resolveStyle(registry, parsed.name, parsed.overrides);
    case "inline":
      return createStyle(parsed.attrs);
  }
}

/** Named references must exist in the registry; inline references always pass. */
export function validateStyleRef(registry: StyleRegistry, ref: unknown): Check<StyleRefError> {
  const parsed = parseStyleRef(ref);
  if (parsed.kind === "named" && !registry.has(parsed.name)) return err("style_not_found");
  return OK_CHECK;
}

/** Every registered style fully resolved, keyed by name in sorted order. */
export function getAllStyles(registry: StyleRegistry): ReadonlyMap<string, Style> {
  const names = [...registry.keys()].sort();
  const out = new Map<string, Style>();
  for (const name of names) out.set(name, resolveStyle(registry, name));
  return out;
}
