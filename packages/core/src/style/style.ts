/**
 * packages/core/src/style/style.ts — Style value object and merge rules.
 */

import { attrEntries, readFinite, readOneOf } from "../attrs.js";

/** RGB triple, each channel 0..255. */
export type RgbColor = readonly [number, number, number];

/** Named color (e.g. "cyan", "bright_red") or an RGB triple. */
export type Color = string | RgbColor;

export const TEXT_ATTRS = [
  "bold",
  "dim",
  "italic",
  "underline",
  "blink",
  "reverse",
  "strikethrough",
] as const;

export type TextAttr = (typeof TEXT_ATTRS)[number];

export const STYLE_ALIGNS = ["left", "center", "right"] as const;

export type StyleAlign = (typeof STYLE_ALIGNS)[number];

/** Resolved style. Every field except `attrs` is optional. */
export type Style = Readonly<{
  fg?: Color | undefined;
  bg?: Color | undefined;
  attrs: readonly TextAttr[];
  padding?: number | undefined;
  margin?: number | undefined;
  width?: number | undefined;
  height?: number | undefined;
  align?: StyleAlign | undefined;
}>;

/** Keys that mark a list as inline style attributes rather than a named reference. */
export const STYLE_KEYS: ReadonlySet<string> = new Set([
  "fg",
  "bg",
  "attrs",
  "padding",
  "margin",
  "width",
  "height",
  "align",
  "spacing",
]);

export const EMPTY_STYLE: Style = Object.freeze({ attrs: Object.freeze([]) });

type MutableStyle = { -readonly [K in keyof Style]: Style[K] };

const SCALAR_KEYS = ["fg", "bg", "padding", "margin", "width", "height", "align"] as const;

function isRgbColor(value: unknown): value is RgbColor {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((channel) => typeof channel === "number" && Number.isFinite(channel))
  );
}

function readColor(value: unknown): Color | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (isRgbColor(value)) return Object.freeze<RgbColor>([value[0], value[1], value[2]]);
  return undefined;
}

function readTextAttrs(value: unknown): readonly TextAttr[] {
  const raw: readonly unknown[] = Array.isArray(value) ? value : [value];
  const out: TextAttr[] = [];
  for (const item of raw) {
    const attr = readOneOf(item, TEXT_ATTRS);
    if (attr !== undefined && !out.includes(attr)) out.push(attr);
  }
  return Object.freeze(out);
}

function uniqAttrs(a: readonly TextAttr[], b: readonly TextAttr[]): readonly TextAttr[] {
  const out: TextAttr[] = [];
  for (const attr of [...a, ...b]) {
    if (!out.includes(attr)) out.push(attr);
  }
  return Object.freeze(out);
}

/**
 * Build a style from an attribute record or `[key, value]` list.
 * Unknown keys and unusable values are ignored.
 */
export function createStyle(source?: unknown): Style {
  const out: MutableStyle = { attrs: Object.freeze([]) };
  for (const [key, value] of attrEntries(source)) {
    switch (key) {
      case "fg":
      case "bg": {
        const color = readColor(value);
        if (color !== undefined) out[key] = color;
        break;
      }
      case "attrs":
        out.attrs = readTextAttrs(value);
        break;
      case "padding":
      case "margin":
      case "width":
      case "height": {
        const n = readFinite(value);
        if (n !== undefined) out[key] = n;
        break;
      }
      case "align": {
        const align = readOneOf(value, STYLE_ALIGNS);
        if (align !== undefined) out.align = align;
        break;
      }
      default:
        break;
    }
  }
  return Object.freeze(out);
}

/**
 * Right-biased merge: scalars come from `b` when set, `attrs` is the ordered
 * union of both sides.
 */
export function mergeStyles(a: Style | undefined, b: Style | undefined): Style {
  if (a === undefined) return b ?? EMPTY_STYLE;
  if (b === undefined) return a;
  const out: MutableStyle = { attrs: uniqAttrs(a.attrs, b.attrs) };
  for (const key of SCALAR_KEYS) {
    const value = b[key] ?? a[key];
    if (value !== undefined) assignScalar(out, key, value);
  }
  return Object.freeze(out);
}

function assignScalar<K extends (typeof SCALAR_KEYS)[number]>(
  out: MutableStyle,
  key: K,
  value: MutableStyle[K],
): void {
  out[key] = value;
}

/** Fold styles left to right over the empty style, skipping absent entries. */
export function mergeManyStyles(styles: readonly (Style | undefined)[]): Style {
  let acc = EMPTY_STYLE;
  for (const style of styles) {
    if (style !== undefined) acc = mergeStyles(acc, style);
  }
  return acc;
}

export function isEmptyStyle(style: Style | undefined): boolean {
  if (style === undefined) return true;
  if (style.attrs.length > 0) return false;
  return SCALAR_KEYS.every((key) => style[key] === undefined);
}
