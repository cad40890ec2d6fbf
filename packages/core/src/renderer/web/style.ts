/**
 * packages/core/src/renderer/web/style.ts — IUR style to inline CSS.
 */

import type { BoxAlign, BoxJustify } from "../../iur/types.js";
import type { Color, Style, TextAttr } from "../../style/style.js";

const ATTR_CSS: Readonly<Partial<Record<TextAttr, string>>> = Object.freeze({
  bold: "font-weight: bold",
  underline: "text-decoration: underline",
  italic: "font-style: italic",
  strikethrough: "text-decoration: line-through",
  dim: "opacity: 0.7",
});

export function cssColor(color: Color): string {
  if (typeof color === "string") return color;
  const [r, g, b] = color;
  return `rgb(${r}, ${g}, ${b})`;
}

function styleDeclarations(style: Style | undefined): string[] {
  if (style === undefined) return [];
  const out: string[] = [];
  if (style.fg !== undefined) out.push(`color: ${cssColor(style.fg)}`);
  if (style.bg !== undefined) out.push(`background-color: ${cssColor(style.bg)}`);
  for (const attr of style.attrs) {
    const css = ATTR_CSS[attr];
    if (css !== undefined) out.push(css);
  }
  return out;
}

/** Declarations joined by `"; "`; empty when the style sets nothing visible. */
export function toCss(style: Style | undefined): string {
  return styleDeclarations(style).join("; ");
}

const ALIGN_ITEMS: Readonly<Record<BoxAlign, string>> = Object.freeze({
  start: "flex-start",
  center: "center",
  end: "flex-end",
  stretch: "stretch",
});

const JUSTIFY_CONTENT: Readonly<Record<BoxJustify, string>> = Object.freeze({
  start: "flex-start",
  center: "center",
  end: "flex-end",
  space_between: "space-between",
  space_around: "space-around",
});

export type FlexOptions = Readonly<{
  direction: "column" | "row";
  spacing?: number | undefined;
  padding?: number | undefined;
  align?: BoxAlign | undefined;
  justify?: BoxJustify | undefined;
  style?: Style | undefined;
}>;

/** Flex container CSS; the element's own style follows the layout declarations. */
export function flexCss(opts: FlexOptions): string {
  const out = ["display: flex", `flex-direction: ${opts.direction}`];
  if (opts.spacing !== undefined && opts.spacing > 0) out.push(`gap: ${opts.spacing}px`);
  if (opts.padding !== undefined) out.push(`padding: ${opts.padding}px`);
  if (opts.align !== undefined) out.push(`align-items: ${ALIGN_ITEMS[opts.align]}`);
  if (opts.justify !== undefined) out.push(`justify-content: ${JUSTIFY_CONTENT[opts.justify]}`);
  return [...out, ...styleDeclarations(opts.style)].join("; ");
}
