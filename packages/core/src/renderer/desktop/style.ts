/**
 * packages/core/src/renderer/desktop/style.ts — IUR style to desktop widget props.
 */

import type { BoxAlign, BoxJustify } from "../../iur/types.js";
import type { Style, TextAttr } from "../../style/style.js";
import type { DesktopProps } from "./widgets.js";

/** Attributes desktop toolkits can express as a font style. */
const FONT_STYLES: ReadonlySet<TextAttr> = new Set<TextAttr>(["bold", "underline", "italic"]);

/** `color`, `background` and `fontStyle`; absent fields are omitted. */
export function toDesktopProps(style: Style | undefined): DesktopProps {
  if (style === undefined) return {};
  const fontStyle = style.attrs.filter((attr) => FONT_STYLES.has(attr));
  return Object.freeze({
    ...(style.fg !== undefined ? { color: style.fg } : {}),
    ...(style.bg !== undefined ? { background: style.bg } : {}),
    ...(fontStyle.length > 0 ? { fontStyle } : {}),
  });
}

const ALIGN: Readonly<Record<BoxAlign, string>> = Object.freeze({
  start: "left",
  center: "center",
  end: "right",
  stretch: "stretch",
});

const JUSTIFY: Readonly<Record<BoxJustify, string>> = Object.freeze({
  start: "top",
  center: "center",
  end: "bottom",
  space_between: "space_between",
  space_around: "space_around",
});

export function desktopAlign(align: BoxAlign | undefined): string | undefined {
  return align === undefined ? undefined : ALIGN[align];
}

export function desktopJustify(justify: BoxJustify | undefined): string | undefined {
  return justify === undefined ? undefined : JUSTIFY[justify];
}
