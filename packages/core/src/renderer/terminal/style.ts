/**
 * packages/core/src/renderer/terminal/style.ts — IUR style to terminal cell style.
 */

import { type Style, mergeManyStyles } from "../../style/style.js";
import type { TerminalStyle } from "./nodes.js";

/**
 * Colors and text attributes only; box metrics belong to the stack.
 * `undefined` when nothing visible remains.
 */
export function toTerminalStyle(style: Style | undefined): TerminalStyle | undefined {
  if (style === undefined) return undefined;
  if (style.fg === undefined && style.bg === undefined && style.attrs.length === 0) return undefined;
  return Object.freeze({
    ...(style.fg !== undefined ? { fg: style.fg } : {}),
    ...(style.bg !== undefined ? { bg: style.bg } : {}),
    attrs: style.attrs,
  });
}

/** Later styles win for colors; attributes accumulate. */
export function mergeTerminalStyles(styles: readonly (Style | undefined)[]): TerminalStyle | undefined {
  const present = styles.filter((s): s is Style => s !== undefined);
  if (present.length === 0) return undefined;
  return toTerminalStyle(mergeManyStyles(present));
}
