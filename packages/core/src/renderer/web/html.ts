/**
 * packages/core/src/renderer/web/html.ts — HTML string building and escaping.
 *
 * Why: Every value that reaches markup passes through `escapeHtml`, including
 * attribute values, so element content can never close a tag or an attribute.
 */

import type { InputType, SignalHandler } from "../../iur/types.js";

const HTML_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
});

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export type AttrValue = string | number | boolean | undefined;

/** Attribute pairs in order; `undefined`, `false` and empty strings are dropped. */
export function htmlAttrs(attrs: ReadonlyArray<readonly [string, AttrValue]>): string {
  let out = "";
  for (const [name, value] of attrs) {
    if (value === undefined || value === false || value === "") continue;
    const text = value === true ? "true" : String(value);
    out += ` ${name}="${escapeHtml(text)}"`;
  }
  return out;
}

export function tag(
  name: string,
  attrs: ReadonlyArray<readonly [string, AttrValue]>,
  inner = "",
): string {
  return `<${name}${htmlAttrs(attrs)}>${inner}</${name}>`;
}

export function voidTag(name: string, attrs: ReadonlyArray<readonly [string, AttrValue]>): string {
  return `<${name}${htmlAttrs(attrs)} />`;
}

/** Signal name carried in a `data-on-*` attribute; underscores become dashes. */
export function eventAttrValue(handler: SignalHandler | undefined): string | undefined {
  if (handler === undefined) return undefined;
  const name = typeof handler === "string" ? handler : handler.signal;
  return name.replaceAll("_", "-");
}

const HTML_INPUT_TYPES: ReadonlySet<string> = new Set<InputType>(["text", "password", "email", "number", "tel"]);

export function htmlInputType(inputType: string): string {
  return HTML_INPUT_TYPES.has(inputType) ? inputType : "text";
}
