/**
 * packages/core/src/renderer/terminal/nodes.ts — Terminal native tree.
 *
 * Why: The terminal sink takes a small tree of text leaves and stacks.
 * Interactive widgets are wrapped in `tagged` nodes so event handling can
 * map a widget back to its id and handlers without the IUR.
 */

import type { BoxAlign, BoxJustify, ElementKind } from "../../iur/types.js";
import type { Color, TextAttr } from "../../style/style.js";

export type TerminalStyle = Readonly<{
  fg?: Color;
  bg?: Color;
  attrs: readonly TextAttr[];
}>;

export type StackDirection = "vertical" | "horizontal";

export type TerminalTextNode = Readonly<{ kind: "text"; content: string }>;

export type TerminalStackNode = Readonly<{
  kind: "stack";
  direction: StackDirection;
  children: readonly TerminalNode[];
  spacing: number;
  padding?: number;
  align?: BoxAlign;
  justify?: BoxJustify;
}>;

export type TerminalStyledNode = Readonly<{ kind: "styled"; node: TerminalNode; style: TerminalStyle }>;

export type TerminalTagMeta = Readonly<Record<string, unknown>>;

export type TerminalTaggedNode = Readonly<{
  kind: "tagged";
  tag: ElementKind;
  node: TerminalNode;
  meta: TerminalTagMeta;
}>;

export type TerminalEmptyNode = Readonly<{ kind: "empty" }>;

export type TerminalNode =
  | TerminalTextNode
  | TerminalStackNode
  | TerminalStyledNode
  | TerminalTaggedNode
  | TerminalEmptyNode;

export const EMPTY_NODE: TerminalEmptyNode = Object.freeze({ kind: "empty" });

export function textNode(content: string): TerminalTextNode {
  return Object.freeze({ kind: "text", content });
}

export type StackOptions = Readonly<{
  spacing?: number;
  padding?: number | undefined;
  align?: BoxAlign | undefined;
  justify?: BoxJustify | undefined;
}>;

export function stackNode(
  direction: StackDirection,
  children: readonly TerminalNode[],
  opts: StackOptions = {},
): TerminalStackNode {
  return Object.freeze({
    kind: "stack",
    direction,
    children: Object.freeze([...children]),
    spacing: opts.spacing ?? 0,
    ...(opts.padding !== undefined ? { padding: opts.padding } : {}),
    ...(opts.align !== undefined ? { align: opts.align } : {}),
    ...(opts.justify !== undefined ? { justify: opts.justify } : {}),
  });
}

/** Wrap `node` only when a style is present. */
export function styledNode(node: TerminalNode, style: TerminalStyle | undefined): TerminalNode {
  return style === undefined ? node : Object.freeze({ kind: "styled", node, style });
}

/** Tag metadata keeps only defined values. */
export function taggedNode(
  tag: ElementKind,
  node: TerminalNode,
  meta: Readonly<Record<string, unknown>>,
): TerminalTaggedNode {
  const compact: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined) compact[key] = value;
  }
  return Object.freeze({ kind: "tagged", tag, node, meta: Object.freeze(compact) });
}

/** Text of every leaf, depth-first. */
export function collectText(node: TerminalNode): readonly string[] {
  switch (node.kind) {
    case "text":
      return [node.content];
    case "stack":
      return node.children.flatMap(collectText);
    case "styled":
    case "tagged":
      return collectText(node.node);
    case "empty":
      return [];
  }
}

/**
 * Plain-text layout: vertical stacks separate children with `spacing` blank
 * lines and horizontal stacks with `spacing` spaces. Empty children are dropped.
 */
export function renderPlainText(node: TerminalNode): string {
  switch (node.kind) {
    case "text":
      return node.content;
    case "styled":
    case "tagged":
      return renderPlainText(node.node);
    case "empty":
      return "";
    case "stack": {
      const parts = node.children.map(renderPlainText).filter((part) => part.length > 0);
      if (node.direction === "horizontal") return parts.join(" ".repeat(node.spacing));
      return parts.join("\n".repeat(node.spacing + 1));
    }
  }
}
