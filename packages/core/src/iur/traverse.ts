/**
 * packages/core/src/iur/traverse.ts — Depth-first IUR traversal and queries.
 */

import { type Check, OK_CHECK, UiError, err } from "../errors.js";
import type { Style } from "../style/style.js";
import { elementChildren, isIurElement } from "./element.js";
import type { ElementKind, IurElement } from "./types.js";

export type TraverseOrder = "pre" | "post";

export type TraverseOptions = Readonly<{ order?: TraverseOrder }>;

export type IurIssue = "duplicate_id" | "missing_id_on_text_input" | "empty_layout";

/**
 * Fold `visit` over every element under `root`, parents before children
 * (`pre`, default) or after them (`post`). Non-element values are skipped.
 */
export function traverseIur<A>(
  root: unknown,
  visit: (element: IurElement, acc: A) => A,
  initial: A,
  opts: TraverseOptions = {},
): A {
  const order = opts.order ?? "pre";
  const walk = (node: unknown, acc: A): A => {
    if (!isIurElement(node)) return acc;
    let next = order === "pre" ? visit(node, acc) : acc;
    for (const child of elementChildren(node)) next = walk(child, next);
    return order === "post" ? visit(node, next) : next;
  };
  return walk(root, initial);
}

/** First element (pre-order) whose `id` equals `id`. */
export function findById(root: unknown, id: string): IurElement | null {
  if (!isIurElement(root)) return null;
  if (root.id === id) return root;
  for (const child of elementChildren(root)) {
    const found = findById(child, id);
    if (found !== null) return found;
  }
  return null;
}

export function findByIdOrThrow(root: unknown, id: string): IurElement {
  const found = findById(root, id);
  if (found === null) {
    throw new UiError("UI_ELEMENT_NOT_FOUND", `Element with id "${id}" not found`);
  }
  return found;
}

export function collectStyles(root: unknown): readonly Style[] {
  return traverseIur<Style[]>(
    root,
    (element, acc) => {
      if (element.style !== undefined) acc.push(element.style);
      return acc;
    },
    [],
  );
}

export function countElements(root: unknown): number {
  return traverseIur(root, (_element, acc: number) => acc + 1, 0);
}

export function countByType(root: unknown): Readonly<Partial<Record<ElementKind, number>>> {
  return traverseIur<Partial<Record<ElementKind, number>>>(
    root,
    (element, acc) => {
      acc[element.type] = (acc[element.type] ?? 0) + 1;
      return acc;
    },
    {},
  );
}

/** Every id in discovery order, duplicates included. */
export function getAllIds(root: unknown): readonly string[] {
  return traverseIur<string[]>(
    root,
    (element, acc) => {
      if (element.id !== undefined) acc.push(element.id);
      return acc;
    },
    [],
  );
}

/** Structural lint: duplicate ids, text inputs without ids, layouts without children. */
export function validateIur(root: unknown): Check<readonly IurIssue[]> {
  const issues: IurIssue[] = [];
  const ids = getAllIds(root);
  if (new Set(ids).size !== ids.length) issues.push("duplicate_id");

  const missingInputId = traverseIur(
    root,
    (element, acc: boolean) => acc || (element.type === "textInput" && element.id === undefined),
    false,
  );
  if (missingInputId) issues.push("missing_id_on_text_input");

  const emptyLayout = traverseIur(
    root,
    (element, acc: boolean) =>
      acc || ((element.type === "vbox" || element.type === "hbox") && element.children.length === 0),
    false,
  );
  if (emptyLayout) issues.push("empty_layout");

  return issues.length === 0 ? OK_CHECK : err(Object.freeze(issues));
}
