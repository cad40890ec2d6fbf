/**
 * packages/core/src/iur/verify.ts — Definition verifiers.
 *
 * Duplicate ids and labels pointing at missing inputs make a definition
 * unrenderable, so both throw UiError with the offending names.
 */

import { UiError } from "../errors.js";
import { traverseIur } from "./traverse.js";
import type { ElementKind } from "./types.js";

type IdOwner = Readonly<{ id: string; kind: ElementKind }>;

export function verifyUniqueIds(root: unknown): void {
  const owners = traverseIur<IdOwner[]>(
    root,
    (element, acc) => {
      if (element.id !== undefined) acc.push({ id: element.id, kind: element.type });
      return acc;
    },
    [],
  );

  const seen = new Set<string>();
  for (const owner of owners) {
    if (!seen.has(owner.id)) {
      seen.add(owner.id);
      continue;
    }
    const sharing = owners.filter((o) => o.id === owner.id).map((o) => `  - ${o.kind}`);
    throw new UiError(
      "UI_DUPLICATE_ID",
      `Duplicate ID found: "${owner.id}"\nThe following elements share the same ID:\n${sharing.join("\n")}`,
    );
  }
}

export function verifyLabelRefs(root: unknown): void {
  const inputIds = traverseIur<string[]>(
    root,
    (element, acc) => {
      if (element.type === "textInput" && element.id !== undefined) acc.push(element.id);
      return acc;
    },
    [],
  );

  traverseIur(
    root,
    (element, acc: null) => {
      if (element.type !== "label" || element.for === undefined) return acc;
      if (inputIds.includes(element.for)) return acc;
      const available = inputIds.length === 0 ? "(none)" : inputIds.map((id) => `"${id}"`).join(", ");
      throw new UiError(
        "UI_DANGLING_LABEL_REF",
        `Invalid label reference: "for" references "${element.for}", but no text input with that ID exists. Available input IDs: ${available}`,
      );
    },
    null,
  );
}

/** Run every verifier; the first violation throws. */
export function verifyTree(root: unknown): void {
  verifyUniqueIds(root);
  verifyLabelRefs(root);
}
