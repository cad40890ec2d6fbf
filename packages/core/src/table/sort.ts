/**
 * packages/core/src/table/sort.ts — Stable row sort for table widgets.
 *
 * Missing values (`null`/`undefined`) sort first ascending and last
 * descending. Equal keys keep their input order.
 */

import { isAttrPair, isPlainRecord } from "../attrs.js";
import type { SortDirection, TableRow } from "../iur/types.js";

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/** Read `key` from a keyed record or a `[key, value]` list row. */
export function getRowValue(row: unknown, key: string): unknown {
  if (isPlainRecord(row)) return row[key];
  if (!Array.isArray(row)) return undefined;
  for (const entry of row) {
    if (isAttrPair(entry) && entry[0] === key) return entry[1];
  }
  return undefined;
}

/**
 * Order two present values. Numbers, strings and booleans compare natively
 * against their own kind; mixed kinds compare by their text form.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) && Number.isNaN(b)) return 0;
    if (Number.isNaN(a)) return 1;
    if (Number.isNaN(b)) return -1;
    return a - b;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  const as = textOf(a);
  const bs = textOf(b);
  if (as < bs) return -1;
  if (as > bs) return 1;
  return 0;
}

function compareWithPlacement(a: unknown, b: unknown, direction: SortDirection): number {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing && bMissing) return 0;
  if (aMissing) return direction === "asc" ? -1 : 1;
  if (bMissing) return direction === "asc" ? 1 : -1;
  const cmp = compareValues(a, b);
  return direction === "asc" ? cmp : -cmp;
}

export function sortRows<T extends TableRow>(
  rows: readonly T[],
  key: string | null | undefined,
  direction: SortDirection = "asc",
): readonly T[] {
  if (rows.length === 0 || isMissing(key)) return rows;

  const sortKey = key;
  const withIndex = rows.map((row, index) => ({ row, index, value: getRowValue(row, sortKey) }));
  withIndex.sort((a, b) => {
    const cmp = compareWithPlacement(a.value, b.value, direction);
    if (cmp !== 0) return cmp;
    return a.index - b.index;
  });

  return Object.freeze(withIndex.map((item) => item.row));
}
