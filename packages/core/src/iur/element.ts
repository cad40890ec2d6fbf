/**
 * packages/core/src/iur/element.ts — Total children/metadata access for IUR values.
 *
 * Both accessors accept `unknown`: a value that is not a recognized element
 * reports `{ type: "unknown" }` metadata and no children, so traversal never
 * throws on foreign nodes.
 */

import { isPlainRecord } from "../attrs.js";
import type { Style } from "../style/style.js";
import {
  ELEMENT_KINDS,
  type ElementKind,
  type ElementMetadata,
  type IurElement,
} from "./types.js";

const KIND_SET: ReadonlySet<string> = new Set(ELEMENT_KINDS);

/**
 * Keys holding nested elements; reported through `elementChildren`, not metadata.
 * `content` is also a text element's string, which stays in metadata.
 */
const NESTED_KEYS: ReadonlySet<string> = new Set([
  "children",
  "items",
  "submenu",
  "tabs",
  "content",
  "rootNodes",
]);

const UNKNOWN_METADATA: ElementMetadata = Object.freeze({ type: "unknown" });

const NO_CHILDREN: readonly IurElement[] = Object.freeze([]);

// ---------------------------------------------------------------------------
// Shape checks
// ---------------------------------------------------------------------------

type FieldCheck = (value: unknown) => boolean;
type FieldShape = Readonly<Record<string, FieldCheck>>;

const isString: FieldCheck = (value) => typeof value === "string";
const isNumber: FieldCheck = (value) => typeof value === "number";
const isBoolean: FieldCheck = (value) => typeof value === "boolean";
const isList: FieldCheck = (value) => Array.isArray(value);
const isNested: FieldCheck = (value) => typeof value === "object" && value !== null;

function optional(check: FieldCheck): FieldCheck {
  return (value) => value === undefined || check(value);
}

function listOf(check: FieldCheck): FieldCheck {
  return (value) => Array.isArray(value) && value.every(check);
}

const isStyleValue: FieldCheck = (value) => isPlainRecord(value) && Array.isArray(value.attrs);

const isHandler: FieldCheck = (value) =>
  typeof value === "string" ||
  (isPlainRecord(value) &&
    typeof value.signal === "string" &&
    (value.payload === undefined || isPlainRecord(value.payload)));

const isChartDatum: FieldCheck = (value) =>
  isPlainRecord(value) && typeof value.label === "string" && typeof value.value === "number";

const isTableRow: FieldCheck = (value) => isPlainRecord(value) || Array.isArray(value);

const isColumn: FieldCheck = (value) => isIurElement(value) && value.type === "column";

const COMMON_SHAPE: FieldShape = Object.freeze({
  id: optional(isString),
  style: optional(isStyleValue),
  visible: isBoolean,
});

const BOX_SHAPE: FieldShape = Object.freeze({
  children: isList,
  spacing: isNumber,
  alignItems: optional(isString),
  justifyContent: optional(isString),
  padding: optional(isNumber),
});

/** Fields each kind declares, checked so renderers and traversal never meet a partial element. */
const KIND_SHAPES: Readonly<Record<ElementKind, FieldShape>> = Object.freeze({
  text: { content: optional(isString) },
  button: { label: optional(isString), onClick: optional(isHandler), disabled: isBoolean },
  label: { for: optional(isString), text: optional(isString) },
  textInput: {
    value: optional(isString),
    placeholder: optional(isString),
    inputType: isString,
    onChange: optional(isHandler),
    onSubmit: optional(isHandler),
    disabled: isBoolean,
    formId: optional(isString),
  },
  gauge: { value: isNumber, min: isNumber, max: isNumber, label: optional(isString) },
  sparkline: { data: listOf(isNumber), showDots: isBoolean, showArea: isBoolean },
  barChart: { data: listOf(isChartDatum), orientation: isString, showLabels: isBoolean },
  lineChart: { data: listOf(isChartDatum), showDots: isBoolean, showArea: isBoolean },
  column: {
    key: isString,
    header: isString,
    sortable: isBoolean,
    formatter: optional((value) => typeof value === "function"),
    width: optional(isNumber),
    align: isString,
  },
  table: {
    data: listOf(isTableRow),
    columns: listOf(isColumn),
    selectedRow: optional(isNumber),
    height: optional(isNumber),
    onRowSelect: optional(isHandler),
    onSort: optional(isHandler),
    sortColumn: optional(isString),
    sortDirection: isString,
  },
  menu: { title: optional(isString), position: optional(isString), items: isList },
  menuItem: {
    label: isString,
    action: optional(isHandler),
    disabled: isBoolean,
    icon: optional(isString),
    shortcut: optional(isString),
    submenu: optional(isList),
  },
  contextMenu: { triggerOn: isString, items: isList },
  tabs: {
    activeTab: optional(isString),
    position: optional(isString),
    onChange: optional(isHandler),
    tabs: isList,
  },
  tab: {
    label: isString,
    icon: optional(isString),
    disabled: isBoolean,
    closable: isBoolean,
    content: optional(isNested),
  },
  treeView: {
    rootNodes: isList,
    selectedNode: optional(isString),
    expandedNodes: optional(listOf(isString)),
    onSelect: optional(isHandler),
    onToggle: optional(isHandler),
    showRoot: isBoolean,
  },
  treeNode: {
    label: isString,
    expanded: isBoolean,
    icon: optional(isString),
    iconExpanded: optional(isString),
    selectable: isBoolean,
    children: optional(isList),
  },
  vbox: BOX_SHAPE,
  hbox: BOX_SHAPE,
});

function isElementKind(kind: string): kind is ElementKind {
  return KIND_SET.has(kind);
}

function matchesShape(value: object, shape: FieldShape): boolean {
  for (const [key, check] of Object.entries(shape)) {
    if (!check(Reflect.get(value, key))) return false;
  }
  return true;
}

/**
 * A known kind carrying every field that kind declares. Nested elements are
 * checked when they are visited, not here; table columns are checked eagerly
 * because renderers read them directly.
 */
export function isIurElement(value: unknown): value is IurElement {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  const kind = value.type;
  if (typeof kind !== "string" || !isElementKind(kind)) return false;
  return matchesShape(value, COMMON_SHAPE) && matchesShape(value, KIND_SHAPES[kind]);
}

export function isElementList(
  value: IurElement | readonly IurElement[],
): value is readonly IurElement[] {
  return Array.isArray(value);
}

export function elementChildren(value: unknown): readonly IurElement[] {
  if (!isIurElement(value)) return NO_CHILDREN;
  switch (value.type) {
    case "vbox":
    case "hbox":
      return value.children;
    case "menu":
    case "contextMenu":
      return value.items;
    case "menuItem":
      return value.submenu ?? NO_CHILDREN;
    case "tabs":
      return value.tabs;
    case "tab": {
      const content = value.content;
      if (content === undefined) return NO_CHILDREN;
      return isElementList(content) ? content : [content];
    }
    case "treeView":
      return value.rootNodes;
    case "treeNode":
      return value.children ?? NO_CHILDREN;
    default:
      return NO_CHILDREN;
  }
}

type MetadataDraft = {
  type: ElementKind;
  id?: string;
  style?: Style;
  visible: boolean;
  [key: string]: unknown;
};

export function elementMetadata(value: unknown): ElementMetadata {
  if (!isIurElement(value)) return UNKNOWN_METADATA;
  const meta: MetadataDraft = { type: value.type, visible: value.visible };
  if (value.id !== undefined) meta.id = value.id;
  if (value.style !== undefined) meta.style = value.style;

  const entries: [string, unknown][] = Object.entries(value);
  for (const [key, entry] of entries) {
    if (entry === undefined) continue;
    if (NESTED_KEYS.has(key) && typeof entry === "object") continue;
    if (key === "type" || key === "id" || key === "style" || key === "visible") continue;
    meta[key] = entry;
  }
  return Object.freeze(meta);
}

/** `false` only when the element explicitly opts out of rendering. */
export function isVisible(value: unknown): boolean {
  return elementMetadata(value).visible !== false;
}

/** Kind name for diagnostics: the `type` field when present, else the JS type. */
export function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "type" in value) return String(value.type);
  return value === null ? "null" : typeof value;
}
