/**
 * packages/core/src/builder/builder.ts — Source entities to IUR elements.
 *
 * Why: Building is lenient. Unknown kinds and malformed collections degrade to
 * `null` or an empty list so a partially specified UI still renders. The style
 * registry is threaded explicitly through every build call.
 *
 * @see builder/entity.ts for the accepted input shape
 */

import {
  type AttrPair,
  isAttrPair,
  isPlainRecord,
  readAttr,
  readBoolean,
  readFinite,
  readFiniteList,
  readOneOf,
  readString,
  readStringList,
} from "../attrs.js";
import { type WarnFn, warnDev, warnPrefix } from "../devWarn.js";
import { type Check, OK_CHECK, err } from "../errors.js";
import { isIurElement } from "../iur/element.js";
import { iur } from "../iur/factories.js";
import type {
  BoxAlign,
  BoxJustify,
  CellAlign,
  CellFormatter,
  ChartDatum,
  ColumnElement,
  InputType,
  IurElement,
  MenuItemElement,
  SignalHandler,
  TabElement,
  TableRow,
  TreeNodeElement,
} from "../iur/types.js";
import {
  type StyleRegistry,
  createStyleRegistry,
  resolveStyleRef,
  validateStyleRef,
} from "../style/resolver.js";
import type { Style } from "../style/style.js";
import { type SourceEntity, normalizeAttrs, normalizeKind } from "./entity.js";

export type BuildOptions = Readonly<{
  /** Named styles referenced by `style` attributes. */
  styles?: StyleRegistry;
  warn?: WarnFn;
}>;

type BuildContext = Readonly<{
  styles: StyleRegistry;
  warn: WarnFn;
}>;

export type ValidationError = "missing_label" | "missing_content" | "unknown_type";

const INPUT_TYPES: readonly InputType[] = ["text", "password", "email", "number", "tel"];
const CELL_ALIGNS: readonly CellAlign[] = ["left", "center", "right"];
const BOX_ALIGNS: readonly BoxAlign[] = ["start", "center", "end", "stretch"];
const BOX_JUSTIFIES: readonly BoxJustify[] = [
  "start",
  "center",
  "end",
  "space_between",
  "space_around",
];
const EDGES = ["top", "bottom", "left", "right"] as const;
const TRIGGERS = ["right_click", "left_click", "long_press"] as const;

function toContext(opts: BuildOptions): BuildContext {
  return {
    styles: opts.styles ?? createStyleRegistry(),
    warn: opts.warn ?? warnDev,
  };
}

/** Build every root entity and return the first that produces an element. */
export function build(
  entities: readonly SourceEntity[],
  opts: BuildOptions = {},
): IurElement | null {
  const ctx = toContext(opts);
  for (const entity of entities) {
    const element = buildWith(entity, ctx);
    if (element !== null) return element;
  }
  return null;
}

/** Build a single entity; unknown kinds yield `null`. */
export function buildEntity(entity: SourceEntity, opts: BuildOptions = {}): IurElement | null {
  return buildWith(entity, toContext(opts));
}

/**
 * Collect the entities of a named sub-collection:
 * - a child named `collectionKey` with nested entities contributes those,
 * - a child named `childKind` contributes itself,
 * - without `childKind`, a child named `collectionKey` contributes itself.
 */
export function extractNestedEntities(
  entity: SourceEntity,
  collectionKey: string,
  childKind?: string,
): readonly SourceEntity[] {
  const out: SourceEntity[] = [];
  for (const child of entity.entities) {
    const name = normalizeKind(child.name);
    if (name === collectionKey && child.entities.length > 0) {
      out.push(...child.entities);
    } else if (childKind !== undefined && name === childKind) {
      out.push(child);
    } else if (childKind === undefined && name === collectionKey) {
      out.push(child);
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Attribute readers
// ---------------------------------------------------------------------------

function readHandler(value: unknown): SignalHandler | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (isPlainRecord(value)) {
    const signal = readString(value.signal);
    if (signal === undefined) return undefined;
    const payload = value.payload;
    return isPlainRecord(payload) ? { signal, payload } : { signal };
  }
  if (isAttrPair(value)) {
    const payload = value[1];
    if (isPlainRecord(payload)) return { signal: value[0], payload };
  }
  return undefined;
}

function readChartData(value: unknown): readonly ChartDatum[] {
  if (!Array.isArray(value)) return [];
  const out: ChartDatum[] = [];
  for (const item of value) {
    if (isPlainRecord(item)) {
      const label = readString(item.label);
      const n = readFinite(item.value);
      if (label !== undefined && n !== undefined) out.push({ label, value: n });
    } else if (isAttrPair(item)) {
      const n = readFinite(item[1]);
      if (n !== undefined) out.push({ label: item[0], value: n });
    }
  }
  return out;
}

function isPairList(value: unknown): value is readonly AttrPair[] {
  return Array.isArray(value) && value.length > 0 && value.every(isAttrPair);
}

function readRows(value: unknown): readonly TableRow[] {
  if (!Array.isArray(value)) return [];
  const out: TableRow[] = [];
  for (const row of value) {
    if (isPlainRecord(row) || isPairList(row)) out.push(row);
  }
  return out;
}

function readFormatter(value: unknown): CellFormatter | undefined {
  if (typeof value !== "function") return undefined;
  return (cell: unknown) => String(value(cell));
}

function readStyle(attrs: unknown, ctx: BuildContext): Style | undefined {
  const ref = readAttr(attrs, "style");
  const check = validateStyleRef(ctx.styles, ref);
  if (!check.ok) {
    ctx.warn(`${warnPrefix("builder")} style reference names an unregistered style`);
  }
  return resolveStyleRef(ctx.styles, ref);
}

type CommonProps = {
  id: string | undefined;
  style: Style | undefined;
  visible: boolean;
};

function readCommon(attrs: unknown, ctx: BuildContext): CommonProps {
  return {
    id: readString(readAttr(attrs, "id")),
    style: readStyle(attrs, ctx),
    visible: readBoolean(readAttr(attrs, "visible"), true),
  };
}

function buildChildren(entities: readonly SourceEntity[], ctx: BuildContext): IurElement[] {
  const out: IurElement[] = [];
  for (const entity of entities) {
    const element = buildWith(entity, ctx);
    if (element !== null) out.push(element);
  }
  return out;
}

function isMenuItem(element: IurElement): element is MenuItemElement {
  return element.type === "menuItem";
}

function isTab(element: IurElement): element is TabElement {
  return element.type === "tab";
}

function isTreeNode(element: IurElement): element is TreeNodeElement {
  return element.type === "treeNode";
}

function isColumn(element: IurElement): element is ColumnElement {
  return element.type === "column";
}

function nonEmpty<T>(list: readonly T[]): readonly T[] | undefined {
  return list.length === 0 ? undefined : list;
}

// ---------------------------------------------------------------------------
// Per-kind builders
// ---------------------------------------------------------------------------

function buildColumn(attrs: unknown, ctx: BuildContext): ColumnElement | null {
  const key = readString(readAttr(attrs, "key"));
  if (key === undefined) return null;
  return iur.column(key, {
    ...readCommon(attrs, ctx),
    header: readString(readAttr(attrs, "header")) ?? key,
    sortable: readBoolean(readAttr(attrs, "sortable"), true),
    formatter: readFormatter(readAttr(attrs, "formatter")),
    width: readFinite(readAttr(attrs, "width")),
    align: readOneOf(readAttr(attrs, "align"), CELL_ALIGNS) ?? "left",
  });
}

/** Columns declared as an attribute: keys, or records carrying a `key`. */
function columnsFromAttr(value: unknown, ctx: BuildContext): readonly ColumnElement[] {
  if (!Array.isArray(value)) return [];
  const out: ColumnElement[] = [];
  for (const item of value) {
    if (typeof item === "string") {
      out.push(iur.column(item));
      continue;
    }
    const column = buildColumn(normalizeAttrs(item), ctx);
    if (column !== null) out.push(column);
  }
  return out;
}

function buildTable(entity: SourceEntity, ctx: BuildContext): IurElement {
  const attrs = entity.attrs;
  const nested = buildChildren(extractNestedEntities(entity, "columns", "column"), ctx).filter(
    isColumn,
  );
  const columns = nested.length > 0 ? nested : columnsFromAttr(readAttr(attrs, "columns"), ctx);
  return iur.table(readRows(readAttr(attrs, "data")), {
    ...readCommon(attrs, ctx),
    columns,
    selectedRow: readFinite(readAttr(attrs, "selectedRow")),
    height: readFinite(readAttr(attrs, "height")),
    onRowSelect: readHandler(readAttr(attrs, "onRowSelect")),
    onSort: readHandler(readAttr(attrs, "onSort")),
    sortColumn: readString(readAttr(attrs, "sortColumn")),
    sortDirection: readOneOf(readAttr(attrs, "sortDirection"), ["asc", "desc"]) ?? "asc",
  });
}

function buildMenuItem(entity: SourceEntity, ctx: BuildContext): MenuItemElement {
  const attrs = entity.attrs;
  const submenu = buildChildren(extractNestedEntities(entity, "submenu", "menuItem"), ctx).filter(
    isMenuItem,
  );
  return iur.menuItem(readString(readAttr(attrs, "label")) ?? "", {
    ...readCommon(attrs, ctx),
    action: readHandler(readAttr(attrs, "action")),
    disabled: readBoolean(readAttr(attrs, "disabled"), false),
    icon: readString(readAttr(attrs, "icon")),
    shortcut: readString(readAttr(attrs, "shortcut")),
    submenu: nonEmpty(submenu),
  });
}

function buildTab(entity: SourceEntity, ctx: BuildContext): TabElement {
  const attrs = entity.attrs;
  const content = buildChildren(entity.entities, ctx);
  return iur.tab(readString(readAttr(attrs, "label")) ?? "", {
    ...readCommon(attrs, ctx),
    icon: readString(readAttr(attrs, "icon")),
    disabled: readBoolean(readAttr(attrs, "disabled"), false),
    closable: readBoolean(readAttr(attrs, "closable"), false),
    content: content.length === 0 ? undefined : content.length === 1 ? content[0] : content,
  });
}

function buildTreeNode(entity: SourceEntity, ctx: BuildContext): TreeNodeElement {
  const attrs = entity.attrs;
  const children = buildChildren(
    extractNestedEntities(entity, "children", "treeNode"),
    ctx,
  ).filter(isTreeNode);
  return iur.treeNode(readString(readAttr(attrs, "label")) ?? "", {
    ...readCommon(attrs, ctx),
    value: readAttr(attrs, "value"),
    expanded: readBoolean(readAttr(attrs, "expanded"), false),
    icon: readString(readAttr(attrs, "icon")),
    iconExpanded: readString(readAttr(attrs, "iconExpanded")),
    selectable: readBoolean(readAttr(attrs, "selectable"), true),
    children: nonEmpty(children),
  });
}

function buildBox(entity: SourceEntity, ctx: BuildContext, kind: "vbox" | "hbox"): IurElement {
  const attrs = entity.attrs;
  const props = {
    ...readCommon(attrs, ctx),
    spacing: readFinite(readAttr(attrs, "spacing")) ?? 0,
    alignItems: readOneOf(readAttr(attrs, "alignItems"), BOX_ALIGNS),
    justifyContent: readOneOf(readAttr(attrs, "justifyContent"), BOX_JUSTIFIES),
    padding: readFinite(readAttr(attrs, "padding")),
  };
  const children = buildChildren(entity.entities, ctx);
  return kind === "vbox" ? iur.vbox(children, props) : iur.hbox(children, props);
}

function buildWith(entity: SourceEntity, ctx: BuildContext): IurElement | null {
  const attrs = entity.attrs;
  const kind = normalizeKind(entity.name);
  switch (kind) {
    case "text":
      return iur.text(readString(readAttr(attrs, "content")), readCommon(attrs, ctx));
    case "button":
      return iur.button(readString(readAttr(attrs, "label")), {
        ...readCommon(attrs, ctx),
        onClick: readHandler(readAttr(attrs, "onClick")),
        disabled: readBoolean(readAttr(attrs, "disabled"), false),
      });
    case "label":
      return iur.label(readString(readAttr(attrs, "text")), {
        ...readCommon(attrs, ctx),
        for: readString(readAttr(attrs, "for")),
      });
    case "textInput":
      return iur.textInput({
        ...readCommon(attrs, ctx),
        value: readString(readAttr(attrs, "value")),
        placeholder: readString(readAttr(attrs, "placeholder")),
        inputType: readOneOf(readAttr(attrs, "type"), INPUT_TYPES) ?? "text",
        onChange: readHandler(readAttr(attrs, "onChange")),
        onSubmit: readHandler(readAttr(attrs, "onSubmit")),
        disabled: readBoolean(readAttr(attrs, "disabled"), false),
        formId: readString(readAttr(attrs, "formId")),
      });
    case "gauge":
      return iur.gauge(readFinite(readAttr(attrs, "value")) ?? 0, {
        ...readCommon(attrs, ctx),
        min: readFinite(readAttr(attrs, "min")) ?? 0,
        max: readFinite(readAttr(attrs, "max")) ?? 100,
        label: readString(readAttr(attrs, "label")),
      });
    case "sparkline":
      return iur.sparkline(readFiniteList(readAttr(attrs, "data")), {
        ...readCommon(attrs, ctx),
        showDots: readBoolean(readAttr(attrs, "showDots"), false),
        showArea: readBoolean(readAttr(attrs, "showArea"), false),
      });
    case "barChart":
      return iur.barChart(readChartData(readAttr(attrs, "data")), {
        ...readCommon(attrs, ctx),
        orientation: readOneOf(readAttr(attrs, "orientation"), ["horizontal", "vertical"]) ?? "horizontal",
        showLabels: readBoolean(readAttr(attrs, "showLabels"), true),
      });
    case "lineChart":
      return iur.lineChart(readChartData(readAttr(attrs, "data")), {
        ...readCommon(attrs, ctx),
        showDots: readBoolean(readAttr(attrs, "showDots"), true),
        showArea: readBoolean(readAttr(attrs, "showArea"), false),
      });
    case "table":
      return buildTable(entity, ctx);
    case "column":
      return buildColumn(attrs, ctx);
    case "menu":
      return iur.menu(
        buildChildren(extractNestedEntities(entity, "menuItems", "menuItem"), ctx).filter(isMenuItem),
        {
          ...readCommon(attrs, ctx),
          title: readString(readAttr(attrs, "title")),
          position: readOneOf(readAttr(attrs, "position"), EDGES),
        },
      );
    case "menuItem":
      return buildMenuItem(entity, ctx);
    case "contextMenu":
      return iur.contextMenu(
        buildChildren(extractNestedEntities(entity, "items", "menuItem"), ctx).filter(isMenuItem),
        {
          ...readCommon(attrs, ctx),
          triggerOn: readOneOf(readAttr(attrs, "triggerOn"), TRIGGERS) ?? "right_click",
        },
      );
    case "tabs":
      return iur.tabs(buildChildren(extractNestedEntities(entity, "tabs", "tab"), ctx).filter(isTab), {
        ...readCommon(attrs, ctx),
        activeTab: readString(readAttr(attrs, "activeTab")),
        position: readOneOf(readAttr(attrs, "position"), EDGES),
        onChange: readHandler(readAttr(attrs, "onChange")),
      });
    case "tab":
      return buildTab(entity, ctx);
    case "treeView":
      return iur.treeView(
        buildChildren(extractNestedEntities(entity, "rootNodes", "treeNode"), ctx).filter(isTreeNode),
        {
          ...readCommon(attrs, ctx),
          selectedNode: readString(readAttr(attrs, "selectedNode")),
          expandedNodes: readStringList(readAttr(attrs, "expandedNodes")),
          onSelect: readHandler(readAttr(attrs, "onSelect")),
          onToggle: readHandler(readAttr(attrs, "onToggle")),
          showRoot: readBoolean(readAttr(attrs, "showRoot"), true),
        },
      );
    case "treeNode":
      return buildTreeNode(entity, ctx);
    case "vbox":
    case "hbox":
      return buildBox(entity, ctx, kind);
    default:
      ctx.warn(`${warnPrefix("builder")} unknown entity kind "${entity.name}" skipped`);
      return null;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Check required fields: buttons need a label, text needs content. Layouts
 * validate their children and stop at the first failure.
 */
export function validate(value: unknown): Check<ValidationError> {
  if (Array.isArray(value)) {
    for (const item of value) {
      const result = validate(item);
      if (!result.ok) return result;
    }
    return OK_CHECK;
  }
  if (!isIurElement(value)) return err("unknown_type");
  switch (value.type) {
    case "button":
      return value.label !== undefined && value.label.length > 0 ? OK_CHECK : err("missing_label");
    case "text":
      return value.content !== undefined && value.content.length > 0
        ? OK_CHECK
        : err("missing_content");
    case "vbox":
    case "hbox":
      return validate(value.children);
    default:
      return OK_CHECK;
  }
}

