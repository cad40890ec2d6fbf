/**
 * packages/core/src/iur/types.ts — Intermediate UI Representation element types.
 *
 * Why: A closed discriminated union lets every renderer switch exhaustively on
 * `type` while unrecognized values are still handled by a single default arm.
 */

import type { Style } from "../style/style.js";

/** Handler reference: a signal name, or a name with an extra payload merged on emit. */
export type SignalHandler =
  | string
  | Readonly<{ signal: string; payload?: Readonly<Record<string, unknown>> | undefined }>;

type Common = Readonly<{
  id?: string | undefined;
  style?: Style | undefined;
  visible: boolean;
}>;

export type InputType = "text" | "password" | "email" | "number" | "tel";
export type CellAlign = "left" | "center" | "right";
export type SortDirection = "asc" | "desc";
export type BoxAlign = "start" | "center" | "end" | "stretch";
export type BoxJustify = "start" | "center" | "end" | "space_between" | "space_around";
export type ChartOrientation = "horizontal" | "vertical";

/** Labeled datum for bar and line charts. */
export type ChartDatum = Readonly<{ label: string; value: number }>;

/** Table row: a keyed record, or an ordered `[key, value]` list. */
export type TableRow = Readonly<Record<string, unknown>> | readonly (readonly [string, unknown])[];

export type CellFormatter = (value: unknown) => string;

// ---------------------------------------------------------------------------
// Widgets
// ---------------------------------------------------------------------------

export type TextElement = Common & Readonly<{ type: "text"; content?: string | undefined }>;

export type ButtonElement = Common &
  Readonly<{
    type: "button";
    label?: string | undefined;
    onClick?: SignalHandler | undefined;
    disabled: boolean;
  }>;

export type LabelElement = Common &
  Readonly<{ type: "label"; for?: string | undefined; text?: string | undefined }>;

export type TextInputElement = Common &
  Readonly<{
    type: "textInput";
    value?: string | undefined;
    placeholder?: string | undefined;
    inputType: InputType;
    onChange?: SignalHandler | undefined;
    onSubmit?: SignalHandler | undefined;
    disabled: boolean;
    formId?: string | undefined;
  }>;

export type GaugeElement = Common &
  Readonly<{
    type: "gauge";
    value: number;
    min: number;
    max: number;
    label?: string | undefined;
  }>;

export type SparklineElement = Common &
  Readonly<{
    type: "sparkline";
    data: readonly number[];
    showDots: boolean;
    showArea: boolean;
  }>;

export type BarChartElement = Common &
  Readonly<{
    type: "barChart";
    data: readonly ChartDatum[];
    orientation: ChartOrientation;
    showLabels: boolean;
  }>;

export type LineChartElement = Common &
  Readonly<{
    type: "lineChart";
    data: readonly ChartDatum[];
    showDots: boolean;
    showArea: boolean;
  }>;

export type ColumnElement = Common &
  Readonly<{
    type: "column";
    key: string;
    header: string;
    sortable: boolean;
    formatter?: CellFormatter | undefined;
    width?: number | undefined;
    align: CellAlign;
  }>;

export type TableElement = Common &
  Readonly<{
    type: "table";
    data: readonly TableRow[];
    columns: readonly ColumnElement[];
    selectedRow?: number | undefined;
    height?: number | undefined;
    onRowSelect?: SignalHandler | undefined;
    onSort?: SignalHandler | undefined;
    sortColumn?: string | undefined;
    sortDirection: SortDirection;
  }>;

export type MenuItemElement = Common &
  Readonly<{
    type: "menuItem";
    label: string;
    action?: SignalHandler | undefined;
    disabled: boolean;
    icon?: string | undefined;
    shortcut?: string | undefined;
    submenu?: readonly MenuItemElement[] | undefined;
  }>;

export type MenuElement = Common &
  Readonly<{
    type: "menu";
    title?: string | undefined;
    position?: "top" | "bottom" | "left" | "right" | undefined;
    items: readonly MenuItemElement[];
  }>;

export type ContextMenuElement = Common &
  Readonly<{
    type: "contextMenu";
    triggerOn: "right_click" | "left_click" | "long_press";
    items: readonly MenuItemElement[];
  }>;

export type TabElement = Common &
  Readonly<{
    type: "tab";
    label: string;
    icon?: string | undefined;
    disabled: boolean;
    closable: boolean;
    content?: IurElement | readonly IurElement[] | undefined;
  }>;

export type TabsElement = Common &
  Readonly<{
    type: "tabs";
    activeTab?: string | undefined;
    position?: "top" | "bottom" | "left" | "right" | undefined;
    onChange?: SignalHandler | undefined;
    tabs: readonly TabElement[];
  }>;

export type TreeNodeElement = Common &
  Readonly<{
    type: "treeNode";
    label: string;
    value?: unknown;
    expanded: boolean;
    icon?: string | undefined;
    iconExpanded?: string | undefined;
    selectable: boolean;
    children?: readonly TreeNodeElement[] | undefined;
  }>;

export type TreeViewElement = Common &
  Readonly<{
    type: "treeView";
    rootNodes: readonly TreeNodeElement[];
    selectedNode?: string | undefined;
    expandedNodes?: readonly string[] | undefined;
    onSelect?: SignalHandler | undefined;
    onToggle?: SignalHandler | undefined;
    showRoot: boolean;
  }>;

// ---------------------------------------------------------------------------
// Layouts
// ---------------------------------------------------------------------------

type BoxFields = Readonly<{
  children: readonly IurElement[];
  spacing: number;
  alignItems?: BoxAlign | undefined;
  justifyContent?: BoxJustify | undefined;
  padding?: number | undefined;
}>;

export type VBoxElement = Common & BoxFields & Readonly<{ type: "vbox" }>;
export type HBoxElement = Common & BoxFields & Readonly<{ type: "hbox" }>;

export type IurElement =
  | TextElement
  | ButtonElement
  | LabelElement
  | TextInputElement
  | GaugeElement
  | SparklineElement
  | BarChartElement
  | LineChartElement
  | TableElement
  | ColumnElement
  | MenuElement
  | MenuItemElement
  | ContextMenuElement
  | TabsElement
  | TabElement
  | TreeViewElement
  | TreeNodeElement
  | VBoxElement
  | HBoxElement;

export type ElementKind = IurElement["type"];

export type ElementOfKind<K extends ElementKind> = Extract<IurElement, { type: K }>;

export const ELEMENT_KINDS: readonly ElementKind[] = Object.freeze([
  "text",
  "button",
  "label",
  "textInput",
  "gauge",
  "sparkline",
  "barChart",
  "lineChart",
  "table",
  "column",
  "menu",
  "menuItem",
  "contextMenu",
  "tabs",
  "tab",
  "treeView",
  "treeNode",
  "vbox",
  "hbox",
]);

/**
 * Flattened element properties. Always carries `type`; `id` and `style` only
 * when set. Unrecognized values report `{ type: "unknown" }`.
 */
export type ElementMetadata = Readonly<{
  type: ElementKind | "unknown";
  id?: string;
  style?: Style;
  visible?: boolean;
}> &
  Readonly<Record<string, unknown>>;
