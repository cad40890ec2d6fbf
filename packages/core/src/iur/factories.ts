/**
 * packages/core/src/iur/factories.ts — Element factory functions.
 *
 * Why: The builder and hand-written trees share one place that applies
 * per-kind defaults, so both produce identical elements for identical input.
 */

import type {
  BarChartElement,
  ButtonElement,
  ChartDatum,
  ColumnElement,
  ContextMenuElement,
  GaugeElement,
  HBoxElement,
  IurElement,
  LabelElement,
  LineChartElement,
  MenuElement,
  MenuItemElement,
  SparklineElement,
  TabElement,
  TableElement,
  TableRow,
  TabsElement,
  TextElement,
  TextInputElement,
  TreeNodeElement,
  TreeViewElement,
  VBoxElement,
} from "./types.js";

/** Props for element `E`: everything but `type`, with defaulted keys `D` optional. */
export type ElementProps<E extends IurElement, D extends keyof E> = Omit<E, "type" | D> &
  Partial<Pick<E, D>>;

function text(content?: string, props: ElementProps<TextElement, "visible"> = {}): TextElement {
  return { visible: true, ...props, type: "text", content };
}

function button(
  label?: string,
  props: ElementProps<ButtonElement, "visible" | "disabled"> = {},
): ButtonElement {
  return { visible: true, disabled: false, ...props, type: "button", label };
}

function label(
  textValue?: string,
  props: ElementProps<LabelElement, "visible"> = {},
): LabelElement {
  return { visible: true, ...props, type: "label", text: textValue };
}

function textInput(
  props: ElementProps<TextInputElement, "visible" | "disabled" | "inputType"> = {},
): TextInputElement {
  return { visible: true, disabled: false, inputType: "text", ...props, type: "textInput" };
}

function gauge(
  value: number,
  props: ElementProps<GaugeElement, "visible" | "min" | "max" | "value"> = {},
): GaugeElement {
  return { visible: true, min: 0, max: 100, ...props, type: "gauge", value };
}

function sparkline(
  data: readonly number[],
  props: ElementProps<SparklineElement, "visible" | "showDots" | "showArea" | "data"> = {},
): SparklineElement {
  return { visible: true, showDots: false, showArea: false, ...props, type: "sparkline", data };
}

function barChart(
  data: readonly ChartDatum[],
  props: ElementProps<BarChartElement, "visible" | "orientation" | "showLabels" | "data"> = {},
): BarChartElement {
  return {
    visible: true,
    orientation: "horizontal",
    showLabels: true,
    ...props,
    type: "barChart",
    data,
  };
}

function lineChart(
  data: readonly ChartDatum[],
  props: ElementProps<LineChartElement, "visible" | "showDots" | "showArea" | "data"> = {},
): LineChartElement {
  return { visible: true, showDots: true, showArea: false, ...props, type: "lineChart", data };
}

function column(
  key: string,
  props: ElementProps<ColumnElement, "visible" | "sortable" | "align" | "header" | "key"> = {},
): ColumnElement {
  return {
    visible: true,
    sortable: true,
    align: "left",
    header: key,
    ...props,
    type: "column",
    key,
  };
}

function table(
  data: readonly TableRow[],
  props: ElementProps<TableElement, "visible" | "columns" | "sortDirection" | "data"> = {},
): TableElement {
  return { visible: true, columns: [], sortDirection: "asc", ...props, type: "table", data };
}

function menuItem(
  labelValue: string,
  props: ElementProps<MenuItemElement, "visible" | "disabled" | "label"> = {},
): MenuItemElement {
  return { visible: true, disabled: false, ...props, type: "menuItem", label: labelValue };
}

function menu(
  items: readonly MenuItemElement[],
  props: ElementProps<MenuElement, "visible" | "items"> = {},
): MenuElement {
  return { visible: true, ...props, type: "menu", items };
}

function contextMenu(
  items: readonly MenuItemElement[],
  props: ElementProps<ContextMenuElement, "visible" | "triggerOn" | "items"> = {},
): ContextMenuElement {
  return { visible: true, triggerOn: "right_click", ...props, type: "contextMenu", items };
}

function tab(
  labelValue: string,
  props: ElementProps<TabElement, "visible" | "disabled" | "closable" | "label"> = {},
): TabElement {
  return {
    visible: true,
    disabled: false,
    closable: false,
    ...props,
    type: "tab",
    label: labelValue,
  };
}

function tabs(
  tabList: readonly TabElement[],
  props: ElementProps<TabsElement, "visible" | "tabs"> = {},
): TabsElement {
  return { visible: true, ...props, type: "tabs", tabs: tabList };
}

function treeNode(
  labelValue: string,
  props: ElementProps<TreeNodeElement, "visible" | "expanded" | "selectable" | "label"> = {},
): TreeNodeElement {
  return {
    visible: true,
    expanded: false,
    selectable: true,
    ...props,
    type: "treeNode",
    label: labelValue,
  };
}

function treeView(
  rootNodes: readonly TreeNodeElement[],
  props: ElementProps<TreeViewElement, "visible" | "showRoot" | "rootNodes"> = {},
): TreeViewElement {
  return { visible: true, showRoot: true, ...props, type: "treeView", rootNodes };
}

function vbox(
  children: readonly IurElement[],
  props: ElementProps<VBoxElement, "visible" | "spacing" | "children"> = {},
): VBoxElement {
  return { visible: true, spacing: 0, ...props, type: "vbox", children };
}

function hbox(
  children: readonly IurElement[],
  props: ElementProps<HBoxElement, "visible" | "spacing" | "children"> = {},
): HBoxElement {
  return { visible: true, spacing: 0, ...props, type: "hbox", children };
}

export const iur = Object.freeze({
  text,
  button,
  label,
  textInput,
  gauge,
  sparkline,
  barChart,
  lineChart,
  column,
  table,
  menuItem,
  menu,
  contextMenu,
  tab,
  tabs,
  treeNode,
  treeView,
  vbox,
  hbox,
});
