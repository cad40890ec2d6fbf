/**
 * packages/core/src/renderer/terminal/renderer.ts — IUR to terminal node tree.
 */

import { type WarnFn, warnDev, warnPrefix } from "../../devWarn.js";
import { describeKind, isIurElement } from "../../iur/element.js";
import type { IurElement } from "../../iur/types.js";
import { barChartText, gaugeText, lineChartText, sparklineText, tableColumns, tableText } from "../charts.js";
import {
  activeTabContent,
  buttonText,
  inputText,
  menuItemText,
  menuTitleText,
  tabText,
  treeNodeText,
  visibleTreeChildren,
} from "../labels.js";
import { type ConvertFn, type Renderer, createRenderer } from "../lifecycle.js";
import {
  EMPTY_NODE,
  type TerminalNode,
  stackNode,
  styledNode,
  taggedNode,
  textNode,
} from "./nodes.js";
import { toTerminalStyle } from "./style.js";

export type TerminalRendererOptions = Readonly<{ warn?: WarnFn }>;

function convertElement(el: IurElement, convertAll: (nodes: readonly unknown[]) => TerminalNode[]): TerminalNode {
  const style = toTerminalStyle(el.style);
  const leaf = (content: string): TerminalNode => styledNode(textNode(content), style);

  switch (el.type) {
    case "text":
      return leaf(el.content ?? "");

    case "button": {
      const node = leaf(buttonText(el.label));
      if (el.onClick === undefined) return node;
      return taggedNode("button", node, { id: el.id, onClick: el.onClick, disabled: el.disabled });
    }

    case "label": {
      const node = leaf(el.text ?? "");
      if (el.for === undefined) return node;
      return taggedNode("label", node, { id: el.id, for: el.for });
    }

    case "textInput":
      return taggedNode("textInput", leaf(inputText(el)), {
        id: el.id,
        value: el.value,
        placeholder: el.placeholder,
        inputType: el.inputType,
        onChange: el.onChange,
        onSubmit: el.onSubmit,
        disabled: el.disabled,
        formId: el.formId,
      });

    case "gauge":
      return taggedNode("gauge", leaf(gaugeText(el)), {
        id: el.id,
        value: el.value,
        min: el.min,
        max: el.max,
        label: el.label,
      });

    case "sparkline":
      return taggedNode("sparkline", leaf(sparklineText(el.data)), {
        id: el.id,
        data: el.data,
        showDots: el.showDots,
        showArea: el.showArea,
      });

    case "barChart":
      return taggedNode("barChart", leaf(barChartText(el)), {
        id: el.id,
        data: el.data,
        orientation: el.orientation,
        showLabels: el.showLabels,
      });

    case "lineChart":
      return taggedNode("lineChart", leaf(lineChartText(el)), {
        id: el.id,
        data: el.data,
        showDots: el.showDots,
        showArea: el.showArea,
      });

    case "table":
      return taggedNode("table", leaf(tableText(el)), {
        id: el.id,
        columns: tableColumns(el).map((column) => column.key),
        rowCount: el.data.length,
        selectedRow: el.selectedRow,
        sortColumn: el.sortColumn,
        sortDirection: el.sortDirection,
        onRowSelect: el.onRowSelect,
        onSort: el.onSort,
      });

    case "column":
      return leaf(el.header);

    case "menuItem":
      return taggedNode("menuItem", leaf(menuItemText(el)), {
        id: el.id,
        label: el.label,
        action: el.action,
        disabled: el.disabled,
        icon: el.icon,
        shortcut: el.shortcut,
        hasSubmenu: el.submenu !== undefined,
      });

    case "menu": {
      const title = menuTitleText(el);
      const children = [...(title !== undefined ? [textNode(title)] : []), ...convertAll(el.items)];
      return taggedNode("menu", styledNode(stackNode("vertical", children), style), {
        id: el.id,
        title: el.title,
        position: el.position,
      });
    }

    case "contextMenu":
      return taggedNode("contextMenu", styledNode(stackNode("vertical", convertAll(el.items)), style), {
        id: el.id,
        triggerOn: el.triggerOn,
      });

    case "tab":
      return taggedNode("tab", leaf(tabText(el)), {
        id: el.id,
        label: el.label,
        icon: el.icon,
        disabled: el.disabled,
        closable: el.closable,
      });

    case "tabs": {
      const bar = styledNode(stackNode("horizontal", convertAll(el.tabs), { spacing: 2 }), style);
      const content = convertAll(activeTabContent(el.tabs, el.activeTab));
      return taggedNode("tabs", stackNode("vertical", [bar, ...content], { spacing: 1 }), {
        id: el.id,
        activeTab: el.activeTab,
        position: el.position,
        onChange: el.onChange,
      });
    }

    case "treeNode": {
      const label = leaf(treeNodeText(el));
      const children = convertAll(visibleTreeChildren(el));
      const node = children.length === 0 ? label : stackNode("vertical", [label, ...children]);
      return taggedNode("treeNode", node, {
        id: el.id,
        label: el.label,
        value: el.value,
        expanded: el.expanded,
        selectable: el.selectable,
        hasChildren: el.children !== undefined,
      });
    }

    case "treeView":
      return taggedNode("treeView", styledNode(stackNode("vertical", convertAll(el.rootNodes)), style), {
        id: el.id,
        selectedNode: el.selectedNode,
        expandedNodes: el.expandedNodes,
        onSelect: el.onSelect,
        onToggle: el.onToggle,
        showRoot: el.showRoot,
      });

    case "vbox":
    case "hbox": {
      const stack = stackNode(el.type === "vbox" ? "vertical" : "horizontal", convertAll(el.children), {
        spacing: el.spacing,
        padding: el.padding,
        align: el.alignItems,
        justify: el.justifyContent,
      });
      return styledNode(stack, style);
    }
  }
}

export function createTerminalRenderer(opts: TerminalRendererOptions = {}): Renderer<TerminalNode> {
  const warn = opts.warn ?? warnDev;

  const convert: ConvertFn<TerminalNode> = (node) => {
    if (!isIurElement(node)) {
      warn(`${warnPrefix("terminal")} unknown node kind "${describeKind(node)}" rendered empty`);
      return EMPTY_NODE;
    }
    if (node.visible === false) return null;
    return convertElement(node, convertAll);
  };

  const convertAll = (nodes: readonly unknown[]): TerminalNode[] => {
    const out: TerminalNode[] = [];
    for (const node of nodes) {
      const converted = convert(node);
      if (converted !== null) out.push(converted);
    }
    return out;
  };

  return createRenderer("terminal", convert, { warn });
}

export const terminalRenderer: Renderer<TerminalNode> = createTerminalRenderer();
