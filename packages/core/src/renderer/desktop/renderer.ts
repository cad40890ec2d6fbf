/**
 * packages/core/src/renderer/desktop/renderer.ts — IUR to desktop widget descriptions.
 */

import { type WarnFn, warnDev, warnPrefix } from "../../devWarn.js";
import { describeKind, isIurElement } from "../../iur/element.js";
import type { IurElement } from "../../iur/types.js";
import { barChartText, gaugeText, lineChartText, sparklineText, tableColumns, tableText } from "../charts.js";
import {
  activeTabContent,
  inputDisplayValue,
  menuItemText,
  menuTitleText,
  tabText,
  treeNodeText,
  visibleTreeChildren,
} from "../labels.js";
import { type ConvertFn, type Renderer, createRenderer } from "../lifecycle.js";
import { putRoot } from "../state.js";
import { desktopAlign, desktopJustify, toDesktopProps } from "./style.js";
import {
  type DesktopWidget,
  buttonWidget,
  containerWidget,
  labelWidget,
  withLabelFor,
  withTag,
} from "./widgets.js";

export type DesktopRendererOptions = Readonly<{ warn?: WarnFn }>;

function disabledProp(disabled: boolean): Readonly<{ disabled?: true }> {
  return disabled ? { disabled: true } : {};
}

function convertElement(
  el: IurElement,
  convertAll: (nodes: readonly unknown[]) => DesktopWidget[],
): DesktopWidget {
  const style = toDesktopProps(el.style);

  switch (el.type) {
    case "text":
      return labelWidget(el.content ?? "", style, el.id);

    case "button":
      return buttonWidget(el.label ?? "", el.onClick, { ...style, ...disabledProp(el.disabled) }, el.id);

    case "label": {
      const label = labelWidget(el.text ?? "", style, el.id);
      return el.for === undefined ? label : withLabelFor(label, el.for);
    }

    case "textInput":
      return withTag(
        labelWidget(inputDisplayValue(el), { ...style, ...disabledProp(el.disabled) }, el.id),
        "textInput",
        {
          id: el.id,
          value: el.value,
          placeholder: el.placeholder,
          inputType: el.inputType,
          onChange: el.onChange,
          onSubmit: el.onSubmit,
          disabled: el.disabled,
          formId: el.formId,
        },
      );

    case "gauge":
      return withTag(labelWidget(gaugeText(el), style, el.id), "gauge", {
        value: el.value,
        min: el.min,
        max: el.max,
        label: el.label,
      });

    case "sparkline":
      return withTag(labelWidget(sparklineText(el.data), style, el.id), "sparkline", {
        data: el.data,
        showDots: el.showDots,
        showArea: el.showArea,
      });

    case "barChart":
      return withTag(labelWidget(barChartText(el), style, el.id), "barChart", {
        data: el.data,
        orientation: el.orientation,
        showLabels: el.showLabels,
      });

    case "lineChart":
      return withTag(labelWidget(lineChartText(el), style, el.id), "lineChart", {
        data: el.data,
        showDots: el.showDots,
        showArea: el.showArea,
      });

    case "table":
      return withTag(labelWidget(tableText(el), style, el.id), "table", {
        columns: tableColumns(el).map((column) => column.key),
        rowCount: el.data.length,
        selectedRow: el.selectedRow,
        sortColumn: el.sortColumn,
        sortDirection: el.sortDirection,
        onRowSelect: el.onRowSelect,
        onSort: el.onSort,
      });

    case "column":
      return labelWidget(el.header, style, el.id);

    case "menuItem":
      return withTag(
        buttonWidget(menuItemText(el), el.action, { ...style, ...disabledProp(el.disabled) }, el.id),
        "menuItem",
        { label: el.label, icon: el.icon, shortcut: el.shortcut, hasSubmenu: el.submenu !== undefined },
      );

    case "menu": {
      const title = menuTitleText(el);
      const children = [...(title !== undefined ? [labelWidget(title)] : []), ...convertAll(el.items)];
      return withTag(containerWidget("vbox", children, style, el.id), "menu", {
        title: el.title,
        position: el.position,
      });
    }

    case "contextMenu":
      return withTag(containerWidget("vbox", convertAll(el.items), style, el.id), "contextMenu", {
        triggerOn: el.triggerOn,
      });

    case "tab":
      return withTag(
        buttonWidget(tabText(el), undefined, { ...style, ...disabledProp(el.disabled) }, el.id),
        "tab",
        { label: el.label, icon: el.icon, closable: el.closable },
      );

    case "tabs": {
      const bar = containerWidget("hbox", convertAll(el.tabs), { spacing: 2 });
      const content = convertAll(activeTabContent(el.tabs, el.activeTab));
      return withTag(containerWidget("vbox", [bar, ...content], { spacing: 1, ...style }, el.id), "tabs", {
        activeTab: el.activeTab,
        position: el.position,
        onChange: el.onChange,
      });
    }

    case "treeNode": {
      const children = convertAll(visibleTreeChildren(el));
      const meta = {
        label: el.label,
        value: el.value,
        expanded: el.expanded,
        selectable: el.selectable,
        hasChildren: el.children !== undefined,
      };
      if (children.length === 0) {
        return withTag(labelWidget(treeNodeText(el), style, el.id), "treeNode", meta);
      }
      const label = labelWidget(treeNodeText(el), style);
      return withTag(containerWidget("vbox", [label, ...children], {}, el.id), "treeNode", meta);
    }

    case "treeView":
      return withTag(containerWidget("vbox", convertAll(el.rootNodes), style, el.id), "treeView", {
        selectedNode: el.selectedNode,
        expandedNodes: el.expandedNodes,
        onSelect: el.onSelect,
        onToggle: el.onToggle,
        showRoot: el.showRoot,
      });

    case "vbox":
    case "hbox":
      return containerWidget(
        el.type,
        convertAll(el.children),
        {
          spacing: el.spacing,
          padding: el.padding,
          align: desktopAlign(el.alignItems),
          justify: desktopJustify(el.justifyContent),
          ...style,
        },
        el.id,
      );
  }
}

export function createDesktopRenderer(opts: DesktopRendererOptions = {}): Renderer<DesktopWidget> {
  const warn = opts.warn ?? warnDev;

  const convert: ConvertFn<DesktopWidget> = (node) => {
    if (!isIurElement(node)) {
      warn(`${warnPrefix("desktop")} unknown node kind "${describeKind(node)}" rendered as an empty label`);
      return labelWidget("");
    }
    if (node.visible === false) return null;
    return convertElement(node, convertAll);
  };

  const convertAll = (nodes: readonly unknown[]): DesktopWidget[] => {
    const out: DesktopWidget[] = [];
    for (const node of nodes) {
      const converted = convert(node);
      if (converted !== null) out.push(converted);
    }
    return out;
  };

  return createRenderer("desktop", convert, {
    warn,
    release: (state) => putRoot(state, null),
  });
}

export const desktopRenderer: Renderer<DesktopWidget> = createDesktopRenderer();
