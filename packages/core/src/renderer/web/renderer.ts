/**
 * packages/core/src/renderer/web/renderer.ts — IUR to an HTML string.
 *
 * Handlers surface as `data-on-*` attributes that a client script binds;
 * the renderer itself never emits inline script.
 */

import { type WarnFn, warnDev, warnPrefix } from "../../devWarn.js";
import { describeKind, isIurElement } from "../../iur/element.js";
import type { IurElement, TableElement } from "../../iur/types.js";
import {
  NO_COLUMNS,
  barChartText,
  formatCell,
  gaugeText,
  lineChartText,
  sortGlyph,
  sparklineText,
  tableColumns,
  tableRows,
} from "../charts.js";
import {
  activeTabContent,
  menuItemText,
  menuTitleText,
  tabText,
  treeNodeText,
  visibleTreeChildren,
} from "../labels.js";
import { type ConvertFn, type Renderer, createRenderer } from "../lifecycle.js";
import { escapeHtml, eventAttrValue, htmlInputType, tag, voidTag } from "./html.js";
import { flexCss, toCss } from "./style.js";

export type WebRendererOptions = Readonly<{ warn?: WarnFn }>;

export const EMPTY_HTML = "<span></span>";

function tableHtml(el: TableElement): string {
  const columns = tableColumns(el);
  if (columns.length === 0) return tag("pre", [["id", el.id]], escapeHtml(NO_COLUMNS));

  const head = columns
    .map((column) => {
      const glyph = el.sortColumn === column.key ? ` ${sortGlyph(el.sortDirection)}` : "";
      return tag(
        "th",
        [
          ["style", `text-align: ${column.align}`],
          ["data-sort-key", column.sortable ? column.key : undefined],
        ],
        escapeHtml(column.header + glyph),
      );
    })
    .join("");

  const body = tableRows(el)
    .map((row, index) => {
      const cells = columns
        .map((column) =>
          tag("td", [["style", `text-align: ${column.align}`]], escapeHtml(formatCell(column, row))),
        )
        .join("");
      return tag("tr", [["aria-selected", el.selectedRow === index ? "true" : undefined]], cells);
    })
    .join("");

  return tag(
    "table",
    [
      ["id", el.id],
      ["data-on-sort", eventAttrValue(el.onSort)],
      ["data-on-row-select", eventAttrValue(el.onRowSelect)],
      ["style", toCss(el.style)],
    ],
    `${tag("thead", [], tag("tr", [], head))}${tag("tbody", [], body)}`,
  );
}

function preHtml(el: IurElement, text: string): string {
  return tag(
    "pre",
    [
      ["id", el.id],
      ["data-kind", el.type],
      ["style", toCss(el.style)],
    ],
    escapeHtml(text),
  );
}

function convertElement(el: IurElement, convertAll: (nodes: readonly unknown[]) => string): string {
  const style = toCss(el.style);

  switch (el.type) {
    case "text":
      return tag("span", [["id", el.id], ["style", style]], escapeHtml(el.content ?? ""));

    case "button":
      return tag(
        "button",
        [
          ["id", el.id],
          ["disabled", el.disabled],
          ["data-on-click", eventAttrValue(el.onClick)],
          ["style", style],
        ],
        escapeHtml(el.label ?? ""),
      );

    case "label":
      return tag("label", [["id", el.id], ["for", el.for], ["style", style]], escapeHtml(el.text ?? ""));

    case "textInput":
      return voidTag("input", [
        ["id", el.id],
        ["name", el.id],
        ["type", htmlInputType(el.inputType)],
        ["value", el.value],
        ["placeholder", el.placeholder],
        ["data-on-change", eventAttrValue(el.onChange)],
        ["data-on-submit", eventAttrValue(el.onSubmit)],
        ["disabled", el.disabled],
        ["form", el.formId],
        ["style", style],
      ]);

    case "gauge":
      return preHtml(el, gaugeText(el));
    case "sparkline":
      return preHtml(el, sparklineText(el.data));
    case "barChart":
      return preHtml(el, barChartText(el));
    case "lineChart":
      return preHtml(el, lineChartText(el));

    case "table":
      return tableHtml(el);

    case "column":
      return tag("span", [["id", el.id], ["style", style]], escapeHtml(el.header));

    case "menuItem":
      return tag(
        "li",
        [
          ["id", el.id],
          ["role", "menuitem"],
          ["data-on-click", el.disabled ? undefined : eventAttrValue(el.action)],
          ["aria-disabled", el.disabled],
          ["aria-haspopup", el.submenu !== undefined],
          ["style", style],
        ],
        escapeHtml(menuItemText(el)),
      );

    case "menu": {
      const title = menuTitleText(el);
      const titleHtml = title !== undefined ? tag("div", [["class", "menu-title"]], escapeHtml(title)) : "";
      return tag(
        "nav",
        [["id", el.id], ["data-position", el.position], ["style", style]],
        titleHtml + tag("ul", [["role", "menu"]], convertAll(el.items)),
      );
    }

    case "contextMenu":
      return tag(
        "ul",
        [["id", el.id], ["role", "menu"], ["data-trigger", el.triggerOn.replaceAll("_", "-")], ["style", style]],
        convertAll(el.items),
      );

    case "tab":
      return tag(
        "button",
        [
          ["id", el.id],
          ["role", "tab"],
          ["disabled", el.disabled],
          ["style", style],
        ],
        escapeHtml(tabText(el)),
      );

    case "tabs": {
      const list = tag(
        "div",
        [["role", "tablist"], ["data-on-change", eventAttrValue(el.onChange)]],
        convertAll(el.tabs),
      );
      const panel = tag(
        "div",
        [["role", "tabpanel"], ["aria-labelledby", el.activeTab]],
        convertAll(activeTabContent(el.tabs, el.activeTab)),
      );
      return tag(
        "div",
        [["id", el.id], ["data-active-tab", el.activeTab], ["data-position", el.position], ["style", style]],
        list + panel,
      );
    }

    case "treeNode": {
      const children = convertAll(visibleTreeChildren(el));
      const group = children !== "" ? tag("ul", [["role", "group"]], children) : "";
      return tag(
        "li",
        [
          ["id", el.id],
          ["role", "treeitem"],
          ["aria-expanded", el.children !== undefined ? String(el.expanded) : undefined],
          ["style", style],
        ],
        escapeHtml(treeNodeText(el)) + group,
      );
    }

    case "treeView":
      return tag(
        "ul",
        [
          ["id", el.id],
          ["role", "tree"],
          ["data-on-select", eventAttrValue(el.onSelect)],
          ["data-on-toggle", eventAttrValue(el.onToggle)],
          ["style", style],
        ],
        convertAll(el.rootNodes),
      );

    case "vbox":
    case "hbox":
      return tag(
        "div",
        [
          ["id", el.id],
          [
            "style",
            flexCss({
              direction: el.type === "vbox" ? "column" : "row",
              spacing: el.spacing,
              padding: el.padding,
              align: el.alignItems,
              justify: el.justifyContent,
              style: el.style,
            }),
          ],
        ],
        convertAll(el.children),
      );
  }
}

export function createWebRenderer(opts: WebRendererOptions = {}): Renderer<string> {
  const warn = opts.warn ?? warnDev;

  const convert: ConvertFn<string> = (node) => {
    if (!isIurElement(node)) {
      warn(`${warnPrefix("web")} unknown node kind "${describeKind(node)}" rendered as an empty span`);
      return EMPTY_HTML;
    }
    if (node.visible === false) return null;
    return convertElement(node, convertAll);
  };

  const convertAll = (nodes: readonly unknown[]): string => {
    let out = "";
    for (const node of nodes) out += convert(node) ?? "";
    return out;
  };

  return createRenderer("web", convert, { warn });
}

export const webRenderer: Renderer<string> = createWebRenderer();
