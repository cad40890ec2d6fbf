/**
 * packages/core/src/renderer/charts.ts — ASCII chart and table text shared by all renderers.
 *
 * Terminal shows this text directly; desktop puts it in labels and web in
 * `<pre>` blocks, so every platform reports the same logical picture.
 */

import { attrEntries } from "../attrs.js";
import type {
  BarChartElement,
  CellAlign,
  ColumnElement,
  GaugeElement,
  LineChartElement,
  SortDirection,
  TableElement,
  TableRow,
} from "../iur/types.js";
import { getRowValue, sortRows } from "../table/sort.js";

export const GAUGE_WIDTH = 20;
export const BAR_WIDTH = 20;
export const BAR_LABEL_WIDTH = 10;
export const VERTICAL_BAR_LEVELS = 5;
export const MAX_VERTICAL_BARS = 10;
export const LINE_CHART_HEIGHT = 5;
export const NO_DATA = "No data";
export const NO_COLUMNS = "No columns defined";

/** Eight-step ramp from low to high. */
export const SPARKLINE_RAMP: readonly string[] = Object.freeze(["_", ".", "-", "~", "o", "O", "@", "#"]);

const DEFAULT_COLUMN_WIDTH_CAP = 999;

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

function textLength(text: string): number {
  return [...text].length;
}

export function alignText(text: string, width: number, align: CellAlign): string {
  const padding = Math.max(0, width - textLength(text));
  switch (align) {
    case "right":
      return " ".repeat(padding) + text;
    case "center": {
      const left = Math.floor(padding / 2);
      return " ".repeat(left) + text + " ".repeat(padding - left);
    }
    default:
      return text + " ".repeat(padding);
  }
}

/** Smallest and largest value, by loop so long series never hit the argument limit. */
export function valueExtent(values: readonly number[]): Readonly<{ min: number; max: number }> {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

export function formatCellValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "object") return JSON.stringify(value) ?? "";
  return String(value);
}

// ---------------------------------------------------------------------------
// Gauge / sparkline
// ---------------------------------------------------------------------------

export function gaugeFillWidth(value: number, min: number, max: number): number {
  const clamped = Math.min(Math.max(value, min), max);
  const range = max - min;
  const pct = range > 0 ? (clamped - min) / range : 0;
  return Math.round(pct * GAUGE_WIDTH);
}

/** `Label: [=====     ] 25/100`; the label prefix only when set. */
export function gaugeText(gauge: Pick<GaugeElement, "value" | "min" | "max" | "label">): string {
  const fill = gaugeFillWidth(gauge.value, gauge.min, gauge.max);
  const bar = `[${"=".repeat(fill)}${" ".repeat(GAUGE_WIDTH - fill)}]`;
  const prefix = gauge.label !== undefined ? `${gauge.label}: ` : "";
  return `${prefix}${bar} ${gauge.value}/${gauge.max}`;
}

/** One ramp character per point. Fewer than two points render nothing. */
export function sparklineText(data: readonly number[]): string {
  if (data.length < 2) return "";
  const { min, max } = valueExtent(data);
  const range = max - min;
  const last = SPARKLINE_RAMP.length - 1;
  return data
    .map((value) => {
      const index =
        range > 0 ? Math.min(Math.trunc(((value - min) / range) * SPARKLINE_RAMP.length), last) : 0;
      return SPARKLINE_RAMP[index] ?? "";
    })
    .join("");
}

// ---------------------------------------------------------------------------
// Bar / line charts
// ---------------------------------------------------------------------------

export function barChartLines(chart: Pick<BarChartElement, "data" | "orientation">): readonly string[] {
  const data = chart.data;
  if (data.length === 0) return [NO_DATA];
  const max = Math.max(0, valueExtent(data.map((d) => d.value)).max);

  if (chart.orientation === "horizontal") {
    return data.map((d) => {
      const width = max > 0 ? Math.max(0, Math.round((d.value / max) * BAR_WIDTH)) : 0;
      return `${d.label.padEnd(BAR_LABEL_WIDTH)} [${"=".repeat(width)}] ${d.value}`;
    });
  }

  const shown = data.slice(0, MAX_VERTICAL_BARS);
  const lines: string[] = [];
  for (let level = VERTICAL_BAR_LEVELS; level >= 1; level--) {
    const threshold = (level * max) / VERTICAL_BAR_LEVELS;
    const cells = shown.map((d) => (max > 0 && d.value >= threshold ? "|" : " "));
    const axis = String(level * (100 / VERTICAL_BAR_LEVELS)).padStart(4);
    lines.push(`${axis} |${cells.join(" ")}|`);
  }
  lines.push(`      ${shown.map(() => "--").join(" ")}`);
  return lines;
}

export function barChartText(chart: Pick<BarChartElement, "data" | "orientation">): string {
  return barChartLines(chart).join("\n");
}

/** Five-row plot, top row first, followed by three-character x labels. */
export function lineChartText(chart: Pick<LineChartElement, "data" | "showDots">): string {
  const data = chart.data;
  if (data.length < 2) return NO_DATA;
  const values = data.map((d) => d.value);
  const { min, max } = valueExtent(values);
  const range = max - min;
  const top = LINE_CHART_HEIGHT - 1;
  const levels = values.map((v) => (range > 0 ? Math.round(((v - min) / range) * top) : 0));
  const mark = chart.showDots ? "o" : "*";

  const rows: string[] = [];
  for (let y = top; y >= 0; y--) {
    rows.push(levels.map((level) => (level === y ? mark : " ")).join(""));
  }
  const labels = data.map((d) => d.label.slice(0, 3).padEnd(4)).join("");
  return `${rows.join("\n")}\n${labels}`;
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function rowKeys(row: TableRow): readonly string[] {
  return attrEntries(row).map(([key]) => key);
}

function autoColumn(key: string): ColumnElement {
  return {
    type: "column",
    key,
    header: capitalize(key),
    sortable: true,
    align: "left",
    visible: true,
  };
}

/** Declared columns, else columns derived from the first row's sorted keys. */
export function tableColumns(table: Pick<TableElement, "columns" | "data">): readonly ColumnElement[] {
  if (table.columns.length > 0) return table.columns;
  const first = table.data[0];
  if (first === undefined) return [];
  return [...new Set(rowKeys(first))].sort().map(autoColumn);
}

export function tableRows(
  table: Pick<TableElement, "data" | "sortColumn" | "sortDirection">,
): readonly TableRow[] {
  return sortRows(table.data, table.sortColumn, table.sortDirection);
}

export function formatCell(column: ColumnElement, row: TableRow): string {
  const value = getRowValue(row, column.key);
  return column.formatter ? column.formatter(value) : formatCellValue(value);
}

export function sortGlyph(direction: SortDirection): string {
  return direction === "asc" ? "↑" : "↓";
}

export type TableLayout = Readonly<{
  columns: readonly ColumnElement[];
  widths: readonly number[];
  rows: readonly TableRow[];
}>;

export function tableLayout(
  table: Pick<TableElement, "columns" | "data" | "sortColumn" | "sortDirection">,
): TableLayout {
  const columns = tableColumns(table);
  const rows = tableRows(table);
  const widths = columns.map((column) => {
    const longest = rows.reduce((acc, row) => Math.max(acc, textLength(formatCell(column, row))), 0);
    return Math.min(Math.max(textLength(column.header), longest), column.width ?? DEFAULT_COLUMN_WIDTH_CAP);
  });
  return { columns, widths, rows };
}

export function tableLines(
  table: Pick<TableElement, "columns" | "data" | "sortColumn" | "sortDirection">,
): readonly string[] {
  const { columns, widths, rows } = tableLayout(table);
  if (columns.length === 0) return [NO_COLUMNS];

  const separator = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const header = columns.map((column, i) => {
    const glyph = table.sortColumn === column.key ? ` ${sortGlyph(table.sortDirection)}` : "";
    return alignText(column.header, widths[i] ?? 0, column.align) + glyph;
  });
  const body = rows.map(
    (row) =>
      `| ${columns.map((column, i) => alignText(formatCell(column, row), widths[i] ?? 0, column.align)).join(" | ")} |`,
  );
  return [separator, `| ${header.join(" | ")} |`, separator, ...body, separator];
}

export function tableText(
  table: Pick<TableElement, "columns" | "data" | "sortColumn" | "sortDirection">,
): string {
  return tableLines(table).join("\n");
}
