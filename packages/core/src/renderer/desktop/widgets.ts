/**
 * packages/core/src/renderer/desktop/widgets.ts — Desktop widget descriptions.
 *
 * Why: Desktop toolkits consume `{ type, props, children }` records. Only three
 * widget types exist; composite IUR elements become containers of labels and
 * buttons, and carry a `tag` so events can recover the source element.
 */

import type { ElementKind, SignalHandler } from "../../iur/types.js";

export type DesktopWidgetType = "label" | "button" | "container";

export type DesktopProps = Readonly<Record<string, unknown>>;

export type DesktopTag = Readonly<{ kind: ElementKind; meta: Readonly<Record<string, unknown>> }>;

export type DesktopWidget = Readonly<{
  type: DesktopWidgetType;
  id?: string;
  props: DesktopProps;
  children: readonly DesktopWidget[];
  /** Input id a label describes. */
  labelFor?: string;
  tag?: DesktopTag;
}>;

function compact(values: Readonly<Record<string, unknown>>): DesktopProps {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) out[key] = value;
  }
  return Object.freeze(out);
}

function widget(
  type: DesktopWidgetType,
  props: Readonly<Record<string, unknown>>,
  children: readonly DesktopWidget[],
  id: string | undefined,
): DesktopWidget {
  return Object.freeze({
    type,
    ...(id !== undefined ? { id } : {}),
    props: compact(props),
    children: Object.freeze([...children]),
  });
}

export function labelWidget(text: string, props: DesktopProps = {}, id?: string): DesktopWidget {
  return widget("label", { text, ...props }, [], id);
}

export function buttonWidget(
  label: string,
  onClick: SignalHandler | undefined,
  props: DesktopProps = {},
  id?: string,
): DesktopWidget {
  return widget("button", { label, onClick, ...props }, [], id);
}

export type ContainerDirection = "vbox" | "hbox";

export function containerWidget(
  direction: ContainerDirection,
  children: readonly DesktopWidget[],
  props: DesktopProps = {},
  id?: string,
): DesktopWidget {
  return widget("container", { direction, ...props }, children, id);
}

export function withLabelFor(target: DesktopWidget, labelFor: string): DesktopWidget {
  return Object.freeze({ ...target, labelFor });
}

export function withTag(
  target: DesktopWidget,
  kind: ElementKind,
  meta: Readonly<Record<string, unknown>>,
): DesktopWidget {
  return Object.freeze({ ...target, tag: Object.freeze({ kind, meta: compact(meta) }) });
}

/** Depth-first visit of `root` and its descendants. */
export function walkWidgets(root: DesktopWidget, visit: (widget: DesktopWidget) => void): void {
  visit(root);
  for (const child of root.children) walkWidgets(child, visit);
}
