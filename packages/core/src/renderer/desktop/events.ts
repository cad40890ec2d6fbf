/**
 * packages/core/src/renderer/desktop/events.ts — Desktop input and window events as signals.
 *
 * Desktop accepts everything terminal does, plus window lifecycle events.
 */

import type { Result } from "../../errors.js";
import type { SignalHandler } from "../../iur/types.js";
import { type SignalData, redact } from "../../security/security.js";
import type { Signal } from "../../signals/signals.js";
import {
  type EventError,
  type EventSignalOptions,
  type HandlerMap,
  asSignalHandler,
  toPlatformSignal,
} from "../events.js";
import { type DesktopWidget, walkWidgets } from "./widgets.js";

type SignalResult = Result<Signal, EventError>;

export function toSignal(
  eventType: string,
  data: SignalData = {},
  opts: EventSignalOptions = {},
): SignalResult {
  return toPlatformSignal("desktop", eventType, data, opts);
}

export function buttonClick(widgetId: string, action: unknown, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("click", { widgetId, action }, opts);
}

export function inputChange(widgetId: string, value: string, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("change", { widgetId, value }, opts);
}

/** Sensitive fields in `data` are redacted before the signal is built. */
export function formSubmit(formId: string, data: SignalData, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("submit", { formId, data: redact(data) }, opts);
}

export function keyPress(
  key: string,
  modifiers: readonly string[] = [],
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("keyPress", { key, modifiers }, opts);
}

// ---------------------------------------------------------------------------
// Mouse
// ---------------------------------------------------------------------------

export function mouseClick(
  widgetId: string,
  button = "left",
  x = 0,
  y = 0,
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("mouse", { action: "click", widgetId, button, x, y }, opts);
}

export function mouseDoubleClick(
  widgetId: string,
  button = "left",
  x = 0,
  y = 0,
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("mouse", { action: "double_click", widgetId, button, x, y }, opts);
}

/** `buttons` lists the buttons held during the move. */
export function mouseMove(
  x: number,
  y: number,
  buttons: readonly string[] = [],
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("mouse", { action: "move", x, y, buttons }, opts);
}

export function mouseScroll(
  x: number,
  y: number,
  direction: "up" | "down" | "left" | "right" = "down",
  delta = 1,
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("mouse", { action: "scroll", x, y, direction, delta }, opts);
}

// ---------------------------------------------------------------------------
// Window
// ---------------------------------------------------------------------------

export function windowResize(width: number, height: number, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "resize", width, height }, opts);
}

export function windowMove(x: number, y: number, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "move", x, y }, opts);
}

export function windowClose(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "close" }, opts);
}

export function windowMinimize(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "minimize" }, opts);
}

export function windowMaximize(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "maximize" }, opts);
}

/** Restore from minimized or maximized. */
export function windowRestore(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "restore" }, opts);
}

export function windowFocus(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "focus" }, opts);
}

export function windowBlur(opts: EventSignalOptions = {}): SignalResult {
  return toSignal("window", { action: "blur" }, opts);
}

// ---------------------------------------------------------------------------
// Handler extraction
// ---------------------------------------------------------------------------

const TAG_HANDLER_KEYS = Object.freeze([
  "onChange",
  "onSubmit",
  "onSelect",
  "onToggle",
  "onRowSelect",
  "onSort",
] as const);

/**
 * Handlers per widget id. Buttons contribute `onClick`; tagged widgets
 * contribute their recorded handlers. Text inputs with an id are always listed.
 */
export function extractHandlers(root: DesktopWidget | null): HandlerMap {
  const out: Record<string, Readonly<Record<string, SignalHandler>>> = {};
  if (root === null) return Object.freeze(out);

  walkWidgets(root, (widget) => {
    if (widget.id === undefined) return;
    const handlers: Record<string, SignalHandler> = {};
    if (widget.type === "button") {
      const onClick = asSignalHandler(widget.props.onClick);
      if (onClick !== undefined) handlers.onClick = onClick;
    }
    const meta = widget.tag?.meta ?? {};
    for (const key of TAG_HANDLER_KEYS) {
      const handler = asSignalHandler(meta[key]);
      if (handler !== undefined) handlers[key] = handler;
    }
    if (Object.keys(handlers).length > 0 || widget.tag?.kind === "textInput") {
      out[widget.id] = Object.freeze(handlers);
    }
  });
  return Object.freeze(out);
}
