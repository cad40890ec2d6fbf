/**
 * packages/core/src/renderer/terminal/events.ts — Terminal input events as signals.
 *
 * Terminal accepts click, change, submit, keyPress, mouse, focus and blur.
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
import type { TerminalNode } from "./nodes.js";

export function toSignal(
  eventType: string,
  data: SignalData = {},
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toPlatformSignal("terminal", eventType, data, opts);
}

export function buttonClick(
  widgetId: string,
  action: unknown,
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toSignal("click", { widgetId, action }, opts);
}

export function inputChange(
  widgetId: string,
  value: string,
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toSignal("change", { widgetId, value }, opts);
}

/** Sensitive fields in `data` are redacted before the signal is built. */
export function formSubmit(
  formId: string,
  data: SignalData,
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toSignal("submit", { formId, data: redact(data) }, opts);
}

export function keyPress(
  key: string,
  modifiers: readonly string[] = [],
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toSignal("keyPress", { key, modifiers }, opts);
}

export function mouseClick(
  widgetId: string,
  button = "left",
  x = 0,
  y = 0,
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  return toSignal("mouse", { action: "click", widgetId, button, x, y }, opts);
}

/** Tag metadata keys that hold handlers. `action` is a menu item's handler. */
const HANDLER_META_KEYS = Object.freeze([
  "onClick",
  "onChange",
  "onSubmit",
  "onSelect",
  "onToggle",
  "onRowSelect",
  "onSort",
  "action",
] as const);

/**
 * Handlers per widget id, read from tagged nodes. Text inputs with an id are
 * always listed, even without handlers.
 */
export function extractHandlers(root: TerminalNode | null): HandlerMap {
  const out: Record<string, Readonly<Record<string, SignalHandler>>> = {};
  const walk = (node: TerminalNode): void => {
    switch (node.kind) {
      case "stack":
        for (const child of node.children) walk(child);
        return;
      case "styled":
        walk(node.node);
        return;
      case "tagged": {
        walk(node.node);
        const id = node.meta.id;
        if (typeof id !== "string") return;
        const handlers: Record<string, SignalHandler> = {};
        for (const key of HANDLER_META_KEYS) {
          const handler = asSignalHandler(node.meta[key]);
          if (handler !== undefined) handlers[key] = handler;
        }
        if (Object.keys(handlers).length > 0 || node.tag === "textInput") {
          out[id] = Object.freeze(handlers);
        }
        return;
      }
      default:
        return;
    }
  };
  if (root !== null) walk(root);
  return Object.freeze(out);
}
