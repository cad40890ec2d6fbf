/**
 * packages/core/src/renderer/web/events.ts — Browser events and connection hooks as signals.
 *
 * Web has no mouse or window events; client hooks arrive as `hook` events
 * whose `hookName` must be one of `WEB_HOOKS`.
 */

import type { Result } from "../../errors.js";
import type { SignalHandler } from "../../iur/types.js";
import { type SignalData, redact } from "../../security/security.js";
import type { Signal } from "../../signals/signals.js";
import {
  type EventError,
  type EventSignalOptions,
  type HandlerMap,
  type WebHook,
  toPlatformSignal,
} from "../events.js";

type SignalResult = Result<Signal, EventError>;

export const BASE_RECONNECT_DELAY_MS = 1000;
export const MAX_RECONNECT_DELAY_MS = 32_000;
export const MAX_RECONNECT_ATTEMPTS = 10;

/** Exponential backoff: 1s, 2s, 4s, ... capped at 32s. Attempts count from 1. */
export function reconnectDelay(attempt: number): number {
  const exponent = Math.max(0, Math.trunc(attempt) - 1);
  return Math.min(BASE_RECONNECT_DELAY_MS * 2 ** exponent, MAX_RECONNECT_DELAY_MS);
}

export function shouldReconnect(attempt: number): boolean {
  return attempt <= MAX_RECONNECT_ATTEMPTS;
}

export function toSignal(
  eventType: string,
  data: SignalData = {},
  opts: EventSignalOptions = {},
): SignalResult {
  return toPlatformSignal("web", eventType, data, opts);
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

export function keyRelease(
  key: string,
  modifiers: readonly string[] = [],
  opts: EventSignalOptions = {},
): SignalResult {
  return toSignal("keyRelease", { key, modifiers }, opts);
}

export function hookEvent(hookName: WebHook, data: SignalData = {}, opts: EventSignalOptions = {}): SignalResult {
  return toSignal("hook", { hookName, data }, opts);
}

// ---------------------------------------------------------------------------
// Connection lifecycle
// ---------------------------------------------------------------------------

export function wsConnecting(opts: EventSignalOptions = {}): SignalResult {
  return hookEvent("connecting", {}, opts);
}

export function wsConnected(opts: EventSignalOptions = {}): SignalResult {
  return hookEvent("connected", {}, opts);
}

export function wsDisconnected(opts: EventSignalOptions = {}): SignalResult {
  return hookEvent("disconnected", {}, opts);
}

export function wsReconnecting(attempt: number, delayMs: number, opts: EventSignalOptions = {}): SignalResult {
  return hookEvent("reconnecting", { attempt, delayMs }, opts);
}

// ---------------------------------------------------------------------------
// Handler extraction
// ---------------------------------------------------------------------------

const OPEN_TAG = /<([a-z]+)((?:\s+[a-z-]+="[^"]*")*)\s*\/?>/g;
const ATTR = /\s+([a-z-]+)="([^"]*)"/g;
const EVENT_ATTR_PREFIX = "data-on-";

/** `data-on-row-select` -> `onRowSelect`. */
function handlerKey(attrName: string): string {
  const words = attrName.slice(EVENT_ATTR_PREFIX.length).split("-");
  return `on${words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join("")}`;
}

function unescapeAttr(value: string): string {
  return value
    .replaceAll("&quot;", '"')
    .replaceAll("&#39;", "'")
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&amp;", "&");
}

/**
 * Handlers per element id, read back from `data-on-*` attributes. Values are
 * the dashed signal names the markup carries. Inputs with an id are always listed.
 */
export function extractHandlers(html: string | null): HandlerMap {
  const out: Record<string, Readonly<Record<string, SignalHandler>>> = {};
  if (html === null) return Object.freeze(out);

  for (const match of html.matchAll(OPEN_TAG)) {
    const tagName = match[1] ?? "";
    let id: string | undefined;
    const handlers: Record<string, SignalHandler> = {};
    for (const attr of (match[2] ?? "").matchAll(ATTR)) {
      const name = attr[1] ?? "";
      const value = unescapeAttr(attr[2] ?? "");
      if (name === "id") id = value;
      else if (name.startsWith(EVENT_ATTR_PREFIX)) handlers[handlerKey(name)] = value;
    }
    if (id === undefined) continue;
    if (Object.keys(handlers).length > 0 || tagName === "input") out[id] = Object.freeze(handlers);
  }
  return Object.freeze(out);
}
