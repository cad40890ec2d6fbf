/**
 * packages/core/src/renderer/events.ts — Raw platform events to signals.
 *
 * Why: The three platforms accept overlapping event sets. One table maps
 * (platform, event kind) to a signal rule, and every interpolated token is
 * resolved through an allowlist before it becomes part of a signal type.
 */

import { isPlainRecord, readString } from "../attrs.js";
import { type Check, OK_CHECK, type Result, err, ok } from "../errors.js";
import { elementMetadata } from "../iur/element.js";
import type { SignalHandler } from "../iur/types.js";
import {
  type PayloadError,
  type PayloadLimits,
  type SignalData,
  lookupEventAction,
  validatePayload,
} from "../security/security.js";
import {
  DEFAULT_NAMESPACE,
  type Signal,
  type SignalError,
  type StandardSignalName,
  createSignal,
} from "../signals/signals.js";
import type { Platform } from "./state.js";

// =============================================================================
// Event table
// =============================================================================

export type PlatformEventType =
  | "click"
  | "change"
  | "submit"
  | "keyPress"
  | "keyRelease"
  | "mouse"
  | "window"
  | "focus"
  | "blur"
  | "hook";

type EventRule =
  | Readonly<{ kind: "standard"; name: StandardSignalName }>
  | Readonly<{ kind: "fixed"; suffix: string }>
  | Readonly<{ kind: "action"; category: "mouse" | "window" }>
  | Readonly<{ kind: "hook" }>;

const CLICK: EventRule = { kind: "standard", name: "click" };
const CHANGE: EventRule = { kind: "standard", name: "change" };
const SUBMIT: EventRule = { kind: "standard", name: "submit" };
const FOCUS: EventRule = { kind: "standard", name: "focus" };
const BLUR: EventRule = { kind: "standard", name: "blur" };
const KEY_PRESS: EventRule = { kind: "fixed", suffix: "key.pressed" };
const KEY_RELEASE: EventRule = { kind: "fixed", suffix: "key.released" };
const MOUSE: EventRule = { kind: "action", category: "mouse" };
const WINDOW: EventRule = { kind: "action", category: "window" };
const HOOK: EventRule = { kind: "hook" };

const EVENT_TABLE: Readonly<Record<Platform, ReadonlyMap<string, EventRule>>> = Object.freeze({
  terminal: new Map<string, EventRule>([
    ["click", CLICK],
    ["change", CHANGE],
    ["submit", SUBMIT],
    ["keyPress", KEY_PRESS],
    ["mouse", MOUSE],
    ["focus", FOCUS],
    ["blur", BLUR],
  ]),
  desktop: new Map<string, EventRule>([
    ["click", CLICK],
    ["change", CHANGE],
    ["submit", SUBMIT],
    ["keyPress", KEY_PRESS],
    ["mouse", MOUSE],
    ["focus", FOCUS],
    ["blur", BLUR],
    ["window", WINDOW],
  ]),
  web: new Map<string, EventRule>([
    ["click", CLICK],
    ["change", CHANGE],
    ["submit", SUBMIT],
    ["keyPress", KEY_PRESS],
    ["keyRelease", KEY_RELEASE],
    ["focus", FOCUS],
    ["blur", BLUR],
    ["hook", HOOK],
  ]),
});

export const WEB_HOOKS = Object.freeze([
  "scroll_handler",
  "resize_handler",
  "focus_handler",
  "blur_handler",
  "scroll_tracker",
  "resize_observer",
  "visibility_observer",
  "connecting",
  "connected",
  "disconnected",
  "reconnecting",
] as const);

export type WebHook = (typeof WEB_HOOKS)[number];

export const PLATFORM_SOURCES: Readonly<Record<Platform, string>> = Object.freeze({
  terminal: "/unified_ui/terminal",
  desktop: "/unified_ui/desktop",
  web: "/unified_ui/web",
});

export function platformEventTypes(platform: Platform): readonly string[] {
  return Object.freeze([...EVENT_TABLE[platform].keys()]);
}

export type EventSignalOptions = Readonly<{
  namespace?: string;
  source?: string;
  subject?: string;
  limits?: PayloadLimits;
}>;

export type EventError =
  | "unsupported_event"
  | "invalid_action"
  | "invalid_hook"
  | PayloadError
  | SignalError;

function lookupHook(value: unknown): WebHook | undefined {
  if (typeof value !== "string") return undefined;
  return WEB_HOOKS.find((hook) => hook === value);
}

/** Signal name or full type for `rule`, or the reason the event is refused. */
function resolveSignalName(
  rule: EventRule,
  data: SignalData,
  namespace: string,
): Result<string, "invalid_action" | "invalid_hook"> {
  switch (rule.kind) {
    case "standard":
      return ok(rule.name);
    case "fixed":
      return ok(`${namespace}.${rule.suffix}`);
    case "action": {
      const action = lookupEventAction(rule.category, data.action);
      return action === undefined ? err("invalid_action") : ok(`${namespace}.${rule.category}.${action}`);
    }
    case "hook": {
      const hook = lookupHook(data.hookName);
      return hook === undefined ? err("invalid_hook") : ok(`${namespace}.web.${hook}`);
    }
  }
}

/**
 * Convert a raw `(platform, eventType, data)` triple into a signal.
 *
 * @param data - Raw event payload. `action` selects the mouse or window
 *   action; `hookName` selects the web hook.
 * @returns The signal, or the first failed check: event support, action or
 *   hook allowlist, then payload limits.
 */
export function toPlatformSignal(
  platform: Platform,
  eventType: string,
  data: SignalData = {},
  opts: EventSignalOptions = {},
): Result<Signal, EventError> {
  const rule = EVENT_TABLE[platform].get(eventType);
  if (rule === undefined) return err("unsupported_event");

  const namespace = opts.namespace ?? DEFAULT_NAMESPACE;
  const name = resolveSignalName(rule, data, namespace);
  if (!name.ok) return name;

  const checked = validatePayload(data, opts.limits);
  if (!checked.ok) return checked;

  return createSignal(
    name.value,
    { ...data, platform },
    {
      namespace,
      source: opts.source ?? PLATFORM_SOURCES[platform],
      ...(opts.subject !== undefined ? { subject: opts.subject } : {}),
    },
  );
}

// =============================================================================
// Element event helpers
// =============================================================================

const HANDLER_KEYS: Readonly<Record<string, string>> = Object.freeze({
  click: "onClick",
  change: "onChange",
  submit: "onSubmit",
  focus: "onFocus",
  blur: "onBlur",
});

export function asSignalHandler(value: unknown): SignalHandler | undefined {
  if (typeof value === "string") return value;
  if (!isPlainRecord(value)) return undefined;
  const signal = readString(value.signal);
  if (signal === undefined) return undefined;
  const payload = value.payload;
  return isPlainRecord(payload) ? { signal, payload } : { signal };
}

/** Handler an element declares for `eventType` (`click` reads `onClick`, ...). */
export function getHandler(element: unknown, eventType: string): SignalHandler | undefined {
  const key = HANDLER_KEYS[eventType];
  if (key === undefined) return undefined;
  return asSignalHandler(elementMetadata(element)[key]);
}

/** Signal name and payload produced by an element handler. */
export type ElementSignal = Readonly<{ name: string; payload: SignalData }>;

export type ElementSignalError = "no_handler" | "missing_element_id";

/**
 * Pair an element's handler with an event payload. The payload gains the
 * element's id as `elementId`; a handler's own payload is merged last.
 */
export function buildElementSignal(
  element: unknown,
  eventType: string,
  payload: SignalData = {},
): Result<ElementSignal, ElementSignalError> {
  const handler = getHandler(element, eventType);
  if (handler === undefined) return err("no_handler");
  const elementId = readString(elementMetadata(element).id);
  if (elementId === undefined) return err("missing_element_id");

  const full: SignalData = { ...payload, elementId };
  if (typeof handler === "string") return ok({ name: handler, payload: full });
  return ok({ name: handler.signal, payload: { ...full, ...handler.payload } });
}

/** Fill in `elementId: "unknown"` and a millisecond `timestamp` when absent. */
export function normalizePayload(payload: SignalData, now: () => number = Date.now): SignalData {
  return Object.freeze({
    ...payload,
    elementId: payload.elementId ?? "unknown",
    timestamp: payload.timestamp ?? now(),
  });
}

export function validateSignalShape(value: unknown): Check<"invalid_format" | "missing_element_id"> {
  if (!isPlainRecord(value)) return err("invalid_format");
  if (typeof value.name !== "string" || !isPlainRecord(value.payload)) return err("invalid_format");
  return Object.prototype.hasOwnProperty.call(value.payload, "elementId")
    ? OK_CHECK
    : err("missing_element_id");
}

/** Normalized field name to the raw keys it may arrive under, in priority order. */
const METADATA_ALIASES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["x", ["x"]],
  ["y", ["y"]],
  ["ctrl", ["control", "ctrl"]],
  ["alt", ["modifierAlt", "alt"]],
  ["shift", ["modifierShift", "shift"]],
  ["meta", ["modifierMeta", "meta"]],
  ["timestamp", ["timestamp", "time", "timestampMs", "ms"]],
];

/** Pull coordinates, modifiers and timestamp out of a raw event under their common aliases. */
export function extractEventMetadata(raw: SignalData): SignalData {
  const out: Record<string, unknown> = {};
  for (const [target, sources] of METADATA_ALIASES) {
    const source = sources.find((key) => Object.prototype.hasOwnProperty.call(raw, key));
    if (source !== undefined) out[target] = raw[source];
  }
  return Object.freeze(out);
}

/** Handlers recorded per element id by a renderer's extractor. */
export type HandlerMap = Readonly<Record<string, Readonly<Record<string, SignalHandler>>>>;
