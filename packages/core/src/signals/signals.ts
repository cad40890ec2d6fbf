/**
 * packages/core/src/signals/signals.ts — Signal values and the standard signal vocabulary.
 *
 * Signal types are dot-delimited `<domain>.<entity>.<action>` strings; the
 * domain defaults to the "unified" namespace.
 */

import { v4 as uuidv4 } from "uuid";
import { type Result, UiError, err, ok } from "../errors.js";
import type { SignalData } from "../security/security.js";

export const DEFAULT_NAMESPACE = "unified";
export const DEFAULT_SIGNAL_SOURCE = "/unified_ui";

/** Standard name to `<entity>.<action>` suffix. */
export const STANDARD_SIGNALS = Object.freeze({
  click: "button.clicked",
  change: "input.changed",
  submit: "form.submitted",
  focus: "element.focused",
  blur: "element.blurred",
  select: "item.selected",
} as const);

export type StandardSignalName = keyof typeof STANDARD_SIGNALS;

export type Signal = Readonly<{
  type: string;
  data: SignalData;
  source: string;
  id: string;
  subject?: string;
  /** ISO-8601 creation time. */
  time: string;
}>;

export type SignalOptions = Readonly<{
  namespace?: string;
  source?: string;
  subject?: string;
  id?: string;
}>;

export type SignalError = "unknown_signal" | "invalid_type_format";

const SEGMENT = /^[a-z][a-z0-9_]*$/;

export function isStandardSignalName(name: string): name is StandardSignalName {
  return Object.prototype.hasOwnProperty.call(STANDARD_SIGNALS, name);
}

const STANDARD_NAMES: readonly StandardSignalName[] = Object.freeze([
  "click",
  "change",
  "submit",
  "focus",
  "blur",
  "select",
] as const);

export function standardSignalNames(): readonly StandardSignalName[] {
  return STANDARD_NAMES;
}

export function isValidSegment(segment: string): boolean {
  return SEGMENT.test(segment);
}

/** At least three segments, each lowercase `[a-z][a-z0-9_]*`. */
export function isValidSignalType(type: string): boolean {
  const parts = type.split(".");
  return parts.length >= 3 && parts.every(isValidSegment);
}

export function signalType(
  name: string,
  namespace: string = DEFAULT_NAMESPACE,
): Result<string, "unknown_signal"> {
  if (!isStandardSignalName(name)) return err("unknown_signal");
  return ok(`${namespace}.${STANDARD_SIGNALS[name]}`);
}

/**
 * Build a signal from a standard name (`"click"`) or a full type string
 * (`"unified.mouse.click"`). Anything else is rejected before a signal exists.
 */
export function createSignal(
  nameOrType: string,
  data: SignalData = {},
  opts: SignalOptions = {},
): Result<Signal, SignalError> {
  let type: string;
  if (isStandardSignalName(nameOrType)) {
    type = `${opts.namespace ?? DEFAULT_NAMESPACE}.${STANDARD_SIGNALS[nameOrType]}`;
  } else if (nameOrType.includes(".")) {
    type = nameOrType;
  } else {
    return err("unknown_signal");
  }
  if (!isValidSignalType(type)) return err("invalid_type_format");

  const signal: Signal = {
    type,
    data: Object.freeze({ ...data }),
    source: opts.source ?? DEFAULT_SIGNAL_SOURCE,
    id: opts.id ?? uuidv4(),
    ...(opts.subject !== undefined ? { subject: opts.subject } : {}),
    time: new Date().toISOString(),
  };
  return ok(Object.freeze(signal));
}

export function createSignalOrThrow(
  nameOrType: string,
  data: SignalData = {},
  opts: SignalOptions = {},
): Signal {
  const result = createSignal(nameOrType, data, opts);
  if (!result.ok) {
    throw new UiError("UI_INVALID_SIGNAL", `Failed to create signal "${nameOrType}": ${result.error}`);
  }
  return result.value;
}
