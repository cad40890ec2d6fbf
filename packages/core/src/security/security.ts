/**
 * packages/core/src/security/security.ts — Event action allowlists and payload hygiene.
 *
 * Why: Mouse, window, key and focus signal types are built from a caller
 * supplied action token. The token is looked up in a fixed allowlist and the
 * allowlist's own string is what reaches the signal type.
 */

import { isPlainRecord } from "../attrs.js";
import { type Check, OK_CHECK, type Result, err, ok } from "../errors.js";

export type SignalData = Readonly<Record<string, unknown>>;

// =============================================================================
// Action allowlists
// =============================================================================

export const MOUSE_ACTIONS = Object.freeze([
  "click",
  "double_click",
  "right_click",
  "middle_click",
  "scroll",
  "move",
  "down",
  "up",
] as const);

export const WINDOW_ACTIONS = Object.freeze([
  "move",
  "resize",
  "close",
  "minimize",
  "maximize",
  "restore",
  "focus",
  "blur",
  "show",
  "hide",
] as const);

export const KEY_ACTIONS = Object.freeze(["press", "release", "down", "up"] as const);

export const FOCUS_ACTIONS = Object.freeze(["focus", "blur"] as const);

export type MouseAction = (typeof MOUSE_ACTIONS)[number];
export type WindowAction = (typeof WINDOW_ACTIONS)[number];
export type KeyAction = (typeof KEY_ACTIONS)[number];
export type FocusAction = (typeof FOCUS_ACTIONS)[number];

const ACTION_ALLOWLISTS: Readonly<Record<string, readonly string[]>> = Object.freeze({
  mouse: MOUSE_ACTIONS,
  window: WINDOW_ACTIONS,
  key: KEY_ACTIONS,
  focus: FOCUS_ACTIONS,
});

const FIXED_EVENT_TYPES: ReadonlySet<string> = new Set(["click", "change", "submit"]);

/**
 * Allowlisted spelling of `action` for an interpolated event category, or
 * `undefined` when the category is not interpolated or the token is unknown.
 */
export function lookupEventAction(eventType: string, action: unknown): string | undefined {
  const allowed = ACTION_ALLOWLISTS[eventType];
  if (allowed === undefined || typeof action !== "string") return undefined;
  return allowed.find((candidate) => candidate === action);
}

export function validateEventAction(eventType: string, action: unknown): Check<"invalid_action"> {
  if (FIXED_EVENT_TYPES.has(eventType)) return OK_CHECK;
  return lookupEventAction(eventType, action) === undefined ? err("invalid_action") : OK_CHECK;
}

// =============================================================================
// Payload limits
// =============================================================================

export type PayloadLimits = Readonly<{
  /** Estimated serialized size in bytes. */
  maxSize: number;
  maxDepth: number;
  /** Longest string value, in code points. */
  maxStringLength: number;
}>;

export const PAYLOAD_LIMITS: PayloadLimits = Object.freeze({
  maxSize: 10_000,
  maxDepth: 10,
  maxStringLength: 1_000,
});

export type PayloadError = "payload_too_large" | "payload_too_deep" | "string_too_long";

const encoder = new TextEncoder();

/**
 * Rough serialized size: UTF-8 bytes plus 10 per string, 20 per scalar,
 * 10 for anything else. Nested records are summed recursively.
 */
export function estimateSize(data: SignalData): number {
  let total = 0;
  for (const value of Object.values(data)) {
    if (typeof value === "string") total += encoder.encode(value).length + 10;
    else if (typeof value === "number" || typeof value === "boolean" || value === null) total += 20;
    else if (isPlainRecord(value)) total += estimateSize(value);
    else total += 10;
  }
  return total;
}

/**
 * Deepest record nesting below `data`; a flat record is depth 0. Descent
 * stops once the depth passes `stopAt`, so the result is then `stopAt + 1`.
 */
export function measureDepth(
  data: SignalData,
  current = 0,
  stopAt: number = Number.POSITIVE_INFINITY,
): number {
  if (current > stopAt) return current;
  let deepest = current;
  for (const value of Object.values(data)) {
    if (isPlainRecord(value)) deepest = Math.max(deepest, measureDepth(value, current + 1, stopAt));
  }
  return deepest;
}

function hasLongString(data: SignalData, maxLength: number): boolean {
  for (const value of Object.values(data)) {
    if (typeof value === "string" && [...value].length > maxLength) return true;
    if (isPlainRecord(value) && hasLongString(value, maxLength)) return true;
  }
  return false;
}

/**
 * Depth, then size, then string length; the first violation wins. Depth goes
 * first so the other walks only ever see bounded nesting.
 */
export function validatePayload(
  data: SignalData,
  limits: PayloadLimits = PAYLOAD_LIMITS,
): Check<PayloadError> {
  if (measureDepth(data, 0, limits.maxDepth) > limits.maxDepth) return err("payload_too_deep");
  if (estimateSize(data) > limits.maxSize) return err("payload_too_large");
  if (hasLongString(data, limits.maxStringLength)) return err("string_too_long");
  return OK_CHECK;
}

// =============================================================================
// Sanitize / redact
// =============================================================================

export const MAX_SANITIZED_LENGTH = 10_000;

export const REDACTED = "[REDACTED]";

export const SENSITIVE_KEY_PATTERNS = Object.freeze([
  "password",
  "passwd",
  "pwd",
  "secret",
  "token",
  "api_key",
  "apikey",
  "passphrase",
] as const);

export type SanitizeError = "too_long";

export function stripMarkup(value: string): string {
  return value
    .replaceAll("&lt;", "")
    .replaceAll("&gt;", "")
    .replaceAll("&amp;", "")
    .replace(/[<>&]/g, "");
}

function sanitizeValue(value: unknown): Result<unknown, SanitizeError> {
  if (typeof value === "string") {
    if ([...value].length > MAX_SANITIZED_LENGTH) return err("too_long");
    return ok(stripMarkup(value));
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null ||
    value === undefined ||
    Array.isArray(value)
  ) {
    return ok(value);
  }
  if (isPlainRecord(value)) return sanitize(value);
  return ok(null);
}

/**
 * Strip markup from every string at every record depth. Arrays are passed
 * through untouched; values that are not plain data become `null`.
 */
export function sanitize(data: SignalData): Result<SignalData, SanitizeError> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const cleaned = sanitizeValue(value);
    if (!cleaned.ok) return cleaned;
    out[key] = cleaned.value;
  }
  return ok(Object.freeze(out));
}

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PATTERNS.some((pattern) => lower.includes(pattern));
}

/** Replace the value of every top-level sensitive key with {@link REDACTED}. */
export function redact(data: SignalData): SignalData {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = isSensitiveKey(key) ? REDACTED : value;
  }
  return Object.freeze(out);
}

export type SecureError = PayloadError | SanitizeError;

export function secure(
  data: SignalData,
  limits: PayloadLimits = PAYLOAD_LIMITS,
): Result<SignalData, SecureError> {
  const checked = validatePayload(data, limits);
  if (!checked.ok) return checked;
  const cleaned = sanitize(data);
  if (!cleaned.ok) return cleaned;
  return ok(redact(cleaned.value));
}

export const MAX_ERROR_TEXT_LENGTH = 200;

/** Text safe to embed in an error message: truncated, then stripped of markup. */
export function sanitizeForError(value: unknown): string {
  const text = typeof value === "string" ? value : String(value);
  const chars = [...text];
  const truncated =
    chars.length > MAX_ERROR_TEXT_LENGTH
      ? `${chars.slice(0, MAX_ERROR_TEXT_LENGTH).join("")}...`
      : text;
  return stripMarkup(truncated);
}
