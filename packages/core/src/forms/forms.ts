/**
 * packages/core/src/forms/forms.ts — Form data collection and field validation.
 *
 * Why: Forms are implicit. A text input joins a form by naming it in `formId`,
 * so collection walks the IUR tree instead of reading a form element.
 * Validators return the first problem per field; `validateForm` gathers them all.
 */

import { type Check, OK_CHECK, err } from "../errors.js";
import { traverseIur } from "../iur/traverse.js";
import type { TextInputElement } from "../iur/types.js";
import { type SignalData, redact } from "../security/security.js";

export type FormValues = Readonly<Record<string, unknown>>;

function formInputs(root: unknown, formId: string): readonly TextInputElement[] {
  return traverseIur<TextInputElement[]>(
    root,
    (element, acc) => {
      if (element.type === "textInput" && element.formId === formId && element.id !== undefined) {
        acc.push(element);
      }
      return acc;
    },
    [],
  );
}

/** Ids of the text inputs that belong to `formId`, in tree order. */
export function formInputIds(root: unknown, formId: string): readonly string[] {
  return Object.freeze(formInputs(root, formId).map((input) => input.id ?? ""));
}

/**
 * Current values of the form's inputs by id. Unset values read as `null`;
 * sensitive fields are redacted.
 */
export function collectFormData(root: unknown, formId: string): FormValues {
  const out: Record<string, unknown> = {};
  for (const input of formInputs(root, formId)) {
    if (input.id !== undefined) out[input.id] = input.value ?? null;
  }
  return redact(out);
}

/** `{ formId, data }`, with `extra` merged last so it may override either key. */
export function buildFormSubmitPayload(
  formId: string,
  data: FormValues,
  extra: SignalData = {},
): SignalData {
  return Object.freeze({ formId, data, ...extra });
}

// =============================================================================
// Validators
// =============================================================================

export type FieldError =
  | "required"
  | "missing"
  | "invalid_type"
  | "invalid_format"
  | "too_short"
  | "too_long"
  | "unknown_pattern";

/** Empty strings, `null` and absent keys all count as missing. */
export function validateRequired(data: FormValues, fields: readonly string[]): Check<readonly string[]> {
  const missing = fields.filter((field) => {
    const value = data[field];
    return value === undefined || value === null || value === "";
  });
  return missing.length === 0 ? OK_CHECK : err(Object.freeze(missing));
}

function isEmailShape(value: string): boolean {
  const parts = value.split("@");
  if (parts.length !== 2) return false;
  const [local = "", domain = ""] = parts;
  return local.length > 0 && domain.length > 0 && domain.includes(".");
}

export function validateEmail(data: FormValues, field: string): Check<FieldError> {
  const value = data[field];
  if (value === undefined || value === null) return err("missing");
  if (typeof value !== "string") return err("invalid_format");
  return isEmailShape(value) ? OK_CHECK : err("invalid_format");
}

/** Length in code points, bounded by `min` and optionally `max`. */
export function validateLength(
  data: FormValues,
  field: string,
  min: number,
  max: number = Number.POSITIVE_INFINITY,
): Check<FieldError> {
  const value = data[field];
  if (value === undefined || value === null) return err("missing");
  if (typeof value !== "string") return err("invalid_type");
  const length = [...value].length;
  if (length < min) return err("too_short");
  if (length > max) return err("too_long");
  return OK_CHECK;
}

export const NAMED_PATTERNS: Readonly<Record<string, RegExp>> = Object.freeze({
  us_zip: /^\d{5}(-\d{4})?$/,
  username: /^[a-zA-Z0-9_]{3,32}$/,
  uuid: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  slug: /^[a-z0-9]+(?:-[a-z0-9]+)*$/,
});

/** `pattern` is a regular expression or a key of {@link NAMED_PATTERNS}. */
export function validateFormat(data: FormValues, field: string, pattern: RegExp | string): Check<FieldError> {
  const regex = typeof pattern === "string" ? NAMED_PATTERNS[pattern] : pattern;
  if (regex === undefined) return err("unknown_pattern");
  const value = data[field];
  if (value === undefined || value === null) return err("missing");
  if (typeof value !== "string") return err("invalid_type");
  // A global or sticky regex would carry lastIndex between calls.
  regex.lastIndex = 0;
  return regex.test(value) ? OK_CHECK : err("invalid_format");
}

export type FieldRule =
  | Readonly<{ kind: "required"; field: string }>
  | Readonly<{ kind: "email"; field: string }>
  | Readonly<{ kind: "length"; field: string; min: number; max?: number }>
  | Readonly<{ kind: "format"; field: string; pattern: RegExp | string }>;

function runRule(data: FormValues, rule: FieldRule): Check<FieldError> {
  switch (rule.kind) {
    case "required":
      return validateRequired(data, [rule.field]).ok ? OK_CHECK : err("required");
    case "email":
      return validateEmail(data, rule.field);
    case "length":
      return validateLength(data, rule.field, rule.min, rule.max);
    case "format":
      return validateFormat(data, rule.field, rule.pattern);
  }
}

/** Rules run in order; a field keeps its first error. */
export function validateForm(
  data: FormValues,
  rules: readonly FieldRule[],
): Check<Readonly<Record<string, FieldError>>> {
  const errors: Record<string, FieldError> = {};
  for (const rule of rules) {
    if (Object.prototype.hasOwnProperty.call(errors, rule.field)) continue;
    const result = runRule(data, rule);
    if (!result.ok) errors[rule.field] = result.error;
  }
  return Object.keys(errors).length === 0 ? OK_CHECK : err(Object.freeze(errors));
}
