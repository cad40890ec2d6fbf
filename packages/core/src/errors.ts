/**
 * packages/core/src/errors.ts — Error codes, error class and result helpers.
 *
 * Why: Broken UI definitions (style cycles, duplicate ids, dangling label refs)
 * are thrown as UiError. Everything recoverable travels as a Result value.
 */

// =============================================================================
// UiErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for configuration-class violations.
 * These are surfaced as UiError instances.
 */
export type UiErrorCode =
  | "UI_CIRCULAR_STYLE"
  | "UI_DUPLICATE_ID"
  | "UI_DANGLING_LABEL_REF"
  | "UI_INVALID_CONFIG"
  | "UI_INVALID_SIGNAL"
  | "UI_ELEMENT_NOT_FOUND";

// =============================================================================
// UiError Class
// =============================================================================

/**
 * Error class for every fatal definition or configuration problem.
 * The `code` property identifies the specific violation.
 */
export class UiError extends Error {
  override readonly name = "UiError";
  readonly code: UiErrorCode;

  constructor(code: UiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiError);
    }
  }
}

// =============================================================================
// Result
// =============================================================================

export type Ok<T> = Readonly<{ ok: true; value: T }>;
export type Err<E> = Readonly<{ ok: false; error: E }>;
export type Result<T, E> = Ok<T> | Err<E>;

/** Success with no payload. */
export type Check<E> = Readonly<{ ok: true }> | Err<E>;

export const OK_CHECK: Readonly<{ ok: true }> = Object.freeze({ ok: true });

export function ok<T>(value: T): Ok<T> {
  return Object.freeze({ ok: true, value });
}

export function err<E>(error: E): Err<E> {
  return Object.freeze({ ok: false, error });
}
