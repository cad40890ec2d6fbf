/**
 * packages/core/src/coordinator/targets.ts — Signal delivery to dispatch targets.
 *
 * Why: Consumers are whatever the host already has: an event emitter (a Node
 * `EventEmitter` fits structurally), a plain callback, or a method looked up
 * by name on a module-like object. Shapes are checked at delivery time so a
 * bad target is reported instead of thrown.
 */

import { isPlainRecord } from "../attrs.js";
import { type Check, OK_CHECK, err } from "../errors.js";
import type { Signal } from "../signals/signals.js";

/** Receives `emit(signal.type, signal)`. */
export type EmitterTarget = Readonly<{ emit(eventName: string, ...args: unknown[]): unknown }>;

/** Called with the signal, or with nothing when it declares no parameter. */
export type CallbackTarget = ((signal: Signal) => unknown) | (() => unknown);

/** Calls `module[fn](...args, signal)`. */
export type RemoteCallTarget = Readonly<{
  module: Readonly<Record<string, unknown>>;
  fn: string;
  args?: readonly unknown[];
}>;

export type DispatchTarget = EmitterTarget | CallbackTarget | RemoteCallTarget;

export type DeliveryError = "invalid_target" | "delivery_failed";

export type DeliveryFailure = Readonly<{
  reason: DeliveryError;
  /** Position of the target in a broadcast; 0 for a single dispatch. */
  index: number;
  message?: string;
}>;

type Invocation = Readonly<{ call: () => unknown }>;

function failure(reason: DeliveryError, index: number, message?: string): DeliveryFailure {
  return Object.freeze(message === undefined ? { reason, index } : { reason, index, message });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasEmit(value: object): value is EmitterTarget {
  return "emit" in value && typeof value.emit === "function";
}

/** The call a target stands for, or `undefined` when its shape is unsupported. */
function resolveInvocation(target: unknown, signal: Signal): Invocation | undefined {
  if (typeof target === "function") {
    if (target.length > 1) return undefined;
    return { call: () => Reflect.apply(target, undefined, target.length === 0 ? [] : [signal]) };
  }
  if (typeof target !== "object" || target === null) return undefined;
  if (hasEmit(target)) return { call: () => target.emit(signal.type, signal) };

  if (!isPlainRecord(target)) return undefined;
  const { module, fn, args } = target;
  if (typeof module !== "object" || module === null || typeof fn !== "string") return undefined;
  const leading: readonly unknown[] | undefined =
    args === undefined ? [] : Array.isArray(args) ? args : undefined;
  if (leading === undefined) return undefined;
  const method: unknown = Reflect.get(module, fn);
  if (typeof method !== "function") return undefined;
  const callArgs: unknown[] = [...leading, signal];
  return { call: () => Reflect.apply(method, module, callArgs) };
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Deliver `signal` to one target. Delivery is fire-and-forget: a promise a
 * consumer returns is not awaited, and its rejection goes to `onAsyncError`.
 */
export function deliver(
  target: unknown,
  signal: Signal,
  onAsyncError: (message: string) => void,
  index = 0,
): Check<DeliveryFailure> {
  const invocation = resolveInvocation(target, signal);
  if (invocation === undefined) return err(failure("invalid_target", index));
  try {
    const returned = invocation.call();
    if (isThenable(returned)) {
      void Promise.resolve(returned).catch((error: unknown) => {
        onAsyncError(`async delivery of ${signal.type} failed: ${describeError(error)}`);
      });
    }
    return OK_CHECK;
  } catch (error: unknown) {
    return err(failure("delivery_failed", index, describeError(error)));
  }
}

export function isDispatchTarget(value: unknown): value is DispatchTarget {
  if (typeof value === "function") return value.length <= 1;
  if (typeof value !== "object" || value === null) return false;
  if (hasEmit(value)) return true;
  return (
    isPlainRecord(value) &&
    typeof value.module === "object" &&
    value.module !== null &&
    typeof value.fn === "string"
  );
}
