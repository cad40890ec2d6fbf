/**
 * packages/core/src/coordinator/coordinator.ts — Multi-platform render fan-out and event dispatch.
 *
 * Why: One IUR tree may be shown on several platforms at once. Each platform
 * renders in isolation: an unknown platform or a failed render is reported
 * under its own key and never hides the others' results.
 */

import { type WarnFn, warnDev, warnPrefix } from "../devWarn.js";
import { type Result, err, ok } from "../errors.js";
import { deepMerge } from "../internal/equal.js";
import type { SignalData } from "../security/security.js";
import type { Signal } from "../signals/signals.js";
import { desktopRenderer } from "../renderer/desktop/renderer.js";
import type { DesktopWidget } from "../renderer/desktop/widgets.js";
import { type EventError, type EventSignalOptions, toPlatformSignal } from "../renderer/events.js";
import type { RenderError, Renderer } from "../renderer/lifecycle.js";
import { PLATFORMS, type Platform, type RendererConfig, type RendererState, isPlatformName } from "../renderer/state.js";
import type { TerminalNode } from "../renderer/terminal/nodes.js";
import { terminalRenderer } from "../renderer/terminal/renderer.js";
import { webRenderer } from "../renderer/web/renderer.js";
import { type DeliveryFailure, type DispatchTarget, deliver } from "./targets.js";

export const DEFAULT_RENDER_TIMEOUT_MS = 5000;

export type AnyRenderer = Renderer<TerminalNode> | Renderer<DesktopWidget> | Renderer<string>;

export type AnyRendererState =
  | RendererState<TerminalNode>
  | RendererState<DesktopWidget>
  | RendererState<string>;

export type PlatformRenderError = "invalid_platform" | "timeout" | RenderError;

export type PlatformResult = Result<AnyRendererState, PlatformRenderError>;

/** Result per requested platform name, unknown names included. */
export type PlatformResults = Readonly<Record<string, PlatformResult>>;

export type RenderOnOptions = Readonly<{
  config?: RendererConfig;
  /** Renderer per platform; defaults to the built-in renderers. */
  renderers?: Readonly<Partial<Record<Platform, AnyRenderer>>>;
  warn?: WarnFn;
}>;

export type ConcurrentRenderOptions = RenderOnOptions &
  Readonly<{
    timeoutMs?: number;
    /** Millisecond clock used to time each render; defaults to `Date.now`. */
    now?: () => number;
  }>;

const DEFAULT_RENDERERS: Readonly<Record<Platform, AnyRenderer>> = Object.freeze({
  terminal: terminalRenderer,
  desktop: desktopRenderer,
  web: webRenderer,
});

// =============================================================================
// Selection
// =============================================================================

export function supportsPlatform(platform: unknown): platform is Platform {
  return isPlatformName(platform);
}

export function availableRenderers(): readonly Platform[] {
  return PLATFORMS;
}

export function selectRenderer(
  platform: unknown,
  renderers: Readonly<Partial<Record<Platform, AnyRenderer>>> = DEFAULT_RENDERERS,
): Result<AnyRenderer, "invalid_platform"> {
  if (!isPlatformName(platform)) return err("invalid_platform");
  const renderer = renderers[platform] ?? DEFAULT_RENDERERS[platform];
  return ok(renderer);
}

/** All renderers in order, or `invalid_platform` on the first unknown name. */
export function selectRenderers(
  platforms: readonly unknown[],
  renderers: Readonly<Partial<Record<Platform, AnyRenderer>>> = DEFAULT_RENDERERS,
): Result<readonly AnyRenderer[], "invalid_platform"> {
  const out: AnyRenderer[] = [];
  for (const platform of platforms) {
    const selected = selectRenderer(platform, renderers);
    if (!selected.ok) return selected;
    out.push(selected.value);
  }
  return ok(Object.freeze(out));
}

// =============================================================================
// Rendering
// =============================================================================

function renderPlatform(iur: unknown, platform: string, opts: RenderOnOptions): PlatformResult {
  const selected = selectRenderer(platform, opts.renderers);
  if (!selected.ok) return selected;
  return selected.value.render(iur, opts.config ?? {});
}

function reportFailures(results: PlatformResults, warn: WarnFn): void {
  for (const [platform, result] of Object.entries(results)) {
    if (!result.ok) warn(`${warnPrefix("coordinator")} render on "${platform}" failed: ${result.error}`);
  }
}

/**
 * Render `iur` on each listed platform. The call itself always succeeds;
 * per-platform failures sit under their own key.
 */
export function renderOn(
  iur: unknown,
  platforms: readonly string[],
  opts: RenderOnOptions = {},
): Result<PlatformResults, never> {
  const results: Record<string, PlatformResult> = {};
  for (const platform of platforms) results[platform] = renderPlatform(iur, platform, opts);
  reportFailures(results, opts.warn ?? warnDev);
  return ok(Object.freeze(results));
}

export function renderAll(iur: unknown, opts: RenderOnOptions = {}): Result<PlatformResults, never> {
  return renderOn(iur, availableRenderers(), opts);
}

/**
 * Render on the next macrotask. The result is `timeout` when the task has not
 * started within `timeoutMs`, or when the render itself ran longer than that.
 */
function renderTask(
  iur: unknown,
  platform: string,
  opts: RenderOnOptions,
  timeoutMs: number,
  now: () => number,
): Promise<PlatformResult> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(err("timeout")), timeoutMs);
    setTimeout(() => {
      const startedAt = now();
      let result: PlatformResult;
      try {
        result = renderPlatform(iur, platform, opts);
      } catch {
        result = err("render_failed");
      }
      clearTimeout(timer);
      resolve(now() - startedAt > timeoutMs ? err("timeout") : result);
    }, 0);
  });
}

/**
 * Same results as `renderOn`, with one task per platform. Results are combined
 * only after every task has finished or timed out.
 */
export async function concurrentRender(
  iur: unknown,
  platforms: readonly string[],
  opts: ConcurrentRenderOptions = {},
): Promise<Result<PlatformResults, never>> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
  const now = opts.now ?? Date.now;
  const settled = await Promise.all(
    platforms.map(
      async (platform) => [platform, await renderTask(iur, platform, opts, timeoutMs, now)] as const,
    ),
  );
  const results: Record<string, PlatformResult> = {};
  for (const [platform, result] of settled) results[platform] = result;
  reportFailures(results, opts.warn ?? warnDev);
  return ok(Object.freeze(results));
}

// =============================================================================
// State merging
// =============================================================================

type StateRecord = Readonly<Record<string, unknown>>;

/** Deep merge in order: nested records combine, every other value is last-write-wins. */
export function mergeStates(states: readonly StateRecord[]): StateRecord {
  return states.reduce<StateRecord>((acc, state) => deepMerge(acc, state), Object.freeze({}));
}

/** The newer state wins outright. */
export function conflictResolution(_oldState: StateRecord, newState: StateRecord): StateRecord {
  return newState;
}

// =============================================================================
// Event dispatch
// =============================================================================

export type DispatchError = EventError | "invalid_platform" | "invalid_target" | "delivery_failed";

export type DispatchFailed = Readonly<{ reason: "dispatch_failed"; failures: readonly DeliveryFailure[] }>;

export type BroadcastError = EventError | "invalid_platform" | DispatchFailed;

export type DispatchOptions = EventSignalOptions & Readonly<{ warn?: WarnFn }>;

function buildSignal(
  platform: string,
  eventType: string,
  data: SignalData,
  opts: DispatchOptions,
): Result<Signal, EventError | "invalid_platform"> {
  if (!isPlatformName(platform)) return err("invalid_platform");
  return toPlatformSignal(platform, eventType, data, opts);
}

function asyncErrorSink(opts: DispatchOptions): (message: string) => void {
  const warn = opts.warn ?? warnDev;
  return (message) => warn(`${warnPrefix("coordinator")} ${message}`);
}

/** Normalize a raw event into a signal and deliver it to `target`. */
export function dispatchEvent(
  platform: string,
  eventType: string,
  data: SignalData,
  target: DispatchTarget,
  opts: DispatchOptions = {},
): Result<Signal, DispatchError> {
  const signal = buildSignal(platform, eventType, data, opts);
  if (!signal.ok) return signal;
  const delivered = deliver(target, signal.value, asyncErrorSink(opts));
  if (!delivered.ok) return err(delivered.error.reason);
  return signal;
}

/**
 * Deliver one signal to every target. Any failed delivery turns the whole
 * call into `dispatch_failed` listing each failure; targets after a failure
 * are still attempted.
 */
export function broadcastEvent(
  platform: string,
  eventType: string,
  data: SignalData,
  targets: readonly DispatchTarget[],
  opts: DispatchOptions = {},
): Result<Signal, BroadcastError> {
  const signal = buildSignal(platform, eventType, data, opts);
  if (!signal.ok) return signal;
  const sink = asyncErrorSink(opts);
  const failures: DeliveryFailure[] = [];
  targets.forEach((target, index) => {
    const delivered = deliver(target, signal.value, sink, index);
    if (!delivered.ok) failures.push(delivered.error);
  });
  if (failures.length > 0) {
    const failed: DispatchFailed = { reason: "dispatch_failed", failures: Object.freeze(failures) };
    return err(Object.freeze(failed));
  }
  return signal;
}
