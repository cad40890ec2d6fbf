/**
 * packages/core/src/renderer/state.ts — Immutable renderer state.
 *
 * Every helper returns a new frozen state; nothing is mutated in place, so a
 * state may be shared freely across concurrent renders.
 */

import { UiError } from "../errors.js";

export const PLATFORMS = Object.freeze(["terminal", "desktop", "web"] as const);

export type Platform = (typeof PLATFORMS)[number];

export function isPlatformName(value: unknown): value is Platform {
  return typeof value === "string" && PLATFORMS.some((p) => p === value);
}

export type RendererConfig = Readonly<Record<string, unknown>>;
export type RendererMetadata = Readonly<Record<string, unknown>>;

export type RendererState<Root> = Readonly<{
  platform: Platform;
  /** Native output; `null` before the first render and after destroy. */
  root: Root | null;
  config: RendererConfig;
  /** Starts at 0 and grows by exactly 1 per effective update. */
  version: number;
  metadata: RendererMetadata;
  /** Native widgets registered by id. */
  widgets: Readonly<Record<string, unknown>>;
}>;

export type CreateStateOptions<Root> = Readonly<{
  root?: Root | null;
  config?: RendererConfig;
  metadata?: RendererMetadata;
}>;

export function createRendererState<Root>(
  platform: Platform,
  opts: CreateStateOptions<Root> = {},
): RendererState<Root> {
  return Object.freeze({
    platform,
    root: opts.root ?? null,
    config: Object.freeze({ ...opts.config }),
    version: 0,
    metadata: Object.freeze({ ...opts.metadata }),
    widgets: Object.freeze({}),
  });
}

function patchState<Root>(
  state: RendererState<Root>,
  patch: Partial<RendererState<Root>>,
): RendererState<Root> {
  return Object.freeze({ ...state, ...patch });
}

export function putRoot<Root>(state: RendererState<Root>, root: Root | null): RendererState<Root> {
  return patchState(state, { root });
}

export function getRootOrThrow<Root>(state: RendererState<Root>): Root {
  if (state.root === null) {
    throw new UiError("UI_ELEMENT_NOT_FOUND", `No root rendered for platform "${state.platform}"`);
  }
  return state.root;
}

export function bumpVersion<Root>(state: RendererState<Root>): RendererState<Root> {
  return patchState(state, { version: state.version + 1 });
}

export function getConfig(state: RendererState<unknown>, key: string, fallback?: unknown): unknown {
  const value = state.config[key];
  return value === undefined ? fallback : value;
}

export function putConfig<Root>(
  state: RendererState<Root>,
  key: string,
  value: unknown,
): RendererState<Root> {
  return patchState(state, { config: Object.freeze({ ...state.config, [key]: value }) });
}

export function getMetadata(state: RendererState<unknown>, key: string, fallback?: unknown): unknown {
  const value = state.metadata[key];
  return value === undefined ? fallback : value;
}

export function putMetadata<Root>(
  state: RendererState<Root>,
  key: string,
  value: unknown,
): RendererState<Root> {
  return patchState(state, { metadata: Object.freeze({ ...state.metadata, [key]: value }) });
}

// ---------------------------------------------------------------------------
// Widget registry
// ---------------------------------------------------------------------------

export function putWidget<Root>(
  state: RendererState<Root>,
  id: string,
  widget: unknown,
): RendererState<Root> {
  return patchState(state, { widgets: Object.freeze({ ...state.widgets, [id]: widget }) });
}

export function getWidget(state: RendererState<unknown>, id: string): unknown {
  return hasWidget(state, id) ? state.widgets[id] : undefined;
}

export function hasWidget(state: RendererState<unknown>, id: string): boolean {
  return Object.prototype.hasOwnProperty.call(state.widgets, id);
}

export function deleteWidget<Root>(state: RendererState<Root>, id: string): RendererState<Root> {
  if (!hasWidget(state, id)) return state;
  const next: Record<string, unknown> = {};
  for (const [key, widget] of Object.entries(state.widgets)) {
    if (key !== id) next[key] = widget;
  }
  return patchState(state, { widgets: Object.freeze(next) });
}

export function widgetIds(state: RendererState<unknown>): readonly string[] {
  return Object.freeze(Object.keys(state.widgets));
}

export function widgetCount(state: RendererState<unknown>): number {
  return Object.keys(state.widgets).length;
}

export function isPlatform(state: RendererState<unknown>, platform: Platform): boolean {
  return state.platform === platform;
}
