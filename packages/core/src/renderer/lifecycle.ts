/**
 * packages/core/src/renderer/lifecycle.ts — Shared render/update/destroy contract.
 *
 * Why: All three platforms differ only in how one node converts. The
 * change gating that decides whether an update reconverts, replaces the root
 * or bumps the version lives here once.
 */

import { warnDev, warnPrefix, type WarnFn } from "../devWarn.js";
import { type Result, err, ok } from "../errors.js";
import { deepEqual } from "../internal/equal.js";
import {
  type Platform,
  type RendererConfig,
  type RendererState,
  createRendererState,
  getMetadata,
  putMetadata,
} from "./state.js";

export const LAST_IUR_KEY = "lastIur";

export type RenderError = "render_failed";

export type ConvertFn<Root> = (node: unknown, state?: RendererState<Root>) => Root | null;

export interface Renderer<Root> {
  readonly platform: Platform;
  /** Full conversion into a fresh state at version 0. */
  render(iur: unknown, opts?: RendererConfig): Result<RendererState<Root>, RenderError>;
  /**
   * Returns `state` itself when neither the IUR nor the merged config changed.
   * Otherwise reconverts and bumps the version once if the root or config moved.
   */
  update(
    iur: unknown,
    state: RendererState<Root>,
    opts?: RendererConfig,
  ): Result<RendererState<Root>, RenderError>;
  destroy(state: RendererState<Root>): Result<RendererState<Root>, never>;
  /** Convert one node; `null` for invisible nodes. */
  convert: ConvertFn<Root>;
}

export type CreateRendererOptions<Root> = Readonly<{
  warn?: WarnFn;
  /** Release hook; the default leaves the state untouched. */
  release?: (state: RendererState<Root>) => RendererState<Root>;
}>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createRenderer<Root>(
  platform: Platform,
  convert: ConvertFn<Root>,
  options: CreateRendererOptions<Root> = {},
): Renderer<Root> {
  const warn = options.warn ?? warnDev;

  const safeConvert = (
    iur: unknown,
    state: RendererState<Root>,
  ): Result<Root | null, RenderError> => {
    try {
      return ok(convert(iur, state));
    } catch (error: unknown) {
      warn(`${warnPrefix(platform)} conversion failed: ${describeError(error)}`);
      return err("render_failed");
    }
  };

  return Object.freeze({
    platform,
    convert,

    render(iur: unknown, opts: RendererConfig = {}) {
      const base = createRendererState<Root>(platform, { config: opts });
      const converted = safeConvert(iur, base);
      if (!converted.ok) return converted;
      const state = createRendererState<Root>(platform, {
        root: converted.value,
        config: opts,
        metadata: { [LAST_IUR_KEY]: iur },
      });
      return ok(state);
    },

    update(iur: unknown, state: RendererState<Root>, opts: RendererConfig = {}) {
      const config: RendererConfig = Object.freeze({ ...state.config, ...opts });
      const configChanged = !deepEqual(config, state.config);
      const iurChanged = !deepEqual(iur, getMetadata(state, LAST_IUR_KEY));
      if (!configChanged && !iurChanged) return ok(state);

      const withConfig: RendererState<Root> = Object.freeze({ ...state, config });
      const converted = safeConvert(iur, withConfig);
      if (!converted.ok) return converted;

      const rootChanged = !deepEqual(converted.value, state.root);
      const next: RendererState<Root> = Object.freeze({
        ...withConfig,
        root: rootChanged ? converted.value : state.root,
        version: rootChanged || configChanged ? state.version + 1 : state.version,
      });
      return ok(putMetadata(next, LAST_IUR_KEY, iur));
    },

    destroy(state: RendererState<Root>) {
      return ok(options.release ? options.release(state) : state);
    },
  });
}
