/**
 * packages/node/src/config.ts — Host configuration for the Node coordinator.
 *
 * Why: Bad host settings are a broken setup, not a runtime condition, so
 * every guard here throws `UiError("UI_INVALID_CONFIG")` with the fix in the message.
 */

import {
  DEFAULT_NAMESPACE,
  DEFAULT_RENDER_TIMEOUT_MS,
  PLATFORMS,
  type Platform,
  type PlatformEnv,
  type WarnFn,
  UiError,
  isPlatformName,
  isValidSegment,
  warnDev,
} from "@unified-ui/core";

export type NodeCoordinatorConfig = Readonly<{
  /** Per-platform timeout for concurrent renders. Default 5000. */
  timeoutMs?: number;
  /** Platforms `render` fans out to. Default: all known platforms. */
  platforms?: readonly string[];
  /** First segment of every signal type. Default `"unified"`. */
  namespace?: string;
  /** Environment read for platform detection. Default `process.env`. */
  env?: PlatformEnv;
  warn?: WarnFn;
}>;

export type ResolvedNodeConfig = Readonly<{
  timeoutMs: number;
  platforms: readonly Platform[];
  namespace: string;
  env: PlatformEnv;
  warn: WarnFn;
}>;

function invalidConfig(detail: string): UiError {
  return new UiError("UI_INVALID_CONFIG", `createNodeCoordinator config: ${detail}`);
}

export function parseTimeoutMs(value: unknown): number {
  if (value === undefined) return DEFAULT_RENDER_TIMEOUT_MS;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw invalidConfig(`timeoutMs must be a positive integer (got ${String(value)}).`);
  }
  return value;
}

export function parsePlatforms(value: unknown): readonly Platform[] {
  if (value === undefined) return PLATFORMS;
  if (!Array.isArray(value) || value.length === 0) {
    throw invalidConfig(`platforms must be a non-empty list drawn from ${PLATFORMS.join(", ")}.`);
  }
  const out: Platform[] = [];
  for (const entry of value) {
    if (!isPlatformName(entry)) {
      throw invalidConfig(
        `unknown platform "${String(entry)}". Fix: use one of ${PLATFORMS.join(", ")}.`,
      );
    }
    if (!out.includes(entry)) out.push(entry);
  }
  return Object.freeze(out);
}

export function parseNamespace(value: unknown): string {
  if (value === undefined) return DEFAULT_NAMESPACE;
  if (typeof value !== "string" || !isValidSegment(value)) {
    throw invalidConfig(
      `namespace "${String(value)}" must be one lowercase segment matching ^[a-z][a-z0-9_]*$.`,
    );
  }
  return value;
}

export function resolveNodeConfig(config: NodeCoordinatorConfig = {}): ResolvedNodeConfig {
  return Object.freeze({
    timeoutMs: parseTimeoutMs(config.timeoutMs),
    platforms: parsePlatforms(config.platforms),
    namespace: parseNamespace(config.namespace),
    env: config.env ?? process.env,
    warn: config.warn ?? warnDev,
  });
}
