/**
 * packages/core/src/devWarn.ts — Development-only warning sink.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

/** Injectable warning callback accepted by builder, renderers and coordinator. */
export type WarnFn = (message: string) => void;

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function warnPrefix(area: string): string {
  return `[unified-ui][${area}]`;
}
