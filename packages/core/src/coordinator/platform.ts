/**
 * packages/core/src/coordinator/platform.ts — Host platform detection.
 *
 * The core never reads `process.env`; hosts pass their environment in.
 */

import { type Platform, isPlatformName } from "../renderer/state.js";

export type PlatformEnv = Readonly<Record<string, string | undefined>>;

/** Forces the platform when set to a known platform name. */
export const PLATFORM_ENV_KEY = "UNIFIED_UI_PLATFORM";
/** `1` or `true` selects web. */
export const WEB_ENV_KEY = "UNIFIED_UI_WEB";

export const DESKTOP_SESSION_KEYS = Object.freeze([
  "DISPLAY",
  "WAYLAND_DISPLAY",
  "XDG_CURRENT_DESKTOP",
  "XDG_SESSION_TYPE",
  "GNOME_DESKTOP_SESSION_ID",
  "KDE_FULL_SESSION",
  "SESSION_MANAGER",
] as const);

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

function isTruthyFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const flag = value.trim().toLowerCase();
  return flag === "1" || flag === "true";
}

/** Forced platform, then web flag, then any desktop session variable; else terminal. */
export function detectPlatform(env: PlatformEnv = {}): Platform {
  const forced = env[PLATFORM_ENV_KEY]?.trim().toLowerCase();
  if (isPlatformName(forced)) return forced;
  if (isTruthyFlag(env[WEB_ENV_KEY])) return "web";
  if (DESKTOP_SESSION_KEYS.some((key) => isSet(env[key]))) return "desktop";
  return "terminal";
}

export function isTerminal(env: PlatformEnv = {}): boolean {
  return detectPlatform(env) === "terminal";
}

export function isDesktop(env: PlatformEnv = {}): boolean {
  return detectPlatform(env) === "desktop";
}

export function isWeb(env: PlatformEnv = {}): boolean {
  return detectPlatform(env) === "web";
}
