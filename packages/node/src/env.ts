import { type Platform, type PlatformEnv, detectPlatform } from "@unified-ui/core";

/** Platform of the running process, read from `process.env` unless `env` is given. */
export function detectHostPlatform(env: PlatformEnv = process.env): Platform {
  return detectPlatform(env);
}
