import assert from "node:assert/strict";
import test from "node:test";
import { detectHostPlatform } from "../env.js";

test("detectHostPlatform: forced platform wins over session variables", () => {
  assert.equal(detectHostPlatform({ UNIFIED_UI_PLATFORM: "web", DISPLAY: ":0" }), "web");
});

test("detectHostPlatform: web flag accepts 1 and true", () => {
  assert.equal(detectHostPlatform({ UNIFIED_UI_WEB: "1" }), "web");
  assert.equal(detectHostPlatform({ UNIFIED_UI_WEB: "TRUE" }), "web");
  assert.equal(detectHostPlatform({ UNIFIED_UI_WEB: "0" }), "terminal");
});

test("detectHostPlatform: any desktop session variable selects desktop", () => {
  assert.equal(detectHostPlatform({ WAYLAND_DISPLAY: "wayland-0" }), "desktop");
  assert.equal(detectHostPlatform({ KDE_FULL_SESSION: "true" }), "desktop");
});

test("detectHostPlatform: empty values and unknown overrides fall back to terminal", () => {
  assert.equal(detectHostPlatform({ DISPLAY: "", UNIFIED_UI_PLATFORM: "mobile" }), "terminal");
  assert.equal(detectHostPlatform({}), "terminal");
});
