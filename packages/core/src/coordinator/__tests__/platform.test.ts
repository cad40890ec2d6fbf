import { assert, describe, test } from "@unified-ui/testkit";
import { detectPlatform, isDesktop, isTerminal, isWeb } from "../platform.js";

describe("detectPlatform", () => {
  test("an empty environment is a terminal", () => {
    assert.equal(detectPlatform(), "terminal");
    assert.equal(detectPlatform({ DISPLAY: "" }), "terminal");
  });

  test("a forced platform is trimmed and case-folded", () => {
    assert.equal(detectPlatform({ UNIFIED_UI_PLATFORM: " Web ", DISPLAY: ":0" }), "web");
    assert.equal(detectPlatform({ UNIFIED_UI_PLATFORM: "tv", DISPLAY: ":0" }), "desktop");
  });

  test("the web flag wins over desktop session keys", () => {
    assert.equal(detectPlatform({ UNIFIED_UI_WEB: "true", DISPLAY: ":0" }), "web");
    assert.equal(detectPlatform({ UNIFIED_UI_WEB: "yes" }), "terminal");
  });

  test("any desktop session key selects desktop", () => {
    assert.equal(detectPlatform({ XDG_SESSION_TYPE: "x11" }), "desktop");
    assert.equal(detectPlatform({ SESSION_MANAGER: "local/host" }), "desktop");
  });

  test("predicates follow detection", () => {
    const env = { UNIFIED_UI_WEB: "1" };
    assert.deepEqual([isTerminal(env), isDesktop(env), isWeb(env)], [false, false, true]);
  });
});
