import { assert, describe, test } from "@unified-ui/testkit";
import { UiError } from "../../errors.js";
import {
  bumpVersion,
  createRendererState,
  deleteWidget,
  getConfig,
  getMetadata,
  getRootOrThrow,
  getWidget,
  hasWidget,
  isPlatform,
  isPlatformName,
  putConfig,
  putMetadata,
  putRoot,
  putWidget,
  widgetCount,
  widgetIds,
} from "../state.js";

describe("renderer state", () => {
  test("starts empty at version 0", () => {
    const state = createRendererState<string>("web");
    assert.deepEqual(state, {
      platform: "web",
      root: null,
      config: {},
      version: 0,
      metadata: {},
      widgets: {},
    });
    assert.equal(Object.isFrozen(state), true);
    assert.equal(isPlatform(state, "web"), true);
    assert.equal(isPlatform(state, "terminal"), false);
  });

  test("helpers return new states and leave the input alone", () => {
    const state = createRendererState<string>("terminal", { config: { theme: "dark" } });
    const next = bumpVersion(putRoot(putConfig(state, "width", 80), "out"));
    assert.equal(next.version, 1);
    assert.equal(next.root, "out");
    assert.equal(getConfig(next, "width"), 80);
    assert.equal(getConfig(next, "theme"), "dark");
    assert.equal(getConfig(next, "missing", "fallback"), "fallback");
    assert.equal(state.version, 0);
    assert.equal(state.root, null);
    assert.equal(getConfig(state, "width"), undefined);
  });

  test("metadata reads fall back when unset", () => {
    const state = putMetadata(createRendererState("desktop"), "lastIur", { type: "text" });
    assert.deepEqual(getMetadata(state, "lastIur"), { type: "text" });
    assert.equal(getMetadata(state, "other", 0), 0);
  });

  test("getRootOrThrow needs a rendered root", () => {
    assert.equal(getRootOrThrow(createRendererState("web", { root: "<p></p>" })), "<p></p>");
    assert.throws(
      () => getRootOrThrow(createRendererState("desktop")),
      (error: unknown) =>
        error instanceof UiError &&
        error.code === "UI_ELEMENT_NOT_FOUND" &&
        error.message === 'No root rendered for platform "desktop"',
    );
  });
});

describe("widget registry", () => {
  test("put, get, delete and list by id", () => {
    let state = createRendererState("desktop");
    state = putWidget(state, "save", { kind: "button" });
    state = putWidget(state, "name", { kind: "input" });
    assert.equal(hasWidget(state, "save"), true);
    assert.deepEqual(getWidget(state, "save"), { kind: "button" });
    assert.deepEqual(widgetIds(state), ["save", "name"]);
    assert.equal(widgetCount(state), 2);

    const trimmed = deleteWidget(state, "save");
    assert.deepEqual(widgetIds(trimmed), ["name"]);
    assert.equal(getWidget(trimmed, "save"), undefined);
    assert.equal(deleteWidget(trimmed, "save"), trimmed);
  });

  test("inherited names are not widgets", () => {
    const state = createRendererState("web");
    assert.equal(hasWidget(state, "toString"), false);
    assert.equal(getWidget(state, "toString"), undefined);
  });
});

describe("isPlatformName", () => {
  test("accepts only known platforms", () => {
    assert.equal(isPlatformName("terminal"), true);
    assert.equal(isPlatformName("mobile"), false);
    assert.equal(isPlatformName(1), false);
  });
});
