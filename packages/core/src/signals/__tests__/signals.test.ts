import { assert, describe, test } from "@unified-ui/testkit";
import { UiError } from "../../errors.js";
import {
  createSignal,
  createSignalOrThrow,
  isValidSignalType,
  signalType,
  standardSignalNames,
} from "../signals.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("signalType", () => {
  test("maps standard names under a namespace", () => {
    assert.deepEqual(signalType("click"), { ok: true, value: "unified.button.clicked" });
    assert.deepEqual(signalType("select", "shop"), { ok: true, value: "shop.item.selected" });
    assert.deepEqual(signalType("hover"), { ok: false, error: "unknown_signal" });
  });

  test("lists the standard names in order", () => {
    assert.deepEqual(standardSignalNames(), ["click", "change", "submit", "focus", "blur", "select"]);
  });
});

describe("isValidSignalType", () => {
  test("needs three or more lowercase segments", () => {
    assert.equal(isValidSignalType("app.cart.item_added"), true);
    assert.equal(isValidSignalType("a.b.c.d"), true);
    assert.equal(isValidSignalType("app.cart"), false);
    assert.equal(isValidSignalType("App.cart.added"), false);
    assert.equal(isValidSignalType("app..added"), false);
    assert.equal(isValidSignalType("app.2cart.added"), false);
  });
});

describe("createSignal", () => {
  test("builds a frozen signal with defaults", () => {
    const result = createSignal("click", { widgetId: "go" });
    assert.ok(result.ok);
    const signal = result.value;
    assert.equal(signal.type, "unified.button.clicked");
    assert.deepEqual(signal.data, { widgetId: "go" });
    assert.equal(signal.source, "/unified_ui");
    assert.match(signal.id, UUID_V4);
    assert.equal(signal.subject, undefined);
    assert.equal(Number.isNaN(Date.parse(signal.time)), false);
    assert.equal(Object.isFrozen(signal), true);
    assert.equal(Object.isFrozen(signal.data), true);
  });

  test("honors id, source and subject options", () => {
    const result = createSignal("change", {}, { id: "sig-1", source: "/app", subject: "form" });
    assert.ok(result.ok);
    assert.equal(result.value.id, "sig-1");
    assert.equal(result.value.source, "/app");
    assert.equal(result.value.subject, "form");
  });

  test("accepts full types and rejects everything else", () => {
    const custom = createSignal("app.cart.item_added");
    assert.equal(custom.ok && custom.value.type, "app.cart.item_added");
    assert.deepEqual(createSignal("hover"), { ok: false, error: "unknown_signal" });
    assert.deepEqual(createSignal("app.cart"), { ok: false, error: "invalid_type_format" });
    assert.deepEqual(createSignal("click", {}, { namespace: "BAD" }), {
      ok: false,
      error: "invalid_type_format",
    });
  });

  test("ids differ between calls", () => {
    assert.notEqual(createSignalOrThrow("click").id, createSignalOrThrow("click").id);
  });
});

describe("createSignalOrThrow", () => {
  test("throws UI_INVALID_SIGNAL with the reason", () => {
    assert.throws(
      () => createSignalOrThrow("hover"),
      (error: unknown) =>
        error instanceof UiError &&
        error.code === "UI_INVALID_SIGNAL" &&
        error.message === 'Failed to create signal "hover": unknown_signal',
    );
  });
});
