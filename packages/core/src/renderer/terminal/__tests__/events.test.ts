import { assert, describe, test } from "@unified-ui/testkit";
import { REDACTED } from "../../../security/security.js";
import { buttonClick, formSubmit, inputChange, keyPress, mouseClick, toSignal } from "../events.js";

describe("terminal events", () => {
  test("button clicks and input changes use the standard signals", () => {
    const click = buttonClick("ok", "ok_clicked");
    assert.ok(click.ok);
    assert.equal(click.value.type, "unified.button.clicked");
    assert.equal(click.value.data.widgetId, "ok");
    assert.equal(click.value.data.action, "ok_clicked");
    assert.equal(click.value.source, "/unified_ui/terminal");

    const change = inputChange("name", "Ann");
    assert.ok(change.ok);
    assert.equal(change.value.type, "unified.input.changed");
    assert.deepEqual(change.value.data, { widgetId: "name", value: "Ann", platform: "terminal" });
  });

  test("form submits redact sensitive fields", () => {
    const submit = formSubmit("signup", { user: "ann", password: "placeholder" });
    assert.ok(submit.ok);
    assert.equal(submit.value.type, "unified.form.submitted");
    assert.deepEqual(submit.value.data, {
      formId: "signup",
      data: { user: "ann", password: REDACTED },
      platform: "terminal",
    });
  });

  test("key presses and mouse clicks", () => {
    const key = keyPress("enter", ["ctrl"]);
    assert.ok(key.ok);
    assert.equal(key.value.type, "unified.key.pressed");
    assert.deepEqual(key.value.data, { key: "enter", modifiers: ["ctrl"], platform: "terminal" });

    const mouse = mouseClick("ok");
    assert.ok(mouse.ok);
    assert.equal(mouse.value.type, "unified.mouse.click");
    assert.deepEqual(mouse.value.data, {
      action: "click",
      widgetId: "ok",
      button: "left",
      x: 0,
      y: 0,
      platform: "terminal",
    });
  });

  test("window events are not terminal events", () => {
    assert.deepEqual(toSignal("window", { action: "close" }), { ok: false, error: "unsupported_event" });
  });

  test("the namespace option reaches the signal type", () => {
    const key = keyPress("q", [], { namespace: "editor" });
    assert.equal(key.ok && key.value.type, "editor.key.pressed");
  });
});
