import { assert, describe, test } from "@unified-ui/testkit";
import { type Signal, createSignalOrThrow } from "../../signals/signals.js";
import { deliver, isDispatchTarget } from "../targets.js";

const clicked = createSignalOrThrow("click", { widgetId: "ok" });

function noAsyncErrors(message: string): void {
  assert.fail(`unexpected async error: ${message}`);
}

describe("deliver", () => {
  test("emitters receive the signal under its type", () => {
    const seen: unknown[][] = [];
    const emitter = { emit: (eventName: string, ...args: unknown[]) => seen.push([eventName, ...args]) };
    assert.deepEqual(deliver(emitter, clicked, noAsyncErrors), { ok: true });
    assert.deepEqual(seen, [["unified.button.clicked", clicked]]);
  });

  test("callbacks get the signal only when they declare a parameter", () => {
    const calls: unknown[][] = [];
    deliver((...args: unknown[]) => calls.push(args), clicked, noAsyncErrors);
    deliver((signal: Signal) => calls.push([signal.type]), clicked, noAsyncErrors);
    assert.deepEqual(calls, [[], ["unified.button.clicked"]]);
  });

  test("remote calls append the signal after the fixed arguments", () => {
    const calls: unknown[][] = [];
    const module = {
      record(prefix: string, signal: Signal) {
        calls.push([prefix, signal.type]);
      },
    };
    const delivered = deliver({ module, fn: "record", args: ["audit"] }, clicked, noAsyncErrors);
    assert.ok(delivered.ok);
    assert.deepEqual(calls, [["audit", "unified.button.clicked"]]);
  });

  test("unsupported shapes are invalid targets at the given index", () => {
    const twoArgs = (_a: unknown, _b: unknown) => undefined;
    assert.deepEqual(deliver(twoArgs, clicked, noAsyncErrors, 3), {
      ok: false,
      error: { reason: "invalid_target", index: 3 },
    });
    assert.deepEqual(deliver({ module: {}, fn: "missing" }, clicked, noAsyncErrors), {
      ok: false,
      error: { reason: "invalid_target", index: 0 },
    });
    assert.deepEqual(deliver({ module: { f() {} }, fn: "f", args: "x" }, clicked, noAsyncErrors), {
      ok: false,
      error: { reason: "invalid_target", index: 0 },
    });
    assert.deepEqual(deliver(42, clicked, noAsyncErrors), {
      ok: false,
      error: { reason: "invalid_target", index: 0 },
    });
  });

  test("a throwing consumer is a delivery failure with its message", () => {
    const delivered = deliver(
      () => {
        throw new Error("consumer down");
      },
      clicked,
      noAsyncErrors,
    );
    assert.deepEqual(delivered, {
      ok: false,
      error: { reason: "delivery_failed", index: 0, message: "consumer down" },
    });
  });

  test("a rejected promise is reported asynchronously", async () => {
    const messages: string[] = [];
    const delivered = deliver(() => Promise.reject(new Error("late")), clicked, (message) => messages.push(message));
    assert.ok(delivered.ok);
    assert.deepEqual(messages, []);
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(messages, ["async delivery of unified.button.clicked failed: late"]);
  });
});

describe("isDispatchTarget", () => {
  test("accepts the three target shapes", () => {
    assert.equal(isDispatchTarget({ emit: () => true }), true);
    assert.equal(isDispatchTarget(() => undefined), true);
    assert.equal(isDispatchTarget({ module: {}, fn: "run" }), true);
  });

  test("rejects everything else", () => {
    assert.equal(isDispatchTarget((_a: unknown, _b: unknown) => undefined), false);
    assert.equal(isDispatchTarget({ fn: "run" }), false);
    assert.equal(isDispatchTarget(null), false);
    assert.equal(isDispatchTarget("emit"), false);
  });
});
