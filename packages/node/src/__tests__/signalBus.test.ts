import assert from "node:assert/strict";
import test from "node:test";
import { type Signal, createSignalOrThrow } from "@unified-ui/core";
import { createSignalBus } from "../signalBus.js";

test("signal bus: exact listeners run before catch-all listeners", () => {
  const bus = createSignalBus();
  const seen: string[] = [];
  bus.on("unified.button.clicked", (signal) => seen.push(`exact:${signal.type}`));
  bus.onAny((signal) => seen.push(`any:${signal.type}`));

  const signal = createSignalOrThrow("click", { widgetId: "save" });
  assert.equal(bus.emit(signal.type, signal), true);
  assert.deepEqual(seen, ["exact:unified.button.clicked", "any:unified.button.clicked"]);
});

test("signal bus: unsubscribe removes the listener", () => {
  const bus = createSignalBus();
  const seen: Signal[] = [];
  const off = bus.on("unified.input.changed", (signal) => seen.push(signal));
  assert.equal(bus.listenerCount("unified.input.changed"), 1);
  off();
  assert.equal(bus.listenerCount("unified.input.changed"), 0);
  const signal = createSignalOrThrow("change", { value: "x" });
  assert.equal(bus.emit(signal.type, signal), false);
  assert.equal(seen.length, 0);
});

test("signal bus: ignores payloads that are not the named signal", () => {
  const bus = createSignalBus();
  let calls = 0;
  bus.onAny(() => {
    calls++;
  });
  const signal = createSignalOrThrow("submit");
  assert.equal(bus.emit("unified.other.event", signal), false);
  assert.equal(bus.emit(signal.type, { type: signal.type }), false);
  assert.equal(calls, 0);
  bus.clear();
  assert.equal(bus.listenerCount(), 0);
});
