import { assert, describe, test } from "@unified-ui/testkit";
import { deepEqual, deepMerge } from "../equal.js";

describe("deepEqual", () => {
  test("undefined-valued keys count as absent", () => {
    assert.equal(deepEqual({ a: 1 }, { a: 1, b: undefined }), true);
    assert.equal(deepEqual({ a: 1 }, { a: 1, b: null }), false);
  });

  test("arrays compare element-wise and never equal records", () => {
    assert.equal(deepEqual([1, [2, { x: "y" }]], [1, [2, { x: "y" }]]), true);
    assert.equal(deepEqual([1, 2], [2, 1]), false);
    assert.equal(deepEqual([1], { 0: 1 }), false);
  });

  test("NaN equals NaN; functions compare by reference", () => {
    const f = (): number => 1;
    const g = (): number => 1;
    assert.equal(deepEqual(Number.NaN, Number.NaN), true);
    assert.equal(deepEqual(f, f), true);
    assert.equal(deepEqual(f, g), false);
  });

  test("different prototypes are unequal", () => {
    assert.equal(deepEqual(new Date(0), {}), false);
  });
});

describe("deepMerge", () => {
  test("records merge recursively and everything else is replaced", () => {
    const merged = deepMerge({ a: { x: 1, y: 2 }, b: [1] }, { a: { y: 3 }, b: [2], c: null });
    assert.deepEqual(merged, { a: { x: 1, y: 3 }, b: [2], c: null });
    assert.equal(Object.isFrozen(merged), true);
  });

  test("a record replaces a scalar", () => {
    assert.deepEqual(deepMerge({ a: 1 }, { a: { b: 2 } }), { a: { b: 2 } });
  });

  test("a parsed __proto__ key stays an own key and leaves the prototype alone", () => {
    const incoming: Record<string, unknown> = JSON.parse('{"__proto__":{"isAdmin":true},"name":"b"}');
    const merged = deepMerge({ name: "a" }, incoming);
    assert.deepEqual(Object.keys(merged), ["name", "__proto__"]);
    assert.equal(Object.getPrototypeOf(merged), Object.prototype);
    assert.equal("isAdmin" in merged, false);
    assert.equal(merged.name, "b");
    assert.deepEqual(Object.getOwnPropertyDescriptor(merged, "__proto__")?.value, { isAdmin: true });
  });

  test("nested __proto__ keys do not leak inherited values", () => {
    const incoming: Record<string, unknown> = JSON.parse('{"settings":{"__proto__":{"x":1}}}');
    const merged = deepMerge({ settings: { theme: "dark" } }, incoming);
    const settings = merged.settings;
    if (typeof settings !== "object" || settings === null) return assert.fail("settings missing");
    assert.deepEqual(Object.keys(settings), ["theme", "__proto__"]);
    assert.equal("x" in settings, false);
  });

  test("constructor and prototype keys merge like any other key", () => {
    const merged = deepMerge({ constructor: { a: 1 } }, { constructor: { b: 2 }, prototype: 3 });
    assert.deepEqual(Object.keys(merged), ["constructor", "prototype"]);
    assert.deepEqual(merged.constructor, { a: 1, b: 2 });
    assert.equal(merged.prototype, 3);
  });
});
