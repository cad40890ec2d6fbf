import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_NAMESPACE, PLATFORMS, UiError } from "@unified-ui/core";
import { parseNamespace, parsePlatforms, parseTimeoutMs, resolveNodeConfig } from "../config.js";

function assertInvalidConfig(run: () => unknown, message: RegExp): void {
  assert.throws(run, (error: unknown) => {
    assert.ok(error instanceof UiError);
    assert.equal(error.code, "UI_INVALID_CONFIG");
    assert.match(error.message, message);
    return true;
  });
}

test("config guard: defaults apply when nothing is set", () => {
  const warn = (): void => {};
  const resolved = resolveNodeConfig({ env: {}, warn });
  assert.equal(resolved.timeoutMs, 5000);
  assert.deepEqual(resolved.platforms, PLATFORMS);
  assert.equal(resolved.namespace, DEFAULT_NAMESPACE);
  assert.deepEqual(resolved.env, {});
  assert.equal(resolved.warn, warn);
});

test("config guard: timeoutMs must be a positive integer", () => {
  assert.equal(parseTimeoutMs(250), 250);
  assertInvalidConfig(() => parseTimeoutMs(0), /timeoutMs must be a positive integer \(got 0\)/);
  assertInvalidConfig(() => parseTimeoutMs(-5), /got -5/);
  assertInvalidConfig(() => parseTimeoutMs(1.5), /got 1.5/);
  assertInvalidConfig(() => parseTimeoutMs("100"), /got 100/);
});

test("config guard: platforms must be a non-empty known subset", () => {
  assert.deepEqual(parsePlatforms(["web", "terminal", "web"]), ["web", "terminal"]);
  assertInvalidConfig(() => parsePlatforms([]), /non-empty list/);
  assertInvalidConfig(() => parsePlatforms("web"), /non-empty list/);
  assertInvalidConfig(
    () => parsePlatforms(["terminal", "mobile"]),
    /unknown platform "mobile"\. Fix: use one of terminal, desktop, web\./,
  );
});

test("config guard: namespace must be a single signal segment", () => {
  assert.equal(parseNamespace("my_app"), "my_app");
  assertInvalidConfig(() => parseNamespace("My.App"), /namespace "My\.App"/);
  assertInvalidConfig(() => parseNamespace("1app"), /namespace "1app"/);
  assertInvalidConfig(() => parseNamespace(""), /namespace ""/);
});

test("config guard: resolveNodeConfig reports the first bad field", () => {
  assertInvalidConfig(() => resolveNodeConfig({ timeoutMs: 0, namespace: "Bad" }), /timeoutMs/);
});
