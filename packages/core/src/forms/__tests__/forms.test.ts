import { assert, describe, test } from "@unified-ui/testkit";
import { iur } from "../../iur/factories.js";
import {
  buildFormSubmitPayload,
  collectFormData,
  formInputIds,
  validateEmail,
  validateForm,
  validateFormat,
  validateLength,
  validateRequired,
} from "../forms.js";

const page = iur.vbox([
  iur.textInput({ id: "email", formId: "signup", value: "ann@example.com" }),
  iur.hbox([
    iur.textInput({ id: "password", formId: "signup", inputType: "password", value: "test-secret" }),
    iur.textInput({ id: "nickname", formId: "signup" }),
  ]),
  iur.textInput({ formId: "signup", value: "no id" }),
  iur.textInput({ id: "query", formId: "search", value: "shoes" }),
]);

describe("form collection", () => {
  test("inputs join a form through formId, in tree order", () => {
    assert.deepEqual(formInputIds(page, "signup"), ["email", "password", "nickname"]);
    assert.deepEqual(formInputIds(page, "missing"), []);
  });

  test("values are redacted and unset values read as null", () => {
    assert.deepEqual(collectFormData(page, "signup"), {
      email: "ann@example.com",
      password: "[REDACTED]",
      nickname: null,
    });
    assert.deepEqual(collectFormData(page, "search"), { query: "shoes" });
  });

  test("submit payload merges extra keys last", () => {
    assert.deepEqual(buildFormSubmitPayload("signup", { a: 1 }), { formId: "signup", data: { a: 1 } });
    assert.deepEqual(buildFormSubmitPayload("signup", { a: 1 }, { formId: "other", step: 2 }), {
      formId: "other",
      data: { a: 1 },
      step: 2,
    });
  });
});

describe("validators", () => {
  test("required treats empty, null and absent as missing", () => {
    assert.deepEqual(validateRequired({ a: "x", b: "", c: null }, ["a", "b", "c", "d"]), {
      ok: false,
      error: ["b", "c", "d"],
    });
    assert.deepEqual(validateRequired({ a: 0 }, ["a"]), { ok: true });
  });

  test("email needs one @ and a dotted domain", () => {
    assert.deepEqual(validateEmail({ e: "ann@example.com" }, "e"), { ok: true });
    assert.deepEqual(validateEmail({ e: "ann@localhost" }, "e"), { ok: false, error: "invalid_format" });
    assert.deepEqual(validateEmail({ e: "a@b@c.d" }, "e"), { ok: false, error: "invalid_format" });
    assert.deepEqual(validateEmail({ e: 5 }, "e"), { ok: false, error: "invalid_format" });
    assert.deepEqual(validateEmail({}, "e"), { ok: false, error: "missing" });
  });

  test("length counts code points", () => {
    assert.deepEqual(validateLength({ n: "héé" }, "n", 3, 3), { ok: true });
    assert.deepEqual(validateLength({ n: "ab" }, "n", 3), { ok: false, error: "too_short" });
    assert.deepEqual(validateLength({ n: "abcd" }, "n", 1, 3), { ok: false, error: "too_long" });
    assert.deepEqual(validateLength({ n: 12 }, "n", 1), { ok: false, error: "invalid_type" });
    assert.deepEqual(validateLength({ n: null }, "n", 1), { ok: false, error: "missing" });
  });

  test("format takes a regex or a named pattern", () => {
    assert.deepEqual(validateFormat({ z: "12345-6789" }, "z", "us_zip"), { ok: true });
    assert.deepEqual(validateFormat({ z: "1234" }, "z", "us_zip"), { ok: false, error: "invalid_format" });
    assert.deepEqual(validateFormat({ s: "my-post-1" }, "s", "slug"), { ok: true });
    assert.deepEqual(validateFormat({ s: "x" }, "s", "postcode"), { ok: false, error: "unknown_pattern" });
    assert.deepEqual(validateFormat({ s: 1 }, "s", /x/), { ok: false, error: "invalid_type" });
  });

  test("a global regex gives the same answer on every call", () => {
    const digits = /^\d+$/g;
    assert.deepEqual(validateFormat({ d: "42" }, "d", digits), { ok: true });
    assert.deepEqual(validateFormat({ d: "42" }, "d", digits), { ok: true });
  });
});

describe("validateForm", () => {
  test("each field keeps its first error", () => {
    const result = validateForm({ name: "", email: "nope", user: "ab" }, [
      { kind: "required", field: "name" },
      { kind: "length", field: "name", min: 2 },
      { kind: "email", field: "email" },
      { kind: "format", field: "user", pattern: "username" },
      { kind: "length", field: "user", min: 3, max: 8 },
    ]);
    assert.deepEqual(result, {
      ok: false,
      error: { name: "required", email: "invalid_format", user: "invalid_format" },
    });
  });

  test("passes when every rule holds", () => {
    const result = validateForm({ name: "Ann", user: "ann_01" }, [
      { kind: "required", field: "name" },
      { kind: "format", field: "user", pattern: "username" },
    ]);
    assert.deepEqual(result, { ok: true });
  });
});
