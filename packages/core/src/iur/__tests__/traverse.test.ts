import { assert, describe, test } from "@unified-ui/testkit";
import { UiError } from "../../errors.js";
import { createStyle } from "../../style/style.js";
import { iur } from "../factories.js";
import {
  collectStyles,
  countByType,
  countElements,
  findById,
  findByIdOrThrow,
  getAllIds,
  traverseIur,
  validateIur,
} from "../traverse.js";

const bold = createStyle({ attrs: ["bold"] });

const tree = iur.vbox(
  [
    iur.text("Title", { id: "title", style: bold }),
    iur.hbox([iur.textInput({ id: "name" }), iur.button("Go", { id: "go" })], { id: "row" }),
  ],
  { id: "root" },
);

describe("traverseIur", () => {
  test("pre-order visits parents first", () => {
    const order = traverseIur<string[]>(tree, (el, acc) => [...acc, el.id ?? el.type], []);
    assert.deepEqual(order, ["root", "title", "row", "name", "go"]);
  });

  test("post-order visits children first", () => {
    const order = traverseIur<string[]>(tree, (el, acc) => [...acc, el.id ?? el.type], [], {
      order: "post",
    });
    assert.deepEqual(order, ["title", "name", "go", "row", "root"]);
  });

  test("non-elements are skipped", () => {
    assert.equal(traverseIur(undefined, (_el, acc: number) => acc + 1, 0), 0);
  });
});

describe("queries", () => {
  test("findById returns the first match or null", () => {
    assert.equal(findById(tree, "go")?.type, "button");
    assert.equal(findById(tree, "missing"), null);
  });

  test("findByIdOrThrow throws UI_ELEMENT_NOT_FOUND", () => {
    assert.throws(
      () => findByIdOrThrow(tree, "missing"),
      (error: unknown) =>
        error instanceof UiError &&
        error.code === "UI_ELEMENT_NOT_FOUND" &&
        error.message === 'Element with id "missing" not found',
    );
  });

  test("counts and ids", () => {
    assert.equal(countElements(tree), 5);
    assert.deepEqual(countByType(tree), { vbox: 1, text: 1, hbox: 1, textInput: 1, button: 1 });
    assert.deepEqual(getAllIds(tree), ["root", "title", "row", "name", "go"]);
    assert.deepEqual(collectStyles(tree), [bold]);
  });
});

describe("validateIur", () => {
  test("a clean tree passes", () => {
    assert.deepEqual(validateIur(tree), { ok: true });
  });

  test("reports every issue kind once", () => {
    const bad = iur.vbox([
      iur.text("a", { id: "dup" }),
      iur.text("b", { id: "dup" }),
      iur.textInput(),
      iur.hbox([]),
    ]);
    assert.deepEqual(validateIur(bad), {
      ok: false,
      error: ["duplicate_id", "missing_id_on_text_input", "empty_layout"],
    });
  });
});
