import { assert, describe, test } from "@unified-ui/testkit";
import { compareValues, getRowValue, sortRows } from "../sort.js";

const rows = [
  { name: "b", qty: 2 },
  { name: "a", qty: null },
  { name: "c", qty: 1 },
  { name: "d", qty: 2 },
];

describe("sortRows", () => {
  test("ascending puts missing values first and keeps ties in input order", () => {
    assert.deepEqual(
      sortRows(rows, "qty", "asc").map((row) => row.name),
      ["a", "c", "b", "d"],
    );
  });

  test("descending puts missing values last and keeps ties in input order", () => {
    assert.deepEqual(
      sortRows(rows, "qty", "desc").map((row) => row.name),
      ["b", "d", "c", "a"],
    );
  });

  test("pair-list rows sort by their keyed value", () => {
    const pairRows = [
      [
        ["name", "x"],
        ["qty", 3],
      ],
      [
        ["name", "y"],
        ["qty", 1],
      ],
    ] as const;
    assert.deepEqual(
      sortRows(pairRows, "qty").map((row) => getRowValue(row, "name")),
      ["y", "x"],
    );
  });

  test("no key or no rows returns the input unchanged", () => {
    assert.equal(sortRows(rows, null), rows);
    assert.equal(sortRows(rows, undefined), rows);
    const empty: { name: string }[] = [];
    assert.equal(sortRows(empty, "name"), empty);
  });

  test("does not reorder the input", () => {
    sortRows(rows, "name", "desc");
    assert.deepEqual(
      rows.map((row) => row.name),
      ["b", "a", "c", "d"],
    );
  });
});

describe("compareValues", () => {
  test("numbers, booleans and NaN", () => {
    assert.equal(compareValues(1, 3) < 0, true);
    assert.equal(compareValues(Number.NaN, 1), 1);
    assert.equal(compareValues(1, Number.NaN), -1);
    assert.equal(compareValues(Number.NaN, Number.NaN), 0);
    assert.equal(compareValues(true, false), 1);
  });

  test("mixed kinds compare by text", () => {
    assert.equal(compareValues(1, "1"), 0);
    assert.equal(compareValues("10", "9"), -1);
    assert.equal(compareValues({ a: 2 }, { a: 1 }), 1);
  });
});

describe("getRowValue", () => {
  test("reads records and pair lists", () => {
    assert.equal(getRowValue({ a: 1 }, "a"), 1);
    assert.equal(getRowValue([["a", 2]], "a"), 2);
    assert.equal(getRowValue([["a", 2]], "b"), undefined);
    assert.equal(getRowValue("row", "a"), undefined);
  });
});
