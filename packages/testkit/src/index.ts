export { readFixture, readJsonFixture } from "./fixtures.js";
export { assert, describe, test } from "./nodeTest.js";
