/**
 * packages/testkit/src/fixtures.ts — Fixture files shared by package tests.
 *
 * Fixtures live under `packages/testkit/fixtures/`; paths are relative to it.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const FIXTURES_ROOT = fileURLToPath(new URL("../fixtures/", import.meta.url));

function resolveFixturePath(relPath: string): string {
  const normalized = path.normalize(relPath);
  if (path.isAbsolute(normalized) || normalized.split(path.sep).includes("..")) {
    throw new Error(`readFixture: path must stay inside the fixtures directory: "${relPath}"`);
  }
  return path.join(FIXTURES_ROOT, normalized);
}

export async function readFixture(relPath: string): Promise<Uint8Array> {
  return await readFile(resolveFixturePath(relPath));
}

/** Parsed JSON; callers narrow the value themselves. */
export async function readJsonFixture(relPath: string): Promise<unknown> {
  const bytes = await readFixture(relPath);
  const parsed: unknown = JSON.parse(new TextDecoder().decode(bytes));
  return parsed;
}
