import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { tmpdir } from "node:os";
import test from "node:test";
import { parseJsonInput, parsePackageArgs, resolvePackagesBody } from "./lib/body.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const root = await mkdtemp(path.join(tmpdir(), "cli-body-test-"));
  try {
    await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

test("parsePackageArgs sends bare ids as a list", () => {
  assert.deepEqual(parsePackageArgs(["acme/alpha", " acme/beta "]), { packages: ["acme/alpha", "acme/beta"] });
});

test("parsePackageArgs switches to a constraint map when any id has one", () => {
  assert.deepEqual(parsePackageArgs(["acme/alpha@^1.2", "acme/beta"]), {
    packages: { "acme/alpha": "^1.2", "acme/beta": "" }
  });
});

test("parsePackageArgs rejects empty ids, duplicates and empty input", () => {
  assert.throws(() => parsePackageArgs(["@^1"]), /package id is missing in "@\^1"/);
  assert.throws(() => parsePackageArgs(["acme/alpha", "acme/alpha@2"]), /package acme\/alpha is listed more than once/);
  assert.throws(() => parsePackageArgs(["  "]), /at least one package id is required/);
});

test("parseJsonInput reads inline json and @file references", async () => {
  await withTempDir(async (root) => {
    const file = path.join(root, "packages.json");
    await writeFile(file, JSON.stringify({ "acme/alpha": "~2.0" }), "utf8");

    assert.deepEqual(await parseJsonInput('["acme/alpha"]'), ["acme/alpha"]);
    assert.deepEqual(await parseJsonInput(`@${file}`), { "acme/alpha": "~2.0" });
    await assert.rejects(parseJsonInput("   "), /json input is empty/);
  });
});

test("resolvePackagesBody accepts lists and constraint maps from json", async () => {
  assert.deepEqual(await resolvePackagesBody([], '["acme/alpha","acme/beta"]'), {
    packages: ["acme/alpha", "acme/beta"]
  });
  assert.deepEqual(await resolvePackagesBody([], '{"acme/alpha":">=1 <3"}'), {
    packages: { "acme/alpha": ">=1 <3" }
  });
  assert.deepEqual(await resolvePackagesBody(["acme/alpha@2.x"], undefined), {
    packages: { "acme/alpha": "2.x" }
  });
});

test("resolvePackagesBody rejects mixed sources and malformed json", async () => {
  await assert.rejects(resolvePackagesBody(["acme/alpha"], "[]"), /mutually exclusive/);
  await assert.rejects(resolvePackagesBody([], '{"acme/alpha":2}'), /constraint for acme\/alpha must be a string/);
  await assert.rejects(resolvePackagesBody([], '"acme/alpha"'), /must be a list of ids or an id => constraint map/);
});
