import assert from "node:assert/strict";
import test from "node:test";
import { BACKUP_SUFFIX, IO_VERBOSITY, isRecord } from "./index.js";

test("isRecord accepts plain objects only", () => {
  assert.equal(isRecord({ name: "acme/alpha" }), true);
  assert.equal(isRecord({}), true);
  assert.equal(isRecord(null), false);
  assert.equal(isRecord(["acme/alpha"]), false);
  assert.equal(isRecord("acme/alpha"), false);
});

test("verbosity levels increase from quiet to debug", () => {
  const ordered = [
    IO_VERBOSITY.quiet,
    IO_VERBOSITY.normal,
    IO_VERBOSITY.verbose,
    IO_VERBOSITY.veryVerbose,
    IO_VERBOSITY.debug
  ];
  assert.deepEqual([...ordered].sort((left, right) => left - right), ordered);
  assert.equal(new Set(ordered).size, ordered.length);
});

test("backup directories carry a fixed suffix", () => {
  assert.equal(BACKUP_SUFFIX, "__backup__");
});
