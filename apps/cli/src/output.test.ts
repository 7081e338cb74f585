import assert from "node:assert/strict";
import test from "node:test";
import { ApiRequestError } from "./lib/http.js";
import { formatError, outputLines } from "./lib/output.js";

test("outputLines keeps only string progress lines", () => {
  assert.deepEqual(outputLines({ output: ["Disabling extensions…", 3, "Enabling extensions…"] }), [
    "Disabling extensions…",
    "Enabling extensions…"
  ]);
  assert.deepEqual(outputLines({ status: "ok" }), []);
  assert.deepEqual(outputLines(null), []);
});

test("formatError prefers the translated api message and its code", () => {
  const error = new ApiRequestError("POST", "http://127.0.0.1:3001/api/packages/remove", 404, {
    status: "error",
    code: "NOT_INSTALLED",
    message: "These extensions are not installed: acme/ghost"
  });

  assert.equal(formatError(error), "These extensions are not installed: acme/ghost [NOT_INSTALLED]");
});

test("formatError falls back to the raw response body", () => {
  const error = new ApiRequestError("GET", "http://127.0.0.1:3001/api/health", 502, "Bad Gateway");

  assert.equal(formatError(error), "HTTP 502 for GET http://127.0.0.1:3001/api/health: Bad Gateway");
  assert.equal(formatError(new Error("request aborted")), "request aborted");
  assert.equal(formatError("plain"), "plain");
});
