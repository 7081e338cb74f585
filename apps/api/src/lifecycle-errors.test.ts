import assert from "node:assert/strict";
import test from "node:test";
import {
  describeLifecycleOutcome,
  errnoCode,
  errorMessage,
  FilesystemError,
  LifecycleError,
  ManagedWithCleanError,
  ManagedWithEnableError
} from "./lifecycle-errors.js";

test("LifecycleError prefixes its message key", () => {
  const error = new LifecycleError("EXTENSIONS_", "NOT_MANAGED", ["acme/a|acme/b"]);

  assert.equal(error.message, "EXTENSIONS_NOT_MANAGED");
  assert.equal(error.messageKey, "EXTENSIONS_NOT_MANAGED");
  assert.deepEqual(error.parameters, ["acme/a|acme/b"]);
  assert.equal(error.cause, undefined);
});

test("partially managed errors carry the extension and backup", () => {
  const cause = new Error("EPERM");
  const clean = new ManagedWithCleanError("EXTENSIONS_", "acme/alpha", "/srv/acme/alpha__backup__", cause);
  const enable = new ManagedWithEnableError("EXTENSIONS_", "acme/alpha");

  assert.equal(clean.messageKey, "EXTENSIONS_MANAGED_WITH_CLEAN_ERROR");
  assert.deepEqual(clean.parameters, ["acme/alpha", "/srv/acme/alpha__backup__"]);
  assert.equal(clean.cause, cause);
  assert.equal(enable.messageKey, "EXTENSIONS_MANAGED_WITH_ENABLE_ERROR");
  assert.ok(enable instanceof LifecycleError);
});

test("describeLifecycleOutcome classifies failures", () => {
  assert.equal(describeLifecycleOutcome(new LifecycleError("X_", "ALREADY_MANAGED", ["a/b"])), "rejected");
  assert.equal(describeLifecycleOutcome(new LifecycleError("X_", "CANNOT_MANAGE_BACKUP_EXISTS", ["a/b", "p"])), "rejected");
  assert.equal(describeLifecycleOutcome(new LifecycleError("X_", "CANNOT_MANAGE_INSTALL_ERROR", ["a/b"])), "rolled_back");
  assert.equal(describeLifecycleOutcome(new LifecycleError("X_", "CANNOT_MANAGE_ROLLBACK_ERROR", ["a/b", "p"])), "failed");
  assert.equal(describeLifecycleOutcome(new ManagedWithEnableError("X_", "a/b")), "partially_managed");
  assert.equal(describeLifecycleOutcome(new Error("boom")), "failed");
});

test("FilesystemError keeps the errno code of its cause", () => {
  const cause = Object.assign(new Error("busy"), { code: "EBUSY" });
  const error = new FilesystemError("rename", ["/a", "/b"], cause);

  assert.equal(error.code, "EBUSY");
  assert.equal(error.message, "cannot rename /a -> /b: EBUSY");
  assert.equal(new FilesystemError("remove", ["/a"], "odd").code, "EUNKNOWN");
});

test("errnoCode and errorMessage read unknown values", () => {
  assert.equal(errnoCode({ code: "ENOENT" }), "ENOENT");
  assert.equal(errnoCode(new Error("x")), null);
  assert.equal(errorMessage(new Error(" spaced ")), "spaced");
  assert.equal(errorMessage("plain"), "plain");
  assert.equal(errorMessage(42), "unknown error");
});
