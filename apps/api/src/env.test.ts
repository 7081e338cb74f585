import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { IO_VERBOSITY } from "@steward/sdk";
import { loadStewardEnv } from "./env.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const root = await mkdtemp(path.join(tmpdir(), "steward-env-test-"));
  try {
    await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

test("loadStewardEnv applies defaults relative to the workspace root", async () => {
  await withTempDir(async (root) => {
    await writeFile(path.join(root, "package.json"), JSON.stringify({ name: "fixture", workspaces: ["apps/*"] }), "utf8");
    const cwd = path.join(root, "apps", "api");
    await mkdir(cwd, { recursive: true });

    const env = loadStewardEnv({}, cwd);

    assert.equal(env.WORKSPACE_ROOT, root);
    assert.equal(env.DATA_DIR, path.join(root, ".data"));
    assert.equal(env.EXTENSIONS_DIR, path.join(root, "extensions"));
    assert.equal(env.PACKAGE_REPOSITORY_DIR, path.join(root, "repository"));
    assert.equal(env.PORT, 3001);
    assert.equal(env.PACKAGE_TYPE, "steward-extension");
    assert.equal(env.EXCEPTION_PREFIX, "EXTENSIONS_");
    assert.equal(env.ENABLE_ON_INSTALL, false);
    assert.equal(env.PURGE_ON_REMOVE, false);
    assert.equal(env.IO_VERBOSITY, IO_VERBOSITY.normal);
    assert.equal(env.RBAC.mode, "disabled");
  });
});

test("loadStewardEnv converts flags and keeps absolute directories", async () => {
  await withTempDir(async (root) => {
    const env = loadStewardEnv(
      {
        PORT: "4010",
        DATA_DIR: path.join(root, "state"),
        ENABLE_ON_INSTALL: "true",
        PURGE_ON_REMOVE: "true",
        IO_VERBOSITY: "very-verbose",
        EXTENSION_RBAC_MODE: "header",
        EXTENSION_RBAC_HEADER_SECRET: "  test-secret  "
      },
      root
    );

    assert.equal(env.PORT, 4010);
    assert.equal(env.DATA_DIR, path.join(root, "state"));
    assert.equal(env.ENABLE_ON_INSTALL, true);
    assert.equal(env.PURGE_ON_REMOVE, true);
    assert.equal(env.IO_VERBOSITY, IO_VERBOSITY.veryVerbose);
    assert.deepEqual(env.RBAC.header, { secret: "test-secret" });
  });
});

test("loadStewardEnv rejects unsafe RBAC settings", () => {
  assert.throws(
    () => loadStewardEnv({ HOST: "0.0.0.0", EXTENSION_RBAC_MODE: "header", EXTENSION_RBAC_HEADER_SECRET: "test-secret" }, tmpdir()),
    /requires loopback HOST/
  );
  assert.throws(() => loadStewardEnv({ EXTENSION_RBAC_MODE: "header" }, tmpdir()), /requires EXTENSION_RBAC_HEADER_SECRET/);
  assert.throws(() => loadStewardEnv({ EXTENSION_RBAC_MODE: "jwt" }, tmpdir()), /requires EXTENSION_RBAC_JWT_SECRET/);
  assert.doesNotThrow(() =>
    loadStewardEnv({ HOST: "0.0.0.0", EXTENSION_RBAC_MODE: "header", EXTENSION_ALLOW_INSECURE_HEADER_MODE: "true" }, tmpdir())
  );
});

test("loadStewardEnv rejects unknown verbosity names", () => {
  assert.throws(() => loadStewardEnv({ IO_VERBOSITY: "loud" }, tmpdir()));
});
