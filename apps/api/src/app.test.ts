import assert from "node:assert/strict";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import type { StewardLogger } from "@steward/sdk";
import { buildApp } from "./app.js";
import { ExtensionAuditStore, type ExtensionAuditRecord } from "./extension-audit-store.js";
import { MANIFEST_FILENAME } from "./extension-manifest.js";
import { ExtensionManager } from "./extension-manager.js";
import type { RbacConfig } from "./extension-rbac.js";
import { FileExtensionRegistry } from "./extension-registry.js";
import { NodeFilesystemOperator } from "./filesystem-operator.js";
import { loadMessageCatalog } from "./message-catalog.js";
import { LocalPackageInstaller } from "./package-installer.js";

const noop = (): void => {};
const logger: StewardLogger = { debug: noop, info: noop, warn: noop, error: noop };

type ErrorBody = {
  status: string;
  code: string;
  messageKey?: string;
  message: string;
  parameters?: Array<string>;
  outcome: string;
  output: Array<string>;
};

async function writeManifest(directory: string, manifest: Record<string, unknown>): Promise<void> {
  await mkdir(directory, { recursive: true });
  await writeFile(path.join(directory, MANIFEST_FILENAME), JSON.stringify(manifest), "utf8");
}

async function withApp(
  rbac: RbacConfig,
  fn: (fixture: {
    app: ReturnType<typeof buildApp>;
    registry: FileExtensionRegistry;
    extensionsDir: string;
  }) => Promise<void>
): Promise<void> {
  const root = await mkdtemp(path.join(tmpdir(), "steward-app-test-"));
  const repositoryDir = path.join(root, "repository");
  const extensionsDir = path.join(root, "extensions");
  const dataDir = path.join(root, "data");

  await writeManifest(path.join(repositoryDir, "acme", "alpha", "1.0.0"), { name: "acme/alpha", version: "1.0.0" });
  await writeManifest(path.join(repositoryDir, "acme", "alpha", "2.0.0"), { name: "acme/alpha", version: "2.0.0" });
  await writeManifest(path.join(repositoryDir, "acme", "manual", "1.0.0"), { name: "acme/manual", version: "1.0.0" });
  await writeManifest(path.join(repositoryDir, "acme", "skin", "1.0.0"), {
    name: "acme/skin",
    version: "1.0.0",
    type: "theme"
  });
  await writeManifest(path.join(extensionsDir, "acme", "manual"), { name: "acme/manual", version: "0.9.0" });

  const filesystem = new NodeFilesystemOperator();
  const registry = new FileExtensionRegistry({ extensionsDir, dataDir, hostVersion: "1.0.0", logger });
  const installer = new LocalPackageInstaller({
    repositoryDir,
    extensionsDir,
    dataDir,
    defaultType: "steward-extension",
    filesystem,
    logger
  });
  const services = {
    registry,
    manager: new ExtensionManager({
      installer,
      registry,
      filesystem,
      packageType: "steward-extension",
      exceptionPrefix: "EXTENSIONS_",
      logger
    }),
    auditStore: new ExtensionAuditStore({ dataDir, logger }),
    catalog: loadMessageCatalog()
  };

  const app = buildApp({ logLevel: false, rbac, services: () => services });
  try {
    await fn({ app, registry, extensionsDir });
  } finally {
    await app.close();
    await rm(root, { recursive: true, force: true });
  }
}

test("GET /api/health reports ok", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({ method: "GET", url: "/api/health" });

    assert.equal(response.statusCode, 200);
    assert.equal(response.json<{ status: string }>().status, "ok");
  });
});

test("POST /api/packages/install installs and reports progress", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      payload: { packages: ["acme/alpha"] }
    });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), {
      status: "ok",
      result: { operation: "install", packages: ["acme/alpha"], failures: [] },
      output: ["Installing acme/alpha (2.0.0)"]
    });

    const managed = await app.inject({ method: "GET", url: "/api/packages/managed" });
    const data = managed.json<{ data: Array<{ id: string; version: string; constraint: string }> }>().data;
    assert.deepEqual(
      data.map((entry) => [entry.id, entry.version, entry.constraint]),
      [["acme/alpha", "2.0.0", "*"]]
    );

    const extensions = await app.inject({ method: "GET", url: "/api/extensions" });
    const listed = extensions.json<{ data: Array<{ id: string; enabled: boolean; managed: boolean }> }>().data;
    assert.deepEqual(
      listed.map((entry) => [entry.id, entry.enabled, entry.managed]),
      [
        ["acme/alpha", false, true],
        ["acme/manual", false, false]
      ]
    );
  });
});

test("POST /api/packages/update with a constraint reports the version change", async () => {
  await withApp({ mode: "disabled" }, async ({ app, registry }) => {
    await app.inject({ method: "POST", url: "/api/packages/install", payload: { packages: ["acme/alpha"] } });
    await registry.enable("acme/alpha");

    const response = await app.inject({
      method: "POST",
      url: "/api/packages/update",
      payload: { packages: { "acme/alpha": "^1" } }
    });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json<{ output: Array<string> }>().output, [
      "Disabling extensions…",
      "Updating acme/alpha (2.0.0 => 1.0.0)",
      "Enabling extensions…"
    ]);
    assert.equal(await registry.isEnabled("acme/alpha"), true);
  });
});

test("installing a manually present extension is rejected with a translated message", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      payload: { packages: ["acme/manual"] }
    });

    assert.equal(response.statusCode, 409);
    const body = response.json<ErrorBody>();
    assert.equal(body.code, "ALREADY_INSTALLED_MANUALLY");
    assert.equal(body.messageKey, "EXTENSIONS_ALREADY_INSTALLED_MANUALLY");
    assert.equal(
      body.message,
      "These extensions were installed manually and must be managed before they can be installed: acme/manual"
    );
    assert.deepEqual(body.parameters, ["acme/manual"]);
    assert.equal(body.outcome, "rejected");
  });
});

test("POST /api/packages/remove rejects extensions that are not installed", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({
      method: "POST",
      url: "/api/packages/remove",
      payload: { packages: ["acme/ghost"] }
    });

    assert.equal(response.statusCode, 404);
    assert.equal(response.json<ErrorBody>().message, "These extensions are not installed: acme/ghost");
  });
});

test("a repository package of another type is refused and never deployed", async () => {
  await withApp({ mode: "disabled" }, async ({ app, extensionsDir }) => {
    const refused = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      payload: { packages: ["acme/skin"] }
    });

    assert.equal(refused.statusCode, 400);
    const body = refused.json<ErrorBody>();
    assert.equal(body.messageKey, "INSTALLER_UNEXPECTED_PACKAGE_TYPE");
    assert.equal(body.message, "The package acme/skin has type theme, which is not managed here.");

    const installed = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      payload: { packages: ["acme/alpha"] }
    });
    assert.equal(installed.statusCode, 200);
    assert.deepEqual((await readdir(path.join(extensionsDir, "acme"))).sort(), ["alpha", "manual"]);
  });
});

test("package ids that are not vendor/name are rejected as invalid input", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      payload: { packages: ["alpha"] }
    });

    assert.equal(response.statusCode, 400);
    const body = response.json<ErrorBody>();
    assert.equal(body.code, "INVALID_EXTENSION_ID");
    assert.equal(body.message, "alpha is not a valid extension name. Use vendor/name in lowercase.");
    assert.equal(body.outcome, "rejected");
  });
});

test("malformed package lists are rejected before any work", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const response = await app.inject({ method: "POST", url: "/api/packages/install", payload: { packages: [] } });

    assert.equal(response.statusCode, 400);
    const body = response.json<ErrorBody>();
    assert.equal(body.code, "invalid_request");
    assert.equal(body.outcome, "rejected");
  });
});

test("POST /api/extensions/:vendor/:name/manage migrates an enabled extension and audits it", async () => {
  await withApp({ mode: "disabled" }, async ({ app, registry, extensionsDir }) => {
    await registry.enable("acme/manual");

    const response = await app.inject({ method: "POST", url: "/api/extensions/acme/manual/manage" });

    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), {
      status: "ok",
      result: { id: "acme/manual", wasEnabled: true, enabled: true },
      output: ["Disabling extension…", "Installing acme/manual (1.0.0)", "Enabling extension…"]
    });
    assert.deepEqual(await readdir(path.join(extensionsDir, "acme")), ["manual"]);
    assert.equal(await registry.isEnabled("acme/manual"), true);

    const again = await app.inject({ method: "POST", url: "/api/extensions/acme/manual/manage" });
    assert.equal(again.statusCode, 409);
    assert.equal(again.json<ErrorBody>().message, "The extension acme/manual is already managed.");

    const audit = await app.inject({ method: "GET", url: "/api/audit" });
    const records = audit.json<{ data: Array<ExtensionAuditRecord> }>().data;
    assert.deepEqual(
      records.map((record) => [record.operation, record.result, record.errorCode, record.actorId]),
      [
        ["manage", "success", null, "local-disabled-rbac"],
        ["manage", "failed", "ALREADY_MANAGED", "local-disabled-rbac"]
      ]
    );
  });
});

test("header RBAC lets members read but not change extensions", async () => {
  await withApp({ mode: "header", header: { secret: "test-secret" } }, async ({ app }) => {
    const memberHeaders = { "x-steward-rbac-token": "test-secret", "x-steward-role": "member" };

    const read = await app.inject({ method: "GET", url: "/api/extensions", headers: memberHeaders });
    assert.equal(read.statusCode, 200);

    const write = await app.inject({
      method: "POST",
      url: "/api/packages/install",
      headers: memberHeaders,
      payload: { packages: ["acme/alpha"] }
    });
    assert.equal(write.statusCode, 403);
    assert.deepEqual(write.json(), { status: "forbidden", code: "insufficient_role", role: "member" });

    const anonymous = await app.inject({ method: "GET", url: "/api/packages/available" });
    assert.equal(anonymous.statusCode, 401);
    assert.equal(anonymous.json<{ code: string }>().code, "missing_header_token");

    const audit = await app.inject({
      method: "GET",
      url: "/api/audit",
      headers: { "x-steward-rbac-token": "test-secret", "x-steward-role": "admin" }
    });
    const records = audit.json<{ data: Array<ExtensionAuditRecord> }>().data;
    assert.deepEqual(
      records.map((record) => [record.operation, record.result, record.actorRole]),
      [["install", "forbidden", "member"]]
    );
  });
});

test("GET /api/packages/available and /api/requirements reflect the repository", async () => {
  await withApp({ mode: "disabled" }, async ({ app }) => {
    const available = await app.inject({ method: "GET", url: "/api/packages/available" });
    assert.deepEqual(
      available.json<{ data: Array<{ id: string; latest: string }> }>().data.map((entry) => [entry.id, entry.latest]),
      [
        ["acme/alpha", "2.0.0"],
        ["acme/manual", "1.0.0"]
      ]
    );

    const requirements = await app.inject({ method: "GET", url: "/api/requirements" });
    assert.deepEqual(requirements.json(), { satisfied: true });
  });
});
