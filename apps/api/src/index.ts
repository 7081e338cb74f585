import { mkdir } from "node:fs/promises";
import { buildApp } from "./app.js";
import { loadStewardEnv } from "./env.js";
import { ExtensionAuditStore } from "./extension-audit-store.js";
import { ExtensionManager } from "./extension-manager.js";
import { FileExtensionRegistry } from "./extension-registry.js";
import { NodeFilesystemOperator } from "./filesystem-operator.js";
import { loadMessageCatalog } from "./message-catalog.js";
import { LocalPackageInstaller } from "./package-installer.js";

const env = loadStewardEnv(process.env, process.cwd());

await mkdir(env.DATA_DIR, { recursive: true });
await mkdir(env.EXTENSIONS_DIR, { recursive: true });

const app = buildApp({
  logLevel: env.LOG_LEVEL,
  rbac: env.RBAC,
  ioVerbosity: env.IO_VERBOSITY,
  services: (logger) => {
    const filesystem = new NodeFilesystemOperator();
    const registry = new FileExtensionRegistry({
      extensionsDir: env.EXTENSIONS_DIR,
      dataDir: env.DATA_DIR,
      hostVersion: env.HOST_VERSION,
      logger
    });
    const installer = new LocalPackageInstaller({
      repositoryDir: env.PACKAGE_REPOSITORY_DIR,
      extensionsDir: env.EXTENSIONS_DIR,
      dataDir: env.DATA_DIR,
      defaultType: env.PACKAGE_TYPE,
      filesystem,
      logger
    });
    return {
      registry,
      manager: new ExtensionManager({
        installer,
        registry,
        filesystem,
        packageType: env.PACKAGE_TYPE,
        exceptionPrefix: env.EXCEPTION_PREFIX,
        enableOnInstall: env.ENABLE_ON_INSTALL,
        purgeOnRemove: env.PURGE_ON_REMOVE,
        logger
      }),
      auditStore: new ExtensionAuditStore({ dataDir: env.DATA_DIR, logger }),
      catalog: loadMessageCatalog()
    };
  }
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  app.log.info({ signal }, "shutting down api");

  try {
    await app.close();
    process.exit(0);
  } catch (error) {
    app.log.error({ error }, "api shutdown failed");
    process.exit(1);
  }
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

if (env.RBAC.mode === "disabled") {
  app.log.warn({ host: env.HOST }, "extension RBAC is disabled; only loopback callers are accepted");
}

try {
  await app.listen({
    host: env.HOST,
    port: env.PORT
  });
  app.log.info(
    {
      extensionsDir: env.EXTENSIONS_DIR,
      repositoryDir: env.PACKAGE_REPOSITORY_DIR,
      dataDir: env.DATA_DIR
    },
    "extension steward ready"
  );
} catch (error) {
  app.log.error({ error }, "api failed to start");
  process.exit(1);
}
