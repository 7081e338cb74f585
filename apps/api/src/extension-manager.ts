import {
  BACKUP_SUFFIX,
  IO_VERBOSITY,
  type ExtensionId,
  type ExtensionIo,
  type ExtensionRegistry,
  type FilesystemOperator,
  type PackageSet
} from "@steward/sdk";
import {
  errorMessage,
  LifecycleError,
  ManagedWithCleanError,
  ManagedWithEnableError
} from "./lifecycle-errors.js";
import {
  PackageManager,
  type BatchOperationResult,
  type BracketContext,
  type BracketPhase,
  type InstallOptions,
  type PackageManagerOptions,
  type PackageRequest,
  type StartManagingResult
} from "./package-manager.js";

export type ExtensionManagerOptions = PackageManagerOptions & {
  registry: ExtensionRegistry;
  filesystem: FilesystemOperator;
  enableOnInstall?: boolean;
  purgeOnRemove?: boolean;
};

export function backupPathFor(extensionPath: string): string {
  return `${extensionPath.replace(/[\\/]+$/, "")}${BACKUP_SUFFIX}`;
}

/**
 * Manages extensions through the package installer while keeping their enabled state
 * consistent, and migrates manually installed extensions into managed ones.
 */
export class ExtensionManager extends PackageManager {
  private readonly registry: ExtensionRegistry;
  private readonly filesystem: FilesystemOperator;
  private readonly enableOnInstall: boolean;
  private readonly purgeOnRemove: boolean;

  constructor(options: ExtensionManagerOptions) {
    super(options);
    this.registry = options.registry;
    this.filesystem = options.filesystem;
    this.enableOnInstall = options.enableOnInstall ?? false;
    this.purgeOnRemove = options.purgeOnRemove ?? false;
  }

  protected override async preInstall(packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {
    const available = await this.registry.allAvailable();
    const installedManually = Object.keys(packages).filter((id) => Object.hasOwn(available, id));
    if (installedManually.length !== 0) {
      throw new LifecycleError(this.exceptionPrefix, "ALREADY_INSTALLED_MANUALLY", [installedManually.join("|")]);
    }
  }

  protected override async postInstall(
    packages: PackageSet,
    context: BracketContext,
    io: ExtensionIo,
    options: InstallOptions
  ): Promise<void> {
    if (!(options.enableOnInstall ?? this.enableOnInstall)) {
      return;
    }

    io.write("ENABLING_EXTENSIONS", IO_VERBOSITY.quiet);
    for (const id of Object.keys(packages)) {
      await this.bestEffort(id, "enable", context, io, () => this.registry.enabling(id));
    }
  }

  protected override async preUpdate(packages: PackageSet, context: BracketContext, io: ExtensionIo): Promise<void> {
    io.write("DISABLING_EXTENSIONS", IO_VERBOSITY.quiet);
    context.enabledBefore = [];
    for (const id of Object.keys(packages)) {
      await this.bestEffort(id, "disable", context, io, async () => {
        if (await this.registry.isEnabled(id)) {
          context.enabledBefore.push(id);
          await this.registry.disable(id);
        }
      });
    }
  }

  protected override async postUpdate(_packages: PackageSet, context: BracketContext, io: ExtensionIo): Promise<void> {
    io.write("ENABLING_EXTENSIONS", IO_VERBOSITY.quiet);
    for (const id of context.enabledBefore) {
      await this.bestEffort(id, "enable", context, io, () => this.registry.enable(id));
    }
  }

  protected override async removePackages(request: PackageRequest, io: ExtensionIo): Promise<BatchOperationResult> {
    const packages = this.normalizeVersion(request);

    const available = await this.registry.allAvailable();
    const notInstalled = Object.keys(packages).filter((id) => !Object.hasOwn(available, id));
    if (notInstalled.length !== 0) {
      throw new LifecycleError(this.exceptionPrefix, "NOT_INSTALLED", [notInstalled.join("|")]);
    }

    return super.removePackages(packages, io);
  }

  protected override async preRemove(packages: PackageSet, context: BracketContext, io: ExtensionIo): Promise<void> {
    io.write("DISABLING_EXTENSIONS", IO_VERBOSITY.quiet);
    for (const id of Object.keys(packages)) {
      await this.bestEffort(id, "disable", context, io, async () => {
        if (await this.registry.isEnabled(id)) {
          await this.registry.disable(id);
        }
      });
    }
  }

  protected override async postRemove(packages: PackageSet, context: BracketContext, io: ExtensionIo): Promise<void> {
    if (!this.purgeOnRemove) {
      return;
    }

    io.write("PURGING_EXTENSIONS", IO_VERBOSITY.quiet);
    for (const id of Object.keys(packages)) {
      await this.bestEffort(id, "purge", context, io, () => this.registry.purge(id));
    }
  }

  protected override async manage(id: ExtensionId, io: ExtensionIo): Promise<StartManagingResult> {
    this.assertExtensionId(id);
    if (!(await this.registry.isAvailable(id))) {
      throw new LifecycleError(this.exceptionPrefix, "NOT_INSTALLED", [id]);
    }

    if (await this.isManaged(id)) {
      throw new LifecycleError(this.exceptionPrefix, "ALREADY_MANAGED", [id]);
    }

    const extensionPath = await this.registry.getExtensionPath(id, true);
    const backupPath = backupPathFor(extensionPath);
    if (await this.filesystem.exists(backupPath)) {
      throw new LifecycleError(this.exceptionPrefix, "CANNOT_MANAGE_BACKUP_EXISTS", [id, backupPath]);
    }

    let enabled = false;
    if (await this.registry.isEnabled(id)) {
      enabled = true;
      io.write("DISABLING_EXTENSION", IO_VERBOSITY.quiet);
      await this.registry.disable(id);
    }

    try {
      await this.filesystem.rename(extensionPath, backupPath);
    } catch (error) {
      await this.restoreEnabled(id, enabled, io);
      throw new LifecycleError(this.exceptionPrefix, "CANNOT_MANAGE_FILESYSTEM_ERROR", [id], error);
    }

    try {
      await this.installPackages([id], io, { enableOnInstall: false });
    } catch (error) {
      io.write({ key: "ROLLING_BACK_EXTENSION", parameters: [id] }, IO_VERBOSITY.quiet);
      try {
        await this.filesystem.rename(backupPath, extensionPath);
      } catch (rollbackError) {
        this.logger.error({ extensionId: id, backupPath, error: rollbackError }, "failed to restore extension backup");
        throw new LifecycleError(this.exceptionPrefix, "CANNOT_MANAGE_ROLLBACK_ERROR", [id, backupPath], error);
      }
      await this.restoreEnabled(id, enabled, io);
      throw new LifecycleError(this.exceptionPrefix, "CANNOT_MANAGE_INSTALL_ERROR", [id], error);
    }

    try {
      await this.filesystem.remove(backupPath);
    } catch (error) {
      throw new ManagedWithCleanError(this.exceptionPrefix, id, backupPath, error);
    }

    if (enabled) {
      try {
        io.write("ENABLING_EXTENSION", IO_VERBOSITY.quiet);
        await this.registry.enabling(id);
      } catch (error) {
        throw new ManagedWithEnableError(this.exceptionPrefix, id, error);
      }
    }

    this.logger.info({ extensionId: id, reenabled: enabled }, "extension is now managed");
    return {
      id,
      wasEnabled: enabled,
      enabled
    };
  }

  private async restoreEnabled(id: ExtensionId, enabled: boolean, io: ExtensionIo): Promise<void> {
    if (!enabled) {
      return;
    }
    try {
      await this.registry.enable(id);
    } catch (error) {
      this.writeFailure(io, error);
      this.logger.warn({ extensionId: id, error }, "failed to re-enable extension after aborted migration");
    }
  }

  /**
   * Runs one per-extension bracket step. Failures are reported and collected, never rethrown,
   * so the rest of the batch still runs.
   */
  private async bestEffort(
    id: ExtensionId,
    phase: BracketPhase,
    context: BracketContext,
    io: ExtensionIo,
    step: () => Promise<void>
  ): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.writeFailure(io, error);
      context.failures.push({
        id,
        phase,
        key: error instanceof LifecycleError ? error.messageKey : null,
        message: errorMessage(error),
        parameters: error instanceof LifecycleError ? [...error.parameters] : []
      });
    }
  }

  private writeFailure(io: ExtensionIo, error: unknown): void {
    if (error instanceof LifecycleError) {
      io.write({ key: error.messageKey, parameters: error.parameters }, IO_VERBOSITY.verbose);
      return;
    }
    io.write(errorMessage(error), IO_VERBOSITY.verbose);
  }
}
