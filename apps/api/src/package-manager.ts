import semver from "semver";
import type {
  AvailablePackage,
  ExtensionId,
  ExtensionIo,
  InstalledPackage,
  PackageInstaller,
  PackageSet,
  StewardLogger
} from "@steward/sdk";
import { nullIo } from "./extension-io.js";
import { isExtensionId } from "./extension-manifest.js";
import { LifecycleError } from "./lifecycle-errors.js";

export type BatchOperation = "install" | "update" | "remove";

export type BracketPhase = "disable" | "enable" | "purge";

export type BracketFailure = {
  id: ExtensionId;
  phase: BracketPhase;
  key: string | null;
  message: string;
  parameters: Array<string>;
};

/**
 * Created fresh for every batch operation and handed to both its pre and post hook.
 */
export type BracketContext = {
  operation: BatchOperation;
  enabledBefore: Array<ExtensionId>;
  failures: Array<BracketFailure>;
};

export type BatchOperationResult = {
  operation: BatchOperation;
  packages: Array<ExtensionId>;
  failures: Array<BracketFailure>;
};

export type InstallOptions = {
  enableOnInstall?: boolean;
};

export type PackageRequest = Array<string> | PackageSet;

export type StartManagingResult = {
  id: ExtensionId;
  wasEnabled: boolean;
  enabled: boolean;
};

export type PackageManagerOptions = {
  installer: PackageInstaller;
  packageType: string;
  managedTypes?: Array<string>;
  exceptionPrefix: string;
  logger: StewardLogger;
};

function sortPackages(packages: PackageSet): PackageSet {
  return Object.fromEntries(Object.entries(packages).sort(([left], [right]) => left.localeCompare(right)));
}

/**
 * Runs install/update/remove through the installer, bracketed by overridable pre/post hooks.
 * Public operations are serialized per instance.
 */
export class PackageManager {
  protected readonly installer: PackageInstaller;
  protected readonly packageType: string;
  protected readonly managedTypes: Array<string>;
  protected readonly exceptionPrefix: string;
  protected readonly logger: StewardLogger;

  private managedPackages: Record<ExtensionId, InstalledPackage> | null = null;
  private operationQueue: Promise<void> = Promise.resolve();

  constructor(options: PackageManagerOptions) {
    this.installer = options.installer;
    this.packageType = options.packageType;
    this.managedTypes = options.managedTypes ?? [options.packageType];
    this.exceptionPrefix = options.exceptionPrefix;
    this.logger = options.logger;
  }

  public install(request: PackageRequest, io: ExtensionIo = nullIo, options: InstallOptions = {}): Promise<BatchOperationResult> {
    return this.serialize(() => this.installPackages(request, io, options));
  }

  public update(request: PackageRequest, io: ExtensionIo = nullIo): Promise<BatchOperationResult> {
    return this.serialize(() => this.updatePackages(request, io));
  }

  public remove(request: PackageRequest, io: ExtensionIo = nullIo): Promise<BatchOperationResult> {
    return this.serialize(() => this.removePackages(request, io));
  }

  public startManaging(id: ExtensionId, io: ExtensionIo = nullIo): Promise<StartManagingResult> {
    return this.serialize(() => this.manage(id, io));
  }

  public async isManaged(id: ExtensionId): Promise<boolean> {
    const managed = await this.getManagedPackages();
    return Object.hasOwn(managed, id);
  }

  public async getManagedPackages(): Promise<Record<ExtensionId, InstalledPackage>> {
    if (this.managedPackages === null) {
      this.managedPackages = await this.installer.getInstalledPackages([this.packageType]);
    }
    return this.managedPackages;
  }

  public getAllManagedPackages(): Promise<Record<ExtensionId, InstalledPackage>> {
    return this.installer.getInstalledPackages(this.managedTypes);
  }

  public getAvailablePackages(): Promise<Array<AvailablePackage>> {
    return this.installer.getAvailablePackages(this.packageType);
  }

  public checkRequirements(): Promise<boolean> {
    return this.installer.checkRequirements();
  }

  public resetCache(): void {
    this.managedPackages = null;
  }

  public normalizeVersion(request: PackageRequest): PackageSet {
    const entries: Array<[string, string]> = Array.isArray(request)
      ? request.map((id) => [id.trim(), "*"])
      : Object.entries(request).map(([id, constraint]) => [id.trim(), constraint.trim()]);

    const normalized: PackageSet = {};
    for (const [id, constraint] of entries) {
      this.assertExtensionId(id);
      const effective = constraint.length > 0 ? constraint : "*";
      if (semver.validRange(effective, { loose: true }) === null) {
        throw new LifecycleError(this.exceptionPrefix, "INVALID_CONSTRAINT", [id, effective]);
      }
      normalized[id] = effective;
    }
    return normalized;
  }

  protected assertExtensionId(id: string): void {
    if (!isExtensionId(id)) {
      throw new LifecycleError(this.exceptionPrefix, "INVALID_EXTENSION_ID", [id]);
    }
  }

  protected async installPackages(request: PackageRequest, io: ExtensionIo, options: InstallOptions): Promise<BatchOperationResult> {
    const packages = this.normalizeVersion(request);
    const managed = await this.getManagedPackages();
    const alreadyManaged = Object.keys(packages).filter((id) => Object.hasOwn(managed, id));
    if (alreadyManaged.length !== 0) {
      throw new LifecycleError(this.exceptionPrefix, "ALREADY_INSTALLED", [alreadyManaged.join("|")]);
    }

    const context = this.createContext("install");
    await this.preInstall(packages, context, io);
    const desired = sortPackages({ ...(await this.desiredFromInstalled()), ...packages });
    try {
      await this.installer.install(desired, Object.keys(packages), this.managedTypes, io);
    } finally {
      this.resetCache();
    }
    await this.postInstall(packages, context, io, options);
    return this.toResult(context, packages);
  }

  protected async updatePackages(request: PackageRequest, io: ExtensionIo): Promise<BatchOperationResult> {
    const packages = this.normalizeVersion(request);
    await this.requireManaged(packages);

    const context = this.createContext("update");
    await this.preUpdate(packages, context, io);
    try {
      const desired = sortPackages({ ...(await this.desiredFromInstalled()), ...packages });
      await this.installer.install(desired, Object.keys(packages), this.managedTypes, io);
    } finally {
      this.resetCache();
      await this.postUpdate(packages, context, io);
    }
    return this.toResult(context, packages);
  }

  protected async removePackages(request: PackageRequest, io: ExtensionIo): Promise<BatchOperationResult> {
    const packages = this.normalizeVersion(request);
    await this.requireManaged(packages);

    const context = this.createContext("remove");
    await this.preRemove(packages, context, io);
    const desired = await this.desiredFromInstalled();
    for (const id of Object.keys(packages)) {
      delete desired[id];
    }
    try {
      await this.installer.install(sortPackages(desired), Object.keys(packages), this.managedTypes, io);
    } finally {
      this.resetCache();
    }
    await this.postRemove(packages, context, io);
    return this.toResult(context, packages);
  }

  protected async manage(id: ExtensionId, _io: ExtensionIo): Promise<StartManagingResult> {
    throw new LifecycleError(this.exceptionPrefix, "UNSUPPORTED_OPERATION", [id]);
  }

  protected async preInstall(_packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {}

  protected async postInstall(
    _packages: PackageSet,
    _context: BracketContext,
    _io: ExtensionIo,
    _options: InstallOptions
  ): Promise<void> {}

  protected async preUpdate(_packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {}

  protected async postUpdate(_packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {}

  protected async preRemove(_packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {}

  protected async postRemove(_packages: PackageSet, _context: BracketContext, _io: ExtensionIo): Promise<void> {}

  protected createContext(operation: BatchOperation): BracketContext {
    return {
      operation,
      enabledBefore: [],
      failures: []
    };
  }

  private async requireManaged(packages: PackageSet): Promise<void> {
    const managed = await this.getManagedPackages();
    const notManaged = Object.keys(packages).filter((id) => !Object.hasOwn(managed, id));
    if (notManaged.length !== 0) {
      throw new LifecycleError(this.exceptionPrefix, "NOT_MANAGED", [notManaged.join("|")]);
    }
  }

  private async desiredFromInstalled(): Promise<PackageSet> {
    const installed = await this.getAllManagedPackages();
    return Object.fromEntries(Object.values(installed).map((entry) => [entry.id, entry.constraint]));
  }

  private toResult(context: BracketContext, packages: PackageSet): BatchOperationResult {
    return {
      operation: context.operation,
      packages: Object.keys(packages),
      failures: [...context.failures]
    };
  }

  private serialize<T>(run: () => Promise<T>): Promise<T> {
    const queued = this.operationQueue.then(run, run);
    this.operationQueue = queued.then(
      () => undefined,
      () => undefined
    );
    return queued;
  }
}
