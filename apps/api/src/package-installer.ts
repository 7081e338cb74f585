import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import { access, mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import semver from "semver";
import {
  IO_VERBOSITY,
  type AvailablePackage,
  type ExtensionId,
  type ExtensionIo,
  type FilesystemOperator,
  type InstalledPackage,
  type PackageInstaller,
  type PackageSet,
  type StewardLogger
} from "@steward/sdk";
import { normalizeSemver, readExtensionManifest } from "./extension-manifest.js";
import { errnoCode, LifecycleError } from "./lifecycle-errors.js";

export const INSTALLER_ERROR_PREFIX = "INSTALLER_";

type ManagedPackagesFile = {
  version: 1;
  packages: Record<ExtensionId, InstalledPackage>;
};

type ResolvedPackage = {
  id: ExtensionId;
  version: string;
  type: string;
  sourceDir: string;
};

function isManagedPackagesFile(value: unknown): value is ManagedPackagesFile {
  return (
    !!value &&
    typeof value === "object" &&
    "version" in value &&
    value.version === 1 &&
    "packages" in value &&
    !!value.packages &&
    typeof value.packages === "object" &&
    !Array.isArray(value.packages)
  );
}

async function listDirectories(root: string): Promise<Array<string>> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Installs packages from a local repository laid out as `{repositoryDir}/{vendor}/{name}/{version}/`.
 * Installed packages are recorded in `{dataDir}/managed-packages.json`.
 */
export class LocalPackageInstaller implements PackageInstaller {
  private readonly repositoryDir: string;
  private readonly extensionsDir: string;
  private readonly manifestPath: string;
  private readonly defaultType: string;
  private readonly filesystem: FilesystemOperator;
  private readonly logger: StewardLogger;

  constructor(input: {
    repositoryDir: string;
    extensionsDir: string;
    dataDir: string;
    defaultType: string;
    filesystem: FilesystemOperator;
    logger: StewardLogger;
  }) {
    this.repositoryDir = input.repositoryDir;
    this.extensionsDir = input.extensionsDir;
    this.manifestPath = path.join(input.dataDir, "managed-packages.json");
    this.defaultType = input.defaultType;
    this.filesystem = input.filesystem;
    this.logger = input.logger;
  }

  public async getInstalledPackages(types: Array<string>): Promise<Record<ExtensionId, InstalledPackage>> {
    const state = await this.readState();
    return Object.fromEntries(Object.entries(state.packages).filter(([, installed]) => types.includes(installed.type)));
  }

  public async install(
    desired: PackageSet,
    touched: Array<ExtensionId>,
    types: Array<string>,
    io: ExtensionIo
  ): Promise<void> {
    const state = await this.readState();

    // Everything is resolved before the first package is touched on disk.
    const plan: Array<{ constraint: string; current: InstalledPackage | undefined; resolved: ResolvedPackage }> = [];
    for (const id of Object.keys(desired).sort()) {
      const current = state.packages[id];
      if (current && !touched.includes(id)) {
        continue;
      }
      const constraint = desired[id];
      plan.push({ constraint, current, resolved: await this.resolve(id, constraint, types) });
    }

    for (const [id, installed] of Object.entries(state.packages).sort(([left], [right]) => left.localeCompare(right))) {
      if (id in desired || !types.includes(installed.type)) {
        continue;
      }
      io.write({ key: "REMOVING_PACKAGE", parameters: [id] }, IO_VERBOSITY.normal);
      await this.filesystem.remove(this.targetFor(id));
      delete state.packages[id];
      await this.writeState(state);
    }

    for (const { constraint, current, resolved } of plan) {
      const id = resolved.id;
      if (current && current.version === resolved.version) {
        io.write({ key: "PACKAGE_UP_TO_DATE", parameters: [id, current.version] }, IO_VERBOSITY.normal);
        state.packages[id] = { ...current, constraint };
        await this.writeState(state);
        continue;
      }

      if (current) {
        io.write({ key: "UPDATING_PACKAGE", parameters: [id, current.version, resolved.version] }, IO_VERBOSITY.normal);
      } else {
        io.write({ key: "INSTALLING_PACKAGE", parameters: [id, resolved.version] }, IO_VERBOSITY.normal);
      }

      await this.deploy(id, resolved.sourceDir);
      state.packages[id] = {
        id,
        version: resolved.version,
        type: resolved.type,
        constraint,
        installedAt: new Date().toISOString()
      };
      await this.writeState(state);
      this.logger.info({ extensionId: id, version: resolved.version }, "package installed");
    }
  }

  public async getAvailablePackages(type: string): Promise<Array<AvailablePackage>> {
    const available: Array<AvailablePackage> = [];

    for (const vendor of await listDirectories(this.repositoryDir)) {
      for (const name of await listDirectories(path.join(this.repositoryDir, vendor))) {
        const id = `${vendor}/${name}`;
        const versions = await this.listVersions(id);
        const latest = versions[0];
        if (!latest) {
          continue;
        }
        const { manifest } = await readExtensionManifest(latest.sourceDir);
        const packageType = manifest?.type ?? this.defaultType;
        if (packageType !== type) {
          continue;
        }
        available.push({
          id,
          type: packageType,
          versions: versions.map((entry) => entry.version),
          latest: latest.version
        });
      }
    }

    return available;
  }

  public async checkRequirements(): Promise<boolean> {
    try {
      await access(this.repositoryDir, constants.R_OK);
      await mkdir(this.extensionsDir, { recursive: true });
      await access(this.extensionsDir, constants.W_OK);
      return true;
    } catch (error) {
      this.logger.warn({ error, repositoryDir: this.repositoryDir, extensionsDir: this.extensionsDir }, "installer requirements not met");
      return false;
    }
  }

  private targetFor(id: ExtensionId): string {
    const [vendor, name] = id.split("/");
    return path.join(this.extensionsDir, vendor, name);
  }

  private async listVersions(id: ExtensionId): Promise<Array<{ version: string; sourceDir: string }>> {
    const [vendor, name] = id.split("/");
    const packageDir = path.join(this.repositoryDir, vendor, name);
    const entries: Array<{ version: string; sourceDir: string }> = [];

    for (const directory of await listDirectories(packageDir)) {
      const version = normalizeSemver(directory);
      if (version) {
        entries.push({ version, sourceDir: path.join(packageDir, directory) });
      }
    }

    return entries.sort((left, right) => semver.rcompare(left.version, right.version));
  }

  private async resolve(id: ExtensionId, constraint: string, types: Array<string>): Promise<ResolvedPackage> {
    const versions = await this.listVersions(id);
    if (versions.length === 0) {
      throw new LifecycleError(INSTALLER_ERROR_PREFIX, "PACKAGE_NOT_FOUND", [id]);
    }

    const match = versions.find((entry) => semver.satisfies(entry.version, constraint, { loose: true }));
    if (!match) {
      throw new LifecycleError(INSTALLER_ERROR_PREFIX, "NO_MATCHING_VERSION", [id, constraint]);
    }

    const { manifest } = await readExtensionManifest(match.sourceDir);
    if (!manifest || manifest.name !== id) {
      throw new LifecycleError(INSTALLER_ERROR_PREFIX, "PACKAGE_NOT_FOUND", [id]);
    }

    const type = manifest.type ?? this.defaultType;
    if (!types.includes(type)) {
      throw new LifecycleError(INSTALLER_ERROR_PREFIX, "UNEXPECTED_PACKAGE_TYPE", [id, type]);
    }

    return {
      id,
      version: match.version,
      type,
      sourceDir: match.sourceDir
    };
  }

  /**
   * Copies into a staging directory next to the target, then swaps it in. A failed copy leaves
   * the previously installed directory untouched.
   */
  private async deploy(id: ExtensionId, sourceDir: string): Promise<void> {
    const target = this.targetFor(id);
    const suffix = randomUUID();
    const staging = `${target}.staging-${suffix}`;
    const previous = `${target}.previous-${suffix}`;

    await this.filesystem.ensureDirectory(path.dirname(target));
    try {
      await this.filesystem.copy(sourceDir, staging);
    } catch (error) {
      await this.filesystem.remove(staging);
      throw error;
    }

    const hadPrevious = await this.filesystem.exists(target);
    if (hadPrevious) {
      await this.filesystem.rename(target, previous);
    }

    try {
      await this.filesystem.rename(staging, target);
    } catch (error) {
      if (hadPrevious) {
        await this.filesystem.rename(previous, target);
      }
      await this.filesystem.remove(staging);
      throw error;
    }

    if (hadPrevious) {
      await this.filesystem.remove(previous);
    }
  }

  private async readState(): Promise<ManagedPackagesFile> {
    try {
      const raw = await readFile(this.manifestPath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (isManagedPackagesFile(parsed)) {
        return parsed;
      }
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        this.logger.warn({ error, filePath: this.manifestPath }, "failed to read managed packages; using empty state");
      }
    }

    return {
      version: 1,
      packages: {}
    };
  }

  private async writeState(state: ManagedPackagesFile): Promise<void> {
    await mkdir(path.dirname(this.manifestPath), { recursive: true });
    await writeFile(this.manifestPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  }
}
