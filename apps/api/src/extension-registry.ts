import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AvailableExtension, ExtensionId, ExtensionRegistry, StewardLogger } from "@steward/sdk";
import { evaluateHostCompatibility, isExtensionId, readExtensionManifest } from "./extension-manifest.js";
import { errnoCode, LifecycleError } from "./lifecycle-errors.js";

export const REGISTRY_ERROR_PREFIX = "EXTENSION_";

type ExtensionStateRecord = {
  enabled: boolean;
  changedAt: string;
};

type ExtensionStateFile = {
  version: 1;
  extensions: Record<ExtensionId, ExtensionStateRecord>;
};

function isStateFile(value: unknown): value is ExtensionStateFile {
  return (
    !!value &&
    typeof value === "object" &&
    "version" in value &&
    value.version === 1 &&
    "extensions" in value &&
    !!value.extensions &&
    typeof value.extensions === "object" &&
    !Array.isArray(value.extensions)
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
 * Extensions live at `{extensionsDir}/{vendor}/{name}/`. Enabled state is kept apart from the
 * extension directories so that replacing a directory does not reset it.
 */
export class FileExtensionRegistry implements ExtensionRegistry {
  private readonly extensionsDir: string;
  private readonly statePath: string;
  private readonly hostVersion: string;
  private readonly logger: StewardLogger;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(input: { extensionsDir: string; dataDir: string; hostVersion: string; logger: StewardLogger }) {
    this.extensionsDir = input.extensionsDir;
    this.statePath = path.join(input.dataDir, "extension-state.json");
    this.hostVersion = input.hostVersion;
    this.logger = input.logger;
  }

  public async allAvailable(): Promise<Record<ExtensionId, AvailableExtension>> {
    const available: Record<ExtensionId, AvailableExtension> = {};

    for (const vendor of await listDirectories(this.extensionsDir)) {
      for (const name of await listDirectories(path.join(this.extensionsDir, vendor))) {
        const id = `${vendor}/${name}`;
        const extension = await this.load(id);
        if (extension) {
          available[id] = extension;
        }
      }
    }

    return available;
  }

  public async isAvailable(id: ExtensionId): Promise<boolean> {
    return (await this.load(id)) !== null;
  }

  public async isEnabled(id: ExtensionId): Promise<boolean> {
    await this.writeQueue;
    const state = await this.readState();
    return state.extensions[id]?.enabled === true;
  }

  public async enable(id: ExtensionId): Promise<void> {
    await this.requireAvailable(id);
    await this.setEnabled(id, true);
  }

  public async enabling(id: ExtensionId): Promise<void> {
    const extension = await this.requireAvailable(id);
    const reasons = evaluateHostCompatibility(extension.requires, this.hostVersion);
    if (reasons.length > 0) {
      throw new LifecycleError(REGISTRY_ERROR_PREFIX, "NOT_ENABLEABLE", [id, reasons.join("; ")]);
    }
    await this.setEnabled(id, true);
  }

  public async disable(id: ExtensionId): Promise<void> {
    await this.setEnabled(id, false);
  }

  public async purge(id: ExtensionId): Promise<void> {
    await this.mutateState((state) => {
      delete state.extensions[id];
    });
  }

  public async getExtensionPath(id: ExtensionId, mustExist: boolean): Promise<string> {
    const directory = this.directoryFor(id);
    if (mustExist && !(await this.isAvailable(id))) {
      throw new LifecycleError(REGISTRY_ERROR_PREFIX, "NOT_AVAILABLE", [id]);
    }
    return `${directory}${path.sep}`;
  }

  private directoryFor(id: ExtensionId): string {
    if (!isExtensionId(id)) {
      throw new LifecycleError(REGISTRY_ERROR_PREFIX, "NOT_AVAILABLE", [id]);
    }
    const [vendor, name] = id.split("/");
    return path.join(this.extensionsDir, vendor, name);
  }

  private async load(id: ExtensionId): Promise<AvailableExtension | null> {
    if (!isExtensionId(id)) {
      return null;
    }

    const directory = this.directoryFor(id);
    const { manifest, diagnostics } = await readExtensionManifest(directory);
    if (!manifest) {
      if (diagnostics.length > 0) {
        this.logger.debug({ extensionId: id, diagnostics }, "skipping extension with unreadable manifest");
      }
      return null;
    }

    // Directories whose manifest names another extension (backups included) are not available.
    if (manifest.name !== id) {
      return null;
    }

    return {
      id,
      version: manifest.version,
      displayName: manifest.displayName,
      type: manifest.type,
      path: directory,
      requires: manifest.requires
    };
  }

  private async requireAvailable(id: ExtensionId): Promise<AvailableExtension> {
    const extension = await this.load(id);
    if (!extension) {
      throw new LifecycleError(REGISTRY_ERROR_PREFIX, "NOT_AVAILABLE", [id]);
    }
    return extension;
  }

  private async setEnabled(id: ExtensionId, enabled: boolean): Promise<void> {
    await this.mutateState((state) => {
      const current = state.extensions[id];
      if (current?.enabled === enabled) {
        return;
      }
      state.extensions[id] = {
        enabled,
        changedAt: new Date().toISOString()
      };
    });
  }

  private async mutateState(mutator: (state: ExtensionStateFile) => void): Promise<void> {
    const run = async (): Promise<void> => {
      const state = await this.readState();
      mutator(state);
      await this.writeState(state);
    };

    const queued = this.writeQueue.then(run, run);
    this.writeQueue = queued.then(
      () => undefined,
      () => undefined
    );
    await queued;
  }

  private async readState(): Promise<ExtensionStateFile> {
    try {
      const raw = await readFile(this.statePath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (isStateFile(parsed)) {
        return parsed;
      }
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        this.logger.warn({ error, filePath: this.statePath }, "failed to read extension state; using empty state");
      }
    }

    return {
      version: 1,
      extensions: {}
    };
  }

  private async writeState(state: ExtensionStateFile): Promise<void> {
    await mkdir(path.dirname(this.statePath), { recursive: true });
    await writeFile(this.statePath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  }
}
