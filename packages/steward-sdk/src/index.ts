export const BACKUP_SUFFIX = "__backup__";

export type ExtensionId = string;

/**
 * Requested units of an operation: extension identifier to version constraint.
 */
export type PackageSet = Record<ExtensionId, string>;

export type AvailableExtension = {
  id: ExtensionId;
  version: string;
  displayName: string;
  type: string | null;
  path: string;
  requires: {
    host: string | null;
  };
};

export type InstalledPackage = {
  id: ExtensionId;
  version: string;
  type: string;
  constraint: string;
  installedAt: string;
};

export type AvailablePackage = {
  id: ExtensionId;
  type: string | null;
  versions: Array<string>;
  latest: string | null;
};

export type StewardLogger = {
  debug: (input: Record<string, unknown>, message?: string) => void;
  info: (input: Record<string, unknown>, message?: string) => void;
  warn: (input: Record<string, unknown>, message?: string) => void;
  error: (input: Record<string, unknown>, message?: string) => void;
};

export const IO_VERBOSITY = {
  quiet: 1,
  normal: 2,
  verbose: 4,
  veryVerbose: 8,
  debug: 16
} as const;

export type IoVerbosity = (typeof IO_VERBOSITY)[keyof typeof IO_VERBOSITY];

export type IoMessage =
  | string
  | {
      key: string;
      parameters: Array<string>;
    };

/**
 * Sink for human-readable progress notices. Never used for control flow.
 */
export type ExtensionIo = {
  write: (message: IoMessage, verbosity?: IoVerbosity) => void;
};

export type ExtensionRegistry = {
  allAvailable: () => Promise<Record<ExtensionId, AvailableExtension>>;
  isAvailable: (id: ExtensionId) => Promise<boolean>;
  isEnabled: (id: ExtensionId) => Promise<boolean>;
  enable: (id: ExtensionId) => Promise<void>;
  enabling: (id: ExtensionId) => Promise<void>;
  disable: (id: ExtensionId) => Promise<void>;
  purge: (id: ExtensionId) => Promise<void>;
  getExtensionPath: (id: ExtensionId, mustExist: boolean) => Promise<string>;
};

export type FilesystemOperator = {
  rename: (source: string, destination: string) => Promise<void>;
  remove: (target: string) => Promise<void>;
  copy: (source: string, destination: string) => Promise<void>;
  ensureDirectory: (target: string) => Promise<void>;
  exists: (target: string) => Promise<boolean>;
};

export type PackageInstaller = {
  getInstalledPackages: (types: Array<string>) => Promise<Record<ExtensionId, InstalledPackage>>;
  /**
   * Reconciles installed packages of `types` with `desired`. Packages in `touched` are re-resolved
   * even when already installed; installed packages of `types` missing from `desired` are removed.
   * Packages of other types are left alone, and resolving a package of another type fails.
   */
  install: (desired: PackageSet, touched: Array<ExtensionId>, types: Array<string>, io: ExtensionIo) => Promise<void>;
  getAvailablePackages: (type: string) => Promise<Array<AvailablePackage>>;
  checkRequirements: () => Promise<boolean>;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
