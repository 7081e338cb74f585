export type LifecycleErrorCode =
  | "ALREADY_INSTALLED"
  | "ALREADY_INSTALLED_MANUALLY"
  | "ALREADY_MANAGED"
  | "NOT_INSTALLED"
  | "NOT_MANAGED"
  | "INVALID_CONSTRAINT"
  | "INVALID_EXTENSION_ID"
  | "CANNOT_MANAGE_FILESYSTEM_ERROR"
  | "CANNOT_MANAGE_INSTALL_ERROR"
  | "CANNOT_MANAGE_BACKUP_EXISTS"
  | "CANNOT_MANAGE_ROLLBACK_ERROR"
  | "MANAGED_WITH_CLEAN_ERROR"
  | "MANAGED_WITH_ENABLE_ERROR"
  | "UNSUPPORTED_OPERATION"
  | "PACKAGE_NOT_FOUND"
  | "NO_MATCHING_VERSION"
  | "UNEXPECTED_PACKAGE_TYPE"
  | "NOT_AVAILABLE"
  | "NOT_ENABLEABLE";

export type LifecycleOutcome = "rejected" | "rolled_back" | "partially_managed" | "failed";

export type FilesystemOperation = "rename" | "remove" | "copy" | "mkdir";

const REJECTED_CODES = new Set<LifecycleErrorCode>([
  "ALREADY_INSTALLED",
  "ALREADY_INSTALLED_MANUALLY",
  "ALREADY_MANAGED",
  "NOT_INSTALLED",
  "NOT_MANAGED",
  "INVALID_CONSTRAINT",
  "INVALID_EXTENSION_ID",
  "CANNOT_MANAGE_BACKUP_EXISTS",
  "UNSUPPORTED_OPERATION",
  "NOT_AVAILABLE"
]);

/**
 * Domain runtime error. `prefix` namespaces the code so the same code raised by different
 * components translates to different messages.
 */
export class LifecycleError extends Error {
  public readonly prefix: string;
  public readonly code: LifecycleErrorCode;
  public readonly parameters: Array<string>;

  constructor(prefix: string, code: LifecycleErrorCode, parameters: Array<string> = [], cause?: unknown) {
    super(`${prefix}${code}`, cause === undefined ? undefined : { cause });
    this.name = "LifecycleError";
    this.prefix = prefix;
    this.code = code;
    this.parameters = parameters;
  }

  public get messageKey(): string {
    return `${this.prefix}${this.code}`;
  }
}

/**
 * The package was installed and is managed, but a follow-up step did not complete.
 */
export class ManagedWithError extends LifecycleError {
  constructor(prefix: string, code: LifecycleErrorCode, parameters: Array<string>, cause?: unknown) {
    super(prefix, code, parameters, cause);
    this.name = "ManagedWithError";
  }
}

export class ManagedWithCleanError extends ManagedWithError {
  public readonly backupPath: string;

  constructor(prefix: string, extensionId: string, backupPath: string, cause?: unknown) {
    super(prefix, "MANAGED_WITH_CLEAN_ERROR", [extensionId, backupPath], cause);
    this.name = "ManagedWithCleanError";
    this.backupPath = backupPath;
  }
}

export class ManagedWithEnableError extends ManagedWithError {
  constructor(prefix: string, extensionId: string, cause?: unknown) {
    super(prefix, "MANAGED_WITH_ENABLE_ERROR", [extensionId], cause);
    this.name = "ManagedWithEnableError";
  }
}

export class FilesystemError extends Error {
  public readonly code: string;
  public readonly operation: FilesystemOperation;
  public readonly paths: Array<string>;

  constructor(operation: FilesystemOperation, paths: Array<string>, cause: unknown) {
    const code = errnoCode(cause) ?? "EUNKNOWN";
    super(`cannot ${operation} ${paths.join(" -> ")}: ${code}`, { cause });
    this.name = "FilesystemError";
    this.code = code;
    this.operation = operation;
    this.paths = paths;
  }
}

export function errnoCode(error: unknown): string | null {
  if (error !== null && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  if (typeof error === "string" && error.trim().length > 0) {
    return error.trim();
  }
  return "unknown error";
}

export function describeLifecycleOutcome(error: unknown): LifecycleOutcome {
  if (error instanceof ManagedWithError) {
    return "partially_managed";
  }
  if (error instanceof LifecycleError) {
    if (error.code === "CANNOT_MANAGE_INSTALL_ERROR" || error.code === "CANNOT_MANAGE_FILESYSTEM_ERROR") {
      return "rolled_back";
    }
    if (REJECTED_CODES.has(error.code)) {
      return "rejected";
    }
  }
  return "failed";
}
