import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { StewardLogger } from "@steward/sdk";
import { errnoCode } from "./lifecycle-errors.js";
import type { BracketFailure } from "./package-manager.js";

export type ExtensionAuditOperation = "install" | "update" | "remove" | "manage";

export type ExtensionAuditResult = "success" | "partial" | "failed" | "forbidden";

export type ExtensionAuditRecord = {
  operationId: string;
  recordedAt: string;
  actorRole: string;
  actorId: string | null;
  requestOrigin: {
    ip: string | null;
    userAgent: string | null;
  };
  operation: ExtensionAuditOperation;
  packages: Array<string>;
  result: ExtensionAuditResult;
  errorCode: string | null;
  errorSummary: string | null;
  failures: Array<BracketFailure>;
};

type ExtensionAuditFile = {
  version: 1;
  records: Array<ExtensionAuditRecord>;
};

function isAuditFile(value: unknown): value is ExtensionAuditFile {
  return (
    !!value &&
    typeof value === "object" &&
    "version" in value &&
    value.version === 1 &&
    "records" in value &&
    Array.isArray(value.records)
  );
}

export class ExtensionAuditStore {
  private readonly filePath: string;
  private readonly logger: Pick<StewardLogger, "warn">;
  private appendQueue: Promise<void> = Promise.resolve();

  constructor(input: { dataDir: string; logger: Pick<StewardLogger, "warn"> }) {
    this.filePath = path.join(input.dataDir, "extension-audit.json");
    this.logger = input.logger;
  }

  public get path(): string {
    return this.filePath;
  }

  public async append(record: ExtensionAuditRecord): Promise<void> {
    const runAppend = async (): Promise<void> => {
      const state = await this.read();
      state.records.push(record);
      await this.write(state);
    };

    const queued = this.appendQueue.then(runAppend, runAppend);
    this.appendQueue = queued.then(
      () => undefined,
      () => undefined
    );
    await queued;
  }

  public async list(): Promise<Array<ExtensionAuditRecord>> {
    await this.appendQueue;
    const state = await this.read();
    return [...state.records];
  }

  private async read(): Promise<ExtensionAuditFile> {
    try {
      const raw = await readFile(this.filePath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (isAuditFile(parsed)) {
        return parsed;
      }
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        this.logger.warn({ error, filePath: this.filePath }, "failed to read extension audit store; using empty state");
      }
    }

    return {
      version: 1,
      records: []
    };
  }

  private async write(state: ExtensionAuditFile): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  }
}
