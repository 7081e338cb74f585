import { randomUUID } from "node:crypto";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z, ZodError } from "zod";
import { IO_VERBOSITY, type ExtensionRegistry, type IoVerbosity, type StewardLogger } from "@steward/sdk";
import type { ExtensionAuditOperation, ExtensionAuditStore } from "./extension-audit-store.js";
import { BufferedExtensionIo } from "./extension-io.js";
import type { ExtensionManager } from "./extension-manager.js";
import {
  MUTATING_ROLES,
  READ_ROLES,
  resolveRequestRole,
  roleAllowed,
  type ExtensionRole,
  type RbacConfig
} from "./extension-rbac.js";
import { describeLifecycleOutcome, errorMessage, LifecycleError, type LifecycleErrorCode } from "./lifecycle-errors.js";
import type { MessageCatalog } from "./message-catalog.js";
import type { BracketFailure } from "./package-manager.js";

export type AppServices = {
  manager: ExtensionManager;
  registry: ExtensionRegistry;
  auditStore: ExtensionAuditStore;
  catalog: MessageCatalog;
};

export type BuildAppInput = {
  logLevel: string | false;
  rbac: RbacConfig;
  ioVerbosity?: IoVerbosity;
  services: (logger: StewardLogger) => AppServices;
};

const packagesBodySchema = z.object({
  packages: z.union([
    z.array(z.string().trim().min(1)).min(1),
    z.record(z.string()).refine((value) => Object.keys(value).length > 0, { message: "packages must not be empty" })
  ])
});

function requestedIds(packages: Array<string> | Record<string, string>): Array<string> {
  return Array.isArray(packages) ? packages : Object.keys(packages);
}

const manageParamsSchema = z.object({
  vendor: z.string().min(1),
  name: z.string().min(1)
});

const NOT_FOUND_CODES = new Set<LifecycleErrorCode>(["NOT_INSTALLED", "NOT_MANAGED", "PACKAGE_NOT_FOUND", "NOT_AVAILABLE"]);
const CONFLICT_CODES = new Set<LifecycleErrorCode>([
  "ALREADY_INSTALLED",
  "ALREADY_INSTALLED_MANUALLY",
  "ALREADY_MANAGED",
  "CANNOT_MANAGE_BACKUP_EXISTS"
]);
const INVALID_CODES = new Set<LifecycleErrorCode>([
  "INVALID_CONSTRAINT",
  "INVALID_EXTENSION_ID",
  "NO_MATCHING_VERSION",
  "UNEXPECTED_PACKAGE_TYPE",
  "UNSUPPORTED_OPERATION"
]);

export function statusCodeFor(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (!(error instanceof LifecycleError)) {
    return 500;
  }
  if (NOT_FOUND_CODES.has(error.code)) {
    return 404;
  }
  if (CONFLICT_CODES.has(error.code)) {
    return 409;
  }
  if (INVALID_CODES.has(error.code)) {
    return 400;
  }
  return 500;
}

function errorPayload(error: unknown, catalog: MessageCatalog, output: Array<string>): Record<string, unknown> {
  if (error instanceof LifecycleError) {
    return {
      status: "error",
      code: error.code,
      messageKey: error.messageKey,
      message: catalog.translate(error.messageKey, error.parameters),
      parameters: error.parameters,
      outcome: describeLifecycleOutcome(error),
      ...(error.cause !== undefined ? { cause: errorMessage(error.cause) } : {}),
      output
    };
  }

  if (error instanceof ZodError) {
    return {
      status: "error",
      code: "invalid_request",
      message: "request validation failed",
      issues: error.issues,
      outcome: "rejected",
      output
    };
  }

  return {
    status: "error",
    code: "internal_error",
    message: errorMessage(error),
    outcome: describeLifecycleOutcome(error),
    output
  };
}

export function buildApp(input: BuildAppInput): FastifyInstance {
  const app = Fastify({
    logger: input.logLevel === false ? false : { level: input.logLevel }
  });
  const { manager, registry, auditStore, catalog } = input.services(app.log);
  const ioVerbosity = input.ioVerbosity ?? IO_VERBOSITY.normal;

  type Authorization =
    | { ok: true; role: ExtensionRole; actorId: string | null }
    | { ok: false; statusCode: number; payload: Record<string, unknown>; role?: ExtensionRole };

  async function authorize(request: FastifyRequest, allowed: Array<ExtensionRole>): Promise<Authorization> {
    const resolved = await resolveRequestRole({
      config: input.rbac,
      headers: request.headers,
      requestIp: request.ip
    });
    if (!resolved.ok) {
      return resolved;
    }
    if (!roleAllowed(resolved.role, allowed)) {
      return {
        ok: false,
        statusCode: 403,
        role: resolved.role,
        payload: {
          status: "forbidden",
          code: "insufficient_role",
          role: resolved.role
        }
      };
    }
    return resolved;
  }

  async function recordAudit(
    request: FastifyRequest,
    entry: {
      operation: ExtensionAuditOperation;
      packages: Array<string>;
      role: string;
      actorId: string | null;
      result: "success" | "partial" | "failed" | "forbidden";
      error?: unknown;
      failures?: Array<BracketFailure>;
    }
  ): Promise<void> {
    const userAgent = request.headers["user-agent"];
    try {
      await auditStore.append({
        operationId: randomUUID(),
        recordedAt: new Date().toISOString(),
        actorRole: entry.role,
        actorId: entry.actorId,
        requestOrigin: {
          ip: request.ip,
          userAgent: typeof userAgent === "string" ? userAgent : null
        },
        operation: entry.operation,
        packages: entry.packages,
        result: entry.result,
        errorCode: entry.error instanceof LifecycleError ? entry.error.code : entry.error === undefined ? null : "internal_error",
        errorSummary: entry.error === undefined ? null : errorMessage(entry.error),
        failures: entry.failures ?? []
      });
    } catch (error) {
      request.log.warn({ error }, "failed to record extension audit entry");
    }
  }

  async function runMutation(
    request: FastifyRequest,
    reply: FastifyReply,
    operation: ExtensionAuditOperation,
    packages: Array<string>,
    run: (io: BufferedExtensionIo) => Promise<{ failures: Array<BracketFailure>; result: unknown }>
  ): Promise<Record<string, unknown>> {
    const access = await authorize(request, MUTATING_ROLES);
    if (!access.ok) {
      await recordAudit(request, {
        operation,
        packages,
        role: access.role ?? "unknown",
        actorId: null,
        result: "forbidden"
      });
      reply.code(access.statusCode);
      return access.payload;
    }

    const io = new BufferedExtensionIo({ catalog, logger: request.log, verbosity: ioVerbosity });
    try {
      const { failures, result } = await run(io);
      await recordAudit(request, {
        operation,
        packages,
        role: access.role,
        actorId: access.actorId,
        result: failures.length > 0 ? "partial" : "success",
        failures
      });
      return {
        status: failures.length > 0 ? "partial" : "ok",
        result,
        output: io.output()
      };
    } catch (error) {
      await recordAudit(request, {
        operation,
        packages,
        role: access.role,
        actorId: access.actorId,
        result: describeLifecycleOutcome(error) === "partially_managed" ? "partial" : "failed",
        error
      });
      reply.code(statusCodeFor(error));
      return errorPayload(error, catalog, io.output());
    }
  }

  async function requireReader(request: FastifyRequest, reply: FastifyReply): Promise<Record<string, unknown> | null> {
    const access = await authorize(request, READ_ROLES);
    if (access.ok) {
      return null;
    }
    reply.code(access.statusCode);
    return access.payload;
  }

  app.setErrorHandler((error, request, reply) => {
    const statusCode =
      error instanceof LifecycleError || error instanceof ZodError ? statusCodeFor(error) : (error.statusCode ?? 500);
    if (statusCode >= 500) {
      request.log.error({ error }, "request failed");
    } else {
      request.log.warn({ error }, "request rejected");
    }
    void reply.code(statusCode).send(errorPayload(error, catalog, []));
  });

  app.get("/api/health", async () => {
    return {
      status: "ok",
      service: "api",
      timestamp: new Date().toISOString()
    };
  });

  app.get("/api/extensions", async (request, reply) => {
    const denied = await requireReader(request, reply);
    if (denied) {
      return denied;
    }

    const available = await registry.allAvailable();
    const data = [];
    for (const extension of Object.values(available)) {
      data.push({
        id: extension.id,
        version: extension.version,
        displayName: extension.displayName,
        path: extension.path,
        enabled: await registry.isEnabled(extension.id),
        managed: await manager.isManaged(extension.id)
      });
    }
    return { data };
  });

  app.get("/api/packages/managed", async (request, reply) => {
    const denied = await requireReader(request, reply);
    if (denied) {
      return denied;
    }
    return { data: Object.values(await manager.getManagedPackages()) };
  });

  app.get("/api/packages/available", async (request, reply) => {
    const denied = await requireReader(request, reply);
    if (denied) {
      return denied;
    }
    return { data: await manager.getAvailablePackages() };
  });

  app.get("/api/requirements", async (request, reply) => {
    const denied = await requireReader(request, reply);
    if (denied) {
      return denied;
    }
    return { satisfied: await manager.checkRequirements() };
  });

  app.get("/api/audit", async (request, reply) => {
    const denied = await requireReader(request, reply);
    if (denied) {
      return denied;
    }
    return { data: await auditStore.list() };
  });

  app.post("/api/packages/install", async (request, reply) => {
    const body = packagesBodySchema.parse(request.body);
    return runMutation(request, reply, "install", requestedIds(body.packages), async (io) => {
      const result = await manager.install(body.packages, io);
      return { failures: result.failures, result };
    });
  });

  app.post("/api/packages/update", async (request, reply) => {
    const body = packagesBodySchema.parse(request.body);
    return runMutation(request, reply, "update", requestedIds(body.packages), async (io) => {
      const result = await manager.update(body.packages, io);
      return { failures: result.failures, result };
    });
  });

  app.post("/api/packages/remove", async (request, reply) => {
    const body = packagesBodySchema.parse(request.body);
    return runMutation(request, reply, "remove", requestedIds(body.packages), async (io) => {
      const result = await manager.remove(body.packages, io);
      return { failures: result.failures, result };
    });
  });

  app.post("/api/extensions/:vendor/:name/manage", async (request, reply) => {
    const params = manageParamsSchema.parse(request.params);
    const id = `${params.vendor}/${params.name}`;
    return runMutation(request, reply, "manage", [id], async (io) => {
      const result = await manager.startManaging(id, io);
      return { failures: [], result };
    });
  });

  return app;
}
