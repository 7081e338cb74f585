import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { IO_VERBOSITY, type IoVerbosity } from "@steward/sdk";
import type { RbacConfig } from "./extension-rbac.js";

loadEnv();

const booleanFlag = z.enum(["true", "false"]);

const envSchema = z.object({
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_DIR: z.string().min(1).default(".data"),
  EXTENSIONS_DIR: z.string().min(1).default("extensions"),
  PACKAGE_REPOSITORY_DIR: z.string().min(1).default("repository"),
  PACKAGE_TYPE: z.string().min(1).default("steward-extension"),
  EXCEPTION_PREFIX: z.string().default("EXTENSIONS_"),
  HOST_VERSION: z.string().min(1).default("1.0.0"),
  ENABLE_ON_INSTALL: booleanFlag.default("false"),
  PURGE_ON_REMOVE: booleanFlag.default("false"),
  IO_VERBOSITY: z.enum(["quiet", "normal", "verbose", "very-verbose", "debug"]).default("normal"),
  EXTENSION_RBAC_MODE: z.enum(["disabled", "header", "jwt"]).default("disabled"),
  EXTENSION_ALLOW_INSECURE_HEADER_MODE: booleanFlag.default("false"),
  EXTENSION_RBAC_HEADER_SECRET: z.string().optional(),
  EXTENSION_RBAC_JWT_SECRET: z.string().optional(),
  EXTENSION_RBAC_JWT_ISSUER: z.string().optional(),
  EXTENSION_RBAC_JWT_AUDIENCE: z.string().optional(),
  EXTENSION_RBAC_JWT_ROLE_CLAIM: z.string().default("role"),
  EXTENSION_RBAC_JWT_ACTOR_CLAIM: z.string().default("sub")
});

export type StewardEnv = z.infer<typeof envSchema>;

function isLoopbackHost(host: string): boolean {
  return host === "127.0.0.1" || host === "::1" || host === "localhost";
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed.length > 0 ? trimmed : null;
}

const verbosityByName: Record<StewardEnv["IO_VERBOSITY"], IoVerbosity> = {
  quiet: IO_VERBOSITY.quiet,
  normal: IO_VERBOSITY.normal,
  verbose: IO_VERBOSITY.verbose,
  "very-verbose": IO_VERBOSITY.veryVerbose,
  debug: IO_VERBOSITY.debug
};

export function assertRbacSettings(parsed: StewardEnv): void {
  const allowInsecure = parsed.EXTENSION_ALLOW_INSECURE_HEADER_MODE === "true";
  if (parsed.EXTENSION_RBAC_MODE === "header") {
    if (!allowInsecure && !isLoopbackHost(parsed.HOST)) {
      throw new Error(
        `EXTENSION_RBAC_MODE=header requires loopback HOST or EXTENSION_ALLOW_INSECURE_HEADER_MODE=true (received HOST=${parsed.HOST})`
      );
    }
    if (!allowInsecure && nonEmpty(parsed.EXTENSION_RBAC_HEADER_SECRET) === null) {
      throw new Error(
        "EXTENSION_RBAC_MODE=header requires EXTENSION_RBAC_HEADER_SECRET unless EXTENSION_ALLOW_INSECURE_HEADER_MODE=true"
      );
    }
  }

  if (parsed.EXTENSION_RBAC_MODE === "jwt" && nonEmpty(parsed.EXTENSION_RBAC_JWT_SECRET) === null) {
    throw new Error("EXTENSION_RBAC_MODE=jwt requires EXTENSION_RBAC_JWT_SECRET");
  }
}

export function rbacConfigFrom(parsed: StewardEnv): RbacConfig {
  return {
    mode: parsed.EXTENSION_RBAC_MODE,
    header: {
      secret: nonEmpty(parsed.EXTENSION_RBAC_HEADER_SECRET)
    },
    jwt: {
      secret: nonEmpty(parsed.EXTENSION_RBAC_JWT_SECRET),
      issuer: nonEmpty(parsed.EXTENSION_RBAC_JWT_ISSUER),
      audience: nonEmpty(parsed.EXTENSION_RBAC_JWT_AUDIENCE),
      roleClaim: parsed.EXTENSION_RBAC_JWT_ROLE_CLAIM,
      actorClaim: parsed.EXTENSION_RBAC_JWT_ACTOR_CLAIM
    }
  };
}

function declaresWorkspaces(dir: string): boolean {
  const manifestPath = path.join(dir, "package.json");
  if (!existsSync(manifestPath)) {
    return false;
  }
  const manifest: unknown = JSON.parse(readFileSync(manifestPath, "utf8"));
  return !!manifest && typeof manifest === "object" && "workspaces" in manifest;
}

function findWorkspaceRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    if (declaresWorkspaces(current)) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return startDir;
    }

    current = parent;
  }
}

export function loadStewardEnv(source: NodeJS.ProcessEnv, cwd: string) {
  const parsed = envSchema.parse(source);
  assertRbacSettings(parsed);

  const workspaceRoot = findWorkspaceRoot(cwd);
  const resolveFromWorkspaceRoot = (value: string): string =>
    path.isAbsolute(value) ? value : path.resolve(workspaceRoot, value);

  return {
    ...parsed,
    WORKSPACE_ROOT: workspaceRoot,
    DATA_DIR: resolveFromWorkspaceRoot(parsed.DATA_DIR),
    EXTENSIONS_DIR: resolveFromWorkspaceRoot(parsed.EXTENSIONS_DIR),
    PACKAGE_REPOSITORY_DIR: resolveFromWorkspaceRoot(parsed.PACKAGE_REPOSITORY_DIR),
    ENABLE_ON_INSTALL: parsed.ENABLE_ON_INSTALL === "true",
    PURGE_ON_REMOVE: parsed.PURGE_ON_REMOVE === "true",
    IO_VERBOSITY: verbosityByName[parsed.IO_VERBOSITY],
    RBAC: rbacConfigFrom(parsed)
  };
}
