import { timingSafeEqual } from "node:crypto";
import { jwtVerify } from "jose";

export type ExtensionRole = "member" | "admin" | "owner" | "system";

export type RbacMode = "disabled" | "header" | "jwt";

export type RbacJwtConfig = {
  secret: string | null;
  issuer: string | null;
  audience: string | null;
  roleClaim: string;
  actorClaim: string;
};

export type RbacHeaderConfig = {
  secret: string | null;
};

export type RbacConfig = {
  mode: RbacMode;
  header?: RbacHeaderConfig;
  jwt?: RbacJwtConfig;
};

export const READ_ROLES: Array<ExtensionRole> = ["member", "admin", "owner", "system"];
export const MUTATING_ROLES: Array<ExtensionRole> = ["admin", "owner", "system"];

export const ROLE_HEADER = "x-steward-role";
export const ACTOR_HEADER = "x-steward-actor";
export const TOKEN_HEADER = "x-steward-rbac-token";

export type RequestRoleResolution =
  | {
      ok: true;
      role: ExtensionRole;
      actorId: string | null;
    }
  | {
      ok: false;
      statusCode: number;
      payload: {
        status: "forbidden" | "unauthorized" | "error";
        code: string;
      };
    };

function deny(statusCode: number, status: "forbidden" | "unauthorized" | "error", code: string): RequestRoleResolution {
  return {
    ok: false,
    statusCode,
    payload: {
      status,
      code
    }
  };
}

function isLoopbackAddress(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return false;
  }

  if (normalized === "localhost" || normalized === "::1") {
    return true;
  }

  const ipv4MappedPrefix = "::ffff:";
  const ipv4Candidate = normalized.startsWith(ipv4MappedPrefix) ? normalized.slice(ipv4MappedPrefix.length) : normalized;
  return ipv4Candidate === "127.0.0.1" || ipv4Candidate.startsWith("127.");
}

export function normalizeHeaderValue(value: unknown): string | null {
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" ? first.trim() : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

export function isExtensionRole(value: string): value is ExtensionRole {
  return value === "member" || value === "admin" || value === "owner" || value === "system";
}

const jwtSecretEncoder = new TextEncoder();

async function resolveJwtRole(headers: Record<string, unknown>, config: RbacJwtConfig | undefined): Promise<RequestRoleResolution> {
  if (!config?.secret || config.secret.trim().length === 0) {
    return deny(500, "error", "rbac_misconfigured");
  }

  const authorizationHeader = normalizeHeaderValue(headers["authorization"]);
  if (!authorizationHeader) {
    return deny(401, "unauthorized", "missing_bearer_token");
  }

  const tokenMatch = authorizationHeader.match(/^Bearer\s+(.+)$/i);
  const token = tokenMatch?.[1]?.trim() ?? "";
  if (token.length === 0) {
    return deny(401, "unauthorized", "invalid_authorization_header");
  }

  try {
    const result = await jwtVerify(token, jwtSecretEncoder.encode(config.secret), {
      ...(config.issuer ? { issuer: config.issuer } : {}),
      ...(config.audience ? { audience: config.audience } : {})
    });
    const roleValue = result.payload[config.roleClaim];
    const normalizedRole = typeof roleValue === "string" ? roleValue.trim() : "";
    if (!isExtensionRole(normalizedRole)) {
      return deny(403, "forbidden", "invalid_role_claim");
    }

    const actorValue = result.payload[config.actorClaim];
    return {
      ok: true,
      role: normalizedRole,
      actorId: typeof actorValue === "string" && actorValue.trim().length > 0 ? actorValue.trim() : null
    };
  } catch {
    return deny(401, "unauthorized", "invalid_bearer_token");
  }
}

function resolveHeaderRole(headers: Record<string, unknown>, config: RbacHeaderConfig | undefined): RequestRoleResolution {
  const headerSecret = typeof config?.secret === "string" ? config.secret.trim() : "";
  if (headerSecret.length > 0) {
    const presentedSecret = normalizeHeaderValue(headers[TOKEN_HEADER]);
    if (!presentedSecret) {
      return deny(401, "unauthorized", "missing_header_token");
    }
    const expectedBuffer = Buffer.from(headerSecret);
    const receivedBuffer = Buffer.from(presentedSecret);
    if (expectedBuffer.length !== receivedBuffer.length || !timingSafeEqual(expectedBuffer, receivedBuffer)) {
      return deny(401, "unauthorized", "invalid_header_token");
    }
  }

  const roleHeader = normalizeHeaderValue(headers[ROLE_HEADER]);
  if (!roleHeader) {
    return deny(401, "unauthorized", "missing_role");
  }
  if (!isExtensionRole(roleHeader)) {
    return deny(400, "error", "invalid_role");
  }

  return {
    ok: true,
    role: roleHeader,
    actorId: normalizeHeaderValue(headers[ACTOR_HEADER])
  };
}

export async function resolveRequestRole(input: {
  config: RbacConfig;
  headers: Record<string, unknown>;
  requestIp?: string | null;
}): Promise<RequestRoleResolution> {
  if (input.config.mode === "disabled") {
    if (!isLoopbackAddress(typeof input.requestIp === "string" ? input.requestIp : "")) {
      return deny(403, "forbidden", "rbac_disabled_remote_forbidden");
    }
    return {
      ok: true,
      role: "admin",
      actorId: "local-disabled-rbac"
    };
  }

  if (input.config.mode === "jwt") {
    return resolveJwtRole(input.headers, input.config.jwt);
  }

  return resolveHeaderRole(input.headers, input.config.header);
}

export function roleAllowed(role: ExtensionRole, allowed: Array<ExtensionRole>): boolean {
  return allowed.includes(role);
}
