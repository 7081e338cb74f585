import type { Command } from "commander";
import { loadCliConfig, normalizePrefix, resolveProfile } from "./config.js";

export type GlobalOptions = {
  profile?: string;
  baseUrl?: string;
  apiPrefix?: string;
  timeoutMs?: string;
  json?: boolean;
  bearer?: string;
  rbacToken?: string;
  role?: string;
  actor?: string;
};

export type RuntimeContext = {
  profileName: string;
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  outputJson: boolean;
  headers: Record<string, string>;
};

function firstNonEmpty(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function positiveInt(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : null;
}

/**
 * Resolves connection settings with precedence flag > STEWARD_* environment > profile.
 */
export async function buildRuntime(command: Command, env: NodeJS.ProcessEnv = process.env): Promise<RuntimeContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const config = await loadCliConfig();
  const { name: profileName, profile } = resolveProfile(config, opts.profile);

  const timeoutMs =
    positiveInt(firstNonEmpty(opts.timeoutMs)) ?? positiveInt(firstNonEmpty(env.STEWARD_TIMEOUT_MS)) ?? profile.timeoutMs;
  const baseUrl = (firstNonEmpty(opts.baseUrl, env.STEWARD_API_BASE) ?? profile.baseUrl).replace(/\/$/, "");
  const apiPrefix = normalizePrefix(firstNonEmpty(opts.apiPrefix, env.STEWARD_API_PREFIX) ?? profile.apiPrefix);

  const bearer = firstNonEmpty(opts.bearer, env.STEWARD_BEARER_TOKEN, profile.auth.bearer);
  const rbacToken = firstNonEmpty(opts.rbacToken, env.STEWARD_RBAC_TOKEN, profile.auth.rbacToken);
  const role = firstNonEmpty(opts.role, env.STEWARD_RBAC_ROLE, profile.auth.role);
  const actor = firstNonEmpty(opts.actor, env.STEWARD_RBAC_ACTOR, profile.auth.actor);

  const headers: Record<string, string> = {};
  if (bearer) {
    headers.Authorization = `Bearer ${bearer}`;
  }
  if (rbacToken) {
    headers["x-steward-rbac-token"] = rbacToken;
  }
  if (role) {
    headers["x-steward-role"] = role;
  }
  if (actor) {
    headers["x-steward-actor"] = actor;
  }

  return {
    profileName,
    baseUrl,
    apiPrefix,
    timeoutMs,
    outputJson: Boolean(opts.json),
    headers
  };
}
