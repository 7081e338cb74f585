import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";

export type CliAuthConfig = {
  bearer: string | null;
  rbacToken: string | null;
  role: string | null;
  actor: string | null;
};

export type CliProfile = {
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  auth: CliAuthConfig;
};

export type CliConfigStore = {
  currentProfile: string;
  profiles: Record<string, CliProfile>;
};

const DEFAULT_PROFILE_NAME = "local";

export const DEFAULT_PROFILE: CliProfile = {
  baseUrl: "http://127.0.0.1:3001",
  apiPrefix: "/api",
  timeoutMs: 30_000,
  auth: {
    bearer: null,
    rbacToken: null,
    role: null,
    actor: null
  }
};

export function configFilePath(): string {
  const root = process.env.XDG_CONFIG_HOME ? process.env.XDG_CONFIG_HOME : path.join(homedir(), ".config");
  return path.join(root, "steward", "cli", "config.json");
}

function readRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === "object" && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function trimmedOrNull(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

export function normalizePrefix(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    return DEFAULT_PROFILE.apiPrefix;
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export function normalizeProfile(input: unknown): CliProfile {
  const profile = readRecord(input);
  const auth = readRecord(profile.auth);
  const baseUrl = trimmedOrNull(profile.baseUrl);
  const apiPrefix = trimmedOrNull(profile.apiPrefix);
  const timeoutMs = profile.timeoutMs;

  return {
    baseUrl: baseUrl ?? DEFAULT_PROFILE.baseUrl,
    apiPrefix: apiPrefix ? normalizePrefix(apiPrefix) : DEFAULT_PROFILE.apiPrefix,
    timeoutMs:
      typeof timeoutMs === "number" && Number.isFinite(timeoutMs) && timeoutMs > 0
        ? Math.floor(timeoutMs)
        : DEFAULT_PROFILE.timeoutMs,
    auth: {
      bearer: trimmedOrNull(auth.bearer),
      rbacToken: trimmedOrNull(auth.rbacToken),
      role: trimmedOrNull(auth.role),
      actor: trimmedOrNull(auth.actor)
    }
  };
}

function defaultConfig(): CliConfigStore {
  return {
    currentProfile: DEFAULT_PROFILE_NAME,
    profiles: {
      [DEFAULT_PROFILE_NAME]: { ...DEFAULT_PROFILE }
    }
  };
}

export async function loadCliConfig(): Promise<CliConfigStore> {
  let raw: string;
  try {
    raw = await readFile(configFilePath(), "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return defaultConfig();
    }
    throw error;
  }

  const parsed = readRecord(JSON.parse(raw));
  const profiles = Object.fromEntries(
    Object.entries(readRecord(parsed.profiles)).map(([name, profile]) => [name, normalizeProfile(profile)])
  );
  if (!(DEFAULT_PROFILE_NAME in profiles)) {
    profiles[DEFAULT_PROFILE_NAME] = { ...DEFAULT_PROFILE };
  }

  const currentProfile =
    typeof parsed.currentProfile === "string" && parsed.currentProfile in profiles
      ? parsed.currentProfile
      : DEFAULT_PROFILE_NAME;

  return {
    currentProfile,
    profiles
  };
}

export async function saveCliConfig(config: CliConfigStore): Promise<void> {
  const file = configFilePath();
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, `${JSON.stringify(config, null, 2)}\n`, "utf8");
}

export function resolveProfile(config: CliConfigStore, profileName?: string): { name: string; profile: CliProfile } {
  const name = profileName && profileName.trim().length > 0 ? profileName.trim() : config.currentProfile;
  const profile = config.profiles[name] ?? config.profiles[DEFAULT_PROFILE_NAME] ?? DEFAULT_PROFILE;
  return {
    name,
    profile: normalizeProfile(profile)
  };
}

export async function upsertProfile(
  profileName: string,
  mutator: (current: CliProfile) => CliProfile
): Promise<{ profileName: string; profile: CliProfile }> {
  const trimmed = profileName.trim();
  if (!trimmed) {
    throw new Error("profile name is required");
  }

  const config = await loadCliConfig();
  const next = normalizeProfile(mutator(normalizeProfile(config.profiles[trimmed])));
  config.profiles[trimmed] = next;
  await saveCliConfig(config);
  return {
    profileName: trimmed,
    profile: next
  };
}

export async function setCurrentProfile(profileName: string): Promise<CliConfigStore> {
  const trimmed = profileName.trim();
  if (!trimmed) {
    throw new Error("profile name is required");
  }

  const config = await loadCliConfig();
  if (!(trimmed in config.profiles)) {
    throw new Error(`profile not found: ${trimmed}`);
  }
  config.currentProfile = trimmed;
  await saveCliConfig(config);
  return config;
}
