import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import semver from "semver";
import { isRecord } from "@steward/sdk";

export const MANIFEST_FILENAME = "extension.manifest.json";

const EXTENSION_ID_PATTERN = /^[a-z0-9][a-z0-9_.-]*\/[a-z0-9][a-z0-9_.-]*$/;

export type ExtensionManifest = {
  name: string;
  version: string;
  displayName: string;
  type: string | null;
  requires: {
    host: string | null;
  };
};

export type ManifestReadResult = {
  manifestPath: string | null;
  manifest: ExtensionManifest | null;
  diagnostics: Array<string>;
};

export function isExtensionId(value: string): boolean {
  return EXTENSION_ID_PATTERN.test(value);
}

export function normalizeSemver(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const valid = semver.valid(trimmed, { loose: true });
  if (valid) {
    return valid;
  }

  const coerced = semver.coerce(trimmed, { loose: true });
  return coerced ? coerced.version : null;
}

export function matchesVersionRange(actualVersion: string, range: string): boolean {
  const normalizedActual = normalizeSemver(actualVersion);
  if (!normalizedActual) {
    return false;
  }

  const normalizedRange = range.trim();
  if (normalizedRange.length === 0) {
    return true;
  }

  try {
    return semver.satisfies(normalizedActual, normalizedRange, {
      includePrerelease: true,
      loose: true
    });
  } catch {
    return false;
  }
}

export function parseManifestLike(input: unknown): ExtensionManifest | null {
  if (!isRecord(input)) {
    return null;
  }

  const name = typeof input.name === "string" ? input.name.trim() : "";
  const version = typeof input.version === "string" ? input.version.trim() : "";
  if (!name || !version || !isExtensionId(name)) {
    return null;
  }

  const displayName = typeof input.displayName === "string" && input.displayName.trim().length > 0 ? input.displayName.trim() : name;
  const type = typeof input.type === "string" && input.type.trim().length > 0 ? input.type.trim() : null;
  const requiresRaw = isRecord(input.requires) ? input.requires : null;
  const host = typeof requiresRaw?.host === "string" && requiresRaw.host.trim().length > 0 ? requiresRaw.host.trim() : null;

  return {
    name,
    version,
    displayName,
    type,
    requires: {
      host
    }
  };
}

export async function readExtensionManifest(extensionRoot: string): Promise<ManifestReadResult> {
  const manifestPath = path.join(extensionRoot, MANIFEST_FILENAME);
  if (!existsSync(manifestPath)) {
    return {
      manifestPath: null,
      manifest: null,
      diagnostics: []
    };
  }

  try {
    const raw = await readFile(manifestPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    const manifest = parseManifestLike(parsed);
    if (!manifest) {
      return {
        manifestPath,
        manifest: null,
        diagnostics: ["manifest shape is invalid or missing required fields"]
      };
    }
    return {
      manifestPath,
      manifest,
      diagnostics: []
    };
  } catch (error) {
    return {
      manifestPath,
      manifest: null,
      diagnostics: [error instanceof Error ? error.message : String(error)]
    };
  }
}

export function evaluateHostCompatibility(requires: ExtensionManifest["requires"], hostVersion: string): Array<string> {
  const reasons: Array<string> = [];
  if (requires.host && !matchesVersionRange(hostVersion, requires.host)) {
    reasons.push(`requires host ${requires.host}; host=${hostVersion}`);
  }
  return reasons;
}
