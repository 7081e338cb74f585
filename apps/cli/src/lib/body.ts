import { readFile } from "node:fs/promises";

export type PackagesBody = {
  packages: Array<string> | Record<string, string>;
};

export async function parseJsonInput(value: string): Promise<unknown> {
  const source = value.trim();
  if (!source) {
    throw new Error("json input is empty");
  }

  if (source.startsWith("@")) {
    const file = source.slice(1);
    const content = await readFile(file, "utf8");
    return JSON.parse(content);
  }

  return JSON.parse(source);
}

/**
 * Turns `vendor/name` or `vendor/name@constraint` arguments into a request body.
 * Without any constraint the ids are sent as a plain list.
 */
export function parsePackageArgs(args: Array<string>): PackagesBody {
  const constraints: Record<string, string> = {};
  let constrained = false;

  for (const arg of args) {
    const trimmed = arg.trim();
    if (!trimmed) {
      continue;
    }
    const index = trimmed.indexOf("@");
    const id = index === -1 ? trimmed : trimmed.slice(0, index).trim();
    const constraint = index === -1 ? "" : trimmed.slice(index + 1).trim();
    if (!id) {
      throw new Error(`package id is missing in "${arg}"`);
    }
    if (Object.hasOwn(constraints, id)) {
      throw new Error(`package ${id} is listed more than once`);
    }
    constrained = constrained || constraint.length > 0;
    constraints[id] = constraint;
  }

  const ids = Object.keys(constraints);
  if (ids.length === 0) {
    throw new Error("at least one package id is required");
  }

  return { packages: constrained ? constraints : ids };
}

export async function resolvePackagesBody(args: Array<string>, fromJson: string | undefined): Promise<PackagesBody> {
  if (typeof fromJson !== "string") {
    return parsePackageArgs(args);
  }
  if (args.length > 0) {
    throw new Error("package arguments and --from-json are mutually exclusive");
  }

  const parsed = await parseJsonInput(fromJson);
  if (Array.isArray(parsed)) {
    return parsePackageArgs(parsed.filter((entry): entry is string => typeof entry === "string"));
  }
  if (parsed && typeof parsed === "object") {
    const packages: Record<string, string> = {};
    for (const [id, constraint] of Object.entries(parsed)) {
      if (typeof constraint !== "string") {
        throw new Error(`constraint for ${id} must be a string`);
      }
      packages[id] = constraint;
    }
    return { packages };
  }
  throw new Error("--from-json must be a list of ids or an id => constraint map");
}
