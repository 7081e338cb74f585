#!/usr/bin/env node
import { Command } from "commander";
import { loadCliConfig, setCurrentProfile, upsertProfile, type CliProfile } from "./lib/config.js";
import { resolvePackagesBody } from "./lib/body.js";
import { invokeApi, type InvokeApiInput } from "./lib/http.js";
import { formatError, printError, printSuccess } from "./lib/output.js";
import { buildRuntime, type RuntimeContext } from "./lib/runtime.js";

async function runApiCall(ctx: RuntimeContext, input: InvokeApiInput): Promise<void> {
  const result = await invokeApi(ctx, input);
  printSuccess(ctx, result);
}

function withRuntime(
  commandName: string,
  handler: (ctx: RuntimeContext, args: Array<unknown>) => Promise<void>
): (...args: Array<unknown>) => Promise<void> {
  return async (...args: Array<unknown>) => {
    const command = args.at(-1);
    if (!(command instanceof Command)) {
      throw new Error("commander command context unavailable");
    }

    let ctx: RuntimeContext | null = null;
    try {
      ctx = await buildRuntime(command);
      await handler(ctx, args);
    } catch (error) {
      if (ctx) {
        printError(ctx, commandName, error);
      } else {
        process.stderr.write(`Error: ${formatError(error)}\n`);
      }
      process.exitCode = 1;
    }
  };
}

function withLocalErrors<A extends Array<unknown>>(handler: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await handler(...args);
    } catch (error) {
      process.stderr.write(`Error: ${formatError(error)}\n`);
      process.exitCode = 1;
    }
  };
}

function stringArgs(value: unknown): Array<string> {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}

function stringOption(options: unknown, key: string): string | undefined {
  if (!options || typeof options !== "object" || !(key in options)) {
    return undefined;
  }
  const value: unknown = Object.getOwnPropertyDescriptor(options, key)?.value;
  return typeof value === "string" ? value : undefined;
}

type ProfileUpdates = {
  baseUrl?: string;
  apiPrefix?: string;
  timeoutMs?: string;
  bearer?: string;
  rbacToken?: string;
  role?: string;
  actor?: string;
};

function applyProfileUpdates(profile: CliProfile, updates: ProfileUpdates): CliProfile {
  const timeoutMs =
    typeof updates.timeoutMs === "string" && updates.timeoutMs.trim().length > 0 ? Number(updates.timeoutMs) : Number.NaN;
  const pick = (next: string | undefined, current: string | null): string | null =>
    next?.trim() ? next.trim() : current;

  return {
    baseUrl: updates.baseUrl?.trim() ? updates.baseUrl.trim() : profile.baseUrl,
    apiPrefix: updates.apiPrefix?.trim() ? updates.apiPrefix.trim() : profile.apiPrefix,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? Math.floor(timeoutMs) : profile.timeoutMs,
    auth: {
      bearer: pick(updates.bearer, profile.auth.bearer),
      rbacToken: pick(updates.rbacToken, profile.auth.rbacToken),
      role: pick(updates.role, profile.auth.role),
      actor: pick(updates.actor, profile.auth.actor)
    }
  };
}

function addPackageMutation(packages: Command, name: "install" | "update" | "remove", description: string): void {
  packages
    .command(`${name} [ids...]`)
    .description(description)
    .option("--from-json <json>", "Package list or id => constraint map as JSON, or @file")
    .action(
      withRuntime(`packages ${name}`, async (ctx, args) => {
        const body = await resolvePackagesBody(stringArgs(args[0]), stringOption(args[1], "fromJson"));
        await runApiCall(ctx, {
          command: `packages ${name}`,
          method: "POST",
          pathTemplate: `/packages/${name}`,
          body
        });
      })
    );
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name("steward")
    .description("Extension steward operator CLI")
    .option("--profile <name>", "Profile name from CLI config")
    .option("--base-url <url>", "API base URL, e.g. http://127.0.0.1:3001")
    .option("--api-prefix <path>", "API prefix path")
    .option("--timeout-ms <n>", "Request timeout in milliseconds")
    .option("--json", "Emit machine-readable JSON envelope")
    .option("--bearer <token>", "Bearer auth token")
    .option("--rbac-token <token>", "RBAC header token")
    .option("--role <role>", "RBAC role header")
    .option("--actor <id>", "RBAC actor header");

  const profile = program.command("profile").description("Manage CLI profiles");
  profile.command("list").description("List profiles").action(
    withLocalErrors(async () => {
      const config = await loadCliConfig();
      process.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
    })
  );

  profile.command("use <name>").description("Set current profile").action(
    withLocalErrors(async (name: string) => {
      await setCurrentProfile(name);
      process.stdout.write(`${JSON.stringify({ status: "ok", currentProfile: name }, null, 2)}\n`);
    })
  );

  profile
    .command("set <name>")
    .description("Create or update profile defaults")
    .option("--base-url <url>")
    .option("--api-prefix <path>")
    .option("--timeout-ms <n>")
    .option("--bearer <token>")
    .option("--rbac-token <token>")
    .option("--role <role>")
    .option("--actor <actor>")
    .action(
      withLocalErrors(async (name: string, options: ProfileUpdates) => {
        const result = await upsertProfile(name, (current) => applyProfileUpdates(current, options));
        process.stdout.write(`${JSON.stringify({ status: "ok", ...result }, null, 2)}\n`);
      })
    );

  program
    .command("health")
    .description("Check API health")
    .action(
      withRuntime("health", async (ctx) => {
        await runApiCall(ctx, { command: "health", method: "GET", pathTemplate: "/health" });
      })
    );

  const extensions = program.command("extensions").description("Extensions present on disk");
  extensions
    .command("list")
    .description("List available extensions with their enabled and managed state")
    .action(
      withRuntime("extensions list", async (ctx) => {
        await runApiCall(ctx, { command: "extensions list", method: "GET", pathTemplate: "/extensions" });
      })
    );

  extensions
    .command("manage <id>")
    .description("Bring a manually installed extension under package management")
    .action(
      withRuntime("extensions manage", async (ctx, args) => {
        const id = typeof args[0] === "string" ? args[0].trim() : "";
        const separator = id.indexOf("/");
        if (separator <= 0 || separator === id.length - 1) {
          throw new Error(`extension id must look like vendor/name (received "${id}")`);
        }
        await runApiCall(ctx, {
          command: "extensions manage",
          method: "POST",
          pathTemplate: "/extensions/:vendor/:name/manage",
          pathParams: {
            vendor: id.slice(0, separator),
            name: id.slice(separator + 1)
          }
        });
      })
    );

  const packages = program.command("packages").description("Managed package operations");
  packages
    .command("list")
    .description("List managed packages")
    .action(
      withRuntime("packages list", async (ctx) => {
        await runApiCall(ctx, { command: "packages list", method: "GET", pathTemplate: "/packages/managed" });
      })
    );

  packages
    .command("available")
    .description("List packages in the repository")
    .action(
      withRuntime("packages available", async (ctx) => {
        await runApiCall(ctx, { command: "packages available", method: "GET", pathTemplate: "/packages/available" });
      })
    );

  addPackageMutation(packages, "install", "Install packages, e.g. acme/hello or acme/hello@^1.2");
  addPackageMutation(packages, "update", "Update managed packages");
  addPackageMutation(packages, "remove", "Remove managed packages");

  program
    .command("requirements")
    .description("Check installer requirements")
    .action(
      withRuntime("requirements", async (ctx) => {
        await runApiCall(ctx, { command: "requirements", method: "GET", pathTemplate: "/requirements" });
      })
    );

  const audit = program.command("audit").description("Lifecycle audit trail");
  audit
    .command("list")
    .description("List recorded lifecycle operations")
    .action(
      withRuntime("audit list", async (ctx) => {
        await runApiCall(ctx, { command: "audit list", method: "GET", pathTemplate: "/audit" });
      })
    );

  return program;
}

async function main(): Promise<void> {
  const program = buildProgram();
  const argv = [...process.argv];
  // npm script forwarding can leave a standalone "--" before command args.
  if (argv[2] === "--") {
    argv.splice(2, 1);
  }
  await program.parseAsync(argv);
}

main().catch((error) => {
  process.stderr.write(`Error: ${formatError(error)}\n`);
  process.exit(1);
});
