import { ApiRequestError, type InvokeApiResult } from "./http.js";
import type { RuntimeContext } from "./runtime.js";

function prettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function field(value: unknown, key: string): unknown {
  return value && typeof value === "object" && key in value ? Object.getOwnPropertyDescriptor(value, key)?.value : undefined;
}

/**
 * Progress lines the API collected while running a lifecycle operation.
 */
export function outputLines(body: unknown): Array<string> {
  const output = field(body, "output");
  return Array.isArray(output) ? output.filter((line): line is string => typeof line === "string") : [];
}

export function formatError(error: unknown): string {
  if (error instanceof ApiRequestError) {
    const message = field(error.body, "message");
    const code = field(error.body, "code");
    if (typeof message === "string") {
      return typeof code === "string" ? `${message} [${code}]` : message;
    }
    return `${error.message}: ${typeof error.body === "string" ? error.body : prettyJson(error.body)}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function printSuccess(ctx: RuntimeContext, result: InvokeApiResult): void {
  if (ctx.outputJson) {
    process.stdout.write(
      `${prettyJson({
        ok: true,
        command: result.command,
        request: result.request,
        response: result.response
      })}\n`
    );
    return;
  }

  for (const line of outputLines(result.response.body)) {
    process.stdout.write(`${line}\n`);
  }
  const payload = field(result.response.body, "result") ?? field(result.response.body, "data") ?? result.response.body;
  process.stdout.write(`${prettyJson(payload)}\n`);
}

export function printError(ctx: RuntimeContext, command: string, error: unknown): void {
  if (ctx.outputJson) {
    process.stderr.write(
      `${prettyJson({
        ok: false,
        command,
        error: {
          kind: error instanceof ApiRequestError ? "api_error" : "command_failed",
          message: formatError(error),
          ...(error instanceof ApiRequestError ? { statusCode: error.statusCode, body: error.body } : {})
        }
      })}\n`
    );
    return;
  }

  if (error instanceof ApiRequestError) {
    for (const line of outputLines(error.body)) {
      process.stderr.write(`${line}\n`);
    }
  }
  process.stderr.write(`Error: ${formatError(error)}\n`);
}
