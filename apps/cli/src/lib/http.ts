import type { RuntimeContext } from "./runtime.js";

export type RequestMethod = "GET" | "POST";

export type InvokeApiInput = {
  command: string;
  method: RequestMethod;
  pathTemplate: string;
  pathParams?: Record<string, string>;
  body?: unknown;
};

export type InvokeApiResult = {
  command: string;
  request: {
    method: RequestMethod;
    url: string;
  };
  response: {
    statusCode: number;
    body: unknown;
  };
};

export class ApiRequestError extends Error {
  public readonly statusCode: number;
  public readonly body: unknown;

  constructor(method: RequestMethod, url: string, statusCode: number, body: unknown) {
    super(`HTTP ${statusCode} for ${method} ${url}`);
    this.name = "ApiRequestError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

export function buildUrl(ctx: RuntimeContext, pathTemplate: string, pathParams: Record<string, string> = {}): string {
  let next = pathTemplate;
  for (const [key, value] of Object.entries(pathParams)) {
    next = next.replaceAll(`:${key}`, encodeURIComponent(value));
  }
  return `${ctx.baseUrl}${ctx.apiPrefix}${next.startsWith("/") ? next : `/${next}`}`;
}

function parseBody(rawText: string): unknown {
  if (rawText.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(rawText);
  } catch {
    return rawText;
  }
}

export async function invokeApi(ctx: RuntimeContext, input: InvokeApiInput): Promise<InvokeApiResult> {
  const url = buildUrl(ctx, input.pathTemplate, input.pathParams);
  const headers: Record<string, string> = {
    Accept: "application/json",
    ...ctx.headers
  };

  let body: string | undefined;
  if (input.body !== undefined) {
    headers["content-type"] = "application/json";
    body = JSON.stringify(input.body);
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort();
  }, Math.max(1, ctx.timeoutMs));

  let response: Response;
  try {
    response = await fetch(url, {
      method: input.method,
      headers,
      body,
      signal: controller.signal
    });
  } finally {
    clearTimeout(timeout);
  }

  const parsedBody = parseBody(await response.text());
  if (!response.ok) {
    throw new ApiRequestError(input.method, url, response.status, parsedBody);
  }

  return {
    command: input.command,
    request: {
      method: input.method,
      url
    },
    response: {
      statusCode: response.status,
      body: parsedBody
    }
  };
}
