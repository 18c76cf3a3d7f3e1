import type { RuntimeContext } from "./runtime.js";

export type RequestMethod = "GET" | "POST" | "DELETE";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type InvokeApiInput = {
  command: string;
  method: RequestMethod;
  pathTemplate: string;
  pathParams?: Record<string, string>;
  body?: unknown;
  allowStatuses?: Array<number>;
};

export type InvokeApiResult = {
  command: string;
  request: {
    method: RequestMethod;
    path: string;
    url: string;
  };
  response: {
    statusCode: number;
    body: unknown;
    rawText: string;
  };
};

export class RelayApiError extends Error {
  public readonly statusCode: number;
  public readonly body: unknown;

  constructor(message: string, statusCode: number, body: unknown) {
    super(message);
    this.name = "RelayApiError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

function withPathParams(pathTemplate: string, pathParams: Record<string, string>): string {
  let next = pathTemplate;
  for (const [key, value] of Object.entries(pathParams)) {
    next = next.replaceAll(`:${key}`, encodeURIComponent(value));
  }
  return next;
}

export async function invokeApi(
  ctx: RuntimeContext,
  input: InvokeApiInput,
  fetchImpl: FetchLike = fetch
): Promise<InvokeApiResult> {
  const path = withPathParams(input.pathTemplate, input.pathParams ?? {});
  const url = `${ctx.baseUrl}${path}`;

  const headers: Record<string, string> = {
    accept: "application/json",
    ...ctx.headers
  };

  let body: string | undefined;
  if (input.body !== undefined) {
    headers["content-type"] = "application/json";
    body = JSON.stringify(input.body);
  }

  const response = await fetchImpl(url, {
    method: input.method,
    headers,
    body,
    signal: AbortSignal.timeout(Math.max(1, ctx.timeoutMs))
  });

  const rawText = await response.text();
  let parsedBody: unknown = rawText;
  if (rawText.trim().length > 0) {
    try {
      parsedBody = JSON.parse(rawText);
    } catch {
      parsedBody = rawText;
    }
  }

  const allowStatuses = input.allowStatuses ?? [200];
  if (!allowStatuses.includes(response.status)) {
    const detail = typeof parsedBody === "string" ? parsedBody : JSON.stringify(parsedBody);
    throw new RelayApiError(`HTTP ${response.status} for ${input.method} ${path}: ${detail}`, response.status, parsedBody);
  }

  return {
    command: input.command,
    request: {
      method: input.method,
      path,
      url
    },
    response: {
      statusCode: response.status,
      body: parsedBody,
      rawText
    }
  };
}
