import type { InvokeApiResult } from "./http.js";
import type { RuntimeContext } from "./runtime.js";

export type OutputStream = {
  write: (chunk: string) => unknown;
};

export type CliIo = {
  stdout: OutputStream;
  stderr: OutputStream;
};

/** Turns a response body into human-readable lines; falls back to pretty JSON. */
export type BodyRenderer = (body: unknown) => string | null;

function prettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function printSuccess(io: CliIo, ctx: RuntimeContext, result: InvokeApiResult, render?: BodyRenderer): void {
  if (ctx.outputJson) {
    io.stdout.write(
      `${prettyJson({
        ok: true,
        command: result.command,
        request: result.request,
        response: {
          statusCode: result.response.statusCode,
          body: result.response.body
        }
      })}\n`
    );
    return;
  }

  const rendered = render?.(result.response.body) ?? null;
  io.stdout.write(`${rendered ?? prettyJson(result.response.body)}\n`);
}

export function printError(io: CliIo, ctx: RuntimeContext | null, command: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);

  if (ctx?.outputJson) {
    io.stderr.write(
      `${prettyJson({
        ok: false,
        command,
        error: {
          kind: "command_failed",
          message
        }
      })}\n`
    );
    return;
  }

  io.stderr.write(`Error: ${message}\n`);
}
