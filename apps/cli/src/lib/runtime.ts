import type { Command } from "commander";

export const DEFAULT_BASE_URL = "http://127.0.0.1:8080";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const ADMIN_TOKEN_HEADER = "x-relay-admin-token";

export type GlobalOptions = {
  baseUrl?: string;
  timeoutMs?: string;
  adminToken?: string;
  json?: boolean;
};

export type RuntimeContext = {
  commandName: string;
  baseUrl: string;
  timeoutMs: number;
  outputJson: boolean;
  headers: Record<string, string>;
};

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function positiveInteger(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : null;
}

/** Flags win over environment variables, which win over the defaults. */
export function resolveRuntime(
  commandName: string,
  opts: GlobalOptions,
  env: Record<string, string | undefined>
): RuntimeContext {
  const baseUrl = (firstNonEmpty(opts.baseUrl, env.RELAY_BASE_URL) ?? DEFAULT_BASE_URL).replace(/\/+$/, "");

  const timeoutMs =
    positiveInteger(firstNonEmpty(opts.timeoutMs)) ??
    positiveInteger(firstNonEmpty(env.RELAY_TIMEOUT_MS)) ??
    DEFAULT_TIMEOUT_MS;

  const headers: Record<string, string> = {};
  const adminToken = firstNonEmpty(opts.adminToken, env.RELAY_ADMIN_TOKEN);
  if (adminToken) {
    headers[ADMIN_TOKEN_HEADER] = adminToken;
  }

  return {
    commandName,
    baseUrl,
    timeoutMs,
    outputJson: Boolean(opts.json),
    headers
  };
}

export function buildRuntime(command: Command, env: Record<string, string | undefined>): RuntimeContext {
  return resolveRuntime(command.name(), command.optsWithGlobals<GlobalOptions>(), env);
}
