import path from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import type { CacheCapacities } from "./bounded-cache.js";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const envSchema = z.object({
  RELAY_LISTEN: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  RELAY_HOST: z.string().trim().min(1).default("relay.example.com"),
  LOG_LEVEL: logLevelSchema.default("info"),
  DATA_DIR: z.string().min(1).default(".data"),
  PUSH_LIMIT: z.coerce.number().int().positive().default(512),
  PUSH_WORKERS: z.coerce.number().int().positive().default(8),
  PUSH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CACHE_OBJECTS: z.coerce.number().int().positive().default(1024),
  CACHE_JSON: z.coerce.number().int().positive().default(1024),
  RELAY_ADMIN_TOKEN: z.string().optional()
});

export type RelayLogLevel = z.infer<typeof logLevelSchema>;

export type RelayConfig = {
  listen: string;
  port: number;
  host: string;
  logLevel: RelayLogLevel;
  dataDir: string;
  pushLimit: number;
  workerCount: number;
  pushTimeoutMs: number;
  cacheCapacities: CacheCapacities;
  adminToken: string | null;
};

export function loadRelayConfig(source: Record<string, string | undefined>, cwd = process.cwd()): RelayConfig {
  const parsed = envSchema.parse(source);
  const adminToken = parsed.RELAY_ADMIN_TOKEN?.trim() ?? "";

  return {
    listen: parsed.RELAY_LISTEN,
    port: parsed.PORT,
    host: parsed.RELAY_HOST,
    logLevel: parsed.LOG_LEVEL,
    dataDir: path.isAbsolute(parsed.DATA_DIR) ? parsed.DATA_DIR : path.resolve(cwd, parsed.DATA_DIR),
    pushLimit: parsed.PUSH_LIMIT,
    workerCount: parsed.PUSH_WORKERS,
    pushTimeoutMs: parsed.PUSH_TIMEOUT_MS,
    cacheCapacities: {
      objects: parsed.CACHE_OBJECTS,
      json: parsed.CACHE_JSON
    },
    adminToken: adminToken.length > 0 ? adminToken : null
  };
}

/** Reads `.env` (if present) into the process environment, then validates it. */
export function readRelayConfig(): RelayConfig {
  loadEnv();
  return loadRelayConfig(process.env);
}

export function isDebugLogLevel(level: RelayLogLevel): boolean {
  return level === "debug" || level === "trace";
}
