import type { RelayConfig } from "./env.js";
import type { RelayLogger } from "./relay-types.js";

export type LogEntry = {
  level: keyof RelayLogger;
  input: Record<string, unknown>;
  message?: string;
};

export function createTestConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  return {
    listen: "127.0.0.1",
    port: 0,
    host: "relay.test",
    logLevel: "silent",
    dataDir: "/tmp/relay-test",
    pushLimit: 4,
    workerCount: 2,
    pushTimeoutMs: 1_000,
    cacheCapacities: { objects: 16, json: 16 },
    adminToken: null,
    ...overrides
  };
}

export function createRecordingLogger(entries: Array<LogEntry>): RelayLogger {
  const record =
    (level: keyof RelayLogger) =>
    (input: Record<string, unknown>, message?: string): void => {
      entries.push({ level, input, message });
    };

  return {
    trace: record("trace"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error")
  };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (predicate()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }

  throw new Error("timed out waiting for condition");
}
