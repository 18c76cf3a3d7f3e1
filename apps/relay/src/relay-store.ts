import { mkdir, open, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RelayLogger } from "./relay-types.js";

export type RelayInstance = {
  domain: string;
  inbox: string;
  actor: string | null;
  joinedAt: string;
};

export type RelaySnapshot = {
  version: 1;
  instances: Array<RelayInstance>;
};

export type RelayStore = {
  load: () => Promise<RelaySnapshot>;
  save: (snapshot: RelaySnapshot) => Promise<void>;
};

const relayInstanceSchema = z.object({
  domain: z.string().min(1),
  inbox: z.string().url(),
  actor: z.string().url().nullable(),
  joinedAt: z.string().min(1)
});

const snapshotSchema = z.object({
  version: z.literal(1),
  instances: z.array(relayInstanceSchema)
});

export function emptySnapshot(): RelaySnapshot {
  return {
    version: 1,
    instances: []
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function fsyncDirectory(targetPath: string): Promise<void> {
  const directory = path.dirname(targetPath);
  let directoryHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    directoryHandle = await open(directory, "r");
    await directoryHandle.sync();
  } catch {
    // Not every filesystem supports fsync on a directory.
  } finally {
    await directoryHandle?.close().catch(() => undefined);
  }
}

function normalizeSnapshot(parsed: unknown): RelaySnapshot {
  const normalized = snapshotSchema.parse(parsed);
  const byDomain = new Map<string, RelayInstance>();

  for (const instance of normalized.instances) {
    byDomain.set(instance.domain, instance);
  }

  return {
    version: 1,
    instances: Array.from(byDomain.values())
  };
}

export class FileRelayStore implements RelayStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: RelayLogger | null
  ) {}

  public async load(): Promise<RelaySnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return emptySnapshot();
      }
      throw error;
    }

    try {
      return normalizeSnapshot(JSON.parse(raw));
    } catch (error) {
      await this.quarantineCorruptFile(error);
      return emptySnapshot();
    }
  }

  public async save(snapshot: RelaySnapshot): Promise<void> {
    const normalized = normalizeSnapshot(snapshot);
    await mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.tmp-${process.pid}-${Date.now()}`;
    const serialized = `${JSON.stringify(normalized, null, 2)}\n`;

    let handle: Awaited<ReturnType<typeof open>> | null = null;
    try {
      handle = await open(tempPath, "w");
      await handle.writeFile(serialized, "utf8");
      await handle.sync();
    } finally {
      await handle?.close().catch(() => undefined);
    }

    await rename(tempPath, this.filePath);
    await fsyncDirectory(this.filePath);
  }

  private async quarantineCorruptFile(error: unknown): Promise<void> {
    const corruptPath = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      await rename(this.filePath, corruptPath);
      this.logger?.warn({ error, filePath: this.filePath, corruptPath }, "relay database corrupted; quarantined original file");
      return;
    } catch (renameError) {
      this.logger?.warn({ error: renameError, filePath: this.filePath }, "relay database quarantine failed");
    }

    await writeFile(this.filePath, `${JSON.stringify(emptySnapshot(), null, 2)}\n`, "utf8");
    this.logger?.warn({ error, filePath: this.filePath }, "relay database corrupted and overwritten with an empty snapshot");
  }
}

/** Keeps the snapshot in memory; for tests and throwaway deployments. */
export class MemoryRelayStore implements RelayStore {
  public snapshot: RelaySnapshot;

  constructor(initial?: RelaySnapshot) {
    this.snapshot = initial ?? emptySnapshot();
  }

  public async load(): Promise<RelaySnapshot> {
    return {
      version: 1,
      instances: this.snapshot.instances.map((instance) => ({ ...instance }))
    };
  }

  public async save(snapshot: RelaySnapshot): Promise<void> {
    this.snapshot = {
      version: 1,
      instances: snapshot.instances.map((instance) => ({ ...instance }))
    };
  }
}
