import { z } from "zod";
import { normalizeHeaderValue } from "./admin-auth.js";
import type { CacheRegistry } from "./bounded-cache.js";
import type { ConcurrencyGate } from "./concurrency-gate.js";
import type { RelayConfig } from "./env.js";
import type { RelayDatabase, RelayInstance } from "./relay-database.js";

export type RelayActor = {
  id: string;
  inbox: string;
  sharedInbox: string | null;
  publicKeyId: string | null;
};

export const activitySchema = z
  .object({
    id: z.string().url(),
    type: z.string().min(1),
    actor: z.string().url(),
    object: z.unknown().optional()
  })
  .passthrough();

export type RelayActivity = z.infer<typeof activitySchema>;

export type HttpSignature = {
  keyId: string;
  actorId: string;
  algorithm: string | null;
  headers: Array<string>;
  signature: string;
};

type RequestLocalValues = {
  actor: RelayActor;
  instance: RelayInstance;
  message: RelayActivity;
};

export type RequestLocalKey = keyof RequestLocalValues;

export type RequestLocalsReader = {
  get<K extends RequestLocalKey>(key: K): RequestLocalValues[K] | undefined;
};

/** Request-scoped store that upstream handlers fill in before the context reads it. */
export class RequestLocals implements RequestLocalsReader {
  private readonly values: Partial<RequestLocalValues> = {};

  public get<K extends RequestLocalKey>(key: K): RequestLocalValues[K] | undefined {
    return this.values[key];
  }

  public set<K extends RequestLocalKey>(key: K, value: RequestLocalValues[K]): void {
    this.values[key] = value;
  }
}

export type RelayServices = {
  cache: CacheRegistry;
  config: RelayConfig;
  database: RelayDatabase;
  gate: ConcurrencyGate;
};

const signatureFieldsSchema = z.object({
  keyId: z.string().min(1),
  signature: z.string().min(1),
  algorithm: z.string().min(1).optional(),
  headers: z.string().optional()
});

/**
 * Parses a `Signature` header (`keyId="...",algorithm="...",headers="...",signature="..."`).
 * Returns null for anything that does not carry at least a key id and a signature.
 */
export function parseSignatureHeader(value: string): HttpSignature | null {
  const fields: Record<string, string> = {};
  for (const match of value.matchAll(/([A-Za-z]+)\s*=\s*"([^"]*)"/g)) {
    fields[match[1]] = match[2];
  }

  const parsed = signatureFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    return null;
  }

  const headerList = (parsed.data.headers ?? "")
    .split(/\s+/)
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);

  return {
    keyId: parsed.data.keyId,
    actorId: parsed.data.keyId.split("#")[0],
    algorithm: parsed.data.algorithm ?? null,
    headers: headerList.length > 0 ? headerList : ["date"],
    signature: parsed.data.signature
  };
}

/**
 * Lazily computed view over one inbound request. Values are read on first
 * access and memoized for the life of the request.
 */
export class RequestContext {
  private actorValue: RelayActor | null = null;
  private instanceValue: RelayInstance | null = null;
  private messageValue: RelayActivity | null = null;
  private signatureValue: HttpSignature | null = null;
  private signatureParsed = false;

  constructor(
    private readonly headers: Record<string, unknown>,
    private readonly locals: RequestLocalsReader,
    private readonly services: RelayServices
  ) {}

  public actor(): RelayActor | null {
    if (!this.actorValue) {
      this.actorValue = this.locals.get("actor") ?? null;
    }
    return this.actorValue;
  }

  public instance(): RelayInstance | null {
    if (!this.instanceValue) {
      this.instanceValue = this.locals.get("instance") ?? null;
    }
    return this.instanceValue;
  }

  public message(): RelayActivity | null {
    if (!this.messageValue) {
      this.messageValue = this.locals.get("message") ?? null;
    }
    return this.messageValue;
  }

  public signature(): HttpSignature | null {
    if (!this.signatureParsed) {
      const header = normalizeHeaderValue(this.headers["signature"]);
      this.signatureValue = header ? parseSignatureHeader(header) : null;
      this.signatureParsed = true;
    }
    return this.signatureValue;
  }

  public get cache(): CacheRegistry {
    return this.services.cache;
  }

  public get config(): RelayConfig {
    return this.services.config;
  }

  public get database(): RelayDatabase {
    return this.services.database;
  }

  public get gate(): ConcurrencyGate {
    return this.services.gate;
  }
}
