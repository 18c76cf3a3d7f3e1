import type { RelayInstance, RelaySnapshot, RelayStore } from "./relay-store.js";

export type { RelayInstance } from "./relay-store.js";

export class RelayDatabaseError extends Error {
  public readonly code: "invalid_inbox" | "not_loaded";
  public readonly statusCode: number;

  constructor(code: "invalid_inbox" | "not_loaded", message: string, statusCode: number) {
    super(message);
    this.name = "RelayDatabaseError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export function domainOf(url: string): string | null {
  try {
    const parsed = new URL(url);
    return parsed.hostname.length > 0 ? parsed.hostname.toLowerCase() : null;
  } catch {
    return null;
  }
}

type AddInstanceInput = {
  inbox: string;
  actor?: string | null;
};

/** Subscribed instances, keyed by domain, persisted through a `RelayStore` after every change. */
export class RelayDatabase {
  private readonly instancesByDomain = new Map<string, RelayInstance>();
  private loaded = false;
  private persistChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: RelayStore,
    private readonly now: () => number = Date.now
  ) {}

  public async load(): Promise<void> {
    const snapshot = await this.store.load();
    this.instancesByDomain.clear();
    for (const instance of snapshot.instances) {
      this.instancesByDomain.set(instance.domain, instance);
    }
    this.loaded = true;
  }

  public listInstances(): Array<RelayInstance> {
    return Array.from(this.instancesByDomain.values())
      .map((instance) => ({ ...instance }))
      .sort((left, right) => left.domain.localeCompare(right.domain));
  }

  public getInstance(domain: string): RelayInstance | null {
    const instance = this.instancesByDomain.get(domain.toLowerCase());
    return instance ? { ...instance } : null;
  }

  /** Inbox URLs of every subscribed instance, except the one at `excludeDomain`. */
  public inboxes(excludeDomain?: string | null): Array<string> {
    const excluded = excludeDomain?.toLowerCase() ?? null;
    const inboxes: Array<string> = [];
    for (const instance of this.instancesByDomain.values()) {
      if (instance.domain === excluded) {
        continue;
      }
      inboxes.push(instance.inbox);
    }
    return inboxes;
  }

  public async addInstance(input: AddInstanceInput): Promise<{ status: "added" | "updated"; instance: RelayInstance }> {
    this.assertLoaded();

    const domain = domainOf(input.inbox);
    if (!domain) {
      throw new RelayDatabaseError("invalid_inbox", `inbox is not an absolute url: ${input.inbox}`, 400);
    }

    const existing = this.instancesByDomain.get(domain);
    const instance: RelayInstance = {
      domain,
      inbox: input.inbox,
      actor: input.actor ?? existing?.actor ?? null,
      joinedAt: existing?.joinedAt ?? new Date(this.now()).toISOString()
    };

    this.instancesByDomain.set(domain, instance);
    await this.persist();

    return {
      status: existing ? "updated" : "added",
      instance: { ...instance }
    };
  }

  public async removeInstance(domain: string): Promise<RelayInstance | null> {
    this.assertLoaded();

    const key = domain.toLowerCase();
    const existing = this.instancesByDomain.get(key);
    if (!existing) {
      return null;
    }

    this.instancesByDomain.delete(key);
    await this.persist();
    return { ...existing };
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new RelayDatabaseError("not_loaded", "relay database has not been loaded", 503);
    }
  }

  private persist(): Promise<void> {
    const snapshot: RelaySnapshot = {
      version: 1,
      instances: this.listInstances()
    };
    const next = this.persistChain.then(() => this.store.save(snapshot));
    this.persistChain = next.catch(() => undefined);
    return next;
  }
}
