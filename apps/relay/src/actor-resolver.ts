import { z } from "zod";
import type { BoundedCache, CacheValue } from "./bounded-cache.js";
import type { RelayActor } from "./request-context.js";
import type { RelayLogger } from "./relay-types.js";

export type ActorResolver = (actorId: string) => Promise<RelayActor | null>;

const actorDocumentSchema = z.object({
  id: z.string().url(),
  inbox: z.string().url(),
  endpoints: z
    .object({
      sharedInbox: z.string().url().optional()
    })
    .passthrough()
    .optional(),
  publicKey: z
    .object({
      id: z.string().min(1)
    })
    .passthrough()
    .optional()
});

export function toRelayActor(document: unknown): RelayActor | null {
  const parsed = actorDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    inbox: parsed.data.inbox,
    sharedInbox: parsed.data.endpoints?.sharedInbox ?? null,
    publicKeyId: parsed.data.publicKey?.id ?? null
  };
}

type HttpActorResolverOptions = {
  cache: BoundedCache<string, CacheValue>;
  userAgent: string;
  timeoutMs: number;
  logger: RelayLogger;
  fetchImpl?: typeof fetch;
};

/**
 * Fetches actor documents over HTTP and keeps the raw JSON in the `json`
 * cache category, so repeat inbound traffic from one actor costs one fetch.
 */
export function createHttpActorResolver(options: HttpActorResolverOptions): ActorResolver {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (actorId: string): Promise<RelayActor | null> => {
    const cached = options.cache.get(actorId);
    if (cached !== undefined) {
      return toRelayActor(cached);
    }

    let document: unknown;
    try {
      const response = await fetchImpl(actorId, {
        headers: {
          accept: "application/activity+json",
          "user-agent": options.userAgent
        },
        signal: AbortSignal.timeout(Math.max(1, options.timeoutMs))
      });
      if (!response.ok) {
        options.logger.debug({ actorId, status: response.status }, "actor fetch returned non-success status");
        return null;
      }
      document = await response.json();
    } catch (error) {
      options.logger.debug({ actorId, error }, "actor fetch failed");
      return null;
    }

    const actor = toRelayActor(document);
    if (actor && actor.id !== actorId) {
      options.logger.debug({ actorId, documentId: actor.id }, "actor document id does not match the fetched url");
      return null;
    }
    if (actor && typeof document === "object" && document !== null) {
      options.cache.set(actorId, document);
    }
    return actor;
  };
}
