import assert from "node:assert/strict";
import test from "node:test";
import { createHttpActorResolver, toRelayActor } from "./actor-resolver.js";
import { BoundedCache, type CacheValue } from "./bounded-cache.js";
import { createRecordingLogger, type LogEntry } from "./test-helpers.js";

const ACTOR_ID = "https://a.example/users/alice";

const actorDocument = {
  "@context": "https://www.w3.org/ns/activitystreams",
  id: ACTOR_ID,
  type: "Person",
  inbox: "https://a.example/users/alice/inbox",
  endpoints: { sharedInbox: "https://a.example/inbox" },
  publicKey: { id: `${ACTOR_ID}#main-key`, owner: ACTOR_ID, publicKeyPem: "test-key" }
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/activity+json" }
  });
}

test("actor documents map onto relay actors", () => {
  assert.deepEqual(toRelayActor(actorDocument), {
    id: ACTOR_ID,
    inbox: "https://a.example/users/alice/inbox",
    sharedInbox: "https://a.example/inbox",
    publicKeyId: `${ACTOR_ID}#main-key`
  });
  assert.deepEqual(toRelayActor({ id: ACTOR_ID, inbox: "https://a.example/users/alice/inbox" }), {
    id: ACTOR_ID,
    inbox: "https://a.example/users/alice/inbox",
    sharedInbox: null,
    publicKeyId: null
  });
  assert.equal(toRelayActor({ id: ACTOR_ID }), null);
});

test("a resolved actor is fetched once and then served from the json cache", async () => {
  const cache = new BoundedCache<string, CacheValue>(4);
  let calls = 0;
  const resolve = createHttpActorResolver({
    cache,
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    logger: createRecordingLogger([]),
    fetchImpl: async () => {
      calls += 1;
      return jsonResponse(actorDocument);
    }
  });

  const first = await resolve(ACTOR_ID);
  const second = await resolve(ACTOR_ID);

  assert.equal(first?.inbox, "https://a.example/users/alice/inbox");
  assert.deepEqual(second, first);
  assert.equal(calls, 1);
  assert.equal(cache.has(ACTOR_ID), true);
});

test("non-success responses resolve to null and are not cached", async () => {
  const cache = new BoundedCache<string, CacheValue>(4);
  const entries: Array<LogEntry> = [];
  const resolve = createHttpActorResolver({
    cache,
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    logger: createRecordingLogger(entries),
    fetchImpl: async () => jsonResponse({ error: "gone" }, 410)
  });

  assert.equal(await resolve(ACTOR_ID), null);
  assert.equal(cache.size, 0);
  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message, entry.input.status]),
    [["debug", "actor fetch returned non-success status", 410]]
  );
});

test("documents that are not actors are neither returned nor cached", async () => {
  const cache = new BoundedCache<string, CacheValue>(4);
  const resolve = createHttpActorResolver({
    cache,
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    logger: createRecordingLogger([]),
    fetchImpl: async () => jsonResponse({ id: ACTOR_ID, type: "Note" })
  });

  assert.equal(await resolve(ACTOR_ID), null);
  assert.equal(cache.size, 0);
});

test("fetch failures resolve to null", async () => {
  const entries: Array<LogEntry> = [];
  const resolve = createHttpActorResolver({
    cache: new BoundedCache<string, CacheValue>(4),
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    logger: createRecordingLogger(entries),
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    }
  });

  assert.equal(await resolve(ACTOR_ID), null);
  assert.equal(entries[0]?.message, "actor fetch failed");
});

test("a document whose id differs from the fetched url is neither returned nor cached", async () => {
  const cache = new BoundedCache<string, CacheValue>(4);
  const entries: Array<LogEntry> = [];
  const resolve = createHttpActorResolver({
    cache,
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    logger: createRecordingLogger(entries),
    fetchImpl: async () => jsonResponse(actorDocument)
  });

  assert.equal(await resolve("https://c.example/users/carol"), null);
  assert.equal(cache.size, 0);
  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message, entry.input.documentId]),
    [["debug", "actor document id does not match the fetched url", ACTOR_ID]]
  );
});
