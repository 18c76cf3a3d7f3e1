import assert from "node:assert/strict";
import test from "node:test";
import { BoundedCache, cacheSizes, createCacheRegistry } from "./bounded-cache.js";

test("inserting capacity + 1 keys evicts the first inserted key", () => {
  const cache = new BoundedCache<string, number>(3);
  cache.set("a", 1);
  cache.set("b", 2);
  cache.set("c", 3);
  cache.set("d", 4);

  assert.equal(cache.size, 3);
  assert.equal(cache.get("a"), undefined);
  assert.deepEqual(cache.keys(), ["b", "c", "d"]);
});

test("reading a key protects it from the next eviction", () => {
  const cache = new BoundedCache<string, number>(3);
  cache.set("a", 1);
  cache.set("b", 2);
  cache.set("c", 3);

  assert.equal(cache.get("a"), 1);
  cache.set("d", 4);

  assert.equal(cache.has("a"), true);
  assert.equal(cache.has("b"), false);
  assert.deepEqual(cache.keys(), ["c", "a", "d"]);
});

test("replacing an existing key updates the value without evicting", () => {
  const cache = new BoundedCache<string, string>(2);
  cache.set("a", "first");
  cache.set("b", "second");
  cache.set("a", "replaced");

  assert.equal(cache.size, 2);
  assert.deepEqual(cache.keys(), ["b", "a"]);
  assert.equal(cache.get("a"), "replaced");
});

test("has does not change recency", () => {
  const cache = new BoundedCache<string, number>(2);
  cache.set("a", 1);
  cache.set("b", 2);

  assert.equal(cache.has("a"), true);
  cache.set("c", 3);

  assert.equal(cache.has("a"), false);
  assert.deepEqual(cache.keys(), ["b", "c"]);
});

test("capacity must be a positive integer", () => {
  assert.throws(() => new BoundedCache<string, number>(0), RangeError);
  assert.throws(() => new BoundedCache<string, number>(1.5), RangeError);
});

test("cache registry builds one cache per category with its own capacity", () => {
  const registry = createCacheRegistry({ objects: 2, json: 3 });
  registry.objects.set("https://a.example/activities/1", "Create");

  assert.deepEqual(cacheSizes(registry), {
    objects: { size: 1, capacity: 2 },
    json: { size: 0, capacity: 3 }
  });
});
