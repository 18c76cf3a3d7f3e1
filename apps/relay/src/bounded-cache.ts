export const CACHE_CATEGORIES = ["objects", "json"] as const;

export type CacheCategory = (typeof CACHE_CATEGORIES)[number];

export type CacheCapacities = Record<CacheCategory, number>;

export type CacheValue = string | number | boolean | object | null;

/**
 * Fixed-capacity least-recently-used map. Insertion order of the backing Map is
 * the recency order: the first key is the eviction candidate.
 */
export class BoundedCache<K, V extends CacheValue> {
  public readonly capacity: number;
  private readonly entries = new Map<K, V>();

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`cache capacity must be a positive integer (received ${capacity})`);
    }

    this.capacity = capacity;
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(key: K): boolean {
    return this.entries.has(key);
  }

  public get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  public set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, value);
  }

  public keys(): Array<K> {
    return Array.from(this.entries.keys());
  }
}

export type CacheRegistry = Readonly<Record<CacheCategory, BoundedCache<string, CacheValue>>>;

export function createCacheRegistry(capacities: CacheCapacities): CacheRegistry {
  return {
    objects: new BoundedCache<string, CacheValue>(capacities.objects),
    json: new BoundedCache<string, CacheValue>(capacities.json)
  };
}

export function cacheSizes(registry: CacheRegistry): Record<CacheCategory, { size: number; capacity: number }> {
  return {
    objects: { size: registry.objects.size, capacity: registry.objects.capacity },
    json: { size: registry.json.size, capacity: registry.json.capacity }
  };
}
