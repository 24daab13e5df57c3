/**
 * Bounded caches for parse results.
 *
 * Color, style and cell-width lookups are pure functions of their input string,
 * so a cache only ever saves work. Callers may pass their own cache, or swap the
 * process-wide defaults for `NoCache` with `setCachingEnabled(false)`.
 */

export interface ParseCache<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  clear(): void;
  readonly size: number;
}

/**
 * Least-recently-used cache backed by a Map (insertion order = recency order).
 */
export class LruCache<V> implements ParseCache<V> {
  private readonly entries = new Map<string, V>();
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LruCache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** A cache that stores nothing. */
export class NoCache<V> implements ParseCache<V> {
  get(_key: string): V | undefined {
    return undefined;
  }

  set(_key: string, _value: V): void {}

  clear(): void {}

  get size(): number {
    return 0;
  }
}

// --- Process-wide defaults ---

export const COLOR_CACHE_SIZE = 1024;
export const STYLE_CACHE_SIZE = 512;
export const CELL_WIDTH_CACHE_SIZE = 1024;

let cachingEnabled = true;
interface CacheSlot {
  reset(enabled: boolean): void;
  clear(): void;
}

const sharedCaches = new Set<CacheSlot>();

/**
 * A process-wide cache slot owned by one parser. `setCachingEnabled` swaps
 * every slot between an `LruCache` and a `NoCache`.
 */
export class SharedCache<V> implements CacheSlot {
  private cache: ParseCache<V>;
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.cache = cachingEnabled ? new LruCache<V>(capacity) : new NoCache<V>();
    sharedCaches.add(this);
  }

  get current(): ParseCache<V> {
    return this.cache;
  }

  reset(enabled: boolean): void {
    this.cache = enabled ? new LruCache<V>(this.capacity) : new NoCache<V>();
  }

  clear(): void {
    this.cache.clear();
  }
}

/** Enable or disable the shared caches. Existing entries are dropped either way. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  for (const shared of sharedCaches) {
    shared.reset(enabled);
  }
}

export function isCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Empty every shared cache. */
export function clearCaches(): void {
  for (const shared of sharedCaches) {
    shared.clear();
  }
}
