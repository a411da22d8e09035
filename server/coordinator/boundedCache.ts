/**
 * Bounded insertion-ordered map shared by the dedup and thread caches.
 *
 * Every operation is synchronous: a lookup and the insert that follows it
 * run without yielding to the event loop, so no other lifecycle can observe
 * the key in between. Callers must keep it that way (no await inside).
 *
 * Once the map grows past `maxSize`, the oldest half (by insertion order)
 * is dropped in one batch. Re-admitting an evicted key only risks a rare
 * duplicate response.
 */
export class BoundedMap<V> {
  private entries = new Map<string, V>();
  readonly maxSize: number;

  constructor(maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 2) {
      throw new Error(`BoundedMap maxSize must be an integer >= 2, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  /**
   * Insert unless present. Returns the stored value and whether this call
   * inserted it.
   */
  setIfAbsent(key: string, value: V): { value: V; inserted: boolean } {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return { value: existing, inserted: false };
    }
    this.entries.set(key, value);
    this.evictIfNeeded();
    return { value, inserted: true };
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Values in insertion order. */
  values(): V[] {
    return Array.from(this.entries.values());
  }

  private evictIfNeeded(): number {
    if (this.entries.size <= this.maxSize) return 0;

    const toRemove = Math.floor(this.maxSize / 2);
    let removed = 0;
    for (const key of this.entries.keys()) {
      if (removed >= toRemove) break;
      this.entries.delete(key);
      removed++;
    }
    return removed;
  }
}
