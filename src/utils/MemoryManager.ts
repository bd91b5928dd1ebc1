import { createLogger } from '../services/Logger';

const logger = createLogger('MemoryManager');

/**
 * Bounded in-process containers.
 *
 * Everything the security core keeps in memory goes through one of these,
 * so growth is capped by size and age rather than by garbage collection.
 */

export type Clock = () => number;

const systemClock: Clock = () => Date.now();

/**
 * LimitedMap - Map with max size, LRU eviction and optional TTL.
 * TTL counts from the last set(); reads refresh recency only.
 */
export class LimitedMap<K, V> {
  private map: Map<K, { value: V; storedAt: number }> = new Map();

  constructor(
    private name: string,
    private maxSize: number,
    private ttlMs?: number,
    private clock: Clock = systemClock
  ) {}

  set(key: K, value: V): void {
    this.map.delete(key);

    // Map iteration order is insertion order: the first key is the least recently used
    if (this.map.size >= this.maxSize) {
      const oldestKey = this.map.keys().next();
      if (!oldestKey.done) {
        this.map.delete(oldestKey.value);
      }
    }

    this.map.set(key, { value, storedAt: this.clock() });
  }

  get(key: K): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry.storedAt, this.clock())) {
      this.map.delete(key);
      return undefined;
    }

    // Refresh recency
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  /**
   * Live entries, least recently used first. Does not refresh recency.
   */
  entries(): Array<[K, V]> {
    const now = this.clock();
    const live: Array<[K, V]> = [];
    for (const [key, entry] of this.map) {
      if (!this.isExpired(entry.storedAt, now)) {
        live.push([key, entry.value]);
      }
    }
    return live;
  }

  /**
   * Cleanup expired entries
   */
  cleanup(): number {
    if (!this.ttlMs) return 0;

    const now = this.clock();
    let removed = 0;

    for (const [key, entry] of this.map) {
      if (this.isExpired(entry.storedAt, now)) {
        this.map.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug(`Cleaned up ${removed} expired entries from ${this.name}`);
    }

    return removed;
  }

  private isExpired(storedAt: number, now: number): boolean {
    return this.ttlMs !== undefined && now - storedAt > this.ttlMs;
  }
}

/**
 * ExpiringSet - membership that lapses after ttlMs.
 */
export class ExpiringSet<T> {
  private readonly entries: LimitedMap<T, true>;

  constructor(name: string, maxSize: number, ttlMs: number, clock: Clock = systemClock) {
    this.entries = new LimitedMap<T, true>(name, maxSize, ttlMs, clock);
  }

  add(value: T): void {
    this.entries.set(value, true);
  }

  has(value: T): boolean {
    return this.entries.has(value);
  }

  delete(value: T): boolean {
    return this.entries.delete(value);
  }

  cleanup(): number {
    return this.entries.cleanup();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * RingBuffer - fixed capacity, oldest entry overwritten on overflow.
 */
export class RingBuffer<T> {
  private items: Array<T | undefined>;
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.items[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * Drop items from the oldest end while the predicate holds.
   */
  dropWhile(predicate: (item: T) => boolean): number {
    let dropped = 0;
    while (this.count > 0) {
      const oldest = this.items[this.head];
      if (oldest === undefined || !predicate(oldest)) break;
      this.items[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      dropped++;
    }
    return dropped;
  }

  /**
   * Items oldest first.
   */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  get size(): number {
    return this.count;
  }
}

/**
 * Process memory in MB.
 */
export function getMemoryStats(): {
  rss: number;
  heapTotal: number;
  heapUsed: number;
  heapPercent: number;
  external: number;
} {
  const mem = process.memoryUsage();

  return {
    rss: Math.round(mem.rss / 1024 / 1024), // MB
    heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
    heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
    heapPercent: Math.round((mem.heapUsed / mem.heapTotal) * 100),
    external: Math.round(mem.external / 1024 / 1024),
  };
}
