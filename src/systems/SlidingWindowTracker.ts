/**
 * SLIDING WINDOW TRACKER
 *
 * Per-profile ring buffers of recent messages for time-windowed checks.
 * Each buffer holds at most `capacity` entries and nothing older than
 * `maxAgeMs`; stale entries are dropped on read and on sweep.
 */

import { createHash } from 'crypto';
import { RingBuffer } from '../utils/MemoryManager';

export interface SlidingWindowEntry {
  readonly messageId: string;
  readonly fingerprint: string;
  readonly tokens: ReadonlySet<string>;
  readonly timestamp: number;
  readonly channelId: string;
}

export function normalizeContent(content: string): string {
  return content.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * sha-256 of the normalized content; "GG" and " gg " share a fingerprint.
 */
export function fingerprintContent(content: string): string {
  return createHash('sha256').update(normalizeContent(content)).digest('hex');
}

export function tokenize(content: string): Set<string> {
  return new Set(
    content
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(token => token.length > 0)
  );
}

/**
 * Jaccard similarity of two token sets. Two empty sets are not similar.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function createWindowEntry(messageId: string, content: string, timestamp: number, channelId: string): SlidingWindowEntry {
  return Object.freeze({
    messageId,
    fingerprint: fingerprintContent(content),
    tokens: tokenize(content),
    timestamp,
    channelId,
  });
}

export class SlidingWindowTracker {
  private buffers: Map<string, RingBuffer<SlidingWindowEntry>> = new Map();

  constructor(
    private readonly capacity: number,
    private readonly maxAgeMs: number
  ) {}

  record(key: string, entry: SlidingWindowEntry): void {
    let buffer = this.buffers.get(key);
    if (!buffer) {
      buffer = new RingBuffer<SlidingWindowEntry>(this.capacity);
      this.buffers.set(key, buffer);
    }
    buffer.push(entry);
  }

  /**
   * Entries in [now - windowMs, now], oldest first.
   */
  recent(key: string, windowMs: number, now: number): SlidingWindowEntry[] {
    const buffer = this.live(key, now);
    if (!buffer) return [];
    const since = now - windowMs;
    return buffer.toArray().filter(entry => entry.timestamp >= since && entry.timestamp <= now);
  }

  countRecent(key: string, windowMs: number, now: number): number {
    return this.recent(key, windowMs, now).length;
  }

  countMatching(key: string, fingerprint: string, windowMs: number, now: number): number {
    return this.recent(key, windowMs, now).filter(entry => entry.fingerprint === fingerprint).length;
  }

  /**
   * Drop stale entries everywhere and forget empty keys.
   * Returns the number of keys removed.
   */
  sweep(now: number): number {
    let removed = 0;
    for (const key of [...this.buffers.keys()]) {
      if (!this.live(key, now)) removed++;
    }
    return removed;
  }

  forget(key: string): void {
    this.buffers.delete(key);
  }

  get trackedKeys(): number {
    return this.buffers.size;
  }

  private live(key: string, now: number): RingBuffer<SlidingWindowEntry> | undefined {
    const buffer = this.buffers.get(key);
    if (!buffer) return undefined;

    const horizon = now - this.maxAgeMs;
    buffer.dropWhile(entry => entry.timestamp < horizon);

    if (buffer.size === 0) {
      this.buffers.delete(key);
      return undefined;
    }
    return buffer;
  }
}
