/**
 * CachedProfileStore
 *
 * Bounded, TTL-evicted cache in front of any ProfileStore. Saves update the
 * cache before the inner store, so the latest profile stays readable while
 * the inner store is down.
 */

import type { SecurityProfile } from '../types/Security.types';
import { profileKey } from '../domain/models/SecurityProfile';
import { Clock, LimitedMap } from '../utils/MemoryManager';
import { ProfileStore, SweepableProfileStore, isSweepable } from './ProfileStore';

export interface ProfileLoad {
  profile: SecurityProfile | null;
  source: 'cache' | 'store';
}

export class CachedProfileStore implements SweepableProfileStore {
  private cache: LimitedMap<string, SecurityProfile>;

  constructor(
    private readonly inner: ProfileStore,
    maxSize: number,
    ttlMs: number,
    clock?: Clock
  ) {
    this.cache = new LimitedMap<string, SecurityProfile>('profile-cache', maxSize, ttlMs, clock);
  }

  async load(userId: string, guildId: string): Promise<ProfileLoad> {
    const key = profileKey(userId, guildId);
    const hit = this.cache.get(key);
    if (hit) return { profile: hit, source: 'cache' };

    const profile = await this.inner.get(userId, guildId);
    if (profile) this.cache.set(key, profile);
    return { profile, source: 'store' };
  }

  async get(userId: string, guildId: string): Promise<SecurityProfile | null> {
    return (await this.load(userId, guildId)).profile;
  }

  /**
   * Cache only; never touches the inner store.
   */
  peek(userId: string, guildId: string): SecurityProfile | undefined {
    return this.cache.get(profileKey(userId, guildId));
  }

  async save(profile: SecurityProfile): Promise<void> {
    this.cache.set(profileKey(profile.userId, profile.guildId), profile);
    await this.inner.save(profile);
  }

  /**
   * Inner store's profiles overlaid with newer cached copies.
   */
  async list(): Promise<SecurityProfile[]> {
    const merged = new Map<string, SecurityProfile>();
    if (isSweepable(this.inner)) {
      for (const profile of await this.inner.list()) {
        merged.set(profileKey(profile.userId, profile.guildId), profile);
      }
    }
    for (const [key, profile] of this.cache.entries()) {
      merged.set(key, profile);
    }
    return [...merged.values()];
  }

  async delete(userId: string, guildId: string): Promise<boolean> {
    const cached = this.cache.delete(profileKey(userId, guildId));
    const stored = isSweepable(this.inner) ? await this.inner.delete(userId, guildId) : false;
    return cached || stored;
  }

  evictExpired(): number {
    return this.cache.cleanup();
  }

  get cachedCount(): number {
    return this.cache.size;
  }
}
