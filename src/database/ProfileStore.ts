/**
 * PROFILE STORE
 *
 * Persistence boundary for security profiles. Saves are upserts keyed by
 * (userId, guildId): saving the same profile twice leaves one row, and the
 * last write wins.
 */

import type { SecurityProfile } from '../types/Security.types';

export interface ProfileStore {
  /** null when the user has never been seen */
  get(userId: string, guildId: string): Promise<SecurityProfile | null>;
  save(profile: SecurityProfile): Promise<void>;
}

/**
 * A store the maintenance sweep can walk and prune.
 */
export interface SweepableProfileStore extends ProfileStore {
  list(): Promise<SecurityProfile[]>;
  delete(userId: string, guildId: string): Promise<boolean>;
}

export function isSweepable(store: ProfileStore): store is SweepableProfileStore {
  return 'list' in store && typeof store.list === 'function' && 'delete' in store && typeof store.delete === 'function';
}
