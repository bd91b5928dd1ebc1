import type { SecurityProfile } from '../types/Security.types';
import { profileKey } from '../domain/models/SecurityProfile';
import type { SweepableProfileStore } from './ProfileStore';

/**
 * Process-local store. Profiles are frozen values, so they are stored as-is.
 */
export class InMemoryProfileStore implements SweepableProfileStore {
  private profiles: Map<string, SecurityProfile> = new Map();

  async get(userId: string, guildId: string): Promise<SecurityProfile | null> {
    return this.profiles.get(profileKey(userId, guildId)) ?? null;
  }

  async save(profile: SecurityProfile): Promise<void> {
    this.profiles.set(profileKey(profile.userId, profile.guildId), profile);
  }

  async list(): Promise<SecurityProfile[]> {
    return [...this.profiles.values()];
  }

  async delete(userId: string, guildId: string): Promise<boolean> {
    return this.profiles.delete(profileKey(userId, guildId));
  }

  get size(): number {
    return this.profiles.size;
  }
}
