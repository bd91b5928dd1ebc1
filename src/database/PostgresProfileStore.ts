/**
 * POSTGRES PROFILE STORE
 *
 * security_profiles table (see migrations/001_security_profiles.sql) with a
 * Redis read-through cache. Writes are idempotent upserts on
 * (user_id, guild_id) and refresh the cache entry.
 */

import { z } from 'zod';
import type { SecurityConfig } from '../config/security.config';
import type { SecurityProfile } from '../types/Security.types';
import { parseSecurityProfile } from '../domain/models/SecurityProfile';
import { DatabaseService } from './DatabaseService';
import type { SweepableProfileStore } from './ProfileStore';

const TABLE = 'security_profiles';

const COLUMNS = [
  'user_id',
  'guild_id',
  'trust_score',
  'punishment_level',
  'quarantine_until',
  'last_violation_at',
  'last_recovered_at',
  'last_activity_at',
  'created_at',
  'aggregates',
  'violation_history',
];

// BIGINT columns come back from pg as strings
const epochMs = z.union([z.string(), z.number()]).transform(value => Number(value));
const nullableEpochMs = z
  .union([z.string(), z.number()])
  .nullable()
  .transform(value => (value === null ? null : Number(value)));

const ProfileRowSchema = z.object({
  user_id: z.string(),
  guild_id: z.string(),
  trust_score: z.coerce.number(),
  punishment_level: z.coerce.number(),
  quarantine_until: nullableEpochMs,
  last_violation_at: nullableEpochMs,
  last_recovered_at: nullableEpochMs,
  last_activity_at: epochMs,
  created_at: epochMs,
  aggregates: z.unknown(),
  violation_history: z.unknown(),
});

export function rowToProfile(row: unknown, config: Pick<SecurityConfig, 'trustThreshold'>): SecurityProfile {
  const parsed = ProfileRowSchema.parse(row);
  return parseSecurityProfile(
    {
      userId: parsed.user_id,
      guildId: parsed.guild_id,
      trustScore: parsed.trust_score,
      punishmentLevel: parsed.punishment_level,
      quarantineUntil: parsed.quarantine_until,
      lastViolationAt: parsed.last_violation_at,
      lastRecoveredAt: parsed.last_recovered_at,
      lastActivityAt: parsed.last_activity_at,
      createdAt: parsed.created_at,
      aggregates: parsed.aggregates,
      violationHistory: parsed.violation_history,
      isTrusted: false, // recomputed by parseSecurityProfile
    },
    config
  );
}

export function profileToRow(profile: SecurityProfile): Record<string, unknown> {
  return {
    user_id: profile.userId,
    guild_id: profile.guildId,
    trust_score: profile.trustScore,
    punishment_level: profile.punishmentLevel,
    quarantine_until: profile.quarantineUntil,
    last_violation_at: profile.lastViolationAt,
    last_recovered_at: profile.lastRecoveredAt,
    last_activity_at: profile.lastActivityAt,
    created_at: profile.createdAt,
    // pg would turn a JS array into a Postgres array literal; send JSON text
    aggregates: JSON.stringify(profile.aggregates),
    violation_history: JSON.stringify(profile.violationHistory),
  };
}

export class PostgresProfileStore implements SweepableProfileStore {
  constructor(
    private readonly db: DatabaseService,
    private readonly config: Pick<SecurityConfig, 'trustThreshold'>,
    private readonly cacheTtlSeconds: number
  ) {}

  async get(userId: string, guildId: string): Promise<SecurityProfile | null> {
    return this.db.cached(
      this.cacheKey(userId, guildId),
      this.cacheTtlSeconds,
      async () => {
        const row = await this.db.queryOne<Record<string, unknown>>(
          `SELECT ${COLUMNS.join(', ')} FROM ${TABLE} WHERE user_id = $1 AND guild_id = $2`,
          [userId, guildId]
        );
        return row ? rowToProfile(row, this.config) : null;
      },
      raw => parseSecurityProfile(raw, this.config)
    );
  }

  async save(profile: SecurityProfile): Promise<void> {
    const row = profileToRow(profile);
    await this.db.upsert(
      TABLE,
      { ...row, updated_at: new Date() },
      ['user_id', 'guild_id'],
      [...COLUMNS.filter(col => col !== 'user_id' && col !== 'guild_id'), 'updated_at']
    );
    await this.db.cache(this.cacheKey(profile.userId, profile.guildId), this.cacheTtlSeconds, profile);
  }

  async list(): Promise<SecurityProfile[]> {
    const rows = await this.db.queryMany<Record<string, unknown>>(`SELECT ${COLUMNS.join(', ')} FROM ${TABLE}`);
    return rows.map(row => rowToProfile(row, this.config));
  }

  async delete(userId: string, guildId: string): Promise<boolean> {
    const removed = await this.db.delete(TABLE, { user_id: userId, guild_id: guildId });
    await this.db.invalidate(this.cacheKey(userId, guildId));
    return removed > 0;
  }

  private cacheKey(userId: string, guildId: string): string {
    return `vigil:profile:${guildId}:${userId}`;
  }
}
