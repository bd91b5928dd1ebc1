/**
 * DOMAIN MODEL: SecurityProfile
 *
 * One profile per user (per guild when profileScope = 'guild').
 * Profiles are frozen values: every engine operation returns a new one.
 * `isTrusted` is never set directly; reviseProfile() derives it from trustScore.
 */

import { z } from 'zod';
import type { SecurityConfig } from '../../config/security.config';
import {
  BehavioralAggregates,
  SecurityProfile,
  ViolationSeverity,
  ViolationType,
} from '../../types/Security.types';
import { SecurityError, SecurityErrorCode } from '../errors/SecurityErrors';

export const GLOBAL_SCOPE = '*';
export const INITIAL_TRUST_SCORE = 100;
export const MAX_PUNISHMENT_LEVEL = 7;

const timestamp = z.number().int().min(0);

const EvidenceValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const ViolationRecordSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  guildId: z.string().min(1),
  type: z.nativeEnum(ViolationType),
  severity: z.nativeEnum(ViolationSeverity),
  messageExcerpt: z.string(),
  channelId: z.string(),
  messageId: z.string(),
  timestamp,
  evidence: z.record(EvidenceValueSchema),
});

const AggregatesSchema = z.object({
  messageCount: z.number().int().min(0),
  avgMessageLength: z.number().min(0),
  channelDiversity: z.array(z.string()),
  positiveContributions: z.number().int().min(0),
  violationStreak: z.number().int().min(0),
  improvementStreak: z.number().int().min(0),
});

export const SecurityProfileSchema = z.object({
  userId: z.string().min(1),
  guildId: z.string().min(1),
  trustScore: z.number().min(0).max(100),
  violationHistory: z.array(ViolationRecordSchema),
  punishmentLevel: z.number().int().min(0).max(MAX_PUNISHMENT_LEVEL),
  isTrusted: z.boolean(),
  quarantineUntil: timestamp.nullable(),
  lastViolationAt: timestamp.nullable(),
  lastRecoveredAt: timestamp.nullable(),
  lastActivityAt: timestamp,
  createdAt: timestamp,
  aggregates: AggregatesSchema,
});

/**
 * Guild component of a profile key: the real guild, or '*' for global profiles.
 */
export function scopeGuildId(guildId: string, scope: SecurityConfig['profileScope']): string {
  return scope === 'global' ? GLOBAL_SCOPE : guildId;
}

export function profileKey(userId: string, guildId: string): string {
  return `${guildId}:${userId}`;
}

function freezeProfile(profile: SecurityProfile): SecurityProfile {
  return Object.freeze({
    ...profile,
    violationHistory: Object.freeze(profile.violationHistory.map(record => Object.freeze(record))),
    aggregates: Object.freeze({
      ...profile.aggregates,
      channelDiversity: Object.freeze([...profile.aggregates.channelDiversity]),
    }),
  });
}

export type ProfileChanges = Partial<Omit<SecurityProfile, 'userId' | 'guildId' | 'isTrusted' | 'createdAt' | 'aggregates'>> & {
  aggregates?: Partial<BehavioralAggregates>;
};

/**
 * Copy-on-write update. Recomputes isTrusted and clamps trust to [0, 100].
 */
export function reviseProfile(
  profile: SecurityProfile,
  changes: ProfileChanges,
  config: Pick<SecurityConfig, 'trustThreshold'>
): SecurityProfile {
  const trustScore = Math.min(100, Math.max(0, changes.trustScore ?? profile.trustScore));
  return freezeProfile({
    ...profile,
    ...changes,
    trustScore,
    isTrusted: trustScore >= config.trustThreshold,
    aggregates: { ...profile.aggregates, ...changes.aggregates },
  });
}

export function createSecurityProfile(
  userId: string,
  guildId: string,
  now: number,
  config: Pick<SecurityConfig, 'trustThreshold'>
): SecurityProfile {
  return freezeProfile({
    userId,
    guildId,
    trustScore: INITIAL_TRUST_SCORE,
    violationHistory: [],
    punishmentLevel: 0,
    isTrusted: INITIAL_TRUST_SCORE >= config.trustThreshold,
    quarantineUntil: null,
    lastViolationAt: null,
    lastRecoveredAt: null,
    lastActivityAt: now,
    createdAt: now,
    aggregates: {
      messageCount: 0,
      avgMessageLength: 0,
      channelDiversity: [],
      positiveContributions: 0,
      violationStreak: 0,
      improvementStreak: 0,
    },
  });
}

/**
 * Validate a profile read from storage. The stored isTrusted flag is ignored
 * and recomputed against the current threshold.
 */
export function parseSecurityProfile(raw: unknown, config: Pick<SecurityConfig, 'trustThreshold'>): SecurityProfile {
  const parsed = SecurityProfileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SecurityError(SecurityErrorCode.INVALID_PROFILE, `Invalid security profile: ${issues.join('; ')}`);
  }
  return reviseProfile(parsed.data, {}, config);
}
