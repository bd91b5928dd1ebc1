// security.config.ts
//
// Single canonical threshold table for detection, trust and escalation.
// Everything here can be overridden through loadSecurityConfig().

import { z } from 'zod';
import { ViolationSeverity } from '../types/Security.types';
import { ConfigurationError } from '../domain/errors/SecurityErrors';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const positiveInt = z.number().int().positive();
const ratio = z.number().min(0).max(1);

const LevelActionSchema = z
  .object({
    action: z.enum(['reminder', 'warning', 'timeout', 'policy']),
    durationMs: positiveInt.optional(),
  })
  .refine(row => row.action !== 'timeout' || row.durationMs !== undefined, {
    message: 'timeout rows need a durationMs',
  });

export const SecurityConfigSchema = z
  .object({
    profileScope: z.enum(['guild', 'global']),

    // Spam & formatting
    spamThreshold: positiveInt,
    spamTimeframeMs: positiveInt,
    rapidMessageLimit: positiveInt,
    rapidTimeframeMs: positiveInt,
    repeatTimeframeMs: positiveInt,
    repeatMatchThreshold: positiveInt,
    similarityThreshold: ratio,
    minAnalysisLength: z.number().int().min(0),
    capsRatioThreshold: ratio,
    capsMinLength: positiveInt,
    mentionLimit: positiveInt,
    mentionSevereLimit: positiveInt,
    phishingThreshold: positiveInt,
    unusualLengthMultiplier: z.number().positive(),
    unusualLengthMinimum: positiveInt,
    unusualMinMessages: positiveInt,
    threatAssessmentThreshold: ratio,
    threatWeights: z.object({
      trustDeficit: z.number().min(0),
      history: z.number().min(0),
      accountAge: z.number().min(0),
      content: z.number().min(0),
    }),
    windowCapacity: positiveInt,

    // Detector budget
    detectorTimeoutMs: positiveInt,
    threatIntelTimeoutMs: positiveInt,
    threatIntelCacheTtlMs: positiveInt,
    latencyBudgetMs: positiveInt,

    // Trust
    severityPenalties: z.object({
      minor: z.number().min(0).max(100),
      moderate: z.number().min(0).max(100),
      serious: z.number().min(0).max(100),
      severe: z.number().min(0).max(100),
      critical: z.number().min(0).max(100),
    }),
    trustThreshold: z.number().min(0).max(100),
    quarantineThreshold: z.number().min(0).max(100),
    quarantineDurationMs: positiveInt,
    recoveryStep: z.number().positive().max(100),
    recoveryIntervalMs: positiveInt,
    positiveContributionMinLength: positiveInt,
    channelDiversityCap: positiveInt,

    // Risk
    riskWeights: z.object({
      frequency: z.number().min(0),
      trustDeficit: z.number().min(0),
      improvement: z.number().min(0),
    }),
    riskCutoffs: z.object({
      critical: ratio,
      high: ratio,
      medium: ratio,
    }),
    riskFrequencyWindowMs: positiveInt,
    riskFrequencyCap: positiveInt,

    // Escalation
    escalationWindowMs: positiveInt,
    escalationPerViolation: z.number().min(0),
    maxEscalation: z.number().min(0),
    levelActions: z.array(LevelActionSchema).length(8),
    maxLevelAction: z.enum(['kick', 'ban']),

    // Retention
    maxViolationHistory: positiveInt,
    violationRetentionMs: positiveInt,
    profileInactivityMs: positiveInt,
    profileCacheSize: positiveInt,
    profileCacheTtlMs: positiveInt,
    deletedMessageTtlMs: positiveInt,

    // Store retries
    storeRetry: z.object({
      maxRetries: z.number().int().min(0),
      baseDelayMs: z.number().int().min(0),
      maxDelayMs: z.number().int().min(0),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.quarantineThreshold > cfg.trustThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['quarantineThreshold'],
        message: 'quarantineThreshold must not exceed trustThreshold',
      });
    }
    if (!(cfg.riskCutoffs.critical >= cfg.riskCutoffs.high && cfg.riskCutoffs.high >= cfg.riskCutoffs.medium)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['riskCutoffs'],
        message: 'risk cutoffs must satisfy critical >= high >= medium',
      });
    }
    if (cfg.riskWeights.frequency + cfg.riskWeights.trustDeficit + cfg.riskWeights.improvement <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['riskWeights'],
        message: 'at least one risk weight must be positive',
      });
    }
    if (!cfg.levelActions.some(row => row.action === 'timeout')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['levelActions'],
        message: 'the level table needs at least one timeout row',
      });
    }
    // The ring buffer must hold enough messages for every window detector to trip
    const neededCapacity = Math.max(cfg.spamThreshold, cfg.rapidMessageLimit + 1, cfg.repeatMatchThreshold + 1);
    if (cfg.windowCapacity < neededCapacity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['windowCapacity'],
        message: `windowCapacity must be at least ${neededCapacity}`,
      });
    }
    if (cfg.mentionSevereLimit < cfg.mentionLimit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mentionSevereLimit'],
        message: 'mentionSevereLimit must be >= mentionLimit',
      });
    }
  });

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;
export type LevelAction = SecurityConfig['levelActions'][number];

type DeepPartial<T> = T extends Array<infer U>
  ? Array<U>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type SecurityConfigOverrides = DeepPartial<SecurityConfig>;

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  profileScope: 'guild',

  spamThreshold: 3,
  spamTimeframeMs: 30 * SECOND,
  rapidMessageLimit: 6,
  rapidTimeframeMs: 10 * SECOND,
  repeatTimeframeMs: 60 * SECOND,
  repeatMatchThreshold: 2,
  similarityThreshold: 0.7,
  minAnalysisLength: 5,
  capsRatioThreshold: 0.8,
  capsMinLength: 10,
  mentionLimit: 4,
  mentionSevereLimit: 8,
  phishingThreshold: 4,
  unusualLengthMultiplier: 10,
  unusualLengthMinimum: 500,
  unusualMinMessages: 10,
  threatAssessmentThreshold: 0.7,
  threatWeights: {
    trustDeficit: 0.3,
    history: 0.25,
    accountAge: 0.2,
    content: 0.25,
  },
  windowCapacity: 100,

  detectorTimeoutMs: 25,
  threatIntelTimeoutMs: 50,
  threatIntelCacheTtlMs: 6 * HOUR,
  latencyBudgetMs: 50,

  severityPenalties: {
    minor: 5,
    moderate: 15,
    serious: 30,
    severe: 50,
    critical: 75,
  },
  trustThreshold: 70,
  quarantineThreshold: 25,
  quarantineDurationMs: DAY,
  recoveryStep: 2,
  recoveryIntervalMs: 6 * HOUR,
  positiveContributionMinLength: 20,
  channelDiversityCap: 50,

  riskWeights: {
    frequency: 0.4,
    trustDeficit: 0.4,
    improvement: 0.2,
  },
  riskCutoffs: {
    critical: 0.8,
    high: 0.6,
    medium: 0.3,
  },
  riskFrequencyWindowMs: DAY,
  riskFrequencyCap: 5,

  escalationWindowMs: DAY,
  escalationPerViolation: 0.5,
  maxEscalation: 2,
  levelActions: [
    { action: 'reminder' },                      // 0
    { action: 'reminder' },                      // 1
    { action: 'warning' },                       // 2
    { action: 'timeout', durationMs: 30 * MINUTE }, // 3
    { action: 'timeout', durationMs: HOUR },     // 4
    { action: 'timeout', durationMs: 2 * HOUR }, // 5
    { action: 'timeout', durationMs: 6 * HOUR }, // 6
    { action: 'policy' },                        // 7 -> maxLevelAction
  ],
  maxLevelAction: 'ban',

  maxViolationHistory: 50,
  violationRetentionMs: 7 * DAY,
  profileInactivityMs: 30 * DAY,
  profileCacheSize: 10_000,
  profileCacheTtlMs: 30 * MINUTE,
  deletedMessageTtlMs: 10 * MINUTE,

  storeRetry: {
    maxRetries: 3,
    baseDelayMs: 50,
    maxDelayMs: 1000,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeLayer(base: Record<string, unknown>, layer: object): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, raw] of Object.entries(layer)) {
    const value: unknown = raw;
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayer(current, value) : value;
  }
  return merged;
}

/**
 * Merge override layers onto the defaults and validate the result.
 * Later layers win. Throws ConfigurationError on any invalid value.
 */
export function loadSecurityConfig(...layers: Array<SecurityConfigOverrides | Record<string, unknown>>): SecurityConfig {
  let merged: Record<string, unknown> = { ...DEFAULT_SECURITY_CONFIG };
  for (const layer of layers) {
    merged = mergeLayer(merged, layer);
  }

  const parsed = SecurityConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid security configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return Object.freeze(parsed.data);
}

export function penaltyFor(config: SecurityConfig, severity: ViolationSeverity): number {
  switch (severity) {
    case ViolationSeverity.MINOR:
      return config.severityPenalties.minor;
    case ViolationSeverity.MODERATE:
      return config.severityPenalties.moderate;
    case ViolationSeverity.SERIOUS:
      return config.severityPenalties.serious;
    case ViolationSeverity.SEVERE:
      return config.severityPenalties.severe;
    case ViolationSeverity.CRITICAL:
      return config.severityPenalties.critical;
  }
}

/**
 * Longest window any detector reads; the tracker keeps nothing older.
 */
export function longestWindowMs(config: SecurityConfig): number {
  return Math.max(config.spamTimeframeMs, config.rapidTimeframeMs, config.repeatTimeframeMs);
}
