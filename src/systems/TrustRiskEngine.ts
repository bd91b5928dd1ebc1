/**
 * TRUST & RISK ENGINE
 *
 * Owns a profile's trust score, risk level and behavioral aggregates.
 * Every method is synchronous and returns a new frozen profile; persistence
 * is the coordinator's job.
 *
 * - Violations lower trust by a fixed penalty per severity, never raise it
 * - Passive recovery credits whole recovery intervals without violations
 * - Quarantine starts when trust falls to the quarantine threshold and caps
 *   recovery until it expires
 */

import type { SecurityConfig } from '../config/security.config';
import { penaltyFor } from '../config/security.config';
import type {
  ChatMessage,
  RiskAssessment,
  RiskLevel,
  SecurityProfile,
  ViolationRecord,
} from '../types/Security.types';
import { isPunitive } from '../domain/models/Violation';
import { INITIAL_TRUST_SCORE, MAX_PUNISHMENT_LEVEL, reviseProfile } from '../domain/models/SecurityProfile';

// Weight of the newest message in the running average length
const LENGTH_EMA_ALPHA = 0.1;

export class TrustRiskEngine {
  constructor(private readonly config: SecurityConfig) {}

  /**
   * Fold a message into the behavioral aggregates.
   */
  observeMessage(profile: SecurityProfile, message: ChatMessage, hadViolation: boolean): SecurityProfile {
    const { aggregates } = profile;
    const length = message.content.length;

    const avgMessageLength =
      aggregates.messageCount === 0
        ? length
        : aggregates.avgMessageLength * (1 - LENGTH_EMA_ALPHA) + length * LENGTH_EMA_ALPHA;

    let channelDiversity = aggregates.channelDiversity;
    if (!channelDiversity.includes(message.channelId)) {
      channelDiversity = [...channelDiversity, message.channelId].slice(-this.config.channelDiversityCap);
    }

    const positive = !hadViolation && message.content.trim().length >= this.config.positiveContributionMinLength;

    return reviseProfile(
      profile,
      {
        lastActivityAt: Math.max(profile.lastActivityAt, message.timestamp),
        aggregates: {
          messageCount: aggregates.messageCount + 1,
          avgMessageLength,
          channelDiversity,
          positiveContributions: aggregates.positiveContributions + (positive ? 1 : 0),
        },
      },
      this.config
    );
  }

  /**
   * Charge one violation. Distress records are only appended.
   */
  applyViolation(profile: SecurityProfile, violation: ViolationRecord): SecurityProfile {
    const violationHistory = this.appendHistory(profile.violationHistory, [violation]);
    if (!isPunitive(violation)) {
      return reviseProfile(profile, { violationHistory }, this.config);
    }

    const trustScore = Math.max(0, profile.trustScore - penaltyFor(this.config, violation.severity));

    let quarantineUntil = profile.quarantineUntil;
    const quarantineActive = quarantineUntil !== null && quarantineUntil > violation.timestamp;
    if (trustScore <= this.config.quarantineThreshold && !quarantineActive) {
      quarantineUntil = violation.timestamp + this.config.quarantineDurationMs;
    }

    return reviseProfile(
      profile,
      {
        trustScore,
        violationHistory,
        quarantineUntil,
        lastViolationAt: Math.max(profile.lastViolationAt ?? 0, violation.timestamp),
        aggregates: {
          violationStreak: profile.aggregates.violationStreak + 1,
          improvementStreak: 0,
        },
      },
      this.config
    );
  }

  /**
   * Append every record; only the primary is charged.
   */
  applyViolations(
    profile: SecurityProfile,
    violations: readonly ViolationRecord[],
    primary: ViolationRecord | null
  ): SecurityProfile {
    if (primary === null || !violations.includes(primary)) {
      if (violations.length === 0) return profile;
      return reviseProfile(profile, { violationHistory: this.appendHistory(profile.violationHistory, violations) }, this.config);
    }

    const others = violations.filter(record => record !== primary);
    const withOthers =
      others.length === 0
        ? profile
        : reviseProfile(profile, { violationHistory: this.appendHistory(profile.violationHistory, others) }, this.config);
    return this.applyViolation(withOthers, primary);
  }

  /**
   * Credit whole recovery intervals contained in elapsedMs.
   * Never lowers trust and never exceeds 100.
   */
  recover(profile: SecurityProfile, elapsedMs: number, now: number): SecurityProfile {
    const intervals = elapsedMs > 0 ? Math.floor(elapsedMs / this.config.recoveryIntervalMs) : 0;
    const quarantineActive = profile.quarantineUntil !== null && profile.quarantineUntil > now;
    const quarantineUntil = quarantineActive ? profile.quarantineUntil : null;

    if (intervals === 0) {
      return quarantineUntil === profile.quarantineUntil
        ? profile
        : reviseProfile(profile, { quarantineUntil }, this.config);
    }

    let trustScore = profile.trustScore;
    for (let i = 0; i < intervals && trustScore < INITIAL_TRUST_SCORE; i++) {
      trustScore += Math.min(this.config.recoveryStep, INITIAL_TRUST_SCORE - trustScore);
    }
    if (quarantineActive) {
      trustScore = Math.max(profile.trustScore, Math.min(trustScore, this.config.quarantineThreshold));
    }

    const remainder = elapsedMs - intervals * this.config.recoveryIntervalMs;

    return reviseProfile(
      profile,
      {
        trustScore,
        quarantineUntil,
        lastRecoveredAt: now - remainder,
        aggregates: {
          violationStreak: Math.max(0, profile.aggregates.violationStreak - intervals),
          improvementStreak: profile.aggregates.improvementStreak + intervals,
        },
      },
      this.config
    );
  }

  /**
   * Recover for the time elapsed since the last violation or last credit.
   */
  recoverSince(profile: SecurityProfile, now: number): SecurityProfile {
    const anchor = Math.max(profile.lastViolationAt ?? profile.createdAt, profile.lastRecoveredAt ?? profile.createdAt);
    return this.recover(profile, now - anchor, now);
  }

  riskAssessment(profile: SecurityProfile, now: number): RiskAssessment {
    const { riskWeights, riskCutoffs } = this.config;

    const since = now - this.config.riskFrequencyWindowMs;
    const recent = profile.violationHistory.filter(
      record => isPunitive(record) && record.timestamp > since && record.timestamp <= now
    ).length;

    const factors = {
      violationFrequency: Math.min(recent / this.config.riskFrequencyCap, 1),
      trustDeficit: 1 - profile.trustScore / 100,
      inverseImprovement: 1 / (1 + profile.aggregates.improvementStreak),
    };

    const totalWeight = riskWeights.frequency + riskWeights.trustDeficit + riskWeights.improvement;
    const weighted =
      riskWeights.frequency * factors.violationFrequency +
      riskWeights.trustDeficit * factors.trustDeficit +
      riskWeights.improvement * factors.inverseImprovement;
    const riskScore = Math.min(1, Math.max(0, weighted / totalWeight));

    let riskLevel: RiskLevel = 'low';
    if (riskScore >= riskCutoffs.critical) riskLevel = 'critical';
    else if (riskScore >= riskCutoffs.high) riskLevel = 'high';
    else if (riskScore >= riskCutoffs.medium) riskLevel = 'medium';

    return { riskScore, riskLevel, factors };
  }

  recordPunishment(profile: SecurityProfile, level: number): SecurityProfile {
    const punishmentLevel = Math.min(MAX_PUNISHMENT_LEVEL, Math.max(0, Math.round(level)));
    return punishmentLevel === profile.punishmentLevel
      ? profile
      : reviseProfile(profile, { punishmentLevel }, this.config);
  }

  /**
   * Moderator override: full trust, no quarantine, streaks reset.
   * History is kept for the audit trail.
   */
  pardon(profile: SecurityProfile, now: number): SecurityProfile {
    return reviseProfile(
      profile,
      {
        trustScore: INITIAL_TRUST_SCORE,
        quarantineUntil: null,
        punishmentLevel: 0,
        lastRecoveredAt: now,
        aggregates: {
          violationStreak: 0,
        },
      },
      this.config
    );
  }

  /**
   * Drop records older than the retention horizon.
   */
  pruneHistory(profile: SecurityProfile, now: number): SecurityProfile {
    const horizon = now - this.config.violationRetentionMs;
    const kept = profile.violationHistory.filter(record => record.timestamp >= horizon);
    return kept.length === profile.violationHistory.length
      ? profile
      : reviseProfile(profile, { violationHistory: kept }, this.config);
  }

  private appendHistory(
    history: readonly ViolationRecord[],
    records: readonly ViolationRecord[]
  ): ViolationRecord[] {
    return [...history, ...records].slice(-this.config.maxViolationHistory);
  }
}
