/**
 * PUNISHMENT ESCALATION ENGINE
 *
 * Deterministic mapping from (profile, primary violation) to a punishment.
 *
 *   level = clamp(round(severity + escalation + trustFactor), 0, 7)
 *   escalation  = min(recent violations × escalationPerViolation, maxEscalation)
 *   trustFactor = (100 - trust) / 100
 *
 * The level indexes the configured level table. decide() reads nothing but
 * its arguments and the config, so equal inputs give equal decisions.
 */

import type { LevelAction, SecurityConfig } from '../config/security.config';
import {
  PunishmentDecision,
  PunishmentType,
  SecurityProfile,
  ViolationRecord,
  ViolationSeverity,
} from '../types/Security.types';
import { isPunitive } from '../domain/models/Violation';
import { MAX_PUNISHMENT_LEVEL } from '../domain/models/SecurityProfile';

export interface DecisionContext {
  now: number;
  /** false when the profile is a fallback default rather than a stored read */
  reliableProfile: boolean;
}

interface LevelRow {
  level: number;
  type: PunishmentType;
  durationMs?: number;
}

export class PunishmentEscalationEngine {
  private readonly lowestTimeoutLevel: number;
  private readonly longestTimeoutLevel: number;

  constructor(private readonly config: SecurityConfig) {
    const timeouts = config.levelActions
      .map((row, level) => ({ row, level }))
      .filter(({ row }) => row.action === 'timeout');

    // The config schema guarantees at least one timeout row
    this.lowestTimeoutLevel = timeouts[0]?.level ?? MAX_PUNISHMENT_LEVEL;
    this.longestTimeoutLevel = timeouts.reduce(
      (best, current) =>
        (current.row.durationMs ?? 0) > (config.levelActions[best].durationMs ?? 0) ? current.level : best,
      this.lowestTimeoutLevel
    );
  }

  decide(
    profile: SecurityProfile,
    primary: ViolationRecord,
    all: readonly ViolationRecord[],
    context: DecisionContext
  ): PunishmentDecision {
    if (!isPunitive(primary)) {
      const supportive: PunishmentDecision = {
        type: 'supportive',
        level: 0,
        rationale: 'Distress signal: supportive response, no punishment',
      };
      return Object.freeze(supportive);
    }

    const recent = this.recentViolationCount(profile, context.now);
    const escalation = Math.min(recent * this.config.escalationPerViolation, this.config.maxEscalation);
    const trustFactor = (100 - profile.trustScore) / 100;
    const computed = clamp(Math.round(primary.severity + escalation + trustFactor), 0, MAX_PUNISHMENT_LEVEL);

    const notes: string[] = [];
    let row = this.rowFor(computed);

    if (primary.severity === ViolationSeverity.CRITICAL && row.level < this.lowestTimeoutLevel) {
      row = this.rowFor(this.lowestTimeoutLevel);
      notes.push('critical severity floor');
    }

    if (!context.reliableProfile && (row.type === 'kick' || row.type === 'ban')) {
      row = this.rowFor(this.longestTimeoutLevel);
      notes.push(`downgraded from ${this.config.maxLevelAction}: profile unavailable`);
    }

    const rationale =
      `${primary.type} (severity ${primary.severity}) + escalation ${escalation} (${recent} recent) ` +
      `+ trust factor ${trustFactor.toFixed(2)} => level ${computed}` +
      (all.length > 1 ? `; ${all.length} findings` : '') +
      (notes.length > 0 ? `; ${notes.join('; ')}` : '');

    const decision: PunishmentDecision = {
      type: row.type,
      ...(row.durationMs !== undefined ? { durationMs: row.durationMs } : {}),
      level: row.level,
      rationale,
    };
    return Object.freeze(decision);
  }

  /**
   * Punitive history records inside the escalation window ending at `now`.
   */
  recentViolationCount(profile: SecurityProfile, now: number): number {
    const since = now - this.config.escalationWindowMs;
    return profile.violationHistory.filter(
      record => isPunitive(record) && record.timestamp > since && record.timestamp <= now
    ).length;
  }

  private rowFor(level: number): LevelRow {
    const action: LevelAction = this.config.levelActions[level];
    switch (action.action) {
      case 'reminder':
      case 'warning':
        return { level, type: action.action };
      case 'timeout':
        return { level, type: 'timeout', durationMs: action.durationMs };
      case 'policy':
        return { level, type: this.config.maxLevelAction };
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
