// SecurityReporter.ts
//
// Read-only views over the profiles for moderators: guild-wide stats and a
// per-user report. Never changes a profile.

import type { SecurityConfig } from '../config/security.config';
import type {
  RiskAssessment,
  RiskLevel,
  SecurityProfile,
  ViolationRecord,
  ViolationType,
} from '../types/Security.types';
import { scopeGuildId } from '../domain/models/SecurityProfile';
import { isPunitive } from '../domain/models/Violation';
import type { SecurityCoordinator } from '../core/SecurityCoordinator';

const RECENT_VIOLATIONS_SHOWN = 10;
const RISKIEST_SHOWN = 5;

export interface SecurityStats {
  guildId: string;
  profiles: number;
  trusted: number;
  quarantined: number;
  averageTrust: number;
  riskLevels: Record<RiskLevel, number>;
  violationsByType: Partial<Record<ViolationType, number>>;
  violationsInWindow: number;
  riskiest: Array<{ userId: string; trustScore: number; riskScore: number; riskLevel: RiskLevel }>;
}

export interface UserReport {
  userId: string;
  guildId: string;
  trustScore: number;
  isTrusted: boolean;
  punishmentLevel: number;
  quarantinedForMs: number;
  risk: RiskAssessment;
  totalViolations: number;
  recentViolations: ViolationRecord[];
  aggregates: SecurityProfile['aggregates'];
  lastViolationAt: number | null;
}

export class SecurityReporter {
  constructor(
    private readonly coordinator: SecurityCoordinator,
    private readonly config: SecurityConfig
  ) {}

  /**
   * Stats for one guild; `windowMs` bounds the violation counts (default 24 h).
   */
  async getStats(rawGuildId: string, now: number, windowMs: number = this.config.riskFrequencyWindowMs): Promise<SecurityStats> {
    const guildId = scopeGuildId(rawGuildId, this.config.profileScope);
    const profiles = (await this.coordinator.listProfiles()).filter(profile => profile.guildId === guildId);

    const riskLevels: Record<RiskLevel, number> = { low: 0, medium: 0, high: 0, critical: 0 };
    const violationsByType: Partial<Record<ViolationType, number>> = {};
    let violationsInWindow = 0;
    let trustSum = 0;
    let trusted = 0;
    let quarantined = 0;

    const scored = profiles.map(profile => {
      const risk = this.coordinator.trust.riskAssessment(profile, now);
      riskLevels[risk.riskLevel]++;
      trustSum += profile.trustScore;
      if (profile.isTrusted) trusted++;
      if (profile.quarantineUntil !== null && profile.quarantineUntil > now) quarantined++;

      for (const record of profile.violationHistory) {
        if (record.timestamp <= now - windowMs || record.timestamp > now) continue;
        violationsInWindow++;
        violationsByType[record.type] = (violationsByType[record.type] ?? 0) + 1;
      }
      return { profile, risk };
    });

    const riskiest = scored
      .filter(({ risk }) => risk.riskLevel !== 'low')
      .sort((a, b) => b.risk.riskScore - a.risk.riskScore || a.profile.trustScore - b.profile.trustScore)
      .slice(0, RISKIEST_SHOWN)
      .map(({ profile, risk }) => ({
        userId: profile.userId,
        trustScore: profile.trustScore,
        riskScore: risk.riskScore,
        riskLevel: risk.riskLevel,
      }));

    return {
      guildId,
      profiles: profiles.length,
      trusted,
      quarantined,
      averageTrust: profiles.length === 0 ? 100 : trustSum / profiles.length,
      riskLevels,
      violationsByType,
      violationsInWindow,
      riskiest,
    };
  }

  /**
   * null for a user never seen in this guild.
   */
  async getUserReport(userId: string, guildId: string, now: number): Promise<UserReport | null> {
    const profile = await this.coordinator.getProfile(userId, guildId);
    if (!profile) return null;

    return {
      userId: profile.userId,
      guildId: profile.guildId,
      trustScore: profile.trustScore,
      isTrusted: profile.isTrusted,
      punishmentLevel: profile.punishmentLevel,
      quarantinedForMs: profile.quarantineUntil !== null ? Math.max(0, profile.quarantineUntil - now) : 0,
      risk: this.coordinator.trust.riskAssessment(profile, now),
      totalViolations: profile.violationHistory.filter(isPunitive).length,
      recentViolations: profile.violationHistory.slice(-RECENT_VIOLATIONS_SHOWN).reverse(),
      aggregates: profile.aggregates,
      lastViolationAt: profile.lastViolationAt,
    };
  }
}

/**
 * Plain-text rendering for a moderator command reply.
 */
export function formatUserReport(report: UserReport): string {
  const lines = [
    `User ${report.userId}: trust ${report.trustScore.toFixed(0)}/100 (${report.isTrusted ? 'trusted' : 'untrusted'})`,
    `Risk: ${report.risk.riskLevel} (${report.risk.riskScore.toFixed(2)}), punishment level ${report.punishmentLevel}`,
    `Violations: ${report.totalViolations} on record, streak ${report.aggregates.violationStreak}`,
  ];
  if (report.quarantinedForMs > 0) {
    lines.push(`Quarantined for another ${Math.ceil(report.quarantinedForMs / 60_000)} min`);
  }
  for (const record of report.recentViolations) {
    lines.push(`- ${new Date(record.timestamp).toISOString()} ${record.type} (severity ${record.severity})`);
  }
  return lines.join('\n');
}
