// ThreatAssessmentDetector.ts - weighted threat level from trust, history, account age and content

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ChatMessage, SecurityProfile } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { PatternLibrary } from './PatternLibrary';
import type { DetectionContext, Detector } from './Detector';

type ThreatConfig = Pick<SecurityConfig, 'threatAssessmentThreshold' | 'threatWeights'>;

const DAY_MS = 24 * 60 * 60 * 1000;
const URL_PATTERN = /https?:\/\//i;
const EMOJI_PATTERN = /\p{Extended_Pictographic}|:[a-z0-9_]+:/giu;
const EMOJI_LIMIT = 5;
const PROMOTIONAL_LIMIT = 3;

/**
 * Risk from account age. Accounts the platform gives no creation time for
 * score as established ones.
 */
export function accountAgeRisk(accountCreatedAt: number | undefined, now: number): number {
  if (accountCreatedAt === undefined) return 0.1;
  const days = (now - accountCreatedAt) / DAY_MS;
  if (days < 1) return 1;
  if (days < 7) return 0.8;
  if (days < 30) return 0.4;
  return 0.1;
}

export function contentRisk(message: ChatMessage, patterns: PatternLibrary): number {
  let risk = 0;
  if (message.urls.length > 0 || URL_PATTERN.test(message.content)) risk += 0.2;
  if ((message.content.match(EMOJI_PATTERN) ?? []).length > EMOJI_LIMIT) risk += 0.1;
  if (patterns.countPromotional(message.content) >= PROMOTIONAL_LIMIT) risk += 0.3;
  return Math.min(1, risk);
}

export function trustDeficit(profile: SecurityProfile): number {
  return Math.max(0, (50 - profile.trustScore) / 50);
}

export function historyRisk(profile: SecurityProfile): number {
  return Math.min(profile.violationHistory.length / 10, 1);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class ThreatAssessmentDetector implements Detector {
  readonly name = 'threat_assessment';

  constructor(
    private readonly patterns: PatternLibrary,
    private readonly config: ThreatConfig
  ) {}

  detect({ message, profile }: DetectionContext): ViolationFinding | null {
    const weights = this.config.threatWeights;
    const trustFactor = trustDeficit(profile);
    const historyFactor = historyRisk(profile);
    const accountAgeFactor = accountAgeRisk(message.accountCreatedAt, message.timestamp);
    const contentFactor = contentRisk(message, this.patterns);

    const threatLevel =
      trustFactor * weights.trustDeficit +
      historyFactor * weights.history +
      accountAgeFactor * weights.accountAge +
      contentFactor * weights.content;
    if (threatLevel < this.config.threatAssessmentThreshold) return null;

    return {
      type: ViolationType.UNUSUAL_ACTIVITY,
      severity: ViolationSeverity.SERIOUS,
      evidence: {
        threatLevel: round2(threatLevel),
        trustFactor: round2(trustFactor),
        historyFactor: round2(historyFactor),
        accountAgeFactor: round2(accountAgeFactor),
        contentFactor: round2(contentFactor),
      },
    };
  }
}
