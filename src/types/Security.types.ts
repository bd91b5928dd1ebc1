// Security.types.ts

export enum ViolationSeverity {
  MINOR = 1,
  MODERATE = 2,
  SERIOUS = 3,
  SEVERE = 4,
  CRITICAL = 5,
}

export enum ViolationType {
  SPAM = 'spam',
  REPEATED_CONTENT = 'repeated_content',
  CAPS_ABUSE = 'caps_abuse',
  MENTION_SPAM = 'mention_spam',
  TOXIC_LANGUAGE = 'toxic_language',
  HARASSMENT = 'harassment',
  THREATS = 'threats',
  HATE_SPEECH = 'hate_speech',
  MALICIOUS_LINKS = 'malicious_links',
  PHISHING = 'phishing',
  NSFW_CONTENT = 'nsfw_content',
  UNUSUAL_ACTIVITY = 'unusual_activity',
  EMOTIONAL_DISTRESS = 'emotional_distress',
}

export type EvidenceValue = string | number | boolean | string[];

export interface ViolationRecord {
  readonly id: string;
  readonly userId: string;
  readonly guildId: string;
  readonly type: ViolationType;
  readonly severity: ViolationSeverity;
  readonly messageExcerpt: string;
  readonly channelId: string;
  readonly messageId: string;
  readonly timestamp: number; // epoch ms
  readonly evidence: Readonly<Record<string, EvidenceValue>>;
}

export interface BehavioralAggregates {
  messageCount: number;
  avgMessageLength: number;
  channelDiversity: readonly string[];
  positiveContributions: number;
  violationStreak: number;
  improvementStreak: number; // recovery intervals credited since the last violation
}

export interface SecurityProfile {
  readonly userId: string;
  readonly guildId: string; // '*' when profiles are global
  readonly trustScore: number; // 0-100
  readonly violationHistory: readonly ViolationRecord[];
  readonly punishmentLevel: number; // 0-7
  readonly isTrusted: boolean;
  readonly quarantineUntil: number | null;
  readonly lastViolationAt: number | null;
  readonly lastRecoveredAt: number | null;
  readonly lastActivityAt: number;
  readonly createdAt: number;
  readonly aggregates: Readonly<BehavioralAggregates>;
}

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface RiskAssessment {
  riskScore: number; // 0-1
  riskLevel: RiskLevel;
  factors: {
    violationFrequency: number;
    trustDeficit: number;
    inverseImprovement: number;
  };
}

export type PunishmentType = 'supportive' | 'reminder' | 'warning' | 'timeout' | 'kick' | 'ban';

export interface PunishmentDecision {
  readonly type: PunishmentType;
  readonly durationMs?: number;
  readonly level: number;
  readonly rationale: string;
}

export interface ChatMessage {
  messageId: string;
  userId: string;
  guildId: string;
  channelId: string;
  content: string;
  timestamp: number; // epoch ms
  mentions: string[];
  urls: string[];
  accountCreatedAt?: number; // epoch ms, when the platform reports it
}

export type ProfileSource = 'store' | 'cache' | 'fallback';

export interface ActionResult {
  success: boolean;
  actionsTaken: string[];
  error?: string;
}

export interface ModerationOutcome {
  violations: ViolationRecord[];
  primary: ViolationRecord | null;
  decision: PunishmentDecision | null;
  updatedTrustScore: number;
  updatedRiskLevel: RiskLevel;
  riskScore: number;
  degradedDetectors: string[];
  persisted: boolean;
  profileSource: ProfileSource;
  execution?: ActionResult;
}
