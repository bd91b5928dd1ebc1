// Shared builders for unit tests. Not loaded by the running bot.

import { loadSecurityConfig } from '../config/security.config';
import type { SecurityConfig } from '../config/security.config';
import type {
  ActionResult,
  ChatMessage,
  ModerationOutcome,
  SecurityProfile,
  ViolationRecord,
  ViolationSeverity,
  ViolationType,
} from '../types/Security.types';
import { createSecurityProfile, profileKey, reviseProfile } from '../domain/models/SecurityProfile';
import type { ProfileChanges } from '../domain/models/SecurityProfile';
import { createViolationRecord } from '../domain/models/Violation';
import type { DetectionContext, WindowView } from '../analyzers/Detector';
import { SlidingWindowTracker, createWindowEntry } from '../systems/SlidingWindowTracker';
import type { ActionExecutor, ExecutionOptions } from '../systems/ActionExecutor';
import { InMemoryProfileStore } from '../database/InMemoryProfileStore';
import type { SweepableProfileStore } from '../database/ProfileStore';

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

// Monday 2025-01-06 12:00:00 UTC
export const BASE_TIME = Date.UTC(2025, 0, 6, 12, 0, 0);

export const testConfig: SecurityConfig = loadSecurityConfig();

let messageSeq = 0;

export function makeMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  messageSeq++;
  return {
    messageId: `msg-${messageSeq}`,
    userId: 'user-1',
    guildId: 'guild-1',
    channelId: 'channel-1',
    content: 'hello there',
    timestamp: BASE_TIME,
    mentions: [],
    urls: [],
    ...overrides,
  };
}

export function makeProfile(
  changes: ProfileChanges = {},
  options: { userId?: string; guildId?: string; createdAt?: number; config?: SecurityConfig } = {}
): SecurityProfile {
  const config = options.config ?? testConfig;
  const profile = createSecurityProfile(
    options.userId ?? 'user-1',
    options.guildId ?? 'guild-1',
    options.createdAt ?? BASE_TIME - 30 * DAY,
    config
  );
  return reviseProfile(profile, changes, config);
}

export function makeRecord(
  type: ViolationType,
  severity: ViolationSeverity,
  timestamp: number = BASE_TIME,
  message: Partial<ChatMessage> = {}
): ViolationRecord {
  return createViolationRecord(makeMessage({ timestamp, ...message }), { type, severity, evidence: {} });
}

/**
 * Detection context over a throwaway window holding `earlier` and `message`.
 */
export function makeContext(
  message: ChatMessage,
  profile: SecurityProfile = makeProfile(),
  earlier: ChatMessage[] = []
): DetectionContext {
  const tracker = new SlidingWindowTracker(100, DAY);
  const key = profileKey(profile.userId, profile.guildId);
  for (const previous of earlier) {
    tracker.record(key, createWindowEntry(previous.messageId, previous.content, previous.timestamp, previous.channelId));
  }
  const current = createWindowEntry(message.messageId, message.content, message.timestamp, message.channelId);
  tracker.record(key, current);

  const now = message.timestamp;
  const window: WindowView = {
    current,
    countMatching: (fingerprint, windowMs) => tracker.countMatching(key, fingerprint, windowMs, now),
    countRecent: windowMs => tracker.countRecent(key, windowMs, now),
    recent: windowMs => tracker.recent(key, windowMs, now),
  };
  return { message, profile, window };
}

export interface ExecutorCall {
  outcome: ModerationOutcome;
  message: ChatMessage;
  options: ExecutionOptions;
}

/**
 * Records every apply(); fails with `failWith` when set.
 */
export class RecordingExecutor implements ActionExecutor {
  readonly calls: ExecutorCall[] = [];
  failWith: Error | null = null;

  async apply(outcome: ModerationOutcome, message: ChatMessage, options: ExecutionOptions): Promise<ActionResult> {
    this.calls.push({ outcome, message, options });
    if (this.failWith) throw this.failWith;
    return { success: true, actionsTaken: ['audit_log'] };
  }
}

/**
 * In-memory store whose reads and writes can be switched off.
 */
export class FlakyStore implements SweepableProfileStore {
  readonly inner = new InMemoryProfileStore();
  failGets = false;
  failSaves = false;
  getCalls = 0;
  saveCalls = 0;

  async get(userId: string, guildId: string): Promise<SecurityProfile | null> {
    this.getCalls++;
    if (this.failGets) throw new Error('connection refused');
    return this.inner.get(userId, guildId);
  }

  async save(profile: SecurityProfile): Promise<void> {
    this.saveCalls++;
    if (this.failSaves) throw new Error('connection refused');
    await this.inner.save(profile);
  }

  async list(): Promise<SecurityProfile[]> {
    if (this.failGets) throw new Error('connection refused');
    return this.inner.list();
  }

  async delete(userId: string, guildId: string): Promise<boolean> {
    return this.inner.delete(userId, guildId);
  }
}

export const instantDelay = async (): Promise<void> => {};
