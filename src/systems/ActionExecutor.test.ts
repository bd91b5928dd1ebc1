import { describe, it, expect } from 'vitest';
import { describeOutcome, formatDuration, isEnforcementStep, planActions } from './ActionExecutor';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ModerationOutcome, PunishmentDecision, PunishmentType } from '../types/Security.types';
import { HOUR, MINUTE, makeMessage, makeRecord } from '../testing/fixtures';

const spam = makeRecord(ViolationType.SPAM, ViolationSeverity.MODERATE);
const caps = makeRecord(ViolationType.CAPS_ABUSE, ViolationSeverity.MINOR);

function decision(type: PunishmentType, level: number, durationMs?: number): PunishmentDecision {
  return { type, level, durationMs, rationale: 'test' };
}

function outcome(changes: Partial<ModerationOutcome> = {}): ModerationOutcome {
  return {
    violations: [spam],
    primary: spam,
    decision: decision('timeout', 3, 30 * MINUTE),
    updatedTrustScore: 71.6,
    updatedRiskLevel: 'medium',
    riskScore: 0.4,
    degradedDetectors: [],
    persisted: true,
    profileSource: 'store',
    ...changes,
  };
}

describe('planActions', () => {
  const present = { messageGone: false };

  it('plans nothing without a decision', () => {
    expect(planActions(null, spam, present)).toEqual([]);
  });

  it('deletes before timing out', () => {
    expect(planActions(decision('timeout', 4, HOUR), spam, present)).toEqual([
      'delete_message',
      'timeout',
      'notify_user',
      'audit_log',
    ]);
  });

  it('notifies before a ban', () => {
    expect(planActions(decision('ban', 7), spam, present)).toEqual(['delete_message', 'notify_user', 'ban', 'audit_log']);
  });

  it('keeps minor reminders in place', () => {
    expect(planActions(decision('reminder', 1), caps, present)).toEqual(['notify_user', 'audit_log']);
    expect(planActions(decision('reminder', 1), spam, present)).toEqual(['delete_message', 'notify_user', 'audit_log']);
  });

  it('only reaches out on distress', () => {
    expect(planActions(decision('supportive', 0), spam, present)).toEqual(['supportive_message', 'audit_log']);
  });

  it('adds support when distress comes with another finding', () => {
    const distress = makeRecord(ViolationType.EMOTIONAL_DISTRESS, ViolationSeverity.MINOR);

    expect(planActions(decision('warning', 2), spam, present, [spam, distress])).toEqual([
      'delete_message',
      'notify_user',
      'supportive_message',
      'audit_log',
    ]);
    expect(planActions(decision('ban', 7), spam, present, [spam, distress])).toEqual([
      'delete_message',
      'notify_user',
      'supportive_message',
      'ban',
      'audit_log',
    ]);
    expect(planActions(decision('supportive', 0), distress, present, [distress])).toEqual([
      'supportive_message',
      'audit_log',
    ]);
  });

  it('skips deletion when the message is already gone', () => {
    expect(planActions(decision('kick', 6), spam, { messageGone: true })).toEqual(['notify_user', 'kick', 'audit_log']);
  });
});

describe('isEnforcementStep', () => {
  it('separates enforcement from notices', () => {
    expect(isEnforcementStep('timeout')).toBe(true);
    expect(isEnforcementStep('delete_message')).toBe(true);
    expect(isEnforcementStep('notify_user')).toBe(false);
    expect(isEnforcementStep('audit_log')).toBe(false);
  });
});

describe('formatDuration', () => {
  it('uses minutes below an hour and hours above', () => {
    expect(formatDuration(30 * MINUTE)).toBe('30m');
    expect(formatDuration(2 * HOUR)).toBe('2h');
    expect(formatDuration(90 * MINUTE)).toBe('1h30m');
  });
});

describe('describeOutcome', () => {
  const message = makeMessage({ messageId: 'm-42', channelId: 'general' });

  it('writes one audit line', () => {
    expect(describeOutcome(outcome(), message, { messageGone: false })).toBe(
      '[vigil] user=user-1 channel=general message=m-42 action=timeout 30m (level 3) violations=spam trust=72 risk=medium'
    );
  });

  it('flags gone messages and unpersisted profiles', () => {
    const line = describeOutcome(
      outcome({ decision: decision('warning', 2), persisted: false }),
      message,
      { messageGone: true }
    );
    expect(line).toBe(
      '[vigil] user=user-1 channel=general message=m-42 action=warning (level 2) violations=spam trust=72 risk=medium (message already gone) (unpersisted)'
    );
  });
});
