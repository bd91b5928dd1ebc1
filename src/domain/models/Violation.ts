/**
 * DOMAIN MODEL: Violation
 *
 * A single detected violation. Records are frozen on creation and only ever
 * appended to a profile's history.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ChatMessage,
  EvidenceValue,
  ViolationRecord,
  ViolationSeverity,
  ViolationType,
} from '../../types/Security.types';

export const MAX_EXCERPT_LENGTH = 200;

/**
 * Severity ranks. Lower number wins a tie between equal severities.
 */
const FAMILY_PRIORITY: Record<ViolationType, number> = {
  [ViolationType.HATE_SPEECH]: 0,
  [ViolationType.THREATS]: 0,
  [ViolationType.PHISHING]: 1,
  [ViolationType.MALICIOUS_LINKS]: 2,
  [ViolationType.HARASSMENT]: 3,
  [ViolationType.TOXIC_LANGUAGE]: 3,
  [ViolationType.NSFW_CONTENT]: 3,
  [ViolationType.SPAM]: 4,
  [ViolationType.REPEATED_CONTENT]: 4,
  [ViolationType.UNUSUAL_ACTIVITY]: 4,
  [ViolationType.CAPS_ABUSE]: 5,
  [ViolationType.MENTION_SPAM]: 5,
  [ViolationType.EMOTIONAL_DISTRESS]: 6,
};

export function familyPriority(type: ViolationType): number {
  return FAMILY_PRIORITY[type];
}

/**
 * Distress findings route to supportive handling, never to punishment.
 */
export function isPunitive(record: Pick<ViolationRecord, 'type'>): boolean {
  return record.type !== ViolationType.EMOTIONAL_DISTRESS;
}

/**
 * Clip to MAX_EXCERPT_LENGTH code points; never splits a surrogate pair.
 */
export function excerpt(content: string): string {
  const chars = Array.from(content);
  return chars.length <= MAX_EXCERPT_LENGTH ? content : `${chars.slice(0, MAX_EXCERPT_LENGTH - 1).join('')}…`;
}

export interface ViolationFinding {
  type: ViolationType;
  severity: ViolationSeverity;
  evidence: Record<string, EvidenceValue>;
}

export function createViolationRecord(
  message: ChatMessage,
  finding: ViolationFinding,
  profileGuildId: string = message.guildId
): ViolationRecord {
  return Object.freeze({
    id: uuidv4(),
    userId: message.userId,
    guildId: profileGuildId,
    type: finding.type,
    severity: finding.severity,
    messageExcerpt: excerpt(message.content),
    channelId: message.channelId,
    messageId: message.messageId,
    timestamp: message.timestamp,
    evidence: Object.freeze({ ...finding.evidence }),
  });
}

/**
 * Pick the record that drives escalation: highest severity among punitive
 * records, ties broken by family priority, then by detection order.
 * A distress record is primary only when nothing else fired.
 */
export function selectPrimary(records: readonly ViolationRecord[]): ViolationRecord | null {
  let primary: ViolationRecord | null = null;

  for (const record of records) {
    if (!isPunitive(record)) continue;
    if (
      primary === null ||
      record.severity > primary.severity ||
      (record.severity === primary.severity && familyPriority(record.type) < familyPriority(primary.type))
    ) {
      primary = record;
    }
  }

  if (primary !== null) return primary;
  return records.find(record => !isPunitive(record)) ?? null;
}
