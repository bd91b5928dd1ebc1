// ActionExecutor.ts - boundary between a decided punishment and the platform
// Platform adapters turn the action plan below into API calls.

import {
  ActionResult,
  ChatMessage,
  ModerationOutcome,
  PunishmentDecision,
  ViolationRecord,
  ViolationSeverity,
} from '../types/Security.types';
import { isPunitive } from '../domain/models/Violation';

// ============================================
// ACTION PLAN
// ============================================

export type ActionStep =
  | 'delete_message'
  | 'notify_user'
  | 'supportive_message'
  | 'timeout'
  | 'kick'
  | 'ban'
  | 'audit_log';

export interface ExecutionOptions {
  /** The source message was deleted or edited before execution */
  messageGone: boolean;
}

export interface ActionExecutor {
  apply(outcome: ModerationOutcome, message: ChatMessage, options: ExecutionOptions): Promise<ActionResult>;
}

/**
 * Steps for a decision, in execution order. The user is notified before a
 * kick or ban so the DM can still reach them. A distress record among the
 * findings adds a supportive message even when another finding is punished.
 * A gone message is never deleted; the audit entry is always written.
 */
export function planActions(
  decision: PunishmentDecision | null,
  primary: ViolationRecord | null,
  options: ExecutionOptions,
  violations: readonly ViolationRecord[] = []
): ActionStep[] {
  if (!decision || !primary) return [];

  let steps: ActionStep[];
  switch (decision.type) {
    case 'supportive':
      steps = ['supportive_message'];
      break;
    case 'reminder':
      steps = primary.severity >= ViolationSeverity.MODERATE ? ['delete_message', 'notify_user'] : ['notify_user'];
      break;
    case 'warning':
      steps = ['delete_message', 'notify_user'];
      break;
    case 'timeout':
      steps = ['delete_message', 'timeout', 'notify_user'];
      break;
    case 'kick':
      steps = ['delete_message', 'notify_user', 'kick'];
      break;
    case 'ban':
      steps = ['delete_message', 'notify_user', 'ban'];
      break;
  }

  if (!steps.includes('supportive_message') && violations.some(record => !isPunitive(record))) {
    const at = steps.findIndex(step => step === 'kick' || step === 'ban');
    steps = at === -1 ? [...steps, 'supportive_message'] : [...steps.slice(0, at), 'supportive_message', ...steps.slice(at)];
  }

  if (options.messageGone) {
    steps = steps.filter(step => step !== 'delete_message');
  }
  return [...steps, 'audit_log'];
}

/**
 * Steps whose failure means the decided punishment was not applied.
 */
export function isEnforcementStep(step: ActionStep): boolean {
  return step === 'delete_message' || step === 'timeout' || step === 'kick' || step === 'ban';
}

export function formatDuration(ms: number): string {
  const minutes = Math.round(ms / 60_000);
  if (minutes < 60) return `${minutes}m`;
  const hours = minutes / 60;
  return Number.isInteger(hours) ? `${hours}h` : `${Math.floor(hours)}h${minutes % 60}m`;
}

/**
 * One-line audit record for the moderation log.
 */
export function describeOutcome(outcome: ModerationOutcome, message: ChatMessage, options: ExecutionOptions): string {
  const decision = outcome.decision;
  const action = decision
    ? `${decision.type}${decision.durationMs !== undefined ? ` ${formatDuration(decision.durationMs)}` : ''} (level ${decision.level})`
    : 'none';
  const types = outcome.violations.map(v => v.type).join(', ') || 'none';

  return (
    `[vigil] user=${message.userId} channel=${message.channelId} message=${message.messageId} ` +
    `action=${action} violations=${types} trust=${outcome.updatedTrustScore.toFixed(0)} ` +
    `risk=${outcome.updatedRiskLevel}` +
    (options.messageGone ? ' (message already gone)' : '') +
    (outcome.persisted ? '' : ' (unpersisted)')
  );
}
