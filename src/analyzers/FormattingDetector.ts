// FormattingDetector.ts - caps abuse and mention spam

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { DetectionContext, Detector } from './Detector';

/**
 * Uppercase letters over all characters of the trimmed content, counted in
 * code points so emoji weigh one character.
 */
export function uppercaseRatio(content: string): number {
  const chars = Array.from(content.trim());
  if (chars.length === 0) return 0;
  let upper = 0;
  for (const char of chars) {
    if (char !== char.toLowerCase() && char === char.toUpperCase()) upper++;
  }
  return upper / chars.length;
}

export class CapsAbuseDetector implements Detector {
  readonly name = 'caps';

  constructor(private readonly config: Pick<SecurityConfig, 'capsMinLength' | 'capsRatioThreshold'>) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const length = Array.from(message.content.trim()).length;
    if (length < this.config.capsMinLength) return null;

    const ratio = uppercaseRatio(message.content);
    if (ratio < this.config.capsRatioThreshold) return null;

    return {
      type: ViolationType.CAPS_ABUSE,
      severity: ViolationSeverity.MINOR,
      evidence: { capsRatio: Math.round(ratio * 100) / 100, length },
    };
  }
}

export class MentionSpamDetector implements Detector {
  readonly name = 'mentions';

  constructor(private readonly config: Pick<SecurityConfig, 'mentionLimit' | 'mentionSevereLimit'>) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const unique = new Set(message.mentions).size;
    if (unique < this.config.mentionLimit) return null;

    return {
      type: ViolationType.MENTION_SPAM,
      severity: unique >= this.config.mentionSevereLimit ? ViolationSeverity.MODERATE : ViolationSeverity.MINOR,
      evidence: { mentions: unique },
    };
  }
}
