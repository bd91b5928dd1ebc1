// SpamDetector.ts - frequency based spam rules over the sliding window

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import { jaccardSimilarity } from '../systems/SlidingWindowTracker';
import type { DetectionContext, Detector } from './Detector';

type SpamConfig = Pick<
  SecurityConfig,
  'spamThreshold' | 'spamTimeframeMs' | 'rapidMessageLimit' | 'rapidTimeframeMs'
>;

/**
 * Identical-message spam (MODERATE) and, failing that, rapid-fire
 * distinct messages (MINOR). The current message counts toward both.
 */
export class SpamDetector implements Detector {
  readonly name = 'spam';

  constructor(private readonly config: SpamConfig) {}

  detect({ window }: DetectionContext): ViolationFinding | null {
    const identical = window.countMatching(window.current.fingerprint, this.config.spamTimeframeMs);
    if (identical >= this.config.spamThreshold) {
      return {
        type: ViolationType.SPAM,
        severity: ViolationSeverity.MODERATE,
        evidence: {
          rule: 'identical',
          count: identical,
          windowMs: this.config.spamTimeframeMs,
        },
      };
    }

    const burst = window.countRecent(this.config.rapidTimeframeMs);
    if (burst > this.config.rapidMessageLimit) {
      return {
        type: ViolationType.SPAM,
        severity: ViolationSeverity.MINOR,
        evidence: {
          rule: 'rapid',
          count: burst,
          windowMs: this.config.rapidTimeframeMs,
        },
      };
    }

    return null;
  }
}

type RepeatConfig = Pick<
  SecurityConfig,
  'repeatTimeframeMs' | 'repeatMatchThreshold' | 'similarityThreshold' | 'minAnalysisLength'
>;

/**
 * Near-duplicate content: token-set similarity against earlier messages.
 */
export class RepeatedContentDetector implements Detector {
  readonly name = 'repeated_content';

  constructor(private readonly config: RepeatConfig) {}

  detect({ message, window }: DetectionContext): ViolationFinding | null {
    if (message.content.trim().length < this.config.minAnalysisLength) return null;

    const current = window.current;
    let matches = 0;
    let best = 0;

    for (const entry of window.recent(this.config.repeatTimeframeMs)) {
      if (entry.messageId === current.messageId) continue;
      const similarity = jaccardSimilarity(current.tokens, entry.tokens);
      if (similarity >= this.config.similarityThreshold) {
        matches++;
        best = Math.max(best, similarity);
      }
    }

    if (matches < this.config.repeatMatchThreshold) return null;

    return {
      type: ViolationType.REPEATED_CONTENT,
      severity: ViolationSeverity.MINOR,
      evidence: {
        matches,
        similarity: Math.round(best * 100) / 100,
        windowMs: this.config.repeatTimeframeMs,
      },
    };
  }
}
