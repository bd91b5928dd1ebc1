// PhishingDetector.ts - keyword + urgency scoring

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { PatternLibrary } from './PatternLibrary';
import type { DetectionContext, Detector } from './Detector';

export class PhishingDetector implements Detector {
  readonly name = 'phishing';

  constructor(
    private readonly patterns: PatternLibrary,
    private readonly config: Pick<SecurityConfig, 'phishingThreshold'>
  ) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const { score, matched } = this.patterns.scorePhishing(message.content);
    if (score < this.config.phishingThreshold) return null;

    return {
      type: ViolationType.PHISHING,
      severity: ViolationSeverity.CRITICAL,
      evidence: { score, matched },
    };
  }
}
