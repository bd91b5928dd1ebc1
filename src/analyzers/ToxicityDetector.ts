// ToxicityDetector.ts - pattern based toxicity families and NSFW keywords

import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { PatternLibrary, ToxicityFamily } from './PatternLibrary';
import type { DetectionContext, Detector } from './Detector';

const FAMILY_OUTCOME: Record<ToxicityFamily, { type: ViolationType; severity: ViolationSeverity }> = {
  insult: { type: ViolationType.TOXIC_LANGUAGE, severity: ViolationSeverity.MODERATE },
  harassment: { type: ViolationType.HARASSMENT, severity: ViolationSeverity.SERIOUS },
  threat: { type: ViolationType.THREATS, severity: ViolationSeverity.SEVERE },
  hate_speech: { type: ViolationType.HATE_SPEECH, severity: ViolationSeverity.CRITICAL },
};

/**
 * Highest matching family wins; a message with an insult and hate speech
 * is reported as hate speech only.
 */
export class ToxicityDetector implements Detector {
  readonly name = 'toxicity';

  constructor(private readonly patterns: PatternLibrary) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const match = this.patterns.matchToxicity(message.content);
    if (!match) return null;

    const outcome = FAMILY_OUTCOME[match.family];
    return {
      type: outcome.type,
      severity: outcome.severity,
      evidence: {
        family: match.family,
        matchedFamilies: match.matchedFamilies,
        patternVersion: this.patterns.version,
      },
    };
  }
}

export class NsfwDetector implements Detector {
  readonly name = 'nsfw';

  constructor(private readonly patterns: PatternLibrary) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const keyword = this.patterns.matchNsfw(message.content);
    if (keyword === null) return null;

    return {
      type: ViolationType.NSFW_CONTENT,
      severity: ViolationSeverity.MODERATE,
      evidence: { keyword },
    };
  }
}
