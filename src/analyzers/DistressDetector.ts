// DistressDetector.ts - crisis keywords, routed to supportive handling

import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { PatternLibrary } from './PatternLibrary';
import type { DetectionContext, Detector } from './Detector';

export class DistressDetector implements Detector {
  readonly name = 'distress';

  constructor(private readonly patterns: PatternLibrary) {}

  detect({ message }: DetectionContext): ViolationFinding | null {
    const keyword = this.patterns.matchDistress(message.content);
    if (keyword === null) return null;

    return {
      type: ViolationType.EMOTIONAL_DISTRESS,
      severity: ViolationSeverity.MINOR,
      evidence: { keyword },
    };
  }
}
