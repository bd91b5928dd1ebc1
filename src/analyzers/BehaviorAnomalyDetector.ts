// BehaviorAnomalyDetector.ts - message far outside the user's usual length

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { DetectionContext, Detector } from './Detector';

type AnomalyConfig = Pick<SecurityConfig, 'unusualMinMessages' | 'unusualLengthMultiplier' | 'unusualLengthMinimum'>;

export class BehaviorAnomalyDetector implements Detector {
  readonly name = 'behavior_anomaly';

  constructor(private readonly config: AnomalyConfig) {}

  detect({ message, profile }: DetectionContext): ViolationFinding | null {
    const { messageCount, avgMessageLength } = profile.aggregates;
    // Not enough history for a baseline
    if (messageCount <= this.config.unusualMinMessages) return null;

    const length = message.content.length;
    if (length <= this.config.unusualLengthMinimum) return null;
    if (length <= avgMessageLength * this.config.unusualLengthMultiplier) return null;

    return {
      type: ViolationType.UNUSUAL_ACTIVITY,
      severity: ViolationSeverity.MINOR,
      evidence: {
        length,
        averageLength: Math.round(avgMessageLength),
      },
    };
  }
}
