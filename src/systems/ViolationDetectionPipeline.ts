/**
 * VIOLATION DETECTION PIPELINE
 *
 * Runs every detector against one message and the sender's profile snapshot.
 *
 * Flow:
 * 1. Record the message in the sliding window (once)
 * 2. Run all detectors concurrently, each under its own timer
 * 3. Collect findings; a crashed or slow detector becomes a DetectorFailure
 *    and counts as "no finding"
 * 4. Tag the primary record
 *
 * evaluate() never rejects.
 */

import type { SecurityConfig } from '../config/security.config';
import { longestWindowMs } from '../config/security.config';
import type { ChatMessage, SecurityProfile, ViolationRecord } from '../types/Security.types';
import { createViolationRecord, selectPrimary } from '../domain/models/Violation';
import { profileKey } from '../domain/models/SecurityProfile';
import { DetectorFailure } from '../domain/errors/SecurityErrors';
import type { PatternLibrary } from '../analyzers/PatternLibrary';
import type { DetectionContext, Detector, DetectorResult, WindowView } from '../analyzers/Detector';
import { RepeatedContentDetector, SpamDetector } from '../analyzers/SpamDetector';
import { CapsAbuseDetector, MentionSpamDetector } from '../analyzers/FormattingDetector';
import { NsfwDetector, ToxicityDetector } from '../analyzers/ToxicityDetector';
import { LinkReputationDetector } from '../analyzers/LinkReputationDetector';
import { PhishingDetector } from '../analyzers/PhishingDetector';
import { DistressDetector } from '../analyzers/DistressDetector';
import { BehaviorAnomalyDetector } from '../analyzers/BehaviorAnomalyDetector';
import { ThreatAssessmentDetector } from '../analyzers/ThreatAssessmentDetector';
import type { ThreatIntel } from '../services/ThreatIntelService';
import type { MetricsService } from '../services/MetricsService';
import { createLogger } from '../services/Logger';
import { TIMED_OUT, withTimeout } from '../utils/async';
import { SlidingWindowTracker, createWindowEntry } from './SlidingWindowTracker';

const logger = createLogger('DetectionPipeline');

export interface DetectionResult {
  violations: ViolationRecord[];
  primary: ViolationRecord | null;
  degraded: DetectorFailure[];
}

export interface PipelineOptions {
  threatIntel?: ThreatIntel;
  detectors?: Detector[];
  tracker?: SlidingWindowTracker;
  metrics?: MetricsService;
}

/**
 * Default detector set. Order only matters as the last tie-break for the primary.
 */
export function createDefaultDetectors(
  config: SecurityConfig,
  patterns: PatternLibrary,
  threatIntel?: ThreatIntel
): Detector[] {
  return [
    new ToxicityDetector(patterns),
    new PhishingDetector(patterns, config),
    new LinkReputationDetector(patterns, config, threatIntel),
    new NsfwDetector(patterns),
    new SpamDetector(config),
    new RepeatedContentDetector(config),
    new BehaviorAnomalyDetector(config),
    new ThreatAssessmentDetector(patterns, config),
    new CapsAbuseDetector(config),
    new MentionSpamDetector(config),
    new DistressDetector(patterns),
  ];
}

export class ViolationDetectionPipeline {
  readonly tracker: SlidingWindowTracker;
  private detectors: Detector[];
  private metrics?: MetricsService;

  constructor(
    private readonly config: SecurityConfig,
    patterns: PatternLibrary,
    options: PipelineOptions = {}
  ) {
    this.tracker = options.tracker ?? new SlidingWindowTracker(config.windowCapacity, longestWindowMs(config));
    this.detectors = options.detectors ?? createDefaultDetectors(config, patterns, options.threatIntel);
    this.metrics = options.metrics;
  }

  async evaluate(message: ChatMessage, profile: SecurityProfile): Promise<DetectionResult> {
    const key = profileKey(profile.userId, profile.guildId);
    const now = message.timestamp;

    const current = createWindowEntry(message.messageId, message.content, now, message.channelId);
    this.tracker.record(key, current);

    const window: WindowView = {
      current,
      countMatching: (fingerprint, windowMs) => this.tracker.countMatching(key, fingerprint, windowMs, now),
      countRecent: windowMs => this.tracker.countRecent(key, windowMs, now),
      recent: windowMs => this.tracker.recent(key, windowMs, now),
    };
    const context: DetectionContext = { message, profile, window };

    const results = await Promise.all(this.detectors.map(detector => this.runDetector(detector, context)));

    const violations: ViolationRecord[] = [];
    const degraded: DetectorFailure[] = [];

    for (const result of results) {
      if (!result.ok) {
        degraded.push(result.error);
        this.reportDegraded(result.error, message);
      } else if (result.finding) {
        violations.push(createViolationRecord(message, result.finding, profile.guildId));
      }
    }

    const primary = selectPrimary(violations);

    if (violations.length > 0) {
      logger.debug(`${violations.length} violation(s) on message ${message.messageId}`, {
        userId: message.userId,
        types: violations.map(v => v.type),
        primary: primary?.type,
      });
    }

    return { violations, primary, degraded };
  }

  private async runDetector(detector: Detector, context: DetectionContext): Promise<DetectorResult> {
    const budget = detector.timeoutMs ?? this.config.detectorTimeoutMs;
    try {
      // Wrapping in an async call turns a synchronous throw into a rejection
      const outcome = await withTimeout(
        (async () => detector.detect(context))(),
        budget
      );
      if (outcome === TIMED_OUT) {
        return {
          ok: false,
          detector: detector.name,
          error: new DetectorFailure(detector.name, `exceeded ${budget}ms`, { timedOut: true }),
        };
      }
      return { ok: true, detector: detector.name, finding: outcome };
    } catch (error) {
      return {
        ok: false,
        detector: detector.name,
        error: new DetectorFailure(detector.name, error instanceof Error ? error.message : String(error), { cause: error }),
      };
    }
  }

  private reportDegraded(failure: DetectorFailure, message: ChatMessage): void {
    const reason = failure.timedOut ? 'timeout' : 'error';
    logger.warn(`Detector ${failure.detector} degraded (${reason}), continuing without it`, {
      messageId: message.messageId,
      error: failure.message,
    });
    this.metrics?.recordDetectorDegraded(failure.detector, reason);
  }
}
