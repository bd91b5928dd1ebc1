import { describe, it, expect } from 'vitest';
import { ViolationDetectionPipeline } from './ViolationDetectionPipeline';
import type { DetectionResult } from './ViolationDetectionPipeline';
import { PatternLibrary } from '../analyzers/PatternLibrary';
import { CapsAbuseDetector } from '../analyzers/FormattingDetector';
import type { Detector } from '../analyzers/Detector';
import { MetricsService } from '../services/MetricsService';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import { BASE_TIME, HOUR, SECOND, makeMessage, makeProfile, makeRecord, testConfig } from '../testing/fixtures';

const patterns = PatternLibrary.loadDefault();

const throwing: Detector = {
  name: 'boom',
  detect: () => {
    throw new Error('model crashed');
  },
};

const stalled: Detector = {
  name: 'stall',
  timeoutMs: 5,
  detect: () => new Promise<null>(() => {}),
};

describe('ViolationDetectionPipeline', () => {
  it('runs the default detectors and tags the primary', async () => {
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns);
    const message = makeMessage({ content: 'YOU ARE AN IDIOT' });

    const result = await pipeline.evaluate(message, makeProfile());

    expect(result.violations.map(v => v.type)).toEqual([ViolationType.TOXIC_LANGUAGE, ViolationType.CAPS_ABUSE]);
    expect(result.primary?.type).toBe(ViolationType.TOXIC_LANGUAGE);
    expect(result.degraded).toEqual([]);
  });

  it('returns no violations for ordinary chat', async () => {
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns);

    const result = await pipeline.evaluate(makeMessage({ content: 'anyone up for ranked later?' }), makeProfile());

    expect(result).toEqual({ violations: [], primary: null, degraded: [] });
  });

  it('assesses the threat from a new account with a bad record', async () => {
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns);
    const history = Array.from({ length: 10 }, () => makeRecord(ViolationType.SPAM, ViolationSeverity.MINOR));
    const profile = makeProfile({ trustScore: 0, violationHistory: history });

    const result = await pipeline.evaluate(
      makeMessage({ content: 'anyone up for ranked later?', accountCreatedAt: BASE_TIME - HOUR }),
      profile
    );

    expect(result.violations.map(v => [v.type, v.severity])).toEqual([
      [ViolationType.UNUSUAL_ACTIVITY, ViolationSeverity.SERIOUS],
    ]);
  });

  it('fails open when a detector throws or stalls', async () => {
    const metrics = new MetricsService({ collectDefaults: false });
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns, {
      detectors: [throwing, stalled, new CapsAbuseDetector(testConfig)],
      metrics,
    });

    const result = await pipeline.evaluate(makeMessage({ content: 'THIS IS SO LOUD' }), makeProfile());

    expect(result.violations).toHaveLength(1);
    expect(result.primary?.type).toBe(ViolationType.CAPS_ABUSE);
    expect(result.degraded.map(failure => [failure.detector, failure.timedOut])).toEqual([
      ['boom', false],
      ['stall', true],
    ]);

    const exported = await metrics.getMetrics();
    expect(exported).toContain('vigil_detector_degraded_total{detector="boom",reason="error"} 1');
    expect(exported).toContain('vigil_detector_degraded_total{detector="stall",reason="timeout"} 1');
  });

  it('records every message in the sender window', async () => {
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns);
    const profile = makeProfile();
    let last: DetectionResult | null = null;

    for (let i = 0; i < 3; i++) {
      last = await pipeline.evaluate(
        makeMessage({ content: 'join my server pls', timestamp: BASE_TIME + i * SECOND }),
        profile
      );
    }

    expect(last?.violations.map(v => [v.type, v.severity])).toEqual([
      [ViolationType.SPAM, ViolationSeverity.MODERATE],
      [ViolationType.REPEATED_CONTENT, ViolationSeverity.MINOR],
    ]);
    expect(pipeline.tracker.trackedKeys).toBe(1);
  });

  it('stamps records with the profile scope', async () => {
    const pipeline = new ViolationDetectionPipeline(testConfig, patterns);
    const globalProfile = makeProfile({}, { guildId: '*' });

    const result = await pipeline.evaluate(makeMessage({ content: 'you clown' }), globalProfile);

    expect(result.violations[0].guildId).toBe('*');
  });
});
