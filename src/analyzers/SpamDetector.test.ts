import { describe, it, expect } from 'vitest';
import { RepeatedContentDetector, SpamDetector } from './SpamDetector';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import { BASE_TIME, SECOND, makeContext, makeMessage, testConfig } from '../testing/fixtures';

const spam = new SpamDetector(testConfig);
const repeated = new RepeatedContentDetector(testConfig);

function burst(contents: string[], lastAt: number, spacingMs: number) {
  return contents.map((content, i) =>
    makeMessage({ content, timestamp: lastAt - (contents.length - i) * spacingMs })
  );
}

describe('SpamDetector', () => {
  it('flags the third identical message inside 30s', () => {
    const earlier = burst(['join my server pls', 'Join my server  pls'], BASE_TIME, 10 * SECOND);
    const current = makeMessage({ content: 'join my server pls' });

    expect(spam.detect(makeContext(current, undefined, earlier))).toEqual({
      type: ViolationType.SPAM,
      severity: ViolationSeverity.MODERATE,
      evidence: { rule: 'identical', count: 3, windowMs: 30_000 },
    });
  });

  it('ignores identical messages outside the window', () => {
    const earlier = [
      makeMessage({ content: 'join my server pls', timestamp: BASE_TIME - 31 * SECOND }),
      makeMessage({ content: 'join my server pls', timestamp: BASE_TIME - 10 * SECOND }),
    ];
    const current = makeMessage({ content: 'join my server pls' });

    expect(spam.detect(makeContext(current, undefined, earlier))).toBeNull();
  });

  it('flags more than 6 distinct messages inside 10s as rapid-fire', () => {
    const earlier = burst(['a1', 'a2', 'a3', 'a4', 'a5', 'a6'], BASE_TIME, SECOND);
    const current = makeMessage({ content: 'a7' });

    expect(spam.detect(makeContext(current, undefined, earlier))).toEqual({
      type: ViolationType.SPAM,
      severity: ViolationSeverity.MINOR,
      evidence: { rule: 'rapid', count: 7, windowMs: 10_000 },
    });
  });

  it('allows exactly 6 messages inside 10s', () => {
    const earlier = burst(['a1', 'a2', 'a3', 'a4', 'a5'], BASE_TIME, SECOND);
    const current = makeMessage({ content: 'a6' });

    expect(spam.detect(makeContext(current, undefined, earlier))).toBeNull();
  });
});

describe('RepeatedContentDetector', () => {
  it('flags a message similar to two earlier ones', () => {
    const earlier = burst(['buy cheap gold coins here today', 'buy cheap gold coins here now'], BASE_TIME, 10 * SECOND);
    const current = makeMessage({ content: 'buy cheap gold coins here pls' });

    expect(repeated.detect(makeContext(current, undefined, earlier))).toEqual({
      type: ViolationType.REPEATED_CONTENT,
      severity: ViolationSeverity.MINOR,
      evidence: { matches: 2, similarity: 0.71, windowMs: 60_000 },
    });
  });

  it('needs repeatMatchThreshold earlier matches', () => {
    const earlier = burst(['buy cheap gold coins here today'], BASE_TIME, 10 * SECOND);
    const current = makeMessage({ content: 'buy cheap gold coins here pls' });

    expect(repeated.detect(makeContext(current, undefined, earlier))).toBeNull();
  });

  it('skips messages shorter than minAnalysisLength', () => {
    const earlier = burst(['ok', 'ok'], BASE_TIME, SECOND);
    const current = makeMessage({ content: 'ok' });

    expect(repeated.detect(makeContext(current, undefined, earlier))).toBeNull();
  });
});
