import { describe, it, expect } from 'vitest';
import { NsfwDetector, ToxicityDetector } from './ToxicityDetector';
import { PhishingDetector } from './PhishingDetector';
import { DistressDetector } from './DistressDetector';
import { PatternLibrary } from './PatternLibrary';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import { makeContext, makeMessage, testConfig } from '../testing/fixtures';

const patterns = PatternLibrary.loadDefault();

function detectWith(detector: ToxicityDetector | NsfwDetector | PhishingDetector | DistressDetector, content: string) {
  return detector.detect(makeContext(makeMessage({ content })));
}

describe('ToxicityDetector', () => {
  const toxicity = new ToxicityDetector(patterns);

  it('maps each family to its type and severity', () => {
    expect(detectWith(toxicity, 'you are such a clown')).toMatchObject({
      type: ViolationType.TOXIC_LANGUAGE,
      severity: ViolationSeverity.MODERATE,
    });
    expect(detectWith(toxicity, 'nobody likes you')).toMatchObject({
      type: ViolationType.HARASSMENT,
      severity: ViolationSeverity.SERIOUS,
    });
    expect(detectWith(toxicity, 'better watch your back')).toMatchObject({
      type: ViolationType.THREATS,
      severity: ViolationSeverity.SEVERE,
    });
    expect(detectWith(toxicity, 'sieg heil')).toMatchObject({
      type: ViolationType.HATE_SPEECH,
      severity: ViolationSeverity.CRITICAL,
    });
  });

  it('records the families and the pattern version', () => {
    expect(detectWith(toxicity, 'you are such a clown')?.evidence).toEqual({
      family: 'insult',
      matchedFamilies: ['insult'],
      patternVersion: '2025.10.1',
    });
  });

  it('passes clean content', () => {
    expect(detectWith(toxicity, 'great game everyone')).toBeNull();
  });
});

describe('NsfwDetector', () => {
  it('reports the matched keyword', () => {
    expect(detectWith(new NsfwDetector(patterns), 'selling an onlyfans leak')).toEqual({
      type: ViolationType.NSFW_CONTENT,
      severity: ViolationSeverity.MODERATE,
      evidence: { keyword: 'onlyfans leak' },
    });
  });
});

describe('PhishingDetector', () => {
  const phishing = new PhishingDetector(patterns, testConfig);

  it('flags content scoring at the threshold as critical', () => {
    expect(detectWith(phishing, 'FREE NITRO claim now, hurry')).toEqual({
      type: ViolationType.PHISHING,
      severity: ViolationSeverity.CRITICAL,
      evidence: { score: 6, matched: ['free nitro', 'claim now', 'urgency:now', 'urgency:hurry'] },
    });
  });

  it('passes content below the threshold', () => {
    // "claim now" (2) + urgency "now" (1)
    expect(detectWith(phishing, 'claim now')).toBeNull();
  });
});

describe('DistressDetector', () => {
  it('reports distress as a minor, non-punitive finding', () => {
    expect(detectWith(new DistressDetector(patterns), 'honestly i want to die')).toEqual({
      type: ViolationType.EMOTIONAL_DISTRESS,
      severity: ViolationSeverity.MINOR,
      evidence: { keyword: 'want to die' },
    });
  });
});
