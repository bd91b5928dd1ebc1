import { describe, it, expect } from 'vitest';
import { formatUserReport } from './SecurityReporter';
import { createSecurityCore } from '../kernel/KernelBootstrap';
import { PatternLibrary } from '../analyzers/PatternLibrary';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import { BASE_TIME, DAY, HOUR, FlakyStore, RecordingExecutor, makeProfile, makeRecord, testConfig } from '../testing/fixtures';

async function seededCore() {
  const store = new FlakyStore();
  await store.inner.save(makeProfile());
  await store.inner.save(
    makeProfile(
      {
        trustScore: 10,
        quarantineUntil: BASE_TIME + HOUR,
        violationHistory: [
          makeRecord(ViolationType.TOXIC_LANGUAGE, ViolationSeverity.SERIOUS, BASE_TIME - 2 * DAY, { userId: 'user-2' }),
          makeRecord(ViolationType.SPAM, ViolationSeverity.MODERATE, BASE_TIME - HOUR, { userId: 'user-2' }),
        ],
      },
      { userId: 'user-2' }
    )
  );
  await store.inner.save(makeProfile({ trustScore: 5 }, { userId: 'user-3', guildId: 'guild-2' }));
  await store.inner.save(
    makeProfile(
      {
        trustScore: 60,
        violationHistory: [
          makeRecord(ViolationType.EMOTIONAL_DISTRESS, ViolationSeverity.MINOR, BASE_TIME - HOUR, { userId: 'user-4' }),
        ],
      },
      { userId: 'user-4' }
    )
  );

  return createSecurityCore({
    config: testConfig,
    patterns: PatternLibrary.loadDefault(),
    store,
    executor: new RecordingExecutor(),
  });
}

describe('SecurityReporter', () => {
  it('summarises one guild', async () => {
    const { reporter } = await seededCore();

    const stats = await reporter.getStats('guild-1', BASE_TIME);

    expect(stats).toMatchObject({
      guildId: 'guild-1',
      profiles: 3,
      trusted: 1,
      quarantined: 1,
      riskLevels: { low: 1, medium: 1, high: 1, critical: 0 },
      violationsByType: { [ViolationType.SPAM]: 1, [ViolationType.EMOTIONAL_DISTRESS]: 1 },
      violationsInWindow: 2,
    });
    expect(stats.averageTrust).toBeCloseTo(170 / 3);
    expect(stats.riskiest.map(entry => [entry.userId, entry.riskLevel])).toEqual([
      ['user-2', 'high'],
      ['user-4', 'medium'],
    ]);
  });

  it('reports an empty guild as fully trusted', async () => {
    const { reporter } = await seededCore();

    const stats = await reporter.getStats('guild-9', BASE_TIME);

    expect(stats.profiles).toBe(0);
    expect(stats.averageTrust).toBe(100);
    expect(stats.riskiest).toEqual([]);
  });

  it('returns null for a user never seen', async () => {
    const { reporter } = await seededCore();
    expect(await reporter.getUserReport('nobody', 'guild-1', BASE_TIME)).toBeNull();
  });

  it('builds and formats a user report', async () => {
    const { reporter } = await seededCore();

    const report = await reporter.getUserReport('user-2', 'guild-1', BASE_TIME);
    if (!report) throw new Error('expected a report');

    expect(report.quarantinedForMs).toBe(HOUR);
    expect(report.totalViolations).toBe(2);
    expect(report.recentViolations.map(r => r.type)).toEqual([ViolationType.SPAM, ViolationType.TOXIC_LANGUAGE]);
    expect(report.risk.riskLevel).toBe('high');

    expect(formatUserReport(report).split('\n')).toEqual([
      'User user-2: trust 10/100 (untrusted)',
      'Risk: high (0.64), punishment level 0',
      'Violations: 2 on record, streak 0',
      'Quarantined for another 60 min',
      '- 2025-01-06T11:00:00.000Z spam (severity 2)',
      '- 2025-01-04T12:00:00.000Z toxic_language (severity 3)',
    ]);
  });
});
