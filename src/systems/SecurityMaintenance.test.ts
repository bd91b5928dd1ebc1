import { describe, it, expect } from 'vitest';
import { scheduleMaintenance } from './SecurityMaintenance';
import { createSecurityCore } from '../kernel/KernelBootstrap';
import { PatternLibrary } from '../analyzers/PatternLibrary';
import { ConfigurationError } from '../domain/errors/SecurityErrors';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import { BASE_TIME, DAY, HOUR, FlakyStore, RecordingExecutor, instantDelay, makeMessage, makeProfile, makeRecord, testConfig } from '../testing/fixtures';

const patterns = PatternLibrary.loadDefault();

function setup() {
  const store = new FlakyStore();
  const core = createSecurityCore({ config: testConfig, patterns, store, executor: new RecordingExecutor(), retryDelay: instantDelay });
  return { store, core };
}

describe('SecurityMaintenance', () => {
  it('recovers, prunes, clears quarantines and evicts idle profiles', async () => {
    const { store, core } = setup();
    const now = BASE_TIME;

    await store.inner.save(
      makeProfile(
        {
          trustScore: 40,
          lastViolationAt: now - 8 * DAY,
          lastActivityAt: now - 8 * DAY,
          violationHistory: [makeRecord(ViolationType.SPAM, ViolationSeverity.MODERATE, now - 8 * DAY, { userId: 'u1' })],
        },
        { userId: 'u1' }
      )
    );
    await store.inner.save(makeProfile({}, { userId: 'u2', createdAt: now - 31 * DAY }));
    await store.inner.save(
      makeProfile(
        {
          trustScore: 20,
          quarantineUntil: now - HOUR,
          lastViolationAt: now - 25 * HOUR,
          lastActivityAt: now - 25 * HOUR,
          violationHistory: [makeRecord(ViolationType.HARASSMENT, ViolationSeverity.SERIOUS, now - 25 * HOUR, { userId: 'u3' })],
        },
        { userId: 'u3' }
      )
    );

    const summary = await core.maintenance.sweep(now);

    expect(summary).toMatchObject({
      profilesScanned: 3,
      profilesUpdated: 2,
      profilesEvicted: 1,
      recordsPruned: 1,
      quarantinesCleared: 1,
      reconciled: 0,
      unpersistedRemaining: 0,
      errors: 0,
    });

    const u1 = await store.inner.get('u1', 'guild-1');
    expect(u1?.trustScore).toBe(100);
    expect(u1?.violationHistory).toEqual([]);

    expect(await store.inner.get('u2', 'guild-1')).toBeNull();

    const u3 = await store.inner.get('u3', 'guild-1');
    expect(u3?.trustScore).toBe(28);
    expect(u3?.quarantineUntil).toBeNull();
    expect(u3?.lastRecoveredAt).toBe(now - HOUR);
    expect(u3?.violationHistory).toHaveLength(1);
  });

  it('leaves a profile alone when nothing is due', async () => {
    const { store, core } = setup();
    await store.inner.save(makeProfile({ lastActivityAt: BASE_TIME, lastViolationAt: BASE_TIME - HOUR, trustScore: 90 }));

    const summary = await core.maintenance.sweep(BASE_TIME);

    expect(summary).toMatchObject({ profilesScanned: 1, profilesUpdated: 0, profilesEvicted: 0 });
    expect((await store.inner.get('user-1', 'guild-1'))?.trustScore).toBe(90);
  });

  it('sweeps a held write so a later reconcile saves the swept copy', async () => {
    const { store, core } = setup();
    store.failSaves = true;
    const outcome = await core.coordinator.handleMessage(makeMessage({ content: 'you are an idiot' }));
    expect(outcome).toMatchObject({ persisted: false, updatedTrustScore: 85 });

    const summary = await core.maintenance.sweep(BASE_TIME + 13 * HOUR);

    expect(summary).toMatchObject({ profilesScanned: 1, profilesUpdated: 1, unpersistedRemaining: 1, errors: 0 });
    expect((await core.coordinator.getProfile('user-1', 'guild-1'))?.trustScore).toBe(89);

    store.failSaves = false;
    expect(await core.coordinator.reconcile()).toEqual({ reconciled: 1, remaining: 0 });
    expect((await store.inner.get('user-1', 'guild-1'))?.trustScore).toBe(89);
  });

  it('counts a failed listing as an error and carries on', async () => {
    const { store, core } = setup();
    await store.inner.save(makeProfile());
    store.failGets = true;

    const summary = await core.maintenance.sweep(BASE_TIME);

    expect(summary.errors).toBe(1);
    expect(summary.profilesScanned).toBe(0);
  });
});

describe('scheduleMaintenance', () => {
  it('rejects an invalid cron expression', () => {
    const { core } = setup();
    expect(() => scheduleMaintenance(core.maintenance, 'not a cron')).toThrow(ConfigurationError);
  });
});
