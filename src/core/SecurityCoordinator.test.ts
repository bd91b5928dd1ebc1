import { describe, it, expect } from 'vitest';
import { SecurityCoordinator } from './SecurityCoordinator';
import { createSecurityCore } from '../kernel/KernelBootstrap';
import type { SecurityCore } from '../kernel/KernelBootstrap';
import { loadSecurityConfig } from '../config/security.config';
import type { SecurityConfig } from '../config/security.config';
import { PatternLibrary } from '../analyzers/PatternLibrary';
import type { Detector } from '../analyzers/Detector';
import { ViolationDetectionPipeline } from '../systems/ViolationDetectionPipeline';
import { EventBus } from '../domain/events/DomainEvent';
import type { AnySecurityEvent, DomainEvent, SecurityEventMap, SecurityEventName } from '../domain/events/DomainEvent';
import { StoreUnavailableError } from '../domain/errors/SecurityErrors';
import { MetricsService } from '../services/MetricsService';
import { planActions } from '../systems/ActionExecutor';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ModerationOutcome, PunishmentDecision } from '../types/Security.types';
import { sleep } from '../utils/async';
import {
  BASE_TIME,
  DAY,
  HOUR,
  MINUTE,
  SECOND,
  FlakyStore,
  RecordingExecutor,
  instantDelay,
  makeMessage,
  makeProfile,
  makeRecord,
  testConfig,
} from '../testing/fixtures';

const patterns = PatternLibrary.loadDefault();

function isNamed<N extends SecurityEventName>(event: AnySecurityEvent, name: N): event is DomainEvent<N> {
  return event.eventName === name;
}

interface Harness {
  core: SecurityCore;
  coordinator: SecurityCoordinator;
  store: FlakyStore;
  executor: RecordingExecutor;
  metrics: MetricsService;
  payloads<N extends SecurityEventName>(name: N): Array<SecurityEventMap[N]>;
}

function setup(config: SecurityConfig = testConfig): Harness {
  const store = new FlakyStore();
  const executor = new RecordingExecutor();
  const metrics = new MetricsService({ collectDefaults: false });
  const events = new EventBus();
  const published: AnySecurityEvent[] = [];
  events.onAny(event => {
    published.push(event);
  });

  const core = createSecurityCore({ config, patterns, store, executor, events, metrics, retryDelay: instantDelay });

  return {
    core,
    coordinator: core.coordinator,
    store,
    executor,
    metrics,
    payloads<N extends SecurityEventName>(name: N) {
      const out: Array<SecurityEventMap[N]> = [];
      for (const event of published) {
        if (isNamed(event, name)) out.push(event.payload);
      }
      return out;
    },
  };
}

describe('SecurityCoordinator', () => {
  it('warns on the third identical message inside 30s', async () => {
    const { coordinator, store, executor, metrics, payloads } = setup();
    const outcomes: ModerationOutcome[] = [];
    for (let i = 0; i < 3; i++) {
      outcomes.push(
        await coordinator.handleMessage(makeMessage({ content: 'join my server pls', timestamp: BASE_TIME + i * SECOND }))
      );
    }

    expect(outcomes[0]).toMatchObject({ decision: null, updatedTrustScore: 100, persisted: true, profileSource: 'store' });
    expect(outcomes[1]).toMatchObject({ decision: null, updatedTrustScore: 100, profileSource: 'cache' });

    const third = outcomes[2];
    expect(third.violations.map(v => v.type)).toEqual([ViolationType.SPAM, ViolationType.REPEATED_CONTENT]);
    expect(third.primary?.type).toBe(ViolationType.SPAM);
    expect(third.decision).toMatchObject({ type: 'warning', level: 2 });
    expect(third.updatedTrustScore).toBe(85);
    expect(third.updatedRiskLevel).toBe('medium');
    expect(third.riskScore).toBeCloseTo(0.42);
    expect(third.execution).toEqual({ success: true, actionsTaken: ['audit_log'] });

    expect(executor.calls).toHaveLength(1);
    expect(executor.calls[0].options).toEqual({ messageGone: false });

    const stored = await store.inner.get('user-1', 'guild-1');
    expect(stored?.trustScore).toBe(85);
    expect(stored?.punishmentLevel).toBe(2);
    expect(stored?.violationHistory).toHaveLength(2);
    expect(stored?.aggregates.messageCount).toBe(3);

    expect(payloads('violation.detected').map(p => p.primary)).toEqual([true, false]);
    expect(payloads('trust_score.changed')).toEqual([{ oldScore: 100, newScore: 85, delta: -15, reason: 'violation' }]);
    expect(payloads('punishment.decided')).toHaveLength(1);
    expect(payloads('action.executed')).toHaveLength(1);
    expect(await metrics.getMetrics()).toContain('vigil_decisions_total{type="warning",level="2"} 1');
  });

  it('answers distress with support and no penalty', async () => {
    const { coordinator, store, executor } = setup();

    const outcome = await coordinator.handleMessage(makeMessage({ content: 'I want to die' }));

    expect(outcome.decision?.type).toBe('supportive');
    expect(outcome.updatedTrustScore).toBe(100);
    expect(executor.calls).toHaveLength(1);

    const stored = await store.inner.get('user-1', 'guild-1');
    expect(stored?.punishmentLevel).toBe(0);
    expect(stored?.violationHistory.map(r => r.type)).toEqual([ViolationType.EMOTIONAL_DISTRESS]);
  });

  it('still offers support when distress comes with a punished finding', async () => {
    const { coordinator, executor } = setup();

    const outcome = await coordinator.handleMessage(makeMessage({ content: 'i am so worthless and useless, i want to die' }));

    expect(outcome.violations.map(v => v.type)).toEqual([ViolationType.TOXIC_LANGUAGE, ViolationType.EMOTIONAL_DISTRESS]);
    expect(outcome.decision?.type).toBe('warning');
    expect(executor.calls).toHaveLength(1);

    const { outcome: applied, options } = executor.calls[0];
    expect(planActions(applied.decision, applied.primary, options, applied.violations)).toEqual([
      'delete_message',
      'notify_user',
      'supportive_message',
      'audit_log',
    ]);
  });

  it('times out phishing from a fresh user and quarantines them', async () => {
    const { coordinator, store } = setup();

    const outcome = await coordinator.handleMessage(makeMessage({ content: 'FREE NITRO claim now, hurry' }));

    expect(outcome.decision).toMatchObject({ type: 'timeout', level: 5, durationMs: 2 * HOUR });
    expect(outcome.updatedTrustScore).toBe(25);
    expect((await store.inner.get('user-1', 'guild-1'))?.quarantineUntil).toBe(BASE_TIME + DAY);
  });

  it('passes clean messages without calling the executor', async () => {
    const { coordinator, executor } = setup();

    const outcome = await coordinator.handleMessage(makeMessage({ content: 'anyone up for ranked later?' }));

    expect(outcome.violations).toEqual([]);
    expect(outcome.decision).toBeNull();
    expect(outcome.execution).toBeUndefined();
    expect(executor.calls).toEqual([]);
  });

  describe('store outages', () => {
    it('moderates from a fallback profile and merges it back on reconcile', async () => {
      const { coordinator, store, executor, payloads } = setup();
      const earlier = makeRecord(ViolationType.SPAM, ViolationSeverity.MODERATE, BASE_TIME - HOUR);
      await store.inner.save(makeProfile({ trustScore: 40, lastViolationAt: BASE_TIME - HOUR, violationHistory: [earlier] }));
      store.failGets = true;

      const outcome = await coordinator.handleMessage(makeMessage({ content: 'you are an idiot' }));

      expect(outcome).toMatchObject({ profileSource: 'fallback', persisted: false, updatedTrustScore: 85 });
      expect(outcome.decision).toMatchObject({ type: 'warning', level: 2 });
      expect(executor.calls).toHaveLength(1);
      expect(store.getCalls).toBe(4);
      expect(store.saveCalls).toBe(0);
      expect(coordinator.getStats().unpersisted).toBe(1);
      expect(payloads('profile.unpersisted').map(p => p.operation)).toEqual(['load']);

      store.failGets = false;
      expect(await coordinator.reconcile()).toEqual({ reconciled: 1, remaining: 0 });

      const merged = await store.inner.get('user-1', 'guild-1');
      expect(merged?.trustScore).toBe(25);
      expect(merged?.quarantineUntil).toBe(BASE_TIME + DAY);
      expect(merged?.punishmentLevel).toBe(2);
      expect(merged?.violationHistory.map(r => r.type)).toEqual([ViolationType.SPAM, ViolationType.TOXIC_LANGUAGE]);
    });

    it('never kicks or bans from a fallback profile', async () => {
      const { coordinator, store } = setup();
      store.failGets = true;

      const decisions: Array<PunishmentDecision | null> = [];
      for (let i = 0; i < 3; i++) {
        const outcome = await coordinator.handleMessage(
          makeMessage({ content: 'sieg heil', timestamp: BASE_TIME + i * 2 * MINUTE })
        );
        decisions.push(outcome.decision);
      }

      expect(decisions.map(d => d?.level)).toEqual([5, 6, 6]);
      expect(decisions[2]).toMatchObject({ type: 'timeout', durationMs: 6 * HOUR });
      expect(decisions[2]?.rationale).toContain('downgraded from ban: profile unavailable');
    });

    it('holds a failed save and writes it with the next message', async () => {
      const { coordinator, store, payloads } = setup();
      store.failSaves = true;

      const first = await coordinator.handleMessage(makeMessage({ content: 'hello there' }));
      expect(first).toMatchObject({ persisted: false, profileSource: 'store' });
      expect(coordinator.getStats().unpersisted).toBe(1);
      expect(payloads('profile.unpersisted').map(p => p.operation)).toEqual(['save']);

      store.failSaves = false;
      const second = await coordinator.handleMessage(makeMessage({ content: 'hello again', timestamp: BASE_TIME + SECOND }));

      expect(second).toMatchObject({ persisted: true, profileSource: 'cache' });
      expect(coordinator.getStats().unpersisted).toBe(0);
      expect((await store.inner.get('user-1', 'guild-1'))?.aggregates.messageCount).toBe(2);
    });

    it('refuses a pardon it cannot read', async () => {
      const { coordinator, store } = setup();
      store.failGets = true;

      await expect(coordinator.pardon('user-1', 'guild-1', 'mod-1', 'appeal')).rejects.toThrow(StoreUnavailableError);
    });
  });

  it('reports an executor failure without rejecting', async () => {
    const { coordinator, executor, payloads } = setup();
    executor.failWith = new Error('Missing Permissions');

    const outcome = await coordinator.handleMessage(makeMessage({ content: 'you are an idiot' }));

    expect(outcome.execution).toEqual({
      success: false,
      actionsTaken: [],
      error: 'Failed to apply warning to user-1: Missing Permissions',
    });
    expect(payloads('action.failed').map(p => p.action)).toEqual(['warning']);
    expect(outcome.persisted).toBe(true);
  });

  it('does not ask the executor to delete a message that is already gone', async () => {
    const { coordinator, executor, payloads } = setup();
    const message = makeMessage({ content: 'you are an idiot' });
    coordinator.markMessageGone(message.messageId);

    await coordinator.handleMessage(message);

    expect(executor.calls[0].options).toEqual({ messageGone: true });
    expect(payloads('punishment.decided')[0].messageGone).toBe(true);
  });

  it('processes one user in order and other users concurrently', async () => {
    const log: string[] = [];
    const tracer: Detector = {
      name: 'tracer',
      timeoutMs: 1000,
      async detect({ message }) {
        log.push(`start:${message.messageId}`);
        await sleep(message.content === 'slow' ? 20 : 0);
        log.push(`end:${message.messageId}`);
        return null;
      },
    };
    const store = new FlakyStore();
    const coordinator = new SecurityCoordinator({
      config: testConfig,
      store,
      pipeline: new ViolationDetectionPipeline(testConfig, patterns, { detectors: [tracer] }),
      executor: new RecordingExecutor(),
      retryDelay: instantDelay,
    });

    await Promise.all([
      coordinator.handleMessage(makeMessage({ messageId: 'a1', content: 'slow' })),
      coordinator.handleMessage(makeMessage({ messageId: 'a2', content: 'fast', timestamp: BASE_TIME + 1 })),
      coordinator.handleMessage(makeMessage({ messageId: 'b1', userId: 'user-2', content: 'fast' })),
    ]);

    expect(log.indexOf('end:a1')).toBeLessThan(log.indexOf('start:a2'));
    expect(log.indexOf('end:b1')).toBeLessThan(log.indexOf('end:a1'));
    expect((await store.inner.get('user-1', 'guild-1'))?.aggregates.messageCount).toBe(2);
    expect(coordinator.getStats().activeKeys).toBe(0);
  });

  it('pardons a user and records the old score', async () => {
    const { coordinator, store, payloads } = setup();
    await coordinator.handleMessage(makeMessage({ content: 'you are an idiot' }));

    const result = await coordinator.pardon('user-1', 'guild-1', 'mod-1', 'appeal accepted');

    expect(result.persisted).toBe(true);
    expect(result.profile.trustScore).toBe(100);
    expect(result.profile.violationHistory).toHaveLength(1);
    expect((await store.inner.get('user-1', 'guild-1'))?.trustScore).toBe(100);
    expect(payloads('profile.pardoned')).toEqual([{ moderatorId: 'mod-1', oldScore: 85, reason: 'appeal accepted' }]);
  });

  it('shares one profile across guilds when profiles are global', async () => {
    const { coordinator } = setup(loadSecurityConfig({ profileScope: 'global' }));

    let last: ModerationOutcome | null = null;
    for (const [i, guildId] of ['guild-a', 'guild-b', 'guild-c'].entries()) {
      last = await coordinator.handleMessage(
        makeMessage({ guildId, content: 'join my server pls', timestamp: BASE_TIME + i * SECOND })
      );
    }

    expect(last?.primary?.type).toBe(ViolationType.SPAM);
    expect(last?.primary?.guildId).toBe('*');
    expect((await coordinator.getProfile('user-1', 'guild-z'))?.violationHistory).toHaveLength(2);
  });
});
