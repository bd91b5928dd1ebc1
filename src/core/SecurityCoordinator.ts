/**
 * SECURITY COORDINATOR
 *
 * Per-message orchestration of the security core:
 *
 *   load profile → recover → detect → decide (pre-violation snapshot)
 *   → charge primary / append all → save → execute
 *
 * Work for one profile key runs strictly in arrival order through a
 * KeyedSerialQueue; different users never wait on each other.
 *
 * Store failures never block moderation. A failed load falls back to the
 * newest unpersisted copy or a fresh default (flagged unreliable, so the
 * decision can never be a kick or ban). Failed or fallback-born writes are
 * held in memory and merged back by reconcile() or the next successful load.
 */

import type { SecurityConfig } from '../config/security.config';
import type {
  ActionResult,
  ChatMessage,
  ModerationOutcome,
  PunishmentDecision,
  SecurityProfile,
  ViolationRecord,
} from '../types/Security.types';
import {
  createSecurityProfile,
  profileKey,
  reviseProfile,
  scopeGuildId,
} from '../domain/models/SecurityProfile';
import { isPunitive, selectPrimary } from '../domain/models/Violation';
import { DomainEvent, DomainEventMetadata, EventBus, SecurityEventMap, SecurityEventName } from '../domain/events/DomainEvent';
import { ActionExecutionError, StoreUnavailableError, toError } from '../domain/errors/SecurityErrors';
import { CachedProfileStore } from '../database/CachedProfileStore';
import type { ProfileStore } from '../database/ProfileStore';
import type { ActionExecutor } from '../systems/ActionExecutor';
import type { ViolationDetectionPipeline } from '../systems/ViolationDetectionPipeline';
import { TrustRiskEngine } from '../systems/TrustRiskEngine';
import { PunishmentEscalationEngine } from '../systems/PunishmentEscalationEngine';
import type { MetricsService } from '../services/MetricsService';
import { createLogger } from '../services/Logger';
import { KeyedSerialQueue } from '../utils/KeyedSerialQueue';
import { Clock, ExpiringSet } from '../utils/MemoryManager';
import { RetryOptions, withRetry } from '../utils/retry';

const logger = createLogger('SecurityCoordinator');

const GONE_MESSAGES_MAX = 10_000;

export interface CoordinatorDeps {
  config: SecurityConfig;
  store: ProfileStore;
  pipeline: ViolationDetectionPipeline;
  executor: ActionExecutor;
  events?: EventBus;
  metrics?: MetricsService;
  trust?: TrustRiskEngine;
  escalation?: PunishmentEscalationEngine;
  clock?: Clock;
  /** Replaces the backoff sleep between store retries */
  retryDelay?: (ms: number) => Promise<void>;
}

/**
 * A profile that is not (yet) in the store. `fallback` copies grew from a
 * default created while the store was unreachable and must be merged into
 * the stored profile rather than overwrite it.
 */
interface PendingWrite {
  profile: SecurityProfile;
  origin: 'store' | 'fallback';
}

interface LoadedProfile {
  profile: SecurityProfile;
  source: ModerationOutcome['profileSource'];
  origin: PendingWrite['origin'];
}

export interface PardonResult {
  profile: SecurityProfile;
  persisted: boolean;
}

export interface ReconcileResult {
  reconciled: number;
  remaining: number;
}

export interface CoordinatorStats {
  activeKeys: number;
  unpersisted: number;
  cachedProfiles: number;
  trackedWindows: number;
  goneMessages: number;
}

export class SecurityCoordinator {
  readonly profiles: CachedProfileStore;
  readonly trust: TrustRiskEngine;
  readonly escalation: PunishmentEscalationEngine;
  readonly events: EventBus;

  private readonly config: SecurityConfig;
  private readonly pipeline: ViolationDetectionPipeline;
  private readonly executor: ActionExecutor;
  private readonly metrics?: MetricsService;
  private readonly clock: Clock;
  private readonly retryDelay?: (ms: number) => Promise<void>;

  private readonly queue = new KeyedSerialQueue();
  private readonly pending: Map<string, PendingWrite> = new Map();
  private readonly goneMessages: ExpiringSet<string>;

  constructor(deps: CoordinatorDeps) {
    this.config = deps.config;
    this.pipeline = deps.pipeline;
    this.executor = deps.executor;
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? (() => Date.now());
    this.retryDelay = deps.retryDelay;
    this.events = deps.events ?? new EventBus();
    this.trust = deps.trust ?? new TrustRiskEngine(deps.config);
    this.escalation = deps.escalation ?? new PunishmentEscalationEngine(deps.config);

    this.profiles =
      deps.store instanceof CachedProfileStore
        ? deps.store
        : new CachedProfileStore(deps.store, deps.config.profileCacheSize, deps.config.profileCacheTtlMs, this.clock);

    this.goneMessages = new ExpiringSet<string>('gone-messages', GONE_MESSAGES_MAX, deps.config.deletedMessageTtlMs, this.clock);
  }

  // ========================================
  // MESSAGE HANDLING
  // ========================================

  /**
   * Evaluate one message and apply the resulting decision.
   * Resolves with the outcome; action failures are reported in `execution`.
   */
  handleMessage(message: ChatMessage): Promise<ModerationOutcome> {
    const guildId = scopeGuildId(message.guildId, this.config.profileScope);
    return this.serialize(message.userId, guildId, () => this.process(message, guildId));
  }

  /**
   * The message was deleted or edited; a pending action must not delete it.
   */
  markMessageGone(messageId: string): void {
    this.goneMessages.add(messageId);
  }

  /**
   * Run `task` in the profile's queue, after everything already queued for it.
   */
  serialize<T>(userId: string, guildId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(profileKey(userId, guildId), task);
  }

  private async process(message: ChatMessage, guildId: string): Promise<ModerationOutcome> {
    const now = message.timestamp;
    const key = profileKey(message.userId, guildId);
    const loaded = await this.loadProfile(message.userId, guildId, now);

    const started = performance.now();

    const before = this.trust.recoverSince(loaded.profile, now);
    const detection = await this.pipeline.evaluate(message, before);
    const { violations, primary } = detection;

    const decision: PunishmentDecision | null = primary
      ? this.escalation.decide(before, primary, violations, { now, reliableProfile: loaded.origin === 'store' })
      : null;

    let after = this.trust.applyViolations(before, violations, primary);
    if (decision && decision.type !== 'supportive') {
      after = this.trust.recordPunishment(after, decision.level);
    }
    after = this.trust.observeMessage(after, message, violations.some(isPunitive));
    const risk = this.trust.riskAssessment(after, now);

    const elapsedMs = performance.now() - started;
    this.recordLatency(elapsedMs, decision, message);

    const persisted = await this.persist(key, after, loaded.origin);

    const outcome: ModerationOutcome = {
      violations,
      primary,
      decision,
      updatedTrustScore: after.trustScore,
      updatedRiskLevel: risk.riskLevel,
      riskScore: risk.riskScore,
      degradedDetectors: detection.degraded.map(failure => failure.detector),
      persisted,
      profileSource: loaded.source,
    };

    const meta = { correlationId: message.messageId, userId: message.userId, guildId, timestamp: now };

    for (const failure of detection.degraded) {
      await this.publish('detector.degraded', {
        detector: failure.detector,
        reason: failure.timedOut ? 'timeout' : 'error',
        error: failure.message,
        messageId: message.messageId,
      }, meta);
    }

    if (loaded.profile.trustScore !== before.trustScore) {
      await this.publishTrustChange(loaded.profile.trustScore, before.trustScore, 'recovery', meta);
    }

    for (const violation of violations) {
      this.metrics?.recordViolation(violation.type, violation.severity);
      await this.publish('violation.detected', { violation, primary: violation === primary }, meta);
    }

    if (before.trustScore !== after.trustScore) {
      await this.publishTrustChange(before.trustScore, after.trustScore, 'violation', meta);
    }

    if (!decision || !primary) {
      return outcome;
    }

    const messageGone = this.goneMessages.has(message.messageId);
    this.metrics?.recordDecision(decision.type, decision.level);
    logger.info(`⚖️ ${decision.type} (level ${decision.level}) for ${message.userId}: ${primary.type}`, {
      messageId: message.messageId,
      trustBefore: before.trustScore,
      trustAfter: after.trustScore,
      riskLevel: risk.riskLevel,
      messageGone,
    });
    await this.publish('punishment.decided', {
      messageId: message.messageId,
      decision,
      primaryType: primary.type,
      trustBefore: before.trustScore,
      trustAfter: after.trustScore,
      riskLevel: risk.riskLevel,
      messageGone,
    }, meta);

    const execution = await this.execute(outcome, message, decision, messageGone, meta);
    return { ...outcome, execution };
  }

  private async execute(
    outcome: ModerationOutcome,
    message: ChatMessage,
    decision: PunishmentDecision,
    messageGone: boolean,
    meta: Partial<DomainEventMetadata>
  ): Promise<ActionResult> {
    let failure: ActionExecutionError;
    try {
      const result = await this.executor.apply(outcome, message, { messageGone });
      if (result.success) {
        await this.publish('action.executed', {
          messageId: message.messageId,
          action: decision.type,
          actionsTaken: result.actionsTaken,
        }, meta);
        return result;
      }
      failure = new ActionExecutionError(decision.type, message.userId, result.error ?? 'executor reported failure');
    } catch (error) {
      failure =
        error instanceof ActionExecutionError
          ? error
          : new ActionExecutionError(decision.type, message.userId, toError(error).message, error);
    }

    logger.error(`Decided ${decision.type} was not applied`, failure, {
      messageId: message.messageId,
      userId: message.userId,
    });
    this.metrics?.recordActionFailure(decision.type);
    await this.publish('action.failed', {
      messageId: message.messageId,
      action: decision.type,
      error: failure.message,
    }, meta);

    return { success: false, actionsTaken: [], error: failure.message };
  }

  private recordLatency(elapsedMs: number, decision: PunishmentDecision | null, message: ChatMessage): void {
    const kind = decision === null ? 'clean' : decision.type === 'supportive' ? 'supportive' : 'violation';
    this.metrics?.recordEvaluation(elapsedMs, kind, this.config.latencyBudgetMs);
    this.metrics?.setTrackedWindows(this.pipeline.tracker.trackedKeys);

    if (elapsedMs > this.config.latencyBudgetMs) {
      logger.warn(`Evaluation took ${elapsedMs.toFixed(1)}ms (budget ${this.config.latencyBudgetMs}ms)`, {
        messageId: message.messageId,
      });
    }
  }

  // ========================================
  // PROFILE I/O
  // ========================================

  private retryOptions(operation: 'load' | 'save'): RetryOptions {
    return {
      ...this.config.storeRetry,
      delay: this.retryDelay,
      onRetry: (error, retry, delayMs) => {
        logger.debug(`Profile ${operation} retry ${retry} in ${delayMs}ms`, { error: error.message });
      },
    };
  }

  private async loadProfile(userId: string, guildId: string, now: number): Promise<LoadedProfile> {
    const key = profileKey(userId, guildId);
    const held = this.pending.get(key);

    try {
      const { profile: stored, source } = await withRetry(
        () => this.profiles.load(userId, guildId),
        this.retryOptions('load')
      );
      if (held) {
        return { profile: this.mergePending(stored, held), source, origin: 'store' };
      }
      return {
        profile: stored ?? createSecurityProfile(userId, guildId, now, this.config),
        source,
        origin: 'store',
      };
    } catch (error) {
      const failure = new StoreUnavailableError('load', toError(error).message, error);
      logger.warn(`Profile load failed for ${key}, using fallback`, { error: failure.message });
      this.metrics?.recordStoreFailure('load');
      await this.publish('profile.unpersisted', { operation: 'load', error: failure.message }, { userId, guildId, timestamp: now });

      if (held) {
        return { profile: held.profile, source: 'fallback', origin: held.origin };
      }
      return {
        profile: createSecurityProfile(userId, guildId, now, this.config),
        source: 'fallback',
        origin: 'fallback',
      };
    }
  }

  /**
   * Returns whether the profile reached the store.
   */
  private async persist(key: string, profile: SecurityProfile, origin: PendingWrite['origin']): Promise<boolean> {
    if (origin === 'fallback') {
      // Writing a default over an unread row would erase its history
      this.holdPending(key, { profile, origin });
      return false;
    }

    try {
      await withRetry(() => this.profiles.save(profile), this.retryOptions('save'));
      this.pending.delete(key);
      this.metrics?.setUnpersisted(this.pending.size);
      return true;
    } catch (error) {
      const failure = new StoreUnavailableError('save', toError(error).message, error);
      logger.warn(`Profile save failed for ${key}, holding for reconciliation`, { error: failure.message });
      this.metrics?.recordStoreFailure('save');
      this.holdPending(key, { profile, origin });
      await this.publish('profile.unpersisted', { operation: 'save', error: failure.message }, {
        userId: profile.userId,
        guildId: profile.guildId,
      });
      return false;
    }
  }

  private holdPending(key: string, write: PendingWrite): void {
    this.pending.set(key, write);
    this.metrics?.setUnpersisted(this.pending.size);
  }

  /**
   * A store-born pending copy descends from the stored row and replaces it.
   * A fallback-born copy has its violations replayed onto the stored row,
   * one message at a time, so only each message's primary is charged.
   */
  private mergePending(stored: SecurityProfile | null, held: PendingWrite): SecurityProfile {
    if (held.origin === 'store' || stored === null) {
      return held.profile;
    }

    const known = new Set(stored.violationHistory.map(record => record.id));
    const byMessage: Map<string, ViolationRecord[]> = new Map();
    for (const record of held.profile.violationHistory) {
      if (known.has(record.id)) continue;
      const group = byMessage.get(record.messageId) ?? [];
      group.push(record);
      byMessage.set(record.messageId, group);
    }

    let merged = stored;
    for (const group of byMessage.values()) {
      merged = this.trust.applyViolations(merged, group, selectPrimary(group));
    }

    return reviseProfile(
      merged,
      {
        punishmentLevel: Math.max(merged.punishmentLevel, held.profile.punishmentLevel),
        lastActivityAt: Math.max(merged.lastActivityAt, held.profile.lastActivityAt),
      },
      this.config
    );
  }

  /**
   * Retry every held profile against the store.
   */
  async reconcile(): Promise<ReconcileResult> {
    let reconciled = 0;

    for (const [key, held] of [...this.pending.entries()]) {
      const { userId, guildId } = held.profile;
      const done = await this.serialize(userId, guildId, async () => {
        const current = this.pending.get(key);
        if (!current) return false; // written by a message in the meantime

        try {
          const { profile: stored } = await withRetry(() => this.profiles.load(userId, guildId), this.retryOptions('load'));
          const merged = this.mergePending(stored, current);
          await withRetry(() => this.profiles.save(merged), this.retryOptions('save'));
          this.pending.delete(key);
          return true;
        } catch (error) {
          logger.warn(`Reconciliation failed for ${key}`, { error: toError(error).message });
          return false;
        }
      });
      if (done) reconciled++;
    }

    this.metrics?.setUnpersisted(this.pending.size);
    if (reconciled > 0) {
      logger.info(`🔁 Reconciled ${reconciled} profile(s), ${this.pending.size} still held`);
    }
    return { reconciled, remaining: this.pending.size };
  }

  // ========================================
  // MODERATOR OPERATIONS & QUERIES
  // ========================================

  /**
   * Manual override. Fails when the stored profile cannot be read, since a
   * pardon written over an unread row would erase its history.
   */
  async pardon(userId: string, rawGuildId: string, moderatorId: string, reason: string): Promise<PardonResult> {
    const guildId = scopeGuildId(rawGuildId, this.config.profileScope);
    const key = profileKey(userId, guildId);

    return this.serialize(userId, guildId, async () => {
      const now = this.clock();
      let current: SecurityProfile;
      try {
        const { profile: stored } = await withRetry(() => this.profiles.load(userId, guildId), this.retryOptions('load'));
        const held = this.pending.get(key);
        current = held ? this.mergePending(stored, held) : stored ?? createSecurityProfile(userId, guildId, now, this.config);
      } catch (error) {
        this.metrics?.recordStoreFailure('load');
        throw new StoreUnavailableError('load', toError(error).message, error);
      }

      const pardoned = this.trust.pardon(current, now);
      const persisted = await this.persist(key, pardoned, 'store');

      logger.info(`🕊️ ${userId} pardoned by ${moderatorId}`, { guildId, oldScore: current.trustScore, reason });
      const meta = { userId, guildId, timestamp: now };
      await this.publish('profile.pardoned', { moderatorId, oldScore: current.trustScore, reason }, meta);
      if (current.trustScore !== pardoned.trustScore) {
        await this.publishTrustChange(current.trustScore, pardoned.trustScore, 'pardon', meta);
      }

      return { profile: pardoned, persisted };
    });
  }

  // ========================================
  // MAINTENANCE ACCESS (caller holds the key's queue slot)
  // ========================================

  /**
   * Stored profile with any held write merged in. Throws when the store
   * stays unreachable after retries.
   */
  async readForMaintenance(userId: string, guildId: string): Promise<SecurityProfile | null> {
    const { profile: stored } = await withRetry(() => this.profiles.load(userId, guildId), this.retryOptions('load'));
    const held = this.pending.get(profileKey(userId, guildId));
    return held ? this.mergePending(stored, held) : stored;
  }

  /**
   * Save through the normal persist path; a failed write replaces any held copy.
   */
  writeForMaintenance(profile: SecurityProfile): Promise<boolean> {
    return this.persist(profileKey(profile.userId, profile.guildId), profile, 'store');
  }

  async evictForMaintenance(userId: string, guildId: string): Promise<void> {
    await withRetry(() => this.profiles.delete(userId, guildId), this.retryOptions('save'));
    this.pending.delete(profileKey(userId, guildId));
    this.metrics?.setUnpersisted(this.pending.size);
  }

  /**
   * Current profile, including writes still held for reconciliation.
   */
  async getProfile(userId: string, rawGuildId: string): Promise<SecurityProfile | null> {
    const guildId = scopeGuildId(rawGuildId, this.config.profileScope);
    const held = this.pending.get(profileKey(userId, guildId));
    try {
      const stored = await this.profiles.get(userId, guildId);
      return held ? this.mergePending(stored, held) : stored;
    } catch (error) {
      if (held) return held.profile;
      throw new StoreUnavailableError('load', toError(error).message, error);
    }
  }

  /**
   * Every known profile, held writes overlaid.
   */
  async listProfiles(): Promise<SecurityProfile[]> {
    const byKey = new Map<string, SecurityProfile>();
    for (const profile of await this.profiles.list()) {
      byKey.set(profileKey(profile.userId, profile.guildId), profile);
    }
    for (const [key, held] of this.pending) {
      byKey.set(key, this.mergePending(byKey.get(key) ?? null, held));
    }
    return [...byKey.values()];
  }

  /**
   * Drop expired cache entries and cancellation marks.
   */
  purgeExpired(): { cacheEvicted: number; marksExpired: number } {
    return {
      cacheEvicted: this.profiles.evictExpired(),
      marksExpired: this.goneMessages.cleanup(),
    };
  }

  getStats(): CoordinatorStats {
    return {
      activeKeys: this.queue.activeKeys,
      unpersisted: this.pending.size,
      cachedProfiles: this.profiles.cachedCount,
      trackedWindows: this.pipeline.tracker.trackedKeys,
      goneMessages: this.goneMessages.size,
    };
  }

  /**
   * Resolves once all queued work has settled.
   */
  async drain(): Promise<void> {
    await this.queue.drain();
  }

  // ========================================
  // EVENTS
  // ========================================

  private async publish<N extends SecurityEventName>(
    name: N,
    payload: SecurityEventMap[N],
    metadata: Partial<DomainEventMetadata>
  ): Promise<void> {
    await this.events.publish(new DomainEvent(name, payload, metadata));
  }

  private async publishTrustChange(
    oldScore: number,
    newScore: number,
    reason: SecurityEventMap['trust_score.changed']['reason'],
    metadata: Partial<DomainEventMetadata>
  ): Promise<void> {
    await this.publish('trust_score.changed', { oldScore, newScore, delta: newScore - oldScore, reason }, metadata);
  }
}
