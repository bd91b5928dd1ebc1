/**
 * SECURITY MAINTENANCE
 *
 * Periodic sweep over everything the security core keeps:
 * - sliding-window buffers past the longest window
 * - violation records past retention
 * - passive trust recovery and expired quarantines for idle users
 * - profiles with no history and no recent activity
 * - profile writes still held after a store outage
 *
 * Each profile is maintained inside the coordinator's per-user queue, so a
 * sweep never races a message for the same user.
 */

import * as cron from 'node-cron';
import type { SecurityConfig } from '../config/security.config';
import type { SecurityProfile } from '../types/Security.types';
import type { SecurityCoordinator } from '../core/SecurityCoordinator';
import type { SlidingWindowTracker } from './SlidingWindowTracker';
import { ConfigurationError, toError } from '../domain/errors/SecurityErrors';
import { createLogger } from '../services/Logger';
import { withRetry } from '../utils/retry';

const logger = createLogger('SecurityMaintenance');

export interface SweepSummary {
  trackerKeysRemoved: number;
  profilesScanned: number;
  profilesUpdated: number;
  recordsPruned: number;
  quarantinesCleared: number;
  profilesEvicted: number;
  cacheEvicted: number;
  marksExpired: number;
  reconciled: number;
  unpersistedRemaining: number;
  errors: number;
}

type ProfileChange = 'unchanged' | 'updated' | 'evicted' | 'missing';

export class SecurityMaintenance {
  constructor(
    private readonly coordinator: SecurityCoordinator,
    private readonly tracker: SlidingWindowTracker,
    private readonly config: SecurityConfig
  ) {}

  async sweep(now: number): Promise<SweepSummary> {
    const started = Date.now();
    const summary: SweepSummary = {
      trackerKeysRemoved: this.tracker.sweep(now),
      profilesScanned: 0,
      profilesUpdated: 0,
      recordsPruned: 0,
      quarantinesCleared: 0,
      profilesEvicted: 0,
      cacheEvicted: 0,
      marksExpired: 0,
      reconciled: 0,
      unpersistedRemaining: 0,
      errors: 0,
    };

    // Held writes first, so the walk below sees them in the store
    const reconcile = await this.coordinator.reconcile();
    summary.reconciled = reconcile.reconciled;

    let profiles: SecurityProfile[] = [];
    try {
      profiles = await withRetry(() => this.coordinator.profiles.list(), this.config.storeRetry);
    } catch (error) {
      summary.errors++;
      logger.error('Profile listing failed, skipping profile maintenance', error);
    }

    for (const listed of profiles) {
      summary.profilesScanned++;
      try {
        const change = await this.coordinator.serialize(listed.userId, listed.guildId, () =>
          this.maintainProfile(listed.userId, listed.guildId, now, summary)
        );
        if (change === 'updated') summary.profilesUpdated++;
        if (change === 'evicted') summary.profilesEvicted++;
      } catch (error) {
        summary.errors++;
        logger.warn(`Maintenance failed for ${listed.guildId}:${listed.userId}`, { error: toError(error).message });
      }
    }

    const purged = this.coordinator.purgeExpired();
    summary.cacheEvicted = purged.cacheEvicted;
    summary.marksExpired = purged.marksExpired;
    summary.unpersistedRemaining = this.coordinator.getStats().unpersisted;

    logger.info(`🧹 Sweep finished in ${Date.now() - started}ms`, { ...summary });
    return summary;
  }

  private async maintainProfile(
    userId: string,
    guildId: string,
    now: number,
    summary: SweepSummary
  ): Promise<ProfileChange> {
    // Re-read inside the queue; the listed copy may be stale
    const current = await this.coordinator.readForMaintenance(userId, guildId);
    if (!current) return 'missing';

    const recovered = this.coordinator.trust.recoverSince(current, now);
    const next = this.coordinator.trust.pruneHistory(recovered, now);

    if (this.isEvictable(next, now)) {
      await this.coordinator.evictForMaintenance(userId, guildId);
      return 'evicted';
    }

    if (next === current) return 'unchanged';

    summary.recordsPruned += recovered.violationHistory.length - next.violationHistory.length;
    if (current.quarantineUntil !== null && next.quarantineUntil === null) {
      summary.quarantinesCleared++;
    }
    // A failed save stays held and goes out with the next reconcile
    await this.coordinator.writeForMaintenance(next);
    return 'updated';
  }

  private isEvictable(profile: SecurityProfile, now: number): boolean {
    return (
      profile.violationHistory.length === 0 &&
      profile.quarantineUntil === null &&
      now - profile.lastActivityAt >= this.config.profileInactivityMs
    );
  }
}

/**
 * Run sweeps on a cron schedule. Overlapping runs are skipped.
 */
export function scheduleMaintenance(
  maintenance: SecurityMaintenance,
  expression: string,
  clock: () => number = () => Date.now()
): cron.ScheduledTask {
  if (!cron.validate(expression)) {
    throw new ConfigurationError('Invalid maintenance schedule', [`SWEEP_CRON: "${expression}"`]);
  }

  let running = false;
  const task = cron.schedule(expression, async () => {
    if (running) {
      logger.warn('Previous sweep still running, skipping this tick');
      return;
    }
    running = true;
    try {
      await maintenance.sweep(clock());
    } catch (error) {
      logger.error('Scheduled sweep failed', error);
    } finally {
      running = false;
    }
  });

  logger.info(`⏰ Maintenance sweep scheduled (${expression})`);
  return task;
}
