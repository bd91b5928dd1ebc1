/**
 * KERNEL BOOTSTRAP
 *
 * Composition root for the security core. Wires config, patterns, store,
 * detection pipeline, coordinator, maintenance and reporting, independent of
 * the chat platform:
 *
 * Discord Client → DiscordAdapter → SecurityCoordinator → ActionExecutor
 *                                        ↘ EventBus → audit log
 */

import { SecurityConfig, loadSecurityConfig } from '../config/security.config';
import { ENV } from '../config/environment';
import { PatternLibrary } from '../analyzers/PatternLibrary';
import { ViolationDetectionPipeline } from '../systems/ViolationDetectionPipeline';
import { SecurityMaintenance } from '../systems/SecurityMaintenance';
import type { ActionExecutor } from '../systems/ActionExecutor';
import { SecurityCoordinator } from '../core/SecurityCoordinator';
import { SecurityReporter } from '../monitoring/SecurityReporter';
import { EventBus } from '../domain/events/DomainEvent';
import type { ProfileStore } from '../database/ProfileStore';
import { InMemoryProfileStore } from '../database/InMemoryProfileStore';
import { PostgresProfileStore } from '../database/PostgresProfileStore';
import { getDatabaseService } from '../database/DatabaseService';
import { runMigrations } from '../database/migrate';
import type { ThreatIntel } from '../services/ThreatIntelService';
import type { MetricsService } from '../services/MetricsService';
import { createLogger } from '../services/Logger';
import type { Clock } from '../utils/MemoryManager';

const logger = createLogger('KernelBootstrap');

export interface SecurityCoreOptions {
  executor: ActionExecutor;
  config?: SecurityConfig;
  patterns?: PatternLibrary;
  store?: ProfileStore;
  threatIntel?: ThreatIntel;
  metrics?: MetricsService;
  events?: EventBus;
  clock?: Clock;
  retryDelay?: (ms: number) => Promise<void>;
}

export interface SecurityCore {
  config: SecurityConfig;
  patterns: PatternLibrary;
  events: EventBus;
  pipeline: ViolationDetectionPipeline;
  coordinator: SecurityCoordinator;
  maintenance: SecurityMaintenance;
  reporter: SecurityReporter;
}

export function createSecurityCore(options: SecurityCoreOptions): SecurityCore {
  const config = options.config ?? loadSecurityConfig(ENV.SECURITY_OVERRIDES);
  const patterns = options.patterns ?? PatternLibrary.loadDefault();
  const events = options.events ?? new EventBus();

  const pipeline = new ViolationDetectionPipeline(config, patterns, {
    threatIntel: options.threatIntel,
    metrics: options.metrics,
  });

  const coordinator = new SecurityCoordinator({
    config,
    store: options.store ?? new InMemoryProfileStore(),
    pipeline,
    executor: options.executor,
    events,
    metrics: options.metrics,
    clock: options.clock,
    retryDelay: options.retryDelay,
  });

  const maintenance = new SecurityMaintenance(coordinator, pipeline.tracker, config);
  const reporter = new SecurityReporter(coordinator, config);

  logger.info(`🛡️ Security core ready (scope: ${config.profileScope}, patterns v${patterns.version})`);
  if (options.threatIntel) {
    logger.info(`   → threat intel lookups enabled (${config.threatIntelTimeoutMs}ms budget)`);
  }

  return { config, patterns, events, pipeline, coordinator, maintenance, reporter };
}

/**
 * PostgreSQL/Redis store when PROFILE_STORE=postgres, in-memory otherwise.
 * Fails fast when PostgreSQL is required but down.
 */
export async function createProfileStore(config: SecurityConfig): Promise<ProfileStore> {
  if (ENV.PROFILE_STORE !== 'postgres') {
    logger.warn('⚠️  Using in-memory profile store; profiles are lost on restart');
    return new InMemoryProfileStore();
  }

  const db = getDatabaseService();
  const health = await db.healthCheck();
  if (!health.postgres) {
    throw new Error('PostgreSQL connection required (PROFILE_STORE=postgres) but not available');
  }
  if (!health.redis) {
    logger.warn('⚠️  Redis: Not connected (profile cache disabled)');
  }

  await runMigrations(db);
  logger.info('✅ PostgreSQL profile store ready');
  return new PostgresProfileStore(db, config, ENV.REDIS_PROFILE_TTL_SECONDS);
}

/**
 * Mirror decisions, failures and overrides into the audit log file.
 */
export function attachAuditLog(events: EventBus): () => void {
  const audit = createLogger('Audit');
  const unsubscribers = [
    events.on('punishment.decided', event => {
      const { decision, primaryType, trustBefore, trustAfter, riskLevel } = event.payload;
      audit.moderation(decision.type, event.metadata.userId ?? 'unknown', decision.rationale, {
        guildId: event.metadata.guildId,
        messageId: event.payload.messageId,
        primaryType,
        trustBefore,
        trustAfter,
        riskLevel,
      });
    }),
    events.on('action.failed', event => {
      audit.error(`Action ${event.payload.action} not applied`, undefined, {
        audit: true,
        userId: event.metadata.userId,
        messageId: event.payload.messageId,
        error: event.payload.error,
      });
    }),
    events.on('detector.degraded', event => {
      audit.warn(`Detector ${event.payload.detector} degraded (${event.payload.reason})`, {
        messageId: event.payload.messageId,
      });
    }),
    events.on('profile.unpersisted', event => {
      audit.warn(`Profile ${event.payload.operation} failed; held for reconciliation`, {
        userId: event.metadata.userId,
        error: event.payload.error,
      });
    }),
    events.on('profile.pardoned', event => {
      audit.moderation('pardon', event.metadata.userId ?? 'unknown', event.payload.reason, {
        moderatorId: event.payload.moderatorId,
        oldScore: event.payload.oldScore,
      });
    }),
  ];

  return () => unsubscribers.forEach(unsubscribe => unsubscribe());
}
