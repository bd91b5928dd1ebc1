/**
 * DOMAIN EVENTS SYSTEM
 *
 * Every decision, failure and manual override in the security core is
 * published here. The audit trail (moderation log channel, audit log file)
 * subscribes instead of being called directly.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  PunishmentDecision,
  PunishmentType,
  RiskLevel,
  ViolationRecord,
  ViolationType,
} from '../../types/Security.types';
import { createLogger } from '../../services/Logger';

const logger = createLogger('EventBus');

export interface DomainEventMetadata {
  eventId: string;
  timestamp: number;
  correlationId?: string; // Source message id, shared by every event it caused
  userId?: string;
  guildId?: string;
}

export interface SecurityEventMap {
  'violation.detected': {
    violation: ViolationRecord;
    primary: boolean;
  };
  'punishment.decided': {
    messageId: string;
    decision: PunishmentDecision;
    primaryType: ViolationType;
    trustBefore: number;
    trustAfter: number;
    riskLevel: RiskLevel;
    messageGone: boolean;
  };
  'trust_score.changed': {
    oldScore: number;
    newScore: number;
    delta: number;
    reason: 'violation' | 'recovery' | 'pardon';
  };
  'action.executed': {
    messageId: string;
    action: PunishmentType;
    actionsTaken: string[];
  };
  'action.failed': {
    messageId: string;
    action: PunishmentType;
    error: string;
  };
  'detector.degraded': {
    detector: string;
    reason: 'error' | 'timeout';
    error: string;
    messageId: string;
  };
  'profile.unpersisted': {
    operation: 'load' | 'save';
    error: string;
  };
  'profile.pardoned': {
    moderatorId: string;
    oldScore: number;
    reason: string;
  };
}

export type SecurityEventName = keyof SecurityEventMap;

export class DomainEvent<N extends SecurityEventName> {
  readonly eventName: N;
  readonly metadata: DomainEventMetadata;
  readonly payload: SecurityEventMap[N];

  constructor(eventName: N, payload: SecurityEventMap[N], metadata: Partial<DomainEventMetadata> = {}) {
    this.eventName = eventName;
    this.payload = payload;
    this.metadata = {
      eventId: metadata.eventId ?? uuidv4(),
      timestamp: metadata.timestamp ?? Date.now(),
      correlationId: metadata.correlationId,
      userId: metadata.userId,
      guildId: metadata.guildId,
    };
  }

  toJSON(): object {
    return {
      eventName: this.eventName,
      metadata: this.metadata,
      payload: this.payload,
    };
  }
}

export type AnySecurityEvent = DomainEvent<SecurityEventName>;

type EventHandler<N extends SecurityEventName> = (event: DomainEvent<N>) => Promise<void> | void;
type AnyEventHandler = (event: AnySecurityEvent) => Promise<void> | void;

function isEventOf<N extends SecurityEventName>(event: AnySecurityEvent, name: N): event is DomainEvent<N> {
  return event.eventName === name;
}

// ===================================
// EVENT BUS (Pub/Sub System)
// ===================================

/**
 * Event Bus - Central event dispatcher
 *
 * Handler errors are logged and never reach the publisher.
 */
export class EventBus {
  private handlers: Map<SecurityEventName, Set<AnyEventHandler>> = new Map();
  private wildcardHandlers: Set<AnyEventHandler> = new Set();

  /**
   * Subscribe to specific event. Returns an unsubscribe function.
   */
  on<N extends SecurityEventName>(eventName: N, handler: EventHandler<N>): () => void {
    const wrapped: AnyEventHandler = event => (isEventOf(event, eventName) ? handler(event) : undefined);

    let set = this.handlers.get(eventName);
    if (!set) {
      set = new Set();
      this.handlers.set(eventName, set);
    }
    set.add(wrapped);

    return () => {
      this.handlers.get(eventName)?.delete(wrapped);
    };
  }

  /**
   * Subscribe to all events (for logging, audit trail)
   */
  onAny(handler: AnyEventHandler): () => void {
    this.wildcardHandlers.add(handler);
    return () => {
      this.wildcardHandlers.delete(handler);
    };
  }

  /**
   * Publish event; resolves once every handler has settled.
   */
  async publish<N extends SecurityEventName>(event: DomainEvent<N>): Promise<void> {
    const specificHandlers = this.handlers.get(event.eventName) ?? new Set<AnyEventHandler>();
    const allHandlers = [...specificHandlers, ...this.wildcardHandlers];

    await Promise.all(
      allHandlers.map(async handler => {
        try {
          await handler(event);
        } catch (error) {
          logger.error(`Event handler error for ${event.eventName}`, error, { eventId: event.metadata.eventId });
        }
      })
    );
  }

  /**
   * Get statistics (for monitoring)
   */
  getStats(): {
    totalEventTypes: number;
    totalHandlers: number;
    wildcardHandlers: number;
  } {
    let totalHandlers = 0;
    this.handlers.forEach(handlers => {
      totalHandlers += handlers.size;
    });

    return {
      totalEventTypes: this.handlers.size,
      totalHandlers,
      wildcardHandlers: this.wildcardHandlers.size,
    };
  }

  /**
   * Clear all handlers (for testing)
   */
  clear(): void {
    this.handlers.clear();
    this.wildcardHandlers.clear();
  }
}
