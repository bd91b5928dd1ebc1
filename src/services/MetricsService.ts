import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { createLogger } from './Logger';

const logger = createLogger('MetricsService');

/**
 * PROMETHEUS METRICS SERVICE
 *
 * Detection, escalation and persistence counters for the security core.
 * One registry per instance; the process-wide instance is `metricsService`.
 */

export class MetricsService {
  private static instance: MetricsService | undefined;
  private registry: Registry;

  // Pipeline
  public pipelineDuration: Histogram<string>;
  public messagesEvaluatedTotal: Counter<string>;
  public violationsTotal: Counter<string>;
  public detectorDegradedTotal: Counter<string>;
  public latencyBudgetExceededTotal: Counter<string>;

  // Escalation & actions
  public decisionsTotal: Counter<string>;
  public actionFailuresTotal: Counter<string>;

  // Persistence
  public storeFailuresTotal: Counter<string>;
  public unpersistedProfilesGauge: Gauge<string>;

  // Memory
  public trackedProfilesGauge: Gauge<string>;
  public uptimeGauge: Gauge<string>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    // Collect default metrics (CPU, memory, etc.)
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: 'vigil_' });
    }

    // ========== Pipeline ==========
    this.pipelineDuration = new Histogram({
      name: 'vigil_pipeline_duration_seconds',
      help: 'Detection + scoring + decision time per message',
      labelNames: ['outcome'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25],
      registers: [this.registry],
    });

    this.messagesEvaluatedTotal = new Counter({
      name: 'vigil_messages_evaluated_total',
      help: 'Messages run through the detection pipeline',
      registers: [this.registry],
    });

    this.violationsTotal = new Counter({
      name: 'vigil_violations_total',
      help: 'Violations detected',
      labelNames: ['type', 'severity'],
      registers: [this.registry],
    });

    this.detectorDegradedTotal = new Counter({
      name: 'vigil_detector_degraded_total',
      help: 'Detector failures and timeouts (fail-open)',
      labelNames: ['detector', 'reason'],
      registers: [this.registry],
    });

    this.latencyBudgetExceededTotal = new Counter({
      name: 'vigil_latency_budget_exceeded_total',
      help: 'Evaluations slower than the latency budget',
      registers: [this.registry],
    });

    // ========== Escalation & actions ==========
    this.decisionsTotal = new Counter({
      name: 'vigil_decisions_total',
      help: 'Punishment decisions by action type',
      labelNames: ['type', 'level'],
      registers: [this.registry],
    });

    this.actionFailuresTotal = new Counter({
      name: 'vigil_action_failures_total',
      help: 'Decided actions the platform rejected',
      labelNames: ['type'],
      registers: [this.registry],
    });

    // ========== Persistence ==========
    this.storeFailuresTotal = new Counter({
      name: 'vigil_store_failures_total',
      help: 'Profile store operations that failed after retries',
      labelNames: ['operation'],
      registers: [this.registry],
    });

    this.unpersistedProfilesGauge = new Gauge({
      name: 'vigil_unpersisted_profiles',
      help: 'Profiles waiting for reconciliation',
      registers: [this.registry],
    });

    this.trackedProfilesGauge = new Gauge({
      name: 'vigil_tracked_windows',
      help: 'Keys with live sliding-window entries',
      registers: [this.registry],
    });

    const startTime = Date.now();
    this.uptimeGauge = new Gauge({
      name: 'vigil_uptime_seconds',
      help: 'Process uptime in seconds',
      registers: [this.registry],
      collect() {
        this.set((Date.now() - startTime) / 1000);
      },
    });

    logger.debug('Metrics service initialized with Prometheus registry');
  }

  /**
   * Get singleton instance
   */
  static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return await this.registry.metrics();
  }

  recordEvaluation(durationMs: number, outcome: 'clean' | 'violation' | 'supportive', budgetMs: number): void {
    this.messagesEvaluatedTotal.inc();
    this.pipelineDuration.observe({ outcome }, durationMs / 1000);
    if (durationMs > budgetMs) {
      this.latencyBudgetExceededTotal.inc();
    }
  }

  recordViolation(type: string, severity: number): void {
    this.violationsTotal.inc({ type, severity: String(severity) });
  }

  recordDetectorDegraded(detector: string, reason: 'error' | 'timeout'): void {
    this.detectorDegradedTotal.inc({ detector, reason });
  }

  recordDecision(type: string, level: number): void {
    this.decisionsTotal.inc({ type, level: String(level) });
  }

  recordActionFailure(type: string): void {
    this.actionFailuresTotal.inc({ type });
  }

  recordStoreFailure(operation: 'load' | 'save'): void {
    this.storeFailuresTotal.inc({ operation });
  }

  setUnpersisted(count: number): void {
    this.unpersistedProfilesGauge.set(count);
  }

  setTrackedWindows(count: number): void {
    this.trackedProfilesGauge.set(count);
  }

  /**
   * Get registry (for a /metrics endpoint)
   */
  getRegistry(): Registry {
    return this.registry;
  }
}

// Export singleton instance
export const metricsService = MetricsService.getInstance();
