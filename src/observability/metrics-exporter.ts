/**
 * Prometheus Metrics Exporter
 *
 * Integrates prom-client for monitoring middleware chains:
 * - Execution counter (chain + outcome labels) and duration histogram
 * - Panic and retry counters
 * - Active executions gauge
 * - Circuit breaker state gauge (0=closed, 1=open, 0.5=half-open)
 *
 * Each exporter owns an isolated registry, so several exporters (or tests)
 * never collide on metric names.
 */

import * as promClient from 'prom-client';
import type { CircuitBreakerState } from '../resilience/circuit-breaker.js';
import type { ExecutionOutcomeLabel, IMetricsExporter } from '../interfaces/metrics-exporter.js';

/**
 * Circuit breaker state values for Prometheus gauge
 */
const CIRCUIT_STATE_VALUES: Record<CircuitBreakerState, number> = {
  closed: 0,
  open: 1,
  'half-open': 0.5,
};

/** Default duration buckets in seconds */
export const DEFAULT_DURATION_BUCKETS = [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export interface MetricsExporterOptions {
  /** Prefix for every metric name (default: 'middleware_') */
  prefix?: string;
  durationBuckets?: number[];
}

export class MetricsExporter implements IMetricsExporter {
  private readonly registry: promClient.Registry;
  private readonly executionsCounter: promClient.Counter<'chain' | 'outcome'>;
  private readonly panicsCounter: promClient.Counter<'chain'>;
  private readonly retriesCounter: promClient.Counter<'chain'>;
  private readonly durationHistogram: promClient.Histogram<'chain'>;
  private readonly activeExecutionsGauge: promClient.Gauge<'chain'>;
  private readonly circuitBreakerStateGauge: promClient.Gauge<'chain'>;

  constructor(options: MetricsExporterOptions = {}) {
    const prefix = options.prefix ?? 'middleware_';
    this.registry = new promClient.Registry();

    this.executionsCounter = new promClient.Counter({
      name: `${prefix}executions_total`,
      help: 'Total number of completed chain executions',
      labelNames: ['chain', 'outcome'] as const,
      registers: [this.registry],
    });

    this.panicsCounter = new promClient.Counter({
      name: `${prefix}panics_total`,
      help: 'Chain executions in which a stage fault was intercepted',
      labelNames: ['chain'] as const,
      registers: [this.registry],
    });

    this.retriesCounter = new promClient.Counter({
      name: `${prefix}stage_retries_total`,
      help: 'Stage attempts made after a failed attempt',
      labelNames: ['chain'] as const,
      registers: [this.registry],
    });

    this.durationHistogram = new promClient.Histogram({
      name: `${prefix}execution_duration_seconds`,
      help: 'Chain execution duration in seconds',
      labelNames: ['chain'] as const,
      buckets: options.durationBuckets ?? DEFAULT_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.activeExecutionsGauge = new promClient.Gauge({
      name: `${prefix}active_executions`,
      help: 'Chain executions currently in flight',
      labelNames: ['chain'] as const,
      registers: [this.registry],
    });

    this.circuitBreakerStateGauge = new promClient.Gauge({
      name: `${prefix}circuit_breaker_state`,
      help: 'Circuit breaker state (0=closed, 1=open, 0.5=half-open)',
      labelNames: ['chain'] as const,
      registers: [this.registry],
    });
  }

  recordExecution(chain: string, outcome: ExecutionOutcomeLabel, durationSeconds: number): void {
    this.executionsCounter.labels(chain, outcome).inc();
    this.durationHistogram.labels(chain).observe(durationSeconds);
  }

  recordPanic(chain: string): void {
    this.panicsCounter.labels(chain).inc();
  }

  recordRetry(chain: string): void {
    this.retriesCounter.labels(chain).inc();
  }

  setActiveExecutions(chain: string, count: number): void {
    this.activeExecutionsGauge.labels(chain).set(count);
  }

  setCircuitBreakerState(chain: string, state: CircuitBreakerState): void {
    this.circuitBreakerStateGauge.labels(chain).set(CIRCUIT_STATE_VALUES[state]);
  }

  /**
   * Get all metrics in Prometheus text format
   */
  async exportMetrics(): Promise<string> {
    return await this.registry.metrics();
  }

  /** Content-Type header value for exportMetrics() output */
  get contentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
