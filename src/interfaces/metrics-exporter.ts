/**
 * Metrics Exporter Interface
 *
 * Receives execution events from chains and exposes them in a
 * Prometheus-compatible format. Values are process-local and ephemeral.
 *
 * Metric types:
 * - Counter: Monotonically increasing (e.g., total executions)
 * - Gauge: Current value (e.g., active executions)
 * - Histogram: Distribution of values (e.g., execution duration)
 *
 * @see https://prometheus.io/docs/concepts/metric_types/
 */

import type { CircuitBreakerState } from '../resilience/circuit-breaker.js';

export type ExecutionOutcomeLabel = 'success' | 'error';

export interface IMetricsExporter {
  /**
   * Records one completed execution of a chain
   *
   * @param chain - Chain name (label)
   * @param outcome - Whether the execution succeeded
   * @param durationSeconds - Wall-clock duration
   */
  recordExecution(chain: string, outcome: ExecutionOutcomeLabel, durationSeconds: number): void;

  /** Records an execution in which a fault was intercepted */
  recordPanic(chain: string): void;

  /** Records one retry attempt of a stage */
  recordRetry(chain: string): void;

  setActiveExecutions(chain: string, count: number): void;

  setCircuitBreakerState(chain: string, state: CircuitBreakerState): void;

  /**
   * Exports all metrics in Prometheus text format
   *
   * @returns Prometheus exposition format (text/plain)
   */
  exportMetrics(): Promise<string>;

  /**
   * Resets all metrics to initial state
   *
   * Use case: Testing, manual reset
   */
  reset(): void;
}
