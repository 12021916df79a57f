/**
 * Runtime configuration of an execution chain
 */

import { systemClock, type Clock } from '../clock.js';
import type { IMetricsExporter } from '../interfaces/metrics-exporter.js';
import type { Logger } from '../observability/logger.js';
import type { ICircuitBreaker } from '../resilience/circuit-breaker.js';
import { noRetry, type RetryPolicy } from '../resilience/retry-policy.js';

export interface ExecutionConfig {
  /** Chain identity used in logs and metric labels */
  name: string;
  /** Bound on the whole traversal; 0 disables it */
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Consulted before every stage attempt; absent means never refuse */
  circuitBreaker?: ICircuitBreaker;
  logger?: Logger;
  clock: Clock;
  metricsExporter?: IMetricsExporter;
  /** Free-form values for stage implementations */
  properties: Record<string, unknown>;
}

/**
 * Collaborators that cannot be expressed in serializable options
 */
export interface ExecutionCollaborators {
  logger?: Logger;
  clock?: Clock;
  metricsExporter?: IMetricsExporter;
  /** Takes precedence over `circuitBreaker.enabled` in the options */
  circuitBreaker?: ICircuitBreaker;
}

export function defaultExecutionConfig(name = 'default'): ExecutionConfig {
  return {
    name,
    timeoutMs: 0,
    retryPolicy: noRetry,
    clock: systemClock,
    properties: {},
  };
}
