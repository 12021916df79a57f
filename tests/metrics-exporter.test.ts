/**
 * Unit tests for MetricsExporter
 *
 * Prometheus series for chain executions:
 * - Execution counter (chain + outcome labels) and duration histogram
 * - Panic and retry counters
 * - Active executions and circuit breaker state gauges
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MetricsExporter } from '../src/observability/metrics-exporter.js';
import { ExecutionChain } from '../src/core/execution-chain.js';
import { ParallelChain } from '../src/core/parallel-chain.js';
import { ExecutionContext } from '../src/context/execution-context.js';
import { noBackoff } from '../src/resilience/backoff.js';

async function lines(exporter: MetricsExporter): Promise<string[]> {
  return (await exporter.exportMetrics()).split('\n');
}

describe('MetricsExporter', () => {
  let metricsExporter: MetricsExporter;

  beforeEach(() => {
    metricsExporter = new MetricsExporter();
  });

  afterEach(() => {
    metricsExporter.reset();
  });

  describe('series', () => {
    it('should_count_executions_by_chain_and_outcome', async () => {
      metricsExporter.recordExecution('orders', 'success', 0.02);
      metricsExporter.recordExecution('orders', 'success', 0.01);
      metricsExporter.recordExecution('orders', 'error', 0.5);

      const output = await lines(metricsExporter);

      expect(output).toContain('middleware_executions_total{chain="orders",outcome="success"} 2');
      expect(output).toContain('middleware_executions_total{chain="orders",outcome="error"} 1');
    });

    it('should_observe_duration_in_histogram', async () => {
      metricsExporter.recordExecution('orders', 'success', 0.25);

      const output = await lines(metricsExporter);

      expect(output).toContain('middleware_execution_duration_seconds_sum{chain="orders"} 0.25');
      expect(output).toContain('middleware_execution_duration_seconds_count{chain="orders"} 1');
    });

    it('should_count_panics_and_retries_per_chain', async () => {
      metricsExporter.recordPanic('billing');
      metricsExporter.recordRetry('billing');
      metricsExporter.recordRetry('billing');

      const output = await lines(metricsExporter);

      expect(output).toContain('middleware_panics_total{chain="billing"} 1');
      expect(output).toContain('middleware_stage_retries_total{chain="billing"} 2');
    });

    it('should_map_breaker_states_to_gauge_values', async () => {
      metricsExporter.setCircuitBreakerState('a', 'closed');
      metricsExporter.setCircuitBreakerState('b', 'open');
      metricsExporter.setCircuitBreakerState('c', 'half-open');

      const output = await lines(metricsExporter);

      expect(output).toContain('middleware_circuit_breaker_state{chain="a"} 0');
      expect(output).toContain('middleware_circuit_breaker_state{chain="b"} 1');
      expect(output).toContain('middleware_circuit_breaker_state{chain="c"} 0.5');
    });

    it('should_set_active_executions_gauge', async () => {
      metricsExporter.setActiveExecutions('orders', 3);

      expect(await lines(metricsExporter)).toContain('middleware_active_executions{chain="orders"} 3');
    });
  });

  describe('registry', () => {
    it('should_apply_custom_prefix_when_configured', async () => {
      const custom = new MetricsExporter({ prefix: 'app_' });
      custom.recordPanic('orders');

      expect(await lines(custom)).toContain('app_panics_total{chain="orders"} 1');
    });

    it('should_keep_registries_isolated_when_several_exporters_exist', async () => {
      const other = new MetricsExporter();
      other.recordPanic('orders');

      expect((await metricsExporter.exportMetrics()).includes('middleware_panics_total{chain="orders"}')).toBe(false);
    });

    it('should_drop_recorded_values_when_reset', async () => {
      metricsExporter.recordRetry('orders');

      metricsExporter.reset();

      expect((await metricsExporter.exportMetrics()).includes('middleware_stage_retries_total{chain="orders"}')).toBe(
        false
      );
    });

    it('should_report_prometheus_text_content_type', () => {
      expect(metricsExporter.contentType).toContain('text/plain');
    });
  });

  describe('chain integration', () => {
    it('should_record_outcomes_when_chain_executes', async () => {
      const chain = new ExecutionChain<string>({
        name: 'checkout',
        metricsExporter,
        retryPolicy: { maxRetries: 1, backoff: noBackoff },
      }).addMiddleware({
        name: 'flaky',
        handle: () => {
          throw new Error('unavailable');
        },
      });

      await chain.execute(ExecutionContext.create(), 'req').catch(() => undefined);

      const output = await lines(metricsExporter);
      expect(output).toContain('middleware_executions_total{chain="checkout",outcome="error"} 1');
      expect(output).toContain('middleware_stage_retries_total{chain="checkout"} 1');
      expect(output).toContain('middleware_active_executions{chain="checkout"} 0');
    });

    it('should_record_panic_when_stage_faults', async () => {
      const chain = new ExecutionChain<string>({ name: 'checkout', metricsExporter }).addMiddleware({
        name: 'broken',
        handle: () => {
          throw 'boom';
        },
      });

      await chain.execute(ExecutionContext.create(), 'req').catch(() => undefined);

      expect(await lines(metricsExporter)).toContain('middleware_panics_total{chain="checkout"} 1');
    });

    it('should_record_panic_when_parallel_worker_faults', async () => {
      class CrashingChain extends ExecutionChain<string> {
        override execute(): Promise<string> {
          throw 'worker crashed';
        }
      }
      const chain = new ParallelChain<string>(
        [new ExecutionChain<string>().addMiddleware(() => 'ok'), new CrashingChain()],
        { name: 'fan-out', metricsExporter }
      );

      await chain.execute(ExecutionContext.create(), 'req').catch(() => undefined);

      expect(await lines(metricsExporter)).toContain('middleware_panics_total{chain="fan-out"} 1');
    });
  });
});
