/**
 * Execution Chain
 *
 * Russian-doll executor: stage i receives a continuation that runs stage i+1,
 * and so on until the terminal handler. Post-processing therefore runs in the
 * reverse order of pre-processing.
 *
 * Every `execute` call works on a snapshot of the stage list and config taken
 * when it starts, so adding stages or updating config while executions are in
 * flight never affects them.
 */

import { defaultExecutionConfig, type ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { IExecutionChain } from '../interfaces/execution-chain.js';
import {
  ExecutionMetrics,
  type ExecutionMetricsSnapshot,
} from '../observability/execution-metrics.js';
import { withFields } from '../observability/logger.js';
import type { Continuation, Middleware, MiddlewareLike, TerminalHandler } from '../types.js';
import { middlewareName, normalizeMiddleware } from './middleware.js';
import { createTraversal, invokeStage, invokeWithRecovery } from './stage-invoker.js';

/** Stage name reported when the terminal handler faults */
export const TERMINAL_STAGE = 'terminal';

export class ExecutionChain<T> implements IExecutionChain<T> {
  private middlewares: Middleware<T>[] = [];
  private config: ExecutionConfig;
  private readonly metrics = new ExecutionMetrics();

  /**
   * @param config - Merged onto defaults (no timeout, no retries, no breaker)
   * @param terminal - Default terminal handler, used when `execute` gets none
   */
  constructor(
    config: Partial<ExecutionConfig> = {},
    private readonly terminal?: TerminalHandler<T>
  ) {
    this.config = { ...defaultExecutionConfig(config.name), ...config };
  }

  async execute(ctx: ExecutionContext, request: T, terminal?: TerminalHandler<T>): Promise<T> {
    const stages = this.middlewares.slice();
    const config = this.config;
    const handler = terminal ?? this.terminal;
    const logger = withFields(config.logger, { chain: config.name });
    const traversal = createTraversal(config, logger);
    const cancels: (() => void)[] = [];
    const startedAt = config.clock.now();
    let failed = true;

    this.metrics.recordStart();
    config.metricsExporter?.setActiveExecutions(config.name, this.metrics.snapshot().currentConcurrency);

    try {
      if (stages.length === 0 && !handler) {
        logger?.debug('Empty middleware chain, returning request as response');
        failed = false;
        return request;
      }

      let root = ctx;
      if (config.timeoutMs > 0) {
        const bounded = ctx.withTimeout(config.timeoutMs);
        root = bounded.context;
        cancels.push(bounded.cancel);
      }

      const names = stages.map((middleware, index) => middlewareName(middleware, index));

      const run = async (index: number, current: ExecutionContext, value: T): Promise<T> => {
        current.throwIfCancelled();

        if (index >= stages.length) {
          if (!handler) {
            return value;
          }
          return invokeWithRecovery(traversal, TERMINAL_STAGE, () => handler(current, value));
        }

        const middleware = stages[index];
        const next: Continuation<T> = (nextCtx, nextValue) => {
          // A context swapped in by the stage never outlives the traversal
          const bounded = nextCtx.boundBy(root);
          if (bounded.context !== nextCtx) {
            cancels.push(bounded.cancel);
          }
          return run(index + 1, bounded.context, nextValue);
        };

        return invokeStage(traversal, current, names[index], () =>
          middleware.handle(current, value, next)
        );
      };

      const response = await run(0, root, request);
      failed = false;
      logger?.debug('Successfully executed middleware chain', {
        middlewareCount: stages.length,
        durationMs: config.clock.now() - startedAt,
      });
      return response;
    } catch (error) {
      logger?.error('Error in execution chain', {
        error,
        durationMs: config.clock.now() - startedAt,
      });
      throw error;
    } finally {
      for (const cancel of cancels) {
        cancel();
      }
      this.complete(config, startedAt, failed, traversal.faulted);
    }
  }

  addMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.middlewares = [...this.middlewares, ...middlewares.map(normalizeMiddleware)];
    return this;
  }

  prependMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.middlewares = [...middlewares.map(normalizeMiddleware), ...this.middlewares];
    return this;
  }

  getMiddlewares(): Middleware<T>[] {
    return this.middlewares.slice();
  }

  count(): number {
    return this.middlewares.length;
  }

  clear(): void {
    this.middlewares = [];
    this.metrics.reset();
  }

  getMetrics(): ExecutionMetricsSnapshot {
    return this.metrics.snapshot();
  }

  getConfig(): ExecutionConfig {
    return { ...this.config };
  }

  updateConfig(config: Partial<ExecutionConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private complete(config: ExecutionConfig, startedAt: number, failed: boolean, faulted: boolean): void {
    const durationMs = Math.max(0, config.clock.now() - startedAt);
    this.metrics.recordCompletion({ durationMs, failed, faulted });

    const exporter = config.metricsExporter;
    if (!exporter) {
      return;
    }
    exporter.recordExecution(config.name, failed ? 'error' : 'success', durationMs / 1000);
    if (faulted) {
      exporter.recordPanic(config.name);
    }
    exporter.setActiveExecutions(config.name, this.metrics.snapshot().currentConcurrency);
    if (config.circuitBreaker) {
      exporter.setCircuitBreakerState(config.name, config.circuitBreaker.getStats().state);
    }
  }
}
