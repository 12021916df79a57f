/**
 * Parallel Chain
 *
 * Fans the same request out to several independent sub-chains and aggregates
 * their outcomes:
 * - any error: the first error by completion order wins, responses are dropped
 * - otherwise: the lowest-index response that is not null/undefined
 * - otherwise: the original request
 *
 * Mutations (stages, config, clear) are broadcast to every sub-chain.
 */

import { ContextCancelledError } from '../errors.js';
import { defaultExecutionConfig, type ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { IExecutionChain } from '../interfaces/execution-chain.js';
import {
  ExecutionMetrics,
  type ExecutionMetricsSnapshot,
} from '../observability/execution-metrics.js';
import { withFields } from '../observability/logger.js';
import type { Middleware, MiddlewareLike, TerminalHandler } from '../types.js';
import { isError, normalizeError } from '../utils.js';
import { invokeWithRecovery, type FaultScope } from './stage-invoker.js';

export class ParallelChain<T> implements IExecutionChain<T> {
  private config: ExecutionConfig;
  private readonly chains: IExecutionChain<T>[];

  constructor(chains: IExecutionChain<T>[], config: Partial<ExecutionConfig> = {}) {
    this.chains = chains.slice();
    this.config = { ...defaultExecutionConfig(config.name ?? 'parallel'), ...config };
  }

  async execute(ctx: ExecutionContext, request: T, terminal?: TerminalHandler<T>): Promise<T> {
    const chains = this.chains;
    if (chains.length === 0) {
      return request;
    }
    if (chains.length === 1) {
      return chains[0].execute(ctx, request, terminal);
    }

    ctx.throwIfCancelled();

    const logger = withFields(this.config.logger, { chain: this.config.name });
    const scope: FaultScope = { logger, faulted: false };
    const responses: (T | undefined)[] = new Array<T | undefined>(chains.length);
    const outcome: { firstError?: Error } = {};

    // A worker that faults outside its own chain's isolation is contained here
    const workers = chains.map((chain, index) =>
      invokeWithRecovery(scope, `parallel#${index}`, () =>
        chain.execute(ctx, request, terminal)
      ).then(
        (response) => {
          responses[index] = response;
        },
        (error: unknown) => {
          outcome.firstError ??= isError(error) ? error : normalizeError(error, `parallel chain ${index}`);
        }
      )
    );

    await untilSettledOrCancelled(ctx, Promise.all(workers));

    if (scope.faulted) {
      this.config.metricsExporter?.recordPanic(this.config.name);
    }

    if (outcome.firstError) {
      logger?.debug('Parallel chain failed', { error: outcome.firstError, chains: chains.length });
      throw outcome.firstError;
    }

    for (const response of responses) {
      if (response !== null && response !== undefined) {
        return response;
      }
    }
    return request;
  }

  addMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    for (const chain of this.chains) {
      chain.addMiddleware(...middlewares);
    }
    return this;
  }

  prependMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    for (const chain of this.chains) {
      chain.prependMiddleware(...middlewares);
    }
    return this;
  }

  /** Stages of every sub-chain, in sub-chain order */
  getMiddlewares(): Middleware<T>[] {
    return this.chains.flatMap((chain) => chain.getMiddlewares());
  }

  count(): number {
    return this.chains.reduce((total, chain) => total + chain.count(), 0);
  }

  clear(): void {
    for (const chain of this.chains) {
      chain.clear();
    }
  }

  /** Field-wise aggregate of the sub-chains' metrics */
  getMetrics(): ExecutionMetricsSnapshot {
    return ExecutionMetrics.combine(this.chains.map((chain) => chain.getMetrics()));
  }

  getConfig(): ExecutionConfig {
    return { ...this.config };
  }

  updateConfig(config: Partial<ExecutionConfig>): void {
    this.config = { ...this.config, ...config };
    for (const chain of this.chains) {
      chain.updateConfig(config);
    }
  }
}

/**
 * Waits for `work` unless the context is cancelled first, in which case the
 * cancellation error is thrown and `work` is abandoned.
 */
async function untilSettledOrCancelled<R>(ctx: ExecutionContext, work: Promise<R>): Promise<R> {
  let rejectCancelled: (error: Error) => void = () => undefined;
  const cancelled = new Promise<never>((_resolve, reject) => {
    rejectCancelled = reject;
  });
  const onAbort = (): void => rejectCancelled(ctx.err() ?? new ContextCancelledError());

  ctx.signal.addEventListener('abort', onAbort, { once: true });
  try {
    return await Promise.race([work, cancelled]);
  } finally {
    ctx.signal.removeEventListener('abort', onAbort);
  }
}
