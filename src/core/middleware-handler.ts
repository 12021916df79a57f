/**
 * Middleware Handler
 *
 * Entry point that pairs one execution chain with a final handler per call
 * and an optional concurrency limit. Excess calls queue in FIFO order;
 * drain() supports graceful shutdown.
 */

import type { ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { ExecutionMetricsSnapshot } from '../observability/execution-metrics.js';
import type { MiddlewareLike, TerminalHandler } from '../types.js';
import { ConcurrencyLimiter, type ConcurrencyLimiterStats } from './concurrency-limiter.js';
import { ExecutionChain } from './execution-chain.js';

export interface MiddlewareHandlerOptions {
  /** Handler identity, also used as the chain name (default: 'handler') */
  name?: string;
  /** Maximum calls in flight; 0 means unlimited (default: 0) */
  maxConcurrency?: number;
  config?: Partial<ExecutionConfig>;
}

export interface HandlerMetricsSnapshot extends ExecutionMetricsSnapshot {
  handlerName: string;
}

export class MiddlewareHandler<T> {
  readonly name: string;
  private readonly chain: ExecutionChain<T>;
  private readonly limiter: ConcurrencyLimiter;

  constructor(options: MiddlewareHandlerOptions = {}) {
    this.name = options.name ?? 'handler';
    this.chain = new ExecutionChain<T>({ name: this.name, ...options.config });

    const { logger, clock } = this.chain.getConfig();
    const maxConcurrency = options.maxConcurrency ?? 0;
    this.limiter = new ConcurrencyLimiter(
      maxConcurrency > 0 ? maxConcurrency : Number.MAX_SAFE_INTEGER,
      logger,
      clock
    );
  }

  /**
   * Runs the request through the chain, ending in `finalHandler`
   *
   * @throws {DrainingError} If the handler is draining
   */
  async handle(ctx: ExecutionContext, request: T, finalHandler: TerminalHandler<T>): Promise<T> {
    return this.limiter.run(() => this.chain.execute(ctx, request, finalHandler));
  }

  addMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.chain.addMiddleware(...middlewares);
    return this;
  }

  prependMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.chain.prependMiddleware(...middlewares);
    return this;
  }

  getMiddlewareCount(): number {
    return this.chain.count();
  }

  getMetrics(): HandlerMetricsSnapshot {
    return { handlerName: this.name, ...this.chain.getMetrics() };
  }

  getLimiterStats(): ConcurrencyLimiterStats {
    return this.limiter.getStats();
  }

  getConfig(): ExecutionConfig {
    return this.chain.getConfig();
  }

  updateConfig(config: Partial<ExecutionConfig>): void {
    this.chain.updateConfig(config);
  }

  /** Removes every stage and resets metrics */
  reset(): void {
    this.chain.clear();
  }

  /**
   * @returns Whether every in-flight call finished within `timeoutMs`
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    return this.limiter.drain(timeoutMs);
  }
}
