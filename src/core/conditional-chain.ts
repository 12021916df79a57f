/**
 * Conditional Chain
 *
 * Runs its base chain only when the predicate holds; otherwise the request is
 * returned unchanged, exactly like an empty chain.
 */

import type { ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { IExecutionChain } from '../interfaces/execution-chain.js';
import type { ExecutionMetricsSnapshot } from '../observability/execution-metrics.js';
import type { ConditionFunc, Middleware, MiddlewareLike, TerminalHandler } from '../types.js';
import { ExecutionChain } from './execution-chain.js';

export class ConditionalChain<T> implements IExecutionChain<T> {
  private readonly base: ExecutionChain<T>;

  constructor(
    private readonly condition: ConditionFunc<T>,
    base: ExecutionChain<T> | Partial<ExecutionConfig> = {}
  ) {
    this.base = base instanceof ExecutionChain ? base : new ExecutionChain<T>(base);
  }

  /**
   * A skipped execution is not recorded in the base chain's metrics.
   * A predicate that throws rejects the call.
   */
  async execute(ctx: ExecutionContext, request: T, terminal?: TerminalHandler<T>): Promise<T> {
    if (!(await this.condition(ctx, request))) {
      this.base.getConfig().logger?.debug('Condition not met, skipping chain', {
        chain: this.base.getConfig().name,
      });
      return request;
    }
    return this.base.execute(ctx, request, terminal);
  }

  addMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.base.addMiddleware(...middlewares);
    return this;
  }

  prependMiddleware(...middlewares: MiddlewareLike<T>[]): this {
    this.base.prependMiddleware(...middlewares);
    return this;
  }

  getMiddlewares(): Middleware<T>[] {
    return this.base.getMiddlewares();
  }

  count(): number {
    return this.base.count();
  }

  clear(): void {
    this.base.clear();
  }

  getMetrics(): ExecutionMetricsSnapshot {
    return this.base.getMetrics();
  }

  getConfig(): ExecutionConfig {
    return this.base.getConfig();
  }

  updateConfig(config: Partial<ExecutionConfig>): void {
    this.base.updateConfig(config);
  }
}
