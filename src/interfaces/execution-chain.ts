/**
 * Execution Chain Interface
 *
 * Common contract of the plain, conditional and parallel chains, so callers
 * and handlers can treat them interchangeably.
 */

import type { ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { ExecutionMetricsSnapshot } from '../observability/execution-metrics.js';
import type { Middleware, MiddlewareLike, TerminalHandler } from '../types.js';

export interface IExecutionChain<T> {
  /**
   * Runs the request through every stage, innermost last.
   *
   * @param terminal - Invoked once the stage list is exhausted; overrides the
   *   chain's default terminal handler
   * @throws {ContextCancelledError} If `ctx` is (or becomes) cancelled
   * @throws {StageFaultError} If a stage or the terminal handler faulted
   * @throws {RetriesExhaustedError} If a stage failed on every attempt
   * @throws {CircuitOpenError} If the breaker refused an attempt
   */
  execute(ctx: ExecutionContext, request: T, terminal?: TerminalHandler<T>): Promise<T>;

  /** Appends stages; executions already running keep their snapshot */
  addMiddleware(...middlewares: MiddlewareLike<T>[]): this;

  prependMiddleware(...middlewares: MiddlewareLike<T>[]): this;

  /** Copy of the stage list */
  getMiddlewares(): Middleware<T>[];

  count(): number;

  /** Removes every stage and resets metrics */
  clear(): void;

  getMetrics(): ExecutionMetricsSnapshot;

  getConfig(): ExecutionConfig;

  /** Merges into the current config; applies to executions started afterwards */
  updateConfig(config: Partial<ExecutionConfig>): void;
}
