/**
 * Core type definitions for the middleware execution engine
 */

import type { ExecutionContext } from './context/execution-context.js';

/**
 * Runs the remainder of the chain.
 *
 * Passing a context other than the one the stage received swaps it in for all
 * subsequent stages (it is bounded by the traversal's own context first).
 */
export type Continuation<T> = (ctx: ExecutionContext, request: T) => Promise<T>;

/**
 * Invoked once the stage list is exhausted
 */
export type TerminalHandler<T> = (ctx: ExecutionContext, request: T) => Promise<T> | T;

export type MiddlewareFunction<T> = (
  ctx: ExecutionContext,
  request: T,
  next: Continuation<T>
) => Promise<T> | T;

/**
 * One processing unit of a chain.
 *
 * `handle` may call `next` zero times (short-circuit) or once; the engine's
 * ordering and metrics guarantees assume at most once per request.
 */
export interface Middleware<T> {
  /** Identity used in fault errors, logs and metrics */
  readonly name?: string;
  handle(ctx: ExecutionContext, request: T, next: Continuation<T>): Promise<T> | T;
}

export type MiddlewareLike<T> = Middleware<T> | MiddlewareFunction<T>;

/**
 * Predicate deciding whether a conditional chain runs at all
 */
export type ConditionFunc<T> = (ctx: ExecutionContext, request: T) => boolean | Promise<boolean>;
