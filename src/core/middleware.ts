/**
 * Middleware normalization helpers
 */

import type { Middleware, MiddlewareFunction, MiddlewareLike } from '../types.js';

/**
 * Wraps a bare function as a Middleware.
 *
 * @param fn - Stage implementation
 * @param name - Identity override (defaults to the function's own name)
 */
export function toMiddleware<T>(fn: MiddlewareFunction<T>, name?: string): Middleware<T> {
  const resolvedName = name ?? (fn.name || undefined);
  return {
    name: resolvedName,
    handle: (ctx, request, next) => fn(ctx, request, next),
  };
}

export function normalizeMiddleware<T>(middleware: MiddlewareLike<T>): Middleware<T> {
  return typeof middleware === 'function' ? toMiddleware(middleware) : middleware;
}

/**
 * Stage identity: explicit name, else the class name, else `stage#<index>`
 */
export function middlewareName<T>(middleware: Middleware<T>, index: number): string {
  if (middleware.name && middleware.name.length > 0) {
    return middleware.name;
  }
  const className = middleware.constructor.name;
  return className && className !== 'Object' ? className : `stage#${index}`;
}
