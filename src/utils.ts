/**
 * Utility functions for the middleware execution engine
 */

import { inspect } from 'util';

/**
 * Built-in error classes that signal a programming fault rather than an
 * operational failure
 */
const FAULT_ERROR_TYPES = [
  TypeError,
  ReferenceError,
  RangeError,
  SyntaxError,
  EvalError,
  URIError,
] as const;

/** Maximum `cause` links followed by matchesErrorChain */
const MAX_CAUSE_DEPTH = 16;

/**
 * Type guard for Error instances
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Normalize unknown error to Error with context
 *
 * @param error - Unknown error (can be Error, string, or any type)
 * @param context - Contextual prefix for the error message
 * @returns Normalized Error object with context, original kept as `cause`
 */
export function normalizeError(error: unknown, context: string): Error {
  const message = isError(error) ? error.message : String(error);
  return new Error(`${context}: ${message}`, { cause: error });
}

/**
 * Whether a thrown value is a fault (the engine's notion of a panic)
 *
 * Non-Error values and built-in runtime errors (TypeError, RangeError, ...)
 * are faults. Subclasses of Error defined by applications are not.
 */
export function isFault(thrown: unknown): boolean {
  if (!isError(thrown)) {
    return true;
  }
  return FAULT_ERROR_TYPES.some((type) => thrown.constructor === type);
}

/**
 * Human-readable description of a panic payload
 */
export function describePayload(payload: unknown): string {
  if (isError(payload)) {
    return `${payload.name}: ${payload.message}`;
  }
  if (typeof payload === 'string') {
    return payload;
  }
  return inspect(payload, { depth: 2, breakLength: Infinity });
}

/**
 * Walks an error and its `cause` chain, returning true on the first match
 */
export function matchesErrorChain(
  error: unknown,
  predicate: (candidate: Error) => boolean
): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && isError(current); depth++) {
    if (predicate(current)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
