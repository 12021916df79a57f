/**
 * Retry policy
 *
 * Bounds a stage to 1 + maxRetries attempts and decides which failures are
 * worth another attempt. With neither `retryOn` nor `shouldRetry` configured,
 * every failure is retryable, faults included. A fault is a StageFaultError
 * whose cause is the built-in error thrown, so `retryOn: [TypeError]` matches
 * it.
 */

import { isTerminalDecision } from '../errors.js';
import { matchesErrorChain } from '../utils.js';
import { noBackoff, type BackoffStrategy } from './backoff.js';

/** Any Error subclass, used for instanceof matching */
export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryPolicy {
  /** Additional attempts after the first; 0 disables retries */
  maxRetries: number;
  /** Delay before retry attempt k (k >= 1) */
  backoff: BackoffStrategy;
  /** Retry only errors that are (or wrap) instances of these classes */
  retryOn?: readonly ErrorClass[];
  /** Custom classification, consulted when `retryOn` does not match */
  shouldRetry?: (error: Error) => boolean;
}

export const noRetry: RetryPolicy = {
  maxRetries: 0,
  backoff: noBackoff,
};

/**
 * Whether another attempt may follow this failure.
 *
 * Cancellation, circuit-open and exhausted-retry errors are never retried
 * (see isTerminalDecision).
 */
export function isRetryable(policy: RetryPolicy, error: Error): boolean {
  if (isTerminalDecision(error)) {
    return false;
  }

  const { retryOn, shouldRetry } = policy;
  if (!retryOn && !shouldRetry) {
    return true;
  }

  if (
    retryOn &&
    matchesErrorChain(error, (candidate) => retryOn.some((type) => candidate instanceof type))
  ) {
    return true;
  }

  return shouldRetry ? shouldRetry(error) : false;
}
