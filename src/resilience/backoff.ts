/**
 * Backoff strategies for retry delays
 *
 * A strategy maps the retry attempt number (1 for the first retry) to a delay
 * in milliseconds. Delays are computed on every attempt, never cached.
 */

import { ConfigurationError } from '../errors.js';

export type BackoffStrategy = (attempt: number) => number;

export type BackoffStrategyName = 'none' | 'constant' | 'linear' | 'exponential';

export interface BackoffOptions {
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Added per attempt by the linear strategy */
  stepMs: number;
  /** Growth factor of the exponential strategy */
  multiplier: number;
  /** Upper bound for any computed delay */
  maxDelayMs: number;
}

export const noBackoff: BackoffStrategy = () => 0;

export function constantBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs;
}

export function linearBackoff(
  initialDelayMs: number,
  stepMs: number,
  maxDelayMs: number = Number.POSITIVE_INFINITY
): BackoffStrategy {
  return (attempt) => Math.min(initialDelayMs + stepMs * (attempt - 1), maxDelayMs);
}

/**
 * initialDelayMs * multiplier^(attempt - 1), capped at maxDelayMs
 */
export function exponentialBackoff(options: {
  initialDelayMs: number;
  multiplier?: number;
  maxDelayMs?: number;
}): BackoffStrategy {
  const multiplier = options.multiplier ?? 2;
  const maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
  return (attempt) =>
    Math.min(options.initialDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
}

export type BackoffFactory = (options: BackoffOptions) => BackoffStrategy;

const backoffRegistry = new Map<string, BackoffFactory>([
  ['none', () => noBackoff],
  ['constant', (o) => constantBackoff(o.initialDelayMs)],
  ['linear', (o) => linearBackoff(o.initialDelayMs, o.stepMs, o.maxDelayMs)],
  [
    'exponential',
    (o) =>
      exponentialBackoff({
        initialDelayMs: o.initialDelayMs,
        multiplier: o.multiplier,
        maxDelayMs: o.maxDelayMs,
      }),
  ],
]);

/**
 * Registers a named strategy so configuration can refer to it
 */
export function registerBackoffStrategy(name: string, factory: BackoffFactory): void {
  backoffRegistry.set(name, factory);
}

export function createBackoffStrategy(name: string, options: BackoffOptions): BackoffStrategy {
  const factory = backoffRegistry.get(name);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown backoff strategy '${name}'. Registered: ${[...backoffRegistry.keys()].join(', ')}`
    );
  }
  return factory(options);
}
