/**
 * Threshold Circuit Breaker
 *
 * Count-based circuit breaker built on the Opossum state machine. Opossum holds
 * whether the circuit is tripped; the cooldown is measured on the injected
 * clock, so open and half-open are told apart by comparing `clock.now()` with
 * `nextAttemptTime`.
 *
 * Policy:
 * - closed -> open after `failureThreshold` consecutive failures
 * - open -> half-open once `cooldownMs` has elapsed on the clock
 * - half-open admits exactly one trial attempt; its success closes the
 *   circuit, its failure re-opens it and restarts the cooldown
 * - a trial that ends without an outcome hands its slot back
 * - any success resets the consecutive failure count
 *
 * Counters are only touched synchronously, so concurrent executions and
 * retry attempts sharing one instance always observe a consistent state.
 *
 * @see https://github.com/nodeshift/opossum
 */

import CircuitBreaker from 'opossum';
import { systemClock, type Clock } from '../clock.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../observability/logger.js';
import type { CircuitBreakerState, CircuitBreakerStats, ICircuitBreaker } from './circuit-breaker.js';

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Cooldown duration in milliseconds before attempting recovery */
  cooldownMs: number;
  /** Breaker identifier (for logging) */
  name?: string;
  logger?: Logger;
  /** Source of failure timestamps and of the cooldown */
  clock?: Clock;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_COOLDOWN_MS = 30_000;

export class ThresholdCircuitBreaker implements ICircuitBreaker {
  private readonly breaker: CircuitBreaker<[], void>;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly name: string;
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private stats: Omit<CircuitBreakerStats, 'state'>;
  private trialInFlight = false;

  constructor(config: CircuitBreakerConfig) {
    if (!Number.isInteger(config.failureThreshold) || config.failureThreshold < 1) {
      throw new ConfigurationError('failureThreshold must be a positive integer');
    }
    if (!Number.isFinite(config.cooldownMs) || config.cooldownMs < 0) {
      throw new ConfigurationError('cooldownMs must be a non-negative number');
    }

    this.failureThreshold = config.failureThreshold;
    this.cooldownMs = config.cooldownMs;
    this.name = config.name ?? 'default';
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;

    this.stats = {
      failureCount: 0,
      lastFailureTime: null,
      nextAttemptTime: null,
      totalFailures: 0,
      totalSuccesses: 0,
    };

    // The action is never fired: attempts run inside the execution chain and
    // report back through recordSuccess/recordFailure. Only the tripped/closed
    // flag is used; its own reset timer is never consulted.
    // - timeout: false, since the chain owns deadlines
    this.breaker = new CircuitBreaker<[], void>(async () => undefined, {
      resetTimeout: this.cooldownMs,
      timeout: false,
      errorThresholdPercentage: 100,
      enabled: true,
    });

    this.breaker.on('close', () => this.onClose());
  }

  isOpen(): boolean {
    switch (this.currentState()) {
      case 'closed':
        return false;
      case 'open':
        return true;
      case 'half-open':
        if (this.trialInFlight) {
          return true;
        }
        this.trialInFlight = true;
        this.logger?.debug('Circuit breaker half-open, admitting one trial attempt', {
          breaker: this.name,
        });
        return false;
    }
  }

  releaseHalfOpenSlot(): void {
    this.trialInFlight = false;
  }

  recordSuccess(): void {
    this.stats.totalSuccesses++;
    this.stats.failureCount = 0;
    this.stats.lastFailureTime = null;

    if (this.currentState() === 'half-open') {
      this.trialInFlight = false;
      this.breaker.close();
    }
  }

  recordFailure(): void {
    this.stats.totalFailures++;
    this.stats.failureCount++;
    this.stats.lastFailureTime = new Date(this.clock.now());

    const state = this.currentState();
    if (state === 'half-open') {
      this.trialInFlight = false;
      this.trip();
      return;
    }

    // Manually open circuit after threshold consecutive failures
    if (state === 'closed' && this.stats.failureCount >= this.failureThreshold) {
      this.trip();
    }
  }

  getStats(): CircuitBreakerStats {
    return { state: this.currentState(), ...this.stats };
  }

  reset(): void {
    this.trialInFlight = false;
    this.breaker.close();
    this.stats = {
      failureCount: 0,
      lastFailureTime: null,
      nextAttemptTime: null,
      totalFailures: this.stats.totalFailures,
      totalSuccesses: this.stats.totalSuccesses,
    };
  }

  forceOpen(): void {
    this.trialInFlight = false;
    this.trip();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private currentState(): CircuitBreakerState {
    if (this.breaker.closed) {
      return 'closed';
    }
    const next = this.stats.nextAttemptTime;
    return next !== null && this.clock.now() < next.getTime() ? 'open' : 'half-open';
  }

  private trip(): void {
    this.stats.nextAttemptTime = new Date(this.clock.now() + this.cooldownMs);
    this.breaker.open();
    this.logger?.warning('Circuit breaker opened', {
      breaker: this.name,
      failureCount: this.stats.failureCount,
      cooldownMs: this.cooldownMs,
    });
  }

  private onClose(): void {
    this.stats.failureCount = 0;
    this.stats.nextAttemptTime = null;
    this.logger?.debug('Circuit breaker closed', { breaker: this.name });
  }
}

/**
 * Creates the default breaker implementation
 */
export function createCircuitBreaker(config: CircuitBreakerConfig): ICircuitBreaker {
  return new ThresholdCircuitBreaker(config);
}
