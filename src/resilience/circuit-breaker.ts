/**
 * Circuit Breaker Interface
 *
 * Shared gate consulted before every stage attempt. One instance may be
 * shared by every retry attempt and every concurrent execution of a chain,
 * so implementations keep their counters consistent across all callers.
 *
 * State machine:
 * - CLOSED (normal): Allow all attempts
 * - OPEN (failing): Reject all attempts (fail fast)
 * - HALF_OPEN (recovering): Allow 1 trial attempt
 *
 * @see https://martinfowler.com/bliki/CircuitBreaker.html
 */

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerStats {
  /** Current circuit state */
  state: CircuitBreakerState;
  /** Consecutive failures since last success */
  failureCount: number;
  /** Timestamp of last failure (for cooldown calculation) */
  lastFailureTime: Date | null;
  /** When the circuit moves to half-open (null unless open) */
  nextAttemptTime: Date | null;
  /** Lifetime failure count */
  totalFailures: number;
  /** Lifetime success count */
  totalSuccesses: number;
}

export interface ICircuitBreaker {
  /**
   * Whether the next attempt must be refused.
   *
   * In half-open state the first caller is admitted as the trial attempt;
   * later callers are refused until it reports an outcome or releases the
   * slot.
   */
  isOpen(): boolean;

  /**
   * Hands back the half-open slot taken through isOpen() when the admitted
   * attempt ended without an outcome (cancelled, or refused further down).
   */
  releaseHalfOpenSlot(): void;

  recordSuccess(): void;

  recordFailure(): void;

  getStats(): CircuitBreakerStats;

  /**
   * Manually resets circuit breaker to closed state
   *
   * Use case: After manual intervention fixes the underlying issue
   */
  reset(): void;

  /** Opens the circuit regardless of the failure count */
  forceOpen(): void;

  /** Releases timers held by the breaker */
  shutdown(): void;
}
