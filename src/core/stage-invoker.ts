/**
 * Stage invocation: fault isolation, circuit breaker gate and retry loop
 *
 * One invocation covers a stage together with everything downstream of it
 * (its continuation), so a retried stage re-runs the rest of the chain.
 */

import {
  CircuitOpenError,
  ContextCancelledError,
  RetriesExhaustedError,
  StageFaultError,
} from '../errors.js';
import type { Clock } from '../clock.js';
import type { ExecutionConfig } from '../config/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import type { Logger } from '../observability/logger.js';
import { isRetryable } from '../resilience/retry-policy.js';
import { describePayload, isError, isFault, normalizeError } from '../utils.js';

/**
 * Where intercepted faults are noted
 */
export interface FaultScope {
  readonly logger?: Logger;
  /** Set once any fault has been intercepted */
  faulted: boolean;
}

/**
 * State shared by every stage of one `execute` call
 */
export interface Traversal extends FaultScope {
  readonly config: ExecutionConfig;
  /** Failures already reported to the breaker by the stage they started at */
  readonly reportedFailures: WeakSet<Error>;
  /** Outcomes (successes and failures) reported to the breaker so far */
  reportedOutcomes: number;
  /** An attempt of this traversal holds the breaker's half-open slot */
  holdsHalfOpenSlot: boolean;
}

export function createTraversal(config: ExecutionConfig, logger?: Logger): Traversal {
  return {
    config,
    logger,
    faulted: false,
    reportedFailures: new WeakSet(),
    reportedOutcomes: 0,
    holdsHalfOpenSlot: false,
  };
}

/**
 * Runs `call`, converting a fault into a StageFaultError.
 *
 * Ordinary errors are rethrown untouched.
 */
export async function invokeWithRecovery<T>(
  scope: FaultScope,
  stage: string,
  call: () => Promise<T> | T
): Promise<T> {
  try {
    return await call();
  } catch (thrown) {
    if (isError(thrown) && !isFault(thrown)) {
      throw thrown;
    }
    scope.faulted = true;
    const fault = new StageFaultError(stage, thrown, describePayload(thrown));
    scope.logger?.error('Panic recovered in middleware', {
      stage,
      panic: describePayload(thrown),
    });
    throw fault;
  }
}

/**
 * Invokes one stage under the chain's breaker and retry policy.
 *
 * At most `maxRetries + 1` attempts are made. Cancellation is checked before
 * every attempt and interrupts a backoff wait; a cancelled context always
 * surfaces as ContextCancelledError, never as the stage's own error.
 *
 * Every stage of a traversal shares one breaker, but each outcome is reported
 * to it once, by the stage where it started: the innermost stage reports a
 * success, and a failure is reported where it was first caught.
 */
export async function invokeStage<T>(
  traversal: Traversal,
  ctx: ExecutionContext,
  stage: string,
  call: () => Promise<T> | T
): Promise<T> {
  const { retryPolicy, circuitBreaker, clock, metricsExporter, name } = traversal.config;
  const maxAttempts = retryPolicy.maxRetries + 1;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      if (circuitBreaker?.getStats().state === 'open') {
        throw new CircuitOpenError(stage, circuitBreaker.getStats().nextAttemptTime);
      }
      const delayMs = retryPolicy.backoff(attempt - 1);
      metricsExporter?.recordRetry(name);
      traversal.logger?.warning('Middleware execution failed, retrying', {
        stage,
        attempt,
        maxAttempts,
        delayMs,
        error: lastError?.message,
      });
      if (delayMs > 0) {
        await sleepOrCancel(ctx, clock, delayMs);
      }
    }

    ctx.throwIfCancelled();

    const tookSlot = admit(traversal, stage);
    const outcomesBefore = traversal.reportedOutcomes;

    try {
      const response = await invokeWithRecovery(traversal, stage, call);
      if (circuitBreaker && traversal.reportedOutcomes === outcomesBefore) {
        circuitBreaker.recordSuccess();
        traversal.reportedOutcomes++;
      }
      return response;
    } catch (error) {
      const failure = isError(error) ? error : normalizeError(error, `middleware '${stage}'`);

      if (
        circuitBreaker &&
        !(failure instanceof CircuitOpenError) &&
        !(failure instanceof ContextCancelledError) &&
        !traversal.reportedFailures.has(failure)
      ) {
        circuitBreaker.recordFailure();
        traversal.reportedFailures.add(failure);
        traversal.reportedOutcomes++;
      }

      const cancelled = ctx.err();
      if (cancelled) {
        throw cancelled;
      }

      if (!isRetryable(retryPolicy, failure)) {
        throw failure;
      }
      lastError = failure;
    } finally {
      if (tookSlot) {
        traversal.holdsHalfOpenSlot = false;
        if (traversal.reportedOutcomes === outcomesBefore) {
          circuitBreaker?.releaseHalfOpenSlot();
        }
      }
    }
  }

  const exhausted = new RetriesExhaustedError(
    stage,
    maxAttempts,
    lastError ?? new Error(`middleware '${stage}' made no attempt`)
  );
  // Each attempt's failure has been reported already
  traversal.reportedFailures.add(exhausted);
  throw exhausted;
}

/**
 * Passes the breaker gate, returning whether this attempt took the half-open
 * slot. Stages nested inside the attempt holding the slot go through.
 */
function admit(traversal: Traversal, stage: string): boolean {
  const { circuitBreaker } = traversal.config;
  if (!circuitBreaker) {
    return false;
  }

  const halfOpen = circuitBreaker.getStats().state === 'half-open';
  if (halfOpen && traversal.holdsHalfOpenSlot) {
    return false;
  }
  if (circuitBreaker.isOpen()) {
    throw new CircuitOpenError(stage, circuitBreaker.getStats().nextAttemptTime);
  }
  if (halfOpen) {
    traversal.holdsHalfOpenSlot = true;
  }
  return halfOpen;
}

async function sleepOrCancel(ctx: ExecutionContext, clock: Clock, delayMs: number): Promise<void> {
  try {
    await clock.sleep(delayMs, ctx.signal);
  } catch (error) {
    throw ctx.err() ?? normalizeError(error, 'backoff wait failed');
  }
}
