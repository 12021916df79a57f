/**
 * Error taxonomy for the middleware execution engine
 *
 * Every failure the engine produces itself is a MiddlewareError subclass with a
 * stable `code`. Errors raised by stage implementations are propagated as-is
 * unless they are faults (see isFault in utils.ts).
 */

export type MiddlewareErrorCode =
  | 'CONTEXT_CANCELLED'
  | 'STAGE_FAULT'
  | 'RETRIES_EXHAUSTED'
  | 'CIRCUIT_OPEN'
  | 'CONTEXT_NOT_FOUND'
  | 'INVALID_CONFIGURATION'
  | 'HANDLER_DRAINING';

/**
 * Base class for engine errors
 */
export abstract class MiddlewareError extends Error {
  abstract readonly code: MiddlewareErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The context's cancellation signal fired (explicit cancel or deadline).
 *
 * Used both as the AbortSignal reason of every ExecutionContext and as the
 * error surfaced to callers of `execute`.
 */
export class ContextCancelledError extends MiddlewareError {
  readonly code = 'CONTEXT_CANCELLED';

  constructor(
    readonly deadlineExceeded: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(deadlineExceeded ? 'context deadline exceeded' : 'context canceled', options);
  }
}

/**
 * A stage (or the terminal handler) faulted: it threw a non-Error value or a
 * built-in runtime error. The original payload is kept on `payload`.
 */
export class StageFaultError extends MiddlewareError {
  readonly code = 'STAGE_FAULT';

  constructor(
    readonly stage: string,
    readonly payload: unknown,
    description: string
  ) {
    super(`panic in middleware '${stage}': ${description}`, {
      cause: payload instanceof Error ? payload : undefined,
    });
  }
}

/**
 * Every permitted attempt of one stage failed
 */
export class RetriesExhaustedError extends MiddlewareError {
  readonly code = 'RETRIES_EXHAUSTED';

  constructor(
    readonly stage: string,
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(
      `middleware '${stage}' failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      { cause: lastError }
    );
  }
}

/**
 * The circuit breaker refused the attempt; the stage was not invoked
 */
export class CircuitOpenError extends MiddlewareError {
  readonly code = 'CIRCUIT_OPEN';

  constructor(
    readonly stage: string,
    readonly nextAttemptTime: Date | null
  ) {
    super(
      nextAttemptTime
        ? `circuit breaker is open for middleware '${stage}' (next attempt after ${nextAttemptTime.toISOString()})`
        : `circuit breaker is open for middleware '${stage}'`
    );
  }
}

export class ContextNotFoundError extends MiddlewareError {
  readonly code = 'CONTEXT_NOT_FOUND';

  constructor(readonly contextId: string) {
    super(`context with ID ${contextId} not found`);
  }
}

export class ConfigurationError extends MiddlewareError {
  readonly code = 'INVALID_CONFIGURATION';
}

/**
 * A handler refused or abandoned a call because it is shutting down
 */
export class DrainingError extends MiddlewareError {
  readonly code = 'HANDLER_DRAINING';
}

/**
 * Decisions already taken further down the chain; never retried.
 *
 * An upstream stage passes these through unchanged.
 */
export function isTerminalDecision(error: unknown): boolean {
  return (
    error instanceof ContextCancelledError ||
    error instanceof CircuitOpenError ||
    error instanceof RetriesExhaustedError
  );
}
