/**
 * Middleware execution engine
 *
 * Russian-doll middleware chains with per-stage retry, circuit breaking and
 * fault isolation, conditional and parallel composition, tracked execution
 * contexts and execution metrics.
 */

export * from './errors.js';
export type * from './types.js';
export { systemClock, type Clock, type CancelTimer } from './clock.js';
export {
  describePayload,
  isError,
  isFault,
  matchesErrorChain,
  normalizeError,
} from './utils.js';

export {
  ExecutionContext,
  toCancellationError,
  type ContextInit,
  type DerivedContext,
  type Metadata,
  type MetadataInit,
} from './context/execution-context.js';
export { ContextManager } from './context/context-manager.js';
export { PooledContextManager, DEFAULT_MAX_POOL_SIZE } from './context/pooled-context-manager.js';
export {
  createContextManager,
  getContextManagerDrivers,
  registerContextManagerDriver,
  type ContextManagerDriver,
} from './context/context-manager-registry.js';

export { ExecutionChain, TERMINAL_STAGE } from './core/execution-chain.js';
export { ConditionalChain } from './core/conditional-chain.js';
export { ParallelChain } from './core/parallel-chain.js';
export {
  MiddlewareHandler,
  type HandlerMetricsSnapshot,
  type MiddlewareHandlerOptions,
} from './core/middleware-handler.js';
export {
  ConcurrencyLimiter,
  DEFAULT_DRAIN_TIMEOUT_MS,
  type ConcurrencyLimiterStats,
} from './core/concurrency-limiter.js';
export { middlewareName, normalizeMiddleware, toMiddleware } from './core/middleware.js';

export type { IExecutionChain } from './interfaces/execution-chain.js';
export type * from './interfaces/context-manager.js';
export type { IMetricsExporter, ExecutionOutcomeLabel } from './interfaces/metrics-exporter.js';

export * from './resilience/backoff.js';
export { isRetryable, noRetry, type ErrorClass, type RetryPolicy } from './resilience/retry-policy.js';
export type * from './resilience/circuit-breaker.js';
export {
  createCircuitBreaker,
  ThresholdCircuitBreaker,
  DEFAULT_COOLDOWN_MS,
  DEFAULT_FAILURE_THRESHOLD,
  type CircuitBreakerConfig,
} from './resilience/circuit-breaker-factory.js';

export {
  ExecutionMetrics,
  type ExecutionMetricsSnapshot,
  type ExecutionOutcome,
} from './observability/execution-metrics.js';
export {
  MetricsExporter,
  DEFAULT_DURATION_BUCKETS,
  type MetricsExporterOptions,
} from './observability/metrics-exporter.js';
export {
  ConsoleLogger,
  LogLevelSchema,
  withFields,
  type ConsoleLoggerOptions,
  type LogFields,
  type LogLevel,
  type Logger,
} from './observability/logger.js';

export { defaultExecutionConfig, type ExecutionCollaborators, type ExecutionConfig } from './config/types.js';
export * from './config/schemas.js';
export {
  createExecutionConfig,
  loadContextManagerOptionsFromEnv,
  loadExecutionOptionsFromEnv,
  loadLoggerOptionsFromEnv,
  parseExecutionOptions,
  type Env,
} from './config/loader.js';
