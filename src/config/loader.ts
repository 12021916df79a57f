/**
 * Configuration loading
 *
 * Builds runtime configuration from:
 * 1. Explicit options (validated with zod)
 * 2. Environment variables
 * 3. Defaults
 */

import type { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { systemClock } from '../clock.js';
import { LogLevelSchema, type ConsoleLoggerOptions } from '../observability/logger.js';
import { createBackoffStrategy } from '../resilience/backoff.js';
import { createCircuitBreaker } from '../resilience/circuit-breaker-factory.js';
import {
  ContextManagerOptionsSchema,
  ExecutionOptionsSchema,
  type ContextManagerOptionsConfig,
  type ExecutionOptions,
  type ExecutionOptionsInput,
} from './schemas.js';
import type { ExecutionCollaborators, ExecutionConfig } from './types.js';

export type Env = Record<string, string | undefined>;

/**
 * Safely parse environment variable as integer with NaN detection
 *
 * parseInt('invalid') returns NaN; failing here names the variable instead of
 * letting zod report a type mismatch on an anonymous field.
 *
 * @returns Parsed integer or undefined if not provided
 * @throws {ConfigurationError} If value is non-numeric (NaN)
 */
function parseEnvInt(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${name}: "${value}". ` +
      `Expected a valid integer.`
    );
  }
  return parsed;
}

function parseEnvFloat(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;

  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${name}: "${value}". ` +
      `Expected a number.`
    );
  }
  return parsed;
}

/**
 * Safely parse environment variable as boolean
 *
 * @returns Parsed boolean or undefined if not provided
 * @throws {ConfigurationError} If value is not 'true', 'false', '1', or '0'
 */
function parseEnvBool(value: string | undefined, name: string): boolean | undefined {
  if (!value) return undefined;

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1') return true;
  if (lower === 'false' || lower === '0') return false;

  throw new ConfigurationError(
    `Invalid boolean value for ${name}: "${value}". ` +
    `Expected "true", "false", "1", or "0".`
  );
}

/**
 * Validates with a schema, flattening zod issues into one ConfigurationError
 */
function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${label}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export function parseExecutionOptions(input: ExecutionOptionsInput = {}): ExecutionOptions {
  return validate(ExecutionOptionsSchema, input, 'execution options');
}

/**
 * Validates options and builds the runtime config of a chain
 *
 * @throws {ConfigurationError} On invalid options or an unknown backoff strategy
 */
export function createExecutionConfig(
  input: ExecutionOptionsInput = {},
  collaborators: ExecutionCollaborators = {}
): ExecutionConfig {
  const options = parseExecutionOptions(input);
  const clock = collaborators.clock ?? systemClock;
  const { retry, circuitBreaker } = options;

  const backoff = createBackoffStrategy(retry.strategy, {
    initialDelayMs: retry.initialDelayMs,
    stepMs: retry.stepMs,
    multiplier: retry.multiplier,
    maxDelayMs: retry.maxDelayMs,
  });

  const breaker =
    collaborators.circuitBreaker ??
    (circuitBreaker.enabled
      ? createCircuitBreaker({
          failureThreshold: circuitBreaker.failureThreshold,
          cooldownMs: circuitBreaker.cooldownMs,
          name: options.name,
          logger: collaborators.logger,
          clock,
        })
      : undefined);

  return {
    name: options.name,
    timeoutMs: options.timeoutMs,
    retryPolicy: { maxRetries: retry.maxRetries, backoff },
    circuitBreaker: breaker,
    logger: collaborators.logger,
    clock,
    metricsExporter: collaborators.metricsExporter,
    properties: { ...options.properties },
  };
}

/**
 * Reads execution options from environment variables
 *
 * Unset variables fall back to schema defaults.
 */
export function loadExecutionOptionsFromEnv(env: Env = process.env): ExecutionOptions {
  return parseExecutionOptions({
    name: env.MIDDLEWARE_CHAIN_NAME || undefined,
    timeoutMs: parseEnvInt(env.MIDDLEWARE_TIMEOUT_MS, 'MIDDLEWARE_TIMEOUT_MS'),
    retry: {
      maxRetries: parseEnvInt(env.MIDDLEWARE_MAX_RETRIES, 'MIDDLEWARE_MAX_RETRIES'),
      strategy: env.MIDDLEWARE_BACKOFF_STRATEGY || undefined,
      initialDelayMs: parseEnvInt(env.MIDDLEWARE_BACKOFF_INITIAL_MS, 'MIDDLEWARE_BACKOFF_INITIAL_MS'),
      multiplier: parseEnvFloat(env.MIDDLEWARE_BACKOFF_MULTIPLIER, 'MIDDLEWARE_BACKOFF_MULTIPLIER'),
      maxDelayMs: parseEnvInt(env.MIDDLEWARE_BACKOFF_MAX_MS, 'MIDDLEWARE_BACKOFF_MAX_MS'),
    },
    circuitBreaker: {
      enabled: parseEnvBool(env.CIRCUIT_BREAKER_ENABLED, 'CIRCUIT_BREAKER_ENABLED'),
      failureThreshold: parseEnvInt(env.CIRCUIT_BREAKER_THRESHOLD, 'CIRCUIT_BREAKER_THRESHOLD'),
      cooldownMs: parseEnvInt(env.CIRCUIT_BREAKER_COOLDOWN_MS, 'CIRCUIT_BREAKER_COOLDOWN_MS'),
    },
  });
}

export function loadLoggerOptionsFromEnv(env: Env = process.env): ConsoleLoggerOptions {
  const raw = env.MIDDLEWARE_LOG_LEVEL?.toLowerCase();
  if (!raw) {
    return {};
  }
  return { level: validate(LogLevelSchema, raw, 'MIDDLEWARE_LOG_LEVEL') };
}

export function loadContextManagerOptionsFromEnv(env: Env = process.env): ContextManagerOptionsConfig {
  return validate(
    ContextManagerOptionsSchema,
    {
      driver: env.CONTEXT_MANAGER_DRIVER || undefined,
      ttlMs: parseEnvInt(env.CONTEXT_TTL_MS, 'CONTEXT_TTL_MS'),
      maxPoolSize: parseEnvInt(env.CONTEXT_POOL_SIZE, 'CONTEXT_POOL_SIZE'),
    },
    'context manager options'
  );
}
