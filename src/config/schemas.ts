/**
 * Zod validation schemas for chain and context-manager options
 */

import { z } from 'zod';
import { DEFAULT_COOLDOWN_MS, DEFAULT_FAILURE_THRESHOLD } from '../resilience/circuit-breaker-factory.js';

export const DEFAULT_INITIAL_DELAY_MS = 100;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_POOL_SIZE = 128;
export const MAX_RETRIES_LIMIT = 100;

/**
 * Retry options schema
 *
 * `strategy` names an entry of the backoff registry; unknown names are
 * rejected when the config is built, since strategies may be registered later.
 */
export const RetryOptionsSchema = z.object({
  maxRetries: z.number()
    .int()
    .min(0)
    .max(MAX_RETRIES_LIMIT, `maxRetries cannot exceed ${MAX_RETRIES_LIMIT}`)
    .default(0)
    .describe('Additional attempts after the first. Default: 0 (no retries)'),

  strategy: z.string()
    .min(1)
    .default('none')
    .describe('Backoff strategy: none, constant, linear, exponential or a registered name'),

  initialDelayMs: z.number()
    .int()
    .min(0)
    .default(DEFAULT_INITIAL_DELAY_MS)
    .describe(`Delay before the first retry. Default: ${DEFAULT_INITIAL_DELAY_MS}ms`),

  stepMs: z.number()
    .int()
    .min(0)
    .default(DEFAULT_INITIAL_DELAY_MS)
    .describe('Increment per attempt for the linear strategy'),

  multiplier: z.number()
    .min(1, 'multiplier must be at least 1')
    .default(2)
    .describe('Growth factor for the exponential strategy. Default: 2'),

  maxDelayMs: z.number()
    .int()
    .min(0)
    .default(DEFAULT_MAX_DELAY_MS)
    .describe(`Upper bound for any delay. Default: ${DEFAULT_MAX_DELAY_MS}ms`),
}).strict();

export const CircuitBreakerOptionsSchema = z.object({
  enabled: z.boolean().default(false),

  failureThreshold: z.number()
    .int()
    .min(1)
    .default(DEFAULT_FAILURE_THRESHOLD)
    .describe(`Consecutive failures that open the circuit. Default: ${DEFAULT_FAILURE_THRESHOLD}`),

  cooldownMs: z.number()
    .int()
    .min(0)
    .default(DEFAULT_COOLDOWN_MS)
    .describe(`Time open before a trial attempt is admitted. Default: ${DEFAULT_COOLDOWN_MS}ms`),
}).strict();

/**
 * Serializable subset of ExecutionConfig
 */
export const ExecutionOptionsSchema = z.object({
  name: z.string().min(1, 'Chain name cannot be empty').default('default'),

  timeoutMs: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Bound on a whole traversal. Default: 0 (none)'),

  retry: RetryOptionsSchema.default({}),

  circuitBreaker: CircuitBreakerOptionsSchema.default({}),

  properties: z.record(z.unknown()).default({}),
}).strict();

export const ContextManagerOptionsSchema = z.object({
  driver: z.string().min(1).default('standard'),

  ttlMs: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Maximum age of a tracked context. Default: 0 (no expiry, no sweep)'),

  maxPoolSize: z.number()
    .int()
    .min(0)
    .default(DEFAULT_POOL_SIZE)
    .describe(`Released contexts kept by the pooled driver. Default: ${DEFAULT_POOL_SIZE}`),
}).strict();

export type RetryOptions = z.infer<typeof RetryOptionsSchema>;
export type CircuitBreakerOptions = z.infer<typeof CircuitBreakerOptionsSchema>;
export type ExecutionOptions = z.infer<typeof ExecutionOptionsSchema>;
export type ExecutionOptionsInput = z.input<typeof ExecutionOptionsSchema>;
export type ContextManagerOptionsConfig = z.infer<typeof ContextManagerOptionsSchema>;
export type ContextManagerOptionsInput = z.input<typeof ContextManagerOptionsSchema>;
