/**
 * Context Manager Interface
 *
 * Tracks live execution contexts by identifier and expires them after a
 * time-to-live. Implementations differ in how contexts are allocated.
 */

import type { Clock } from '../clock.js';
import type {
  DerivedContext,
  ExecutionContext,
  MetadataInit,
} from '../context/execution-context.js';
import type { Logger } from '../observability/logger.js';

export interface CreateContextOptions {
  /** Cancellation source of the new context */
  signal?: AbortSignal;
  metadata?: MetadataInit;
}

export interface ContextManagerStats {
  activeContexts: number;
  ttlMs: number;
  cleanupEnabled: boolean;
  pooled: boolean;
  /** Released contexts waiting for reuse (always 0 when not pooled) */
  poolSize: number;
}

export interface ContextManagerOptions {
  /** Maximum age of a tracked context; 0 disables expiry and the sweep */
  ttlMs?: number;
  logger?: Logger;
  clock?: Clock;
  /** Returning '' leaves the created context untracked (default: uuid v4) */
  idGenerator?: () => string;
  /** Released contexts kept for reuse by pooled managers */
  maxPoolSize?: number;
}

export interface IContextManager {
  createContext(options?: CreateContextOptions): ExecutionContext;

  getContext(id: string): ExecutionContext | undefined;

  /**
   * Merges `delta` into the tracked context's metadata
   *
   * @throws {ContextNotFoundError} If no context is tracked under `id`
   */
  updateContext(id: string, delta: MetadataInit): void;

  /** @returns Whether a context was tracked under `id` */
  removeContext(id: string): boolean;

  /**
   * Removes contexts older than the TTL or already cancelled
   *
   * @returns Number of contexts removed
   */
  cleanupExpiredContexts(): number;

  getActiveContexts(): number;

  getStats(): ContextManagerStats;

  withTimeout(parent: ExecutionContext, timeoutMs: number): DerivedContext;

  withCancel(parent: ExecutionContext): DerivedContext;

  withDeadline(parent: ExecutionContext, deadline: number | Date): DerivedContext;

  /**
   * Stops the background sweep, waiting for a running one, and clears the
   * registry. Call once.
   */
  shutdown(): Promise<void>;
}
