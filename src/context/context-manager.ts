/**
 * Context Manager
 *
 * Registry of live execution contexts keyed by identifier. With a TTL, a
 * background sweep runs every TTL/2 and drops contexts that are too old or
 * already cancelled.
 *
 * The sweep and shutdown() are serialized through AsyncLock so shutdown never
 * returns while a sweep is still touching the registry.
 */

import AsyncLock from 'async-lock';
import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError, ContextNotFoundError } from '../errors.js';
import { systemClock, type CancelTimer, type Clock } from '../clock.js';
import type {
  ContextManagerOptions,
  ContextManagerStats,
  CreateContextOptions,
  IContextManager,
} from '../interfaces/context-manager.js';
import type { Logger } from '../observability/logger.js';
import {
  ExecutionContext,
  type DerivedContext,
  type MetadataInit,
} from './execution-context.js';

const SWEEP_LOCK_KEY = 'context-sweep';

export class ContextManager implements IContextManager {
  protected readonly contexts = new Map<string, ExecutionContext>();
  protected readonly ttlMs: number;
  protected readonly logger?: Logger;
  protected readonly clock: Clock;
  private readonly idGenerator: () => string;
  private readonly lock = new AsyncLock();
  private stopSweep: CancelTimer | null = null;
  private stopped = false;

  constructor(options: ContextManagerOptions = {}) {
    const ttlMs = options.ttlMs ?? 0;
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new ConfigurationError('ttlMs must be a non-negative number');
    }

    this.ttlMs = ttlMs;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? (() => uuidv4());

    if (this.ttlMs > 0) {
      this.startSweep();
    }
  }

  createContext(options: CreateContextOptions = {}): ExecutionContext {
    const id = this.idGenerator();
    const context = this.allocate(id, options);
    if (id !== '') {
      this.contexts.set(id, context);
    }
    return context;
  }

  getContext(id: string): ExecutionContext | undefined {
    return this.contexts.get(id);
  }

  updateContext(id: string, delta: MetadataInit): void {
    const context = this.contexts.get(id);
    if (!context) {
      throw new ContextNotFoundError(id);
    }
    const entries = delta instanceof Map ? delta.entries() : Object.entries(delta);
    for (const [key, value] of entries) {
      context.setValue(key, value);
    }
  }

  removeContext(id: string): boolean {
    const context = this.contexts.get(id);
    if (!context) {
      return false;
    }
    this.contexts.delete(id);
    this.release(context);
    this.logger?.debug('Removed context from management', {
      contextId: id,
      remainingContexts: this.contexts.size,
    });
    return true;
  }

  cleanupExpiredContexts(): number {
    const now = this.clock.now();
    const expired: string[] = [];

    for (const [id, context] of this.contexts) {
      const tooOld = this.ttlMs > 0 && now - context.createdAt > this.ttlMs;
      if (tooOld || context.isCancelled()) {
        expired.push(id);
      }
    }

    for (const id of expired) {
      this.contexts.delete(id);
    }

    if (expired.length > 0) {
      this.logger?.debug('Cleaned up expired contexts', {
        expiredCount: expired.length,
        remainingContexts: this.contexts.size,
      });
    }
    return expired.length;
  }

  getActiveContexts(): number {
    return this.contexts.size;
  }

  getStats(): ContextManagerStats {
    return {
      activeContexts: this.contexts.size,
      ttlMs: this.ttlMs,
      cleanupEnabled: this.ttlMs > 0,
      pooled: false,
      poolSize: 0,
    };
  }

  withTimeout(parent: ExecutionContext, timeoutMs: number): DerivedContext {
    return parent.withTimeout(timeoutMs);
  }

  withCancel(parent: ExecutionContext): DerivedContext {
    return parent.withCancel();
  }

  withDeadline(parent: ExecutionContext, deadline: number | Date): DerivedContext {
    return parent.withDeadline(deadline);
  }

  async shutdown(): Promise<void> {
    this.stopSweep?.();
    this.stopSweep = null;

    await this.lock.acquire(SWEEP_LOCK_KEY, () => {
      this.stopped = true;
      const cleared = this.contexts.size;
      this.contexts.clear();
      this.logger?.debug('Context manager shutdown', { clearedContexts: cleared });
    });
  }

  /**
   * Builds the context for a new identifier
   */
  protected allocate(id: string, options: CreateContextOptions): ExecutionContext {
    return ExecutionContext.create({
      id,
      signal: options.signal,
      metadata: options.metadata,
      clock: this.clock,
    });
  }

  /**
   * Called with a context the caller explicitly removed
   */
  protected release(_context: ExecutionContext): void {
    // Released contexts are left to the garbage collector
  }

  private startSweep(): void {
    const intervalMs = Math.max(1, Math.floor(this.ttlMs / 2));
    this.stopSweep = this.clock.setRepeating(() => {
      this.sweep().catch((error: unknown) => {
        this.logger?.error('Context sweep failed', { error });
      });
    }, intervalMs);

    this.logger?.debug('Started context cleanup routine', { ttlMs: this.ttlMs, intervalMs });
  }

  private async sweep(): Promise<void> {
    await this.lock.acquire(SWEEP_LOCK_KEY, () => {
      if (!this.stopped) {
        this.cleanupExpiredContexts();
      }
    });
  }
}
