/**
 * Pooled Context Manager
 *
 * Context manager that recycles removed contexts. createContext() takes from
 * the pool first and re-initializes the recycled object in place (its metadata
 * map is cleared, not reallocated).
 *
 * A context handed back through removeContext() must no longer be used by the
 * caller: the next createContext() may reuse it.
 */

import type {
  ContextManagerOptions,
  ContextManagerStats,
  CreateContextOptions,
} from '../interfaces/context-manager.js';
import { ConfigurationError } from '../errors.js';
import { ContextManager } from './context-manager.js';
import type { ExecutionContext } from './execution-context.js';

export const DEFAULT_MAX_POOL_SIZE = 128;

export class PooledContextManager extends ContextManager {
  private readonly pool: ExecutionContext[] = [];
  private readonly maxPoolSize: number;

  constructor(options: ContextManagerOptions = {}) {
    super(options);
    const maxPoolSize = options.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE;
    if (!Number.isInteger(maxPoolSize) || maxPoolSize < 0) {
      throw new ConfigurationError('maxPoolSize must be a non-negative integer');
    }
    this.maxPoolSize = maxPoolSize;
  }

  override getStats(): ContextManagerStats {
    return { ...super.getStats(), pooled: true, poolSize: this.pool.length };
  }

  override async shutdown(): Promise<void> {
    await super.shutdown();
    this.pool.length = 0;
  }

  protected override allocate(id: string, options: CreateContextOptions): ExecutionContext {
    const recycled = this.pool.pop();
    if (!recycled) {
      return super.allocate(id, options);
    }
    recycled.reinitialize({
      id,
      signal: options.signal ?? new AbortController().signal,
      metadata: options.metadata,
    });
    return recycled;
  }

  protected override release(context: ExecutionContext): void {
    if (this.pool.length < this.maxPoolSize) {
      this.pool.push(context);
    }
  }
}
