/**
 * Concurrency limiter for handler calls
 *
 * Admits up to `maxConcurrent` calls at once; the rest wait in FIFO order.
 * A slot released while callers are waiting passes straight to the oldest
 * waiter, so the active count never dips below the limit under load.
 */

import { ConfigurationError, DrainingError } from '../errors.js';
import { systemClock, type Clock } from '../clock.js';
import type { Logger } from '../observability/logger.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export interface ConcurrencyLimiterStats {
  active: number;
  waiting: number;
  max: number;
  draining: boolean;
  /** drain() calls still waiting for active calls to finish */
  pendingDrains: number;
}

export const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

export class ConcurrencyLimiter {
  private active = 0;
  private waitingQueue: Waiter[] = [];
  private draining = false;
  private drainResolvers: (() => void)[] = [];

  constructor(
    private readonly maxConcurrent: number,
    private readonly logger?: Logger,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigurationError('maxConcurrent must be a positive integer');
    }
  }

  /**
   * Acquire a slot (waits if the limit is reached)
   *
   * @throws {DrainingError} If the limiter is draining, or starts draining while waiting
   */
  async acquire(): Promise<void> {
    if (this.draining) {
      throw new DrainingError('Handler is draining - no new calls accepted');
    }

    if (this.active < this.maxConcurrent) {
      this.active++;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      this.waitingQueue.push({ resolve, reject });
    });
  }

  /**
   * Release a slot, handing it to the oldest waiter if any
   */
  release(): void {
    const next = this.waitingQueue.shift();
    if (next) {
      next.resolve();
      return;
    }

    this.active = Math.max(0, this.active - 1);
    if (this.active === 0 && this.draining) {
      for (const resolve of this.drainResolvers.splice(0)) {
        resolve();
      }
    }
  }

  async run<R>(fn: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyLimiterStats {
    return {
      active: this.active,
      waiting: this.waitingQueue.length,
      max: this.maxConcurrent,
      draining: this.draining,
      pendingDrains: this.drainResolvers.length,
    };
  }

  isDraining(): boolean {
    return this.draining;
  }

  /**
   * Stops accepting calls, rejects queued ones and waits for active calls.
   *
   * Resolves once no call is active, or after `timeoutMs` with calls still running.
   *
   * @returns Whether every active call finished in time
   */
  async drain(timeoutMs: number = DEFAULT_DRAIN_TIMEOUT_MS): Promise<boolean> {
    this.draining = true;

    const rejected = this.waitingQueue.splice(0);
    for (const waiter of rejected) {
      waiter.reject(new DrainingError('Handler drained before the call could start'));
    }
    if (rejected.length > 0) {
      this.logger?.warning('Rejected waiting calls while draining', { rejected: rejected.length });
    }

    if (this.active === 0) {
      return true;
    }

    let cancelTimer: () => void = () => undefined;
    let onDrained: () => void = () => undefined;
    const drained = await Promise.race([
      new Promise<boolean>((resolve) => {
        onDrained = () => resolve(true);
        this.drainResolvers.push(onDrained);
      }),
      new Promise<boolean>((resolve) => {
        cancelTimer = this.clock.setTimer(() => resolve(false), timeoutMs);
      }),
    ]);
    cancelTimer();
    this.drainResolvers = this.drainResolvers.filter((resolver) => resolver !== onDrained);

    if (!drained) {
      this.logger?.warning('Drain timed out with calls still active', {
        timeoutMs,
        active: this.active,
      });
    }
    return drained;
  }
}
