/**
 * Clock abstraction
 *
 * All time-dependent behavior in the engine (backoff waits, context
 * deadlines, the context sweep, duration measurement) goes through an
 * injected Clock so tests can substitute a deterministic implementation.
 */

/** Cancels a timer created by a Clock; calling it twice is harmless */
export type CancelTimer = () => void;

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;

  /**
   * Resolves after `ms` milliseconds.
   *
   * Rejects with `signal.reason` as soon as the signal aborts (immediately if
   * it already has).
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;

  /** Runs `fn` once after `ms` milliseconds */
  setTimer(fn: () => void, ms: number): CancelTimer;

  /** Runs `fn` every `ms` milliseconds until cancelled */
  setRepeating(fn: () => void, ms: number): CancelTimer;
}

/**
 * Clock backed by Node timers
 *
 * setTimer/setRepeating timers are unref'd: a context deadline or sweep never
 * keeps the process alive. sleep() timers are not, since a caller awaits them.
 */
export const systemClock: Clock = {
  now: () => Date.now(),

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        reject(signal?.reason);
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },

  setTimer(fn: () => void, ms: number): CancelTimer {
    const timer = setTimeout(fn, Math.max(0, ms));
    timer.unref();
    return () => clearTimeout(timer);
  },

  setRepeating(fn: () => void, ms: number): CancelTimer {
    const timer = setInterval(fn, Math.max(1, ms));
    timer.unref();
    return () => clearInterval(timer);
  },
};
