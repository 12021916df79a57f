/**
 * Execution Metrics
 *
 * Per-chain accumulator of execution counts, error and panic counts, duration
 * statistics and concurrency. Mutations happen in synchronous critical
 * sections, so a snapshot taken while executions are in flight is always
 * internally consistent. All counters only grow until reset().
 */

export interface ExecutionMetricsSnapshot {
  /** Completed executions (successful + failed) */
  executions: number;
  successful: number;
  /** Completed executions that ended in an error */
  failed: number;
  /** Executions in which at least one fault was intercepted */
  panics: number;
  totalDurationMs: number;
  /** 0 until the first execution completes */
  minDurationMs: number;
  avgDurationMs: number;
  maxDurationMs: number;
  currentConcurrency: number;
  peakConcurrency: number;
  /** Percentage of successful executions (0-100) */
  successRate: number;
  lastExecutionAt: Date | null;
}

export interface ExecutionOutcome {
  durationMs: number;
  failed: boolean;
  faulted: boolean;
}

export class ExecutionMetrics {
  private executions = 0;
  private successful = 0;
  private failed = 0;
  private panics = 0;
  private totalDurationMs = 0;
  private minDurationMs = 0;
  private maxDurationMs = 0;
  private currentConcurrency = 0;
  private peakConcurrency = 0;
  private lastExecutionAt: Date | null = null;

  /**
   * Marks an execution as started (concurrency tracking)
   */
  recordStart(): void {
    this.currentConcurrency++;
    if (this.currentConcurrency > this.peakConcurrency) {
      this.peakConcurrency = this.currentConcurrency;
    }
  }

  /**
   * Records a finished execution, whether it succeeded or not
   */
  recordCompletion(outcome: ExecutionOutcome): void {
    this.currentConcurrency = Math.max(0, this.currentConcurrency - 1);

    this.executions++;
    if (outcome.failed) {
      this.failed++;
    } else {
      this.successful++;
    }
    if (outcome.faulted) {
      this.panics++;
    }

    this.totalDurationMs += outcome.durationMs;
    if (this.executions === 1 || outcome.durationMs < this.minDurationMs) {
      this.minDurationMs = outcome.durationMs;
    }
    if (outcome.durationMs > this.maxDurationMs) {
      this.maxDurationMs = outcome.durationMs;
    }
    this.lastExecutionAt = new Date();
  }

  snapshot(): ExecutionMetricsSnapshot {
    return {
      executions: this.executions,
      successful: this.successful,
      failed: this.failed,
      panics: this.panics,
      totalDurationMs: this.totalDurationMs,
      minDurationMs: this.minDurationMs,
      avgDurationMs: this.executions > 0 ? this.totalDurationMs / this.executions : 0,
      maxDurationMs: this.maxDurationMs,
      currentConcurrency: this.currentConcurrency,
      peakConcurrency: this.peakConcurrency,
      successRate: this.executions > 0 ? (this.successful / this.executions) * 100 : 0,
      lastExecutionAt: this.lastExecutionAt,
    };
  }

  /**
   * Clears every counter. In-flight executions still complete normally.
   */
  reset(): void {
    this.executions = 0;
    this.successful = 0;
    this.failed = 0;
    this.panics = 0;
    this.totalDurationMs = 0;
    this.minDurationMs = 0;
    this.maxDurationMs = 0;
    this.currentConcurrency = 0;
    this.peakConcurrency = 0;
    this.lastExecutionAt = null;
  }

  /**
   * Field-wise aggregate of several snapshots.
   *
   * Counts, durations and concurrency are summed; min/max are taken over the
   * snapshots that have executions; average and success rate are recomputed.
   */
  static combine(snapshots: readonly ExecutionMetricsSnapshot[]): ExecutionMetricsSnapshot {
    const combined = empty();
    const mins: number[] = [];

    for (const snapshot of snapshots) {
      combined.executions += snapshot.executions;
      combined.successful += snapshot.successful;
      combined.failed += snapshot.failed;
      combined.panics += snapshot.panics;
      combined.totalDurationMs += snapshot.totalDurationMs;
      combined.maxDurationMs = Math.max(combined.maxDurationMs, snapshot.maxDurationMs);
      combined.currentConcurrency += snapshot.currentConcurrency;
      combined.peakConcurrency += snapshot.peakConcurrency;
      if (snapshot.executions > 0) {
        mins.push(snapshot.minDurationMs);
      }
      if (
        snapshot.lastExecutionAt &&
        (!combined.lastExecutionAt || snapshot.lastExecutionAt > combined.lastExecutionAt)
      ) {
        combined.lastExecutionAt = snapshot.lastExecutionAt;
      }
    }

    combined.minDurationMs = mins.length > 0 ? Math.min(...mins) : 0;
    if (combined.executions > 0) {
      combined.avgDurationMs = combined.totalDurationMs / combined.executions;
      combined.successRate = (combined.successful / combined.executions) * 100;
    }
    return combined;
  }
}

function empty(): ExecutionMetricsSnapshot {
  return {
    executions: 0,
    successful: 0,
    failed: 0,
    panics: 0,
    totalDurationMs: 0,
    minDurationMs: 0,
    avgDurationMs: 0,
    maxDurationMs: 0,
    currentConcurrency: 0,
    peakConcurrency: 0,
    successRate: 0,
    lastExecutionAt: null,
  };
}
