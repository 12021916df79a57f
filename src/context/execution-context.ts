/**
 * Execution Context
 *
 * Carrier of cancellation state, start time and request metadata passed to
 * every stage of a chain. Immutable by convention: narrowing a deadline or
 * adding a cancel hook produces a new, derived context whose signal is a strict
 * descendant of its parent's (aborting the parent aborts the child, never the
 * other way around).
 *
 * The metadata map is the one mutable part. Derived contexts start from a copy
 * of their parent's metadata, so writes never leak upwards.
 */

import { ContextCancelledError } from '../errors.js';
import { systemClock, type CancelTimer, type Clock } from '../clock.js';

export type Metadata = Map<string, unknown>;

/**
 * A derived context together with the function that cancels it.
 *
 * Callers must invoke `cancel` once the context is no longer needed so the
 * parent's abort listener and any deadline timer are released.
 */
export interface DerivedContext {
  context: ExecutionContext;
  cancel: () => void;
}

interface ContextState {
  signal: AbortSignal;
  parent: ExecutionContext | null;
  createdAt: number;
  id: string;
  deadline: number | null;
  metadata: Metadata;
}

export type MetadataInit = Map<string, unknown> | Record<string, unknown>;

export interface ContextInit {
  signal?: AbortSignal;
  metadata?: MetadataInit;
  id?: string;
  clock?: Clock;
}

/**
 * Converts an abort reason into the engine's cancellation error
 */
export function toCancellationError(reason: unknown): ContextCancelledError {
  if (reason instanceof ContextCancelledError) {
    return reason;
  }
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  const timedOut =
    typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
  return new ContextCancelledError(timedOut, { cause: reason });
}

function toEntries(metadata: MetadataInit | undefined): Iterable<[string, unknown]> {
  if (!metadata) {
    return [];
  }
  if (metadata instanceof Map) {
    return metadata.entries();
  }
  return Object.entries(metadata);
}

export class ExecutionContext {
  private state: ContextState;

  private constructor(
    state: ContextState,
    private readonly clock: Clock
  ) {
    this.state = state;
  }

  /**
   * Root context that is never cancelled unless the given signal aborts
   */
  static create(init: ContextInit = {}): ExecutionContext {
    const clock = init.clock ?? systemClock;
    return new ExecutionContext(
      {
        signal: init.signal ?? new AbortController().signal,
        parent: null,
        createdAt: clock.now(),
        id: init.id ?? '',
        deadline: null,
        metadata: new Map(toEntries(init.metadata)),
      },
      clock
    );
  }

  /** Root context with no cancellation source */
  static background(clock: Clock = systemClock): ExecutionContext {
    return ExecutionContext.create({ clock });
  }

  get signal(): AbortSignal {
    return this.state.signal;
  }

  get metadata(): Metadata {
    return this.state.metadata;
  }

  get createdAt(): number {
    return this.state.createdAt;
  }

  /** Identifier assigned by a ContextManager; empty when untracked */
  get id(): string {
    return this.state.id;
  }

  /** Absolute deadline in epoch milliseconds, inherited from ancestors */
  get deadline(): number | null {
    return this.state.deadline;
  }

  get parent(): ExecutionContext | null {
    return this.state.parent;
  }

  isCancelled(): boolean {
    return this.state.signal.aborted;
  }

  /**
   * The cancellation error, or null while the context is live
   */
  err(): ContextCancelledError | null {
    if (!this.state.signal.aborted) {
      return null;
    }
    return toCancellationError(this.state.signal.reason);
  }

  throwIfCancelled(): void {
    const error = this.err();
    if (error) {
      throw error;
    }
  }

  /** Milliseconds since creation */
  age(): number {
    return this.clock.now() - this.state.createdAt;
  }

  getValue(key: string): unknown;
  getValue<V>(key: string, guard: (value: unknown) => value is V): V | undefined;
  getValue<V>(key: string, guard?: (value: unknown) => value is V): unknown {
    const value = this.state.metadata.get(key);
    if (!guard) {
      return value;
    }
    return guard(value) ? value : undefined;
  }

  setValue(key: string, value: unknown): this {
    this.state.metadata.set(key, value);
    return this;
  }

  withCancel(): DerivedContext {
    return this.derive(null, []);
  }

  withTimeout(timeoutMs: number): DerivedContext {
    return this.derive(this.clock.now() + timeoutMs, []);
  }

  withDeadline(deadline: number | Date): DerivedContext {
    return this.derive(deadline instanceof Date ? deadline.getTime() : deadline, []);
  }

  isDescendantOf(ancestor: ExecutionContext): boolean {
    let current = this.state.parent;
    while (current) {
      if (current === ancestor) {
        return true;
      }
      current = current.parent;
    }
    return false;
  }

  /**
   * Bounds this context by `ancestor`'s cancellation.
   *
   * A context already derived from `ancestor` is returned unchanged. Anything
   * else is re-parented onto a context linked to both signals, so it can
   * never outlive `ancestor`.
   */
  boundBy(ancestor: ExecutionContext): DerivedContext {
    if (this === ancestor || this.isDescendantOf(ancestor)) {
      return { context: this, cancel: () => undefined };
    }
    const bound = ancestor.derive(this.state.deadline, [this.state.signal]);
    for (const [key, value] of this.state.metadata) {
      bound.context.state.metadata.set(key, value);
    }
    return bound;
  }

  /**
   * Re-initializes a released context for reuse by a context pool.
   *
   * The metadata map is cleared in place, never reallocated.
   */
  reinitialize(init: {
    signal: AbortSignal;
    id: string;
    metadata?: MetadataInit;
  }): void {
    const metadata = this.state.metadata;
    metadata.clear();
    for (const [key, value] of toEntries(init.metadata)) {
      metadata.set(key, value);
    }
    this.state = {
      signal: init.signal,
      parent: null,
      createdAt: this.clock.now(),
      id: init.id,
      deadline: null,
      metadata,
    };
  }

  private derive(deadline: number | null, linkedSignals: AbortSignal[]): DerivedContext {
    const controller = new AbortController();
    const effectiveDeadline =
      deadline === null
        ? this.state.deadline
        : this.state.deadline === null
          ? deadline
          : Math.min(deadline, this.state.deadline);

    const child = new ExecutionContext(
      {
        signal: controller.signal,
        parent: this,
        createdAt: this.clock.now(),
        id: '',
        deadline: effectiveDeadline,
        metadata: new Map(this.state.metadata),
      },
      this.clock
    );

    const releases: CancelTimer[] = [];
    const abort = (reason: ContextCancelledError): void => {
      if (!controller.signal.aborted) {
        controller.abort(reason);
      }
      for (const release of releases.splice(0)) {
        release();
      }
    };

    for (const source of [this.state.signal, ...linkedSignals]) {
      if (source.aborted) {
        abort(toCancellationError(source.reason));
        return { context: child, cancel: () => undefined };
      }
      const onAbort = (): void => abort(toCancellationError(source.reason));
      source.addEventListener('abort', onAbort, { once: true });
      releases.push(() => source.removeEventListener('abort', onAbort));
    }

    if (deadline !== null) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        abort(new ContextCancelledError(true));
      } else {
        releases.push(this.clock.setTimer(() => abort(new ContextCancelledError(true)), remaining));
      }
    }

    return {
      context: child,
      cancel: () => abort(new ContextCancelledError(false)),
    };
  }
}
