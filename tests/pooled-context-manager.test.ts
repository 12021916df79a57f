/**
 * Unit tests for PooledContextManager
 */

import { describe, it, expect, afterEach } from 'vitest';
import { PooledContextManager } from '../src/context/pooled-context-manager.js';
import { ConfigurationError } from '../src/errors.js';
import { ManualClock } from './helpers/manual-clock.js';

function sequentialIds(): () => string {
  let next = 0;
  return () => `pooled-${++next}`;
}

describe('PooledContextManager', () => {
  const managers: PooledContextManager[] = [];

  function build(maxPoolSize?: number, clock = new ManualClock()): PooledContextManager {
    const manager = new PooledContextManager({ clock, maxPoolSize, idGenerator: sequentialIds() });
    managers.push(manager);
    return manager;
  }

  afterEach(async () => {
    for (const manager of managers.splice(0)) {
      await manager.shutdown();
    }
  });

  it('should_reuse_removed_context_when_creating_next', () => {
    const manager = build();
    const first = manager.createContext({ metadata: { user: 'alice' } });
    manager.removeContext('pooled-1');

    const second = manager.createContext({ metadata: { user: 'bob' } });

    expect(second).toBe(first);
    expect(second.id).toBe('pooled-2');
    expect(second.getValue('user')).toBe('bob');
    expect(manager.getContext('pooled-2')).toBe(second);
  });

  it('should_clear_metadata_map_in_place_when_reusing', () => {
    const manager = build();
    const first = manager.createContext({ metadata: { user: 'alice', role: 'admin' } });
    const map = first.metadata;
    manager.removeContext('pooled-1');

    const second = manager.createContext();

    expect(second.metadata).toBe(map);
    expect(map.size).toBe(0);
  });

  it('should_reset_creation_time_and_signal_when_reusing', () => {
    const clock = new ManualClock(10_000);
    const manager = build(undefined, clock);
    const controller = new AbortController();
    const first = manager.createContext({ signal: controller.signal });
    controller.abort();
    manager.removeContext('pooled-1');
    clock.advance(250);

    const second = manager.createContext();

    expect(second).toBe(first);
    expect(second.createdAt).toBe(10_250);
    expect(second.isCancelled()).toBe(false);
  });

  it('should_not_pool_contexts_when_expired_by_sweep', () => {
    const manager = build();
    const controller = new AbortController();
    manager.createContext({ signal: controller.signal });
    controller.abort();

    expect(manager.cleanupExpiredContexts()).toBe(1);
    expect(manager.getStats().poolSize).toBe(0);
  });

  it('should_cap_pool_when_more_contexts_released_than_max', () => {
    const manager = build(2);
    for (let i = 0; i < 3; i++) {
      manager.createContext();
    }

    manager.removeContext('pooled-1');
    manager.removeContext('pooled-2');
    manager.removeContext('pooled-3');

    expect(manager.getStats()).toMatchObject({ pooled: true, poolSize: 2, activeContexts: 0 });
  });

  it('should_empty_pool_when_shut_down', async () => {
    const manager = build();
    manager.createContext();
    manager.removeContext('pooled-1');

    await manager.shutdown();

    expect(manager.getStats().poolSize).toBe(0);
  });

  it('should_reject_invalid_pool_size_when_constructing', () => {
    expect(() => new PooledContextManager({ maxPoolSize: -1 })).toThrow(ConfigurationError);
    expect(() => new PooledContextManager({ maxPoolSize: 1.5 })).toThrow(ConfigurationError);
  });
});
