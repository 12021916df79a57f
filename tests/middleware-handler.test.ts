/**
 * Unit tests for MiddlewareHandler
 */

import { describe, it, expect } from 'vitest';
import { MiddlewareHandler } from '../src/core/middleware-handler.js';
import { ExecutionContext } from '../src/context/execution-context.js';
import { DrainingError } from '../src/errors.js';

interface HttpRequest {
  path: string;
  headers: Record<string, string>;
}

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe('MiddlewareHandler', () => {
  it('should_run_stages_then_final_handler_when_handling', async () => {
    const handler = new MiddlewareHandler<HttpRequest>({ name: 'api' }).addMiddleware((ctx, request, next) =>
      next(ctx, { ...request, headers: { ...request.headers, 'x-trace': 'trace-1' } })
    );

    const response = await handler.handle(
      ExecutionContext.create(),
      { path: '/users', headers: {} },
      (_ctx, request) => ({ ...request, path: `${request.path}/handled` })
    );

    expect(response).toEqual({ path: '/users/handled', headers: { 'x-trace': 'trace-1' } });
  });

  it('should_report_handler_name_with_metrics', async () => {
    const handler = new MiddlewareHandler<string>({ name: 'api' });

    await handler.handle(ExecutionContext.create(), 'req', (_ctx, request) => request);

    expect(handler.getMetrics()).toMatchObject({ handlerName: 'api', executions: 1, successful: 1 });
    expect(handler.getConfig().name).toBe('api');
  });

  it('should_count_and_reset_stages', () => {
    const handler = new MiddlewareHandler<string>()
      .addMiddleware((ctx, request, next) => next(ctx, request))
      .prependMiddleware((ctx, request, next) => next(ctx, request));

    expect(handler.getMiddlewareCount()).toBe(2);

    handler.reset();
    expect(handler.getMiddlewareCount()).toBe(0);
  });

  it('should_treat_zero_concurrency_as_unlimited', () => {
    const handler = new MiddlewareHandler<string>({ maxConcurrency: 0 });

    expect(handler.getLimiterStats().max).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should_queue_calls_beyond_limit_when_concurrency_bounded', async () => {
    const release = gate();
    const handler = new MiddlewareHandler<string>({ maxConcurrency: 1 }).addMiddleware(
      async (ctx, request, next) => {
        if (request === 'first') {
          await release.wait;
        }
        return next(ctx, request);
      }
    );
    const ctx = ExecutionContext.create();

    const first = handler.handle(ctx, 'first', (_c, request) => request);
    const second = handler.handle(ctx, 'second', (_c, request) => request);
    await new Promise((resolve) => setImmediate(resolve));

    expect(handler.getLimiterStats()).toMatchObject({ active: 1, waiting: 1 });

    release.open();
    await expect(Promise.all([first, second])).resolves.toEqual(['first', 'second']);
  });

  it('should_apply_config_updates_to_chain', () => {
    const handler = new MiddlewareHandler<string>({ config: { timeoutMs: 100 } });

    handler.updateConfig({ timeoutMs: 500 });

    expect(handler.getConfig().timeoutMs).toBe(500);
  });

  it('should_refuse_calls_after_drain', async () => {
    const handler = new MiddlewareHandler<string>({ maxConcurrency: 2 });

    await expect(handler.drain()).resolves.toBe(true);
    await expect(handler.handle(ExecutionContext.create(), 'req', (_c, r) => r)).rejects.toBeInstanceOf(
      DrainingError
    );
  });
});
