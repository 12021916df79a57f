/**
 * Unit tests for ExecutionChain traversal, fault isolation and metrics
 */

import { describe, it, expect, vi } from 'vitest';
import { ExecutionChain, TERMINAL_STAGE } from '../src/core/execution-chain.js';
import { ExecutionContext } from '../src/context/execution-context.js';
import {
  ContextCancelledError,
  RetriesExhaustedError,
  StageFaultError,
} from '../src/errors.js';
import type { Middleware } from '../src/types.js';
import { ManualClock } from './helpers/manual-clock.js';
import { RecordingLogger } from './helpers/recording-logger.js';

function recordingStage(name: string, log: string[]): Middleware<string> {
  return {
    name,
    handle: async (ctx, request, next) => {
      log.push(`${name}:before`);
      const response = await next(ctx, request);
      log.push(`${name}:after`);
      return response;
    },
  };
}

class ValidationError extends Error {}

describe('ExecutionChain', () => {
  describe('traversal', () => {
    it('should_return_request_unchanged_when_chain_is_empty', async () => {
      const chain = new ExecutionChain<{ id: number }>();
      const request = { id: 7 };

      const response = await chain.execute(ExecutionContext.create(), request);

      expect(response).toBe(request);
      expect(chain.getMetrics().executions).toBe(1);
      expect(chain.getMetrics().successful).toBe(1);
    });

    it('should_nest_stages_russian_doll_style_when_three_stages_run', async () => {
      const log: string[] = [];
      const chain = new ExecutionChain<string>().addMiddleware(
        recordingStage('A', log),
        recordingStage('B', log),
        recordingStage('C', log)
      );

      await chain.execute(ExecutionContext.create(), 'req');

      expect(log).toEqual([
        'A:before',
        'B:before',
        'C:before',
        'C:after',
        'B:after',
        'A:after',
      ]);
    });

    it('should_pass_transformed_request_to_terminal_when_stages_rewrite_it', async () => {
      const chain = new ExecutionChain<string>()
        .addMiddleware((ctx, request, next) => next(ctx, `${request}-a`))
        .addMiddleware((ctx, request, next) => next(ctx, `${request}-b`));

      const response = await chain.execute(ExecutionContext.create(), 'x', (_ctx, request) => `${request}!`);

      expect(response).toBe('x-a-b!');
    });

    it('should_skip_downstream_stages_when_stage_short_circuits', async () => {
      const downstream = vi.fn(async (_ctx: ExecutionContext, request: string) => request);
      const chain = new ExecutionChain<string>()
        .addMiddleware(() => 'cached')
        .addMiddleware((ctx, request, next) => downstream(ctx, request).then((r) => next(ctx, r)));

      const response = await chain.execute(ExecutionContext.create(), 'req');

      expect(response).toBe('cached');
      expect(downstream).not.toHaveBeenCalled();
    });

    it('should_run_prepended_stage_first_when_prependMiddleware_used', async () => {
      const log: string[] = [];
      const chain = new ExecutionChain<string>()
        .addMiddleware(recordingStage('second', log))
        .prependMiddleware(recordingStage('first', log));

      await chain.execute(ExecutionContext.create(), 'req');

      expect(log[0]).toBe('first:before');
      expect(log[1]).toBe('second:before');
    });

    it('should_use_call_site_terminal_over_default_when_both_given', async () => {
      const chain = new ExecutionChain<string>({}, () => 'default');

      expect(await chain.execute(ExecutionContext.create(), 'req')).toBe('default');
      expect(await chain.execute(ExecutionContext.create(), 'req', () => 'call-site')).toBe('call-site');
    });

    it('should_keep_running_snapshot_when_stages_added_mid_execution', async () => {
      const log: string[] = [];
      const chain = new ExecutionChain<string>();
      chain.addMiddleware({
        name: 'mutator',
        handle: (ctx, request, next) => {
          chain.addMiddleware(recordingStage('late', log));
          return next(ctx, request);
        },
      });

      await chain.execute(ExecutionContext.create(), 'req');

      expect(log).toEqual([]);
      expect(chain.count()).toBe(2);
    });
  });

  describe('fault isolation', () => {
    it('should_convert_thrown_string_into_stage_fault_when_stage_panics', async () => {
      const chain = new ExecutionChain<string>().addMiddleware({
        name: 'exploder',
        handle: () => {
          throw 'boom';
        },
      });

      const error = await chain.execute(ExecutionContext.create(), 'req').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetriesExhaustedError);
      expect(error).toMatchObject({
        stage: 'exploder',
        attempts: 1,
        message: "middleware 'exploder' failed after 1 attempt: panic in middleware 'exploder': boom",
      });
      const fault = error instanceof RetriesExhaustedError ? error.lastError : undefined;
      expect(fault).toBeInstanceOf(StageFaultError);
      expect(fault).toMatchObject({
        stage: 'exploder',
        payload: 'boom',
        message: "panic in middleware 'exploder': boom",
      });
      expect(chain.getMetrics().panics).toBe(1);
      expect(chain.getMetrics().failed).toBe(1);
    });

    it('should_treat_builtin_type_error_as_fault_when_thrown_by_stage', async () => {
      const chain = new ExecutionChain<string>().addMiddleware({
        name: 'typo',
        handle: () => {
          throw new TypeError('undefined is not a function');
        },
      });

      await expect(chain.execute(ExecutionContext.create(), 'req')).rejects.toThrow(
        "panic in middleware 'typo': TypeError: undefined is not a function"
      );
    });

    it('should_count_one_panic_per_execution_when_several_stages_fault', async () => {
      const chain = new ExecutionChain<string>()
        .addMiddleware({
          name: 'outer',
          handle: async (ctx, request, next) => {
            await next(ctx, request).catch(() => undefined);
            throw new RangeError('outer broke too');
          },
        })
        .addMiddleware({
          name: 'inner',
          handle: () => {
            throw 42;
          },
        });

      await expect(chain.execute(ExecutionContext.create(), 'req')).rejects.toMatchObject({
        stage: 'outer',
        cause: expect.any(StageFaultError),
      });
      expect(chain.getMetrics().panics).toBe(1);
    });

    it('should_name_terminal_stage_when_terminal_handler_faults', async () => {
      const chain = new ExecutionChain<string>().addMiddleware((ctx, request, next) => next(ctx, request));

      const error = await chain
        .execute(ExecutionContext.create(), 'req', () => {
          throw new ReferenceError('missing');
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetriesExhaustedError);
      expect(error).toMatchObject({ stage: 'stage#0', lastError: expect.any(StageFaultError) });
      expect(error).toMatchObject({ lastError: { stage: TERMINAL_STAGE } });
    });

    it('should_wrap_ordinary_error_with_attempt_count_when_no_retries_configured', async () => {
      const cause = new ValidationError('bad input');
      const chain = new ExecutionChain<string>().addMiddleware({
        name: 'validate',
        handle: () => {
          throw cause;
        },
      });

      const error = await chain.execute(ExecutionContext.create(), 'req').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetriesExhaustedError);
      expect(error).toMatchObject({
        stage: 'validate',
        attempts: 1,
        cause,
        message: "middleware 'validate' failed after 1 attempt: bad input",
      });
      expect(chain.getMetrics().panics).toBe(0);
    });

    it('should_surface_fault_itself_when_retry_policy_excludes_it', async () => {
      const chain = new ExecutionChain<string>({
        retryPolicy: { maxRetries: 2, backoff: () => 0, retryOn: [ValidationError] },
      }).addMiddleware({
        name: 'exploder',
        handle: () => {
          throw 'boom';
        },
      });

      const error = await chain.execute(ExecutionContext.create(), 'req').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StageFaultError);
      expect(error).toMatchObject({ stage: 'exploder', payload: 'boom' });
    });

    it('should_name_anonymous_stage_by_index_when_it_faults', async () => {
      const chain = new ExecutionChain<string>()
        .addMiddleware((ctx, request, next) => next(ctx, request))
        .addMiddleware(() => {
          throw null;
        });

      await expect(chain.execute(ExecutionContext.create(), 'req')).rejects.toMatchObject({
        stage: 'stage#1',
      });
    });
  });

  describe('cancellation and deadlines', () => {
    it('should_reject_without_invoking_stages_when_context_already_cancelled', async () => {
      const stage = vi.fn(async (_ctx: ExecutionContext, request: string) => request);
      const chain = new ExecutionChain<string>().addMiddleware(stage);
      const { context, cancel } = ExecutionContext.create().withCancel();
      cancel();

      await expect(chain.execute(context, 'req')).rejects.toBeInstanceOf(ContextCancelledError);
      expect(stage).not.toHaveBeenCalled();
    });

    it('should_fail_with_deadline_exceeded_when_chain_timeout_elapses', async () => {
      const clock = new ManualClock();
      const chain = new ExecutionChain<string>({ timeoutMs: 50, clock }).addMiddleware(
        (ctx, request, next) => {
          clock.advance(100);
          return next(ctx, request);
        },
        (ctx, request) => request
      );

      const error = await chain.execute(ExecutionContext.background(clock), 'req').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContextCancelledError);
      expect(error).toMatchObject({ deadlineExceeded: true });
    });

    it('should_release_chain_timeout_when_execution_finishes', async () => {
      const clock = new ManualClock();
      const chain = new ExecutionChain<string>({ timeoutMs: 1000, clock }).addMiddleware(
        (ctx, request, next) => next(ctx, request)
      );

      await chain.execute(ExecutionContext.background(clock), 'req');

      expect(clock.pendingTimers()).toBe(0);
    });

    it('should_hand_narrowed_context_to_later_stages_when_stage_swaps_it', async () => {
      const clock = new ManualClock();
      const seen: (number | null)[] = [];
      const chain = new ExecutionChain<string>({ clock })
        .addMiddleware((ctx, request, next) => next(ctx.withTimeout(10).context, request))
        .addMiddleware((ctx, request) => {
          seen.push(ctx.deadline);
          return request;
        });

      await chain.execute(ExecutionContext.background(clock), 'req');

      expect(seen).toEqual([clock.now() + 10]);
    });

    it('should_bound_foreign_context_by_caller_when_stage_swaps_unrelated_one', async () => {
      const root = ExecutionContext.create();
      let observed: ExecutionContext | undefined;
      const chain = new ExecutionChain<string>()
        .addMiddleware((_ctx, request, next) =>
          next(ExecutionContext.create({ metadata: { swapped: true } }), request)
        )
        .addMiddleware((ctx, request) => {
          observed = ctx;
          return request;
        });

      await chain.execute(root, 'req');

      expect(observed?.getValue('swapped')).toBe(true);
      expect(observed?.isDescendantOf(root)).toBe(true);
      expect(observed?.isCancelled()).toBe(true);
    });
  });

  describe('metrics and configuration', () => {
    it('should_record_duration_from_clock_when_execution_completes', async () => {
      const clock = new ManualClock();
      const chain = new ExecutionChain<string>({ clock }).addMiddleware((ctx, request, next) => {
        clock.advance(30);
        return next(ctx, request);
      });

      await chain.execute(ExecutionContext.background(clock), 'req');
      const metrics = chain.getMetrics();

      expect(metrics.totalDurationMs).toBe(30);
      expect(metrics.minDurationMs).toBe(30);
      expect(metrics.maxDurationMs).toBe(30);
      expect(metrics.successRate).toBe(100);
      expect(metrics.currentConcurrency).toBe(0);
      expect(metrics.peakConcurrency).toBe(1);
    });

    it('should_track_peak_concurrency_when_executions_overlap', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const chain = new ExecutionChain<string>().addMiddleware(async (ctx, request, next) => {
        await gate;
        return next(ctx, request);
      });

      const first = chain.execute(ExecutionContext.create(), 'a');
      const second = chain.execute(ExecutionContext.create(), 'b');
      expect(chain.getMetrics().currentConcurrency).toBe(2);

      release();
      await Promise.all([first, second]);

      expect(chain.getMetrics().peakConcurrency).toBe(2);
      expect(chain.getMetrics().currentConcurrency).toBe(0);
    });

    it('should_return_copy_of_stages_when_getMiddlewares_called', () => {
      const chain = new ExecutionChain<string>().addMiddleware((ctx, request, next) => next(ctx, request));

      const stages = chain.getMiddlewares();
      stages.pop();

      expect(chain.count()).toBe(1);
    });

    it('should_remove_stages_and_reset_metrics_when_cleared', async () => {
      const chain = new ExecutionChain<string>().addMiddleware((ctx, request, next) => next(ctx, request));
      await chain.execute(ExecutionContext.create(), 'req');

      chain.clear();

      expect(chain.count()).toBe(0);
      expect(chain.getMetrics().executions).toBe(0);
    });

    it('should_use_updated_config_when_later_execution_starts', async () => {
      const logger = new RecordingLogger();
      const chain = new ExecutionChain<string>({ name: 'before' }).addMiddleware({
        name: 'fails',
        handle: () => {
          throw new ValidationError('nope');
        },
      });

      chain.updateConfig({ name: 'after', logger });
      await chain.execute(ExecutionContext.create(), 'req').catch(() => undefined);

      expect(chain.getConfig().name).toBe('after');
      expect(logger.entries.at(-1)).toMatchObject({
        level: 'error',
        message: 'Error in execution chain',
        fields: { chain: 'after' },
      });
    });
  });
});
