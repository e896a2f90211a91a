import { afterEach, describe, expect, it, vi } from 'vitest';
import { PipelineScheduler } from '../src/services/scheduler';
import { RunContext } from '../src/types/run';
import { createDeferredRunner, emptyReport as reportFor } from './fakes/fakes';

describe('PipelineScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('refuses to start a second run while one is in progress', async () => {
    const runner = createDeferredRunner();
    const scheduler = new PipelineScheduler(runner);

    const first = scheduler.trigger();
    expect(scheduler.isRunning).toBe(true);

    await expect(scheduler.trigger()).resolves.toBeNull();
    expect(runner.run).toHaveBeenCalledTimes(1);

    runner.release();
    const report = await first;
    expect(report?.status).toBe('completed');
    expect(scheduler.isRunning).toBe(false);
  });

  it('gives every run its own id', async () => {
    const runner = { run: vi.fn(async (ctx: RunContext) => reportFor(ctx)) };
    const scheduler = new PipelineScheduler(runner);

    const a = await scheduler.trigger();
    const b = await scheduler.trigger();

    expect(a?.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(a?.runId).not.toBe(b?.runId);
  });

  it('clears the running flag when a run fails', async () => {
    const scheduler = new PipelineScheduler({ run: vi.fn().mockRejectedValue(new Error('database down')) });

    await expect(scheduler.trigger()).rejects.toThrow('database down');
    expect(scheduler.isRunning).toBe(false);
  });

  it('runs on the interval and stops cleanly', async () => {
    vi.useFakeTimers();
    const runner = { run: vi.fn(async (ctx: RunContext) => reportFor(ctx)) };
    const scheduler = new PipelineScheduler(runner);

    scheduler.start(60_000);
    expect(runner.run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runner.run).toHaveBeenCalledTimes(2);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(runner.run).toHaveBeenCalledTimes(2);
  });

  it('waits for an in-flight run when stopping', async () => {
    const runner = createDeferredRunner();
    const scheduler = new PipelineScheduler(runner);
    scheduler.start(60_000);

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    runner.release();
    await stopping;
    expect(stopped).toBe(true);
  });
});
