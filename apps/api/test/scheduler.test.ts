import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IngestionScheduler } from '../src/ingestion/scheduler.js';
import type { IngestionRunner } from '../src/ingestion/pipeline.js';
import { silentLogger } from './helpers.js';

function runnerResolving(value = 0) {
  return { runOnce: vi.fn<IngestionRunner['runOnce']>(async () => value) };
}

describe('IngestionScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs immediately and then once per interval', async () => {
    const runner = runnerResolving(3);
    const scheduler = new IngestionScheduler(runner, { intervalMs: 60_000, logger: silentLogger() });

    scheduler.start();
    expect(runner.runOnce).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(runner.runOnce).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(runner.runOnce).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(runner.runOnce).toHaveBeenCalledTimes(4);

    await scheduler.stop();
  });

  it('logs the count of each run', async () => {
    const logger = silentLogger();
    const scheduler = new IngestionScheduler(runnerResolving(5), { logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info.mock.calls[0][0]).toMatch(/^\[scheduler\] Crawled 5 new apartments at /);
    await scheduler.stop();
  });

  it('keeps looping after a run throws', async () => {
    const logger = silentLogger();
    const runner = runnerResolving(0);
    runner.runOnce.mockRejectedValueOnce(new Error('database is locked'));
    const scheduler = new IngestionScheduler(runner, { intervalMs: 1_000, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(logger.error).toHaveBeenCalledWith('[scheduler] Error during crawling', { error: 'database is locked' });

    await vi.advanceTimersByTimeAsync(1_000);
    expect(runner.runOnce).toHaveBeenCalledTimes(2);
    expect(scheduler.isRunning).toBe(true);

    await scheduler.stop();
  });

  it('stops between runs without waiting for the interval', async () => {
    const runner = runnerResolving(0);
    const scheduler = new IngestionScheduler(runner, { intervalMs: 60_000, logger: silentLogger() });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(10);
    await scheduler.stop();

    expect(scheduler.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(300_000);
    expect(runner.runOnce).toHaveBeenCalledTimes(1);
  });

  it('aborts the signal handed to an in-flight run', async () => {
    let seen: AbortSignal | undefined;
    const runner = {
      runOnce: vi.fn<IngestionRunner['runOnce']>(
        (signal) =>
          new Promise<number>((resolve) => {
            seen = signal;
            signal?.addEventListener('abort', () => resolve(0));
          })
      )
    };
    const scheduler = new IngestionScheduler(runner, { logger: silentLogger() });

    scheduler.start();
    expect(seen?.aborted).toBe(false);

    await scheduler.stop();
    expect(seen?.aborted).toBe(true);
    expect(runner.runOnce).toHaveBeenCalledTimes(1);
  });

  it('ignores a second start while running', async () => {
    const runner = runnerResolving(0);
    const scheduler = new IngestionScheduler(runner, { logger: silentLogger() });

    scheduler.start();
    scheduler.start();
    expect(runner.runOnce).toHaveBeenCalledTimes(1);

    await scheduler.stop();
  });

  it('can be restarted after stop', async () => {
    const runner = runnerResolving(0);
    const scheduler = new IngestionScheduler(runner, { logger: silentLogger() });

    scheduler.start();
    await scheduler.stop();
    scheduler.start();

    expect(runner.runOnce).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });
});
