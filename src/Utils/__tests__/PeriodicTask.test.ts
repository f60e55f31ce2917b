import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PeriodicTask, type TickResult } from '../PeriodicTask';
import { wait } from '../wait';

describe('PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks immediately and then every interval', async () => {
    const run = vi.fn<() => TickResult>();
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, run });
    task.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(3);

    await task.stop();
  });

  it('can wait one interval before the first tick', async () => {
    const run = vi.fn<() => TickResult>();
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, run });
    task.start({ immediate: false });

    await vi.advanceTimersByTimeAsync(99);
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  it('uses the delay a tick asks for, once', async () => {
    const run = vi.fn<() => TickResult>().mockReturnValueOnce({ delayMs: 1_000 });
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, run });
    task.start();

    await vi.advanceTimersByTimeAsync(999);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(3);

    await task.stop();
  });

  it('reports a failing tick and retries after the error delay', async () => {
    const failure = new Error('boom');
    const run = vi.fn<() => TickResult>().mockImplementationOnce(() => {
      throw failure;
    });
    const onError = vi.fn();
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, errorDelayMs: 500, run, onError });
    task.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(onError).toHaveBeenCalledWith(failure);
    await vi.advanceTimersByTimeAsync(499);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(2);

    await task.stop();
  });

  it('never overlaps a slow tick', async () => {
    const run = vi.fn(() => wait(500));
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, run });
    task.start();

    await vi.advanceTimersByTimeAsync(500);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(2);

    const stopped = task.stop(0);
    await vi.advanceTimersByTimeAsync(0);
    await stopped;
  });

  it('stops scheduling once stopped', async () => {
    const run = vi.fn<() => TickResult>();
    const task = new PeriodicTask({ name: 'test', intervalMs: 100, run });
    task.start();
    await vi.advanceTimersByTimeAsync(0);
    await task.stop();

    expect(task.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
