import { afterEach, describe, expect, it, vi } from 'vitest';
import { PollScheduler } from './scheduler';

afterEach(() => {
  vi.useRealTimers();
});

describe('PollScheduler', () => {
  it('runs a single cycle when the interval is 0', async () => {
    const cycle = vi.fn(async () => 'done');
    const scheduler = new PollScheduler(cycle, { intervalSeconds: 0 });
    const results: unknown[] = [];
    scheduler.on('cycle', (result) => results.push(result));

    await scheduler.start();

    expect(cycle).toHaveBeenCalledTimes(1);
    expect(results).toEqual(['done']);
    expect(scheduler.isRunning).toBe(false);
  });

  it('rethrows the error of a single cycle', async () => {
    const scheduler = new PollScheduler(
      async () => {
        throw new Error('provider unavailable');
      },
      { intervalSeconds: 0 }
    );

    await expect(scheduler.start()).rejects.toThrow('provider unavailable');
  });

  it('waits the interval between the end of one cycle and the next', async () => {
    vi.useFakeTimers();
    const cycle = vi.fn(async () => 1);
    const scheduler = new PollScheduler(cycle, { intervalSeconds: 5 });

    const running = scheduler.start();
    await vi.advanceTimersByTimeAsync(4000);
    expect(cycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3500);
    expect(cycle).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await running;
    expect(scheduler.isRunning).toBe(false);
  });

  it('keeps polling after a failed cycle', async () => {
    vi.useFakeTimers();
    const cycle = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('ok');
    const scheduler = new PollScheduler(cycle, { intervalSeconds: 1 });
    const failures: unknown[] = [];
    const results: unknown[] = [];
    scheduler.on('cycleFailed', (err) => failures.push(err));
    scheduler.on('cycle', (result) => results.push(result));

    const running = scheduler.start();
    await vi.advanceTimersByTimeAsync(1500);
    scheduler.stop();
    await running;

    expect(failures).toHaveLength(1);
    expect(results).toEqual(['ok']);
  });

  it('ignores a second start while running', async () => {
    vi.useFakeTimers();
    const cycle = vi.fn(async () => 1);
    const scheduler = new PollScheduler(cycle, { intervalSeconds: 60 });

    const running = scheduler.start();
    await scheduler.start();
    scheduler.stop();
    await running;

    expect(cycle).toHaveBeenCalledTimes(1);
  });
});
