import { describe, expect, it } from 'vitest';
import { runBounded } from '../../src/utils/bounded-pool.js';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runBounded', () => {
  it('never runs more than the concurrency limit at once', async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    await runBounded(
      [1, 2, 3, 4, 5, 6, 7],
      async (item) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick(5);
        seen.push(item);
        inFlight--;
      },
      { concurrency: 3 },
    );

    expect(peak).toBe(3);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('stops scheduling after the first failure and rethrows it', async () => {
    const started: number[] = [];

    await expect(
      runBounded(
        [0, 1, 2, 3, 4],
        async (item) => {
          started.push(item);
          if (item === 0) throw new Error('first failure');
          await tick(5);
        },
        { concurrency: 1 },
      ),
    ).rejects.toThrow('first failure');

    expect(started).toEqual([0]);
  });

  it('waits for in-flight workers before rejecting', async () => {
    let finished = 0;

    await expect(
      runBounded(
        [0, 1],
        async (item) => {
          if (item === 0) throw new Error('boom');
          await tick(10);
          finished++;
        },
        { concurrency: 2 },
      ),
    ).rejects.toThrow('boom');

    expect(finished).toBe(1);
  });

  it('schedules nothing once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await runBounded([1, 2, 3], async () => {
      calls++;
    }, { concurrency: 2, signal: controller.signal });

    expect(calls).toBe(0);
  });

  it('resolves for an empty list', async () => {
    await expect(runBounded([], async () => undefined, { concurrency: 4 })).resolves.toBeUndefined();
  });
});
