export interface BoundedPoolOptions {
  concurrency: number;
  /** When aborted, no new item is scheduled. */
  signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 *
 * The first rejection stops scheduling; workers already running are awaited
 * before that first error is rethrown. Items are picked in array order.
 */
export async function runBounded<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: BoundedPoolOptions,
): Promise<void> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const lane = async (): Promise<void> => {
    while (!failed && !options.signal?.aborted && next < items.length) {
      const index = next;
      next += 1;
      try {
        await worker(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.allSettled(lanes);

  if (failed) {
    throw firstError;
  }
}
