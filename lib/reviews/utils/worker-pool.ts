/**
 * Bounded worker pool.
 *
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * `shouldStop` is checked before each item is taken; items already
 * started always run to completion. If a worker throws, no new items
 * are taken and the first error is rethrown after in-flight work settles.
 */

export interface WorkerPoolOptions {
  concurrency: number;
  shouldStop?: () => boolean;
}

export interface WorkerPoolResult {
  started: number;
  stopped: boolean;
}

export async function runWorkerPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: WorkerPoolOptions
): Promise<WorkerPoolResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  let next = 0;
  let stopped = false;
  let failed = false;

  const lane = async (): Promise<void> => {
    while (next < items.length && !failed) {
      if (options.shouldStop?.()) {
        stopped = true;
        return;
      }
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  const settled = await Promise.allSettled(lanes);

  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }

  return { started: next, stopped };
}
