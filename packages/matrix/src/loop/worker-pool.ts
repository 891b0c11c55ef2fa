import { assertPositiveInt } from "@asset-matrix/kit";

export interface PoolOptions<T, R> {
  concurrency: number;
  /** Converts a worker rejection into a result so no task is ever dropped. */
  recover: (item: T, err: unknown) => R;
  /** Called once per finished task, in completion order. A throw ends that lane. */
  onSettled?: (result: R, item: T, completedCount: number) => void;
  /** When aborted, lanes stop pulling new items; in-flight items finish. */
  signal?: AbortSignal;
}

export interface PoolOutcome<T, R> {
  /** Results in completion order. */
  results: R[];
  /** Items never started because the signal aborted. */
  skipped: T[];
}

/**
 * Fixed-size pool of async lanes draining a shared queue. Each lane awaits one
 * task at a time, so at most `concurrency` tasks are in flight.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  opts: PoolOptions<T, R>,
): Promise<PoolOutcome<T, R>> {
  const { recover, onSettled, signal } = opts;
  const concurrency = assertPositiveInt(opts.concurrency, "concurrency");

  const results: R[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++];
      let result: R;
      try {
        result = await worker(item);
      } catch (err) {
        result = recover(item, err);
      }
      results.push(result);
      onSettled?.(result, item, results.length);
    }
  };

  // Every lane finishes before a lane failure is rethrown, so callers never clean
  // up under a task that is still running.
  const laneCount = Math.min(concurrency, items.length);
  const lanes = await Promise.allSettled(Array.from({ length: laneCount }, () => lane()));
  const failed = lanes.find((l): l is PromiseRejectedResult => l.status === "rejected");
  if (failed) throw failed.reason;

  return { results, skipped: items.slice(next) };
}
