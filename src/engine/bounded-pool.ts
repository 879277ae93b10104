/**
 * Bounded worker pool with a join point.
 *
 * At most `concurrency` workers run at once; the returned promise resolves
 * only after every item has settled, in input order. Once the signal aborts,
 * items that have not started yet settle as rejected without running.
 */

import { abortReason } from './retry';

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results: Settled<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (signal?.aborted) {
        results[index] = { status: 'rejected', reason: abortReason(signal) };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (err) {
        results[index] = { status: 'rejected', reason: err };
      }
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < Math.min(limit, items.length); i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return results;
}
