/**
 * Bounded task pool for mask rasterization.
 *
 * At most `limit` tasks are in flight; results keep the input order.
 * Each task starts on a fresh macrotask so long CPU-bound batches leave
 * room for cancellation requests and I/O between items.
 */

import { setImmediate as nextTurn } from 'node:timers/promises';
import { CropExportError } from '../../src/lib/errors.js';

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => R | Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new CropExportError('invalid-input', `Worker limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;
  let stopped = false;

  const worker = async (): Promise<void> => {
    while (!stopped && next < items.length) {
      const index = next++;
      await nextTurn();
      if (signal?.aborted) {
        stopped = true;
        throw new CropExportError('cancelled');
      }
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = await task(item, index);
      } catch (error) {
        // first failure stops the other workers from picking up new items
        stopped = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
