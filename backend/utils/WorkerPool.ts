import { createLogger } from './LoggerUtils.js';

const logger = createLogger('WORKER POOL');

/**
 * Run `task` over `items` with at most `concurrency` in flight.
 * Results come back in submission order. A task that rejects contributes
 * `onError(item, index, error)` instead of failing the batch.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  onError: (item: T, index: number, error: unknown) => R
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  const worker = async (workerId: number) => {
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;

      const startTime = Date.now();
      try {
        results[next.index] = await task(next.item, next.index);
        const duration = (Date.now() - startTime) / 1000;
        logger.debug(`Worker ${workerId}: task ${next.index} done in ${duration.toFixed(2)}s`);
      } catch (error) {
        logger.error(`Worker ${workerId}: task ${next.index} failed`, error);
        results[next.index] = onError(next.item, next.index, error);
      }
    }
  };

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    (_, i) => worker(i + 1)
  );
  await Promise.all(workers);

  return results;
}
