import os from 'node:os';

/**
 * Default worker pool size: the parallelism the host reports
 */
export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Maps items with at most `concurrency` mappers in flight.
 * @returns Results in input order, whatever order the mappers settle in
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, received ${concurrency}`);
  }

  const output: R[] = new Array<R>(items.length);
  const pending = items.map((item, index) => ({ item, index }));

  const worker = async (): Promise<void> => {
    for (let task = pending.shift(); task; task = pending.shift()) {
      // eslint-disable-next-line no-await-in-loop
      output[task.index] = await mapper(task.item, task.index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
  return output;
}
