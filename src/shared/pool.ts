// src/shared/pool.ts — bounded worker pool used for per-tick fan-out and ping matrices.
// Results keep input order regardless of completion order.

export type Settled<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

export async function mapSettled<I, O>(
  items: readonly I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<O>,
): Promise<Settled<O>[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: Settled<O>[] = new Array(items.length);
  const running = new Set<Promise<void>>();
  let next = 0;

  const start = (index: number): void => {
    const task = (async () => {
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    })().finally(() => {
      running.delete(task);
    });
    running.add(task);
  };

  while (next < items.length) {
    while (running.size < concurrency && next < items.length) {
      start(next++);
    }
    if (running.size >= concurrency) {
      await Promise.race(running);
    }
  }
  await Promise.all(running);
  return results;
}
