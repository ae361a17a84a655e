/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * Each result lands at the index of its input, so the returned array is in
 * input order no matter which task finishes first.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const width = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: width }, () => drain()));
  return results;
}
