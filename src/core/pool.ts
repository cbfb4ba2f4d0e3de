/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Results keep the
 * input order regardless of completion order.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let index = 0;
  const slotCount = Math.max(1, Math.min(concurrency, items.length));
  const slots = Array.from({ length: slotCount }, async () => {
    while (index < items.length) {
      const current = index;
      index += 1;
      results[current] = await worker(items[current], current);
    }
  });
  await Promise.all(slots);
  return results;
}
