/**
 * Runs `worker` over `items` with at most `limit` in flight. Results keep the
 * input order; a rejected worker does not stop the others.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, idx: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let next = 0;

  async function runner(): Promise<void> {
    while (next < items.length) {
      const current = next++;
      try {
        results[current] = { status: "fulfilled", value: await worker(items[current], current) };
      } catch (reason) {
        results[current] = { status: "rejected", reason };
      }
    }
  }

  const runners = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () =>
    runner()
  );
  await Promise.all(runners);
  return results;
}
