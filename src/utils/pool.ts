/**
 * Bounded worker pool
 */

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Run `worker` over every item with at most `limit` calls in flight.
 *
 * Each call writes only to its own result slot, so results line up with
 * `items` by index. A rejected call is captured in its slot and does not
 * stop the remaining items.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length);
  const size = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = { ok: true, value: await worker(item, index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  }

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < size; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);

  return results;
}
