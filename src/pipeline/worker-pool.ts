/**
 * Runs `task` over `items` with at most `limit` in flight. A rejected task
 * is reported to `onError` and never stops its siblings.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<void>,
  onError: (item: T, err: unknown) => void
): Promise<void> {
  let next = 0;
  const size = Math.max(1, Math.min(limit, items.length));

  const worker = async () => {
    while (next < items.length) {
      const item = items[next++];
      try {
        await task(item);
      } catch (err) {
        onError(item, err);
      }
    }
  };

  await Promise.all(Array.from({ length: size }, () => worker()));
}
