/**
 * Fixed-size async worker pool
 * N workers drain a shared cursor over the input; never one task per item.
 */

export async function runWorkerPool<T>(
  items: readonly T[],
  concurrency: number,
  handler: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      await handler(item, index);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  // Full join: wait for every worker even when one fails
  const results = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));

  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
}
