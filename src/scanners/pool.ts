function isAsyncIterable<T>(items: Iterable<T> | AsyncIterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}

/**
 * Pull items from a shared iterator with at most `concurrency` tasks in flight.
 * `shouldStop` is polled before each item is taken, never while a task runs.
 */
export async function runWithConcurrency<T>(
  items: Iterable<T> | AsyncIterable<T>,
  concurrency: number,
  task: (item: T) => Promise<void>,
  shouldStop: () => boolean = () => false
): Promise<void> {
  const iterator: Iterator<T> | AsyncIterator<T> = isAsyncIterable(items)
    ? items[Symbol.asyncIterator]()
    : items[Symbol.iterator]();

  const worker = async (): Promise<void> => {
    while (!shouldStop()) {
      const next = await iterator.next();
      if (next.done) return;
      await task(next.value);
    }
  };

  const limit = Math.max(1, Math.floor(concurrency));
  try {
    await Promise.all(Array.from({ length: limit }, () => worker()));
  } finally {
    await iterator.return?.();
  }
}
