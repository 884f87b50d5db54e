export async function limitConcurrency<T>(
  tasks: (() => Promise<T>)[],
  limit: number
): Promise<T[]> {
  if (limit < 1) throw new RangeError(`Concurrency limit must be at least 1, got ${limit}`);

  const results = new Array<T>(tasks.length);
  const executing = new Set<Promise<void>>();

  for (const [index, task] of tasks.entries()) {
    const promise: Promise<void> = task().then(result => {
      results[index] = result;
    }).finally(() => {
      executing.delete(promise);
    });

    executing.add(promise);

    if (executing.size >= limit) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);
  return results;
}

/** Maps `items` through `fn` with at most `limit` calls in flight; results keep input order. */
export async function mapWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const tasks = items.map(item => () => fn(item));
  return limitConcurrency(tasks, limit);
}
