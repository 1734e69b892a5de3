export const DEFAULT_CONCURRENCY = 10;
export const REPOSITORY_CONCURRENCY = 4;

async function pool(count: number, concurrency: number, work: (index: number) => Promise<void>): Promise<void> {
  let nextIndex = 0;
  async function worker(): Promise<void> {
    while (nextIndex < count) {
      const i = nextIndex++;
      await work(i);
    }
  }
  await Promise.all(Array.from({ length: Math.min(Math.max(concurrency, 1), count) }, () => worker()));
}

/** Map with bounded concurrency; the first rejection rejects the whole call. */
export async function runConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  await pool(items.length, concurrency, async (i) => {
    results[i] = await fn(items[i]);
  });
  return results;
}

/** Like runConcurrent, but every item runs to completion and failures are returned in place. */
export async function runConcurrentSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  await pool(items.length, concurrency, async (i) => {
    try {
      results[i] = { status: "fulfilled", value: await fn(items[i]) };
    } catch (reason: unknown) {
      results[i] = { status: "rejected", reason };
    }
  });
  return results;
}
