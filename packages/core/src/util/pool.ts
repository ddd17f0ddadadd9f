/**
 * Run `fn` over a lazily produced sequence with at most `concurrency` calls
 * in flight. The first rejection stops further pulls; it is rethrown once the
 * calls already started have settled.
 */
export async function runWithConcurrency<T>(
  items: Iterable<T>,
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>
): Promise<void> {
  const n = Math.max(1, Math.floor(concurrency));
  const iterator = items[Symbol.iterator]();
  const failures: unknown[] = [];
  let nextIndex = 0;

  async function worker(): Promise<void> {
    for (;;) {
      if (failures.length > 0) return;
      try {
        const next = iterator.next();
        if (next.done) return;
        await fn(next.value, nextIndex++);
      } catch (error) {
        failures.push(error);
        return;
      }
    }
  }

  await Promise.all(Array.from({ length: n }, () => worker()));
  if (failures.length > 0) throw failures[0];
}
