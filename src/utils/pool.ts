/**
 * 以固定併發數依序處理 items，結果順序與輸入相同。
 * signal 中止後不再啟動新的工作，已開始的工作照常結束。
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  const limit = Math.max(1, Math.floor(concurrency));
  let idx = 0,
    active = 0;

  return new Promise((resolve) => {
    const next = () => {
      while (active < limit && idx < items.length && !signal?.aborted) {
        const current = idx++;
        active++;
        void worker(items[current], current)
          .then(
            (value) => {
              results[current] = { status: "fulfilled", value };
            },
            (reason: unknown) => {
              results[current] = { status: "rejected", reason };
            }
          )
          .finally(() => {
            active--;
            next();
          });
      }
      if (active === 0) resolve(results.filter((r) => r !== undefined));
    };
    next();
  });
}
