import { describe, expect, test } from "vitest";

import { runPool } from "@/utils/pool";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("runPool", () => {
  test("結果順序與輸入相同，併發數不超過上限", async () => {
    let active = 0;
    let peak = 0;
    const results = await runPool([3, 1, 2, 5], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n * 10;
    });
    expect(results).toEqual([
      { status: "fulfilled", value: 30 },
      { status: "fulfilled", value: 10 },
      { status: "fulfilled", value: 20 },
      { status: "fulfilled", value: 50 },
    ]);
    expect(peak).toBe(2);
  });

  test("個別失敗不影響其他工作", async () => {
    const results = await runPool([1, 2], 4, async (n) => {
      if (n === 1) throw new Error("boom");
      return n;
    });
    expect(results[0]).toMatchObject({ status: "rejected" });
    expect(results[1]).toEqual({ status: "fulfilled", value: 2 });
  });

  test("中止後不再開始新的工作", async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const results = await runPool(
      [1, 2, 3],
      1,
      async (n) => {
        started.push(n);
        controller.abort();
        return n;
      },
      controller.signal
    );
    expect(started).toEqual([1]);
    expect(results).toEqual([{ status: "fulfilled", value: 1 }]);
  });

  test("沒有工作時立即結束", async () => {
    expect(await runPool([], 3, async () => 1)).toEqual([]);
  });
});
