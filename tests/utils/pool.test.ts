import { describe, expect, test } from "vitest";
import { runPool } from "../../src/utils/pool";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runPool", () => {
  test("returns results in item order", async () => {
    const results = await runPool([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([
      { ok: true, value: 60 },
      { ok: true, value: 20 },
      { ok: true, value: 40 },
    ]);
  });

  test("never runs more than the limit at once", async () => {
    let running = 0;
    let peak = 0;

    await runPool(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });

    expect(peak).toBe(3);
  });

  test("captures a rejection without stopping the other items", async () => {
    const results = await runPool(["a", "b", "c"], 2, async (item) => {
      if (item === "b") throw new Error("boom");
      return item.toUpperCase();
    });

    expect(results[0]).toEqual({ ok: true, value: "A" });
    expect(results[1]?.ok).toBe(false);
    expect(results[2]).toEqual({ ok: true, value: "C" });
  });

  test("handles an empty list", async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
