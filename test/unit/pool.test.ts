import { describe, it, expect } from "vitest";
import { mapPool } from "../../src/utils/pool.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapPool", () => {
  it("returns results in input order when tasks finish out of order", async () => {
    const delays = [30, 5, 20, 0, 10];
    const finished: number[] = [];

    const results = await mapPool(delays, 3, async (delay, index) => {
      await sleep(delay);
      finished.push(index);
      return delay * 2;
    });

    expect(results).toEqual([60, 10, 40, 0, 20]);
    expect(finished).not.toEqual([0, 1, 2, 3, 4]);
  });

  it("never runs more than `concurrency` tasks at once", async () => {
    let running = 0;
    let peak = 0;

    await mapPool(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(2);
      running--;
    });

    expect(peak).toBe(3);
  });

  it("treats a concurrency below one as one", async () => {
    const order: number[] = [];
    await mapPool([1, 2, 3], 0, async (item) => {
      order.push(item);
      await sleep(1);
    });
    expect(order).toEqual([1, 2, 3]);
  });

  it("handles an empty input", async () => {
    expect(await mapPool([], 4, async () => 1)).toEqual([]);
  });

  it("rejects when a task fails", async () => {
    await expect(
      mapPool([1, 2], 2, async (item) => {
        if (item === 2) throw new Error("task failed");
        return item;
      })
    ).rejects.toThrow("task failed");
  });
});
