import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "../../concurrency";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("mapWithConcurrency", () => {
  it("keeps input order", async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it("never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n;
    });
    expect(peak).toBe(2);
  });

  it("stops starting work after the first failure", async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error("item 2 failed");
      return n;
    });

    await expect(run).rejects.toThrow("item 2 failed");
    expect(started).toEqual([1, 2]);
  });

  it("handles an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
