import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "../pool.js";

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order whatever the completion order", async () => {
    const out = await mapWithConcurrency([30, 5, 15, 0], 4, async (ms, index) => {
      await sleep(ms);
      return `${index}:${ms}`;
    });
    expect(out).toEqual(["0:30", "1:5", "2:15", "3:0"]);
  });

  it("never runs more than the limit at once", async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(5);
      running--;
    });
    expect(peak).toBe(2);
  });

  it("handles an empty input", async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });
});
