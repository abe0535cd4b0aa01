/**
 * Tests for mapWithConcurrency
 */
import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../src/utils/pool.js";

const tick = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("returns results in input order whatever the completion order", async () => {
    const result = await mapWithConcurrency([30, 10, 20, 0], 4, async (ms) => {
      await tick(ms);
      return ms * 2;
    });
    expect(result).toEqual([60, 20, 40, 0]);
  });

  it("never runs more than `width` calls at once", async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(5);
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  it("handles an empty input", async () => {
    expect(await mapWithConcurrency([], 8, async () => 1)).toEqual([]);
  });

  it("passes the item index", async () => {
    expect(await mapWithConcurrency(["a", "b"], 1, async (s, i) => `${i}:${s}`)).toEqual(["0:a", "1:b"]);
  });
});
