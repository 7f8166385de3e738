import { mapWithConcurrency } from "../concurrency";

describe("mapWithConcurrency", () => {
  it("keeps input order and the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight -= 1;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });

  it("stops starting work after a failure", async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([1, 2, 3, 4], 1, async (item) => {
      started.push(item);
      if (item === 2) {
        throw new Error("item 2 failed");
      }
      return item;
    });

    await expect(run).rejects.toThrow("item 2 failed");
    expect(started).toEqual([1, 2]);
  });
});
