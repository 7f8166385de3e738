import { MAX_TIMEOUT_MS, TimeoutError, withTimeout } from "../withTimeout";

describe("withTimeout", () => {
  it("resolves with the task result before the deadline", async () => {
    await expect(withTimeout(async () => "done", 50, "fast")).resolves.toBe("done");
  });

  it("rejects and aborts the signal when the deadline passes", async () => {
    let aborted = false;
    const task = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          reject(signal.reason);
        });
      });

    const result = withTimeout(task, 10, "slow call");
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("slow call timed out after 10ms");
    expect(aborted).toBe(true);
  });

  it("clamps deadlines too large for a timer", async () => {
    const result = withTimeout(
      () => new Promise<string>((resolve) => setTimeout(() => resolve("finished"), 30)),
      MAX_TIMEOUT_MS + 1,
      "infer"
    );
    await expect(result).resolves.toBe("finished");
  });

  it("runs without a deadline when the timeout is zero", async () => {
    const result = withTimeout(
      (signal) => new Promise<boolean>((resolve) => setTimeout(() => resolve(signal.aborted), 20)),
      0
    );
    await expect(result).resolves.toBe(false);
  });
});
