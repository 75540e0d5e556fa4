import { describe, it, expect, vi, afterEach } from "vitest";
import { TimeoutError, withTimeout } from "../../src/utils/timeout.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("passes through a value that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50)).resolves.toBe("ok");
  });

  it("rejects with TimeoutError once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 100, "miner-1");
    const outcome = expect(pending).rejects.toThrow(
      new TimeoutError("miner-1 timed out after 100ms")
    );

    await vi.advanceTimersByTimeAsync(100);

    await outcome;
  });

  it("keeps the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 50)).rejects.toThrow("boom");
  });
});
