import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withTimeout } from "../../src/util/timeout.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the promise's value", async () => {
    await expect(
      withTimeout(Promise.resolve("done"), 1000, () => new Error("late")),
    ).resolves.toBe("done");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("passes through the promise's rejection", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), 1000, () => new Error("late")),
    ).rejects.toThrow("boom");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects with the built error once the deadline passes", async () => {
    const onTimeout = vi.fn(() => new Error("took too long"));
    const pending = withTimeout(new Promise<string>(() => {}), 50, onTimeout);
    const assertion = expect(pending).rejects.toThrow("took too long");

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it("does not build the error when the promise wins", async () => {
    const onTimeout = vi.fn(() => new Error("late"));
    const pending = withTimeout(
      new Promise<number>(resolve => setTimeout(() => resolve(7), 10)),
      50,
      onTimeout,
    );

    await vi.advanceTimersByTimeAsync(10);
    await expect(pending).resolves.toBe(7);
    await vi.advanceTimersByTimeAsync(100);
    expect(onTimeout).not.toHaveBeenCalled();
  });
});
