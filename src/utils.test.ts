import { describe, it, expect, vi, afterEach } from "vitest";
import { capitalize, sleep, truncate, withTimeout } from "./utils.js";
import { TimeoutError } from "./infra/errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("truncate", () => {
  it("returns short text unchanged", () => {
    expect(truncate("hello", 10)).toBe("hello");
  });

  it("adds an ellipsis within the limit", () => {
    expect(truncate("hello world", 8)).toBe("hello...");
  });

  it("hard-cuts very small limits", () => {
    expect(truncate("hello", 3)).toBe("hel");
    expect(truncate("hello", 0)).toBe("");
  });
});

describe("capitalize", () => {
  it("uppercases the first letter", () => {
    expect(capitalize("linkedin")).toBe("Linkedin");
    expect(capitalize("")).toBe("");
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(500).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });
});

describe("withTimeout", () => {
  it("passes through a result that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 100, "op")).resolves.toBe(7);
  });

  it("rejects with TimeoutError when the promise is too slow", async () => {
    vi.useFakeTimers();
    const slow = new Promise<number>(() => {});
    const raced = withTimeout(slow, 1000, "slow op");
    const assertion = expect(raced).rejects.toThrow(TimeoutError);
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it("propagates the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 100, "op")).rejects.toThrow("boom");
  });
});
