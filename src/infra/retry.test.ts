import { describe, it, expect, vi } from "vitest";
import { withRetry, isTransientError } from "./retry.js";
import { AuthenticationError, SourceError, TimeoutError, TransientProviderError } from "./errors.js";

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

describe("isTransientError", () => {
  it("accepts transient provider errors and timeouts", () => {
    expect(isTransientError(new TransientProviderError("HTTP 500", "gmail", 500))).toBe(true);
    expect(isTransientError(new TimeoutError("fetch", 10))).toBe(true);
  });

  it("rejects auth and other errors", () => {
    expect(isTransientError(new AuthenticationError("bad token", "gmail"))).toBe(false);
    expect(isTransientError(new SourceError("HTTP 404", "gmail"))).toBe(false);
    expect(isTransientError(new Error("plain"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first success without sleeping", async () => {
    const { sleep, delays } = recordingSleep();
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(withRetry(fn, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("retries transient failures with 1s then 2s backoff", async () => {
    const { sleep, delays } = recordingSleep();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TransientProviderError("HTTP 503", "telegram", 503))
      .mockRejectedValueOnce(new TransientProviderError("HTTP 429", "telegram", 429))
      .mockResolvedValue("third time");
    await expect(withRetry(fn, { sleep })).resolves.toBe("third time");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it("gives up after three attempts", async () => {
    const { sleep } = recordingSleep();
    const err = new TransientProviderError("HTTP 500", "gmail", 500);
    const fn = vi.fn().mockRejectedValue(err);
    await expect(withRetry(fn, { sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("never retries authentication failures", async () => {
    const { sleep, delays } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(new AuthenticationError("HTTP 401", "linkedin"));
    await expect(withRetry(fn, { sleep })).rejects.toThrow(AuthenticationError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("reports each retry", async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TimeoutError("fetch", 10))
      .mockResolvedValue(1);
    await withRetry(fn, { sleep, onRetry });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
    expect(onRetry.mock.calls[0]?.[2]).toBe(1000);
  });
});
