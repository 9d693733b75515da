import { describe, test, expect, vi } from "vitest";
import { backoffDelay, isRetryableError, sleep, withRetry } from "../src/utils/retry.js";

const FAST = { initialDelayMs: 1, maxDelayMs: 2, maxTotalDelayMs: 10 };

describe("withRetry", () => {
  test("returns once a later attempt succeeds", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).resolves.toBe("ok");
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  test("rethrows the last error at the attempt cap", async () => {
    let calls = 0;
    const run = withRetry(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { ...FAST, maxAttempts: 3 }
    );
    await expect(run).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  test("does not retry when shouldRetry says no", async () => {
    let calls = 0;
    const run = withRetry(
      async () => {
        calls++;
        throw new Error("fatal");
      },
      { ...FAST, maxAttempts: 5, shouldRetry: () => false }
    );
    await expect(run).rejects.toThrow("fatal");
    expect(calls).toBe(1);
  });

  test("caps the total time spent waiting", async () => {
    const delays: number[] = [];
    const run = withRetry(
      async () => {
        throw new Error("busy");
      },
      {
        maxAttempts: 4,
        initialDelayMs: 2,
        maxDelayMs: 3,
        maxTotalDelayMs: 4,
        onRetry: ({ delayMs }) => delays.push(delayMs),
      }
    );
    await expect(run).rejects.toThrow("busy");
    expect(delays).toEqual([2, 2, 0]);
  });

  test("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stopped"));
    const fn = vi.fn(async () => "never");
    await expect(withRetry(fn, { signal: controller.signal })).rejects.toThrow("stopped");
    expect(fn).not.toHaveBeenCalled();
  });

  test("abandons the wait between attempts on abort", async () => {
    const controller = new AbortController();
    const run = withRetry(
      async () => {
        setTimeout(() => controller.abort(), 5);
        throw new Error("timeout");
      },
      { maxAttempts: 3, initialDelayMs: 60_000, signal: controller.signal }
    );
    const error = await run.catch((err: unknown) => err);
    expect(error instanceof Error && error.name).toBe("AbortError");
  });
});

describe("sleep", () => {
  test("rejects immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toBeDefined();
  });
});

describe("backoffDelay", () => {
  test("doubles up to the maximum", () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n, 1000, 10_000))).toEqual([
      1000, 2000, 4000, 8000, 10_000,
    ]);
  });
});

describe("isRetryableError", () => {
  test("recognises transient failures", () => {
    expect(isRetryableError(new Error("Request timed out"))).toBe(true);
    expect(isRetryableError(new Error("read ECONNRESET"))).toBe(true);
    expect(isRetryableError(new Error("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND") }))).toBe(
      true
    );
  });

  test("rejects everything else", () => {
    expect(isRetryableError(new Error("invalid api key"))).toBe(false);
    expect(isRetryableError("timeout")).toBe(false);
  });
});
