import { describe, expect, it } from "vitest";
import { isRetryable, runPool, withRetry } from "../src/engine/pool";
import {
  ExhaustedError,
  HashMismatchError,
  IOFailureError,
  InvalidInputError,
  NetworkFailureError,
  NotFoundError,
} from "../src/utils/errors";

describe("isRetryable", () => {
  it("retries transient failures only", () => {
    expect(isRetryable(new NetworkFailureError("reset"))).toBe(true);
    expect(isRetryable(new HashMismatchError("bad chunk", "a", "b"))).toBe(true);
    expect(isRetryable(new NotFoundError("chunk_pending", "later"))).toBe(true);
    expect(isRetryable(new NotFoundError("transfer_unknown", "gone"))).toBe(false);
    expect(isRetryable(new InvalidInputError("bad id"))).toBe(false);
    expect(isRetryable(new IOFailureError("disk full"))).toBe(false);
    expect(isRetryable(new Error("plain"))).toBe(false);
  });
});

describe("withRetry", () => {
  const policy = { maxAttempts: 3, baseDelayMs: 1 };

  it("returns the first successful result", async () => {
    const attempts: number[] = [];

    const result = await withRetry("op", policy, async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new NetworkFailureError("reset");
      return "done";
    });

    expect(result).toBe("done");
    expect(attempts).toEqual([1, 2, 3]);
  });

  it("wraps the last error in Exhausted once attempts run out", async () => {
    const last = new NetworkFailureError("third reset");
    let calls = 0;

    const error = await withRetry("op", policy, async () => {
      calls++;
      throw calls === 3 ? last : new NetworkFailureError("reset");
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExhaustedError);
    expect(error).toMatchObject({ message: "op failed after 3 attempts: third reset" });
    expect(error instanceof ExhaustedError && error.cause).toBe(last);
  });

  it("does not retry terminal errors", async () => {
    let calls = 0;

    await expect(
      withRetry("op", policy, async () => {
        calls++;
        throw new InvalidInputError("bad");
      })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(calls).toBe(1);
  });
});

describe("runPool", () => {
  it("never exceeds the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;
    const done: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6], 2, async (item) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      done.push(item);
    });

    expect(peak).toBe(2);
    expect([...done].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("stops starting work after the first failure and rethrows it", async () => {
    const started: number[] = [];

    const error = await runPool([1, 2, 3, 4], 1, async (item) => {
      started.push(item);
      if (item === 2) throw new IOFailureError("disk full");
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IOFailureError);
    expect(started).toEqual([1, 2]);
  });

  it("handles an empty list", async () => {
    await expect(runPool([], 4, async () => undefined)).resolves.toBeUndefined();
  });
});
