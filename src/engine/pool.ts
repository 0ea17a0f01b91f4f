import { setTimeout as delay } from "timers/promises";
import { ExhaustedError, NotFoundError, TransferError } from "../utils/errors";

export interface RetryPolicy {
  /** Total tries per operation, the first one included */
  maxAttempts: number;
  /** Delay before retry `n` is `baseDelayMs * n` */
  baseDelayMs: number;
}

/**
 * Transient failures worth another try. A chunk the sender has not uploaded
 * yet and a chunk that arrived damaged both count; anything structural does not.
 */
export function isRetryable(error: unknown): boolean {
  if (!(error instanceof TransferError)) return false;
  switch (error.category) {
    case "NetworkFailure":
    case "HashMismatch":
      return true;
    case "NotFound":
      return error instanceof NotFoundError && error.reason === "chunk_pending";
    default:
      return false;
  }
}

export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      // An abort wins over whatever the interrupted request reported
      signal?.throwIfAborted();
      if (!isRetryable(error)) throw error;
      lastError = error;
      if (attempt < attempts) {
        const wait = policy.baseDelayMs * attempt;
        console.warn(
          `[engine] ${label} failed (attempt ${attempt}/${attempts}), retrying in ${wait}ms:`,
          error instanceof Error ? error.message : error
        );
        await delay(wait, undefined, { signal }).catch((delayError: unknown) => {
          signal?.throwIfAborted();
          throw delayError;
        });
      }
    }
  }
  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new ExhaustedError(`${label} failed after ${attempts} attempts: ${reason}`, attempts, lastError);
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. The first
 * failure stops new items from starting; in-flight ones are allowed to finish
 * and the first error is rethrown, unless `signal` fired, whose reason is.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const lane = async () => {
    while (!failed && next < items.length) {
      const item = items[next++];
      try {
        signal?.throwIfAborted();
        await worker(item);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
  if (failed) {
    signal?.throwIfAborted();
    throw firstError;
  }
}
