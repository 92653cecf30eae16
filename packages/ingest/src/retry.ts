import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError } from "@refseq-db/core";

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after failed attempt `attempt` (1-based), in milliseconds. */
  backoffMs(attempt: number): number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** 3 attempts; waits 2^attempt * 50 seconds after each failed one. */
export const DOWNLOAD_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: (attempt) => 2 ** attempt * 50 * 1000,
};

export const EXTRACT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  backoffMs: () => 0,
};

export const defaultSleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
};

export interface RetryOptions {
  policy: RetryPolicy;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
}

export function getRetryDelay(attempt: number, policy: RetryPolicy): number {
  return Math.max(0, policy.backoffMs(attempt));
}

/**
 * Runs `fn` until it resolves or the policy's attempt budget is spent.
 * No delay follows the final attempt. Aborts are rethrown immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (error) {
      if (signal?.aborted) throw error;
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < policy.maxAttempts) {
        const delayMs = getRetryDelay(attempt, policy);
        options.onRetry?.(attempt, delayMs, lastError);
        await sleep(delayMs, signal);
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError ?? new Error("Max retries exceeded"));
}
