import { describe, test, expect } from "vitest";
import { RetryExhaustedError } from "@refseq-db/core";
import {
  DOWNLOAD_RETRY_POLICY,
  EXTRACT_RETRY_POLICY,
  type RetryPolicy,
  getRetryDelay,
  withRetry,
} from "./retry";

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe("DOWNLOAD_RETRY_POLICY", () => {
  test("allows three attempts", () => {
    expect(DOWNLOAD_RETRY_POLICY.maxAttempts).toBe(3);
  });

  test("backs off 2^attempt * 50 seconds", () => {
    expect(getRetryDelay(1, DOWNLOAD_RETRY_POLICY)).toBe(100_000);
    expect(getRetryDelay(2, DOWNLOAD_RETRY_POLICY)).toBe(200_000);
    expect(getRetryDelay(3, DOWNLOAD_RETRY_POLICY)).toBe(400_000);
  });
});

describe("getRetryDelay", () => {
  test("never returns a negative delay", () => {
    const policy: RetryPolicy = { maxAttempts: 2, backoffMs: () => -5 };
    expect(getRetryDelay(1, policy)).toBe(0);
  });
});

describe("withRetry", () => {
  test("returns the first successful result without sleeping", async () => {
    const { delays, sleep } = recordingSleep();

    const result = await withRetry(async () => "ok", { policy: DOWNLOAD_RETRY_POLICY, sleep });

    expect(result).toBe("ok");
    expect(delays).toEqual([]);
  });

  test("sleeps 100s then 200s across three failures and gives up", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const attempt = withRetry(
      async () => {
        calls++;
        throw new Error("HTTP 503");
      },
      { policy: DOWNLOAD_RETRY_POLICY, sleep }
    );

    await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(calls).toBe(3);
    expect(delays).toEqual([100_000, 200_000]);
  });

  test("exposes the last error and attempt count", async () => {
    const { sleep } = recordingSleep();
    let calls = 0;

    const error = await withRetry(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { policy: EXTRACT_RETRY_POLICY, sleep }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(2);
      expect(error.lastError.message).toBe("failure 2");
    }
  });

  test("passes the 1-based attempt number to the callback", async () => {
    const { sleep } = recordingSleep();
    const seen: number[] = [];

    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) throw new Error("not yet");
        return attempt;
      },
      { policy: DOWNLOAD_RETRY_POLICY, sleep }
    );

    expect(seen).toEqual([1, 2]);
  });

  test("reports each retry before sleeping", async () => {
    const { sleep } = recordingSleep();
    const retries: Array<[number, number, string]> = [];

    await withRetry(
      async (attempt) => {
        if (attempt === 1) throw new Error("reset");
        return true;
      },
      {
        policy: DOWNLOAD_RETRY_POLICY,
        sleep,
        onRetry: (attempt, delayMs, error) => retries.push([attempt, delayMs, error.message]),
      }
    );

    expect(retries).toEqual([[1, 100_000, "reset"]]);
  });

  test("stops immediately once the signal is aborted", async () => {
    const { delays, sleep } = recordingSleep();
    const controller = new AbortController();
    let calls = 0;

    const attempt = withRetry(
      async () => {
        calls++;
        controller.abort(new Error("interrupted"));
        throw new Error("aborted mid-transfer");
      },
      { policy: DOWNLOAD_RETRY_POLICY, sleep, signal: controller.signal }
    );

    await expect(attempt).rejects.toThrow("aborted mid-transfer");
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });
});
