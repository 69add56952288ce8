import { describe, it } from "node:test";
import assert from "node:assert";
import {
  backoffDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  withRetry,
  withTimeout,
} from "../../src/lib/retry";
import { NetworkError, TimeoutError } from "../../src/errors/app.errors";

const noSleep = (delays: number[]) => async (ms: number): Promise<void> => {
  delays.push(ms);
};

describe("Retry policy", () => {
  describe("backoffDelay", () => {
    it("should grow exponentially and cap at maxDelayMs", () => {
      assert.strictEqual(backoffDelay(DEFAULT_RETRY_POLICY, 1), 250);
      assert.strictEqual(backoffDelay(DEFAULT_RETRY_POLICY, 2), 500);
      assert.strictEqual(backoffDelay(DEFAULT_RETRY_POLICY, 3), 1000);
      assert.strictEqual(backoffDelay(DEFAULT_RETRY_POLICY, 10), 5000);
    });
  });

  describe("createRetryPolicy", () => {
    it("should merge overrides over the defaults", () => {
      assert.deepStrictEqual(createRetryPolicy({ maxAttempts: 5 }), {
        maxAttempts: 5,
        baseDelayMs: 250,
        maxDelayMs: 5000,
        exponentialBase: 2,
        timeoutMs: 5000,
      });
    });
  });

  describe("withTimeout", () => {
    it("should resolve when the call finishes in time", async () => {
      assert.strictEqual(await withTimeout(async () => 42, 1000, "fast"), 42);
    });

    it("should reject with TimeoutError past the deadline", async () => {
      await assert.rejects(
        withTimeout(() => new Promise<number>((resolve) => setTimeout(() => resolve(1), 200)), 10, "slow"),
        (err: unknown) => err instanceof TimeoutError && err.message === "slow timed out after 10ms",
      );
    });

    it("should skip the deadline when timeoutMs is 0", async () => {
      assert.strictEqual(await withTimeout(async () => "ok", 0, "none"), "ok");
    });
  });

  describe("withRetry", () => {
    it("should retry recoverable errors with backoff", async () => {
      const delays: number[] = [];
      let calls = 0;
      const result = await withRetry(
        async () => {
          calls += 1;
          if (calls < 3) throw new NetworkError("ECONNRESET");
          return "done";
        },
        DEFAULT_RETRY_POLICY,
        { label: "test", sleep: noSleep(delays) },
      );
      assert.strictEqual(result, "done");
      assert.strictEqual(calls, 3);
      assert.deepStrictEqual(delays, [250, 500]);
    });

    it("should not retry non-recoverable errors", async () => {
      const delays: number[] = [];
      let calls = 0;
      await assert.rejects(
        withRetry(
          async () => {
            calls += 1;
            throw new Error("invalid signature");
          },
          DEFAULT_RETRY_POLICY,
          { label: "test", sleep: noSleep(delays) },
        ),
        /invalid signature/,
      );
      assert.strictEqual(calls, 1);
      assert.deepStrictEqual(delays, []);
    });

    it("should throw the last error after maxAttempts", async () => {
      const delays: number[] = [];
      let calls = 0;
      await assert.rejects(
        withRetry(
          async () => {
            calls += 1;
            throw new NetworkError(`attempt ${calls}`);
          },
          createRetryPolicy({ maxAttempts: 2 }),
          { label: "test", sleep: noSleep(delays) },
        ),
        /attempt 2/,
      );
      assert.strictEqual(calls, 2);
      assert.deepStrictEqual(delays, [250]);
    });

    it("should honour a custom shouldRetry", async () => {
      let calls = 0;
      await assert.rejects(
        withRetry(
          async () => {
            calls += 1;
            throw new NetworkError("no orderbook exists");
          },
          DEFAULT_RETRY_POLICY,
          { label: "test", shouldRetry: () => false, sleep: noSleep([]) },
        ),
      );
      assert.strictEqual(calls, 1);
    });
  });
});
