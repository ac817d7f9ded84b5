/**
 * Retry Utility Unit Tests
 *
 * Backoff, retryable-error detection and the telemetry emitted around
 * retried LLM calls.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  withRetry,
  isRetryableError,
  calculateBackoffDelay,
  DEFAULT_RETRY_CONFIG,
} from "../../src/utils/retry.js";
import { setTestSink, TelemetryEvents, type TelemetryData } from "../../src/utils/telemetry.js";

const CONTEXT = { adapter: "openai", model: "gpt-4o-mini", operation: "dialogue" };

describe("Retry Utility", () => {
  describe("isRetryableError", () => {
    it.each([408, 429, 500, 502, 503, 504])("retries status %d", (status) => {
      expect(isRetryableError({ status, message: "upstream" })).toBe(true);
    });

    it.each([400, 401, 403, 404])("does not retry status %d", (statusCode) => {
      expect(isRetryableError({ statusCode, message: "client error" })).toBe(false);
    });

    it("retries on transient error messages", () => {
      expect(isRetryableError(new Error("Connection timeout"))).toBe(true);
      expect(isRetryableError(new Error("Rate limit exceeded"))).toBe(true);
      expect(isRetryableError(new Error("Server is overloaded"))).toBe(true);
      expect(isRetryableError(new Error("read ECONNRESET"))).toBe(true);
    });

    it("does not retry other errors", () => {
      expect(isRetryableError(new Error("Invalid input"))).toBe(false);
      expect(isRetryableError({ foo: "bar" })).toBe(false);
      expect(isRetryableError(null)).toBe(false);
    });
  });

  describe("calculateBackoffDelay", () => {
    it("doubles the base delay per attempt within the jitter band", () => {
      // 250ms, 500ms, 1000ms, each ±20%
      expect(calculateBackoffDelay(1)).toBeGreaterThanOrEqual(200);
      expect(calculateBackoffDelay(1)).toBeLessThanOrEqual(300);
      expect(calculateBackoffDelay(2)).toBeGreaterThanOrEqual(400);
      expect(calculateBackoffDelay(2)).toBeLessThanOrEqual(600);
      expect(calculateBackoffDelay(3)).toBeGreaterThanOrEqual(800);
      expect(calculateBackoffDelay(3)).toBeLessThanOrEqual(1200);
    });

    it("caps delay at maxDelayMs", () => {
      const delay = calculateBackoffDelay(10, DEFAULT_RETRY_CONFIG);
      expect(delay).toBeGreaterThanOrEqual(4000);
      expect(delay).toBeLessThanOrEqual(6000);
    });

    it("is exact without jitter", () => {
      expect(
        calculateBackoffDelay(2, { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, backoffFactor: 3, jitterPercent: 0 }),
      ).toBe(300);
    });
  });

  describe("withRetry", () => {
    let events: Array<{ name: string; data: TelemetryData }>;

    beforeEach(() => {
      events = [];
      setTestSink((name, data) => events.push({ name, data }));
      vi.useFakeTimers();
    });

    afterEach(() => {
      setTestSink(null);
      vi.useRealTimers();
    });

    it("returns the first success without telemetry", async () => {
      const fn = vi.fn().mockResolvedValue("reply");

      const promise = withRetry(fn, CONTEXT);
      await vi.runAllTimersAsync();

      expect(await promise).toBe("reply");
      expect(fn).toHaveBeenCalledTimes(1);
      expect(events).toEqual([]);
    });

    it("retries a retryable failure and reports the recovery", async () => {
      const fn = vi.fn().mockRejectedValueOnce({ status: 503, message: "Service unavailable" }).mockResolvedValue("reply");

      const promise = withRetry(fn, CONTEXT);
      await vi.runAllTimersAsync();

      expect(await promise).toBe("reply");
      expect(fn).toHaveBeenCalledTimes(2);
      expect(events.map((event) => event.name)).toEqual([TelemetryEvents.LlmRetry, TelemetryEvents.LlmRetrySuccess]);
      expect(events[0].data).toMatchObject({ ...CONTEXT, attempt: 1, max_attempts: 3 });
      expect(typeof events[0].data.delay_ms).toBe("number");
      expect(events[1].data).toMatchObject({ ...CONTEXT, total_attempts: 2 });
    });

    it("rethrows a non-retryable failure at once", async () => {
      const failure = { status: 400, message: "Bad request" };
      const fn = vi.fn().mockRejectedValue(failure);

      const promise = withRetry(fn, CONTEXT).catch((err: unknown) => err);
      await vi.runAllTimersAsync();

      expect(await promise).toBe(failure);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(events).toEqual([]);
    });

    it("gives up after the configured attempts", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("socket hang up"));

      const promise = withRetry(fn, CONTEXT, { ...DEFAULT_RETRY_CONFIG, maxAttempts: 2 }).catch((err: unknown) => err);
      await vi.runAllTimersAsync();

      const error = await promise;
      expect(error).toBeInstanceOf(Error);
      expect(fn).toHaveBeenCalledTimes(2);
      expect(events.map((event) => event.name)).toEqual([TelemetryEvents.LlmRetry, TelemetryEvents.LlmRetryExhausted]);
      expect(events[1].data).toMatchObject({ total_attempts: 2, error_message: "socket hang up" });
    });
  });
});
