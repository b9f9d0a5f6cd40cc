import { describe, expect, it } from "vitest";
import {
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  FETCH_BACKOFF,
  PROBE_BACKOFF,
  backoffDelay,
  createRetryPolicy,
  parseRetryAfter,
  throttleDelay,
} from "../../src/downloader/retry.js";

describe("retry", () => {
  describe("backoffDelay", () => {
    it("draws the first attempt from the base window", () => {
      expect(backoffDelay(1, PROBE_BACKOFF, 30_000, () => 0)).toBe(500);
      expect(backoffDelay(1, PROBE_BACKOFF, 30_000, () => 0.5)).toBe(1000);
      expect(backoffDelay(1, PROBE_BACKOFF, 30_000, () => 1)).toBe(1500);
    });

    it("doubles the window on each attempt", () => {
      expect(backoffDelay(2, PROBE_BACKOFF, 30_000, () => 0)).toBe(1000);
      expect(backoffDelay(3, PROBE_BACKOFF, 30_000, () => 0)).toBe(2000);
      expect(backoffDelay(3, FETCH_BACKOFF, 30_000, () => 1)).toBe(12_000);
    });

    it("never exceeds the cap", () => {
      expect(backoffDelay(10, PROBE_BACKOFF, 30_000, () => 1)).toBe(30_000);
      expect(backoffDelay(1, FETCH_BACKOFF, 1500, () => 0.9)).toBe(1500);
    });
  });

  describe("parseRetryAfter", () => {
    it("reads delta-seconds", () => {
      expect(parseRetryAfter("5")).toBe(5000);
      expect(parseRetryAfter(" 12 ")).toBe(12_000);
      expect(parseRetryAfter("0")).toBe(0);
    });

    it("reads an HTTP-date relative to now", () => {
      const now = Date.parse("Wed, 21 Oct 2015 07:28:00 GMT");
      expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:30 GMT", now)).toBe(30_000);
      expect(parseRetryAfter("Wed, 21 Oct 2015 07:27:00 GMT", now)).toBe(0);
    });

    it("returns undefined for a missing or unreadable header", () => {
      expect(parseRetryAfter(undefined)).toBeUndefined();
      expect(parseRetryAfter("")).toBeUndefined();
      expect(parseRetryAfter("soon")).toBeUndefined();
    });
  });

  describe("throttleDelay", () => {
    const policy = createRetryPolicy({ random: () => 0.25 });

    it("prefers the server's Retry-After", () => {
      expect(throttleDelay(1, "2", FETCH_BACKOFF, policy)).toBe(2000);
    });

    it("caps the server's Retry-After", () => {
      expect(throttleDelay(1, "120", FETCH_BACKOFF, policy)).toBe(30_000);
    });

    it("falls back to jittered backoff", () => {
      // attempt 2 → window 2000..6000
      expect(throttleDelay(2, undefined, FETCH_BACKOFF, policy)).toBe(3000);
      expect(throttleDelay(2, "later", FETCH_BACKOFF, policy)).toBe(3000);
    });
  });

  it("builds a policy from defaults and overrides", () => {
    const policy = createRetryPolicy({ maxRetries: 2 });

    expect(policy.maxRetries).toBe(2);
    expect(policy.maxDelayMs).toBe(DEFAULT_MAX_DELAY_MS);
    expect(createRetryPolicy().maxRetries).toBe(DEFAULT_MAX_RETRIES);
  });
});
