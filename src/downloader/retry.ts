import type { RetryPolicy } from "./types.js";

export const DEFAULT_MAX_RETRIES = 8;
export const DEFAULT_MAX_DELAY_MS = 30_000;

/** Jitter window for a throttled HEAD, first attempt */
export const PROBE_BACKOFF = { minMs: 500, maxMs: 1500 } as const;

/** Jitter window for a throttled GET, first attempt */
export const FETCH_BACKOFF = { minMs: 1000, maxMs: 3000 } as const;

export interface BackoffWindow {
  minMs: number;
  maxMs: number;
}

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return {
    maxRetries: DEFAULT_MAX_RETRIES,
    maxDelayMs: DEFAULT_MAX_DELAY_MS,
    sleep,
    random: Math.random,
    ...overrides,
  };
}

/**
 * Jittered exponential backoff. Attempt 1 draws from the base window,
 * each later attempt doubles both bounds. The result never exceeds maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  window: BackoffWindow,
  maxDelayMs: number,
  random: () => number,
): number {
  const scale = 2 ** Math.max(0, attempt - 1);
  const low = window.minMs * scale;
  const high = window.maxMs * scale;
  const delay = Math.round(low + random() * (high - low));
  return Math.min(delay, maxDelayMs);
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns undefined when the header is missing or unreadable.
 */
export function parseRetryAfter(
  value: string | undefined,
  now: number = Date.now(),
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed === "") {
    return undefined;
  }

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Wait before the next throttled attempt, preferring the server's hint.
 */
export function throttleDelay(
  attempt: number,
  retryAfter: string | undefined,
  window: BackoffWindow,
  policy: RetryPolicy,
): number {
  const hinted = parseRetryAfter(retryAfter);
  if (hinted !== undefined) {
    return Math.min(hinted, policy.maxDelayMs);
  }
  return backoffDelay(attempt, window, policy.maxDelayMs, policy.random);
}
