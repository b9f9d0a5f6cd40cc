import type { AxiosInstance } from "axios";
import chalk from "chalk";
import { logger } from "../utils/logger.js";
import type { AggregateTracker } from "./aggregate-tracker.js";
import { HttpError, ThrottledError } from "./errors.js";
import {
  HTTP_TOO_MANY_REQUESTS,
  headerValue,
  isSuccess,
  parseContentLength,
  sendRequest,
} from "./http.js";
import { PROBE_BACKOFF, throttleDelay } from "./retry.js";
import type { RetryPolicy } from "./types.js";

export type ProbeRetryHook = (delayMs: number, attempt: number) => void;

/**
 * Size Probe
 *
 * Learns a file's byte length from a HEAD request and folds it into the
 * aggregate total the first time the URL is seen.
 */
export class SizeProbe {
  private client: AxiosInstance;
  private tracker: AggregateTracker;
  private policy: RetryPolicy;

  constructor(
    client: AxiosInstance,
    tracker: AggregateTracker,
    policy: RetryPolicy,
  ) {
    this.client = client;
    this.tracker = tracker;
    this.policy = policy;
  }

  /**
   * @returns the declared content length, or 0 when the server sends none
   */
  async probe(url: string, onRetry?: ProbeRetryHook): Promise<number> {
    for (let attempt = 1; ; attempt++) {
      const response = await sendRequest(this.client, {
        url,
        method: "HEAD",
      });

      if (response.status === HTTP_TOO_MANY_REQUESTS) {
        if (attempt > this.policy.maxRetries) {
          throw new ThrottledError(url, attempt);
        }
        const delay = throttleDelay(
          attempt,
          headerValue(response.headers, "retry-after"),
          PROBE_BACKOFF,
          this.policy,
        );
        logger.debug(
          chalk.yellow(`HEAD ${url} throttled, retrying in ${delay}ms`),
        );
        onRetry?.(delay, attempt);
        await this.policy.sleep(delay);
        continue;
      }

      if (!isSuccess(response.status)) {
        throw new HttpError(response.status, response.statusText, url);
      }

      const size = parseContentLength(response.headers) ?? 0;
      this.tracker.countOnce(url, size);
      return size;
    }
  }
}
