import type { AxiosInstance } from "axios";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import pLimit from "p-limit";
import { logger } from "../utils/logger.js";
import { formatBytes } from "../utils/format.js";
import { AggregateTracker } from "./aggregate-tracker.js";
import { createDownloadJob } from "./download-job.js";
import { DownloaderError, FileSystemError, errorMessage } from "./errors.js";
import { createHttpClient } from "./http.js";
import { createRetryPolicy } from "./retry.js";
import { SizeProbe } from "./size-probe.js";
import { DownloadStateMachine } from "./state-machine.js";
import type {
  DownloadJob,
  DownloadObserver,
  DownloaderOptions,
  JobResult,
  RetryPolicy,
  RunSummary,
} from "./types.js";

export const DEFAULT_USER_AGENT = "mfdl";

/**
 * Scheduler
 *
 * Runs one Download State Machine per URL:
 * 1. Prepares the destination directory (clean, then create)
 * 2. Creates one job per URL
 * 3. Runs jobs with at most `workers` in flight
 * 4. Collects every job's result, failures included
 */
export class Scheduler {
  private dest: string;
  private workers: number;
  private clean: boolean;
  private client: AxiosInstance;
  private policy: RetryPolicy;
  private observer?: DownloadObserver;

  constructor(options: DownloaderOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new DownloaderError(
        `Worker count must be a positive integer, got ${options.workers}`,
      );
    }

    this.dest = path.resolve(options.dest);
    this.workers = options.workers;
    this.clean = options.clean ?? false;
    this.client = options.client ?? createHttpClient(DEFAULT_USER_AGENT);
    this.observer = options.observer;

    const overrides: Partial<RetryPolicy> = {};
    if (options.maxRetries !== undefined) {
      overrides.maxRetries = options.maxRetries;
    }
    if (options.maxDelayMs !== undefined) {
      overrides.maxDelayMs = options.maxDelayMs;
    }
    if (options.sleep) {
      overrides.sleep = options.sleep;
    }
    if (options.random) {
      overrides.random = options.random;
    }
    this.policy = createRetryPolicy(overrides);
  }

  get destination(): string {
    return this.dest;
  }

  /**
   * Download every URL. Resolves once all jobs reached a terminal state.
   * Rejects only when the destination directory cannot be prepared.
   */
  async run(urls: readonly string[]): Promise<RunSummary> {
    const startTime = Date.now();

    // Barrier: no job touches the filesystem before this completes
    await prepareDestination(this.dest, this.clean);

    const tracker = new AggregateTracker(urls.length, this.observer);
    const sizeProbe = new SizeProbe(this.client, tracker, this.policy);
    const machine = new DownloadStateMachine(
      this.client,
      sizeProbe,
      tracker,
      this.policy,
      this.observer,
    );

    logger.debug(
      chalk.blue(`Starting ${urls.length} jobs with ${this.workers} workers`),
    );

    const limit = pLimit(this.workers);
    // Jobs that share a destination path run one after another
    const tails = new Map<string, Promise<unknown>>();

    const pending = urls.map((url, index) => {
      const job = createDownloadJob(index + 1, url, this.dest);
      const previous = tails.get(job.destPath) ?? Promise.resolve();
      const next = previous.then(() =>
        limit(() => this.runJob(job, machine, tracker)),
      );
      tails.set(job.destPath, next);
      return next;
    });

    const results = await Promise.all(pending);
    const snapshot = tracker.snapshot();

    return {
      results,
      totalFiles: urls.length,
      finishedFiles: snapshot.finishedFiles,
      skippedFiles: results.filter((r) => r.outcome === "skipped").length,
      failedFiles: snapshot.failedFiles,
      totalBytes: snapshot.totalBytes,
      totalSize: formatBytes(snapshot.totalBytes),
      destination: this.dest,
      workers: this.workers,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Job boundary: errors become a failed result and never reach siblings.
   */
  private async runJob(
    job: DownloadJob,
    machine: DownloadStateMachine,
    tracker: AggregateTracker,
  ): Promise<JobResult> {
    let result: JobResult;
    try {
      this.observer?.onJobStart?.(job);
      result = await machine.run(job);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error(
        chalk.red(`Error downloading file from ${job.url}: ${cause.message}`),
      );
      tracker.recordFailed();
      result = {
        job,
        outcome: "failed",
        bytesWritten: 0,
        totalBytes: job.expectedSize,
        error: cause,
      };
    }

    try {
      this.observer?.onJobFinish?.(result);
    } catch (error) {
      logger.warn(
        chalk.yellow(`Progress observer failed for ${job.url}: ${errorMessage(error)}`),
      );
    }
    return result;
  }
}

/**
 * Remove the destination when asked (best-effort), then always create it.
 */
export async function prepareDestination(
  dest: string,
  clean: boolean,
): Promise<void> {
  if (clean) {
    try {
      await fs.promises.rm(dest, { recursive: true, force: true });
      logger.debug(chalk.gray(`Cleaned destination ${dest}`));
    } catch (error) {
      logger.warn(
        chalk.yellow(`Could not clean ${dest}: ${errorMessage(error)}`),
      );
    }
  }

  try {
    await fs.promises.mkdir(dest, { recursive: true });
  } catch (error) {
    throw new FileSystemError("mkdir", dest, error);
  }
}
