/**
 * Type definitions for the download engine
 */

import type { AxiosInstance } from "axios";

/**
 * One URL to download, with the paths derived from it
 */
export interface DownloadJob {
  id: number;
  url: string;
  fileName: string;
  destPath: string;
  tempPath: string;
  resumeOffset: number;
  expectedSize: number;
}

/**
 * How a job ended
 * - skipped: destination already existed, nothing fetched
 * - resumed: finalized from a non-empty partial file
 * - completed: fetched from byte 0 and finalized
 * - failed: an error ended the job
 */
export type JobOutcome = "skipped" | "resumed" | "completed" | "failed";

export interface JobResult {
  job: DownloadJob;
  outcome: JobOutcome;
  bytesWritten: number;
  totalBytes: number;
  error?: Error;
}

/**
 * Read-only view of the shared aggregate state
 */
export interface AggregateSnapshot {
  totalBytes: number;
  countedUrls: number;
  totalFiles: number;
  finishedFiles: number;
  failedFiles: number;
}

/**
 * Hooks the engine calls as jobs progress. All optional.
 */
export interface DownloadObserver {
  onJobStart?: (job: DownloadJob) => void;
  onJobSize?: (job: DownloadJob) => void;
  onJobProgress?: (job: DownloadJob, receivedBytes: number) => void;
  onJobRetry?: (job: DownloadJob, delayMs: number, attempt: number) => void;
  onJobFinish?: (result: JobResult) => void;
  onAggregateChange?: (snapshot: AggregateSnapshot) => void;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Throttle retry settings shared by the size probe and the state machine
 */
export interface RetryPolicy {
  maxRetries: number;
  maxDelayMs: number;
  sleep: SleepFn;
  random: () => number;
}

/**
 * Options for the Scheduler
 */
export interface DownloaderOptions {
  dest: string;
  workers: number;
  clean?: boolean;
  maxRetries?: number;
  maxDelayMs?: number;
  client?: AxiosInstance;
  observer?: DownloadObserver;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Result of a Scheduler run
 */
export interface RunSummary {
  results: JobResult[];
  totalFiles: number;
  finishedFiles: number;
  skippedFiles: number;
  failedFiles: number;
  totalBytes: number;
  totalSize: string;
  destination: string;
  workers: number;
  durationMs: number;
}
