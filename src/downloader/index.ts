/**
 * Download Engine
 *
 * Bounded-concurrency batch downloader with resume and throttle handling.
 *
 * Usage:
 *   import { Scheduler } from "./src/downloader/index.js";
 *
 *   const scheduler = new Scheduler({ dest: "./downloads", workers: 4 });
 *   const summary = await scheduler.run(["https://example.com/a.bin"]);
 */

// Main classes
export { Scheduler, prepareDestination, DEFAULT_USER_AGENT } from "./scheduler.js";
export { DownloadStateMachine } from "./state-machine.js";
export { SizeProbe } from "./size-probe.js";
export { AggregateTracker } from "./aggregate-tracker.js";

// Helpers
export { createDownloadJob, fileNameFromUrl } from "./download-job.js";
export { createHttpClient } from "./http.js";
export { DEFAULT_MAX_RETRIES } from "./retry.js";

// Errors
export {
  DownloaderError,
  NetworkError,
  HttpError,
  ThrottledError,
  FileSystemError,
  ProgressSetupError,
  errorMessage,
} from "./errors.js";

// Types
export type {
  DownloadJob,
  JobOutcome,
  JobResult,
  AggregateSnapshot,
  DownloadObserver,
  DownloaderOptions,
  RetryPolicy,
  RunSummary,
} from "./types.js";
