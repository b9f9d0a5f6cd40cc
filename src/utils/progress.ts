import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import {
  ProgressSetupError,
  errorMessage,
} from "../downloader/errors.js";
import type {
  AggregateSnapshot,
  DownloadJob,
  DownloadObserver,
  JobResult,
} from "../downloader/types.js";
import { formatBytes } from "./format.js";

export const TOTAL_TASK = "Total";

/** Finished file bars stay on screen this long before they are removed */
const FINISHED_BAR_LINGER_MS = 750;
const PROGRESS_REDRAW_INTERVAL_MS = 100;

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;
const liveTasks = new Set<string>();
const lastRedraw = new Map<string, number>();

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    try {
      mpb = new MultiProgressBars({
        anchor: "bottom",
        persist: true,
        border: true,
        initMessage: " Download Progress ",
      });
    } catch (error) {
      throw new ProgressSetupError(
        `Could not start the progress display: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
  liveTasks.clear();
  lastRedraw.clear();
}

/**
 * Add the aggregate task (files done and total size)
 */
export function addTotalProgressTask(totalFiles: number): void {
  const bars = initProgressBars();
  bars.addTask(TOTAL_TASK, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalFiles} files (Total size: ${formatBytes(0)})`,
  });
  liveTasks.add(TOTAL_TASK);
}

export function updateTotalProgress(snapshot: AggregateSnapshot): void {
  if (!mpb || !liveTasks.has(TOTAL_TASK)) return;
  const done = snapshot.finishedFiles + snapshot.failedFiles;
  const failed =
    snapshot.failedFiles > 0 ? chalk.red(`, ${snapshot.failedFiles} failed`) : "";
  mpb.updateTask(TOTAL_TASK, {
    percentage: snapshot.totalFiles > 0 ? done / snapshot.totalFiles : 1,
    message: `${done}/${snapshot.totalFiles} files${failed} (Total size: ${formatBytes(snapshot.totalBytes)})`,
  });
}

/**
 * Add a per-file download task (Blue)
 */
export function addFileProgressTask(taskName: string): void {
  const bars = initProgressBars();
  bars.addTask(taskName, {
    type: "percentage",
    barTransformFn: chalk.blue,
    nameTransformFn: chalk.blue.bold,
    message: "Probing...",
  });
  liveTasks.add(taskName);
}

/**
 * Update per-file progress, redrawn at most every PROGRESS_REDRAW_INTERVAL_MS
 */
export function updateFileProgress(
  taskName: string,
  receivedBytes: number,
  totalBytes: number,
  force = false,
): void {
  if (!mpb || !liveTasks.has(taskName)) return;

  const now = Date.now();
  const last = lastRedraw.get(taskName) ?? 0;
  if (!force && now - last < PROGRESS_REDRAW_INTERVAL_MS) return;
  lastRedraw.set(taskName, now);

  const total = totalBytes > 0 ? formatBytes(totalBytes) : "?";
  mpb.updateTask(taskName, {
    percentage: totalBytes > 0 ? Math.min(1, receivedBytes / totalBytes) : 0,
    message: `${formatBytes(receivedBytes)}/${total}`,
  });
}

export function updateTaskMessage(taskName: string, message: string): void {
  if (!mpb || !liveTasks.has(taskName)) return;
  mpb.updateTask(taskName, { message });
}

/**
 * Mark a task as done
 */
export function markTaskDone(
  taskName: string,
  message?: string,
  colorFn?: (text: string) => string,
): void {
  if (!mpb || !liveTasks.has(taskName)) return;
  mpb.done(taskName, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}

/**
 * Remove a task from the progress bars
 */
export function removeProgressTask(taskName: string): void {
  if (!mpb || !liveTasks.has(taskName)) return;
  mpb.removeTask(taskName);
  liveTasks.delete(taskName);
  lastRedraw.delete(taskName);
}

export function jobTaskName(job: DownloadJob): string {
  return `${job.id}. ${job.fileName}`;
}

/**
 * Status line for a finished job
 */
export function describeOutcome(result: JobResult): {
  message: string;
  colorFn: (text: string) => string;
} {
  const size = formatBytes(result.totalBytes);
  switch (result.outcome) {
    case "skipped":
      return { message: "Exists ✔", colorFn: chalk.yellow };
    case "resumed":
      return { message: `Done ${size} ✔`, colorFn: chalk.cyan };
    case "completed":
      return { message: `Ok ${size} ✔`, colorFn: chalk.green };
    case "failed":
      return {
        message: `Failed: ${result.error?.message ?? "unknown error"}`,
        colorFn: chalk.red,
      };
  }
}

/**
 * Observer that renders the engine's events as progress bars
 */
export function createProgressObserver(totalFiles: number): DownloadObserver {
  initProgressBars();
  addTotalProgressTask(totalFiles);

  return {
    onJobStart(job) {
      addFileProgressTask(jobTaskName(job));
    },
    onJobSize(job) {
      updateFileProgress(
        jobTaskName(job),
        job.resumeOffset,
        job.expectedSize,
        true,
      );
    },
    onJobProgress(job, receivedBytes) {
      updateFileProgress(jobTaskName(job), receivedBytes, job.expectedSize);
    },
    onJobRetry(job, delayMs, attempt) {
      updateTaskMessage(
        jobTaskName(job),
        chalk.yellow(
          `Throttled, retry ${attempt} in ${(delayMs / 1000).toFixed(1)}s`,
        ),
      );
    },
    onJobFinish(result) {
      const taskName = jobTaskName(result.job);
      const { message, colorFn } = describeOutcome(result);
      markTaskDone(taskName, message, colorFn);
      if (result.outcome !== "failed") {
        setTimeout(
          () => removeProgressTask(taskName),
          FINISHED_BAR_LINGER_MS,
        ).unref();
      }
    },
    onAggregateChange(snapshot) {
      updateTotalProgress(snapshot);
    },
  };
}
