import type { AggregateSnapshot, DownloadObserver } from "./types.js";

/**
 * Aggregate Tracker
 *
 * Shared state for a run: the byte total across all URLs, the set of URLs
 * whose size has been counted, and file counters. Every mutation is a
 * single synchronous method, so no other job can interleave between the
 * check and the update.
 */
export class AggregateTracker {
  private totalBytes = 0;
  private countedUrls = new Set<string>();
  private finishedFiles = 0;
  private failedFiles = 0;
  private readonly totalFiles: number;
  private readonly observer?: DownloadObserver;

  constructor(totalFiles: number, observer?: DownloadObserver) {
    this.totalFiles = totalFiles;
    this.observer = observer;
  }

  /**
   * Add `bytes` to the total unless this URL was already counted.
   * A non-positive size leaves the URL uncounted so a later response
   * that declares the length can still fold it in.
   *
   * @returns true when the bytes were added
   */
  countOnce(url: string, bytes: number): boolean {
    if (bytes <= 0 || this.countedUrls.has(url)) {
      return false;
    }
    this.countedUrls.add(url);
    this.totalBytes += bytes;
    this.notify();
    return true;
  }

  isCounted(url: string): boolean {
    return this.countedUrls.has(url);
  }

  /** A job reached Skipped or Finalized */
  recordFinished(): void {
    this.finishedFiles++;
    this.notify();
  }

  recordFailed(): void {
    this.failedFiles++;
    this.notify();
  }

  snapshot(): AggregateSnapshot {
    return {
      totalBytes: this.totalBytes,
      countedUrls: this.countedUrls.size,
      totalFiles: this.totalFiles,
      finishedFiles: this.finishedFiles,
      failedFiles: this.failedFiles,
    };
  }

  private notify(): void {
    this.observer?.onAggregateChange?.(this.snapshot());
  }
}
