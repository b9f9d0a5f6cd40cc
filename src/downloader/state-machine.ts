import type { AxiosInstance } from "axios";
import chalk from "chalk";
import fs from "fs";
import type { FileHandle } from "fs/promises";
import { logger } from "../utils/logger.js";
import type { AggregateTracker } from "./aggregate-tracker.js";
import {
  DownloaderError,
  FileSystemError,
  HttpError,
  NetworkError,
  ThrottledError,
  errorMessage,
} from "./errors.js";
import {
  HTTP_RANGE_NOT_SATISFIABLE,
  HTTP_TOO_MANY_REQUESTS,
  discardBody,
  headerValue,
  isByteStream,
  isSuccess,
  parseContentLength,
  parseContentRangeTotal,
  sendRequest,
} from "./http.js";
import { FETCH_BACKOFF, throttleDelay } from "./retry.js";
import type { SizeProbe } from "./size-probe.js";
import type {
  DownloadJob,
  DownloadObserver,
  JobOutcome,
  JobResult,
  RetryPolicy,
} from "./types.js";

type AttemptResult =
  | { kind: "done"; result: JobResult }
  | { kind: "throttled"; retryAfter: string | undefined };

/**
 * Download State Machine
 *
 * CheckExists → ProbeSize → ResumeCheck → StreamFetch → StreamWrite → Finalize
 *
 * A 429 on the fetch restarts the whole sequence from CheckExists after a
 * backoff pause. Any other error is thrown to the caller, leaving the
 * partial file in place for the next run.
 */
export class DownloadStateMachine {
  private client: AxiosInstance;
  private sizeProbe: SizeProbe;
  private tracker: AggregateTracker;
  private policy: RetryPolicy;
  private observer?: DownloadObserver;

  constructor(
    client: AxiosInstance,
    sizeProbe: SizeProbe,
    tracker: AggregateTracker,
    policy: RetryPolicy,
    observer?: DownloadObserver,
  ) {
    this.client = client;
    this.sizeProbe = sizeProbe;
    this.tracker = tracker;
    this.policy = policy;
    this.observer = observer;
  }

  async run(job: DownloadJob): Promise<JobResult> {
    for (let attempt = 1; ; attempt++) {
      const step = await this.attempt(job);
      if (step.kind === "done") {
        return step.result;
      }

      if (attempt > this.policy.maxRetries) {
        throw new ThrottledError(job.url, attempt);
      }
      const delay = throttleDelay(
        attempt,
        step.retryAfter,
        FETCH_BACKOFF,
        this.policy,
      );
      logger.debug(
        chalk.yellow(`GET ${job.url} throttled, restarting in ${delay}ms`),
      );
      this.observer?.onJobRetry?.(job, delay, attempt);
      await this.policy.sleep(delay);
    }
  }

  private async attempt(job: DownloadJob): Promise<AttemptResult> {
    // CheckExists
    if (fs.existsSync(job.destPath)) {
      this.tracker.recordFinished();
      return this.done(job, "skipped", 0);
    }

    // ProbeSize
    job.expectedSize = await this.sizeProbe.probe(job.url, (delay, attempt) =>
      this.observer?.onJobRetry?.(job, delay, attempt),
    );

    // ResumeCheck
    job.resumeOffset = await fileSize(job.tempPath);
    this.observer?.onJobSize?.(job);

    if (job.expectedSize > 0 && job.resumeOffset >= job.expectedSize) {
      logger.debug(
        chalk.gray(`${job.fileName}: partial file already complete`),
      );
      await this.finalize(job);
      return this.done(job, "resumed", 0);
    }

    // StreamFetch
    const response = await sendRequest(this.client, {
      url: job.url,
      method: "GET",
      headers: { Range: `bytes=${job.resumeOffset}-` },
      responseType: "stream",
    });

    if (response.status === HTTP_TOO_MANY_REQUESTS) {
      discardBody(response.data);
      return {
        kind: "throttled",
        retryAfter: headerValue(response.headers, "retry-after"),
      };
    }

    // The partial file already holds the whole resource. With offset 0
    // this is an empty file, answered "bytes */0".
    if (
      response.status === HTTP_RANGE_NOT_SATISFIABLE &&
      parseContentRangeTotal(response.headers) === job.resumeOffset
    ) {
      discardBody(response.data);
      job.expectedSize = job.resumeOffset;
      this.tracker.countOnce(job.url, job.expectedSize);
      if (job.resumeOffset === 0) {
        await touch(job.tempPath);
      }
      await this.finalize(job);
      return this.done(
        job,
        job.resumeOffset > 0 ? "resumed" : "completed",
        0,
      );
    }

    if (!isSuccess(response.status)) {
      discardBody(response.data);
      throw new HttpError(response.status, response.statusText, job.url);
    }

    let append = true;
    if (response.status !== 206 && job.resumeOffset > 0) {
      logger.debug(
        chalk.yellow(
          `${job.fileName}: server ignored Range, restarting from byte 0`,
        ),
      );
      job.resumeOffset = 0;
      append = false;
    }

    if (job.expectedSize === 0) {
      const declared = declaredTotal(response.headers, job.resumeOffset);
      if (declared !== undefined && declared > 0) {
        this.tracker.countOnce(job.url, declared);
        job.expectedSize = declared;
        this.observer?.onJobSize?.(job);
      }
    }

    // StreamWrite
    const written = await this.writeBody(job, response.data, append);
    const received = job.resumeOffset + written;
    if (job.expectedSize > 0 && received < job.expectedSize) {
      throw new NetworkError(
        `Connection closed after ${received} of ${job.expectedSize} bytes (${job.url})`,
      );
    }

    // Finalize
    await this.finalize(job);
    return this.done(
      job,
      job.resumeOffset > 0 ? "resumed" : "completed",
      written,
    );
  }

  private async writeBody(
    job: DownloadJob,
    body: unknown,
    append: boolean,
  ): Promise<number> {
    if (!isByteStream(body)) {
      discardBody(body);
      throw new NetworkError(`Response body is not a stream (${job.url})`);
    }

    let handle: FileHandle;
    try {
      handle = await fs.promises.open(job.tempPath, append ? "a" : "w");
    } catch (error) {
      discardBody(body);
      throw new FileSystemError("open", job.tempPath, error);
    }

    let written = 0;
    try {
      for await (const chunk of body) {
        try {
          await handle.write(chunk);
        } catch (error) {
          throw new FileSystemError("write", job.tempPath, error);
        }
        written += chunk.length;
        this.observer?.onJobProgress?.(job, job.resumeOffset + written);
      }
    } catch (error) {
      discardBody(body);
      // the write or stream error is the one reported
      await handle.close().catch((closeError: unknown) => {
        logger.debug(
          chalk.gray(`Could not close ${job.tempPath}: ${errorMessage(closeError)}`),
        );
      });
      if (error instanceof DownloaderError) {
        throw error;
      }
      throw new NetworkError(
        `Response stream failed: ${errorMessage(error)} (${job.url})`,
        { cause: error },
      );
    }

    try {
      await handle.close();
    } catch (error) {
      throw new FileSystemError("close", job.tempPath, error);
    }
    return written;
  }

  private async finalize(job: DownloadJob): Promise<void> {
    try {
      await fs.promises.rename(job.tempPath, job.destPath);
    } catch (error) {
      throw new FileSystemError("rename", job.tempPath, error);
    }
    this.tracker.recordFinished();
  }

  private done(
    job: DownloadJob,
    outcome: JobOutcome,
    bytesWritten: number,
  ): AttemptResult {
    return {
      kind: "done",
      result: {
        job,
        outcome,
        bytesWritten,
        totalBytes: Math.max(job.expectedSize, job.resumeOffset + bytesWritten),
      },
    };
  }
}

/**
 * Byte length of a partial file, 0 when it does not exist
 */
export async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return 0;
    }
    throw new FileSystemError("stat", filePath, error);
  }
}

/**
 * Create an empty file, or leave an existing one as it is
 */
async function touch(filePath: string): Promise<void> {
  try {
    const handle = await fs.promises.open(filePath, "a");
    await handle.close();
  } catch (error) {
    throw new FileSystemError("open", filePath, error);
  }
}

/**
 * Full resource size as declared by a fetch response
 */
function declaredTotal(
  headers: Parameters<typeof parseContentLength>[0],
  offset: number,
): number | undefined {
  const rangeTotal = parseContentRangeTotal(headers);
  if (rangeTotal !== undefined) {
    return rangeTotal;
  }
  const length = parseContentLength(headers);
  return length === undefined ? undefined : offset + length;
}
