/**
 * Base error for everything the download engine raises.
 */
export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The request never produced a response (DNS, refused connection, reset).
 */
export class NetworkError extends DownloaderError {
  constructor(message = "Network error", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The server answered with a non-2xx status other than 429.
 */
export class HttpError extends DownloaderError {
  public statusCode: number;
  public statusText: string;
  public url: string;

  constructor(statusCode: number, statusText: string, url: string) {
    super(`HTTP ${statusCode} ${statusText}`.trim() + ` (${url})`);
    this.statusCode = statusCode;
    this.statusText = statusText;
    this.url = url;
  }
}

/**
 * The server kept answering 429 after the retry budget was spent.
 */
export class ThrottledError extends DownloaderError {
  public url: string;
  public attempts: number;

  constructor(url: string, attempts: number) {
    super(`Still throttled after ${attempts} attempts (${url})`);
    this.url = url;
    this.attempts = attempts;
  }
}

export type FileSystemOperation =
  | "stat"
  | "open"
  | "write"
  | "close"
  | "rename"
  | "mkdir";

/**
 * A filesystem call failed while preparing, writing or finalizing a file.
 */
export class FileSystemError extends DownloaderError {
  public operation: FileSystemOperation;
  public path: string;

  constructor(operation: FileSystemOperation, path: string, cause: unknown) {
    super(`Failed to ${operation} ${path}: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
    this.path = path;
  }
}

/**
 * The terminal progress display could not be set up. Fatal to the run.
 */
export class ProgressSetupError extends DownloaderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
