import axios from "axios";
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import { Readable } from "stream";
import { NetworkError } from "./errors.js";

export const HTTP_TOO_MANY_REQUESTS = 429;
export const HTTP_RANGE_NOT_SATISFIABLE = 416;

/**
 * Shared axios instance for probes and fetches. No timeout: a job runs
 * until the server finishes or the connection drops.
 */
export function createHttpClient(userAgent: string): AxiosInstance {
  return axios.create({
    headers: { "User-Agent": userAgent },
    maxRedirects: 10,
    decompress: false,
  });
}

/**
 * Issue a request and hand back whatever status the server sent.
 * Only failures without a response are turned into errors.
 */
export async function sendRequest(
  client: AxiosInstance,
  config: AxiosRequestConfig & { url: string },
): Promise<AxiosResponse<unknown>> {
  try {
    return await client.request<unknown>({
      ...config,
      validateStatus: () => true,
    });
  } catch (error) {
    if (axios.isAxiosError(error)) {
      throw new NetworkError(`${error.message} (${config.url})`, {
        cause: error,
      });
    }
    throw error;
  }
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function headerValue(
  headers: AxiosResponse["headers"],
  name: string,
): string | undefined {
  const value: unknown = headers[name.toLowerCase()];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return undefined;
}

/**
 * content-length as a number, or undefined when absent or malformed
 */
export function parseContentLength(
  headers: AxiosResponse["headers"],
): number | undefined {
  const raw = headerValue(headers, "content-length");
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) {
    return undefined;
  }
  return parseInt(raw, 10);
}

/**
 * Total size from "bytes 0-99/1234" or "bytes * /1234"
 */
export function parseContentRangeTotal(
  headers: AxiosResponse["headers"],
): number | undefined {
  const raw = headerValue(headers, "content-range");
  if (raw === undefined) {
    return undefined;
  }
  const match = /\/(\d+)\s*$/.exec(raw);
  if (!match?.[1]) {
    return undefined;
  }
  return parseInt(match[1], 10);
}

export function isByteStream(value: unknown): value is AsyncIterable<Uint8Array> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value
  );
}

/**
 * Release the socket behind a response body we are not going to read.
 */
export function discardBody(data: unknown): void {
  if (data instanceof Readable) {
    data.destroy();
  }
}
