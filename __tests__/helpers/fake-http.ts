/**
 * In-process HTTP stand-in for the download engine tests.
 *
 * Builds an axios instance whose adapter answers from registered files,
 * honoring Range requests, so no test opens a socket.
 */
import axios, { AxiosError } from "axios";
import type {
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";

export interface RecordedRequest {
  method: string;
  url: string;
  range?: string;
}

export interface FakeReply {
  status: number;
  headers?: Record<string, string>;
  body?: Buffer;
  /** Reject like a dropped connection instead of answering */
  networkError?: string;
}

export interface FakeFileOptions {
  /** HEAD answers without content-length */
  omitHeadLength?: boolean;
  /** GET ignores Range and always sends the whole body with 200 */
  ignoreRange?: boolean;
  /** GET declares the full length but sends only this many bytes */
  truncateAt?: number;
  /** Delay before every GET answer */
  delayMs?: number;
}

const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  206: "Partial Content",
  404: "Not Found",
  416: "Range Not Satisfiable",
  429: "Too Many Requests",
  500: "Internal Server Error",
};

type Handler = (request: RecordedRequest) => Promise<FakeReply> | FakeReply;

export class FakeServer {
  readonly requests: RecordedRequest[] = [];
  private handlers = new Map<string, Handler>();
  private queued = new Map<string, FakeReply[]>();

  /**
   * Serve `body` at `url` for HEAD and GET
   */
  file(url: string, body: Buffer | string, options: FakeFileOptions = {}): this {
    const data = typeof body === "string" ? Buffer.from(body) : body;
    this.handlers.set(url, async (request): Promise<FakeReply> => {
      if (request.method === "HEAD") {
        return {
          status: 200,
          headers: options.omitHeadLength
            ? {}
            : { "content-length": String(data.length) },
        };
      }

      if (options.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, options.delayMs));
      }

      const offset = parseRange(request.range);
      if (offset === undefined || options.ignoreRange) {
        return {
          status: 200,
          headers: { "content-length": String(data.length) },
          body: truncate(data, options.truncateAt),
        };
      }

      if (offset >= data.length) {
        return {
          status: 416,
          headers: { "content-range": `bytes */${data.length}` },
        };
      }

      return {
        status: 206,
        headers: {
          "content-length": String(data.length - offset),
          "content-range": `bytes ${offset}-${data.length - 1}/${data.length}`,
        },
        body: truncate(data.subarray(offset), options.truncateAt),
      };
    });
    return this;
  }

  /**
   * Answer every request to `url` with the same reply
   */
  always(url: string, reply: FakeReply): this {
    this.handlers.set(url, () => reply);
    return this;
  }

  /**
   * Answer the next `method` request to `url` with `reply`, before the
   * regular handler takes over
   */
  enqueue(url: string, method: "HEAD" | "GET", reply: FakeReply): this {
    const key = `${method} ${url}`;
    const list = this.queued.get(key) ?? [];
    list.push(reply);
    this.queued.set(key, list);
    return this;
  }

  count(method: "HEAD" | "GET", url?: string): number {
    return this.requests.filter(
      (r) => r.method === method && (url === undefined || r.url === url),
    ).length;
  }

  client(): AxiosInstance {
    return axios.create({
      adapter: (config) => this.handle(config),
    });
  }

  private async handle(
    config: InternalAxiosRequestConfig,
  ): Promise<AxiosResponse> {
    const method = (config.method ?? "get").toUpperCase();
    const url = config.url ?? "";
    const rangeHeader = config.headers.get("Range");
    const request: RecordedRequest = {
      method,
      url,
      range: typeof rangeHeader === "string" ? rangeHeader : undefined,
    };
    this.requests.push(request);

    const reply = await this.reply(request);
    if (reply.networkError) {
      throw new AxiosError(reply.networkError, "ECONNRESET", config);
    }

    return {
      status: reply.status,
      statusText: STATUS_TEXT[reply.status] ?? "",
      headers: reply.headers ?? {},
      data: method === "HEAD" ? "" : Readable.from([reply.body ?? Buffer.alloc(0)]),
      config,
    };
  }

  private async reply(request: RecordedRequest): Promise<FakeReply> {
    const queue = this.queued.get(`${request.method} ${request.url}`);
    const next = queue?.shift();
    if (next) {
      return next;
    }
    const handler = this.handlers.get(request.url);
    if (!handler) {
      return { status: 404 };
    }
    return handler(request);
  }
}

function parseRange(range: string | undefined): number | undefined {
  const match = range ? /^bytes=(\d+)-$/.exec(range) : null;
  return match?.[1] ? parseInt(match[1], 10) : undefined;
}

function truncate(data: Buffer, at: number | undefined): Buffer {
  return at === undefined ? data : data.subarray(0, at);
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), "mfdl-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** Resolves immediately; records the requested delays */
export function instantSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
