import {
  FatalAuthError,
  MalformedResponseError,
  RequestRejectedError,
  TransientFetchError
} from "../../core/crawl/crawl.errors";
import { parseRetryAfterMs } from "./retryAfter";

export type QueryValue = string | number | undefined;

export type JsonRequest = {
  method?: "GET" | "POST";
  path: string;     // relative to the base URL, or an absolute http(s) URL
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
};

export type RetailHttpClientOptions = {
  source: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
};

/**
 * JSON-over-HTTP for retailer APIs using native fetch. Every failure is mapped onto the crawl error
 * taxonomy so connectors can classify errors with `instanceof`. Retrying is the caller's job.
 */
export class RetailHttpClient {
  private readonly timeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    private readonly options: RetailHttpClientOptions
  ) {
    this.timeoutMs = options.timeoutMs ?? 8000;
  }

  buildUrl(path: string, query: Record<string, QueryValue> = {}): URL {
    const url = /^https?:\/\//.test(path) ? new URL(path) : new URL(this.baseUrl);
    if (!/^https?:\/\//.test(path)) {
      const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
      url.pathname = `${base}/${path.replace(/^\/+/, "")}`;
    }
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }
    return url;
  }

  async requestJson(req: JsonRequest): Promise<unknown> {
    const url = this.buildUrl(req.path, req.query);
    const safeUrl = `${url.origin}${url.pathname}${url.search}`;
    const context = { source: this.options.source, url: safeUrl };

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (req.signal?.aborted) {
      controller.abort();
    } else {
      req.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const headers: Record<string, string> = { accept: "application/json", ...this.options.headers, ...req.headers };
    let body: string | undefined;
    if (req.body !== undefined) {
      headers["content-type"] = "application/json; charset=UTF-8";
      body = JSON.stringify(req.body);
    }

    let res: Response;
    try {
      res = await fetch(url, { method: req.method ?? "GET", headers, body, signal: controller.signal });
    } catch (err) {
      if (timedOut) {
        throw new TransientFetchError(`${this.options.source} request timeout after ${this.timeoutMs}ms`, { context, cause: err });
      }
      if (req.signal?.aborted) throw err;
      throw new TransientFetchError(`${this.options.source} request failed: ${err instanceof Error ? err.message : String(err)}`, {
        context,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      req.signal?.removeEventListener("abort", onCallerAbort);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      const status = res.status;
      const message = `${this.options.source} request failed: ${status}`;
      if (status === 401 || status === 403) {
        throw new FatalAuthError(message, { ...context, status });
      }
      if (status === 429 || status >= 500) {
        throw new TransientFetchError(message, {
          context: { ...context, status },
          retryDelayMs: status === 429 ? parseRetryAfterMs(res.headers.get("retry-after"), Date.now()) : undefined
        });
      }
      throw new RequestRejectedError(message, { ...context, status });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new TransientFetchError(`${this.options.source} response body could not be read`, { context, cause: err });
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MalformedResponseError(`${this.options.source} response is not valid JSON`, { ...context, status: res.status }, err);
    }
  }
}

export const isTransientFetchError = (error: unknown): boolean => error instanceof TransientFetchError;
