export type CrawlErrorCode =
  | "transient_fetch"
  | "fatal_auth"
  | "malformed_response"
  | "request_rejected"
  | "corrupt_state"
  | "invalid_record"
  | "source_aborted"
  | "unsupported_mode";

export type CrawlErrorContext = {
  source?: string;
  partition?: string;
  cursor?: string;
  status?: number;
  url?: string;
  path?: string;
};

export class CrawlError extends Error {
  readonly code: CrawlErrorCode;
  readonly context: CrawlErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: CrawlErrorCode; message: string; context?: CrawlErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "CrawlError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Timeouts, dropped connections, 429 and 5xx. */
export class TransientFetchError extends CrawlError {
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(message: string, opts: { context?: CrawlErrorContext; retryDelayMs?: number; cause?: unknown } = {}) {
    super({ code: "transient_fetch", message, context: opts.context, cause: opts.cause });
    this.name = "TransientFetchError";
    this.status = opts.context?.status;
    this.retryDelayMs = opts.retryDelayMs;
  }
}

export class FatalAuthError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext, cause?: unknown) {
    super({ code: "fatal_auth", message, context, cause });
    this.name = "FatalAuthError";
  }
}

export class MalformedResponseError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext, cause?: unknown) {
    super({ code: "malformed_response", message, context, cause });
    this.name = "MalformedResponseError";
  }
}

/** Non-auth 4xx: the request itself is wrong, retrying will not help. */
export class RequestRejectedError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext, cause?: unknown) {
    super({ code: "request_rejected", message, context, cause });
    this.name = "RequestRejectedError";
  }
}

export class CorruptStateError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext, cause?: unknown) {
    super({ code: "corrupt_state", message, context, cause });
    this.name = "CorruptStateError";
  }
}

export class InvalidRecordError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext) {
    super({ code: "invalid_record", message, context });
    this.name = "InvalidRecordError";
  }
}

export class SourceAbortedError extends CrawlError {
  constructor(message: string, context?: CrawlErrorContext, cause?: unknown) {
    super({ code: "source_aborted", message, context, cause });
    this.name = "SourceAbortedError";
  }
}

export class UnsupportedExecutionModeError extends CrawlError {
  constructor(mode: string) {
    super({
      code: "unsupported_mode",
      message: `Execution mode "${mode}" is not implemented; use "parallel"`
    });
    this.name = "UnsupportedExecutionModeError";
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
