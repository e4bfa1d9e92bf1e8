/**
 * Typed errors raised by the downloader.
 * Every error carries a stable error code and a message that is readable
 * without looking at logs.
 */
import type { CommonErrorCode } from "./types.js";

/**
 * Base class for all downloader errors.
 */
export class DownloaderError extends Error {
  public readonly errorCode: CommonErrorCode;
  public readonly details: string | undefined;

  constructor(
    message: string,
    errorCode: CommonErrorCode,
    options: { details?: string | undefined; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DownloaderError";
    this.errorCode = errorCode;
    this.details = options.details;
  }
}

/**
 * What went wrong in a GraphQL exchange.
 * "channel_not_found" and "channel_empty" are distinct so callers can decide
 * between retrying and aborting.
 */
export type ApiErrorReason =
  | "http"
  | "malformed"
  | "graphql"
  | "not_found"
  | "not_streamable"
  | "channel_not_found"
  | "channel_empty";

export class DLiveAPIError extends DownloaderError {
  public readonly reason: ApiErrorReason;
  public readonly statusCode: number | undefined;

  constructor(
    message: string,
    reason: ApiErrorReason,
    options: { statusCode?: number | undefined; details?: string | undefined; cause?: unknown } = {}
  ) {
    super(message, "API_ERROR", options);
    this.name = "DLiveAPIError";
    this.reason = reason;
    this.statusCode = options.statusCode;
  }
}

export { DLiveAPIError as ApiError };

export class PlaylistError extends DownloaderError {
  constructor(
    message: string,
    errorCode: Extract<CommonErrorCode, "PARSE_ERROR" | "NO_SEGMENTS"> = "PARSE_ERROR",
    details?: string
  ) {
    super(message, errorCode, { details });
    this.name = "PlaylistError";
  }
}

export class ValidationError extends DownloaderError {
  constructor(message: string, details?: string) {
    super(message, "INVALID_INPUT", { details });
    this.name = "ValidationError";
  }
}

/**
 * A network call that failed for good: either the retry budget is spent or
 * the server answered with a non-retryable status.
 */
export class TransportError extends DownloaderError {
  public readonly url: string;
  public readonly statusCode: number | undefined;
  /** Truncated response body, if the server sent one */
  public readonly body: string | undefined;
  public readonly attempts: number;

  constructor(
    message: string,
    options: {
      url: string;
      statusCode?: number | undefined;
      body?: string | undefined;
      attempts?: number | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options.statusCode === undefined ? "NETWORK_ERROR" : "FETCH_FAILED", {
      cause: options.cause,
      details: options.body,
    });
    this.name = "TransportError";
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.body = options.body;
    this.attempts = options.attempts ?? 1;
  }
}

/**
 * Wraps an unexpected failure with context about what was being done.
 */
export class DownloadFailedError extends DownloaderError {
  constructor(message: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${reason}`, "DOWNLOAD_FAILED", { cause });
    this.name = "DownloadFailedError";
  }
}

/**
 * Returns a human-readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
