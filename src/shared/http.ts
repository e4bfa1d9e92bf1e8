import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import ky, { HTTPError, type KyInstance, type Options as KyOptions } from "ky";
import pRetry, { AbortError } from "p-retry";
import { TransportError, errorMessage } from "../downloader/shared/errors.js";
import { logger } from "./logger.js";

/**
 * User-Agent sent with every request.
 */
export const USER_AGENT = "dlive-vod/0.1.0 (+https://dlive.tv/)";

/** Connect + response headers timeout, per attempt */
export const REQUEST_TIMEOUT_MS = 20_000;

/** Total attempts per call (first try included) */
export const DEFAULT_ATTEMPTS = 5;

/** Largest chunk written to disk at once while streaming a download */
export const DOWNLOAD_CHUNK_SIZE = 512 * 1024;

const BODY_SNIPPET_LENGTH = 200;

export type FetchFunction = NonNullable<KyOptions["fetch"]>;

/**
 * Network operations the API and segment pipeline depend on.
 */
export interface HttpFetcher {
  fetchText(url: string): Promise<string>;
  fetchBinary(url: string): Promise<Buffer>;
  /** Streams a resource to disk, truncating any existing file. */
  downloadToFile(url: string, destination: string): Promise<void>;
  /** POSTs a JSON payload and returns the raw response text. */
  postJson(url: string, payload: unknown): Promise<string>;
}

export interface FetcherOptions {
  attempts?: number | undefined;
  timeoutMs?: number | undefined;
  /** First backoff delay; later delays double */
  minRetryDelayMs?: number | undefined;
  /** Replaces the global fetch (tests) */
  fetch?: FetchFunction | undefined;
}

/**
 * Pre-configured HTTP client with the fixed User-Agent and timeout.
 * ky's own retry is off: ResilientFetcher retries whole attempts, including
 * body reads, which ky does not cover.
 */
export function createHttpClient(
  options: Pick<FetcherOptions, "timeoutMs" | "fetch"> = {}
): KyInstance {
  return ky.create({
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/json, text/plain, */*",
    },
    timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    retry: 0,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

/**
 * 429 and 5xx responses are worth another try; other 4xx are not.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function readBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    return text ? text.substring(0, BODY_SNIPPET_LENGTH) : undefined;
  } catch {
    // The body is only diagnostic context
    return undefined;
  }
}

async function* readChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      for (let offset = 0; offset < value.byteLength; offset += DOWNLOAD_CHUNK_SIZE) {
        yield Buffer.from(value.subarray(offset, offset + DOWNLOAD_CHUNK_SIZE));
      }
    }
  } finally {
    // Stopped early by a failed write: release the connection
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug(`Could not cancel response body: ${errorMessage(error)}`);
      });
    }
    reader.releaseLock();
  }
}

/**
 * HTTP client wrapper with bounded automatic retry and exponential backoff.
 * Uses p-retry around each complete attempt so connection failures, read
 * failures, timeouts, 429 and 5xx are all retried the same way.
 */
export class ResilientFetcher implements HttpFetcher {
  private readonly client: KyInstance;
  private readonly attempts: number;
  private readonly minRetryDelayMs: number;

  constructor(options: FetcherOptions = {}) {
    this.client = createHttpClient(options);
    this.attempts = Math.max(1, Math.floor(options.attempts ?? DEFAULT_ATTEMPTS));
    this.minRetryDelayMs = options.minRetryDelayMs ?? 500;
  }

  fetchText(url: string): Promise<string> {
    return this.withRetry("GET", url, () => this.client.get(url).text());
  }

  fetchBinary(url: string): Promise<Buffer> {
    return this.withRetry("GET", url, async () =>
      Buffer.from(await this.client.get(url).arrayBuffer())
    );
  }

  downloadToFile(url: string, destination: string): Promise<void> {
    return this.withRetry("GET", url, async () => {
      const response = await this.client.get(url);
      if (!response.body) {
        throw new Error(`Empty response body from ${url}`);
      }
      await pipeline(
        Readable.from(readChunks(response.body)),
        createWriteStream(destination, { highWaterMark: DOWNLOAD_CHUNK_SIZE })
      );
    });
  }

  postJson(url: string, payload: unknown): Promise<string> {
    return this.withRetry("POST", url, () => this.client.post(url, { json: payload }).text());
  }

  private async withRetry<T>(method: string, url: string, attempt: () => Promise<T>): Promise<T> {
    let attemptNumber = 0;

    try {
      return await pRetry(
        async () => {
          attemptNumber++;
          try {
            return await attempt();
          } catch (error) {
            throw await this.classify(error, method, url, attemptNumber);
          }
        },
        {
          retries: this.attempts - 1,
          factor: 2,
          minTimeout: this.minRetryDelayMs,
          maxTimeout: this.minRetryDelayMs * 16,
          onFailedAttempt: (error) => {
            if (error.retriesLeft > 0) {
              logger.debug(
                `${method} ${url} attempt ${error.attemptNumber} failed (${error.message}), ${error.retriesLeft} retries left`
              );
            }
          },
        }
      );
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        `${method} ${url} failed after ${attemptNumber} attempt(s): ${errorMessage(error)}`,
        { url, attempts: attemptNumber, cause: error }
      );
    }
  }

  /**
   * Turns HTTP errors into TransportErrors. Non-retryable statuses are
   * wrapped in AbortError so p-retry gives up immediately.
   */
  private async classify(
    error: unknown,
    method: string,
    url: string,
    attemptNumber: number
  ): Promise<unknown> {
    if (!(error instanceof HTTPError)) {
      return error;
    }

    const statusCode = error.response.status;
    const transportError = new TransportError(`${method} ${url} returned HTTP ${statusCode}`, {
      url,
      statusCode,
      body: await readBodySnippet(error.response),
      attempts: attemptNumber,
      cause: error,
    });

    return isRetryableStatus(statusCode) ? transportError : new AbortError(transportError);
  }
}
