/**
 * HTTP Fetcher
 *
 * Plain GET requests against the review source with a shared rate limit,
 * a per-request timeout and exponential backoff on transient failures.
 */

import type { ConditionalValidators, FetchOutcome, RawDocument } from "../types";
import { FetchError } from "../errors";
import { sha256 } from "../utils/hash";
import { RateLimiter } from "../utils/rate-limiter";
import { withRetry, type Sleep } from "../utils/retry";

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  /** Shared across every caller hitting the source */
  rateLimiter: RateLimiter;
  accept?: string;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
  now?: () => Date;
}

/** What the pipeline and discovery need from a fetcher. */
export interface DocumentFetcher {
  fetch(sourceUrl: string, validators?: ConditionalValidators): Promise<FetchOutcome>;
}

export class HttpFetcher implements DocumentFetcher {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: HttpFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch a URL. Returns a RawDocument, or NotModified when the
   * validators from a previous run still match.
   *
   * @throws FetchError TERMINAL for 4xx and malformed URLs, TRANSIENT once retries are exhausted
   */
  async fetch(sourceUrl: string, validators?: ConditionalValidators): Promise<FetchOutcome> {
    const url = parseHttpUrl(sourceUrl);

    return withRetry((attempt) => this.attempt(url, sourceUrl, attempt, validators), {
      maxRetries: this.options.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
      sleep: this.options.sleep,
      isRetryable: (error) => error instanceof FetchError && error.kind === "TRANSIENT",
      onRetry: ({ attempt, delayMs, error }) => {
        console.warn(
          `[Fetcher] Attempt ${attempt} for ${sourceUrl} failed (${error instanceof Error ? error.message : String(error)}); retrying in ${delayMs}ms`
        );
      },
    });
  }

  private async attempt(
    url: URL,
    sourceUrl: string,
    attempt: number,
    validators?: ConditionalValidators
  ): Promise<FetchOutcome> {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: this.options.accept ?? "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
    };
    if (validators?.etag) headers["If-None-Match"] = validators.etag;
    if (validators?.lastModified) headers["If-Modified-Since"] = validators.lastModified;

    await this.options.rateLimiter.acquire();

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method: "GET",
        headers,
        redirect: "follow",
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      throw new FetchError(
        timedOut
          ? `Timed out after ${this.options.timeoutMs}ms (attempt ${attempt})`
          : `Network error: ${error instanceof Error ? error.message : String(error)} (attempt ${attempt})`,
        "TRANSIENT",
        sourceUrl,
        undefined,
        error
      );
    }

    const fetchedAt = this.now().toISOString();

    if (response.status === 304) {
      return { sourceUrl, notModified: true, fetchedAt };
    }

    if (response.status >= 500 || response.status === 429) {
      throw new FetchError(`HTTP ${response.status} (attempt ${attempt})`, "TRANSIENT", sourceUrl, response.status);
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}`, "TERMINAL", sourceUrl, response.status);
    }

    let rawContent: string;
    try {
      rawContent = await response.text();
    } catch (error) {
      throw new FetchError(`Body read failed (attempt ${attempt})`, "TRANSIENT", sourceUrl, response.status, error);
    }

    const document: RawDocument = {
      sourceUrl,
      fetchedAt,
      rawContent,
      contentHash: sha256(rawContent),
      responseStatus: response.status,
      contentType: response.headers.get("content-type") ?? undefined,
      etag: response.headers.get("etag") ?? undefined,
      lastModified: response.headers.get("last-modified") ?? undefined,
    };
    return document;
  }
}

function parseHttpUrl(sourceUrl: string): URL {
  let url: URL;
  try {
    url = new URL(sourceUrl);
  } catch (error) {
    throw new FetchError(`Malformed URL: ${sourceUrl}`, "TERMINAL", sourceUrl, undefined, error);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new FetchError(`Unsupported URL scheme: ${url.protocol}`, "TERMINAL", sourceUrl);
  }
  return url;
}
