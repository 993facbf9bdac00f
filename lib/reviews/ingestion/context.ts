/**
 * Pipeline Context Factory
 *
 * Wires the fetcher, geocoder, resolver and store from a loaded config.
 * The source and the geocoder are different hosts, so each gets its own
 * rate limiter.
 */

import type { ReviewPipelineConfig } from "../config";
import { HttpFetcher } from "../fetcher";
import { createConsoleObserver, type ReviewIngestionObserver } from "../observability";
import {
  createDefaultGazetteer,
  loadGazetteerFile,
  LocationResolver,
  NominatimGeocoder,
  type Geocoder,
} from "../resolver";
import type { ReviewStore } from "../storage";
import { RateLimiter } from "../utils/rate-limiter";
import type { ReviewIngestionDeps, ReviewIngestionRequest } from "./pipeline";

export interface ReviewPipelineContext extends ReviewIngestionDeps {
  fetcher: HttpFetcher;
  resolver: LocationResolver;
  observer: ReviewIngestionObserver;
}

export interface CreatePipelineContextOptions {
  store: ReviewStore;
  observer?: ReviewIngestionObserver;
  fetchImpl?: typeof fetch;
  geocoder?: Geocoder;
}

export async function createPipelineContext(
  config: ReviewPipelineConfig,
  options: CreatePipelineContextOptions
): Promise<ReviewPipelineContext> {
  const observer = options.observer ?? createConsoleObserver();

  const fetcher = new HttpFetcher({
    userAgent: config.fetch.userAgent,
    timeoutMs: config.fetch.timeoutMs,
    maxRetries: config.fetch.maxRetries,
    retryBaseDelayMs: config.fetch.retryBaseDelayMs,
    rateLimiter: new RateLimiter(config.fetch.rateLimitMs),
    fetchImpl: options.fetchImpl,
  });

  const geocoder =
    options.geocoder ??
    new NominatimGeocoder({
      url: config.geocoder.url,
      userAgent: config.fetch.userAgent,
      timeoutMs: config.fetch.timeoutMs,
      maxRetries: config.fetch.maxRetries,
      retryBaseDelayMs: config.fetch.retryBaseDelayMs,
      rateLimiter: new RateLimiter(config.geocoder.rateLimitMs),
      fetchImpl: options.fetchImpl,
    });

  const gazetteer = config.resolver.gazetteerPath
    ? await loadGazetteerFile(config.resolver.gazetteerPath)
    : createDefaultGazetteer();

  const resolver = new LocationResolver({
    gazetteer,
    geocoder,
    cache: options.store.geocodeCache,
    geocodeContext: config.geocoder.context,
    lowConfidenceThreshold: config.resolver.lowConfidenceThreshold,
    observer,
  });

  return { fetcher, resolver, store: options.store, observer };
}

export function buildIngestionRequest(
  config: ReviewPipelineConfig,
  options: { full?: boolean; signal?: AbortSignal } = {}
): ReviewIngestionRequest {
  return {
    source: {
      baseUrl: config.source.baseUrl,
      indexPath: config.source.indexPath,
      mode: config.source.discoveryMode,
      maxIndexPages: config.source.maxIndexPages,
      wpPerPage: config.source.wpPerPage,
    },
    concurrency: config.pipeline.concurrency,
    full: options.full,
    signal: options.signal,
  };
}
