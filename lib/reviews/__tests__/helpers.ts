/**
 * Shared test doubles.
 */

import { HttpFetcher } from "../fetcher";
import { normalizeReview } from "../normalizer";
import type { GeocodeHit, Geocoder } from "../resolver";
import type { ParsedReview, ResolvedLocation, RestaurantRecordInput } from "../types";
import { RateLimiter } from "../utils/rate-limiter";

export interface RecordedRequest {
  url: string;
  headers: Headers;
}

type Route = Response | Error | ((request: RecordedRequest) => Response);

/**
 * A `fetch` that answers from a queue of responses, in order.
 */
export function queuedFetch(responses: Route[]): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetchImpl: typeof fetch = async (input, init) => {
    const request = { url: String(input), headers: new Headers(init?.headers) };
    requests.push(request);
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected request to ${request.url}`);
    if (next instanceof Error) throw next;
    return typeof next === "function" ? next(request) : next;
  };

  return { fetchImpl, requests };
}

/**
 * A `fetch` that answers by URL; unknown URLs get a 404.
 */
export function routedFetch(
  routes: Record<string, Route | undefined>
): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const request = { url: String(input), headers: new Headers(init?.headers) };
    requests.push(request);
    const route = routes[request.url];
    if (!route) return new Response("not found", { status: 404 });
    if (route instanceof Error) throw route;
    return typeof route === "function" ? route(request) : route.clone();
  };

  return { fetchImpl, requests };
}

export function html(body: string, headers: Record<string, string> = {}, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/html; charset=UTF-8", ...headers },
  });
}

export function json(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function createTestFetcher(fetchImpl: typeof fetch, maxRetries = 2): HttpFetcher {
  return new HttpFetcher({
    userAgent: "review-atlas-test",
    timeoutMs: 1000,
    maxRetries,
    retryBaseDelayMs: 10,
    rateLimiter: new RateLimiter(0),
    fetchImpl,
    sleep: async () => {},
    now: () => new Date("2024-01-15T08:00:00.000Z"),
  });
}

/**
 * Geocoder answering from a fixed table and counting calls.
 */
export class FakeGeocoder implements Geocoder {
  readonly queries: string[] = [];

  constructor(private readonly hits: Record<string, GeocodeHit | Error | null> = {}) {}

  async geocode(query: string): Promise<GeocodeHit | null> {
    this.queries.push(query);
    // Let concurrent callers pile up before answering
    await new Promise((resolve) => setTimeout(resolve, 1));
    const hit = this.hits[query];
    if (hit instanceof Error) throw hit;
    return hit ?? null;
  }
}

// ============================================================================
// Record Builders
// ============================================================================

export const TEST_FETCHED_AT = "2024-01-15T08:00:00.000Z";

export function sampleReview(overrides: Partial<ParsedReview> = {}): ParsedReview {
  return {
    restaurantName: "Green Leaf Cafe",
    rawLocationText: "in Petworth",
    reviewBody: "Great vegan options.",
    tags: ["Vegetarian", "Cafe"],
    publishedAt: "2019-04-12T14:30:00.000Z",
    publishedAtInferred: false,
    sourceUrl: "https://critic.test/green-leaf-cafe/",
    strategy: "article-markup",
    parserVersion: "test",
    ...overrides,
  };
}

export function sampleLocation(overrides: Partial<ResolvedLocation> = {}): ResolvedLocation {
  return {
    neighborhoodName: "Petworth",
    latitude: 38.941,
    longitude: -77.0244,
    confidence: 1,
    status: "resolved",
    method: "gazetteer",
    cacheKey: "petworth",
    ...overrides,
  };
}

export function sampleRecord(
  review: Partial<ParsedReview> = {},
  location: Partial<ResolvedLocation> = {}
): RestaurantRecordInput {
  return normalizeReview(sampleReview(review), sampleLocation(location), {
    fetchedAt: TEST_FETCHED_AT,
    parsedAt: TEST_FETCHED_AT,
  }).record;
}
