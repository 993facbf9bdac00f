/**
 * Geocoder Client
 *
 * Free-text lookups against a Nominatim-compatible search endpoint.
 * Nominatim's usage policy asks for at most one request per second and
 * an identifying User-Agent, hence the shared rate limiter.
 */

import { z } from "zod";
import { ResolveError } from "../errors";
import { RateLimiter } from "../utils/rate-limiter";
import { withRetry, type Sleep } from "../utils/retry";

export interface GeocodeHit {
  lat: number;
  lon: number;
  /** Most specific named place the service returned (neighbourhood, suburb, city...) */
  locality: string | null;
  /** Service's own match quality, 0..1 */
  quality: number;
}

export interface Geocoder {
  /**
   * @returns the best hit, or null when the service found nothing
   * @throws ResolveError SERVICE_UNAVAILABLE when the service can't answer
   */
  geocode(query: string): Promise<GeocodeHit | null>;
}

// ============================================================================
// Nominatim
// ============================================================================

const nominatimResultSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    importance: z.coerce.number().optional(),
    address: z
      .object({
        neighbourhood: z.string().optional(),
        suburb: z.string().optional(),
        quarter: z.string().optional(),
        city_district: z.string().optional(),
        city: z.string().optional(),
        town: z.string().optional(),
        village: z.string().optional(),
      })
      .optional(),
  })
);

type NominatimAddress = NonNullable<z.infer<typeof nominatimResultSchema>[number]["address"]>;

function pickLocality(address: NominatimAddress | undefined): string | null {
  if (!address) return null;
  return (
    address.neighbourhood ??
    address.suburb ??
    address.quarter ??
    address.city_district ??
    address.city ??
    address.town ??
    address.village ??
    null
  );
}

export interface NominatimGeocoderOptions {
  url: string;
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  rateLimiter: RateLimiter;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

class RetryableGeocodeFailure extends Error {}

export class NominatimGeocoder implements Geocoder {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: NominatimGeocoderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async geocode(query: string): Promise<GeocodeHit | null> {
    const url = new URL(this.options.url);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("addressdetails", "1");
    url.searchParams.set("limit", "1");

    let body: unknown;
    try {
      body = await withRetry(() => this.request(url), {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        sleep: this.options.sleep,
        isRetryable: (error) => error instanceof RetryableGeocodeFailure,
        onRetry: ({ attempt, delayMs, error }) => {
          console.warn(
            `[Geocoder] Attempt ${attempt} for "${query}" failed (${error instanceof Error ? error.message : String(error)}); retrying in ${delayMs}ms`
          );
        },
      });
    } catch (error) {
      throw new ResolveError(
        `Geocoder unavailable: ${error instanceof Error ? error.message : String(error)}`,
        "SERVICE_UNAVAILABLE",
        query,
        error
      );
    }

    const parsed = nominatimResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolveError(
        `Unexpected geocoder response: ${z.prettifyError(parsed.error)}`,
        "SERVICE_UNAVAILABLE",
        query
      );
    }

    const [best] = parsed.data;
    if (!best) return null;

    return {
      lat: best.lat,
      lon: best.lon,
      locality: pickLocality(best.address),
      quality: best.importance ?? 0,
    };
  }

  private async request(url: URL): Promise<unknown> {
    await this.options.rateLimiter.acquire();

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method: "GET",
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new RetryableGeocodeFailure(error instanceof Error ? error.message : String(error));
    }

    if (response.status >= 500 || response.status === 429) {
      throw new RetryableGeocodeFailure(`HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    return response.json();
  }
}
