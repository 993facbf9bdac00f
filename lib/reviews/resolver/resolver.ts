/**
 * Location Resolver
 *
 * Maps free-text location to a neighborhood and coordinate:
 * gazetteer -> persistent cache -> external geocoder.
 *
 * Cache reads take no lock. Writes are first-writer-wins per key, and
 * concurrent lookups of the same key share one in-flight lookup, cache
 * read included.
 */

import type { ResolvedLocation } from "../types";
import type { GeocodeCache } from "../storage/types";
import type { ReviewIngestionObserver } from "../observability";
import type { Geocoder } from "./geocoder";
import { Gazetteer } from "./gazetteer";
import { normalizeLocationText } from "./location-text";

export const GAZETTEER_CONFIDENCE = 1.0;
export const GEOCODER_CONFIDENCE_FLOOR = 0.6;
export const GEOCODER_CONFIDENCE_RANGE = 0.3;

export interface LocationResolverOptions {
  gazetteer: Gazetteer;
  geocoder: Geocoder;
  cache: GeocodeCache;
  /** Appended to every geocoder query, e.g. "Washington, DC" */
  geocodeContext?: string;
  lowConfidenceThreshold: number;
  observer?: ReviewIngestionObserver;
}

export function unresolvedLocation(cacheKey: string): ResolvedLocation {
  return {
    neighborhoodName: null,
    latitude: null,
    longitude: null,
    confidence: 0,
    status: "unresolved",
    method: "none",
    cacheKey,
  };
}

/**
 * Scale the geocoder's own match quality into 0.6..0.9.
 */
export function geocoderConfidence(quality: number): number {
  const clamped = Math.min(1, Math.max(0, Number.isFinite(quality) ? quality : 0));
  return Math.round((GEOCODER_CONFIDENCE_FLOOR + GEOCODER_CONFIDENCE_RANGE * clamped) * 1000) / 1000;
}

export class LocationResolver {
  private readonly inFlight = new Map<string, Promise<ResolvedLocation>>();
  /** Keys the geocoder had no answer for during this resolver's lifetime */
  private readonly misses = new Set<string>();

  constructor(private readonly options: LocationResolverOptions) {}

  /**
   * @throws ResolveError SERVICE_UNAVAILABLE when the geocoder can't be reached
   */
  async resolve(rawLocationText: string): Promise<ResolvedLocation> {
    const key = normalizeLocationText(rawLocationText);
    if (!key) return unresolvedLocation(key);

    const entry = this.options.gazetteer.match(key);
    if (entry) {
      this.options.observer?.increment("resolver.gazetteer_hit");
      return {
        neighborhoodName: entry.name,
        latitude: entry.lat,
        longitude: entry.lon,
        confidence: GAZETTEER_CONFIDENCE,
        status: "resolved",
        method: "gazetteer",
        cacheKey: key,
      };
    }

    if (this.misses.has(key)) return unresolvedLocation(key);

    // Registered before any await so a concurrent caller always finds it
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const lookup = this.lookup(key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, lookup);
    return lookup;
  }

  /**
   * Drop the cached resolution for a location text (e.g. after the
   * source text changed or the gazetteer was corrected).
   */
  async invalidate(rawLocationText: string): Promise<boolean> {
    const key = normalizeLocationText(rawLocationText);
    this.misses.delete(key);
    return this.options.cache.invalidate(key);
  }

  private async lookup(key: string): Promise<ResolvedLocation> {
    const cached = await this.options.cache.get(key);
    if (cached) {
      this.options.observer?.increment("resolver.cache_hit");
      return cached;
    }

    const query = this.options.geocodeContext ? `${key}, ${this.options.geocodeContext}` : key;

    this.options.observer?.increment("resolver.geocoder_call");
    const hit = await this.options.geocoder.geocode(query);

    if (!hit || !hit.locality) {
      // Not persisted: a later run gets another chance at it
      this.misses.add(key);
      return unresolvedLocation(key);
    }

    const confidence = geocoderConfidence(hit.quality);
    const location: ResolvedLocation = {
      neighborhoodName: this.options.gazetteer.canonicalName(hit.locality) ?? hit.locality,
      latitude: hit.lat,
      longitude: hit.lon,
      confidence,
      status: confidence < this.options.lowConfidenceThreshold ? "low_confidence" : "resolved",
      method: "geocoder",
      cacheKey: key,
    };

    // Another writer may have stored this key first; theirs wins
    return this.options.cache.putIfAbsent(key, location);
  }
}
