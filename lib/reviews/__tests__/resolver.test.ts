import { describe, expect, it } from "vitest";
import { ResolveError } from "../errors";
import { createSilentObserver } from "../observability";
import {
  Gazetteer,
  LocationResolver,
  NominatimGeocoder,
  createDefaultGazetteer,
  geocoderConfidence,
  normalizeLocationText,
  type Geocoder,
} from "../resolver";
import { createMemoryReviewStore, type GeocodeCache } from "../storage";
import { RateLimiter } from "../utils/rate-limiter";
import { FakeGeocoder, json, queuedFetch } from "./helpers";

function createResolver(geocoder: Geocoder, cache = createMemoryReviewStore().geocodeCache) {
  const observer = createSilentObserver();
  const resolver = new LocationResolver({
    gazetteer: createDefaultGazetteer(),
    geocoder,
    cache,
    lowConfidenceThreshold: 0.7,
    observer,
  });
  return { resolver, cache, observer };
}

describe("normalizeLocationText", () => {
  it("strips lead-in phrases and area suffixes", () => {
    expect(normalizeLocationText("Located in the Riverside area.")).toBe("riverside");
    expect(normalizeLocationText("in the Mount Pleasant neighborhood")).toBe("mount pleasant");
  });

  it("keeps comma-separated segments", () => {
    expect(normalizeLocationText("3105 Mount  Pleasant St NW, Mount Pleasant")).toBe(
      "3105 mount pleasant st nw, mount pleasant"
    );
  });

  it("gives the same key to formatting variants", () => {
    expect(normalizeLocationText("Café Row")).toBe(normalizeLocationText("cafe   row"));
  });

  it("keeps letters that have no ASCII decomposition", () => {
    expect(normalizeLocationText("Located in Østerbro")).toBe("østerbro");
    expect(normalizeLocationText("Łódź, Śródmieście")).toBe("łodz, srodmiescie");
  });
});

describe("Gazetteer", () => {
  it("matches aliases to the canonical entry", () => {
    const gazetteer = new Gazetteer([{ name: "Mount Pleasant", aliases: ["Mt Pleasant"], lat: 1, lon: 2 }]);
    expect(gazetteer.match("mt pleasant")?.name).toBe("Mount Pleasant");
    expect(gazetteer.canonicalName("MOUNT PLEASANT")).toBe("Mount Pleasant");
    expect(gazetteer.match("petworth")).toBeNull();
  });

  it("falls back to individual address segments", () => {
    const gazetteer = createDefaultGazetteer();
    expect(gazetteer.match("3105 mount pleasant st nw, mount pleasant")?.name).toBe("Mount Pleasant");
  });
});

describe("geocoderConfidence", () => {
  it("scales service quality into 0.6..0.9", () => {
    expect(geocoderConfidence(0)).toBe(0.6);
    expect(geocoderConfidence(1)).toBe(0.9);
    expect(geocoderConfidence(0.5)).toBe(0.75);
    expect(geocoderConfidence(4)).toBe(0.9);
    expect(geocoderConfidence(Number.NaN)).toBe(0.6);
  });
});

describe("LocationResolver", () => {
  it("resolves gazetteer matches with full confidence and no external call", async () => {
    const geocoder = new FakeGeocoder();
    const { resolver, observer } = createResolver(geocoder);

    const location = await resolver.resolve("Located in Petworth");

    expect(location).toEqual({
      neighborhoodName: "Petworth",
      latitude: 38.941,
      longitude: -77.0244,
      confidence: 1,
      status: "resolved",
      method: "gazetteer",
      cacheKey: "petworth",
    });
    expect(geocoder.queries).toEqual([]);
    expect(observer.getMetrics().counters["resolver.gazetteer_hit"]).toBe(1);
  });

  it("geocodes unknown text and caches the result", async () => {
    const geocoder = new FakeGeocoder({
      "1 fake st": { lat: 10, lon: 20, locality: "Riverside", quality: 1 },
    });
    const { resolver, cache } = createResolver(geocoder);

    const location = await resolver.resolve("1 Fake St");

    expect(location).toEqual({
      neighborhoodName: "Riverside",
      latitude: 10,
      longitude: 20,
      confidence: 0.9,
      status: "resolved",
      method: "geocoder",
      cacheKey: "1 fake st",
    });
    expect(await cache.get("1 fake st")).toEqual(location);
  });

  it("canonicalizes geocoder localities through the gazetteer", async () => {
    const geocoder = new FakeGeocoder({
      "2 fake st": { lat: 10, lon: 20, locality: "Mt Pleasant", quality: 1 },
    });
    const { resolver } = createResolver(geocoder);

    expect((await resolver.resolve("2 Fake St")).neighborhoodName).toBe("Mount Pleasant");
  });

  it("marks weak geocoder matches as low confidence", async () => {
    const geocoder = new FakeGeocoder({
      "somewhere vague": { lat: 1, lon: 1, locality: "Riverside", quality: 0 },
    });
    const { resolver } = createResolver(geocoder);

    const location = await resolver.resolve("somewhere vague");

    expect(location.status).toBe("low_confidence");
    expect(location.confidence).toBe(0.6);
  });

  it("shares one geocoder call between concurrent lookups of the same text", async () => {
    const geocoder = new FakeGeocoder({
      "1 fake st": { lat: 10, lon: 20, locality: "Riverside", quality: 1 },
    });
    const { resolver } = createResolver(geocoder);

    const results = await Promise.all([
      resolver.resolve("1 Fake St"),
      resolver.resolve("1 fake st."),
      resolver.resolve("1  FAKE ST"),
    ]);

    expect(geocoder.queries).toEqual(["1 fake st"]);
    expect(new Set(results.map((r) => r.neighborhoodName))).toEqual(new Set(["Riverside"]));
  });

  it("shares one lookup with a caller that arrives while the cache read is pending", async () => {
    const geocoder = new FakeGeocoder({
      "1 fake st": { lat: 10, lon: 20, locality: "Riverside", quality: 1 },
    });
    const backing = createMemoryReviewStore().geocodeCache;
    const slowCache: GeocodeCache = {
      ...backing,
      get: async (key) => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return backing.get(key);
      },
    };
    const { resolver } = createResolver(geocoder, slowCache);

    const first = resolver.resolve("1 Fake St");
    await new Promise((resolve) => setTimeout(resolve, 10));
    const second = resolver.resolve("1 fake st");
    const results = await Promise.all([first, second]);

    expect(geocoder.queries).toEqual(["1 fake st"]);
    expect(results.map((r) => r.neighborhoodName)).toEqual(["Riverside", "Riverside"]);
  });

  it("answers from the shared cache on later runs", async () => {
    const first = new FakeGeocoder({
      "1 fake st": { lat: 10, lon: 20, locality: "Riverside", quality: 1 },
    });
    const cache = createMemoryReviewStore().geocodeCache;
    await createResolver(first, cache).resolver.resolve("1 Fake St");

    const second = new FakeGeocoder();
    const { resolver, observer } = createResolver(second, cache);
    const location = await resolver.resolve("1 Fake St");

    expect(location.neighborhoodName).toBe("Riverside");
    expect(second.queries).toEqual([]);
    expect(observer.getMetrics().counters["resolver.cache_hit"]).toBe(1);
  });

  it("keeps the first cached entry when another writer raced ahead", async () => {
    const { cache } = createResolver(new FakeGeocoder());
    const winner = {
      neighborhoodName: "Shaw",
      latitude: 1,
      longitude: 2,
      confidence: 0.8,
      status: "resolved" as const,
      method: "geocoder" as const,
      cacheKey: "1 fake st",
    };
    await cache.putIfAbsent("1 fake st", winner);

    const stored = await cache.putIfAbsent("1 fake st", { ...winner, neighborhoodName: "Riverside" });

    expect(stored.neighborhoodName).toBe("Shaw");
  });

  it("returns unresolved without caching when nothing matches", async () => {
    const geocoder = new FakeGeocoder({ "nowhere in particular": null });
    const { resolver, cache } = createResolver(geocoder);

    const location = await resolver.resolve("Nowhere in particular");
    await resolver.resolve("Nowhere in particular");

    expect(location).toEqual({
      neighborhoodName: null,
      latitude: null,
      longitude: null,
      confidence: 0,
      status: "unresolved",
      method: "none",
      cacheKey: "nowhere in particular",
    });
    expect(geocoder.queries).toEqual(["nowhere in particular"]);
    expect(await cache.get("nowhere in particular")).toBeNull();
  });

  it("treats hits without a locality as unresolved", async () => {
    const geocoder = new FakeGeocoder({ "5 elm st": { lat: 1, lon: 2, locality: null, quality: 1 } });
    const { resolver } = createResolver(geocoder);

    expect((await resolver.resolve("5 Elm St")).status).toBe("unresolved");
  });

  it("propagates service outages and caches nothing", async () => {
    const geocoder = new FakeGeocoder({
      "1 fake st": new ResolveError("down", "SERVICE_UNAVAILABLE", "1 fake st"),
    });
    const { resolver, cache } = createResolver(geocoder);

    await expect(resolver.resolve("1 Fake St")).rejects.toMatchObject({ kind: "SERVICE_UNAVAILABLE" });
    expect(await cache.get("1 fake st")).toBeNull();
  });

  it("re-queries after invalidate", async () => {
    const geocoder = new FakeGeocoder({
      "1 fake st": { lat: 10, lon: 20, locality: "Riverside", quality: 1 },
    });
    const { resolver } = createResolver(geocoder);

    await resolver.resolve("1 Fake St");
    expect(await resolver.invalidate("1 Fake St")).toBe(true);
    await resolver.resolve("1 Fake St");

    expect(geocoder.queries).toEqual(["1 fake st", "1 fake st"]);
    expect(await resolver.invalidate("never seen")).toBe(false);
  });

  it("returns unresolved for empty text", async () => {
    const { resolver } = createResolver(new FakeGeocoder());
    expect((await resolver.resolve("  ... ")).status).toBe("unresolved");
  });
});

describe("NominatimGeocoder", () => {
  function createGeocoder(fetchImpl: typeof fetch, maxRetries = 1) {
    return new NominatimGeocoder({
      url: "https://geo.test/search",
      userAgent: "review-atlas-test",
      timeoutMs: 1000,
      maxRetries,
      retryBaseDelayMs: 10,
      rateLimiter: new RateLimiter(0),
      fetchImpl,
      sleep: async () => {},
    });
  }

  it("parses the best hit and picks the most specific locality", async () => {
    const { fetchImpl, requests } = queuedFetch([
      json([
        {
          lat: "38.9126",
          lon: "-77.0219",
          importance: 0.5,
          display_name: "Shaw, Washington",
          address: { suburb: "Shaw", city: "Washington" },
        },
      ]),
    ]);

    const hit = await createGeocoder(fetchImpl).geocode("1 fake st, Washington, DC");

    expect(hit).toEqual({
      lat: 38.9126,
      lon: -77.0219,
      locality: "Shaw",
      quality: 0.5,
    });
    const url = new URL(requests[0].url);
    expect(url.searchParams.get("q")).toBe("1 fake st, Washington, DC");
    expect(url.searchParams.get("format")).toBe("jsonv2");
    expect(requests[0].headers.get("user-agent")).toBe("review-atlas-test");
  });

  it("returns null for an empty result list", async () => {
    const { fetchImpl } = queuedFetch([json([])]);
    expect(await createGeocoder(fetchImpl).geocode("nowhere")).toBeNull();
  });

  it("retries server errors, then reports the service unavailable", async () => {
    const { fetchImpl, requests } = queuedFetch([
      new Response("busy", { status: 503 }),
      new Response("busy", { status: 503 }),
    ]);

    const error = await createGeocoder(fetchImpl, 1).geocode("x").then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ResolveError);
    expect(error).toMatchObject({ kind: "SERVICE_UNAVAILABLE", locationText: "x" });
    expect(requests).toHaveLength(2);
  });

  it("rejects an unexpected response shape", async () => {
    const { fetchImpl } = queuedFetch([json({ error: "nope" })]);
    await expect(createGeocoder(fetchImpl).geocode("x")).rejects.toMatchObject({
      kind: "SERVICE_UNAVAILABLE",
    });
  });
});
