import { describe, expect, it } from "vitest";
import {
  CuisineVocabulary,
  canonicalDisplayName,
  getDefaultCuisineVocabulary,
  normalizeReview,
} from "../normalizer";
import { TEST_FETCHED_AT, sampleLocation, sampleRecord, sampleReview } from "./helpers";

const meta = { fetchedAt: TEST_FETCHED_AT, parsedAt: TEST_FETCHED_AT };

describe("canonicalDisplayName", () => {
  it("title-cases names written all upper or all lower case", () => {
    expect(canonicalDisplayName("BLUE DOOR DINER")).toBe("Blue Door Diner");
    expect(canonicalDisplayName("joe's  diner")).toBe("Joe's Diner");
  });

  it("keeps deliberate mixed casing", () => {
    expect(canonicalDisplayName("  NoMa Pizza Co ")).toBe("NoMa Pizza Co");
  });

  it("straightens typographic quotes", () => {
    expect(canonicalDisplayName("Joe’s Diner")).toBe("Joe's Diner");
  });
});

describe("CuisineVocabulary", () => {
  it("maps aliases onto canonical slugs", () => {
    const vocabulary = getDefaultCuisineVocabulary();
    expect(vocabulary.canonicalize("BBQ")).toEqual({ tag: "barbecue", known: true });
    expect(vocabulary.canonicalize("Szechuan")).toEqual({ tag: "chinese", known: true });
    expect(vocabulary.canonicalize("Soul Food")).toEqual({ tag: "southern", known: true });
  });

  it("ignores a trailing cuisine or food suffix", () => {
    const vocabulary = new CuisineVocabulary({ thai: ["thai"] });
    expect(vocabulary.canonicalize("Thai Cuisine").tag).toBe("thai");
    expect(vocabulary.canonicalize("thai food").tag).toBe("thai");
  });

  it("passes unknown tags through trimmed", () => {
    expect(getDefaultCuisineVocabulary().canonicalize(" Molecular ")).toEqual({
      tag: "Molecular",
      known: false,
    });
  });
});

describe("normalizeReview", () => {
  it("gives the same id to formatting variants of one restaurant", () => {
    const a = sampleRecord({ restaurantName: "Joe’s Diner" });
    const b = sampleRecord({ restaurantName: "joe's  diner" });

    expect(a.restaurantId).toBe(b.restaurantId);
    expect(a.displayName).toBe("Joe's Diner");
    expect(b.displayName).toBe("Joe's Diner");
  });

  it("gives different ids to the same name in different neighborhoods", () => {
    const a = sampleRecord({}, sampleLocation());
    const b = sampleRecord({}, sampleLocation({ neighborhoodName: "Shaw", cacheKey: "shaw" }));
    expect(a.restaurantId).not.toBe(b.restaurantId);
  });

  it("canonicalizes, deduplicates and sorts tags and reports unknown ones", () => {
    const result = normalizeReview(
      sampleReview({ tags: ["BBQ", "Tacos", "barbecue", "Molecular", " ", "Ramen"] }),
      sampleLocation(),
      meta
    );

    expect(result.record.cuisineTags).toEqual(["Molecular", "barbecue", "japanese", "mexican"]);
    expect(result.unknownTags).toEqual(["Molecular"]);
  });

  it("keys unresolved locations by their normalized text", () => {
    const result = normalizeReview(
      sampleReview({ rawLocationText: "Nowhere  in particular" }),
      sampleLocation({
        neighborhoodName: null,
        latitude: null,
        longitude: null,
        confidence: 0,
        status: "unresolved",
        method: "none",
        cacheKey: "nowhere in particular",
      }),
      meta
    );

    expect(result.neighborhoodKey).toBe("unresolved:nowhere in particular");
    expect(result.record).toMatchObject({
      neighborhood: null,
      coordinates: null,
      locationStatus: "unresolved",
      locationConfidence: 0,
      rawLocationText: "Nowhere in particular",
    });
  });

  it("carries coordinates and provenance", () => {
    const record = sampleRecord();

    expect(record).toMatchObject({
      displayName: "Green Leaf Cafe",
      neighborhood: "Petworth",
      coordinates: { lat: 38.941, lon: -77.0244 },
      locationConfidence: 1,
      locationStatus: "resolved",
      cuisineTags: ["cafe", "vegetarian"],
      sourceUrl: "https://critic.test/green-leaf-cafe/",
      fetchedAt: TEST_FETCHED_AT,
      publishedAtInferred: false,
    });
    expect(record.contentHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("carries links and post metadata when the page has them", () => {
    const record = sampleRecord({
      yelpUrl: "https://www.yelp.com/biz/green-leaf-cafe",
      mapsUrl: "https://www.google.com/maps/place/Green+Leaf+Cafe",
      sourcePostId: 4711,
      modifiedAt: "2019-05-01T10:00:00.000Z",
    });

    expect(record).toMatchObject({
      yelpUrl: "https://www.yelp.com/biz/green-leaf-cafe",
      mapsUrl: "https://www.google.com/maps/place/Green+Leaf+Cafe",
      sourcePostId: 4711,
      modifiedAt: "2019-05-01T10:00:00.000Z",
    });
    expect(sampleRecord()).toMatchObject({ yelpUrl: null, mapsUrl: null, sourcePostId: null, modifiedAt: null });
  });

  it("changes the content hash only when content changes", () => {
    const base = sampleRecord();
    const refetched = normalizeReview(sampleReview(), sampleLocation(), {
      fetchedAt: "2024-02-01T00:00:00.000Z",
      parsedAt: "2024-02-01T00:00:00.000Z",
    }).record;
    const edited = sampleRecord({ reviewBody: "Great vegan options. Now open late." });
    const retagged = sampleRecord({ tags: ["Cafe", "Vegetarian"] });

    expect(refetched.contentHash).toBe(base.contentHash);
    expect(retagged.contentHash).toBe(base.contentHash);
    expect(edited.contentHash).not.toBe(base.contentHash);
  });
});
