import { describe, expect, it } from "vitest";
import { StoreError } from "../errors";
import { runReviewIngestion, type ReviewIngestionRequest } from "../ingestion";
import { ConsoleObserver, createSilentObserver } from "../observability";
import { LocationResolver, createDefaultGazetteer, type GeocodeHit } from "../resolver";
import { createMemoryReviewStore, type ReviewStore } from "../storage";
import type { DiscoveredUrl } from "../types";
import { computeRestaurantId } from "../utils/hash";
import { FakeGeocoder, createTestFetcher, html, routedFetch } from "./helpers";

const SITE = "https://example.com";

const source: ReviewIngestionRequest["source"] = {
  baseUrl: SITE,
  indexPath: "/",
  mode: "html",
  maxIndexPages: 5,
  wpPerPage: 10,
};

function reviewPage(
  name: string,
  location: string | null,
  body: string,
  tags: string[] = [],
  publishedAt?: string
): string {
  return `<!DOCTYPE html><html><body>
    <article>
      <h1 class="entry-title">${name}</h1>
      ${publishedAt ? `<time class="entry-date published" datetime="${publishedAt}">${publishedAt}</time>` : ""}
      ${location === null ? "" : `<p class="location">${location}</p>`}
      <div class="entry-content"><p>${body}</p></div>
      <footer>${tags.map((tag) => `<a rel="tag" href="${SITE}/tag/${tag}/">${tag}</a>`).join("")}</footer>
    </article>
  </body></html>`;
}

function indexPage(paths: string[]): string {
  return paths
    .map((p) => `<article><h2 class="entry-title"><a rel="bookmark" href="${SITE}${p}">${p}</a></h2></article>`)
    .join("\n");
}

function createDeps(
  store: ReviewStore,
  fetchImpl: typeof fetch,
  hits: Record<string, GeocodeHit | Error | null> = {}
) {
  const geocoder = new FakeGeocoder(hits);
  const resolver = new LocationResolver({
    gazetteer: createDefaultGazetteer(),
    geocoder,
    cache: store.geocodeCache,
    lowConfidenceThreshold: 0.7,
  });
  return {
    fetcher: createTestFetcher(fetchImpl),
    resolver,
    store,
    observer: createSilentObserver(),
    geocoder,
  };
}

function threeReviewSite(): Record<string, Response> {
  return {
    [`${SITE}/`]: html(indexPage(["/a/", "/b/", "/c/"])),
    [`${SITE}/a/`]: html(reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options.", ["Vegetarian"])),
    [`${SITE}/b/`]: html(reviewPage("Blue Door Diner", "1 Fake St", "Enormous pancakes.", ["Diner", "Molecular"])),
    [`${SITE}/c/`]: html(reviewPage("Mystery Spot", "somewhere else entirely", "Hard to find.")),
  };
}

const GEOCODER_HITS: Record<string, GeocodeHit | null> = {
  "1 fake st": { lat: 38.91, lon: -77.02, locality: "Shaw", quality: 1 },
  "somewhere else entirely": null,
};

describe("runReviewIngestion", () => {
  it("discovers, parses, resolves and stores every review", async () => {
    const store = createMemoryReviewStore();
    const { fetchImpl } = routedFetch(threeReviewSite());

    const summary = await runReviewIngestion(createDeps(store, fetchImpl, GEOCODER_HITS), {
      source,
      concurrency: 2,
    });

    expect(summary.discovered).toBe(3);
    expect(summary.counts).toEqual({ created: 3, updated: 0, unchanged: 0, skipped: 0, failed: 0 });
    expect(summary.failures).toEqual([]);
    expect(summary.warnings.map((w) => [w.url, w.kind])).toEqual([[`${SITE}/c/`, "NO_MATCH"]]);
    expect(summary.unknownTags).toEqual([{ tag: "Molecular", count: 1 }]);
    expect(summary.stopped).toBe(false);

    const records = await store.restaurants.list();
    const byName = new Map(records.map((r) => [r.displayName, r]));
    expect(byName.get("Green Leaf Cafe")).toMatchObject({
      neighborhood: "Petworth",
      locationStatus: "resolved",
      locationConfidence: 1,
      cuisineTags: ["vegetarian"],
    });
    expect(byName.get("Blue Door Diner")).toMatchObject({
      neighborhood: "Shaw",
      coordinates: { lat: 38.91, lon: -77.02 },
      cuisineTags: ["Molecular", "american"],
    });
    expect(byName.get("Mystery Spot")).toMatchObject({
      neighborhood: null,
      coordinates: null,
      locationStatus: "unresolved",
    });

    const [recorded] = await store.runs.listRuns(1);
    expect(recorded.runId).toBe(summary.runId);
  });

  it("skips unchanged pages on a second run and revisits the unresolved one", async () => {
    const store = createMemoryReviewStore();
    const { fetchImpl, requests } = routedFetch(threeReviewSite());
    const deps = createDeps(store, fetchImpl, GEOCODER_HITS);

    await runReviewIngestion(deps, { source, concurrency: 2 });
    const before = await store.restaurants.list();
    const requestsBefore = requests.length;
    const second = await runReviewIngestion(deps, { source, concurrency: 2 });

    expect(second.counts).toEqual({ created: 0, updated: 0, unchanged: 1, skipped: 2, failed: 0 });
    expect(await store.restaurants.list()).toEqual(before);
    expect(requests.slice(requestsBefore).map((r) => r.url)).toContain(`${SITE}/c/`);
  });

  it("reprocesses everything in full mode without changing stored records", async () => {
    const store = createMemoryReviewStore();
    const { fetchImpl } = routedFetch(threeReviewSite());
    const deps = createDeps(store, fetchImpl, GEOCODER_HITS);

    await runReviewIngestion(deps, { source, concurrency: 2 });
    const again = await runReviewIngestion(deps, { source, concurrency: 2, full: true });

    expect(again.full).toBe(true);
    expect(again.counts).toEqual({ created: 0, updated: 0, unchanged: 3, skipped: 0, failed: 0 });
  });

  it("updates a record when its page changes", async () => {
    const store = createMemoryReviewStore();
    const routes = threeReviewSite();
    const { fetchImpl } = routedFetch(routes);
    const deps = createDeps(store, fetchImpl, GEOCODER_HITS);

    await runReviewIngestion(deps, { source, concurrency: 2 });
    routes[`${SITE}/a/`] = html(
      reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options. Now open late.", ["Vegetarian"])
    );
    const second = await runReviewIngestion(deps, { source, concurrency: 2 });

    expect(second.counts).toEqual({ created: 0, updated: 1, unchanged: 1, skipped: 1, failed: 0 });
    const records = await store.restaurants.list();
    expect(records).toHaveLength(3);
    expect(records.find((r) => r.displayName === "Green Leaf Cafe")?.reviewBody).toBe(
      "Great vegan options. Now open late."
    );
  });

  it("records one failure without stopping the other items", async () => {
    const store = createMemoryReviewStore();
    const routes: Record<string, Response> = {};
    const urls: DiscoveredUrl[] = [];
    for (let i = 1; i <= 10; i++) {
      const url = `${SITE}/review-${i}/`;
      urls.push({ url });
      if (i !== 7) {
        routes[url] = html(reviewPage(`Place ${i}`, "Located in Shaw", `Review number ${i}.`));
      }
    }
    const { fetchImpl } = routedFetch(routes);

    const summary = await runReviewIngestion(createDeps(store, fetchImpl), { source, concurrency: 3, urls });

    expect(summary.discovered).toBe(10);
    expect(summary.counts).toEqual({ created: 9, updated: 0, unchanged: 0, skipped: 0, failed: 1 });
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0]).toMatchObject({ url: `${SITE}/review-7/`, stage: "fetch", kind: "TERMINAL" });
    expect(await store.restaurants.list()).toHaveLength(9);
  });

  it("reports pages with missing fields as parse failures", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/corner-bakery/`;
    const { fetchImpl } = routedFetch({ [url]: html(reviewPage("Corner Bakery", null, "Flaky croissants.")) });

    const summary = await runReviewIngestion(createDeps(store, fetchImpl), {
      source,
      concurrency: 1,
      urls: [{ url }],
    });

    expect(summary.counts.failed).toBe(1);
    expect(summary.failures[0]).toMatchObject({ url, stage: "parse", kind: "MISSING_FIELDS" });
    expect(summary.failures[0].details?.missingFields).toEqual(["rawLocationText"]);
  });

  it("skips without fetching when the change signal matches the checkpoint", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/a/`;
    const { fetchImpl, requests } = routedFetch({
      [url]: html(reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options.")),
    });
    const deps = createDeps(store, fetchImpl);
    const urls = [{ url, changeSignal: "2024-01-01T00:00:00" }];

    await runReviewIngestion(deps, { source, concurrency: 1, urls });
    const second = await runReviewIngestion(deps, { source, concurrency: 1, urls });

    expect(second.counts.skipped).toBe(1);
    expect(requests).toHaveLength(1);
  });

  it("treats a 304 as skipped", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/a/`;
    const page = reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options.");
    const { fetchImpl, requests } = routedFetch({
      [url]: (request) =>
        request.headers.get("if-none-match") === '"v1"'
          ? new Response(null, { status: 304 })
          : html(page, { etag: '"v1"' }),
    });
    const deps = createDeps(store, fetchImpl);

    await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url }] });
    const second = await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url }] });

    expect(second.counts.skipped).toBe(1);
    expect(requests[1].headers.get("if-none-match")).toBe('"v1"');
  });

  it("supersedes an unresolved record once the location resolves", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/pho/`;
    const { fetchImpl } = routedFetch({
      [url]: html(reviewPage("Pho 88", "2 New Row", "Rich broth.", ["Pho"])),
    });

    await runReviewIngestion(createDeps(store, fetchImpl, { "2 new row": null }), {
      source,
      concurrency: 1,
      urls: [{ url }],
    });
    const [unresolved] = await store.restaurants.list();
    expect(unresolved.locationStatus).toBe("unresolved");

    const second = await runReviewIngestion(
      createDeps(store, fetchImpl, { "2 new row": { lat: 38.88, lon: -77.1, locality: "Clarendon", quality: 1 } }),
      { source, concurrency: 1, urls: [{ url }], full: true }
    );

    expect(second.counts.created).toBe(1);
    const live = await store.restaurants.list();
    expect(live).toHaveLength(1);
    expect(live[0]).toMatchObject({ displayName: "Pho 88", neighborhood: "Clarendon" });

    const old = await store.restaurants.get(unresolved.restaurantId);
    expect(old?.tombstoneReason).toBe(`superseded by ${live[0].restaurantId}`);
  });

  it("retries an unresolved location on the next incremental run", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/pho/`;
    const { fetchImpl } = routedFetch({
      [url]: html(reviewPage("Pho 88", "2 New Row", "Rich broth.", ["Pho"])),
    });

    await runReviewIngestion(createDeps(store, fetchImpl, { "2 new row": null }), {
      source,
      concurrency: 1,
      urls: [{ url }],
    });
    const [unresolved] = await store.restaurants.list();
    expect(unresolved.locationStatus).toBe("unresolved");
    expect((await store.checkpoints.getCheckpoint(url))?.locationStatus).toBe("unresolved");

    const retry = createDeps(store, fetchImpl, {
      "2 new row": { lat: 38.88, lon: -77.1, locality: "Clarendon", quality: 1 },
    });
    const second = await runReviewIngestion(retry, { source, concurrency: 1, urls: [{ url }] });

    expect(retry.geocoder.queries).toEqual(["2 new row"]);
    expect(second.counts).toEqual({ created: 1, updated: 0, unchanged: 0, skipped: 0, failed: 0 });
    const live = await store.restaurants.list();
    expect(live.map((r) => [r.displayName, r.neighborhood, r.locationStatus])).toEqual([
      ["Pho 88", "Clarendon", "resolved"],
    ]);
    expect((await store.restaurants.get(unresolved.restaurantId))?.tombstoneReason).toBe(
      `superseded by ${live[0].restaurantId}`
    );

    const third = await runReviewIngestion(retry, { source, concurrency: 1, urls: [{ url }] });
    expect(third.counts.skipped).toBe(1);
  });

  it("keeps the newest post when two posts review the same restaurant", async () => {
    const older = `${SITE}/pho-2019/`;
    const newer = `${SITE}/pho-2021/`;
    const routes: Record<string, Response> = {
      [older]: html(reviewPage("Pho 88", "Located in Shaw", "First visit.", [], "2019-05-01T12:00:00.000Z")),
      [newer]: html(reviewPage("Pho 88", "Located in Shaw", "Second visit.", [], "2021-08-01T12:00:00.000Z")),
    };

    const store = createMemoryReviewStore();
    const deps = createDeps(store, routedFetch(routes).fetchImpl);
    const first = await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url: older }, { url: newer }] });
    const again = await runReviewIngestion(deps, {
      source,
      concurrency: 1,
      urls: [{ url: older }, { url: newer }],
      full: true,
    });

    expect(first.counts).toEqual({ created: 1, updated: 1, unchanged: 0, skipped: 0, failed: 0 });
    expect(again.counts).toEqual({ created: 0, updated: 0, unchanged: 2, skipped: 0, failed: 0 });
    const [record] = await store.restaurants.list();
    expect(record).toMatchObject({ sourceUrl: newer, reviewBody: "Second visit." });
    expect(await store.restaurants.history(record.restaurantId)).toHaveLength(2);

    const reversed = createMemoryReviewStore();
    const reversedRun = await runReviewIngestion(createDeps(reversed, routedFetch(routes).fetchImpl), {
      source,
      concurrency: 1,
      urls: [{ url: newer }, { url: older }],
    });
    expect(reversedRun.counts).toEqual({ created: 1, updated: 0, unchanged: 1, skipped: 0, failed: 0 });
    expect((await reversed.restaurants.list())[0]).toMatchObject({ sourceUrl: newer, reviewBody: "Second visit." });
  });

  it("creates the Green Leaf Cafe record from a geocoded neighborhood", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/green-leaf-cafe/`;
    const { fetchImpl } = routedFetch({
      [url]: html(reviewPage("Green Leaf Cafe", "in the Riverside area", "Great vegan options.", ["Vegetarian"])),
    });
    const deps = createDeps(store, fetchImpl, {
      riverside: { lat: 38.9, lon: -77.05, locality: "Riverside", quality: 0.5 },
    });

    const summary = await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url }] });

    expect(deps.geocoder.queries).toEqual(["riverside"]);
    expect(summary.counts.created).toBe(1);
    expect(summary.warnings).toEqual([]);
    expect(await store.restaurants.get(computeRestaurantId("green leaf cafe", "riverside"))).toMatchObject({
      displayName: "Green Leaf Cafe",
      neighborhood: "Riverside",
      coordinates: { lat: 38.9, lon: -77.05 },
      locationConfidence: 0.75,
      locationStatus: "resolved",
      rawLocationText: "in the Riverside area",
      cuisineTags: ["vegetarian"],
    });
  });

  it("geocodes a location text shared by two restaurants once per run", async () => {
    const store = createMemoryReviewStore();
    const { fetchImpl } = routedFetch({
      [`${SITE}/blue-door/`]: html(reviewPage("Blue Door Diner", "1 Fake St", "Enormous pancakes.")),
      [`${SITE}/red-door/`]: html(reviewPage("Red Door Grill", "1 Fake St.", "Good burgers.")),
    });
    const deps = createDeps(store, fetchImpl, GEOCODER_HITS);

    const summary = await runReviewIngestion(deps, {
      source,
      concurrency: 2,
      urls: [{ url: `${SITE}/blue-door/` }, { url: `${SITE}/red-door/` }],
    });

    expect(summary.counts.created).toBe(2);
    expect(deps.geocoder.queries).toEqual(["1 fake st"]);
    expect((await store.restaurants.list()).map((r) => r.neighborhood)).toEqual(["Shaw", "Shaw"]);
  });

  it("does not bring back a tombstoned restaurant", async () => {
    const store = createMemoryReviewStore();
    const url = `${SITE}/a/`;
    const routes: Record<string, Response> = {
      [url]: html(reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options.")),
    };
    const { fetchImpl } = routedFetch(routes);
    const deps = createDeps(store, fetchImpl);

    await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url }] });
    const [record] = await store.restaurants.list();
    await store.restaurants.tombstone(record.restaurantId, { confirm: true, reason: "closed" });

    routes[url] = html(reviewPage("Green Leaf Cafe", "Located in Petworth", "Reopened with a new menu."));
    const second = await runReviewIngestion(deps, { source, concurrency: 1, urls: [{ url }] });

    expect(second.counts.unchanged).toBe(1);
    expect(second.warnings.map((w) => w.kind)).toEqual(["TOMBSTONED"]);
    expect(await store.restaurants.list()).toEqual([]);
    expect((await store.restaurants.get(record.restaurantId))?.reviewBody).toBe("Great vegan options.");
  });

  it("stops taking new items once the signal is aborted", async () => {
    const store = createMemoryReviewStore();
    const controller = new AbortController();
    const routes: Record<string, Response> = {};
    const urls: DiscoveredUrl[] = [];
    for (let i = 1; i <= 3; i++) {
      const url = `${SITE}/stop-${i}/`;
      urls.push({ url });
      routes[url] = html(reviewPage(`Stop ${i}`, "Located in Shaw", "Fine."));
    }
    const routed = routedFetch(routes);
    const fetchImpl: typeof fetch = (input, init) => {
      controller.abort();
      return routed.fetchImpl(input, init);
    };

    const summary = await runReviewIngestion(createDeps(store, fetchImpl), {
      source,
      concurrency: 1,
      urls,
      signal: controller.signal,
    });

    expect(summary.stopped).toBe(true);
    expect(summary.counts.created).toBe(1);
    expect(await store.runs.listRuns()).toHaveLength(1);
  });

  it("retries a write conflict once", async () => {
    const store = createMemoryReviewStore();
    let conflicts = 0;
    const conflicting: ReviewStore = {
      restaurants: {
        ...store.restaurants,
        upsert: async (record, context) => {
          if (conflicts === 0) {
            conflicts++;
            throw new StoreError("raced", "WRITE_CONFLICT");
          }
          return store.restaurants.upsert(record, context);
        },
      },
      checkpoints: store.checkpoints,
      geocodeCache: store.geocodeCache,
      runs: store.runs,
      close: () => store.close(),
    };
    const url = `${SITE}/a/`;
    const { fetchImpl } = routedFetch({
      [url]: html(reviewPage("Green Leaf Cafe", "Located in Petworth", "Great vegan options.")),
    });

    const summary = await runReviewIngestion(createDeps(conflicting, fetchImpl), {
      source,
      concurrency: 1,
      urls: [{ url }],
    });

    expect(conflicts).toBe(1);
    expect(summary.counts).toEqual({ created: 1, updated: 0, unchanged: 0, skipped: 0, failed: 0 });
  });

  it("stops the run and rethrows when the store becomes unavailable", async () => {
    const store = createMemoryReviewStore();
    const outage = new StoreError("database is down", "UNAVAILABLE");
    const failing: ReviewStore = {
      restaurants: {
        ...store.restaurants,
        upsert: async () => {
          throw outage;
        },
      },
      checkpoints: store.checkpoints,
      geocodeCache: store.geocodeCache,
      runs: store.runs,
      close: () => store.close(),
    };
    const routes: Record<string, Response> = {};
    const urls: DiscoveredUrl[] = [];
    for (let i = 1; i <= 4; i++) {
      const url = `${SITE}/down-${i}/`;
      urls.push({ url });
      routes[url] = html(reviewPage(`Down ${i}`, "Located in Shaw", "Fine."));
    }
    const { fetchImpl, requests } = routedFetch(routes);
    const lines: string[] = [];
    const deps = { ...createDeps(failing, fetchImpl), observer: new ConsoleObserver((line) => lines.push(line)) };

    await expect(runReviewIngestion(deps, { source, concurrency: 1, urls })).rejects.toBe(outage);

    expect(requests).toHaveLength(1);
    expect(await store.runs.listRuns()).toEqual([]);

    const runEnd: unknown = JSON.parse(lines[lines.length - 1]);
    expect(runEnd).toMatchObject({
      event: "review_ingestion_run_end",
      ok: false,
      error: "database is down",
      summary: { stopped: true, counts: { failed: 1 } },
    });
  });

  it("fails the run when the first index page cannot be fetched", async () => {
    const store = createMemoryReviewStore();
    const { fetchImpl } = routedFetch({});

    await expect(runReviewIngestion(createDeps(store, fetchImpl), { source, concurrency: 1 })).rejects.toMatchObject({
      kind: "TERMINAL",
    });
  });
});
