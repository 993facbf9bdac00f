/**
 * Review Ingestion Pipeline
 *
 * Orchestrates the full ingestion flow:
 * discover → (fetch → parse → resolve → normalize → upsert) per URL → summarize
 *
 * Items run on a bounded worker pool and fail independently. A store that
 * becomes unavailable stops the run: no new items start, in-flight items
 * finish, and the store error is rethrown once the summary is emitted.
 */

import { randomUUID } from "crypto";
import { discoverReviewUrls, type DiscoveryOptions, type DocumentFetcher } from "../fetcher";
import { parseReview, type ExtractionStrategy } from "../parser";
import type { LocationResolver } from "../resolver";
import { normalizeReview, type CuisineVocabulary, type NormalizeResult } from "../normalizer";
import type { ReviewStore } from "../storage";
import { createConsoleObserver, type ReviewIngestionObserver } from "../observability";
import { errorKind, errorMessage, ParseError, StoreError } from "../errors";
import { CRITIC_BLOG_SOURCE_KEY } from "../sources/critic-blog/constants";
import {
  isNotModified,
  type DiscoveredUrl,
  type ItemIssue,
  type ParsedReview,
  type PipelineStage,
  type RawDocument,
  type ResolvedLocation,
  type RestaurantRecordInput,
  type RunCounts,
  type RunSummary,
  type SourceCheckpoint,
  type UpsertResult,
} from "../types";
import { KeyedMutex } from "../utils/keyed-mutex";
import { toMatchKey } from "../utils/text";
import { runWorkerPool } from "../utils/worker-pool";

// ============================================================================
// Pipeline Configuration
// ============================================================================

export interface ReviewIngestionDeps {
  fetcher: DocumentFetcher;
  resolver: Pick<LocationResolver, "resolve">;
  store: ReviewStore;
  observer?: ReviewIngestionObserver;
  strategies?: readonly ExtractionStrategy[];
  vocabulary?: CuisineVocabulary;
  now?: () => Date;
}

export interface ReviewIngestionRequest {
  source: DiscoveryOptions;
  concurrency: number;
  /** Ignore checkpoints and reprocess every URL */
  full?: boolean;
  /** Checked before each item starts */
  signal?: AbortSignal;
  /** Process these URLs instead of walking the index */
  urls?: DiscoveredUrl[];
}

type ItemOutcome = keyof RunCounts;

// ============================================================================
// Run State
// ============================================================================

class RunState {
  readonly counts: RunCounts = { created: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };
  readonly failures: ItemIssue[] = [];
  readonly warnings: ItemIssue[] = [];
  readonly unknownTags = new Map<string, number>();
  fatalError: StoreError | undefined;

  fail(url: string, stage: PipelineStage, error: unknown, details?: Record<string, unknown>): void {
    this.counts.failed++;
    this.failures.push({ url, stage, kind: errorKind(error), message: errorMessage(error), details });
  }

  warn(issue: ItemIssue): void {
    this.warnings.push(issue);
  }

  countTags(tags: readonly string[]): void {
    for (const tag of tags) {
      this.unknownTags.set(tag, (this.unknownTags.get(tag) ?? 0) + 1);
    }
  }

  sortedUnknownTags(): RunSummary["unknownTags"] {
    return [...this.unknownTags.entries()]
      .map(([tag, count]) => ({ tag, count }))
      .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
  }
}

/**
 * Marks an item as already failed and recorded, so the worker stops
 * without counting it twice.
 */
class ItemFailed extends Error {
  constructor() {
    super("item failed");
    this.name = "ItemFailed";
  }
}

// ============================================================================
// Main Pipeline Function
// ============================================================================

export async function runReviewIngestion(
  deps: ReviewIngestionDeps,
  request: ReviewIngestionRequest
): Promise<RunSummary> {
  const runId = randomUUID();
  const observer = deps.observer ?? createConsoleObserver();
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const runStart = Date.now();
  const full = request.full ?? false;
  const state = new RunState();
  const mutex = new KeyedMutex();

  observer.onRunStart({
    runId,
    sourceKey: CRITIC_BLOG_SOURCE_KEY,
    input: { baseUrl: request.source.baseUrl, mode: request.source.mode, full },
  });

  const step = async <T>(name: string, url: string | undefined, task: () => Promise<T> | T): Promise<T> => {
    const stepStart = Date.now();
    observer.onStepStart({ runId, step: name, url });
    try {
      const result = await task();
      observer.onStepEnd({ runId, step: name, url, ok: true, durationMs: Date.now() - stepStart });
      return result;
    } catch (error) {
      observer.onStepEnd({
        runId,
        step: name,
        url,
        ok: false,
        durationMs: Date.now() - stepStart,
        data: { kind: errorKind(error), message: errorMessage(error) },
      });
      throw error;
    }
  };

  // ==========================================================================
  // DISCOVER
  // ==========================================================================
  let items: DiscoveredUrl[];
  if (request.urls) {
    items = dedupe(request.urls);
  } else {
    try {
      const discovery = await step("discover", undefined, () =>
        discoverReviewUrls(deps.fetcher, request.source)
      );
      items = discovery.urls;
      discovery.issues.forEach((issue) => state.warn(issue));
      observer.increment("reviews.index_pages", discovery.pagesVisited);
    } catch (error) {
      observer.onRunEnd({ runId, ok: false, durationMs: Date.now() - runStart, error: errorMessage(error) });
      throw error;
    }
  }
  observer.increment("reviews.discovered", items.length);

  // ==========================================================================
  // PER ITEM
  // ==========================================================================

  const upsertOnce = async (record: RestaurantRecordInput): Promise<UpsertResult> => {
    try {
      return await deps.store.restaurants.upsert(record, { runId, now: now().toISOString() });
    } catch (error) {
      if (error instanceof StoreError && error.kind === "WRITE_CONFLICT") {
        console.warn(`[Pipeline] Write conflict on ${record.restaurantId}; retrying once`);
        observer.increment("reviews.write_conflict_retry");
        return deps.store.restaurants.upsert(record, { runId, now: now().toISOString() });
      }
      throw error;
    }
  };

  /**
   * A resolved record replaces an earlier unresolved one for the same
   * post and name; the old one is tombstoned rather than left as a duplicate.
   */
  const supersedeUnresolved = async (record: RestaurantRecordInput, nameKey: string): Promise<void> => {
    const siblings = await deps.store.restaurants.findBySourceUrl(record.sourceUrl);
    for (const sibling of siblings) {
      if (
        sibling.restaurantId === record.restaurantId ||
        sibling.locationStatus !== "unresolved" ||
        sibling.tombstonedAt ||
        toMatchKey(sibling.displayName) !== nameKey
      ) {
        continue;
      }
      await mutex.runExclusive(sibling.restaurantId, () =>
        deps.store.restaurants.tombstone(sibling.restaurantId, {
          confirm: true,
          reason: `superseded by ${record.restaurantId}`,
          runId,
          now: now().toISOString(),
        })
      );
      observer.increment("reviews.superseded");
    }
  };

  const processItem = async (item: DiscoveredUrl): Promise<ItemOutcome> => {
    const url = item.url;
    const stored = full ? null : await deps.store.checkpoints.getCheckpoint(url);
    // A post whose location didn't resolve is reprocessed until it does
    const checkpoint = stored?.locationStatus === "unresolved" ? null : stored;

    if (checkpoint && item.changeSignal && checkpoint.changeSignal === item.changeSignal) {
      return "skipped";
    }

    // FETCH
    let document: RawDocument;
    try {
      const outcome = await step("fetch", url, () =>
        deps.fetcher.fetch(
          url,
          checkpoint ? { etag: checkpoint.etag, lastModified: checkpoint.lastModified } : undefined
        )
      );
      if (isNotModified(outcome)) return "skipped";
      document = outcome;
    } catch (error) {
      state.fail(url, "fetch", error);
      throw new ItemFailed();
    }

    if (checkpoint && checkpoint.contentHash === document.contentHash) {
      // Same bytes as the last committed version; only refresh the validators
      await deps.store.checkpoints.saveCheckpoint(
        buildCheckpoint(document, item, checkpoint, now())
      );
      return "skipped";
    }

    // PARSE
    let parsed: ParsedReview;
    try {
      parsed = await step("parse", url, () => parseReview(document, deps.strategies));
    } catch (error) {
      const details =
        error instanceof ParseError
          ? { missingFields: error.missingFields, strategiesTried: error.strategiesTried, partial: error.partial }
          : undefined;
      state.fail(url, "parse", error, details);
      throw new ItemFailed();
    }

    // RESOLVE
    let location: ResolvedLocation;
    try {
      location = await step("resolve", url, () => deps.resolver.resolve(parsed.rawLocationText));
    } catch (error) {
      state.fail(url, "resolve", error, { rawLocationText: parsed.rawLocationText });
      throw new ItemFailed();
    }

    if (location.status === "unresolved") {
      state.warn({
        url,
        stage: "resolve",
        kind: "NO_MATCH",
        message: `No neighborhood found for "${parsed.rawLocationText}"`,
      });
    } else if (location.status === "low_confidence") {
      state.warn({
        url,
        stage: "resolve",
        kind: "LOW_CONFIDENCE",
        message: `"${parsed.rawLocationText}" resolved to ${location.neighborhoodName} with confidence ${location.confidence}`,
      });
    }

    // NORMALIZE
    let normalized: NormalizeResult;
    try {
      normalized = await step("normalize", url, () =>
        normalizeReview(
          parsed,
          location,
          { fetchedAt: document.fetchedAt, parsedAt: now().toISOString() },
          deps.vocabulary
        )
      );
    } catch (error) {
      state.fail(url, "normalize", error);
      throw new ItemFailed();
    }
    state.countTags(normalized.unknownTags);

    // UPSERT
    const { record, nameKey } = normalized;
    let upsert: UpsertResult;
    try {
      upsert = await step("upsert", url, () =>
        mutex.runExclusive(record.restaurantId, () => upsertOnce(record))
      );
      if (upsert.result === "created" && location.status !== "unresolved") {
        await supersedeUnresolved(record, nameKey);
      }
      await deps.store.checkpoints.saveCheckpoint(
        buildCheckpoint(document, item, record, now())
      );
    } catch (error) {
      state.fail(url, "upsert", error, { restaurantId: record.restaurantId });
      if (error instanceof StoreError && error.kind === "UNAVAILABLE") {
        state.fatalError = state.fatalError ?? error;
      }
      throw new ItemFailed();
    }

    if (upsert.tombstoned) {
      state.warn({
        url,
        stage: "upsert",
        kind: "TOMBSTONED",
        message: `Restaurant ${record.restaurantId} is tombstoned; update ignored`,
      });
    }

    return upsert.result;
  };

  const pool = await runWorkerPool(
    items,
    async (item) => {
      let outcome: ItemOutcome;
      try {
        outcome = await processItem(item);
      } catch (error) {
        if (error instanceof ItemFailed) {
          observer.increment("reviews.failed");
          return;
        }
        if (error instanceof StoreError && error.kind === "UNAVAILABLE") {
          state.fail(item.url, "upsert", error);
          state.fatalError = state.fatalError ?? error;
          return;
        }
        throw error;
      }
      state.counts[outcome]++;
      observer.increment(`reviews.${outcome}`);
    },
    {
      concurrency: request.concurrency,
      shouldStop: () => request.signal?.aborted === true || state.fatalError !== undefined,
    }
  );

  // ==========================================================================
  // SUMMARIZE
  // ==========================================================================
  const summary: RunSummary = {
    runId,
    startedAt,
    finishedAt: now().toISOString(),
    full,
    stopped: pool.stopped,
    discovered: items.length,
    counts: state.counts,
    failures: state.failures,
    warnings: state.warnings,
    unknownTags: state.sortedUnknownTags(),
  };

  if (state.fatalError) {
    observer.onRunEnd({
      runId,
      ok: false,
      durationMs: Date.now() - runStart,
      error: state.fatalError.message,
      summary,
    });
    throw state.fatalError;
  }

  await deps.store.runs.recordRun(summary);

  observer.timing("reviews.run_ms", Date.now() - runStart);
  observer.onRunEnd({ runId, ok: true, durationMs: Date.now() - runStart, summary });

  return summary;
}

// ============================================================================
// Helpers
// ============================================================================

function dedupe(urls: readonly DiscoveredUrl[]): DiscoveredUrl[] {
  const seen = new Map<string, DiscoveredUrl>();
  for (const item of urls) {
    if (!seen.has(item.url)) seen.set(item.url, item);
  }
  return [...seen.values()];
}

function buildCheckpoint(
  document: RawDocument,
  item: DiscoveredUrl,
  committed: Pick<SourceCheckpoint, "restaurantId" | "locationStatus">,
  processedAt: Date
): SourceCheckpoint {
  return {
    sourceUrl: document.sourceUrl,
    contentHash: document.contentHash,
    changeSignal: item.changeSignal,
    etag: document.etag,
    lastModified: document.lastModified,
    restaurantId: committed.restaurantId,
    locationStatus: committed.locationStatus,
    processedAt: processedAt.toISOString(),
  };
}
