/**
 * In-Memory Review Store
 *
 * Holds a whole store snapshot in memory. Used directly by tests and as
 * the base of the JSON-file store, which persists the snapshot after
 * every mutation.
 */

import type { StoreSnapshot } from "../api/schemas";
import { TombstoneConfirmationError } from "../errors";
import type {
  ResolvedLocation,
  RestaurantChange,
  RestaurantRecord,
  RestaurantRecordInput,
  RunSummary,
  UpsertResult,
} from "../types";
import type {
  CheckpointStore,
  GeocodeCache,
  ListOptions,
  RestaurantStore,
  ReviewStore,
  RunLog,
  TombstoneOptions,
  UpsertContext,
} from "./types";
import { storedPostWins } from "./post-preference";

export function emptySnapshot(): StoreSnapshot {
  return {
    version: 1,
    restaurants: {},
    history: [],
    checkpoints: {},
    geocodeCache: {},
    runs: [],
  };
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryReviewStore implements ReviewStore {
  readonly restaurants: RestaurantStore;
  readonly checkpoints: CheckpointStore;
  readonly geocodeCache: GeocodeCache;
  readonly runs: RunLog;

  constructor(protected state: StoreSnapshot = emptySnapshot()) {
    this.restaurants = {
      upsert: (record, context) => this.upsert(record, context),
      get: async (id) => this.getRecord(id),
      list: async (options) => this.listRecords(options),
      findBySourceUrl: async (url) => this.findBySourceUrl(url),
      history: async (id) => this.historyFor(id),
      tombstone: (id, options) => this.tombstone(id, options),
    };
    this.checkpoints = {
      getCheckpoint: async (url) => {
        const checkpoint = this.state.checkpoints[url];
        return checkpoint ? clone(checkpoint) : null;
      },
      saveCheckpoint: async (checkpoint) => {
        this.state.checkpoints[checkpoint.sourceUrl] = clone(checkpoint);
        await this.persist();
      },
    };
    this.geocodeCache = {
      get: async (key) => {
        const entry = this.state.geocodeCache[key];
        return entry ? clone(entry) : null;
      },
      putIfAbsent: (key, location) => this.putLocationIfAbsent(key, location),
      invalidate: async (key) => {
        if (!(key in this.state.geocodeCache)) return false;
        delete this.state.geocodeCache[key];
        await this.persist();
        return true;
      },
    };
    this.runs = {
      recordRun: async (summary) => {
        this.state.runs.push(clone(summary));
        await this.persist();
      },
      listRuns: async (limit = 20) => this.recentRuns(limit),
    };
  }

  /** Hook for subclasses that keep the snapshot somewhere durable. */
  protected async persist(): Promise<void> {}

  async close(): Promise<void> {}

  // ==========================================================================
  // Restaurants
  // ==========================================================================

  private async upsert(
    input: RestaurantRecordInput,
    context: UpsertContext = {}
  ): Promise<UpsertResult> {
    const now = context.now ?? new Date().toISOString();
    const existing = this.state.restaurants[input.restaurantId];

    if (existing?.tombstonedAt) {
      return { result: "unchanged", record: clone(existing), tombstoned: true };
    }
    if (existing && (existing.contentHash === input.contentHash || storedPostWins(existing, input))) {
      return { result: "unchanged", record: clone(existing) };
    }

    const record: RestaurantRecord = {
      ...clone(input),
      firstSeenAt: existing ? existing.firstSeenAt : now,
      lastUpdatedAt: now,
      tombstonedAt: null,
      tombstoneReason: null,
    };
    const change: RestaurantChange = {
      restaurantId: record.restaurantId,
      change: existing ? "updated" : "created",
      contentHash: record.contentHash,
      previousContentHash: existing ? existing.contentHash : null,
      sourceUrl: record.sourceUrl,
      runId: context.runId,
      at: now,
    };

    this.state.restaurants[record.restaurantId] = record;
    this.state.history.push(change);
    await this.persist();

    return { result: existing ? "updated" : "created", record: clone(record) };
  }

  private getRecord(restaurantId: string): RestaurantRecord | null {
    const record = this.state.restaurants[restaurantId];
    return record ? clone(record) : null;
  }

  private listRecords(options: ListOptions = {}): RestaurantRecord[] {
    return Object.values(this.state.restaurants)
      .filter((record) => options.includeTombstoned || !record.tombstonedAt)
      .sort((a, b) => a.restaurantId.localeCompare(b.restaurantId))
      .map(clone);
  }

  private findBySourceUrl(sourceUrl: string): RestaurantRecord[] {
    return Object.values(this.state.restaurants)
      .filter((record) => record.sourceUrl === sourceUrl)
      .map(clone);
  }

  private historyFor(restaurantId: string): RestaurantChange[] {
    return this.state.history
      .filter((change) => change.restaurantId === restaurantId)
      .map(clone);
  }

  private async tombstone(
    restaurantId: string,
    options: TombstoneOptions
  ): Promise<RestaurantRecord | null> {
    if (options.confirm !== true) {
      throw new TombstoneConfirmationError(restaurantId);
    }

    const existing = this.state.restaurants[restaurantId];
    if (!existing) return null;
    if (existing.tombstonedAt) return clone(existing);

    const now = options.now ?? new Date().toISOString();
    const record: RestaurantRecord = {
      ...existing,
      tombstonedAt: now,
      tombstoneReason: options.reason,
    };

    this.state.restaurants[restaurantId] = record;
    this.state.history.push({
      restaurantId,
      change: "tombstoned",
      contentHash: existing.contentHash,
      previousContentHash: existing.contentHash,
      sourceUrl: existing.sourceUrl,
      runId: options.runId,
      at: now,
      reason: options.reason,
    });
    await this.persist();

    return clone(record);
  }

  // ==========================================================================
  // Geocode Cache / Runs
  // ==========================================================================

  private async putLocationIfAbsent(
    key: string,
    location: ResolvedLocation
  ): Promise<ResolvedLocation> {
    const existing = this.state.geocodeCache[key];
    if (existing) return clone(existing);

    this.state.geocodeCache[key] = clone(location);
    await this.persist();
    return clone(location);
  }

  private recentRuns(limit: number): RunSummary[] {
    return this.state.runs.slice(-limit).reverse().map(clone);
  }
}

export function createMemoryReviewStore(): MemoryReviewStore {
  return new MemoryReviewStore();
}
