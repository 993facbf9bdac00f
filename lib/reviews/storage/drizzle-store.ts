/**
 * PostgreSQL Review Store
 *
 * drizzle-orm over node-postgres. Updates are optimistic: the row is only
 * rewritten while its content hash still matches the one that was read,
 * so two writers racing on the same restaurant surface as WRITE_CONFLICT.
 */

import { and, desc, eq, isNull } from "drizzle-orm";
import type { Database } from "@/lib/db";
import {
  geocodeCache,
  ingestionRuns,
  restaurantChanges,
  restaurants,
  sourceCheckpoints,
  type GeocodeCacheRow,
  type IngestionRunRow,
  type NewRestaurantRow,
  type RestaurantChangeRow,
  type RestaurantRow,
  type SourceCheckpointRow,
} from "@/lib/db/schema";
import {
  changeKindSchema,
  locationStatusSchema,
  resolutionMethodSchema,
} from "../api/schemas";
import { errorMessage, StoreError, TombstoneConfirmationError } from "../errors";
import type {
  ResolvedLocation,
  RestaurantChange,
  RestaurantRecord,
  RestaurantRecordInput,
  RunSummary,
  SourceCheckpoint,
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

// ============================================================================
// Row Mapping
// ============================================================================

function iso(date: Date): string {
  return date.toISOString();
}

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function orUndefined<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

export function recordToRow(record: RestaurantRecord): NewRestaurantRow {
  return {
    restaurantId: record.restaurantId,
    displayName: record.displayName,
    neighborhood: record.neighborhood,
    latitude: record.coordinates ? record.coordinates.lat : null,
    longitude: record.coordinates ? record.coordinates.lon : null,
    locationConfidence: record.locationConfidence,
    locationStatus: record.locationStatus,
    rawLocationText: record.rawLocationText,
    cuisineTags: record.cuisineTags,
    reviewBody: record.reviewBody,
    publishedAt: new Date(record.publishedAt),
    publishedAtInferred: record.publishedAtInferred,
    yelpUrl: record.yelpUrl,
    mapsUrl: record.mapsUrl,
    sourceUrl: record.sourceUrl,
    sourcePostId: record.sourcePostId,
    modifiedAt: record.modifiedAt ? new Date(record.modifiedAt) : null,
    fetchedAt: new Date(record.fetchedAt),
    parsedAt: new Date(record.parsedAt),
    firstSeenAt: new Date(record.firstSeenAt),
    lastUpdatedAt: new Date(record.lastUpdatedAt),
    contentHash: record.contentHash,
    tombstonedAt: record.tombstonedAt ? new Date(record.tombstonedAt) : null,
    tombstoneReason: record.tombstoneReason,
  };
}

export function rowToRecord(row: RestaurantRow): RestaurantRecord {
  return {
    restaurantId: row.restaurantId,
    displayName: row.displayName,
    neighborhood: row.neighborhood,
    coordinates:
      row.latitude !== null && row.longitude !== null
        ? { lat: row.latitude, lon: row.longitude }
        : null,
    locationConfidence: row.locationConfidence,
    locationStatus: locationStatusSchema.parse(row.locationStatus),
    rawLocationText: row.rawLocationText,
    cuisineTags: row.cuisineTags,
    reviewBody: row.reviewBody,
    publishedAt: iso(row.publishedAt),
    publishedAtInferred: row.publishedAtInferred,
    yelpUrl: row.yelpUrl,
    mapsUrl: row.mapsUrl,
    sourceUrl: row.sourceUrl,
    sourcePostId: row.sourcePostId,
    modifiedAt: isoOrNull(row.modifiedAt),
    fetchedAt: iso(row.fetchedAt),
    parsedAt: iso(row.parsedAt),
    firstSeenAt: iso(row.firstSeenAt),
    lastUpdatedAt: iso(row.lastUpdatedAt),
    contentHash: row.contentHash,
    tombstonedAt: isoOrNull(row.tombstonedAt),
    tombstoneReason: row.tombstoneReason,
  };
}

function rowToChange(row: RestaurantChangeRow): RestaurantChange {
  return {
    restaurantId: row.restaurantId,
    change: changeKindSchema.parse(row.change),
    contentHash: row.contentHash,
    previousContentHash: row.previousContentHash,
    sourceUrl: row.sourceUrl,
    runId: orUndefined(row.runId),
    at: iso(row.at),
    reason: orUndefined(row.reason),
  };
}

function rowToLocation(row: GeocodeCacheRow): ResolvedLocation {
  return {
    neighborhoodName: row.neighborhoodName,
    latitude: row.latitude,
    longitude: row.longitude,
    confidence: row.confidence,
    status: locationStatusSchema.parse(row.status),
    method: resolutionMethodSchema.parse(row.method),
    cacheKey: row.cacheKey,
  };
}

function rowToCheckpoint(row: SourceCheckpointRow): SourceCheckpoint {
  return {
    sourceUrl: row.sourceUrl,
    contentHash: row.contentHash,
    changeSignal: orUndefined(row.changeSignal),
    etag: orUndefined(row.etag),
    lastModified: orUndefined(row.lastModified),
    restaurantId: orUndefined(row.restaurantId),
    locationStatus: row.locationStatus === null ? undefined : locationStatusSchema.parse(row.locationStatus),
    processedAt: iso(row.processedAt),
  };
}

function rowToRunSummary(row: IngestionRunRow): RunSummary {
  return {
    runId: row.runId,
    startedAt: iso(row.startedAt),
    finishedAt: iso(row.finishedAt),
    full: row.full,
    stopped: row.stopped,
    discovered: row.discovered,
    counts: row.counts,
    failures: row.failures,
    warnings: row.warnings,
    unknownTags: row.unknownTags,
  };
}

// ============================================================================
// Error Mapping
// ============================================================================

const PG_UNIQUE_VIOLATION = "23505";

function pgErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  // drizzle wraps driver errors; the pg code sits on the cause
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") return current.code;
    current = current.cause;
  }
  return undefined;
}

function toStoreError(error: unknown, operation: string): StoreError {
  if (error instanceof StoreError) return error;
  if (pgErrorCode(error) === PG_UNIQUE_VIOLATION) {
    return new StoreError(`${operation}: concurrent write`, "WRITE_CONFLICT", error);
  }
  return new StoreError(`${operation}: ${errorMessage(error)}`, "UNAVAILABLE", error);
}

// ============================================================================
// Store
// ============================================================================

export class DrizzleReviewStore implements ReviewStore {
  readonly restaurants: RestaurantStore;
  readonly checkpoints: CheckpointStore;
  readonly geocodeCache: GeocodeCache;
  readonly runs: RunLog;

  constructor(
    private readonly db: Database,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {
    this.restaurants = {
      upsert: (record, context) => this.guard("upsert", () => this.upsert(record, context)),
      get: (id) => this.guard("get", () => this.getRecord(id)),
      list: (options) => this.guard("list", () => this.listRecords(options)),
      findBySourceUrl: (url) => this.guard("findBySourceUrl", () => this.findBySourceUrl(url)),
      history: (id) => this.guard("history", () => this.historyFor(id)),
      tombstone: (id, options) => this.tombstone(id, options),
    };
    this.checkpoints = {
      getCheckpoint: (url) => this.guard("getCheckpoint", () => this.getCheckpoint(url)),
      saveCheckpoint: (checkpoint) =>
        this.guard("saveCheckpoint", () => this.saveCheckpoint(checkpoint)),
    };
    this.geocodeCache = {
      get: (key) => this.guard("geocodeCache.get", () => this.getLocation(key)),
      putIfAbsent: (key, location) =>
        this.guard("geocodeCache.putIfAbsent", () => this.putLocationIfAbsent(key, location)),
      invalidate: (key) => this.guard("geocodeCache.invalidate", () => this.invalidateLocation(key)),
    };
    this.runs = {
      recordRun: (summary) => this.guard("recordRun", () => this.recordRun(summary)),
      listRuns: (limit = 20) => this.guard("listRuns", () => this.listRuns(limit)),
    };
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private async guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw toStoreError(error, operation);
    }
  }

  // ==========================================================================
  // Restaurants
  // ==========================================================================

  private async upsert(
    input: RestaurantRecordInput,
    context: UpsertContext = {}
  ): Promise<UpsertResult> {
    const now = context.now ?? new Date().toISOString();
    const existing = await this.getRecord(input.restaurantId);

    if (existing?.tombstonedAt) {
      return { result: "unchanged", record: existing, tombstoned: true };
    }
    if (existing && (existing.contentHash === input.contentHash || storedPostWins(existing, input))) {
      return { result: "unchanged", record: existing };
    }

    const record: RestaurantRecord = {
      ...input,
      firstSeenAt: existing ? existing.firstSeenAt : now,
      lastUpdatedAt: now,
      tombstonedAt: null,
      tombstoneReason: null,
    };

    await this.db.transaction(async (tx) => {
      if (!existing) {
        const inserted = await tx
          .insert(restaurants)
          .values(recordToRow(record))
          .onConflictDoNothing()
          .returning({ id: restaurants.restaurantId });
        if (inserted.length === 0) {
          throw new StoreError(`Restaurant ${record.restaurantId} was created concurrently`, "WRITE_CONFLICT");
        }
      } else {
        const updated = await tx
          .update(restaurants)
          .set(recordToRow(record))
          .where(
            and(
              eq(restaurants.restaurantId, record.restaurantId),
              eq(restaurants.contentHash, existing.contentHash),
              isNull(restaurants.tombstonedAt)
            )
          )
          .returning({ id: restaurants.restaurantId });
        if (updated.length === 0) {
          throw new StoreError(`Restaurant ${record.restaurantId} changed concurrently`, "WRITE_CONFLICT");
        }
      }

      await tx.insert(restaurantChanges).values({
        restaurantId: record.restaurantId,
        change: existing ? "updated" : "created",
        contentHash: record.contentHash,
        previousContentHash: existing ? existing.contentHash : null,
        sourceUrl: record.sourceUrl,
        runId: context.runId,
        at: new Date(now),
      });
    });

    return { result: existing ? "updated" : "created", record };
  }

  private async getRecord(restaurantId: string): Promise<RestaurantRecord | null> {
    const rows = await this.db
      .select()
      .from(restaurants)
      .where(eq(restaurants.restaurantId, restaurantId))
      .limit(1);
    return rows.length > 0 ? rowToRecord(rows[0]) : null;
  }

  private async listRecords(options: ListOptions = {}): Promise<RestaurantRecord[]> {
    const rows = await this.db
      .select()
      .from(restaurants)
      .where(options.includeTombstoned ? undefined : isNull(restaurants.tombstonedAt))
      .orderBy(restaurants.restaurantId);
    return rows.map(rowToRecord);
  }

  private async findBySourceUrl(sourceUrl: string): Promise<RestaurantRecord[]> {
    const rows = await this.db
      .select()
      .from(restaurants)
      .where(eq(restaurants.sourceUrl, sourceUrl));
    return rows.map(rowToRecord);
  }

  private async historyFor(restaurantId: string): Promise<RestaurantChange[]> {
    const rows = await this.db
      .select()
      .from(restaurantChanges)
      .where(eq(restaurantChanges.restaurantId, restaurantId))
      .orderBy(restaurantChanges.at);
    return rows.map(rowToChange);
  }

  private async tombstone(
    restaurantId: string,
    options: TombstoneOptions
  ): Promise<RestaurantRecord | null> {
    if (options.confirm !== true) {
      throw new TombstoneConfirmationError(restaurantId);
    }

    return this.guard("tombstone", async () => {
      const existing = await this.getRecord(restaurantId);
      if (!existing) return null;
      if (existing.tombstonedAt) return existing;

      const now = options.now ?? new Date().toISOString();
      await this.db.transaction(async (tx) => {
        await tx
          .update(restaurants)
          .set({ tombstonedAt: new Date(now), tombstoneReason: options.reason })
          .where(eq(restaurants.restaurantId, restaurantId));
        await tx.insert(restaurantChanges).values({
          restaurantId,
          change: "tombstoned",
          contentHash: existing.contentHash,
          previousContentHash: existing.contentHash,
          sourceUrl: existing.sourceUrl,
          runId: options.runId,
          at: new Date(now),
          reason: options.reason,
        });
      });

      return { ...existing, tombstonedAt: now, tombstoneReason: options.reason };
    });
  }

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  private async getCheckpoint(sourceUrl: string): Promise<SourceCheckpoint | null> {
    const rows = await this.db
      .select()
      .from(sourceCheckpoints)
      .where(eq(sourceCheckpoints.sourceUrl, sourceUrl))
      .limit(1);
    return rows.length > 0 ? rowToCheckpoint(rows[0]) : null;
  }

  private async saveCheckpoint(checkpoint: SourceCheckpoint): Promise<void> {
    const values = {
      contentHash: checkpoint.contentHash,
      changeSignal: checkpoint.changeSignal ?? null,
      etag: checkpoint.etag ?? null,
      lastModified: checkpoint.lastModified ?? null,
      restaurantId: checkpoint.restaurantId ?? null,
      locationStatus: checkpoint.locationStatus ?? null,
      processedAt: new Date(checkpoint.processedAt),
    };
    await this.db
      .insert(sourceCheckpoints)
      .values({ sourceUrl: checkpoint.sourceUrl, ...values })
      .onConflictDoUpdate({ target: sourceCheckpoints.sourceUrl, set: values });
  }

  // ==========================================================================
  // Geocode Cache
  // ==========================================================================

  private async getLocation(key: string): Promise<ResolvedLocation | null> {
    const rows = await this.db
      .select()
      .from(geocodeCache)
      .where(eq(geocodeCache.cacheKey, key))
      .limit(1);
    return rows.length > 0 ? rowToLocation(rows[0]) : null;
  }

  private async putLocationIfAbsent(
    key: string,
    location: ResolvedLocation
  ): Promise<ResolvedLocation> {
    const inserted = await this.db
      .insert(geocodeCache)
      .values({
        cacheKey: key,
        neighborhoodName: location.neighborhoodName,
        latitude: location.latitude,
        longitude: location.longitude,
        confidence: location.confidence,
        status: location.status,
        method: location.method,
      })
      .onConflictDoNothing()
      .returning();

    if (inserted.length > 0) return rowToLocation(inserted[0]);

    const winner = await this.getLocation(key);
    if (!winner) {
      throw new StoreError(`Geocode cache entry ${key} vanished after a conflicting insert`, "WRITE_CONFLICT");
    }
    return winner;
  }

  private async invalidateLocation(key: string): Promise<boolean> {
    const deleted = await this.db
      .delete(geocodeCache)
      .where(eq(geocodeCache.cacheKey, key))
      .returning({ key: geocodeCache.cacheKey });
    return deleted.length > 0;
  }

  // ==========================================================================
  // Runs
  // ==========================================================================

  private async recordRun(summary: RunSummary): Promise<void> {
    const values = {
      startedAt: new Date(summary.startedAt),
      finishedAt: new Date(summary.finishedAt),
      full: summary.full,
      stopped: summary.stopped,
      discovered: summary.discovered,
      counts: summary.counts,
      failures: summary.failures,
      warnings: summary.warnings,
      unknownTags: summary.unknownTags,
    };
    await this.db
      .insert(ingestionRuns)
      .values({ runId: summary.runId, ...values })
      .onConflictDoUpdate({ target: ingestionRuns.runId, set: values });
  }

  private async listRuns(limit: number): Promise<RunSummary[]> {
    const rows = await this.db
      .select()
      .from(ingestionRuns)
      .orderBy(desc(ingestionRuns.startedAt))
      .limit(limit);
    return rows.map(rowToRunSummary);
  }
}
