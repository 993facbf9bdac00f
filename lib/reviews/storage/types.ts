/**
 * Storage Contracts
 *
 * The orchestrator and resolver only see these interfaces; PostgreSQL,
 * JSON-file and in-memory backends implement them.
 */

import type {
  ResolvedLocation,
  RestaurantChange,
  RestaurantRecord,
  RestaurantRecordInput,
  RunSummary,
  SourceCheckpoint,
  UpsertResult,
} from "../types";

export interface UpsertContext {
  runId?: string;
  /** Overrides the write timestamp (tests, replays) */
  now?: string;
}

export interface TombstoneOptions {
  confirm: boolean;
  reason: string;
  runId?: string;
  now?: string;
}

export interface ListOptions {
  includeTombstoned?: boolean;
}

export interface RestaurantStore {
  /**
   * Create, update or leave unchanged, decided by contentHash. A record
   * that follows a newer post about the same restaurant is left unchanged.
   * @throws StoreError WRITE_CONFLICT when a concurrent writer got there first
   * @throws StoreError UNAVAILABLE when the backend can't be reached
   */
  upsert(record: RestaurantRecordInput, context?: UpsertContext): Promise<UpsertResult>;
  get(restaurantId: string): Promise<RestaurantRecord | null>;
  list(options?: ListOptions): Promise<RestaurantRecord[]>;
  findBySourceUrl(sourceUrl: string): Promise<RestaurantRecord[]>;
  history(restaurantId: string): Promise<RestaurantChange[]>;
  /**
   * @throws TombstoneConfirmationError unless `confirm` is true
   */
  tombstone(restaurantId: string, options: TombstoneOptions): Promise<RestaurantRecord | null>;
}

export interface CheckpointStore {
  getCheckpoint(sourceUrl: string): Promise<SourceCheckpoint | null>;
  saveCheckpoint(checkpoint: SourceCheckpoint): Promise<void>;
}

export interface GeocodeCache {
  get(key: string): Promise<ResolvedLocation | null>;
  /** Stores `location` unless the key already has an entry; returns the stored entry. */
  putIfAbsent(key: string, location: ResolvedLocation): Promise<ResolvedLocation>;
  invalidate(key: string): Promise<boolean>;
}

export interface RunLog {
  recordRun(summary: RunSummary): Promise<void>;
  listRuns(limit?: number): Promise<RunSummary[]>;
}

/**
 * Everything the pipeline persists, behind one handle.
 */
export interface ReviewStore {
  restaurants: RestaurantStore;
  checkpoints: CheckpointStore;
  geocodeCache: GeocodeCache;
  runs: RunLog;
  close(): Promise<void>;
}
