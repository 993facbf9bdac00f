/**
 * Review Pipeline Types
 *
 * Core type definitions shared across the review ingestion pipeline.
 */

// ============================================================================
// Fetch
// ============================================================================

export interface RawDocument {
  sourceUrl: string;
  fetchedAt: string; // ISO timestamp
  rawContent: string;
  contentHash: string; // sha256 of rawContent
  contentType?: string;
  responseStatus: number;
  etag?: string;
  lastModified?: string;
}

/** Returned by a conditional GET when the source reports no change (HTTP 304). */
export interface NotModified {
  sourceUrl: string;
  notModified: true;
  fetchedAt: string;
}

export type FetchOutcome = RawDocument | NotModified;

export function isNotModified(outcome: FetchOutcome): outcome is NotModified {
  return "notModified" in outcome;
}

export interface ConditionalValidators {
  etag?: string;
  lastModified?: string;
}

export interface DiscoveredUrl {
  url: string;
  /** Source-provided change signal (e.g. WordPress modified_gmt) */
  changeSignal?: string;
}

// ============================================================================
// Parse
// ============================================================================

export interface ParsedReviewFields {
  restaurantName: string;
  rawLocationText: string;
  reviewBody: string;
  tags: string[];
  publishedAt: string;
  yelpUrl?: string;
  mapsUrl?: string;
  /** WordPress post id */
  sourcePostId?: number;
  modifiedAt?: string; // ISO timestamp
}

export type RequiredReviewField = "restaurantName" | "rawLocationText" | "reviewBody";

export const REQUIRED_REVIEW_FIELDS: readonly RequiredReviewField[] = [
  "restaurantName",
  "rawLocationText",
  "reviewBody",
];

export interface ParsedReview extends ParsedReviewFields {
  sourceUrl: string;
  publishedAtInferred: boolean;
  strategy: string;
  parserVersion: string;
}

// ============================================================================
// Resolve
// ============================================================================

export type LocationStatus = "resolved" | "low_confidence" | "unresolved";

export type ResolutionMethod = "gazetteer" | "geocoder" | "none";

export interface ResolvedLocation {
  neighborhoodName: string | null;
  latitude: number | null;
  longitude: number | null;
  confidence: number; // 0..1
  status: LocationStatus;
  method: ResolutionMethod;
  /** Normalized location text the result is cached under */
  cacheKey: string;
}

// ============================================================================
// Normalize / Store
// ============================================================================

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface RestaurantRecord {
  // Identity
  restaurantId: string;
  displayName: string;

  // Location
  neighborhood: string | null;
  coordinates: Coordinates | null;
  locationConfidence: number;
  locationStatus: LocationStatus;
  rawLocationText: string;

  // Review content
  cuisineTags: string[];
  reviewBody: string;
  publishedAt: string;
  publishedAtInferred: boolean;

  // Links
  yelpUrl: string | null;
  mapsUrl: string | null;

  // Provenance
  sourceUrl: string;
  sourcePostId: number | null;
  modifiedAt: string | null;
  fetchedAt: string;
  parsedAt: string;
  firstSeenAt: string;
  lastUpdatedAt: string;
  contentHash: string;

  // Tombstone
  tombstonedAt: string | null;
  tombstoneReason: string | null;
}

/** What the normalizer produces; the store owns the lifecycle fields. */
export type RestaurantRecordInput = Omit<
  RestaurantRecord,
  "firstSeenAt" | "lastUpdatedAt" | "tombstonedAt" | "tombstoneReason"
>;

export type UpsertOutcome = "created" | "updated" | "unchanged";

export interface UpsertResult {
  result: UpsertOutcome;
  record: RestaurantRecord;
  /** Set when the id carries a tombstone and the write was refused */
  tombstoned?: boolean;
}

export type RestaurantChangeKind = "created" | "updated" | "tombstoned";

export interface RestaurantChange {
  restaurantId: string;
  change: RestaurantChangeKind;
  contentHash: string;
  previousContentHash: string | null;
  sourceUrl: string;
  runId?: string;
  at: string;
  reason?: string;
}

export interface SourceCheckpoint {
  sourceUrl: string;
  contentHash: string;
  changeSignal?: string;
  etag?: string;
  lastModified?: string;
  restaurantId?: string;
  /** Location status of the committed record; unresolved ones are revisited */
  locationStatus?: LocationStatus;
  processedAt: string;
}

// ============================================================================
// Run Summary
// ============================================================================

export type PipelineStage = "discover" | "fetch" | "parse" | "resolve" | "normalize" | "upsert";

export interface ItemIssue {
  url: string;
  stage: PipelineStage;
  kind: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface RunCounts {
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  full: boolean;
  stopped: boolean;
  discovered: number;
  counts: RunCounts;
  failures: ItemIssue[];
  warnings: ItemIssue[];
  unknownTags: Array<{ tag: string; count: number }>;
}
