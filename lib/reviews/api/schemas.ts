/**
 * Schemas for persisted and exported review data
 */

import { z } from "zod";

// ============================================================================
// Persisted Records (JSON-file snapshot)
// ============================================================================

export const locationStatusSchema = z.enum(["resolved", "low_confidence", "unresolved"]);
export const resolutionMethodSchema = z.enum(["gazetteer", "geocoder", "none"]);
export const changeKindSchema = z.enum(["created", "updated", "tombstoned"]);

export const coordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const restaurantRecordSchema = z.object({
  restaurantId: z.string().min(1),
  displayName: z.string().min(1),
  neighborhood: z.string().nullable(),
  coordinates: coordinatesSchema.nullable(),
  locationConfidence: z.number().min(0).max(1),
  locationStatus: locationStatusSchema,
  rawLocationText: z.string(),
  cuisineTags: z.array(z.string()),
  reviewBody: z.string(),
  publishedAt: z.string(),
  publishedAtInferred: z.boolean(),
  yelpUrl: z.string().nullable().default(null),
  mapsUrl: z.string().nullable().default(null),
  sourceUrl: z.string(),
  sourcePostId: z.number().int().nullable().default(null),
  modifiedAt: z.string().nullable().default(null),
  fetchedAt: z.string(),
  parsedAt: z.string(),
  firstSeenAt: z.string(),
  lastUpdatedAt: z.string(),
  contentHash: z.string(),
  tombstonedAt: z.string().nullable(),
  tombstoneReason: z.string().nullable(),
});

export const restaurantChangeSchema = z.object({
  restaurantId: z.string(),
  change: changeKindSchema,
  contentHash: z.string(),
  previousContentHash: z.string().nullable(),
  sourceUrl: z.string(),
  runId: z.string().optional(),
  at: z.string(),
  reason: z.string().optional(),
});

export const sourceCheckpointSchema = z.object({
  sourceUrl: z.string(),
  contentHash: z.string(),
  changeSignal: z.string().optional(),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
  restaurantId: z.string().optional(),
  locationStatus: locationStatusSchema.optional(),
  processedAt: z.string(),
});

export const resolvedLocationSchema = z.object({
  neighborhoodName: z.string().nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  confidence: z.number().min(0).max(1),
  status: locationStatusSchema,
  method: resolutionMethodSchema,
  cacheKey: z.string(),
});

const itemIssueSchema = z.object({
  url: z.string(),
  stage: z.enum(["discover", "fetch", "parse", "resolve", "normalize", "upsert"]),
  kind: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export const runSummarySchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  full: z.boolean(),
  stopped: z.boolean(),
  discovered: z.number().int().min(0),
  counts: z.object({
    created: z.number().int().min(0),
    updated: z.number().int().min(0),
    unchanged: z.number().int().min(0),
    skipped: z.number().int().min(0),
    failed: z.number().int().min(0),
  }),
  failures: z.array(itemIssueSchema),
  warnings: z.array(itemIssueSchema),
  unknownTags: z.array(z.object({ tag: z.string(), count: z.number().int() })),
});

export const storeSnapshotSchema = z.object({
  version: z.literal(1),
  restaurants: z.record(z.string(), restaurantRecordSchema),
  history: z.array(restaurantChangeSchema),
  checkpoints: z.record(z.string(), sourceCheckpointSchema),
  geocodeCache: z.record(z.string(), resolvedLocationSchema),
  runs: z.array(runSummarySchema),
});

export type StoreSnapshot = z.infer<typeof storeSnapshotSchema>;

// ============================================================================
// Export Artifact
// ============================================================================

export const exportedRestaurantSchema = z.object({
  restaurant_id: z.string(),
  display_name: z.string(),
  neighborhood: z.string().nullable(),
  coordinates: coordinatesSchema.nullable(),
  location_confidence: z.number().min(0).max(1),
  location_status: locationStatusSchema,
  raw_location_text: z.string(),
  cuisine_tags: z.array(z.string()),
  review_body: z.string(),
  published_at: z.string(),
  published_at_inferred: z.boolean(),
  modified_at: z.string().nullable(),
  yelp_url: z.string().nullable(),
  maps_url: z.string().nullable(),
  source_url: z.string(),
  source_post_id: z.number().int().nullable(),
  first_seen_at: z.string(),
  last_updated_at: z.string(),
  content_hash: z.string(),
});

export const exportArtifactSchema = z.array(exportedRestaurantSchema);

export type ExportedRestaurant = z.infer<typeof exportedRestaurantSchema>;

export const exportedCuisineSchema = z.object({
  slug: z.string().min(1),
  aliases: z.array(z.string()),
  restaurant_count: z.number().int().min(0),
});

export const cuisineExportSchema = z.array(exportedCuisineSchema);

export type ExportedCuisine = z.infer<typeof exportedCuisineSchema>;

// ============================================================================
// CLI Arguments
// ============================================================================

export const runArgsSchema = z.object({
  full: z.boolean().default(false),
  concurrency: z.coerce.number().int().min(1).max(32).optional(),
  rateLimitMs: z.coerce.number().int().min(0).optional(),
  maxPages: z.coerce.number().int().positive().optional(),
});

export type RunArgs = z.infer<typeof runArgsSchema>;

export const tombstoneArgsSchema = z.object({
  restaurantId: z.string().min(1, "restaurantId is required"),
  confirm: z.boolean(),
  reason: z.string().min(1).default("removed by operator"),
});

export type TombstoneArgs = z.infer<typeof tombstoneArgsSchema>;
