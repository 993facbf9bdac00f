/**
 * Critic Review Atlas - Database Schema
 *
 * This schema supports:
 * - Canonical restaurant records with tombstones
 * - Append-only change history per restaurant
 * - Persistent geocode cache keyed by normalized location text
 * - Per-URL source checkpoints for incremental runs
 * - Ingestion run summaries
 */

import {
  pgTable,
  text,
  timestamp,
  boolean,
  jsonb,
  integer,
  doublePrecision,
  uuid,
  index,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import type { ItemIssue, RunCounts } from "@/lib/reviews/types";

// ============================================================================
// 1) Restaurants
// ============================================================================

export const restaurants = pgTable("restaurants", {
  restaurantId: text("restaurant_id").primaryKey(), // sha256(nameKey|neighborhoodKey)[0:24]
  displayName: text("display_name").notNull(),
  neighborhood: text("neighborhood"),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  locationConfidence: doublePrecision("location_confidence").notNull(),
  locationStatus: text("location_status").notNull(), // "resolved", "low_confidence", "unresolved"
  rawLocationText: text("raw_location_text").notNull(),
  cuisineTags: jsonb("cuisine_tags").$type<string[]>().notNull().default([]),
  reviewBody: text("review_body").notNull(),
  publishedAt: timestamp("published_at", { withTimezone: true }).notNull(),
  publishedAtInferred: boolean("published_at_inferred").notNull().default(false),
  yelpUrl: text("yelp_url"),
  mapsUrl: text("maps_url"),
  sourceUrl: text("source_url").notNull(),
  sourcePostId: integer("source_post_id"), // WordPress post id
  modifiedAt: timestamp("modified_at", { withTimezone: true }),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),
  parsedAt: timestamp("parsed_at", { withTimezone: true }).notNull(),
  firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull(),
  lastUpdatedAt: timestamp("last_updated_at", { withTimezone: true }).notNull(),
  contentHash: text("content_hash").notNull(),
  tombstonedAt: timestamp("tombstoned_at", { withTimezone: true }),
  tombstoneReason: text("tombstone_reason"),
}, (table) => [
  index("restaurants_source_url_idx").on(table.sourceUrl),
  index("restaurants_neighborhood_idx").on(table.neighborhood),
]);

export const restaurantChanges = pgTable("restaurant_changes", {
  id: uuid("id").primaryKey().defaultRandom(),
  restaurantId: text("restaurant_id").notNull().references(() => restaurants.restaurantId),
  change: text("change").notNull(), // "created", "updated", "tombstoned"
  contentHash: text("content_hash").notNull(),
  previousContentHash: text("previous_content_hash"),
  sourceUrl: text("source_url").notNull(),
  runId: text("run_id"),
  at: timestamp("at", { withTimezone: true }).notNull().defaultNow(),
  reason: text("reason"),
}, (table) => [
  index("restaurant_changes_restaurant_idx").on(table.restaurantId),
]);

// ============================================================================
// 2) Geocode Cache
// ============================================================================

export const geocodeCache = pgTable("geocode_cache", {
  cacheKey: text("cache_key").primaryKey(), // normalized location text
  neighborhoodName: text("neighborhood_name"),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  confidence: doublePrecision("confidence").notNull(),
  status: text("status").notNull(),
  method: text("method").notNull(), // "gazetteer", "geocoder", "none"
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

// ============================================================================
// 3) Checkpoints & Runs
// ============================================================================

export const sourceCheckpoints = pgTable("source_checkpoints", {
  sourceUrl: text("source_url").primaryKey(),
  contentHash: text("content_hash").notNull(), // sha256 of the raw body
  changeSignal: text("change_signal"), // e.g. WordPress modified_gmt
  etag: text("etag"),
  lastModified: text("last_modified"),
  restaurantId: text("restaurant_id"),
  locationStatus: text("location_status"),
  processedAt: timestamp("processed_at", { withTimezone: true }).notNull(),
});

export const ingestionRuns = pgTable("ingestion_runs", {
  runId: text("run_id").primaryKey(),
  startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  full: boolean("full").notNull().default(false),
  stopped: boolean("stopped").notNull().default(false),
  discovered: integer("discovered").notNull().default(0),
  counts: jsonb("counts").$type<RunCounts>().notNull(),
  failures: jsonb("failures").$type<ItemIssue[]>().notNull().default([]),
  warnings: jsonb("warnings").$type<ItemIssue[]>().notNull().default([]),
  unknownTags: jsonb("unknown_tags").$type<Array<{ tag: string; count: number }>>().notNull().default([]),
}, (table) => [
  index("ingestion_runs_started_idx").on(table.startedAt),
]);

// ============================================================================
// Relations
// ============================================================================

export const restaurantsRelations = relations(restaurants, ({ many }) => ({
  changes: many(restaurantChanges),
}));

export const restaurantChangesRelations = relations(restaurantChanges, ({ one }) => ({
  restaurant: one(restaurants, {
    fields: [restaurantChanges.restaurantId],
    references: [restaurants.restaurantId],
  }),
}));

// ============================================================================
// Type Exports
// ============================================================================

export type RestaurantRow = typeof restaurants.$inferSelect;
export type NewRestaurantRow = typeof restaurants.$inferInsert;

export type RestaurantChangeRow = typeof restaurantChanges.$inferSelect;

export type GeocodeCacheRow = typeof geocodeCache.$inferSelect;
export type SourceCheckpointRow = typeof sourceCheckpoints.$inferSelect;
export type IngestionRunRow = typeof ingestionRuns.$inferSelect;
