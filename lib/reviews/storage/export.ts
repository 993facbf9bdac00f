/**
 * Export Artifact
 *
 * Flat JSON array of live restaurant records with stable snake_case
 * field names. Unresolved records are included with null coordinates
 * unless `proximityOnly` is set. A second artifact lists the cuisine
 * vocabulary with how many live restaurants carry each cuisine.
 */

import {
  cuisineExportSchema,
  exportArtifactSchema,
  type ExportedCuisine,
  type ExportedRestaurant,
} from "../api/schemas";
import type { CuisineVocabulary } from "../normalizer/cuisine-vocabulary";
import type { RestaurantRecord } from "../types";
import type { RestaurantStore } from "./types";

export interface ExportOptions {
  /** Only records with coordinates (drops unresolved locations) */
  proximityOnly?: boolean;
}

export function toExportedRestaurant(record: RestaurantRecord): ExportedRestaurant {
  return {
    restaurant_id: record.restaurantId,
    display_name: record.displayName,
    neighborhood: record.neighborhood,
    coordinates: record.coordinates,
    location_confidence: record.locationConfidence,
    location_status: record.locationStatus,
    raw_location_text: record.rawLocationText,
    cuisine_tags: record.cuisineTags,
    review_body: record.reviewBody,
    published_at: record.publishedAt,
    published_at_inferred: record.publishedAtInferred,
    modified_at: record.modifiedAt,
    yelp_url: record.yelpUrl,
    maps_url: record.mapsUrl,
    source_url: record.sourceUrl,
    source_post_id: record.sourcePostId,
    first_seen_at: record.firstSeenAt,
    last_updated_at: record.lastUpdatedAt,
    content_hash: record.contentHash,
  };
}

export function buildExport(
  records: readonly RestaurantRecord[],
  options: ExportOptions = {}
): ExportedRestaurant[] {
  const rows = records
    .filter((record) => !record.tombstonedAt)
    .filter((record) => !options.proximityOnly || record.coordinates !== null)
    .map(toExportedRestaurant);
  return exportArtifactSchema.parse(rows);
}

export async function exportRestaurants(
  store: RestaurantStore,
  options: ExportOptions = {}
): Promise<ExportedRestaurant[]> {
  const records = await store.list({ includeTombstoned: false });
  return buildExport(records, options);
}

export function buildCuisineExport(
  records: readonly RestaurantRecord[],
  vocabulary: CuisineVocabulary
): ExportedCuisine[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    if (record.tombstonedAt) continue;
    for (const tag of record.cuisineTags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  const rows = vocabulary.entries().map((entry) => ({
    slug: entry.slug,
    aliases: entry.aliases,
    restaurant_count: counts.get(entry.slug) ?? 0,
  }));
  return cuisineExportSchema.parse(rows);
}

export async function exportCuisines(
  store: RestaurantStore,
  vocabulary: CuisineVocabulary
): Promise<ExportedCuisine[]> {
  const records = await store.list({ includeTombstoned: false });
  return buildCuisineExport(records, vocabulary);
}
