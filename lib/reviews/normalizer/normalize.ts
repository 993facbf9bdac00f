/**
 * Review Normalization
 *
 * Turns a parsed review plus its resolved location into the canonical
 * restaurant record. Identity comes from the normalized name and
 * neighborhood keys, so formatting drift between runs maps to the same id.
 */

import type { ParsedReview, ResolvedLocation, RestaurantRecordInput } from "../types";
import { computeContentHash, computeRestaurantId } from "../utils/hash";
import { collapseWhitespace, straightenQuotes, toMatchKey, toTitleCase } from "../utils/text";
import { CuisineVocabulary, getDefaultCuisineVocabulary } from "./cuisine-vocabulary";

export interface NormalizeMeta {
  fetchedAt: string;
  parsedAt: string;
}

export interface NormalizeResult {
  record: RestaurantRecordInput;
  nameKey: string;
  neighborhoodKey: string;
  /** Tags with no vocabulary entry, kept verbatim on the record */
  unknownTags: string[];
}

// ============================================================================
// Field Canonicalization
// ============================================================================

export function canonicalDisplayName(raw: string): string {
  const cleaned = collapseWhitespace(straightenQuotes(raw.normalize("NFC")));
  const hasLetters = /\p{L}/u.test(cleaned);
  if (hasLetters && (cleaned === cleaned.toUpperCase() || cleaned === cleaned.toLowerCase())) {
    return toTitleCase(cleaned);
  }
  return cleaned;
}

export function neighborhoodKeyFor(location: ResolvedLocation): string {
  if (location.neighborhoodName) {
    return toMatchKey(location.neighborhoodName);
  }
  return `unresolved:${location.cacheKey}`;
}

export function canonicalizeTags(
  tags: readonly string[],
  vocabulary: CuisineVocabulary
): { tags: string[]; unknown: string[] } {
  const result = new Set<string>();
  const unknown = new Set<string>();

  for (const raw of tags) {
    const trimmed = collapseWhitespace(raw);
    if (!trimmed) continue;
    const { tag, known } = vocabulary.canonicalize(trimmed);
    result.add(tag);
    if (!known) unknown.add(tag);
  }

  return {
    tags: [...result].sort(),
    unknown: [...unknown].sort(),
  };
}

// ============================================================================
// Normalize
// ============================================================================

export function normalizeReview(
  review: ParsedReview,
  location: ResolvedLocation,
  meta: NormalizeMeta,
  vocabulary: CuisineVocabulary = getDefaultCuisineVocabulary()
): NormalizeResult {
  const displayName = canonicalDisplayName(review.restaurantName);
  const nameKey = toMatchKey(displayName);
  const neighborhoodKey = neighborhoodKeyFor(location);
  const { tags, unknown } = canonicalizeTags(review.tags, vocabulary);

  const rawLocationText = collapseWhitespace(review.rawLocationText);
  const reviewBody = review.reviewBody.trim();

  const coordinates =
    location.latitude !== null && location.longitude !== null
      ? { lat: location.latitude, lon: location.longitude }
      : null;

  const record: RestaurantRecordInput = {
    restaurantId: computeRestaurantId(nameKey, neighborhoodKey),
    displayName,
    neighborhood: location.neighborhoodName,
    coordinates,
    locationConfidence: location.confidence,
    locationStatus: location.status,
    rawLocationText,
    cuisineTags: tags,
    reviewBody,
    publishedAt: review.publishedAt,
    publishedAtInferred: review.publishedAtInferred,
    yelpUrl: review.yelpUrl ?? null,
    mapsUrl: review.mapsUrl ?? null,
    sourceUrl: review.sourceUrl,
    sourcePostId: review.sourcePostId ?? null,
    modifiedAt: review.modifiedAt ?? null,
    fetchedAt: meta.fetchedAt,
    parsedAt: meta.parsedAt,
    contentHash: computeContentHash({
      displayName,
      rawLocationText,
      reviewBody,
      cuisineTags: tags,
    }),
  };

  return { record, nameKey, neighborhoodKey, unknownTags: unknown };
}
