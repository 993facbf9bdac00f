/**
 * Hashing Utilities for the Review Pipeline
 */

import { createHash } from "crypto";

/**
 * Compute SHA256 hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Stable restaurant identity from normalized name and neighborhood keys.
 */
export function computeRestaurantId(nameKey: string, neighborhoodKey: string): string {
  return sha256(`${nameKey}|${neighborhoodKey}`).slice(0, 24);
}

/**
 * Hash over the fields that drive the upsert decision.
 * Tags are sorted so set ordering never changes the hash.
 */
export function computeContentHash(fields: {
  displayName: string;
  rawLocationText: string;
  reviewBody: string;
  cuisineTags: string[];
}): string {
  return sha256(
    JSON.stringify([
      fields.displayName,
      fields.rawLocationText,
      fields.reviewBody,
      [...fields.cuisineTags].sort(),
    ])
  );
}
