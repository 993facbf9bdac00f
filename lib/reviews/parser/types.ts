/**
 * Extraction Strategy Contract
 */

import type { ParsedReviewFields, RawDocument } from "../types";

/**
 * A pure function from a raw document to whatever review fields it can
 * recover. Returns null when the document isn't in a shape the strategy
 * understands at all.
 */
export interface ExtractionStrategy {
  name: string;
  extract(document: RawDocument): Partial<ParsedReviewFields> | null;
}
