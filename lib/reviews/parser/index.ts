/**
 * Review Parser
 *
 * Runs the extraction strategies in order and keeps the first one that
 * recovers every required field. New source formats are supported by
 * adding a strategy to the list, not by editing existing ones.
 */

import type { ParsedReview, ParsedReviewFields, RawDocument, RequiredReviewField } from "../types";
import { REQUIRED_REVIEW_FIELDS } from "../types";
import { ParseError } from "../errors";
import { PARSER_VERSION } from "../sources/critic-blog/constants";
import type { ExtractionStrategy } from "./types";
import { wordpressJsonStrategy } from "./strategies/wordpress-json";
import { jsonLdStrategy } from "./strategies/json-ld";
import { articleMarkupStrategy } from "./strategies/article-markup";
import { heuristicTextStrategy } from "./strategies/heuristic-text";

export type { ExtractionStrategy } from "./types";
export { wordpressJsonStrategy, jsonLdStrategy, articleMarkupStrategy, heuristicTextStrategy };

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  wordpressJsonStrategy,
  jsonLdStrategy,
  articleMarkupStrategy,
  heuristicTextStrategy,
];

function missingFields(fields: Partial<ParsedReviewFields>): RequiredReviewField[] {
  return REQUIRED_REVIEW_FIELDS.filter((field) => {
    const value = fields[field];
    return typeof value !== "string" || value.trim().length === 0;
  });
}

/**
 * Parse a raw document into a review.
 *
 * @throws ParseError carrying the fields recovered across all strategies
 */
export function parseReview(
  document: RawDocument,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES
): ParsedReview {
  const merged: Partial<ParsedReviewFields> = {};
  const tried: string[] = [];
  let closest: RequiredReviewField[] | undefined;

  for (const strategy of strategies) {
    const fields = strategy.extract(document);
    if (!fields) continue;
    tried.push(strategy.name);

    const missing = missingFields(fields);
    if (missing.length === 0) {
      return toParsedReview(document, fields, strategy.name);
    }
    if (!closest || missing.length < closest.length) {
      closest = missing;
    }

    // Keep the first value seen for each field so the error explains what was recoverable
    merged.restaurantName = merged.restaurantName ?? fields.restaurantName;
    merged.rawLocationText = merged.rawLocationText ?? fields.rawLocationText;
    merged.reviewBody = merged.reviewBody ?? fields.reviewBody;
    merged.publishedAt = merged.publishedAt ?? fields.publishedAt;
    if (!merged.tags?.length && fields.tags?.length) {
      merged.tags = fields.tags;
    }
  }

  // Fields from different strategies are never combined into a review;
  // when together they would be complete, report what the closest strategy lacked
  const mergedMissing = missingFields(merged);
  const missing = mergedMissing.length > 0 ? mergedMissing : (closest ?? mergedMissing);
  throw new ParseError(
    `Missing required fields: ${missing.join(", ")}`,
    document.sourceUrl,
    missing,
    merged,
    tried
  );
}

function toParsedReview(
  document: RawDocument,
  fields: Partial<ParsedReviewFields>,
  strategy: string
): ParsedReview {
  const publishedAt = fields.publishedAt;
  return {
    restaurantName: fields.restaurantName ?? "",
    rawLocationText: fields.rawLocationText ?? "",
    reviewBody: fields.reviewBody ?? "",
    tags: fields.tags ?? [],
    publishedAt: publishedAt ?? document.fetchedAt,
    publishedAtInferred: publishedAt === undefined,
    yelpUrl: fields.yelpUrl,
    mapsUrl: fields.mapsUrl,
    sourcePostId: fields.sourcePostId,
    modifiedAt: fields.modifiedAt,
    sourceUrl: document.sourceUrl,
    strategy,
    parserVersion: PARSER_VERSION,
  };
}
