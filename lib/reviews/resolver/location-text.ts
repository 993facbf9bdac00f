/**
 * Location Text Normalization
 *
 * Produces the key that the gazetteer and the geocode cache are indexed
 * by. "Located in the Riverside area." and "riverside" share a key.
 */

import { collapseWhitespace, stripAccents, straightenQuotes } from "../utils/text";

const LEADING_BOILERPLATE =
  /^(?:(?:located|situated|found|nestled|tucked away)\s+(?:in|at|on|near)\s+|(?:in|at|on|near|off|along)\s+|the\s+)+/;

const TRAILING_BOILERPLATE = /\s+(?:area|neighborhood|neighbourhood|district)$/;

function normalizeSegment(segment: string): string {
  let value = collapseWhitespace(segment);
  // Strip repeatedly: "located in the heart of the X area" is rare, "in the X area" is common
  for (let i = 0; i < 3; i++) {
    const next = value.replace(LEADING_BOILERPLATE, "").replace(TRAILING_BOILERPLATE, "");
    if (next === value) break;
    value = next;
  }
  return value;
}

export function normalizeLocationText(raw: string): string {
  const folded = straightenQuotes(stripAccents(raw))
    .toLowerCase()
    .replace(/[^\p{L}\p{N},'&\s-]/gu, " ");

  return folded
    .split(",")
    .map(normalizeSegment)
    .filter((segment) => segment.length > 0)
    .join(", ");
}

/**
 * Comma-separated segments of a normalized key
 * ("1234 main st nw, riverside" -> ["1234 main st nw", "riverside"]).
 */
export function locationSegments(key: string): string[] {
  return key.split(", ").filter((segment) => segment.length > 0);
}
