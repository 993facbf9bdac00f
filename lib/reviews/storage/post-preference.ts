/**
 * Which post a restaurant record follows when several posts review the
 * same restaurant (same name and neighborhood, different URLs).
 *
 * The newest dated post wins; a post with a real publish date beats one
 * whose date was inferred from the fetch time; remaining ties go to the
 * lexicographically smaller URL. The outcome does not depend on the order
 * the posts are processed in, so repeated runs leave the record alone.
 */

import type { RestaurantRecord, RestaurantRecordInput } from "../types";

type PostFields = Pick<RestaurantRecord, "sourceUrl" | "publishedAt" | "publishedAtInferred">;

export function comparePosts(a: PostFields, b: PostFields): number {
  if (a.publishedAtInferred !== b.publishedAtInferred) {
    return a.publishedAtInferred ? -1 : 1;
  }
  if (a.publishedAt !== b.publishedAt) {
    return a.publishedAt < b.publishedAt ? -1 : 1;
  }
  if (a.sourceUrl === b.sourceUrl) return 0;
  return a.sourceUrl > b.sourceUrl ? -1 : 1;
}

/**
 * True when the stored record comes from a different post that outranks
 * the incoming one; the incoming write is then ignored.
 */
export function storedPostWins(existing: RestaurantRecord, incoming: RestaurantRecordInput): boolean {
  return existing.sourceUrl !== incoming.sourceUrl && comparePosts(existing, incoming) > 0;
}
