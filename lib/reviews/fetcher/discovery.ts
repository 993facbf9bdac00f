/**
 * Review URL Discovery
 *
 * Enumerates the source's paginated index (HTML index pages or the
 * WordPress REST listing) and returns the review post URLs it links to.
 * Requests go through the same HttpFetcher as posts, so they share its
 * rate limit and retry policy.
 */

import * as cheerio from "cheerio";
import { z } from "zod";
import type { DiscoveredUrl, ItemIssue } from "../types";
import type { DiscoveryMode } from "../config";
import { FetchError, errorKind, errorMessage } from "../errors";
import { isNotModified } from "../types";
import { NON_POST_PATH_PATTERNS } from "../sources/critic-blog/constants";
import type { DocumentFetcher } from "./http-fetcher";

export interface DiscoveryOptions {
  baseUrl: string;
  indexPath: string;
  mode: DiscoveryMode;
  maxIndexPages: number;
  wpPerPage: number;
}

export interface DiscoveryResult {
  urls: DiscoveredUrl[];
  pagesVisited: number;
  issues: ItemIssue[];
}

/**
 * Walk the index. A failure on the first page is rethrown (nothing to
 * process); a failure on a later page ends discovery with what was found
 * so far and is reported as an issue.
 */
export async function discoverReviewUrls(
  fetcher: DocumentFetcher,
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const seen = new Map<string, DiscoveredUrl>();
  const issues: ItemIssue[] = [];
  let pagesVisited = 0;

  for (let page = 1; page <= options.maxIndexPages; page++) {
    const pageUrl = options.mode === "wp-json"
      ? buildWpListingUrl(options.baseUrl, page, options.wpPerPage)
      : buildIndexPageUrl(options.baseUrl, options.indexPath, page);

    let found: DiscoveredUrl[];
    try {
      const outcome = await fetcher.fetch(pageUrl);
      if (isNotModified(outcome)) break;
      pagesVisited++;
      found = options.mode === "wp-json"
        ? parseWpListing(outcome.rawContent)
        : extractPostLinks(outcome.rawContent, pageUrl, options.baseUrl);
    } catch (error) {
      if (page > 1 && isEndOfListing(error, options.mode)) break;
      if (page === 1) throw error;

      issues.push({
        url: pageUrl,
        stage: "discover",
        kind: errorKind(error),
        message: errorMessage(error),
      });
      break;
    }

    let added = 0;
    for (const item of found) {
      if (!seen.has(item.url)) {
        seen.set(item.url, item);
        added++;
      }
    }

    // An index page that adds nothing new means we've walked past the end
    if (added === 0) break;
  }

  return { urls: [...seen.values()], pagesVisited, issues };
}

// ============================================================================
// URL Builders
// ============================================================================

export function buildIndexPageUrl(baseUrl: string, indexPath: string, page: number): string {
  const root = new URL(indexPath, `${baseUrl}/`).toString();
  if (page === 1) return root;
  const withSlash = root.endsWith("/") ? root : `${root}/`;
  return `${withSlash}page/${page}/`;
}

export function buildWpListingUrl(baseUrl: string, page: number, perPage: number): string {
  const url = new URL("/wp-json/wp/v2/posts", `${baseUrl}/`);
  url.searchParams.set("per_page", String(perPage));
  url.searchParams.set("page", String(page));
  url.searchParams.set("_fields", "link,modified_gmt");
  return url.toString();
}

function isEndOfListing(error: unknown, mode: DiscoveryMode): boolean {
  if (!(error instanceof FetchError) || error.kind !== "TERMINAL") return false;
  // WordPress answers 400 (rest_post_invalid_page_number) past the last page
  return error.status === 404 || (mode === "wp-json" && error.status === 400);
}

// ============================================================================
// HTML Index Pages
// ============================================================================

/**
 * Pull review post links out of one index page.
 * Prefers explicit post permalinks; falls back to any same-host link
 * that doesn't look like navigation.
 */
export function extractPostLinks(html: string, pageUrl: string, baseUrl: string): DiscoveredUrl[] {
  const $ = cheerio.load(html);
  const host = new URL(baseUrl).host;

  $("ul.related_post, nav, .nav-links, .pagination, #sidebar, .sidebar, footer").remove();

  const collect = (selector: string): string[] =>
    $(selector)
      .map((_, el) => $(el).attr("href"))
      .get()
      .filter((href): href is string => typeof href === "string" && href.length > 0);

  let hrefs = collect('a[rel="bookmark"], .entry-title a, article h2 a');
  if (hrefs.length === 0) {
    hrefs = collect("a[href]");
  }

  const urls: DiscoveredUrl[] = [];
  const seen = new Set<string>();
  const indexRoot = stripTrailingSlash(new URL(pageUrl).pathname);

  for (const href of hrefs) {
    const url = toPostUrl(href, pageUrl, host);
    if (!url) continue;
    const path = stripTrailingSlash(new URL(url).pathname);
    if (path === "" || path === indexRoot) continue;
    if (!seen.has(url)) {
      seen.add(url);
      urls.push({ url });
    }
  }

  return urls;
}

function toPostUrl(href: string, pageUrl: string, host: string): string | null {
  let url: URL;
  try {
    url = new URL(href, pageUrl);
  } catch {
    return null;
  }
  if (url.host !== host) return null;
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (NON_POST_PATH_PATTERNS.some((pattern) => pattern.test(url.pathname + url.hash))) return null;
  url.hash = "";
  return url.toString();
}

function stripTrailingSlash(path: string): string {
  return path.replace(/\/+$/, "");
}

// ============================================================================
// WordPress REST Listing
// ============================================================================

const wpListingSchema = z.array(
  z.object({
    link: z.string(),
    modified_gmt: z.string().optional(),
  })
);

export function parseWpListing(body: string): DiscoveredUrl[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new Error(`WordPress listing is not JSON: ${errorMessage(error)}`);
  }

  const parsed = wpListingSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Unexpected WordPress listing shape: ${z.prettifyError(parsed.error)}`);
  }

  return parsed.data.map((post) => ({
    url: post.link,
    changeSignal: post.modified_gmt,
  }));
}
