/**
 * Shared HTML helpers for extraction strategies.
 */

import * as cheerio from "cheerio";
import type { RawDocument } from "../types";
import { collapseWhitespace } from "../utils/text";
import { IGNORED_LINK_PATTERNS } from "../sources/critic-blog/constants";

export type Cheerio$ = cheerio.CheerioAPI;

/** Selectors for page furniture that never belongs to the review body. */
const NON_BODY_SELECTORS = [
  "script",
  "style",
  "noscript",
  "iframe",
  "form",
  "ul.related_post",
  ".jp-relatedposts",
  ".sharedaddy",
  ".sd-sharing",
  ".share-buttons",
  ".wp-embedded-content",
  ".yarpp-related",
  ".post-navigation",
  ".comments-area",
].join(", ");

const TAG_STOPLIST = new Set(["uncategorized", "review", "reviews", "restaurant", "restaurants"]);

export function isJsonDocument(document: RawDocument): boolean {
  if (document.contentType?.includes("json")) return true;
  const head = document.rawContent.trimStart().charAt(0);
  return head === "{" || head === "[";
}

/**
 * JSON.parse that yields undefined for malformed input.
 */
export function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

export function loadHtml(html: string): Cheerio$ {
  return cheerio.load(html);
}

export function cleanText(input: string | undefined | null): string | undefined {
  if (!input) return undefined;
  const cleaned = collapseWhitespace(input);
  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Paragraph text of a content container, furniture removed,
 * one blank line between paragraphs.
 */
export function extractBodyText($: Cheerio$, selector: string): string | undefined {
  const container = $(selector).first();
  if (container.length === 0) return undefined;

  const root = container.clone();
  root.find(NON_BODY_SELECTORS).remove();

  const paragraphs = root
    .find("p, li, blockquote")
    .filter((_, el) => $(el).parents("p, li, blockquote").length === 0)
    .map((_, el) => cleanText($(el).text()))
    .get()
    .filter((text) => !isBoilerplateParagraph(text));

  if (paragraphs.length > 0) {
    return paragraphs.join("\n\n");
  }
  return cleanText(root.text());
}

/**
 * Text of an HTML fragment (e.g. WordPress `content.rendered`).
 */
export function fragmentToText(html: string): string | undefined {
  const $ = loadHtml(`<div id="fragment-root">${html}</div>`);
  return extractBodyText($, "#fragment-root");
}

function isBoilerplateParagraph(text: string): boolean {
  return /^(share this|like this|related|posted in|filed under)\b/i.test(text);
}

export interface ContentLinks {
  /** Text of the first Google Maps link, usually the street address */
  mapsLinkText?: string;
  mapsUrl?: string;
  yelpUrl?: string;
}

const MAPS_HREF = /(google\.[a-z.]+\/maps|maps\.google\.|goo\.gl\/maps|maps\.app\.goo\.gl)/i;
const YELP_HREF = /\byelp\.[a-z.]+\//i;

/**
 * The critic links each restaurant's address to Google Maps and often
 * to its Yelp page; the first of each inside the content is kept.
 */
export function scanContentLinks($: Cheerio$, selector: string): ContentLinks {
  const links: ContentLinks = {};
  $(selector)
    .find("a[href]")
    .each((_, el) => {
      const href = $(el).attr("href") ?? "";
      const text = cleanText($(el).text());
      if (IGNORED_LINK_PATTERNS.some((pattern) => pattern.test(href) || (text !== undefined && pattern.test(text)))) {
        return;
      }
      if (!links.yelpUrl && YELP_HREF.test(href)) {
        links.yelpUrl = href;
      } else if (!links.mapsUrl && text && MAPS_HREF.test(href)) {
        links.mapsUrl = href;
        links.mapsLinkText = text;
      }
    });
  return links;
}

export function collectTags(values: Array<string | undefined>): string[] {
  const tags = new Map<string, string>();
  for (const value of values) {
    const tag = cleanText(value);
    if (!tag) continue;
    const key = tag.toLowerCase();
    if (TAG_STOPLIST.has(key) || tags.has(key)) continue;
    tags.set(key, tag);
  }
  return [...tags.values()];
}

export function toIsoDate(value: string | undefined | null): string | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

// ============================================================================
// Location Phrases
// ============================================================================

/**
 * Text patterns that introduce a location, most explicit first.
 * Each yields the full phrase; the resolver strips the boilerplate.
 */
const LOCATION_PATTERNS: RegExp[] = [
  /\b(?:Location|Address|Where):\s*([^\n]+)/i,
  /\blocated (?:in|at|on) (?:the )?[^.;\n]+/i,
  /\bin the [A-Z][\w'.-]*(?: [A-Z][\w'.-]*)* (?:area|neighborhood|neighbourhood|district)\b/,
];

export function findLocationPhrase(text: string): string | undefined {
  for (const pattern of LOCATION_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const phrase = cleanText(match[1] ?? match[0]);
    if (phrase) return phrase.replace(/[.,;:]+$/, "");
  }
  return undefined;
}
