/**
 * WordPress REST strategy.
 *
 * Handles documents fetched from /wp-json/wp/v2/posts (a single post
 * object, or the one-element array returned by a ?slug= query).
 */

import { z } from "zod";
import type { ExtractionStrategy } from "../types";
import type { ParsedReviewFields } from "../../types";
import {
  cleanText,
  collectTags,
  findLocationPhrase,
  fragmentToText,
  isJsonDocument,
  loadHtml,
  parseJsonOrUndefined,
  scanContentLinks,
  toIsoDate,
} from "../html";

const renderedSchema = z.object({ rendered: z.string() });

const wpPostSchema = z.object({
  id: z.number().int().optional(),
  title: renderedSchema,
  content: renderedSchema,
  date: z.string().optional(),
  date_gmt: z.string().optional(),
  modified: z.string().optional(),
  modified_gmt: z.string().optional(),
  _embedded: z
    .object({
      "wp:term": z.array(z.array(z.object({ name: z.string(), taxonomy: z.string().optional() }))).optional(),
    })
    .optional(),
});

type WpPost = z.infer<typeof wpPostSchema>;

function readPost(raw: string): WpPost | null {
  const json = parseJsonOrUndefined(raw);
  const candidate = Array.isArray(json) ? json[0] : json;
  const parsed = wpPostSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

export const wordpressJsonStrategy: ExtractionStrategy = {
  name: "wordpress-json",

  extract(document) {
    if (!isJsonDocument(document)) return null;
    const post = readPost(document.rawContent);
    if (!post) return null;

    const fields: Partial<ParsedReviewFields> = {};

    // Titles come back HTML-encoded ("Joe&#8217;s Diner")
    fields.restaurantName = cleanText(loadHtml(post.title.rendered).root().text());

    const $ = loadHtml(`<div id="wp-content">${post.content.rendered}</div>`);
    const body = fragmentToText(post.content.rendered);
    const links = scanContentLinks($, "#wp-content");
    fields.reviewBody = body;
    fields.yelpUrl = links.yelpUrl;
    fields.mapsUrl = links.mapsUrl;
    fields.sourcePostId = post.id;
    fields.rawLocationText =
      cleanText($("#wp-content address").first().text()) ??
      links.mapsLinkText ??
      (body ? findLocationPhrase(body) : undefined);

    const terms = post._embedded?.["wp:term"]?.flat() ?? [];
    fields.tags = collectTags(terms.map((term) => term.name));

    // date_gmt has no zone suffix; it is UTC by definition
    fields.publishedAt = post.date_gmt ? toIsoDate(`${post.date_gmt}Z`) : toIsoDate(post.date);
    fields.modifiedAt = post.modified_gmt ? toIsoDate(`${post.modified_gmt}Z`) : toIsoDate(post.modified);

    return fields;
  },
};
