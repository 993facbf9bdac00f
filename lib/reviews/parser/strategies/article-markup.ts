/**
 * WordPress article markup strategy.
 *
 * Title from .entry-title, body from .entry-content, location from an
 * explicit address element or the Google Maps link the critic puts on
 * the restaurant's address. Maps and Yelp links are kept as well.
 */

import type { ExtractionStrategy } from "../types";
import type { ParsedReviewFields } from "../../types";
import {
  cleanText,
  collectTags,
  extractBodyText,
  isJsonDocument,
  loadHtml,
  scanContentLinks,
  toIsoDate,
} from "../html";

const CONTENT_SELECTOR = ".entry-content, .post-content, article .content";

export const articleMarkupStrategy: ExtractionStrategy = {
  name: "article-markup",

  extract(document) {
    if (isJsonDocument(document)) return null;
    const $ = loadHtml(document.rawContent);

    const title = cleanText($(".entry-title, .post-title").first().text());
    const hasContent = $(CONTENT_SELECTOR).length > 0;
    if (!title && !hasContent) return null;

    const links = hasContent ? scanContentLinks($, CONTENT_SELECTOR) : {};
    const fields: Partial<ParsedReviewFields> = {};
    fields.restaurantName = title;
    fields.yelpUrl = links.yelpUrl;
    fields.mapsUrl = links.mapsUrl;

    fields.rawLocationText =
      cleanText($('[itemprop="address"]').first().text()) ??
      cleanText($("article address, .entry-content address").first().text()) ??
      cleanText($(".location, .restaurant-location, .restaurant-address").first().text()) ??
      links.mapsLinkText;

    fields.reviewBody = hasContent ? extractBodyText($, CONTENT_SELECTOR) : undefined;

    fields.tags = collectTags([
      ...$('a[rel~="tag"], .cat-links a, .tags-links a').map((_, el) => $(el).text()).get(),
      ...$('meta[property="article:tag"]').map((_, el) => $(el).attr("content")).get(),
    ]);

    fields.publishedAt =
      toIsoDate($('meta[property="article:published_time"]').attr("content")) ??
      toIsoDate($("time.entry-date, time.published").first().attr("datetime")) ??
      toIsoDate($("time[datetime]").first().attr("datetime"));
    fields.modifiedAt =
      toIsoDate($('meta[property="article:modified_time"]').attr("content")) ??
      toIsoDate($("time.updated").first().attr("datetime"));

    return fields;
  },
};
