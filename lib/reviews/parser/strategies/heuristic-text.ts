/**
 * Heuristic text strategy.
 *
 * Last resort for pages with no usable markup: headline for the name,
 * the largest block of paragraphs for the body, and location phrases
 * ("located in ...", "in the ... area") found in the text.
 */

import type { ExtractionStrategy } from "../types";
import type { ParsedReviewFields } from "../../types";
import type { Cheerio$ } from "../html";
import { cleanText, findLocationPhrase, isJsonDocument, loadHtml, toIsoDate } from "../html";

/** "Green Leaf Cafe | Eating Around Town" -> "Green Leaf Cafe" */
function stripSiteSuffix(title: string): string {
  return title.split(/\s+[|\u2013\u2014-]\s+/)[0];
}

/**
 * Find the element whose direct <p> children hold the most text.
 */
function largestParagraphBlock($: Cheerio$): string[] {
  let best: string[] = [];
  let bestLength = 0;

  $("body *").each((_, el) => {
    const paragraphs = $(el)
      .children("p")
      .map((__, p) => cleanText($(p).text()))
      .get();
    const length = paragraphs.reduce((sum, text) => sum + text.length, 0);
    if (length > bestLength) {
      best = paragraphs;
      bestLength = length;
    }
  });

  return best;
}

export const heuristicTextStrategy: ExtractionStrategy = {
  name: "heuristic-text",

  extract(document) {
    if (isJsonDocument(document)) return null;
    const $ = loadHtml(document.rawContent);
    $("script, style, noscript, nav, header nav, footer, ul.related_post, .sidebar, #sidebar").remove();

    const fields: Partial<ParsedReviewFields> = {};

    const headline =
      cleanText($("h1").first().text()) ??
      cleanText($('meta[property="og:title"]').attr("content")) ??
      cleanText($("title").first().text());
    fields.restaurantName = headline ? cleanText(stripSiteSuffix(headline)) : undefined;

    const paragraphs = largestParagraphBlock($);
    if (paragraphs.length > 0) {
      fields.reviewBody = paragraphs.join("\n\n");
    }

    // One line per block so labelled phrases ("Location: ...") end at their block
    const blockLines = $("p, li, address, dd, td, h2, h3, h4")
      .map((_, el) => cleanText($(el).text()))
      .get();
    const searchText = [...paragraphs, ...blockLines].join("\n");
    fields.rawLocationText = findLocationPhrase(searchText);

    fields.publishedAt =
      toIsoDate($('meta[property="article:published_time"]').attr("content")) ??
      toIsoDate($("time[datetime]").first().attr("datetime"));

    return fields;
  },
};
