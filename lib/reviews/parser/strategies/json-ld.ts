/**
 * schema.org JSON-LD strategy.
 *
 * Looks for a Restaurant (or other FoodEstablishment) node, either on its
 * own or as the itemReviewed of a Review, plus the article body.
 */

import type { ExtractionStrategy } from "../types";
import type { ParsedReviewFields } from "../../types";
import { cleanText, collectTags, isJsonDocument, loadHtml, parseJsonOrUndefined, toIsoDate } from "../html";

type JsonObject = Record<string, unknown>;

const ESTABLISHMENT_TYPES = new Set([
  "Restaurant",
  "FoodEstablishment",
  "CafeOrCoffeeShop",
  "Bakery",
  "BarOrPub",
  "FastFoodRestaurant",
  "IceCreamShop",
  "Winery",
  "Brewery",
]);

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typesOf(node: JsonObject): string[] {
  const type = node["@type"];
  if (typeof type === "string") return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === "string");
  return [];
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? cleanText(value) : undefined;
}

function strings(value: unknown): string[] {
  if (typeof value === "string") return value.split(",");
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return [];
}

/**
 * Flatten arrays and @graph containers into a list of nodes.
 */
function flattenNodes(value: unknown, out: JsonObject[] = []): JsonObject[] {
  if (Array.isArray(value)) {
    for (const item of value) flattenNodes(item, out);
  } else if (isObject(value)) {
    out.push(value);
    if (Array.isArray(value["@graph"])) flattenNodes(value["@graph"], out);
  }
  return out;
}

function addressText(address: unknown): string | undefined {
  if (typeof address === "string") return cleanText(address);
  if (!isObject(address)) return undefined;
  const parts = [address.streetAddress, address.addressLocality]
    .map(str)
    .filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(", ") : undefined;
}

export const jsonLdStrategy: ExtractionStrategy = {
  name: "json-ld",

  extract(document) {
    if (isJsonDocument(document)) return null;
    const $ = loadHtml(document.rawContent);

    const nodes: JsonObject[] = [];
    // Malformed blocks are skipped; other blocks may still be usable
    $('script[type="application/ld+json"]').each((_, el) => {
      flattenNodes(parseJsonOrUndefined($(el).text()), nodes);
    });
    if (nodes.length === 0) return null;

    const review = nodes.find((node) => typesOf(node).includes("Review"));
    const reviewed = review && isObject(review.itemReviewed) ? review.itemReviewed : undefined;
    const establishment =
      reviewed ?? nodes.find((node) => typesOf(node).some((type) => ESTABLISHMENT_TYPES.has(type)));
    const article = nodes.find((node) =>
      typesOf(node).some((type) => type === "BlogPosting" || type === "Article" || type === "NewsArticle")
    );

    if (!establishment && !review) return null;

    const fields: Partial<ParsedReviewFields> = {
      restaurantName: establishment ? str(establishment.name) : undefined,
      rawLocationText: establishment ? addressText(establishment.address) : undefined,
      reviewBody: str(review?.reviewBody) ?? str(article?.articleBody),
      tags: collectTags(establishment ? strings(establishment.servesCuisine) : []),
      publishedAt: toIsoDate(str(review?.datePublished) ?? str(article?.datePublished)),
    };
    return fields;
  },
};
