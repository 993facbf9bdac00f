/**
 * Controlled cuisine vocabulary.
 *
 * Maps free-form tags ("BBQ", "Szechuan", "tacos") onto canonical slugs.
 * Tags the vocabulary doesn't know pass through unchanged and are reported
 * so the vocabulary can be curated.
 */

import defaultVocabulary from "@/data/cuisines.json";
import { toMatchKey } from "../utils/text";

export interface CanonicalTag {
  tag: string;
  known: boolean;
}

function tagKey(tag: string): string {
  return toMatchKey(tag).replace(/\s+(?:food|cuisine|restaurants?)$/, "");
}

export interface CuisineEntry {
  slug: string;
  aliases: string[];
}

export class CuisineVocabulary {
  private readonly aliases = new Map<string, string>();

  constructor(private readonly vocabulary: Record<string, string[]>) {
    for (const [canonical, aliases] of Object.entries(vocabulary)) {
      this.aliases.set(tagKey(canonical), canonical);
      for (const alias of aliases) {
        const key = tagKey(alias);
        if (!this.aliases.has(key)) {
          this.aliases.set(key, canonical);
        }
      }
    }
  }

  canonicalize(tag: string): CanonicalTag {
    const canonical = this.aliases.get(tagKey(tag));
    if (canonical) return { tag: canonical, known: true };
    return { tag: tag.trim(), known: false };
  }

  /** Canonical cuisines in slug order. */
  entries(): CuisineEntry[] {
    return Object.entries(this.vocabulary)
      .map(([slug, aliases]) => ({ slug, aliases: aliases.filter((alias) => alias !== slug) }))
      .sort((a, b) => a.slug.localeCompare(b.slug));
  }
}

let defaultInstance: CuisineVocabulary | null = null;

export function getDefaultCuisineVocabulary(): CuisineVocabulary {
  if (!defaultInstance) {
    defaultInstance = new CuisineVocabulary(defaultVocabulary);
  }
  return defaultInstance;
}
