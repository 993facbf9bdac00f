/**
 * Text Normalization Utilities
 */

/**
 * Collapse runs of whitespace (including non-breaking and zero-width spaces) and trim.
 */
export function collapseWhitespace(input: string): string {
  return input.replace(/[\s\u00a0\u200b]+/g, " ").trim();
}

/**
 * Replace typographic quotes and dashes with their ASCII forms.
 */
export function straightenQuotes(input: string): string {
  return input
    .replace(/[\u2018\u2019\u201a\u201b\u2032`\u00b4]/g, "'")
    .replace(/[\u201c\u201d\u201e\u201f\u2033]/g, '"')
    .replace(/[\u2013\u2014]/g, "-");
}

/**
 * Decompose and drop combining marks ("Café" -> "Cafe").
 */
export function stripAccents(input: string): string {
  return input.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Key used for identity comparisons: accent-free, lowercased,
 * quote-normalized and whitespace-collapsed.
 */
export function toMatchKey(input: string): string {
  return collapseWhitespace(straightenQuotes(stripAccents(input)).toLowerCase());
}

const SMALL_WORDS = new Set(["a", "an", "and", "at", "by", "de", "del", "di", "for", "in", "la", "le", "of", "on", "or", "the", "to"]);

/**
 * Title-case a string, keeping short connector words lowercase
 * except at the start.
 */
export function toTitleCase(input: string): string {
  return input
    .toLowerCase()
    .split(" ")
    .map((word, idx) => {
      if (!word) return word;
      if (idx > 0 && SMALL_WORDS.has(word)) return word;
      return word.charAt(0).toUpperCase() + word.slice(1);
    })
    .join(" ");
}
