/**
 * Critic Blog Source Constants
 */

export const CRITIC_BLOG_SOURCE_KEY = "critic-blog" as const;

export const PARSER_VERSION = "critic-blog-v1.2.0";

/**
 * Default user agent to use (modern Chrome on Windows)
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const CRITIC_BLOG_DEFAULTS = {
  baseUrl: "https://example.com",
  indexPath: "/",
  discoveryMode: "html" as const,
  maxIndexPages: 200,
  wpPerPage: 50,
  timeoutMs: 20000,
  rateLimitMs: 1500,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  geocodeContext: "Washington, DC",
};

/**
 * Path fragments that never point at a review post.
 */
export const NON_POST_PATH_PATTERNS = [
  /\/page\/\d+/,
  /\/category\//,
  /\/tag\//,
  /\/author\//,
  /\/feed\/?$/,
  /\/wp-(?:admin|content|includes|json|login)/,
  /\/comments?\//,
  /#/,
];

/**
 * Link hosts/texts in a post body that are not the restaurant's location.
 */
export const IGNORED_LINK_PATTERNS = [
  /plus\.google\./,
  /wmata\.com\/?$/,
  /Metro Trip Planner/i,
];
