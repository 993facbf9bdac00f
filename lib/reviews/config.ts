/**
 * Review Pipeline Configuration
 *
 * Reads environment variables into a typed config. CLI flags are applied
 * on top through `overrides`.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import {
  CRITIC_BLOG_DEFAULTS,
  DEFAULT_USER_AGENT,
} from "./sources/critic-blog/constants";

// ============================================================================
// Environment Schema
// ============================================================================

const envSchema = z.object({
  REVIEWS_SOURCE_URL: z.url().default(CRITIC_BLOG_DEFAULTS.baseUrl),
  REVIEWS_INDEX_PATH: z.string().default(CRITIC_BLOG_DEFAULTS.indexPath),
  REVIEWS_DISCOVERY_MODE: z.enum(["html", "wp-json"]).default(CRITIC_BLOG_DEFAULTS.discoveryMode),
  REVIEWS_MAX_INDEX_PAGES: z.coerce.number().int().positive().default(CRITIC_BLOG_DEFAULTS.maxIndexPages),
  REVIEWS_WP_PER_PAGE: z.coerce.number().int().min(1).max(100).default(CRITIC_BLOG_DEFAULTS.wpPerPage),
  REVIEWS_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  REVIEWS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(CRITIC_BLOG_DEFAULTS.timeoutMs),
  REVIEWS_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(CRITIC_BLOG_DEFAULTS.rateLimitMs),
  REVIEWS_MAX_RETRIES: z.coerce.number().int().min(0).default(CRITIC_BLOG_DEFAULTS.maxRetries),
  REVIEWS_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(CRITIC_BLOG_DEFAULTS.retryBaseDelayMs),
  REVIEWS_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  GEOCODER_URL: z.url().default("https://nominatim.openstreetmap.org/search"),
  GEOCODER_CONTEXT: z.string().default(CRITIC_BLOG_DEFAULTS.geocodeContext),
  GEOCODER_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(1100),
  REVIEWS_LOW_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  REVIEWS_GAZETTEER_PATH: z.string().optional(),
  REVIEWS_DATA_DIR: z.string().default(".data"),
  DATABASE_URL: z.string().optional(),
});

// ============================================================================
// Typed Config
// ============================================================================

export type DiscoveryMode = "html" | "wp-json";

export interface ReviewPipelineConfig {
  source: {
    baseUrl: string;
    indexPath: string;
    discoveryMode: DiscoveryMode;
    maxIndexPages: number;
    wpPerPage: number;
  };
  fetch: {
    userAgent: string;
    timeoutMs: number;
    rateLimitMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  geocoder: {
    url: string;
    context: string;
    rateLimitMs: number;
  };
  resolver: {
    lowConfidenceThreshold: number;
    gazetteerPath?: string;
  };
  pipeline: {
    concurrency: number;
  };
  storage: {
    dataDir: string;
    databaseUrl?: string;
  };
}

export interface ConfigOverrides {
  concurrency?: number;
  rateLimitMs?: number;
  maxIndexPages?: number;
}

/**
 * Build the pipeline config from environment variables.
 * Empty strings are treated as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): ReviewPipelineConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    source: {
      baseUrl: e.REVIEWS_SOURCE_URL.replace(/\/+$/, ""),
      indexPath: e.REVIEWS_INDEX_PATH,
      discoveryMode: e.REVIEWS_DISCOVERY_MODE,
      maxIndexPages: overrides.maxIndexPages ?? e.REVIEWS_MAX_INDEX_PAGES,
      wpPerPage: e.REVIEWS_WP_PER_PAGE,
    },
    fetch: {
      userAgent: e.REVIEWS_USER_AGENT,
      timeoutMs: e.REVIEWS_FETCH_TIMEOUT_MS,
      rateLimitMs: overrides.rateLimitMs ?? e.REVIEWS_RATE_LIMIT_MS,
      maxRetries: e.REVIEWS_MAX_RETRIES,
      retryBaseDelayMs: e.REVIEWS_RETRY_BASE_DELAY_MS,
    },
    geocoder: {
      url: e.GEOCODER_URL,
      context: e.GEOCODER_CONTEXT,
      rateLimitMs: e.GEOCODER_RATE_LIMIT_MS,
    },
    resolver: {
      lowConfidenceThreshold: e.REVIEWS_LOW_CONFIDENCE_THRESHOLD,
      gazetteerPath: e.REVIEWS_GAZETTEER_PATH,
    },
    pipeline: {
      concurrency: overrides.concurrency ?? e.REVIEWS_CONCURRENCY,
    },
    storage: {
      dataDir: e.REVIEWS_DATA_DIR,
      databaseUrl: e.DATABASE_URL,
    },
  };
}
