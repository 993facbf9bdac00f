/**
 * Critic Review Atlas
 *
 * Ingests a restaurant critic's blog into deduplicated, geolocated
 * restaurant records.
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./fetcher";
export * from "./parser";
export * from "./resolver";
export * from "./normalizer";
export * from "./storage";
export * from "./ingestion";
export * from "./observability";
