import { createDatabase } from "@/lib/db";
import type { ReviewPipelineConfig } from "../config";
import { DrizzleReviewStore } from "./drizzle-store";
import { FileReviewStore } from "./file-store";
import type { ReviewStore } from "./types";

export * from "./types";
export * from "./memory-store";
export * from "./file-store";
export * from "./drizzle-store";
export * from "./export";
export * from "./post-preference";

/**
 * PostgreSQL when DATABASE_URL is set, otherwise the JSON file under
 * REVIEWS_DATA_DIR.
 */
export async function createReviewStore(
  storage: ReviewPipelineConfig["storage"]
): Promise<ReviewStore> {
  if (storage.databaseUrl) {
    const { db, pool } = createDatabase(storage.databaseUrl);
    console.log("[Store] Using PostgreSQL");
    return new DrizzleReviewStore(db, () => pool.end());
  }
  console.log(`[Store] Using JSON file store in ${storage.dataDir}`);
  return FileReviewStore.open(storage.dataDir);
}
