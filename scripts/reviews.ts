#!/usr/bin/env tsx
/**
 * Review Pipeline CLI
 *
 * Usage:
 *   npm run reviews -- run [--full] [--concurrency N] [--rate-limit MS] [--max-pages N]
 *   npm run reviews -- export [--out PATH] [--proximity-only] [--cuisines PATH]
 *   npm run reviews -- tombstone <restaurantId> --confirm [--reason TEXT]
 *   npm run reviews -- invalidate-location <text>
 *   npm run reviews -- runs [--limit N]
 *
 * Exit code 0 when the command completed (a run may still report per-item
 * failures), 1 for bad arguments and fatal errors.
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { parseCliArgs, USAGE, type CliCommand } from "../lib/reviews/cli/args";
import {
  buildIngestionRequest,
  CliUsageError,
  createConsoleObserver,
  createPipelineContext,
  createReviewStore,
  errorMessage,
  exportCuisines,
  exportRestaurants,
  getDefaultCuisineVocabulary,
  loadConfig,
  runReviewIngestion,
  TombstoneConfirmationError,
  type ReviewPipelineConfig,
  type ReviewStore,
} from "../lib/reviews";

const DEFAULT_EXPORT_FILE = "restaurants.json";

async function writeJson(out: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(out), { recursive: true });
  await writeFile(out, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

async function runCommand(
  command: Exclude<CliCommand, { command: "help" }>,
  pipelineConfig: ReviewPipelineConfig,
  store: ReviewStore
): Promise<number> {
  switch (command.command) {
    case "run": {
      const observer = createConsoleObserver();
      const context = await createPipelineContext(pipelineConfig, { store, observer });

      const controller = new AbortController();
      process.once("SIGINT", () => {
        console.warn("[CLI] Stopping after in-flight items finish (Ctrl-C again to force)");
        controller.abort();
        process.once("SIGINT", () => process.exit(130));
      });

      const summary = await runReviewIngestion(
        context,
        buildIngestionRequest(pipelineConfig, { full: command.args.full, signal: controller.signal })
      );
      console.log(JSON.stringify(summary, null, 2));
      return 0;
    }

    case "export": {
      const rows = await exportRestaurants(store.restaurants, { proximityOnly: command.proximityOnly });
      const out = command.out ?? path.join(pipelineConfig.storage.dataDir, DEFAULT_EXPORT_FILE);
      await writeJson(out, rows);
      console.log(`[CLI] Exported ${rows.length} restaurants to ${out}`);

      if (command.cuisinesOut) {
        const cuisines = await exportCuisines(store.restaurants, getDefaultCuisineVocabulary());
        await writeJson(command.cuisinesOut, cuisines);
        console.log(`[CLI] Exported ${cuisines.length} cuisines to ${command.cuisinesOut}`);
      }
      return 0;
    }

    case "tombstone": {
      const record = await store.restaurants.tombstone(command.args.restaurantId, {
        confirm: command.args.confirm,
        reason: command.args.reason,
      });
      if (!record) {
        console.error(`[CLI] No restaurant ${command.args.restaurantId}`);
        return 1;
      }
      console.log(`[CLI] Tombstoned ${record.restaurantId} (${record.displayName}) at ${record.tombstonedAt}`);
      return 0;
    }

    case "invalidate-location": {
      const context = await createPipelineContext(pipelineConfig, { store });
      const removed = await context.resolver.invalidate(command.text);
      console.log(
        removed
          ? `[CLI] Removed cached location for "${command.text}"`
          : `[CLI] No cached location for "${command.text}"`
      );
      return 0;
    }

    case "runs": {
      const runs = await store.runs.listRuns(command.limit);
      console.log(JSON.stringify(runs, null, 2));
      return 0;
    }
  }
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`[CLI] ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (command.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const pipelineConfig = loadConfig(
    process.env,
    command.command === "run"
      ? {
          concurrency: command.args.concurrency,
          rateLimitMs: command.args.rateLimitMs,
          maxIndexPages: command.args.maxPages,
        }
      : {}
  );

  const store = await createReviewStore(pipelineConfig.storage);
  try {
    return await runCommand(command, pipelineConfig, store);
  } catch (error) {
    if (error instanceof TombstoneConfirmationError) {
      console.error(`[CLI] ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await store.close();
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`[CLI] Fatal: ${errorMessage(error)}`);
    process.exit(1);
  });
