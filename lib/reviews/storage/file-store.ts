/**
 * JSON-File Review Store
 *
 * Default backend when no DATABASE_URL is configured. The whole snapshot
 * lives in `<dataDir>/reviews.json` and is rewritten (temp file + rename)
 * after every mutation, one write at a time.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { storeSnapshotSchema, type StoreSnapshot } from "../api/schemas";
import { errorMessage, StoreError } from "../errors";
import { emptySnapshot, MemoryReviewStore } from "./memory-store";

export const SNAPSHOT_FILE_NAME = "reviews.json";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readSnapshot(filePath: string): Promise<StoreSnapshot> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return emptySnapshot();
    throw new StoreError(`Cannot read ${filePath}: ${errorMessage(error)}`, "UNAVAILABLE", error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StoreError(`${filePath} is not valid JSON`, "UNAVAILABLE", error);
  }

  const parsed = storeSnapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new StoreError(
      `${filePath} does not match the store format:\n${z.prettifyError(parsed.error)}`,
      "UNAVAILABLE",
      parsed.error
    );
  }
  return parsed.data;
}

export class FileReviewStore extends MemoryReviewStore {
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    readonly filePath: string,
    snapshot: StoreSnapshot
  ) {
    super(snapshot);
  }

  static async open(dataDir: string): Promise<FileReviewStore> {
    const filePath = path.join(dataDir, SNAPSHOT_FILE_NAME);
    const snapshot = await readSnapshot(filePath);
    return new FileReviewStore(filePath, snapshot);
  }

  protected override async persist(): Promise<void> {
    const json = JSON.stringify(this.state, null, 2);
    const write = this.writeChain.then(() => this.writeSnapshot(json));
    // Keep the chain alive after a failed write; the caller still sees the error
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  override async close(): Promise<void> {
    await this.writeChain;
  }

  private async writeSnapshot(json: string): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, json, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new StoreError(
        `Cannot write ${this.filePath}: ${errorMessage(error)}`,
        "UNAVAILABLE",
        error
      );
    }
  }
}
