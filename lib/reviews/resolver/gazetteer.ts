/**
 * Neighborhood Gazetteer
 *
 * Known neighborhoods with their aliases and centroids. An exact match
 * against the gazetteer is the highest-confidence resolution.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import defaultNeighborhoods from "@/data/neighborhoods.json";
import { ConfigError } from "../errors";
import { locationSegments, normalizeLocationText } from "./location-text";

export const gazetteerEntrySchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export type GazetteerEntry = z.infer<typeof gazetteerEntrySchema>;
export type GazetteerEntryInput = z.input<typeof gazetteerEntrySchema>;

const gazetteerFileSchema = z.array(gazetteerEntrySchema);

export class Gazetteer {
  private readonly index = new Map<string, GazetteerEntry>();

  constructor(entries: GazetteerEntryInput[]) {
    for (const input of entries) {
      const entry = gazetteerEntrySchema.parse(input);
      for (const label of [entry.name, ...entry.aliases]) {
        const key = normalizeLocationText(label);
        if (key && !this.index.has(key)) {
          this.index.set(key, entry);
        }
      }
    }
  }

  /**
   * Match a normalized location key: the whole key first, then each
   * comma-separated segment in order (street, neighborhood, city).
   */
  match(key: string): GazetteerEntry | null {
    const whole = this.index.get(key);
    if (whole) return whole;

    for (const segment of locationSegments(key)) {
      const entry = this.index.get(segment);
      if (entry) return entry;
    }
    return null;
  }

  /** Canonical neighborhood name for a free-text locality, if known. */
  canonicalName(locality: string): string | null {
    return this.index.get(normalizeLocationText(locality))?.name ?? null;
  }

  get size(): number {
    return this.index.size;
  }
}

export function createDefaultGazetteer(): Gazetteer {
  return new Gazetteer(defaultNeighborhoods);
}

export async function loadGazetteerFile(path: string): Promise<Gazetteer> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read gazetteer ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = gazetteerFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid gazetteer ${path}:\n${z.prettifyError(parsed.error)}`);
  }
  return new Gazetteer(parsed.data);
}
