import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { RawVideoRecord } from "./record.js";

export type FetchOptions = {
  regionCode: string;
  maxResults: number;
  categoryId?: string;
};

// Supplies already-fetched records; the engine never calls one itself.
export interface RecordSource {
  fetchRecords(options: FetchOptions): Promise<RawVideoRecord[]>;
}

const looseValue = z.unknown();

const catalogItemSchema = z.object({
  id: looseValue,
  snippet: z.record(z.string(), looseValue),
  statistics: z.record(z.string(), looseValue).optional()
});

const snapshotSchema = z.union([
  z.array(z.record(z.string(), looseValue)),
  z.object({ items: z.array(z.record(z.string(), looseValue)) })
]);

// Catalog API items nest text under `snippet` and counts under `statistics`.
export const flattenItem = (item: Record<string, unknown>): RawVideoRecord => {
  const nested = catalogItemSchema.safeParse(item);
  if (!nested.success) {
    return {
      id: item.id,
      title: item.title,
      description: item.description,
      categoryId: item.categoryId,
      publishedAt: item.publishedAt,
      viewCount: item.viewCount,
      likeCount: item.likeCount,
      commentCount: item.commentCount
    };
  }
  const { id, snippet, statistics = {} } = nested.data;
  return {
    id,
    title: snippet.title,
    description: snippet.description,
    categoryId: snippet.categoryId,
    publishedAt: snippet.publishedAt,
    viewCount: statistics.viewCount,
    likeCount: statistics.likeCount,
    commentCount: statistics.commentCount
  };
};

export const parseSnapshot = (payload: unknown): RawVideoRecord[] => {
  const parsed = snapshotSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Invalid snapshot: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
  return items.map(flattenItem);
};

export const applyFetchOptions = (records: RawVideoRecord[], options: FetchOptions): RawVideoRecord[] => {
  const filtered = options.categoryId
    ? records.filter((record) => String(record.categoryId ?? "") === options.categoryId)
    : records;
  return filtered.slice(0, Math.max(0, options.maxResults));
};

/**
 * Reads records from a JSON snapshot: either one file, or a directory
 * holding `<REGION>.json` per region.
 */
export class SnapshotRecordSource implements RecordSource {
  constructor(private readonly snapshotPath: string) {}

  private async resolveFile(regionCode: string): Promise<string> {
    const stat = await fs.stat(this.snapshotPath);
    if (!stat.isDirectory()) return this.snapshotPath;
    return path.join(this.snapshotPath, `${regionCode.toUpperCase()}.json`);
  }

  async fetchRecords(options: FetchOptions): Promise<RawVideoRecord[]> {
    if (!this.snapshotPath) {
      throw new Error("SNAPSHOT_PATH is required");
    }
    const file = await this.resolveFile(options.regionCode);
    const payload: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    return applyFetchOptions(parseSnapshot(payload), options);
  }
}
