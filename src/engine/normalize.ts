import crypto from "crypto";
import type { RawVideoRecord, VideoRecord } from "../shared/record.js";
import { roundTo } from "./numbers.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

type CountField = "viewCount" | "likeCount" | "commentCount";
type CountKey = "views" | "likes" | "comments";

export const COUNT_FIELDS: ReadonlyArray<{ field: CountField; key: CountKey }> = [
  { field: "viewCount", key: "views" },
  { field: "likeCount", key: "likes" },
  { field: "commentCount", key: "comments" }
];

// Tried in order. Both read whole seconds as UTC; the second drops any
// fractional seconds and offset suffix.
export const TIMESTAMP_FORMATS: readonly RegExp[] = [
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/,
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d*)?(?:Z|[+-]\d{2}:?\d{2})?$/
];

const hashId = (input: string) => crypto.createHash("sha256").update(input).digest("hex");

const toStringOrNull = (value: unknown): string | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
};

export const parseCount = (value: unknown): number => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : 0;
  }
  return 0;
};

const toUtcDate = (match: RegExpMatchArray): Date | null => {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  return roundTrips ? date : null;
};

export const parsePublishedAt = (value: unknown): Date | null => {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  for (const pattern of TIMESTAMP_FORMATS) {
    const match = trimmed.match(pattern);
    if (!match) continue;
    const date = toUtcDate(match);
    if (date) return date;
  }
  return null;
};

export const computeEngagementRate = (views: number, likes: number, comments: number): number => {
  if (views <= 0) return 0;
  return roundTo(((likes + comments) / views) * 100, 2);
};

/**
 * Builds a typed record from a raw one. Returns null only when both the
 * identifier and the title are missing; a record without an id gets one
 * derived from its title and timestamp.
 *
 * Counts that are missing or not integers become 0. An unparseable
 * timestamp leaves `publishHour` and `daysSinceUpload` null. A timestamp
 * in the future keeps its `publishHour` but gets a null `daysSinceUpload`,
 * which keeps the record out of the hourly buckets only.
 */
export const normalizeRecord = (raw: RawVideoRecord, now: Date = new Date()): VideoRecord | null => {
  const rawId = toStringOrNull(raw.id)?.trim() ?? "";
  const title = toStringOrNull(raw.title)?.trim() ?? "";
  if (!rawId && !title) return null;

  const counts: Record<CountKey, number> = { views: 0, likes: 0, comments: 0 };
  for (const { field, key } of COUNT_FIELDS) {
    counts[key] = parseCount(raw[field]);
  }

  const published = parsePublishedAt(raw.publishedAt);
  const daysSinceUpload = published ? Math.floor((now.getTime() - published.getTime()) / MS_PER_DAY) : null;

  return {
    id: rawId || hashId(`${title}:${toStringOrNull(raw.publishedAt) ?? ""}`).slice(0, 16),
    title,
    description: toStringOrNull(raw.description) ?? "",
    categoryId: toStringOrNull(raw.categoryId)?.trim() ?? "",
    publishedAt: published ? published.toISOString() : null,
    views: counts.views,
    likes: counts.likes,
    comments: counts.comments,
    engagementRate: computeEngagementRate(counts.views, counts.likes, counts.comments),
    publishHour: published ? published.getUTCHours() : null,
    daysSinceUpload: daysSinceUpload !== null && daysSinceUpload >= 0 ? daysSinceUpload : null
  };
};

export const normalizeRecords = (
  rawRecords: readonly RawVideoRecord[],
  now: Date = new Date()
): { records: VideoRecord[]; discarded: number } => {
  const records: VideoRecord[] = [];
  let discarded = 0;
  for (const raw of rawRecords) {
    const record = normalizeRecord(raw, now);
    if (record) {
      records.push(record);
    } else {
      discarded += 1;
    }
  }
  return { records, discarded };
};
