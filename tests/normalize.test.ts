import test from "node:test";
import assert from "node:assert/strict";
import {
  computeEngagementRate,
  normalizeRecord,
  normalizeRecords,
  parseCount,
  parsePublishedAt
} from "../src/engine/normalize.js";

const now = new Date("2024-03-20T00:00:00Z");

test("engagement rates follow the rounded percentage rule", () => {
  const { records } = normalizeRecords(
    [
      { id: "a", title: "One", viewCount: "100", likeCount: "10", commentCount: "5" },
      { id: "b", title: "Two", viewCount: "200", likeCount: "20", commentCount: "5" },
      { id: "c", title: "Three", viewCount: "0", likeCount: "0", commentCount: "0" }
    ],
    now
  );
  assert.deepEqual(
    records.map((record) => record.engagementRate),
    [15, 12.5, 0]
  );
});

test("computeEngagementRate is zero without views", () => {
  assert.equal(computeEngagementRate(0, 50, 10), 0);
  assert.equal(computeEngagementRate(3, 1, 0), 33.33);
  assert.equal(computeEngagementRate(800, 1, 0), 0.12);
});

test("parseCount coerces malformed counts to zero", () => {
  assert.equal(parseCount("1234"), 1234);
  assert.equal(parseCount(" 42 "), 42);
  assert.equal(parseCount(12.7), 12);
  assert.equal(parseCount("abc"), 0);
  assert.equal(parseCount("-5"), 0);
  assert.equal(parseCount(-3), 0);
  assert.equal(parseCount(undefined), 0);
  assert.equal(parseCount(null), 0);
  assert.equal(parseCount(Number.NaN), 0);
});

test("parsePublishedAt accepts both timestamp shapes", () => {
  assert.equal(parsePublishedAt("2024-03-10T14:30:00Z")?.toISOString(), "2024-03-10T14:30:00.000Z");
  assert.equal(parsePublishedAt("2024-03-10T14:30:00.123Z")?.toISOString(), "2024-03-10T14:30:00.000Z");
  assert.equal(parsePublishedAt("2024-03-10T14:30:00")?.toISOString(), "2024-03-10T14:30:00.000Z");
  assert.equal(parsePublishedAt("yesterday"), null);
  assert.equal(parsePublishedAt("2024-02-30T10:00:00Z"), null);
  assert.equal(parsePublishedAt(1710081000), null);
});

test("normalizeRecord derives hour and upload age", () => {
  const record = normalizeRecord(
    { id: "v1", title: " Launch day ", categoryId: 20, publishedAt: "2024-03-10T14:30:00Z", viewCount: "10" },
    now
  );
  assert.ok(record);
  assert.equal(record.title, "Launch day");
  assert.equal(record.categoryId, "20");
  assert.equal(record.publishHour, 14);
  assert.equal(record.daysSinceUpload, 9);
  assert.equal(record.likes, 0);
});

test("a bad timestamp keeps the record but leaves time fields null", () => {
  const record = normalizeRecord({ id: "v2", title: "Clip", publishedAt: "not a date", viewCount: "5" }, now);
  assert.ok(record);
  assert.equal(record.publishHour, null);
  assert.equal(record.daysSinceUpload, null);
  assert.equal(record.publishedAt, null);
  assert.equal(record.views, 5);
});

test("a future timestamp keeps the hour but drops the upload age", () => {
  const record = normalizeRecord({ id: "v3", title: "Premiere", publishedAt: "2024-03-25T08:00:00Z" }, now);
  assert.ok(record);
  assert.equal(record.publishHour, 8);
  assert.equal(record.daysSinceUpload, null);
});

test("records need an id or a title", () => {
  assert.equal(normalizeRecord({ description: "orphan" }, now), null);
  const untitled = normalizeRecord({ id: "only-id" }, now);
  assert.equal(untitled?.title, "");
  const anonymous = normalizeRecord({ title: "Only title" }, now);
  assert.equal(anonymous?.id.length, 16);

  const { records, discarded } = normalizeRecords([{}, { id: "x" }], now);
  assert.equal(records.length, 1);
  assert.equal(discarded, 1);
});
