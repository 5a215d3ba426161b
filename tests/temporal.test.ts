import test from "node:test";
import assert from "node:assert/strict";
import { normalizeRecords } from "../src/engine/normalize.js";
import { aggregateHours, formatHourLabel } from "../src/engine/temporal.js";

const now = new Date("2024-06-01T00:00:00Z");
const stamp = (hour: number) => `2024-05-20T${String(hour).padStart(2, "0")}:15:00Z`;

test("formatHourLabel uses a 12-hour clock", () => {
  assert.equal(formatHourLabel(0), "12AM");
  assert.equal(formatHourLabel(1), "1AM");
  assert.equal(formatHourLabel(11), "11AM");
  assert.equal(formatHourLabel(12), "12PM");
  assert.equal(formatHourLabel(13), "1PM");
  assert.equal(formatHourLabel(23), "11PM");
});

test("empty input still yields 24 zero buckets", () => {
  const hours = aggregateHours([]);
  assert.equal(hours.length, 24);
  hours.forEach((bucket, index) => {
    assert.equal(bucket.hour, index);
    assert.equal(bucket.videoCount, 0);
    assert.equal(bucket.averageViews, 0);
    assert.equal(bucket.averageEngagement, 0);
  });
});

test("buckets average views and engagement per hour", () => {
  const { records } = normalizeRecords(
    [
      { id: "a", title: "A", publishedAt: stamp(9), viewCount: 100, likeCount: 10 },
      { id: "b", title: "B", publishedAt: stamp(9), viewCount: 200, likeCount: 30 },
      { id: "c", title: "C", publishedAt: stamp(18), viewCount: 50 }
    ],
    now
  );
  const hours = aggregateHours(records);
  assert.deepEqual(hours[9], {
    hour: 9,
    hourLabel: "9AM",
    videoCount: 2,
    averageViews: 150,
    averageEngagement: 12.5
  });
  assert.equal(hours[18].videoCount, 1);
  assert.equal(hours[18].averageViews, 50);
  assert.equal(hours[0].videoCount, 0);
});

test("hour averages round halves to even", () => {
  const { records } = normalizeRecords(
    [
      { id: "a", title: "A", publishedAt: stamp(5), viewCount: 2 },
      { id: "b", title: "B", publishedAt: stamp(5), viewCount: 3 },
      { id: "c", title: "C", publishedAt: stamp(6), viewCount: 3 },
      { id: "d", title: "D", publishedAt: stamp(6), viewCount: 4 }
    ],
    now
  );
  const hours = aggregateHours(records);
  assert.equal(hours[5].averageViews, 2);
  assert.equal(hours[6].averageViews, 4);
});

test("only records with an hour and a non-negative age are counted", () => {
  const { records } = normalizeRecords(
    [
      { id: "a", title: "A", publishedAt: stamp(3), viewCount: 10 },
      { id: "b", title: "B", publishedAt: "garbage", viewCount: 10 },
      { id: "c", title: "C", publishedAt: "2024-07-01T03:00:00Z", viewCount: 10 }
    ],
    now
  );
  const hours = aggregateHours(records);
  const total = hours.reduce((sum, bucket) => sum + bucket.videoCount, 0);
  assert.equal(total, 1);
  assert.equal(hours[3].videoCount, 1);
});
