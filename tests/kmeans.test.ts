import test from "node:test";
import assert from "node:assert/strict";
import { kMeans } from "../src/engine/kmeans.js";
import { createRandom } from "../src/engine/random.js";

const points = [
  [0, 0],
  [0, 1],
  [10, 10],
  [10, 11]
];

test("kMeans separates well-apart groups", () => {
  const result = kMeans(points, 2, { seed: 7 });
  assert.equal(result.labels[0], result.labels[1]);
  assert.equal(result.labels[2], result.labels[3]);
  assert.notEqual(result.labels[0], result.labels[2]);
  assert.equal(result.inertia, 1);
  assert.deepEqual(result.centroids[result.labels[0]], [0, 0.5]);
});

test("kMeans is deterministic for a fixed seed", () => {
  const first = kMeans(points, 3, { seed: 42 });
  const second = kMeans(points, 3, { seed: 42 });
  assert.deepEqual(first, second);
});

test("kMeans rejects impossible cluster counts", () => {
  assert.throws(() => kMeans(points, 0), RangeError);
  assert.throws(() => kMeans(points, 1.5), RangeError);
  assert.throws(() => kMeans(points, 5), RangeError);
});

test("createRandom repeats its sequence for the same seed", () => {
  const a = createRandom(42);
  const b = createRandom(42);
  const first = [a(), a(), a()];
  assert.deepEqual(first, [b(), b(), b()]);
  for (const value of first) {
    assert.ok(value >= 0 && value < 1);
  }
});
