import { createRandom, DEFAULT_SEED, randomIndex, type RandomSource } from "./random.js";

export type KMeansOptions = {
  seed?: number;
  restarts?: number;
  maxIterations?: number;
  tolerance?: number;
};

export type KMeansResult = {
  readonly labels: number[];
  readonly centroids: number[][];
  readonly inertia: number;
  readonly iterations: number;
};

const squaredDistance = (a: readonly number[], b: readonly number[]): number => {
  let total = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = a[i] - b[i];
    total += diff * diff;
  }
  return total;
};

const nearest = (point: readonly number[], centroids: readonly number[][]) => {
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  centroids.forEach((centroid, index) => {
    const distance = squaredDistance(point, centroid);
    if (distance < bestDistance) {
      best = index;
      bestDistance = distance;
    }
  });
  return { index: best, distance: bestDistance };
};

// k-means++ seeding: each next centre is drawn with probability proportional
// to its squared distance from the centres chosen so far.
const seedCentroids = (points: readonly number[][], k: number, random: RandomSource): number[][] => {
  const centroids = [[...points[randomIndex(random, points.length)]]];
  while (centroids.length < k) {
    const distances = points.map((point) => nearest(point, centroids).distance);
    const total = distances.reduce((sum, value) => sum + value, 0);
    let chosen = randomIndex(random, points.length);
    if (total > 0) {
      let target = random() * total;
      for (let i = 0; i < distances.length; i += 1) {
        target -= distances[i];
        if (target < 0 && distances[i] > 0) {
          chosen = i;
          break;
        }
      }
    }
    centroids.push([...points[chosen]]);
  }
  return centroids;
};

const runOnce = (
  points: readonly number[][],
  k: number,
  random: RandomSource,
  maxIterations: number,
  tolerance: number
): KMeansResult => {
  const dimensions = points[0].length;
  let centroids = seedCentroids(points, k, random);
  let labels = points.map((point) => nearest(point, centroids).index);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations += 1;
    const sums = Array.from({ length: k }, () => new Array<number>(dimensions).fill(0));
    const sizes = new Array<number>(k).fill(0);
    points.forEach((point, index) => {
      const label = labels[index];
      sizes[label] += 1;
      for (let d = 0; d < dimensions; d += 1) sums[label][d] += point[d];
    });

    // An emptied cluster takes over the point farthest from its current centre.
    const taken = new Set<number>();
    const next = sums.map((sum, cluster) => {
      if (sizes[cluster] > 0) return sum.map((value) => value / sizes[cluster]);
      let farthest = 0;
      let farthestDistance = -1;
      points.forEach((point, index) => {
        if (taken.has(index)) return;
        const distance = squaredDistance(point, centroids[labels[index]]);
        if (distance > farthestDistance) {
          farthest = index;
          farthestDistance = distance;
        }
      });
      taken.add(farthest);
      return [...points[farthest]];
    });

    const shift = next.reduce((total, centroid, cluster) => total + squaredDistance(centroid, centroids[cluster]), 0);
    centroids = next;
    const nextLabels = points.map((point) => nearest(point, centroids).index);
    const stable = nextLabels.every((label, index) => label === labels[index]);
    labels = nextLabels;
    if (stable || shift <= tolerance) break;
  }

  const inertia = points.reduce((total, point, index) => total + squaredDistance(point, centroids[labels[index]]), 0);
  return { labels, centroids, inertia, iterations };
};

/**
 * Lloyd's k-means over dense vectors. Runs `restarts` seeded k-means++
 * initializations from one random stream and keeps the lowest-inertia run
 * (the earliest on ties), so a fixed seed always yields the same partition.
 */
export const kMeans = (points: readonly number[][], k: number, options: KMeansOptions = {}): KMeansResult => {
  if (!Number.isInteger(k) || k <= 0) {
    throw new RangeError(`Cluster count must be a positive integer, got ${k}`);
  }
  if (points.length < k) {
    throw new RangeError(`Cannot partition ${points.length} points into ${k} clusters`);
  }

  const random = createRandom(options.seed ?? DEFAULT_SEED);
  const restarts = Math.max(1, options.restarts ?? 10);
  const maxIterations = options.maxIterations ?? 300;
  const tolerance = options.tolerance ?? 1e-8;

  let best = runOnce(points, k, random, maxIterations, tolerance);
  for (let run = 1; run < restarts; run += 1) {
    const result = runOnce(points, k, random, maxIterations, tolerance);
    if (result.inertia < best.inertia) {
      best = result;
    }
  }
  return best;
};
