import type { ClusterProfile, TopicAnalysis, VideoRecord } from "../shared/record.js";
import { InsufficientDataError } from "./errors.js";
import { kMeans } from "./kmeans.js";
import { mean } from "./numbers.js";
import { DEFAULT_SEED } from "./random.js";
import { buildTermSpace, cleanTitle } from "./vectorize.js";

export const DEFAULT_CLUSTERS = 5;
export const TERMS_PER_CLUSTER = 5;
export const SAMPLE_TITLES_PER_CLUSTER = 5;

export type TopicOptions = {
  numClusters?: number;
  seed?: number;
};

// The +1 keeps zero-view records finite.
export const engagementScore = (record: Pick<VideoRecord, "views" | "likes" | "comments">): number =>
  record.likes / (record.views + 1) + record.comments / (record.views + 1);

const topTerms = (centroid: readonly number[], terms: readonly string[]): string[] =>
  centroid
    .map((weight, index) => ({ weight, index }))
    .sort((a, b) => b.weight - a.weight || a.index - b.index)
    .slice(0, TERMS_PER_CLUSTER)
    .map(({ index }) => terms[index]);

/**
 * Groups titled records into `numClusters` topics and ranks the topics by
 * mean engagement score, best first (lower cluster id on ties).
 *
 * Throws InsufficientDataError when fewer distinct title vectors than
 * clusters exist; the caller picks the fallback.
 */
export const clusterTopics = (records: readonly VideoRecord[], options: TopicOptions = {}): TopicAnalysis => {
  const numClusters = options.numClusters ?? DEFAULT_CLUSTERS;
  if (!Number.isInteger(numClusters) || numClusters <= 0) {
    throw new RangeError(`numClusters must be a positive integer, got ${numClusters}`);
  }

  const titled = records.filter((record) => record.title.trim().length > 0);
  const space = buildTermSpace(titled.map((record) => cleanTitle(record.title)));

  const distinct = new Set(space.vectors.map((vector) => vector.join(","))).size;
  if (distinct < numClusters) {
    throw new InsufficientDataError(distinct, numClusters);
  }

  const result = kMeans(space.vectors, numClusters, { seed: options.seed ?? DEFAULT_SEED });

  const assignments = titled.map((record, index) => ({ videoId: record.id, clusterId: result.labels[index] }));

  const profiles: ClusterProfile[] = result.centroids
    .map((centroid, clusterId) => {
      const members = titled.filter((_record, index) => result.labels[index] === clusterId);
      return {
        clusterId,
        terms: topTerms(centroid, space.terms),
        meanEngagement: mean(members.map(engagementScore)),
        memberCount: members.length,
        sampleTitles: members.slice(0, SAMPLE_TITLES_PER_CLUSTER).map((record) => record.title)
      };
    })
    .sort((a, b) => b.meanEngagement - a.meanEngagement || a.clusterId - b.clusterId);

  return {
    numClusters,
    vocabularySize: space.terms.length,
    inertia: result.inertia,
    assignments,
    profiles,
    topCluster: profiles[0]
  };
};
