import type {
  CategoryPerformance,
  FreshnessPoint,
  HourBucket,
  IdeaBrief,
  KeywordCount,
  RawVideoRecord,
  RecommendationInsight,
  TopicAnalysis,
  VideoRecord
} from "../shared/record.js";
import { buildIdeaBrief } from "./brief.js";
import { aggregateCategories } from "./categories.js";
import { buildFreshnessPoints } from "./freshness.js";
import { countKeywords } from "./keywords.js";
import { normalizeRecords } from "./normalize.js";
import { DEFAULT_SEED } from "./random.js";
import { synthesizeRecommendation } from "./recommend.js";
import { aggregateHours } from "./temporal.js";
import { clusterTopics, DEFAULT_CLUSTERS } from "./topics.js";

export type AnalyzeOptions = {
  regionCode?: string;
  numClusters?: number;
  seed?: number;
  now?: Date;
  includeTopics?: boolean;
};

export type TrendReport = {
  regionCode: string | null;
  videos: VideoRecord[];
  discarded: number;
  categories: CategoryPerformance[];
  keywords: KeywordCount[];
  hours: HourBucket[];
  freshness: FreshnessPoint[];
  topics: TopicAnalysis | null;
  ideaBrief: IdeaBrief | null;
  recommendation: RecommendationInsight;
};

/**
 * Runs the whole engine over one already-fetched batch. Pure apart from the
 * clock, which `now` pins. A batch with no titles skips clustering and
 * yields the fallback insight. InsufficientDataError from clustering reaches
 * the caller unchanged; pass `includeTopics: false` to skip clustering.
 */
export const analyzeTrends = (rawRecords: readonly RawVideoRecord[], options: AnalyzeOptions = {}): TrendReport => {
  const { records, discarded } = normalizeRecords(rawRecords, options.now ?? new Date());

  const categories = aggregateCategories(records);
  const hours = aggregateHours(records);
  const hasTitles = records.some((record) => record.title.trim().length > 0);
  const topics =
    options.includeTopics === false || !hasTitles
      ? null
      : clusterTopics(records, {
          numClusters: options.numClusters ?? DEFAULT_CLUSTERS,
          seed: options.seed ?? DEFAULT_SEED
        });

  return {
    regionCode: options.regionCode ?? null,
    videos: records,
    discarded,
    categories,
    keywords: countKeywords(records),
    hours,
    freshness: buildFreshnessPoints(records),
    topics,
    ideaBrief: topics ? buildIdeaBrief(topics, records) : null,
    recommendation: synthesizeRecommendation(hours, categories, topics ? topics.topCluster : null)
  };
};
