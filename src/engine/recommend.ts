import type {
  CategoryPerformance,
  ClusterProfile,
  HourBucket,
  HourSummary,
  RecommendationInsight
} from "../shared/record.js";

export const CATEGORY_NAMES: Readonly<Record<string, string>> = {
  "1": "Film & Animation",
  "2": "Autos & Vehicles",
  "10": "Music",
  "15": "Pets & Animals",
  "17": "Sports",
  "19": "Travel & Events",
  "20": "Gaming",
  "22": "People & Blogs",
  "23": "Comedy",
  "24": "Entertainment",
  "25": "News & Politics",
  "26": "Howto & Style",
  "27": "Education",
  "28": "Science & Technology"
};

export const FALLBACK_CATEGORY_NAME = "Various Categories";

const FALLBACK_HOUR: HourSummary = { hour: 12, hourLabel: "12PM", averageViews: 0 };

export const resolveCategoryName = (categoryId: string | null): string => {
  if (!categoryId) return FALLBACK_CATEGORY_NAME;
  return CATEGORY_NAMES[categoryId] ?? `Category ${categoryId}`;
};

const formatViews = (views: number) => Math.trunc(views).toLocaleString("en-US");

export const buildRecommendationText = (hourLabel: string, averageViews: number, categoryName: string): string =>
  `Based on trending video analytics, upload your content at ${hourLabel} for maximum reach. ` +
  `Videos uploaded at this time show an average of ${formatViews(averageViews)} views. ` +
  `The most successful category in trending videos is ${categoryName}.`;

const toSummary = (bucket: HourBucket): HourSummary => ({
  hour: bucket.hour,
  hourLabel: bucket.hourLabel,
  averageViews: Math.trunc(bucket.averageViews)
});

/**
 * Picks the best publish hour and category. With no populated hour the
 * insight falls back to 12PM with zero views; with no categories the
 * category name falls back to "Various Categories".
 */
export const synthesizeRecommendation = (
  hours: readonly HourBucket[],
  categories: readonly CategoryPerformance[],
  topCluster: ClusterProfile | null = null
): RecommendationInsight => {
  const populated = hours.filter((bucket) => bucket.videoCount > 0);
  const ranked = (populated.length > 0 ? populated : [...hours]).sort(
    (a, b) => b.averageViews - a.averageViews || a.hour - b.hour
  );
  const best = populated.length > 0 ? toSummary(ranked[0]) : FALLBACK_HOUR;

  let bestCategory: CategoryPerformance | null = null;
  for (const category of categories) {
    if (!bestCategory || category.performanceScore > bestCategory.performanceScore) {
      bestCategory = category;
    }
  }
  const bestCategoryId = bestCategory ? bestCategory.categoryId : null;
  const bestCategoryName = resolveCategoryName(bestCategoryId);

  return {
    bestHour: best.hour,
    bestHourLabel: best.hourLabel,
    bestHourAverageViews: best.averageViews,
    topThreeHours: ranked.slice(0, 3).map(toSummary),
    bestCategoryId,
    bestCategoryName,
    trendingTopic: topCluster ? { clusterId: topCluster.clusterId, terms: [...topCluster.terms] } : null,
    recommendationText: buildRecommendationText(best.hourLabel, best.averageViews, bestCategoryName)
  };
};
