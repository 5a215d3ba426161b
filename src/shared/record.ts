// Loosely typed input as it arrives from the record source.
export type RawVideoRecord = {
  id?: unknown;
  title?: unknown;
  description?: unknown;
  categoryId?: unknown;
  publishedAt?: unknown;
  viewCount?: unknown;
  likeCount?: unknown;
  commentCount?: unknown;
};

export type VideoRecord = {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly categoryId: string;
  readonly publishedAt: string | null; // ISO timestamp, UTC
  readonly views: number;
  readonly likes: number;
  readonly comments: number;
  readonly engagementRate: number;
  readonly publishHour: number | null;
  readonly daysSinceUpload: number | null;
};

export type ClusterAssignment = {
  readonly videoId: string;
  readonly clusterId: number;
};

export type ClusterProfile = {
  readonly clusterId: number;
  readonly terms: string[];
  readonly meanEngagement: number;
  readonly memberCount: number;
  readonly sampleTitles: string[];
};

export type TopicAnalysis = {
  readonly numClusters: number;
  readonly vocabularySize: number;
  readonly inertia: number;
  readonly assignments: ClusterAssignment[];
  // Ranked by mean engagement, best first.
  readonly profiles: ClusterProfile[];
  readonly topCluster: ClusterProfile;
};

export type HourBucket = {
  readonly hour: number;
  readonly hourLabel: string;
  readonly videoCount: number;
  readonly averageViews: number;
  readonly averageEngagement: number;
};

export type CategoryPerformance = {
  readonly categoryId: string;
  readonly videoCount: number;
  readonly averageViews: number;
  readonly performanceScore: number;
};

export type KeywordCount = {
  readonly keyword: string;
  readonly count: number;
};

export type FreshnessPoint = {
  readonly videoId: string;
  readonly title: string;
  readonly daysSinceUpload: number;
  readonly views: number;
  readonly engagementRate: number;
};

export type HourSummary = {
  readonly hour: number;
  readonly hourLabel: string;
  readonly averageViews: number;
};

export type RecommendationInsight = {
  readonly bestHour: number;
  readonly bestHourLabel: string;
  readonly bestHourAverageViews: number;
  readonly topThreeHours: HourSummary[];
  readonly bestCategoryId: string | null;
  readonly bestCategoryName: string;
  readonly trendingTopic: { clusterId: number; terms: string[] } | null;
  readonly recommendationText: string;
};

export type IdeaBrief = {
  readonly keywords: string[];
  readonly sampleTitles: string[];
  readonly averageEngagement: number;
  readonly averageSentiment: number;
};
