export { analyzeTrends } from "./engine/pipeline.js";
export type { AnalyzeOptions, TrendReport } from "./engine/pipeline.js";
export { normalizeRecord, normalizeRecords, parseCount, parsePublishedAt, computeEngagementRate } from "./engine/normalize.js";
export { aggregateCategories } from "./engine/categories.js";
export { aggregateHours, formatHourLabel } from "./engine/temporal.js";
export { clusterTopics, engagementScore } from "./engine/topics.js";
export { buildTermSpace, cleanTitle } from "./engine/vectorize.js";
export { kMeans } from "./engine/kmeans.js";
export { synthesizeRecommendation, resolveCategoryName } from "./engine/recommend.js";
export { countKeywords } from "./engine/keywords.js";
export { buildFreshnessPoints } from "./engine/freshness.js";
export { titleSentiment, averageSentiment } from "./engine/sentiment.js";
export { buildIdeaBrief } from "./engine/brief.js";
export { InsufficientDataError } from "./engine/errors.js";
export { SnapshotRecordSource } from "./shared/source.js";
export type { RecordSource, FetchOptions } from "./shared/source.js";
export { createApp } from "./server/app.js";
export type * from "./shared/record.js";
