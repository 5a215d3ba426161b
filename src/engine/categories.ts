import type { CategoryPerformance, VideoRecord } from "../shared/record.js";

// Categories come out in first-seen order; records without a category are skipped.
export const aggregateCategories = (records: readonly VideoRecord[]): CategoryPerformance[] => {
  const totals = new Map<string, { views: number; count: number }>();

  for (const record of records) {
    if (!record.categoryId) continue;
    const entry = totals.get(record.categoryId) ?? { views: 0, count: 0 };
    entry.views += record.views;
    entry.count += 1;
    totals.set(record.categoryId, entry);
  }

  return Array.from(totals.entries()).map(([categoryId, { views, count }]) => {
    const averageViews = views / count;
    return {
      categoryId,
      videoCount: count,
      averageViews,
      performanceScore: averageViews * count
    };
  });
};
