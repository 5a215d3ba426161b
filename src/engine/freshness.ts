import type { FreshnessPoint, VideoRecord } from "../shared/record.js";

// Upload age against views, for records whose age is known.
export const buildFreshnessPoints = (records: readonly VideoRecord[]): FreshnessPoint[] =>
  records.flatMap((record) =>
    record.daysSinceUpload === null
      ? []
      : [
          {
            videoId: record.id,
            title: record.title,
            daysSinceUpload: record.daysSinceUpload,
            views: record.views,
            engagementRate: record.engagementRate
          }
        ]
  );
