import type { HourBucket, VideoRecord } from "../shared/record.js";
import { roundTo } from "./numbers.js";

export const HOURS_PER_DAY = 24;

// 12-hour clock; midnight and noon both read 12.
export const formatHourLabel = (hour: number): string => {
  const displayHour = hour % 12 === 0 ? 12 : hour % 12;
  return `${displayHour}${hour < 12 ? "AM" : "PM"}`;
};

/**
 * Always returns 24 buckets in hour order. Only records with a publish
 * hour and a non-negative upload age contribute; empty hours are zero-filled.
 */
export const aggregateHours = (records: readonly VideoRecord[]): HourBucket[] => {
  const totals = Array.from({ length: HOURS_PER_DAY }, () => ({ views: 0, engagement: 0, count: 0 }));

  for (const record of records) {
    if (record.publishHour === null || record.daysSinceUpload === null) continue;
    const slot = totals[record.publishHour];
    slot.views += record.views;
    slot.engagement += record.engagementRate;
    slot.count += 1;
  }

  return totals.map((slot, hour) => ({
    hour,
    hourLabel: formatHourLabel(hour),
    videoCount: slot.count,
    averageViews: slot.count > 0 ? roundTo(slot.views / slot.count, 0) : 0,
    averageEngagement: slot.count > 0 ? roundTo(slot.engagement / slot.count, 2) : 0
  }));
};
