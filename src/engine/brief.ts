import type { IdeaBrief, TopicAnalysis, VideoRecord } from "../shared/record.js";
import { roundTo } from "./numbers.js";
import { averageSentiment } from "./sentiment.js";

/**
 * Plain-data input for the idea-generation collaborator: the top cluster's
 * terms and sample titles, its engagement as a percentage, and the mean
 * title sentiment over every record in the batch (untitled ones score 0).
 */
export const buildIdeaBrief = (topics: TopicAnalysis, records: readonly VideoRecord[]): IdeaBrief => ({
  keywords: [...topics.topCluster.terms],
  sampleTitles: [...topics.topCluster.sampleTitles],
  averageEngagement: roundTo(topics.topCluster.meanEngagement * 100, 2),
  averageSentiment: roundTo(averageSentiment(records.map((record) => record.title)), 2)
});
