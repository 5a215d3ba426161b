import express from "express";
import type { ZodError } from "zod";
import { InsufficientDataError } from "../engine/errors.js";
import { normalizeRecords } from "../engine/normalize.js";
import { analyzeTrends, type TrendReport } from "../engine/pipeline.js";
import { config } from "../shared/config.js";
import type { VideoRecord } from "../shared/record.js";
import { flattenItem, type RecordSource } from "../shared/source.js";
import { analyzeBodySchema, suggestionsQuerySchema, trendingQuerySchema } from "./schemas.js";

const EXTENDED_RESULTS = 100;

export type AppDefaults = {
  regionCode: string;
  maxResults: number;
  numClusters: number;
  seed: number;
};

const configDefaults = (): AppDefaults => ({
  regionCode: config.defaultRegion,
  maxResults: config.maxResults,
  numClusters: config.numClusters,
  seed: config.clusterSeed
});

const invalidPayload = (res: express.Response, error: ZodError) =>
  res.status(400).json({ error: "invalid_payload", issues: error.issues });

const insufficientData = (res: express.Response, error: InsufficientDataError) =>
  res.status(422).json({
    error: error.code,
    message: error.message,
    distinctTitles: error.distinctTitles,
    requestedClusters: error.requestedClusters
  });

const serverError = (res: express.Response, error: unknown, fallback: string) => {
  const message = error instanceof Error ? error.message : fallback;
  return res.status(500).json({ error: message });
};

// Clustering is optional here: on too few titles the rest of the report still ships.
const analyzeWithOptionalTopics = (
  run: (includeTopics: boolean) => TrendReport
): { report: TrendReport; topicsSkipped: boolean } => {
  try {
    return { report: run(true), topicsSkipped: false };
  } catch (error) {
    if (!(error instanceof InsufficientDataError)) throw error;
    return { report: run(false), topicsSkipped: true };
  }
};

const mentions = (record: VideoRecord, keyword: string, includeDescription: boolean) =>
  record.title.toLowerCase().includes(keyword) ||
  (includeDescription && record.description.toLowerCase().includes(keyword));

export const createApp = (source: RecordSource, defaults: AppDefaults = configDefaults()) => {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/trending", async (req, res) => {
    const parsed = trendingQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return invalidPayload(res, parsed.error);
    }
    const query = parsed.data;
    const regionCode = (query.country ?? defaults.regionCode).toUpperCase();
    const keyword = (query.keyword ?? "").toLowerCase();

    try {
      const now = new Date();
      const raw = await source.fetchRecords({ regionCode, maxResults: query.max_results ?? defaults.maxResults });
      const { report, topicsSkipped } = analyzeWithOptionalTopics((includeTopics) =>
        analyzeTrends(raw, {
          regionCode,
          now,
          includeTopics,
          numClusters: query.num_clusters ?? defaults.numClusters,
          seed: query.seed ?? defaults.seed
        })
      );

      const videos = keyword ? report.videos.filter((video) => mentions(video, keyword, false)) : report.videos;

      let alsoTrending: VideoRecord[] = [];
      if (keyword) {
        const extended = await source.fetchRecords({ regionCode, maxResults: EXTENDED_RESULTS });
        const shown = new Set(videos.map((video) => video.id));
        alsoTrending = normalizeRecords(extended, now).records.filter(
          (video) => !shown.has(video.id) && mentions(video, keyword, true)
        );
      }

      return res.json({
        country: regionCode,
        keyword,
        topicsSkipped,
        ...report,
        videos,
        alsoTrending
      });
    } catch (error) {
      return serverError(res, error, "Analysis failed");
    }
  });

  app.get("/creator-suggestions", async (req, res) => {
    const parsed = suggestionsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return invalidPayload(res, parsed.error);
    }
    const query = parsed.data;
    const regionCode = (query.country ?? defaults.regionCode).toUpperCase();

    try {
      const raw = await source.fetchRecords({
        regionCode,
        maxResults: query.max_results ?? defaults.maxResults,
        categoryId: query.category
      });
      const report = analyzeTrends(raw, {
        regionCode,
        numClusters: query.num_clusters ?? defaults.numClusters,
        seed: query.seed ?? defaults.seed
      });
      const clusterOf = new Map((report.topics?.assignments ?? []).map((row) => [row.videoId, row.clusterId]));

      return res.json({
        region: regionCode,
        category: query.category ?? null,
        clusters: report.topics?.profiles ?? [],
        insights: report.ideaBrief,
        videoData: report.videos.map((video) => ({
          videoId: video.id,
          title: video.title,
          categoryId: video.categoryId,
          views: video.views,
          likes: video.likes,
          comments: video.comments,
          cluster: clusterOf.get(video.id) ?? null
        }))
      });
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        return insufficientData(res, error);
      }
      return serverError(res, error, "Suggestion analysis failed");
    }
  });

  app.post("/analyze", (req, res) => {
    const parsed = analyzeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return invalidPayload(res, parsed.error);
    }
    const body = parsed.data;
    const run = (includeTopics: boolean) =>
      analyzeTrends(body.records.map(flattenItem), {
        regionCode: body.regionCode,
        now: body.now ? new Date(body.now) : undefined,
        includeTopics,
        numClusters: body.numClusters ?? defaults.numClusters,
        seed: body.seed ?? defaults.seed
      });

    try {
      if (body.topics === "optional") {
        const { report, topicsSkipped } = analyzeWithOptionalTopics(run);
        return res.json({ topicsSkipped, ...report });
      }
      return res.json({ topicsSkipped: false, ...run(true) });
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        return insufficientData(res, error);
      }
      return serverError(res, error, "Analysis failed");
    }
  });

  return app;
};
