import { z } from "zod";

const positiveInt = (max: number) => z.coerce.number().int().positive().max(max);

export const trendingQuerySchema = z.object({
  country: z.string().trim().min(2).max(8).optional(),
  keyword: z.string().trim().optional(),
  max_results: positiveInt(200).optional(),
  num_clusters: positiveInt(50).optional(),
  seed: z.coerce.number().int().optional()
});

export const suggestionsQuerySchema = z.object({
  country: z.string().trim().min(2).max(8).optional(),
  category: z.string().trim().min(1).optional(),
  max_results: positiveInt(200).optional(),
  num_clusters: positiveInt(50).optional(),
  seed: z.coerce.number().int().optional()
});

export const analyzeBodySchema = z.object({
  records: z.array(z.record(z.string(), z.unknown())).max(1000),
  regionCode: z.string().optional(),
  numClusters: z.number().int().positive().max(50).optional(),
  seed: z.number().int().optional(),
  now: z.string().datetime().optional(),
  topics: z.enum(["required", "optional"]).optional()
});
