import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.TRENDLENS_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const numberEnv = (key: string, fallback: number): number => {
  const parsed = Number(process.env[key]);
  return process.env[key] && Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  port: numberEnv("PORT", 3000),
  snapshotPath: process.env.SNAPSHOT_PATH ?? "",
  defaultRegion: process.env.DEFAULT_REGION ?? "US",
  maxResults: numberEnv("MAX_RESULTS", 50),
  numClusters: numberEnv("NUM_CLUSTERS", 5),
  clusterSeed: numberEnv("CLUSTER_SEED", 42)
};
