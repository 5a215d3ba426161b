import { InsufficientDataError } from "../engine/errors.js";
import { analyzeTrends } from "../engine/pipeline.js";
import { config } from "../shared/config.js";
import { SnapshotRecordSource } from "../shared/source.js";

type RunOptions = {
  input: string;
  country: string;
  keyword: string;
  maxResults: number;
  clusters: number;
  seed: number;
  topics: boolean;
};

const parseArgs = (argv: string[]): RunOptions => {
  const args = new Map<string, string>();
  let topics = true;
  for (const arg of argv) {
    if (arg === "--no-topics") {
      topics = false;
      continue;
    }
    const match = arg.match(/^--([a-z-]+)=(.*)$/);
    if (match) {
      args.set(match[1], match[2]);
    }
  }

  const numberArg = (key: string, fallback: number) => {
    const parsed = Number(args.get(key));
    return args.has(key) && Number.isFinite(parsed) ? parsed : fallback;
  };

  return {
    input: args.get("input") ?? config.snapshotPath,
    country: (args.get("country") ?? config.defaultRegion).toUpperCase(),
    keyword: (args.get("keyword") ?? "").toLowerCase(),
    maxResults: numberArg("max-results", config.maxResults),
    clusters: numberArg("clusters", config.numClusters),
    seed: numberArg("seed", config.clusterSeed),
    topics
  };
};

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  if (!options.input) {
    throw new Error("Pass --input=<snapshot> or set SNAPSHOT_PATH");
  }

  const source = new SnapshotRecordSource(options.input);
  const raw = await source.fetchRecords({ regionCode: options.country, maxResults: options.maxResults });
  console.error(`Loaded ${raw.length} records for ${options.country}`);

  const report = analyzeTrends(raw, {
    regionCode: options.country,
    numClusters: options.clusters,
    seed: options.seed,
    includeTopics: options.topics
  });
  const videos = options.keyword
    ? report.videos.filter((video) => video.title.toLowerCase().includes(options.keyword))
    : report.videos;

  console.log(JSON.stringify({ ...report, videos }, null, 2));
};

run().catch((err) => {
  if (err instanceof InsufficientDataError) {
    console.error(`Report failed: ${err.message}. Lower --clusters or pass --no-topics.`);
  } else {
    console.error("Report failed:", err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
});
