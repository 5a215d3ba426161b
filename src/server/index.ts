import { config, envInfo } from "../shared/config.js";
import { SnapshotRecordSource } from "../shared/source.js";
import { createApp } from "./app.js";

const start = () => {
  if (!config.snapshotPath) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    console.error(`Missing SNAPSHOT_PATH in environment. ${details}`);
    process.exit(1);
  }

  const app = createApp(new SnapshotRecordSource(config.snapshotPath));
  app.listen(config.port, () => {
    console.log(`API listening on http://localhost:${config.port}`);
  });
};

start();
