import "dotenv/config";
import express from "express";
import cors from "cors";
import { json } from "body-parser";
import { registerRoutes } from "./routes";
import { RunStore } from "../platform/run-store";
import { readPipelineConfig } from "../config/config-io";
import { CONFIG_FILE } from "../config/constants";
import { runPipeline } from "../pipeline/orchestrator";
import { preflightValidate } from "../validators/preflight";
import { FileWatermarkStore } from "../state/watermark-store";
import { logger } from "../utils/logger";

export function createApp(configPath: string) {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(json({ limit: "1mb" }));

  registerRoutes(app, {
    runs: new RunStore(),
    // config is re-read per run so edits apply without a restart
    startRun: async ({ mode, dryRun }) => {
      const cfg = readPipelineConfig(configPath);
      const runMode = mode ?? cfg.mode;
      const runDry = dryRun ?? cfg.dryRun;
      preflightValidate(cfg, runMode, runDry);
      return runPipeline(cfg, { mode: runMode, dryRun: runDry });
    },
    readWatermarks: () => new FileWatermarkStore(readPipelineConfig(configPath).stateFile).snapshot(),
  });

  return app;
}

if (require.main === module) {
  const app = createApp(process.env.PIPELINE_CONFIG || CONFIG_FILE);
  const port = Number(process.env.PLATFORM_PORT || 5050);
  app.listen(port, () => logger.info(`Platform API listening on :${port}`));
}
