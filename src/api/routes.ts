import type { Express, NextFunction, Request, Response } from "express";
import { z } from "zod";
import { asyncRoute, validate } from "./validators";
import { RunStore } from "../platform/run-store";
import { RunMode } from "../config/pipeline-config.types";
import { RunSummary } from "../pipeline/pipeline.types";
import { WatermarkValue } from "../state/watermark-store";
import { AuthorizationError, ConfigError, ConnectivityError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

export type PlatformDeps = {
  runs: RunStore;
  startRun: (opts: { mode?: RunMode; dryRun?: boolean }) => Promise<RunSummary>;
  readWatermarks: () => Promise<Record<string, WatermarkValue>>;
};

const StartRunZ = z.object({
  body: z
    .object({
      mode: z.enum(["delta", "full"]).optional(),
      dryRun: z.boolean().optional(),
    })
    .default({}),
});

const RunIdZ = z.object({
  params: z.object({ id: z.string().uuid() }),
});

function statusFor(err: unknown): number {
  if (err instanceof AuthorizationError) return 403;
  if (err instanceof ConfigError) return 400;
  if (err instanceof ConnectivityError) return 502;
  return 500;
}

export function registerRoutes(app: Express, deps: PlatformDeps) {
  app.get("/health", (_req, res) => {
    res.json({ ok: true, running: deps.runs.isRunning });
  });

  // 1) Start a run and wait for its summary
  app.post(
    "/runs",
    validate(StartRunZ, async ({ body }, _req, res) => {
      const summary = await deps.runs.runExclusive(() => deps.startRun(body));
      if (!summary) {
        res.status(409).json({ error: "A run is already in progress" });
        return;
      }
      res.status(201).json(summary);
    })
  );

  // 2) Runs started by this process
  app.get("/runs", (_req, res) => {
    res.json({ runs: deps.runs.list() });
  });

  app.get(
    "/runs/:id",
    validate(RunIdZ, async ({ params }, _req, res) => {
      const run = deps.runs.get(params.id);
      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }
      res.json(run);
    })
  );

  // 3) Current high-water marks
  app.get(
    "/watermarks",
    asyncRoute(async (_req, res) => {
      res.json({ watermarks: await deps.readWatermarks() });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`[api] ${errorMessage(err)}`);
    res.status(statusFor(err)).json({ error: errorMessage(err) });
  });
}
