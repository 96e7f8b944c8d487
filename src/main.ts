#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "./cli/args";
import { dbConfigFromEnv, loadLocalEnv } from "./config/tool.config";
import { connectPg, withPgClient } from "./db/postgres.client";
import { logger } from "./utils/logger";

import { generateConfig } from "./config/config-generator";
import { readPipelineConfig, writeYaml } from "./config/config-io";
import { runPipeline } from "./pipeline/orchestrator";
import { preflightValidate } from "./validators/preflight";
import { defaultReportPath, writeJsonReport } from "./reporting/report-writer";
import { errorMessage } from "./errors";

import { CONFIG_FILE, REPORT_DIR } from "./config/constants";

async function main() {
  loadLocalEnv();
  const args = parseArgs(process.argv.slice(2));
  const configPath = args.configPath ?? CONFIG_FILE;

  // -----------------------------
  // CONFIG GENERATION
  // -----------------------------
  if (args.mode === "configGen") {
    logger.info("Generating pipeline config from the source schema...");

    const source = dbConfigFromEnv();
    const retry = { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2 };

    const config = await withPgClient(
      () => connectPg(source, "source", retry),
      (client) =>
        generateConfig({
          client,
          schema: process.env.DEFAULT_SCHEMA || "public",
          source,
          destination: { ...source, host: "qa-host", passwordEnv: "QA_PGPASSWORD" },
        })
    );

    writeYaml(configPath, config);
    logger.info(`Config written to ${configPath}`);
    logger.info(
      "Next steps:\n" +
        "1. Review masking.rules and primary keys\n" +
        "2. Point destination at the QA database\n" +
        "3. Set MASKING_SALT (never change it afterwards)\n" +
        "4. Run --delta or --full (dryRun is on until you turn it off)"
    );
    return;
  }

  // -----------------------------
  // DELTA / FULL
  // -----------------------------
  const config = readPipelineConfig(configPath);
  const mode = args.mode ?? config.mode;
  const dryRun = args.dryrun || config.dryRun;
  preflightValidate(config, mode, dryRun);

  const summary = await runPipeline(config, { mode, dryRun });

  const reportPath = args.reportPath ?? defaultReportPath(REPORT_DIR, summary);
  writeJsonReport(reportPath, summary);
  logger.info(`Run report written to ${reportPath}`);
  logger.info(
    `Rows copied: ${summary.rowsCopied}, failed units: ${summary.rowsFailed}` +
      (summary.auditPersisted ? "" : " (audit row NOT persisted)")
  );

  if (!summary.auditPersisted) process.exitCode = 1;
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.stack || err.message : errorMessage(err));
  process.exit(1);
});
