import { Auditor } from "../audit/auditor";
import { PipelineConfig, RunMode, TableDescriptor } from "../config/pipeline-config.types";
import { Connector, DbConnection, closeQuietly, pgConnector } from "../db/postgres.client";
import { errorMessage } from "../errors";
import { extractBatches } from "../executor/extractor";
import { loadWithRetry, truncateTable } from "../executor/loader";
import { SqlFilter, staticFilter, watermarkFilter } from "../executor/query-builder";
import { RetryHooks, RetryPolicy, exponentialBackoff, fixedDelay } from "../executor/retry";
import { maskBatch } from "../masking/row-masker";
import { PgTokenVault } from "../masking/token-vault";
import { FileWatermarkStore, WatermarkStore, WatermarkValue } from "../state/watermark-store";
import { logger } from "../utils/logger";
import { checkRunnerRole } from "./authorization";
import { RunSummary, TableResult } from "./pipeline.types";
import { runPool } from "./worker-pool";

export type PipelineOptions = {
  mode?: RunMode;
  /** overrides `cfg.dryRun` */
  dryRun?: boolean;
  connect?: Connector;
  watermarks?: WatermarkStore;
  sleep?: RetryHooks["sleep"];
};

type RunContext = {
  cfg: PipelineConfig;
  mode: RunMode;
  dryRun: boolean;
  connect: Connector;
  auditor: Auditor;
  watermarks: WatermarkStore;
  extractRetry: RetryPolicy;
  loadRetry: RetryPolicy;
  sleep?: RetryHooks["sleep"];
};

/**
 * Delta mode with a stored mark reads only newer rows; otherwise the
 * table's static filter (if any) applies.
 */
export async function resolveFilter(
  table: TableDescriptor,
  mode: RunMode,
  watermarks: WatermarkStore
): Promise<SqlFilter | undefined> {
  if (mode === "delta") {
    const prior = await watermarks.get(table.name);
    if (prior !== undefined) {
      logger.info(`  ${table.name}: using watermark ${table.watermarkColumn} > ${prior}`);
      return watermarkFilter(table.watermarkColumn, prior);
    }
    logger.info(`  ${table.name}: no previous watermark, reading everything (first delta run)`);
  }
  return staticFilter(table.filter);
}

async function processTable(table: TableDescriptor, ctx: RunContext): Promise<TableResult> {
  const { cfg, mode, dryRun, auditor } = ctx;
  const started = Date.now();
  const result: TableResult = { table: table.name, batches: 0, rows: 0, failedBatches: 0, elapsedMs: 0 };

  logger.info(`Processing table ${table.name} (batch size ${table.batchSize})`);

  // each table task owns its connections
  let src: DbConnection | undefined;
  let dst: DbConnection | undefined;

  try {
    src = await ctx.connect(cfg.source, `source:${table.name}`);
    dst = await ctx.connect(cfg.destination, `destination:${table.name}`);

    const filter = await resolveFilter(table, mode, ctx.watermarks);

    if (mode === "full" && table.truncateOnFull && !dryRun) {
      await truncateTable(dst, table.name);
      logger.info(`  ${table.name}: destination truncated`);
    }

    const rules = cfg.masking.rules[table.name] ?? {};
    const maskCtx = { salt: cfg.masking.salt, vault: new PgTokenVault(dst, cfg.tokenVaultTable) };

    const batches = extractBatches(src, {
      table: table.name,
      batchSize: table.batchSize,
      filter,
      retry: ctx.extractRetry,
      sleep: ctx.sleep,
    });

    for await (const batch of batches) {
      result.batches += 1;
      logger.debug(`  ${table.name}: extracted batch of ${batch.length} rows`);

      try {
        const masked = await maskBatch(table.name, batch, rules, maskCtx);

        if (dryRun) {
          logger.info(`  [dryrun] ${table.name}: ${masked.length} rows not written`);
        } else {
          await loadWithRetry(
            dst,
            { table: table.name, rows: masked, primaryKey: table.primaryKey },
            ctx.loadRetry,
            ctx.sleep
          );
          logger.info(`  ${table.name}: loaded ${masked.length} rows`);
        }

        auditor.logTable(table.name, masked.length);
        result.rows += masked.length;

        if (mode === "delta") {
          await ctx.watermarks.advance(
            table.name,
            batch.map((row) => row[table.watermarkColumn])
          );
        }
      } catch (err) {
        result.failedBatches += 1;
        logger.error(`  ${table.name}: batch ${result.batches} failed: ${errorMessage(err)}`);
        auditor.logError(table.name, errorMessage(err));
      }
    }
  } finally {
    await closeQuietly(src);
    await closeQuietly(dst);

    result.elapsedMs = Date.now() - started;
    if (result.rows === 0) logger.info(`  ${table.name}: no rows processed`);
    logger.info(
      `  ${table.name}: ${result.rows} rows in ${result.batches} batches, ${(result.elapsedMs / 1000).toFixed(3)}s`
    );
  }

  return result;
}

async function runTables(ctx: RunContext): Promise<void> {
  const { cfg, auditor } = ctx;
  const tables = cfg.tables;

  const onTableError = (table: TableDescriptor, err: unknown) => {
    logger.error(`Table ${table.name} aborted: ${errorMessage(err)}`);
    auditor.logError(table.name, errorMessage(err));
  };

  const task = async (table: TableDescriptor) => {
    await processTable(table, ctx);
  };

  if (cfg.parallelTables && tables.length > 1) {
    logger.info(`Running ${tables.length} tables in parallel (workers = ${cfg.maxWorkers})`);
    await runPool(tables, cfg.maxWorkers, task, onTableError);
    return;
  }

  for (const table of tables) {
    try {
      await task(table);
    } catch (err) {
      onTableError(table, err);
    }
  }
}

/**
 * Opens the run's own connections and checks the runner role. On any
 * failure both are closed before the error propagates.
 */
async function openAuthorized(
  cfg: PipelineConfig,
  connect: Connector
): Promise<{ src: DbConnection; dst: DbConnection }> {
  let src: DbConnection | undefined;
  let dst: DbConnection | undefined;

  try {
    src = await connect(cfg.source, "source");
    dst = await connect(cfg.destination, "destination");
    await checkRunnerRole(dst, cfg.allowedRunnerRoles);
    return { src, dst };
  } catch (err) {
    await closeQuietly(src);
    await closeQuietly(dst);
    throw err;
  }
}

/**
 * One pipeline run: authorize, copy every table, write the audit row.
 *
 * Throws only when connecting or authorizing fails; in that case nothing
 * has been read, written or audited. Every later failure is recorded in
 * the audit and the run carries on.
 */
export async function runPipeline(cfg: PipelineConfig, opts: PipelineOptions = {}): Promise<RunSummary> {
  const mode = opts.mode ?? cfg.mode;
  const dryRun = opts.dryRun ?? cfg.dryRun;
  const connect = opts.connect ?? pgConnector(cfg.retry.connect);

  logger.info(`Environment: ${cfg.envName}`);
  logger.info(`Mode: ${mode}${dryRun ? " (dry run)" : ""}`);

  const { src, dst } = await openAuthorized(cfg, connect);
  logger.info("Database role authorized");

  const auditor = new Auditor(dst, cfg.envName, cfg.auditTable);
  const watermarks = opts.watermarks ?? new FileWatermarkStore(cfg.stateFile);
  let auditPersisted = false;

  try {
    await runTables({
      cfg,
      mode,
      dryRun,
      connect,
      auditor,
      watermarks,
      extractRetry: fixedDelay(cfg.retry.extract),
      loadRetry: exponentialBackoff(cfg.retry.load),
      sleep: opts.sleep,
    });
    logger.info("Pipeline completed");
  } catch (err) {
    logger.error(`Pipeline error: ${errorMessage(err)}`);
    auditor.logError("general", errorMessage(err));
  } finally {
    try {
      await auditor.finish();
      auditPersisted = true;
    } catch (err) {
      logger.error(errorMessage(err));
    }
    await closeQuietly(src);
    await closeQuietly(dst);
  }

  let finalMarks: Record<string, WatermarkValue> = {};
  if (mode === "delta") {
    try {
      finalMarks = await watermarks.snapshot();
    } catch (err) {
      logger.error(`Could not read watermarks for the run summary: ${errorMessage(err)}`);
    }
  }

  return {
    ...auditor.summary(),
    mode,
    dryRun,
    auditPersisted,
    watermarks: finalMarks,
  };
}
