import crypto from "crypto";
import { DbConnection } from "../db/postgres.client";
import { AuditPersistenceError, errorMessage } from "../errors";
import { quoteTable } from "../executor/query-builder";
import { AuditSummary, ErrorEntry, TableEntry } from "../pipeline/pipeline.types";
import { logger } from "../utils/logger";

/**
 * Accumulates one run's counters and errors and writes them as a single
 * row at the end.
 *
 * Every mutator is synchronous, so calls from concurrently running table
 * tasks are applied one at a time by the event loop.
 */
export class Auditor {
  readonly executionId: string;
  private readonly startedAt: Date;
  private finishedAt: Date | undefined;
  private readonly tables: TableEntry[] = [];
  private readonly errors: ErrorEntry[] = [];
  private rowsCopied = 0;
  private rowsFailed = 0;

  constructor(
    private readonly client: DbConnection,
    private readonly envName: string,
    private readonly table = "execution_audit",
    private readonly now: () => Date = () => new Date()
  ) {
    this.executionId = crypto.randomUUID();
    this.startedAt = this.now();
  }

  logTable(table: string, rows: number) {
    this.tables.push({ table, rows });
    this.rowsCopied += rows;
  }

  /** Records a failed unit. Never throws. */
  logError(unit: string, message: string) {
    this.rowsFailed += 1;
    this.errors.push({ unit, error: String(message) });
  }

  summary(): AuditSummary {
    return {
      executionId: this.executionId,
      envName: this.envName,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt?.toISOString(),
      tablesProcessed: this.tables.map((t) => ({ ...t })),
      rowsCopied: this.rowsCopied,
      rowsFailed: this.rowsFailed,
      errors: this.errors.map((e) => ({ ...e })),
    };
  }

  /**
   * Stamps the end time and inserts the summary row. A failure here is
   * thrown as AuditPersistenceError and not retried.
   */
  async finish(): Promise<AuditSummary> {
    this.finishedAt = this.now();

    // a batch that failed mid-transaction can leave the connection aborted
    try {
      await this.client.query("ROLLBACK");
    } catch (err) {
      logger.debug(`[audit] pre-write rollback ignored: ${errorMessage(err)}`);
    }

    const summary = this.summary();

    try {
      await this.client.query(
        `INSERT INTO ${quoteTable(this.table)} (
          execution_id, started_at, finished_at, env_name,
          tables_processed, rows_copied, rows_failed, errors
        ) VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8::jsonb)`,
        [
          summary.executionId,
          this.startedAt,
          this.finishedAt,
          summary.envName,
          JSON.stringify(summary.tablesProcessed),
          summary.rowsCopied,
          summary.rowsFailed,
          JSON.stringify(summary.errors),
        ]
      );
    } catch (err) {
      throw new AuditPersistenceError(
        `Could not persist audit ${summary.executionId}: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    logger.info(`Audit saved with execution id ${summary.executionId}`);
    return summary;
  }
}
