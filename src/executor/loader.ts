import { DbConnection } from "../db/postgres.client";
import { LoadError, errorMessage } from "../errors";
import { Row } from "../pipeline/pipeline.types";
import { logger } from "../utils/logger";
import { buildInsertSql, buildTruncateSql, chunkRows } from "./query-builder";
import { RetryHooks, RetryPolicy, withRetry } from "./retry";

export type LoadParams = {
  table: string;
  rows: Row[];
  /** upsert on this key; plain append when absent */
  primaryKey?: string[];
};

/**
 * Writes one batch in a single transaction. With a primary key the write
 * is an upsert and can be replayed safely; without one a replay appends
 * duplicates. Wide or large batches are sent as several INSERTs inside
 * that transaction.
 */
export async function insertBatch(client: DbConnection, params: LoadParams): Promise<number> {
  const { table, rows, primaryKey } = params;
  if (rows.length === 0) return 0;

  const statements = chunkRows(rows).map((chunk) => buildInsertSql({ table, rows: chunk, primaryKey }));

  await client.query("BEGIN");
  try {
    let written = 0;
    for (const { sql, values } of statements) {
      const res = await client.query(sql, values);
      written += res.rowCount ?? 0;
    }
    await client.query("COMMIT");
    return written;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      logger.warn(`[load] ${table}: rollback failed (${errorMessage(rollbackErr)})`);
    }
    throw err;
  }
}

export async function loadWithRetry(
  client: DbConnection,
  params: LoadParams,
  retry: RetryPolicy,
  sleep?: RetryHooks["sleep"]
): Promise<number> {
  try {
    return await withRetry(retry, () => insertBatch(client, params), {
      sleep,
      onRetry: (err, attempt, delayMs) =>
        logger.warn(
          `[load] ${params.table} attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`
        ),
    });
  } catch (err) {
    throw new LoadError(
      `Load failed for ${params.table} after ${retry.maxAttempts} attempts: ${errorMessage(err)}`,
      params.table,
      { cause: err }
    );
  }
}

export async function truncateTable(client: DbConnection, table: string): Promise<void> {
  await client.query(buildTruncateSql(table));
}
