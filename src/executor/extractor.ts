import { DbConnection } from "../db/postgres.client";
import { ExtractionError, errorMessage } from "../errors";
import { Row } from "../pipeline/pipeline.types";
import { logger } from "../utils/logger";
import { SqlFilter, buildSelectBatchSql } from "./query-builder";
import { RetryHooks, RetryPolicy, withRetry } from "./retry";

export type ExtractParams = {
  table: string;
  batchSize: number;
  filter?: SqlFilter;
  retry: RetryPolicy;
  sleep?: RetryHooks["sleep"];
};

/**
 * Reads `table` page by page with LIMIT/OFFSET until a page comes back
 * empty. Each page fetch is retried under `retry`; when attempts run out
 * the generator throws ExtractionError and yields nothing further.
 *
 * Single pass: the generator cannot be restarted.
 */
export async function* extractBatches(
  client: DbConnection,
  params: ExtractParams
): AsyncGenerator<Row[], void, undefined> {
  const { table, batchSize, filter, retry } = params;
  let offset = 0;

  while (true) {
    const { sql, values } = buildSelectBatchSql({ table, filter, batchSize, offset });

    let rows: Row[];
    try {
      const res = await withRetry(retry, () => client.query<Row>(sql, values), {
        sleep: params.sleep,
        onRetry: (err, attempt, delayMs) =>
          logger.warn(
            `[extract] ${table} offset ${offset} attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`
          ),
      });
      rows = res.rows;
    } catch (err) {
      throw new ExtractionError(
        `Extraction failed for ${table} at offset ${offset} after ${retry.maxAttempts} attempts: ${errorMessage(err)}`,
        table,
        { cause: err }
      );
    }

    if (rows.length === 0) return;

    yield rows;
    offset += batchSize;
  }
}
