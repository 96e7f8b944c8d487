import { Client } from "pg";
import { DbConfig, resolveDbPassword } from "../config/tool.config";
import { BackoffConfig } from "../config/pipeline-config.types";
import { ConnectivityError, errorMessage } from "../errors";
import { exponentialBackoff, withRetry } from "../executor/retry";
import { logger } from "../utils/logger";

export type QueryRows<R> = {
  rows: R[];
  rowCount: number | null;
};

/**
 * The slice of a pg client the pipeline talks to. Tests provide an
 * in-process implementation.
 */
export interface DbConnection {
  query<R extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    values?: unknown[]
  ): Promise<QueryRows<R>>;
  end(): Promise<void>;
}

export type Connector = (db: DbConfig, label: string) => Promise<DbConnection>;

class PgConnection implements DbConnection {
  constructor(private readonly client: Client) {}

  async query<R extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    values?: unknown[]
  ): Promise<QueryRows<R>> {
    const res = await this.client.query<R>(sql, values);
    return { rows: res.rows, rowCount: res.rowCount };
  }

  end(): Promise<void> {
    return this.client.end();
  }
}

function newClient(db: DbConfig, password: string): Client {
  return new Client({
    host: db.host,
    port: db.port,
    user: db.user,
    password,
    database: db.database,
    ssl: db.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/**
 * Opens a connection, retrying connectivity/authentication failures with
 * exponential backoff. Exhaustion is a ConnectivityError for `label`.
 */
export async function connectPg(
  db: DbConfig,
  label: string,
  retry: BackoffConfig
): Promise<DbConnection> {
  const password = resolveDbPassword(db);

  try {
    return await withRetry(
      exponentialBackoff(retry),
      async () => {
        const client = newClient(db, password);
        try {
          await client.connect();
        } catch (err) {
          await client.end().catch((closeErr: unknown) =>
            logger.debug(`Ignoring close error after failed connect: ${errorMessage(closeErr)}`)
          );
          throw err;
        }
        return new PgConnection(client);
      },
      {
        onRetry: (err, attempt, delayMs) =>
          logger.warn(
            `[connect] ${label} attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`
          ),
      }
    );
  } catch (err) {
    throw new ConnectivityError(
      `Could not connect to ${label} (${db.host}:${db.port}/${db.database}): ${errorMessage(err)}`,
      label,
      { cause: err }
    );
  }
}

export function pgConnector(retry: BackoffConfig): Connector {
  return (db, label) => connectPg(db, label, retry);
}

export async function withPgClient<T>(
  connect: () => Promise<DbConnection>,
  fn: (client: DbConnection) => Promise<T>
): Promise<T> {
  const client = await connect();
  try {
    return await fn(client);
  } finally {
    await closeQuietly(client);
  }
}

/** Best-effort close; a failing close never masks the caller's outcome. */
export async function closeQuietly(client: DbConnection | undefined): Promise<void> {
  if (!client) return;
  try {
    await client.end();
  } catch (err) {
    logger.debug(`Ignoring close error: ${errorMessage(err)}`);
  }
}
