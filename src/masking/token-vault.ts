import crypto from "crypto";
import { DbConnection } from "../db/postgres.client";
import { quoteTable } from "../executor/query-builder";

export interface TokenVault {
  getOrCreate(originalId: string): Promise<string>;
}

/**
 * Durable original-id -> token mapping kept in the destination database.
 *
 * Creation is a single conditional insert: under concurrent callers the
 * unique constraint on `original_id` lets exactly one row in, and every
 * loser re-reads the winner's token.
 */
export class PgTokenVault implements TokenVault {
  private readonly cache = new Map<string, string>();
  private readonly table: string;

  constructor(
    private readonly client: DbConnection,
    table = "token_vault",
    private readonly newToken: () => string = () => crypto.randomUUID()
  ) {
    this.table = quoteTable(table);
  }

  async getOrCreate(originalId: string): Promise<string> {
    const cached = this.cache.get(originalId);
    if (cached !== undefined) return cached;

    const inserted = await this.client.query<{ token_uuid: string }>(
      `INSERT INTO ${this.table} (original_id, token_uuid) VALUES ($1, $2) ` +
        `ON CONFLICT (original_id) DO NOTHING RETURNING token_uuid`,
      [originalId, this.newToken()]
    );

    let token = inserted.rows[0]?.token_uuid;

    if (token === undefined) {
      const existing = await this.client.query<{ token_uuid: string }>(
        `SELECT token_uuid FROM ${this.table} WHERE original_id = $1`,
        [originalId]
      );
      token = existing.rows[0]?.token_uuid;
    }

    if (token === undefined) {
      throw new Error(`Token vault returned no token for an existing identifier`);
    }

    this.cache.set(originalId, token);
    return token;
  }
}
