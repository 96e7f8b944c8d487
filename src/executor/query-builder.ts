import { Row } from "../pipeline/pipeline.types";

export type SqlStatement = { sql: string; values: unknown[] };

/** Predicate fragment; placeholders are numbered from $1. */
export type SqlFilter = { sql: string; values: unknown[] };

export function quoteIdent(ident: string): string {
  return `"${ident.replace(/"/g, '""')}"`;
}

/**
 * Quotes `table` or `schema.table`.
 */
export function quoteTable(name: string): string {
  return name
    .split(".")
    .map((part) => quoteIdent(part))
    .join(".");
}

export function watermarkFilter(column: string, priorValue: string | number): SqlFilter {
  return { sql: `${quoteIdent(column)} > $1`, values: [priorValue] };
}

export function staticFilter(predicate: string | undefined): SqlFilter | undefined {
  return predicate ? { sql: predicate, values: [] } : undefined;
}

/**
 * No ORDER BY: pages are positional, so rows written to the source while a
 * table is being read can shift between pages (skipped or read twice).
 */
export function buildSelectBatchSql(params: {
  table: string;
  filter?: SqlFilter;
  batchSize: number;
  offset: number;
}): SqlStatement {
  const { table, filter, batchSize, offset } = params;

  let sql = `SELECT * FROM ${quoteTable(table)}`;
  if (filter) sql += ` WHERE ${filter.sql}`;
  sql += ` LIMIT ${Math.trunc(batchSize)} OFFSET ${Math.trunc(offset)}`;

  return { sql, values: filter ? [...filter.values] : [] };
}

/** PostgreSQL's limit on bound parameters in one statement. */
export const MAX_BIND_PARAMS = 65535;

/**
 * Splits `rows` so each multi-row INSERT stays under `maxParams` bound
 * parameters.
 */
export function chunkRows(rows: Row[], maxParams = MAX_BIND_PARAMS): Row[][] {
  if (rows.length === 0) return [];
  const columns = Math.max(1, Object.keys(rows[0]).length);
  const perStatement = Math.max(1, Math.floor(maxParams / columns));

  const chunks: Row[][] = [];
  for (let i = 0; i < rows.length; i += perStatement) {
    chunks.push(rows.slice(i, i + perStatement));
  }
  return chunks;
}

export function buildInsertSql(params: {
  table: string;
  rows: Row[];
  primaryKey?: string[];
}): SqlStatement {
  const { table, rows, primaryKey } = params;
  if (rows.length === 0) {
    throw new Error(`Cannot build INSERT for ${table}: empty batch`);
  }

  const columns = Object.keys(rows[0]);
  const values: unknown[] = [];
  let idx = 1;

  const tuples = rows.map((row) => {
    const placeholders = columns.map((c) => {
      values.push(row[c] ?? null);
      return `$${idx++}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  let sql =
    `INSERT INTO ${quoteTable(table)} (${columns.map(quoteIdent).join(", ")}) ` +
    `VALUES ${tuples.join(", ")}`;

  if (primaryKey && primaryKey.length > 0) {
    const keySet = new Set(primaryKey);
    const updates = columns
      .filter((c) => !keySet.has(c))
      .map((c) => `${quoteIdent(c)} = EXCLUDED.${quoteIdent(c)}`);

    sql += ` ON CONFLICT (${primaryKey.map(quoteIdent).join(", ")})`;
    sql += updates.length > 0 ? ` DO UPDATE SET ${updates.join(", ")}` : " DO NOTHING";
  }

  return { sql, values };
}

export function buildTruncateSql(table: string): string {
  return `TRUNCATE TABLE ${quoteTable(table)}`;
}
