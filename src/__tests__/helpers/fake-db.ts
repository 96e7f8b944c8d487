import type { DbConfig } from "../../config/tool.config";
import type { Connector, DbConnection, QueryRows } from "../../db/postgres.client";
import type { Row } from "../../pipeline/pipeline.types";

type Logged = { sql: string; values: unknown[] };

export type FailureHook = (sql: string, values: unknown[]) => Error | undefined;

function unquote(ident: string): string {
  const t = ident.trim();
  return t.startsWith('"') && t.endsWith('"') ? t.slice(1, -1).replace(/""/g, '"') : t;
}

function tableName(quoted: string): string {
  return quoted
    .split(".")
    .map(unquote)
    .join(".");
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/**
 * Just enough of PostgreSQL to run the pipeline's own statements against
 * in-memory tables. Anything else throws, so a test notices a new query shape.
 */
export class FakeDatabase {
  readonly tables = new Map<string, Row[]>();
  readonly log: Logged[] = [];
  /** static WHERE text -> row predicate */
  readonly predicates = new Map<string, (row: Row) => boolean>();
  role = "qa_runner";
  failOn: FailureHook | undefined;
  opened = 0;
  closed = 0;

  constructor(readonly name: string) {}

  seed(table: string, rows: Row[]) {
    this.tables.set(table, rows.map((r) => ({ ...r })));
  }

  rows(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }

  queries(pattern: RegExp): Logged[] {
    return this.log.filter((q) => pattern.test(q.sql));
  }

  connect(): FakeConnection {
    this.opened += 1;
    return new FakeConnection(this);
  }

  /** Rows carried by an INSERT's VALUES list. */
  insertRowCount(sql: string, values: unknown[]): number {
    const m = /^INSERT INTO \S+ \(([^)]*)\)/.exec(sql.trim());
    if (!m) throw new Error(`fake-db: unsupported INSERT: ${sql}`);
    return values.length / m[1].split(",").length;
  }

  /** Executes an INSERT immediately; returns the rows that were written. */
  applyInsert(sql: string, values: unknown[]): Row[] {
    const m = /^INSERT INTO (\S+) \(([^)]*)\)\s*VALUES (.+?)(?: ON CONFLICT \(([^)]*)\) (DO UPDATE SET .+?|DO NOTHING))?(?: RETURNING (\w+))?$/s.exec(
      sql.trim()
    );
    if (!m) throw new Error(`fake-db: unsupported INSERT: ${sql}`);

    const table = tableName(m[1]);
    const columns = m[2].split(",").map(unquote);
    const keys = m[4] ? m[4].split(",").map(unquote) : undefined;
    const doNothing = m[5] === "DO NOTHING";

    const rowCount = values.length / columns.length;
    const target = this.tables.get(table) ?? [];
    this.tables.set(table, target);

    const written: Row[] = [];
    for (let r = 0; r < rowCount; r++) {
      const row: Row = {};
      columns.forEach((c, i) => {
        row[c] = values[r * columns.length + i];
      });

      if (keys) {
        const existing = target.find((t) => keys.every((k) => t[k] === row[k]));
        if (existing) {
          if (!doNothing) Object.assign(existing, row);
          if (!doNothing) written.push(existing);
          continue;
        }
      }
      target.push(row);
      written.push(row);
    }
    return written;
  }

  select(sql: string, values: unknown[]): Row[] {
    const page = /^SELECT \* FROM (\S+)(?: WHERE (.+?))? LIMIT (\d+) OFFSET (\d+)$/.exec(sql);
    if (page) {
      const all = this.rows(tableName(page[1]));
      const where = page[2];
      let filtered = all;

      if (where !== undefined) {
        const wm = /^"([^"]+)" > \$1$/.exec(where);
        if (wm) {
          filtered = all.filter((r) => r[wm[1]] !== null && compare(r[wm[1]], values[0]) > 0);
        } else {
          const pred = this.predicates.get(where);
          if (!pred) throw new Error(`fake-db: unknown predicate: ${where}`);
          filtered = all.filter(pred);
        }
      }

      const limit = Number(page[3]);
      const offset = Number(page[4]);
      return filtered.slice(offset, offset + limit).map((r) => ({ ...r }));
    }

    const lookup = /^SELECT (\w+) FROM (\S+) WHERE (\w+) = \$1$/.exec(sql);
    if (lookup) {
      return this.rows(tableName(lookup[2]))
        .filter((r) => r[lookup[3]] === values[0])
        .map((r) => ({ [lookup[1]]: r[lookup[1]] }));
    }

    throw new Error(`fake-db: unsupported SELECT: ${sql}`);
  }
}

export class FakeConnection implements DbConnection {
  private pending: (() => void)[] | undefined;
  ended = false;

  constructor(private readonly db: FakeDatabase) {}

  async query<R extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    values: unknown[] = []
  ): Promise<QueryRows<R>> {
    // a real round trip is never synchronous; let other tasks interleave
    await Promise.resolve();

    if (this.ended) throw new Error("fake-db: connection already closed");

    const text = sql.trim();
    this.db.log.push({ sql: text, values });

    const failure = this.db.failOn?.(text, values);
    if (failure) throw failure;

    return this.execute<R>(text, values);
  }

  async end(): Promise<void> {
    this.ended = true;
    this.db.closed += 1;
  }

  private execute<R>(sql: string, values: unknown[]): QueryRows<R> {
    const result = (rows: Row[], rowCount: number | null = rows.length): QueryRows<R> => ({
      // rows built by the fake are shaped by the statement the test issued
      rows: rows as R[],
      rowCount,
    });

    if (sql === "BEGIN") {
      this.pending = [];
      return result([], null);
    }
    if (sql === "COMMIT") {
      for (const apply of this.pending ?? []) apply();
      this.pending = undefined;
      return result([], null);
    }
    if (sql === "ROLLBACK") {
      this.pending = undefined;
      return result([], null);
    }
    if (sql === "SELECT current_user AS role") {
      return result([{ role: this.db.role }]);
    }
    if (sql.startsWith("TRUNCATE TABLE ")) {
      this.db.tables.set(tableName(sql.slice("TRUNCATE TABLE ".length)), []);
      return result([], null);
    }
    if (sql.startsWith("SELECT ")) {
      return result(this.db.select(sql, values));
    }
    if (sql.startsWith("INSERT INTO ")) {
      const returning = /RETURNING (\w+)$/.exec(sql);
      if (this.pending) {
        const count = this.db.insertRowCount(sql, values);
        this.pending.push(() => this.db.applyInsert(sql, values));
        return result([], count);
      }
      const written = this.db.applyInsert(sql, values);
      if (returning) {
        const col = returning[1];
        return result(written.map((r) => ({ [col]: r[col] })));
      }
      return result([], written.length);
    }

    throw new Error(`fake-db: unsupported statement: ${sql}`);
  }
}

/**
 * Routes connections by database name, the way a real connector would by
 * host/database.
 */
export function fakeConnector(...dbs: FakeDatabase[]): Connector {
  return async (cfg: DbConfig) => {
    const db = dbs.find((d) => d.name === cfg.database);
    if (!db) throw new Error(`fake-db: no database named ${cfg.database}`);
    return db.connect();
  };
}
