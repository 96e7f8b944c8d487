import { describe, it, expect } from "vitest";
import {
  buildInsertSql,
  buildSelectBatchSql,
  buildTruncateSql,
  chunkRows,
  quoteTable,
  staticFilter,
  watermarkFilter,
} from "../query-builder";

describe("quoteTable", () => {
  it("quotes each part of a qualified name", () => {
    expect(quoteTable("customers")).toBe('"customers"');
    expect(quoteTable("sales.orders")).toBe('"sales"."orders"');
    expect(quoteTable('we"ird')).toBe('"we""ird"');
  });
});

describe("buildSelectBatchSql", () => {
  it("pages without a filter", () => {
    expect(buildSelectBatchSql({ table: "customers", batchSize: 500, offset: 1000 })).toEqual({
      sql: 'SELECT * FROM "customers" LIMIT 500 OFFSET 1000',
      values: [],
    });
  });

  it("binds the watermark as $1", () => {
    const filter = watermarkFilter("updated_at", "2024-01-02");
    expect(buildSelectBatchSql({ table: "customers", filter, batchSize: 2, offset: 0 })).toEqual({
      sql: 'SELECT * FROM "customers" WHERE "updated_at" > $1 LIMIT 2 OFFSET 0',
      values: ["2024-01-02"],
    });
  });

  it("inlines a static predicate", () => {
    const filter = staticFilter("status <> 'draft'");
    expect(buildSelectBatchSql({ table: "orders", filter, batchSize: 10, offset: 0 }).sql).toBe(
      `SELECT * FROM "orders" WHERE status <> 'draft' LIMIT 10 OFFSET 0`
    );
    expect(staticFilter(undefined)).toBeUndefined();
  });
});

describe("buildInsertSql", () => {
  const rows = [
    { id: 1, email: "a", name: "x" },
    { id: 2, email: "b", name: null },
  ];

  it("builds a plain multi-row insert without a key", () => {
    expect(buildInsertSql({ table: "events", rows })).toEqual({
      sql: 'INSERT INTO "events" ("id", "email", "name") VALUES ($1, $2, $3), ($4, $5, $6)',
      values: [1, "a", "x", 2, "b", null],
    });
  });

  it("upserts every non-key column with a key", () => {
    expect(buildInsertSql({ table: "customers", rows, primaryKey: ["id"] }).sql).toBe(
      'INSERT INTO "customers" ("id", "email", "name") VALUES ($1, $2, $3), ($4, $5, $6) ' +
        'ON CONFLICT ("id") DO UPDATE SET "email" = EXCLUDED."email", "name" = EXCLUDED."name"'
    );
  });

  it("does nothing on conflict when every column is part of the key", () => {
    expect(buildInsertSql({ table: "links", rows: [{ a: 1, b: 2 }], primaryKey: ["a", "b"] }).sql).toBe(
      'INSERT INTO "links" ("a", "b") VALUES ($1, $2) ON CONFLICT ("a", "b") DO NOTHING'
    );
  });

  it("rejects an empty batch", () => {
    expect(() => buildInsertSql({ table: "t", rows: [] })).toThrow("empty batch");
  });
});

describe("buildTruncateSql", () => {
  it("quotes the table", () => {
    expect(buildTruncateSql("public.orders")).toBe('TRUNCATE TABLE "public"."orders"');
  });
});

describe("chunkRows", () => {
  it("keeps every statement under the bound-parameter limit", () => {
    const rows = Array.from({ length: 10 }, (_, i) => ({ a: i, b: i, c: i }));
    const chunks = chunkRows(rows, 7);

    // 7 params / 3 columns -> 2 rows per statement
    expect(chunks.map((c) => c.length)).toEqual([2, 2, 2, 2, 2]);
    expect(chunks.flat()).toEqual(rows);
  });

  it("sizes chunks against PostgreSQL's 65535 limit by default", () => {
    const row = Object.fromEntries(Array.from({ length: 132 }, (_, i) => [`c${i}`, i]));
    const chunks = chunkRows(Array.from({ length: 500 }, () => row));

    expect(chunks.map((c) => c.length)).toEqual([496, 4]);
  });

  it("returns nothing for an empty batch", () => {
    expect(chunkRows([])).toEqual([]);
  });
});
