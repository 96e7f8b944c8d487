import { describe, it, expect } from "vitest";
import { insertBatch, loadWithRetry, truncateTable } from "../loader";
import { exponentialBackoff } from "../retry";
import { FakeDatabase } from "../../__tests__/helpers/fake-db";
import { LoadError } from "../../errors";

const noSleep = async () => undefined;
const backoff = exponentialBackoff({ maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2 });

describe("insertBatch", () => {
  it("commits the batch in one transaction", async () => {
    const db = new FakeDatabase("qa");
    await insertBatch(db.connect(), { table: "events", rows: [{ id: 1 }, { id: 2 }] });

    expect(db.rows("events")).toEqual([{ id: 1 }, { id: 2 }]);
    expect(db.log.map((q) => q.sql.split(" ")[0])).toEqual(["BEGIN", "INSERT", "COMMIT"]);
  });

  it("splits a batch over the parameter limit into several INSERTs in one transaction", async () => {
    const db = new FakeDatabase("qa");
    const rows = Array.from({ length: 10000 }, (_, i) => ({ a: i, b: 0, c: 0, d: 0, e: 0, f: 0, g: 0 }));

    const written = await insertBatch(db.connect(), { table: "events", rows });

    expect(written).toBe(10000);
    expect(db.log.map((q) => q.sql.split(" ")[0])).toEqual(["BEGIN", "INSERT", "INSERT", "COMMIT"]);
    expect(db.queries(/^INSERT/).map((q) => q.values.length)).toEqual([9362 * 7, 638 * 7]);
    expect(db.rows("events")).toHaveLength(10000);
  });

  it("is idempotent for keyed tables", async () => {
    const db = new FakeDatabase("qa");
    const rows = [
      { customer_id: 1, email: "h1" },
      { customer_id: 2, email: "h2" },
    ];

    await insertBatch(db.connect(), { table: "customers", rows, primaryKey: ["customer_id"] });
    const afterFirst = structuredClone(db.rows("customers"));
    await insertBatch(db.connect(), { table: "customers", rows, primaryKey: ["customer_id"] });

    expect(db.rows("customers")).toEqual(afterFirst);
  });

  it("overwrites non-key columns of existing rows", async () => {
    const db = new FakeDatabase("qa");
    db.seed("customers", [{ customer_id: 1, email: "old" }]);

    await insertBatch(db.connect(), {
      table: "customers",
      rows: [{ customer_id: 1, email: "new" }],
      primaryKey: ["customer_id"],
    });

    expect(db.rows("customers")).toEqual([{ customer_id: 1, email: "new" }]);
  });

  it("appends duplicates on replay when no key is declared", async () => {
    const db = new FakeDatabase("qa");
    const rows = [{ id: 1 }];
    await insertBatch(db.connect(), { table: "events", rows });
    await insertBatch(db.connect(), { table: "events", rows });

    expect(db.rows("events")).toHaveLength(2);
  });

  it("rolls back and rethrows on failure", async () => {
    const db = new FakeDatabase("qa");
    db.failOn = (sql) => (sql.startsWith("INSERT") ? new Error("duplicate key") : undefined);

    await expect(insertBatch(db.connect(), { table: "events", rows: [{ id: 1 }] })).rejects.toThrow("duplicate key");
    expect(db.rows("events")).toEqual([]);
    expect(db.log.map((q) => q.sql.split(" ")[0])).toEqual(["BEGIN", "INSERT", "ROLLBACK"]);
  });
});

describe("loadWithRetry", () => {
  it("retries until the write goes through", async () => {
    const db = new FakeDatabase("qa");
    let failures = 0;
    db.failOn = (sql) => {
      if (sql.startsWith("INSERT") && failures < 2) {
        failures += 1;
        return new Error("deadlock detected");
      }
      return undefined;
    };

    await loadWithRetry(db.connect(), { table: "events", rows: [{ id: 1 }] }, backoff, noSleep);

    expect(db.rows("events")).toEqual([{ id: 1 }]);
    expect(db.queries(/^ROLLBACK$/)).toHaveLength(2);
  });

  it("gives up with LoadError after the last attempt", async () => {
    const db = new FakeDatabase("qa");
    db.failOn = (sql) => (sql.startsWith("INSERT") ? new Error("disk full") : undefined);

    const err = await loadWithRetry(db.connect(), { table: "events", rows: [{ id: 1 }] }, backoff, noSleep).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(LoadError);
    expect(err).toMatchObject({ message: "Load failed for events after 5 attempts: disk full", unit: "events" });
    expect(db.queries(/^INSERT/)).toHaveLength(5);
  });
});

describe("truncateTable", () => {
  it("empties the destination table", async () => {
    const db = new FakeDatabase("qa");
    db.seed("orders", [{ id: 1 }]);
    await truncateTable(db.connect(), "orders");
    expect(db.rows("orders")).toEqual([]);
  });
});
