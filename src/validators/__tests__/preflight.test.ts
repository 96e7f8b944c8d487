import { describe, it, expect, vi } from "vitest";
import { preflightValidate } from "../preflight";
import type { PipelineConfig, TableDescriptor } from "../../config/pipeline-config.types";
import { logger } from "../../utils/logger";

function table(name: string, extra: Partial<TableDescriptor> = {}): TableDescriptor {
  return { name, batchSize: 100, watermarkColumn: "updated_at", truncateOnFull: false, ...extra };
}

function config(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const db = { host: "h", port: 5432, user: "u", database: "d", password: "test-secret" };
  return {
    version: 1,
    envName: "qa",
    mode: "delta",
    dryRun: false,
    parallelTables: false,
    maxWorkers: 3,
    stateFile: "state/last_run.json",
    allowedRunnerRoles: [],
    source: db,
    destination: db,
    masking: { salt: "test-salt", rules: {} },
    tables: [table("customers")],
    retry: {
      extract: { maxAttempts: 1, delayMs: 0 },
      load: { maxAttempts: 1, initialDelayMs: 0, maxDelayMs: 0, multiplier: 1 },
      connect: { maxAttempts: 1, initialDelayMs: 0, maxDelayMs: 0, multiplier: 1 },
    },
    auditTable: "execution_audit",
    tokenVaultTable: "token_vault",
    ...overrides,
  };
}

describe("preflightValidate", () => {
  it("accepts a consistent config", () => {
    expect(() => preflightValidate(config(), "delta")).not.toThrow();
  });

  it("requires at least one table", () => {
    expect(() => preflightValidate(config({ tables: [] }), "delta")).toThrow(
      "No tables configured in config.tables"
    );
  });

  it("rejects a table listed twice", () => {
    expect(() => preflightValidate(config({ tables: [table("a"), table("a")] }), "delta")).toThrow(
      'Table "a" is configured more than once'
    );
  });

  it("rejects rules for tables that are not copied", () => {
    const cfg = config({ masking: { salt: "s", rules: { orders: { note: { kind: "hash" } } } } });
    expect(() => preflightValidate(cfg, "delta")).toThrow(
      "masking.rules names tables that are not configured: orders"
    );
  });

  it("warns when a primary key column is hashed", () => {
    const warn = vi.spyOn(logger, "warn");
    const cfg = config({
      tables: [table("customers", { primaryKey: ["email"] })],
      masking: { salt: "s", rules: { customers: { email: { kind: "hash" } } } },
    });

    preflightValidate(cfg, "delta");

    expect(warn).toHaveBeenCalledWith('customers.email is part of the primary key and masked with "hash"');
  });

  it("does not warn for a tokenized key", () => {
    const warn = vi.spyOn(logger, "warn");
    const cfg = config({
      tables: [table("customers", { primaryKey: ["ssn"] })],
      masking: { salt: "s", rules: { customers: { ssn: { kind: "tokenize" } } } },
    });

    preflightValidate(cfg, "delta");

    expect(warn).not.toHaveBeenCalled();
  });
});
